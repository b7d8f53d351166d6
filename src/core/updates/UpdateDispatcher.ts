import { updateSchema, updateType, type Update, type UpdateKind, type UpdatePayload } from '../types/update.js';
import { createLogger } from '../../utils/logger.js';
import { DecodeError } from '../../utils/errors.js';

export type UpdateHandler = (update: Update) => Promise<void>;
export type KindHandler<K extends UpdateKind> = (payload: UpdatePayload<K>, update: Update) => Promise<void>;

/** Routes decoded updates to the handlers registered for their kind. */
export class UpdateDispatcher {
  private readonly logger = createLogger({ component: 'UpdateDispatcher' });
  private readonly kindHandlers = new Map<UpdateKind, UpdateHandler[]>();
  private readonly updateHandlers: UpdateHandler[] = [];

  on<K extends UpdateKind>(kind: K, handler: KindHandler<K>): this {
    const wrapped: UpdateHandler = async (update) => {
      const payload = update[kind];
      if (payload != null) {
        await handler(payload, update);
      }
    };
    const handlers = this.kindHandlers.get(kind) ?? [];
    handlers.push(wrapped);
    this.kindHandlers.set(kind, handlers);
    return this;
  }

  /** Registers a handler that sees every update, whatever its kind. */
  onUpdate(handler: UpdateHandler): this {
    this.updateHandlers.push(handler);
    return this;
  }

  async dispatch(update: Update): Promise<void> {
    const kind = updateType(update);
    const logger = this.logger.child({ method: 'dispatch', updateId: update.update_id, kind });

    const handlers = [...this.updateHandlers, ...(kind === undefined ? [] : this.kindHandlers.get(kind) ?? [])];
    if (handlers.length === 0) {
      logger.debug('No handler for update');
      return;
    }
    await Promise.all(handlers.map((handler) => handler(update)));
  }

  /** Decodes an untrusted body (e.g. a webhook POST) and dispatches it. */
  async handle(body: unknown): Promise<void> {
    const parsed = updateSchema.safeParse(body);
    if (!parsed.success) {
      this.logger.warn({ issues: parsed.error.issues.length }, 'Rejected malformed update');
      throw new DecodeError('Body is not a Telegram update', undefined, { cause: parsed.error });
    }
    await this.dispatch(parsed.data);
  }
}
