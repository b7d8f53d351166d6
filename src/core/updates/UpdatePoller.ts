import type { BotClient } from '../client/BotClient.js';
import { getUpdates } from '../methods/updates.js';
import type { Update, UpdateKind } from '../types/update.js';
import { createLogger } from '../../utils/logger.js';

export interface UpdatePollerOptions {
  /** Long-polling timeout in seconds. */
  timeoutSeconds?: number;
  limit?: number;
  allowedUpdates?: UpdateKind[];
  /** Stops the iteration once the in-flight poll returns. */
  signal?: AbortSignal;
  /** First offset to request; defaults to 0. */
  offset?: number;
}

const DEFAULT_TIMEOUT_SECONDS = 1;

/**
 * Long polling over `getUpdates` as an async iterable. Each update is
 * acknowledged by the next poll's offset. A failed poll ends the iteration
 * by throwing.
 */
export class UpdatePoller implements AsyncIterable<Update> {
  private readonly logger = createLogger({ component: 'UpdatePoller' });
  private offset: number;

  constructor(
    private readonly client: BotClient,
    private readonly options: UpdatePollerOptions = {}
  ) {
    this.offset = options.offset ?? 0;
  }

  /** The offset the next poll will send. */
  get nextOffset(): number {
    return this.offset;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<Update, void, undefined> {
    const { signal } = this.options;

    while (!signal?.aborted) {
      const batch = await this.poll();
      for (const update of batch) {
        yield update;
      }
    }
    this.logger.info({ offset: this.offset }, 'Polling stopped');
  }

  /** Fetches one batch and advances the offset past it. */
  async poll(): Promise<Update[]> {
    const { timeoutSeconds = DEFAULT_TIMEOUT_SECONDS, limit, allowedUpdates } = this.options;

    const batch = await this.client.send(
      getUpdates({ offset: this.offset, limit, timeout: timeoutSeconds, allowed_updates: allowedUpdates })
    );
    this.offset = batch.reduce((offset, update) => Math.max(offset, update.update_id + 1), this.offset);
    if (batch.length > 0) {
      this.logger.debug({ count: batch.length, offset: this.offset }, 'Received updates');
    }
    return batch;
  }
}
