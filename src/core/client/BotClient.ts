import type { TransportPort } from '../../ports/TransportPort.js';
import type { TelegramMethod } from '../method.js';
import { createLogger } from '../../utils/logger.js';

/** Routes each request to the transport operation its kind calls for. */
export class BotClient {
  private readonly logger = createLogger({ component: 'BotClient' });

  constructor(private readonly transport: TransportPort) {}

  async send<R>(method: TelegramMethod<R>): Promise<R> {
    const logger = this.logger.child({ method: 'send', apiMethod: method.name, kind: method.kind });
    logger.debug('Dispatching request');

    try {
      switch (method.kind) {
        case 'json':
          return await this.transport.sendJson(method);
        case 'file':
          return await this.transport.sendFile(method);
      }
    } catch (error) {
      logger.warn({ err: error }, 'Request failed');
      throw error;
    }
  }
}
