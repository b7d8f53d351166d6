import type { Server } from 'node:http';
import type { Config } from '../../config/index.js';
import type { BotClient } from '../client/BotClient.js';
import type { UpdateDispatcher } from '../updates/UpdateDispatcher.js';
import { UpdatePoller } from '../updates/UpdatePoller.js';
import { getMe } from '../methods/bot.js';
import { deleteWebhook, setWebhook } from '../methods/webhook.js';
import type { User } from '../types/user.js';
import { startServer } from '../../server.js';
import { createLogger } from '../../utils/logger.js';

export type RunnerConfig = Pick<Config, 'webhookUrl' | 'pollingTimeoutSeconds' | 'host' | 'port'>;

export interface BotRunnerOptions {
  client: BotClient;
  dispatcher: UpdateDispatcher;
  config: RunnerConfig;
}

/**
 * Verifies the token, then delivers updates to the dispatcher: through a webhook
 * server when `webhookUrl` is set, otherwise by long polling.
 */
export class BotRunner {
  private readonly logger = createLogger({ component: 'BotRunner' });
  private readonly abort = new AbortController();
  private server: Server | undefined;
  private polling: Promise<void> | undefined;
  private failure: unknown;

  constructor(private readonly options: BotRunnerOptions) {}

  async start(): Promise<User> {
    const logger = this.logger.child({ method: 'start' });
    const { client, config } = this.options;

    const me = await client.send(getMe());
    logger.info({ botId: me.id, botUsername: me.username }, 'Telegram bot verified');

    if (config.webhookUrl) {
      await client.send(setWebhook({ url: config.webhookUrl }));
      logger.info({ webhookUrl: config.webhookUrl }, 'Webhook set');
      this.server = await startServer(this.options.dispatcher, config.port, config.host);
    } else {
      // getUpdates is refused while a webhook is registered
      await client.send(deleteWebhook());
      logger.info({ timeoutSeconds: config.pollingTimeoutSeconds }, 'No webhook URL configured, using polling');
      this.polling = this.poll().catch((error: unknown) => {
        this.logger.error({ err: error }, 'Polling failed');
        this.failure = error;
      });
    }
    return me;
  }

  /** Resolves when polling ends; rejects if a poll fails. Resolves immediately in webhook mode. */
  async wait(): Promise<void> {
    await this.polling;
    if (this.failure !== undefined) {
      throw this.failure;
    }
  }

  async stop(): Promise<void> {
    this.abort.abort();
    await this.polling;

    const server = this.server;
    this.server = undefined;
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      });
    }
    this.logger.info('Bot stopped');
  }

  private async poll(): Promise<void> {
    const poller = new UpdatePoller(this.options.client, {
      timeoutSeconds: this.options.config.pollingTimeoutSeconds,
      signal: this.abort.signal,
    });

    for await (const update of poller) {
      try {
        await this.options.dispatcher.dispatch(update);
      } catch (error) {
        // Handler failures are logged; polling goes on
        this.logger.error({ err: error, updateId: update.update_id }, 'Error processing update');
      }
    }
  }
}
