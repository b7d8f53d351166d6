/**
 * Echo bot: replies to every text message with the same text.
 * Run with: npx tsx scripts/echo-bot.ts
 * Polls unless TELEGRAM_WEBHOOK_URL is set.
 */
import 'dotenv/config';

import { loadConfig } from '../src/config/index.js';
import { createTransport } from '../src/adapters/createTransport.js';
import { BotClient } from '../src/core/client/BotClient.js';
import { UpdateDispatcher } from '../src/core/updates/UpdateDispatcher.js';
import { BotRunner } from '../src/core/runner/BotRunner.js';
import { messageText, replyText } from '../src/core/methods/message.js';
import { createLogger } from '../src/utils/logger.js';

const logger = createLogger({ component: 'echo-bot' });

async function main(): Promise<void> {
  const config = loadConfig();
  const client = new BotClient(createTransport(config));

  const dispatcher = new UpdateDispatcher().on('message', async (message) => {
    const text = messageText(message);
    if (text !== undefined) {
      await client.send(replyText(message, text));
    }
  });

  const runner = new BotRunner({ client, dispatcher, config });
  const me = await runner.start();
  logger.info({ username: me.username }, 'Echo bot running');

  process.once('SIGINT', () => {
    runner.stop().catch((error: unknown) => logger.error({ err: error }, 'Failed to stop cleanly'));
  });
  await runner.wait();
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Echo bot crashed');
  process.exit(1);
});
