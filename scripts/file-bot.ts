/**
 * File bot: answers /start with the photo at FILE_BOT_PHOTO_PATH, uploaded as multipart.
 * Run with: npx tsx scripts/file-bot.ts
 * Needs a multipart-capable transport (TELEGRAM_TRANSPORT=fetch or node).
 */
import 'dotenv/config';

import { loadConfig } from '../src/config/index.js';
import { createTransport } from '../src/adapters/createTransport.js';
import { BotClient } from '../src/core/client/BotClient.js';
import { UpdateDispatcher } from '../src/core/updates/UpdateDispatcher.js';
import { BotRunner } from '../src/core/runner/BotRunner.js';
import { messageText } from '../src/core/methods/message.js';
import { sendPhoto } from '../src/core/methods/media.js';
import { uploadPath } from '../src/core/inputFile.js';
import { createLogger } from '../src/utils/logger.js';

const logger = createLogger({ component: 'file-bot' });

async function main(): Promise<void> {
  const config = loadConfig();
  const photoPath = process.env.FILE_BOT_PHOTO_PATH;
  if (!photoPath) {
    throw new Error('FILE_BOT_PHOTO_PATH is not set');
  }

  const client = new BotClient(createTransport(config));
  const dispatcher = new UpdateDispatcher().on('message', async (message) => {
    if (messageText(message)?.startsWith('/start')) {
      await client.send(
        sendPhoto({ chat_id: message.chat.id, photo: uploadPath(photoPath, { mime: 'image/jpeg' }) })
      );
    }
  });

  const runner = new BotRunner({ client, dispatcher, config });
  await runner.start();
  logger.info('File bot running');

  process.once('SIGINT', () => {
    runner.stop().catch((error: unknown) => logger.error({ err: error }, 'Failed to stop cleanly'));
  });
  await runner.wait();
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, 'File bot crashed');
  process.exit(1);
});
