export * from './bot.js';
export * from './chat.js';
export * from './file.js';
export * from './media.js';
export * from './message.js';
export * from './query.js';
export * from './updates.js';
export * from './user.js';
export * from './webhook.js';
