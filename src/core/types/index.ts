export * from './bot.js';
export * from './chat.js';
export * from './file.js';
export * from './inline.js';
export * from './markup.js';
export * from './message.js';
export * from './query.js';
export * from './update.js';
export * from './user.js';
export * from './webhook.js';
