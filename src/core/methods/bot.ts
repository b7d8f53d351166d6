import { z } from 'zod';
import { jsonMethod, type JsonMethod } from '../method.js';
import { botCommandSchema, type BotCommand, type BotCommandScope } from '../types/bot.js';
import { userSchema, type User } from '../types/user.js';

export interface CommandScopeParams {
  scope?: BotCommandScope;
  language_code?: string;
}

/** Returns the bot's own user; a cheap way to check the token. */
export function getMe(): JsonMethod<User> {
  return jsonMethod('getMe', {}, userSchema);
}

/** Logs out from the cloud Bot API server before moving the bot to a local one. */
export function logOut(): JsonMethod<boolean> {
  return jsonMethod('logOut', {}, z.boolean());
}

export function close(): JsonMethod<boolean> {
  return jsonMethod('close', {}, z.boolean());
}

export function setMyCommands(commands: BotCommand[], options: CommandScopeParams = {}): JsonMethod<boolean> {
  return jsonMethod('setMyCommands', { commands, ...options }, z.boolean());
}

export function deleteMyCommands(options: CommandScopeParams = {}): JsonMethod<boolean> {
  return jsonMethod('deleteMyCommands', options, z.boolean());
}

export function getMyCommands(options: CommandScopeParams = {}): JsonMethod<BotCommand[]> {
  return jsonMethod('getMyCommands', options, z.array(botCommandSchema));
}
