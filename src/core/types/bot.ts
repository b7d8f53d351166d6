import { z } from 'zod';
import type { ChatId } from './chat.js';

export const botCommandSchema = z.object({
  command: z.string(),
  description: z.string(),
});

export type BotCommand = z.infer<typeof botCommandSchema>;

export type BotCommandScope =
  | { type: 'default' }
  | { type: 'all_private_chats' }
  | { type: 'all_group_chats' }
  | { type: 'all_chat_administrators' }
  | { type: 'chat'; chat_id: ChatId }
  | { type: 'chat_administrators'; chat_id: ChatId }
  | { type: 'chat_member'; chat_id: ChatId; user_id: number };
