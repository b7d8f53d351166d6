import { z } from 'zod';
import { userSchema } from './user.js';

export type ParseMode = 'MarkdownV2' | 'Markdown' | 'HTML';

export const messageEntitySchema = z.object({
  type: z.string(),
  offset: z.number().int(),
  length: z.number().int(),
  url: z.string().optional(),
  user: userSchema.optional(),
  language: z.string().optional(),
});

export type MessageEntity = z.infer<typeof messageEntitySchema>;

export const loginUrlSchema = z.object({
  url: z.string(),
  forward_text: z.string().optional(),
  bot_username: z.string().optional(),
  request_write_access: z.boolean().optional(),
});

export const inlineKeyboardButtonSchema = z.object({
  text: z.string(),
  url: z.string().optional(),
  login_url: loginUrlSchema.optional(),
  callback_data: z.string().optional(),
  switch_inline_query: z.string().optional(),
  switch_inline_query_current_chat: z.string().optional(),
  pay: z.boolean().optional(),
});

export type InlineKeyboardButton = z.infer<typeof inlineKeyboardButtonSchema>;

export const inlineKeyboardMarkupSchema = z.object({
  inline_keyboard: z.array(z.array(inlineKeyboardButtonSchema)),
});

export type InlineKeyboardMarkup = z.infer<typeof inlineKeyboardMarkupSchema>;

export interface KeyboardButton {
  text: string;
  request_contact?: boolean;
  request_location?: boolean;
  request_poll?: { type?: 'quiz' | 'regular' };
}

export interface ReplyKeyboardMarkup {
  keyboard: KeyboardButton[][];
  resize_keyboard?: boolean;
  one_time_keyboard?: boolean;
  input_field_placeholder?: string;
  selective?: boolean;
}

export interface ReplyKeyboardRemove {
  remove_keyboard: true;
  selective?: boolean;
}

export interface ForceReply {
  force_reply: true;
  input_field_placeholder?: string;
  selective?: boolean;
}

export type ReplyMarkup = InlineKeyboardMarkup | ReplyKeyboardMarkup | ReplyKeyboardRemove | ForceReply;

export function inlineKeyboard(rows: InlineKeyboardButton[][]): InlineKeyboardMarkup {
  return { inline_keyboard: rows };
}

export function callbackButton(text: string, callbackData: string): InlineKeyboardButton {
  return { text, callback_data: callbackData };
}

export function urlButton(text: string, url: string): InlineKeyboardButton {
  return { text, url };
}
