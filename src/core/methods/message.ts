import { z } from 'zod';
import { jsonMethod, type JsonMethod } from '../method.js';
import type { ChatId } from '../types/chat.js';
import type { InlineKeyboardMarkup, MessageEntity, ParseMode, ReplyMarkup } from '../types/markup.js';
import {
  messageIdSchema,
  messageOrTrueSchema,
  messageSchema,
  pollSchema,
  type Message,
  type MessageId,
  type Poll,
} from '../types/message.js';

/** Delivery options shared by every method that sends a message. */
export interface SendOptions {
  disable_notification?: boolean;
  protect_content?: boolean;
  reply_to_message_id?: number;
  allow_sending_without_reply?: boolean;
  reply_markup?: ReplyMarkup;
}

export interface SendMessageParams extends SendOptions {
  chat_id: ChatId;
  text: string;
  parse_mode?: ParseMode;
  entities?: MessageEntity[];
  disable_web_page_preview?: boolean;
}

export function sendMessage(params: SendMessageParams): JsonMethod<Message> {
  return jsonMethod('sendMessage', params, messageSchema);
}

/** The text of a text message, or `undefined` for any other kind. */
export function messageText(message: Message): string | undefined {
  return message.text;
}

/** Sends `text` to the message's chat as a reply to it. */
export function replyText(
  message: Message,
  text: string,
  options: Omit<SendMessageParams, 'chat_id' | 'text' | 'reply_to_message_id'> = {}
): JsonMethod<Message> {
  return sendMessage({ ...options, chat_id: message.chat.id, text, reply_to_message_id: message.message_id });
}

export interface ForwardMessageParams {
  chat_id: ChatId;
  from_chat_id: ChatId;
  message_id: number;
  disable_notification?: boolean;
  protect_content?: boolean;
}

export function forwardMessage(params: ForwardMessageParams): JsonMethod<Message> {
  return jsonMethod('forwardMessage', params, messageSchema);
}

export interface CopyMessageParams extends SendOptions {
  chat_id: ChatId;
  from_chat_id: ChatId;
  message_id: number;
  caption?: string;
  parse_mode?: ParseMode;
  caption_entities?: MessageEntity[];
}

/** Like `forwardMessage`, without the link to the original. */
export function copyMessage(params: CopyMessageParams): JsonMethod<MessageId> {
  return jsonMethod('copyMessage', params, messageIdSchema);
}

export type MessageTarget =
  | { chat_id: ChatId; message_id: number; inline_message_id?: never }
  | { inline_message_id: string; chat_id?: never; message_id?: never };

export type EditMessageTextParams = MessageTarget & {
  text: string;
  parse_mode?: ParseMode;
  entities?: MessageEntity[];
  disable_web_page_preview?: boolean;
  reply_markup?: InlineKeyboardMarkup;
};

export function editMessageText(params: EditMessageTextParams): JsonMethod<Message | true> {
  return jsonMethod('editMessageText', params, messageOrTrueSchema);
}

export function deleteMessage(chatId: ChatId, messageId: number): JsonMethod<boolean> {
  return jsonMethod('deleteMessage', { chat_id: chatId, message_id: messageId }, z.boolean());
}

export type ChatAction =
  | 'typing'
  | 'upload_photo'
  | 'record_video'
  | 'upload_video'
  | 'record_voice'
  | 'upload_voice'
  | 'upload_document'
  | 'find_location'
  | 'record_video_note'
  | 'upload_video_note';

export function sendChatAction(chatId: ChatId, action: ChatAction): JsonMethod<boolean> {
  return jsonMethod('sendChatAction', { chat_id: chatId, action }, z.boolean());
}

export interface SendLocationParams extends SendOptions {
  chat_id: ChatId;
  latitude: number;
  longitude: number;
  horizontal_accuracy?: number;
  live_period?: number;
  heading?: number;
  proximity_alert_radius?: number;
}

export function sendLocation(params: SendLocationParams): JsonMethod<Message> {
  return jsonMethod('sendLocation', params, messageSchema);
}

export interface SendContactParams extends SendOptions {
  chat_id: ChatId;
  phone_number: string;
  first_name: string;
  last_name?: string;
  vcard?: string;
}

export function sendContact(params: SendContactParams): JsonMethod<Message> {
  return jsonMethod('sendContact', params, messageSchema);
}

export interface SendDiceParams extends SendOptions {
  chat_id: ChatId;
  emoji?: string;
}

export function sendDice(params: SendDiceParams): JsonMethod<Message> {
  return jsonMethod('sendDice', params, messageSchema);
}

export interface SendPollParams extends SendOptions {
  chat_id: ChatId;
  question: string;
  options: string[];
  is_anonymous?: boolean;
  type?: 'regular' | 'quiz';
  allows_multiple_answers?: boolean;
  correct_option_id?: number;
  explanation?: string;
  explanation_parse_mode?: ParseMode;
  open_period?: number;
  close_date?: number;
  is_closed?: boolean;
}

export function sendPoll(params: SendPollParams): JsonMethod<Message> {
  return jsonMethod('sendPoll', params, messageSchema);
}

export function stopPoll(
  chatId: ChatId,
  messageId: number,
  replyMarkup?: InlineKeyboardMarkup
): JsonMethod<Poll> {
  return jsonMethod('stopPoll', { chat_id: chatId, message_id: messageId, reply_markup: replyMarkup }, pollSchema);
}
