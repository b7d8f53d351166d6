import { z } from 'zod';
import type { InputFileVariant } from '../inputFile.js';
import { fileMethod, jsonMethod, type FileMethod, type JsonMethod } from '../method.js';
import {
  chatInviteLinkSchema,
  chatMemberSchema,
  type ChatId,
  type ChatInviteLink,
  type ChatMember,
  type ChatPermissions,
} from '../types/chat.js';
import { chatInfoSchema, type ChatInfo } from '../types/message.js';

export function getChat(chatId: ChatId): JsonMethod<ChatInfo> {
  return jsonMethod('getChat', { chat_id: chatId }, chatInfoSchema);
}

export function leaveChat(chatId: ChatId): JsonMethod<boolean> {
  return jsonMethod('leaveChat', { chat_id: chatId }, z.boolean());
}

export function getChatAdministrators(chatId: ChatId): JsonMethod<ChatMember[]> {
  return jsonMethod('getChatAdministrators', { chat_id: chatId }, z.array(chatMemberSchema));
}

export function getChatMemberCount(chatId: ChatId): JsonMethod<number> {
  return jsonMethod('getChatMemberCount', { chat_id: chatId }, z.number().int());
}

export function getChatMember(chatId: ChatId, userId: number): JsonMethod<ChatMember> {
  return jsonMethod('getChatMember', { chat_id: chatId, user_id: userId }, chatMemberSchema);
}

export function banChatMember(
  chatId: ChatId,
  userId: number,
  options: { until_date?: number; revoke_messages?: boolean } = {}
): JsonMethod<boolean> {
  return jsonMethod('banChatMember', { chat_id: chatId, user_id: userId, ...options }, z.boolean());
}

/** With `only_if_banned`, a current member is left alone instead of being removed. */
export function unbanChatMember(
  chatId: ChatId,
  userId: number,
  options: { only_if_banned?: boolean } = {}
): JsonMethod<boolean> {
  return jsonMethod('unbanChatMember', { chat_id: chatId, user_id: userId, ...options }, z.boolean());
}

export function restrictChatMember(
  chatId: ChatId,
  userId: number,
  permissions: ChatPermissions,
  options: { until_date?: number } = {}
): JsonMethod<boolean> {
  return jsonMethod(
    'restrictChatMember',
    { chat_id: chatId, user_id: userId, permissions, ...options },
    z.boolean()
  );
}

export interface AdministratorRights {
  is_anonymous?: boolean;
  can_manage_chat?: boolean;
  can_post_messages?: boolean;
  can_edit_messages?: boolean;
  can_delete_messages?: boolean;
  can_manage_voice_chats?: boolean;
  can_restrict_members?: boolean;
  can_promote_members?: boolean;
  can_change_info?: boolean;
  can_invite_users?: boolean;
  can_pin_messages?: boolean;
}

/** Passing no rights demotes the user. */
export function promoteChatMember(
  chatId: ChatId,
  userId: number,
  rights: AdministratorRights = {}
): JsonMethod<boolean> {
  return jsonMethod('promoteChatMember', { chat_id: chatId, user_id: userId, ...rights }, z.boolean());
}

export function setChatAdministratorCustomTitle(
  chatId: ChatId,
  userId: number,
  customTitle: string
): JsonMethod<boolean> {
  return jsonMethod(
    'setChatAdministratorCustomTitle',
    { chat_id: chatId, user_id: userId, custom_title: customTitle },
    z.boolean()
  );
}

export function setChatPermissions(chatId: ChatId, permissions: ChatPermissions): JsonMethod<boolean> {
  return jsonMethod('setChatPermissions', { chat_id: chatId, permissions }, z.boolean());
}

/** Replaces the primary invite link; returns the new one. */
export function exportChatInviteLink(chatId: ChatId): JsonMethod<string> {
  return jsonMethod('exportChatInviteLink', { chat_id: chatId }, z.string());
}

export interface InviteLinkOptions {
  name?: string;
  expire_date?: number;
  member_limit?: number;
  creates_join_request?: boolean;
}

export function createChatInviteLink(chatId: ChatId, options: InviteLinkOptions = {}): JsonMethod<ChatInviteLink> {
  return jsonMethod('createChatInviteLink', { chat_id: chatId, ...options }, chatInviteLinkSchema);
}

export function revokeChatInviteLink(chatId: ChatId, inviteLink: string): JsonMethod<ChatInviteLink> {
  return jsonMethod('revokeChatInviteLink', { chat_id: chatId, invite_link: inviteLink }, chatInviteLinkSchema);
}

export function approveChatJoinRequest(chatId: ChatId, userId: number): JsonMethod<boolean> {
  return jsonMethod('approveChatJoinRequest', { chat_id: chatId, user_id: userId }, z.boolean());
}

export function declineChatJoinRequest(chatId: ChatId, userId: number): JsonMethod<boolean> {
  return jsonMethod('declineChatJoinRequest', { chat_id: chatId, user_id: userId }, z.boolean());
}

export function setChatPhoto(chatId: ChatId, photo: InputFileVariant): FileMethod<boolean> {
  return fileMethod('setChatPhoto', { chat_id: chatId }, { photo }, z.boolean());
}

export function deleteChatPhoto(chatId: ChatId): JsonMethod<boolean> {
  return jsonMethod('deleteChatPhoto', { chat_id: chatId }, z.boolean());
}

/** Only for supergroups whose `can_set_sticker_set` is true in `getChat`. */
export function setChatStickerSet(chatId: ChatId, stickerSetName: string): JsonMethod<boolean> {
  return jsonMethod('setChatStickerSet', { chat_id: chatId, sticker_set_name: stickerSetName }, z.boolean());
}

export function deleteChatStickerSet(chatId: ChatId): JsonMethod<boolean> {
  return jsonMethod('deleteChatStickerSet', { chat_id: chatId }, z.boolean());
}

export function setChatTitle(chatId: ChatId, title: string): JsonMethod<boolean> {
  return jsonMethod('setChatTitle', { chat_id: chatId, title }, z.boolean());
}

export function setChatDescription(chatId: ChatId, description?: string): JsonMethod<boolean> {
  return jsonMethod('setChatDescription', { chat_id: chatId, description }, z.boolean());
}

export function pinChatMessage(
  chatId: ChatId,
  messageId: number,
  options: { disable_notification?: boolean } = {}
): JsonMethod<boolean> {
  return jsonMethod('pinChatMessage', { chat_id: chatId, message_id: messageId, ...options }, z.boolean());
}

/** Without a message id, unpins the most recent pinned message. */
export function unpinChatMessage(chatId: ChatId, messageId?: number): JsonMethod<boolean> {
  return jsonMethod('unpinChatMessage', { chat_id: chatId, message_id: messageId }, z.boolean());
}

export function unpinAllChatMessages(chatId: ChatId): JsonMethod<boolean> {
  return jsonMethod('unpinAllChatMessages', { chat_id: chatId }, z.boolean());
}
