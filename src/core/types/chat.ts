import { z } from 'zod';
import { userSchema } from './user.js';

/** Numeric chat id, or `@channelusername` for public channels. */
export type ChatId = number | string;

export const chatTypeSchema = z.enum(['private', 'group', 'supergroup', 'channel']);

export const chatPhotoSchema = z.object({
  small_file_id: z.string(),
  small_file_unique_id: z.string(),
  big_file_id: z.string(),
  big_file_unique_id: z.string(),
});

export const chatPermissionsSchema = z.object({
  can_send_messages: z.boolean().optional(),
  can_send_media_messages: z.boolean().optional(),
  can_send_polls: z.boolean().optional(),
  can_send_other_messages: z.boolean().optional(),
  can_add_web_page_previews: z.boolean().optional(),
  can_change_info: z.boolean().optional(),
  can_invite_users: z.boolean().optional(),
  can_pin_messages: z.boolean().optional(),
});

export type ChatPermissions = z.infer<typeof chatPermissionsSchema>;

export const locationSchema = z.object({
  longitude: z.number(),
  latitude: z.number(),
  horizontal_accuracy: z.number().optional(),
  live_period: z.number().int().optional(),
  heading: z.number().int().optional(),
  proximity_alert_radius: z.number().int().optional(),
});

export type Location = z.infer<typeof locationSchema>;

export const chatLocationSchema = z.object({
  location: locationSchema,
  address: z.string(),
});

export const chatSchema = z.object({
  id: z.number().int(),
  type: chatTypeSchema,
  title: z.string().optional(),
  username: z.string().optional(),
  first_name: z.string().optional(),
  last_name: z.string().optional(),
  photo: chatPhotoSchema.optional(),
  bio: z.string().optional(),
  description: z.string().optional(),
  invite_link: z.string().optional(),
  permissions: chatPermissionsSchema.optional(),
  slow_mode_delay: z.number().int().optional(),
  message_auto_delete_time: z.number().int().optional(),
  sticker_set_name: z.string().optional(),
  can_set_sticker_set: z.boolean().optional(),
  linked_chat_id: z.number().int().optional(),
  location: chatLocationSchema.optional(),
});

export type Chat = z.infer<typeof chatSchema>;

const ownerSchema = z.object({
  status: z.literal('creator'),
  user: userSchema,
  is_anonymous: z.boolean(),
  custom_title: z.string().optional(),
});

const administratorSchema = z.object({
  status: z.literal('administrator'),
  user: userSchema,
  can_be_edited: z.boolean(),
  is_anonymous: z.boolean(),
  can_manage_chat: z.boolean(),
  can_delete_messages: z.boolean(),
  can_manage_voice_chats: z.boolean().optional(),
  can_restrict_members: z.boolean(),
  can_promote_members: z.boolean(),
  can_change_info: z.boolean(),
  can_invite_users: z.boolean(),
  can_post_messages: z.boolean().optional(),
  can_edit_messages: z.boolean().optional(),
  can_pin_messages: z.boolean().optional(),
  custom_title: z.string().optional(),
});

const memberSchema = z.object({
  status: z.literal('member'),
  user: userSchema,
});

const restrictedSchema = z.object({
  status: z.literal('restricted'),
  user: userSchema,
  is_member: z.boolean(),
  can_change_info: z.boolean(),
  can_invite_users: z.boolean(),
  can_pin_messages: z.boolean(),
  can_send_messages: z.boolean(),
  can_send_media_messages: z.boolean(),
  can_send_polls: z.boolean(),
  can_send_other_messages: z.boolean(),
  can_add_web_page_previews: z.boolean(),
  until_date: z.number().int(),
});

const leftSchema = z.object({
  status: z.literal('left'),
  user: userSchema,
});

const bannedSchema = z.object({
  status: z.literal('kicked'),
  user: userSchema,
  until_date: z.number().int(),
});

export const chatMemberSchema = z.discriminatedUnion('status', [
  ownerSchema,
  administratorSchema,
  memberSchema,
  restrictedSchema,
  leftSchema,
  bannedSchema,
]);

export type ChatMember = z.infer<typeof chatMemberSchema>;
export type ChatMemberStatus = ChatMember['status'];

export const chatInviteLinkSchema = z.object({
  invite_link: z.string(),
  creator: userSchema,
  creates_join_request: z.boolean().optional(),
  is_primary: z.boolean(),
  is_revoked: z.boolean(),
  name: z.string().optional(),
  expire_date: z.number().int().optional(),
  member_limit: z.number().int().optional(),
  pending_join_request_count: z.number().int().optional(),
});

export type ChatInviteLink = z.infer<typeof chatInviteLinkSchema>;

export const chatMemberUpdatedSchema = z.object({
  chat: chatSchema,
  from: userSchema,
  date: z.number().int(),
  old_chat_member: chatMemberSchema,
  new_chat_member: chatMemberSchema,
  invite_link: chatInviteLinkSchema.optional(),
});

export type ChatMemberUpdated = z.infer<typeof chatMemberUpdatedSchema>;

export const chatJoinRequestSchema = z.object({
  chat: chatSchema,
  from: userSchema,
  date: z.number().int(),
  bio: z.string().optional(),
  invite_link: chatInviteLinkSchema.optional(),
});

export type ChatJoinRequest = z.infer<typeof chatJoinRequestSchema>;
