import { z } from 'zod';
import { chatSchema, locationSchema } from './chat.js';
import {
  animationSchema,
  audioSchema,
  documentSchema,
  photoSizeSchema,
  stickerSchema,
  videoNoteSchema,
  videoSchema,
  voiceSchema,
} from './file.js';
import { inlineKeyboardMarkupSchema, messageEntitySchema } from './markup.js';
import { userSchema } from './user.js';

export const messageIdSchema = z.object({
  message_id: z.number().int(),
});

export type MessageId = z.infer<typeof messageIdSchema>;

export const contactSchema = z.object({
  phone_number: z.string(),
  first_name: z.string(),
  last_name: z.string().optional(),
  user_id: z.number().int().optional(),
  vcard: z.string().optional(),
});

export type Contact = z.infer<typeof contactSchema>;

export const diceSchema = z.object({
  emoji: z.string(),
  value: z.number().int(),
});

export type Dice = z.infer<typeof diceSchema>;

export const venueSchema = z.object({
  location: locationSchema,
  title: z.string(),
  address: z.string(),
  foursquare_id: z.string().optional(),
  foursquare_type: z.string().optional(),
  google_place_id: z.string().optional(),
  google_place_type: z.string().optional(),
});

export type Venue = z.infer<typeof venueSchema>;

export const pollOptionSchema = z.object({
  text: z.string(),
  voter_count: z.number().int(),
});

export const pollSchema = z.object({
  id: z.string(),
  question: z.string(),
  options: z.array(pollOptionSchema),
  total_voter_count: z.number().int(),
  is_closed: z.boolean(),
  is_anonymous: z.boolean(),
  type: z.enum(['regular', 'quiz']),
  allows_multiple_answers: z.boolean(),
  correct_option_id: z.number().int().optional(),
  explanation: z.string().optional(),
  explanation_entities: z.array(messageEntitySchema).optional(),
  open_period: z.number().int().optional(),
  close_date: z.number().int().optional(),
});

export type Poll = z.infer<typeof pollSchema>;

export const pollAnswerSchema = z.object({
  poll_id: z.string(),
  user: userSchema,
  option_ids: z.array(z.number().int()),
});

export type PollAnswer = z.infer<typeof pollAnswerSchema>;

const messageFieldsSchema = z.object({
  message_id: z.number().int(),
  from: userSchema.optional(),
  sender_chat: chatSchema.optional(),
  date: z.number().int(),
  chat: chatSchema,
  forward_from: userSchema.optional(),
  forward_from_chat: chatSchema.optional(),
  forward_from_message_id: z.number().int().optional(),
  forward_signature: z.string().optional(),
  forward_sender_name: z.string().optional(),
  forward_date: z.number().int().optional(),
  via_bot: userSchema.optional(),
  edit_date: z.number().int().optional(),
  media_group_id: z.string().optional(),
  author_signature: z.string().optional(),
  text: z.string().optional(),
  entities: z.array(messageEntitySchema).optional(),
  animation: animationSchema.optional(),
  audio: audioSchema.optional(),
  document: documentSchema.optional(),
  photo: z.array(photoSizeSchema).optional(),
  sticker: stickerSchema.optional(),
  video: videoSchema.optional(),
  video_note: videoNoteSchema.optional(),
  voice: voiceSchema.optional(),
  caption: z.string().optional(),
  caption_entities: z.array(messageEntitySchema).optional(),
  contact: contactSchema.optional(),
  dice: diceSchema.optional(),
  poll: pollSchema.optional(),
  venue: venueSchema.optional(),
  location: locationSchema.optional(),
  new_chat_members: z.array(userSchema).optional(),
  left_chat_member: userSchema.optional(),
  new_chat_title: z.string().optional(),
  new_chat_photo: z.array(photoSizeSchema).optional(),
  delete_chat_photo: z.literal(true).optional(),
  group_chat_created: z.literal(true).optional(),
  supergroup_chat_created: z.literal(true).optional(),
  channel_chat_created: z.literal(true).optional(),
  migrate_to_chat_id: z.number().int().optional(),
  migrate_from_chat_id: z.number().int().optional(),
  connected_website: z.string().optional(),
  reply_markup: inlineKeyboardMarkupSchema.optional(),
});

// Replies and pinned messages nest one level of Message inside Message.
export type Message = z.infer<typeof messageFieldsSchema> & {
  reply_to_message?: Message;
  pinned_message?: Message;
};

export const messageSchema: z.ZodType<Message> = messageFieldsSchema.extend({
  reply_to_message: z.lazy(() => messageSchema).optional(),
  pinned_message: z.lazy(() => messageSchema).optional(),
});

/** A chat as returned by `getChat`, which may carry the pinned message. */
export const chatInfoSchema = chatSchema.extend({
  pinned_message: messageSchema.optional(),
});

export type ChatInfo = z.infer<typeof chatInfoSchema>;

/** Editing methods return the edited message, or `true` for inline messages. */
export const messageOrTrueSchema = z.union([messageSchema, z.literal(true)]);
