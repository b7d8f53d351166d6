import { z } from 'zod';
import { chatJoinRequestSchema, chatMemberUpdatedSchema } from './chat.js';
import { messageSchema, pollAnswerSchema, pollSchema } from './message.js';
import {
  callbackQuerySchema,
  chosenInlineResultSchema,
  inlineQuerySchema,
  preCheckoutQuerySchema,
  shippingQuerySchema,
} from './query.js';

/** At most one of the optional fields is present in any given update. */
export const updateSchema = z.object({
  update_id: z.number().int(),
  message: messageSchema.optional(),
  edited_message: messageSchema.optional(),
  channel_post: messageSchema.optional(),
  edited_channel_post: messageSchema.optional(),
  inline_query: inlineQuerySchema.optional(),
  chosen_inline_result: chosenInlineResultSchema.optional(),
  callback_query: callbackQuerySchema.optional(),
  shipping_query: shippingQuerySchema.optional(),
  pre_checkout_query: preCheckoutQuerySchema.optional(),
  poll: pollSchema.optional(),
  poll_answer: pollAnswerSchema.optional(),
  my_chat_member: chatMemberUpdatedSchema.optional(),
  chat_member: chatMemberUpdatedSchema.optional(),
  chat_join_request: chatJoinRequestSchema.optional(),
});

export type Update = z.infer<typeof updateSchema>;

export const UPDATE_KINDS = [
  'message',
  'edited_message',
  'channel_post',
  'edited_channel_post',
  'inline_query',
  'chosen_inline_result',
  'callback_query',
  'shipping_query',
  'pre_checkout_query',
  'poll',
  'poll_answer',
  'my_chat_member',
  'chat_member',
  'chat_join_request',
] as const satisfies ReadonlyArray<keyof Update>;

export type UpdateKind = (typeof UPDATE_KINDS)[number];
export type UpdatePayload<K extends UpdateKind> = NonNullable<Update[K]>;

/** Names the kind of event an update carries, or `undefined` for kinds this library does not model. */
export function updateType(update: Update): UpdateKind | undefined {
  return UPDATE_KINDS.find((kind) => update[kind] !== undefined);
}
