import { z } from 'zod';
import { locationSchema } from './chat.js';
import { messageSchema } from './message.js';
import { userSchema } from './user.js';

export const inlineQuerySchema = z.object({
  id: z.string(),
  from: userSchema,
  query: z.string(),
  offset: z.string(),
  chat_type: z.string().optional(),
  location: locationSchema.optional(),
});

export type InlineQuery = z.infer<typeof inlineQuerySchema>;

export const chosenInlineResultSchema = z.object({
  result_id: z.string(),
  from: userSchema,
  location: locationSchema.optional(),
  inline_message_id: z.string().optional(),
  query: z.string(),
});

export type ChosenInlineResult = z.infer<typeof chosenInlineResultSchema>;

export const callbackQuerySchema = z.object({
  id: z.string(),
  from: userSchema,
  message: messageSchema.optional(),
  inline_message_id: z.string().optional(),
  chat_instance: z.string(),
  data: z.string().optional(),
  game_short_name: z.string().optional(),
});

export type CallbackQuery = z.infer<typeof callbackQuerySchema>;

const shippingAddressSchema = z.object({
  country_code: z.string(),
  state: z.string(),
  city: z.string(),
  street_line1: z.string(),
  street_line2: z.string(),
  post_code: z.string(),
});

export const shippingQuerySchema = z.object({
  id: z.string(),
  from: userSchema,
  invoice_payload: z.string(),
  shipping_address: shippingAddressSchema,
});

export type ShippingQuery = z.infer<typeof shippingQuerySchema>;

export const preCheckoutQuerySchema = z.object({
  id: z.string(),
  from: userSchema,
  currency: z.string(),
  total_amount: z.number().int(),
  invoice_payload: z.string(),
  shipping_option_id: z.string().optional(),
});

export type PreCheckoutQuery = z.infer<typeof preCheckoutQuerySchema>;
