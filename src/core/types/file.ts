import { z } from 'zod';

export const photoSizeSchema = z.object({
  file_id: z.string(),
  file_unique_id: z.string(),
  width: z.number().int(),
  height: z.number().int(),
  file_size: z.number().int().optional(),
});

export type PhotoSize = z.infer<typeof photoSizeSchema>;

export const animationSchema = z.object({
  file_id: z.string(),
  file_unique_id: z.string(),
  width: z.number().int(),
  height: z.number().int(),
  duration: z.number().int(),
  thumb: photoSizeSchema.optional(),
  file_name: z.string().optional(),
  mime_type: z.string().optional(),
  file_size: z.number().int().optional(),
});

export type Animation = z.infer<typeof animationSchema>;

export const audioSchema = z.object({
  file_id: z.string(),
  file_unique_id: z.string(),
  duration: z.number().int(),
  performer: z.string().optional(),
  title: z.string().optional(),
  file_name: z.string().optional(),
  mime_type: z.string().optional(),
  file_size: z.number().int().optional(),
  thumb: photoSizeSchema.optional(),
});

export type Audio = z.infer<typeof audioSchema>;

export const documentSchema = z.object({
  file_id: z.string(),
  file_unique_id: z.string(),
  thumb: photoSizeSchema.optional(),
  file_name: z.string().optional(),
  mime_type: z.string().optional(),
  file_size: z.number().int().optional(),
});

export type Document = z.infer<typeof documentSchema>;

export const videoSchema = z.object({
  file_id: z.string(),
  file_unique_id: z.string(),
  width: z.number().int(),
  height: z.number().int(),
  duration: z.number().int(),
  thumb: photoSizeSchema.optional(),
  file_name: z.string().optional(),
  mime_type: z.string().optional(),
  file_size: z.number().int().optional(),
});

export type Video = z.infer<typeof videoSchema>;

export const videoNoteSchema = z.object({
  file_id: z.string(),
  file_unique_id: z.string(),
  length: z.number().int(),
  duration: z.number().int(),
  thumb: photoSizeSchema.optional(),
  file_size: z.number().int().optional(),
});

export type VideoNote = z.infer<typeof videoNoteSchema>;

export const voiceSchema = z.object({
  file_id: z.string(),
  file_unique_id: z.string(),
  duration: z.number().int(),
  mime_type: z.string().optional(),
  file_size: z.number().int().optional(),
});

export type Voice = z.infer<typeof voiceSchema>;

export const stickerSchema = z.object({
  file_id: z.string(),
  file_unique_id: z.string(),
  width: z.number().int(),
  height: z.number().int(),
  is_animated: z.boolean(),
  thumb: photoSizeSchema.optional(),
  emoji: z.string().optional(),
  set_name: z.string().optional(),
  file_size: z.number().int().optional(),
});

export type Sticker = z.infer<typeof stickerSchema>;

/**
 * A file ready to be downloaded from
 * `https://api.telegram.org/file/bot<token>/<file_path>`; the link stays valid for at least an hour.
 */
export const fileSchema = z.object({
  file_id: z.string(),
  file_unique_id: z.string(),
  file_size: z.number().int().optional(),
  file_path: z.string().optional(),
});

export type TelegramFile = z.infer<typeof fileSchema>;
