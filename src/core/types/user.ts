import { z } from 'zod';
import { photoSizeSchema } from './file.js';

export const userSchema = z.object({
  id: z.number().int(),
  is_bot: z.boolean(),
  first_name: z.string(),
  last_name: z.string().optional(),
  username: z.string().optional(),
  language_code: z.string().optional(),
  can_join_groups: z.boolean().optional(),
  can_read_all_group_messages: z.boolean().optional(),
  supports_inline_queries: z.boolean().optional(),
});

export type User = z.infer<typeof userSchema>;

export const userProfilePhotosSchema = z.object({
  total_count: z.number().int(),
  photos: z.array(z.array(photoSizeSchema)),
});

export type UserProfilePhotos = z.infer<typeof userProfilePhotosSchema>;
