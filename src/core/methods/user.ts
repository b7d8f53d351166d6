import { jsonMethod, type JsonMethod } from '../method.js';
import { userProfilePhotosSchema, type UserProfilePhotos } from '../types/user.js';

export function getUserProfilePhotos(
  userId: number,
  options: { offset?: number; limit?: number } = {}
): JsonMethod<UserProfilePhotos> {
  return jsonMethod('getUserProfilePhotos', { user_id: userId, ...options }, userProfilePhotosSchema);
}
