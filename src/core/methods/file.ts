import { jsonMethod, type JsonMethod } from '../method.js';
import { fileSchema, type TelegramFile } from '../types/file.js';

/**
 * Prepares a file (up to 20MB) for download. Build the link from the
 * returned `file_path` with `buildFileUrl`.
 */
export function getFile(fileId: string): JsonMethod<TelegramFile> {
  return jsonMethod('getFile', { file_id: fileId }, fileSchema);
}
