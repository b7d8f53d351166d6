import { DEFAULT_API_BASE_URL } from '../config/index.js';

export function buildMethodUrl(token: string, method: string, apiBaseUrl: string = DEFAULT_API_BASE_URL): string {
  return `${apiBaseUrl}/bot${token}/${method}`;
}

/** Download link for a `file_path` returned by `getFile`. */
export function buildFileUrl(token: string, filePath: string, apiBaseUrl: string = DEFAULT_API_BASE_URL): string {
  return `${apiBaseUrl}/file/bot${token}/${filePath}`;
}
