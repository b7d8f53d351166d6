import type { FileMethod, JsonMethod } from '../core/method.js';

export interface TransportOptions {
  token: string;
  /** Defaults to `https://api.telegram.org`. */
  apiBaseUrl?: string;
  /** Per-request timeout; none unless set. */
  timeoutMs?: number;
}

/**
 * What an HTTP client needs to provide to act as a Bot API client. Each call
 * issues exactly one POST and resolves with the decoded `result`, or rejects with
 * a `TransportError`, `DecodeError`, `TelegramApiError` or (uploads only) `FileReadError`.
 */
export interface TransportPort {
  sendJson<R>(method: JsonMethod<R>): Promise<R>;
  /** Transports without multipart support reject uploads with `UnsupportedRequestError`. */
  sendFile<R>(method: FileMethod<R>): Promise<R>;
}
