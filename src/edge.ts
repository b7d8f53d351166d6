// Entry point for runtimes without Node built-ins: nothing reachable from here imports `node:*`.
export * from './core/types/index.js';
export * from './core/methods/index.js';
export type { FileMethod, JsonMethod, MethodResult, TelegramMethod } from './core/method.js';
export type { InputFile, InputFileVariant } from './core/inputFile.js';
export { fileId, fileUrl, uploadBytes } from './core/inputFile.js';
export { parseResponse } from './core/response.js';
export { buildFileUrl, buildMethodUrl } from './core/url.js';
export type { TransportOptions, TransportPort } from './ports/TransportPort.js';
export type { EdgeTransportOptions } from './adapters/edge/EdgeTransport.js';
export { EdgeTransport } from './adapters/edge/EdgeTransport.js';
export { createEdgeWebhookApp } from './adapters/webhook/edgeWebhook.js';
export { BotClient } from './core/client/BotClient.js';
export { UpdateDispatcher } from './core/updates/UpdateDispatcher.js';
export {
  DecodeError,
  TelegramApiError,
  TelewireError,
  TransportError,
  UnsupportedRequestError,
} from './utils/errors.js';
