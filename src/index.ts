export * from './core/types/index.js';
export * from './core/methods/index.js';
export type { FileMethod, JsonMethod, MethodParams, MethodResult, ResultSchema, TelegramMethod } from './core/method.js';
export { fileMethod, jsonMethod } from './core/method.js';
export type { InputFile, InputFileSource, InputFileVariant } from './core/inputFile.js';
export { fileId, fileNameOf, fileReference, fileUrl, uploadBytes, uploadPath } from './core/inputFile.js';
export type { FormPart } from './core/encoding.js';
export { encodeFormValue, encodeJson, encodeJsonWithReferences, formParts, hasUploads } from './core/encoding.js';
export { buildFormData, readInputFile } from './core/multipart.js';
export type { ApiResponse } from './core/response.js';
export { apiResponseSchema, decodeResponse, parseResponse } from './core/response.js';
export { buildFileUrl, buildMethodUrl } from './core/url.js';

export type { TransportOptions, TransportPort } from './ports/TransportPort.js';
export type { FetchFunction, FetchTransportOptions } from './adapters/fetch/FetchTransport.js';
export { FetchTransport } from './adapters/fetch/FetchTransport.js';
export { NodeHttpTransport } from './adapters/node/NodeHttpTransport.js';
export type { EdgeTransportOptions } from './adapters/edge/EdgeTransport.js';
export { EdgeTransport } from './adapters/edge/EdgeTransport.js';
export { createTransport } from './adapters/createTransport.js';
export { createWebhookRouter } from './adapters/webhook/webhookRouter.js';
export { createEdgeWebhookApp } from './adapters/webhook/edgeWebhook.js';

export { BotClient } from './core/client/BotClient.js';
export type { UpdatePollerOptions } from './core/updates/UpdatePoller.js';
export { UpdatePoller } from './core/updates/UpdatePoller.js';
export type { KindHandler, UpdateHandler } from './core/updates/UpdateDispatcher.js';
export { UpdateDispatcher } from './core/updates/UpdateDispatcher.js';
export type { BotRunnerOptions, RunnerConfig } from './core/runner/BotRunner.js';
export { BotRunner } from './core/runner/BotRunner.js';
export { createApp, startServer } from './server.js';

export type { Config, TransportKind } from './config/index.js';
export { DEFAULT_API_BASE_URL, loadConfig } from './config/index.js';
export type { ResponseParameters } from './utils/errors.js';
export {
  ConfigError,
  DecodeError,
  FileReadError,
  TelegramApiError,
  TelewireError,
  TransportError,
  UnsupportedRequestError,
} from './utils/errors.js';
export { createLogger } from './utils/logger.js';
