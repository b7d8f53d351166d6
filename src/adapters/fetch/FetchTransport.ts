import type { TransportOptions, TransportPort } from '../../ports/TransportPort.js';
import type { FileMethod, JsonMethod, ResultSchema } from '../../core/method.js';
import { encodeJson } from '../../core/encoding.js';
import { buildFormData } from '../../core/multipart.js';
import { parseResponse } from '../../core/response.js';
import { buildMethodUrl } from '../../core/url.js';
import { DEFAULT_API_BASE_URL } from '../../config/index.js';
import { createLogger } from '../../utils/logger.js';
import { TransportError } from '../../utils/errors.js';

export type FetchFunction = typeof fetch;

export interface FetchTransportOptions extends TransportOptions {
  /** Defaults to the global `fetch`. */
  fetch?: FetchFunction;
}

/** Transport over the WHATWG `fetch` API, with multipart uploads through `FormData`. */
export class FetchTransport implements TransportPort {
  private readonly logger = createLogger({ adapter: 'FetchTransport' });
  private readonly token: string;
  private readonly apiBaseUrl: string;
  private readonly timeoutMs: number | undefined;
  private readonly fetchImpl: FetchFunction;

  constructor(options: FetchTransportOptions) {
    this.token = options.token;
    this.apiBaseUrl = (options.apiBaseUrl ?? DEFAULT_API_BASE_URL).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async sendJson<R>(method: JsonMethod<R>): Promise<R> {
    return this.post(method.name, method.result, {
      headers: { 'Content-Type': 'application/json' },
      body: encodeJson(method),
    });
  }

  async sendFile<R>(method: FileMethod<R>): Promise<R> {
    // fetch sets the multipart Content-Type, boundary included
    const form = await buildFormData(method);
    return this.post(method.name, method.result, { body: form });
  }

  private async post<R>(
    name: string,
    result: ResultSchema<R>,
    init: { headers?: Record<string, string>; body: string | FormData }
  ): Promise<R> {
    const logger = this.logger.child({ method: 'post', apiMethod: name });
    logger.debug('Sending request');

    let response: Response;
    try {
      response = await this.fetchImpl(buildMethodUrl(this.token, name, this.apiBaseUrl), {
        method: 'POST',
        ...init,
        signal: this.timeoutMs === undefined ? undefined : AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      logger.error({ err: error }, 'Request failed before a response arrived');
      throw new TransportError('fetch', `Request to ${name} failed`, { cause: error });
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      logger.error({ err: error, status: response.status }, 'Failed to read response body');
      throw new TransportError('fetch', `Reading the ${name} response failed`, { cause: error });
    }

    logger.debug({ status: response.status }, 'Response received');
    return parseResponse(text, result, response.status);
  }
}
