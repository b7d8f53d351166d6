import type { TransportOptions, TransportPort } from '../../ports/TransportPort.js';
import type { FileMethod, JsonMethod, ResultSchema } from '../../core/method.js';
import { encodeJson, encodeJsonWithReferences, hasUploads } from '../../core/encoding.js';
import { parseResponse } from '../../core/response.js';
import { buildMethodUrl } from '../../core/url.js';
import { DEFAULT_API_BASE_URL } from '../../config/index.js';
import type { FetchFunction } from '../fetch/FetchTransport.js';
import { createLogger } from '../../utils/logger.js';
import { TransportError, UnsupportedRequestError } from '../../utils/errors.js';

export interface EdgeTransportOptions extends TransportOptions {
  fetch?: FetchFunction;
}

/**
 * JSON-only transport for serverless edge runtimes. File-bearing requests are
 * accepted when every file is a reference (file id or URL); uploads are refused.
 */
export class EdgeTransport implements TransportPort {
  private readonly logger = createLogger({ adapter: 'EdgeTransport' });
  private readonly token: string;
  private readonly apiBaseUrl: string;
  private readonly timeoutMs: number | undefined;
  private readonly fetchImpl: FetchFunction;

  constructor(options: EdgeTransportOptions) {
    this.token = options.token;
    this.apiBaseUrl = (options.apiBaseUrl ?? DEFAULT_API_BASE_URL).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async sendJson<R>(method: JsonMethod<R>): Promise<R> {
    return this.post(method.name, method.result, encodeJson(method));
  }

  async sendFile<R>(method: FileMethod<R>): Promise<R> {
    if (hasUploads(method)) {
      this.logger.warn({ apiMethod: method.name }, 'Refusing upload: multipart is not supported');
      throw new UnsupportedRequestError(
        `${method.name}: file uploads need a multipart-capable transport; pass a file id or URL instead`
      );
    }
    return this.post(method.name, method.result, encodeJsonWithReferences(method));
  }

  private async post<R>(name: string, result: ResultSchema<R>, body: string): Promise<R> {
    const logger = this.logger.child({ method: 'post', apiMethod: name });

    let response: Response;
    try {
      response = await this.fetchImpl(buildMethodUrl(this.token, name, this.apiBaseUrl), {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body,
        signal: this.timeoutMs === undefined ? undefined : AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      logger.error({ err: error }, 'Request failed before a response arrived');
      throw new TransportError('edge', `Request to ${name} failed`, { cause: error });
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      throw new TransportError('edge', `Reading the ${name} response failed`, { cause: error });
    }
    return parseResponse(text, result, response.status);
  }
}
