import { request as httpRequest, type IncomingMessage } from 'node:http';
import { request as httpsRequest } from 'node:https';
import type { TransportOptions, TransportPort } from '../../ports/TransportPort.js';
import type { FileMethod, JsonMethod, ResultSchema } from '../../core/method.js';
import { encodeJson } from '../../core/encoding.js';
import { buildFormData } from '../../core/multipart.js';
import { parseResponse } from '../../core/response.js';
import { buildMethodUrl } from '../../core/url.js';
import { DEFAULT_API_BASE_URL } from '../../config/index.js';
import { createLogger } from '../../utils/logger.js';
import { TransportError } from '../../utils/errors.js';

interface RawResponse {
  status: number;
  text: string;
}

/** Transport over Node's own `http`/`https` modules, chosen by the base URL's protocol. */
export class NodeHttpTransport implements TransportPort {
  private readonly logger = createLogger({ adapter: 'NodeHttpTransport' });
  private readonly token: string;
  private readonly apiBaseUrl: string;
  private readonly timeoutMs: number | undefined;

  constructor(options: TransportOptions) {
    this.token = options.token;
    this.apiBaseUrl = (options.apiBaseUrl ?? DEFAULT_API_BASE_URL).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs;
  }

  async sendJson<R>(method: JsonMethod<R>): Promise<R> {
    const body = Buffer.from(encodeJson(method), 'utf8');
    return this.post(method.name, method.result, 'application/json', body);
  }

  async sendFile<R>(method: FileMethod<R>): Promise<R> {
    // Let the platform encoder produce the multipart body and its boundary
    const encoded = new Response(await buildFormData(method));
    const contentType = encoded.headers.get('content-type') ?? 'multipart/form-data';
    const body = Buffer.from(await encoded.arrayBuffer());
    return this.post(method.name, method.result, contentType, body);
  }

  private async post<R>(name: string, result: ResultSchema<R>, contentType: string, body: Buffer): Promise<R> {
    const logger = this.logger.child({ method: 'post', apiMethod: name });
    logger.debug({ bytes: body.length }, 'Sending request');

    let response: RawResponse;
    try {
      response = await this.exchange(new URL(buildMethodUrl(this.token, name, this.apiBaseUrl)), contentType, body);
    } catch (error) {
      logger.error({ err: error }, 'Request failed before a response arrived');
      throw new TransportError('node', `Request to ${name} failed`, { cause: error });
    }

    logger.debug({ status: response.status }, 'Response received');
    return parseResponse(response.text, result, response.status);
  }

  private exchange(url: URL, contentType: string, body: Buffer): Promise<RawResponse> {
    const send = url.protocol === 'http:' ? httpRequest : httpsRequest;

    return new Promise((resolve, reject) => {
      const req = send(
        url,
        {
          method: 'POST',
          headers: {
            'Content-Type': contentType,
            'Content-Length': body.length,
          },
          timeout: this.timeoutMs,
        },
        (res: IncomingMessage) => {
          const chunks: Buffer[] = [];
          res.on('data', (chunk: Buffer) => chunks.push(chunk));
          res.on('error', reject);
          res.on('end', () => {
            resolve({ status: res.statusCode ?? 0, text: Buffer.concat(chunks).toString('utf8') });
          });
        }
      );

      req.on('timeout', () => {
        req.destroy(new Error(`Request timed out after ${this.timeoutMs}ms`));
      });
      req.on('error', reject);
      req.end(body);
    });
  }
}
