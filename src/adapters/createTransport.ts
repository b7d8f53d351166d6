import type { Config } from '../config/index.js';
import type { TransportPort } from '../ports/TransportPort.js';
import { EdgeTransport } from './edge/EdgeTransport.js';
import { FetchTransport } from './fetch/FetchTransport.js';
import { NodeHttpTransport } from './node/NodeHttpTransport.js';

type TransportConfig = Pick<Config, 'botToken' | 'apiBaseUrl' | 'transport' | 'requestTimeoutMs'>;

export function createTransport(config: TransportConfig): TransportPort {
  const options = {
    token: config.botToken,
    apiBaseUrl: config.apiBaseUrl,
    timeoutMs: config.requestTimeoutMs,
  };

  switch (config.transport) {
    case 'fetch':
      return new FetchTransport(options);
    case 'node':
      return new NodeHttpTransport(options);
    case 'edge':
      return new EdgeTransport(options);
  }
}
