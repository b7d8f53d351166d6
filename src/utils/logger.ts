import pino from 'pino';

// Edge runtimes may have no `process`
const env = (key: string): string | undefined => globalThis.process?.env[key];

let correlationId: string | undefined;

export function setCorrelationId(id: string): void {
  correlationId = id;
}

export function generateCorrelationId(): string {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
}

// The token is part of every request URL, so neither may reach a log line.
const REDACT_PATHS = ['token', 'botToken', 'url', '*.token', '*.botToken', 'config.botToken'];

export function createLogger(context?: Record<string, unknown>): pino.Logger {
  const loggerOptions: pino.LoggerOptions =
    env('NODE_ENV') === 'development'
      ? {
          level: env('LOG_LEVEL') || 'info',
          redact: { paths: REDACT_PATHS, censor: '[redacted]' },
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
            },
          },
        }
      : {
          level: env('LOG_LEVEL') || 'info',
          redact: { paths: REDACT_PATHS, censor: '[redacted]' },
        };

  const baseLogger = pino(loggerOptions);

  const correlationIdValue = correlationId || generateCorrelationId();
  if (!correlationId) {
    setCorrelationId(correlationIdValue);
  }

  return baseLogger.child({
    correlationId: correlationIdValue,
    ...context,
  });
}
