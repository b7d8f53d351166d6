import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';

export const DEFAULT_API_BASE_URL = 'https://api.telegram.org';

const configSchema = z.object({
  // Telegram
  botToken: z.string().min(1),
  apiBaseUrl: z
    .string()
    .url()
    .default(DEFAULT_API_BASE_URL)
    .transform((url) => url.replace(/\/+$/, '')),
  transport: z.enum(['fetch', 'node', 'edge']).default('fetch'),
  requestTimeoutMs: z.coerce.number().int().positive().optional(),
  webhookUrl: z.string().url().optional(), // Optional: if not set, uses polling
  pollingTimeoutSeconds: z.coerce.number().int().nonnegative().default(1),

  // App
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  host: z.string().default('0.0.0.0'),
  port: z.coerce.number().int().positive().default(5000),
});

export type Config = z.infer<typeof configSchema>;
export type TransportKind = Config['transport'];

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  // Empty strings count as unset
  const env = (key: string): string | undefined => {
    const value = source[key];
    return value === '' ? undefined : value;
  };

  const raw = {
    botToken: env('TELEGRAM_BOT_TOKEN'),
    apiBaseUrl: env('TELEGRAM_API_BASE_URL'),
    transport: env('TELEGRAM_TRANSPORT'),
    requestTimeoutMs: env('TELEGRAM_REQUEST_TIMEOUT_MS'),
    webhookUrl: env('TELEGRAM_WEBHOOK_URL'),
    pollingTimeoutSeconds: env('TELEGRAM_POLLING_TIMEOUT'),
    logLevel: env('LOG_LEVEL'),
    host: env('HOST'),
    port: env('PORT'),
  };

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}
