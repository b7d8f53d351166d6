import { z } from 'zod';
import { DecodeError, TelegramApiError } from '../utils/errors.js';
import type { ResultSchema } from './method.js';

const responseParametersSchema = z.object({
  migrate_to_chat_id: z.number().int().optional(),
  retry_after: z.number().int().optional(),
});

export const apiResponseSchema = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  description: z.string().optional(),
  error_code: z.number().int().optional(),
  parameters: responseParametersSchema.optional(),
});

export type ApiResponse = z.infer<typeof apiResponseSchema>;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Decodes an already-parsed response envelope. `ok: false` always takes the
 * error path, whether or not a `result` came along with it.
 */
export function decodeResponse<R>(body: unknown, result: ResultSchema<R>, status?: number): R {
  const envelope = apiResponseSchema.safeParse(body);
  if (!envelope.success) {
    throw new DecodeError(`Unexpected response envelope: ${describeIssues(envelope.error)}`, status, {
      cause: envelope.error,
    });
  }

  const { ok, description, error_code: errorCode, parameters } = envelope.data;
  if (!ok) {
    throw new TelegramApiError(description ?? 'Unknown error', errorCode, parameters);
  }

  const decoded = result.safeParse(envelope.data.result);
  if (!decoded.success) {
    throw new DecodeError(`Unexpected result shape: ${describeIssues(decoded.error)}`, status, {
      cause: decoded.error,
    });
  }
  return decoded.data;
}

/** Decodes a raw response body. */
export function parseResponse<R>(text: string, result: ResultSchema<R>, status?: number): R {
  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch (error) {
    throw new DecodeError(
      status === undefined ? 'Response body is not JSON' : `Response body is not JSON (HTTP ${status})`,
      status,
      { cause: error }
    );
  }
  return decodeResponse(body, result, status);
}
