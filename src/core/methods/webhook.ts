import { z } from 'zod';
import type { InputFileVariant } from '../inputFile.js';
import { fileMethod, jsonMethod, type FileMethod, type JsonMethod } from '../method.js';
import type { UpdateKind } from '../types/update.js';
import { webhookInfoSchema, type WebhookInfo } from '../types/webhook.js';

export interface SetWebhookParams {
  /** HTTPS URL to send updates to; an empty string removes the webhook. */
  url: string;
  /** Public key certificate, for self-signed setups. */
  certificate?: InputFileVariant;
  ip_address?: string;
  max_connections?: number;
  allowed_updates?: UpdateKind[];
  drop_pending_updates?: boolean;
}

export function setWebhook(params: SetWebhookParams): FileMethod<boolean> {
  const { certificate, ...rest } = params;
  return fileMethod('setWebhook', rest, { certificate }, z.boolean());
}

export function deleteWebhook(params: { drop_pending_updates?: boolean } = {}): JsonMethod<boolean> {
  return jsonMethod('deleteWebhook', params, z.boolean());
}

export function getWebhookInfo(): JsonMethod<WebhookInfo> {
  return jsonMethod('getWebhookInfo', {}, webhookInfoSchema);
}
