import { z } from 'zod';
import { jsonMethod, type JsonMethod } from '../method.js';
import { updateSchema, type Update, type UpdateKind } from '../types/update.js';

export interface GetUpdatesParams {
  /** First update to return; one greater than the highest `update_id` already seen. */
  offset?: number;
  limit?: number;
  /** Long-polling timeout in seconds. */
  timeout?: number;
  allowed_updates?: UpdateKind[];
}

export function getUpdates(params: GetUpdatesParams = {}): JsonMethod<Update[]> {
  return jsonMethod('getUpdates', params, z.array(updateSchema));
}
