import { z } from 'zod';
import { jsonMethod, type JsonMethod } from '../method.js';
import type { InlineQueryResult } from '../types/inline.js';

export interface AnswerCallbackQueryParams {
  callback_query_id: string;
  text?: string;
  show_alert?: boolean;
  url?: string;
  cache_time?: number;
}

export function answerCallbackQuery(params: AnswerCallbackQueryParams): JsonMethod<boolean> {
  return jsonMethod('answerCallbackQuery', params, z.boolean());
}

export interface AnswerInlineQueryParams {
  inline_query_id: string;
  /** At most 50 results. */
  results: InlineQueryResult[];
  /** Seconds the result may be cached on the server; 300 when unset. */
  cache_time?: number;
  is_personal?: boolean;
  /** Passed back in the next inline query's `offset` when the user scrolls for more. */
  next_offset?: string;
  switch_pm_text?: string;
  switch_pm_parameter?: string;
}

export function answerInlineQuery(params: AnswerInlineQueryParams): JsonMethod<boolean> {
  return jsonMethod('answerInlineQuery', params, z.boolean());
}
