import type { z } from 'zod';
import type { InputFileVariant } from './inputFile.js';

export type MethodParams = Readonly<Record<string, unknown>>;
export type ResultSchema<R> = z.ZodType<R, z.ZodTypeDef, unknown>;

interface MethodBase<R> {
  /** Remote method name; the last segment of `https://api.telegram.org/bot<token>/<name>`. */
  readonly name: string;
  /** Scalar fields, without unset ones. File-typed fields live in `files()` instead. */
  readonly params: MethodParams;
  readonly result: ResultSchema<R>;
}

/** A request serialized wholesale as one JSON document. */
export interface JsonMethod<R> extends MethodBase<R> {
  readonly kind: 'json';
}

/** A request that may carry uploads and is sent as `multipart/form-data`. */
export interface FileMethod<R> extends MethodBase<R> {
  readonly kind: 'file';
  files(): ReadonlyMap<string, InputFileVariant>;
}

export type TelegramMethod<R> = JsonMethod<R> | FileMethod<R>;

export type MethodResult<M> = M extends TelegramMethod<infer R> ? R : never;

function deepFreeze<T>(value: T): T {
  if (typeof value !== 'object' || value === null || ArrayBuffer.isView(value)) {
    return value;
  }
  for (const nested of Object.values(value)) {
    deepFreeze(nested);
  }
  Object.freeze(value);
  return value;
}

// Mirrors the wire format: an unset optional field is absent, not null.
function compact(fields: object): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) {
      out[key] = value;
    }
  }
  return out;
}

export function jsonMethod<R>(name: string, params: object, result: ResultSchema<R>): JsonMethod<R> {
  return Object.freeze({
    kind: 'json',
    name,
    params: deepFreeze(structuredClone(compact(params))),
    result,
  });
}

export function fileMethod<R>(
  name: string,
  params: object,
  files: Readonly<Record<string, InputFileVariant | undefined>>,
  result: ResultSchema<R>
): FileMethod<R> {
  const entries = Object.entries(files).filter(
    (entry): entry is [string, InputFileVariant] => entry[1] !== undefined
  );
  const frozenParams = deepFreeze(structuredClone(compact(params)));
  for (const [field] of entries) {
    if (field in frozenParams) {
      throw new TypeError(`Field "${field}" of ${name} cannot be both a scalar and a file`);
    }
  }
  return Object.freeze({
    kind: 'file',
    name,
    params: frozenParams,
    result,
    files: () => new Map(entries),
  });
}
