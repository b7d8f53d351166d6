import type { InputFile } from './inputFile.js';
import { fileReference } from './inputFile.js';
import type { FileMethod, JsonMethod } from './method.js';

/** Canonical JSON body of a plain request. */
export function encodeJson(method: JsonMethod<unknown>): string {
  return JSON.stringify(method.params);
}

/** Multipart text values: strings go verbatim, everything else as JSON. */
export function encodeFormValue(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

export type FormPart =
  | { readonly kind: 'text'; readonly name: string; readonly value: string }
  | { readonly kind: 'file'; readonly name: string; readonly file: InputFile };

/**
 * Flattens a file-bearing request into multipart parts: one text part per scalar
 * field, then one part per entry of `files()` (references as text, uploads as files).
 */
export function formParts(method: FileMethod<unknown>): FormPart[] {
  const parts: FormPart[] = Object.entries(method.params).map(([name, value]) => ({
    kind: 'text',
    name,
    value: encodeFormValue(value),
  }));
  for (const [name, variant] of method.files()) {
    const reference = fileReference(variant);
    if (reference !== undefined) {
      parts.push({ kind: 'text', name, value: reference });
    } else if (variant.type === 'upload') {
      parts.push({ kind: 'file', name, file: variant.file });
    }
  }
  return parts;
}

export function hasUploads(method: FileMethod<unknown>): boolean {
  for (const variant of method.files().values()) {
    if (variant.type === 'upload') {
      return true;
    }
  }
  return false;
}

/**
 * JSON body of a file-bearing request whose files are all references.
 * Throws if any entry is an upload.
 */
export function encodeJsonWithReferences(method: FileMethod<unknown>): string {
  const body: Record<string, unknown> = { ...method.params };
  for (const [name, variant] of method.files()) {
    const reference = fileReference(variant);
    if (reference === undefined) {
      throw new TypeError(`Field "${name}" of ${method.name} is an upload`);
    }
    body[name] = reference;
  }
  return JSON.stringify(body);
}
