import { readFile } from 'node:fs/promises';
import { FileReadError } from '../utils/errors.js';
import { formParts } from './encoding.js';
import type { InputFile } from './inputFile.js';
import type { FileMethod } from './method.js';

export async function readInputFile(file: InputFile): Promise<Uint8Array> {
  switch (file.source.kind) {
    case 'bytes':
      return file.source.data;
    case 'path': {
      const { path } = file.source;
      try {
        return await readFile(path);
      } catch (error) {
        throw new FileReadError(path, { cause: error });
      }
    }
  }
}

/** Builds the platform `FormData` for a file-bearing request, reading path uploads from disk. */
export async function buildFormData(method: FileMethod<unknown>): Promise<FormData> {
  const form = new FormData();
  for (const part of formParts(method)) {
    if (part.kind === 'text') {
      form.append(part.name, part.value);
    } else {
      const data = await readInputFile(part.file);
      form.append(part.name, new Blob([data], { type: part.file.mime }), part.file.name);
    }
  }
  return form;
}
