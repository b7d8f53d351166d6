import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { encodeFormValue, encodeJsonWithReferences, formParts, hasUploads } from '../../core/encoding.js';
import { buildFormData, readInputFile } from '../../core/multipart.js';
import { fileId, fileUrl, uploadBytes, uploadPath } from '../../core/inputFile.js';
import { sendDocument, sendPhoto } from '../../core/methods/media.js';
import { inlineKeyboard, callbackButton } from '../../core/types/markup.js';
import { FileReadError } from '../../utils/errors.js';

const encoder = new TextEncoder();

describe('encodeFormValue', () => {
  it('should send strings verbatim and everything else as JSON', () => {
    expect(encodeFormValue('hello')).toBe('hello');
    expect(encodeFormValue(42)).toBe('42');
    expect(encodeFormValue(true)).toBe('true');
    expect(encodeFormValue({ a: [1] })).toBe('{"a":[1]}');
  });
});

describe('formParts', () => {
  it('should list scalar fields first, then the file fields', () => {
    const method = sendDocument({
      chat_id: 5,
      caption: 'report',
      document: uploadBytes('r.txt', encoder.encode('data'), 'text/plain'),
      thumb: fileId('thumb-id'),
    });

    const parts = formParts(method);

    expect(parts.map((part) => [part.kind, part.name])).toEqual([
      ['text', 'chat_id'],
      ['text', 'caption'],
      ['file', 'document'],
      ['text', 'thumb'],
    ]);
    expect(parts[0]).toEqual({ kind: 'text', name: 'chat_id', value: '5' });
    expect(parts[3]).toEqual({ kind: 'text', name: 'thumb', value: 'thumb-id' });
  });

  it('should serialize reply markup as JSON text', () => {
    const markup = inlineKeyboard([[callbackButton('Yes', 'y')]]);
    const method = sendPhoto({ chat_id: 5, photo: fileId('p'), reply_markup: markup });

    const markupPart = formParts(method).find((part) => part.name === 'reply_markup');

    expect(markupPart).toEqual({
      kind: 'text',
      name: 'reply_markup',
      value: '{"inline_keyboard":[[{"text":"Yes","callback_data":"y"}]]}',
    });
  });
});

describe('reference-only encoding', () => {
  it('should detect uploads among the file fields', () => {
    expect(hasUploads(sendPhoto({ chat_id: 1, photo: fileId('p') }))).toBe(false);
    expect(hasUploads(sendPhoto({ chat_id: 1, photo: uploadBytes('p.jpg', new Uint8Array([1])) }))).toBe(true);
  });

  it('should inline references into a JSON body', () => {
    const method = sendPhoto({ chat_id: 1, photo: fileUrl('https://example.com/cat.jpg') });

    expect(encodeJsonWithReferences(method)).toBe('{"chat_id":1,"photo":"https://example.com/cat.jpg"}');
  });

  it('should refuse to inline an upload', () => {
    const method = sendPhoto({ chat_id: 1, photo: uploadBytes('p.jpg', new Uint8Array([1])) });

    expect(() => encodeJsonWithReferences(method)).toThrow(TypeError);
  });
});

describe('buildFormData', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'telewire-'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should attach in-memory uploads with their name and media type', async () => {
    const method = sendPhoto({ chat_id: 9, photo: uploadBytes('cat.jpg', encoder.encode('jpeg-bytes'), 'image/jpeg') });

    const form = await buildFormData(method);
    const photo = form.get('photo');

    expect(form.get('chat_id')).toBe('9');
    if (photo === null || typeof photo === 'string') throw new Error('expected a file part');
    expect(photo.name).toBe('cat.jpg');
    expect(photo.type).toBe('image/jpeg');
    expect(await photo.text()).toBe('jpeg-bytes');
  });

  it('should read path uploads from disk when the form is built', async () => {
    const path = join(dir, 'notes.txt');
    await writeFile(path, 'from disk');
    const method = sendDocument({ chat_id: 9, document: uploadPath(path, { mime: 'text/plain' }) });

    const document = (await buildFormData(method)).get('document');

    if (document === null || typeof document === 'string') throw new Error('expected a file part');
    expect(document.name).toBe('notes.txt');
    expect(document.type).toBe('text/plain');
    expect(await document.text()).toBe('from disk');
  });

  it('should fail with a file read error for a missing path', async () => {
    const missing = join(dir, 'missing.bin');
    const method = sendDocument({ chat_id: 9, document: uploadPath(missing) });

    await expect(buildFormData(method)).rejects.toBeInstanceOf(FileReadError);
    await expect(buildFormData(method)).rejects.toMatchObject({ path: missing, code: 'FILE_READ_ERROR' });
  });
});

describe('readInputFile', () => {
  it('should return in-memory bytes as they are', async () => {
    const data = new Uint8Array([7, 8]);
    const variant = uploadBytes('b.bin', data);
    if (variant.type !== 'upload') throw new Error('expected an upload');

    expect(await readInputFile(variant.file)).toBe(data);
  });
});
