export type InputFileSource =
  | { kind: 'bytes'; data: Uint8Array }
  | { kind: 'path'; path: string };

/** A file to be uploaded as a multipart part. */
export interface InputFile {
  readonly name: string;
  readonly mime: string;
  readonly source: InputFileSource;
}

/**
 * Value of a file-typed request field: a file Telegram already knows
 * (by `file_id` or HTTP URL) or a new upload.
 */
export type InputFileVariant =
  | { readonly type: 'id'; readonly id: string }
  | { readonly type: 'url'; readonly url: string }
  | { readonly type: 'upload'; readonly file: InputFile };

const DEFAULT_MIME = 'application/octet-stream';

/** Last segment of a POSIX or Windows path. */
export function fileNameOf(path: string): string {
  return path.split(/[\\/]/).filter((segment) => segment.length > 0).pop() ?? path;
}

export function fileId(id: string): InputFileVariant {
  return Object.freeze({ type: 'id', id });
}

export function fileUrl(url: string): InputFileVariant {
  return Object.freeze({ type: 'url', url });
}

export function uploadBytes(name: string, data: Uint8Array, mime: string = DEFAULT_MIME): InputFileVariant {
  const file: InputFile = Object.freeze({ name, mime, source: Object.freeze({ kind: 'bytes', data }) });
  return Object.freeze({ type: 'upload', file });
}

/** The file is read when the request is sent, not here. */
export function uploadPath(
  path: string,
  options: { name?: string; mime?: string } = {}
): InputFileVariant {
  const file: InputFile = Object.freeze({
    name: options.name ?? fileNameOf(path),
    mime: options.mime ?? DEFAULT_MIME,
    source: Object.freeze({ kind: 'path', path }),
  });
  return Object.freeze({ type: 'upload', file });
}

/** The string Telegram accepts in place of the file, or `undefined` for uploads. */
export function fileReference(variant: InputFileVariant): string | undefined {
  switch (variant.type) {
    case 'id':
      return variant.id;
    case 'url':
      return variant.url;
    case 'upload':
      return undefined;
  }
}
