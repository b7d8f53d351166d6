export class TelewireError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TelewireError';
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

/** Network-level failure: the request never produced a response body. */
export class TransportError extends TelewireError {
  constructor(transport: string, message: string, options?: ErrorOptions) {
    super(message, `TRANSPORT_${transport.toUpperCase()}`, options);
    this.name = 'TransportError';
  }
}

export class DecodeError extends TelewireError {
  public readonly status: number | undefined;

  constructor(message: string, status?: number, options?: ErrorOptions) {
    super(message, 'DECODE_ERROR', options);
    this.name = 'DecodeError';
    this.status = status;
  }
}

export interface ResponseParameters {
  migrate_to_chat_id?: number;
  retry_after?: number;
}

/** The Bot API answered with `ok: false`. */
export class TelegramApiError extends TelewireError {
  public readonly description: string;
  public readonly errorCode: number | undefined;
  public readonly parameters: ResponseParameters | undefined;

  constructor(description: string, errorCode?: number, parameters?: ResponseParameters) {
    super(
      errorCode === undefined ? description : `${description} (${errorCode})`,
      'TELEGRAM_API_ERROR'
    );
    this.name = 'TelegramApiError';
    this.description = description;
    this.errorCode = errorCode;
    this.parameters = parameters;
  }
}

export class FileReadError extends TelewireError {
  public readonly path: string;

  constructor(path: string, options?: ErrorOptions) {
    super(`Failed to read upload file: ${path}`, 'FILE_READ_ERROR', options);
    this.name = 'FileReadError';
    this.path = path;
  }
}

export class UnsupportedRequestError extends TelewireError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'UNSUPPORTED_REQUEST', options);
    this.name = 'UnsupportedRequestError';
  }
}

export class ConfigError extends TelewireError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIG_ERROR', options);
    this.name = 'ConfigError';
  }
}
