export enum HttpParserErrorCode {
  INVALID_TOKEN = 'ERR_INVALID_TOKEN',
  INVALID_METHOD = 'ERR_INVALID_METHOD',
  INVALID_VERSION = 'ERR_INVALID_VERSION',
  INVALID_STATUS = 'ERR_INVALID_STATUS',
  LINE_TOO_LONG = 'ERR_LINE_TOO_LONG',
  HEADERS_TOO_LARGE = 'ERR_HEADERS_TOO_LARGE',
  INVALID_CONTENT_LENGTH = 'ERR_INVALID_CONTENT_LENGTH',
  INVALID_TRANSFER_ENCODING = 'ERR_INVALID_TRANSFER_ENCODING',
  CONFLICTING_FRAMING = 'ERR_CONFLICTING_FRAMING',
  INVALID_CHUNK_SIZE = 'ERR_INVALID_CHUNK_SIZE',
  INVALID_CHUNK_DATA = 'ERR_INVALID_CHUNK_DATA',
  DATA_AFTER_MESSAGE = 'ERR_DATA_AFTER_MESSAGE',
  UNEXPECTED_EOF = 'ERR_UNEXPECTED_EOF',
  CALLBACK_FAILED = 'ERR_CALLBACK_FAILED',
  PORT_OUT_OF_RANGE = 'ERR_PORT_OUT_OF_RANGE',
  EMPTY_URL = 'ERR_EMPTY_URL',
  INVALID_URL = 'ERR_INVALID_URL',
}

export enum HttpParserErrorCategory {
  SYNTAX = 'syntax',
  SIZE = 'size',
  FRAMING = 'framing',
  STATE = 'state',
  CALLBACK = 'callback',
  URL = 'url',
}

export const ERROR_CATEGORY: Record<HttpParserErrorCode, HttpParserErrorCategory> = {
  [HttpParserErrorCode.INVALID_TOKEN]: HttpParserErrorCategory.SYNTAX,
  [HttpParserErrorCode.INVALID_METHOD]: HttpParserErrorCategory.SYNTAX,
  [HttpParserErrorCode.INVALID_VERSION]: HttpParserErrorCategory.SYNTAX,
  [HttpParserErrorCode.INVALID_STATUS]: HttpParserErrorCategory.SYNTAX,
  [HttpParserErrorCode.LINE_TOO_LONG]: HttpParserErrorCategory.SIZE,
  [HttpParserErrorCode.HEADERS_TOO_LARGE]: HttpParserErrorCategory.SIZE,
  [HttpParserErrorCode.INVALID_CONTENT_LENGTH]: HttpParserErrorCategory.FRAMING,
  [HttpParserErrorCode.INVALID_TRANSFER_ENCODING]: HttpParserErrorCategory.FRAMING,
  [HttpParserErrorCode.CONFLICTING_FRAMING]: HttpParserErrorCategory.FRAMING,
  [HttpParserErrorCode.INVALID_CHUNK_SIZE]: HttpParserErrorCategory.FRAMING,
  [HttpParserErrorCode.INVALID_CHUNK_DATA]: HttpParserErrorCategory.FRAMING,
  [HttpParserErrorCode.DATA_AFTER_MESSAGE]: HttpParserErrorCategory.STATE,
  [HttpParserErrorCode.UNEXPECTED_EOF]: HttpParserErrorCategory.STATE,
  [HttpParserErrorCode.CALLBACK_FAILED]: HttpParserErrorCategory.CALLBACK,
  [HttpParserErrorCode.PORT_OUT_OF_RANGE]: HttpParserErrorCategory.URL,
  [HttpParserErrorCode.EMPTY_URL]: HttpParserErrorCategory.URL,
  [HttpParserErrorCode.INVALID_URL]: HttpParserErrorCategory.URL,
} as const;

export interface HttpParserErrorOptions {
  code: HttpParserErrorCode;
  message: string;
  cause?: unknown;
  /** Byte index inside the buffer being parsed when the error was raised. */
  position?: number;
}

export class HttpParserError extends Error {
  public readonly code: HttpParserErrorCode;
  public readonly category: HttpParserErrorCategory;
  public position: number | undefined;

  constructor(options: HttpParserErrorOptions) {
    super(options.message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = this.constructor.name;
    this.code = options.code;
    this.category = ERROR_CATEGORY[options.code];
    this.position = options.position;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

export class HttpUrlParseError extends HttpParserError {}

export function isHttpParserError(error: unknown): error is HttpParserError {
  return error instanceof HttpParserError;
}
