import type { HttpParserLimits } from './types.js';

export const CR = 0x0d;
export const LF = 0x0a;
export const SP = 0x20;
export const HTAB = 0x09;
export const COLON = 0x3a;
export const SEMICOLON = 0x3b;
export const SLASH = 0x2f;
export const DOT = 0x2e;

export const HttpMethods = [
  'DELETE', 'GET', 'HEAD', 'POST', 'PUT', 'CONNECT', 'OPTIONS', 'TRACE',
  'COPY', 'LOCK', 'MKCOL', 'MOVE', 'PROPFIND', 'PROPPATCH', 'SEARCH', 'UNLOCK',
  'BIND', 'REBIND', 'UNBIND', 'ACL',
  'REPORT', 'MKACTIVITY', 'CHECKOUT', 'MERGE',
  'M-SEARCH', 'NOTIFY', 'SUBSCRIBE', 'UNSUBSCRIBE',
  'PATCH', 'PURGE', 'MKCALENDAR',
  'LINK', 'UNLINK',
  'SOURCE',
] as const;

export enum MessageKind {
  REQUEST = 'request',
  RESPONSE = 'response',
  BOTH = 'both',
}

export enum ParserMode {
  IDLE = 'idle',
  PARSING_REQUEST_LINE = 'parsing_request_line',
  PARSING_STATUS_LINE = 'parsing_status_line',
  PARSING_HEADER_NAME = 'parsing_header_name',
  PARSING_HEADER_VALUE = 'parsing_header_value',
  HEADERS_COMPLETE = 'headers_complete',
  PARSING_BODY_FIXED_LENGTH = 'parsing_body_fixed_length',
  PARSING_BODY_CHUNKED = 'parsing_body_chunked',
  PARSING_BODY_UNTIL_CLOSE = 'parsing_body_until_close',
  PARSING_TRAILERS = 'parsing_trailers',
  MESSAGE_COMPLETE = 'message_complete',
  ERROR = 'error',
}

export enum ChunkPhase {
  CHUNK_SIZE = 'chunk_size',
  CHUNK_EXTENSION = 'chunk_extension',
  CHUNK_DATA = 'chunk_data',
  CHUNK_DATA_CRLF = 'chunk_data_crlf',
  TRAILER_HEADERS = 'trailer_headers',
  CHUNK_COMPLETE = 'chunk_complete',
}

export enum ParserFlags {
  NONE = 0,
  CHUNKED = 1 << 0,
  CONNECTION_KEEP_ALIVE = 1 << 1,
  CONNECTION_CLOSE = 1 << 2,
  CONNECTION_UPGRADE = 1 << 3,
  TRAILING = 1 << 4,
  UPGRADE = 1 << 5,
  SKIP_BODY = 1 << 6,
  CONTENT_LENGTH = 1 << 7,
  TRANSFER_ENCODING = 1 << 8,
  UPGRADE_HEADER = 1 << 9,
}

/** Value returned from `onHeadersComplete` to steer what follows the header block. */
export enum HeadersDirective {
  CONTINUE = 'continue',
  SKIP_BODY = 'skip_body',
  UPGRADE = 'upgrade',
}

export const DEFAULT_PARSER_LIMITS: HttpParserLimits = {
  maxStartLineBytes: 8 * 1024,
  maxHeaderLineBytes: 8 * 1024 + 256 + 1,
  maxHeaderBytes: 80 * 1024,
  maxHeaderCount: 100,
  maxMethodBytes: 32,
  maxChunkSizeHexDigits: 8,
  maxChunkExtensionBytes: 256,
} as const;
