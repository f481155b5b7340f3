import { isToken } from '../char-class.js';
import { HttpParserError, HttpParserErrorCode } from '../errors.js';
import { MessageKind, ParserFlags } from '../specs.js';
import type { ParserState } from '../types.js';

export enum FramingHeader {
  GENERAL = 'general',
  CONTENT_LENGTH = 'content-length',
  TRANSFER_ENCODING = 'transfer-encoding',
  CONNECTION = 'connection',
  UPGRADE = 'upgrade',
}

const FRAMING_HEADERS = new Map<string, FramingHeader>([
  ['content-length', FramingHeader.CONTENT_LENGTH],
  ['transfer-encoding', FramingHeader.TRANSFER_ENCODING],
  ['connection', FramingHeader.CONNECTION],
  ['upgrade', FramingHeader.UPGRADE],
]);

/** Longest header name the parser needs to recognise. */
export const MAX_FRAMING_HEADER_NAME_LENGTH = 'transfer-encoding'.length;

const DIGITS = /^[0-9]+$/;
const OWS_EDGES = /^[ \t]+|[ \t]+$/g;

/** Strips SP and HTAB only; obs-text such as 0xA0 stays part of the value. */
function trimOws(value: string): string {
  return value.replace(OWS_EDGES, '');
}

function isTokenString(value: string): boolean {
  for (let i = 0; i < value.length; i++) {
    if (!isToken(value.charCodeAt(i))) {
      return false;
    }
  }
  return value.length > 0;
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map(trimOws)
    .filter((item) => item !== '');
}

export function classifyHeaderName(lowerName: string): FramingHeader {
  return FRAMING_HEADERS.get(lowerName) ?? FramingHeader.GENERAL;
}

/**
 * A Content-Length value is a bare run of digits. Lists such as `5, 5`
 * are rejected.
 *
 * Lengths are JavaScript numbers, so a value above
 * `Number.MAX_SAFE_INTEGER` (2^53 - 1) is rejected as
 * `INVALID_CONTENT_LENGTH` even though HTTP puts no upper bound on it.
 */
export function parseContentLength(value: string): number {
  const trimmed = trimOws(value);

  if (!DIGITS.test(trimmed)) {
    throw new HttpParserError({
      code: HttpParserErrorCode.INVALID_CONTENT_LENGTH,
      message: `Invalid Content-Length: "${trimmed}"`,
    });
  }

  const length = Number(trimmed);

  if (!Number.isSafeInteger(length)) {
    throw new HttpParserError({
      code: HttpParserErrorCode.INVALID_CONTENT_LENGTH,
      message: `Content-Length too large: ${trimmed}`,
    });
  }

  return length;
}

export function parseTransferCodings(value: string): string[] {
  const codings: string[] = [];

  for (const item of splitList(value)) {
    const semicolonIndex = item.indexOf(';');
    const coding = trimOws(semicolonIndex === -1 ? item : item.slice(0, semicolonIndex)).toLowerCase();

    if (!isTokenString(coding)) {
      throw new HttpParserError({
        code: HttpParserErrorCode.INVALID_TRANSFER_ENCODING,
        message: `Invalid transfer coding: "${item}"`,
      });
    }
    codings.push(coding);
  }

  return codings;
}

export function parseConnectionTokens(value: string): number {
  let flags: number = ParserFlags.NONE;

  for (const token of splitList(value)) {
    switch (token.toLowerCase()) {
      case 'close':
        flags |= ParserFlags.CONNECTION_CLOSE;
        break;
      case 'keep-alive':
        flags |= ParserFlags.CONNECTION_KEEP_ALIVE;
        break;
      case 'upgrade':
        flags |= ParserFlags.CONNECTION_UPGRADE;
        break;
      default:
        break;
    }
  }

  return flags;
}

/**
 * Transfer-Encoding is chunked when `chunked` is the final coding.
 * `chunked` anywhere else, or applied twice, cannot be framed.
 */
export function isChunkedCodingList(codings: readonly string[]): boolean {
  const chunkedIndex = codings.indexOf('chunked');

  if (chunkedIndex === -1) {
    return false;
  }

  if (chunkedIndex !== codings.length - 1) {
    throw new HttpParserError({
      code: HttpParserErrorCode.INVALID_TRANSFER_ENCODING,
      message: 'Transfer-Encoding "chunked" must be the final coding',
    });
  }

  return true;
}

export function statusHasNoBody(statusCode: number): boolean {
  return (statusCode >= 100 && statusCode < 200) || statusCode === 204 || statusCode === 304;
}

export function computeKeepAlive(state: Readonly<ParserState>): boolean {
  const { flags } = state;

  if (state.httpMajor > 0 && state.httpMinor > 0) {
    if (flags & ParserFlags.CONNECTION_CLOSE) {
      return false;
    }
  } else if (!(flags & ParserFlags.CONNECTION_KEEP_ALIVE)) {
    return false;
  }

  if (state.messageKind !== MessageKind.RESPONSE) {
    return true;
  }

  // a response without its own framing ends when the connection closes
  return (flags & (ParserFlags.CHUNKED | ParserFlags.SKIP_BODY | ParserFlags.UPGRADE)) !== 0
    || state.contentLength !== null
    || statusHasNoBody(state.statusCode);
}
