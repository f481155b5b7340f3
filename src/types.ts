import type { Buffer } from 'node:buffer';

import type { HttpParserError } from './errors.js';
import type {
  ChunkPhase,
  HeadersDirective,
  HttpMethods,
  MessageKind,
  ParserMode,
} from './specs.js';

export type HttpMethod = typeof HttpMethods[number];

/** The kind a single message turned out to be; `MessageKind.BOTH` never appears here. */
export type ResolvedMessageKind = MessageKind.REQUEST | MessageKind.RESPONSE;

export interface HttpParserLimits {
  maxStartLineBytes: number;
  maxHeaderLineBytes: number;
  maxHeaderBytes: number;
  maxHeaderCount: number;
  maxMethodBytes: number;
  maxChunkSizeHexDigits: number;
  maxChunkExtensionBytes: number;
}

export interface HttpParserOptions extends Partial<HttpParserLimits> {
  allowDuplicateContentLength?: boolean;
}

export type ResolvedParserOptions = Readonly<HttpParserLimits & {
  allowDuplicateContentLength: boolean;
}>;

export interface ParserState {
  mode: ParserMode;
  messageKind: ResolvedMessageKind | null;
  method: HttpMethod | null;
  statusCode: number;
  httpMajor: number;
  httpMinor: number;
  /** Declared Content-Length; stays as sent while the body is read. */
  contentLength: number | null;
  /** Bitset of `ParserFlags`. */
  flags: number;
  chunkState: ChunkPhase | null;
  remainingChunkBytes: number;
}

/**
 * Callbacks fired synchronously, in document order, from inside `consume()`.
 *
 * Every `Buffer` handed to a callback is a view into the buffer passed to
 * `consume()`. It is only valid until the callback returns: copy it if it has
 * to outlive the call. A single URL, status, header field or value may arrive
 * in several pieces when it straddles two `consume()` calls.
 */
export interface HttpParserHandler {
  onMessageBegin?(): void;
  onUrl?(span: Buffer): void;
  onStatus?(span: Buffer): void;
  onHeaderField?(span: Buffer): void;
  onHeaderValue?(span: Buffer): void;
  onHeadersComplete?(): HeadersDirective | void;
  onBody?(span: Buffer): void;
  onChunkHeader?(size: number): void;
  onChunkComplete?(): void;
  onMessageComplete?(): void;
  onError?(error: HttpParserError): void;
}

export type ParseOutcome =
  | { type: 'ok' }
  | { type: 'error'; error: HttpParserError };

export interface ConsumeResult {
  bytesConsumed: number;
  outcome: ParseOutcome;
}
