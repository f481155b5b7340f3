import { Buffer } from 'node:buffer';

import {
  HEADER_VALUE, hexValue, isDigit, isToken, URL_CHAR,
} from '../char-class.js';
import { HttpParserError, HttpParserErrorCode } from '../errors.js';
import { resolveParserOptions } from '../options.js';
import {
  ChunkPhase,
  COLON,
  CR,
  DOT,
  HeadersDirective,
  HTAB,
  HttpMethods,
  LF,
  MessageKind,
  ParserFlags,
  ParserMode,
  SEMICOLON,
  SLASH,
  SP,
} from '../specs.js';
import type {
  ConsumeResult,
  HttpMethod,
  HttpParserHandler,
  HttpParserOptions,
  ParserState,
  ResolvedParserOptions,
} from '../types.js';
import {
  classifyHeaderName,
  computeKeepAlive,
  FramingHeader,
  isChunkedCodingList,
  MAX_FRAMING_HEADER_NAME_LENGTH,
  parseConnectionTokens,
  parseContentLength,
  parseTransferCodings,
  statusHasNoBody,
} from './framing.js';

// Start-line steps and header-block steps are declared contiguously: the
// byte accounting in consume() checks them as ranges.
const enum Step {
  START,
  START_LF,

  REQ_METHOD,
  REQ_URL_START,
  REQ_URL,
  VERSION_LITERAL,
  VERSION_MAJOR,
  VERSION_DOT,
  VERSION_MINOR,
  REQ_LINE_CR,
  RES_STATUS_SP,
  RES_STATUS_CODE,
  RES_STATUS_END,
  RES_REASON,
  START_LINE_LF,

  HEADER_LINE_START,
  HEADER_FIELD,
  HEADER_VALUE_OWS,
  HEADER_VALUE,
  HEADER_LINE_LF,
  HEADERS_END_LF,

  BODY_FIXED,
  BODY_UNTIL_CLOSE,
  CHUNK_SIZE_START,
  CHUNK_SIZE,
  CHUNK_SIZE_BWS,
  CHUNK_EXTENSION,
  CHUNK_SIZE_LF,
  CHUNK_DATA,
  CHUNK_DATA_CR,
  CHUNK_DATA_LF,

  DONE,
  DEAD,
}

const enum SpanKind {
  URL,
  STATUS,
  HEADER_FIELD,
  HEADER_VALUE,
}

const HTTP_PREFIX = Buffer.from('HTTP/', 'ascii');
const RESPONSE_PROBE = 'HTTP';
const STATUS_CODE_DIGITS = 3;

function toHttpMethod(text: string): HttpMethod | null {
  return HttpMethods.find((method) => method === text) ?? null;
}

function createParserState(): ParserState {
  return {
    mode: ParserMode.IDLE,
    messageKind: null,
    method: null,
    statusCode: 0,
    httpMajor: 0,
    httpMinor: 0,
    contentLength: null,
    flags: ParserFlags.NONE,
    chunkState: null,
    remainingChunkBytes: 0,
  };
}

function toBuffer(input: Buffer | Uint8Array): Buffer {
  if (Buffer.isBuffer(input)) {
    return input;
  }
  if (input instanceof Uint8Array) {
    return Buffer.from(input.buffer, input.byteOffset, input.byteLength);
  }
  throw new TypeError('input must be a Buffer or Uint8Array');
}

function fail(code: HttpParserErrorCode, message: string): never {
  throw new HttpParserError({ code, message });
}

/**
 * Incremental HTTP/1.x parser.
 *
 * Feed bytes with `consume()` as they arrive. Each call walks the bytes once,
 * fires the handler callbacks synchronously and returns how many bytes belong
 * to the current message. The parser stops right after `onMessageComplete`;
 * call `reset()` before feeding the next pipelined message, or hand the rest
 * of the buffer to another consumer when `isUpgrade()` is true.
 */
export class HttpParser {
  public readonly kind: MessageKind;

  private readonly handler: HttpParserHandler;
  private readonly options: ResolvedParserOptions;

  private state: ParserState = createParserState();
  private step = Step.START;
  private openSpan: SpanKind | null = null;
  private lastError: HttpParserError | null = null;
  private cursor = 0;

  private lineBytes = 0;
  private headerBytes = 0;
  private headerCount = 0;
  private methodText = '';
  private literalIndex = 0;
  private statusDigits = 0;

  private headerName: string | null = '';
  private headerKind = FramingHeader.GENERAL;
  private headerValue = '';
  private valueEmitted = false;
  private transferCodings: string[] = [];

  private chunkSizeDigits = 0;
  private chunkExtensionBytes = 0;
  private bodyBytesLeft = 0;

  constructor(kind: MessageKind, handler: HttpParserHandler = {}, options?: HttpParserOptions) {
    if (!Object.values(MessageKind).includes(kind)) {
      throw new TypeError(`Unknown message kind: ${String(kind)}`);
    }
    this.kind = kind;
    this.handler = handler;
    this.options = resolveParserOptions(options);
  }

  get error(): HttpParserError | null {
    return this.lastError;
  }

  getState(): Readonly<ParserState> {
    return { ...this.state };
  }

  methodName(): string {
    return this.state.method ?? '';
  }

  statusCode(): number {
    return this.state.statusCode;
  }

  isUpgrade(): boolean {
    return (this.state.flags & ParserFlags.UPGRADE) !== 0;
  }

  httpVersion(): { major: number; minor: number } {
    return { major: this.state.httpMajor, minor: this.state.httpMinor };
  }

  shouldKeepAlive(): boolean {
    return computeKeepAlive(this.state);
  }

  reset(): void {
    this.state = createParserState();
    this.step = Step.START;
    this.openSpan = null;
    this.lastError = null;
    this.lineBytes = 0;
    this.headerBytes = 0;
    this.headerCount = 0;
    this.methodText = '';
    this.literalIndex = 0;
    this.statusDigits = 0;
    this.resetHeader();
    this.transferCodings = [];
    this.chunkSizeDigits = 0;
    this.chunkExtensionBytes = 0;
    this.bodyBytesLeft = 0;
  }

  consume(input: Buffer | Uint8Array): ConsumeResult {
    const buffer = toBuffer(input);
    const previous = this.lastError;

    if (previous) {
      return { bytesConsumed: 0, outcome: { type: 'error', error: previous } };
    }

    if (buffer.length === 0) {
      return { bytesConsumed: 0, outcome: { type: 'ok' } };
    }

    this.cursor = 0;
    try {
      if (this.step === Step.DONE) {
        fail(HttpParserErrorCode.DATA_AFTER_MESSAGE, 'Data received after the message was complete');
      }
      const consumed = this.execute(buffer);
      return { bytesConsumed: consumed, outcome: { type: 'ok' } };
    } catch (error) {
      return this.enterError(error, this.cursor);
    }
  }

  /** Signals the end of input, completing a body that is delimited by connection close. */
  finish(): ConsumeResult {
    const previous = this.lastError;

    if (previous) {
      return { bytesConsumed: 0, outcome: { type: 'error', error: previous } };
    }

    try {
      switch (this.step) {
        case Step.START:
        case Step.START_LF:
        case Step.DONE:
          break;
        case Step.BODY_UNTIL_CLOSE:
          this.completeMessage();
          break;
        case Step.BODY_FIXED:
        case Step.CHUNK_DATA:
          fail(HttpParserErrorCode.UNEXPECTED_EOF, 'Unexpected end of input inside the message body');
        default:
          fail(HttpParserErrorCode.UNEXPECTED_EOF, `Unexpected end of input while in ${this.state.mode}`);
      }
    } catch (error) {
      return this.enterError(error, 0);
    }

    return { bytesConsumed: 0, outcome: { type: 'ok' } };
  }

  private enterError(error: unknown, position: number): ConsumeResult {
    const parserError = error instanceof HttpParserError
      ? error
      : new HttpParserError({
        code: HttpParserErrorCode.CALLBACK_FAILED,
        message: 'Unexpected failure while parsing',
        cause: error,
      });

    if (parserError.position === undefined) {
      parserError.position = position;
    }

    this.lastError = parserError;
    this.state.mode = ParserMode.ERROR;
    this.step = Step.DEAD;
    this.openSpan = null;

    try {
      this.handler.onError?.(parserError);
    } catch (hookError) {
      parserError.cause ??= hookError;
    }

    return {
      bytesConsumed: parserError.position ?? position,
      outcome: { type: 'error', error: parserError },
    };
  }

  private notify<T>(callback: () => T): T {
    try {
      return callback();
    } catch (error) {
      throw new HttpParserError({
        code: HttpParserErrorCode.CALLBACK_FAILED,
        message: `Callback failed: ${error instanceof Error ? error.message : String(error)}`,
        cause: error,
      });
    }
  }

  private emit(kind: SpanKind, span: Buffer): void {
    switch (kind) {
      case SpanKind.URL:
        if (span.length > 0) {
          this.notify(() => this.handler.onUrl?.(span));
        }
        break;
      case SpanKind.STATUS:
        if (span.length > 0) {
          this.notify(() => this.handler.onStatus?.(span));
        }
        break;
      case SpanKind.HEADER_FIELD:
        if (span.length > 0) {
          if (this.headerName !== null) {
            const name = this.headerName + span.toString('latin1').toLowerCase();
            this.headerName = name.length <= MAX_FRAMING_HEADER_NAME_LENGTH ? name : null;
          }
          this.notify(() => this.handler.onHeaderField?.(span));
        }
        break;
      case SpanKind.HEADER_VALUE:
        if (span.length > 0 || !this.valueEmitted) {
          this.valueEmitted = true;
          if (this.headerKind !== FramingHeader.GENERAL) {
            this.headerValue += span.toString('latin1');
          }
          this.notify(() => this.handler.onHeaderValue?.(span));
        }
        break;
    }
  }

  private emitBody(span: Buffer): void {
    if (span.length > 0) {
      this.notify(() => this.handler.onBody?.(span));
    }
  }

  private isRequest(): boolean {
    return this.state.messageKind === MessageKind.REQUEST;
  }

  private isTrailing(): boolean {
    return (this.state.flags & ParserFlags.TRAILING) !== 0;
  }

  private resetHeader(): void {
    this.headerName = '';
    this.headerKind = FramingHeader.GENERAL;
    this.headerValue = '';
    this.valueEmitted = false;
  }

  private beginMessage(): void {
    this.state.mode = this.kind === MessageKind.RESPONSE
      ? ParserMode.PARSING_STATUS_LINE
      : ParserMode.PARSING_REQUEST_LINE;
    this.state.messageKind = this.kind === MessageKind.BOTH ? null : this.kind;
    this.lineBytes = 0;
    this.step = this.kind === MessageKind.RESPONSE ? Step.VERSION_LITERAL : Step.REQ_METHOD;
    this.notify(() => this.handler.onMessageBegin?.());
  }

  private beginHeaderBlock(): void {
    this.state.mode = this.isTrailing() ? ParserMode.PARSING_TRAILERS : ParserMode.PARSING_HEADER_NAME;
    this.step = Step.HEADER_LINE_START;
    this.lineBytes = 0;
    this.headerBytes = 0;
    this.headerCount = 0;
  }

  private applyFramingHeader(): void {
    const { state } = this;

    switch (this.headerKind) {
      case FramingHeader.CONTENT_LENGTH: {
        const length = parseContentLength(this.headerValue);
        if (state.flags & ParserFlags.CONTENT_LENGTH) {
          if (!this.options.allowDuplicateContentLength || length !== state.contentLength) {
            fail(HttpParserErrorCode.CONFLICTING_FRAMING, 'Duplicate Content-Length header');
          }
        }
        state.flags |= ParserFlags.CONTENT_LENGTH;
        state.contentLength = length;
        break;
      }
      case FramingHeader.TRANSFER_ENCODING:
        state.flags |= ParserFlags.TRANSFER_ENCODING;
        this.transferCodings.push(...parseTransferCodings(this.headerValue));
        break;
      case FramingHeader.CONNECTION:
        state.flags |= parseConnectionTokens(this.headerValue);
        break;
      case FramingHeader.UPGRADE:
        state.flags |= ParserFlags.UPGRADE_HEADER;
        break;
      case FramingHeader.GENERAL:
        break;
    }
  }

  /** Returns true when the message ended with the header block. */
  private completeHeaders(): boolean {
    const { state } = this;
    const request = this.isRequest();

    if (state.flags & ParserFlags.TRANSFER_ENCODING) {
      if (state.flags & ParserFlags.CONTENT_LENGTH) {
        fail(HttpParserErrorCode.CONFLICTING_FRAMING, 'Both Transfer-Encoding and Content-Length are present');
      }
      if (isChunkedCodingList(this.transferCodings)) {
        state.flags |= ParserFlags.CHUNKED;
      } else if (request) {
        fail(HttpParserErrorCode.INVALID_TRANSFER_ENCODING, 'Request Transfer-Encoding must end with "chunked"');
      }
    }

    let upgradeNow = false;
    if (request) {
      const connect = state.method === 'CONNECT';
      const upgradeRequested = (state.flags & ParserFlags.CONNECTION_UPGRADE) !== 0
        && (state.flags & ParserFlags.UPGRADE_HEADER) !== 0;
      if (connect || upgradeRequested) {
        state.flags |= ParserFlags.UPGRADE;
      }
      upgradeNow = connect;
    } else if (state.statusCode === 101) {
      state.flags |= ParserFlags.UPGRADE;
      upgradeNow = true;
    }

    state.mode = ParserMode.HEADERS_COMPLETE;
    const directive = this.notify(() => this.handler.onHeadersComplete?.());

    if (directive === HeadersDirective.UPGRADE) {
      state.flags |= ParserFlags.UPGRADE;
      upgradeNow = true;
    } else if (directive === HeadersDirective.SKIP_BODY) {
      state.flags |= ParserFlags.SKIP_BODY;
    }

    if (upgradeNow || (state.flags & ParserFlags.SKIP_BODY) || (!request && statusHasNoBody(state.statusCode))) {
      this.completeMessage();
      return true;
    }

    if (state.flags & ParserFlags.CHUNKED) {
      state.mode = ParserMode.PARSING_BODY_CHUNKED;
      state.chunkState = ChunkPhase.CHUNK_SIZE;
      this.step = Step.CHUNK_SIZE_START;
      return false;
    }

    if (state.contentLength !== null) {
      if (state.contentLength === 0) {
        this.completeMessage();
        return true;
      }
      state.mode = ParserMode.PARSING_BODY_FIXED_LENGTH;
      this.bodyBytesLeft = state.contentLength;
      this.step = Step.BODY_FIXED;
      return false;
    }

    if (request) {
      this.completeMessage();
      return true;
    }

    state.mode = ParserMode.PARSING_BODY_UNTIL_CLOSE;
    this.step = Step.BODY_UNTIL_CLOSE;
    return false;
  }

  private completeMessage(): void {
    this.state.mode = ParserMode.MESSAGE_COMPLETE;
    if (this.state.chunkState !== null) {
      this.state.chunkState = ChunkPhase.CHUNK_COMPLETE;
    }
    this.step = Step.DONE;
    this.notify(() => this.handler.onMessageComplete?.());
  }

  private countLineByte(limit: number, what: string): void {
    if (++this.lineBytes > limit) {
      fail(HttpParserErrorCode.LINE_TOO_LONG, `${what} exceeds limit of ${limit} bytes`);
    }
  }

  private countHeaderByte(): void {
    const { maxHeaderLineBytes, maxHeaderBytes } = this.options;
    this.countLineByte(maxHeaderLineBytes, 'Header line');
    if (++this.headerBytes > maxHeaderBytes) {
      fail(HttpParserErrorCode.HEADERS_TOO_LARGE, `Headers exceed limit of ${maxHeaderBytes} bytes`);
    }
  }

  private execute(buffer: Buffer): number {
    const { state, options } = this;
    const length = buffer.length;
    let mark = this.openSpan === null ? -1 : 0;

    for (let i = 0; i < length; i++) {
      this.cursor = i;
      const byte = buffer[i];
      const step = this.step;

      if (step >= Step.REQ_METHOD && step <= Step.START_LINE_LF) {
        this.countLineByte(options.maxStartLineBytes, 'Start line');
      } else if (step >= Step.HEADER_LINE_START && step <= Step.HEADERS_END_LF) {
        this.countHeaderByte();
      }

      switch (step) {
        case Step.START:
          if (byte === CR) {
            this.step = Step.START_LF;
            break;
          }
          if (byte === LF) {
            fail(HttpParserErrorCode.INVALID_TOKEN, 'LF without preceding CR');
          }
          this.beginMessage();
          i--;
          break;

        case Step.START_LF:
          if (byte !== LF) {
            fail(HttpParserErrorCode.INVALID_TOKEN, 'CR not followed by LF');
          }
          this.step = Step.START;
          break;

        case Step.REQ_METHOD:
          if (byte === SP) {
            const method = toHttpMethod(this.methodText);
            if (!method) {
              fail(HttpParserErrorCode.INVALID_METHOD, `Unknown method: "${this.methodText}"`);
            }
            state.method = method;
            state.messageKind = MessageKind.REQUEST;
            state.mode = ParserMode.PARSING_REQUEST_LINE;
            this.step = Step.REQ_URL_START;
            break;
          }
          if (byte === SLASH && state.messageKind === null && this.methodText === RESPONSE_PROBE) {
            state.messageKind = MessageKind.RESPONSE;
            state.mode = ParserMode.PARSING_STATUS_LINE;
            this.step = Step.VERSION_MAJOR;
            break;
          }
          if (!isToken(byte)) {
            fail(HttpParserErrorCode.INVALID_METHOD, 'Invalid character in method');
          }
          if (this.methodText.length >= options.maxMethodBytes) {
            fail(HttpParserErrorCode.INVALID_METHOD, `Method exceeds limit of ${options.maxMethodBytes} bytes`);
          }
          this.methodText += String.fromCharCode(byte);
          break;

        case Step.REQ_URL_START:
          if (byte === SP) {
            fail(HttpParserErrorCode.EMPTY_URL, 'Empty request target');
          }
          if (URL_CHAR[byte] !== 1) {
            fail(HttpParserErrorCode.INVALID_TOKEN, 'Invalid character in request target');
          }
          mark = i;
          this.openSpan = SpanKind.URL;
          this.step = Step.REQ_URL;
          break;

        case Step.REQ_URL:
          if (byte === SP) {
            this.emit(SpanKind.URL, buffer.subarray(mark, i));
            this.openSpan = null;
            this.literalIndex = 0;
            this.step = Step.VERSION_LITERAL;
            break;
          }
          if (byte === CR) {
            fail(HttpParserErrorCode.INVALID_VERSION, 'Missing HTTP version in request line');
          }
          if (URL_CHAR[byte] !== 1) {
            fail(HttpParserErrorCode.INVALID_TOKEN, 'Invalid character in request target');
          }
          break;

        case Step.VERSION_LITERAL:
          if (byte !== HTTP_PREFIX[this.literalIndex]) {
            fail(HttpParserErrorCode.INVALID_VERSION, 'Expected "HTTP/"');
          }
          if (++this.literalIndex === HTTP_PREFIX.length) {
            this.step = Step.VERSION_MAJOR;
          }
          break;

        case Step.VERSION_MAJOR:
          if (!isDigit(byte)) {
            fail(HttpParserErrorCode.INVALID_VERSION, 'Invalid major version');
          }
          state.httpMajor = byte - 0x30;
          this.step = Step.VERSION_DOT;
          break;

        case Step.VERSION_DOT:
          if (byte !== DOT) {
            fail(HttpParserErrorCode.INVALID_VERSION, 'Invalid HTTP version');
          }
          this.step = Step.VERSION_MINOR;
          break;

        case Step.VERSION_MINOR:
          if (!isDigit(byte)) {
            fail(HttpParserErrorCode.INVALID_VERSION, 'Invalid minor version');
          }
          state.httpMinor = byte - 0x30;
          this.step = this.isRequest() ? Step.REQ_LINE_CR : Step.RES_STATUS_SP;
          break;

        case Step.REQ_LINE_CR:
          if (byte !== CR) {
            fail(HttpParserErrorCode.INVALID_VERSION, 'Expected CRLF after HTTP version');
          }
          this.step = Step.START_LINE_LF;
          break;

        case Step.RES_STATUS_SP:
          if (byte !== SP) {
            fail(HttpParserErrorCode.INVALID_VERSION, 'Expected space after HTTP version');
          }
          this.statusDigits = 0;
          this.step = Step.RES_STATUS_CODE;
          break;

        case Step.RES_STATUS_CODE:
          if (!isDigit(byte)) {
            fail(HttpParserErrorCode.INVALID_STATUS, 'Invalid status code');
          }
          state.statusCode = state.statusCode * 10 + (byte - 0x30);
          if (++this.statusDigits === STATUS_CODE_DIGITS) {
            this.step = Step.RES_STATUS_END;
          }
          break;

        case Step.RES_STATUS_END:
          if (byte === SP) {
            mark = i + 1;
            this.openSpan = SpanKind.STATUS;
            this.step = Step.RES_REASON;
            break;
          }
          if (byte === CR) {
            this.step = Step.START_LINE_LF;
            break;
          }
          fail(HttpParserErrorCode.INVALID_STATUS, 'Status code must be three digits');

        case Step.RES_REASON:
          if (byte === CR) {
            this.emit(SpanKind.STATUS, buffer.subarray(mark, i));
            this.openSpan = null;
            this.step = Step.START_LINE_LF;
            break;
          }
          if (HEADER_VALUE[byte] !== 1) {
            fail(HttpParserErrorCode.INVALID_TOKEN, 'Invalid character in reason phrase');
          }
          break;

        case Step.START_LINE_LF:
          if (byte !== LF) {
            fail(HttpParserErrorCode.INVALID_TOKEN, 'CR not followed by LF');
          }
          this.beginHeaderBlock();
          break;

        case Step.HEADER_LINE_START:
          if (byte === CR) {
            this.step = Step.HEADERS_END_LF;
            break;
          }
          if (byte === SP || byte === HTAB) {
            fail(HttpParserErrorCode.INVALID_TOKEN, 'Obsolete line folding is not supported');
          }
          if (!isToken(byte)) {
            fail(HttpParserErrorCode.INVALID_TOKEN, 'Invalid character in header name');
          }
          if (++this.headerCount > options.maxHeaderCount) {
            fail(HttpParserErrorCode.HEADERS_TOO_LARGE, `Header count exceeds limit of ${options.maxHeaderCount}`);
          }
          this.resetHeader();
          state.mode = this.isTrailing() ? ParserMode.PARSING_TRAILERS : ParserMode.PARSING_HEADER_NAME;
          mark = i;
          this.openSpan = SpanKind.HEADER_FIELD;
          this.step = Step.HEADER_FIELD;
          break;

        case Step.HEADER_FIELD:
          if (byte === COLON) {
            this.emit(SpanKind.HEADER_FIELD, buffer.subarray(mark, i));
            this.openSpan = null;
            if (!this.isTrailing() && this.headerName !== null) {
              this.headerKind = classifyHeaderName(this.headerName);
            }
            state.mode = this.isTrailing() ? ParserMode.PARSING_TRAILERS : ParserMode.PARSING_HEADER_VALUE;
            this.step = Step.HEADER_VALUE_OWS;
            break;
          }
          if (!isToken(byte)) {
            fail(HttpParserErrorCode.INVALID_TOKEN, 'Invalid character in header name');
          }
          break;

        case Step.HEADER_VALUE_OWS:
          if (byte === SP || byte === HTAB) {
            break;
          }
          if (byte === CR) {
            this.emit(SpanKind.HEADER_VALUE, buffer.subarray(i, i));
            this.step = Step.HEADER_LINE_LF;
            break;
          }
          if (HEADER_VALUE[byte] !== 1) {
            fail(HttpParserErrorCode.INVALID_TOKEN, 'Invalid character in header value');
          }
          mark = i;
          this.openSpan = SpanKind.HEADER_VALUE;
          this.step = Step.HEADER_VALUE;
          break;

        case Step.HEADER_VALUE:
          if (byte === CR) {
            this.emit(SpanKind.HEADER_VALUE, buffer.subarray(mark, i));
            this.openSpan = null;
            this.step = Step.HEADER_LINE_LF;
            break;
          }
          if (HEADER_VALUE[byte] !== 1) {
            fail(HttpParserErrorCode.INVALID_TOKEN, 'Invalid character in header value');
          }
          break;

        case Step.HEADER_LINE_LF:
          if (byte !== LF) {
            fail(HttpParserErrorCode.INVALID_TOKEN, 'CR not followed by LF');
          }
          this.applyFramingHeader();
          this.resetHeader();
          this.lineBytes = 0;
          this.step = Step.HEADER_LINE_START;
          break;

        case Step.HEADERS_END_LF:
          if (byte !== LF) {
            fail(HttpParserErrorCode.INVALID_TOKEN, 'CR not followed by LF');
          }
          if (this.isTrailing()) {
            this.notify(() => this.handler.onChunkComplete?.());
            this.completeMessage();
            return i + 1;
          }
          if (this.completeHeaders()) {
            return i + 1;
          }
          break;

        case Step.BODY_FIXED: {
          const available = Math.min(this.bodyBytesLeft, length - i);
          this.bodyBytesLeft -= available;
          this.emitBody(buffer.subarray(i, i + available));
          i += available - 1;
          if (this.bodyBytesLeft === 0) {
            this.completeMessage();
            return i + 1;
          }
          break;
        }

        case Step.BODY_UNTIL_CLOSE:
          this.emitBody(buffer.subarray(i));
          i = length;
          break;

        case Step.CHUNK_SIZE_START: {
          const value = hexValue(byte);
          if (value === -1) {
            fail(HttpParserErrorCode.INVALID_CHUNK_SIZE, 'Invalid character in chunk size');
          }
          state.remainingChunkBytes = value;
          this.chunkSizeDigits = 1;
          this.chunkExtensionBytes = 0;
          state.chunkState = ChunkPhase.CHUNK_SIZE;
          this.step = Step.CHUNK_SIZE;
          break;
        }

        case Step.CHUNK_SIZE: {
          if (byte === CR) {
            this.step = Step.CHUNK_SIZE_LF;
            break;
          }
          if (byte === SEMICOLON) {
            state.chunkState = ChunkPhase.CHUNK_EXTENSION;
            this.step = Step.CHUNK_EXTENSION;
            break;
          }
          if (byte === SP || byte === HTAB) {
            this.step = Step.CHUNK_SIZE_BWS;
            break;
          }
          const value = hexValue(byte);
          if (value === -1) {
            fail(HttpParserErrorCode.INVALID_CHUNK_SIZE, 'Invalid character in chunk size');
          }
          if (++this.chunkSizeDigits > options.maxChunkSizeHexDigits) {
            fail(
              HttpParserErrorCode.INVALID_CHUNK_SIZE,
              `Chunk size exceeds limit of ${options.maxChunkSizeHexDigits} hex digits`,
            );
          }
          const size = state.remainingChunkBytes * 16 + value;
          if (!Number.isSafeInteger(size)) {
            fail(HttpParserErrorCode.INVALID_CHUNK_SIZE, 'Chunk size overflow');
          }
          state.remainingChunkBytes = size;
          break;
        }

        case Step.CHUNK_SIZE_BWS:
          if (byte === SP || byte === HTAB) {
            break;
          }
          if (byte === SEMICOLON) {
            state.chunkState = ChunkPhase.CHUNK_EXTENSION;
            this.step = Step.CHUNK_EXTENSION;
            break;
          }
          if (byte === CR) {
            this.step = Step.CHUNK_SIZE_LF;
            break;
          }
          fail(HttpParserErrorCode.INVALID_CHUNK_SIZE, 'Invalid character after chunk size');

        case Step.CHUNK_EXTENSION:
          if (byte === CR) {
            this.step = Step.CHUNK_SIZE_LF;
            break;
          }
          if (HEADER_VALUE[byte] !== 1) {
            fail(HttpParserErrorCode.INVALID_TOKEN, 'Invalid character in chunk extension');
          }
          if (++this.chunkExtensionBytes > options.maxChunkExtensionBytes) {
            fail(
              HttpParserErrorCode.LINE_TOO_LONG,
              `Chunk extension exceeds limit of ${options.maxChunkExtensionBytes} bytes`,
            );
          }
          break;

        case Step.CHUNK_SIZE_LF: {
          if (byte !== LF) {
            fail(HttpParserErrorCode.INVALID_CHUNK_SIZE, 'Chunk size line must end with CRLF');
          }
          const size = state.remainingChunkBytes;
          this.notify(() => this.handler.onChunkHeader?.(size));
          if (size === 0) {
            state.flags |= ParserFlags.TRAILING;
            state.chunkState = ChunkPhase.TRAILER_HEADERS;
            this.beginHeaderBlock();
            break;
          }
          state.chunkState = ChunkPhase.CHUNK_DATA;
          this.step = Step.CHUNK_DATA;
          break;
        }

        case Step.CHUNK_DATA: {
          const available = Math.min(state.remainingChunkBytes, length - i);
          state.remainingChunkBytes -= available;
          this.emitBody(buffer.subarray(i, i + available));
          i += available - 1;
          if (state.remainingChunkBytes === 0) {
            state.chunkState = ChunkPhase.CHUNK_DATA_CRLF;
            this.step = Step.CHUNK_DATA_CR;
          }
          break;
        }

        case Step.CHUNK_DATA_CR:
          if (byte !== CR) {
            fail(HttpParserErrorCode.INVALID_CHUNK_DATA, 'Missing CRLF after chunk data');
          }
          this.step = Step.CHUNK_DATA_LF;
          break;

        case Step.CHUNK_DATA_LF:
          if (byte !== LF) {
            fail(HttpParserErrorCode.INVALID_CHUNK_DATA, 'Missing CRLF after chunk data');
          }
          this.notify(() => this.handler.onChunkComplete?.());
          state.chunkState = ChunkPhase.CHUNK_SIZE;
          this.step = Step.CHUNK_SIZE_START;
          break;
      }
    }

    if (this.openSpan !== null && mark < length) {
      this.emit(this.openSpan, buffer.subarray(mark));
    }

    return length;
  }
}
