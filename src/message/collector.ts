import { Buffer } from 'node:buffer';

import { HttpParser } from '../decode/parser.js';
import type { HttpParserError } from '../errors.js';
import { HeadersDirective, MessageKind, ParserMode } from '../specs.js';
import type {
  HttpMethod,
  HttpParserHandler,
  HttpParserOptions,
  ResolvedMessageKind,
} from '../types.js';
import { parseUrl } from '../url/parse-url.js';
import type { UrlFields } from '../url/url-fields.js';

export type HeaderPair = [name: string, value: string];

export interface HttpMessage {
  kind: ResolvedMessageKind;
  method: HttpMethod | null;
  url: string;
  urlFields: UrlFields | null;
  statusCode: number;
  reason: string;
  version: { major: number; minor: number };
  headers: HeaderPair[];
  trailers: HeaderPair[];
  body: Buffer;
  upgrade: boolean;
  keepAlive: boolean;
}

export interface MessageCollectorOptions extends HttpParserOptions {
  /** Responses answer a HEAD request: their headers announce a body that never follows. */
  skipResponseBody?: boolean;
}

export interface CollectResult {
  messages: HttpMessage[];
  error: HttpParserError | null;
  /** Bytes that followed an upgraded message, empty otherwise. */
  upgradeHead: Buffer;
}

function joinLatin1(parts: Buffer[]): string {
  return Buffer.concat(parts).toString('latin1');
}

/**
 * Handler that joins the spans of each message into an `HttpMessage`.
 * Completed messages accumulate in `messages`.
 */
export class MessageCollector implements HttpParserHandler {
  readonly parser: HttpParser;
  readonly messages: HttpMessage[] = [];

  private readonly skipResponseBody: boolean;

  private urlParts: Buffer[] = [];
  private statusParts: Buffer[] = [];
  private fieldParts: Buffer[] = [];
  private valueParts: Buffer[] | null = null;
  private bodyParts: Buffer[] = [];
  private headers: HeaderPair[] = [];
  private trailers: HeaderPair[] = [];
  private inTrailers = false;
  private urlFields: UrlFields | null = null;

  constructor(kind: MessageKind, options: MessageCollectorOptions = {}) {
    const { skipResponseBody = false, ...parserOptions } = options;
    this.skipResponseBody = skipResponseBody;
    this.parser = new HttpParser(kind, this, parserOptions);
  }

  onMessageBegin(): void {
    this.urlParts = [];
    this.statusParts = [];
    this.fieldParts = [];
    this.valueParts = null;
    this.bodyParts = [];
    this.headers = [];
    this.trailers = [];
    this.inTrailers = false;
    this.urlFields = null;
  }

  // spans are copied: they are only valid while the callback runs
  onUrl(span: Buffer): void {
    this.urlParts.push(Buffer.from(span));
  }

  onStatus(span: Buffer): void {
    this.statusParts.push(Buffer.from(span));
  }

  onHeaderField(span: Buffer): void {
    if (this.valueParts !== null) {
      this.flushHeader();
    }
    this.fieldParts.push(Buffer.from(span));
  }

  onHeaderValue(span: Buffer): void {
    this.valueParts ??= [];
    this.valueParts.push(Buffer.from(span));
  }

  onHeadersComplete(): HeadersDirective {
    this.flushHeader();

    if (this.urlParts.length > 0) {
      const url = Buffer.concat(this.urlParts);
      const result = parseUrl(url, this.parser.methodName() === 'CONNECT');
      if (!result.ok) {
        throw result.error;
      }
      this.urlFields = result.fields;
    }

    if (this.skipResponseBody && this.parser.getState().messageKind === MessageKind.RESPONSE) {
      return HeadersDirective.SKIP_BODY;
    }
    return HeadersDirective.CONTINUE;
  }

  onBody(span: Buffer): void {
    this.bodyParts.push(Buffer.from(span));
  }

  onChunkHeader(size: number): void {
    if (size === 0) {
      this.inTrailers = true;
    }
  }

  onMessageComplete(): void {
    this.flushHeader();

    const { parser } = this;
    const state = parser.getState();

    this.messages.push({
      kind: state.messageKind ?? MessageKind.REQUEST,
      method: state.method,
      url: joinLatin1(this.urlParts),
      urlFields: this.urlFields,
      statusCode: state.statusCode,
      reason: joinLatin1(this.statusParts),
      version: parser.httpVersion(),
      headers: this.headers,
      trailers: this.trailers,
      body: Buffer.concat(this.bodyParts),
      upgrade: parser.isUpgrade(),
      keepAlive: parser.shouldKeepAlive(),
    });
  }

  private flushHeader(): void {
    if (this.valueParts === null) {
      return;
    }
    const pair: HeaderPair = [joinLatin1(this.fieldParts), joinLatin1(this.valueParts)];
    (this.inTrailers ? this.trailers : this.headers).push(pair);
    this.fieldParts = [];
    this.valueParts = null;
  }
}

/**
 * Runs every chunk through one parser, resetting it between pipelined
 * messages, and signals end of input after the last chunk. Parsing stops at
 * the first error or at an upgrade.
 */
export function collectMessages(
  kind: MessageKind,
  chunks: Iterable<Buffer | Uint8Array>,
  options?: MessageCollectorOptions,
): CollectResult {
  const collector = new MessageCollector(kind, options);
  const { parser } = collector;
  const queue = Array.from(chunks, (chunk) => Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength));

  for (let index = 0; index < queue.length; index++) {
    let data = queue[index];

    while (data.length > 0) {
      const { bytesConsumed, outcome } = parser.consume(data);

      if (outcome.type === 'error') {
        return { messages: collector.messages, error: outcome.error, upgradeHead: Buffer.alloc(0) };
      }

      data = data.subarray(bytesConsumed);

      if (parser.getState().mode === ParserMode.MESSAGE_COMPLETE) {
        if (parser.isUpgrade()) {
          return {
            messages: collector.messages,
            error: null,
            upgradeHead: Buffer.concat([data, ...queue.slice(index + 1)]),
          };
        }
        parser.reset();
      }
    }
  }

  const { outcome } = parser.finish();
  return {
    messages: collector.messages,
    error: outcome.type === 'error' ? outcome.error : null,
    upgradeHead: Buffer.alloc(0),
  };
}
