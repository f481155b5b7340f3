import * as assert from 'node:assert';
import { Buffer } from 'node:buffer';
import { describe, it, test } from 'node:test';

import { HttpParserErrorCode } from '../errors.js';
import {
  ChunkPhase, MessageKind, ParserFlags, ParserMode,
} from '../specs.js';
import type { HttpParserHandler } from '../types.js';
import { HttpParser } from './parser.js';

const CHUNKED_HEAD = 'POST /upload HTTP/1.1\r\nTransfer-Encoding: chunked\r\n\r\n';

function createRecorder() {
  const events: string[] = [];
  const handler: HttpParserHandler = {
    onHeaderField: (span) => { events.push(`field:${span.toString('latin1')}`); },
    onHeaderValue: (span) => { events.push(`value:${span.toString('latin1')}`); },
    onHeadersComplete: () => { events.push('headers'); },
    onBody: (span) => { events.push(`body:${span.toString('latin1')}`); },
    onChunkHeader: (size) => { events.push(`chunk:${size}`); },
    onChunkComplete: () => { events.push('chunk-complete'); },
    onMessageComplete: () => { events.push('complete'); },
  };
  return { events, handler };
}

function parseChunked(body: string) {
  const { events, handler } = createRecorder();
  const parser = new HttpParser(MessageKind.REQUEST, handler);
  const input = Buffer.from(CHUNKED_HEAD + body, 'latin1');
  const result = parser.consume(input);
  const headersAt = events.indexOf('headers');
  return {
    parser, input, result, events: events.slice(headersAt + 1),
  };
}

describe('HttpParser - chunked body', () => {
  test('should decode a single chunk', () => {
    const { parser, input, result, events } = parseChunked('4\r\nWiki\r\n0\r\n\r\n');

    assert.deepStrictEqual(result, { bytesConsumed: input.length, outcome: { type: 'ok' } });
    assert.deepStrictEqual(events, [
      'chunk:4',
      'body:Wiki',
      'chunk-complete',
      'chunk:0',
      'chunk-complete',
      'complete',
    ]);

    const state = parser.getState();
    assert.strictEqual(state.mode, ParserMode.MESSAGE_COMPLETE);
    assert.strictEqual(state.chunkState, ChunkPhase.CHUNK_COMPLETE);
    assert.strictEqual(state.flags & ParserFlags.CHUNKED, ParserFlags.CHUNKED);
    assert.strictEqual(state.contentLength, null);
  });

  test('should decode several chunks', () => {
    const { events } = parseChunked('4\r\nWiki\r\n5\r\npedia\r\n0\r\n\r\n');

    assert.deepStrictEqual(events.filter((event) => event.startsWith('body:')), ['body:Wiki', 'body:pedia']);
    assert.deepStrictEqual(events.filter((event) => event.startsWith('chunk:')), ['chunk:4', 'chunk:5', 'chunk:0']);
  });

  test('should accept upper- and lower-case hex sizes', () => {
    const { events } = parseChunked('A\r\n0123456789\r\nb\r\nabcdefghijk\r\n0\r\n\r\n');

    assert.deepStrictEqual(events.filter((event) => event.startsWith('chunk:')), ['chunk:10', 'chunk:11', 'chunk:0']);
  });

  test('should skip chunk extensions and whitespace before them', () => {
    const { result, events } = parseChunked('4;name=value\r\nWiki\r\n3 ; x="y"\r\nabc\r\n0;last\r\n\r\n');

    assert.strictEqual(result.outcome.type, 'ok');
    assert.deepStrictEqual(events.filter((event) => event.startsWith('body:')), ['body:Wiki', 'body:abc']);
  });

  test('should accept a body that is only the last chunk', () => {
    const { events } = parseChunked('0\r\n\r\n');

    assert.deepStrictEqual(events, ['chunk:0', 'chunk-complete', 'complete']);
  });

  test('should deliver binary chunk data untouched', () => {
    const { events } = parseChunked('3\r\n\r\n\x00\r\n0\r\n\r\n');

    assert.strictEqual(events[1], 'body:\r\n\x00');
  });

  test('should decode a chunked response', () => {
    const { events, handler } = createRecorder();
    const parser = new HttpParser(MessageKind.RESPONSE, handler);
    const input = Buffer.from('HTTP/1.1 200 OK\r\nTransfer-Encoding: gzip, chunked\r\n\r\n2\r\nhi\r\n0\r\n\r\n');

    const result = parser.consume(input);

    assert.strictEqual(result.bytesConsumed, input.length);
    assert.strictEqual(events.at(-1), 'complete');
    assert.strictEqual(parser.shouldKeepAlive(), true);
  });
});

describe('HttpParser - trailers', () => {
  it('should deliver trailers as header events after the last chunk', () => {
    const { parser, events } = parseChunked('4\r\nWiki\r\n0\r\nX-Checksum: abc\r\nX-Empty:\r\n\r\n');

    assert.deepStrictEqual(events.slice(3), [
      'chunk:0',
      'field:X-Checksum',
      'value:abc',
      'field:X-Empty',
      'value:',
      'chunk-complete',
      'complete',
    ]);
    assert.strictEqual(parser.getState().flags & ParserFlags.TRAILING, ParserFlags.TRAILING);
  });

  it('should not interpret framing headers in trailers', () => {
    const { result, parser } = parseChunked('0\r\nContent-Length: 99\r\nTransfer-Encoding: gzip\r\n\r\n');

    assert.strictEqual(result.outcome.type, 'ok');
    assert.strictEqual(parser.getState().contentLength, null);
    assert.strictEqual(parser.getState().flags & ParserFlags.CONTENT_LENGTH, 0);
  });

  it('should be in the trailer mode while reading trailers', () => {
    const { parser } = parseChunked('0\r\nX-A: 1');

    assert.strictEqual(parser.getState().mode, ParserMode.PARSING_TRAILERS);
    assert.strictEqual(parser.getState().chunkState, ChunkPhase.TRAILER_HEADERS);
  });
});

describe('HttpParser - chunk state', () => {
  it('should expose the remaining bytes of the current chunk', () => {
    const { parser } = parseChunked('a\r\n123');

    const state = parser.getState();
    assert.strictEqual(state.mode, ParserMode.PARSING_BODY_CHUNKED);
    assert.strictEqual(state.chunkState, ChunkPhase.CHUNK_DATA);
    assert.strictEqual(state.remainingChunkBytes, 7);
  });
});

describe('HttpParser - chunked errors', () => {
  const errorOf = (body: string, options?: { maxChunkSizeHexDigits?: number; maxChunkExtensionBytes?: number }) => {
    const parser = new HttpParser(MessageKind.REQUEST, {}, options);
    const input = Buffer.from(CHUNKED_HEAD + body);
    const result = parser.consume(input);
    assert.strictEqual(result.outcome.type, 'error');
    return { error: parser.error, offset: result.bytesConsumed - CHUNKED_HEAD.length };
  };

  it('should reject a non-hex chunk size', () => {
    const { error, offset } = errorOf('zz\r\n');

    assert.strictEqual(error?.code, HttpParserErrorCode.INVALID_CHUNK_SIZE);
    assert.strictEqual(offset, 0);
  });

  it('should reject an empty chunk size', () => {
    assert.strictEqual(errorOf('\r\n').error?.code, HttpParserErrorCode.INVALID_CHUNK_SIZE);
  });

  it('should reject too many hex digits', () => {
    const { error, offset } = errorOf('123456789\r\n');

    assert.strictEqual(error?.code, HttpParserErrorCode.INVALID_CHUNK_SIZE);
    assert.strictEqual(error?.message, 'Chunk size exceeds limit of 8 hex digits');
    assert.strictEqual(offset, 8);
  });

  it('should honour a custom hex digit limit', () => {
    assert.strictEqual(errorOf('100\r\n', { maxChunkSizeHexDigits: 2 }).error?.code, HttpParserErrorCode.INVALID_CHUNK_SIZE);
  });

  it('should reject chunk data without its CRLF', () => {
    const { error, offset } = errorOf('4\r\nWikiX\r\n');

    assert.strictEqual(error?.code, HttpParserErrorCode.INVALID_CHUNK_DATA);
    assert.strictEqual(error?.message, 'Missing CRLF after chunk data');
    assert.strictEqual(offset, 7);
  });

  it('should reject a chunk size line ending in a bare CR', () => {
    assert.strictEqual(errorOf('4\rWiki').error?.code, HttpParserErrorCode.INVALID_CHUNK_SIZE);
  });

  it('should reject overlong chunk extensions', () => {
    const { error } = errorOf('1;abcdef\r\nx\r\n', { maxChunkExtensionBytes: 4 });

    assert.strictEqual(error?.code, HttpParserErrorCode.LINE_TOO_LONG);
  });

  it('should reject a chunked request whose coding list does not end in chunked', () => {
    const parser = new HttpParser(MessageKind.REQUEST);
    const result = parser.consume(Buffer.from('POST / HTTP/1.1\r\nTransfer-Encoding: chunked, gzip\r\n\r\n'));

    assert.strictEqual(result.outcome.type, 'error');
    assert.strictEqual(parser.error?.code, HttpParserErrorCode.INVALID_TRANSFER_ENCODING);
  });

  it('should reject a request with a non-chunked transfer coding', () => {
    const parser = new HttpParser(MessageKind.REQUEST);
    parser.consume(Buffer.from('POST / HTTP/1.1\r\nTransfer-Encoding: gzip\r\n\r\n'));

    assert.strictEqual(parser.error?.code, HttpParserErrorCode.INVALID_TRANSFER_ENCODING);
    assert.strictEqual(parser.error?.message, 'Request Transfer-Encoding must end with "chunked"');
  });
});
