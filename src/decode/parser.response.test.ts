import * as assert from 'node:assert';
import { Buffer } from 'node:buffer';
import { describe, it, test } from 'node:test';

import {
  HeadersDirective, MessageKind, ParserFlags, ParserMode,
} from '../specs.js';
import type { HttpParserHandler } from '../types.js';
import { HttpParser } from './parser.js';

function createRecorder(directive?: HeadersDirective) {
  const events: string[] = [];
  const handler: HttpParserHandler = {
    onMessageBegin: () => { events.push('begin'); },
    onStatus: (span) => { events.push(`status:${span.toString('latin1')}`); },
    onHeaderField: (span) => { events.push(`field:${span.toString('latin1')}`); },
    onHeaderValue: (span) => { events.push(`value:${span.toString('latin1')}`); },
    onHeadersComplete: () => {
      events.push('headers');
      return directive;
    },
    onBody: (span) => { events.push(`body:${span.toString('latin1')}`); },
    onMessageComplete: () => { events.push('complete'); },
  };
  return { events, handler };
}

describe('HttpParser - status line', () => {
  test('should parse status code and reason', () => {
    const { events, handler } = createRecorder();
    const parser = new HttpParser(MessageKind.RESPONSE, handler);
    const input = Buffer.from('HTTP/1.1 200 OK\r\nContent-Length: 2\r\n\r\nhi');

    const result = parser.consume(input);

    assert.strictEqual(result.bytesConsumed, input.length);
    assert.deepStrictEqual(events, [
      'begin',
      'status:OK',
      'field:Content-Length',
      'value:2',
      'headers',
      'body:hi',
      'complete',
    ]);
    assert.strictEqual(parser.statusCode(), 200);
    assert.strictEqual(parser.methodName(), '');
    assert.strictEqual(parser.getState().messageKind, MessageKind.RESPONSE);
  });

  test('should allow a reason phrase with spaces', () => {
    const { events, handler } = createRecorder();
    const parser = new HttpParser(MessageKind.RESPONSE, handler);

    parser.consume(Buffer.from('HTTP/1.0 500 Internal Server Error\r\nContent-Length: 0\r\n\r\n'));

    assert.strictEqual(events[1], 'status:Internal Server Error');
    assert.deepStrictEqual(parser.httpVersion(), { major: 1, minor: 0 });
  });

  test('should allow a missing reason phrase', () => {
    const { events, handler } = createRecorder();
    const parser = new HttpParser(MessageKind.RESPONSE, handler);

    parser.consume(Buffer.from('HTTP/1.1 404\r\nContent-Length: 0\r\n\r\n'));

    assert.strictEqual(parser.statusCode(), 404);
    assert.deepStrictEqual(events.slice(0, 2), ['begin', 'field:Content-Length']);
  });

  test('should not emit an empty reason after a trailing space', () => {
    const { events, handler } = createRecorder();
    const parser = new HttpParser(MessageKind.RESPONSE, handler);

    parser.consume(Buffer.from('HTTP/1.1 200 \r\nContent-Length: 0\r\n\r\n'));

    assert.strictEqual(events.some((event) => event.startsWith('status:')), false);
  });
});

describe('HttpParser - response body framing', () => {
  it('should complete bodiless status codes at the header block', () => {
    for (const status of ['100 Continue', '204 No Content', '304 Not Modified']) {
      const { events, handler } = createRecorder();
      const parser = new HttpParser(MessageKind.RESPONSE, handler);
      const input = Buffer.from(`HTTP/1.1 ${status}\r\nContent-Length: 10\r\n\r\n`);

      const result = parser.consume(input);

      assert.strictEqual(result.bytesConsumed, input.length, status);
      assert.strictEqual(events.at(-1), 'complete', status);
    }
  });

  it('should read until close without framing headers', () => {
    const { events, handler } = createRecorder();
    const parser = new HttpParser(MessageKind.RESPONSE, handler);

    parser.consume(Buffer.from('HTTP/1.1 200 OK\r\n\r\nabc'));
    parser.consume(Buffer.from('def'));

    assert.strictEqual(parser.getState().mode, ParserMode.PARSING_BODY_UNTIL_CLOSE);
    assert.strictEqual(parser.shouldKeepAlive(), false);
    assert.deepStrictEqual(events.slice(-2), ['body:abc', 'body:def']);

    const result = parser.finish();

    assert.deepStrictEqual(result, { bytesConsumed: 0, outcome: { type: 'ok' } });
    assert.strictEqual(events.at(-1), 'complete');
    assert.strictEqual(parser.getState().mode, ParserMode.MESSAGE_COMPLETE);
  });

  it('should read until close with a non-chunked transfer coding', () => {
    const { events, handler } = createRecorder();
    const parser = new HttpParser(MessageKind.RESPONSE, handler);

    const result = parser.consume(Buffer.from('HTTP/1.1 200 OK\r\nTransfer-Encoding: gzip\r\n\r\nraw'));

    assert.strictEqual(result.outcome.type, 'ok');
    assert.strictEqual(parser.getState().mode, ParserMode.PARSING_BODY_UNTIL_CLOSE);
    assert.strictEqual(events.at(-1), 'body:raw');
  });

  it('should skip the body when the handler asks for it', () => {
    const { events, handler } = createRecorder(HeadersDirective.SKIP_BODY);
    const parser = new HttpParser(MessageKind.RESPONSE, handler);
    const input = Buffer.from('HTTP/1.1 200 OK\r\nContent-Length: 10\r\n\r\n');

    const result = parser.consume(input);

    assert.strictEqual(result.bytesConsumed, input.length);
    assert.deepStrictEqual(events.slice(-2), ['headers', 'complete']);
    assert.strictEqual(parser.getState().flags & ParserFlags.SKIP_BODY, ParserFlags.SKIP_BODY);
    assert.strictEqual(parser.shouldKeepAlive(), true);
  });

  it('should ignore a CONTINUE directive', () => {
    const { events, handler } = createRecorder(HeadersDirective.CONTINUE);
    const parser = new HttpParser(MessageKind.RESPONSE, handler);

    parser.consume(Buffer.from('HTTP/1.1 200 OK\r\nContent-Length: 1\r\n\r\nz'));

    assert.deepStrictEqual(events.slice(-2), ['body:z', 'complete']);
  });
});

describe('HttpParser - MessageKind.BOTH', () => {
  it('should detect the kind of each message', () => {
    const { events, handler } = createRecorder();
    const parser = new HttpParser(MessageKind.BOTH, handler);

    parser.consume(Buffer.from('HTTP/1.1 304 Not Modified\r\n\r\n'));

    assert.strictEqual(parser.getState().messageKind, MessageKind.RESPONSE);
    assert.strictEqual(parser.statusCode(), 304);
    assert.strictEqual(events.at(-1), 'complete');

    parser.reset();
    parser.consume(Buffer.from('OPTIONS * HTTP/1.1\r\n\r\n'));

    assert.strictEqual(parser.getState().messageKind, MessageKind.REQUEST);
    assert.strictEqual(parser.methodName(), 'OPTIONS');
  });

  it('should leave the kind open until the first line is recognised', () => {
    const parser = new HttpParser(MessageKind.BOTH);

    parser.consume(Buffer.from('HTT'));

    assert.strictEqual(parser.getState().messageKind, null);
    assert.strictEqual(parser.kind, MessageKind.BOTH);
  });
});
