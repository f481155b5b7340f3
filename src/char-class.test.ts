import * as assert from 'node:assert';
import { describe, it } from 'node:test';

import {
  HEADER_VALUE,
  hexValue,
  HOST,
  isAlpha,
  isDigit,
  isToken,
  SCHEMA,
  toLowerByte,
  URL_CHAR,
  USERINFO,
} from './char-class.js';

const code = (char: string) => char.charCodeAt(0);

describe('char-class tables', () => {
  it('should have one entry per byte', () => {
    for (const table of [HEADER_VALUE, URL_CHAR, SCHEMA, USERINFO, HOST]) {
      assert.strictEqual(table.length, 256);
    }
  });

  it('should accept tchar in tokens', () => {
    for (const char of 'Az09!#$%&\'*+-.^_`|~') {
      assert.ok(isToken(code(char)), char);
    }
  });

  it('should reject separators in tokens', () => {
    for (const char of ' \t"(),/:;<=>?@[\\]{}') {
      assert.strictEqual(isToken(code(char)), false, JSON.stringify(char));
    }
    assert.strictEqual(isToken(0x7f), false);
    assert.strictEqual(isToken(0x80), false);
  });

  it('should accept HTAB, SP, VCHAR and obs-text in header values', () => {
    assert.strictEqual(HEADER_VALUE[0x09], 1);
    assert.strictEqual(HEADER_VALUE[0x20], 1);
    assert.strictEqual(HEADER_VALUE[code('~')], 1);
    assert.strictEqual(HEADER_VALUE[0xe9], 1);
    assert.strictEqual(HEADER_VALUE[0x0d], 0);
    assert.strictEqual(HEADER_VALUE[0x0a], 0);
    assert.strictEqual(HEADER_VALUE[0x00], 0);
    assert.strictEqual(HEADER_VALUE[0x7f], 0);
  });

  it('should only accept visible ASCII in URLs', () => {
    assert.strictEqual(URL_CHAR[code('/')], 1);
    assert.strictEqual(URL_CHAR[code('%')], 1);
    assert.strictEqual(URL_CHAR[0x20], 0);
    assert.strictEqual(URL_CHAR[0x7f], 0);
    assert.strictEqual(URL_CHAR[0xc3], 0);
  });

  it('should separate host and userinfo characters by the colon', () => {
    assert.strictEqual(USERINFO[code(':')], 1);
    assert.strictEqual(HOST[code(':')], 0);
    assert.strictEqual(HOST[code('@')], 0);
    assert.strictEqual(USERINFO[code('@')], 0);
  });

  it('should accept schema characters', () => {
    for (const char of 'a+-.Z9') {
      assert.strictEqual(SCHEMA[code(char)], 1, char);
    }
    assert.strictEqual(SCHEMA[code('_')], 0);
  });
});

describe('char-class predicates', () => {
  it('should classify digits and letters', () => {
    assert.ok(isDigit(code('0')));
    assert.ok(isDigit(code('9')));
    assert.strictEqual(isDigit(code('a')), false);
    assert.ok(isAlpha(code('a')));
    assert.ok(isAlpha(code('Z')));
    assert.strictEqual(isAlpha(code('@')), false);
    assert.strictEqual(isAlpha(code('[')), false);
  });

  it('should decode hex digits', () => {
    assert.strictEqual(hexValue(code('0')), 0);
    assert.strictEqual(hexValue(code('9')), 9);
    assert.strictEqual(hexValue(code('a')), 10);
    assert.strictEqual(hexValue(code('F')), 15);
    assert.strictEqual(hexValue(code('g')), -1);
    assert.strictEqual(hexValue(code(';')), -1);
  });

  it('should lower-case ASCII letters only', () => {
    assert.strictEqual(toLowerByte(code('A')), code('a'));
    assert.strictEqual(toLowerByte(code('z')), code('z'));
    assert.strictEqual(toLowerByte(code('[')), code('['));
  });
});
