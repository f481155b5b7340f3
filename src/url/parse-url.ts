import { Buffer } from 'node:buffer';

import {
  HOST, IPV6, isAlpha, isDigit, SCHEMA, URL_CHAR, USERINFO,
} from '../char-class.js';
import { HttpParserErrorCode, HttpUrlParseError } from '../errors.js';
import { COLON, HTAB, SLASH, SP } from '../specs.js';
import {
  createUrlFields, setUrlField, UrlField, type UrlFields, type UrlParseResult,
} from './url-fields.js';

const QUESTION = 0x3f;
const HASH = 0x23;
const AT = 0x40;
const ASTERISK = 0x2a;
const OPEN_BRACKET = 0x5b;
const CLOSE_BRACKET = 0x5d;
const PERCENT = 0x25;

const MAX_PORT = 65535;

const enum UrlStep {
  START,
  SCHEMA,
  SCHEMA_SLASH,
  SCHEMA_SLASH_SLASH,
  AUTHORITY,
  HOST_V6,
  HOST_V6_ZONE,
  HOST_V6_END,
  PORT,
  PATH,
  QUERY,
  FRAGMENT,
}

function invalid(message: string, position?: number): never {
  throw new HttpUrlParseError({ code: HttpParserErrorCode.INVALID_URL, message, position });
}

function isBlank(buffer: Buffer): boolean {
  for (const byte of buffer) {
    if (byte !== SP && byte !== HTAB && byte !== 0x0d && byte !== 0x0a) {
      return false;
    }
  }
  return true;
}

function parsePort(buffer: Buffer, start: number, end: number): number {
  if (start === end) {
    invalid('Empty port', start);
  }

  let port = 0;
  for (let i = start; i < end; i++) {
    const byte = buffer[i];
    if (!isDigit(byte)) {
      invalid('Invalid character in port', i);
    }
    port = port * 10 + (byte - 0x30);
    if (port > MAX_PORT) {
      throw new HttpUrlParseError({
        code: HttpParserErrorCode.PORT_OUT_OF_RANGE,
        message: `Port exceeds ${MAX_PORT}`,
        position: start,
      });
    }
  }
  return port;
}

class UrlScanner {
  readonly fields: UrlFields = createUrlFields();

  private step: UrlStep;
  private start = 0;
  private hostStart = 0;
  private portColon = -1;
  private hostColons = 0;
  private sawAt = false;
  private sawAuthority = false;
  private v6Start = -1;

  constructor(private readonly buffer: Buffer, private readonly isConnect: boolean) {
    this.step = isConnect ? UrlStep.AUTHORITY : UrlStep.START;
    if (isConnect) {
      this.sawAuthority = true;
    }
  }

  scan(): UrlFields {
    const { buffer } = this;
    const length = buffer.length;

    for (let i = 0; i < length; i++) {
      const byte = buffer[i];

      switch (this.step) {
        case UrlStep.START:
          if (byte === SLASH || byte === ASTERISK) {
            this.openComponent(UrlStep.PATH, i);
          } else if (byte === QUESTION) {
            this.openComponent(UrlStep.QUERY, i + 1);
          } else if (byte === HASH) {
            this.openComponent(UrlStep.FRAGMENT, i + 1);
          } else if (isAlpha(byte)) {
            this.openComponent(UrlStep.SCHEMA, i);
          } else if (URL_CHAR[byte] === 1) {
            this.openComponent(UrlStep.PATH, i);
          } else {
            invalid('Invalid character at start of URL', i);
          }
          break;

        case UrlStep.SCHEMA:
          if (byte === COLON) {
            setUrlField(this.fields, UrlField.SCHEMA, this.start, i - this.start);
            this.step = UrlStep.SCHEMA_SLASH;
          } else if (SCHEMA[byte] !== 1) {
            // not a schema after all: the text so far opens a relative path
            this.step = UrlStep.PATH;
            i--;
          }
          break;

        case UrlStep.SCHEMA_SLASH:
          if (byte === SLASH) {
            this.step = UrlStep.SCHEMA_SLASH_SLASH;
          } else {
            this.openComponent(UrlStep.PATH, i);
            i--;
          }
          break;

        case UrlStep.SCHEMA_SLASH_SLASH:
          if (byte === SLASH) {
            this.sawAuthority = true;
            this.hostStart = i + 1;
            this.step = UrlStep.AUTHORITY;
          } else {
            this.openComponent(UrlStep.PATH, i - 1);
            i--;
          }
          break;

        case UrlStep.AUTHORITY:
          if (byte === SLASH || byte === QUESTION || byte === HASH) {
            this.closeAuthority(i);
            this.leaveAuthority(byte, i);
          } else if (byte === AT) {
            if (this.sawAt) {
              invalid('Duplicate "@" in authority', i);
            }
            this.sawAt = true;
            setUrlField(this.fields, UrlField.USERINFO, this.hostStart, i - this.hostStart);
            this.hostStart = i + 1;
            this.portColon = -1;
            this.hostColons = 0;
          } else if (byte === OPEN_BRACKET && i === this.hostStart) {
            this.v6Start = i + 1;
            this.step = UrlStep.HOST_V6;
          } else if (byte === COLON) {
            if (this.portColon === -1) {
              this.portColon = i;
            }
            this.hostColons++;
          } else if (USERINFO[byte] !== 1) {
            invalid('Invalid character in authority', i);
          }
          break;

        case UrlStep.HOST_V6:
          if (byte === CLOSE_BRACKET) {
            this.closeV6Host(i);
          } else if (byte === PERCENT) {
            this.step = UrlStep.HOST_V6_ZONE;
          } else if (IPV6[byte] !== 1) {
            invalid('Invalid character in IPv6 address', i);
          }
          break;

        case UrlStep.HOST_V6_ZONE:
          if (byte === CLOSE_BRACKET) {
            this.closeV6Host(i);
          } else if (HOST[byte] !== 1) {
            invalid('Invalid character in IPv6 zone', i);
          }
          break;

        case UrlStep.HOST_V6_END:
          if (byte === COLON) {
            this.portColon = i;
            this.step = UrlStep.PORT;
          } else if (byte === SLASH || byte === QUESTION || byte === HASH) {
            this.closeAuthority(i);
            this.leaveAuthority(byte, i);
          } else {
            invalid('Unexpected character after IPv6 address', i);
          }
          break;

        case UrlStep.PORT:
          if (byte === SLASH || byte === QUESTION || byte === HASH) {
            this.closeAuthority(i);
            this.leaveAuthority(byte, i);
          } else if (!isDigit(byte)) {
            invalid('Invalid character in port', i);
          }
          break;

        case UrlStep.PATH:
          if (byte === QUESTION) {
            this.closeComponent(UrlField.PATH, i);
            this.openComponent(UrlStep.QUERY, i + 1);
          } else if (byte === HASH) {
            this.closeComponent(UrlField.PATH, i);
            this.openComponent(UrlStep.FRAGMENT, i + 1);
          } else if (URL_CHAR[byte] !== 1) {
            invalid('Invalid character in path', i);
          }
          break;

        case UrlStep.QUERY:
          if (byte === HASH) {
            this.closeComponent(UrlField.QUERY, i);
            this.openComponent(UrlStep.FRAGMENT, i + 1);
          } else if (URL_CHAR[byte] !== 1) {
            invalid('Invalid character in query', i);
          }
          break;

        case UrlStep.FRAGMENT:
          if (URL_CHAR[byte] !== 1) {
            invalid('Invalid character in fragment', i);
          }
          break;
      }
    }

    this.end(length);
    return this.fields;
  }

  private openComponent(step: UrlStep, start: number): void {
    this.step = step;
    this.start = start;
  }

  private closeComponent(field: UrlField, end: number): void {
    if (end > this.start) {
      setUrlField(this.fields, field, this.start, end - this.start);
    }
  }

  private closeV6Host(i: number): void {
    if (i === this.v6Start) {
      invalid('Empty IPv6 address', i);
    }
    setUrlField(this.fields, UrlField.HOST, this.v6Start, i - this.v6Start);
    this.step = UrlStep.HOST_V6_END;
  }

  private leaveAuthority(byte: number, i: number): void {
    if (this.isConnect) {
      invalid('CONNECT target must be host:port', i);
    }
    if (byte === SLASH) {
      this.openComponent(UrlStep.PATH, i);
    } else if (byte === QUESTION) {
      this.openComponent(UrlStep.QUERY, i + 1);
    } else {
      this.openComponent(UrlStep.FRAGMENT, i + 1);
    }
  }

  private closeAuthority(end: number): void {
    const { buffer, fields } = this;

    if (this.step === UrlStep.AUTHORITY) {
      if (this.hostColons > 1) {
        invalid('Invalid character in host', this.portColon);
      }
      const hostEnd = this.portColon === -1 ? end : this.portColon;
      if (hostEnd === this.hostStart) {
        invalid('Missing host', this.hostStart);
      }
      setUrlField(fields, UrlField.HOST, this.hostStart, hostEnd - this.hostStart);
    } else if (this.step === UrlStep.HOST_V6 || this.step === UrlStep.HOST_V6_ZONE) {
      invalid('Unterminated IPv6 address', end);
    }

    if (this.portColon !== -1) {
      fields.port = parsePort(buffer, this.portColon + 1, end);
      setUrlField(fields, UrlField.PORT, this.portColon + 1, end - this.portColon - 1);
    }

    if (this.isConnect) {
      const hasUserinfo = this.sawAt;
      if (hasUserinfo || this.portColon === -1) {
        invalid('CONNECT target must be host:port', 0);
      }
    }
  }

  private end(length: number): void {
    switch (this.step) {
      case UrlStep.START:
        break;
      case UrlStep.SCHEMA:
        this.closeComponent(UrlField.PATH, length);
        break;
      case UrlStep.SCHEMA_SLASH:
        invalid('Nothing follows the schema', length);
      case UrlStep.SCHEMA_SLASH_SLASH:
        this.openComponent(UrlStep.PATH, length - 1);
        this.closeComponent(UrlField.PATH, length);
        break;
      case UrlStep.AUTHORITY:
      case UrlStep.HOST_V6:
      case UrlStep.HOST_V6_ZONE:
      case UrlStep.HOST_V6_END:
      case UrlStep.PORT:
        this.closeAuthority(length);
        break;
      case UrlStep.PATH:
        this.closeComponent(UrlField.PATH, length);
        break;
      case UrlStep.QUERY:
        this.closeComponent(UrlField.QUERY, length);
        break;
      case UrlStep.FRAGMENT:
        this.closeComponent(UrlField.FRAGMENT, length);
        break;
    }

    if (this.sawAuthority && !this.isConnect && (this.fields.fieldSet & (1 << UrlField.HOST)) === 0) {
      invalid('Missing host', length);
    }
  }
}

/**
 * Splits a request-target into its components in a single pass.
 *
 * With `isConnect` the input must be an authority-form `host:port`.
 * Otherwise absolute URLs and relative references are both accepted.
 */
export function parseUrl(input: Buffer | string, isConnect = false): UrlParseResult {
  const buffer = typeof input === 'string' ? Buffer.from(input, 'utf8') : input;

  if (buffer.length === 0 || isBlank(buffer)) {
    return {
      ok: false,
      error: new HttpUrlParseError({ code: HttpParserErrorCode.EMPTY_URL, message: 'Empty URL', position: 0 }),
    };
  }

  try {
    return { ok: true, fields: new UrlScanner(buffer, isConnect).scan() };
  } catch (error) {
    if (error instanceof HttpUrlParseError) {
      return { ok: false, error };
    }
    throw error;
  }
}

/** Two-value form: `resultCode` is 0 on success and non-zero for malformed input. */
export function parseUrlWithCode(
  buffer: Buffer,
  length: number,
  isConnect: boolean,
): { resultCode: number; fields: UrlFields } {
  if (!Number.isInteger(length) || length < 0 || length > buffer.length) {
    throw new RangeError(`length (${length}) must be an integer within the buffer`);
  }

  const result = parseUrl(buffer.subarray(0, length), isConnect);
  return result.ok
    ? { resultCode: 0, fields: result.fields }
    : { resultCode: 1, fields: createUrlFields() };
}
