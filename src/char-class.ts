const NOT_HEX = 0xff;

function createTable(predicate: (byte: number) => boolean): Uint8Array {
  const table = new Uint8Array(256);
  for (let byte = 0; byte < 256; byte++) {
    table[byte] = predicate(byte) ? 1 : 0;
  }
  return table;
}

function includes(chars: string) {
  return (byte: number) => chars.includes(String.fromCharCode(byte));
}

export function isDigit(byte: number): boolean {
  return byte >= 0x30 && byte <= 0x39;
}

export function isAlpha(byte: number): boolean {
  const lower = byte | 0x20;
  return lower >= 0x61 && lower <= 0x7a;
}

function isAlphaNum(byte: number): boolean {
  return isDigit(byte) || isAlpha(byte);
}

const isUnreserved = (byte: number) => isAlphaNum(byte) || includes('-._~')(byte);
const isSubDelim = includes('!$&\'()*+,;=');

// RFC 9110 tchar
export const TOKEN = createTable((byte) => isAlphaNum(byte) || includes('!#$%&\'*+-.^_`|~')(byte));

// field-vchar, SP and HTAB; obs-text is accepted as opaque
export const HEADER_VALUE = createTable((byte) => byte === 0x09 || (byte >= 0x20 && byte !== 0x7f));

// visible ASCII; SP, CTLs, DEL and non-ASCII bytes end or break a request-target
export const URL_CHAR = createTable((byte) => byte > 0x20 && byte < 0x7f);

export const SCHEMA = createTable((byte) => isAlphaNum(byte) || includes('+-.')(byte));

export const USERINFO = createTable(
  (byte) => isUnreserved(byte) || isSubDelim(byte) || includes('%:')(byte),
);

export const HOST = createTable((byte) => isUnreserved(byte) || isSubDelim(byte) || byte === 0x25);

export const IPV6 = createTable((byte) => isDigit(byte) || includes('abcdefABCDEF:.')(byte));

export const HEX_VALUE = (() => {
  const table = new Uint8Array(256).fill(NOT_HEX);
  for (let byte = 0; byte < 256; byte++) {
    if (isDigit(byte)) {
      table[byte] = byte - 0x30;
    } else if ((byte | 0x20) >= 0x61 && (byte | 0x20) <= 0x66) {
      table[byte] = (byte | 0x20) - 0x61 + 10;
    }
  }
  return table;
})();

export function isToken(byte: number): boolean {
  return TOKEN[byte] === 1;
}

/** Numeric value of a hex digit, or -1. */
export function hexValue(byte: number): number {
  const value = HEX_VALUE[byte] ?? NOT_HEX;
  return value === NOT_HEX ? -1 : value;
}

export function toLowerByte(byte: number): number {
  return byte >= 0x41 && byte <= 0x5a ? byte | 0x20 : byte;
}
