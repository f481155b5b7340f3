import type { Buffer } from 'node:buffer';

import type { HttpUrlParseError } from '../errors.js';

export enum UrlField {
  SCHEMA = 0,
  HOST = 1,
  PORT = 2,
  PATH = 3,
  QUERY = 4,
  FRAGMENT = 5,
  USERINFO = 6,
}

export interface UrlSpan {
  offset: number;
  length: number;
}

/**
 * Result of a URL scan. Spans point into the scanned input and are never
 * percent-decoded. `port` is only meaningful when the PORT bit is set.
 */
export interface UrlFields {
  fieldSet: number;
  port: number;
  spans: Partial<Record<UrlField, UrlSpan>>;
}

export type UrlParseResult =
  | { ok: true; fields: UrlFields }
  | { ok: false; error: HttpUrlParseError };

export function createUrlFields(): UrlFields {
  return { fieldSet: 0, port: 0, spans: {} };
}

export function fieldBit(field: UrlField): number {
  return 1 << field;
}

export function hasUrlField(fields: UrlFields, field: UrlField): boolean {
  return (fields.fieldSet & fieldBit(field)) !== 0;
}

export function setUrlField(fields: UrlFields, field: UrlField, offset: number, length: number): void {
  fields.fieldSet |= fieldBit(field);
  fields.spans[field] = { offset, length };
}

export function getUrlField(input: Buffer | string, fields: UrlFields, field: UrlField): string | null {
  const span = fields.spans[field];
  if (!span || !hasUrlField(fields, field)) {
    return null;
  }
  const end = span.offset + span.length;
  return typeof input === 'string'
    ? input.slice(span.offset, end)
    : input.toString('latin1', span.offset, end);
}
