import { DEFAULT_PARSER_LIMITS } from './specs.js';
import type { HttpParserLimits, HttpParserOptions, ResolvedParserOptions } from './types.js';

const LIMIT_KEYS: ReadonlyArray<keyof HttpParserLimits> = [
  'maxStartLineBytes',
  'maxHeaderLineBytes',
  'maxHeaderBytes',
  'maxHeaderCount',
  'maxMethodBytes',
  'maxChunkSizeHexDigits',
  'maxChunkExtensionBytes',
];

export function resolveParserOptions(options: HttpParserOptions = {}): ResolvedParserOptions {
  const limits: HttpParserLimits = { ...DEFAULT_PARSER_LIMITS };

  for (const key of LIMIT_KEYS) {
    const value = options[key];
    if (value === undefined) {
      continue;
    }
    if (!Number.isInteger(value) || value <= 0) {
      throw new TypeError(`${key} must be a positive integer`);
    }
    limits[key] = value;
  }

  const { allowDuplicateContentLength = false } = options;

  if (typeof allowDuplicateContentLength !== 'boolean') {
    throw new TypeError('allowDuplicateContentLength must be a boolean');
  }

  return Object.freeze({ ...limits, allowDuplicateContentLength });
}
