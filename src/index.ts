export {
  HEADER_VALUE,
  hexValue,
  HOST,
  isAlpha,
  isDigit,
  isToken,
  SCHEMA,
  toLowerByte,
  TOKEN,
  URL_CHAR,
  USERINFO,
} from './char-class.js';
export {
  classifyHeaderName,
  computeKeepAlive,
  FramingHeader,
  parseConnectionTokens,
  parseContentLength,
  parseTransferCodings,
  statusHasNoBody,
} from './decode/framing.js';
export { HttpParser } from './decode/parser.js';
export {
  ERROR_CATEGORY,
  HttpParserError,
  HttpParserErrorCategory,
  HttpParserErrorCode,
  HttpUrlParseError,
  isHttpParserError,
} from './errors.js';
export type { HttpParserErrorOptions } from './errors.js';
export { collectMessages, MessageCollector } from './message/collector.js';
export type {
  CollectResult,
  HeaderPair,
  HttpMessage,
  MessageCollectorOptions,
} from './message/collector.js';
export { resolveParserOptions } from './options.js';
export {
  ChunkPhase,
  DEFAULT_PARSER_LIMITS,
  HeadersDirective,
  HttpMethods,
  MessageKind,
  ParserFlags,
  ParserMode,
} from './specs.js';
export type {
  ConsumeResult,
  HttpMethod,
  HttpParserHandler,
  HttpParserLimits,
  HttpParserOptions,
  ParseOutcome,
  ParserState,
  ResolvedMessageKind,
  ResolvedParserOptions,
} from './types.js';
export { parseUrl, parseUrlWithCode } from './url/parse-url.js';
export {
  getUrlField,
  hasUrlField,
  UrlField,
} from './url/url-fields.js';
export type { UrlFields, UrlParseResult, UrlSpan } from './url/url-fields.js';
