import {
  type RequestRecord,
  type OutboundRequest,
  type HttpVersion,
  type ReplayScheme,
  getHeader,
} from '../types/request-record';

export type TranslationErrorCode =
  | 'INVALID_METHOD'
  | 'MALFORMED_PATH'
  | 'UNKNOWN_SCHEME'
  | 'UNKNOWN_PROTOCOL';

export class TranslationError extends Error {
  readonly code: TranslationErrorCode;

  constructor(code: TranslationErrorCode, message: string) {
    super(message);
    this.name = 'TranslationError';
    this.code = code;
  }
}

// RFC 9110 token
const TOKEN_PATTERN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;
const BAD_PERCENT_ESCAPE = /%(?![0-9A-Fa-f]{2})/;
const WHITESPACE_OR_CONTROL = /[\x00-\x20\x7f]/;
const VERSION_PATTERN = /^HTTPS?\/(\d{1,7})\.(\d{1,7})$/;
const HIGH_BYTE = /[\x80-\xff]/g;
const OUT_OF_BYTE_RANGE = /[^\x00-\xff]/;

// Base for resolving origin-form targets; its host never reaches the output
const PARSE_BASE = 'http://replay.invalid';

/**
 * Scheme from the protocol prefix: "HTTP" is http, "HTTPS" is https
 */
export function parseScheme(protocol: string | undefined): ReplayScheme {
  if (protocol === undefined || protocol.slice(0, 4) !== 'HTTP') {
    throw new TranslationError('UNKNOWN_SCHEME', `Unknown scheme: ${protocol ?? '(none)'}`);
  }
  return protocol.charAt(4) === 'S' ? 'https' : 'http';
}

/**
 * Parse "HTTP/1.1" or "HTTPS/1.0" into major/minor numbers
 */
export function parseHttpVersion(protocol: string | undefined): HttpVersion {
  const match = protocol?.match(VERSION_PATTERN);
  if (!match) {
    throw new TranslationError('UNKNOWN_PROTOCOL', `Unknown protocol: ${protocol ?? '(none)'}`);
  }
  return {
    major: parseInt(match[1], 10),
    minor: parseInt(match[2], 10),
  };
}

/**
 * Parse a request target (origin-form "/a?b" or absolute-form
 * "http://host/a?b") and return its path and query
 */
export function parseRequestTarget(path: string | undefined): { pathname: string; search: string } {
  if (!path) {
    throw new TranslationError('MALFORMED_PATH', 'Malformed path: (none)');
  }
  if (BAD_PERCENT_ESCAPE.test(path) || WHITESPACE_OR_CONTROL.test(path) || OUT_OF_BYTE_RANGE.test(path)) {
    throw new TranslationError('MALFORMED_PATH', `Malformed path: ${path}`);
  }

  // one code point per logged byte; escape bytes >= 0x80 as themselves
  // rather than letting URL re-encode them as UTF-8
  const escaped = path.replace(HIGH_BYTE, (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`);

  let parsed: URL;
  try {
    parsed = new URL(escaped, PARSE_BASE);
  } catch {
    throw new TranslationError('MALFORMED_PATH', `Malformed path: ${path}`);
  }

  return { pathname: parsed.pathname, search: parsed.search };
}

/**
 * Build the request to send to the replay target from a completed record
 * @param targetHost - host (and optional port) the connection goes to
 * @throws TranslationError if the record cannot be replayed
 */
export function translateRequest(record: RequestRecord, targetHost: string): OutboundRequest {
  const method = record.method ?? '';
  if (!TOKEN_PATTERN.test(method)) {
    throw new TranslationError('INVALID_METHOD', `Invalid method: ${method || '(none)'}`);
  }

  const target = parseRequestTarget(record.path);
  const scheme = parseScheme(record.protocol);
  const version = parseHttpVersion(record.protocol);

  const url = new URL(`${scheme}://${targetHost}`);
  url.pathname = target.pathname;
  url.search = target.search;

  return Object.freeze({
    method,
    url: url.toString(),
    scheme,
    protocol: record.protocol ?? '',
    version: Object.freeze(version),
    headers: Object.freeze(record.headers.map((header) => Object.freeze({ ...header }))),
    originalHost: (getHeader(record.headers, 'Host') ?? '').trim(),
  });
}

/**
 * URL as the source server saw it: the outbound URL with the original Host
 * in place of the replay target. Used for reporting only.
 */
export function displayUrl(request: OutboundRequest): string {
  const url = new URL(request.url);
  const host = request.originalHost || url.host;
  return `${url.protocol}//${host}${url.pathname}${url.search}`;
}
