
import { HEADER_ENCODING, PROTOCOL_VERSION } from '../common/consts.js';
import type { HeaderPair, HttpScope, SyncRequest } from '../types/bridge.js';

import { encodeOwned, ownBytes } from './utils/bytes.js';

export interface TranslatedRequest {
  scope: HttpScope;
  body: Uint8Array;
}

const DECIMAL_PATTERN = /^\s*\d+\s*$/;

/**
 * Parses a non-negative decimal integer; anything else yields `undefined`.
 */
export function parseDecimal(value: string | undefined): number | undefined {
  if (value === undefined || !DECIMAL_PATTERN.test(value)) {
    return undefined;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isSafeInteger(parsed) ? parsed : undefined;
}

/**
 * `X_Forwarded_For` and `X-Forwarded-For` both become `x-forwarded-for`.
 */
export function toHeaderName(name: string): string {
  return name.replace(/_/g, '-').toLowerCase();
}

function encodeHeader(name: string, value: string): HeaderPair {
  return [encodeOwned(toHeaderName(name), HEADER_ENCODING), encodeOwned(value, HEADER_ENCODING)];
}

export function collectHeaders(request: SyncRequest): HeaderPair[] {
  const headers = request.headers.map(([name, value]) => encodeHeader(name, value));

  if (request.contentType) {
    headers.push(encodeHeader('content-type', request.contentType));
  }

  if (request.contentLength) {
    headers.push(encodeHeader('content-length', request.contentLength));
  }

  return headers;
}

export function parseHttpVersion(protocol = 'HTTP/1.1'): string {
  const slash = protocol.indexOf('/');
  if (slash === -1 || slash === protocol.length - 1) {
    return '1.1';
  }

  return protocol.slice(slash + 1);
}

function defaultPort(scheme: string): number {
  return scheme === 'https' ? 443 : 80;
}

/**
 * Reads at most `maxBodySize` bytes of the declared body.
 * ! A missing or malformed content length means an empty body, never an error.
 */
export function readBody(request: SyncRequest, maxBodySize: number): Uint8Array {
  const declared = parseDecimal(request.contentLength);
  if (declared === undefined || declared === 0) {
    return new Uint8Array(0);
  }

  const length = Math.min(declared, maxBodySize);
  const chunk = request.body.read(length);
  return ownBytes(chunk.byteLength > length ? chunk.subarray(0, length) : chunk);
}

/**
 * Builds the handler scope and reads the request body up front.
 */
export function translateRequest(request: SyncRequest, maxBodySize: number): TranslatedRequest {
  const scheme = request.scheme ?? 'http';
  const path = request.path ?? '/';

  const scope: HttpScope = {
    type: 'http',
    version: PROTOCOL_VERSION,
    httpVersion: parseHttpVersion(request.protocol),
    method: request.method,
    scheme,
    path,
    rawPath: encodeOwned(path, 'utf8'),
    queryString: encodeOwned(request.queryString ?? '', 'utf8'),
    rootPath: request.rootPath ?? '',
    headers: collectHeaders(request),
    server: [request.serverName, parseDecimal(request.serverPort) ?? defaultPort(scheme)],
    client: [request.remoteAddr ?? '127.0.0.1', parseDecimal(request.remotePort) ?? 0],
    extensions: {},
  };

  return {
    scope: Object.freeze(scope),
    body: readBody(request, maxBodySize),
  };
}
