import { Buffer } from 'node:buffer';
import http from 'node:http';

import { HttpCode, MAX_BODY_SIZE } from '../common/consts.js';
import { getErrorMessage, log, logJsonl } from '../common/logger.js';
import type { SyncApp, SyncRequest } from '../types/bridge.js';

import { createBufferReader } from './utils/body-reader.js';

export interface SyncHostOptions {
  host: string;
  port: number;
  /**
   * Requests with a larger body are answered with 413.
   */
  maxBodySize?: number;
}

interface ResponseHead {
  statusCode: number;
  statusMessage?: string;
  headers: Array<[string, string]>;
}

function sendJson(res: http.ServerResponse, payload: unknown, statusCode: HttpCode): void {
  res.statusCode = statusCode;
  res.setHeader('Content-Type', 'application/json; charset=utf-8');
  res.end(JSON.stringify(payload));
}

function safeSendJson(res: http.ServerResponse, payload: unknown, statusCode: HttpCode): void {
  if (res.writableEnded) {
    return;
  }

  if (res.headersSent) {
    res.end();
    return;
  }

  sendJson(res, payload, statusCode);
}

/**
 * `200 OK` -> 200 and `OK`; a bare `200` carries no message.
 */
export function parseStatusLine(status: string): Pick<ResponseHead, 'statusCode' | 'statusMessage'> {
  const match = /^(\d{3})(?: (.*))?$/.exec(status.trim());
  if (match === null) {
    throw new Error(`Invalid status line: ${status}`);
  }

  const statusMessage = match[2];
  return {
    statusCode: Number.parseInt(match[1], 10),
    statusMessage: statusMessage === undefined || statusMessage.length === 0 ? undefined : statusMessage,
  };
}

/**
 * Collects the body; resolves `undefined` once it grows past `maxBytes` and discards the rest.
 */
function readRequestBody(req: http.IncomingMessage, maxBytes: number): Promise<Buffer | undefined> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let totalBytes = 0;
    let overflow = false;

    req.on('data', (chunk: Buffer) => {
      totalBytes += chunk.byteLength;
      if (totalBytes > maxBytes) {
        overflow = true;
        chunks.length = 0;
        return;
      }

      chunks.push(chunk);
    });

    req.once('end', () => {
      resolve(overflow ? undefined : Buffer.concat(chunks));
    });

    req.once('error', reject);
  });
}

export function toSyncRequest(req: http.IncomingMessage, body: Buffer, fallbackServer: SyncHostOptions): SyncRequest {
  const target = req.url ?? '/';
  const queryIndex = target.indexOf('?');
  const headers: Array<[string, string]> = [];
  let contentType: string | undefined;
  let declaresLength = false;

  for (let i = 0; i + 1 < req.rawHeaders.length; i += 2) {
    const name = req.rawHeaders[i];
    const value = req.rawHeaders[i + 1];
    const normalized = name.toLowerCase();

    if (normalized === 'content-type') {
      contentType = value;
      continue;
    }

    if (normalized === 'content-length') {
      declaresLength = true;
      continue;
    }

    headers.push([name, value]);
  }

  const socket = req.socket;

  return {
    method: req.method ?? 'GET',
    path: queryIndex === -1 ? target : target.slice(0, queryIndex),
    queryString: queryIndex === -1 ? '' : target.slice(queryIndex + 1),
    headers,
    contentType,
    // The body is already buffered, so chunked uploads get a length too.
    contentLength: declaresLength || body.byteLength > 0 ? String(body.byteLength) : undefined,
    body: createBufferReader(body),
    serverName: socket.localAddress ?? fallbackServer.host,
    serverPort: String(socket.localPort ?? fallbackServer.port),
    remoteAddr: socket.remoteAddress,
    remotePort: socket.remotePort === undefined ? undefined : String(socket.remotePort),
    scheme: 'http',
    protocol: `HTTP/${req.httpVersion}`,
  };
}

/**
 * Runs the app and copies its two-phase response onto `res`.
 */
function respond(app: SyncApp, request: SyncRequest, res: http.ServerResponse): void {
  const started: { head?: ResponseHead } = {};

  const chunks = app(request, (status, headers) => {
    started.head = { ...parseStatusLine(status), headers };
  });

  const head = started.head;
  if (head === undefined) {
    throw new Error('sync app returned without starting a response');
  }

  res.statusCode = head.statusCode;
  if (head.statusMessage !== undefined) {
    res.statusMessage = head.statusMessage;
  }

  for (const [name, value] of head.headers) {
    res.appendHeader(name, value);
  }

  for (const chunk of chunks) {
    res.write(chunk);
  }

  res.end();
}

/**
 * Serves a synchronous app over node:http. Meant for development and tests.
 */
export function serveSync(app: SyncApp, options: SyncHostOptions): http.Server {
  const maxBodySize = options.maxBodySize ?? MAX_BODY_SIZE;

  const server = http.createServer((req, res) => {
    const method = req.method ?? 'GET';
    const url = req.url ?? null;

    logJsonl('INFO', 'request_received', {
      method,
      url,
      ip: req.socket.remoteAddress ?? 'unknown',
    });

    res.once('finish', () => {
      logJsonl('INFO', 'request_completed', {
        method,
        url,
        statusCode: res.statusCode,
      });
    });

    void readRequestBody(req, maxBodySize)
      .then((body) => {
        if (body === undefined) {
          safeSendJson(res, { message: `request body too large (limit ${maxBodySize} bytes)` }, HttpCode.PayloadTooLarge);
          return;
        }

        respond(app, toSyncRequest(req, body, options), res);
      })
      .catch((error: unknown) => {
        logJsonl('ERROR', 'request_failed', {
          method,
          url,
          error: getErrorMessage(error),
        });

        if (res.headersSent) {
          res.destroy();
          return;
        }

        safeSendJson(res, { message: 'Internal Server Error' }, HttpCode.InternalServerError);
      });
  });

  server.on('close', () => {
    log('INFO', `Sync host closed at http://${options.host}:${options.port}`);
  });

  server.listen(options.port, options.host, () => {
    log('INFO', `Sync host started at http://${options.host}:${options.port}`);
  });

  return server;
}
