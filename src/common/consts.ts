/**
 * Header names and values cross the bridge as single-byte text.
 */
export const HEADER_ENCODING = 'latin1';

/**
 * Upper bound on the request body read before a handler starts (10 MiB).
 */
export const MAX_BODY_SIZE = 10 * 1024 * 1024;

export const DEFAULT_POOL_SIZE = 4;

export const PROTOCOL_VERSION = {
  version: '3.0',
  specVersion: '2.1',
} as const;

export const PLAIN_TEXT_CONTENT_TYPE = 'text/plain; charset=utf-8';

/**
 * Methods a dispatcher mount answers to.
 */
export const MOUNT_METHODS = ['GET', 'HEAD', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'] as const;

export const enum HttpCode {
  NotFound = 404,
  PayloadTooLarge = 413,
  InternalServerError = 500,
  GatewayTimeout = 504,
}

/**
 * Lifecycle of a pool slot's worker, kept in a word shared with that worker.
 */
export const enum WorkerState {
  Starting = 0,
  Ready = 1,
  Exited = 2,
}

/**
 * A worker that has not reported ready by then is treated as dead.
 */
export const WORKER_STARTUP_TIMEOUT_MS = 30_000;
