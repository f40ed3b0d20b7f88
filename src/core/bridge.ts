import { Buffer } from 'node:buffer';
import { STATUS_CODES } from 'node:http';

import { HEADER_ENCODING, HttpCode, PLAIN_TEXT_CONTENT_TYPE } from '../common/consts.js';
import { logJsonl } from '../common/logger.js';
import type { SyncApp } from '../types/bridge.js';
import { createBridgeWorkerPool } from '../workers/bridge-worker-pool.js';
import type { BridgeWorkerSnapshot } from '../workers/bridge-worker-pool.js';
import { resolveBridgeOptions } from '../workers/options.js';
import type { BridgeConfig, StatusFormat } from '../workers/options.js';

import { END_OF_STREAM } from './channel.js';
import type { ResponseChannels } from './channel.js';
import { translateRequest } from './scope.js';

/**
 * Synchronous entry point over a pool of async handler workers.
 */
export interface SyncBridge {
  /**
   * Blocks until the handler has sent its status, then returns the body as a lazy sequence.
   */
  handle: SyncApp;
  /**
   * Terminates the worker threads.
   */
  close(): Promise<void>;
  getSnapshot(): BridgeWorkerSnapshot[];
}

export function formatStatus(status: number, format: StatusFormat): string {
  const phrase = STATUS_CODES[status];
  if (format === 'numeric' || phrase === undefined) {
    return String(status);
  }

  return `${status} ${phrase}`;
}

export function decodeHeaders(headers: ReadonlyArray<readonly [Uint8Array, Uint8Array]>): Array<[string, string]> {
  return headers.map(([name, value]) => [
    Buffer.from(name).toString(HEADER_ENCODING),
    Buffer.from(value).toString(HEADER_ENCODING),
  ]);
}

/**
 * Pulls chunks until the end marker. Stopping early cancels the request.
 */
function* streamBody(channels: ResponseChannels): Generator<Uint8Array, void, undefined> {
  let finished = false;

  try {
    for (;;) {
      const chunk = channels.receiveChunk();
      if (chunk === END_OF_STREAM) {
        finished = true;
        return;
      }

      yield chunk;
    }
  } finally {
    if (!finished) {
      channels.cancel();
    }
  }
}

function* single(chunk: Uint8Array): Generator<Uint8Array, void, undefined> {
  yield chunk;
}

export function createSyncBridge(config: BridgeConfig): SyncBridge {
  const options = resolveBridgeOptions(config);
  const pool = createBridgeWorkerPool(options);

  const handle: SyncApp = (request, startResponse) => {
    const { scope, body } = translateRequest(request, options.maxBodySize);
    const channels = pool.submit(scope, body);
    const head = channels.receiveStart(options.startTimeoutMs);

    if (head === undefined) {
      channels.cancel();
      logJsonl('WARN', 'response_start_timeout', {
        method: scope.method,
        path: scope.path,
        timeoutMs: options.startTimeoutMs,
      });

      startResponse(formatStatus(HttpCode.GatewayTimeout, options.statusFormat), [
        ['content-type', PLAIN_TEXT_CONTENT_TYPE],
      ]);
      return single(Buffer.from('Gateway Timeout: handler did not start a response'));
    }

    startResponse(formatStatus(head.status, options.statusFormat), decodeHeaders(head.headers));
    return streamBody(channels);
  };

  return {
    handle,
    close: () => pool.close(),
    getSnapshot: () => pool.getSnapshot(),
  };
}
