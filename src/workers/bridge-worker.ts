import { Buffer } from 'node:buffer';
import { parentPort, workerData } from 'node:worker_threads';

import { HEADER_ENCODING, WorkerState } from '../common/consts.js';
import { getErrorMessage, getErrorStack, logJsonl, setLogSink } from '../common/logger.js';
import { ResponseWriter } from '../core/channel.js';
import type {
  AsyncHandler,
  BytesLike,
  HttpScope,
  InboundMessage,
  OutboundMessage,
  Receive,
  Send,
} from '../types/bridge.js';

import type { protocol } from './protocol.js';

/**
 * ! Worker must run under parentPort; standalone run is invalid.
 */
if (parentPort === null) {
  throw new Error('bridge worker missing parent port');
}
const port = parentPort;

const data: protocol.WorkerData = workerData;

setLogSink((line) => {
  const message: protocol.OutboundMessage = { type: 'log', line };
  port.postMessage(message);
});

/**
 * Handler module, imported once per worker lifetime.
 */
let handlerPromise: Promise<AsyncHandler> | undefined;

async function importHandler(): Promise<AsyncHandler> {
  const loaded: Record<string, unknown> = await import(data.handlerUrl);
  const exported = loaded[data.exportName];

  if (typeof exported !== 'function') {
    throw new TypeError(`Export "${data.exportName}" is not a function: ${data.handlerUrl}`);
  }

  return async (scope, receive, send) => {
    await exported(scope, receive, send);
  };
}

/**
 * A failed import is not cached, the next request retries it.
 */
function loadHandler(): Promise<AsyncHandler> {
  if (handlerPromise === undefined) {
    handlerPromise = importHandler();
    void handlerPromise.catch(() => {
      handlerPromise = undefined;
    });
  }

  return handlerPromise;
}

function toBytes(value: BytesLike, encoding: BufferEncoding): Uint8Array {
  return typeof value === 'string' ? Buffer.from(value, encoding) : value;
}

function toStatus(status: unknown): number {
  if (typeof status !== 'number' || !Number.isInteger(status) || status < 100 || status > 999) {
    throw new TypeError(`Invalid response status: ${String(status)}`);
  }

  return status;
}

function toHeaderPairs(headers: ReadonlyArray<readonly [BytesLike, BytesLike]>): Array<[Uint8Array, Uint8Array]> {
  return headers.map(([name, value]) => [toBytes(name, HEADER_ENCODING), toBytes(value, HEADER_ENCODING)]);
}

/**
 * Routes one outbound handler message onto the response channel.
 */
function deliver(writer: ResponseWriter, message: OutboundMessage): void {
  switch (message.type) {
    case 'http.response.start':
      writer.start(toStatus(message.status), toHeaderPairs(message.headers ?? []));
      return;
    case 'http.response.body':
      writer.body(toBytes(message.body ?? '', 'utf8'), message.more === true);
      return;
    default:
      throw new TypeError(`Unsupported message type: ${String(Reflect.get(message, 'type'))}`);
  }
}

/**
 * Worker copies lose the freeze applied on the calling thread.
 */
function freezeScope(scope: HttpScope): HttpScope {
  Object.freeze(scope.headers);
  Object.freeze(scope.server);
  Object.freeze(scope.client);
  Object.freeze(scope.extensions);
  return Object.freeze(scope);
}

/**
 * Writers of every job received and not finished yet, by request id.
 */
const pending = new Map<string, ResponseWriter>();

/**
 * Runs one handler invocation to completion and always terminates its channel.
 */
async function execute(job: protocol.ExecuteMessage, writer: ResponseWriter): Promise<void> {
  const startedAt = Date.now();
  const scope = freezeScope(job.scope);

  // The request message repeats until the response is over; the body is already complete.
  const receive: Receive = async (): Promise<InboundMessage> => {
    if (writer.hasEnded() || writer.isCancelled()) {
      return { type: 'http.disconnect' };
    }

    return { type: 'http.request', body: job.body, more: false };
  };

  const send: Send = async (message) => {
    if (writer.isCancelled()) {
      return;
    }

    deliver(writer, message);
  };

  try {
    const handler = await loadHandler();
    await handler(scope, receive, send);
    writer.complete();
  } catch (error) {
    logJsonl('ERROR', 'handler_failed', {
      id: job.id,
      method: scope.method,
      path: scope.path,
      headersSent: writer.hasStarted(),
      error: getErrorMessage(error),
      stack: getErrorStack(error),
    });
    writer.fail(error);
  } finally {
    try {
      writer.close();
    } catch (error) {
      logJsonl('WARN', 'request_teardown_failed', {
        id: job.id,
        error: getErrorMessage(error),
      });
    }

    Atomics.sub(data.loads, data.slot, 1);
  }

  if (writer.isCancelled()) {
    logJsonl('INFO', 'request_cancelled', { id: job.id, elapsedMs: Date.now() - startedAt });
  }
}

/**
 * `process.exit` from a handler ends the thread; answer every job it still holds first.
 */
process.on('exit', () => {
  for (const writer of pending.values()) {
    writer.fail(new Error('bridge worker exited'));
  }

  Atomics.store(data.states, data.slot, WorkerState.Exited);
});

/**
 * Handlers may leave promises behind; log them instead of losing the worker.
 */
process.on('unhandledRejection', (reason) => {
  logJsonl('ERROR', 'bridge_worker_unhandled_rejection', {
    slot: data.slot,
    error: getErrorMessage(reason),
  });
});

process.on('uncaughtException', (error) => {
  logJsonl('ERROR', 'bridge_worker_uncaught_exception', {
    slot: data.slot,
    error: getErrorMessage(error),
    stack: getErrorStack(error),
  });
});

/**
 * Jobs run one at a time, in arrival order.
 */
let queue: Promise<void> = Promise.resolve();

port.on('message', (message: protocol.InboundMessage) => {
  if (message.type !== 'execute') {
    return;
  }

  const writer = new ResponseWriter(message.port, message.signal);
  pending.set(message.id, writer);

  queue = queue
    .then(() => execute(message, writer))
    .catch((error: unknown) => {
      logJsonl('ERROR', 'bridge_worker_execute_failed', {
        id: message.id,
        error: getErrorMessage(error),
      });
    })
    .finally(() => {
      pending.delete(message.id);
    });
});

Atomics.store(data.states, data.slot, WorkerState.Ready);
