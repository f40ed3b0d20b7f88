import { Buffer } from 'node:buffer';
import { receiveMessageOnPort } from 'node:worker_threads';
import type { MessagePort } from 'node:worker_threads';

import { HEADER_ENCODING, HttpCode, PLAIN_TEXT_CONTENT_TYPE } from '../common/consts.js';
import { getErrorMessage, logJsonl } from '../common/logger.js';
import type { protocol } from '../workers/protocol.js';

import { copyForTransfer, encodeOwned } from './utils/bytes.js';

/**
 * Terminates a body sequence. Distinct from every chunk, including an empty one.
 */
export const END_OF_STREAM: unique symbol = Symbol('syncbridge.end-of-stream');

export type EndOfStream = typeof END_OF_STREAM;

/**
 * Index of the word bumped after every post on the channel.
 */
const SEQUENCE = 0;

/**
 * Index of the word set once the reader gives up on the response.
 */
const CANCELLED = 1;

/**
 * Allocates the shared `[sequence, cancelled]` words of one request.
 */
export function createSignal(): Int32Array {
  return new Int32Array(new SharedArrayBuffer(2 * Int32Array.BYTES_PER_ELEMENT));
}

/**
 * Longest single wait before the reader checks that the worker is still alive.
 */
const LIVENESS_SLICE_MS = 100;

/**
 * Body of the 500 answered for a request whose worker died.
 */
export const WORKER_EXITED_BODY = 'Handler error: bridge worker exited';

function plainTextHead(): Array<[Uint8Array, Uint8Array]> {
  return [[encodeOwned('content-type', HEADER_ENCODING), encodeOwned(PLAIN_TEXT_CONTENT_TYPE, HEADER_ENCODING)]];
}

/**
 * Worker end of a per-request response channel.
 * Enforces one status message before any chunk and exactly one end marker.
 */
export class ResponseWriter {
  /**
   * Port the messages are posted on.
   */
  private readonly port: MessagePort;

  /**
   * Shared words of this request.
   */
  private readonly signal: Int32Array;

  /**
   * Status has been posted.
   */
  private started = false;

  /**
   * End marker has been posted.
   */
  private ended = false;

  /**
   * Terminal state; nothing is posted afterwards.
   */
  private completed = false;

  constructor(port: MessagePort, signal: Int32Array) {
    this.port = port;
    this.signal = signal;
  }

  hasStarted(): boolean {
    return this.started;
  }

  hasEnded(): boolean {
    return this.ended;
  }

  isCancelled(): boolean {
    return Atomics.load(this.signal, CANCELLED) === 1;
  }

  /**
   * Posts the status message. A second call is logged and dropped.
   */
  start(status: number, headers: Array<[Uint8Array, Uint8Array]>): void {
    if (this.completed) {
      return;
    }

    if (this.started) {
      logJsonl('WARN', 'duplicate_response_start', { status });
      return;
    }

    this.started = true;
    const transfer: ArrayBuffer[] = [];
    const owned = headers.map(([name, value]): [Uint8Array, Uint8Array] => {
      const ownedName = copyForTransfer(name);
      const ownedValue = copyForTransfer(value);
      transfer.push(ownedName.buffer, ownedValue.buffer);
      return [ownedName.bytes, ownedValue.bytes];
    });
    this.post({ type: 'start', status, headers: owned }, transfer);
  }

  /**
   * Posts a body chunk. Empty chunks are skipped; `more = false` ends the stream.
   */
  body(chunk: Uint8Array, more: boolean): void {
    if (!this.started) {
      throw new Error('http.response.body sent before http.response.start');
    }

    if (this.ended || this.completed) {
      return;
    }

    if (chunk.byteLength > 0) {
      const owned = copyForTransfer(chunk);
      this.post({ type: 'chunk', chunk: owned.bytes }, [owned.buffer]);
    }

    if (!more) {
      this.ended = true;
      this.post({ type: 'end' });
    }
  }

  /**
   * Handler returned. Answers 500 if it never sent a status.
   */
  complete(): void {
    if (this.completed) {
      return;
    }

    if (!this.started) {
      this.start(HttpCode.InternalServerError, plainTextHead());
      this.body(Buffer.from('Handler returned without sending a response'), false);
    }

    this.finish();
  }

  /**
   * Handler threw. Headers already sent cannot be taken back, so only the stream is ended then.
   */
  fail(error: unknown): void {
    if (this.completed) {
      return;
    }

    if (!this.started) {
      this.start(HttpCode.InternalServerError, plainTextHead());
      this.body(Buffer.from(`Handler error: ${getErrorMessage(error)}`), false);
    }

    this.finish();
  }

  /**
   * Releases the worker end of the channel.
   */
  close(): void {
    this.port.close();
  }

  private finish(): void {
    if (!this.ended) {
      this.ended = true;
      this.post({ type: 'end' });
    }

    this.completed = true;
  }

  /**
   * Buffers in `transfer` move to the reader and are unusable here afterwards.
   */
  private post(message: protocol.ChannelMessage, transfer: ArrayBuffer[] = []): void {
    this.port.postMessage(message, transfer);
    Atomics.add(this.signal, SEQUENCE, 1);
    Atomics.notify(this.signal, SEQUENCE);
  }
}

/**
 * Calling-thread end of a per-request response channel.
 * Every receive blocks the thread until the worker posts.
 */
export class ResponseChannels {
  /**
   * Port the worker posts to.
   */
  private readonly port: MessagePort;

  /**
   * Shared words of this request.
   */
  private readonly signal: Int32Array;

  /**
   * Reports whether the worker serving this request can still post.
   */
  private readonly isAlive: () => boolean;

  /**
   * End marker seen or request cancelled.
   */
  private drained = false;

  private startSeen = false;

  /**
   * Stands in for the rest of the response once the worker is gone.
   */
  private substitute: protocol.ChannelMessage[] | undefined;

  constructor(port: MessagePort, signal: Int32Array, isAlive: () => boolean = () => true) {
    this.port = port;
    this.signal = signal;
    this.isAlive = isAlive;
  }

  /**
   * Blocks until the status message arrives. Returns `undefined` when `timeoutMs` elapses first.
   */
  receiveStart(timeoutMs?: number): protocol.StartMessage | undefined {
    const message = this.receive(timeoutMs);
    if (message === undefined) {
      return undefined;
    }

    if (message.type !== 'start') {
      throw new Error(`response channel out of order: expected start, received ${message.type}`);
    }

    return message;
  }

  /**
   * Blocks until the next chunk or the end marker.
   */
  receiveChunk(): Uint8Array | EndOfStream {
    if (this.drained) {
      return END_OF_STREAM;
    }

    const message = this.receive(undefined);
    if (message === undefined || message.type === 'end') {
      this.drained = true;
      this.port.close();
      return END_OF_STREAM;
    }

    if (message.type === 'start') {
      throw new Error('response channel out of order: received a second start');
    }

    return message.chunk;
  }

  /**
   * Tells the worker the response is no longer read and drops the channel.
   */
  cancel(): void {
    Atomics.store(this.signal, CANCELLED, 1);
    this.drained = true;
    this.port.close();
  }

  private receive(timeoutMs: number | undefined): protocol.ChannelMessage | undefined {
    const deadline = timeoutMs === undefined ? Number.POSITIVE_INFINITY : Date.now() + timeoutMs;

    for (;;) {
      // Read the sequence first so a post racing with the receive below still wakes the wait.
      const seen = Atomics.load(this.signal, SEQUENCE);
      const entry = receiveMessageOnPort(this.port);
      if (entry !== undefined) {
        const message: protocol.ChannelMessage = entry.message;
        if (message.type === 'start') {
          this.startSeen = true;
        }

        return message;
      }

      if (this.substitute !== undefined) {
        return this.substitute.shift() ?? { type: 'end' };
      }

      if (!this.isAlive()) {
        // Messages posted just before the exit are still queued; the next pass drains them first.
        this.substitute = this.startSeen
          ? [{ type: 'end' }]
          : [
              { type: 'start', status: HttpCode.InternalServerError, headers: plainTextHead() },
              { type: 'chunk', chunk: encodeOwned(WORKER_EXITED_BODY, 'utf8') },
              { type: 'end' },
            ];
        continue;
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        return undefined;
      }

      Atomics.wait(this.signal, SEQUENCE, seen, Math.min(remaining, LIVENESS_SLICE_MS));
    }
  }
}
