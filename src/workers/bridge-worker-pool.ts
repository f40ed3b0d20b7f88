import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { MessageChannel, Worker } from 'node:worker_threads';

import { WORKER_STARTUP_TIMEOUT_MS, WorkerState } from '../common/consts.js';
import { getErrorMessage, logJsonl, writeLogLine } from '../common/logger.js';
import { createSignal, ResponseChannels } from '../core/channel.js';
import type { HttpScope } from '../types/bridge.js';

import type { BridgeOptions } from './options.js';
import type { protocol } from './protocol.js';

/**
 * One pool position. Its worker thread is started on first use and again after it exits.
 */
interface WorkerSlot {
  index: number;
  worker: Worker | undefined;
  /**
   * How many worker threads this slot has started.
   */
  startCount: number;
  /**
   * When the current worker thread was started.
   */
  startedAt: number;
  lastExitCode?: number;
}

/**
 * Per-slot diagnostics.
 */
export interface BridgeWorkerSnapshot {
  slot: number;
  status: 'running' | 'stopped' | 'closed';
  threadId?: number;
  /**
   * Requests submitted to the slot and not finished yet.
   */
  load: number;
  startCount: number;
  lastExitCode?: number;
}

/**
 * Main-thread API of the worker execution engine.
 */
export interface BridgeWorkerPool {
  /**
   * Hands one request to a worker and returns its response channels. Does not wait for the handler.
   */
  submit(scope: HttpScope, body: Uint8Array): ResponseChannels;
  /**
   * Terminates every worker. Requests still running are abandoned.
   */
  close(): Promise<void>;
  getSnapshot(): BridgeWorkerSnapshot[];
}

/**
 * Resolves the worker entry: compiled js, or a bootstrap that registers tsx when running from sources.
 */
function resolveWorkerEntry(): URL {
  const currentExt = path.extname(fileURLToPath(import.meta.url));

  if (currentExt === '.ts') {
    return new URL('./bridge-worker-dev.mjs', import.meta.url);
  }

  return new URL('./bridge-worker.js', import.meta.url);
}

export function createBridgeWorkerPool(options: BridgeOptions): BridgeWorkerPool {
  return new BridgeWorkerPoolImpl(options);
}

class BridgeWorkerPoolImpl implements BridgeWorkerPool {
  private readonly options: BridgeOptions;

  private readonly entry: URL;

  /**
   * In-flight counters, one per slot, shared with the workers.
   */
  private readonly loads: Int32Array;

  /**
   * `WorkerState` words, one per slot, shared with the workers.
   */
  private readonly states: Int32Array;

  private readonly slots: WorkerSlot[];

  /**
   * Monotonic request id counter.
   */
  private requestCounter = 0;

  private closed = false;

  constructor(options: BridgeOptions) {
    this.options = options;
    this.entry = resolveWorkerEntry();
    this.loads = new Int32Array(new SharedArrayBuffer(options.poolSize * Int32Array.BYTES_PER_ELEMENT));
    this.states = new Int32Array(new SharedArrayBuffer(options.poolSize * Int32Array.BYTES_PER_ELEMENT));
    this.slots = Array.from({ length: options.poolSize }, (_, index): WorkerSlot => ({
      index,
      worker: undefined,
      startCount: 0,
      startedAt: 0,
    }));
  }

  submit(scope: HttpScope, body: Uint8Array): ResponseChannels {
    if (this.closed) {
      throw new Error('bridge worker pool is closed');
    }

    const slot = this.pickSlot();
    const worker = this.ensureWorker(slot);
    const { port1, port2 } = new MessageChannel();
    const signal = createSignal();

    const message: protocol.ExecuteMessage = {
      type: 'execute',
      id: `${Date.now().toString(36)}-${(this.requestCounter++).toString(36)}`,
      scope,
      body,
      port: port2,
      signal,
    };

    Atomics.add(this.loads, slot.index, 1);
    worker.postMessage(message, [port2]);

    const generation = slot.startCount;
    return new ResponseChannels(port1, signal, () => this.isAlive(slot, generation));
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }

    this.closed = true;

    const workers: Worker[] = [];
    for (const slot of this.slots) {
      if (slot.worker !== undefined) {
        workers.push(slot.worker);
        slot.worker = undefined;
      }
    }

    await Promise.all(
      workers.map(async (worker) => {
        try {
          await worker.terminate();
        } catch (error) {
          logJsonl('WARN', 'bridge_worker_terminate_failed', {
            error: getErrorMessage(error),
          });
        }
      }),
    );
  }

  getSnapshot(): BridgeWorkerSnapshot[] {
    return this.slots.map((slot): BridgeWorkerSnapshot => ({
      slot: slot.index,
      status: this.closed ? 'closed' : slot.worker === undefined ? 'stopped' : 'running',
      threadId: slot.worker?.threadId,
      load: Atomics.load(this.loads, slot.index),
      startCount: slot.startCount,
      lastExitCode: slot.lastExitCode,
    }));
  }

  /**
   * Whether the worker that took a request can still answer it.
   * Readable while the calling thread blocks: it touches only shared words and slot fields.
   */
  private isAlive(slot: WorkerSlot, generation: number): boolean {
    if (this.closed || slot.startCount !== generation) {
      return false;
    }

    const state = Atomics.load(this.states, slot.index);
    if (state === WorkerState.Exited) {
      return false;
    }

    return state === WorkerState.Ready || Date.now() - slot.startedAt < WORKER_STARTUP_TIMEOUT_MS;
  }

  /**
   * Prefers an idle running worker, then a slot not started yet, then the least loaded slot.
   */
  private pickSlot(): WorkerSlot {
    let unstarted: WorkerSlot | undefined;
    let leastLoaded: WorkerSlot | undefined;
    let leastLoad = Number.POSITIVE_INFINITY;

    for (const slot of this.slots) {
      const load = Atomics.load(this.loads, slot.index);

      if (slot.worker !== undefined && load === 0) {
        return slot;
      }

      if (slot.worker === undefined && unstarted === undefined) {
        unstarted = slot;
      }

      if (load < leastLoad) {
        leastLoad = load;
        leastLoaded = slot;
      }
    }

    const picked = unstarted ?? leastLoaded;
    if (picked === undefined) {
      throw new Error('bridge worker pool has no slots');
    }

    return picked;
  }

  /**
   * Starts the slot's worker on demand and wires its lifecycle hooks.
   */
  private ensureWorker(slot: WorkerSlot): Worker {
    if (slot.worker !== undefined) {
      return slot.worker;
    }

    const workerData: protocol.WorkerData = {
      slot: slot.index,
      handlerUrl: this.options.handlerUrl,
      exportName: this.options.exportName,
      loads: this.loads,
      states: this.states,
    };

    Atomics.store(this.states, slot.index, WorkerState.Starting);
    const worker = new Worker(this.entry, { workerData });

    worker.unref();

    worker.on('message', (message: protocol.OutboundMessage) => {
      if (message.type === 'log') {
        writeLogLine(message.line);
      }
    });

    worker.once('error', (error) => {
      logJsonl('ERROR', 'bridge_worker_error', {
        slot: slot.index,
        error: getErrorMessage(error),
      });
    });

    worker.once('exit', (code) => {
      Atomics.store(this.states, slot.index, WorkerState.Exited);

      if (slot.worker !== worker) {
        return;
      }

      // Jobs queued on the dead thread are gone with it.
      slot.worker = undefined;
      slot.lastExitCode = code;
      Atomics.store(this.loads, slot.index, 0);

      if (!this.closed) {
        logJsonl('WARN', 'bridge_worker_exited', { slot: slot.index, code });
      }
    });

    slot.worker = worker;
    slot.startCount += 1;
    slot.startedAt = Date.now();
    logJsonl('INFO', 'bridge_worker_started', {
      slot: slot.index,
      threadId: worker.threadId,
      handler: this.options.handlerUrl,
    });

    return worker;
  }
}
