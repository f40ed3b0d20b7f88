import type { MessagePort } from 'node:worker_threads';

import type { HttpScope } from '../types/bridge.js';

/**
 * IPC protocol between the calling thread and bridge workers.
 */
export namespace protocol {
  /**
   * Static data every bridge worker starts with.
   */
  export interface WorkerData {
    /**
     * Slot index inside the pool.
     */
    slot: number;
    /**
     * File URL of the handler module.
     */
    handlerUrl: string;
    /**
     * Export to call on the handler module.
     */
    exportName: string;
    /**
     * Shared per-slot in-flight counters. The worker decrements its own slot.
     */
    loads: Int32Array;
    /**
     * Shared per-slot `WorkerState` words. The worker marks its own slot ready and exited.
     */
    states: Int32Array;
  }

  /**
   * Main -> worker: run one request.
   */
  export interface ExecuteMessage {
    type: 'execute';
    /**
     * Correlation id used in logs.
     */
    id: string;
    scope: HttpScope;
    /**
     * Request body, already capped.
     */
    body: Uint8Array;
    /**
     * Worker end of the per-request response channel.
     */
    port: MessagePort;
    /**
     * Shared `[sequence, cancelled]` words for this request.
     */
    signal: Int32Array;
  }

  /**
   * Worker -> main: a formatted log line.
   */
  export interface LogMessage {
    type: 'log';
    line: string;
  }

  /**
   * Status and headers, sent at most once per request.
   */
  export interface StartMessage {
    type: 'start';
    status: number;
    headers: Array<[Uint8Array, Uint8Array]>;
  }

  /**
   * One non-empty body chunk.
   */
  export interface ChunkMessage {
    type: 'chunk';
    chunk: Uint8Array;
  }

  /**
   * End-of-stream marker on the wire.
   */
  export interface EndMessage {
    type: 'end';
  }

  /**
   * Union of messages on a per-request response channel.
   */
  export type ChannelMessage = StartMessage | ChunkMessage | EndMessage;

  /**
   * Union of commands accepted by worker.
   */
  export type InboundMessage = ExecuteMessage;

  /**
   * Union of events emitted by worker on its parent port.
   */
  export type OutboundMessage = LogMessage;
}
