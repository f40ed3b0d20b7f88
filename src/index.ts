export { createSyncBridge, decodeHeaders, formatStatus } from './core/bridge.js';
export type { SyncBridge } from './core/bridge.js';
export { END_OF_STREAM, ResponseChannels } from './core/channel.js';
export type { EndOfStream } from './core/channel.js';
export { createDispatcher } from './core/dispatcher.js';
export { serveSync } from './core/host.js';
export type { SyncHostOptions } from './core/host.js';
export { translateRequest } from './core/scope.js';
export type { TranslatedRequest } from './core/scope.js';
export { createBufferReader } from './core/utils/body-reader.js';
export { getErrorMessage, logJsonl, setLogSink } from './common/logger.js';
export type { LogLevel, LogSink } from './common/logger.js';
export { MAX_BODY_SIZE } from './common/consts.js';
export { createBridgeWorkerPool } from './workers/bridge-worker-pool.js';
export type { BridgeWorkerPool, BridgeWorkerSnapshot } from './workers/bridge-worker-pool.js';
export { resolveBridgeOptions } from './workers/options.js';
export type { BridgeConfig, BridgeOptions, StatusFormat } from './workers/options.js';
export type * from './types/bridge.js';
