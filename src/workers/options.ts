import path from 'node:path';
import { pathToFileURL } from 'node:url';

import { DEFAULT_POOL_SIZE, MAX_BODY_SIZE } from '../common/consts.js';

/**
 * `numeric` answers `200`, `withPhrase` answers `200 OK`.
 */
export type StatusFormat = 'numeric' | 'withPhrase';

const STATUS_FORMATS: readonly StatusFormat[] = ['numeric', 'withPhrase'];

/**
 * Bridge settings as callers pass them. Only the handler is required.
 */
export interface BridgeConfig {
  /**
   * Handler module: a file path (resolved against cwd), a `file:` URL string, or a URL.
   */
  handler: string | URL;
  /**
   * Export holding the handler function.
   */
  exportName?: string;
  /**
   * Number of worker threads.
   */
  poolSize?: number;
  /**
   * Largest request body read, in bytes.
   */
  maxBodySize?: number;
  statusFormat?: StatusFormat;
  /**
   * Longest wait for the handler's status message. Unset means wait indefinitely.
   */
  startTimeoutMs?: number;
}

/**
 * Fully resolved bridge settings.
 */
export interface BridgeOptions {
  handlerUrl: string;
  exportName: string;
  poolSize: number;
  maxBodySize: number;
  statusFormat: StatusFormat;
  startTimeoutMs: number | undefined;
}

function toHandlerUrl(handler: string | URL): string {
  if (handler instanceof URL) {
    return handler.href;
  }

  if (handler.startsWith('file:')) {
    return handler;
  }

  return pathToFileURL(path.resolve(handler)).href;
}

function resolveInteger(name: string, value: number | string | undefined, minimum: number): number | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }

  const parsed = typeof value === 'number' ? value : Number(value);
  if (!Number.isSafeInteger(parsed) || parsed < minimum) {
    throw new Error(`Invalid ${name}: ${String(value)}`);
  }

  return parsed;
}

function resolveStatusFormat(value: string | undefined): StatusFormat | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }

  const format = STATUS_FORMATS.find((candidate) => candidate === value);
  if (format === undefined) {
    throw new Error(`Invalid statusFormat: ${value}`);
  }

  return format;
}

/**
 * Resolves bridge options: explicit config first, then `SYNCBRIDGE_*` environment variables, then defaults.
 */
export function resolveBridgeOptions(config: BridgeConfig, env: NodeJS.ProcessEnv = process.env): BridgeOptions {
  const exportName = config.exportName ?? 'default';
  if (exportName.length === 0) {
    throw new Error('Invalid exportName: (empty)');
  }

  return {
    handlerUrl: toHandlerUrl(config.handler),
    exportName,
    poolSize:
      resolveInteger('poolSize', config.poolSize ?? env.SYNCBRIDGE_POOL_SIZE, 1) ?? DEFAULT_POOL_SIZE,
    maxBodySize:
      resolveInteger('maxBodySize', config.maxBodySize ?? env.SYNCBRIDGE_MAX_BODY_SIZE, 0) ?? MAX_BODY_SIZE,
    statusFormat: resolveStatusFormat(config.statusFormat ?? env.SYNCBRIDGE_STATUS_FORMAT) ?? 'withPhrase',
    startTimeoutMs: resolveInteger('startTimeoutMs', config.startTimeoutMs ?? env.SYNCBRIDGE_START_TIMEOUT_MS, 1),
  };
}
