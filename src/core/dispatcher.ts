import { Buffer } from 'node:buffer';

import createRouter from 'find-my-way';

import { HttpCode, MOUNT_METHODS, PLAIN_TEXT_CONTENT_TYPE } from '../common/consts.js';
import { log } from '../common/logger.js';
import type { SyncApp } from '../types/bridge.js';

const notFound: SyncApp = (_request, startResponse) => {
  startResponse(`${HttpCode.NotFound} Not Found`, [['content-type', PLAIN_TEXT_CONTENT_TYPE]]);
  return [Buffer.from('Not Found')];
};

interface Mount {
  prefix: string;
  app: SyncApp;
}

/**
 * `/api/` and `/api` mount the same prefix; `/` mounts the root.
 */
function normalizePrefix(prefix: string): string {
  const trimmed = prefix.replace(/\/+$/, '');
  if (trimmed.length === 0) {
    return '';
  }

  return trimmed.startsWith('/') ? trimmed : `/${trimmed}`;
}

/**
 * Routes requests to synchronous apps by path prefix.
 * The matched prefix moves from `path` to the end of `rootPath`.
 */
export function createDispatcher(mounts: Readonly<Record<string, SyncApp>>, fallback: SyncApp = notFound): SyncApp {
  const router = createRouter({});
  // Keyed by mount path; the router store must be truthy, so the root is `/` here and `''` as a prefix.
  const mounted = new Map<string, Mount>();
  const unusedHandler = (): void => {};

  for (const [rawPrefix, app] of Object.entries(mounts)) {
    const prefix = normalizePrefix(rawPrefix);
    const mountPath = prefix === '' ? '/' : prefix;
    if (mounted.has(mountPath)) {
      throw new Error(`Duplicate mount prefix: ${rawPrefix}`);
    }

    mounted.set(mountPath, { prefix, app });
    router.on([...MOUNT_METHODS], mountPath, unusedHandler, mountPath);
    router.on([...MOUNT_METHODS], `${prefix}/*`, unusedHandler, mountPath);
    log('INFO', `Mounted app at ${mountPath}`);
  }

  return (request, startResponse) => {
    const path = request.path ?? '/';
    const method = MOUNT_METHODS.find((candidate) => candidate === request.method);
    const match = method === undefined ? null : router.find(method, path);
    const mountPath: unknown = match?.store;
    const mount = typeof mountPath === 'string' ? mounted.get(mountPath) : undefined;

    if (mount === undefined) {
      return fallback(request, startResponse);
    }

    const { prefix, app } = mount;
    const remainder = path.slice(prefix.length);
    return app(
      {
        ...request,
        rootPath: `${request.rootPath ?? ''}${prefix}`,
        path: remainder.length > 0 ? remainder : '/',
      },
      startResponse,
    );
  };
}
