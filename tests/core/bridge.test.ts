import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createSyncBridge, formatStatus } from '@/core/bridge.js';
import type { SyncBridge } from '@/core/bridge.js';
import type { BridgeConfig } from '@/workers/options.js';

import { HandlerFixtures } from '../helpers/handlers.js';
import type { HandlerName } from '../helpers/handlers.js';
import { collectText, eventually, loggedEvents, makeRequest, recordStart, withBody } from '../helpers/test-utils.js';

interface EchoPayload {
  method: string;
  path: string;
  rootPath: string;
  query: string;
  headers: Array<[string, string]>;
  bodyLength: number;
  body: string;
  more: boolean;
  frozen: boolean;
}

describe('sync bridge', () => {
  const fixtures = new HandlerFixtures('syncbridge-facade-');
  const bridges: SyncBridge[] = [];

  async function startBridge(name: HandlerName, config: Omit<BridgeConfig, 'handler'> = {}): Promise<SyncBridge> {
    const bridge = createSyncBridge({ poolSize: 1, ...config, handler: await fixtures.write(name) });
    bridges.push(bridge);
    return bridge;
  }

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(async () => {
    for (const bridge of bridges.splice(0)) {
      await bridge.close();
    }

    await fixtures.cleanup();

    vi.restoreAllMocks();
  });

  it('returns the status and headers before any body is read', async () => {
    const bridge = await startBridge('ok');
    const events: string[] = [];

    const body = bridge.handle(makeRequest(), (status, headers) => {
      events.push(`start ${status} ${JSON.stringify(headers)}`);
    });
    expect(events).toEqual(['start 200 OK [["content-type","text/plain"]]']);

    for (const chunk of body) {
      events.push(`chunk ${Buffer.from(chunk).toString()}`);
    }

    expect(events).toEqual(['start 200 OK [["content-type","text/plain"]]', 'chunk ok']);
  });

  it('formats the status as a bare number when configured', async () => {
    const bridge = await startBridge('ok', { statusFormat: 'numeric' });
    const { startResponse, recorded } = recordStart();

    const body = bridge.handle(makeRequest(), startResponse);

    expect(recorded.status).toBe('200');
    expect(collectText(body)).toBe('ok');
  });

  it('yields nothing on a second pass over the body', async () => {
    const bridge = await startBridge('ok');
    const { startResponse } = recordStart();

    const body = bridge.handle(makeRequest(), startResponse);

    expect(collectText(body)).toBe('ok');
    expect(collectText(body)).toBe('');
  });

  it('hands the translated scope and the whole body to the handler', async () => {
    const bridge = await startBridge('echo');
    const { startResponse, recorded } = recordStart();

    const body = bridge.handle(
      withBody('hello', {
        path: '/items',
        queryString: 'page=2',
        headers: [['X_Trace_Id', 't-1']],
        contentType: 'text/plain',
      }),
      startResponse,
    );
    const payload: EchoPayload = JSON.parse(collectText(body));

    expect(recorded.status).toBe('200 OK');
    expect(recorded.headers).toEqual([['content-type', 'application/json']]);
    expect(payload).toEqual({
      method: 'POST',
      path: '/items',
      rootPath: '',
      query: 'page=2',
      headers: [
        ['x-trace-id', 't-1'],
        ['content-type', 'text/plain'],
        ['content-length', '5'],
      ],
      bodyLength: 5,
      body: 'hello',
      more: false,
      frozen: true,
    });
  });

  it('never reads more than the configured body cap', async () => {
    const bridge = await startBridge('echo', { maxBodySize: 4 });
    const { startResponse } = recordStart();

    const payload: EchoPayload = JSON.parse(collectText(bridge.handle(withBody('hello world'), startResponse)));

    expect(payload.bodyLength).toBe(4);
    expect(payload.body).toBe('hell');
  });

  it('treats a non-numeric content length as an empty body', async () => {
    const bridge = await startBridge('echo');
    const { startResponse, recorded } = recordStart();

    const payload: EchoPayload = JSON.parse(
      collectText(bridge.handle(withBody('hello', { contentLength: 'lots' }), startResponse)),
    );

    expect(recorded.status).toBe('200 OK');
    expect(payload.bodyLength).toBe(0);
  });

  it('decodes response header bytes as latin1', async () => {
    const bridge = await startBridge('mirrorHeader');
    const { startResponse, recorded } = recordStart();

    const body = bridge.handle(makeRequest({ headers: [['X-Name', 'Jürgen']] }), startResponse);

    expect(recorded.headers).toEqual([
      ['x-name', 'Jürgen'],
      ['x-note', 'café'],
    ]);
    expect(collectText(body)).toBe('');
  });

  it('answers 500 with a diagnostic body when the handler throws first', async () => {
    const bridge = await startBridge('raising');
    const { startResponse, recorded } = recordStart();

    const body = bridge.handle(makeRequest({ path: '/explode' }), startResponse);

    expect(recorded.status).toBe('500 Internal Server Error');
    expect(recorded.headers).toEqual([['content-type', 'text/plain; charset=utf-8']]);
    expect(collectText(body)).toBe('Handler error: boom');

    await eventually(() =>
      loggedEvents(vi.mocked(console.log).mock.calls).some((entry) => entry.event === 'handler_failed'),
    );

    const failure = loggedEvents(vi.mocked(console.log).mock.calls).find((entry) => entry.event === 'handler_failed');
    expect(failure?.level).toBe('ERROR');
    expect(failure?.error).toBe('boom');
    expect(failure?.path).toBe('/explode');
    expect(failure?.headersSent).toBe(false);
  });

  it('truncates the body when the handler throws after the status', async () => {
    const bridge = await startBridge('lateFailure');
    const { startResponse, recorded } = recordStart();

    const body = bridge.handle(makeRequest(), startResponse);

    expect(recorded.status).toBe('200 OK');
    expect(collectText(body)).toBe('partial');

    await eventually(() =>
      loggedEvents(vi.mocked(console.log).mock.calls).some(
        (entry) => entry.event === 'handler_failed' && entry.headersSent === true,
      ),
    );
  });

  it('repeats the request message until the response is sent', async () => {
    const bridge = await startBridge('doubleReceive', { startTimeoutMs: 2000 });
    const { startResponse, recorded } = recordStart();

    const body = bridge.handle(withBody('hi'), startResponse);

    expect(recorded.status).toBe('200 OK');
    expect(collectText(body)).toBe('http.request http.request 2');
  });

  it('hands out body chunks that own their memory', async () => {
    const bridge = await startBridge('pooled');
    const { startResponse, recorded } = recordStart();

    const chunks = [...bridge.handle(makeRequest(), startResponse)];

    expect(recorded.headers).toEqual([['x-secret-length', '19']]);
    expect(chunks).toHaveLength(1);
    expect(chunks[0].byteOffset).toBe(0);
    expect(chunks[0].buffer.byteLength).toBe(2);
    expect(Buffer.from(chunks[0].buffer).toString()).toBe('ok');
  });

  it('answers 500 when the handler sends nothing at all', async () => {
    const bridge = await startBridge('silent');
    const { startResponse, recorded } = recordStart();

    const body = bridge.handle(makeRequest(), startResponse);

    expect(recorded.status).toBe('500 Internal Server Error');
    expect(collectText(body)).toBe('Handler returned without sending a response');
  });

  it('keeps the worker and its loaded handler across requests', async () => {
    const bridge = await startBridge('counter', { exportName: 'handle' });

    const first = collectText(bridge.handle(makeRequest(), recordStart().startResponse)).split(':');
    const second = collectText(bridge.handle(makeRequest(), recordStart().startResponse)).split(':');

    expect(first[1]).toBe('1');
    expect(second[1]).toBe('2');
    expect(second[0]).toBe(first[0]);
    expect(bridge.getSnapshot()[0].startCount).toBe(1);
  });

  it('cancels the request when the caller stops reading early', async () => {
    const bridge = await startBridge('stream');

    for (const chunk of bridge.handle(makeRequest({ path: '/stream' }), recordStart().startResponse)) {
      expect(Buffer.from(chunk).toString()).toBe('one');
      break;
    }

    const outcome = collectText(bridge.handle(makeRequest({ path: '/outcome' }), recordStart().startResponse));
    expect(outcome).toBe('http.disconnect');
  });

  it('answers 504 when the status does not arrive in time', async () => {
    const bridge = await startBridge('slow', { startTimeoutMs: 50 });
    const { startResponse, recorded } = recordStart();

    const body = bridge.handle(makeRequest(), startResponse);

    expect(recorded.status).toBe('504 Gateway Timeout');
    expect(recorded.headers).toEqual([['content-type', 'text/plain; charset=utf-8']]);
    expect(collectText(body)).toBe('Gateway Timeout: handler did not start a response');

    await eventually(() => bridge.getSnapshot()[0].load === 0);
  });
});

describe('formatStatus', () => {
  it('adds the reason phrase only when one is known', () => {
    expect(formatStatus(404, 'withPhrase')).toBe('404 Not Found');
    expect(formatStatus(404, 'numeric')).toBe('404');
    expect(formatStatus(599, 'withPhrase')).toBe('599');
  });
});
