import { MessageChannel } from 'node:worker_threads';
import type { MessagePort } from 'node:worker_threads';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createSignal, END_OF_STREAM, ResponseChannels, ResponseWriter, WORKER_EXITED_BODY } from '@/core/channel.js';

import { loggedEvents } from '../helpers/test-utils.js';

function text(chunk: Uint8Array | typeof END_OF_STREAM): string | typeof END_OF_STREAM {
  return chunk === END_OF_STREAM ? chunk : Buffer.from(chunk).toString('utf8');
}

describe('response channel', () => {
  const ports: MessagePort[] = [];
  let writer: ResponseWriter;
  let channels: ResponseChannels;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});

    const { port1, port2 } = new MessageChannel();
    ports.push(port1, port2);
    const signal = createSignal();
    writer = new ResponseWriter(port2, signal);
    channels = new ResponseChannels(port1, signal);
  });

  afterEach(() => {
    for (const port of ports.splice(0)) {
      port.close();
    }

    vi.restoreAllMocks();
  });

  it('delivers the status before the body and ends with one marker', () => {
    writer.start(200, []);
    writer.body(Buffer.from('ok'), false);

    const head = channels.receiveStart();
    expect(head?.status).toBe(200);
    expect(head?.headers).toEqual([]);
    expect(text(channels.receiveChunk())).toBe('ok');
    expect(channels.receiveChunk()).toBe(END_OF_STREAM);
    expect(channels.receiveChunk()).toBe(END_OF_STREAM);
  });

  it('suppresses empty chunks that announce more body', () => {
    writer.start(200, []);
    writer.body(new Uint8Array(0), true);
    writer.body(Buffer.from('a'), true);
    writer.body(new Uint8Array(0), false);

    channels.receiveStart();
    expect(text(channels.receiveChunk())).toBe('a');
    expect(channels.receiveChunk()).toBe(END_OF_STREAM);
  });

  it('ignores and logs a second status message', () => {
    writer.start(200, []);
    writer.start(404, []);
    writer.complete();

    expect(channels.receiveStart()?.status).toBe(200);
    expect(channels.receiveChunk()).toBe(END_OF_STREAM);

    const events = loggedEvents(vi.mocked(console.log).mock.calls);
    expect(events).toHaveLength(1);
    expect(events[0].event).toBe('duplicate_response_start');
    expect(events[0].status).toBe(404);
  });

  it('rejects a body sent before the status', () => {
    expect(() => writer.body(Buffer.from('x'), false)).toThrow('http.response.body sent before http.response.start');
  });

  it('answers 500 when the handler returns without a status', () => {
    writer.complete();

    const head = channels.receiveStart();
    expect(head?.status).toBe(500);
    expect(head?.headers.map(([name, value]) => [Buffer.from(name).toString(), Buffer.from(value).toString()])).toEqual([
      ['content-type', 'text/plain; charset=utf-8'],
    ]);
    expect(text(channels.receiveChunk())).toBe('Handler returned without sending a response');
    expect(channels.receiveChunk()).toBe(END_OF_STREAM);
  });

  it('answers 500 with a diagnostic chunk when the handler fails before the status', () => {
    writer.fail(new Error('boom'));

    expect(channels.receiveStart()?.status).toBe(500);
    expect(text(channels.receiveChunk())).toBe('Handler error: boom');
    expect(channels.receiveChunk()).toBe(END_OF_STREAM);
  });

  it('only ends the stream when the handler fails after the status', () => {
    writer.start(200, []);
    writer.body(Buffer.from('partial'), true);
    writer.fail(new Error('late'));

    expect(channels.receiveStart()?.status).toBe(200);
    expect(text(channels.receiveChunk())).toBe('partial');
    expect(channels.receiveChunk()).toBe(END_OF_STREAM);
  });

  it('writes nothing after completion', () => {
    writer.start(201, []);
    writer.complete();
    writer.body(Buffer.from('too late'), false);
    writer.fail(new Error('ignored'));

    expect(channels.receiveStart()?.status).toBe(201);
    expect(channels.receiveChunk()).toBe(END_OF_STREAM);
    expect(writer.hasEnded()).toBe(true);
  });

  it('shares cancellation with the writer', () => {
    expect(writer.isCancelled()).toBe(false);

    channels.cancel();

    expect(writer.isCancelled()).toBe(true);
    expect(channels.receiveChunk()).toBe(END_OF_STREAM);
  });

  it('posts header bytes and chunks on buffers of their own', () => {
    const pool = Buffer.from('x-request-id: unrelated; ok');
    writer.start(200, [[pool.subarray(0, 12), pool.subarray(14, 23)]]);
    writer.body(pool.subarray(25), false);

    const head = channels.receiveStart();
    const chunk = channels.receiveChunk();

    expect(head?.headers.map(([name, value]) => [name.buffer.byteLength, value.buffer.byteLength])).toEqual([[12, 9]]);
    expect(chunk).not.toBe(END_OF_STREAM);
    if (chunk !== END_OF_STREAM) {
      expect(chunk.buffer.byteLength).toBe(2);
      expect(Buffer.from(chunk.buffer).toString()).toBe('ok');
    }
  });

  it('gives up waiting for the status after the timeout', () => {
    const startedAt = Date.now();

    expect(channels.receiveStart(30)).toBeUndefined();
    expect(Date.now() - startedAt).toBeGreaterThanOrEqual(25);
  });
});

describe('response channel with a dead worker', () => {
  const ports: MessagePort[] = [];

  function open(isAlive: () => boolean): { writer: ResponseWriter; channels: ResponseChannels } {
    const { port1, port2 } = new MessageChannel();
    ports.push(port1, port2);
    const signal = createSignal();
    return { writer: new ResponseWriter(port2, signal), channels: new ResponseChannels(port1, signal, isAlive) };
  }

  afterEach(() => {
    for (const port of ports.splice(0)) {
      port.close();
    }
  });

  it('answers 500 when the worker is gone before the status', () => {
    const { channels } = open(() => false);

    const head = channels.receiveStart();

    expect(head?.status).toBe(500);
    expect(head?.headers.map(([name, value]) => [Buffer.from(name).toString(), Buffer.from(value).toString()])).toEqual([
      ['content-type', 'text/plain; charset=utf-8'],
    ]);
    expect(text(channels.receiveChunk())).toBe(WORKER_EXITED_BODY);
    expect(channels.receiveChunk()).toBe(END_OF_STREAM);
  });

  it('ends the body when the worker is gone after the status', () => {
    let alive = true;
    const { writer, channels } = open(() => alive);
    writer.start(200, []);
    writer.body(Buffer.from('a'), true);

    expect(channels.receiveStart()?.status).toBe(200);
    expect(text(channels.receiveChunk())).toBe('a');

    alive = false;

    expect(channels.receiveChunk()).toBe(END_OF_STREAM);
  });

  it('still delivers what the worker posted before it exited', () => {
    const { writer, channels } = open(() => false);
    writer.start(202, []);
    writer.body(Buffer.from('done'), false);

    expect(channels.receiveStart()?.status).toBe(202);
    expect(text(channels.receiveChunk())).toBe('done');
    expect(channels.receiveChunk()).toBe(END_OF_STREAM);
  });
});
