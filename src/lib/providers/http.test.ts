import { describe, it, expect } from 'vitest';
import { AttemptDeadline, joinUrl, postEventStream, type FetchLike } from './http.js';
import { guardEventStream } from './guard.js';
import { ProviderContractError } from './errors.js';
import type { CanonicalEvent } from './providerContract.js';
import { collect, jsonResponse, queuedFetch, sseResponse } from '../testing/streams.js';

const ctx = { provider: 'openai', api: 'openai-completions' } as const;

function deadline(parent = new AbortController().signal, timeoutMs = 1000, idleTimeoutMs = 1000) {
  return new AttemptDeadline(parent, { timeoutMs, idleTimeoutMs }, ctx);
}

describe('joinUrl', () => {
  it('joins without doubling slashes', () => {
    expect(joinUrl('https://api.example.test/v1/', '/chat/completions')).toBe(
      'https://api.example.test/v1/chat/completions'
    );
  });
});

describe('postEventStream', () => {
  it('sends JSON and asks for an event stream', async () => {
    const { fetchImpl, calls } = queuedFetch([sseResponse('data: [DONE]\n\n')]);
    const scope = deadline();

    await postEventStream('https://api.example.test/v1/x', { authorization: 'Bearer test-key' }, { a: 1 }, {
      fetchImpl,
      deadline: scope,
      ctx,
    });
    scope.dispose();

    expect(calls).toEqual([
      {
        url: 'https://api.example.test/v1/x',
        headers: {
          'content-type': 'application/json',
          accept: 'text/event-stream',
          authorization: 'Bearer test-key',
        },
        body: { a: 1 },
      },
    ]);
  });

  it('throws a classified error for a non-2xx status', async () => {
    const { fetchImpl } = queuedFetch([jsonResponse(401, { error: { message: 'Incorrect API key' } })]);
    const scope = deadline();

    const result = postEventStream('https://api.example.test/v1/x', {}, {}, { fetchImpl, deadline: scope, ctx });

    await expect(result).rejects.toMatchObject({
      kind: 'auth',
      status: 401,
      message: 'openai returned HTTP 401: Incorrect API key',
    });
    scope.dispose();
  });

  it('times out as a transient network error when no response arrives', async () => {
    const fetchImpl: FetchLike = () => new Promise<Response>(() => undefined);
    const scope = deadline(undefined, 20);

    const result = postEventStream('https://api.example.test/v1/x', {}, {}, { fetchImpl, deadline: scope, ctx });

    await expect(result).rejects.toMatchObject({
      kind: 'network',
      message: 'timed out after 20ms waiting for response',
    });
    scope.dispose();
  });

  it('reports a caller abort as aborted', async () => {
    const parent = new AbortController();
    const fetchImpl: FetchLike = () => new Promise<Response>(() => undefined);
    const scope = deadline(parent.signal);

    const result = postEventStream('https://api.example.test/v1/x', {}, {}, { fetchImpl, deadline: scope, ctx });
    parent.abort();

    await expect(result).rejects.toMatchObject({ kind: 'aborted' });
    scope.dispose();
  });
});

describe('AttemptDeadline', () => {
  it('switches to the idle timeout once connected', async () => {
    const scope = deadline(undefined, 1000, 15);
    scope.markConnected();

    await new Promise((resolve) => setTimeout(resolve, 40));

    expect(scope.signal.aborted).toBe(true);
    expect(scope.signal.reason).toBeInstanceOf(ProviderContractError);
    expect(scope.signal.reason).toMatchObject({
      kind: 'network',
      message: 'timed out after 15ms waiting for stream data',
    });
    scope.dispose();
  });
});

describe('guardEventStream', () => {
  async function* events(items: CanonicalEvent[], failure?: Error): AsyncGenerator<CanonicalEvent> {
    yield* items;
    if (failure) throw failure;
  }

  it('stops after the first terminal event', async () => {
    const out = await collect(
      guardEventStream(
        events([
          { type: 'text_delta', text: 'hi' },
          { type: 'finish', reason: 'stop' },
          { type: 'text_delta', text: 'late' },
        ]),
        ctx
      )
    );

    expect(out).toEqual([
      { type: 'text_delta', text: 'hi' },
      { type: 'finish', reason: 'stop' },
    ]);
  });

  it('turns a thrown error into a terminal error event', async () => {
    const out = await collect(guardEventStream(events([], new TypeError('fetch failed')), ctx));

    expect(out).toHaveLength(1);
    expect(out[0]).toMatchObject({ type: 'error', error: { kind: 'network', provider: 'openai' } });
  });

  it('reports a stream without a terminal event as malformed', async () => {
    const out = await collect(guardEventStream(events([{ type: 'text_delta', text: 'cut' }]), ctx));

    expect(out[1]).toMatchObject({
      type: 'error',
      error: { kind: 'malformed_stream', message: 'stream ended without a finish reason' },
    });
  });
});
