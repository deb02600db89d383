import { describe, expect, it, vi } from 'vitest';
import type { ExtractedToken } from '@otp-relay/domain';
import { BackendClient } from '../backend-client.js';

const token: ExtractedToken = {
  value: 'test-access-token',
  sourceTier: 'persistent',
  sourceKey: 'accessToken',
  extractedAt: new Date('2026-01-05T09:00:00.000Z')
};

function clientWith(fetchImpl: typeof fetch, sleep = vi.fn(async (_ms: number) => {})) {
  const client = new BackendClient('http://backend.test/', {
    source: 'vendor-login',
    maxAttempts: 4,
    backoffMs: 100,
    maxBackoffMs: 1_000,
    fetchImpl,
    sleep,
    now: () => new Date('2026-01-05T09:00:01.000Z')
  });
  return { client, sleep };
}

describe('backend token dispatch', () => {
  it('retries transient 5xx responses and succeeds on the third attempt', async () => {
    const fetchImpl = vi.fn<typeof fetch>()
      .mockResolvedValueOnce(new Response('upstream down', { status: 500 }))
      .mockResolvedValueOnce(new Response('upstream down', { status: 500 }))
      .mockResolvedValueOnce(new Response('{"ok":true}', { status: 200 }));
    const { client, sleep } = clientWith(fetchImpl);

    const result = await client.sendAccessToken(token);

    expect(result).toEqual({ status: 'success', attempts: 3 });
    expect(fetchImpl).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200]);
  });

  it('fails immediately on a permanent 401 rejection', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(new Response('bad key', { status: 401 }));
    const { client, sleep } = clientWith(fetchImpl);

    const result = await client.sendAccessToken(token);

    expect(result).toEqual({
      status: 'failed',
      attempts: 1,
      lastError: { kind: 'BackendRejected', status: 401, message: 'backend_rejected:401:bad key' }
    });
    expect(sleep).not.toHaveBeenCalled();
  });

  it('posts the token with a fixed source tag and dispatch timestamp', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(new Response(null, { status: 204 }));
    const { client } = clientWith(fetchImpl);

    await client.sendAccessToken(token);

    const call = fetchImpl.mock.calls[0];
    const init = call?.[1];
    expect(call?.[0]).toBe('http://backend.test/api/auth/token');
    expect(init?.method).toBe('POST');
    expect(JSON.parse(String(init?.body))).toEqual({
      access_token: 'test-access-token',
      source: 'vendor-login',
      timestamp: '2026-01-05T09:00:01.000Z'
    });
  });

  it('treats connection failures as transient and gives up after the attempt budget', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockRejectedValue(new TypeError('fetch failed'));
    const { client, sleep } = clientWith(fetchImpl);

    const result = await client.sendAccessToken(token);

    expect(result).toEqual({
      status: 'failed',
      attempts: 4,
      lastError: { kind: 'BackendTransientFailure', message: 'backend_unreachable:fetch failed' }
    });
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200, 400]);
  });

  it('retries rate limiting and honours Retry-After within the cap', async () => {
    const fetchImpl = vi.fn<typeof fetch>()
      .mockResolvedValueOnce(new Response('slow down', { status: 429, headers: { 'Retry-After': '30' } }))
      .mockResolvedValueOnce(new Response('{}', { status: 201 }));
    const { client, sleep } = clientWith(fetchImpl);

    const result = await client.sendAccessToken(token);

    expect(result).toEqual({ status: 'success', attempts: 2 });
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1_000]);
  });

  it('refuses to send a placeholder token', async () => {
    const fetchImpl = vi.fn<typeof fetch>();
    const { client } = clientWith(fetchImpl);

    const result = await client.sendAccessToken({ ...token, value: 'undefined' });

    expect(result).toEqual({
      status: 'failed',
      attempts: 0,
      lastError: { kind: 'BackendRejected', message: 'token_empty' }
    });
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it('stops retrying once the caller aborts', async () => {
    const controller = new AbortController();
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(new Response('down', { status: 503 }));
    const sleep = vi.fn(async (_ms: number) => {
      controller.abort();
    });
    const { client } = clientWith(fetchImpl, sleep);

    const result = await client.sendAccessToken(token, { signal: controller.signal });

    expect(result.status).toBe('failed');
    expect(result.attempts).toBe(1);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it('treats a body that fails mid-read as transient and retries', async () => {
    const broken = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.error(new TypeError('terminated'));
      }
    });
    const fetchImpl = vi.fn<typeof fetch>()
      .mockResolvedValueOnce(new Response(broken, { status: 503 }))
      .mockResolvedValueOnce(new Response('{}', { status: 200 }));
    const { client, sleep } = clientWith(fetchImpl);

    const result = await client.sendAccessToken(token);

    expect(result).toEqual({ status: 'success', attempts: 2 });
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100]);
  });

  it('reports a body read failure on the last attempt as a result', async () => {
    const fetchImpl = vi.fn<typeof fetch>(
      async () =>
        new Response(
          new ReadableStream<Uint8Array>({
            start(controller) {
              controller.error(new TypeError('terminated'));
            }
          }),
          { status: 502 }
        )
    );
    const { client } = clientWith(fetchImpl);

    const result = await client.sendAccessToken(token);

    expect(result).toEqual({
      status: 'failed',
      attempts: 4,
      lastError: { kind: 'BackendTransientFailure', status: 502, message: 'backend_read_failed:502:terminated' }
    });
  });

  it('cancels an in-flight request when the caller aborts', async () => {
    const controller = new AbortController();
    const fetchImpl = vi.fn<typeof fetch>(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        })
    );
    const client = new BackendClient('http://backend.test', { fetchImpl, requestTimeoutMs: 60_000 });
    setTimeout(() => controller.abort(), 20);

    const startedAt = Date.now();
    const result = await client.sendAccessToken(token, { signal: controller.signal });

    expect(Date.now() - startedAt).toBeLessThan(1_000);
    expect(result).toEqual({
      status: 'failed',
      attempts: 1,
      lastError: { kind: 'BackendTransientFailure', message: 'backend_unreachable:aborted' }
    });
  });

  it('cuts the backoff short when the caller aborts', async () => {
    const controller = new AbortController();
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response('down', { status: 503 }));
    const client = new BackendClient('http://backend.test', { fetchImpl, backoffMs: 10_000, maxBackoffMs: 10_000 });
    setTimeout(() => controller.abort(), 20);

    const startedAt = Date.now();
    const result = await client.sendAccessToken(token, { signal: controller.signal });

    expect(Date.now() - startedAt).toBeLessThan(1_000);
    expect(result.status).toBe('failed');
    expect(result.attempts).toBe(1);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it('checks backend reachability through its health endpoint', async () => {
    const fetchImpl = vi.fn<typeof fetch>()
      .mockResolvedValueOnce(new Response('{"status":"ok"}', { status: 200 }))
      .mockRejectedValueOnce(new TypeError('fetch failed'));
    const { client } = clientWith(fetchImpl);

    expect(await client.verifyConnection()).toBe(true);
    expect(await client.verifyConnection()).toBe(false);
    expect(fetchImpl.mock.calls[0]?.[0]).toBe('http://backend.test/health');
  });
});
