/**
 * render-dash Runtime Host — RenderClient Tests
 *
 * fetch is replaced by an in-process handler; nothing leaves the process.
 *
 * Coverage:
 *   H1: requests carry the bearer credential and hit the right endpoints
 *   H2: wrapped and unwrapped bodies both parse
 *   H3: status codes are classified into exactly one error kind
 *   H4: transient failures are retried once after the fixed delay
 *   H5: terminal failures are not retried
 *   H6: network failures and timeouts are classified
 *   H7: bodies that break the contract are MalformedResponse
 *   H8: fetchCombined merges both reads
 */

import { describe, it, expect, vi } from 'vitest';
import { DeployState, RemoteError, RemoteErrorKind, ServiceState } from '@render-dash/core';
import { RenderClient, classifyStatus } from '../src/index.js';
import type { RenderClientOptions } from '../src/index.js';

// ---------------------------------------------------------------------------
// Fakes
// ---------------------------------------------------------------------------

interface RecordedRequest {
  readonly url: string;
  readonly init: RequestInit | undefined;
}

type Handler = (url: string, attempt: number) => Response | Promise<Response>;

function fakeFetch(handler: Handler): { impl: typeof fetch; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];
  const impl: typeof fetch = async (input, init) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    requests.push({ url, init });
    return handler(url, requests.filter((r) => r.url === url).length);
  };
  return { impl, requests };
}

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function text(body: string, status: number): Response {
  return new Response(body, { status });
}

function client(handler: Handler, extra: Partial<RenderClientOptions> = {}) {
  const { impl, requests } = fakeFetch(handler);
  const sleep = vi.fn((_ms: number) => Promise.resolve());
  const instance = new RenderClient({ apiKey: 'test-secret', fetch: impl, sleep, ...extra });
  return { client: instance, requests, sleep };
}

async function remoteErrorOf(promise: Promise<unknown>): Promise<RemoteError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof RemoteError) return err;
    throw err;
  }
  throw new Error('expected a RemoteError');
}

const SERVICE_BODY = {
  id: 'srv-1',
  name: 'Chat API',
  type: 'web_service',
  suspended: 'not_suspended',
  serviceDetails: { url: 'https://chat.onrender.com' },
};

const BASE = 'https://api.render.com/v1';

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('RenderClient', () => {
  it('H1: requests carry the bearer credential', async () => {
    const { client: c, requests } = client(() => json(SERVICE_BODY));
    await c.fetchServiceDetail('srv-1');

    expect(requests).toHaveLength(1);
    expect(requests[0]?.url).toBe(`${BASE}/services/srv-1`);
    expect(requests[0]?.init?.method).toBe('GET');
    expect(requests[0]?.init?.headers).toEqual({
      Accept: 'application/json',
      Authorization: 'Bearer test-secret',
    });
  });

  it('H1: a custom base URL loses its trailing slash', async () => {
    const { client: c, requests } = client(() => json([]), { baseUrl: 'http://render.test/v1/' });
    await c.listServices();
    expect(requests[0]?.url).toBe('http://render.test/v1/services?limit=100');
  });

  it('H2: an unwrapped service body parses', async () => {
    const { client: c } = client(() => json(SERVICE_BODY));
    expect(await c.fetchServiceDetail('srv-1')).toEqual({
      id: 'srv-1',
      name: 'Chat API',
      type: 'web_service',
      state: ServiceState.Running,
      url: 'https://chat.onrender.com',
    });
  });

  it('H2: a wrapped service body parses', async () => {
    const { client: c } = client(() => json({ service: { id: 'srv-1', suspended: 'suspended' } }));
    expect(await c.fetchServiceDetail('srv-1')).toEqual({
      id: 'srv-1',
      name: 'srv-1',
      type: 'unknown',
      state: ServiceState.Suspended,
    });
  });

  it('H2: the latest deploy comes from a wrapped list', async () => {
    const { client: c, requests } = client(() =>
      json([
        {
          deploy: {
            id: 'dep-1',
            status: 'build_in_progress',
            commit: { id: 'abc1234def', message: 'Fix login' },
            createdAt: '2026-01-01T09:00:00.000Z',
          },
          cursor: 'c1',
        },
      ]),
    );
    const deploy = await c.fetchLatestDeploy('srv-1');

    expect(requests[0]?.url).toBe(`${BASE}/services/srv-1/deploys?limit=1`);
    expect(deploy).toEqual({
      id: 'dep-1',
      deployState: DeployState.Building,
      commitRef: 'abc1234def',
      commitMessage: 'Fix login',
      startedAt: new Date('2026-01-01T09:00:00.000Z'),
    });
  });

  it('H2: no deploys → null; missing createdAt falls back to now', async () => {
    const now = new Date('2026-02-02T00:00:00.000Z');
    const empty = client(() => json([]));
    expect(await empty.client.fetchLatestDeploy('srv-1')).toBeNull();

    const undated = client(() => json([{ id: 'dep-2', status: 'live' }]), { now: () => now });
    expect(await undated.client.fetchLatestDeploy('srv-1')).toEqual({
      id: 'dep-2',
      deployState: DeployState.Live,
      startedAt: now,
    });
  });

  it('H2: listServices accepts both list shapes', async () => {
    const wrapped = client(() => json([{ service: { id: 'srv-1', name: 'Chat' }, cursor: 'c' }, { id: 'srv-2' }]));
    expect((await wrapped.client.listServices()).map((s) => s.id)).toEqual(['srv-1', 'srv-2']);

    const keyed = client(() => json({ services: [{ id: 'srv-3' }] }));
    expect((await keyed.client.listServices()).map((s) => s.id)).toEqual(['srv-3']);
  });

  it('H3: status codes are classified', () => {
    expect(classifyStatus(401)).toBe(RemoteErrorKind.AuthFailure);
    expect(classifyStatus(403)).toBe(RemoteErrorKind.AuthFailure);
    expect(classifyStatus(404)).toBe(RemoteErrorKind.NotFound);
    expect(classifyStatus(429)).toBe(RemoteErrorKind.RateLimited);
    expect(classifyStatus(500)).toBe(RemoteErrorKind.ServerError);
    expect(classifyStatus(503)).toBe(RemoteErrorKind.ServerError);
    expect(classifyStatus(400)).toBe(RemoteErrorKind.ClientError);
    expect(classifyStatus(418)).toBe(RemoteErrorKind.ClientError);
  });

  it('H4: a rate-limited call is retried once after 500ms', async () => {
    const onRetry = vi.fn();
    const { client: c, requests, sleep } = client(
      (_url, attempt) => (attempt === 1 ? json({ message: 'slow down' }, 429) : json(SERVICE_BODY)),
      { onRetry },
    );

    const detail = await c.fetchServiceDetail('srv-1');

    expect(detail.state).toBe(ServiceState.Running);
    expect(requests).toHaveLength(2);
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(500);
    expect(onRetry).toHaveBeenCalledTimes(1);
  });

  it('H4: a server error that persists surfaces after exactly two attempts', async () => {
    const { client: c, requests, sleep } = client(() => text('upstream down', 503), { retryDelayMs: 25 });
    const err = await remoteErrorOf(c.fetchServiceDetail('srv-1'));

    expect(err.kind).toBe(RemoteErrorKind.ServerError);
    expect(err.status).toBe(503);
    expect(err.path).toBe('/services/srv-1');
    expect(err.message).toBe('GET /services/srv-1 returned 503: upstream down');
    expect(requests).toHaveLength(2);
    expect(sleep).toHaveBeenCalledWith(25);
  });

  it('H4: long error bodies are truncated', async () => {
    const { client: c } = client(() => text('x'.repeat(300), 500));
    const err = await remoteErrorOf(c.fetchServiceDetail('srv-1'));
    expect(err.message).toBe(`GET /services/srv-1 returned 500: ${'x'.repeat(200)}…`);
  });

  it('H5: an auth failure is not retried and carries a hint', async () => {
    const { client: c, requests, sleep } = client(() => json({ message: 'Unauthorized' }, 401));
    const err = await remoteErrorOf(c.fetchServiceDetail('srv-1'));

    expect(err.kind).toBe(RemoteErrorKind.AuthFailure);
    expect(err.message).toBe('GET /services/srv-1 returned 401: Unauthorized (check render.api_key)');
    expect(requests).toHaveLength(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('H5: not-found and other 4xx are terminal', async () => {
    const missing = client(() => text('', 404));
    const notFound = await remoteErrorOf(missing.client.fetchServiceDetail('srv-x'));
    expect(notFound.kind).toBe(RemoteErrorKind.NotFound);
    expect(notFound.message).toBe('GET /services/srv-x returned 404 (check the service id in config.yaml)');
    expect(missing.requests).toHaveLength(1);

    const bad = client(() => json({ message: 'bad limit' }, 400));
    const clientError = await remoteErrorOf(bad.client.listServices());
    expect(clientError.kind).toBe(RemoteErrorKind.ClientError);
    expect(bad.requests).toHaveLength(1);
  });

  it('H6: a rejected fetch is a NetworkError and is retried', async () => {
    const { client: c, requests } = client(() => {
      throw new TypeError('fetch failed');
    });
    const err = await remoteErrorOf(c.fetchServiceDetail('srv-1'));

    expect(err.kind).toBe(RemoteErrorKind.NetworkError);
    expect(err.message).toBe('GET /services/srv-1 failed: fetch failed');
    expect(err.status).toBeUndefined();
    expect(requests).toHaveLength(2);
  });

  it('H6: a request that outlives the timeout is a Timeout', async () => {
    const hanging: typeof fetch = (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
      });
    const sleep = vi.fn((_ms: number) => Promise.resolve());
    const c = new RenderClient({ apiKey: 'test-secret', fetch: hanging, sleep, timeoutMs: 5 });

    const err = await remoteErrorOf(c.fetchServiceDetail('srv-1'));

    expect(err.kind).toBe(RemoteErrorKind.Timeout);
    expect(err.message).toBe('GET /services/srv-1 timed out after 5ms');
    expect(sleep).toHaveBeenCalledTimes(1);
  });

  it('H7: a non-JSON body is MalformedResponse and not retried', async () => {
    const { client: c, requests } = client(() => text('<html>oops</html>', 200));
    const err = await remoteErrorOf(c.fetchServiceDetail('srv-1'));

    expect(err.kind).toBe(RemoteErrorKind.MalformedResponse);
    expect(err.message).toBe('GET /services/srv-1 returned a non-JSON body');
    expect(requests).toHaveLength(1);
  });

  it('H7: a body that breaks the schema is MalformedResponse', async () => {
    const { client: c } = client(() => json({ name: 'no id here' }));
    const err = await remoteErrorOf(c.fetchServiceDetail('srv-1'));
    expect(err.kind).toBe(RemoteErrorKind.MalformedResponse);
    expect(err.message.startsWith('GET /services/srv-1 returned an unexpected body')).toBe(true);
  });

  it('H8: fetchCombined merges both reads', async () => {
    const { client: c } = client((url) =>
      url.endsWith('/deploys?limit=1')
        ? json([{ id: 'dep-1', status: 'live', createdAt: '2026-01-01T09:00:00.000Z' }])
        : json(SERVICE_BODY),
    );
    const status = await c.fetchCombined('srv-1');
    expect(status.detail.state).toBe(ServiceState.Running);
    expect(status.latestDeploy?.deployState).toBe(DeployState.Live);
  });

  it('H8: fetchCombined reports the service error when both reads fail', async () => {
    const { client: c } = client((url) => (url.endsWith('/deploys?limit=1') ? text('', 500) : text('', 404)));
    const err = await remoteErrorOf(c.fetchCombined('srv-1'));
    expect(err.kind).toBe(RemoteErrorKind.NotFound);
  });
});
