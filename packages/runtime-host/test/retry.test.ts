/**
 * render-dash Runtime Host — Retry Policy Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { RemoteError, RemoteErrorKind } from '@render-dash/core';
import { withRetry } from '../src/index.js';

function failing(...errors: unknown[]): () => Promise<string> {
  let call = 0;
  return () => {
    const err = errors[call++];
    return err === undefined ? Promise.resolve('ok') : Promise.reject(err);
  };
}

const RATE_LIMITED = new RemoteError(RemoteErrorKind.RateLimited, 'slow down', { status: 429 });
const TIMEOUT = new RemoteError(RemoteErrorKind.Timeout, 'timed out');
const AUTH = new RemoteError(RemoteErrorKind.AuthFailure, 'denied', { status: 401 });

describe('withRetry', () => {
  it('returns the first result without sleeping', async () => {
    const sleep = vi.fn((_ms: number) => Promise.resolve());
    expect(await withRetry(failing(), { sleep })).toBe('ok');
    expect(sleep).not.toHaveBeenCalled();
  });

  it('retries a transient failure once after the default delay', async () => {
    const sleep = vi.fn((_ms: number) => Promise.resolve());
    const onRetry = vi.fn();
    expect(await withRetry(failing(RATE_LIMITED), { sleep, onRetry })).toBe('ok');
    expect(sleep).toHaveBeenCalledWith(500);
    expect(onRetry).toHaveBeenCalledWith(RATE_LIMITED, 500);
  });

  it('gives up after the second transient failure', async () => {
    const sleep = vi.fn((_ms: number) => Promise.resolve());
    await expect(withRetry(failing(RATE_LIMITED, TIMEOUT), { sleep, retryDelayMs: 10 })).rejects.toBe(TIMEOUT);
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(10);
  });

  it('surfaces terminal and unclassified errors immediately', async () => {
    const sleep = vi.fn((_ms: number) => Promise.resolve());
    await expect(withRetry(failing(AUTH), { sleep })).rejects.toBe(AUTH);
    const plain = new Error('bug');
    await expect(withRetry(failing(plain), { sleep })).rejects.toBe(plain);
    expect(sleep).not.toHaveBeenCalled();
  });
});
