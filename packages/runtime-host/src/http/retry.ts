/**
 * render-dash Runtime Host — Retry Policy
 *
 * At most one automatic retry, after a fixed backoff, and only for
 * transient RemoteError kinds (RateLimited, ServerError, NetworkError,
 * Timeout). Terminal kinds and non-RemoteError throws surface immediately.
 */

import { isRemoteError } from '@render-dash/core';
import type { RemoteError } from '@render-dash/core';

export const DEFAULT_RETRY_DELAY_MS = 500;

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface RetryOptions {
  /** Delay before the single retry (default 500ms). */
  readonly retryDelayMs?: number | undefined;
  /** Injected for tests. */
  readonly sleep?: Sleep | undefined;
  /** Called before the retry is attempted. */
  readonly onRetry?: ((error: RemoteError, delayMs: number) => void) | undefined;
}

export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (!isRemoteError(err) || !err.transient) throw err;

    const delayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    options.onRetry?.(err, delayMs);
    await (options.sleep ?? defaultSleep)(delayMs);
    return fn();
  }
}
