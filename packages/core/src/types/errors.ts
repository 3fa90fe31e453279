/**
 * render-dash Core — Remote Error Taxonomy
 *
 * Every failure of a remote read is classified into exactly one
 * RemoteErrorKind. The kind decides whether the client retries:
 *
 *   transient — RateLimited, ServerError, NetworkError, Timeout
 *               (retried once after a fixed backoff)
 *   terminal  — AuthFailure, NotFound, ClientError, MalformedResponse
 *               (surfaced immediately)
 */

// ---------------------------------------------------------------------------
// Error Kind
// ---------------------------------------------------------------------------

export enum RemoteErrorKind {
  /** 401 / 403 — the bearer credential was rejected. */
  AuthFailure = 'AuthFailure',
  /** 404 — the service id is misconfigured or the service was deleted. */
  NotFound = 'NotFound',
  /** 429 */
  RateLimited = 'RateLimited',
  /** Any 5xx response. */
  ServerError = 'ServerError',
  /** Any other 4xx response. */
  ClientError = 'ClientError',
  /** The request never produced a response (DNS, refused, reset). */
  NetworkError = 'NetworkError',
  /** The per-call timeout elapsed before a response arrived. */
  Timeout = 'Timeout',
  /** The response body violated the remote contract. */
  MalformedResponse = 'MalformedResponse',
}

const TRANSIENT_KINDS: ReadonlySet<RemoteErrorKind> = new Set([
  RemoteErrorKind.RateLimited,
  RemoteErrorKind.ServerError,
  RemoteErrorKind.NetworkError,
  RemoteErrorKind.Timeout,
]);

export function isTransientKind(kind: RemoteErrorKind): boolean {
  return TRANSIENT_KINDS.has(kind);
}

// ---------------------------------------------------------------------------
// Remote Error
// ---------------------------------------------------------------------------

export interface RemoteErrorOptions {
  /** HTTP status, when the failure came from a response. */
  readonly status?: number | undefined;
  /** Request path that failed, e.g. `/services/srv-1/deploys`. */
  readonly path?: string | undefined;
  readonly cause?: unknown;
}

/**
 * A classified failure of one remote read.
 *
 * Thrown by RemoteStatusClient implementations and stored verbatim in a
 * StatusSnapshot's `lastError`.
 */
export class RemoteError extends Error {
  readonly kind: RemoteErrorKind;
  readonly status: number | undefined;
  readonly path: string | undefined;

  constructor(kind: RemoteErrorKind, message: string, options: RemoteErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'RemoteError';
    this.kind = kind;
    this.status = options.status;
    this.path = options.path;
  }

  get transient(): boolean {
    return isTransientKind(this.kind);
  }
}

export function isRemoteError(err: unknown): err is RemoteError {
  return err instanceof RemoteError;
}

/**
 * Wrap anything thrown by a client into a RemoteError.
 *
 * Non-RemoteError values indicate a client bug rather than a remote
 * failure; they are reported as MalformedResponse so the snapshot still
 * carries a classified error.
 */
export function toRemoteError(err: unknown): RemoteError {
  if (err instanceof RemoteError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new RemoteError(RemoteErrorKind.MalformedResponse, `Unexpected client failure: ${message}`, {
    cause: err,
  });
}
