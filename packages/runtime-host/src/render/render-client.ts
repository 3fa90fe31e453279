/**
 * render-dash Runtime Host — Render API Client
 *
 * Implements the RemoteStatusClient contract from @render-dash/core against
 * the Render REST API (https://api.render.com/v1).
 *
 * Every request:
 *   - carries the bearer credential,
 *   - is aborted after `timeoutMs` and reported as Timeout,
 *   - has its response classified into exactly one RemoteErrorKind,
 *   - is validated against a zod schema (violations are MalformedResponse),
 *   - is retried at most once, after a fixed delay, for transient kinds.
 *
 * fetch is injected so tests never touch the network.
 */

import type { z } from 'zod';
import { RemoteError, RemoteErrorKind, fetchCombined } from '@render-dash/core';
import type { DeployDetail, RemoteStatus, RemoteStatusClient, ServiceDetail } from '@render-dash/core';
import { withRetry } from '../http/retry.js';
import type { Sleep } from '../http/retry.js';
import {
  DeployListResponseSchema,
  ServiceListResponseSchema,
  ServiceResponseSchema,
  toDeployDetail,
  toServiceDetail,
  unwrapDeployList,
  unwrapService,
  unwrapServiceList,
} from './schema.js';

export const RENDER_API_BASE_URL = 'https://api.render.com/v1';
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
/** Page size for GET /services. */
export const SERVICE_LIST_LIMIT = 100;

export interface RenderClientOptions {
  readonly apiKey: string;
  readonly baseUrl?: string | undefined;
  readonly timeoutMs?: number | undefined;
  readonly retryDelayMs?: number | undefined;
  readonly fetch?: typeof fetch | undefined;
  readonly sleep?: Sleep | undefined;
  /** Fallback start time for deploys that carry no createdAt. */
  readonly now?: (() => Date) | undefined;
  readonly onRetry?: ((error: RemoteError, delayMs: number) => void) | undefined;
}

// ---------------------------------------------------------------------------
// Status Classification
// ---------------------------------------------------------------------------

/** Map a non-2xx HTTP status to its error kind. */
export function classifyStatus(status: number): RemoteErrorKind {
  if (status === 401 || status === 403) return RemoteErrorKind.AuthFailure;
  if (status === 404) return RemoteErrorKind.NotFound;
  if (status === 429) return RemoteErrorKind.RateLimited;
  if (status >= 500) return RemoteErrorKind.ServerError;
  return RemoteErrorKind.ClientError;
}

const STATUS_HINTS: Partial<Record<RemoteErrorKind, string>> = {
  [RemoteErrorKind.AuthFailure]: 'check render.api_key',
  [RemoteErrorKind.NotFound]: 'check the service id in config.yaml',
};

// ---------------------------------------------------------------------------
// RenderClient
// ---------------------------------------------------------------------------

export class RenderClient implements RemoteStatusClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => Date;

  constructor(private readonly options: RenderClientOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = (options.baseUrl ?? RENDER_API_BASE_URL).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? globalThis.fetch;
    this.now = options.now ?? (() => new Date());
  }

  async fetchServiceDetail(id: string): Promise<ServiceDetail> {
    const data = await this.get(`/services/${encodeURIComponent(id)}`, ServiceResponseSchema);
    return toServiceDetail(unwrapService(data));
  }

  async fetchLatestDeploy(id: string): Promise<DeployDetail | null> {
    const data = await this.get(`/services/${encodeURIComponent(id)}/deploys?limit=1`, DeployListResponseSchema);
    const [latest] = unwrapDeployList(data);
    return latest === undefined ? null : toDeployDetail(latest, this.now());
  }

  fetchCombined(id: string): Promise<RemoteStatus> {
    return fetchCombined(this, id);
  }

  async listServices(): Promise<ServiceDetail[]> {
    const data = await this.get(`/services?limit=${SERVICE_LIST_LIMIT}`, ServiceListResponseSchema);
    return unwrapServiceList(data).map(toServiceDetail);
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private get<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    return withRetry(() => this.request(path, schema), {
      retryDelayMs: this.options.retryDelayMs,
      sleep: this.options.sleep,
      onRetry: this.options.onRetry,
    });
  }

  private async request<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);

    let status: number;
    let text: string;
    try {
      const response = await this.fetchImpl(this.baseUrl + path, {
        method: 'GET',
        headers: {
          Accept: 'application/json',
          Authorization: `Bearer ${this.apiKey}`,
        },
        signal: controller.signal,
      });
      status = response.status;
      text = await response.text();
    } catch (err) {
      if (timedOut) {
        throw new RemoteError(RemoteErrorKind.Timeout, `GET ${path} timed out after ${this.timeoutMs}ms`, {
          path,
          cause: err,
        });
      }
      const message = err instanceof Error ? err.message : String(err);
      throw new RemoteError(RemoteErrorKind.NetworkError, `GET ${path} failed: ${message}`, {
        path,
        cause: err,
      });
    } finally {
      clearTimeout(timer);
    }

    if (status < 200 || status >= 300) {
      const kind = classifyStatus(status);
      const hint = STATUS_HINTS[kind];
      const detail = summarizeBody(text);
      throw new RemoteError(
        kind,
        `GET ${path} returned ${status}` + (detail !== '' ? `: ${detail}` : '') + (hint !== undefined ? ` (${hint})` : ''),
        { status, path },
      );
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch (err) {
      throw new RemoteError(RemoteErrorKind.MalformedResponse, `GET ${path} returned a non-JSON body`, {
        status,
        path,
        cause: err,
      });
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      const [issue] = parsed.error.issues;
      const where = issue !== undefined && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
      throw new RemoteError(
        RemoteErrorKind.MalformedResponse,
        `GET ${path} returned an unexpected body${where}: ${issue?.message ?? 'invalid'}`,
        { status, path, cause: parsed.error },
      );
    }
    return parsed.data;
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

const MAX_DETAIL_LENGTH = 200;

/** Render error bodies are `{ "message": "..." }`; fall back to raw text. */
function summarizeBody(text: string): string {
  const detail = errorMessageOf(text) ?? text.trim();
  return detail.length > MAX_DETAIL_LENGTH ? `${detail.slice(0, MAX_DETAIL_LENGTH)}…` : detail;
}

function errorMessageOf(text: string): string | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return undefined;
  }
  if (parsed !== null && typeof parsed === 'object' && 'message' in parsed && typeof parsed.message === 'string') {
    return parsed.message;
  }
  return undefined;
}
