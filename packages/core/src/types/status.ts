/**
 * render-dash Core — Status Types
 *
 * The remote read results (ServiceDetail, DeployDetail, RemoteStatus) and
 * the cached per-service view built from them (StatusSnapshot).
 */

import type { RemoteError } from './errors.js';

// ---------------------------------------------------------------------------
// States
// ---------------------------------------------------------------------------

export enum ServiceState {
  Running = 'Running',
  Deploying = 'Deploying',
  Suspended = 'Suspended',
  Failed = 'Failed',
  /** The only valid state before the first successful fetch. */
  Unknown = 'Unknown',
}

export enum DeployState {
  Live = 'Live',
  Building = 'Building',
  Failed = 'Failed',
  Created = 'Created',
  Canceled = 'Canceled',
}

/** Deploy states that mean a rollout has not settled yet. */
export function isDeployInProgress(state: DeployState): boolean {
  return state === DeployState.Building || state === DeployState.Created;
}

// ---------------------------------------------------------------------------
// Remote Read Results
// ---------------------------------------------------------------------------

export interface ServiceDetail {
  readonly id: string;
  readonly name: string;
  /** Remote service type, e.g. `web_service`, `cron_job`. */
  readonly type: string;
  readonly state: ServiceState;
  readonly url?: string | undefined;
}

export interface DeployDetail {
  readonly id: string;
  readonly deployState: DeployState;
  readonly commitRef?: string | undefined;
  readonly commitMessage?: string | undefined;
  readonly startedAt: Date;
  readonly finishedAt?: Date | undefined;
}

/** Combined result of one service-detail read and one latest-deploy read. */
export interface RemoteStatus {
  readonly detail: ServiceDetail;
  /** `null` when the service has never deployed. */
  readonly latestDeploy: DeployDetail | null;
}

// ---------------------------------------------------------------------------
// Snapshot
// ---------------------------------------------------------------------------

/**
 * Latest known state of one configured service.
 *
 * Snapshots are frozen. The status cache replaces the whole object on every
 * change, so a reader holds either the old or the new snapshot, never a mix.
 */
export interface StatusSnapshot {
  readonly serviceId: string;
  readonly serviceState: ServiceState;
  readonly serviceUrl?: string | undefined;
  readonly remoteName?: string | undefined;
  readonly serviceType?: string | undefined;
  readonly latestDeploy?: DeployDetail | undefined;
  /** Most recent completed attempt, successful or not. */
  readonly lastFetchedAt?: Date | undefined;
  /** Most recent successful attempt. */
  readonly lastSucceededAt?: Date | undefined;
  /** Set by a failed attempt, cleared by the next success. */
  readonly lastError?: RemoteError | undefined;
  readonly inFlight: boolean;
}

/** Result of one fetch attempt, as handed to StatusCache.completeFetch(). */
export type FetchOutcome =
  | { readonly ok: true; readonly value: RemoteStatus }
  | { readonly ok: false; readonly error: RemoteError };
