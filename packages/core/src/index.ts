/**
 * @render-dash/core
 *
 * Service resolver, status cache and synchronization engine.
 *
 * This package is side-effect free: no node:fs, no fetch, no child
 * processes. The remote client, config loading and log persistence are
 * provided by @render-dash/runtime-host and injected at construction time.
 */

// Types
export type { MatchResult, MatchTier, ServiceRecord, ServiceStore } from './types/service.js';
export { DEFAULT_PRIORITY } from './types/service.js';

export type {
  DeployDetail,
  FetchOutcome,
  RemoteStatus,
  ServiceDetail,
  StatusSnapshot,
} from './types/status.js';
export { DeployState, ServiceState, isDeployInProgress } from './types/status.js';

export type { RemoteErrorOptions } from './types/errors.js';
export { RemoteError, RemoteErrorKind, isRemoteError, isTransientKind, toRemoteError } from './types/errors.js';

// Remote client contract (implementation lives in runtime-host)
export type { RemoteStatusClient, StatusReads } from './remote/client.js';
export { fetchCombined } from './remote/client.js';

// Log sink contract (implementation lives in runtime-host)
export type { RefreshReason, SyncLogEntry, SyncLogSink } from './logging/sync-log.js';
export { nullSyncLogSink } from './logging/sync-log.js';

// Implementations
export { compareRecords, resolveService, sortRecords } from './resolver/resolve.js';
export type { Clock } from './cache/status-cache.js';
export { StatusCache, unknownSnapshot } from './cache/status-cache.js';
export type {
  CycleSummary,
  EnginePhase,
  RefreshServiceOptions,
  SyncEngineOptions,
} from './sync/engine.js';
export { SyncEngine } from './sync/engine.js';
