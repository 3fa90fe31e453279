/**
 * render-dash Core — Status Cache
 *
 * The single source of truth for per-service status. Every presentation
 * sink reads from here; only the two atomic operations below mutate it.
 *
 *   beginFetch(id)            gate: marks the id in-flight, or refuses if it
 *                             already is (at most one outstanding fetch per id)
 *   completeFetch(id, outcome) clears in-flight, stamps lastFetchedAt, and
 *                             either replaces the state fields (success) or
 *                             records lastError while keeping the last known
 *                             good fields (failure)
 *
 * Snapshots are frozen and replaced wholesale. All cache logic is
 * synchronous, so on a single event loop no reader can observe a
 * half-applied update.
 */

import type { FetchOutcome, StatusSnapshot } from '../types/status.js';
import { ServiceState } from '../types/status.js';

export type Clock = () => Date;

const systemClock: Clock = () => new Date();

export function unknownSnapshot(serviceId: string): StatusSnapshot {
  return Object.freeze({ serviceId, serviceState: ServiceState.Unknown, inFlight: false });
}

export class StatusCache {
  private readonly snapshots = new Map<string, StatusSnapshot>();

  constructor(private readonly clock: Clock = systemClock) {}

  /** Snapshot for `id`; the Unknown snapshot if never populated. */
  get(id: string): StatusSnapshot {
    return this.snapshots.get(id) ?? unknownSnapshot(id);
  }

  /** True once any attempt (successful or not) has completed for `id`. */
  has(id: string): boolean {
    return this.snapshots.get(id)?.lastFetchedAt !== undefined;
  }

  /** Ids with an entry, in insertion order. */
  ids(): string[] {
    return [...this.snapshots.keys()];
  }

  entries(): Array<[string, StatusSnapshot]> {
    return [...this.snapshots.entries()];
  }

  /**
   * Create Unknown entries for ids not yet present. Existing entries are
   * left untouched.
   */
  register(ids: Iterable<string>): void {
    for (const id of ids) {
      if (!this.snapshots.has(id)) this.snapshots.set(id, unknownSnapshot(id));
    }
  }

  /**
   * Mark `id` in-flight. Returns false, without changing anything, if a
   * fetch for `id` is already outstanding.
   */
  beginFetch(id: string): boolean {
    const current = this.get(id);
    if (current.inFlight) return false;
    this.snapshots.set(id, Object.freeze({ ...current, inFlight: true }));
    return true;
  }

  completeFetch(id: string, outcome: FetchOutcome): StatusSnapshot {
    const current = this.get(id);
    const now = this.clock();

    let next: StatusSnapshot;
    if (outcome.ok) {
      const { detail, latestDeploy } = outcome.value;
      next = {
        serviceId: id,
        serviceState: detail.state,
        // A success that lacks a URL keeps the one already known.
        serviceUrl: detail.url ?? current.serviceUrl,
        remoteName: detail.name,
        serviceType: detail.type,
        latestDeploy: latestDeploy ?? undefined,
        lastFetchedAt: now,
        lastSucceededAt: now,
        lastError: undefined,
        inFlight: false,
      };
    } else {
      next = {
        ...current,
        lastFetchedAt: now,
        lastError: outcome.error,
        inFlight: false,
      };
    }

    const frozen = Object.freeze(next);
    this.snapshots.set(id, frozen);
    return frozen;
  }
}
