/**
 * render-dash Core — Synchronization Engine
 *
 * Runs refresh cycles against a RemoteStatusClient and writes every result
 * into the StatusCache.
 *
 * Cycle state machine (engine-wide, not per service):
 *
 *   idle ──(timer | manual)──▶ running ──(all fetches settled)──▶ idle
 *                                 │
 *                                 └─ manual trigger (or a restart) while
 *                                    running sets a single pending flag;
 *                                    when the cycle settles exactly one
 *                                    follow-up cycle runs
 *
 * A timer tick while running is dropped. Within a cycle every configured id
 * is passed through StatusCache.beginFetch(); granted ids are fetched
 * concurrently and joined with Promise.allSettled, so one service's failure
 * never cancels a sibling or the cycle.
 *
 * Shutdown never aborts an in-flight fetch: stop() waits for the running
 * cycle to settle so no partially-applied result is left behind.
 */

import type { StatusCache } from '../cache/status-cache.js';
import type { RemoteStatusClient } from '../remote/client.js';
import type { RefreshReason, SyncLogEntry, SyncLogSink } from '../logging/sync-log.js';
import { nullSyncLogSink } from '../logging/sync-log.js';
import { toRemoteError } from '../types/errors.js';
import type { FetchOutcome, StatusSnapshot } from '../types/status.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type EnginePhase = 'idle' | 'running';

export interface CycleSummary {
  readonly cycle: number;
  readonly reason: RefreshReason;
  readonly succeeded: number;
  readonly failed: number;
  /** Ids whose previous fetch was still outstanding. */
  readonly skipped: number;
  readonly startedAt: number;
  readonly durationMs: number;
}

export interface SyncEngineOptions {
  readonly logSink?: SyncLogSink | undefined;
  /** Millisecond clock used for staleness and durations. */
  readonly now?: (() => number) | undefined;
}

export interface RefreshServiceOptions {
  /** Fetch even when the cache already holds a completed attempt. */
  readonly force?: boolean | undefined;
}

type CycleListener = (summary: CycleSummary) => void;

// ---------------------------------------------------------------------------
// SyncEngine
// ---------------------------------------------------------------------------

export class SyncEngine {
  private serviceIds: string[] = [];
  private timer: ReturnType<typeof setInterval> | null = null;
  private active: Promise<void> | null = null;
  private pendingFollowUp = false;
  private stopped = false;
  private cycleSeq = 0;
  private lastCycleStartedAt: number | null = null;
  private readonly listeners = new Set<CycleListener>();
  private readonly logSink: SyncLogSink;
  private readonly now: () => number;

  constructor(
    private readonly cache: StatusCache,
    private readonly client: Pick<RemoteStatusClient, 'fetchCombined'>,
    options: SyncEngineOptions = {},
  ) {
    this.logSink = options.logSink ?? nullSyncLogSink;
    this.now = options.now ?? Date.now;
  }

  get phase(): EnginePhase {
    return this.active === null ? 'idle' : 'running';
  }

  /** Number of cycles started since construction. */
  get cycleCount(): number {
    return this.cycleSeq;
  }

  /**
   * Register `serviceIds` in the cache, run one cycle immediately, then one
   * every `intervalMs`. When a cycle from before the last stop() is still
   * settling, the immediate cycle runs as its follow-up over the new ids.
   */
  start(serviceIds: Iterable<string>, intervalMs: number): void {
    if (this.timer !== null) {
      throw new Error('SyncEngine.start: engine is already running');
    }
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
      throw new RangeError(`SyncEngine.start: interval must be a positive number of ms, got ${intervalMs}`);
    }

    this.serviceIds = [...new Set(serviceIds)];
    this.cache.register(this.serviceIds);
    this.stopped = false;
    this.timer = setInterval(() => this.trigger('timer'), intervalMs);
    this.trigger('startup');
  }

  /** Fire-and-forget; never blocks the caller. */
  triggerManualRefresh(): void {
    this.trigger('manual');
  }

  /**
   * Stop the timer and drop any pending follow-up cycle. Resolves once the
   * running cycle (if any) has settled.
   */
  async stop(): Promise<void> {
    this.stopped = true;
    this.pendingFollowUp = false;
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
    }
    await this.whenIdle();
  }

  /** Resolves when no cycle is running, including any coalesced follow-up. */
  whenIdle(): Promise<void> {
    return this.active ?? Promise.resolve();
  }

  /** Milliseconds since the most recent cycle began; null before the first. */
  timeSinceLastCycleStart(): number | null {
    if (this.lastCycleStartedAt === null) return null;
    return Math.max(0, this.now() - this.lastCycleStartedAt);
  }

  /** Subscribe to cycle completions. Returns the unsubscribe function. */
  onCycleComplete(listener: CycleListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * One on-demand fetch for a single id, outside the cycle machinery.
   *
   * Fetches when the cache has no completed attempt for `id`, or when
   * `force` is set. Rejects with the RemoteError if that fetch fails (after
   * the client's retry). When no fetch is needed, or another fetch for the
   * same id is already outstanding, resolves with the current snapshot.
   */
  async refreshService(id: string, options: RefreshServiceOptions = {}): Promise<StatusSnapshot> {
    if (options.force !== true && this.cache.has(id)) return this.cache.get(id);
    if (!this.cache.beginFetch(id)) return this.cache.get(id);

    const outcome = await this.fetchInto(id, 0);
    if (!outcome.ok) throw outcome.error;
    return this.cache.get(id);
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private trigger(reason: RefreshReason): void {
    if (this.stopped) return;
    if (this.active !== null) {
      if (reason !== 'timer') this.pendingFollowUp = true;
      return;
    }
    this.active = this.runCycles(reason);
  }

  /**
   * Run one cycle, then one follow-up whenever the pending flag was raised
   * during the cycle that just settled. `active` is cleared in the same
   * synchronous step that reads the flag, so no trigger falls between them.
   */
  private async runCycles(first: RefreshReason): Promise<void> {
    let reason = first;
    try {
      for (;;) {
        await this.runCycle(reason);
        if (!this.pendingFollowUp || this.stopped) break;
        this.pendingFollowUp = false;
        reason = 'coalesced';
      }
    } catch (err) {
      // eslint-disable-next-line no-console
      console.error('[rdash sync] refresh cycle failed:', err);
    } finally {
      this.active = null;
    }
  }

  private async runCycle(reason: RefreshReason): Promise<void> {
    const cycle = ++this.cycleSeq;
    const startedAt = this.now();
    this.lastCycleStartedAt = startedAt;

    this.log({
      event: 'cycle_start',
      timestamp: new Date(startedAt).toISOString(),
      cycle,
      reason,
      serviceCount: this.serviceIds.length,
    });

    const dispatched: Array<Promise<FetchOutcome>> = [];
    let skipped = 0;
    for (const id of this.serviceIds) {
      if (!this.cache.beginFetch(id)) {
        skipped++;
        this.log({
          event: 'fetch_skipped',
          timestamp: new Date(this.now()).toISOString(),
          cycle,
          serviceId: id,
        });
        continue;
      }
      dispatched.push(this.fetchInto(id, cycle));
    }

    const settled = await Promise.allSettled(dispatched);
    let succeeded = 0;
    for (const result of settled) {
      if (result.status === 'fulfilled' && result.value.ok) succeeded++;
    }

    const summary: CycleSummary = {
      cycle,
      reason,
      succeeded,
      failed: settled.length - succeeded,
      skipped,
      startedAt,
      durationMs: this.now() - startedAt,
    };

    this.log({
      event: 'cycle_end',
      timestamp: new Date(this.now()).toISOString(),
      cycle,
      succeeded: summary.succeeded,
      failed: summary.failed,
      skipped,
      durationMs: summary.durationMs,
    });

    for (const listener of this.listeners) {
      try {
        listener(summary);
      } catch (err) {
        // eslint-disable-next-line no-console
        console.error('[rdash sync] cycle listener failed:', err);
      }
    }
  }

  /** Sink failures are reported, never propagated into a cycle. */
  private log(entry: SyncLogEntry): void {
    try {
      this.logSink.append(entry);
    } catch (err) {
      // eslint-disable-next-line no-console
      console.error('[rdash sync] log sink failed:', err);
    }
  }

  /** Fetch one id (already granted by beginFetch) and complete it in the cache. */
  private async fetchInto(id: string, cycle: number): Promise<FetchOutcome> {
    const startedAt = this.now();
    let outcome: FetchOutcome;
    try {
      outcome = { ok: true, value: await this.client.fetchCombined(id) };
    } catch (err) {
      outcome = { ok: false, error: toRemoteError(err) };
    }

    const snapshot = this.cache.completeFetch(id, outcome);
    this.log({
      event: 'fetch_complete',
      timestamp: new Date(this.now()).toISOString(),
      cycle,
      serviceId: id,
      ok: outcome.ok,
      state: snapshot.serviceState,
      errorKind: outcome.ok ? null : outcome.error.kind,
      durationMs: this.now() - startedAt,
    });
    return outcome;
  }
}
