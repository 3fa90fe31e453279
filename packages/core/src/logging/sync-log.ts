/**
 * render-dash Core — Sync Log Sink Interface
 *
 * The engine reports what it does to an injected sink. The core owns this
 * contract; the JSONL file implementation lives in the runtime host, so the
 * core itself never writes to disk.
 */

import type { RemoteErrorKind } from '../types/errors.js';
import type { ServiceState } from '../types/status.js';

export type SyncLogEntry =
  | {
      readonly event: 'cycle_start';
      readonly timestamp: string;
      readonly cycle: number;
      readonly reason: RefreshReason;
      readonly serviceCount: number;
    }
  | {
      readonly event: 'fetch_complete';
      readonly timestamp: string;
      /** 0 for on-demand fetches outside a cycle. */
      readonly cycle: number;
      readonly serviceId: string;
      readonly ok: boolean;
      readonly state: ServiceState;
      readonly errorKind: RemoteErrorKind | null;
      readonly durationMs: number;
    }
  | {
      readonly event: 'fetch_skipped';
      readonly timestamp: string;
      readonly cycle: number;
      readonly serviceId: string;
    }
  | {
      readonly event: 'cycle_end';
      readonly timestamp: string;
      readonly cycle: number;
      readonly succeeded: number;
      readonly failed: number;
      readonly skipped: number;
      readonly durationMs: number;
    };

/** What started a cycle. */
export type RefreshReason = 'startup' | 'timer' | 'manual' | 'coalesced';

export interface SyncLogSink {
  append(entry: SyncLogEntry): void;
}

/** Sink used when logging is disabled. */
export const nullSyncLogSink: SyncLogSink = {
  append(): void {
    // disabled
  },
};
