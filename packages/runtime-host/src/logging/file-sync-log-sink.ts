/**
 * render-dash Runtime Host — File-backed Sync Log Sink
 *
 * Implements SyncLogSink from @render-dash/core by appending one JSONL line
 * per engine event to `sync.jsonl`. Each line gets a ULID `event_id` and
 * snake_case keys.
 *
 * Writes are synchronous, so a line is on disk before the engine moves on.
 */

import type { SyncLogEntry, SyncLogSink } from '@render-dash/core';
import type { LogIO } from './log-io.js';
import { ulid } from './ulid.js';

export const SYNC_LOG_FILE = 'sync.jsonl';

export class FileSyncLogSink implements SyncLogSink {
  constructor(
    private readonly io: LogIO,
    private readonly filename: string = SYNC_LOG_FILE,
  ) {}

  append(entry: SyncLogEntry): void {
    this.io.appendLine(this.filename, JSON.stringify({ event_id: ulid(), ...toRecord(entry) }));
  }
}

function toRecord(entry: SyncLogEntry): Record<string, unknown> {
  switch (entry.event) {
    case 'cycle_start':
      return {
        event: entry.event,
        timestamp: entry.timestamp,
        cycle: entry.cycle,
        reason: entry.reason,
        service_count: entry.serviceCount,
      };
    case 'fetch_complete':
      return {
        event: entry.event,
        timestamp: entry.timestamp,
        cycle: entry.cycle,
        service_id: entry.serviceId,
        ok: entry.ok,
        state: entry.state,
        error_kind: entry.errorKind,
        duration_ms: entry.durationMs,
      };
    case 'fetch_skipped':
      return {
        event: entry.event,
        timestamp: entry.timestamp,
        cycle: entry.cycle,
        service_id: entry.serviceId,
      };
    case 'cycle_end':
      return {
        event: entry.event,
        timestamp: entry.timestamp,
        cycle: entry.cycle,
        succeeded: entry.succeeded,
        failed: entry.failed,
        skipped: entry.skipped,
        duration_ms: entry.durationMs,
      };
  }
}
