/**
 * render-dash Runtime Host — LogIO
 *
 * Injectable append-only output for JSONL log files. Paths are bare file names
 * resolved against the implementation's log directory.
 *
 *   FileLogIO   — appends under `<stateDir>/logs/`
 *   MemoryLogIO — keeps lines in memory, for tests
 */

import { appendFileSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';

export interface LogIO {
  /** Append one line; a newline is added. Creates the directory on demand. */
  appendLine(filename: string, line: string): void;
}

// ---------------------------------------------------------------------------
// FileLogIO
// ---------------------------------------------------------------------------

export class FileLogIO implements LogIO {
  readonly logsDir: string;

  constructor(stateDir: string) {
    this.logsDir = join(stateDir, 'logs');
  }

  appendLine(filename: string, line: string): void {
    mkdirSync(this.logsDir, { recursive: true });
    appendFileSync(join(this.logsDir, filename), line + '\n', 'utf-8');
  }
}

// ---------------------------------------------------------------------------
// MemoryLogIO
// ---------------------------------------------------------------------------

export class MemoryLogIO implements LogIO {
  private readonly files = new Map<string, string[]>();

  appendLine(filename: string, line: string): void {
    const lines = this.files.get(filename) ?? [];
    lines.push(line);
    this.files.set(filename, lines);
  }

  /** Lines appended so far, without trailing newlines. */
  readLines(filename: string): ReadonlyArray<string> {
    return this.files.get(filename) ?? [];
  }
}
