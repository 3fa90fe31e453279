/**
 * Runtime wiring shared by every command.
 *
 * buildRuntime() loads the config and assembles the Render client, status
 * cache, sync engine and browser launcher. Nothing here starts a timer;
 * the dashboard starts the engine, one-shot commands call refreshService().
 */

import { RemoteError, StatusCache, SyncEngine, nullSyncLogSink } from '@render-dash/core';
import type { SyncLogSink } from '@render-dash/core';
import {
  ConfigError,
  FileLogIO,
  FileSyncLogSink,
  RenderClient,
  SystemBrowserLauncher,
  getStateDir,
  loadConfig,
} from '@render-dash/runtime-host';
import type { AppConfig, BrowserLauncher } from '@render-dash/runtime-host';

/** Options accepted on the root program and visible to every subcommand. */
export type GlobalOptions = {
  config?: string;
  log?: boolean;
};

export interface Runtime {
  config: AppConfig;
  client: RenderClient;
  cache: StatusCache;
  engine: SyncEngine;
  launcher: BrowserLauncher;
}

export function isSyncLogEnabled(opts: GlobalOptions, env: NodeJS.ProcessEnv = process.env): boolean {
  return opts.log === true || env['RDASH_LOG'] === '1';
}

/** JSONL sink under <state dir>/logs/ when enabled, otherwise the no-op sink. */
export function buildSyncLogSink(enabled: boolean, env: NodeJS.ProcessEnv = process.env): SyncLogSink {
  if (!enabled) return nullSyncLogSink;
  return new FileSyncLogSink(new FileLogIO(getStateDir({ env })));
}

/**
 * Load config and assemble the runtime.
 *
 * @throws {ConfigError} if the config cannot be loaded
 */
export function buildRuntime(opts: GlobalOptions, env: NodeJS.ProcessEnv = process.env): Runtime {
  const config = loadConfig({ configPath: opts.config, env });
  const client = new RenderClient({ apiKey: config.apiKey, timeoutMs: config.requestTimeoutMs });
  const cache = new StatusCache();
  const engine = new SyncEngine(cache, client, {
    logSink: buildSyncLogSink(isSyncLogEnabled(opts, env), env),
  });
  return { config, client, cache, engine, launcher: new SystemBrowserLauncher() };
}

/** One-line description of any error a command can hit. */
export function describeError(err: unknown): string {
  if (err instanceof ConfigError) return `Configuration error: ${err.message}`;
  if (err instanceof RemoteError) {
    const status = err.status !== undefined ? ` (${err.status})` : '';
    return `${err.kind}${status}: ${err.message}`;
  }
  return err instanceof Error ? err.message : String(err);
}

/** Print `[rdash <scope>] <error>` to stderr and exit 1. */
export function fail(scope: string, err: unknown): never {
  const prefix = scope === '' ? '[rdash]' : `[rdash ${scope}]`;
  // eslint-disable-next-line no-console
  console.error(`${prefix} ${describeError(err)}`);
  process.exit(1);
}
