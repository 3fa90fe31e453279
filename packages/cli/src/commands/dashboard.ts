/**
 * rdash dashboard — Live status view
 *
 * Also what a bare `rdash` runs in an interactive terminal. Loads the
 * config, then hands the runtime to the ink view (loaded lazily so one-shot
 * commands never import React).
 */

import { Command } from 'commander';
import { buildRuntime, fail } from './runtime.js';
import type { GlobalOptions, Runtime } from './runtime.js';

export async function launchDashboard(options: GlobalOptions): Promise<void> {
  let runtime: Runtime;
  try {
    runtime = buildRuntime(options);
  } catch (err) {
    fail('dashboard', err);
  }

  const { runDashboard } = await import('../tui/dashboard/launch.js');
  await runDashboard(runtime);
}

export const dashboardCommand = new Command('dashboard')
  .description('Open the live dashboard (refreshes every refresh_interval seconds)')
  .action(async (_options: unknown, command: Command) => {
    await launchDashboard(command.optsWithGlobals<GlobalOptions>());
  });
