/**
 * rdash <service> <action> — resolve a service and act on it
 *
 * Actions:
 *   status    fetch once and print the service's status (--json for JSON)
 *   logs      open the Render dashboard logs page
 *   events    open the events page
 *   deploys   open the deploys page
 *   settings  open the service's dashboard landing page
 *
 * The service token goes through the resolver: a unique match proceeds,
 * no-match lists the configured services, ambiguous lists the numbered
 * candidates. Both non-unique outcomes exit 1.
 */

import { resolveService } from '@render-dash/core';
import type { ServiceRecord, StatusSnapshot } from '@render-dash/core';
import { DASHBOARD_PAGES, dashboardUrl } from '@render-dash/runtime-host';
import type { DashboardPage } from '@render-dash/runtime-host';
import { formatAmbiguous, formatNoMatch } from '../tui/output/services.js';
import { formatStatus, statusToJson } from '../tui/output/status.js';
import { t } from '../tui/theme.js';
import { buildRuntime, fail } from './runtime.js';
import type { GlobalOptions, Runtime } from './runtime.js';

export type ServiceAction = 'status' | DashboardPage;

export const SERVICE_ACTIONS: ReadonlyArray<ServiceAction> = ['status', ...DASHBOARD_PAGES];

export function parseAction(value: string): ServiceAction | undefined {
  const lowered = value.toLowerCase();
  return SERVICE_ACTIONS.find((action) => action === lowered);
}

export type ServiceActionOptions = GlobalOptions & {
  json?: boolean;
};

export async function runServiceAction(
  term: string,
  actionArg: string,
  options: ServiceActionOptions,
): Promise<void> {
  const action = parseAction(actionArg);
  if (action === undefined) {
    // eslint-disable-next-line no-console
    console.error(`[rdash] Invalid action: ${actionArg}`);
    // eslint-disable-next-line no-console
    console.error(`  Valid actions: ${SERVICE_ACTIONS.join(', ')}`);
    process.exit(1);
  }

  let runtime: Runtime;
  try {
    runtime = buildRuntime(options);
  } catch (err) {
    fail(action, err);
  }

  const record = resolveOrExit(term, runtime.config.services);

  if (action === 'status') {
    await printStatus(runtime, record, options.json === true);
    return;
  }
  await openPage(runtime, record, action);
}

// ---------------------------------------------------------------------------
// Internals
// ---------------------------------------------------------------------------

function resolveOrExit(term: string, store: ReadonlyArray<ServiceRecord>): ServiceRecord {
  const match = resolveService(term, store);
  switch (match.kind) {
    case 'unique':
      return match.record;
    case 'no-match':
      process.stderr.write(formatNoMatch(term, store));
      process.exit(1);
    case 'ambiguous':
      process.stderr.write(formatAmbiguous(term, match.candidates));
      process.exit(1);
  }
}

async function printStatus(runtime: Runtime, record: ServiceRecord, json: boolean): Promise<void> {
  runtime.cache.register([record.id]);
  let snapshot: StatusSnapshot;
  try {
    snapshot = await runtime.engine.refreshService(record.id);
  } catch (err) {
    fail('status', err);
  }

  if (json) {
    // eslint-disable-next-line no-console
    console.log(JSON.stringify(statusToJson(record, snapshot), null, 2));
    return;
  }
  process.stdout.write(formatStatus(record, snapshot, new Date()));
}

async function openPage(runtime: Runtime, record: ServiceRecord, page: DashboardPage): Promise<void> {
  const url = dashboardUrl(record.id, page);
  // eslint-disable-next-line no-console
  console.log(`Opening ${page} for ${t.white(record.name)}: ${t.blue(url)}`);
  try {
    await runtime.launcher.open(url);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    // eslint-disable-next-line no-console
    console.error(`[rdash ${page}] Could not open a browser: ${message}`);
    // eslint-disable-next-line no-console
    console.error(`  Open this URL manually: ${url}`);
    process.exit(1);
  }
}
