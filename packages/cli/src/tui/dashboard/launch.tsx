import React from 'react'
import { render } from 'ink'
import { sortRecords } from '@render-dash/core'
import type { Runtime } from '../../commands/runtime.js'
import { DashboardView } from './DashboardView.js'

/**
 * runDashboard — mount the live view, start the engine, and block until the
 * operator quits. The engine is stopped (waiting for any in-flight cycle)
 * before this resolves.
 */
export async function runDashboard(runtime: Runtime): Promise<void> {
  const { config, cache, engine, launcher } = runtime
  const records = sortRecords(config.services)

  const instance = render(
    <DashboardView
      records={records}
      cache={cache}
      engine={engine}
      launcher={launcher}
      refreshSeconds={config.refreshIntervalSeconds}
    />,
  )

  engine.start(records.map(r => r.id), config.refreshIntervalSeconds * 1000)
  try {
    await instance.waitUntilExit()
  } finally {
    await engine.stop()
  }
}
