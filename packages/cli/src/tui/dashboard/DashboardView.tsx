import React, { useEffect, useReducer } from 'react'
import { Box, Text, useApp, useInput, useStdout } from 'ink'
import chalk from 'chalk'
import type { ServiceRecord, StatusCache, SyncEngine } from '@render-dash/core'
import { dashboardUrl } from '@render-dash/runtime-host'
import type { BrowserLauncher } from '@render-dash/runtime-host'
import { hex } from '../theme.js'
import { DashboardHeader } from './DashboardHeader.js'
import { Panel } from './Panel.js'
import { ServiceRow } from './ServiceRow.js'
import {
  DISPLAY_TICK_MS,
  PAGE_KEYS,
  formatSinceRefresh,
  initialState,
  launchFailedNotice,
  openedNotice,
  reducer,
} from './state.js'

export interface DashboardViewProps {
  /** Priority-ordered; row order never changes while mounted. */
  records: ReadonlyArray<ServiceRecord>
  cache: StatusCache
  engine: SyncEngine
  launcher: BrowserLauncher
  refreshSeconds: number
  tickMs?: number
}

/**
 * DashboardView — full-screen live view of every configured service.
 *
 * The view never fetches. The engine writes the status cache; this
 * component re-reads it on every display tick and after each cycle.
 *
 * Keyboard:
 *   q / Escape  → exit
 *   r           → manual refresh (coalesced by the engine)
 *   ↑ ↓ / k j   → move selection
 *   l e d s     → open logs / events / deploys / settings for the selection
 */
export function DashboardView({
  records,
  cache,
  engine,
  launcher,
  refreshSeconds,
  tickMs = DISPLAY_TICK_MS,
}: DashboardViewProps): React.ReactElement {
  const { exit: inkExit } = useApp()
  const [state, dispatch] = useReducer(reducer, Date.now(), initialState)
  const { stdout } = useStdout()

  useEffect(() => {
    const tick = () => dispatch({ type: 'TICK', now: Date.now() })
    const timer = setInterval(tick, tickMs)
    const unsubscribe = engine.onCycleComplete(tick)
    return () => {
      clearInterval(timer)
      unsubscribe()
    }
  }, [engine, tickMs])

  useInput((input, key) => {
    if (input === 'q' || key.escape) {
      inkExit()
      return
    }
    if (input === 'r') {
      engine.triggerManualRefresh()
      dispatch({ type: 'NOTICE', notice: { tone: 'info', text: 'refresh requested' } })
      return
    }
    if (key.upArrow || input === 'k') {
      dispatch({ type: 'MOVE', delta: -1, count: records.length })
      return
    }
    if (key.downArrow || input === 'j') {
      dispatch({ type: 'MOVE', delta: 1, count: records.length })
      return
    }

    const page = PAGE_KEYS[input]
    const record = records[state.selected]
    if (page === undefined || record === undefined) return

    const url = dashboardUrl(record.id, page)
    void launcher.open(url).then(
      () => dispatch({ type: 'NOTICE', notice: openedNotice(url) }),
      (err: unknown) => dispatch({ type: 'NOTICE', notice: launchFailedNotice(err, url) }),
    )
  })

  const now = new Date(state.now)
  const cols = stdout.columns ?? 80

  const refreshing = engine.phase === 'running' ? ' · refreshing…' : ''
  const slLeft  = ` ◈ last refresh ${formatSinceRefresh(engine.timeSinceLastCycleStart())}${refreshing}`
  const slRight = `q quit · r refresh `
  const slFill  = ' '.repeat(Math.max(0, cols - slLeft.length - slRight.length))
  const slLine  = chalk.bgHex(hex.blueDim).white(slLeft + slFill + slRight)

  const errors = records.filter(r => cache.get(r.id).lastError !== undefined).length

  return (
    <Box flexDirection="column">
      <DashboardHeader serviceCount={records.length} refreshSeconds={refreshSeconds} />

      <Panel label="Services" meta={errors > 0 ? `${errors} failing` : undefined}>
        {records.map((record, i) => (
          <ServiceRow
            key={record.id}
            record={record}
            snapshot={cache.get(record.id)}
            selected={i === state.selected}
            now={now}
          />
        ))}
      </Panel>

      {state.notice !== null && (
        <Box paddingX={1}>
          <Text color={state.notice.tone === 'error' ? hex.red : hex.muted}>{state.notice.text}</Text>
        </Box>
      )}

      <Box>
        <Text>{slLine}</Text>
      </Box>
    </Box>
  )
}
