import type { DashboardPage } from '@render-dash/runtime-host'

/** Display tick: how often the view re-reads the status cache. */
export const DISPLAY_TICK_MS = 1000

export interface Notice {
  tone: 'info' | 'error'
  text: string
}

export interface DashboardState {
  /** Index into the priority-ordered record list. */
  selected: number
  /** Wall clock at the last tick; drives every "ago" label. */
  now: number
  notice: Notice | null
}

export type DashboardAction =
  | { type: 'TICK'; now: number }
  | { type: 'MOVE'; delta: number; count: number }
  | { type: 'NOTICE'; notice: Notice | null }

export const initialState = (now: number): DashboardState => ({ selected: 0, now, notice: null })

export function reducer(state: DashboardState, action: DashboardAction): DashboardState {
  switch (action.type) {
    case 'TICK':
      return { ...state, now: action.now }
    case 'MOVE': {
      if (action.count <= 0) return { ...state, selected: 0 }
      const selected = (((state.selected + action.delta) % action.count) + action.count) % action.count
      return { ...state, selected }
    }
    case 'NOTICE':
      return { ...state, notice: action.notice }
  }
}

/** Keys that open a dashboard page for the selected service. */
export const PAGE_KEYS: Readonly<Partial<Record<string, DashboardPage>>> = {
  l: 'logs',
  e: 'events',
  d: 'deploys',
  s: 'settings',
}

export const openedNotice = (url: string): Notice => ({ tone: 'info', text: `opened ${url}` })

/** The URL stays on screen so it can be opened by hand. */
export function launchFailedNotice(err: unknown, url: string): Notice {
  const message = err instanceof Error ? err.message : String(err)
  return { tone: 'error', text: `${message}; open manually: ${url}` }
}

/** Status bar age of the last cycle: "never", "0s ago", "12s ago". */
export function formatSinceRefresh(ms: number | null): string {
  if (ms === null) return 'never'
  return `${Math.floor(ms / 1000)}s ago`
}
