/**
 * rdash CLI — Output Formatter Tests
 *
 * Colour codes are stripped before comparing, so the assertions hold with
 * or without a colour-capable terminal.
 */

import { describe, it, expect } from 'vitest'
import { stripVTControlCharacters as plain } from 'node:util'
import { DeployState, RemoteError, RemoteErrorKind, ServiceState } from '@render-dash/core'
import type { ServiceRecord, StatusSnapshot } from '@render-dash/core'
import { commitSubject, deploySummary, errorLabel, stateGlyph, timeAgo } from '../src/tui/output/format.js'
import { formatStatus, statusToJson } from '../src/tui/output/status.js'
import {
  defaultAlias,
  formatAmbiguous,
  formatNoMatch,
  formatRemoteChoices,
  formatServiceList,
} from '../src/tui/output/services.js'

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const NOW = new Date('2026-01-01T12:00:00.000Z')
const ago = (seconds: number): Date => new Date(NOW.getTime() - seconds * 1000)

const CHAT: ServiceRecord = { id: 'srv-1', name: 'Chat API', aliases: ['chat', 'api'], priority: 1 }
const WORKER: ServiceRecord = { id: 'srv-2', name: 'Worker', aliases: ['worker'], priority: 2 }

const HEALTHY: StatusSnapshot = {
  serviceId: 'srv-1',
  serviceState: ServiceState.Running,
  serviceUrl: 'https://chat.onrender.com',
  remoteName: 'Chat API',
  serviceType: 'web_service',
  latestDeploy: {
    id: 'dep-1',
    deployState: DeployState.Live,
    commitRef: 'abc1234def',
    commitMessage: 'Fix login\n\nLonger body',
    startedAt: ago(300),
    finishedAt: ago(240),
  },
  lastFetchedAt: ago(2),
  lastSucceededAt: ago(2),
  inFlight: false,
}

const AUTH = new RemoteError(
  RemoteErrorKind.AuthFailure,
  'GET /services/srv-1 returned 401 (check render.api_key)',
  { status: 401 },
)

// ---------------------------------------------------------------------------
// format.ts
// ---------------------------------------------------------------------------

describe('format helpers', () => {
  it('timeAgo picks the coarsest unit and floors', () => {
    expect(timeAgo(ago(40), NOW)).toBe('40s ago')
    expect(timeAgo(ago(125), NOW)).toBe('2m ago')
    expect(timeAgo(ago(3 * 3600 + 59), NOW)).toBe('3h ago')
    expect(timeAgo(ago(2 * 86400), NOW)).toBe('2d ago')
    expect(timeAgo(ago(-30), NOW)).toBe('0s ago')
  })

  it('commitSubject keeps the first line and truncates', () => {
    expect(commitSubject('Fix login\nbody')).toBe('Fix login')
    expect(commitSubject('a'.repeat(70))).toBe('a'.repeat(59) + '…')
    expect(commitSubject('')).toBe('')
  })

  it('deploySummary and errorLabel', () => {
    const deploy = HEALTHY.latestDeploy
    expect(deploy).toBeDefined()
    if (deploy === undefined) return
    expect(deploySummary(deploy, NOW)).toBe('live · 5m ago · abc1234')
    expect(deploySummary({ ...deploy, deployState: DeployState.Created, commitRef: undefined }, NOW)).toBe(
      'queued · 5m ago',
    )
    expect(errorLabel(AUTH)).toBe('AuthFailure (401)')
    expect(errorLabel(new RemoteError(RemoteErrorKind.Timeout, 'slow'))).toBe('Timeout')
  })

  it('stateGlyph is hollow only for Unknown', () => {
    expect(stateGlyph(ServiceState.Unknown)).toBe('○')
    expect(stateGlyph(ServiceState.Failed)).toBe('●')
  })
})

// ---------------------------------------------------------------------------
// status.ts
// ---------------------------------------------------------------------------

describe('formatStatus', () => {
  it('prints every known field of a healthy service', () => {
    expect(plain(formatStatus(CHAT, HEALTHY, NOW))).toBe(
      [
        '● Chat API  srv-1',
        '  state     Running',
        '  type      web_service',
        '  url       https://chat.onrender.com',
        '  deploy    live · 5m ago',
        '  commit    abc1234  Fix login',
        '  checked   2s ago',
        '',
      ].join('\n'),
    )
  })

  it('shows the error and no deploy line before any success', () => {
    const failed: StatusSnapshot = {
      serviceId: 'srv-1',
      serviceState: ServiceState.Unknown,
      lastFetchedAt: NOW,
      lastError: AUTH,
      inFlight: false,
    }
    expect(plain(formatStatus(CHAT, failed, NOW))).toBe(
      [
        '○ Chat API  srv-1',
        '  state     Unknown',
        '  checked   0s ago',
        '  error     AuthFailure (401) GET /services/srv-1 returned 401 (check render.api_key)',
        '',
      ].join('\n'),
    )
  })

  it('says "none" for a reachable service that never deployed', () => {
    const { latestDeploy: _dropped, ...rest } = HEALTHY
    expect(plain(formatStatus(CHAT, rest, NOW))).toContain('\n  deploy    none\n')
  })
})

describe('statusToJson', () => {
  it('serializes the snapshot with snake_case keys and ISO timestamps', () => {
    expect(statusToJson(CHAT, { ...HEALTHY, lastError: AUTH })).toEqual({
      id: 'srv-1',
      name: 'Chat API',
      aliases: ['chat', 'api'],
      state: 'Running',
      type: 'web_service',
      url: 'https://chat.onrender.com',
      latest_deploy: {
        id: 'dep-1',
        state: 'Live',
        commit: 'abc1234def',
        commit_message: 'Fix login\n\nLonger body',
        started_at: '2026-01-01T11:55:00.000Z',
        finished_at: '2026-01-01T11:56:00.000Z',
      },
      last_fetched_at: '2026-01-01T11:59:58.000Z',
      last_succeeded_at: '2026-01-01T11:59:58.000Z',
      error: {
        kind: 'AuthFailure',
        status: 401,
        message: 'GET /services/srv-1 returned 401 (check render.api_key)',
      },
    })
  })

  it('uses null for everything unknown', () => {
    expect(statusToJson(WORKER, { serviceId: 'srv-2', serviceState: ServiceState.Unknown, inFlight: false })).toEqual({
      id: 'srv-2',
      name: 'Worker',
      aliases: ['worker'],
      state: 'Unknown',
      type: null,
      url: null,
      latest_deploy: null,
      last_fetched_at: null,
      last_succeeded_at: null,
      error: null,
    })
  })
})

// ---------------------------------------------------------------------------
// services.ts
// ---------------------------------------------------------------------------

describe('service list output', () => {
  it('formatServiceList prints records in priority order', () => {
    expect(plain(formatServiceList([WORKER, CHAT]))).toBe(
      [
        'Configured services (2):',
        '',
        '  Chat API',
        '    id        srv-1',
        '    aliases   chat, api',
        '    priority  1',
        '',
        '  Worker',
        '    id        srv-2',
        '    aliases   worker',
        '    priority  2',
        '',
      ].join('\n'),
    )
  })

  it('formatNoMatch lists the available services', () => {
    expect(plain(formatNoMatch('zzz', [WORKER, CHAT]))).toBe(
      [
        "No service matches 'zzz'.",
        '',
        'Available services:',
        '  Chat API (chat, api)',
        '  Worker (worker)',
        '',
      ].join('\n'),
    )
  })

  it('formatAmbiguous numbers the candidates', () => {
    expect(plain(formatAmbiguous('ch', [CHAT, WORKER]))).toBe(
      [
        "'ch' matches 2 services:",
        '  1. Chat API (srv-1)  aliases: chat, api',
        '  2. Worker (srv-2)  aliases: worker',
        'Use a more specific alias.',
        '',
      ].join('\n'),
    )
  })

  it('formatRemoteChoices shows name, id and type', () => {
    expect(
      plain(formatRemoteChoices([{ id: 'srv-9', name: 'Cron', type: 'cron_job', state: ServiceState.Running }])),
    ).toBe('  1. Cron (srv-9) - cron_job\n')
  })

  it('defaultAlias lowercases and dashes', () => {
    expect(defaultAlias('  My Chat_API  v2 ')).toBe('my-chat-api-v2')
  })
})
