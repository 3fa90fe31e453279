import { DeployState, ServiceState } from '@render-dash/core'
import type { DeployDetail, RemoteError } from '@render-dash/core'

const MINUTE = 60
const HOUR = 60 * MINUTE
const DAY = 24 * HOUR

/**
 * timeAgo — coarse relative age: "3d ago", "5h ago", "12m ago", "40s ago".
 * Future timestamps (clock skew) read as "0s ago".
 */
export function timeAgo(from: Date, now: Date): string {
  const seconds = Math.max(0, Math.floor((now.getTime() - from.getTime()) / 1000))
  if (seconds >= DAY)    return `${Math.floor(seconds / DAY)}d ago`
  if (seconds >= HOUR)   return `${Math.floor(seconds / HOUR)}h ago`
  if (seconds >= MINUTE) return `${Math.floor(seconds / MINUTE)}m ago`
  return `${seconds}s ago`
}

export const shortCommit = (ref: string): string => ref.slice(0, 7)

/** First line of a commit message, truncated to `max` characters. */
export function commitSubject(message: string, max = 60): string {
  const [first = ''] = message.split('\n')
  const line = first.trim()
  return line.length > max ? line.slice(0, max - 1) + '…' : line
}

export const stateGlyph = (state: ServiceState): string =>
  state === ServiceState.Unknown ? '○' : '●'

const _deployLabels: Record<DeployState, string> = {
  [DeployState.Live]:     'live',
  [DeployState.Building]: 'building',
  [DeployState.Created]:  'queued',
  [DeployState.Failed]:   'failed',
  [DeployState.Canceled]: 'canceled',
}

export const deployLabel = (state: DeployState): string => _deployLabels[state]

/** "live · 5m ago · 1a2b3c4" */
export function deploySummary(deploy: DeployDetail, now: Date): string {
  const parts = [deployLabel(deploy.deployState), timeAgo(deploy.startedAt, now)]
  if (deploy.commitRef !== undefined) parts.push(shortCommit(deploy.commitRef))
  return parts.join(' · ')
}

/** "AuthFailure (401)" */
export function errorLabel(error: RemoteError): string {
  return error.status !== undefined ? `${error.kind} (${error.status})` : error.kind
}
