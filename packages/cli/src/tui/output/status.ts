import type { ServiceRecord, StatusSnapshot } from '@render-dash/core'
import { t, stateColor, deployColor } from '../theme.js'
import { commitSubject, deployLabel, errorLabel, shortCommit, stateGlyph, timeAgo } from './format.js'

const LABEL_WIDTH = 10

/**
 * formatStatus — the `rdash <service> status` block.
 *
 *   ● Chat API  srv-abc123
 *     state     Running
 *     type      web_service
 *     url       https://chat.example.com
 *     deploy    live · 5m ago
 *     commit    1a2b3c4  Fix login redirect
 *     checked   2s ago
 *
 * When the last fetch failed an `error` line follows and the remaining
 * lines keep showing the last known good values.
 */
export function formatStatus(record: ServiceRecord, snapshot: StatusSnapshot, now: Date): string {
  const color = stateColor(snapshot.serviceState)
  const label = (s: string) => t.muted(s.padEnd(LABEL_WIDTH))

  let out = color(stateGlyph(snapshot.serviceState)) + ' ' + t.white.bold(record.name) + '  ' + t.dim(record.id) + '\n'
  out += '  ' + label('state') + color(snapshot.serviceState) + '\n'

  if (snapshot.serviceType !== undefined) {
    out += '  ' + label('type') + t.text(snapshot.serviceType) + '\n'
  }
  if (snapshot.serviceUrl !== undefined) {
    out += '  ' + label('url') + t.blue(snapshot.serviceUrl) + '\n'
  }

  const deploy = snapshot.latestDeploy
  if (deploy !== undefined) {
    out += (
      '  ' + label('deploy') +
      deployColor(deploy.deployState)(deployLabel(deploy.deployState)) +
      t.dim(' · ' + timeAgo(deploy.startedAt, now)) +
      '\n'
    )
    if (deploy.commitRef !== undefined) {
      const subject = deploy.commitMessage !== undefined ? '  ' + commitSubject(deploy.commitMessage) : ''
      out += '  ' + label('commit') + t.blueDim(shortCommit(deploy.commitRef)) + t.text(subject) + '\n'
    }
  } else if (snapshot.lastSucceededAt !== undefined) {
    out += '  ' + label('deploy') + t.dim('none') + '\n'
  }

  if (snapshot.lastFetchedAt !== undefined) {
    out += '  ' + label('checked') + t.text(timeAgo(snapshot.lastFetchedAt, now)) + '\n'
  }
  if (snapshot.lastError !== undefined) {
    out += '  ' + label('error') + t.red(errorLabel(snapshot.lastError)) + ' ' + t.muted(snapshot.lastError.message) + '\n'
  }

  return out
}

/** JSON shape printed by `rdash <service> status --json`. */
export function statusToJson(record: ServiceRecord, snapshot: StatusSnapshot): Record<string, unknown> {
  const deploy = snapshot.latestDeploy
  return {
    id: record.id,
    name: record.name,
    aliases: [...record.aliases],
    state: snapshot.serviceState,
    type: snapshot.serviceType ?? null,
    url: snapshot.serviceUrl ?? null,
    latest_deploy: deploy === undefined ? null : {
      id: deploy.id,
      state: deploy.deployState,
      commit: deploy.commitRef ?? null,
      commit_message: deploy.commitMessage ?? null,
      started_at: deploy.startedAt.toISOString(),
      finished_at: deploy.finishedAt?.toISOString() ?? null,
    },
    last_fetched_at: snapshot.lastFetchedAt?.toISOString() ?? null,
    last_succeeded_at: snapshot.lastSucceededAt?.toISOString() ?? null,
    error: snapshot.lastError === undefined ? null : {
      kind: snapshot.lastError.kind,
      status: snapshot.lastError.status ?? null,
      message: snapshot.lastError.message,
    },
  }
}
