import { sortRecords } from '@render-dash/core'
import type { ServiceDetail, ServiceRecord } from '@render-dash/core'
import { t } from '../theme.js'

const aliasList = (record: ServiceRecord): string => record.aliases.join(', ')

/**
 * formatServiceList — `rdash services list`, in resolver order
 * (priority, then name).
 */
export function formatServiceList(store: ReadonlyArray<ServiceRecord>): string {
  const sorted = sortRecords(store)
  let out = t.muted(`Configured services (${sorted.length}):`) + '\n'
  for (const record of sorted) {
    out += '\n  ' + t.white(record.name) + '\n'
    out += '    ' + t.muted('id'.padEnd(10)) + t.text(record.id) + '\n'
    out += '    ' + t.muted('aliases'.padEnd(10)) + t.text(aliasList(record)) + '\n'
    out += '    ' + t.muted('priority'.padEnd(10)) + t.text(String(record.priority)) + '\n'
  }
  return out
}

/** No record matched `token`; list what is available. */
export function formatNoMatch(token: string, store: ReadonlyArray<ServiceRecord>): string {
  let out = t.red(`No service matches '${token}'.`) + '\n\n'
  out += t.muted('Available services:') + '\n'
  for (const record of sortRecords(store)) {
    out += '  ' + t.white(record.name) + t.dim(` (${aliasList(record)})`) + '\n'
  }
  return out
}

/** Several records matched; numbered in the resolver's order. */
export function formatAmbiguous(token: string, candidates: ReadonlyArray<ServiceRecord>): string {
  let out = t.amber(`'${token}' matches ${candidates.length} services:`) + '\n'
  candidates.forEach((record, i) => {
    out += `  ${i + 1}. ` + t.white(record.name) + t.dim(` (${record.id})  aliases: ${aliasList(record)}`) + '\n'
  })
  out += t.muted('Use a more specific alias.') + '\n'
  return out
}

/** Numbered remote services for `rdash services add`. */
export function formatRemoteChoices(services: ReadonlyArray<ServiceDetail>): string {
  let out = ''
  services.forEach((service, i) => {
    out += `  ${i + 1}. ` + t.white(service.name) + t.dim(` (${service.id}) - ${service.type}`) + '\n'
  })
  return out
}

/** Alias suggested for a remote service name: lowercase, spaces and underscores to dashes. */
export const defaultAlias = (name: string): string =>
  name.trim().toLowerCase().replace(/[\s_]+/g, '-')
