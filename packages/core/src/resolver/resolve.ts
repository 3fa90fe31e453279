/**
 * render-dash Core — Service Resolver
 *
 * Maps a short user-typed token to configured services. Matching is
 * case-insensitive and tiered; the first tier that yields any candidate
 * decides the result:
 *
 *   1. exact alias       token === alias
 *   2. partial alias     alias contains token (substring, any position)
 *   3. partial name      name contains token (substring, any position)
 *
 * Partial matching is substring-anywhere rather than prefix-only, so `api`
 * finds `chat-api`. Candidates are always returned in display order:
 * ascending priority, then case-insensitive name, then id.
 *
 * The resolver is a pure function of (token, store).
 */

import type { MatchResult, MatchTier, ServiceRecord, ServiceStore } from '../types/service.js';

// ---------------------------------------------------------------------------
// Ordering
// ---------------------------------------------------------------------------

/**
 * Total order used for every candidate list and for the dashboard rows.
 * The id comparison only matters when priority and name both tie.
 */
export function compareRecords(a: ServiceRecord, b: ServiceRecord): number {
  if (a.priority !== b.priority) return a.priority - b.priority;
  const an = a.name.toLowerCase();
  const bn = b.name.toLowerCase();
  if (an !== bn) return an < bn ? -1 : 1;
  if (a.id === b.id) return 0;
  return a.id < b.id ? -1 : 1;
}

export function sortRecords(records: Iterable<ServiceRecord>): ServiceRecord[] {
  return [...records].sort(compareRecords);
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

type TierPredicate = (record: ServiceRecord, needle: string) => boolean;

const TIERS: ReadonlyArray<readonly [MatchTier, TierPredicate]> = [
  ['exact-alias', (r, needle) => r.aliases.some((a) => a.toLowerCase() === needle)],
  ['partial-alias', (r, needle) => r.aliases.some((a) => a.toLowerCase().includes(needle))],
  ['partial-name', (r, needle) => r.name.toLowerCase().includes(needle)],
];

/**
 * Resolve `token` against `store`.
 *
 * A blank token never matches. Duplicate exact aliases cannot pass config
 * validation, but if a store contains them the result is `ambiguous`
 * rather than an arbitrary pick.
 */
export function resolveService(token: string, store: ServiceStore): MatchResult {
  const needle = token.trim().toLowerCase();
  if (needle === '') return { kind: 'no-match' };

  for (const [tier, matches] of TIERS) {
    const candidates = store.filter((record) => matches(record, needle));
    if (candidates.length === 1) {
      const [record] = candidates;
      if (record !== undefined) return { kind: 'unique', record, tier };
    }
    if (candidates.length > 1) {
      return { kind: 'ambiguous', candidates: sortRecords(candidates), tier };
    }
  }

  return { kind: 'no-match' };
}
