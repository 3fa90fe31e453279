/**
 * render-dash Core — Service Record Types
 *
 * A ServiceRecord is one configured service, loaded once from the config
 * file and never mutated. The ordered list of records is the store every
 * other component reads from.
 */

// ---------------------------------------------------------------------------
// Service Record
// ---------------------------------------------------------------------------

/** Priority assigned to a record whose configuration omits one. */
export const DEFAULT_PRIORITY = 1;

export interface ServiceRecord {
  /** Opaque remote identifier (e.g. `srv-abc123`). Unique across the store. */
  readonly id: string;
  /** Human display name. Not required to be unique. */
  readonly name: string;
  /**
   * Short lookup tokens, in authored order and case. Each alias is unique
   * across the whole store (compared case-insensitively).
   */
  readonly aliases: ReadonlyArray<string>;
  /** Lower value = shown first. */
  readonly priority: number;
}

export type ServiceStore = ReadonlyArray<ServiceRecord>;

// ---------------------------------------------------------------------------
// Match Result
// ---------------------------------------------------------------------------

/** Which resolver tier produced a non-empty candidate set. */
export type MatchTier = 'exact-alias' | 'partial-alias' | 'partial-name';

/**
 * Outcome of resolving a user token against the store.
 *
 * `no-match` and `ambiguous` are ordinary outcomes the caller branches on,
 * not failures.
 */
export type MatchResult =
  | { readonly kind: 'unique'; readonly record: ServiceRecord; readonly tier: MatchTier }
  | { readonly kind: 'ambiguous'; readonly candidates: ReadonlyArray<ServiceRecord>; readonly tier: MatchTier }
  | { readonly kind: 'no-match' };
