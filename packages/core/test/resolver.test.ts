/**
 * render-dash Core — Service Resolver Tests
 *
 * Coverage:
 *   S1: exact alias match is unique
 *   S2: exact alias wins over a partial alias on another record
 *   S3: partial alias (substring) yields ambiguous candidates in display order
 *   S4: partial name match is the last tier
 *   S5: no tier matches → no-match
 *   S6: blank token never matches
 *   S7: matching ignores case and surrounding whitespace
 *   S8: display order is priority, then lowercase name, then id
 *   S9: exact beats partial; shared prefixes are ambiguous in priority order
 */

import { describe, it, expect } from 'vitest';
import { compareRecords, resolveService, sortRecords } from '../src/index.js';
import type { ServiceRecord } from '../src/index.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

function record(id: string, name: string, aliases: string[], priority = 1): ServiceRecord {
  return { id, name, aliases, priority };
}

const CHAT = record('srv-1', 'Chat API', ['chat', 'api']);
const CHANNELS = record('srv-2', 'Channel Worker', ['chan', 'worker'], 2);
const BILLING = record('srv-3', 'billing', ['bill'], 1);

const STORE: ReadonlyArray<ServiceRecord> = [CHANNELS, CHAT, BILLING];

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('resolveService', () => {
  it('S1: exact alias match is unique', () => {
    expect(resolveService('bill', STORE)).toEqual({ kind: 'unique', record: BILLING, tier: 'exact-alias' });
  });

  it('S2: exact alias wins over a partial alias on another record', () => {
    // "chat" is exact on srv-1; "ch" would also be a prefix of "chan"
    const result = resolveService('chat', STORE);
    expect(result).toEqual({ kind: 'unique', record: CHAT, tier: 'exact-alias' });
  });

  it('S3: partial alias yields ambiguous candidates in display order', () => {
    const result = resolveService('ch', STORE);
    expect(result.kind).toBe('ambiguous');
    if (result.kind !== 'ambiguous') return;
    expect(result.tier).toBe('partial-alias');
    expect(result.candidates.map((r) => r.id)).toEqual(['srv-1', 'srv-2']);
  });

  it('S3: substring anywhere in an alias counts', () => {
    expect(resolveService('ork', STORE)).toEqual({ kind: 'unique', record: CHANNELS, tier: 'partial-alias' });
  });

  it('S4: partial name match is the last tier', () => {
    expect(resolveService('illing', STORE)).toEqual({ kind: 'unique', record: BILLING, tier: 'partial-name' });
    expect(resolveService('channel', STORE)).toEqual({
      kind: 'unique',
      record: CHANNELS,
      tier: 'partial-name',
    });
  });

  it('S5: no tier matches → no-match', () => {
    expect(resolveService('zzz', STORE)).toEqual({ kind: 'no-match' });
    expect(resolveService('chat', [])).toEqual({ kind: 'no-match' });
  });

  it('S6: blank token never matches', () => {
    expect(resolveService('', STORE)).toEqual({ kind: 'no-match' });
    expect(resolveService('   ', STORE)).toEqual({ kind: 'no-match' });
  });

  it('S7: matching ignores case and surrounding whitespace', () => {
    expect(resolveService('  CHAT ', STORE)).toEqual({ kind: 'unique', record: CHAT, tier: 'exact-alias' });
  });

  it('S7: duplicate exact aliases resolve as ambiguous rather than an arbitrary pick', () => {
    const a = record('srv-a', 'A', ['dup']);
    const b = record('srv-b', 'B', ['DUP']);
    const result = resolveService('dup', [b, a]);
    expect(result.kind).toBe('ambiguous');
    if (result.kind !== 'ambiguous') return;
    expect(result.tier).toBe('exact-alias');
    expect(result.candidates.map((r) => r.id)).toEqual(['srv-a', 'srv-b']);
  });
});

describe('sortRecords', () => {
  it('S8: display order is priority, then lowercase name, then id', () => {
    const records = [
      record('srv-z', 'beta', [], 2),
      record('srv-b', 'Alpha', [], 1),
      record('srv-a', 'alpha', [], 1),
      record('srv-c', 'Zed', [], 0),
    ];
    expect(sortRecords(records).map((r) => r.id)).toEqual(['srv-c', 'srv-a', 'srv-b', 'srv-z']);
  });

  it('S8: compareRecords is zero only for the same id at equal priority and name', () => {
    expect(compareRecords(CHAT, CHAT)).toBe(0);
    expect(compareRecords(CHAT, CHANNELS)).toBeLessThan(0);
    expect(compareRecords(CHANNELS, CHAT)).toBeGreaterThan(0);
  });

  it('S8: does not mutate its input', () => {
    const input = [CHANNELS, CHAT];
    sortRecords(input);
    expect(input.map((r) => r.id)).toEqual(['srv-2', 'srv-1']);
  });
});

describe('resolveService on overlapping aliases', () => {
  const store: ReadonlyArray<ServiceRecord> = [
    record('srv-2', 'Chat Web', ['chat-web'], 2),
    record('srv-1', 'Chat API', ['chat', 'chat-api'], 1),
  ];

  it('S9: an exact alias wins even when other aliases contain it', () => {
    expect(resolveService('chat', store)).toEqual({ kind: 'unique', record: store[1], tier: 'exact-alias' });
  });

  it('S9: a shared prefix is ambiguous, ordered by priority, on every call', () => {
    const first = resolveService('ch', store);
    const second = resolveService('CH', store);
    expect(first).toEqual(second);
    expect(first.kind).toBe('ambiguous');
    if (first.kind !== 'ambiguous') return;
    expect(first.candidates.map((r) => r.id)).toEqual(['srv-1', 'srv-2']);
  });

  it('S9: a prefix of a single alias is unique', () => {
    expect(resolveService('chat-w', store)).toEqual({ kind: 'unique', record: store[0], tier: 'partial-alias' });
  });

  it('S9: nothing matches zzz', () => {
    expect(resolveService('zzz', store)).toEqual({ kind: 'no-match' });
  });
});
