/**
 * render-dash Runtime Host — ULID
 *
 * 26-character Crockford Base32 identifier: 10 characters of millisecond
 * timestamp followed by 16 characters of randomness. Sorts by creation time,
 * which keeps `event_id` ordering aligned with the log's append order.
 */

import { randomBytes } from 'node:crypto';

const ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';
const TIME_LENGTH = 10;
const RANDOM_LENGTH = 16;

function encode(value: bigint, length: number): string {
  let out = '';
  let rest = value;
  for (let i = 0; i < length; i++) {
    out = ALPHABET.charAt(Number(rest % 32n)) + out;
    rest /= 32n;
  }
  return out;
}

/** New ULID for `timeMs` (default: now). */
export function ulid(timeMs: number = Date.now()): string {
  if (!Number.isInteger(timeMs) || timeMs < 0) {
    throw new RangeError(`ulid: timestamp must be a non-negative integer, got ${timeMs}`);
  }
  const random = randomBytes(10).reduce((acc, byte) => (acc << 8n) | BigInt(byte), 0n);
  return encode(BigInt(timeMs), TIME_LENGTH) + encode(random, RANDOM_LENGTH);
}
