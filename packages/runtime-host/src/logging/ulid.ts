/**
 * Stratum Runtime Host — ULID Generator
 *
 * Universally Unique Lexicographically Sortable Identifier: 26 characters of
 * Crockford Base32, a 48-bit millisecond timestamp (10 chars) followed by
 * 80 random bits (16 chars).
 *
 * Used as `event_id` in resolutions.jsonl so that log files merged from
 * several machines can be de-duplicated on read.
 *
 * @see https://github.com/ulid/spec
 */

import { randomBytes } from 'node:crypto';

/** Crockford's Base32 alphabet (no I, L, O, U). */
const CROCKFORD_ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';

const TIME_CHARS = 10;
const RANDOM_CHARS = 16;

/** Encode `value` as exactly `length` Crockford characters, zero-padded. */
function encodeCrockford(value: bigint, length: number): string {
  let out = '';
  let v = value;
  for (let i = 0; i < length; i++) {
    out = CROCKFORD_ALPHABET.charAt(Number(v & 31n)) + out;
    v >>= 5n;
  }
  return out;
}

/**
 * Generate a ULID.
 *
 * The random part is not incremented within a millisecond; ordering of
 * same-millisecond ids is arbitrary.
 *
 * @param timeMs - Timestamp component; defaults to now
 */
export function ulid(timeMs: number = Date.now()): string {
  let random = 0n;
  for (const byte of randomBytes(10)) {
    random = (random << 8n) | BigInt(byte);
  }
  return encodeCrockford(BigInt(timeMs), TIME_CHARS) + encodeCrockford(random, RANDOM_CHARS);
}
