/**
 * synthctl Runtime Host — ULID Generator
 *
 * 26-character Crockford Base32 identifiers: a 48-bit millisecond
 * timestamp followed by 80 random bits. Used as the `event_id` of
 * selection log lines, so a log merged from several machines can be
 * deduplicated on read.
 *
 * Generators are monotonic: ids issued within one millisecond (or after
 * the clock steps back) increment the previous random part instead of
 * drawing a new one, so a generator's ids always sort in issue order.
 *
 * @see https://github.com/ulid/spec
 */

import { randomBytes } from 'node:crypto';

// ---------------------------------------------------------------------------
// Crockford Base32
// ---------------------------------------------------------------------------

/** Excludes I, L, O and U. */
const CROCKFORD_ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';

const TIME_CHARS = 10;
const RANDOM_CHARS = 16;
const RANDOM_BYTES = 10;
const MAX_RANDOM = (BigInt(1) << BigInt(80)) - BigInt(1);

function encodeCrockford(value: bigint, length: number): string {
  let out = '';
  let v = value;
  for (let i = 0; i < length; i++) {
    out = CROCKFORD_ALPHABET.charAt(Number(v & BigInt(0x1f))) + out;
    v >>= BigInt(5);
  }
  return out;
}

function toBigInt(bytes: Uint8Array): bigint {
  let value = BigInt(0);
  for (const byte of bytes) {
    value = (value << BigInt(8)) | BigInt(byte);
  }
  return value;
}

// ---------------------------------------------------------------------------
// Generator
// ---------------------------------------------------------------------------

export interface UlidOptions {
  /** Milliseconds since the epoch. Defaults to Date.now. */
  readonly now?: () => number;
  /** Source of random bytes. Defaults to node:crypto randomBytes. */
  readonly random?: (size: number) => Uint8Array;
}

/**
 * Create a monotonic ULID generator.
 *
 * @example
 * const nextId = ulidFactory();
 * nextId(); // e.g. '01JDKPF8X7M4VQN3BGHST6RWYZ'
 */
export function ulidFactory(options: UlidOptions = {}): () => string {
  const now = options.now ?? Date.now;
  const random = options.random ?? randomBytes;

  let lastTime = -1;
  let lastRandom = BigInt(0);

  return () => {
    const time = now();
    if (time > lastTime) {
      lastTime = time;
      lastRandom = toBigInt(random(RANDOM_BYTES)) & MAX_RANDOM;
    } else if (lastRandom === MAX_RANDOM) {
      // Random part exhausted within this millisecond; borrow the next one.
      lastTime += 1;
      lastRandom = BigInt(0);
    } else {
      lastRandom += BigInt(1);
    }
    return encodeCrockford(BigInt(lastTime), TIME_CHARS) + encodeCrockford(lastRandom, RANDOM_CHARS);
  };
}

/** Process-wide generator. */
export const ulid: () => string = ulidFactory();
