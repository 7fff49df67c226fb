import { createHash } from "node:crypto";
import { sortIdentifiers, type Identifier } from "./identifiers.js";
import cookedTable from "./rng-cooked.json" with { type: "json" };

const RNG_LEN = 607;
const RNG_TAP = 273;
const INT32_MAX = 2 ** 31 - 1;
const INT63_MASK = (1n << 63n) - 1n;
const INT63_RANGE = 1n << 63n;
const ZERO_SEED_REPLACEMENT = 89482311n;

const COOKED = BigInt64Array.from(cookedTable.map((value) => BigInt(value)));

export interface SeededRandom {
  /** Next non-negative 63-bit output. */
  int63(): bigint;
  /** Next non-negative 31-bit output. */
  int31(): number;
  /** Uniform integer in `[0, bound)`. */
  nextInt(bound: number): number;
}

/**
 * First 8 bytes of the SHA-256 digest of `value`, read as a big-endian unsigned integer.
 */
export function digestPrefix64(value: string): bigint {
  return createHash("sha256").update(value, "utf8").digest().readBigUInt64BE(0);
}

/**
 * The digest prefix of `seed` reinterpreted as a signed 64-bit integer, which is what the
 * generator is seeded with.
 */
export function deriveSeed(seed: string): bigint {
  return BigInt.asIntN(64, digestPrefix64(seed));
}

// Park-Miller minimal standard step, used only to spread the seed over the state vector.
function seedStep(x: number): number {
  const hi = Math.trunc(x / 44488);
  const lo = x % 44488;
  const next = 48271 * lo - 3399 * hi;
  return next < 0 ? next + INT32_MAX : next;
}

/**
 * Additive lagged Fibonacci generator (lags 607 and 273) with the seeding, output and bounded
 * draw rules of the classic Mitchell-Reeds source, so a seed yields the same stream as other
 * tools built on that source.
 */
export function createSeededRandom(seed: bigint): SeededRandom {
  // BigInt64Array stores wrap to 64 bits, which is the arithmetic the generator is defined in.
  const vec = new BigInt64Array(RNG_LEN);
  let tap = 0;
  let feed = RNG_LEN - RNG_TAP;

  let reduced = BigInt.asIntN(64, seed) % BigInt(INT32_MAX);
  if (reduced < 0n) {
    reduced += BigInt(INT32_MAX);
  }
  if (reduced === 0n) {
    reduced = ZERO_SEED_REPLACEMENT;
  }

  let x = Number(reduced);
  for (let i = -20; i < RNG_LEN; i++) {
    x = seedStep(x);
    if (i >= 0) {
      let u = BigInt(x) << 40n;
      x = seedStep(x);
      u ^= BigInt(x) << 20n;
      x = seedStep(x);
      u ^= BigInt(x);
      vec[i] = u ^ COOKED[i];
    }
  }

  const int63 = (): bigint => {
    tap = tap === 0 ? RNG_LEN - 1 : tap - 1;
    feed = feed === 0 ? RNG_LEN - 1 : feed - 1;
    vec[feed] = vec[feed] + vec[tap];
    return vec[feed] & INT63_MASK;
  };

  const int31 = (): number => Number(int63() >> 32n);

  const nextInt = (bound: number): number => {
    if (!Number.isSafeInteger(bound) || bound <= 0) {
      throw new RangeError(`bound must be a positive safe integer, got ${bound}`);
    }

    if (bound <= INT32_MAX) {
      if ((bound & (bound - 1)) === 0) {
        return int31() & (bound - 1);
      }
      const max = INT32_MAX - (2 ** 31 % bound);
      let value = int31();
      while (value > max) {
        value = int31();
      }
      return value % bound;
    }

    const range = BigInt(bound);
    if ((range & (range - 1n)) === 0n) {
      return Number(int63() & (range - 1n));
    }
    const max = INT63_MASK - (INT63_RANGE % range);
    let value = int63();
    while (value > max) {
      value = int63();
    }
    return Number(value % range);
  };

  return { int63, int31, nextInt };
}

/**
 * Fisher-Yates shuffle from the last index down to 1. Returns a new array.
 */
export function shuffle<T>(items: readonly T[], random: SeededRandom): T[] {
  const shuffled = [...items];

  for (let i = shuffled.length - 1; i > 0; i--) {
    const j = random.nextInt(i + 1);
    const current = shuffled[i];
    shuffled[i] = shuffled[j];
    shuffled[j] = current;
  }

  return shuffled;
}

/**
 * Orders identifiers for distribution.
 *
 * An empty seed keeps the arrival order. Any other seed sorts numerically first and then
 * shuffles, so the same seed and the same set of identifiers always give the same sequence no
 * matter how the input was ordered.
 */
export function sequence(ids: readonly Identifier[], seed: string): Identifier[] {
  if (seed === "") {
    return [...ids];
  }

  return shuffle(sortIdentifiers(ids), createSeededRandom(deriveSeed(seed)));
}
