import type { RngPort } from "../ports/rng";

const U32_MAX = 0xffffffff;

/** Deterministic PRNG for reproducible sampling. */
function mulberry32(seed: number): () => number {
  let t = seed >>> 0;
  return () => {
    t += 0x6d2b79f5;
    let x = t;
    x = Math.imul(x ^ (x >>> 15), x | 1);
    x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
    return (x ^ (x >>> 14)) >>> 0;
  };
}

function fromUnit(unit: () => number): RngPort {
  return {
    uniformReal(low: number, high: number): number {
      return low + unit() * (high - low);
    },
    uniformInt(low: number, high: number): number {
      const lo = Math.ceil(low);
      const hi = Math.floor(high);
      if (hi <= lo) return lo;
      // unit() can return exactly 1, which would land one past hi
      return Math.min(hi, lo + Math.floor(unit() * (hi - lo + 1)));
    },
  };
}

/**
 * Seeded RNG. Equal seeds produce equal sample streams.
 */
export function seededRng(seed: number): RngPort {
  const next = mulberry32(seed);
  return fromUnit(() => next() / U32_MAX);
}

/**
 * Non-reproducible RNG backed by Math.random.
 */
export function mathRng(): RngPort {
  return fromUnit(() => Math.random());
}
