/**
 * Uniform generator on [0, 1).
 * @public
 */
export type Rng = () => number;

/**
 * Simple seeded RNG (32-bit LCG) for reproducible walk sampling.
 * @public
 */
export function createRng(seed: number): Rng {
  let state = seed | 0;
  return () => {
    state = (state * 1664525 + 1013904223) | 0;
    return (state >>> 0) / 4294967296;
  };
}

/**
 * Pick `k` distinct indices from [0, n) uniformly without replacement
 * (partial Fisher-Yates), returned in ascending order.
 * @internal
 */
export function sampleIndices(n: number, k: number, rng: Rng): number[] {
  const count = Math.min(n, Math.max(0, k));
  const pool = Array.from({ length: n }, (_, i) => i);
  for (let i = 0; i < count; i++) {
    const j = i + Math.floor(rng() * (n - i));
    const tmp = pool[i];
    pool[i] = pool[j];
    pool[j] = tmp;
  }
  return pool.slice(0, count).sort((a, b) => a - b);
}
