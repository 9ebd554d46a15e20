/**
 * packages/testkit/src/rng.ts — Seeded PRNG for property-style tests.
 *
 * Why: Randomized tests must replay exactly from a seed. xorshift32 is small,
 * fast and good enough to pick sizes and indices.
 */

export type Rng = Readonly<{
  /** Next value in [0, 2^32). */
  u32(): number;
  /** Next integer in [lo, hi]. */
  int(lo: number, hi: number): number;
}>;

export function createRng(seed: number): Rng {
  // xorshift32 has a fixed point at 0.
  let state = seed >>> 0 || 0x9e3779b9;

  const u32 = (): number => {
    let x = state;
    x ^= x << 13;
    x >>>= 0;
    x ^= x >>> 17;
    x ^= x << 5;
    x >>>= 0;
    state = x;
    return x;
  };

  return Object.freeze({
    u32,
    int(lo: number, hi: number): number {
      if (hi < lo) return lo;
      return lo + (u32() % (hi - lo + 1));
    },
  });
}
