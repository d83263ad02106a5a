/**
 * packages/testkit/src/rng.ts — Seeded deterministic RNG for fuzz-style tests.
 *
 * Why: Randomized tests must replay exactly from a printed seed, so they use a
 * small xorshift32 generator instead of Math.random().
 */

export type Rng = Readonly<{
  /** Next unsigned 32-bit value. */
  u32(): number;
  /** Next float in [0, 1). */
  next(): number;
  /** Integer in [min, max] (inclusive). */
  int(min: number, max: number): number;
  /** True with probability `percent`/100. */
  chance(percent: number): boolean;
  pick<T>(values: readonly T[]): T;
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
    next: () => u32() / 4294967296,
    int: (min: number, max: number) => min + (u32() % (max - min + 1)),
    chance: (percent: number) => u32() % 100 < percent,
    pick<T>(values: readonly T[]): T {
      const value = values.length === 0 ? undefined : values[u32() % values.length];
      if (value === undefined) {
        throw new Error("createRng.pick: values must be non-empty");
      }
      return value;
    },
  });
}
