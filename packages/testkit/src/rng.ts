/**
 * Deterministic xorshift32 generator for randomized structural tests.
 * The same seed always yields the same sequence.
 */
export type Rng = Readonly<{
  u32: () => number;
  /** Uniform integer in [min, max]. */
  int: (min: number, max: number) => number;
  /** True with probability `p`. */
  chance: (p: number) => boolean;
  pick: <T>(items: readonly T[]) => T;
}>;

export function createRng(seed: number): Rng {
  let state = seed >>> 0 || 0x9e3779b9;

  const u32 = (): number => {
    state ^= state << 13;
    state >>>= 0;
    state ^= state >>> 17;
    state ^= state << 5;
    state >>>= 0;
    return state;
  };

  const int = (min: number, max: number): number => {
    if (max < min) throw new RangeError(`createRng.int: max ${String(max)} < min ${String(min)}`);
    return min + (u32() % (max - min + 1));
  };

  return Object.freeze({
    u32,
    int,
    chance: (p: number) => u32() / 4294967296 < p,
    pick: <T>(items: readonly T[]): T => {
      const item = items[int(0, items.length - 1)];
      if (item === undefined) throw new RangeError("createRng.pick: empty list");
      return item;
    },
  });
}
