/**
 * packages/testkit/src/rng.ts: Seeded PRNG for property tests.
 *
 * mulberry32: same seed, same sequence, on every platform.
 */

export type Rng = Readonly<{
  /** Next unsigned 32-bit value. */
  u32: () => number;
  /** Integer in [0, maxExclusive). */
  int: (maxExclusive: number) => number;
  /** Float in [0, 1). */
  float: () => number;
  pick: <T>(items: readonly T[]) => T;
  /** String of `length` characters drawn from `alphabet`. */
  string: (length: number, alphabet: string) => string;
}>;

export function createRng(seed: number): Rng {
  let state = seed >>> 0;

  const u32 = (): number => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return (t ^ (t >>> 14)) >>> 0;
  };

  const int = (maxExclusive: number): number => {
    if (!Number.isInteger(maxExclusive) || maxExclusive <= 0) {
      throw new RangeError(`maxExclusive must be a positive integer, got ${maxExclusive}`);
    }
    return u32() % maxExclusive;
  };

  const pick = <T>(items: readonly T[]): T => {
    const item = items[int(items.length)];
    if (item === undefined) throw new RangeError("pick from an empty list");
    return item;
  };

  const chars = (alphabet: string): readonly string[] => Array.from(alphabet);

  return Object.freeze({
    u32,
    int,
    float: () => u32() / 0x1_0000_0000,
    pick,
    string: (length: number, alphabet: string): string => {
      const pool = chars(alphabet);
      let out = "";
      for (let i = 0; i < length; i++) out += pick(pool);
      return out;
    },
  });
}
