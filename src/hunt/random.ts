/**
 * Randomness used while priming. Injected so tests can pin the seed.
 */
export interface RandomSource {
  /** Uniform 32-bit unsigned integer */
  nextU32(): number;
  /** Uniform integer in [min, max], both inclusive */
  intBetween(min: number, max: number): number;
}

export const mathRandom: RandomSource = {
  nextU32: () => Math.floor(Math.random() * 0x100000000) >>> 0,
  intBetween: (min, max) => min + Math.floor(Math.random() * (max - min + 1)),
};

/**
 * Deterministic mulberry32 generator.
 */
export function seededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  const next = (): number => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return (t ^ (t >>> 14)) >>> 0;
  };
  return {
    nextU32: next,
    intBetween: (min, max) => min + (next() % (max - min + 1)),
  };
}
