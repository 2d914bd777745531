/**
 * Source of uniformly distributed numbers in [0, 1)
 */
export type RandomSource = () => number;

/**
 * Seeded 32-bit PRNG. The same seed always yields the same sequence.
 */
export function mulberry32(seed: number): RandomSource {
  let value = seed >>> 0;
  return () => {
    value += 0x6d2b79f5;
    let t = Math.imul(value ^ (value >>> 15), 1 | value);
    t ^= t + Math.imul(t ^ (t >>> 7), 61 | t);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

// Uniform in [min, max)
export function randomBetween(random: RandomSource, min: number, max: number): number {
  return min + random() * (max - min);
}
