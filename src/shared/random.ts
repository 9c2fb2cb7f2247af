export type RandomSource = () => number;

/**
 * Small seeded generator (mulberry32). Same seed, same sequence.
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return function () {
    let t = (state += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function randomInt(rng: RandomSource, maxExclusive: number): number {
  return Math.floor(rng() * maxExclusive);
}
