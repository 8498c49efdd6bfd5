/** Returns a random value in [base*(1-variance), base*(1+variance)] */
export function jitter(base: number, variance = 0.2, random: () => number = Math.random): number {
  const min = base * (1 - variance);
  const max = base * (1 + variance);
  return min + random() * (max - min);
}

/**
 * Seeded PRNG (mulberry32). Returns floats in [0, 1).
 * Same seed, same sequence.
 */
export function createSeededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
