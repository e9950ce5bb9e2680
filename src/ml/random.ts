/**
 * Seeded pseudo-random numbers (mulberry32).
 *
 * Every stochastic step takes a `Random` created from the configured seed,
 * never Math.random, so identical input gives identical output.
 */

export type Random = () => number;

export function createRandom(seed: number): Random {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function randomInt(random: Random, maxExclusive: number): number {
  return Math.min(maxExclusive - 1, Math.floor(random() * maxExclusive));
}

/** `size` distinct indices from [0, n), partial Fisher-Yates. */
export function sampleIndices(random: Random, n: number, size: number): number[] {
  const indices = Array.from({ length: n }, (_, i) => i);
  const take = Math.min(size, n);

  for (let i = 0; i < take; i++) {
    const j = i + randomInt(random, n - i);
    const tmp = indices[i];
    indices[i] = indices[j];
    indices[j] = tmp;
  }

  return indices.slice(0, take);
}
