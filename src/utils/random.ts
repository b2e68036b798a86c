/** Uniform source in [0, 1), same contract as Math.random. */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

/** Deterministic PRNG (mulberry32). */
export function mulberry32(seed: number): RandomSource {
  let s = seed | 0;
  return () => {
    s = (s + 0x6d2b79f5) | 0;
    let t = Math.imul(s ^ (s >>> 15), 1 | s);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function randomIndex(length: number, random: RandomSource): number {
  return Math.min(length - 1, Math.floor(random() * length));
}

/**
 * Fisher–Yates permutation of 0..n-1.
 */
export function permutation(n: number, random: RandomSource): number[] {
  const order = Array.from({ length: n }, (_, i) => i);
  for (let i = n - 1; i > 0; i--) {
    const j = randomIndex(i + 1, random);
    [order[i], order[j]] = [order[j], order[i]];
  }
  return order;
}
