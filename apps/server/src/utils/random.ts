export type Rng = () => number; // uniform in [0, 1)

// mulberry32: small seeded generator, one instance per run
export const createRng = (seed: number): Rng => {
  let s = seed >>> 0;
  return () => {
    s = (s + 0x6d2b79f5) >>> 0;
    let t = s;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
};

export const permutation = (n: number, rng: Rng): number[] => {
  const order = Array.from({ length: n }, (_, i) => i);
  for (let i = n - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    [order[i], order[j]] = [order[j], order[i]];
  }
  return order;
};

/** Picks `k` distinct items uniformly, without replacement. */
export const sampleWithoutReplacement = <T>(items: readonly T[], k: number, rng: Rng): T[] =>
  permutation(items.length, rng).slice(0, k).map(i => items[i]);
