/** Source of uniform floats in [0, 1). Injected everywhere randomness is needed. */
export interface Random {
  next(): number;
}

// Simple LCG for deterministic gameplay randomness.
export function createRng(seed: number): Random {
  let state = seed >>> 0;
  return {
    next(): number {
      // LCG parameters (Numerical Recipes)
      state = (state * 1664525 + 1013904223) >>> 0;
      return state / 0x100000000;
    },
  };
}

export const mathRandom: Random = { next: () => Math.random() };

export function nextRange(rng: Random, min: number, max: number): number {
  return min + rng.next() * (max - min);
}

/** Inclusive on both ends. */
export function nextInt(rng: Random, min: number, max: number): number {
  return Math.min(max, Math.floor(nextRange(rng, min, max + 1)));
}

export function pick<T>(rng: Random, items: readonly T[]): T | undefined {
  if (items.length === 0) return undefined;
  return items[nextInt(rng, 0, items.length - 1)];
}
