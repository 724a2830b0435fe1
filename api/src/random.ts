// api/src/random.ts
import seedrandom from "seedrandom";

/** Uniform source of floats in [0, 1). */
export interface RandomSource {
  next(): number;
}

export const systemRandom: RandomSource = {
  next: () => Math.random(),
};

export function createSeededRandom(seed: number | string): RandomSource {
  const prng = seedrandom(String(seed));
  return { next: () => prng() };
}

/** Integer in [0, n). */
export function randomIndex(random: RandomSource, n: number): number {
  if (n <= 0) throw new Error(`randomIndex: empty range (${n})`);
  const idx = Math.floor(random.next() * n);
  return Math.min(idx, n - 1);
}

export function pickOne<T>(random: RandomSource, items: readonly T[]): T {
  if (items.length === 0) throw new Error("pickOne: empty pool");
  return items[randomIndex(random, items.length)];
}

/** Fisher–Yates, returns a new array. */
export function shuffle<T>(random: RandomSource, items: readonly T[]): T[] {
  const out = items.slice();
  for (let i = out.length - 1; i > 0; i--) {
    const j = randomIndex(random, i + 1);
    const tmp = out[i];
    out[i] = out[j];
    out[j] = tmp;
  }
  return out;
}
