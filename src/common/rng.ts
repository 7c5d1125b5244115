import type { Rng } from "./types";

export const defaultRng: Rng = Math.random;

/**
 * Seeded PRNG (mulberry32). The same seed always yields the same sequence,
 * which makes a whole experiment reproducible.
 */
export function createRng(seed: number): Rng {
  let s = seed | 0;
  return () => {
    s = (s + 0x6d2b79f5) | 0;
    let t = Math.imul(s ^ (s >>> 15), 1 | s);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Replays a fixed list of draws in a loop. Handy for scripted experiments. */
export function sequenceRng(values: readonly number[]): Rng {
  if (values.length === 0) {
    throw new RangeError("sequenceRng needs at least one value");
  }
  let i = 0;
  return () => {
    const value = values[i % values.length];
    i++;
    return value;
  };
}
