/**
 * Deterministic train/val/test partitioning.
 *
 * Two stages, each shuffling with a fresh generator seeded from the same seed:
 * carve `val + test` out of the full set, then carve `test` out of that
 * holdout. Same seed and same input order always give the same partitions.
 */

import type { DatasetRecord, DatasetSplits, SplitRatios } from "../domain/types.ts";

export const DEFAULT_SPLIT_SEED = 42;
export const DEFAULT_SPLIT_RATIOS: SplitRatios = { train: 0.8, val: 0.1, test: 0.1 };

export interface SplitOptions {
  seed?: number;
  ratios?: SplitRatios;
}

/** Seeded pseudo-random number generator (Mulberry32), values in [0, 1). */
export function mulberry32(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Fisher-Yates shuffle into a new array. */
export function shuffled<T>(items: readonly T[], random: () => number): T[] {
  const out = [...items];
  for (let i = out.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    const a = out[i];
    const b = out[j];
    if (a === undefined || b === undefined) continue;
    out[i] = b;
    out[j] = a;
  }
  return out;
}

/**
 * Split `items` so that `ceil(n * holdoutFraction)` of them land in the
 * holdout. Returns `[rest, holdout]`.
 */
export function holdoutSplit<T>(items: readonly T[], holdoutFraction: number, seed: number): [T[], T[]] {
  const holdoutSize = Math.min(items.length, Math.ceil(items.length * holdoutFraction));
  const order = shuffled(items, mulberry32(seed));
  return [order.slice(holdoutSize), order.slice(0, holdoutSize)];
}

export function splitDataset(records: DatasetRecord[], options: SplitOptions = {}): DatasetSplits {
  const seed = options.seed ?? DEFAULT_SPLIT_SEED;
  const { val, test } = options.ratios ?? DEFAULT_SPLIT_RATIOS;
  const holdout = val + test;

  if (holdout <= 0) return { train: [...records], val: [], test: [] };

  const [train, temp] = holdoutSplit(records, holdout, seed);
  const [valSplit, testSplit] = holdoutSplit(temp, test / holdout, seed);
  return { train, val: valSplit, test: testSplit };
}
