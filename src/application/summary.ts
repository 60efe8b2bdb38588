/**
 * Dataset summary — sizes per split and record counts per type.
 */

import type { DatasetRecord, DatasetSplits, DatasetSummary, RecordType } from "../domain/types.ts";

/** Counts per type, most frequent first; ties keep first-appearance order. */
export function typeBreakdown(records: DatasetRecord[]): Partial<Record<RecordType, number>> {
  const counts = new Map<RecordType, number>();
  for (const r of records) counts.set(r.type, (counts.get(r.type) ?? 0) + 1);

  const ordered = [...counts].sort((a, b) => b[1] - a[1]);
  const breakdown: Partial<Record<RecordType, number>> = {};
  for (const [type, count] of ordered) breakdown[type] = count;
  return breakdown;
}

export function summarizeDataset(records: DatasetRecord[], splits: DatasetSplits): DatasetSummary {
  return {
    total_examples: records.length,
    train_size: splits.train.length,
    val_size: splits.val.length,
    test_size: splits.test.length,
    type_breakdown: typeBreakdown(records),
  };
}
