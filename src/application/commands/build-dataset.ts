/**
 * BuildDataset command — dedupe, split and summarize mined records.
 */

import type { BuildResult, DatasetRecord, PipelineConfig } from "../../domain/types.ts";
import { dedupeRecords } from "../dedupe.ts";
import { splitDataset } from "../splitting.ts";
import { summarizeDataset } from "../summary.ts";

export function buildDataset(
  records: DatasetRecord[],
  config: Pick<PipelineConfig, "splitSeed" | "splitRatios">,
): BuildResult {
  const unique = dedupeRecords(records);
  if (unique.length === 0) {
    return {
      success: false,
      reason: "No records extracted from any file; check the corpus root and corpus names",
    };
  }

  const splits = splitDataset(unique, { seed: config.splitSeed, ratios: config.splitRatios });
  return {
    success: true,
    duplicatesDropped: records.length - unique.length,
    splits,
    summary: summarizeDataset(unique, splits),
  };
}
