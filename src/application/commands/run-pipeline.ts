/**
 * RunPipeline command — mine, build and write the dataset in one pass.
 *
 * Nothing is written unless the build succeeds, so an empty corpus leaves
 * the output directory untouched.
 */

import { resolve } from "node:path";
import type { DatasetSummary, MiningResult, PipelineConfig } from "../../domain/types.ts";
import { DatasetWriter } from "../../infra/dataset-writer.ts";
import { buildDataset } from "./build-dataset.ts";
import { mineCorpus, type MineOptions } from "./mine-corpus.ts";

export type PipelineResult =
  | {
      success: true;
      mined: MiningResult;
      duplicatesDropped: number;
      summary: DatasetSummary;
      /** Split files in train, val, test order, then the summary file. */
      writtenFiles: string[];
    }
  | { success: false; mined: MiningResult; reason: string };

export async function runPipeline(config: PipelineConfig, options: MineOptions = {}): Promise<PipelineResult> {
  const mined = await mineCorpus(config, options);

  const built = buildDataset(mined.records, config);
  if (!built.success) return { success: false, mined, reason: built.reason };

  const writer = new DatasetWriter(resolve(config.outputDir));
  const splitPaths = await writer.writeSplits(built.splits);
  const summaryPath = await writer.writeSummary(built.summary);

  return {
    success: true,
    mined,
    duplicatesDropped: built.duplicatesDropped,
    summary: built.summary,
    writtenFiles: [...splitPaths, summaryPath],
  };
}
