/**
 * MineCorpus command.
 *
 * Walks every configured corpus and extracts records file by file, in
 * canonical order (corpus order, then sorted path). Per-file failures are
 * counted and reported; they never stop the run.
 */

import { resolve } from "node:path";
import type { DatasetRecord, FileFailure, MiningResult, PipelineConfig } from "../../domain/types.ts";
import { collectCorpusFiles } from "../../infra/file-collector.ts";
import { createDefaultRegistry, type ExtractorRegistry } from "../extractors/registry.ts";
import { extractFile } from "./extract-file.ts";

export interface MineOptions {
  registry?: ExtractorRegistry;
  /** Called after each file, e.g. for progress output. */
  onFile?: (filePath: string, corpus: string, recordCount: number | null) => void;
}

export async function mineCorpus(
  config: Pick<PipelineConfig, "rootDir" | "corpora" | "enabledExtractors">,
  options: MineOptions = {},
): Promise<MiningResult> {
  const registry = options.registry ?? createDefaultRegistry();
  const extractors = registry.select(config.enabledExtractors);
  const collected = await collectCorpusFiles(resolve(config.rootDir), config.corpora);

  const records: DatasetRecord[] = [];
  const failures: FileFailure[] = [];
  let filesScanned = 0;

  for (const { corpus, files } of collected.corpora) {
    for (const filePath of files) {
      filesScanned++;
      const result = await extractFile(filePath, extractors);
      if (result.success) {
        records.push(...result.records);
        options.onFile?.(filePath, corpus, result.records.length);
      } else {
        failures.push(result.failure);
        options.onFile?.(filePath, corpus, null);
      }
    }
  }

  return {
    records,
    filesScanned,
    skippedFiles: failures.length,
    failures,
    missingCorpora: collected.missingCorpora,
  };
}
