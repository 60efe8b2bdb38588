/**
 * Dataset writer — writes split files and the summary.
 */

import { join } from "node:path";
import { mkdir, writeFile } from "node:fs/promises";
import { SplitName, type DatasetRecord, type DatasetSplits, type DatasetSummary } from "../domain/types.ts";

export const SUMMARY_FILE = "dataset_summary.json";

export function splitFileName(split: SplitName): string {
  return `${split}.json`;
}

/** JSON Lines: one record per line, trailing newline, non-ASCII kept as is. */
export function toJsonLines(records: DatasetRecord[]): string {
  return records
    .map((r) =>
      JSON.stringify({
        source_file: r.source_file,
        type: r.type,
        input_text: r.input_text,
        target_text: r.target_text,
      }),
    )
    .map((line) => `${line}\n`)
    .join("");
}

export class DatasetWriter {
  constructor(private outputDir: string) {}

  async writeSplits(splits: DatasetSplits): Promise<string[]> {
    await mkdir(this.outputDir, { recursive: true });
    const written: string[] = [];
    for (const split of Object.values(SplitName)) {
      const path = join(this.outputDir, splitFileName(split));
      await writeFile(path, toJsonLines(splits[split]), "utf8");
      written.push(path);
    }
    return written;
  }

  async writeSummary(summary: DatasetSummary): Promise<string> {
    await mkdir(this.outputDir, { recursive: true });
    const path = join(this.outputDir, SUMMARY_FILE);
    await writeFile(path, JSON.stringify(summary, null, 2), "utf8");
    return path;
  }
}
