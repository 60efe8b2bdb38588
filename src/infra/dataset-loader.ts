/**
 * Dataset loader — reads written splits back.
 */

import { join } from "node:path";
import { readFile } from "node:fs/promises";
import { z } from "zod";
import { RecordType, SplitName, type DatasetRecord, type DatasetSplits, type DatasetSummary } from "../domain/types.ts";
import { SUMMARY_FILE, splitFileName } from "./dataset-writer.ts";

const recordSchema = z.object({
  source_file: z.string(),
  type: z.nativeEnum(RecordType),
  input_text: z.string(),
  target_text: z.string(),
});

const summarySchema = z.object({
  total_examples: z.number().int().nonnegative(),
  train_size: z.number().int().nonnegative(),
  val_size: z.number().int().nonnegative(),
  test_size: z.number().int().nonnegative(),
  type_breakdown: z.record(z.nativeEnum(RecordType), z.number().int().nonnegative()),
});

/** The fields an inference run needs from a split line. */
export interface EvaluationPair {
  input_text: string;
  reference: string;
}

export async function loadSplit(path: string): Promise<DatasetRecord[]> {
  const text = await readFile(path, "utf8");
  const records: DatasetRecord[] = [];

  text.split("\n").forEach((line, i) => {
    const trimmed = line.trim();
    if (!trimmed) return;
    const parsed = recordSchema.safeParse(JSON.parse(trimmed));
    if (!parsed.success) {
      throw new Error(`${path}:${i + 1}: ${parsed.error.issues.map((issue) => issue.message).join("; ")}`);
    }
    records.push(parsed.data);
  });

  return records;
}

export async function loadSplits(outputDir: string): Promise<DatasetSplits> {
  const load = (split: SplitName) => loadSplit(join(outputDir, splitFileName(split)));
  const [train, val, test] = await Promise.all([
    load(SplitName.TRAIN),
    load(SplitName.VAL),
    load(SplitName.TEST),
  ]);
  return { train, val, test };
}

export async function loadSummary(outputDir: string): Promise<DatasetSummary> {
  const raw: unknown = JSON.parse(await readFile(join(outputDir, SUMMARY_FILE), "utf8"));
  return summarySchema.parse(raw);
}

export async function loadEvaluationPairs(path: string): Promise<EvaluationPair[]> {
  const records = await loadSplit(path);
  return records.map((r) => ({ input_text: r.input_text, reference: r.target_text }));
}
