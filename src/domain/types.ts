/**
 * Domain types for the dataset miner.
 */

// ── Enums (as const objects for runtime + type safety) ──────────────

export const RecordType = {
  OPERATION_DESCRIPTION: "operation_description",
  EXAMPLE_DESCRIPTION: "example_description",
  EXAMPLE_SUMMARY: "example_summary",
  SCHEMA_DESCRIPTION: "schema_description",
} as const;
export type RecordType = (typeof RecordType)[keyof typeof RecordType];

export const ExtractorKind = {
  OPERATIONS: "operations",
  EXAMPLES: "examples",
  SCHEMAS: "schemas",
} as const;
export type ExtractorKind = (typeof ExtractorKind)[keyof typeof ExtractorKind];

/** Canonical run order of extractors, independent of configuration order. */
export const EXTRACTOR_ORDER: readonly ExtractorKind[] = [
  ExtractorKind.OPERATIONS,
  ExtractorKind.EXAMPLES,
  ExtractorKind.SCHEMAS,
];

export const SplitName = { TRAIN: "train", VAL: "val", TEST: "test" } as const;
export type SplitName = (typeof SplitName)[keyof typeof SplitName];

// ── Data interfaces ─────────────────────────────────────────────────

/**
 * One mined training example. Field names and their order are the on-disk
 * contract with the fine-tuning job, which reads `input_text`/`target_text`.
 */
export interface DatasetRecord {
  source_file: string;
  type: RecordType;
  input_text: string;
  target_text: string;
}

export interface SplitRatios {
  train: number;
  val: number;
  test: number;
}

export interface PipelineConfig {
  rootDir: string;
  corpora: string[];
  enabledExtractors: ExtractorKind[];
  splitSeed: number;
  splitRatios: SplitRatios;
  outputDir: string;
}

export interface DatasetSplits {
  train: DatasetRecord[];
  val: DatasetRecord[];
  test: DatasetRecord[];
}

export interface DatasetSummary {
  total_examples: number;
  train_size: number;
  val_size: number;
  test_size: number;
  type_breakdown: Partial<Record<RecordType, number>>;
}

// ── Pipeline results ────────────────────────────────────────────────

export type FailureKind = "parse" | "extraction";

export interface FileFailure {
  file: string;
  kind: FailureKind;
  reason: string;
}

export type FileResult =
  | { success: true; records: DatasetRecord[] }
  | { success: false; failure: FileFailure };

export interface MiningResult {
  records: DatasetRecord[];
  filesScanned: number;
  skippedFiles: number;
  failures: FileFailure[];
  missingCorpora: string[];
}

export type BuildResult =
  | { success: true; duplicatesDropped: number; splits: DatasetSplits; summary: DatasetSummary }
  | { success: false; reason: string };
