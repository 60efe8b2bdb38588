/**
 * Base extractor protocol and shared helpers.
 */

import { entries, type DocNode, type MappingNode } from "../../domain/document.ts";
import { cleanText, countTokens } from "../../domain/rules.ts";
import type { DatasetRecord, ExtractorKind, RecordType } from "../../domain/types.ts";

export interface Extractor {
  kind: ExtractorKind;
  /** Mine records from a document whose root is already known to be a mapping. */
  extract(root: MappingNode, sourceFile: string): DatasetRecord[];
}

export function makeRecord(
  sourceFile: string,
  type: RecordType,
  inputText: string,
  targetText: string,
): DatasetRecord {
  return {
    source_file: sourceFile,
    type,
    input_text: inputText,
    target_text: targetText,
  };
}

/** Cleaned label, or null when it does not carry more than `minTokens` tokens. */
export function substantialLabel(raw: string, minTokens = 0): string | null {
  const cleaned = cleanText(raw);
  if (!cleaned || countTokens(cleaned) <= minTokens) return null;
  return cleaned;
}

/** Entries of a mapping whose value is itself a mapping. */
export function mappingEntries(node: DocNode): [string, MappingNode][] {
  const out: [string, MappingNode][] = [];
  for (const [key, value] of entries(node)) {
    if (value.kind === "mapping") out.push([key, value]);
  }
  return out;
}
