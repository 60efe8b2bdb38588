/**
 * ExtractFile command.
 *
 * Runs one spec file through parse + every selected extractor. Failures stay
 * local to the file and come back as a FileFailure.
 */

import { basename } from "node:path";
import { isMapping, type DocNode } from "../../domain/document.ts";
import type { DatasetRecord, FileResult } from "../../domain/types.ts";
import { errorMessage, loadDocument } from "../../infra/document-parser.ts";
import type { Extractor } from "../extractors/base.ts";

export async function extractFile(filePath: string, extractors: Extractor[]): Promise<FileResult> {
  const sourceFile = basename(filePath);

  // 1. Parse
  const parsed = await loadDocument(filePath);
  if (!parsed.ok) {
    return { success: false, failure: { file: filePath, kind: "parse", reason: parsed.reason } };
  }

  // 2. Extract
  try {
    return { success: true, records: extractDocument(parsed.document, sourceFile, extractors) };
  } catch (e) {
    return { success: false, failure: { file: filePath, kind: "extraction", reason: errorMessage(e) } };
  }
}

/** Records from an already parsed document; a non-mapping root yields none. */
export function extractDocument(
  document: DocNode,
  sourceFile: string,
  extractors: Extractor[],
): DatasetRecord[] {
  if (!isMapping(document)) return [];
  const records: DatasetRecord[] = [];
  for (const extractor of extractors) {
    records.push(...extractor.extract(document, sourceFile));
  }
  return records;
}
