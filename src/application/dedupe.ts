/**
 * Record deduplication on `input_text`, first occurrence wins.
 */

import type { DatasetRecord } from "../domain/types.ts";

export function dedupeRecords(records: DatasetRecord[]): DatasetRecord[] {
  const seen = new Set<string>();
  return records.filter((r) => {
    if (seen.has(r.input_text)) return false;
    seen.add(r.input_text);
    return true;
  });
}
