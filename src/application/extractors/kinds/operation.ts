/**
 * Operation extractor — kind: operations
 *
 * One record per HTTP operation under `paths`, labelled by its description.
 */

import { get, renderValue, textOf, type DocNode, type MappingNode } from "../../../domain/document.ts";
import { MIN_OPERATION_DESCRIPTION_TOKENS, RESERVED_PATH_ITEM_KEYS } from "../../../domain/rules.ts";
import { ExtractorKind, RecordType, type DatasetRecord } from "../../../domain/types.ts";
import { makeRecord, mappingEntries, substantialLabel, type Extractor } from "../base.ts";

export class OperationExtractor implements Extractor {
  kind: ExtractorKind = ExtractorKind.OPERATIONS;

  extract(root: MappingNode, sourceFile: string): DatasetRecord[] {
    const records: DatasetRecord[] = [];

    for (const [path, pathItem] of mappingEntries(get(root, "paths"))) {
      for (const [method, operation] of mappingEntries(pathItem)) {
        if (RESERVED_PATH_ITEM_KEYS.has(method)) continue;

        const label = substantialLabel(
          textOf(get(operation, "description")),
          MIN_OPERATION_DESCRIPTION_TOKENS,
        );
        if (!label) continue;

        const summary = renderValue(get(operation, "summary"));
        const tags = formatTags(get(operation, "tags"));
        const context = `Method: ${method.toUpperCase()} | Path: ${path} | Summary: ${summary} | Tags: ${tags}`;

        records.push(makeRecord(sourceFile, RecordType.OPERATION_DESCRIPTION, context, label));
      }
    }

    return records;
  }
}

/** Comma-joined tag list; anything other than a sequence renders empty. */
export function formatTags(tags: DocNode): string {
  if (tags.kind !== "sequence") return "";
  return tags.items.map((tag) => renderValue(tag)).join(", ");
}
