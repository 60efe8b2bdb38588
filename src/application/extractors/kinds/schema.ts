/**
 * Schema extractor — kind: schemas
 */

import { get, getPath, keys, textOf, type MappingNode } from "../../../domain/document.ts";
import { MIN_SCHEMA_DESCRIPTION_TOKENS } from "../../../domain/rules.ts";
import { ExtractorKind, RecordType, type DatasetRecord } from "../../../domain/types.ts";
import { makeRecord, mappingEntries, substantialLabel, type Extractor } from "../base.ts";

export class SchemaExtractor implements Extractor {
  kind: ExtractorKind = ExtractorKind.SCHEMAS;

  extract(root: MappingNode, sourceFile: string): DatasetRecord[] {
    const records: DatasetRecord[] = [];

    for (const [name, schema] of mappingEntries(getPath(root, "components", "schemas"))) {
      const label = substantialLabel(textOf(get(schema, "description")), MIN_SCHEMA_DESCRIPTION_TOKENS);
      if (!label) continue;

      const fields = keys(get(schema, "properties")).join(", ");
      records.push(
        makeRecord(sourceFile, RecordType.SCHEMA_DESCRIPTION, `Schema: ${name} | Fields: ${fields}`, label),
      );
    }

    return records;
  }
}
