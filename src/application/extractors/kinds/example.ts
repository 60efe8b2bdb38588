/**
 * Example extractor — kind: examples
 *
 * Reads `components.examples`. An example with both summary and description
 * is labelled by its description; one with only a summary by the summary.
 */

import { get, getPath, renderValue, textOf, type MappingNode } from "../../../domain/document.ts";
import { EXAMPLE_VALUE_MAX_CHARS, truncate } from "../../../domain/rules.ts";
import { ExtractorKind, RecordType, type DatasetRecord } from "../../../domain/types.ts";
import { makeRecord, mappingEntries, substantialLabel, type Extractor } from "../base.ts";

export class ExampleExtractor implements Extractor {
  kind: ExtractorKind = ExtractorKind.EXAMPLES;

  extract(root: MappingNode, sourceFile: string): DatasetRecord[] {
    const records: DatasetRecord[] = [];

    for (const [name, example] of mappingEntries(getPath(root, "components", "examples"))) {
      const summary = textOf(get(example, "summary"));
      const description = textOf(get(example, "description"));
      if (!summary) continue;

      const data = truncate(renderValue(get(example, "value")), EXAMPLE_VALUE_MAX_CHARS);

      if (description) {
        const label = substantialLabel(description);
        if (!label) continue;
        records.push(
          makeRecord(
            sourceFile,
            RecordType.EXAMPLE_DESCRIPTION,
            `Example: ${name} | Summary: ${summary} | Data: ${data}`,
            label,
          ),
        );
      } else {
        const label = substantialLabel(summary);
        if (!label) continue;
        records.push(
          makeRecord(sourceFile, RecordType.EXAMPLE_SUMMARY, `Example: ${name} | Data: ${data}`, label),
        );
      }
    }

    return records;
  }
}
