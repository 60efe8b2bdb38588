import { RecordType, type DatasetRecord } from "../../domain/types.ts";

export function record(
  inputText: string,
  targetText = `label for ${inputText}`,
  type: RecordType = RecordType.OPERATION_DESCRIPTION,
  sourceFile = "spec.yaml",
): DatasetRecord {
  return { source_file: sourceFile, type, input_text: inputText, target_text: targetText };
}

export function records(count: number): DatasetRecord[] {
  return Array.from({ length: count }, (_, i) => record(`ctx-${i}`));
}
