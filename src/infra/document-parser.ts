/**
 * Spec file parsing — YAML (and therefore JSON) into the DocNode tree.
 */

import { readFile } from "node:fs/promises";
import { parseDocument as parseYamlDocument } from "yaml";
import { toDocNode, type DocNode } from "../domain/document.ts";

export type ParseResult =
  | { ok: true; document: DocNode }
  | { ok: false; reason: string };

const decoder = new TextDecoder("utf-8", { fatal: true });

export function parseDocument(bytes: Uint8Array): ParseResult {
  let source: string;
  try {
    source = decoder.decode(bytes);
  } catch (e) {
    return { ok: false, reason: `Invalid UTF-8: ${errorMessage(e)}` };
  }
  return parseText(source);
}

export function parseText(source: string): ParseResult {
  try {
    // Duplicate keys are accepted; the last one wins. Integers stay exact.
    const doc = parseYamlDocument(source, { uniqueKeys: false, logLevel: "error", intAsBigInt: true });
    const [firstError] = doc.errors;
    if (firstError) return { ok: false, reason: firstError.message };
    // Alias expansion is unbounded; shared anchors become shared nodes.
    const value: unknown = doc.toJS({ maxAliasCount: -1 });
    return { ok: true, document: toDocNode(value) };
  } catch (e) {
    return { ok: false, reason: errorMessage(e) };
  }
}

export async function loadDocument(filePath: string): Promise<ParseResult> {
  let bytes: Uint8Array;
  try {
    bytes = await readFile(filePath);
  } catch (e) {
    return { ok: false, reason: `File error: ${errorMessage(e)}` };
  }
  return parseDocument(bytes);
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
