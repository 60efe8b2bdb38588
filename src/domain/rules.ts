/**
 * Extraction rules as pure functions and constants.
 */

// ── Path-item keys shared by all operations of a path ───────────────

export const RESERVED_PATH_ITEM_KEYS: ReadonlySet<string> = new Set([
  "summary",
  "description",
  "parameters",
  "servers",
  "$ref",
]);

// ── Label thresholds (tokens after cleaning, strictly greater than) ──

export const MIN_OPERATION_DESCRIPTION_TOKENS = 5;
export const MIN_SCHEMA_DESCRIPTION_TOKENS = 3;

export const EXAMPLE_VALUE_MAX_CHARS = 200;

export const SPEC_FILE_EXTENSIONS = [".yaml", ".yml", ".json"] as const;

// ── Text cleaning ───────────────────────────────────────────────────

/**
 * Normalize free text into a single-line label.
 *
 * Tag spans are removed with a plain `<[^>]+>` match, so unbalanced angle
 * brackets in malformed markup can swallow text up to the next `>`.
 */
export function cleanText(text: string | null | undefined): string {
  if (!text) return "";
  let out = text.replace(/<[^>]+>/g, "");
  out = out.replace(/[\n\r]/g, " ");
  return out.replace(/\s+/g, " ").trim();
}

export function countTokens(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

/** Truncate to at most `max` code points. */
export function truncate(text: string, max: number): string {
  const chars = Array.from(text);
  return chars.length <= max ? text : chars.slice(0, max).join("");
}
