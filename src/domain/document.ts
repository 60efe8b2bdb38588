/**
 * Document model — parsed spec files as an explicit tagged tree.
 *
 * Any node may be any variant, wherever it sits in the tree. Every accessor
 * here is total: reading through a node of the wrong variant yields the
 * caller's fallback.
 */

export type Scalar = string | number | boolean | bigint;

export type DocNode =
  | { kind: "mapping"; entries: Map<string, DocNode> }
  | { kind: "sequence"; items: DocNode[] }
  | { kind: "scalar"; value: Scalar }
  | { kind: "null" };

export type MappingNode = Extract<DocNode, { kind: "mapping" }>;

export const NULL_NODE: DocNode = { kind: "null" };

/**
 * Convert a value produced by a YAML/JSON parser into a DocNode.
 *
 * Objects reached more than once (YAML aliases) map to one shared node, and a
 * collection is memoized before its children are converted, so self-referencing
 * anchors become cyclic DocNodes instead of recursing forever.
 */
export function toDocNode(value: unknown, seen: Map<object, DocNode> = new Map()): DocNode {
  if (value === null || value === undefined) return NULL_NODE;
  if (typeof value === "object") {
    const known = seen.get(value);
    if (known) return known;
  }
  if (Array.isArray(value)) {
    const items: DocNode[] = [];
    const node: DocNode = { kind: "sequence", items };
    seen.set(value, node);
    for (const item of value) items.push(toDocNode(item, seen));
    return node;
  }
  if (value instanceof Date) {
    return { kind: "scalar", value: Number.isNaN(value.getTime()) ? String(value) : value.toISOString() };
  }
  if (value instanceof Map) {
    const entries = new Map<string, DocNode>();
    const node: DocNode = { kind: "mapping", entries };
    seen.set(value, node);
    for (const [k, v] of value) entries.set(String(k), toDocNode(v, seen));
    return node;
  }
  switch (typeof value) {
    case "string":
    case "number":
    case "boolean":
    case "bigint":
      return { kind: "scalar", value };
    case "object": {
      const entries = new Map<string, DocNode>();
      const node: DocNode = { kind: "mapping", entries };
      seen.set(value, node);
      for (const [k, v] of Object.entries(value)) entries.set(k, toDocNode(v, seen));
      return node;
    }
    default:
      return { kind: "scalar", value: String(value) };
  }
}

export function isMapping(node: DocNode | undefined): node is MappingNode {
  return node !== undefined && node.kind === "mapping";
}

/**
 * Safe field access. A non-mapping `node` yields `fallback` for every key;
 * a mapping yields the child when present, else `fallback`.
 */
export function get(node: DocNode | undefined, key: string, fallback: DocNode = NULL_NODE): DocNode {
  if (!isMapping(node)) return fallback;
  return node.entries.get(key) ?? fallback;
}

/** Follow a chain of keys, stopping at the first absent or non-mapping step. */
export function getPath(node: DocNode | undefined, ...path: string[]): DocNode {
  let current: DocNode = node ?? NULL_NODE;
  for (const key of path) current = get(current, key);
  return current;
}

/** Key/child pairs of a mapping in insertion order; empty for anything else. */
export function entries(node: DocNode | undefined): [string, DocNode][] {
  return isMapping(node) ? [...node.entries] : [];
}

export function keys(node: DocNode | undefined): string[] {
  return isMapping(node) ? [...node.entries.keys()] : [];
}

/** Scalars rendered as text; null, mappings and sequences read as "". */
export function textOf(node: DocNode | undefined): string {
  return node !== undefined && node.kind === "scalar" ? String(node.value) : "";
}

/**
 * Render any node as display text: scalars as themselves, null as "",
 * mappings and sequences as compact JSON.
 */
export function renderValue(node: DocNode | undefined): string {
  if (node === undefined) return "";
  switch (node.kind) {
    case "null":
      return "";
    case "scalar":
      return String(node.value);
    case "mapping":
    case "sequence":
      return toJson(node);
  }
}

/**
 * Compact JSON for a node. Bigints are written as bare digits; a node that
 * contains itself is written as null at the point of recursion.
 */
export function toJson(node: DocNode, active: Set<DocNode> = new Set()): string {
  switch (node.kind) {
    case "null":
      return "null";
    case "scalar":
      if (typeof node.value === "bigint") return node.value.toString();
      return JSON.stringify(node.value);
    case "sequence":
    case "mapping": {
      if (active.has(node)) return "null";
      active.add(node);
      const body =
        node.kind === "sequence"
          ? `[${node.items.map((item) => toJson(item, active)).join(",")}]`
          : `{${[...node.entries].map(([k, v]) => `${JSON.stringify(k)}:${toJson(v, active)}`).join(",")}}`;
      active.delete(node);
      return body;
    }
  }
}
