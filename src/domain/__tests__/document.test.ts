import { describe, it, expect } from "vitest";
import {
  NULL_NODE,
  entries,
  get,
  getPath,
  isMapping,
  keys,
  renderValue,
  textOf,
  toDocNode,
  type DocNode,
} from "../document.ts";

const scalar = (value: string | number | boolean): DocNode => ({ kind: "scalar", value });

describe("toDocNode", () => {
  it("tags each variant", () => {
    expect(toDocNode(null)).toEqual({ kind: "null" });
    expect(toDocNode(undefined)).toEqual({ kind: "null" });
    expect(toDocNode("x")).toEqual({ kind: "scalar", value: "x" });
    expect(toDocNode(3)).toEqual({ kind: "scalar", value: 3 });
    expect(toDocNode([1])).toEqual({ kind: "sequence", items: [{ kind: "scalar", value: 1 }] });
    expect(toDocNode({ a: true })).toEqual({
      kind: "mapping",
      entries: new Map([["a", { kind: "scalar", value: true }]]),
    });
  });

  it("renders dates as ISO strings", () => {
    expect(toDocNode(new Date("2024-01-02T03:04:05.000Z"))).toEqual({
      kind: "scalar",
      value: "2024-01-02T03:04:05.000Z",
    });
  });

  it("keeps mapping key order", () => {
    expect(keys(toDocNode({ b: 1, a: 2, c: 3 }))).toEqual(["b", "a", "c"]);
  });
});

describe("get", () => {
  const nonMappings: DocNode[] = [
    NULL_NODE,
    scalar("paths"),
    scalar(42),
    scalar(false),
    { kind: "sequence", items: [scalar("a")] },
  ];

  it("returns the fallback for every key on a non-mapping node", () => {
    const fallback = scalar("default");
    for (const node of nonMappings) {
      for (const key of ["paths", "0", "length", "__proto__", ""]) {
        expect(get(node, key, fallback)).toBe(fallback);
      }
    }
  });

  it("returns the fallback for an undefined node", () => {
    expect(get(undefined, "x")).toBe(NULL_NODE);
  });

  it("returns the child when present and the fallback when absent", () => {
    const node = toDocNode({ summary: "s" });
    expect(get(node, "summary")).toEqual(scalar("s"));
    expect(get(node, "description", scalar(""))).toEqual(scalar(""));
  });

  it("does not see inherited object properties", () => {
    const node = toDocNode({});
    expect(get(node, "toString")).toBe(NULL_NODE);
    expect(get(node, "constructor")).toBe(NULL_NODE);
  });
});

describe("getPath", () => {
  it("stops at a non-mapping step", () => {
    const doc = toDocNode({ components: ["not", "a", "mapping"] });
    expect(getPath(doc, "components", "schemas")).toBe(NULL_NODE);
  });

  it("walks nested mappings", () => {
    const doc = toDocNode({ components: { schemas: { User: {} } } });
    expect(keys(getPath(doc, "components", "schemas"))).toEqual(["User"]);
  });
});

describe("entries / isMapping", () => {
  it("is empty for non-mappings", () => {
    expect(entries(toDocNode([{ a: 1 }]))).toEqual([]);
    expect(entries(toDocNode("str"))).toEqual([]);
    expect(isMapping(toDocNode([]))).toBe(false);
    expect(isMapping(toDocNode({}))).toBe(true);
  });
});

describe("textOf / renderValue", () => {
  it("reads scalars as text and collections as empty", () => {
    expect(textOf(scalar(12))).toBe("12");
    expect(textOf(toDocNode({ a: 1 }))).toBe("");
    expect(textOf(NULL_NODE)).toBe("");
  });

  it("renders collections as compact JSON", () => {
    expect(renderValue(toDocNode({ id: 1, tags: ["a"] }))).toBe('{"id":1,"tags":["a"]}');
    expect(renderValue(toDocNode(null))).toBe("");
    expect(renderValue(scalar(true))).toBe("true");
  });

  it("writes bigints as bare digits inside collections", () => {
    expect(renderValue(toDocNode({ id: 1234567890123456789n, name: "x" }))).toBe('{"id":1234567890123456789,"name":"x"}');
    expect(renderValue(toDocNode(42n))).toBe("42");
  });

  it("writes a self-containing collection as null where it recurs", () => {
    const parent: Record<string, unknown> = { name: "loop" };
    parent.child = parent;
    expect(renderValue(toDocNode(parent))).toBe('{"name":"loop","child":null}');
  });
});

describe("toDocNode with shared and cyclic values", () => {
  it("maps an object reached twice to one node", () => {
    const shared = { description: "Error" };
    const node = toDocNode({ a: shared, b: shared });
    expect(get(node, "a")).toBe(get(node, "b"));
  });

  it("turns a self-referencing object into a cyclic node", () => {
    const parent: Record<string, unknown> = {};
    parent.child = parent;
    const node = toDocNode(parent);
    expect(get(node, "child")).toBe(node);
    expect(getPath(node, "child", "child", "child")).toBe(node);
  });

  it("handles a sequence that contains itself", () => {
    const list: unknown[] = ["a"];
    list.push(list);
    const node = toDocNode(list);
    expect(node.kind === "sequence" && node.items[1]).toBe(node);
    expect(renderValue(node)).toBe('["a",null]');
  });
});
