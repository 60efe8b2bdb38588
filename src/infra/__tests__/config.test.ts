import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import {
  ConfigError,
  DEFAULT_CONFIG,
  MAX_SPLIT_SEED,
  loadConfig,
  loadConfigFile,
  overridesFromFlags,
  resolveConfig,
} from "../config.ts";

describe("resolveConfig", () => {
  it("returns the defaults without overrides", () => {
    expect(resolveConfig()).toEqual({
      rootDir: "open_api_specs",
      corpora: ["broken", "business", "deployed", "public", "specs-3.0"],
      enabledExtractors: ["operations", "examples", "schemas"],
      splitSeed: 42,
      splitRatios: { train: 0.8, val: 0.1, test: 0.1 },
      outputDir: ".",
    });
  });

  it("applies later layers over earlier ones and skips undefined values", () => {
    const config = resolveConfig(
      { rootDir: "from-file", splitSeed: 1 },
      { rootDir: "from-flags", splitSeed: undefined, enabledExtractors: ["operations"] },
    );
    expect(config.rootDir).toBe("from-flags");
    expect(config.splitSeed).toBe(1);
    expect(config.enabledExtractors).toEqual(["operations"]);
    expect(config.corpora).toEqual(DEFAULT_CONFIG.corpora);
  });

  it("rejects unknown extractors", () => {
    expect(() => resolveConfig({ enabledExtractors: ["paths"] })).toThrow(ConfigError);
  });

  it("rejects ratios that do not sum to 1", () => {
    try {
      resolveConfig({ splitRatios: { train: 0.7, val: 0.1, test: 0.1 } });
      expect.fail("expected ConfigError");
    } catch (e) {
      expect(e).toBeInstanceOf(ConfigError);
      if (e instanceof ConfigError) expect(e.issues).toEqual(["splitRatios: splitRatios must sum to 1"]);
    }
  });

  it("rejects a non-integer seed and an empty extractor set", () => {
    expect(() => resolveConfig({ splitSeed: 1.5 })).toThrow(ConfigError);
    expect(() => resolveConfig({ splitSeed: Number.NaN })).toThrow(ConfigError);
    expect(() => resolveConfig({ enabledExtractors: [] })).toThrow(ConfigError);
  });
});

describe("split seed bounds", () => {
  it("accepts the full unsigned 32-bit range", () => {
    expect(resolveConfig({ splitSeed: 0 }).splitSeed).toBe(0);
    expect(resolveConfig({ splitSeed: MAX_SPLIT_SEED }).splitSeed).toBe(4294967295);
  });

  it("rejects negative seeds and seeds past 32 bits", () => {
    expect(() => resolveConfig({ splitSeed: -1 })).toThrow(ConfigError);
    expect(() => resolveConfig({ splitSeed: 2 ** 32 })).toThrow(ConfigError);
  });
});

describe("overridesFromFlags", () => {
  it("converts comma lists and the seed", () => {
    expect(
      overridesFromFlags({ root: "specs", out: "data", corpora: "public, broken,", extractors: "operations", seed: " 7 " }),
    ).toEqual({
      rootDir: "specs",
      outputDir: "data",
      corpora: ["public", "broken"],
      enabledExtractors: ["operations"],
      splitSeed: 7,
    });
  });

  it("treats blank flags as absent", () => {
    const overrides = overridesFromFlags({ root: "", seed: "  " });
    expect(overrides.splitSeed).toBeUndefined();
    expect(overrides.rootDir).toBeUndefined();
    expect(resolveConfig({ splitSeed: 9 }, overrides).splitSeed).toBe(9);
  });

  it("leaves a non-numeric seed for validation to reject", () => {
    expect(() => resolveConfig(overridesFromFlags({ seed: "abc" }))).toThrow(ConfigError);
  });
});

describe("loadConfigFile", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `config-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it("reads a YAML config file", async () => {
    const path = join(testDir, "miner.yaml");
    await writeFile(path, "rootDir: specs\ncorpora:\n  - public\nenabledExtractors: [operations]\n");
    expect(await loadConfigFile(path)).toEqual({
      rootDir: "specs",
      corpora: ["public"],
      enabledExtractors: ["operations"],
    });
  });

  it("rejects unknown keys", async () => {
    const path = join(testDir, "miner.json");
    await writeFile(path, '{"root_dir": "specs"}');
    await expect(loadConfigFile(path)).rejects.toBeInstanceOf(ConfigError);
  });

  it("lets overrides win over the file", async () => {
    const path = join(testDir, "miner.yaml");
    await writeFile(path, "rootDir: specs\nsplitSeed: 9\n");
    const config = await loadConfig({ configPath: path, overrides: { splitSeed: 11 } });
    expect(config.rootDir).toBe("specs");
    expect(config.splitSeed).toBe(11);
  });

  it("reports a missing file as a ConfigError", async () => {
    await expect(loadConfigFile(join(testDir, "nope.yaml"))).rejects.toBeInstanceOf(ConfigError);
  });
});
