/**
 * Pipeline configuration — defaults, optional config file, overrides.
 *
 * Later sources win: defaults → config file → overrides (CLI flags).
 */

import { readFile } from "node:fs/promises";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ExtractorKind, type PipelineConfig } from "../domain/types.ts";
import { DEFAULT_SPLIT_RATIOS, DEFAULT_SPLIT_SEED } from "../application/splitting.ts";

export const DEFAULT_CORPORA = ["broken", "business", "deployed", "public", "specs-3.0"];

export const DEFAULT_CONFIG: PipelineConfig = {
  rootDir: "open_api_specs",
  corpora: DEFAULT_CORPORA,
  enabledExtractors: Object.values(ExtractorKind),
  splitSeed: DEFAULT_SPLIT_SEED,
  splitRatios: DEFAULT_SPLIT_RATIOS,
  outputDir: ".",
};

const RATIO_TOLERANCE = 1e-9;

/** Seeds are unsigned 32-bit integers. */
export const MAX_SPLIT_SEED = 0xffffffff;

const ratioSchema = z.number().min(0).max(1);

const configSchema = z
  .object({
    rootDir: z.string().min(1),
    corpora: z.array(z.string().min(1)).min(1),
    enabledExtractors: z.array(z.nativeEnum(ExtractorKind)).min(1),
    splitSeed: z.number().int().min(0).max(MAX_SPLIT_SEED),
    splitRatios: z.object({ train: ratioSchema, val: ratioSchema, test: ratioSchema }),
    outputDir: z.string().min(1),
  })
  .strict()
  .refine(
    ({ splitRatios: { train, val, test } }) => Math.abs(train + val + test - 1) <= RATIO_TOLERANCE,
    { message: "splitRatios must sum to 1", path: ["splitRatios"] },
  );

const partialConfigSchema = z
  .object({
    rootDir: z.string(),
    corpora: z.array(z.string()),
    enabledExtractors: z.array(z.string()),
    splitSeed: z.number(),
    splitRatios: z.object({ train: z.number(), val: z.number(), test: z.number() }),
    outputDir: z.string(),
  })
  .partial()
  .strict();

export type ConfigOverrides = z.infer<typeof partialConfigSchema>;

/** Raw string flags as the CLI receives them. */
export interface ConfigFlags {
  root?: string;
  out?: string;
  corpora?: string;
  extractors?: string;
  seed?: string;
}

function splitList(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  return value
    .split(",")
    .map((v) => v.trim())
    .filter(Boolean);
}

function parseSeed(value: string | undefined): number | undefined {
  const trimmed = value?.trim();
  if (!trimmed) return undefined;
  return Number(trimmed);
}

/** Blank flags count as absent so they never override lower layers. */
export function overridesFromFlags(flags: ConfigFlags): ConfigOverrides {
  return {
    rootDir: flags.root || undefined,
    outputDir: flags.out || undefined,
    corpora: splitList(flags.corpora),
    enabledExtractors: splitList(flags.extractors),
    splitSeed: parseSeed(flags.seed),
  };
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigError";
  }
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/** Merge overrides onto the defaults and validate the result. */
export function resolveConfig(...layers: ConfigOverrides[]): PipelineConfig {
  const merged: Record<string, unknown> = { ...DEFAULT_CONFIG };
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) merged[key] = value;
    }
  }

  const parsed = configSchema.safeParse(merged);
  if (!parsed.success) throw new ConfigError("Invalid configuration", formatIssues(parsed.error));
  return parsed.data;
}

/** Read a YAML or JSON config file holding any subset of PipelineConfig. */
export async function loadConfigFile(path: string): Promise<ConfigOverrides> {
  let raw: unknown;
  try {
    raw = parseYaml(await readFile(path, "utf8"));
  } catch (e) {
    throw new ConfigError(`Cannot read config file ${path}`, [e instanceof Error ? e.message : String(e)]);
  }

  const parsed = partialConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) throw new ConfigError(`Invalid config file ${path}`, formatIssues(parsed.error));
  return parsed.data;
}

export async function loadConfig(
  options: { configPath?: string; overrides?: ConfigOverrides } = {},
): Promise<PipelineConfig> {
  const fromFile = options.configPath ? await loadConfigFile(options.configPath) : {};
  return resolveConfig(fromFile, options.overrides ?? {});
}
