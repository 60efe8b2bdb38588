/**
 * apidoc-miner CLI.
 *
 * Subcommands: build, inspect
 */

import { defineCommand, runMain } from "citty";
import { relative, resolve } from "node:path";
import { runPipeline } from "./application/commands/run-pipeline.ts";
import { ConfigError, loadConfig, overridesFromFlags } from "./infra/config.ts";
import { loadSplits, loadSummary } from "./infra/dataset-loader.ts";
import type { PipelineConfig } from "./domain/types.ts";

// ── Build command ───────────────────────────────────────────────────

const buildCmd = defineCommand({
  meta: { name: "build", description: "Mine spec files and write train/val/test splits" },
  args: {
    root: { type: "positional", description: "Corpus root directory", required: false },
    out: { type: "string", description: "Output directory for split files" },
    config: { type: "string", description: "YAML/JSON config file" },
    corpora: { type: "string", description: "Corpus subdirectories (comma-separated)" },
    extractors: { type: "string", description: "Enabled extractors: operations,examples,schemas" },
    seed: { type: "string", description: "Split seed" },
  },
  async run({ args }) {
    const overrides = overridesFromFlags(args);

    let config: PipelineConfig;
    try {
      config = await loadConfig({ configPath: args.config, overrides });
    } catch (e) {
      if (e instanceof ConfigError) {
        console.error(`✗ ${e.message}`);
        process.exit(1);
      }
      throw e;
    }

    const rootDir = resolve(config.rootDir);
    console.log(`Mining specs from: ${rootDir}`);
    console.log(`Corpora: ${config.corpora.join(", ")}`);
    console.log(`Extractors: ${config.enabledExtractors.join(", ")}\n`);

    let currentCorpus: string | null = null;
    const result = await runPipeline(config, {
      onFile(filePath, corpus, recordCount) {
        if (corpus !== currentCorpus) {
          currentCorpus = corpus;
          console.log(`Processing corpus: ${corpus}`);
        }
        if (recordCount === null) console.log(`  ⚠ ${relative(rootDir, filePath)}`);
      },
    });

    const { mined } = result;
    for (const corpus of mined.missingCorpora) {
      console.log(`⚠ Corpus not found: ${resolve(rootDir, corpus)}`);
    }
    for (const failure of mined.failures) {
      const label = failure.kind === "parse" ? "malformed" : "failing";
      console.log(`⚠ Skipped ${label} file ${failure.file}: ${failure.reason.slice(0, 120)}`);
    }

    console.log(`\nScanned ${mined.filesScanned} files: ${mined.records.length} records (${mined.skippedFiles} skipped)`);

    if (!result.success) {
      console.error(`✗ ${result.reason}`);
      process.exit(1);
    }

    const { summary } = result;
    console.log(`✓ ${summary.total_examples} unique examples (${result.duplicatesDropped} duplicates dropped)`);
    for (const [type, count] of Object.entries(summary.type_breakdown)) {
      console.log(`    ${type}: ${count}`);
    }
    console.log(`\nDone: train ${summary.train_size}, val ${summary.val_size}, test ${summary.test_size}`);
    for (const path of result.writtenFiles) console.log(`  ✓ ${path}`);
  },
});

// ── Inspect command ─────────────────────────────────────────────────

const inspectCmd = defineCommand({
  meta: { name: "inspect", description: "Check written splits against the dataset summary" },
  args: {
    dir: { type: "positional", description: "Directory holding the split files", required: false },
  },
  async run({ args }) {
    const outputDir = resolve(args.dir ?? ".");
    const [summary, splits] = await Promise.all([loadSummary(outputDir), loadSplits(outputDir)]);

    const mismatches: string[] = [];
    if (splits.train.length !== summary.train_size) mismatches.push("train");
    if (splits.val.length !== summary.val_size) mismatches.push("val");
    if (splits.test.length !== summary.test_size) mismatches.push("test");

    const loaded = { train: splits.train.length, val: splits.val.length, test: splits.test.length };
    console.log(JSON.stringify({ summary, loaded, mismatches }, null, 2));
    if (mismatches.length > 0) process.exit(1);
  },
});

// ── Main ────────────────────────────────────────────────────────────

const main = defineCommand({
  meta: { name: "apidoc-miner", version: "1.0.0", description: "OpenAPI description dataset miner" },
  subCommands: {
    build: buildCmd,
    inspect: inspectCmd,
  },
});

void runMain(main);
