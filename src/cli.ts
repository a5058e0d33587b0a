#!/usr/bin/env node
/**
 * quote-shards CLI
 *
 *   generate  – shard the corpus and write the edge rule
 *   sample    – resolve random requests against a generated tree
 *   serve     – local preview of the edge rule over HTTP
 */

import { Command } from "commander";
import { loadConfig, type ConfigOverrides } from "./config";
import { readLayoutReport } from "./core/edge-rules";
import { RequestSimulator } from "./core/request-simulator";
import { generate } from "./generator";
import { startPreviewServer } from "./preview/server";
import { logger, logFailure } from "./utils/logger";

const PREVIEW_PORT = Number(process.env.PREVIEW_PORT ?? 5500);

const parseCount = (value: string): number => {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) throw new Error(`Expected a non-negative integer, got "${value}"`);
  return n;
};

const program = new Command();

program
  .name("quote-shards")
  .description("Shard a quote corpus into hex-addressed static JSON files for edge routing")
  .version("0.1.0");

program
  .command("generate")
  .description("Replace both output trees and write the rule and layout files")
  .option("-s, --source-dir <dir>", "Directory of category JSON files")
  .option("-o, --output-dir <dir>", "Output directory for the full set")
  .option("-c, --categories-dir <dir>", "Output directory for the per-category sets")
  .option("-w, --min-width <digits>", "Minimum address width of the full set")
  .option("--category-min-width <digits>", "Minimum address width of the category sets")
  .option("-p, --shard-policy <policy>", "flat or fanout")
  .option("--store-as-list", "Write each bucket as a one-element array")
  .option("-j, --concurrency <n>", "Bucket writes in flight at once")
  .option("--rules-file <file>", "Where to write the rule text")
  .option("--layout-file <file>", "Where to write the layout report")
  .option("-d, --target-domain <host>", "Host the edge rule matches")
  .action(async (options: ConfigOverrides) => {
    const summary = await generate(loadConfig(process.env, options));
    if (summary.skipped) process.exitCode = 1;
  });

program
  .command("sample")
  .description("Resolve random requests against a generated tree")
  .option("-n, --count <n>", "Requests to resolve", parseCount, 5)
  .option("-c, --category <key>", "Pick from this category instead of the full set")
  .option("--seed <n>", "Random seed", parseCount)
  .option("--layout-file <file>", "Layout report of the tree")
  .action(async (options: { count: number; category?: string; seed?: number; layoutFile?: string }) => {
    const config = loadConfig(process.env, { layoutFile: options.layoutFile });
    const report = await readLayoutReport(config.layoutFile);
    const simulator = new RequestSimulator(report, options.seed ?? Date.now());

    if (options.category !== undefined && !simulator.hasCategory(options.category)) {
      throw new Error(`Unknown category "${options.category}" (have: ${report.categories.keys.join(", ")})`);
    }
    for (const resolved of await simulator.sample(options.count, options.category)) {
      process.stdout.write(JSON.stringify(resolved) + "\n");
    }
  });

program
  .command("serve")
  .description("Serve the generated trees behind a local copy of the edge rule")
  .option("--port <n>", "Port to listen on", parseCount, PREVIEW_PORT)
  .option("--seed <n>", "Random seed", parseCount)
  .option("--layout-file <file>", "Layout report of the tree")
  .action(async (options: { port: number; seed?: number; layoutFile?: string }) => {
    const config = loadConfig(process.env, { layoutFile: options.layoutFile });
    const report = await readLayoutReport(config.layoutFile);
    startPreviewServer(report, new RequestSimulator(report, options.seed ?? Date.now()), options.port);
  });

try {
  await program.parseAsync(process.argv);
} catch (error) {
  logFailure(logger, error, { context: 'cli', argv: process.argv.slice(2) });
  process.exit(1);
}
