import { mkdir, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import type { GeneratorConfig } from "./config";
import { BucketFiller } from "./core/bucket-filler";
import { planLayout, type Layout } from "./core/capacity-planner";
import { categoryKeys, largestCategorySize, loadCorpus } from "./core/corpus-loader";
import { buildLayoutReport, categoryDir, renderRules, type LayoutReport } from "./core/edge-rules";
import { FileBucketStore } from "./storage/file-bucket-store";
import { generatorLogger as logger, logElapsed } from "./utils/logger";

export interface GenerateSummary {
  /** True when the corpus was empty; the outputs are then cleared, not written. */
  skipped: boolean;
  items: number;
  report?: LayoutReport;
}

async function writeTextFile(file: string, text: string): Promise<void> {
  await mkdir(path.dirname(path.resolve(file)), { recursive: true });
  await writeFile(file, text, "utf8");
}

/** Remove both trees, the rule text and the layout report of an earlier run. */
async function clearOutputs(config: GeneratorConfig): Promise<void> {
  await rm(config.full.outputDir, { recursive: true, force: true });
  await rm(config.categories.outputDir, { recursive: true, force: true });
  await rm(config.rulesFile, { force: true });
  await rm(config.layoutFile, { force: true });
}

/**
 * One batch run: load, clear the previous outputs, plan, fill, render the rule.
 * Write failures are not caught; re-running is the recovery path.
 */
export async function generate(config: GeneratorConfig): Promise<GenerateSummary> {
  const startTime = Date.now();
  const fillOptions = { storeAsList: config.storeAsList, concurrency: config.concurrency };

  const corpus = await loadCorpus(config.sourceDir);
  await clearOutputs(config);
  if (corpus.all.length === 0) {
    logger.warn({ sourceDir: config.sourceDir }, 'No data found, previous output removed');
    return { skipped: true, items: 0 };
  }

  // ── Full set ──────────────────────────────────────────────────
  const full: Layout = planLayout(corpus.all.length, config.full.minWidth, config.full.shardPolicy);
  logger.info({
    items: corpus.all.length,
    ...full,
  }, `[Global Data] width ${full.width} (capacity ${full.capacity}), shard depth ${full.shardDepth}`);

  const fullStore = new FileBucketStore(config.full.outputDir, full.shardDepth);
  await fullStore.clear();
  await new BucketFiller(fullStore, fillOptions).fill(corpus.all, full.width);

  // ── Categories: one shared layout sized by the largest ────────
  const maxCategoryItems = largestCategorySize(corpus);
  const categories: Layout = planLayout(
    maxCategoryItems,
    config.categories.minWidth,
    config.categories.shardPolicy,
  );
  logger.info({
    maxCategoryItems,
    ...categories,
  }, `[Category Data] width ${categories.width} (capacity ${categories.capacity}), shard depth ${categories.shardDepth}`);

  const categoriesRoot = new FileBucketStore(config.categories.outputDir, categories.shardDepth);
  await categoriesRoot.clear();

  for (const [key, items] of corpus.categories) {
    logger.debug({ category: key, items: items.length }, 'Processing category');
    const store = new FileBucketStore(categoryDir(config.categories.outputDir, key), categories.shardDepth);
    await new BucketFiller(store, fillOptions).fill(items, categories.width);
  }

  // ── Rule + layout report ──────────────────────────────────────
  const report = buildLayoutReport(
    { ...full, outputDir: config.full.outputDir },
    { ...categories, outputDir: config.categories.outputDir },
    categoryKeys(corpus),
  );
  await writeTextFile(config.rulesFile, renderRules(report, { targetDomain: config.targetDomain }));
  await writeTextFile(config.layoutFile, JSON.stringify(report, null, 2) + "\n");
  logger.info({ rulesFile: config.rulesFile, layoutFile: config.layoutFile }, 'Rules written');

  logElapsed(logger, 'generate', startTime, {
    items: corpus.all.length,
    categories: report.categories.keys.length,
  });
  return { skipped: false, items: corpus.all.length, report };
}
