import { readdir, readFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { loaderLogger as logger, logFailure, logElapsed } from "../utils/logger";
import type { Item, JsonValue } from "./types";

const SOURCE_EXTENSION = ".json";

const jsonLiteral = z.union([z.string(), z.number(), z.boolean(), z.null()]);
const jsonValue: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([jsonLiteral, z.array(jsonValue), z.record(jsonValue)])
);

/** A source file is an ordered array of items. */
export const sourceFileSchema = z.array(jsonValue);

export interface Corpus {
  /** Every item, category by category in file-name order. */
  all: Item[];
  /** category key → items; keys without items are left out. */
  categories: Map<string, Item[]>;
}

/** Items of the largest category, 0 when there are none. */
export function largestCategorySize(corpus: Corpus): number {
  let max = 0;
  for (const items of corpus.categories.values()) max = Math.max(max, items.length);
  return max;
}

export function categoryKeys(corpus: Corpus): string[] {
  return [...corpus.categories.keys()];
}

async function readSourceFile(file: string): Promise<Item[]> {
  const text = await readFile(file, "utf8");
  return sourceFileSchema.parse(JSON.parse(text));
}

/**
 * Load every `*.json` file of `sourceDir`; the base name is the category key.
 * A file that fails to parse is logged and skipped.
 */
export async function loadCorpus(sourceDir: string): Promise<Corpus> {
  const startTime = Date.now();
  const entries = await readdir(sourceDir, { withFileTypes: true });
  const files = entries
    .filter(e => e.isFile() && e.name.endsWith(SOURCE_EXTENSION))
    .map(e => e.name)
    .sort();

  logger.info({ sourceDir, files: files.length }, 'Loading corpus');

  const corpus: Corpus = { all: [], categories: new Map() };
  let skipped = 0;

  for (const name of files) {
    const file = path.join(sourceDir, name);
    const category = path.basename(name, SOURCE_EXTENSION);

    let items: Item[];
    try {
      items = await readSourceFile(file);
    } catch (error) {
      skipped++;
      logFailure(logger, error, { context: 'source-read', file });
      continue;
    }

    if (items.length === 0) {
      logger.debug({ category, file }, 'Category is empty, excluded');
      continue;
    }

    for (const item of items) corpus.all.push(item);
    corpus.categories.set(category, items);
  }

  logElapsed(logger, 'corpus-load', startTime, {
    items: corpus.all.length,
    categories: corpus.categories.size,
    skipped,
  });
  return corpus;
}
