import { readFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { rulesLogger as logger } from "../utils/logger";
import type { Layout } from "./capacity-planner";

/** uuidv4() output is hex only up to its first hyphen. */
export const UUID_HEX_PREFIX = 8;

/** Characters of the query string the category rule reads (`c=<key>`). */
export const CATEGORY_KEY_LENGTH = 1;

export const PLACEHOLDER_DOMAIN = "api.yourdomain.com";

const RANDOM_VALUE = "uuidv4(cf.random_seed)";

export interface TreeLayout extends Layout {
  outputDir: string;
  /** URL prefix the tree is published under, e.g. `/data/`. */
  publicPath: string;
}

export interface LayoutReport {
  full: TreeLayout;
  categories: TreeLayout & { keys: string[] };
}

export type RuleKind = "random" | "category";

const count = z.number().int().nonnegative();
const treeLayoutSchema = z.object({
  width: count,
  shardDepth: count,
  capacity: count,
  outputDir: z.string(),
  publicPath: z.string(),
});

export const layoutReportSchema = z.object({
  full: treeLayoutSchema,
  categories: treeLayoutSchema.extend({ keys: z.array(z.string()) }),
});

/** Read a layout report written by a previous `generate` run. */
export async function readLayoutReport(file: string): Promise<LayoutReport> {
  const text = await readFile(file, "utf8");
  return layoutReportSchema.parse(JSON.parse(text));
}

/** Directory of one category's buckets. */
export const categoryDir = (categoriesDir: string, key: string): string =>
  path.join(categoriesDir, key);

export const publicPathFor = (outputDir: string): string =>
  `/${path.basename(path.resolve(outputDir))}/`;

export function buildLayoutReport(
  full: Layout & { outputDir: string },
  categories: Layout & { outputDir: string },
  keys: readonly string[],
): LayoutReport {
  const report: LayoutReport = {
    full: { ...full, publicPath: publicPathFor(full.outputDir) },
    categories: {
      ...categories,
      publicPath: publicPathFor(categories.outputDir),
      keys: [...keys].sort(),
    },
  };

  for (const tree of [report.full, report.categories]) {
    if (tree.width > UUID_HEX_PREFIX) {
      logger.warn({ width: tree.width, publicPath: tree.publicPath },
        `Width exceeds the ${UUID_HEX_PREFIX} hex characters a UUID prefix provides`);
    }
  }
  const unroutable = report.categories.keys.filter(k => k.length !== CATEGORY_KEY_LENGTH);
  if (unroutable.length > 0) {
    logger.warn({ keys: unroutable }, 'Category keys the edge rule cannot select');
  }

  return report;
}

/**
 * Edge expression that rewrites a request to one bucket file:
 *   concat("/data/", substring(uuidv4(cf.random_seed), 0, 4), ".json")
 */
export function renderRuleExpression(kind: RuleKind, layout: Layout, publicPath: string): string {
  const parts = [`"${publicPath}"`];

  if (kind === "category") {
    parts.push(`substring(http.request.uri.query, 2, ${CATEGORY_KEY_LENGTH})`, '"/"');
  }
  for (let level = 0; level < layout.shardDepth; level++) {
    parts.push(`substring(${RANDOM_VALUE}, ${level}, 1)`, '"/"');
  }
  if (layout.width === 0) {
    // a single-address space has only `0.json`
    parts.push('"0"');
  } else {
    parts.push(`substring(${RANDOM_VALUE}, ${layout.shardDepth}, ${layout.width - layout.shardDepth})`);
  }
  parts.push('".json"');

  return `concat(${parts.join(', ')})`;
}

export interface RenderRulesOptions {
  targetDomain?: string;
}

export function renderRules(report: LayoutReport, options: RenderRulesOptions = {}): string {
  const { full, categories } = report;
  const domain = options.targetDomain || PLACEHOLDER_DOMAIN;
  const hostCheck = `(http.host eq "${domain}")`;
  const lines: string[] = [];

  lines.push("=== Cloudflare Transform Rules (Auto Generated) ===");
  if (options.targetDomain) {
    lines.push(`Target Domain: ${options.targetDomain}`, "");
  } else {
    lines.push(`!!! IMPORTANT: Replace '${PLACEHOLDER_DOMAIN}' with your actual subdomain !!!`, "");
  }

  lines.push(`[Rule 1: Random] (HEX_LEN=${full.width}, SHARD=${full.shardDepth})`);
  lines.push(`Condition: ${hostCheck} and (http.request.uri.path eq "/") and (not http.request.uri.query contains "c=")`);
  lines.push("Expression:");
  lines.push(renderRuleExpression("random", full, full.publicPath), "");

  lines.push("-".repeat(50), "");

  lines.push(`[Rule 2: Category] (HEX_LEN=${categories.width}, SHARD=${categories.shardDepth})`);
  lines.push(`Condition: ${hostCheck} and (http.request.uri.path eq "/") and (http.request.uri.query contains "c=")`);
  lines.push("Expression:");
  lines.push(renderRuleExpression("category", categories, categories.publicPath));
  lines.push(`Categories: ${categories.keys.join(", ")}`);

  return lines.join("\n") + "\n";
}
