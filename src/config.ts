import { z } from "zod";
import { SHARD_POLICIES, type ShardPolicy } from "./core/capacity-planner";

export interface ProfileConfig {
  outputDir: string;
  /** Floor for the address width of this profile. */
  minWidth: number;
  shardPolicy: ShardPolicy;
}

export interface GeneratorConfig {
  sourceDir: string;
  full: ProfileConfig;
  categories: ProfileConfig;
  storeAsList: boolean;
  concurrency: number;
  rulesFile: string;
  layoutFile: string;
  targetDomain?: string;
}

/** Values given on the command line; each one wins over its env var. */
export interface ConfigOverrides {
  sourceDir?: string;
  outputDir?: string;
  categoriesDir?: string;
  minWidth?: string | number;
  categoryMinWidth?: string | number;
  shardPolicy?: string;
  storeAsList?: string | boolean;
  concurrency?: string | number;
  rulesFile?: string;
  layoutFile?: string;
  targetDomain?: string;
}

export const DEFAULTS = {
  sourceDir: "sentences",
  outputDir: "data",
  categoriesDir: "categories",
  // 16^4 = 65,536 files
  minWidth: 4,
  // 16^3 = 4,096 files per category
  categoryMinWidth: 3,
  shardPolicy: "flat",
  storeAsList: false,
  concurrency: 1,
  rulesFile: "rules.txt",
  layoutFile: "layout.json",
} as const;

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

const nonEmpty = z.string().min(1);
const positiveInt = z.coerce.number().int().min(1);
const width = z.coerce.number().int().min(0);
const flag = z.union([
  z.boolean(),
  z.enum(["true", "false", "1", "0"]).transform(v => v === "true" || v === "1"),
]);

const configSchema = z.object({
  sourceDir: nonEmpty,
  outputDir: nonEmpty,
  categoriesDir: nonEmpty,
  minWidth: width,
  categoryMinWidth: width,
  shardPolicy: z.enum(SHARD_POLICIES),
  storeAsList: flag,
  concurrency: positiveInt,
  rulesFile: nonEmpty,
  layoutFile: nonEmpty,
  targetDomain: z.string().optional(),
});

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {},
): GeneratorConfig {
  const parsed = configSchema.safeParse({
    sourceDir: overrides.sourceDir ?? env.QS_SOURCE_DIR ?? DEFAULTS.sourceDir,
    outputDir: overrides.outputDir ?? env.QS_OUTPUT_DIR ?? DEFAULTS.outputDir,
    categoriesDir: overrides.categoriesDir ?? env.QS_CATEGORIES_DIR ?? DEFAULTS.categoriesDir,
    minWidth: overrides.minWidth ?? env.QS_MIN_WIDTH ?? DEFAULTS.minWidth,
    categoryMinWidth: overrides.categoryMinWidth ?? env.QS_CATEGORY_MIN_WIDTH ?? DEFAULTS.categoryMinWidth,
    shardPolicy: overrides.shardPolicy ?? env.QS_SHARD_POLICY ?? DEFAULTS.shardPolicy,
    storeAsList: overrides.storeAsList ?? env.QS_STORE_AS_LIST ?? DEFAULTS.storeAsList,
    concurrency: overrides.concurrency ?? env.QS_CONCURRENCY ?? DEFAULTS.concurrency,
    rulesFile: overrides.rulesFile ?? env.QS_RULES_FILE ?? DEFAULTS.rulesFile,
    layoutFile: overrides.layoutFile ?? env.QS_LAYOUT_FILE ?? DEFAULTS.layoutFile,
    targetDomain: overrides.targetDomain ?? env.QS_TARGET_DOMAIN,
  });

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const c = parsed.data;
  return {
    sourceDir: c.sourceDir,
    full: { outputDir: c.outputDir, minWidth: c.minWidth, shardPolicy: c.shardPolicy },
    categories: { outputDir: c.categoriesDir, minWidth: c.categoryMinWidth, shardPolicy: c.shardPolicy },
    storeAsList: c.storeAsList,
    concurrency: c.concurrency,
    rulesFile: c.rulesFile,
    layoutFile: c.layoutFile,
    ...(c.targetDomain ? { targetDomain: c.targetDomain } : {}),
  };
}
