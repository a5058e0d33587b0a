import { plannerLogger as logger } from "../utils/logger";

/** Number of distinct values per address character. */
export const HEX_RADIX = 16;

/** Largest per-directory fan-out the `fanout` policy allows: 16^3 entries. */
export const FANOUT_LEAF_WIDTH = 3;

/**
 *  flat    – every file directly under the output directory (depth 0)
 *  fanout  – leading digits become directories so no level exceeds 4096 entries
 */
export const SHARD_POLICIES = ["flat", "fanout"] as const;
export type ShardPolicy = (typeof SHARD_POLICIES)[number];

export interface Layout {
  /** Hex digits per address. */
  width: number;
  /** Leading digits promoted to directory levels. */
  shardDepth: number;
  /** 16^width addresses. */
  capacity: number;
}

const assertCount = (name: string, value: number): void => {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`${name} must be a non-negative integer, got ${value}`);
  }
};

/** Number of addresses a width provides. */
export function addressCapacity(width: number): number {
  assertCount("width", width);
  const capacity = HEX_RADIX ** width;
  if (!Number.isSafeInteger(capacity)) {
    throw new RangeError(`width ${width} exceeds the addressable range`);
  }
  return capacity;
}

/**
 * Smallest width whose capacity holds `itemCount`, never below `minWidth`.
 * Decided by integer comparison so exact powers of 16 are not rounded up:
 * 65536 items fit width 4.
 */
export function planWidth(itemCount: number, minWidth: number): number {
  assertCount("itemCount", itemCount);
  assertCount("minWidth", minWidth);
  if (itemCount === 0) return minWidth;

  let width = 0;
  let capacity = 1;
  while (capacity < itemCount) {
    capacity *= HEX_RADIX;
    width++;
  }
  return Math.max(minWidth, width);
}

export function planShardDepth(width: number, policy: ShardPolicy): number {
  assertCount("width", width);
  switch (policy) {
    case "flat":
      return 0;
    case "fanout":
      return Math.max(0, width - FANOUT_LEAF_WIDTH);
  }
}

export function planLayout(itemCount: number, minWidth: number, policy: ShardPolicy): Layout {
  const width = planWidth(itemCount, minWidth);
  const layout: Layout = {
    width,
    shardDepth: planShardDepth(width, policy),
    capacity: addressCapacity(width),
  };

  logger.debug({ itemCount, minWidth, policy, ...layout }, 'Address space planned');
  return layout;
}
