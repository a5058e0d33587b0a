import type { BucketStore } from "../storage/bucket-store";
import { createProgress, fillerLogger as logger, logElapsed } from "../utils/logger";
import { addressCapacity, HEX_RADIX } from "./capacity-planner";
import type { Item } from "./types";

export interface FillOptions {
  /** Write `[item]` instead of the bare item. */
  storeAsList?: boolean;
  /** Writes in flight at once; 1 keeps the fill strictly sequential. */
  concurrency?: number;
}

/**
 * Zero-padded lowercase hex of `width` digits. A width-0 space still has its
 * one address, written as "0".
 */
export function formatAddress(address: number, width: number): string {
  return address.toString(HEX_RADIX).padStart(width, "0");
}

/** Characters in an address string of a `width`-digit space. */
export const addressLength = (width: number): number => Math.max(width, 1);

/**
 * Fill-Full assignment: address `i` holds `items[i % items.length]`, so every
 * address the edge router can produce resolves to a real record.
 */
export function* assignBuckets<T>(items: readonly T[], width: number): Generator<[string, T]> {
  if (items.length === 0) return;
  const capacity = addressCapacity(width);
  for (let i = 0; i < capacity; i++) {
    yield [formatAddress(i, width), items[i % items.length]];
  }
}

/**
 * Deterministic address → item filler writing straight into a BucketStore.
 * Injection of the store decouples assignment from persistence.
 */
export class BucketFiller {
  private readonly store: BucketStore;
  private readonly storeAsList: boolean;
  private readonly concurrency: number;

  constructor(store: BucketStore, options: FillOptions = {}) {
    this.store = store;
    this.storeAsList = options.storeAsList ?? false;
    this.concurrency = options.concurrency ?? 1;

    if (!Number.isInteger(this.concurrency) || this.concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer, got ${this.concurrency}`);
    }
  }

  /**
   * Assign every address of a `width`-digit space and persist each bucket.
   * Returns the full mapping; empty input writes nothing.
   */
  async fill(items: readonly Item[], width: number): Promise<Map<string, Item>> {
    const mapping = new Map<string, Item>();
    if (items.length === 0) {
      logger.warn({ width }, 'No items to distribute, skipping fill');
      return mapping;
    }

    const shardDepth = this.store.shardDepth;
    if (!Number.isInteger(width) || width < 0) {
      throw new RangeError(`width must be a non-negative integer, got ${width}`);
    }
    const length = addressLength(width);
    if (!Number.isInteger(shardDepth) || shardDepth < 0 || shardDepth >= length) {
      throw new RangeError(`shard depth must be in [0, ${length}), got ${shardDepth}`);
    }

    const capacity = addressCapacity(width);
    const startTime = Date.now();
    logger.info({
      items: items.length,
      buckets: capacity,
      shardDepth,
      storeAsList: this.storeAsList,
    }, `Distributing ${items.length} items into ${capacity} buckets`);

    let pending: Promise<void>[] = [];
    const progress = createProgress(logger, capacity);

    for (const [address, item] of assignBuckets(items, width)) {
      mapping.set(address, item);
      pending.push(this.store.write(address, this.storeAsList ? [item] : item));

      if (pending.length >= this.concurrency) {
        await Promise.all(pending);
        pending = [];
      }
      progress.tick();
    }
    await Promise.all(pending);

    logElapsed(logger, 'bucket-fill', startTime, { buckets: capacity });
    return mapping;
  }
}
