import type { JsonValue } from "../core/types";

export const BUCKET_EXTENSION = ".json";

/**
 *  shardDepth      – leading address digits stored as directory levels
 *  write(addr, v)  – persist ONE bucket payload (creates directories first)
 *  read(addr)      – parsed payload, `undefined` when the bucket is absent
 *  clear()         – drop every bucket; the next fill starts from nothing
 */
export interface BucketStore {
  readonly shardDepth: number;
  write(address: string, payload: JsonValue): Promise<void>;
  read(address: string): Promise<JsonValue | undefined>;
  clear(): Promise<void>;
}

/**
 * Relative path segments of one bucket: the first `shardDepth` characters are
 * one directory each, the rest is the file name.
 *
 *   bucketPath("a1b2", 0) → ["a1b2.json"]
 *   bucketPath("a1b2", 2) → ["a", "1", "b2.json"]
 */
export function bucketPath(address: string, shardDepth: number): string[] {
  if (!Number.isInteger(shardDepth) || shardDepth < 0 || shardDepth >= address.length) {
    throw new RangeError(
      `shard depth ${shardDepth} is invalid for address "${address}" (width ${address.length})`
    );
  }
  return [...address.slice(0, shardDepth), address.slice(shardDepth) + BUCKET_EXTENSION];
}

/** Compact JSON, non-ASCII left as is. */
export function serializeBucket(payload: JsonValue): string {
  return JSON.stringify(payload);
}
