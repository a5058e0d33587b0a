import type { JsonValue } from "../core/types";
import { bucketPath, serializeBucket, type BucketStore } from "./bucket-store";

/**
 *  Pure in-memory store for unit tests and dry runs.
 *  Keeps the serialized text keyed by the relative file path, so callers can
 *  compare exactly what a FileBucketStore would have written.
 */
export class MemoryBucketStore implements BucketStore {
  /** relative path → serialized payload */
  private readonly files = new Map<string, string>();

  constructor(readonly shardDepth: number) {}

  async write(address: string, payload: JsonValue): Promise<void> {
    this.files.set(this.key(address), serializeBucket(payload));
  }

  async read(address: string): Promise<JsonValue | undefined> {
    const text = this.files.get(this.key(address));
    if (text === undefined) return undefined;
    const value: JsonValue = JSON.parse(text);
    return value;
  }

  async clear(): Promise<void> {
    this.files.clear();
  }

  /** Snapshot of every stored file, sorted by path. */
  entries(): [string, string][] {
    return [...this.files.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  }

  get size() { return this.files.size; }

  private key(address: string): string {
    return bucketPath(address, this.shardDepth).join("/");
  }
}
