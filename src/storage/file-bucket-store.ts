import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import type { JsonValue } from "../core/types";
import { bucketPath, serializeBucket, type BucketStore } from "./bucket-store";

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

/**
 * One JSON file per bucket under `baseDir`.
 *    <baseDir>/0a3f.json            (shardDepth 0)
 *    <baseDir>/0/a/3f.json          (shardDepth 2)
 */
export class FileBucketStore implements BucketStore {
  constructor(
    readonly baseDir: string,
    readonly shardDepth: number,
  ) {}

  filePath(address: string): string {
    return path.join(this.baseDir, ...bucketPath(address, this.shardDepth));
  }

  async write(address: string, payload: JsonValue): Promise<void> {
    const file = this.filePath(address);
    // recursive mkdir is a no-op when the directory exists, so concurrent writers are fine
    await mkdir(path.dirname(file), { recursive: true });
    await writeFile(file, serializeBucket(payload), "utf8");
  }

  async read(address: string): Promise<JsonValue | undefined> {
    try {
      const text = await readFile(this.filePath(address), "utf8");
      const value: JsonValue = JSON.parse(text);
      return value;
    } catch (error) {
      if (isMissingFile(error)) return undefined;
      throw error;
    }
  }

  /** Remove the whole tree and recreate an empty base directory. */
  async clear(): Promise<void> {
    await rm(this.baseDir, { recursive: true, force: true });
    await mkdir(this.baseDir, { recursive: true });
  }
}
