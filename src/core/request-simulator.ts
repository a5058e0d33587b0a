import * as prand from "pure-rand";
import { bucketPath, type BucketStore } from "../storage/bucket-store";
import { FileBucketStore } from "../storage/file-bucket-store";
import { simulatorLogger as logger } from "../utils/logger";
import { HEX_RADIX } from "./capacity-planner";
import { categoryDir, type LayoutReport, type TreeLayout } from "./edge-rules";
import { formatAddress } from "./bucket-filler";
import type { JsonValue } from "./types";

export type StoreOpener = (baseDir: string, shardDepth: number) => BucketStore;

export const openFileStore: StoreOpener = (baseDir, shardDepth) =>
  new FileBucketStore(baseDir, shardDepth);

export interface ResolvedRequest {
  /** Path the edge rule would rewrite the request to. */
  url: string;
  address: string;
  category?: string;
  /** `undefined` means the bucket is missing from the tree. */
  item: JsonValue | undefined;
}

/**
 * Plays the edge router against a generated tree: picks a random address of
 * the right width and reads the bucket it lands on. A fixed seed gives the
 * same sequence of picks.
 */
export class RequestSimulator {
  private rng: prand.RandomGenerator;
  private readonly stores = new Map<string, BucketStore>();

  constructor(
    private readonly report: LayoutReport,
    seed: number,
    private readonly openStore: StoreOpener = openFileStore,
  ) {
    this.rng = prand.xoroshiro128plus(seed);
    logger.debug({ seed }, 'Request simulator initialized');
  }

  /** `width` random hex digits, one draw per digit; "0" for width 0. */
  nextAddress(width: number): string {
    if (width === 0) return formatAddress(0, 0);
    let address = "";
    for (let i = 0; i < width; i++) {
      const [digit, nextRng] = prand.uniformIntDistribution(0, HEX_RADIX - 1, this.rng);
      this.rng = nextRng;
      address += formatAddress(digit, 1);
    }
    return address;
  }

  hasCategory(category: string): boolean {
    return this.report.categories.keys.includes(category);
  }

  /**
   * Resolve one request: a random pick from the full tree, or from one
   * category when `category` is given. Unknown categories resolve to `undefined`.
   */
  async resolve(category?: string): Promise<ResolvedRequest | undefined> {
    if (category !== undefined && !this.hasCategory(category)) {
      logger.debug({ category }, 'Unknown category requested');
      return undefined;
    }

    const tree: TreeLayout = category === undefined ? this.report.full : this.report.categories;
    const prefix = category === undefined ? tree.publicPath : `${tree.publicPath}${category}/`;
    const baseDir = category === undefined ? tree.outputDir : categoryDir(tree.outputDir, category);

    const address = this.nextAddress(tree.width);
    const item = await this.store(baseDir, tree.shardDepth).read(address);
    if (item === undefined) {
      logger.warn({ address, baseDir }, 'Bucket missing');
    }

    return {
      url: prefix + bucketPath(address, tree.shardDepth).join("/"),
      address,
      ...(category === undefined ? {} : { category }),
      item,
    };
  }

  /** Resolve `count` requests in sequence. */
  async sample(count: number, category?: string): Promise<ResolvedRequest[]> {
    const results: ResolvedRequest[] = [];
    for (let i = 0; i < count; i++) {
      const resolved = await this.resolve(category);
      if (resolved) results.push(resolved);
    }
    return results;
  }

  private store(baseDir: string, shardDepth: number): BucketStore {
    let store = this.stores.get(baseDir);
    if (!store) {
      store = this.openStore(baseDir, shardDepth);
      this.stores.set(baseDir, store);
    }
    return store;
  }
}
