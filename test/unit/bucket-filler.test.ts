import { describe, it, expect } from "vitest";
import { assignBuckets, BucketFiller, formatAddress } from "../../src/core/bucket-filler";
import { planLayout } from "../../src/core/capacity-planner";
import { MemoryBucketStore } from "../../src/storage/memory-bucket-store";

describe("formatAddress", () => {
  it("zero-pads lowercase hex", () => {
    expect(formatAddress(255, 4)).toBe("00ff");
    expect(formatAddress(0, 1)).toBe("0");
    expect(formatAddress(0xabc, 3)).toBe("abc");
  });

  it("writes the single address of a width-0 space as 0", () => {
    expect(formatAddress(0, 0)).toBe("0");
  });
});

describe("assignBuckets", () => {
  it("cycles the items across the address space", () => {
    const pairs = [...assignBuckets(["a", "b", "c"], 1)];
    expect(pairs).toHaveLength(16);
    expect(pairs.slice(0, 5)).toEqual([["0", "a"], ["1", "b"], ["2", "c"], ["3", "a"], ["4", "b"]]);
    expect(pairs[15]).toEqual(["f", "a"]);
  });

  it("yields nothing for no items", () => {
    expect([...assignBuckets([], 2)]).toEqual([]);
  });
});

describe("BucketFiller", () => {
  it("fills every address of a width-1 space", async () => {
    const store = new MemoryBucketStore(0);
    const mapping = await new BucketFiller(store).fill(["a", "b", "c"], 1);

    expect(mapping.size).toBe(16);
    expect(mapping.get("0")).toBe("a");
    expect(mapping.get("1")).toBe("b");
    expect(mapping.get("2")).toBe("c");
    expect(mapping.get("3")).toBe("a");
    expect(mapping.get("f")).toBe("a");

    expect(store.size).toBe(16);
    expect(store.entries()[0]).toEqual(["0.json", '"a"']);
    expect(store.entries()[10]).toEqual(["a.json", '"b"']);
  });

  it("reaches every item when the space is at least as large as the list", async () => {
    const items = ["q1", "q2", "q3", "q4", "q5"];
    const mapping = await new BucketFiller(new MemoryBucketStore(0)).fill(items, 1);
    expect(new Set(mapping.values())).toEqual(new Set(items));
  });

  it("wraps a list longer than the space", async () => {
    const items = Array.from({ length: 20 }, (_, i) => i);
    const mapping = await new BucketFiller(new MemoryBucketStore(0)).fill(items, 1);
    expect(mapping.size).toBe(16);
    expect(mapping.get("f")).toBe(15);
  });

  it("writes each bucket as a one-element array with storeAsList", async () => {
    const store = new MemoryBucketStore(0);
    await new BucketFiller(store, { storeAsList: true }).fill(["a", "b", "c"], 1);
    expect(await store.read("2")).toEqual(["c"]);
    expect(store.entries()[2]).toEqual(["2.json", '["c"]']);
  });

  it("nests leading digits under directories", async () => {
    const store = new MemoryBucketStore(1);
    await new BucketFiller(store).fill(["a", "b", "c"], 2);
    expect(store.size).toBe(256);
    // 0xab = 171, 171 % 3 = 0
    expect(store.entries()).toContainEqual(["a/b.json", '"a"']);
    expect(store.entries()[0]).toEqual(["0/0.json", '"a"']);
  });

  it("keeps non-ASCII text unescaped and compact", async () => {
    const store = new MemoryBucketStore(0);
    await new BucketFiller(store).fill([{ text: "你好", from: "x" }], 1);
    expect(store.entries()[0]).toEqual(["0.json", '{"text":"你好","from":"x"}']);
  });

  it("writes the same buckets with concurrent writes", async () => {
    const items = ["a", "b", "c", "d", "e", "f", "g"];
    const sequential = new MemoryBucketStore(1);
    const concurrent = new MemoryBucketStore(1);
    await new BucketFiller(sequential).fill(items, 2);
    await new BucketFiller(concurrent, { concurrency: 8 }).fill(items, 2);
    expect(concurrent.entries()).toEqual(sequential.entries());
  });

  it("is a no-op for an empty item list", async () => {
    const store = new MemoryBucketStore(0);
    const mapping = await new BucketFiller(store).fill([], 2);
    expect(mapping.size).toBe(0);
    expect(store.size).toBe(0);
  });

  it("fills the one bucket of a planned width-0 layout", async () => {
    const layout = planLayout(1, 0, "flat");
    expect(layout).toEqual({ width: 0, shardDepth: 0, capacity: 1 });

    const store = new MemoryBucketStore(layout.shardDepth);
    const mapping = await new BucketFiller(store).fill(["a"], layout.width);
    expect([...mapping.entries()]).toEqual([["0", "a"]]);
    expect(store.entries()).toEqual([["0.json", '"a"']]);
  });

  it("is a no-op for an empty item list at width 0", async () => {
    const store = new MemoryBucketStore(0);
    const mapping = await new BucketFiller(store).fill([], 0);
    expect(mapping.size).toBe(0);
    expect(store.size).toBe(0);
  });

  it("rejects a negative width or a shard depth that leaves no file name", async () => {
    await expect(new BucketFiller(new MemoryBucketStore(0)).fill(["a"], -1)).rejects.toThrow(RangeError);
    await expect(new BucketFiller(new MemoryBucketStore(2)).fill(["a"], 2)).rejects.toThrow(RangeError);
    await expect(new BucketFiller(new MemoryBucketStore(1)).fill(["a"], 0)).rejects.toThrow(RangeError);
  });

  it("rejects a non-positive concurrency", () => {
    expect(() => new BucketFiller(new MemoryBucketStore(0), { concurrency: 0 })).toThrow(RangeError);
  });
});
