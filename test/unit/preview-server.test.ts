import { describe, it, expect } from "vitest";
import { BucketFiller } from "../../src/core/bucket-filler";
import type { LayoutReport } from "../../src/core/edge-rules";
import { RequestSimulator } from "../../src/core/request-simulator";
import { handleEdgeRequest } from "../../src/preview/server";
import { MemoryBucketStore } from "../../src/storage/memory-bucket-store";

const report: LayoutReport = {
  full: { width: 1, shardDepth: 0, capacity: 16, outputDir: "data", publicPath: "/data/" },
  categories: {
    width: 1,
    shardDepth: 0,
    capacity: 16,
    outputDir: "categories",
    publicPath: "/categories/",
    keys: ["a"],
  },
};

async function simulatorWith(items: string[]): Promise<RequestSimulator> {
  const store = new MemoryBucketStore(0);
  await new BucketFiller(store).fill(items, 1);
  return new RequestSimulator(report, 1, () => store);
}

describe("handleEdgeRequest", () => {
  it("serves a random full-set bucket without a category", async () => {
    const out = await handleEdgeRequest(await simulatorWith(["只"]), {});
    expect(out.status).toBe(200);
    expect(out.body).toBe('"只"');
    expect(out.rewrittenTo).toMatch(/^\/data\/[0-9a-f]\.json$/);
  });

  it("serves a category bucket for c=<key>", async () => {
    const out = await handleEdgeRequest(await simulatorWith(["x"]), { c: "a" });
    expect(out.status).toBe(200);
    expect(out.rewrittenTo).toMatch(/^\/categories\/a\/[0-9a-f]\.json$/);
  });

  it("answers 404 for an unknown category", async () => {
    const out = await handleEdgeRequest(await simulatorWith(["x"]), { c: "q" });
    expect(out).toEqual({ status: 404, body: '{"error":"Unknown category: q"}' });
  });

  it("answers 400 for a repeated category parameter", async () => {
    const out = await handleEdgeRequest(await simulatorWith(["x"]), { c: ["a", "b"] });
    expect(out.status).toBe(400);
  });

  it("answers 404 when the bucket file is missing", async () => {
    const simulator = new RequestSimulator(report, 1, () => new MemoryBucketStore(0));
    const out = await handleEdgeRequest(simulator, {});
    expect(out.status).toBe(404);
    expect(out.body).toBe('{"error":"Bucket missing"}');
  });
});
