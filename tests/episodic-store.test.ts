/**
 * Tests for recency-weighted episodic recall
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { EpisodicStore } from "../backends/episodic-store.js";
import { InMemoryVectorIndex } from "../backends/vector-index.js";
import { KeywordEmbedder } from "./helpers.js";

const NOW = new Date("2026-10-18T12:00:00.000Z");

describe("EpisodicStore", () => {
  let index: InMemoryVectorIndex;
  let embedder: KeywordEmbedder;
  let store: EpisodicStore;

  beforeEach(() => {
    vi.useFakeTimers();
    index = new InMemoryVectorIndex();
    embedder = new KeywordEmbedder();
    store = new EpisodicStore(index, embedder);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("records salience in metadata", async () => {
    vi.setSystemTime(NOW);
    const record = await store.put("cust_1", "ep_1", "Customer tried a router restart", { ticket: "42" }, 0.7);

    expect(record.kind).toBe("episodic");
    expect(record.salience).toBe(0.7);
    expect(record.metadata.salience).toBe(0.7);
    expect(record.metadata.ticket).toBe("42");
    expect(record.createdAt).toBe(NOW.toISOString());
  });

  it("defaults salience to 1", async () => {
    vi.setSystemTime(NOW);
    const record = await store.put("cust_1", "ep_1", "Customer tried a router restart");
    expect(record.salience).toBe(1);
  });

  it("ranks the newer of two equally similar episodes first", async () => {
    vi.setSystemTime(new Date("2026-08-19T12:00:00.000Z"));
    await store.put("cust_1", "old", "Customer tried a router restart");
    vi.setSystemTime(NOW);
    await store.put("cust_1", "new", "Customer tried a router restart");

    const results = await store.search("cust_1", "router restart", 2);

    expect(results.map((r) => r.key)).toEqual(["new", "old"]);
    expect(results[0].recencyScore).toBe(1);
    expect(results[1].recencyScore).toBeCloseTo(1 / 3, 10);
    expect(results[0].similarity).toBeCloseTo(results[1].similarity, 10);
  });

  it("blends similarity and recency with the default weight", async () => {
    vi.setSystemTime(new Date("2026-09-18T12:00:00.000Z"));
    await store.put("cust_1", "ep", "router restart");
    vi.setSystemTime(NOW);

    const [result] = await store.search("cust_1", "router restart", 1);

    expect(result.similarity).toBeCloseTo(1, 10);
    expect(result.recencyScore).toBeCloseTo(0.5, 10);
    expect(result.combinedScore).toBeCloseTo(0.85, 10);
  });

  it("lets the weight trade similarity against recency", async () => {
    vi.setSystemTime(new Date("2026-08-19T12:00:00.000Z"));
    await store.put("cust_1", "relevant", "Customer tried a router restart");
    vi.setSystemTime(NOW);
    await store.put("cust_1", "recent", "Billing question");

    const bySimilarity = await store.search("cust_1", "router restart", 2, 0);
    const byRecency = await store.search("cust_1", "router restart", 2, 1);

    expect(bySimilarity.map((r) => r.key)).toEqual(["relevant", "recent"]);
    expect(byRecency.map((r) => r.key)).toEqual(["recent", "relevant"]);
  });

  it("over-fetches twice topK from the index", async () => {
    vi.setSystemTime(NOW);
    const spy = vi.spyOn(index, "query");
    await store.search("cust_1", "router", 3);
    expect(spy).toHaveBeenCalledWith("cust_1", expect.any(Array), 6);
  });

  it("scores rows without a usable timestamp as not recent", async () => {
    vi.setSystemTime(NOW);
    await index.upsert({
      id: "cust_1:raw",
      namespace: "cust_1",
      document: "router restart",
      embedding: await embedder.embed("router restart"),
      metadata: { key: "raw", timestamp: "not-a-date" },
    });

    const [result] = await store.search("cust_1", "router restart", 1);

    expect(result.key).toBe("raw");
    expect(result.recencyScore).toBe(0);
    expect(result.combinedScore).toBeCloseTo(0.7, 10);
  });

  it("rejects weights outside [0, 1]", async () => {
    await expect(store.search("cust_1", "router", 3, 1.5)).rejects.toThrow(RangeError);
    expect(() => new EpisodicStore(index, embedder, -0.1)).toThrow("recency weight must be within [0, 1], got -0.1");
  });

  it("deletes and clears", async () => {
    vi.setSystemTime(NOW);
    await store.put("cust_1", "a", "router restart");
    await store.put("cust_1", "b", "modem reset");

    expect(await store.delete("cust_1", "a")).toBe(true);
    expect(await store.get("cust_1", "a")).toBeNull();
    expect(await store.clear("cust_1")).toBe(1);
  });
});
