import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { rmSync } from "node:fs";
import { join } from "node:path";
import { EpisodicStore } from "../backends/episodic-store.js";
import { PreferenceStore } from "../backends/preference-store.js";
import { SemanticStore } from "../backends/semantic-store.js";
import { InMemoryVectorIndex } from "../backends/vector-index.js";
import { formatMemoryContext, MemoryReader } from "../services/memory-reader.js";
import { KeywordEmbedder, makeTempDir } from "./helpers.js";

describe("MemoryReader", () => {
  let dir: string;
  let semantic: SemanticStore;
  let episodic: EpisodicStore;
  let preferences: PreferenceStore;
  let reader: MemoryReader;

  beforeEach(() => {
    dir = makeTempDir("memory-reader-test-");
    const embedder = new KeywordEmbedder();
    semantic = new SemanticStore(new InMemoryVectorIndex(), embedder);
    episodic = new EpisodicStore(new InMemoryVectorIndex(), embedder);
    preferences = new PreferenceStore(join(dir, "preferences.json"));
    reader = new MemoryReader(semantic, episodic, preferences, { semanticTopK: 1, episodicTopK: 2 });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("reads all three stores for one namespace", async () => {
    await semantic.put("cust_1", "device", "Customer device is an Archer router");
    await semantic.put("cust_1", "billing", "Billing handled by email");
    await episodic.put("cust_1", "ep", "Customer tried a router restart");
    await episodic.put("cust_2", "ep", "Customer tried a router restart");
    preferences.put("cust_1", "contact", "email");

    const reads = await reader.read("cust_1", "archer router");

    expect(reads.query).toBe("archer router");
    expect(reads.semantic.map((r) => r.key)).toEqual(["device"]);
    expect(reads.episodic.map((r) => r.id)).toEqual(["cust_1:ep"]);
    expect(reads.preferences.contact.value).toBe("email");
  });

  it("skips the searches for an empty query but still returns preferences", async () => {
    const spy = vi.spyOn(semantic, "search");
    preferences.put("cust_1", "contact", "phone");

    const reads = await reader.read("cust_1", "  ");

    expect(spy).not.toHaveBeenCalled();
    expect(reads.semantic).toEqual([]);
    expect(reads.episodic).toEqual([]);
    expect(reads.preferences.contact.value).toBe("phone");
  });
});

describe("formatMemoryContext", () => {
  it("renders each non-empty block", async () => {
    const semantic = new SemanticStore(new InMemoryVectorIndex(), new KeywordEmbedder());
    await semantic.put("cust_1", "device", "Customer device is an Archer router");
    const [fact] = await semantic.search("cust_1", "router", 1);

    expect(
      formatMemoryContext({
        query: "router",
        semantic: [fact],
        episodic: [],
        preferences: { contact: { value: "email", updated_at: "2026-10-18T12:00:00.000Z" } },
      }),
    ).toBe(
      'Semantic memories (facts, domain knowledge):\n- Customer device is an Archer router\n\nUser preferences:\n- contact: "email"',
    );
  });

  it("renders nothing when there is nothing to show", () => {
    expect(formatMemoryContext({ query: "x", semantic: [], episodic: [], preferences: {} })).toBe("");
  });
});
