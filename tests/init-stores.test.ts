import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { existsSync, rmSync } from "node:fs";
import { join } from "node:path";
import { initMemorySystem, VERSION } from "../index.js";
import { memoryConfigSchema } from "../config.js";
import { OpenAIChatClient } from "../services/chat.js";
import { Embeddings } from "../services/embeddings.js";
import { createMemorySystem } from "../setup/init-stores.js";
import { silentLogger } from "../utils/logger.js";
import { KeywordEmbedder, makeTempDir, scriptedLlm } from "./helpers.js";

describe("createMemorySystem", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir("init-stores-test-");
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("wires OpenAI-backed collaborators by default", () => {
    const cfg = memoryConfigSchema.parse({
      embedding: { apiKey: "test-secret-key" },
      storage: { vectorBackend: "memory", dataDir: dir },
    });

    const system = createMemorySystem(cfg, { logger: silentLogger });

    expect(system.embeddings).toBeInstanceOf(Embeddings);
    expect(system.llm).toBeInstanceOf(OpenAIChatClient);
    expect(existsSync(join(dir, "tickets.db"))).toBe(true);
    system.close();
  });

  it("logs where the stores live", () => {
    const cfg = memoryConfigSchema.parse({
      embedding: { apiKey: "test-secret-key" },
      storage: { vectorBackend: "memory", dataDir: dir },
    });
    const info = vi.fn();

    const system = createMemorySystem(cfg, {
      embeddings: new KeywordEmbedder(),
      llm: scriptedLlm(),
      logger: { info, warn: vi.fn() },
    });

    expect(info).toHaveBeenCalledWith(
      `stores ready (vector backend: memory, preferences: ${join(dir, "preferences.json")})`,
    );
    system.close();
  });

  it("stores and finds memories through the wired stores", async () => {
    const cfg = memoryConfigSchema.parse({
      embedding: { apiKey: "test-secret-key" },
      storage: { vectorBackend: "memory", dataDir: dir },
    });
    const system = createMemorySystem(cfg, { embeddings: new KeywordEmbedder(), llm: scriptedLlm(), logger: silentLogger });

    await system.semantic.put("cust_1", "device", "Customer device is an Archer router");
    const reads = await system.reader.read("cust_1", "router");

    expect(reads.semantic.map((r) => r.content)).toEqual(["Customer device is an Archer router"]);
    system.close();
  });
});

describe("initMemorySystem", () => {
  it("parses raw config and leaves error reporting off by default", async () => {
    const dir = makeTempDir("init-memory-test-");
    const system = await initMemorySystem(
      { embedding: { apiKey: "test-secret-key" }, storage: { vectorBackend: "memory", dataDir: dir } },
      { embeddings: new KeywordEmbedder(), llm: scriptedLlm(), logger: silentLogger },
    );

    expect(VERSION).toBe("0.1.0");
    expect(system.config.storage.dataDir).toBe(dir);
    expect(system.config.errorReporting.enabled).toBe(false);
    system.close();
    rmSync(dir, { recursive: true, force: true });
  });

  it("rejects invalid config before touching storage", async () => {
    await expect(initMemorySystem({ embedding: { apiKey: "short" } })).rejects.toThrow("embedding.apiKey");
  });
});
