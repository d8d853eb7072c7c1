/**
 * Embedding service: OpenAI implementation behind the EmbeddingProvider interface.
 * Stores depend only on the interface; tests pass a deterministic provider.
 */

import OpenAI from "openai";
import { createHash } from "node:crypto";
import { EMBEDDING_CACHE_MAX } from "../utils/constants.js";
import { withLLMRetry } from "./chat.js";
import { captureMemoryError, toError } from "./error-reporter.js";

export interface EmbeddingProvider {
  embed(text: string): Promise<number[]>;
}

export class EmbeddingError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = "EmbeddingError";
  }
}

/**
 * Insertion-ordered Map used as an LRU: a hit moves the entry to the back. Vectors go in and
 * come out as copies, so callers cannot change what later lookups see.
 */
class VectorCache {
  private readonly entries = new Map<string, number[]>();

  constructor(private readonly capacity: number) {}

  static keyFor(text: string): string {
    return createHash("sha256").update(text, "utf-8").digest("hex");
  }

  get(key: string): number[] | undefined {
    const hit = this.entries.get(key);
    if (hit === undefined) return undefined;
    this.entries.delete(key);
    this.entries.set(key, hit);
    return [...hit];
  }

  set(key: string, vector: number[]): void {
    if (this.entries.size >= this.capacity) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) this.entries.delete(oldest.value);
    }
    this.entries.set(key, [...vector]);
  }
}

/** OpenAI embeddings. Models are tried in order and must share a dimension. */
export class Embeddings implements EmbeddingProvider {
  private readonly client: OpenAI;
  private readonly cache = new VectorCache(EMBEDDING_CACHE_MAX);
  private readonly models: string[];

  constructor(
    clientOrApiKey: OpenAI | string,
    modelOrModels: string | string[],
    private readonly maxRetries = 2,
  ) {
    this.client = typeof clientOrApiKey === "string" ? new OpenAI({ apiKey: clientOrApiKey }) : clientOrApiKey;
    this.models = typeof modelOrModels === "string" ? [modelOrModels] : [...modelOrModels];
    if (this.models.length === 0) throw new Error("Embeddings requires at least one model");
  }

  async embed(text: string): Promise<number[]> {
    const key = VectorCache.keyFor(text);
    const cached = this.cache.get(key);
    if (cached) return cached;

    let failure: Error = new Error("no model available");
    for (const model of this.models) {
      try {
        const vector = await this.embedWith(model, text);
        this.cache.set(key, vector);
        return vector;
      } catch (err) {
        failure = toError(err);
      }
    }
    const error = new EmbeddingError(`embedding failed: ${failure.message}`, failure);
    captureMemoryError(error, { subsystem: "embeddings", operation: "embed", phase: "exhausted" });
    throw error;
  }

  private async embedWith(model: string, text: string): Promise<number[]> {
    const response = await withLLMRetry(() => this.client.embeddings.create({ model, input: text }), {
      maxRetries: this.maxRetries,
      label: `embed (${model})`,
    });
    const vector = response.data[0]?.embedding;
    if (!vector || vector.length === 0) throw new Error(`empty embedding from ${model}`);
    return vector;
  }
}

/** Embed through any provider; non-EmbeddingError failures are wrapped so callers see one error type. */
export async function embedOrThrow(provider: EmbeddingProvider, text: string): Promise<number[]> {
  try {
    const vector = await provider.embed(text);
    if (vector.length === 0) throw new EmbeddingError("embedding provider returned an empty vector");
    return vector;
  } catch (err) {
    if (err instanceof EmbeddingError) throw err;
    const cause = toError(err);
    throw new EmbeddingError(`embedding failed: ${cause.message}`, cause);
  }
}
