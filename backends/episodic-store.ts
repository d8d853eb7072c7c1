/**
 * Episodic memory: what happened, ranked by similarity blended with recency.
 *
 * Search over-fetches 2 × topK by similarity, then reranks by
 * (1 - w) * similarity + w * 1 / (1 + ageDays / 30).
 */

import type { EpisodicSearchResult, MemoryMetadata, MemoryRecord } from "../types/memory.js";
import { embedOrThrow, type EmbeddingProvider } from "../services/embeddings.js";
import { DEFAULT_RECENCY_WEIGHT, DEFAULT_SEARCH_TOP_K, EPISODIC_OVERFETCH_FACTOR } from "../utils/constants.js";
import { combineWithRecency, recencyScore } from "../utils/decay.js";
import { composeId } from "../utils/keys.js";
import { buildMetadata, rowToRecord } from "./semantic-store.js";
import type { VectorIndex, VectorRow } from "./vector-index.js";

export class EpisodicStore {
  constructor(
    private readonly index: VectorIndex,
    private readonly embeddings: EmbeddingProvider,
    private readonly defaultRecencyWeight = DEFAULT_RECENCY_WEIGHT,
  ) {
    assertWeight(defaultRecencyWeight);
  }

  async put(
    namespace: string,
    key: string,
    content: string,
    metadata?: MemoryMetadata,
    salienceScore = 1.0,
  ): Promise<MemoryRecord> {
    const id = composeId(namespace, key);
    if (!content.trim()) throw new Error("episodic memory content must not be empty");
    const embedding = await embedOrThrow(this.embeddings, content);
    const row: VectorRow = {
      id,
      namespace,
      embedding,
      document: content,
      metadata: buildMetadata(namespace, key, "episodic", metadata, { salience: salienceScore }),
    };
    await this.index.upsert(row);
    return rowToRecord(row, "episodic");
  }

  async get(namespace: string, key: string): Promise<MemoryRecord | null> {
    const row = await this.index.get(composeId(namespace, key));
    return row ? rowToRecord(row, "episodic") : null;
  }

  async search(
    namespace: string,
    query: string,
    topK = DEFAULT_SEARCH_TOP_K,
    recencyWeight = this.defaultRecencyWeight,
  ): Promise<EpisodicSearchResult[]> {
    assertWeight(recencyWeight);
    if (topK <= 0) return [];
    const vector = await embedOrThrow(this.embeddings, query);
    const hits = await this.index.query(namespace, vector, topK * EPISODIC_OVERFETCH_FACTOR);
    const now = new Date();

    const scored = hits.map((hit, index) => {
      const record = rowToRecord(hit, "episodic");
      const recency = recencyScore(hit.metadata.timestamp, now);
      return {
        index,
        result: {
          id: record.id,
          namespace: record.namespace,
          key: record.key,
          content: record.content,
          metadata: record.metadata,
          similarity: hit.similarity,
          recencyScore: recency,
          combinedScore: combineWithRecency(hit.similarity, recency, recencyWeight),
        },
      };
    });

    return scored
      .sort((a, b) => b.result.combinedScore - a.result.combinedScore || a.index - b.index)
      .slice(0, topK)
      .map(({ result }) => result);
  }

  async delete(namespace: string, key: string): Promise<boolean> {
    return this.index.delete(composeId(namespace, key));
  }

  async clear(namespace: string): Promise<number> {
    return this.index.deleteNamespace(namespace);
  }

  async reset(): Promise<void> {
    await this.index.reset();
  }
}

function assertWeight(weight: number): void {
  if (!Number.isFinite(weight) || weight < 0 || weight > 1) {
    throw new RangeError(`recency weight must be within [0, 1], got ${weight}`);
  }
}
