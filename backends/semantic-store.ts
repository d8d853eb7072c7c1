/**
 * Semantic memory: stable facts keyed by `namespace:key`, ranked by pure similarity.
 */

import type { MemoryMetadata, MemoryRecord, SemanticSearchResult } from "../types/memory.js";
import { embedOrThrow, type EmbeddingProvider } from "../services/embeddings.js";
import { DEFAULT_SEARCH_TOP_K } from "../utils/constants.js";
import { isoNow } from "../utils/dates.js";
import { composeId } from "../utils/keys.js";
import type { MetadataFilter, VectorIndex, VectorRow } from "./vector-index.js";

/** Caller metadata first; the system fields always win. */
export function buildMetadata(
  namespace: string,
  key: string,
  type: "semantic" | "episodic",
  metadata: MemoryMetadata | undefined,
  extra: MemoryMetadata = {},
): MemoryMetadata {
  return { ...metadata, ...extra, namespace, key, timestamp: isoNow(), type };
}

export function rowToRecord(row: VectorRow, kind: "semantic" | "episodic"): MemoryRecord {
  const key = typeof row.metadata.key === "string" ? row.metadata.key : row.id.slice(row.namespace.length + 1);
  const timestamp = row.metadata.timestamp;
  const salience = row.metadata.salience;
  return {
    id: row.id,
    namespace: row.namespace,
    key,
    kind,
    content: row.document,
    embedding: [...row.embedding],
    metadata: { ...row.metadata },
    createdAt: typeof timestamp === "string" ? timestamp : "",
    ...(typeof salience === "number" ? { salience } : {}),
  };
}

export class SemanticStore {
  constructor(
    private readonly index: VectorIndex,
    private readonly embeddings: EmbeddingProvider,
  ) {}

  async put(namespace: string, key: string, content: string, metadata?: MemoryMetadata): Promise<MemoryRecord> {
    const id = composeId(namespace, key);
    if (!content.trim()) throw new Error("semantic memory content must not be empty");
    const embedding = await embedOrThrow(this.embeddings, content);
    const row: VectorRow = {
      id,
      namespace,
      embedding,
      document: content,
      metadata: buildMetadata(namespace, key, "semantic", metadata),
    };
    await this.index.upsert(row);
    return rowToRecord(row, "semantic");
  }

  async get(namespace: string, key: string): Promise<MemoryRecord | null> {
    const row = await this.index.get(composeId(namespace, key));
    return row ? rowToRecord(row, "semantic") : null;
  }

  async search(
    namespace: string,
    query: string,
    topK = DEFAULT_SEARCH_TOP_K,
    filters?: MetadataFilter,
  ): Promise<SemanticSearchResult[]> {
    if (topK <= 0) return [];
    const vector = await embedOrThrow(this.embeddings, query);
    const hits = await this.index.query(namespace, vector, topK, filters);
    return hits.map((hit) => {
      const record = rowToRecord(hit, "semantic");
      return {
        id: record.id,
        namespace: record.namespace,
        key: record.key,
        content: record.content,
        metadata: record.metadata,
        similarity: hit.similarity,
        distance: 1 - hit.similarity,
      };
    });
  }

  async delete(namespace: string, key: string): Promise<boolean> {
    return this.index.delete(composeId(namespace, key));
  }

  /** Remove every fact in one namespace. */
  async clear(namespace: string): Promise<number> {
    return this.index.deleteNamespace(namespace);
  }

  async reset(): Promise<void> {
    await this.index.reset();
  }
}
