/**
 * Vector index seam shared by the semantic and episodic stores.
 *
 * Rows are keyed by `namespace:key`; every query is pre-filtered by namespace.
 * Similarity is cosine similarity (1 - cosine distance), results sorted descending.
 */

import type { MemoryMetadata } from "../types/memory.js";

export type VectorRow = {
  id: string;
  namespace: string;
  embedding: number[];
  document: string;
  metadata: MemoryMetadata;
};

export type VectorHit = VectorRow & { similarity: number };

/** Exact-match metadata filter; every listed field must equal the stored value. */
export type MetadataFilter = MemoryMetadata;

export interface VectorIndex {
  upsert(row: VectorRow): Promise<void>;
  get(id: string): Promise<VectorRow | null>;
  query(namespace: string, vector: number[], limit: number, filter?: MetadataFilter): Promise<VectorHit[]>;
  delete(id: string): Promise<boolean>;
  deleteNamespace(namespace: string): Promise<number>;
  reset(): Promise<void>;
  count(namespace?: string): Promise<number>;
  close(): void;
}

export function cosineSimilarity(a: number[], b: number[]): number {
  const len = Math.min(a.length, b.length);
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < len; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export function matchesFilter(metadata: MemoryMetadata, filter: MetadataFilter | undefined): boolean {
  if (!filter) return true;
  return Object.entries(filter).every(([field, expected]) => metadata[field] === expected);
}

/** Sort hits by similarity, descending; ties keep insertion order. */
export function rankHits(hits: VectorHit[], limit: number): VectorHit[] {
  return hits
    .map((hit, index) => ({ hit, index }))
    .sort((a, b) => b.hit.similarity - a.hit.similarity || a.index - b.index)
    .slice(0, Math.max(0, limit))
    .map(({ hit }) => hit);
}

function cloneRow(row: VectorRow): VectorRow {
  return { ...row, embedding: [...row.embedding], metadata: { ...row.metadata } };
}

/** Exact cosine search over an in-process map. */
export class InMemoryVectorIndex implements VectorIndex {
  private readonly rows = new Map<string, VectorRow>();

  async upsert(row: VectorRow): Promise<void> {
    // Re-insert so an overwritten id moves to the end, like a fresh write.
    this.rows.delete(row.id);
    this.rows.set(row.id, cloneRow(row));
  }

  async get(id: string): Promise<VectorRow | null> {
    const row = this.rows.get(id);
    return row ? cloneRow(row) : null;
  }

  async query(namespace: string, vector: number[], limit: number, filter?: MetadataFilter): Promise<VectorHit[]> {
    const hits: VectorHit[] = [];
    for (const row of this.rows.values()) {
      if (row.namespace !== namespace || !matchesFilter(row.metadata, filter)) continue;
      hits.push({ ...cloneRow(row), similarity: cosineSimilarity(vector, row.embedding) });
    }
    return rankHits(hits, limit);
  }

  async delete(id: string): Promise<boolean> {
    return this.rows.delete(id);
  }

  async deleteNamespace(namespace: string): Promise<number> {
    let removed = 0;
    for (const [id, row] of this.rows) {
      if (row.namespace === namespace) {
        this.rows.delete(id);
        removed++;
      }
    }
    return removed;
  }

  async reset(): Promise<void> {
    this.rows.clear();
  }

  async count(namespace?: string): Promise<number> {
    if (namespace === undefined) return this.rows.size;
    let n = 0;
    for (const row of this.rows.values()) if (row.namespace === namespace) n++;
    return n;
  }

  close(): void {}
}
