/**
 * Read phase: semantic facts, recency-weighted episodes and preferences for one namespace,
 * fetched concurrently and rendered as context blocks for the planner and responder.
 */

import type { EpisodicStore } from "../backends/episodic-store.js";
import { formatPreferences, type PreferenceStore } from "../backends/preference-store.js";
import type { SemanticStore } from "../backends/semantic-store.js";
import type { EpisodicSearchResult, PreferenceEntry, SemanticSearchResult } from "../types/memory.js";

export type MemoryReadOptions = {
  semanticTopK?: number;
  episodicTopK?: number;
  recencyWeight?: number;
};

export type MemoryReads = {
  query: string;
  semantic: SemanticSearchResult[];
  episodic: EpisodicSearchResult[];
  preferences: Record<string, PreferenceEntry>;
};

export class MemoryReader {
  constructor(
    private readonly semantic: SemanticStore,
    private readonly episodic: EpisodicStore,
    private readonly preferences: PreferenceStore,
    private readonly options: MemoryReadOptions = {},
  ) {}

  async read(namespace: string, query: string): Promise<MemoryReads> {
    const preferences = this.preferences.getAll(namespace);
    if (!query.trim()) return { query, semantic: [], episodic: [], preferences };

    const [semantic, episodic] = await Promise.all([
      this.semantic.search(namespace, query, this.options.semanticTopK ?? 3),
      this.episodic.search(namespace, query, this.options.episodicTopK ?? 3, this.options.recencyWeight),
    ]);
    return { query, semantic, episodic, preferences };
  }
}

export function formatMemoryContext(reads: MemoryReads): string {
  const blocks: string[] = [];
  if (reads.semantic.length > 0) {
    blocks.push(`Semantic memories (facts, domain knowledge):\n${reads.semantic.map((r) => `- ${r.content}`).join("\n")}`);
  }
  if (reads.episodic.length > 0) {
    blocks.push(`Episodic memories (past experiences):\n${reads.episodic.map((r) => `- ${r.content}`).join("\n")}`);
  }
  if (Object.keys(reads.preferences).length > 0) {
    blocks.push(`User preferences:\n${formatPreferences(reads.preferences)}`);
  }
  return blocks.join("\n\n");
}
