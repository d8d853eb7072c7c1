/**
 * Shared memory types used by backends and services.
 */

export const MEMORY_KINDS = ["semantic", "episodic"] as const;
export type MemoryKind = (typeof MEMORY_KINDS)[number];

/** Flat metadata map; values must survive a JSON round trip through the vector backend. */
export type MetadataValue = string | number | boolean | null;
export type MemoryMetadata = Record<string, MetadataValue>;

/** Metadata every stored vector record carries, regardless of what the caller passed. */
export type SystemMetadata = {
  namespace: string;
  key: string;
  /** ISO-8601 UTC, stamped on every write. */
  timestamp: string;
  type: MemoryKind;
};

export type MemoryRecord = {
  /** `namespace:key` */
  id: string;
  namespace: string;
  key: string;
  kind: MemoryKind;
  content: string;
  embedding: number[];
  metadata: MemoryMetadata;
  createdAt: string;
  /** Episodic only: caller-supplied importance at write time. */
  salience?: number;
};

export type SemanticSearchResult = {
  id: string;
  namespace: string;
  key: string;
  content: string;
  metadata: MemoryMetadata;
  similarity: number;
  /** 1 - similarity, kept for callers that think in distances. */
  distance: number;
};

export type EpisodicSearchResult = {
  id: string;
  namespace: string;
  key: string;
  content: string;
  metadata: MemoryMetadata;
  similarity: number;
  /** 0–1, 1 = written just now. */
  recencyScore: number;
  combinedScore: number;
};

/** Anything JSON can hold. Preferences are free-form but must persist as JSON. */
export type PreferenceValue =
  | string
  | number
  | boolean
  | null
  | PreferenceValue[]
  | { [key: string]: PreferenceValue };

export type PreferenceEntry = {
  value: PreferenceValue;
  /** ISO-8601 UTC */
  updated_at: string;
};

/** Importance/novelty/contradiction/risk, each in [0, 1]. Computed per turn, never persisted on its own. */
export type SalienceScore = {
  importance: number;
  novelty: number;
  contradiction: number;
  risk: number;
};

export type ChatRole = "system" | "user" | "assistant";

export type ChatMessage = {
  role: ChatRole;
  content: string;
};
