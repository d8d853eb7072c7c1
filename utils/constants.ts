/**
 * Shared constants to avoid magic numbers across the memory core.
 */

/** Milliseconds per day. */
export const MS_PER_DAY = 86_400_000;
/** Days after which an episodic record's recency score has halved. */
export const RECENCY_DECAY_DAYS = 30;
/** Default episodic recency weight `w` in `(1 - w) * similarity + w * recency`. */
export const DEFAULT_RECENCY_WEIGHT = 0.3;
/** Episodic search fetches this many times `topK` before reranking. */
export const EPISODIC_OVERFETCH_FACTOR = 2;
/** Default top-k for store searches when the caller does not say. */
export const DEFAULT_SEARCH_TOP_K = 5;
/** Default salience write threshold. */
export const DEFAULT_SALIENCE_THRESHOLD = 0.6;
/** Extraction candidates shorter than this (trimmed) are noise. */
export const DEFAULT_MIN_CANDIDATE_CHARS = 10;
/** Messages of the current conversation shown to scorer and extractor. */
export const DEFAULT_CONVERSATION_WINDOW = 6;
/** Memories of each kind shown to the planner. */
export const PLANNER_MAX_MEMORIES = 5;
/** Metadata `source` for facts written from authoritative tool output. */
export const TOOL_VERIFIED_SOURCE = "tool_verified";
/** SQLite busy timeout (ms). */
export const SQLITE_BUSY_TIMEOUT_MS = 5000;
/** Max cached embeddings (LRU eviction). */
export const EMBEDDING_CACHE_MAX = 500;
