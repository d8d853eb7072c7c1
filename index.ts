/**
 * support-memory
 *
 * Memory core for a support-ticket assistant:
 *   1. Semantic + episodic stores on LanceDB (recency-weighted episodic recall)
 *   2. Preference store (atomic JSON document)
 *   3. Procedural rules with escalation, checked against the SQLite ticket record
 *
 * Writes are salience-gated; tool-verified ticket facts overwrite stale memories.
 */

import { memoryConfigSchema } from "./config.js";
import { initErrorReporter } from "./services/error-reporter.js";
import { createMemorySystem, type MemorySystem, type MemorySystemOverrides } from "./setup/init-stores.js";
import { consoleLogger } from "./utils/logger.js";

export const VERSION = "0.1.0";

/** Parse config, start opt-in error reporting, and wire the stores. */
export async function initMemorySystem(rawConfig: unknown, overrides: MemorySystemOverrides = {}): Promise<MemorySystem> {
  const cfg = memoryConfigSchema.parse(rawConfig);
  await initErrorReporter(cfg.errorReporting, VERSION, overrides.logger ?? consoleLogger);
  return createMemorySystem(cfg, overrides);
}

export { ConfigError, memoryConfigSchema, vectorDimsForModel, type MemoryConfig } from "./config.js";
export { createMemorySystem, type MemorySystem, type MemorySystemOverrides } from "./setup/init-stores.js";

export { EpisodicStore } from "./backends/episodic-store.js";
export { formatPreferences, PreferenceStore, PreferenceStoreError } from "./backends/preference-store.js";
export { SemanticStore } from "./backends/semantic-store.js";
export { TicketDB, TicketPersistenceError } from "./backends/ticket-db.js";
export { VectorDB } from "./backends/vector-db.js";
export {
  cosineSimilarity,
  InMemoryVectorIndex,
  type MetadataFilter,
  type VectorHit,
  type VectorIndex,
  type VectorRow,
} from "./backends/vector-index.js";

export { chatComplete, chatCompleteWithRetry, LLMRetryError, OpenAIChatClient, withLLMRetry, type LlmClient } from "./services/chat.js";
export { ConflictResolver, deriveVerifiedFacts, detectConflicts, type ConflictResolution } from "./services/conflict-resolver.js";
export { EmbeddingError, Embeddings, type EmbeddingProvider } from "./services/embeddings.js";
export { captureMemoryError, flushErrorReporter, initErrorReporter } from "./services/error-reporter.js";
export { ProcedureStateMachine, type EscalationOutcome } from "./services/escalation.js";
export { formatMemoryContext, MemoryReader, type MemoryReads } from "./services/memory-reader.js";
export { MemoryTurnRunner, TurnInputError, validateTurnInput, type TurnInput, type TurnResult } from "./services/memory-turn.js";
export { formatConversation, MemoryWriter, type MemoryWriteResult } from "./services/memory-writer.js";
export { buildPlannerPrompt, parseProcedure, selectProcedure } from "./services/planner.js";
export {
  assertToolAllowed,
  DIAGNOSTIC_ORDER,
  ESCALATION_RULES,
  getEscalationDecision,
  getProceduralPrompt,
  getProcedure,
  isProcedureId,
  PROCEDURES,
  ToolSelectionError,
  TOOL_USAGE_RULES,
  validateToolSelection,
  type EscalationRule,
  type Procedure,
  type ProcedureId,
} from "./services/procedural-memory.js";
export { combinedSalience, detectExplicitTrigger, SalienceScorer, shouldWrite } from "./services/salience-scorer.js";
export { executeTicketTool, TICKET_TOOL_SCHEMAS } from "./services/ticket-tools.js";

export * from "./types/memory.js";
export * from "./types/ticket.js";
export { composeId, deriveFactKey, InvalidMemoryKeyError, parseId, randomKey, verifiedFactKey } from "./utils/keys.js";
export { consoleLogger, silentLogger, type MemoryLogger } from "./utils/logger.js";
export { NamespaceLock } from "./utils/namespace-lock.js";
