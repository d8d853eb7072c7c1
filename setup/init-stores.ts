import OpenAI from "openai";
import { EpisodicStore } from "../backends/episodic-store.js";
import { PreferenceStore } from "../backends/preference-store.js";
import { SemanticStore } from "../backends/semantic-store.js";
import { TicketDB } from "../backends/ticket-db.js";
import { VectorDB } from "../backends/vector-db.js";
import { InMemoryVectorIndex, type VectorIndex } from "../backends/vector-index.js";
import { vectorDimsForModel, type MemoryConfig } from "../config.js";
import { OpenAIChatClient, type LlmClient } from "../services/chat.js";
import { ConflictResolver } from "../services/conflict-resolver.js";
import { Embeddings, type EmbeddingProvider } from "../services/embeddings.js";
import { MemoryReader } from "../services/memory-reader.js";
import { MemoryTurnRunner } from "../services/memory-turn.js";
import { MemoryWriter } from "../services/memory-writer.js";
import { SalienceScorer } from "../services/salience-scorer.js";
import type { TicketBackend } from "../types/ticket.js";
import type { MemoryLogger } from "../utils/logger.js";
import { consoleLogger } from "../utils/logger.js";

export type MemorySystemOverrides = {
  embeddings?: EmbeddingProvider;
  llm?: LlmClient;
  semanticIndex?: VectorIndex;
  episodicIndex?: VectorIndex;
  tickets?: TicketBackend & { close?: () => void };
  logger?: MemoryLogger;
  /** Let the LLM planner pick procedures for turns that bring none. Default true. */
  usePlanner?: boolean;
  now?: () => Date;
};

export interface MemorySystem {
  config: MemoryConfig;
  embeddings: EmbeddingProvider;
  llm: LlmClient;
  semantic: SemanticStore;
  episodic: EpisodicStore;
  preferences: PreferenceStore;
  tickets: TicketBackend;
  scorer: SalienceScorer;
  reader: MemoryReader;
  writer: MemoryWriter;
  resolver: ConflictResolver;
  runner: MemoryTurnRunner;
  close(): void;
}

function createVectorIndex(cfg: MemoryConfig, table: string, logger: MemoryLogger): VectorIndex {
  if (cfg.storage.vectorBackend === "memory") return new InMemoryVectorIndex();
  return new VectorDB(cfg.storage.lanceDbPath, table, vectorDimsForModel(cfg.embedding.model), logger);
}

/**
 * Wire stores and services from a parsed config. Collaborators that talk to the outside
 * world (embeddings, LLM, vector indexes, ticket backend) can be replaced.
 */
export function createMemorySystem(cfg: MemoryConfig, overrides: MemorySystemOverrides = {}): MemorySystem {
  const logger = overrides.logger ?? consoleLogger;

  let openai: OpenAI | null = null;
  const client = (): OpenAI => {
    openai ??= new OpenAI({
      apiKey: cfg.embedding.apiKey,
      ...(cfg.embedding.baseURL ? { baseURL: cfg.embedding.baseURL } : {}),
    });
    return openai;
  };

  const embeddings = overrides.embeddings ?? new Embeddings(client(), cfg.embedding.model);
  const llm =
    overrides.llm ??
    new OpenAIChatClient(client(), {
      model: cfg.llm.model,
      fallbackModels: cfg.llm.fallbackModels,
      temperature: cfg.llm.temperature,
      timeoutMs: cfg.llm.timeoutMs,
      logWarn: (msg) => logger.warn(msg),
    });

  const semanticIndex = overrides.semanticIndex ?? createVectorIndex(cfg, "semantic", logger);
  const episodicIndex = overrides.episodicIndex ?? createVectorIndex(cfg, "episodic", logger);
  const semantic = new SemanticStore(semanticIndex, embeddings);
  const episodic = new EpisodicStore(episodicIndex, embeddings, cfg.retrieval.recencyWeight);
  const preferences = new PreferenceStore(cfg.storage.preferencesPath);
  const tickets = overrides.tickets ?? new TicketDB(cfg.storage.ticketsPath);

  const scorer = new SalienceScorer(llm, logger);
  const reader = new MemoryReader(semantic, episodic, preferences, {
    semanticTopK: cfg.retrieval.semanticTopK,
    episodicTopK: cfg.retrieval.episodicTopK,
    recencyWeight: cfg.retrieval.recencyWeight,
  });
  const writer = new MemoryWriter(
    llm,
    scorer,
    semantic,
    episodic,
    { threshold: cfg.salience.threshold, minCandidateChars: cfg.extraction.minCandidateChars },
    logger,
  );
  const resolver = new ConflictResolver(semantic, cfg.retrieval.conflictScanTopK, logger);
  const runner = new MemoryTurnRunner({
    reader,
    writer,
    resolver,
    tickets,
    ...(overrides.usePlanner === false ? {} : { planner: llm }),
    conversationWindow: cfg.extraction.conversationWindow,
    logger,
    ...(overrides.now ? { now: overrides.now } : {}),
  });

  logger.info(
    `stores ready (vector backend: ${cfg.storage.vectorBackend}, preferences: ${cfg.storage.preferencesPath})`,
  );

  return {
    config: cfg,
    embeddings,
    llm,
    semantic,
    episodic,
    preferences,
    tickets,
    scorer,
    reader,
    writer,
    resolver,
    runner,
    close() {
      semanticIndex.close();
      episodicIndex.close();
      if (tickets instanceof TicketDB) tickets.close();
      else overrides.tickets?.close?.();
    },
  };
}
