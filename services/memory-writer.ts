/**
 * Salience-gated dual write: score the turn, and when it clears the gate extract semantic
 * facts and episodic experiences with one LLM call and upsert them.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { EpisodicStore } from "../backends/episodic-store.js";
import type { SemanticStore } from "../backends/semantic-store.js";
import type { ChatMessage, SalienceScore } from "../types/memory.js";
import type { TicketToolResult } from "../types/ticket.js";
import {
  DEFAULT_CONVERSATION_WINDOW,
  DEFAULT_MIN_CANDIDATE_CHARS,
  DEFAULT_SALIENCE_THRESHOLD,
} from "../utils/constants.js";
import { extractJson } from "../utils/json-extract.js";
import { deriveFactKey, randomKey } from "../utils/keys.js";
import type { MemoryLogger } from "../utils/logger.js";
import { silentLogger } from "../utils/logger.js";
import { loadPrompt } from "../utils/prompt-loader.js";
import type { LlmClient } from "./chat.js";
import { addOperationBreadcrumb } from "./error-reporter.js";
import { combinedSalience, detectExplicitTrigger, shouldWrite, type SalienceScorer } from "./salience-scorer.js";

export const ExtractionSchema = Type.Object({
  semantic: Type.Optional(Type.Array(Type.String())),
  episodic: Type.Optional(Type.Array(Type.String())),
});
export type Extraction = Static<typeof ExtractionSchema>;

export type MemoryWriteOptions = {
  threshold?: number;
  minCandidateChars?: number;
};

export type MemoryWriteResult = {
  written: boolean;
  scores: SalienceScore;
  combined: number;
  explicitTrigger: boolean;
  /** "malformed" when the extraction answer could not be read; nothing was written then. */
  extraction: "ok" | "malformed" | "skipped";
  semanticKeys: string[];
  episodicKeys: string[];
  semanticCount: number;
  episodicCount: number;
};

/** Last `window` messages as `role: content` lines. */
export function formatConversation(messages: ChatMessage[], window = DEFAULT_CONVERSATION_WINDOW): string {
  return messages
    .slice(-window)
    .map((m) => `${m.role}: ${m.content}`)
    .join("\n");
}

export function parseExtraction(content: string): Extraction | null {
  const extracted = extractJson(content);
  if (!extracted.ok || !Value.Check(ExtractionSchema, extracted.value)) return null;
  return extracted.value;
}

export class MemoryWriter {
  private readonly threshold: number;
  private readonly minCandidateChars: number;

  constructor(
    private readonly llm: LlmClient,
    private readonly scorer: SalienceScorer,
    private readonly semantic: SemanticStore,
    private readonly episodic: EpisodicStore,
    options: MemoryWriteOptions = {},
    private readonly logger: MemoryLogger = silentLogger,
  ) {
    this.threshold = options.threshold ?? DEFAULT_SALIENCE_THRESHOLD;
    this.minCandidateChars = options.minCandidateChars ?? DEFAULT_MIN_CANDIDATE_CHARS;
  }

  async write(input: {
    namespace: string;
    conversation: string;
    toolResult?: TicketToolResult;
  }): Promise<MemoryWriteResult> {
    const { namespace, conversation, toolResult } = input;
    const explicitTrigger = detectExplicitTrigger(toolResult);
    const scores = await this.scorer.compute(conversation, toolResult);
    const combined = combinedSalience(scores);
    const base = { scores, combined, explicitTrigger, semanticKeys: [], episodicKeys: [], semanticCount: 0, episodicCount: 0 };

    if (!shouldWrite(scores, this.threshold, explicitTrigger)) {
      this.logger.info(`memory write skipped for ${namespace} (salience ${combined.toFixed(2)} < ${this.threshold})`);
      return { ...base, written: false, extraction: "skipped" };
    }

    addOperationBreadcrumb("writer", "extract");
    const content = await this.llm.invoke([
      { role: "system", content: loadPrompt("extraction") },
      { role: "user", content: conversation },
    ]);
    const extraction = parseExtraction(content);
    if (!extraction) {
      this.logger.warn(`memory extraction for ${namespace} returned unreadable output; nothing written`);
      return { ...base, written: true, extraction: "malformed" };
    }

    const semanticKeys: string[] = [];
    for (const fact of this.candidates(extraction.semantic)) {
      const key = deriveFactKey(fact);
      await this.semantic.put(namespace, key, fact);
      semanticKeys.push(key);
    }

    const episodicKeys: string[] = [];
    for (const experience of this.candidates(extraction.episodic)) {
      const key = randomKey("episodic");
      await this.episodic.put(namespace, key, experience, undefined, scores.importance);
      episodicKeys.push(key);
    }

    this.logger.info(
      `memory write for ${namespace}: ${semanticKeys.length} semantic, ${episodicKeys.length} episodic` +
        (explicitTrigger ? " (explicit trigger)" : ""),
    );
    return {
      ...base,
      written: true,
      extraction: "ok",
      semanticKeys,
      episodicKeys,
      semanticCount: semanticKeys.length,
      episodicCount: episodicKeys.length,
    };
  }

  /** Trimmed candidates shorter than the minimum are noise. */
  private candidates(list: string[] | undefined): string[] {
    return (list ?? []).filter((c) => c.trim().length >= this.minCandidateChars);
  }
}
