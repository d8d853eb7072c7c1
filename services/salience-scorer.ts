/**
 * Salience gate for memory writes: importance, novelty, contradiction and risk scored by the
 * LLM, combined as 0.4·i + 0.3·n + 0.2·c − 0.1·r and compared with the write threshold.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { SalienceScore } from "../types/memory.js";
import type { TicketToolResult } from "../types/ticket.js";
import { DEFAULT_SALIENCE_THRESHOLD } from "../utils/constants.js";
import { extractJson } from "../utils/json-extract.js";
import type { MemoryLogger } from "../utils/logger.js";
import { silentLogger } from "../utils/logger.js";
import { fillPrompt, loadPrompt } from "../utils/prompt-loader.js";
import type { LlmClient } from "./chat.js";

const ScoreField = Type.Optional(Type.Union([Type.Number(), Type.String()]));

export const SalienceResponseSchema = Type.Object({
  importance: ScoreField,
  novelty: ScoreField,
  contradiction: ScoreField,
  risk: ScoreField,
});
export type SalienceResponse = Static<typeof SalienceResponseSchema>;

/** Used when the model's answer cannot be read. */
export const FALLBACK_SALIENCE: Readonly<SalienceScore> = Object.freeze({
  importance: 0.5,
  novelty: 0.5,
  contradiction: 0,
  risk: 0,
});

const WEIGHTS = { importance: 0.4, novelty: 0.3, contradiction: 0.2, risk: -0.1 } as const;

function clamp01(n: number): number {
  return Math.min(1, Math.max(0, n));
}

/** Missing → 0; a non-numeric string makes the whole answer unreadable (null). */
function toScore(value: number | string | undefined): number | null {
  if (value === undefined) return 0;
  const n = typeof value === "number" ? value : value.trim() === "" ? Number.NaN : Number(value);
  return Number.isFinite(n) ? clamp01(n) : null;
}

/** Read a salience answer; null when it is not a usable score object. */
export function parseSalience(content: string): SalienceScore | null {
  const extracted = extractJson(content);
  if (!extracted.ok || !Value.Check(SalienceResponseSchema, extracted.value)) return null;
  const raw = extracted.value;
  const importance = toScore(raw.importance);
  const novelty = toScore(raw.novelty);
  const contradiction = toScore(raw.contradiction);
  const risk = toScore(raw.risk);
  if (importance === null || novelty === null || contradiction === null || risk === null) return null;
  return { importance, novelty, contradiction, risk };
}

export function combinedSalience(score: SalienceScore): number {
  return (
    WEIGHTS.importance * score.importance +
    WEIGHTS.novelty * score.novelty +
    WEIGHTS.contradiction * score.contradiction +
    WEIGHTS.risk * score.risk
  );
}

export function shouldWrite(
  score: SalienceScore,
  threshold = DEFAULT_SALIENCE_THRESHOLD,
  explicitTrigger = false,
): boolean {
  if (explicitTrigger) return true;
  return combinedSalience(score) >= threshold;
}

/** Ticket lifecycle events always get written: creation, updates, escalation, resolution. */
export function detectExplicitTrigger(toolResult: TicketToolResult | undefined): boolean {
  if (!toolResult || !toolResult.ok) return false;
  if (toolResult.event === "created" || toolResult.event === "updated") return true;
  return toolResult.ticket.status === "Escalated" || toolResult.ticket.status === "Resolved";
}

export class SalienceScorer {
  constructor(
    private readonly llm: LlmClient,
    private readonly logger: MemoryLogger = silentLogger,
  ) {}

  /** One LLM call. Unreadable answers fall back to 0.5/0.5/0/0; LLM failures propagate. */
  async compute(conversation: string, toolResult?: TicketToolResult): Promise<SalienceScore> {
    const prompt = fillPrompt(loadPrompt("salience"), {
      conversation,
      toolResult: toolResult ? JSON.stringify(toolResult, null, 2) : "None",
    });
    const content = await this.llm.invoke(prompt);
    const parsed = parseSalience(content);
    if (!parsed) {
      this.logger.warn("salience: unreadable model output, using fallback scores");
      return { ...FALLBACK_SALIENCE };
    }
    return parsed;
  }
}
