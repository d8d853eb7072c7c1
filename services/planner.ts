/**
 * Procedure planner: one LLM call that picks a procedure id. Anything unreadable or
 * unknown falls back to standard_support.
 */

import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { ChatMessage } from "../types/memory.js";
import { PLANNER_MAX_MEMORIES } from "../utils/constants.js";
import { extractJson } from "../utils/json-extract.js";
import { fillPrompt, loadPrompt } from "../utils/prompt-loader.js";
import type { LlmClient } from "./chat.js";
import { formatConversation } from "./memory-writer.js";
import { DEFAULT_PROCEDURE, isProcedureId, PROCEDURE_IDS, PROCEDURES, type ProcedureId } from "./procedural-memory.js";

const PlannerResponseSchema = Type.Object({ procedure: Type.String() });

export type PlannerInput = {
  messages: ChatMessage[];
  semantic: ReadonlyArray<{ content: string }>;
  episodic: ReadonlyArray<{ content: string }>;
};

function listMemories(memories: ReadonlyArray<{ content: string }>): string {
  if (memories.length === 0) return "None";
  return memories
    .slice(0, PLANNER_MAX_MEMORIES)
    .map((m) => `- ${m.content}`)
    .join("\n");
}

export function buildPlannerPrompt(input: PlannerInput): string {
  const procedures = PROCEDURE_IDS.map((id) => {
    const p = PROCEDURES[id];
    return `- ${id}: ${p.name} (tools: ${p.allowedTools.join(", ") || "none"})`;
  }).join("\n");
  return fillPrompt(loadPrompt("planner"), {
    procedures,
    semanticCount: String(input.semantic.length),
    semantic: listMemories(input.semantic),
    episodicCount: String(input.episodic.length),
    episodic: listMemories(input.episodic),
    conversation: formatConversation(input.messages),
  });
}

export function parseProcedure(content: string): ProcedureId {
  const extracted = extractJson(content);
  if (!extracted.ok || !Value.Check(PlannerResponseSchema, extracted.value)) return DEFAULT_PROCEDURE;
  const choice = extracted.value.procedure.trim();
  return isProcedureId(choice) ? choice : DEFAULT_PROCEDURE;
}

export async function selectProcedure(llm: LlmClient, input: PlannerInput): Promise<ProcedureId> {
  const content = await llm.invoke(buildPlannerPrompt(input));
  return parseProcedure(content);
}
