/**
 * Procedural memory: the frozen rule tables (procedures, tool usage, escalation) and the
 * pure decisions made from them. Nothing here is written at run time.
 */

import type { Ticket, TicketToolName } from "../types/ticket.js";
import { ageInDays, parseTimestamp } from "../utils/dates.js";
import { fillPrompt, loadPrompt } from "../utils/prompt-loader.js";

export const PROCEDURE_IDS = ["standard_support", "quick_resolution", "escalated_support"] as const;
export type ProcedureId = (typeof PROCEDURE_IDS)[number];

export const ESCALATION_RULE_IDS = ["critical", "high_priority_3_days"] as const;
export type EscalationRuleId = (typeof ESCALATION_RULE_IDS)[number];

export type EscalationRule = {
  id: EscalationRuleId;
  action: "escalate_to_level2";
  message: string;
  /** Human-readable predicate, shown in prompts. */
  threshold: string;
};

export type Procedure = {
  id: ProcedureId;
  name: string;
  steps: readonly string[];
  allowedTools: readonly TicketToolName[];
  escalationRuleIds: readonly EscalationRuleId[];
};

export type ToolUsageRule = {
  requiredFields: readonly string[];
  optionalFields: readonly string[];
  defaults?: Readonly<Record<string, string>>;
  useWhen?: string;
};

export class ToolSelectionError extends Error {
  constructor(
    message: string,
    public readonly procedureId: string,
    public readonly tool: string,
  ) {
    super(message);
    this.name = "ToolSelectionError";
  }
}

/** Age at which an open High-priority ticket escalates. */
const HIGH_PRIORITY_ESCALATION_DAYS = 3;

export const DIAGNOSTIC_ORDER: readonly string[] = Object.freeze([
  "1. Check ticket status and priority",
  "2. Retrieve relevant memories (semantic + episodic)",
  "3. If device info missing, ask for device model",
  "4. If issue unclear, ask for specific symptoms",
  "5. Suggest troubleshooting steps based on issue type",
  "6. If unresolved after 2 attempts, escalate",
]);

export const TOOL_USAGE_RULES: Readonly<Record<TicketToolName, ToolUsageRule>> = Object.freeze({
  create_ticket: Object.freeze({
    requiredFields: Object.freeze(["customer_name", "issue"]),
    optionalFields: Object.freeze(["device", "priority"]),
    defaults: Object.freeze({ priority: "Medium", device: "-" }),
  }),
  update_ticket: Object.freeze({
    requiredFields: Object.freeze(["ticket_id"]),
    optionalFields: Object.freeze(["note", "device", "status"]),
  }),
  lookup_ticket: Object.freeze({
    requiredFields: Object.freeze(["ticket_id"]),
    optionalFields: Object.freeze([]),
    useWhen: "user asks for status, details, or history",
  }),
});

export const ESCALATION_RULES: Readonly<Record<EscalationRuleId, EscalationRule>> = Object.freeze({
  critical: Object.freeze({
    id: "critical",
    action: "escalate_to_level2",
    threshold: "priority == 'Critical' or status == 'Escalated'",
    message: "Issue escalated to Level 2 support due to critical priority.",
  }),
  high_priority_3_days: Object.freeze({
    id: "high_priority_3_days",
    action: "escalate_to_level2",
    threshold: "priority == 'High' and age_days >= 3",
    message: "High priority ticket open for 3+ days, escalating.",
  }),
});

export const PROCEDURES: Readonly<Record<ProcedureId, Procedure>> = Object.freeze({
  standard_support: Object.freeze({
    id: "standard_support",
    name: "Standard Support Flow",
    steps: DIAGNOSTIC_ORDER,
    allowedTools: Object.freeze(["create_ticket", "update_ticket", "lookup_ticket"] as const),
    escalationRuleIds: Object.freeze(["critical", "high_priority_3_days"] as const),
  }),
  quick_resolution: Object.freeze({
    id: "quick_resolution",
    name: "Quick Resolution Flow",
    steps: Object.freeze([
      "1. Check if issue matches known quick fixes",
      "2. Apply quick fix if available",
      "3. If not, escalate to standard flow",
    ]),
    allowedTools: Object.freeze(["lookup_ticket"] as const),
    escalationRuleIds: Object.freeze([] as const),
  }),
  escalated_support: Object.freeze({
    id: "escalated_support",
    name: "Escalated Support Flow",
    steps: Object.freeze([
      "1. Review escalation reason",
      "2. Gather all context (memories + ticket history)",
      "3. Apply Level 2 diagnostic procedures",
      "4. Document resolution path",
    ]),
    allowedTools: Object.freeze(["lookup_ticket", "update_ticket"] as const),
    escalationRuleIds: Object.freeze([] as const),
  }),
});

export const DEFAULT_PROCEDURE: ProcedureId = "standard_support";

export function isProcedureId(value: unknown): value is ProcedureId {
  return typeof value === "string" && (PROCEDURE_IDS as readonly string[]).includes(value);
}

export function getProcedure(id: ProcedureId): Procedure {
  return PROCEDURES[id];
}

/**
 * First matching escalation rule for the ticket, or null.
 * An unparsable `createdAt` disables the age rule; the critical rule still applies.
 */
export function getEscalationDecision(ticket: Ticket, now: Date = new Date()): EscalationRule | null {
  if (ticket.priority === "Critical" || ticket.status === "Escalated") return ESCALATION_RULES.critical;

  if (ticket.priority === "High") {
    const created = parseTimestamp(ticket.createdAt);
    if (created !== null && Math.floor(ageInDays(created, now)) >= HIGH_PRIORITY_ESCALATION_DAYS) {
      return ESCALATION_RULES.high_priority_3_days;
    }
  }
  return null;
}

export type ToolValidation = { ok: true } | { ok: false; reason: string };

export function validateToolSelection(procedureId: ProcedureId, tool: string): ToolValidation {
  const procedure = PROCEDURES[procedureId];
  if ((procedure.allowedTools as readonly string[]).includes(tool)) return { ok: true };
  return {
    ok: false,
    reason: `tool "${tool}" is not allowed in ${procedure.id} (allowed: ${procedure.allowedTools.join(", ")})`,
  };
}

export function assertToolAllowed(procedureId: ProcedureId, tool: string): void {
  const result = validateToolSelection(procedureId, tool);
  if (!result.ok) throw new ToolSelectionError(result.reason, procedureId, tool);
}

function formatToolRule(tool: TicketToolName, rule: ToolUsageRule): string {
  const parts = [`- ${tool}: requires ${rule.requiredFields.join(", ")}`];
  if (rule.optionalFields.length > 0) parts.push(`optional ${rule.optionalFields.join(", ")}`);
  if (rule.defaults) {
    parts.push(
      `defaults ${Object.entries(rule.defaults)
        .map(([k, v]) => `${k}=${v}`)
        .join(", ")}`,
    );
  }
  if (rule.useWhen) parts.push(`use when ${rule.useWhen}`);
  return parts.join("; ");
}

/** Instructions for the responder: steps, tool rules and escalation rules of one procedure. */
export function getProceduralPrompt(procedureId: ProcedureId = DEFAULT_PROCEDURE): string {
  const procedure = PROCEDURES[procedureId];
  const toolRules = procedure.allowedTools.map((tool) => formatToolRule(tool, TOOL_USAGE_RULES[tool]));
  const escalation =
    procedure.escalationRuleIds.length > 0
      ? procedure.escalationRuleIds.map((id) => `- ${id}: ${ESCALATION_RULES[id].threshold} -> ${ESCALATION_RULES[id].action}`)
      : ["- none (already escalated or lookup-only)"];

  return fillPrompt(loadPrompt("procedure"), {
    procedureName: procedure.name,
    steps: procedure.steps.join("\n"),
    toolRules: toolRules.join("\n"),
    allowedTools: procedure.allowedTools.join(", "),
    escalationRules: escalation.join("\n"),
  });
}
