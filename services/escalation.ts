/**
 * Per-session procedure state. The planner proposes, ticket observations can force
 * `escalated_support`, and once escalated the session stays escalated.
 */

import type { TicketToolResult } from "../types/ticket.js";
import type { MemoryLogger } from "../utils/logger.js";
import { silentLogger } from "../utils/logger.js";
import {
  DEFAULT_PROCEDURE,
  getEscalationDecision,
  type EscalationRule,
  type ProcedureId,
} from "./procedural-memory.js";

export type EscalationOutcome = {
  transitioned: boolean;
  procedure: ProcedureId;
  rule: EscalationRule | null;
};

export class ProcedureStateMachine {
  private procedure: ProcedureId;
  private lastRule: EscalationRule | null = null;

  constructor(
    initial: ProcedureId = DEFAULT_PROCEDURE,
    private readonly logger: MemoryLogger = silentLogger,
  ) {
    this.procedure = initial;
  }

  get current(): ProcedureId {
    return this.procedure;
  }

  get escalation(): EscalationRule | null {
    return this.lastRule;
  }

  get isEscalated(): boolean {
    return this.procedure === "escalated_support";
  }

  /** Apply the planner's choice. Ignored once the session is escalated. */
  plan(procedureId: ProcedureId): ProcedureId {
    if (this.isEscalated && procedureId !== "escalated_support") {
      this.logger.info(`planner chose ${procedureId} but session is escalated; keeping escalated_support`);
      return this.procedure;
    }
    this.procedure = procedureId;
    return this.procedure;
  }

  /** Evaluate escalation rules against the ticket carried by a tool result. */
  observe(toolResult: TicketToolResult | undefined, now: Date = new Date()): EscalationOutcome {
    if (!toolResult || !toolResult.ok) return { transitioned: false, procedure: this.procedure, rule: null };

    const rule = getEscalationDecision(toolResult.ticket, now);
    if (!rule) return { transitioned: false, procedure: this.procedure, rule: null };

    const transitioned = this.procedure !== "escalated_support";
    this.procedure = "escalated_support";
    this.lastRule = rule;
    if (transitioned) this.logger.info(`ticket ${toolResult.ticketId}: ${rule.message} (rule ${rule.id})`);
    return { transitioned, procedure: this.procedure, rule };
  }
}
