/**
 * Tool output is authoritative. After a successful ticket call, derive the verified facts,
 * report memories that disagree with them, and upsert the facts under fixed keys.
 */

import type { SemanticStore } from "../backends/semantic-store.js";
import type { TicketToolResult } from "../types/ticket.js";
import { TOOL_VERIFIED_SOURCE } from "../utils/constants.js";
import { findTicketId, verifiedFactKey, type VerifiedField } from "../utils/keys.js";
import type { MemoryLogger } from "../utils/logger.js";
import { silentLogger } from "../utils/logger.js";

export type VerifiedFact = { field: VerifiedField; key: string; content: string };

export type ConflictKind = "ticket_id" | "device";

export type Conflict = {
  kind: ConflictKind;
  /** Content of the disagreeing memory. */
  memory: string;
  detail: string;
};

export type ConflictResolution = {
  verifiedFacts: VerifiedFact[];
  writtenKeys: string[];
  conflicts: Conflict[];
  conflictCount: number;
  message: string;
};

const EMPTY_RESOLUTION: ConflictResolution = {
  verifiedFacts: [],
  writtenKeys: [],
  conflicts: [],
  conflictCount: 0,
  message: "",
};

/** Facts stated by a successful ticket result, in write order. */
export function deriveVerifiedFacts(toolResult: TicketToolResult): VerifiedFact[] {
  if (!toolResult.ok) return [];
  const { ticketId, ticket } = toolResult;
  const facts: VerifiedFact[] = [];
  if (ticketId) {
    facts.push({ field: "existence", key: verifiedFactKey(ticketId, "existence"), content: `Customer has active ticket ${ticketId}` });
  }
  if (ticket.device && ticket.device !== "-") {
    facts.push({ field: "device", key: verifiedFactKey(ticketId, "device"), content: `Customer device: ${ticket.device}` });
  }
  if (ticket.customerName) {
    facts.push({ field: "customer", key: verifiedFactKey(ticketId, "customer"), content: `Customer name: ${ticket.customerName}` });
  }
  if (ticket.status) {
    facts.push({ field: "status", key: verifiedFactKey(ticketId, "status"), content: `Ticket ${ticketId} status: ${ticket.status}` });
  }
  return facts;
}

/** Memories that disagree with the ticket on its id or its device. */
export function detectConflicts(toolResult: TicketToolResult, memories: readonly string[]): Conflict[] {
  if (!toolResult.ok) return [];
  const { ticketId, ticket } = toolResult;
  const device = ticket.device && ticket.device !== "-" ? ticket.device.toLowerCase() : null;
  const conflicts: Conflict[] = [];

  for (const memory of memories) {
    const content = memory.toLowerCase();
    if (ticketId && content.includes("ticket") && !content.includes(`ticket ${ticketId}`)) {
      const mentioned = findTicketId(content);
      if (mentioned && mentioned !== ticketId) {
        conflicts.push({
          kind: "ticket_id",
          memory,
          detail: `Ticket ID conflict: memory had ${mentioned}, tool verified ${ticketId}`,
        });
      }
    }
    if (device && !content.includes(device) && (content.includes("device") || content.includes("router"))) {
      conflicts.push({ kind: "device", memory, detail: "Device conflict detected in memory" });
    }
  }
  return conflicts;
}

export class ConflictResolver {
  constructor(
    private readonly semantic: SemanticStore,
    private readonly scanTopK = 5,
    private readonly logger: MemoryLogger = silentLogger,
  ) {}

  /**
   * Scan runs before anything is written, against `existing` when given, otherwise against a
   * namespace search for the verified facts.
   */
  async resolve(namespace: string, toolResult: TicketToolResult | undefined, existing?: readonly string[]): Promise<ConflictResolution> {
    if (!toolResult || !toolResult.ok) return { ...EMPTY_RESOLUTION };

    const facts = deriveVerifiedFacts(toolResult);
    const memories = existing ?? (await this.scan(namespace, facts));
    const conflicts = detectConflicts(toolResult, memories);

    const writtenKeys: string[] = [];
    for (const fact of facts) {
      await this.semantic.put(namespace, fact.key, fact.content, { source: TOOL_VERIFIED_SOURCE, field: fact.field });
      writtenKeys.push(fact.key);
    }

    const message =
      conflicts.length > 0
        ? `Tool output verified. ${conflicts.length} conflict(s) detected and resolved. Conflicting memories have been updated with authoritative tool data.`
        : "Tool output verified. No conflicts detected. Memories updated with tool data.";
    if (conflicts.length > 0) {
      this.logger.info(`ticket ${toolResult.ticketId}: ${conflicts.length} memory conflict(s) in ${namespace}`);
    }
    return { verifiedFacts: facts, writtenKeys, conflicts, conflictCount: conflicts.length, message };
  }

  /** Memories near the verified facts, deduplicated by id. */
  private async scan(namespace: string, facts: VerifiedFact[]): Promise<string[]> {
    const seen = new Map<string, string>();
    for (const fact of facts) {
      const hits = await this.semantic.search(namespace, fact.content, this.scanTopK);
      for (const hit of hits) {
        seen.set(hit.id, hit.content);
      }
    }
    return [...seen.values()];
  }
}
