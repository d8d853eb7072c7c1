/**
 * Deterministic stand-ins for the embedding provider and the LLM, plus small fixtures.
 */

import { vi, type Mock } from "vitest";
import { mkdtempSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { LlmClient } from "../services/chat.js";
import type { EmbeddingProvider } from "../services/embeddings.js";
import type { ChatMessage } from "../types/memory.js";
import type { Ticket, TicketToolResult } from "../types/ticket.js";

/** Fixed vocabulary; each dimension counts one word. */
export const VOCAB = [
  "customer",
  "device",
  "router",
  "archer",
  "netgear",
  "nighthawk",
  "ticket",
  "status",
  "name",
  "alice",
  "wifi",
  "restart",
  "reset",
  "slow",
  "tried",
  "modem",
  "firmware",
  "billing",
  "kitchen",
  "upstairs",
] as const;

/** Bag-of-words embedding over VOCAB: lowercase, split on non-alphanumerics, count hits. */
export class KeywordEmbedder implements EmbeddingProvider {
  readonly calls: string[] = [];

  async embed(text: string): Promise<number[]> {
    this.calls.push(text);
    const vector = new Array<number>(VOCAB.length).fill(0);
    for (const token of text.toLowerCase().split(/[^a-z0-9]+/)) {
      const idx = VOCAB.findIndex((w) => w === token);
      if (idx >= 0) vector[idx] += 1;
    }
    return vector;
  }
}

export type ScriptedLlm = LlmClient & {
  invoke: Mock<(input: string | ChatMessage[]) => Promise<string>>;
};

/** LLM that answers with the given responses in order. */
export function scriptedLlm(...responses: string[]): ScriptedLlm {
  const invoke = vi.fn<(input: string | ChatMessage[]) => Promise<string>>();
  for (const response of responses) invoke.mockResolvedValueOnce(response);
  return { invoke };
}

export function makeTempDir(prefix = "support-memory-test-"): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function makeTicket(overrides: Partial<Ticket> = {}): Ticket {
  return {
    ticketId: "998880",
    status: "In Progress",
    priority: "Medium",
    device: "Archer-AX55",
    customerName: "Alice",
    issue: "WiFi drops upstairs",
    description: "WiFi drops upstairs",
    createdAt: "2026-10-14",
    lastUpdated: "2026-10-16",
    notes: [{ timestamp: "2026-10-14T09:00:00.000Z", author: "customer", text: "WiFi drops upstairs" }],
    ...overrides,
  };
}

export type OkToolResult = Extract<TicketToolResult, { ok: true }>;

export function lookupResult(ticket: Ticket): OkToolResult {
  return {
    ok: true,
    tool: "lookup_ticket",
    ticketId: ticket.ticketId,
    ticket,
    event: "lookup",
    message: `Ticket ${ticket.ticketId} is ${ticket.status}`,
  };
}
