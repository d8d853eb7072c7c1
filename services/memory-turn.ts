/**
 * One conversational turn against the memory core:
 * read → plan → write (salience-gated extraction) → conflict resolution → escalation.
 * Turns on the same namespace are serialized; different namespaces run in parallel.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { TicketBackend, TicketToolName, TicketToolResult } from "../types/ticket.js";
import { DEFAULT_CONVERSATION_WINDOW } from "../utils/constants.js";
import type { MemoryLogger } from "../utils/logger.js";
import { silentLogger } from "../utils/logger.js";
import { NamespaceLock } from "../utils/namespace-lock.js";
import type { LlmClient } from "./chat.js";
import { ConflictResolver, type ConflictResolution } from "./conflict-resolver.js";
import { addOperationBreadcrumb } from "./error-reporter.js";
import { ProcedureStateMachine, type EscalationOutcome } from "./escalation.js";
import { formatMemoryContext, MemoryReader, type MemoryReads } from "./memory-reader.js";
import { formatConversation, MemoryWriter, type MemoryWriteResult } from "./memory-writer.js";
import { selectProcedure } from "./planner.js";
import { getProceduralPrompt, type ProcedureId } from "./procedural-memory.js";
import { executeTicketTool } from "./ticket-tools.js";

export class TurnInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TurnInputError";
  }
}

const ProcedureIdSchema = Type.Union([
  Type.Literal("standard_support"),
  Type.Literal("quick_resolution"),
  Type.Literal("escalated_support"),
]);

const TicketSchema = Type.Object({
  ticketId: Type.String(),
  status: Type.Union([
    Type.Literal("New"),
    Type.Literal("In Progress"),
    Type.Literal("Escalated"),
    Type.Literal("Resolved"),
    Type.Literal("Closed"),
  ]),
  priority: Type.Union([Type.Literal("Low"), Type.Literal("Medium"), Type.Literal("High"), Type.Literal("Critical")]),
  device: Type.String(),
  customerName: Type.String(),
  issue: Type.String(),
  description: Type.String(),
  createdAt: Type.String(),
  lastUpdated: Type.String(),
  notes: Type.Array(Type.Object({ timestamp: Type.String(), author: Type.String(), text: Type.String() })),
});

const ToolNameSchema = Type.Union([
  Type.Literal("create_ticket"),
  Type.Literal("update_ticket"),
  Type.Literal("lookup_ticket"),
]);

const TicketToolResultSchema = Type.Union([
  Type.Object({
    ok: Type.Literal(true),
    tool: ToolNameSchema,
    ticketId: Type.String(),
    ticket: TicketSchema,
    event: Type.Union([Type.Literal("lookup"), Type.Literal("created"), Type.Literal("updated")]),
    message: Type.String(),
  }),
  Type.Object({
    ok: Type.Literal(false),
    tool: ToolNameSchema,
    error: Type.String(),
    ticketId: Type.Optional(Type.String()),
  }),
]);

export const TurnInputSchema = Type.Object({
  // Needs a non-space character and no ":".
  namespace: Type.String({ minLength: 1, pattern: "^(?=.*\\S)[^:]+$" }),
  messages: Type.Array(
    Type.Object({
      role: Type.Union([Type.Literal("system"), Type.Literal("user"), Type.Literal("assistant")]),
      content: Type.String(),
    }),
    { minItems: 1 },
  ),
  toolResult: Type.Optional(TicketToolResultSchema),
  plannedProcedure: Type.Optional(ProcedureIdSchema),
});
export type TurnInput = Static<typeof TurnInputSchema>;

export type TurnResult = {
  namespace: string;
  reads: MemoryReads;
  /** Rendered read-phase context for the responder. */
  context: string;
  procedure: ProcedureId;
  proceduralPrompt: string;
  write: MemoryWriteResult;
  conflicts: ConflictResolution | null;
  escalation: EscalationOutcome;
};

export type MemoryTurnDeps = {
  reader: MemoryReader;
  writer: MemoryWriter;
  resolver: ConflictResolver;
  tickets: TicketBackend;
  /** When set, the planner picks a procedure for turns that do not bring one. */
  planner?: LlmClient;
  conversationWindow?: number;
  logger?: MemoryLogger;
  now?: () => Date;
};

export function validateTurnInput(input: unknown): TurnInput {
  if (Value.Check(TurnInputSchema, input)) return input;
  const first = Value.Errors(TurnInputSchema, input).First();
  throw new TurnInputError(first ? `invalid turn input at ${first.path || "/"}: ${first.message}` : "invalid turn input");
}

export class MemoryTurnRunner {
  private readonly lock = new NamespaceLock();
  private readonly sessions = new Map<string, ProcedureStateMachine>();
  private readonly logger: MemoryLogger;
  private readonly now: () => Date;

  constructor(private readonly deps: MemoryTurnDeps) {
    this.logger = deps.logger ?? silentLogger;
    this.now = deps.now ?? (() => new Date());
  }

  /** Procedure state of one namespace's session, created on first use. */
  session(namespace: string): ProcedureStateMachine {
    let machine = this.sessions.get(namespace);
    if (!machine) {
      machine = new ProcedureStateMachine("standard_support", this.logger);
      this.sessions.set(namespace, machine);
    }
    return machine;
  }

  /**
   * Drop a namespace's procedure state once queued work for it has finished. The next turn
   * starts a fresh `standard_support` session. False when there was no session.
   */
  async endSession(namespace: string): Promise<boolean> {
    return this.lock.runExclusive(namespace, async () => this.sessions.delete(namespace));
  }

  /** Namespaces that currently hold procedure state. */
  get activeSessions(): number {
    return this.sessions.size;
  }

  /** Run a ticket tool under the session's current procedure. */
  async executeTool(namespace: string, tool: TicketToolName, args: unknown): Promise<TicketToolResult> {
    return this.lock.runExclusive(namespace, async () =>
      executeTicketTool(this.deps.tickets, this.session(namespace).current, tool, args),
    );
  }

  async runTurn(raw: unknown): Promise<TurnResult> {
    const input = validateTurnInput(raw);
    return this.lock.runExclusive(input.namespace, () => this.turn(input));
  }

  private async turn(input: TurnInput): Promise<TurnResult> {
    const { namespace, messages, toolResult } = input;
    const machine = this.session(namespace);
    const query = messages[messages.length - 1]?.content ?? "";

    addOperationBreadcrumb("turn", "read");
    const reads = await this.deps.reader.read(namespace, query);

    const planned =
      input.plannedProcedure ??
      (this.deps.planner
        ? await selectProcedure(this.deps.planner, { messages, semantic: reads.semantic, episodic: reads.episodic })
        : machine.current);
    machine.plan(planned);

    addOperationBreadcrumb("turn", "write");
    const conversation = formatConversation(messages, this.deps.conversationWindow ?? DEFAULT_CONVERSATION_WINDOW);
    const write = await this.deps.writer.write({ namespace, conversation, toolResult });

    const conflicts = toolResult?.ok
      ? await this.deps.resolver.resolve(
          namespace,
          toolResult,
          reads.semantic.map((r) => r.content),
        )
      : null;

    const escalation = machine.observe(toolResult, this.now());
    if (escalation.transitioned && escalation.rule) {
      this.logger.info(`${namespace}: escalated (${escalation.rule.id})`);
    }

    return {
      namespace,
      reads,
      context: formatMemoryContext(reads),
      procedure: machine.current,
      proceduralPrompt: getProceduralPrompt(machine.current),
      write,
      conflicts,
      escalation,
    };
  }
}
