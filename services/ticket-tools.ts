/**
 * Ticket tools as the agent calls them: name + JSON arguments, gated by the active
 * procedure's allowed tools and validated against a typebox schema per tool.
 */

import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import {
  TICKET_PRIORITIES,
  TICKET_STATUSES,
  type TicketBackend,
  type TicketToolName,
  type TicketToolResult,
} from "../types/ticket.js";
import { assertToolAllowed, type ProcedureId } from "./procedural-memory.js";

const PriorityEnum = Type.Union(
  [Type.Literal("Low"), Type.Literal("Medium"), Type.Literal("High"), Type.Literal("Critical")],
  { description: `One of ${TICKET_PRIORITIES.join(", ")} (default: Medium)` },
);
const StatusEnum = Type.Union(
  [
    Type.Literal("New"),
    Type.Literal("In Progress"),
    Type.Literal("Escalated"),
    Type.Literal("Resolved"),
    Type.Literal("Closed"),
  ],
  { description: `One of ${TICKET_STATUSES.join(", ")}` },
);

export const CreateTicketArgs = Type.Object({
  customer_name: Type.String({ minLength: 1, description: "Customer's name" }),
  issue: Type.String({ minLength: 1, description: "Short description of the problem" }),
  device: Type.Optional(Type.String({ description: "Device model, '-' when unknown (default: '-')" })),
  priority: Type.Optional(PriorityEnum),
});

export const UpdateTicketArgs = Type.Object({
  ticket_id: Type.String({ minLength: 1, description: "Ticket to update" }),
  note: Type.Optional(Type.String({ description: "Note appended to the ticket history" })),
  device: Type.Optional(Type.String({ description: "New device model ('-' leaves it unchanged)" })),
  status: Type.Optional(StatusEnum),
});

export const LookupTicketArgs = Type.Object({
  ticket_id: Type.String({ minLength: 1, description: "Ticket to look up" }),
});

export const TICKET_TOOL_SCHEMAS = {
  create_ticket: CreateTicketArgs,
  update_ticket: UpdateTicketArgs,
  lookup_ticket: LookupTicketArgs,
} satisfies Record<TicketToolName, TSchema>;

function validationError(schema: TSchema, args: unknown): string {
  const first = Value.Errors(schema, args).First();
  return first ? `invalid arguments: ${first.path || "/"} ${first.message}` : "invalid arguments";
}

function createTicket(backend: TicketBackend, args: Static<typeof CreateTicketArgs>): TicketToolResult {
  const ticket = backend.create(args.customer_name, args.issue, args.device ?? "-", args.priority ?? "Medium");
  return {
    ok: true,
    tool: "create_ticket",
    ticketId: ticket.ticketId,
    ticket,
    event: "created",
    message: `Ticket ${ticket.ticketId} created successfully`,
  };
}

function updateTicket(backend: TicketBackend, args: Static<typeof UpdateTicketArgs>): TicketToolResult {
  const result = backend.update(args.ticket_id, { note: args.note, device: args.device, status: args.status });
  if (!result.found) {
    return { ok: false, tool: "update_ticket", ticketId: args.ticket_id, error: `Ticket ${args.ticket_id} not found.` };
  }
  return {
    ok: true,
    tool: "update_ticket",
    ticketId: result.ticket.ticketId,
    ticket: result.ticket,
    event: "updated",
    message: `Ticket ${result.ticket.ticketId} updated`,
  };
}

function lookupTicket(backend: TicketBackend, args: Static<typeof LookupTicketArgs>): TicketToolResult {
  const result = backend.lookup(args.ticket_id);
  if (!result.found) {
    return { ok: false, tool: "lookup_ticket", ticketId: args.ticket_id, error: `Ticket ${args.ticket_id} not found.` };
  }
  return {
    ok: true,
    tool: "lookup_ticket",
    ticketId: result.ticket.ticketId,
    ticket: result.ticket,
    event: "lookup",
    message: `Ticket ${result.ticket.ticketId} is ${result.ticket.status}`,
  };
}

/**
 * Run one ticket tool. Tools outside the procedure throw ToolSelectionError; bad
 * arguments and unknown tickets come back as `{ ok: false }`; persistence failures throw.
 */
export function executeTicketTool(
  backend: TicketBackend,
  procedureId: ProcedureId,
  tool: TicketToolName,
  args: unknown,
): TicketToolResult {
  assertToolAllowed(procedureId, tool);
  switch (tool) {
    case "create_ticket":
      if (!Value.Check(CreateTicketArgs, args)) return { ok: false, tool, error: validationError(CreateTicketArgs, args) };
      return createTicket(backend, args);
    case "update_ticket":
      if (!Value.Check(UpdateTicketArgs, args)) return { ok: false, tool, error: validationError(UpdateTicketArgs, args) };
      return updateTicket(backend, args);
    case "lookup_ticket":
      if (!Value.Check(LookupTicketArgs, args)) return { ok: false, tool, error: validationError(LookupTicketArgs, args) };
      return lookupTicket(backend, args);
  }
}
