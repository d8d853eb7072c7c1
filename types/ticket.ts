/**
 * Ticket record as owned by the ticket backend. The memory core only reads it.
 */

export const TICKET_PRIORITIES = ["Low", "Medium", "High", "Critical"] as const;
export type TicketPriority = (typeof TICKET_PRIORITIES)[number];

export const TICKET_STATUSES = ["New", "In Progress", "Escalated", "Resolved", "Closed"] as const;
export type TicketStatus = (typeof TICKET_STATUSES)[number];

export type TicketNote = {
  timestamp: string;
  author: string;
  text: string;
};

export type Ticket = {
  ticketId: string;
  status: TicketStatus;
  priority: TicketPriority;
  /** "-" when unknown. */
  device: string;
  customerName: string;
  issue: string;
  description: string;
  /** YYYY-MM-DD (UTC) */
  createdAt: string;
  /** YYYY-MM-DD (UTC) */
  lastUpdated: string;
  notes: TicketNote[];
};

export type TicketLookup =
  | { found: true; ticket: Ticket }
  | { found: false; ticketId: string };

export type TicketUpdate = {
  note?: string;
  device?: string;
  status?: TicketStatus;
};

/** Authoritative ticket store. Not-found is a value, persistence failures throw. */
export interface TicketBackend {
  lookup(ticketId: string): TicketLookup;
  create(customerName: string, issue: string, device?: string, priority?: TicketPriority): Ticket;
  update(ticketId: string, changes: TicketUpdate): TicketLookup;
}

export const TICKET_TOOLS = ["create_ticket", "update_ticket", "lookup_ticket"] as const;
export type TicketToolName = (typeof TICKET_TOOLS)[number];

export type TicketEvent = "lookup" | "created" | "updated";

export type TicketToolResult =
  | {
      ok: true;
      tool: TicketToolName;
      ticketId: string;
      ticket: Ticket;
      event: TicketEvent;
      message: string;
    }
  | {
      ok: false;
      tool: TicketToolName;
      error: string;
      ticketId?: string;
    };

export function isTicketPriority(value: unknown): value is TicketPriority {
  return typeof value === "string" && (TICKET_PRIORITIES as readonly string[]).includes(value);
}

export function isTicketStatus(value: unknown): value is TicketStatus {
  return typeof value === "string" && (TICKET_STATUSES as readonly string[]).includes(value);
}
