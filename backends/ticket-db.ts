/**
 * Ticket database: the authoritative ticket record (SQLite, WAL).
 * Every write runs in a transaction that reads its own result back before committing.
 */

import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import {
  isTicketPriority,
  isTicketStatus,
  type Ticket,
  type TicketBackend,
  type TicketLookup,
  type TicketNote,
  type TicketPriority,
  type TicketUpdate,
} from "../types/ticket.js";
import { captureMemoryError, toError } from "../services/error-reporter.js";
import { SQLITE_BUSY_TIMEOUT_MS } from "../utils/constants.js";
import { isoDate, isoNow } from "../utils/dates.js";

export class TicketPersistenceError extends Error {
  constructor(
    message: string,
    public readonly expected: number,
    public readonly actual: number,
    public readonly path: string,
  ) {
    super(message);
    this.name = "TicketPersistenceError";
  }
}

type TicketRow = {
  ticket_id: string;
  status: string;
  priority: string;
  device: string;
  customer_name: string;
  issue: string;
  description: string;
  created_at: string;
  last_updated: string;
};

type NoteRow = { timestamp: string; author: string; text: string };

export type TicketDBOptions = {
  /** Clock for created_at / last_updated / note timestamps. */
  now?: () => Date;
};

export class TicketDB implements TicketBackend {
  private readonly db: Database.Database;
  private readonly now: () => Date;

  constructor(
    private readonly dbPath: string,
    options: TicketDBOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
    mkdirSync(dirname(dbPath), { recursive: true });
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma(`busy_timeout = ${SQLITE_BUSY_TIMEOUT_MS}`);
    this.db.pragma("foreign_keys = ON");

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS tickets (
        ticket_id TEXT PRIMARY KEY,
        status TEXT NOT NULL DEFAULT 'New',
        priority TEXT NOT NULL DEFAULT 'Medium',
        device TEXT NOT NULL DEFAULT '-',
        customer_name TEXT NOT NULL,
        issue TEXT NOT NULL,
        description TEXT NOT NULL,
        created_at TEXT NOT NULL,
        last_updated TEXT NOT NULL
      )
    `);
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS ticket_notes (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        ticket_id TEXT NOT NULL REFERENCES tickets(ticket_id) ON DELETE CASCADE,
        timestamp TEXT NOT NULL,
        author TEXT NOT NULL,
        text TEXT NOT NULL
      )
    `);
    this.db.exec(`CREATE INDEX IF NOT EXISTS idx_ticket_notes_ticket ON ticket_notes(ticket_id)`);
  }

  get path(): string {
    return this.dbPath;
  }

  lookup(ticketId: string): TicketLookup {
    const ticket = this.readTicket(ticketId);
    return ticket ? { found: true, ticket } : { found: false, ticketId };
  }

  create(customerName: string, issue: string, device = "-", priority: TicketPriority = "Medium"): Ticket {
    const now = this.now();
    const today = isoDate(now);
    const write = this.db.transaction((): Ticket => {
      const ticketId = String(this.maxNumericId() + 1);
      const expected = this.countTickets() + 1;
      this.db
        .prepare(
          `INSERT INTO tickets (ticket_id, status, priority, device, customer_name, issue, description, created_at, last_updated)
           VALUES (?, 'New', ?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(ticketId, priority, device || "-", customerName, issue, issue, today, today);
      this.insertNote(ticketId, { timestamp: isoNow(now), author: "customer", text: issue });
      return this.verifyWrite(ticketId, expected);
    });
    return this.guard("ticket-create", () => write());
  }

  update(ticketId: string, changes: TicketUpdate): TicketLookup {
    const now = this.now();
    const write = this.db.transaction((): TicketLookup => {
      const existing = this.readTicket(ticketId);
      if (!existing) return { found: false, ticketId };
      const expected = this.countTickets();
      if (changes.note) {
        this.insertNote(ticketId, { timestamp: isoNow(now), author: "customer", text: changes.note });
      }
      const device = changes.device && changes.device !== "-" ? changes.device : existing.device;
      const status = changes.status ?? existing.status;
      this.db
        .prepare(`UPDATE tickets SET device = ?, status = ?, last_updated = ? WHERE ticket_id = ?`)
        .run(device, status, isoDate(now), ticketId);
      return { found: true, ticket: this.verifyWrite(ticketId, expected) };
    });
    return this.guard("ticket-update", () => write());
  }

  /** Insert or replace whole tickets (seed data, imports). */
  importTickets(tickets: Ticket[]): number {
    const write = this.db.transaction((): number => {
      const upsert = this.db.prepare(
        `INSERT OR REPLACE INTO tickets (ticket_id, status, priority, device, customer_name, issue, description, created_at, last_updated)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      );
      const clearNotes = this.db.prepare(`DELETE FROM ticket_notes WHERE ticket_id = ?`);
      for (const t of tickets) {
        upsert.run(t.ticketId, t.status, t.priority, t.device, t.customerName, t.issue, t.description, t.createdAt, t.lastUpdated);
        clearNotes.run(t.ticketId);
        for (const note of t.notes) this.insertNote(t.ticketId, note);
      }
      return tickets.length;
    });
    return this.guard("ticket-import", () => write());
  }

  count(): number {
    return this.countTickets();
  }

  close(): void {
    this.db.close();
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      captureMemoryError(toError(err), { subsystem: "tickets", operation });
      throw err;
    }
  }

  /** Read-back inside the transaction: the row must exist and the table must hold `expected` rows. */
  private verifyWrite(ticketId: string, expected: number): Ticket {
    const actual = this.countTickets();
    const ticket = this.readTicket(ticketId);
    if (!ticket || actual !== expected) {
      throw new TicketPersistenceError(
        `ticket ${ticketId} write verification failed: expected ${expected} tickets, found ${actual}${ticket ? "" : " (row missing)"}`,
        expected,
        actual,
        this.dbPath,
      );
    }
    return ticket;
  }

  private insertNote(ticketId: string, note: TicketNote): void {
    this.db
      .prepare(`INSERT INTO ticket_notes (ticket_id, timestamp, author, text) VALUES (?, ?, ?, ?)`)
      .run(ticketId, note.timestamp, note.author, note.text);
  }

  private countTickets(): number {
    const row = this.db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM tickets`).get();
    return row?.n ?? 0;
  }

  private maxNumericId(): number {
    const row = this.db
      .prepare<[], { max_id: number | null }>(
        `SELECT MAX(CAST(ticket_id AS INTEGER)) AS max_id FROM tickets WHERE ticket_id GLOB '[0-9]*' AND ticket_id NOT GLOB '*[^0-9]*'`,
      )
      .get();
    return row?.max_id ?? 0;
  }

  private readTicket(ticketId: string): Ticket | null {
    const row = this.db.prepare<[string], TicketRow>(`SELECT * FROM tickets WHERE ticket_id = ?`).get(ticketId);
    if (!row) return null;
    const notes = this.db
      .prepare<[string], NoteRow>(`SELECT timestamp, author, text FROM ticket_notes WHERE ticket_id = ? ORDER BY id`)
      .all(ticketId);
    return {
      ticketId: row.ticket_id,
      status: isTicketStatus(row.status) ? row.status : "New",
      priority: isTicketPriority(row.priority) ? row.priority : "Medium",
      device: row.device,
      customerName: row.customer_name,
      issue: row.issue,
      description: row.description,
      createdAt: row.created_at,
      lastUpdated: row.last_updated,
      notes: notes.map((n) => ({ timestamp: n.timestamp, author: n.author, text: n.text })),
    };
  }
}
