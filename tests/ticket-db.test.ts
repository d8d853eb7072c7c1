/**
 * Tests for the SQLite ticket database
 */

import { afterEach, beforeEach, describe, expect, it } from "vitest";
import Database from "better-sqlite3";
import { rmSync } from "node:fs";
import { join } from "node:path";
import { TicketDB, TicketPersistenceError } from "../backends/ticket-db.js";
import { makeTempDir, makeTicket } from "./helpers.js";

const NOW = new Date("2026-10-18T12:00:00.000Z");

describe("TicketDB", () => {
  let dir: string;
  let path: string;
  let db: TicketDB;

  beforeEach(() => {
    dir = makeTempDir("ticket-db-test-");
    path = join(dir, "data", "tickets.db");
    db = new TicketDB(path, { now: () => NOW });
  });

  afterEach(() => {
    db.close();
    rmSync(dir, { recursive: true, force: true });
  });

  it("creates tickets with sequential ids and a first note", () => {
    const first = db.create("Alice", "WiFi drops upstairs", "Archer-AX55", "High");
    const second = db.create("Bob", "Slow internet");

    expect(first).toEqual({
      ticketId: "1",
      status: "New",
      priority: "High",
      device: "Archer-AX55",
      customerName: "Alice",
      issue: "WiFi drops upstairs",
      description: "WiFi drops upstairs",
      createdAt: "2026-10-18",
      lastUpdated: "2026-10-18",
      notes: [{ timestamp: "2026-10-18T12:00:00.000Z", author: "customer", text: "WiFi drops upstairs" }],
    });
    expect(second.ticketId).toBe("2");
    expect(second.device).toBe("-");
    expect(second.priority).toBe("Medium");
    expect(db.count()).toBe(2);
  });

  it("continues numbering after imported tickets and skips non-numeric ids", () => {
    db.importTickets([makeTicket({ ticketId: "998880" }), makeTicket({ ticketId: "ABC-1" })]);

    expect(db.create("Carol", "No signal").ticketId).toBe("998881");
  });

  it("looks tickets up and reports unknown ids as not found", () => {
    db.importTickets([makeTicket()]);

    const found = db.lookup("998880");
    expect(found.found).toBe(true);
    if (found.found) expect(found.ticket.customerName).toBe("Alice");
    expect(db.lookup("404")).toEqual({ found: false, ticketId: "404" });
  });

  it("replaces notes on re-import", () => {
    db.importTickets([makeTicket()]);
    db.importTickets([makeTicket({ notes: [{ timestamp: "2026-10-17T08:00:00.000Z", author: "agent", text: "Called back" }] })]);

    const result = db.lookup("998880");
    expect(result.found && result.ticket.notes).toEqual([
      { timestamp: "2026-10-17T08:00:00.000Z", author: "agent", text: "Called back" },
    ]);
  });

  it("updates status and device and appends notes", () => {
    const ticket = db.create("Alice", "WiFi drops upstairs", "Archer-AX55");

    const result = db.update(ticket.ticketId, { note: "Tried a router restart", status: "In Progress", device: "-" });

    expect(result.found).toBe(true);
    if (!result.found) return;
    expect(result.ticket.status).toBe("In Progress");
    expect(result.ticket.device).toBe("Archer-AX55");
    expect(result.ticket.notes.map((n) => n.text)).toEqual(["WiFi drops upstairs", "Tried a router restart"]);

    const moved = db.update(ticket.ticketId, { device: "Deco-M5" });
    expect(moved.found && moved.ticket.device).toBe("Deco-M5");
  });

  it("reports updates of unknown tickets as not found", () => {
    expect(db.update("404", { status: "Resolved" })).toEqual({ found: false, ticketId: "404" });
    expect(db.count()).toBe(0);
  });

  it("persists across connections", () => {
    db.create("Alice", "WiFi drops upstairs");
    db.close();

    db = new TicketDB(path, { now: () => NOW });
    expect(db.lookup("1").found).toBe(true);
  });

  it("rolls back a create whose read-back does not match", () => {
    const saboteur = new Database(path);
    saboteur.exec(`
      CREATE TRIGGER shadow_insert AFTER INSERT ON tickets
      WHEN NEW.ticket_id NOT LIKE '%-shadow'
      BEGIN
        INSERT INTO tickets (ticket_id, customer_name, issue, description, created_at, last_updated)
        VALUES (NEW.ticket_id || '-shadow', NEW.customer_name, NEW.issue, NEW.description, NEW.created_at, NEW.last_updated);
      END
    `);

    let caught: unknown;
    try {
      db.create("Alice", "WiFi drops upstairs");
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(TicketPersistenceError);
    if (caught instanceof TicketPersistenceError) {
      expect(caught.expected).toBe(1);
      expect(caught.actual).toBe(2);
      expect(caught.path).toBe(path);
    }

    saboteur.exec("DROP TRIGGER shadow_insert");
    saboteur.close();
    expect(db.count()).toBe(0);
  });
});
