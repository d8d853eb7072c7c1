/**
 * Storage identity for vector records: `namespace:key`.
 *
 * Keys for facts about stable entities (a ticket, a device, a customer) are derived
 * from the fact text so repeated mentions upsert one slot instead of piling up
 * near-duplicates. Random keys are the fallback, and the rule for episodes.
 */

import { randomUUID } from "node:crypto";

export class InvalidMemoryKeyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidMemoryKeyError";
  }
}

const ID_SEPARATOR = ":";

export function composeId(namespace: string, key: string): string {
  if (!namespace.trim()) throw new InvalidMemoryKeyError("namespace must not be empty");
  if (!key.trim()) throw new InvalidMemoryKeyError("key must not be empty");
  // A separator inside the namespace would let ("a:b", "c") and ("a", "b:c") share an id.
  if (namespace.includes(ID_SEPARATOR)) {
    throw new InvalidMemoryKeyError(`namespace must not contain '${ID_SEPARATOR}': ${namespace}`);
  }
  return `${namespace}${ID_SEPARATOR}${key}`;
}

export function parseId(id: string): { namespace: string; key: string } {
  const idx = id.indexOf(ID_SEPARATOR);
  if (idx <= 0 || idx === id.length - 1) throw new InvalidMemoryKeyError(`not a memory id: ${id}`);
  return { namespace: id.slice(0, idx), key: id.slice(idx + 1) };
}

export function randomKey(prefix: string): string {
  return `${prefix}_${randomUUID().replace(/-/g, "").slice(0, 8)}`;
}

const TICKET_ID_PATTERN = /ticket[:\s#]*(\d+)/;
const DEVICE_PATTERN = /(netgear|archer|nighthawk|router[-\s]*[a-z0-9]+)/;
const CUSTOMER_PATTERN = /customer[:\s]+([a-z]+)/;

/** First ticket id mentioned in `text` (case-insensitive), or null. */
export function findTicketId(text: string): string | null {
  const m = TICKET_ID_PATTERN.exec(text.toLowerCase());
  return m ? m[1] : null;
}

/**
 * Deterministic key for a semantic fact: ticket id, then device token, then customer
 * name; a random `semantic_xxxxxxxx` key when none of them is present.
 */
export function deriveFactKey(fact: string): string {
  const lower = fact.toLowerCase();

  const ticketId = findTicketId(lower);
  if (ticketId) return `ticket_${ticketId}`;

  if (lower.includes("router") || lower.includes("device")) {
    const device = DEVICE_PATTERN.exec(lower);
    if (device) return `device_${device[1].replace(/\s/g, "_")}`;
  }

  if (lower.includes("customer")) {
    const name = CUSTOMER_PATTERN.exec(lower);
    if (name) return `customer_${name[1]}`;
  }

  return randomKey("semantic");
}

export type VerifiedField = "existence" | "device" | "customer" | "status";

/** Fixed slot for a tool-verified fact so re-verification overwrites it. */
export function verifiedFactKey(ticketId: string, field: VerifiedField): string {
  return field === "existence" ? `ticket_${ticketId}_verified` : `ticket_${ticketId}_${field}_verified`;
}
