/**
 * Timestamp parsing and age arithmetic.
 */

import { MS_PER_DAY } from "./constants.js";

/**
 * Parse an ISO-8601 timestamp or a bare YYYY-MM-DD date (interpreted as UTC midnight).
 * Returns epoch milliseconds, or null when the value is missing or unparsable.
 */
export function parseTimestamp(value: unknown): number | null {
  if (typeof value !== "string") return null;
  const s = value.trim();
  if (!s) return null;
  const dateOnly = /^(\d{4})-(\d{2})-(\d{2})$/.exec(s);
  if (dateOnly) {
    const [, y, m, d] = dateOnly;
    const ms = Date.UTC(Number(y), Number(m) - 1, Number(d));
    return Number.isNaN(ms) ? null : ms;
  }
  if (!/^\d{4}-\d{2}-\d{2}T/.test(s)) return null;
  const ms = Date.parse(s);
  return Number.isNaN(ms) ? null : ms;
}

/** Fractional days between `fromMs` and `now`. Negative when `fromMs` is in the future. */
export function ageInDays(fromMs: number, now: Date = new Date()): number {
  return (now.getTime() - fromMs) / MS_PER_DAY;
}

/** ISO-8601 UTC timestamp for `now`. */
export function isoNow(now: Date = new Date()): string {
  return now.toISOString();
}

/** YYYY-MM-DD (UTC) for `now`. */
export function isoDate(now: Date = new Date()): string {
  return now.toISOString().slice(0, 10);
}
