/**
 * Recency decay for episodic ranking.
 *
 * Reciprocal decay, not exponential: r = 1 / (1 + ageDays / 30). At 30 days the
 * score is 0.5, at 90 days 0.25. Records with no usable timestamp score 0.
 */

import { RECENCY_DECAY_DAYS } from "./constants.js";
import { ageInDays, parseTimestamp } from "./dates.js";

export function recencyScore(
  timestamp: unknown,
  now: Date = new Date(),
  decayDays = RECENCY_DECAY_DAYS,
): number {
  const ms = parseTimestamp(timestamp);
  if (ms === null) return 0;
  // Clock skew can put a fresh record slightly in the future; treat it as brand new.
  const age = Math.max(0, ageInDays(ms, now));
  return 1 / (1 + age / decayDays);
}

/** (1 - w) * similarity + w * recency */
export function combineWithRecency(similarity: number, recency: number, weight: number): number {
  return (1 - weight) * similarity + weight * recency;
}
