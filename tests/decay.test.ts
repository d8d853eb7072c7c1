import { describe, it, expect } from "vitest";
import { combineWithRecency, recencyScore } from "../utils/decay.js";
import { ageInDays, isoDate, parseTimestamp } from "../utils/dates.js";

const NOW = new Date("2026-10-18T12:00:00.000Z");

describe("parseTimestamp", () => {
  it("reads bare dates as UTC midnight", () => {
    expect(parseTimestamp("2026-10-18")).toBe(Date.UTC(2026, 9, 18));
  });

  it("reads ISO timestamps", () => {
    expect(parseTimestamp("2026-10-18T12:00:00.000Z")).toBe(NOW.getTime());
  });

  it("returns null for missing or malformed values", () => {
    expect(parseTimestamp(undefined)).toBeNull();
    expect(parseTimestamp(42)).toBeNull();
    expect(parseTimestamp("")).toBeNull();
    expect(parseTimestamp("not-a-date")).toBeNull();
    expect(parseTimestamp("18/10/2026")).toBeNull();
  });
});

describe("ageInDays / isoDate", () => {
  it("measures fractional days", () => {
    expect(ageInDays(Date.UTC(2026, 9, 15), NOW)).toBe(3.5);
  });

  it("formats the UTC date", () => {
    expect(isoDate(new Date("2026-10-18T23:59:00.000Z"))).toBe("2026-10-18");
  });
});

describe("recencyScore", () => {
  it("is 1 for a record written now", () => {
    expect(recencyScore(NOW.toISOString(), NOW)).toBe(1);
  });

  it("halves at 30 days", () => {
    expect(recencyScore("2026-09-18T12:00:00.000Z", NOW)).toBeCloseTo(0.5, 10);
  });

  it("is a quarter at 90 days", () => {
    expect(recencyScore("2026-07-20T12:00:00.000Z", NOW)).toBeCloseTo(0.25, 10);
  });

  it("treats future timestamps as brand new", () => {
    expect(recencyScore("2026-10-19T12:00:00.000Z", NOW)).toBe(1);
  });

  it("is 0 without a usable timestamp", () => {
    expect(recencyScore("not-a-date", NOW)).toBe(0);
    expect(recencyScore(null, NOW)).toBe(0);
  });
});

describe("combineWithRecency", () => {
  it("weights similarity and recency", () => {
    expect(combineWithRecency(1, 0.5, 0.3)).toBeCloseTo(0.85, 10);
  });

  it("ignores recency at weight 0", () => {
    expect(combineWithRecency(0.4, 1, 0)).toBe(0.4);
  });
});
