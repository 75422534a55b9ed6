import { describe, expect, it } from "vitest";

import {
  computeNextRuns,
  getZonedMinuteKey,
  isValidTimeZone,
  matchesCronExpression,
  parseCronExpression,
  type CronExpression
} from "../../server/cron.js";

function parseOrThrow(input: string): CronExpression {
  const parsed = parseCronExpression(input);
  if (!parsed.ok) {
    throw new Error(parsed.error);
  }
  return parsed.expression;
}

describe("cron parsing", () => {
  it("expands steps, ranges and weekday names", () => {
    const expression = parseOrThrow("*/15 9-17 * * MON-FRI");

    expect([...expression.minute.values]).toEqual([0, 15, 30, 45]);
    expect(expression.hour.values.size).toBe(9);
    expect(expression.dayOfMonth.wildcard).toBe(true);
    expect([...expression.dayOfWeek.values]).toEqual([1, 2, 3, 4, 5]);
    expect(expression.dayOfWeek.wildcard).toBe(false);
  });

  it("accepts month and weekday names in any case", () => {
    const expression = parseOrThrow("0 6 1 jan-Mar mon,FRI");

    expect([...expression.month.values]).toEqual([1, 2, 3]);
    expect([...expression.dayOfWeek.values]).toEqual([1, 5]);
  });

  it("treats day-of-week 7 as Sunday", () => {
    expect([...parseOrThrow("0 0 * * 7").dayOfWeek.values]).toEqual([0]);
    expect(parseOrThrow("0 0 * * 0-7").dayOfWeek.wildcard).toBe(true);
  });

  it("collapses whitespace in the raw expression", () => {
    expect(parseOrThrow("  0   12 * *  * ").raw).toBe("0 12 * * *");
  });

  it("rejects malformed expressions with a field-specific message", () => {
    expect(parseCronExpression("* * *")).toEqual({
      ok: false,
      error: "Cron must have exactly 5 fields: minute hour day-of-month month day-of-week"
    });
    expect(parseCronExpression("61 * * * *")).toEqual({
      ok: false,
      error: "Invalid minute field: out of range (0-59)"
    });
    expect(parseCronExpression("0 5-2 * * *")).toEqual({
      ok: false,
      error: "Invalid hour field: range start must be <= range end"
    });
    expect(parseCronExpression("0 0 * * */0")).toEqual({
      ok: false,
      error: 'Invalid day-of-week field: invalid step "0"'
    });
  });
});

describe("cron matching", () => {
  it("matches minutes in the requested timezone", () => {
    const expression = parseOrThrow("0 9 * * *");
    const date = new Date("2026-01-15T14:00:00.000Z");

    expect(matchesCronExpression(expression, date, "America/New_York")).toBe(true);
    expect(matchesCronExpression(expression, date, "UTC")).toBe(false);
  });

  it("returns null for an unknown timezone", () => {
    expect(matchesCronExpression(parseOrThrow("* * * * *"), new Date(), "Mars/Olympus")).toBeNull();
    expect(isValidTimeZone("Mars/Olympus")).toBe(false);
    expect(isValidTimeZone("Europe/Berlin")).toBe(true);
  });

  it("builds zoned minute keys", () => {
    expect(getZonedMinuteKey(new Date("2026-01-15T14:05:30.000Z"), "America/New_York")).toBe("2026-01-15T09:05");
    expect(getZonedMinuteKey(new Date("2026-01-15T14:05:30.000Z"), "UTC")).toBe("2026-01-15T14:05");
  });
});

describe("next run computation", () => {
  it("lists upcoming daily runs after the reference time", () => {
    const runs = computeNextRuns(parseOrThrow("30 9 * * *"), new Date("2026-03-02T08:00:00.000Z"), "UTC", 2);
    expect(runs.map((run) => run.toISOString())).toEqual([
      "2026-03-02T09:30:00.000Z",
      "2026-03-03T09:30:00.000Z"
    ]);
  });

  it("excludes the reference minute itself", () => {
    const runs = computeNextRuns(parseOrThrow("0 * * * *"), new Date("2026-03-02T08:00:00.000Z"), "UTC", 1);
    expect(runs.map((run) => run.toISOString())).toEqual(["2026-03-02T09:00:00.000Z"]);
  });

  it("converts wall-clock times from the schedule timezone", () => {
    const runs = computeNextRuns(
      parseOrThrow("0 9 * * *"),
      new Date("2026-01-15T00:00:00.000Z"),
      "America/New_York",
      1
    );
    expect(runs.map((run) => run.toISOString())).toEqual(["2026-01-15T14:00:00.000Z"]);
  });

  it("fires when either day-of-month or day-of-week matches", () => {
    const runs = computeNextRuns(parseOrThrow("0 12 1 * 1"), new Date("2026-02-28T13:00:00.000Z"), "UTC", 2);
    expect(runs.map((run) => run.toISOString())).toEqual([
      "2026-03-01T12:00:00.000Z",
      "2026-03-02T12:00:00.000Z"
    ]);
  });

  it("returns no runs for dates that never occur", () => {
    expect(computeNextRuns(parseOrThrow("0 0 31 2 *"), new Date("2026-01-01T00:00:00.000Z"), "UTC", 3)).toEqual([]);
  });
});
