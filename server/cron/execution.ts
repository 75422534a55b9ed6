import { getZonedDateParts, type ZonedDateParts } from "./serialization.js";
import type { CronExpression } from "./schedule.js";

const MINUTE_MS = 60_000;
const MAX_SCAN_MS = 366 * 24 * 60 * MINUTE_MS;

function matchesDay(expression: CronExpression, parts: ZonedDateParts): boolean {
  const dayOfMonthMatches = expression.dayOfMonth.values.has(parts.dayOfMonth);
  const dayOfWeekMatches = expression.dayOfWeek.values.has(parts.dayOfWeek);

  if (expression.dayOfMonth.wildcard && expression.dayOfWeek.wildcard) {
    return true;
  }
  if (expression.dayOfMonth.wildcard) {
    return dayOfWeekMatches;
  }
  if (expression.dayOfWeek.wildcard) {
    return dayOfMonthMatches;
  }
  return dayOfMonthMatches || dayOfWeekMatches;
}

export function matchesCronExpression(
  expression: CronExpression,
  date: Date,
  timeZone: string
): boolean | null {
  const parts = getZonedDateParts(date, timeZone);
  if (!parts) {
    return null;
  }

  return (
    expression.minute.values.has(parts.minute) &&
    expression.hour.values.has(parts.hour) &&
    expression.month.values.has(parts.month) &&
    matchesDay(expression, parts)
  );
}

/**
 * Finds the next `count` minutes strictly after `from` that match the
 * expression in the given timezone. Gives up after one year of wall time,
 * so impossible dates such as "0 0 31 2 *" return an empty list.
 */
export function computeNextRuns(
  expression: CronExpression,
  from: Date,
  timeZone: string,
  count: number
): Date[] {
  const results: Date[] = [];
  if (count <= 0) {
    return results;
  }

  const cursor = new Date(from.getTime());
  cursor.setUTCSeconds(0, 0);
  cursor.setTime(cursor.getTime() + MINUTE_MS);
  const limit = from.getTime() + MAX_SCAN_MS;

  while (cursor.getTime() <= limit && results.length < count) {
    const parts = getZonedDateParts(cursor, timeZone);
    if (!parts) {
      return [];
    }

    const hourEligible =
      expression.month.values.has(parts.month) &&
      matchesDay(expression, parts) &&
      expression.hour.values.has(parts.hour);

    if (!hourEligible) {
      cursor.setTime(cursor.getTime() + (60 - parts.minute) * MINUTE_MS);
      continue;
    }

    if (expression.minute.values.has(parts.minute)) {
      results.push(new Date(cursor.getTime()));
    }
    cursor.setTime(cursor.getTime() + MINUTE_MS);
  }

  return results;
}
