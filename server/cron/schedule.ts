interface CronFieldSpec {
  min: number;
  max: number;
  names?: Record<string, number>;
  normalize?: (value: number) => number;
}

export interface ParsedCronField {
  values: Set<number>;
  wildcard: boolean;
}

export interface CronExpression {
  raw: string;
  minute: ParsedCronField;
  hour: ParsedCronField;
  dayOfMonth: ParsedCronField;
  month: ParsedCronField;
  dayOfWeek: ParsedCronField;
}

export type CronParseResult =
  | {
      ok: true;
      expression: CronExpression;
    }
  | {
      ok: false;
      error: string;
    };

type CronFieldKey = "minute" | "hour" | "dayOfMonth" | "month" | "dayOfWeek";
type CronFieldParseResult = { ok: true; field: ParsedCronField } | { ok: false; error: string };

const monthNames: Record<string, number> = {
  JAN: 1,
  FEB: 2,
  MAR: 3,
  APR: 4,
  MAY: 5,
  JUN: 6,
  JUL: 7,
  AUG: 8,
  SEP: 9,
  OCT: 10,
  NOV: 11,
  DEC: 12
};

const weekdayNames: Record<string, number> = {
  SUN: 0,
  MON: 1,
  TUE: 2,
  WED: 3,
  THU: 4,
  FRI: 5,
  SAT: 6
};

const cronFieldDefinitions: ReadonlyArray<{ key: CronFieldKey; label: string; spec: CronFieldSpec }> = [
  { key: "minute", label: "minute", spec: { min: 0, max: 59 } },
  { key: "hour", label: "hour", spec: { min: 0, max: 23 } },
  { key: "dayOfMonth", label: "day-of-month", spec: { min: 1, max: 31 } },
  { key: "month", label: "month", spec: { min: 1, max: 12, names: monthNames } },
  {
    key: "dayOfWeek",
    label: "day-of-week",
    spec: { min: 0, max: 7, names: weekdayNames, normalize: (value) => (value === 7 ? 0 : value) }
  }
];

function parseValueToken(value: string, spec: CronFieldSpec): number | null {
  if (/^\d+$/.test(value)) {
    const parsed = Number.parseInt(value, 10);
    return Number.isFinite(parsed) ? parsed : null;
  }

  if (spec.names) {
    const named = spec.names[value.toUpperCase()];
    return named === undefined ? null : named;
  }

  return null;
}

function addRangeValues(
  output: Set<number>,
  start: number,
  end: number,
  step: number,
  spec: CronFieldSpec
): string | null {
  if (start < spec.min || start > spec.max || end < spec.min || end > spec.max) {
    return `out of range (${spec.min}-${spec.max})`;
  }
  if (start > end) {
    return "range start must be <= range end";
  }

  for (let value = start; value <= end; value += step) {
    output.add(spec.normalize ? spec.normalize(value) : value);
  }

  return null;
}

function countAllValues(spec: CronFieldSpec): number {
  const values = new Set<number>();
  for (let current = spec.min; current <= spec.max; current += 1) {
    values.add(spec.normalize ? spec.normalize(current) : current);
  }
  return values.size;
}

function parseField(value: string, spec: CronFieldSpec): CronFieldParseResult {
  const token = value.trim();
  if (token.length === 0) {
    return { ok: false, error: "field is empty" };
  }

  const values = new Set<number>();

  for (const rawSegment of token.split(",")) {
    const segment = rawSegment.trim();
    if (segment.length === 0) {
      return { ok: false, error: "contains an empty list segment" };
    }

    const slashParts = segment.split("/");
    if (slashParts.length > 2) {
      return { ok: false, error: `invalid step syntax "${segment}"` };
    }

    const rangeToken = slashParts[0].trim();
    const stepToken = slashParts.length === 2 ? slashParts[1].trim() : "1";
    const step = /^\d+$/.test(stepToken) ? Number.parseInt(stepToken, 10) : null;
    if (step === null || step <= 0) {
      return { ok: false, error: `invalid step "${stepToken}"` };
    }

    let start: number | null;
    let end: number | null;

    if (rangeToken === "*") {
      start = spec.min;
      end = spec.max;
    } else if (rangeToken.includes("-")) {
      const [startToken, endToken, ...extra] = rangeToken.split("-");
      if (extra.length > 0) {
        return { ok: false, error: `invalid range "${rangeToken}"` };
      }
      start = parseValueToken(startToken.trim(), spec);
      end = parseValueToken(endToken.trim(), spec);
      if (start === null || end === null) {
        return { ok: false, error: `invalid range "${rangeToken}"` };
      }
    } else {
      start = parseValueToken(rangeToken, spec);
      if (start === null) {
        return { ok: false, error: `invalid token "${rangeToken}"` };
      }
      // "5/15" means every 15 starting at 5
      end = slashParts.length === 2 ? spec.max : start;
    }

    const rangeError = addRangeValues(values, start, end, step, spec);
    if (rangeError) {
      return { ok: false, error: rangeError };
    }
  }

  if (values.size === 0) {
    return { ok: false, error: "field produced no values" };
  }

  return {
    ok: true,
    field: {
      values,
      wildcard: values.size === countAllValues(spec)
    }
  };
}

export function parseCronExpression(input: string): CronParseResult {
  const normalized = input.trim();
  const tokens = normalized.split(/\s+/).filter((entry) => entry.length > 0);
  if (tokens.length !== 5) {
    return {
      ok: false,
      error: "Cron must have exactly 5 fields: minute hour day-of-month month day-of-week"
    };
  }

  const parsed: Partial<Record<CronFieldKey, ParsedCronField>> = {};
  for (const [index, definition] of cronFieldDefinitions.entries()) {
    const result = parseField(tokens[index], definition.spec);
    if (!result.ok) {
      return { ok: false, error: `Invalid ${definition.label} field: ${result.error}` };
    }
    parsed[definition.key] = result.field;
  }

  const { minute, hour, dayOfMonth, month, dayOfWeek } = parsed;
  if (!minute || !hour || !dayOfMonth || !month || !dayOfWeek) {
    return { ok: false, error: "Cron expression is incomplete" };
  }

  return {
    ok: true,
    expression: {
      raw: tokens.join(" "),
      minute,
      hour,
      dayOfMonth,
      month,
      dayOfWeek
    }
  };
}
