import { z } from "zod";

const timeSchema = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, "Time must use 24-hour HH:MM");

export const scheduleSpecSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("manual") }),
  z.object({
    kind: z.literal("interval"),
    everyHours: z.number().int().min(1).max(23),
    minute: z.number().int().min(0).max(59).default(0)
  }),
  z.object({ kind: z.literal("daily"), time: timeSchema }),
  z.object({
    kind: z.literal("weekly"),
    time: timeSchema,
    days: z.array(z.number().int().min(0).max(6)).min(1).max(7)
  }),
  z.object({ kind: z.literal("cron"), cron: z.string().trim().min(1).max(100) })
]);

export type ScheduleSpec = z.infer<typeof scheduleSpecSchema>;

function splitTime(time: string): { hour: number; minute: number } {
  const [hourToken = "0", minuteToken = "0"] = time.split(":");
  return {
    hour: Number.parseInt(hourToken, 10),
    minute: Number.parseInt(minuteToken, 10)
  };
}

function formatTime(hour: number, minute: number): string {
  return `${String(hour).padStart(2, "0")}:${String(minute).padStart(2, "0")}`;
}

function parseBoundedInt(token: string, min: number, max: number): number | null {
  if (!/^\d{1,2}$/.test(token)) {
    return null;
  }
  const value = Number.parseInt(token, 10);
  return value >= min && value <= max ? value : null;
}

export function buildCronFromSchedule(spec: ScheduleSpec): string {
  switch (spec.kind) {
    case "manual":
      return "";
    case "interval":
      return spec.everyHours === 1 ? `${spec.minute} * * * *` : `${spec.minute} */${spec.everyHours} * * *`;
    case "daily": {
      const { hour, minute } = splitTime(spec.time);
      return `${minute} ${hour} * * *`;
    }
    case "weekly": {
      const { hour, minute } = splitTime(spec.time);
      const days = [...new Set(spec.days)].sort((left, right) => left - right);
      return `${minute} ${hour} * * ${days.join(",")}`;
    }
    case "cron":
      return spec.cron.trim().split(/\s+/).join(" ");
  }
}

/**
 * Maps a stored cron string back onto the simplest preset that produces it,
 * falling back to a raw cron spec for anything the presets cannot express.
 */
export function describeCron(cron: string): ScheduleSpec {
  const normalized = cron.trim();
  if (normalized.length === 0) {
    return { kind: "manual" };
  }

  const fields = normalized.split(/\s+/);
  if (fields.length !== 5) {
    return { kind: "cron", cron: normalized };
  }

  const [minuteToken, hourToken, dayOfMonthToken, monthToken, dayOfWeekToken] = fields;
  const minute = parseBoundedInt(minuteToken, 0, 59);
  const fixedCalendar = dayOfMonthToken === "*" && monthToken === "*";
  const raw: ScheduleSpec = { kind: "cron", cron: fields.join(" ") };

  if (minute === null || !fixedCalendar) {
    return raw;
  }

  if (dayOfWeekToken === "*") {
    if (hourToken === "*") {
      return { kind: "interval", everyHours: 1, minute };
    }

    const stepMatch = hourToken.match(/^\*\/(\d{1,2})$/);
    if (stepMatch) {
      const everyHours = parseBoundedInt(stepMatch[1], 1, 23);
      return everyHours === null ? raw : { kind: "interval", everyHours, minute };
    }
  }

  const hour = parseBoundedInt(hourToken, 0, 23);
  if (hour === null) {
    return raw;
  }

  if (dayOfWeekToken === "*") {
    return { kind: "daily", time: formatTime(hour, minute) };
  }

  if (/^\d(,\d)*$/.test(dayOfWeekToken)) {
    const days = dayOfWeekToken.split(",").map((entry) => Number.parseInt(entry, 10));
    if (days.every((day) => day <= 6)) {
      return { kind: "weekly", time: formatTime(hour, minute), days };
    }
  }

  return raw;
}
