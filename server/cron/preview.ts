import { computeNextRuns } from "./execution.js";
import { describeCron, type ScheduleSpec } from "./presets.js";
import { parseCronExpression } from "./schedule.js";

export const DEFAULT_PREVIEW_COUNT = 5;

export interface SchedulePreview {
  cron: string;
  timezone: string;
  scheduleSpec: ScheduleSpec;
  nextRuns: string[];
}

export function previewSchedule(
  cron: string,
  timezone: string,
  from: Date = new Date(),
  count: number = DEFAULT_PREVIEW_COUNT
): SchedulePreview {
  const normalized = cron.trim();
  const parsed = normalized.length > 0 ? parseCronExpression(normalized) : null;
  const nextRuns = parsed?.ok
    ? computeNextRuns(parsed.expression, from, timezone, count).map((date) => date.toISOString())
    : [];

  return {
    cron: normalized,
    timezone,
    scheduleSpec: describeCron(normalized),
    nextRuns
  };
}
