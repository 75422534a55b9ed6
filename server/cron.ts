export {
  parseCronExpression,
  type CronExpression,
  type CronParseResult,
  type ParsedCronField
} from "./cron/schedule.js";
export {
  DEFAULT_TIMEZONE,
  getZonedDateParts,
  getZonedMinuteKey,
  isValidTimeZone,
  type ZonedDateParts
} from "./cron/serialization.js";
export { computeNextRuns, matchesCronExpression } from "./cron/execution.js";
export {
  buildCronFromSchedule,
  describeCron,
  scheduleSpecSchema,
  type ScheduleSpec
} from "./cron/presets.js";
export { DEFAULT_PREVIEW_COUNT, previewSchedule, type SchedulePreview } from "./cron/preview.js";
