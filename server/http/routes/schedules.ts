import type { Express, Request, Response } from "express";
import { z } from "zod";
import { buildCronFromSchedule, parseCronExpression, previewSchedule, scheduleSpecSchema } from "../../cron.js";
import { DEFAULT_TIMEZONE } from "../../cron/serialization.js";
import { TaskValidationError } from "../../errors.js";
import { resolveTimezone } from "../../taskInput.js";
import { sendZodError } from "./helpers.js";

const schedulePreviewSchema = z.object({
  schedule: scheduleSpecSchema,
  timezone: z.string().trim().max(100).default(DEFAULT_TIMEZONE)
});

export function registerScheduleRoutes(app: Express): void {
  app.post("/api/schedules/preview", (request: Request, response: Response) => {
    try {
      const input = schedulePreviewSchema.parse(request.body);
      const timezone = resolveTimezone(input.timezone);
      const cron = buildCronFromSchedule(input.schedule);
      if (cron.length > 0) {
        const parsed = parseCronExpression(cron);
        if (!parsed.ok) {
          throw new TaskValidationError(`Invalid schedule: ${parsed.error}`);
        }
      }

      const preview = previewSchedule(cron, timezone);
      response.json({
        cron: preview.cron,
        timezone: preview.timezone,
        scheduleSpec: preview.scheduleSpec,
        nextRuns: preview.nextRuns
      });
    } catch (error) {
      sendZodError(error, response);
    }
  });
}
