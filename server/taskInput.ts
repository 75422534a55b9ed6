import { z } from "zod";
import { validateTaskParameters } from "./blocks/parameters.js";
import type { BlockRegistry } from "./blocks/registry.js";
import { buildCronFromSchedule, parseCronExpression, scheduleSpecSchema } from "./cron.js";
import { DEFAULT_TIMEZONE, isValidTimeZone } from "./cron/serialization.js";
import { TaskValidationError } from "./errors.js";
import type { TaskInput } from "./types.js";

const parameterRecordSchema = z.record(z.unknown());

export const blockRefSchema = z.object({
  type: z.enum(["processing", "action"]),
  name: z.string().trim().min(1).max(100)
});

export const taskBodySchema = z.object({
  name: z.string().trim().min(1).max(100),
  inputBlock: z.string().trim().min(1).max(100),
  targetUrl: z.string().trim().url().max(500),
  blockChain: z.array(blockRefSchema).max(50).default([]),
  parameters: z
    .object({
      input: parameterRecordSchema.optional(),
      processing: z.record(parameterRecordSchema).optional(),
      action: z.record(parameterRecordSchema).optional()
    })
    .default({}),
  schedule: z.union([scheduleSpecSchema, z.string().max(100)]).default({ kind: "manual" }),
  timezone: z.string().trim().max(100).default(DEFAULT_TIMEZONE)
});

export type TaskBody = z.infer<typeof taskBodySchema>;

export function resolveScheduleCron(schedule: TaskBody["schedule"]): string {
  if (typeof schedule === "string") {
    return schedule.trim().split(/\s+/).filter((token) => token.length > 0).join(" ");
  }
  return buildCronFromSchedule(schedule);
}

export function resolveTimezone(raw: string): string {
  const timezone = raw.trim() || DEFAULT_TIMEZONE;
  if (!isValidTimeZone(timezone)) {
    throw new TaskValidationError(`Invalid timezone: ${timezone}`);
  }
  return timezone;
}

/** Turns a parsed task body into a storable definition, checking schedule and block parameters. */
export function resolveTaskInput(registry: BlockRegistry, body: TaskBody): TaskInput {
  const cron = resolveScheduleCron(body.schedule);
  if (cron.length > 0) {
    const parsed = parseCronExpression(cron);
    if (!parsed.ok) {
      throw new TaskValidationError(`Invalid schedule: ${parsed.error}`);
    }
  }

  return {
    name: body.name,
    inputBlock: body.inputBlock,
    targetUrl: body.targetUrl,
    blockChain: body.blockChain,
    parameters: validateTaskParameters(registry, body.inputBlock, body.blockChain, body.parameters),
    schedule: {
      cron,
      timezone: resolveTimezone(body.timezone)
    }
  };
}
