import type { Response } from "express";
import { ZodError } from "zod";
import { isTaskAlreadyRunningError, isTaskValidationError } from "../../errors.js";

export function sendZodError(error: unknown, response: Response): void {
  if (error instanceof ZodError) {
    response.status(400).json({
      error: "Validation failed",
      details: error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message }))
    });
    return;
  }

  if (isTaskValidationError(error)) {
    response.status(error.statusCode).json({ error: error.message });
    return;
  }

  if (isTaskAlreadyRunningError(error)) {
    response.status(error.statusCode).json({ error: error.message, runId: error.runId });
    return;
  }

  console.error("[api-error]", error);
  response.status(500).json({ error: "Internal server error" });
}

export function firstParam(value: unknown): string {
  if (Array.isArray(value)) {
    return typeof value[0] === "string" ? value[0] : "";
  }
  return typeof value === "string" ? value : "";
}

export function parseLimit(value: unknown, fallback: number, max: number): number {
  const parsed = Number.parseInt(firstParam(value), 10);
  if (Number.isNaN(parsed) || parsed < 1) {
    return fallback;
  }
  return Math.min(parsed, max);
}

export function writeSseEvent(response: Response, event: string, payload: unknown): void {
  response.write(`event: ${event}\n`);
  response.write(`data: ${JSON.stringify(payload)}\n\n`);
}
