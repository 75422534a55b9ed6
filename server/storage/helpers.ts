import type { BlockParameterValue, JsonObject } from "../types.js";

export const MAX_STORED_RUNS = 100;
export const MAX_RUN_LOGS = 500;
export const MAX_ITEM_STATES_PER_TASK = 5_000;

export function nowIso(): string {
  return new Date().toISOString();
}

export function deepClone<T>(value: T): T {
  return structuredClone(value);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function readString(value: unknown, fallback = ""): string {
  return typeof value === "string" ? value : fallback;
}

export function readOptionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

export function readCount(value: unknown): number {
  return typeof value === "number" && Number.isFinite(value) ? Math.max(0, Math.floor(value)) : 0;
}

export function isParameterValue(value: unknown): value is BlockParameterValue {
  return typeof value === "string" || typeof value === "boolean" || (typeof value === "number" && Number.isFinite(value));
}

export function normalizeItems(raw: unknown): JsonObject[] {
  if (!Array.isArray(raw)) {
    return [];
  }
  return raw.filter((entry: unknown): entry is JsonObject => isRecord(entry));
}
