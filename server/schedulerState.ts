import fs from "node:fs/promises";
import path from "node:path";
import { resolveDataPath } from "./runtime/dataPaths.js";

interface SchedulerStateFile {
  version: 1;
  updatedAt: string;
  markers: Record<string, string>;
}

export const SCHEDULER_STATE_FILE_NAME = "scheduler-state.json";

export function resolveSchedulerStatePath(): string {
  return resolveDataPath(SCHEDULER_STATE_FILE_NAME);
}

function nowIso(): string {
  return new Date().toISOString();
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function normalizeMarkers(raw: unknown): Record<string, string> {
  if (!isRecord(raw)) {
    return {};
  }

  const normalized: Record<string, string> = {};
  for (const [rawTaskId, rawMarker] of Object.entries(raw)) {
    const taskId = rawTaskId.trim();
    if (taskId.length === 0 || typeof rawMarker !== "string") {
      continue;
    }

    const marker = rawMarker.trim();
    if (marker.length === 0) {
      continue;
    }
    normalized[taskId] = marker;
  }

  return normalized;
}

export async function loadSchedulerMarkers(
  statePath: string = resolveSchedulerStatePath()
): Promise<Map<string, string>> {
  try {
    const raw = await fs.readFile(statePath, "utf8");
    const parsed: unknown = JSON.parse(raw);
    if (!isRecord(parsed)) {
      return new Map();
    }

    const markers = normalizeMarkers(parsed.markers);
    return new Map(Object.entries(markers));
  } catch (error) {
    if (!isMissingFileError(error)) {
      console.warn(`[scheduler-state] Ignoring unreadable ${statePath}.`, error);
    }
    return new Map();
  }
}

export async function saveSchedulerMarkers(
  markers: Map<string, string>,
  statePath: string = resolveSchedulerStatePath()
): Promise<void> {
  const payload: SchedulerStateFile = {
    version: 1,
    updatedAt: nowIso(),
    markers: Object.fromEntries(markers.entries())
  };

  await fs.mkdir(path.dirname(statePath), { recursive: true });
  await fs.writeFile(statePath, JSON.stringify(payload, null, 2), "utf8");
}
