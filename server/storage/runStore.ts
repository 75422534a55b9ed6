import { nanoid } from "nanoid";
import { createPendingStages } from "../engine/chain.js";
import type {
  BlockType,
  RunStatus,
  RunTrigger,
  StageResult,
  StageStatus,
  Task,
  TaskRun
} from "../types.js";
import {
  MAX_RUN_LOGS,
  MAX_STORED_RUNS,
  isRecord,
  nowIso,
  readCount,
  readOptionalString,
  readString
} from "./helpers.js";

function normalizeRunStatus(status: unknown): RunStatus {
  return status === "running" || status === "completed" || status === "failed" || status === "cancelled"
    ? status
    : "failed";
}

function normalizeStageStatus(status: unknown): StageStatus {
  return status === "pending" ||
    status === "running" ||
    status === "completed" ||
    status === "failed" ||
    status === "skipped"
    ? status
    : "pending";
}

function normalizeBlockType(value: unknown): BlockType | null {
  return value === "input" || value === "processing" || value === "action" ? value : null;
}

function normalizeStages(raw: unknown): StageResult[] {
  if (!Array.isArray(raw)) {
    return [];
  }

  const stages: StageResult[] = [];
  for (const [position, entry] of raw.entries()) {
    if (!isRecord(entry)) {
      continue;
    }
    const type = normalizeBlockType(entry.type);
    if (!type) {
      continue;
    }

    const stage: StageResult = {
      index: typeof entry.index === "number" ? readCount(entry.index) : position,
      type,
      name: readString(entry.name),
      status: normalizeStageStatus(entry.status),
      inputCount: readCount(entry.inputCount),
      outputCount: readCount(entry.outputCount),
      errorCount: readCount(entry.errorCount)
    };

    const startedAt = readOptionalString(entry.startedAt);
    if (startedAt) {
      stage.startedAt = startedAt;
    }
    const finishedAt = readOptionalString(entry.finishedAt);
    if (finishedAt) {
      stage.finishedAt = finishedAt;
    }
    const error = readOptionalString(entry.error);
    if (error) {
      stage.error = error;
    }
    stages.push(stage);
  }
  return stages;
}

function normalizeRun(raw: unknown): TaskRun | null {
  if (!isRecord(raw)) {
    return null;
  }

  const taskId = readString(raw.taskId).trim();
  if (taskId.length === 0) {
    return null;
  }

  const run: TaskRun = {
    id: readOptionalString(raw.id) ?? nanoid(),
    taskId,
    taskName: readString(raw.taskName),
    trigger: raw.trigger === "schedule" ? "schedule" : "manual",
    status: normalizeRunStatus(raw.status),
    startedAt: readOptionalString(raw.startedAt) ?? nowIso(),
    logs: Array.isArray(raw.logs)
      ? raw.logs.filter((entry: unknown): entry is string => typeof entry === "string").slice(-MAX_RUN_LOGS)
      : [],
    stages: normalizeStages(raw.stages)
  };

  const finishedAt = readOptionalString(raw.finishedAt);
  if (finishedAt) {
    run.finishedAt = finishedAt;
  }
  const error = readOptionalString(raw.error);
  if (error) {
    run.error = error;
  }
  return run;
}

/**
 * Drops the oldest finished runs past `max`. Running runs are always kept.
 */
export function capRuns(runs: TaskRun[], max: number = MAX_STORED_RUNS): TaskRun[] {
  let excess = runs.length - max;
  if (excess <= 0) {
    return runs;
  }

  const kept: TaskRun[] = [];
  for (let index = runs.length - 1; index >= 0; index -= 1) {
    const run = runs[index];
    if (excess > 0 && run.status !== "running") {
      excess -= 1;
      continue;
    }
    kept.push(run);
  }
  return kept.reverse();
}

export function normalizeRuns(raw: unknown): TaskRun[] {
  if (!Array.isArray(raw)) {
    return [];
  }

  const runs = raw
    .map((entry: unknown) => normalizeRun(entry))
    .filter((entry): entry is TaskRun => entry !== null);
  return capRuns(runs);
}

export function createRunRecord(task: Task, trigger: RunTrigger, startedAt: string = nowIso()): TaskRun {
  return {
    id: nanoid(),
    taskId: task.id,
    taskName: task.name,
    trigger,
    status: "running",
    startedAt,
    logs: [`Run started (${trigger}) at ${startedAt}`],
    stages: createPendingStages(task)
  };
}
