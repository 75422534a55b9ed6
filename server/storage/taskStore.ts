import { nanoid } from "nanoid";
import { DEFAULT_TIMEZONE, isValidTimeZone } from "../cron/serialization.js";
import {
  createEmptyBlockData,
  type BlockData,
  type BlockParameters,
  type BlockRef,
  type JsonObject,
  type Task,
  type TaskInput,
  type TaskParameters,
  type TaskSchedule,
  type TaskStatus
} from "../types.js";
import {
  deepClone,
  isParameterValue,
  isRecord,
  normalizeItems,
  nowIso,
  readOptionalString,
  readString
} from "./helpers.js";

function normalizeTaskStatus(value: unknown): TaskStatus {
  return value === "pending" || value === "running" || value === "completed" || value === "failed" ? value : "pending";
}

function normalizeBlockParameters(raw: unknown): BlockParameters {
  if (!isRecord(raw)) {
    return {};
  }

  const parameters: BlockParameters = {};
  for (const [key, value] of Object.entries(raw)) {
    if (isParameterValue(value)) {
      parameters[key] = value;
    }
  }
  return parameters;
}

function normalizeParameterGroup(raw: unknown): Record<string, BlockParameters> {
  if (!isRecord(raw)) {
    return {};
  }

  const group: Record<string, BlockParameters> = {};
  for (const [blockName, value] of Object.entries(raw)) {
    group[blockName] = normalizeBlockParameters(value);
  }
  return group;
}

export function normalizeTaskParameters(raw: unknown): TaskParameters {
  const source = isRecord(raw) ? raw : {};
  return {
    input: normalizeBlockParameters(source.input),
    processing: normalizeParameterGroup(source.processing),
    action: normalizeParameterGroup(source.action)
  };
}

function normalizeItemGroup(raw: unknown): Record<string, JsonObject[]> {
  if (!isRecord(raw)) {
    return {};
  }

  const group: Record<string, JsonObject[]> = {};
  for (const [blockName, value] of Object.entries(raw)) {
    group[blockName] = normalizeItems(value);
  }
  return group;
}

export function normalizeBlockData(raw: unknown): BlockData {
  if (!isRecord(raw)) {
    return createEmptyBlockData();
  }

  return {
    input: normalizeItems(raw.input),
    processing: normalizeItemGroup(raw.processing),
    action: normalizeItemGroup(raw.action)
  };
}

export function normalizeBlockChain(raw: unknown): BlockRef[] {
  if (!Array.isArray(raw)) {
    return [];
  }

  const chain: BlockRef[] = [];
  for (const entry of raw) {
    if (!isRecord(entry) || typeof entry.name !== "string" || entry.name.trim().length === 0) {
      continue;
    }
    if (entry.type === "processing" || entry.type === "action") {
      chain.push({ type: entry.type, name: entry.name.trim() });
    }
  }
  return chain;
}

export function normalizeTaskSchedule(raw: unknown): TaskSchedule {
  const source = isRecord(raw) ? raw : {};
  const cron = readString(source.cron).trim();
  const requestedTimezone = readString(source.timezone).trim();
  return {
    cron,
    timezone: requestedTimezone.length > 0 && isValidTimeZone(requestedTimezone) ? requestedTimezone : DEFAULT_TIMEZONE
  };
}

function normalizeTask(raw: unknown, now: string): Task | null {
  if (!isRecord(raw)) {
    return null;
  }

  const inputBlock = readString(raw.inputBlock).trim();
  if (inputBlock.length === 0) {
    return null;
  }

  const task: Task = {
    id: readOptionalString(raw.id) ?? nanoid(),
    name: readString(raw.name).trim() || "Untitled Task",
    inputBlock,
    targetUrl: readString(raw.targetUrl).trim(),
    blockChain: normalizeBlockChain(raw.blockChain),
    parameters: normalizeTaskParameters(raw.parameters),
    schedule: normalizeTaskSchedule(raw.schedule),
    status: normalizeTaskStatus(raw.status),
    createdAt: readOptionalString(raw.createdAt) ?? now,
    updatedAt: readOptionalString(raw.updatedAt) ?? now,
    blockData: normalizeBlockData(raw.blockData)
  };

  const lastRun = readOptionalString(raw.lastRun);
  if (lastRun) {
    task.lastRun = lastRun;
  }
  const lastError = readOptionalString(raw.lastError);
  if (lastError) {
    task.lastError = lastError;
  }

  return task;
}

export function normalizeTasks(raw: unknown): Task[] {
  if (!Array.isArray(raw)) {
    return [];
  }

  const now = nowIso();
  const seen = new Set<string>();
  const tasks: Task[] = [];
  for (const entry of raw) {
    const task = normalizeTask(entry, now);
    if (!task || seen.has(task.id)) {
      continue;
    }
    seen.add(task.id);
    tasks.push(task);
  }
  return tasks;
}

export function createTaskRecord(input: TaskInput, now: string = nowIso()): Task {
  return {
    id: nanoid(),
    name: input.name.trim(),
    inputBlock: input.inputBlock,
    targetUrl: input.targetUrl.trim(),
    blockChain: deepClone(input.blockChain),
    parameters: deepClone(input.parameters),
    schedule: normalizeTaskSchedule(input.schedule),
    status: "pending",
    createdAt: now,
    updatedAt: now,
    blockData: createEmptyBlockData()
  };
}

export function applyTaskDefinition(current: Task, input: TaskInput, updatedAt: string = nowIso()): Task {
  return {
    ...current,
    name: input.name.trim(),
    inputBlock: input.inputBlock,
    targetUrl: input.targetUrl.trim(),
    blockChain: deepClone(input.blockChain),
    parameters: deepClone(input.parameters),
    schedule: normalizeTaskSchedule(input.schedule),
    updatedAt
  };
}
