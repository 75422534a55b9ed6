import type { ItemStateRecord } from "../types.js";
import { MAX_ITEM_STATES_PER_TASK, isRecord, nowIso, readString } from "./helpers.js";

export function normalizeItemStates(raw: unknown, knownTaskIds: ReadonlySet<string>): ItemStateRecord[] {
  if (!Array.isArray(raw)) {
    return [];
  }

  const records: ItemStateRecord[] = [];
  const seen = new Set<string>();
  for (const entry of raw) {
    if (!isRecord(entry)) {
      continue;
    }
    const taskId = readString(entry.taskId);
    const itemHash = readString(entry.itemHash);
    const key = `${taskId}:${itemHash}`;
    if (!knownTaskIds.has(taskId) || itemHash.length === 0 || seen.has(key)) {
      continue;
    }
    seen.add(key);
    records.push({ taskId, itemHash, createdAt: readString(entry.createdAt) || nowIso() });
  }
  return records;
}

/** Keeps the newest records of each task, dropping the oldest past the cap. */
export function capItemStates(
  records: ItemStateRecord[],
  maxPerTask: number = MAX_ITEM_STATES_PER_TASK
): ItemStateRecord[] {
  const countsByTask = new Map<string, number>();
  const kept: ItemStateRecord[] = [];
  for (let index = records.length - 1; index >= 0; index -= 1) {
    const record = records[index];
    const count = countsByTask.get(record.taskId) ?? 0;
    if (count >= maxPerTask) {
      continue;
    }
    countsByTask.set(record.taskId, count + 1);
    kept.push(record);
  }
  return kept.reverse();
}
