import fs from "node:fs";
import path from "node:path";
import { resolveDataPath } from "./runtime/dataPaths.js";
import { MAX_STORED_RUNS, deepClone, isRecord, nowIso } from "./storage/helpers.js";
import { capItemStates, normalizeItemStates } from "./storage/itemStateStore.js";
import { capRuns, createRunRecord, normalizeRuns } from "./storage/runStore.js";
import { applyTaskDefinition, createTaskRecord, normalizeTasks } from "./storage/taskStore.js";
import type { ItemStateStore } from "./blocks/types.js";
import type { AppState, RunTrigger, Task, TaskInput, TaskRun } from "./types.js";

export const DB_FILE_NAME = "taskchain-db.json";

export interface ListRunsOptions {
  limit?: number;
  taskId?: string;
}

function createDefaultState(): AppState {
  return {
    tasks: [],
    runs: [],
    itemStates: []
  };
}

function ensureDbFile(dbPath: string): void {
  const dir = path.dirname(dbPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  if (!fs.existsSync(dbPath)) {
    fs.writeFileSync(dbPath, JSON.stringify(createDefaultState(), null, 2), "utf8");
  }
}

function sanitizeState(raw: unknown): AppState {
  if (!isRecord(raw)) {
    return createDefaultState();
  }

  const tasks = normalizeTasks(raw.tasks);
  const taskIds = new Set(tasks.map((task) => task.id));
  return {
    tasks,
    runs: normalizeRuns(raw.runs),
    itemStates: capItemStates(normalizeItemStates(raw.itemStates, taskIds))
  };
}

export class LocalStore implements ItemStateStore {
  private state: AppState;
  private readonly itemIndex = new Map<string, Set<string>>();

  constructor(private readonly dbPath: string = resolveDataPath(DB_FILE_NAME)) {
    ensureDbFile(dbPath);
    this.state = this.load();
    this.rebuildItemIndex();
  }

  private load(): AppState {
    const raw = fs.readFileSync(this.dbPath, "utf8");
    const parsed: unknown = JSON.parse(raw);
    return sanitizeState(parsed);
  }

  private persist(): void {
    fs.writeFileSync(this.dbPath, JSON.stringify(this.state, null, 2), "utf8");
  }

  private rebuildItemIndex(): void {
    this.itemIndex.clear();
    for (const record of this.state.itemStates) {
      let hashes = this.itemIndex.get(record.taskId);
      if (!hashes) {
        hashes = new Set();
        this.itemIndex.set(record.taskId, hashes);
      }
      hashes.add(record.itemHash);
    }
  }

  getState(): AppState {
    return deepClone(this.state);
  }

  listTasks(): Task[] {
    return deepClone(this.state.tasks);
  }

  getTask(id: string): Task | undefined {
    const task = this.state.tasks.find((entry) => entry.id === id);
    return task ? deepClone(task) : undefined;
  }

  createTask(input: TaskInput): Task {
    const task = createTaskRecord(input);
    this.state.tasks.unshift(task);
    this.persist();
    return deepClone(task);
  }

  updateTask(id: string, input: TaskInput): Task | undefined {
    return this.updateTaskState(id, (current) => applyTaskDefinition(current, input));
  }

  updateTaskState(id: string, updater: (task: Task) => Task): Task | undefined {
    const index = this.state.tasks.findIndex((entry) => entry.id === id);
    if (index === -1) {
      return undefined;
    }

    this.state.tasks[index] = updater(this.state.tasks[index]);
    this.persist();
    return deepClone(this.state.tasks[index]);
  }

  deleteTask(id: string): boolean {
    const previousCount = this.state.tasks.length;
    this.state.tasks = this.state.tasks.filter((entry) => entry.id !== id);
    if (this.state.tasks.length === previousCount) {
      return false;
    }

    this.state.itemStates = this.state.itemStates.filter((record) => record.taskId !== id);
    this.itemIndex.delete(id);
    this.persist();
    return true;
  }

  createRun(task: Task, trigger: RunTrigger): TaskRun {
    const run = createRunRecord(task, trigger);
    this.state.runs.unshift(run);
    this.state.runs = capRuns(this.state.runs);
    this.persist();
    return deepClone(run);
  }

  getRun(runId: string): TaskRun | undefined {
    const run = this.state.runs.find((entry) => entry.id === runId);
    return run ? deepClone(run) : undefined;
  }

  updateRun(runId: string, updater: (run: TaskRun) => TaskRun): TaskRun | undefined {
    const index = this.state.runs.findIndex((entry) => entry.id === runId);
    if (index === -1) {
      return undefined;
    }

    this.state.runs[index] = updater(this.state.runs[index]);
    this.persist();
    return deepClone(this.state.runs[index]);
  }

  listRuns(options: ListRunsOptions = {}): TaskRun[] {
    const limit = Math.max(1, Math.min(MAX_STORED_RUNS, options.limit ?? 30));
    const runs = options.taskId ? this.state.runs.filter((run) => run.taskId === options.taskId) : this.state.runs;
    return deepClone(runs.slice(0, limit));
  }

  hasItem(taskId: string, itemHash: string): boolean {
    return this.itemIndex.get(taskId)?.has(itemHash) ?? false;
  }

  recordItems(taskId: string, itemHashes: string[]): void {
    // A run can finish after its task was deleted.
    if (!this.state.tasks.some((task) => task.id === taskId)) {
      return;
    }

    const createdAt = nowIso();
    const fresh = [...new Set(itemHashes)].filter((itemHash) => !this.hasItem(taskId, itemHash));
    if (fresh.length === 0) {
      return;
    }

    this.state.itemStates.push(...fresh.map((itemHash) => ({ taskId, itemHash, createdAt })));
    this.state.itemStates = capItemStates(this.state.itemStates);
    this.rebuildItemIndex();
    this.persist();
  }

  countItemStates(taskId: string): number {
    return this.itemIndex.get(taskId)?.size ?? 0;
  }
}
