import { isAbortError } from "./abort.js";
import type { BlockRegistry } from "./blocks/registry.js";
import type { FetchFn } from "./blocks/types.js";
import { executeBlockChain, type StageFinishEvent, type StageStartEvent } from "./engine/chain.js";
import { toErrorMessage } from "./errors.js";
import { ALL_TASKS_TOPIC, taskTopic, type PubSub } from "./realtime/pubsub.js";
import type { LocalStore } from "./storage.js";
import { MAX_RUN_LOGS } from "./storage/helpers.js";
import type { StageResult, Task, TaskEvent, TaskRun } from "./types.js";

export const CANCELLED_MESSAGE = "Cancelled";

export interface RunTaskInput {
  store: LocalStore;
  registry: BlockRegistry;
  events: PubSub<TaskEvent>;
  runId: string;
  task: Task;
  abortSignal: AbortSignal;
  fetchFn?: FetchFn;
}

function nowIso(): string {
  return new Date().toISOString();
}

function isRunTerminalStatus(status: TaskRun["status"]): boolean {
  return status === "completed" || status === "failed" || status === "cancelled";
}

function isRunActive(input: RunTaskInput): boolean {
  const run = input.store.getRun(input.runId);
  return run !== undefined && !isRunTerminalStatus(run.status);
}

function withoutLastError(task: Task): Task {
  const next = { ...task };
  delete next.lastError;
  return next;
}

export function publishTaskEvent(events: PubSub<TaskEvent>, event: Omit<TaskEvent, "at">): void {
  const payload: TaskEvent = { ...event, at: nowIso() };
  events.publish(taskTopic(event.taskId), payload);
  events.publish(ALL_TASKS_TOPIC, payload);
}

function appendRunLog(input: RunTaskInput, message: string): void {
  if (!isRunActive(input)) {
    return;
  }

  input.store.updateRun(input.runId, (run) => ({
    ...run,
    logs: [...run.logs, message].slice(-MAX_RUN_LOGS)
  }));
  publishTaskEvent(input.events, { type: "log", taskId: input.task.id, runId: input.runId, message });
}

function updateStage(input: RunTaskInput, index: number, updater: (stage: StageResult) => StageResult): void {
  if (!isRunActive(input)) {
    return;
  }

  const updated = input.store.updateRun(input.runId, (run) => ({
    ...run,
    stages: run.stages.map((stage) => (stage.index === index ? updater(stage) : stage))
  }));

  const stage = updated?.stages.find((entry) => entry.index === index);
  if (stage) {
    publishTaskEvent(input.events, { type: "stage", taskId: input.task.id, runId: input.runId, stage });
  }
}

function markStageStarted(input: RunTaskInput, event: StageStartEvent): void {
  updateStage(input, event.index, (stage) => ({
    ...stage,
    status: "running",
    inputCount: event.inputCount,
    startedAt: nowIso()
  }));
  appendRunLog(input, `Stage ${event.index + 1} (${event.type} ${event.name}) started with ${event.inputCount} item(s)`);
}

function markStageFinished(input: RunTaskInput, event: StageFinishEvent): void {
  updateStage(input, event.index, (stage) => {
    const next: StageResult = {
      ...stage,
      status: event.status,
      inputCount: event.inputCount,
      outputCount: event.outputCount,
      errorCount: event.errorCount
    };
    if (event.status !== "skipped") {
      next.finishedAt = nowIso();
    }
    if (event.error) {
      next.error = event.error;
    }
    return next;
  });

  const label = `Stage ${event.index + 1} (${event.type} ${event.name})`;
  if (event.status === "completed") {
    const errors = event.errorCount > 0 ? `, ${event.errorCount} error(s)` : "";
    appendRunLog(input, `${label} completed with ${event.outputCount} item(s)${errors}`);
  } else if (event.status === "failed") {
    appendRunLog(input, `${label} failed: ${event.error ?? "unknown error"}`);
  } else {
    appendRunLog(input, `${label} skipped`);
  }
}

function markRunCompleted(input: RunTaskInput, blockData: Task["blockData"]): void {
  if (!isRunActive(input)) {
    return;
  }

  const finishedAt = nowIso();
  input.store.updateRun(input.runId, (current) => ({
    ...current,
    status: "completed",
    finishedAt,
    logs: [...current.logs, `Run completed at ${finishedAt}`].slice(-MAX_RUN_LOGS)
  }));

  input.store.updateTaskState(input.task.id, (task) => ({
    ...withoutLastError(task),
    status: "completed",
    blockData
  }));
  publishTaskEvent(input.events, { type: "status", taskId: input.task.id, runId: input.runId, status: "completed" });
}

/**
 * Marks a run failed and its task failed with the same reason. Returns false
 * when the run is unknown or already finished.
 */
export function failRun(store: LocalStore, events: PubSub<TaskEvent>, runId: string, reason: string): boolean {
  const current = store.getRun(runId);
  if (!current || isRunTerminalStatus(current.status)) {
    return false;
  }

  store.updateRun(runId, (run) => ({
    ...run,
    status: "failed",
    finishedAt: nowIso(),
    error: reason,
    logs: [...run.logs, `Run failed: ${reason}`].slice(-MAX_RUN_LOGS)
  }));
  store.updateTaskState(current.taskId, (task) => ({
    ...task,
    status: "failed",
    lastError: reason
  }));
  publishTaskEvent(events, { type: "status", taskId: current.taskId, runId, status: "failed" });
  return true;
}

/**
 * Marks a run cancelled and its task failed. Returns false when the run is
 * unknown or already finished.
 */
export function cancelRun(
  store: LocalStore,
  events: PubSub<TaskEvent>,
  runId: string,
  reason = CANCELLED_MESSAGE
): boolean {
  const current = store.getRun(runId);
  if (!current || isRunTerminalStatus(current.status)) {
    return false;
  }

  const finishedAt = nowIso();
  store.updateRun(runId, (run) => ({
    ...run,
    status: "cancelled",
    finishedAt,
    error: reason,
    stages: run.stages.map(
      (stage): StageResult =>
        stage.status === "pending" || stage.status === "running" ? { ...stage, status: "skipped" } : stage
    ),
    logs: [...run.logs, `Run cancelled: ${reason}`].slice(-MAX_RUN_LOGS)
  }));
  store.updateTaskState(current.taskId, (task) => ({
    ...task,
    status: "failed",
    lastError: CANCELLED_MESSAGE
  }));
  publishTaskEvent(events, { type: "status", taskId: current.taskId, runId, status: "cancelled" });
  return true;
}

export async function runTask(input: RunTaskInput): Promise<void> {
  let activeStage = "";
  const log = (message: string) => {
    appendRunLog(input, activeStage ? `${activeStage}: ${message}` : message);
  };

  publishTaskEvent(input.events, { type: "status", taskId: input.task.id, runId: input.runId, status: "running" });

  try {
    const result = await executeBlockChain({
      task: input.task,
      registry: input.registry,
      context: {
        taskId: input.task.id,
        signal: input.abortSignal,
        log,
        itemStates: input.store,
        fetchFn: input.fetchFn ?? fetch
      },
      onStageStart: (event) => {
        activeStage = event.name;
        markStageStarted(input, event);
      },
      onStageFinish: (event) => {
        markStageFinished(input, event);
      }
    });

    markRunCompleted(input, result.blockData);
  } catch (error) {
    if (input.abortSignal.aborted && isAbortError(error)) {
      cancelRun(input.store, input.events, input.runId);
      return;
    }

    const reason = toErrorMessage(error);
    console.warn(`[runner] Task "${input.task.name}" failed: ${reason}`);
    failRun(input.store, input.events, input.runId, reason);
  }
}
