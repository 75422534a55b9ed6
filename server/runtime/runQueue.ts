import type { BlockRegistry } from "../blocks/registry.js";
import type { FetchFn } from "../blocks/types.js";
import { TaskAlreadyRunningError } from "../errors.js";
import type { PubSub } from "../realtime/pubsub.js";
import { CANCELLED_MESSAGE, cancelRun, failRun, runTask } from "../runner.js";
import type { LocalStore } from "../storage.js";
import type { RunTrigger, Task, TaskEvent, TaskRun } from "../types.js";

export interface ActiveTaskRun {
  runId: string;
  controller: AbortController;
}

export interface QueueTaskRunOptions {
  task: Task;
  trigger: RunTrigger;
}

export interface RunQueueRuntimeDependencies {
  store: LocalStore;
  registry: BlockRegistry;
  events: PubSub<TaskEvent>;
  activeRuns: Map<string, ActiveTaskRun>;
  fetchFn?: FetchFn;
}

export interface RunQueueRuntime {
  queueTaskRun: (options: QueueTaskRunOptions) => Promise<TaskRun>;
  cancelTaskRun: (runId: string, reason?: string) => boolean;
  cancelActiveRunForTask: (taskId: string, reason?: string) => boolean;
  listActiveTaskIds: () => Set<string>;
}

export function createRunQueueRuntime(deps: RunQueueRuntimeDependencies): RunQueueRuntime {
  async function queueTaskRun(options: QueueTaskRunOptions): Promise<TaskRun> {
    const active = deps.activeRuns.get(options.task.id);
    if (active) {
      throw new TaskAlreadyRunningError(options.task.id, active.runId);
    }

    const run = deps.store.createRun(options.task, options.trigger);
    const task =
      deps.store.updateTaskState(options.task.id, (current) => ({
        ...current,
        status: "running",
        lastRun: run.startedAt
      })) ?? options.task;

    const controller = new AbortController();
    deps.activeRuns.set(task.id, { runId: run.id, controller });

    void runTask({
      store: deps.store,
      registry: deps.registry,
      events: deps.events,
      runId: run.id,
      task,
      abortSignal: controller.signal,
      fetchFn: deps.fetchFn
    })
      .catch((error) => {
        console.error("[run-task-error]", error);
        failRun(deps.store, deps.events, run.id, "Unexpected run error");
      })
      .finally(() => {
        if (deps.activeRuns.get(task.id)?.runId === run.id) {
          deps.activeRuns.delete(task.id);
        }
      });

    return run;
  }

  function cancelTaskRun(runId: string, reason = CANCELLED_MESSAGE): boolean {
    for (const active of deps.activeRuns.values()) {
      if (active.runId === runId) {
        active.controller.abort();
        break;
      }
    }
    return cancelRun(deps.store, deps.events, runId, reason);
  }

  function cancelActiveRunForTask(taskId: string, reason = CANCELLED_MESSAGE): boolean {
    const active = deps.activeRuns.get(taskId);
    if (!active) {
      return false;
    }
    return cancelTaskRun(active.runId, reason);
  }

  function listActiveTaskIds(): Set<string> {
    return new Set(deps.activeRuns.keys());
  }

  return {
    queueTaskRun,
    cancelTaskRun,
    cancelActiveRunForTask,
    listActiveTaskIds
  };
}
