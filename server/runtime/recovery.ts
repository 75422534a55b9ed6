import type { PubSub } from "../realtime/pubsub.js";
import { failRun } from "../runner.js";
import type { LocalStore } from "../storage.js";
import type { TaskEvent } from "../types.js";
import type { ActiveTaskRun } from "./runQueue.js";

export const INTERRUPTED_MESSAGE = "Interrupted by restart";

export interface RunRecoveryRuntimeDependencies {
  store: LocalStore;
  events: PubSub<TaskEvent>;
  activeRuns: Map<string, ActiveTaskRun>;
}

export interface RecoverySummary {
  runs: number;
  orphanedTasks: number;
}

export function createRunRecoveryRuntime(deps: RunRecoveryRuntimeDependencies): {
  recoverInterruptedRuns: () => Promise<RecoverySummary>;
} {
  async function recoverInterruptedRuns(): Promise<RecoverySummary> {
    const activeRunIds = new Set([...deps.activeRuns.values()].map((active) => active.runId));
    const state = deps.store.getState();
    const summary: RecoverySummary = { runs: 0, orphanedTasks: 0 };

    for (const run of state.runs) {
      if (run.status !== "running" || activeRunIds.has(run.id)) {
        continue;
      }
      if (failRun(deps.store, deps.events, run.id, INTERRUPTED_MESSAGE)) {
        summary.runs += 1;
        console.info(`[recovery] Marked run ${run.id} of "${run.taskName}" as interrupted.`);
      }
    }

    // Tasks can be left running without a run record when the runs list was trimmed.
    for (const task of deps.store.listTasks()) {
      if (task.status !== "running" || deps.activeRuns.has(task.id)) {
        continue;
      }
      deps.store.updateTaskState(task.id, (current) => ({
        ...current,
        status: "failed",
        lastError: INTERRUPTED_MESSAGE
      }));
      summary.orphanedTasks += 1;
    }

    return summary;
  }

  return {
    recoverInterruptedRuns
  };
}
