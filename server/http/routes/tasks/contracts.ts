import type { BlockRegistry } from "../../../blocks/registry.js";
import type { PubSub } from "../../../realtime/pubsub.js";
import type { QueueTaskRunOptions } from "../../../runtime/runQueue.js";
import type { LocalStore } from "../../../storage.js";
import type { Task, TaskEvent, TaskRun } from "../../../types.js";

export interface TaskRouteContext {
  store: LocalStore;
  registry: BlockRegistry;
  events: PubSub<TaskEvent>;
  queueTaskRun: (options: QueueTaskRunOptions) => Promise<TaskRun>;
  cancelActiveRunForTask: (taskId: string) => boolean;
  forgetScheduledTask: (taskId: string) => Promise<void>;
  heartbeatIntervalMs?: number;
}

export interface TaskStatusPayload {
  status: Task["status"];
  lastRun: string | null;
  lastError: string | null;
  blockData: Task["blockData"];
}

export function toTaskStatusPayload(task: Task): TaskStatusPayload {
  return {
    status: task.status,
    lastRun: task.lastRun ?? null,
    lastError: task.lastError ?? null,
    blockData: task.blockData
  };
}
