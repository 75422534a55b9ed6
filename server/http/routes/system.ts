import type { Express } from "express";
import type { BlockType, Task, TaskStatus } from "../../types.js";

export interface SystemRouteDependencies {
  listTasks: () => Task[];
  getBlockCounts: () => Record<BlockType, number>;
  getVersion?: () => string;
  getSchedulerStatus?: () => {
    enabled: boolean;
  };
}

const RECENT_TASK_LIMIT = 5;

export function registerSystemRoutes(app: Express, deps: SystemRouteDependencies): void {
  app.get("/api/health", (_request, response) => {
    const version = deps.getVersion?.();
    const schedulerStatus = deps.getSchedulerStatus?.();
    response.json({
      ok: true,
      now: new Date().toISOString(),
      ...(typeof version === "string" && version.trim().length > 0
        ? {
            version: version.trim()
          }
        : {}),
      ...(schedulerStatus
        ? {
            scheduler: schedulerStatus
          }
        : {})
    });
  });

  app.get("/api/dashboard", (_request, response) => {
    const tasks = deps.listTasks();
    const statusCounts: Record<TaskStatus, number> = {
      pending: 0,
      running: 0,
      completed: 0,
      failed: 0
    };
    for (const task of tasks) {
      statusCounts[task.status] += 1;
    }

    const recentTasks = [...tasks]
      .sort((left, right) => right.createdAt.localeCompare(left.createdAt))
      .slice(0, RECENT_TASK_LIMIT);

    response.json({
      tasks: {
        total: tasks.length,
        ...statusCounts
      },
      blocks: deps.getBlockCounts(),
      recentTasks
    });
  });
}
