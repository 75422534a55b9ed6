import type { Express, Request, Response } from "express";
import { previewSchedule } from "../../../cron.js";
import { resolveTaskInput, taskBodySchema } from "../../../taskInput.js";
import { firstParam, sendZodError } from "../helpers.js";
import type { TaskRouteContext } from "./contracts.js";

const RECENT_RUN_LIMIT = 10;

export function registerTaskCrudRoutes(app: Express, deps: TaskRouteContext): void {
  app.get("/api/tasks", (_request: Request, response: Response) => {
    response.json({ tasks: deps.store.listTasks() });
  });

  app.post("/api/tasks", (request: Request, response: Response) => {
    try {
      const input = resolveTaskInput(deps.registry, taskBodySchema.parse(request.body));
      const task = deps.store.createTask(input);
      console.info(`[tasks] Created "${task.name}" (${task.id}).`);
      response.status(201).json({ task });
    } catch (error) {
      sendZodError(error, response);
    }
  });

  app.get("/api/tasks/:taskId", (request: Request, response: Response) => {
    const task = deps.store.getTask(firstParam(request.params.taskId));
    if (!task) {
      response.status(404).json({ error: "Task not found" });
      return;
    }

    const preview = previewSchedule(task.schedule.cron, task.schedule.timezone);
    response.json({
      task,
      scheduleSpec: preview.scheduleSpec,
      nextRuns: preview.nextRuns,
      runs: deps.store.listRuns({ taskId: task.id, limit: RECENT_RUN_LIMIT })
    });
  });

  app.put("/api/tasks/:taskId", (request: Request, response: Response) => {
    const taskId = firstParam(request.params.taskId);
    if (!deps.store.getTask(taskId)) {
      response.status(404).json({ error: "Task not found" });
      return;
    }

    try {
      const input = resolveTaskInput(deps.registry, taskBodySchema.parse(request.body));
      const task = deps.store.updateTask(taskId, input);
      if (!task) {
        response.status(404).json({ error: "Task not found" });
        return;
      }
      response.json({ task });
    } catch (error) {
      sendZodError(error, response);
    }
  });

  app.delete("/api/tasks/:taskId", async (request: Request, response: Response) => {
    const taskId = firstParam(request.params.taskId);
    const task = deps.store.getTask(taskId);
    if (!task) {
      response.status(404).json({ error: "Task not found" });
      return;
    }

    try {
      deps.cancelActiveRunForTask(taskId);
      deps.store.deleteTask(taskId);
      await deps.forgetScheduledTask(taskId);
      console.info(`[tasks] Deleted "${task.name}" (${taskId}).`);
      response.status(204).send();
    } catch (error) {
      sendZodError(error, response);
    }
  });
}
