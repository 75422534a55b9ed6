import type { Express, Request, Response } from "express";
import { taskTopic, type PubSubMessage } from "../../../realtime/pubsub.js";
import type { TaskEvent } from "../../../types.js";
import { firstParam, sendZodError, writeSseEvent } from "../helpers.js";
import { toTaskStatusPayload, type TaskRouteContext, type TaskStatusPayload } from "./contracts.js";

const DEFAULT_HEARTBEAT_INTERVAL_MS = 15_000;

export function registerTaskRunRoutes(app: Express, deps: TaskRouteContext): void {
  // Registered before /api/tasks/:taskId so "status" is not read as an id.
  app.get("/api/tasks/status", (request: Request, response: Response) => {
    const ids = firstParam(request.query.ids)
      .split(",")
      .map((id) => id.trim())
      .filter((id) => id.length > 0);
    if (ids.length === 0) {
      response.status(400).json({ error: "No task IDs provided" });
      return;
    }

    const statuses: Record<string, TaskStatusPayload> = {};
    for (const id of ids) {
      const task = deps.store.getTask(id);
      if (task) {
        statuses[id] = toTaskStatusPayload(task);
      }
    }
    response.json(statuses);
  });

  app.post("/api/tasks/:taskId/run", async (request: Request, response: Response) => {
    const task = deps.store.getTask(firstParam(request.params.taskId));
    if (!task) {
      response.status(404).json({ error: "Task not found" });
      return;
    }

    try {
      const run = await deps.queueTaskRun({ task, trigger: "manual" });
      response.status(202).json({ run });
    } catch (error) {
      sendZodError(error, response);
    }
  });

  app.get("/api/tasks/:taskId/status", (request: Request, response: Response) => {
    const task = deps.store.getTask(firstParam(request.params.taskId));
    if (!task) {
      response.status(404).json({ error: "Task not found" });
      return;
    }

    response.json(toTaskStatusPayload(task));
  });

  app.get("/api/tasks/:taskId/events", (request: Request, response: Response) => {
    const taskId = firstParam(request.params.taskId);
    const task = deps.store.getTask(taskId);
    if (!task) {
      response.status(404).json({ error: "Task not found" });
      return;
    }

    response.status(200);
    response.setHeader("Content-Type", "text/event-stream; charset=utf-8");
    response.setHeader("Cache-Control", "no-cache, no-transform");
    response.setHeader("Connection", "keep-alive");
    response.setHeader("X-Accel-Buffering", "no");
    response.flushHeaders?.();

    let closed = false;
    const unsubscribe = deps.events.subscribe(taskTopic(taskId), (message: PubSubMessage<TaskEvent>) => {
      writeSseEvent(response, message.data.type, message.data);
    });
    const heartbeatTimer = setInterval(() => {
      writeSseEvent(response, "heartbeat", { taskId, at: new Date().toISOString() });
    }, deps.heartbeatIntervalMs ?? DEFAULT_HEARTBEAT_INTERVAL_MS);
    heartbeatTimer.unref?.();

    const closeStream = () => {
      if (closed) {
        return;
      }
      closed = true;
      clearInterval(heartbeatTimer);
      unsubscribe();
      response.end();
    };

    writeSseEvent(response, "ready", {
      taskId,
      status: task.status,
      at: new Date().toISOString()
    });

    request.on("close", closeStream);
  });
}
