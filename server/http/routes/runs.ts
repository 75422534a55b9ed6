import type { Express, Request, Response } from "express";
import type { LocalStore } from "../../storage.js";
import { firstParam, parseLimit } from "./helpers.js";

export interface RunRouteDependencies {
  store: LocalStore;
  cancelTaskRun: (runId: string) => boolean;
}

export function registerRunRoutes(app: Express, deps: RunRouteDependencies): void {
  app.get("/api/runs", (request: Request, response: Response) => {
    const taskId = firstParam(request.query.taskId).trim();
    response.json({
      runs: deps.store.listRuns({
        limit: parseLimit(request.query.limit, 30, 100),
        ...(taskId.length > 0 ? { taskId } : {})
      })
    });
  });

  app.get("/api/runs/:runId", (request: Request, response: Response) => {
    const run = deps.store.getRun(firstParam(request.params.runId));
    if (!run) {
      response.status(404).json({ error: "Run not found" });
      return;
    }

    response.json({ run });
  });

  app.post("/api/runs/:runId/stop", (request: Request, response: Response) => {
    const runId = firstParam(request.params.runId);
    if (!deps.store.getRun(runId)) {
      response.status(404).json({ error: "Run not found" });
      return;
    }

    if (!deps.cancelTaskRun(runId)) {
      response.status(409).json({ error: "Run is not active" });
      return;
    }

    response.json({ run: deps.store.getRun(runId) });
  });
}
