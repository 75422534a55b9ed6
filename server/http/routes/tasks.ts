import type { Express } from "express";
import type { TaskRouteContext } from "./tasks/contracts.js";
import { registerTaskCrudRoutes } from "./tasks/registerTaskCrudRoutes.js";
import { registerTaskRunRoutes } from "./tasks/registerTaskRunRoutes.js";

export function registerTaskRoutes(app: Express, deps: TaskRouteContext): void {
  registerTaskRunRoutes(app, deps);
  registerTaskCrudRoutes(app, deps);
}

export type TaskRouteDependencies = TaskRouteContext;
