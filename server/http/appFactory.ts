import express from "express";

import {
  createApiAuthMiddleware,
  createCorsMiddleware,
  createErrorMiddleware,
  createNotFoundMiddleware,
  createSecurityHeadersMiddleware
} from "./middleware.js";
import { registerBlockRoutes, type BlockRouteDependencies } from "./routes/blocks.js";
import { registerRunRoutes, type RunRouteDependencies } from "./routes/runs.js";
import { registerScheduleRoutes } from "./routes/schedules.js";
import { registerSystemRoutes, type SystemRouteDependencies } from "./routes/system.js";
import { registerTaskRoutes, type TaskRouteDependencies } from "./routes/tasks.js";

export interface AppFactoryDependencies {
  apiAuthToken: string;
  allowedCorsOrigins: string[];
  allowAnyCorsOrigin: boolean;
  system: SystemRouteDependencies;
  blocks: BlockRouteDependencies;
  tasks: TaskRouteDependencies;
  runs: RunRouteDependencies;
}

export function createApp(deps: AppFactoryDependencies): express.Express {
  const app = express();

  app.disable("x-powered-by");
  app.use(createSecurityHeadersMiddleware());
  app.use(
    createCorsMiddleware({
      allowedOrigins: deps.allowedCorsOrigins,
      allowAnyOrigin: deps.allowAnyCorsOrigin
    })
  );
  app.use(express.json({ limit: "1mb" }));
  app.use(createApiAuthMiddleware(deps.apiAuthToken));

  registerSystemRoutes(app, deps.system);
  registerBlockRoutes(app, deps.blocks);
  registerTaskRoutes(app, deps.tasks);
  registerRunRoutes(app, deps.runs);
  registerScheduleRoutes(app);

  app.use(createNotFoundMiddleware());
  app.use(createErrorMiddleware());

  return app;
}
