import type { Server } from "node:http";
import path from "node:path";

import { createDefaultBlockRegistry } from "../blocks/index.js";
import type { BlockRegistry } from "../blocks/registry.js";
import type { FetchFn } from "../blocks/types.js";
import { createApp } from "../http/appFactory.js";
import { PubSub } from "../realtime/pubsub.js";
import { SCHEDULER_STATE_FILE_NAME } from "../schedulerState.js";
import { DB_FILE_NAME, LocalStore } from "../storage.js";
import type { TaskEvent } from "../types.js";
import { initializeRuntimeBootstrap, type RuntimeBootstrapHandle } from "./bootstrap.js";
import { resolveRuntimeConfig, type RuntimeConfig } from "./config.js";
import { createRunRecoveryRuntime } from "./recovery.js";
import { createRunQueueRuntime, type ActiveTaskRun } from "./runQueue.js";
import { createSchedulerRuntime } from "./scheduler.js";

export interface ServerRuntimeOptions {
  env?: NodeJS.ProcessEnv;
  config?: Partial<RuntimeConfig>;
  store?: LocalStore;
  registry?: BlockRegistry;
  events?: PubSub<TaskEvent>;
  activeRuns?: Map<string, ActiveTaskRun>;
  fetchFn?: FetchFn;
}

export interface ServerRuntime {
  app: ReturnType<typeof createApp>;
  config: RuntimeConfig;
  store: LocalStore;
  events: PubSub<TaskEvent>;
  start: () => Server;
  stop: () => void;
}

export function createServerRuntime(options: ServerRuntimeOptions = {}): ServerRuntime {
  const resolvedConfig = resolveRuntimeConfig(options.env);
  const config: RuntimeConfig = {
    ...resolvedConfig,
    ...(options.config ?? {})
  };
  const appVersion =
    (options.env?.TASKCHAIN_BUILD_VERSION ??
      process.env.TASKCHAIN_BUILD_VERSION ??
      options.env?.npm_package_version ??
      process.env.npm_package_version ??
      "dev").trim() || "dev";

  const store = options.store ?? new LocalStore(path.join(config.dataDir, DB_FILE_NAME));
  const registry = options.registry ?? createDefaultBlockRegistry();
  const events = options.events ?? new PubSub<TaskEvent>();
  const activeRuns = options.activeRuns ?? new Map<string, ActiveTaskRun>();

  const { queueTaskRun, cancelTaskRun, cancelActiveRunForTask, listActiveTaskIds } = createRunQueueRuntime({
    store,
    registry,
    events,
    activeRuns,
    fetchFn: options.fetchFn
  });

  const { recoverInterruptedRuns } = createRunRecoveryRuntime({
    store,
    events,
    activeRuns
  });

  const scheduler = createSchedulerRuntime({
    store,
    queueTaskRun,
    listActiveTaskIds,
    catchUpWindowMinutes: config.schedulerCatchUpMinutes,
    statePath: path.join(config.dataDir, SCHEDULER_STATE_FILE_NAME)
  });

  const app = createApp({
    apiAuthToken: config.apiAuthToken,
    allowedCorsOrigins: config.allowedCorsOrigins,
    allowAnyCorsOrigin: config.allowAnyCorsOrigin,
    system: {
      listTasks: () => store.listTasks(),
      getBlockCounts: () => registry.counts(),
      getVersion: () => appVersion,
      getSchedulerStatus: () => ({
        enabled: config.enableScheduler
      })
    },
    blocks: {
      registry
    },
    tasks: {
      store,
      registry,
      events,
      queueTaskRun,
      cancelActiveRunForTask: (taskId) => cancelActiveRunForTask(taskId),
      forgetScheduledTask: scheduler.forgetTask
    },
    runs: {
      store,
      cancelTaskRun: (runId) => cancelTaskRun(runId)
    }
  });

  let server: Server | null = null;
  let bootstrapHandle: RuntimeBootstrapHandle | null = null;

  function stop(): void {
    if (bootstrapHandle) {
      bootstrapHandle.dispose();
      bootstrapHandle = null;
    }

    for (const active of activeRuns.values()) {
      cancelTaskRun(active.runId, "Server shutting down");
    }

    if (server) {
      server.close();
      // Event streams never end on their own.
      server.closeAllConnections();
      server = null;
    }
  }

  function start(): Server {
    if (server) {
      return server;
    }

    server = app.listen(config.port, () => {
      const counts = registry.counts();
      console.log(`taskchain API listening on http://localhost:${config.port} (mode=${config.mode})`);
      console.log(
        `[blocks] Loaded ${counts.input} input, ${counts.processing} processing and ${counts.action} action block(s)`
      );

      void initializeRuntimeBootstrap({
        enableScheduler: config.enableScheduler,
        enableRecovery: config.enableRecovery,
        ensureSchedulerMarkersLoaded: scheduler.ensureSchedulerMarkersLoaded,
        tickTaskSchedules: scheduler.tickTaskSchedules,
        recoverInterruptedRuns,
        schedulerPollIntervalMs: config.schedulerPollIntervalMs
      })
        .then((handle) => {
          bootstrapHandle = handle;
        })
        .catch((error) => {
          console.error("[runtime-startup-error]", error);
        });
    });

    return server;
  }

  return {
    app,
    config,
    store,
    events,
    start,
    stop
  };
}
