import { readFile } from "node:fs/promises";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";

import { TaskAlreadyRunningError } from "../../server/errors.js";
import { createSchedulerRuntime } from "../../server/runtime/scheduler.js";
import type { QueueTaskRunOptions } from "../../server/runtime/runQueue.js";
import type { LocalStore } from "../../server/storage.js";
import type { TaskRun } from "../../server/types.js";
import { createTaskInput } from "../helpers/taskFixtures.js";
import { createTempStore } from "../helpers/tempStore.js";

function fakeRun(options: QueueTaskRunOptions): TaskRun {
  return {
    id: `run-${options.task.id}`,
    taskId: options.task.id,
    taskName: options.task.name,
    trigger: options.trigger,
    status: "running",
    startedAt: "2026-03-02T10:07:30.000Z",
    logs: [],
    stages: []
  };
}

function createScheduler(store: LocalStore, dataDir: string, now: Date) {
  const queueTaskRun = vi.fn(async (options: QueueTaskRunOptions) => fakeRun(options));
  const statePath = path.join(dataDir, "scheduler-state.json");
  const scheduler = createSchedulerRuntime({
    store,
    queueTaskRun,
    listActiveTaskIds: () => new Set<string>(),
    catchUpWindowMinutes: 15,
    statePath,
    now: () => now
  });
  return { scheduler, queueTaskRun, statePath };
}

describe("scheduler runtime", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("triggers a due task once and remembers the latest slot", async () => {
    vi.spyOn(console, "info").mockImplementation(() => {});
    const { store, dataDir, cleanup } = await createTempStore();
    try {
      const task = store.createTask(createTaskInput({ schedule: { cron: "*/5 * * * *", timezone: "UTC" } }));
      store.createTask(createTaskInput({ name: "Manual only" }));
      const { scheduler, queueTaskRun, statePath } = createScheduler(
        store,
        dataDir,
        new Date("2026-03-02T10:07:30.000Z")
      );

      await scheduler.tickTaskSchedules();
      await scheduler.tickTaskSchedules();

      expect(queueTaskRun).toHaveBeenCalledTimes(1);
      expect(queueTaskRun.mock.calls[0][0]).toMatchObject({ trigger: "schedule", task: { id: task.id } });
      expect(scheduler.getMarker(task.id)).toBe("2026-03-02T10:05|*/5 * * * *|UTC");

      const saved: unknown = JSON.parse(await readFile(statePath, "utf8"));
      expect(saved).toMatchObject({ version: 1, markers: { [task.id]: "2026-03-02T10:05|*/5 * * * *|UTC" } });
    } finally {
      await cleanup();
    }
  });

  it("evaluates cron fields in the task timezone", async () => {
    vi.spyOn(console, "info").mockImplementation(() => {});
    const { store, dataDir, cleanup } = await createTempStore();
    try {
      const task = store.createTask(
        createTaskInput({ schedule: { cron: "0 9 * * *", timezone: "America/New_York" } })
      );
      const { scheduler, queueTaskRun } = createScheduler(store, dataDir, new Date("2026-01-15T14:00:20.000Z"));

      await scheduler.tickTaskSchedules();

      expect(queueTaskRun).toHaveBeenCalledTimes(1);
      expect(scheduler.getMarker(task.id)).toBe("2026-01-15T09:00|0 9 * * *|America/New_York");
    } finally {
      await cleanup();
    }
  });

  it("does not trigger tasks whose cron has no slot in the catch-up window", async () => {
    const { store, dataDir, cleanup } = await createTempStore();
    try {
      store.createTask(createTaskInput({ schedule: { cron: "0 * * * *", timezone: "UTC" } }));
      const { scheduler, queueTaskRun } = createScheduler(store, dataDir, new Date("2026-03-02T10:30:00.000Z"));

      await scheduler.tickTaskSchedules();

      expect(queueTaskRun).not.toHaveBeenCalled();
    } finally {
      await cleanup();
    }
  });

  it("warns once about an invalid cron expression", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const { store, dataDir, cleanup } = await createTempStore();
    try {
      const task = store.createTask(createTaskInput({ schedule: { cron: "bad cron", timezone: "UTC" } }));
      const { scheduler, queueTaskRun } = createScheduler(store, dataDir, new Date("2026-03-02T10:00:00.000Z"));

      await scheduler.tickTaskSchedules();
      await scheduler.tickTaskSchedules();

      expect(queueTaskRun).not.toHaveBeenCalled();
      expect(scheduler.getMarker(task.id)).toBe("invalid-cron:bad cron");
      expect(warn).toHaveBeenCalledTimes(1);
    } finally {
      await cleanup();
    }
  });

  it("keeps the marker when the task is already running and clears it on other failures", async () => {
    vi.spyOn(console, "info").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const { store, dataDir, cleanup } = await createTempStore();
    try {
      const busy = store.createTask(
        createTaskInput({ name: "Busy", schedule: { cron: "0 10 * * *", timezone: "UTC" } })
      );
      const broken = store.createTask(
        createTaskInput({ name: "Broken", schedule: { cron: "0 10 * * *", timezone: "UTC" } })
      );
      const { scheduler, queueTaskRun } = createScheduler(store, dataDir, new Date("2026-03-02T10:00:10.000Z"));
      queueTaskRun.mockImplementation(async (options) => {
        if (options.task.id === busy.id) {
          throw new TaskAlreadyRunningError(busy.id, "run-busy");
        }
        throw new Error("disk full");
      });

      await scheduler.tickTaskSchedules();

      expect(scheduler.getMarker(busy.id)).toBe("2026-03-02T10:00|0 10 * * *|UTC");
      expect(scheduler.getMarker(broken.id)).toBeUndefined();
      expect(error).toHaveBeenCalledWith('[scheduler] Failed to trigger scheduled run for "Broken".', expect.any(Error));
    } finally {
      await cleanup();
    }
  });

  it("reloads saved markers and forgets deleted tasks", async () => {
    vi.spyOn(console, "info").mockImplementation(() => {});
    const { store, dataDir, cleanup } = await createTempStore();
    try {
      const task = store.createTask(createTaskInput({ schedule: { cron: "0 10 * * *", timezone: "UTC" } }));
      const now = new Date("2026-03-02T10:00:10.000Z");
      const first = createScheduler(store, dataDir, now);
      await first.scheduler.tickTaskSchedules();
      expect(first.queueTaskRun).toHaveBeenCalledTimes(1);

      const restarted = createScheduler(store, dataDir, now);
      await restarted.scheduler.tickTaskSchedules();
      expect(restarted.queueTaskRun).not.toHaveBeenCalled();

      await restarted.scheduler.forgetTask(task.id);
      expect(restarted.scheduler.getMarker(task.id)).toBeUndefined();
    } finally {
      await cleanup();
    }
  });
});
