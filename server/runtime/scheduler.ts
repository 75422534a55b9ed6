import { getZonedMinuteKey, matchesCronExpression, parseCronExpression } from "../cron.js";
import { DEFAULT_TIMEZONE } from "../cron/serialization.js";
import { isTaskAlreadyRunningError } from "../errors.js";
import { loadSchedulerMarkers, saveSchedulerMarkers } from "../schedulerState.js";
import type { LocalStore } from "../storage.js";
import type { TaskRun } from "../types.js";
import type { QueueTaskRunOptions } from "./runQueue.js";

export const DEFAULT_SCHEDULER_POLL_INTERVAL_MS = 15_000;
export const DEFAULT_SCHEDULER_CATCHUP_MINUTES = 15;

export interface SchedulerRuntimeDependencies {
  store: LocalStore;
  queueTaskRun: (options: QueueTaskRunOptions) => Promise<TaskRun>;
  listActiveTaskIds: () => Set<string>;
  catchUpWindowMinutes?: number;
  statePath?: string;
  now?: () => Date;
}

export interface SchedulerRuntime {
  ensureSchedulerMarkersLoaded: () => Promise<void>;
  tickTaskSchedules: () => Promise<void>;
  forgetTask: (taskId: string) => Promise<void>;
  getMarker: (taskId: string) => string | undefined;
}

function buildSchedulerSlots(now: Date, catchUpWindowMinutes: number): Date[] {
  const slots: Date[] = [];
  for (let offset = catchUpWindowMinutes; offset >= 0; offset -= 1) {
    const slot = new Date(now.getTime() - offset * 60_000);
    slot.setSeconds(0, 0);
    slots.push(slot);
  }
  return slots;
}

export function createSchedulerRuntime(deps: SchedulerRuntimeDependencies): SchedulerRuntime {
  const scheduledRunMarkerByTask = new Map<string, string>();
  const catchUpWindowMinutes = deps.catchUpWindowMinutes ?? DEFAULT_SCHEDULER_CATCHUP_MINUTES;
  const now = deps.now ?? (() => new Date());
  let schedulerTickActive = false;
  let schedulerMarkersLoaded = false;

  async function ensureSchedulerMarkersLoaded(): Promise<void> {
    if (schedulerMarkersLoaded) {
      return;
    }

    try {
      const loaded = await loadSchedulerMarkers(deps.statePath);
      scheduledRunMarkerByTask.clear();
      for (const [taskId, marker] of loaded.entries()) {
        scheduledRunMarkerByTask.set(taskId, marker);
      }
    } catch (error) {
      console.error("[scheduler-state-load-error]", error);
    } finally {
      schedulerMarkersLoaded = true;
    }
  }

  async function tickTaskSchedules(): Promise<void> {
    if (schedulerTickActive) {
      return;
    }

    schedulerTickActive = true;

    try {
      await ensureSchedulerMarkersLoaded();

      const tickTime = now();
      const slots = buildSchedulerSlots(tickTime, catchUpWindowMinutes);
      const tasks = deps.store.listTasks();
      const knownIds = new Set(tasks.map((task) => task.id));
      let markersDirty = false;

      for (const taskId of [...scheduledRunMarkerByTask.keys()]) {
        if (!knownIds.has(taskId)) {
          scheduledRunMarkerByTask.delete(taskId);
          markersDirty = true;
        }
      }

      const activeTaskIds = deps.listActiveTaskIds();

      for (const task of tasks) {
        const cron = task.schedule.cron.trim();
        if (cron.length === 0) {
          if (scheduledRunMarkerByTask.delete(task.id)) {
            markersDirty = true;
          }
          continue;
        }

        const parseResult = parseCronExpression(cron);
        if (!parseResult.ok) {
          const invalidMarker = `invalid-cron:${cron}`;
          if (scheduledRunMarkerByTask.get(task.id) !== invalidMarker) {
            scheduledRunMarkerByTask.set(task.id, invalidMarker);
            markersDirty = true;
            console.warn(`[scheduler] Skipping ${task.name}: invalid cron "${cron}" (${parseResult.error}).`);
          }
          continue;
        }

        const timezone = task.schedule.timezone.trim() || DEFAULT_TIMEZONE;
        if (!getZonedMinuteKey(tickTime, timezone)) {
          const invalidMarker = `invalid-timezone:${timezone}`;
          if (scheduledRunMarkerByTask.get(task.id) !== invalidMarker) {
            scheduledRunMarkerByTask.set(task.id, invalidMarker);
            markersDirty = true;
            console.warn(`[scheduler] Skipping ${task.name}: invalid timezone "${timezone}".`);
          }
          continue;
        }

        for (const slot of slots) {
          const slotMinuteKey = getZonedMinuteKey(slot, timezone);
          if (!slotMinuteKey || !matchesCronExpression(parseResult.expression, slot, timezone)) {
            continue;
          }

          const marker = `${slotMinuteKey}|${cron}|${timezone}`;
          const previousMarker = scheduledRunMarkerByTask.get(task.id);
          // Markers only move forward, so catch-up never replays an older slot.
          if (previousMarker === marker || (previousMarker !== undefined && isLaterMarker(previousMarker, marker))) {
            continue;
          }

          scheduledRunMarkerByTask.set(task.id, marker);
          markersDirty = true;

          if (activeTaskIds.has(task.id)) {
            console.info(
              `[scheduler] Skipping scheduled run for "${task.name}" at ${slotMinuteKey} (${timezone}) because a run is already active.`
            );
            continue;
          }

          try {
            const run = await deps.queueTaskRun({ task, trigger: "schedule" });
            activeTaskIds.add(task.id);
            console.info(`[scheduler] Triggered "${task.name}" at ${slotMinuteKey} (${timezone}) as run ${run.id}.`);
          } catch (error) {
            if (isTaskAlreadyRunningError(error)) {
              activeTaskIds.add(task.id);
              console.info(`[scheduler] Skipping scheduled run for "${task.name}" at ${slotMinuteKey}: already running.`);
              continue;
            }

            scheduledRunMarkerByTask.delete(task.id);
            markersDirty = true;
            console.error(`[scheduler] Failed to trigger scheduled run for "${task.name}".`, error);
          }
        }
      }

      if (markersDirty) {
        await saveSchedulerMarkers(scheduledRunMarkerByTask, deps.statePath);
      }
    } catch (error) {
      console.error("[scheduler-error]", error);
    } finally {
      schedulerTickActive = false;
    }
  }

  async function forgetTask(taskId: string): Promise<void> {
    await ensureSchedulerMarkersLoaded();
    if (scheduledRunMarkerByTask.delete(taskId)) {
      await saveSchedulerMarkers(scheduledRunMarkerByTask, deps.statePath);
    }
  }

  return {
    ensureSchedulerMarkersLoaded,
    tickTaskSchedules,
    forgetTask,
    getMarker: (taskId) => scheduledRunMarkerByTask.get(taskId)
  };
}

function isLaterMarker(previous: string, next: string): boolean {
  const [previousMinute, previousCron, previousTimezone] = previous.split("|");
  const [nextMinute, nextCron, nextTimezone] = next.split("|");
  return previousCron === nextCron && previousTimezone === nextTimezone && previousMinute > nextMinute;
}
