import { resolveDataRootPath } from "./dataPaths.js";

export type RuntimeMode = "local" | "remote";

export interface RuntimeConfig {
  mode: RuntimeMode;
  port: number;
  apiAuthToken: string;
  allowedCorsOrigins: string[];
  allowAnyCorsOrigin: boolean;
  enableScheduler: boolean;
  enableRecovery: boolean;
  schedulerPollIntervalMs: number;
  schedulerCatchUpMinutes: number;
  dataDir: string;
}

const defaultPort = 8080;
const defaultCorsOrigins = ["http://localhost:5173", "http://127.0.0.1:5173"];
const defaultSchedulerPollIntervalMs = 15_000;
const defaultSchedulerCatchUpMinutes = 15;

const truthyEnvValues = new Set(["1", "true", "yes", "on"]);
const falsyEnvValues = new Set(["0", "false", "no", "off"]);

export function resolveRuntimeMode(raw: string | undefined): RuntimeMode {
  if (raw?.trim().toLowerCase() === "remote") {
    return "remote";
  }

  return "local";
}

export function resolvePort(raw: string | undefined): number {
  const parsed = Number.parseInt(raw ?? "", 10);
  if (!Number.isFinite(parsed) || parsed < 1 || parsed > 65535) {
    return defaultPort;
  }
  return parsed;
}

export function parseBooleanEnv(raw: string | undefined, fallback: boolean): boolean {
  if (!raw) {
    return fallback;
  }

  const normalized = raw.trim().toLowerCase();
  if (truthyEnvValues.has(normalized)) {
    return true;
  }
  if (falsyEnvValues.has(normalized)) {
    return false;
  }

  return fallback;
}

export function parseIntEnv(raw: string | undefined, fallback: number, min: number, max: number): number {
  const parsed = Number.parseInt(raw ?? "", 10);
  if (!Number.isFinite(parsed)) {
    return fallback;
  }

  return Math.max(min, Math.min(max, parsed));
}

export function resolveCorsOrigins(raw: string | undefined): {
  allowedCorsOrigins: string[];
  allowAnyCorsOrigin: boolean;
} {
  const configured = (raw ?? "")
    .split(",")
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
  const allowedCorsOrigins = configured.length > 0 ? configured : defaultCorsOrigins;

  return {
    allowedCorsOrigins,
    allowAnyCorsOrigin: allowedCorsOrigins.includes("*")
  };
}

export function resolveRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const mode = resolveRuntimeMode(env.TASKCHAIN_RUNTIME_MODE);
  const { allowedCorsOrigins, allowAnyCorsOrigin } = resolveCorsOrigins(env.CORS_ORIGINS);

  const config: RuntimeConfig = {
    mode,
    port: resolvePort(env.PORT),
    apiAuthToken: (env.TASKCHAIN_API_TOKEN ?? "").trim(),
    allowedCorsOrigins,
    allowAnyCorsOrigin,
    enableScheduler: parseBooleanEnv(env.TASKCHAIN_ENABLE_SCHEDULER, true),
    enableRecovery: parseBooleanEnv(env.TASKCHAIN_ENABLE_RECOVERY, true),
    schedulerPollIntervalMs: parseIntEnv(
      env.TASKCHAIN_SCHEDULER_POLL_MS,
      defaultSchedulerPollIntervalMs,
      1_000,
      300_000
    ),
    schedulerCatchUpMinutes: parseIntEnv(
      env.TASKCHAIN_SCHEDULER_CATCHUP_MINUTES,
      defaultSchedulerCatchUpMinutes,
      0,
      720
    ),
    dataDir: resolveDataRootPath(env)
  };

  if (config.mode === "remote" && config.apiAuthToken.length === 0) {
    throw new Error("TASKCHAIN_API_TOKEN is required when TASKCHAIN_RUNTIME_MODE=remote.");
  }

  return config;
}
