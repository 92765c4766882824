import path from "node:path";
import { config as loadDotenv } from "dotenv";

loadDotenv({ path: process.env.DOTENV_PATH || path.resolve(process.cwd(), ".env") });

export const DEFAULT_TIME_SERVICE_URL = "https://aisenseapi.com/services/v1/datetime";

type Env = Record<string, string | undefined>;

function envString(env: Env, key: string): string | null {
  const raw = env[key]?.trim();
  return raw ? raw : null;
}

function envNumber(env: Env, key: string, defaultValue: number): number {
  const raw = env[key];
  if (!raw) {
    return defaultValue;
  }
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : defaultValue;
}

function envFlag(env: Env, key: string, defaultValue: boolean): boolean {
  const raw = env[key];
  if (raw === undefined) {
    return defaultValue;
  }
  const lower = raw.trim().toLowerCase();
  if (lower === "0" || lower === "false" || lower === "no") {
    return false;
  }
  if (lower === "1" || lower === "true" || lower === "yes") {
    return true;
  }
  return defaultValue;
}

function envChoice<T extends string>(env: Env, key: string, choices: readonly T[], defaultValue: T): T {
  const raw = env[key]?.trim().toLowerCase();
  return choices.find((choice) => choice === raw) ?? defaultValue;
}

export type AppConfig = {
  port: number;
  schedulePath: string | null;
  scheduleUrl: string | null;
  scheduleTimeoutSec: number;
  scheduleRefreshSec: number;
  scheduleCache: boolean;
  timeSource: "http" | "system";
  timeServiceUrl: string | null;
  timeResyncSec: number;
  timeInitialTimeoutSec: number;
  mockUtcTime: string | null;
  fallbackEnabled: boolean;
  defaultEventPath: string | null;
  defaultEventId: string | null;
  defaultEventCheckSec: number;
  fetchRetrySec: number;
  mediaBaseUrl: string | null;
  mediaDir: string;
  workDir: string;
  audioOutput: "ffplay" | "silent";
  autostart: boolean;
  allowTimeOverride: boolean;
};

export function readConfig(env: Env = process.env): AppConfig {
  const schedulePath = envString(env, "SCHEDULE_PATH");
  const defaultEventPath = envString(env, "DEFAULT_EVENT_PATH");
  return {
    port: envNumber(env, "PORT", 3000),
    schedulePath: schedulePath ? path.resolve(schedulePath) : null,
    scheduleUrl: envString(env, "SCHEDULE_URL"),
    scheduleTimeoutSec: Math.max(1, envNumber(env, "SCHEDULE_TIMEOUT_SEC", 15)),
    scheduleRefreshSec: Math.max(0, envNumber(env, "SCHEDULE_REFRESH_SEC", 0)),
    scheduleCache: envFlag(env, "SCHEDULE_CACHE", true),
    timeSource: envChoice(env, "TIME_SOURCE", ["http", "system"] as const, "http"),
    timeServiceUrl: env.TIME_SERVICE_URL === undefined ? DEFAULT_TIME_SERVICE_URL : envString(env, "TIME_SERVICE_URL"),
    timeResyncSec: Math.max(0, envNumber(env, "TIME_RESYNC_SEC", 60)),
    timeInitialTimeoutSec: Math.max(0.1, envNumber(env, "TIME_INITIAL_TIMEOUT_SEC", 5)),
    mockUtcTime: envString(env, "MOCK_UTC_TIME"),
    fallbackEnabled: envFlag(env, "FALLBACK_ENABLED", true),
    defaultEventPath: defaultEventPath ? path.resolve(defaultEventPath) : null,
    defaultEventId: envString(env, "DEFAULT_EVENT_ID"),
    defaultEventCheckSec: Math.max(1, envNumber(env, "DEFAULT_EVENT_CHECK_SEC", 60)),
    fetchRetrySec: Math.max(0, envNumber(env, "FETCH_RETRY_SEC", 5)),
    mediaBaseUrl: envString(env, "MEDIA_BASE_URL"),
    mediaDir: path.resolve(envString(env, "MEDIA_DIR") ?? process.cwd()),
    workDir: envString(env, "WORK_DIR") ?? "/tmp/slotcast",
    audioOutput: envChoice(env, "AUDIO_OUTPUT", ["ffplay", "silent"] as const, "ffplay"),
    autostart: envFlag(env, "AUTOSTART", true),
    allowTimeOverride: envFlag(env, "ALLOW_TIME_OVERRIDE", false)
  };
}

export const appConfig = readConfig();
