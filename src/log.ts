import { errorMessage } from "./errors";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevel | "silent", number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

function isLevel(raw: string): raw is LogLevel | "silent" {
  return Object.prototype.hasOwnProperty.call(LEVEL_RANK, raw);
}

function thresholdFromEnv(): number {
  const raw = (process.env.LOG_LEVEL || "info").toLowerCase();
  return isLevel(raw) ? LEVEL_RANK[raw] : LEVEL_RANK.info;
}

let threshold = thresholdFromEnv();

export function setLogLevel(level: LogLevel | "silent"): void {
  threshold = LEVEL_RANK[level];
}

export function log(event: string, data: Record<string, unknown> = {}, level: LogLevel = "info"): void {
  if (LEVEL_RANK[level] < threshold) {
    return;
  }
  const payload = {
    ts: new Date().toISOString(),
    level,
    event,
    ...data
  };
  console.log(JSON.stringify(payload));
}

export function logDebug(event: string, data: Record<string, unknown> = {}): void {
  log(event, data, "debug");
}

export function logWarn(event: string, data: Record<string, unknown> = {}): void {
  log(event, data, "warn");
}

export function logError(event: string, error: unknown, data: Record<string, unknown> = {}): void {
  log(event, { ...data, error: errorMessage(error) }, "error");
}
