import path from "node:path";
import { CachedAudioFetcher, MediaFetcher } from "./audio";
import { FfplayOutput, SilentOutput, type AudioOutput } from "./audio-output";
import type { AppConfig } from "./config";
import { loadDefaultEventFile } from "./default-event";
import { ConfigurationError } from "./errors";
import { PlaybackLoop } from "./playback-loop";
import { RuntimeState } from "./runtime-state";
import { FileScheduleSource, HttpScheduleSource, ScheduleStore, type ScheduleSource } from "./schedule-source";
import { HttpTimeSource, SystemTimeSource, TimeSync, type TimeSource } from "./time-sync";

export type Station = {
  store: ScheduleStore;
  timeSync: TimeSync;
  state: RuntimeState;
  loop: PlaybackLoop;
};

export function createScheduleSource(config: AppConfig): ScheduleSource {
  if (config.schedulePath) {
    return new FileScheduleSource(config.schedulePath);
  }
  if (config.scheduleUrl) {
    return new HttpScheduleSource(config.scheduleUrl, config.scheduleTimeoutSec * 1000);
  }
  throw new ConfigurationError("No schedule source configured: set SCHEDULE_PATH or SCHEDULE_URL");
}

export function createTimeSource(config: AppConfig): TimeSource {
  if (config.timeSource === "system") {
    return new SystemTimeSource();
  }
  if (!config.timeServiceUrl) {
    throw new ConfigurationError("No time source configured: set TIME_SERVICE_URL or TIME_SOURCE=system");
  }
  return new HttpTimeSource(config.timeServiceUrl);
}

export function createOutput(config: AppConfig): AudioOutput {
  return config.audioOutput === "silent" ? new SilentOutput() : new FfplayOutput();
}

export async function createStation(config: AppConfig, output: AudioOutput = createOutput(config)): Promise<Station> {
  const store = new ScheduleStore(createScheduleSource(config), { cacheLastResponse: config.scheduleCache });
  const timeSync = new TimeSync({
    source: createTimeSource(config),
    resyncIntervalMs: config.timeResyncSec * 1000,
    initialTimeoutMs: config.timeInitialTimeoutSec * 1000,
    mockUtcTime: config.mockUtcTime
  });
  const fetcher = new CachedAudioFetcher(new MediaFetcher({
    cacheDir: path.join(config.workDir, "media-cache"),
    mediaBaseUrl: config.mediaBaseUrl,
    mediaDir: config.mediaDir
  }));
  const explicit = config.fallbackEnabled && config.defaultEventPath
    ? await loadDefaultEventFile(config.defaultEventPath)
    : null;
  const state = new RuntimeState();
  const loop = new PlaybackLoop({
    schedule: store,
    timeSync,
    fetcher,
    output,
    state,
    fallback: {
      enabled: config.fallbackEnabled,
      explicit,
      defaultEventId: config.defaultEventId,
      checkIntervalMs: config.defaultEventCheckSec * 1000
    },
    fetchRetryMs: config.fetchRetrySec * 1000
  });
  return { store, timeSync, state, loop };
}
