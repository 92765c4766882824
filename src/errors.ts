/** Missing or unusable collaborator; fatal to starting playback. */
export class ConfigurationError extends Error {
  readonly name = "ConfigurationError";
}

export class ScheduleLoadError extends Error {
  readonly name = "ScheduleLoadError";
}

export class TimeSourceError extends Error {
  readonly name = "TimeSourceError";
}

export class AudioFetchError extends Error {
  readonly name = "AudioFetchError";

  constructor(readonly locator: string, message: string) {
    super(message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
