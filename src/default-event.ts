import { errorMessage } from "./errors";
import { log, logWarn } from "./log";
import { loadScheduleFile } from "./schedule";
import type { ScheduledEvent } from "./types";

export type DefaultEventOptions = {
  enabled: boolean;
  /** Standalone payload; wins over anything found in the schedule. */
  explicit?: ScheduledEvent | null;
  defaultEventId?: string | null;
};

export function findDefaultInSchedule(
  events: readonly ScheduledEvent[],
  defaultEventId?: string | null
): ScheduledEvent | null {
  const wantedId = defaultEventId?.trim().toLowerCase();
  if (wantedId) {
    const byId = events.find((e) => e.event_id.toLowerCase() === wantedId);
    if (byId) return byId;
  }
  return events.find((e) => e.event_name.trim().toLowerCase() === "default") ?? null;
}

/**
 * Resolves the filler event played when nothing is scheduled. Returns null,
 * disabling fallback for the run, when nothing usable is found.
 */
export function resolveDefaultEvent(
  events: readonly ScheduledEvent[],
  opts: DefaultEventOptions
): ScheduledEvent | null {
  if (!opts.enabled) return null;

  const explicit = opts.explicit ?? null;
  const candidate = explicit ?? findDefaultInSchedule(events, opts.defaultEventId);
  if (!candidate) {
    logWarn("fallback.default.missing", { defaultEventId: opts.defaultEventId ?? null });
    return null;
  }
  if (candidate.tracks.length === 0) {
    logWarn("fallback.default.no_tracks", { eventId: candidate.event_id });
    return null;
  }
  log("fallback.default.resolved", {
    eventId: candidate.event_id,
    eventName: candidate.event_name,
    origin: explicit ? "explicit" : "schedule",
    tracks: candidate.tracks.length
  });
  return candidate;
}

/** First event of a standalone default-event file, or null when it cannot be read. */
export async function loadDefaultEventFile(filePath: string): Promise<ScheduledEvent | null> {
  try {
    const { events } = await loadScheduleFile(filePath);
    return events[0] ?? null;
  } catch (error) {
    logWarn("fallback.default.unreadable", { filePath, error: errorMessage(error) });
    return null;
  }
}
