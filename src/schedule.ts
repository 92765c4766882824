import { readFile } from "node:fs/promises";
import { z } from "zod";
import { ScheduleLoadError, errorMessage } from "./errors";
import { parseUtcTimestamp } from "./timestamp";
import { isPlayableDuration } from "./track-cursor";
import type { ScheduleIssue, ScheduledEvent, ScheduledTrack } from "./types";

const text = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((v) => (v === null || v === undefined ? "" : String(v)));

const seconds = z
  .union([z.number(), z.string()])
  .nullish()
  .transform((v) => {
    const n = typeof v === "string" ? Number(v) : v ?? 0;
    return Number.isFinite(n) ? n : 0;
  });

const trackSchema = z.object({
  track_id: text,
  track_name: text,
  track_url: text,
  track_duration_seconds: seconds
});

const eventSchema = z.object({
  event_id: text,
  event_name: text,
  artist_name: text,
  start_time_utc: text,
  end_time_utc: text,
  tracks: z
    .array(trackSchema)
    .nullish()
    .transform((v) => v ?? [])
});

export type ScheduleValidation = {
  events: ScheduledEvent[];
  issues: ScheduleIssue[];
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function entriesOf(data: unknown): unknown[] {
  if (Array.isArray(data)) return data;
  if (isRecord(data) && Array.isArray(data.events)) return data.events;
  if (isRecord(data)) return [data];
  throw new ScheduleLoadError("Schedule payload must be a JSON array of events or an event object");
}

function classify(event: ScheduledEvent, index: number): ScheduleIssue[] {
  const issues: ScheduleIssue[] = [];
  const eventId = event.event_id || null;
  const start = parseUtcTimestamp(event.start_time_utc);
  const end = parseUtcTimestamp(event.end_time_utc);

  if (start === null) {
    issues.push({ kind: "invalid_start", index, eventId, message: `Invalid start time "${event.start_time_utc}"` });
  }
  if (end === null) {
    issues.push({ kind: "invalid_end", index, eventId, message: `Invalid end time "${event.end_time_utc}"` });
  }
  if (start !== null && end !== null && end <= start) {
    issues.push({ kind: "inverted_window", index, eventId, message: "End time is not after start time" });
  }
  if (event.tracks.length === 0) {
    issues.push({ kind: "no_tracks", index, eventId, message: "Event has no tracks" });
  }
  event.tracks.forEach((track, trackIndex) => {
    if (!isPlayableDuration(track.track_duration_seconds)) {
      issues.push({
        kind: "missing_track_duration",
        index,
        eventId,
        trackIndex,
        message: `Track "${track.track_name}" is missing track_duration_seconds`
      });
    }
  });
  return issues;
}

/**
 * Splits raw schedule data into structurally valid events and a list of data
 * issues. Structurally valid events with bad windows or durations are kept;
 * the selector and cursor exclude them on their own.
 */
export function validateSchedule(data: unknown): ScheduleValidation {
  const events: ScheduledEvent[] = [];
  const issues: ScheduleIssue[] = [];

  entriesOf(data).forEach((entry, index) => {
    const parsed = eventSchema.safeParse(entry);
    if (!parsed.success) {
      const first = parsed.error.issues[0];
      issues.push({
        kind: "malformed_entry",
        index,
        eventId: isRecord(entry) && typeof entry.event_id === "string" ? entry.event_id : null,
        message: first ? `${first.path.join(".") || "entry"}: ${first.message}` : "Malformed event entry"
      });
      return;
    }
    events.push(parsed.data);
    issues.push(...classify(parsed.data, index));
  });

  return { events, issues };
}

export function parseScheduleJson(raw: string): ScheduleValidation {
  const trimmed = raw.trim();
  if (!trimmed) {
    throw new ScheduleLoadError("Received empty schedule payload");
  }
  let data: unknown;
  try {
    data = JSON.parse(trimmed);
  } catch (error) {
    throw new ScheduleLoadError(`Unable to parse schedule JSON: ${errorMessage(error)}`);
  }
  return validateSchedule(data);
}

function toWireTrack(track: ScheduledTrack): ScheduledTrack {
  return {
    track_id: track.track_id,
    track_name: track.track_name,
    track_url: track.track_url,
    track_duration_seconds: track.track_duration_seconds
  };
}

function toWireEvent(event: ScheduledEvent): ScheduledEvent {
  return {
    event_id: event.event_id,
    event_name: event.event_name,
    artist_name: event.artist_name,
    start_time_utc: event.start_time_utc,
    end_time_utc: event.end_time_utc,
    tracks: event.tracks.map(toWireTrack)
  };
}

export function serializeSchedule(events: readonly ScheduledEvent[], pretty = true): string {
  return JSON.stringify(events.map(toWireEvent), null, pretty ? 2 : undefined);
}

export async function loadScheduleFile(filePath: string): Promise<ScheduleValidation> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf-8");
  } catch (error) {
    throw new ScheduleLoadError(`Unable to read schedule file ${filePath}: ${errorMessage(error)}`);
  }
  return parseScheduleJson(raw);
}
