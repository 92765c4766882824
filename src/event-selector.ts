import { parseUtcTimestamp } from "./timestamp";
import { totalTrackDurationSec } from "./track-cursor";
import type { EventWindow, ScheduledEvent, SelectionResult } from "./types";

export type WindowIssue = "invalid_start" | "invalid_end" | "inverted_window";

export type SelectionReporter = {
  onExcluded?: (event: ScheduledEvent, index: number, issue: WindowIssue) => void;
  onOverlap?: (winner: ScheduledEvent, shadowed: ScheduledEvent) => void;
};

/**
 * Effective end is capped by the audio the event actually carries: a slot
 * longer than its tracks ends when the tracks run out. Without any usable
 * track duration the declared end stands.
 */
export function effectiveEndMs(event: ScheduledEvent, startMs: number, endMs: number): number {
  const tracksMs = totalTrackDurationSec(event) * 1000;
  if (tracksMs <= 0) return endMs;
  return startMs + Math.min(endMs - startMs, tracksMs);
}

export function resolveWindow(event: ScheduledEvent): EventWindow | WindowIssue {
  const startMs = parseUtcTimestamp(event.start_time_utc);
  if (startMs === null) return "invalid_start";
  const endMs = parseUtcTimestamp(event.end_time_utc);
  if (endMs === null) return "invalid_end";
  if (endMs <= startMs) return "inverted_window";
  return { startMs, endMs, effectiveEndMs: effectiveEndMs(event, startMs, endMs) };
}

/**
 * Picks the event that is playing at `nowMs`, or else the soonest upcoming one.
 * Overlapping active windows resolve to the first in source order; equal
 * upcoming starts resolve the same way. Holds no state between calls.
 */
export function selectEvent(
  events: readonly ScheduledEvent[],
  nowMs: number,
  reporter: SelectionReporter = {}
): SelectionResult {
  let active: { event: ScheduledEvent; window: EventWindow } | null = null;
  let upcoming: { event: ScheduledEvent; window: EventWindow } | null = null;

  for (let index = 0; index < events.length; index += 1) {
    const event = events[index];
    const window = resolveWindow(event);
    if (typeof window === "string") {
      reporter.onExcluded?.(event, index, window);
      continue;
    }

    if (nowMs >= window.startMs && nowMs < window.effectiveEndMs) {
      if (active) {
        reporter.onOverlap?.(active.event, event);
      } else {
        active = { event, window };
      }
      continue;
    }

    if (window.startMs > nowMs && (!upcoming || window.startMs < upcoming.window.startMs)) {
      upcoming = { event, window };
    }
  }

  if (active) {
    return {
      kind: "active",
      event: active.event,
      window: active.window,
      elapsedSec: (nowMs - active.window.startMs) / 1000
    };
  }
  if (upcoming) {
    return {
      kind: "upcoming",
      event: upcoming.event,
      window: upcoming.window,
      waitMs: Math.max(0, upcoming.window.startMs - nowMs)
    };
  }
  return { kind: "none" };
}

/** Side-effect-free preview of what would be selected at `at`. */
export function isEventActiveAt(
  events: readonly ScheduledEvent[],
  at: number | Date | string
): SelectionResult | null {
  const ms = typeof at === "string" ? parseUtcTimestamp(at) : typeof at === "number" ? at : at.getTime();
  if (ms === null || !Number.isFinite(ms)) return null;
  return selectEvent(events, ms);
}
