import type { ScheduledEvent, TrackPosition } from "./types";

export function isPlayableDuration(durationSec: number): boolean {
  return Number.isFinite(durationSec) && durationSec > 0;
}

export function totalTrackDurationSec(event: ScheduledEvent): number {
  let total = 0;
  for (const track of event.tracks) {
    if (isPlayableDuration(track.track_duration_seconds)) {
      total += track.track_duration_seconds;
    }
  }
  return total;
}

/**
 * Maps seconds elapsed since the event start onto a track and an offset inside
 * it. Tracks without a usable duration are stepped over without consuming time.
 * Returns null once the elapsed time runs past every track.
 */
export function locateTrack(
  event: ScheduledEvent,
  elapsedSec: number,
  onSkippedTrack?: (trackIndex: number) => void
): TrackPosition | null {
  let remaining = Math.max(0, Number.isFinite(elapsedSec) ? elapsedSec : 0);

  for (let i = 0; i < event.tracks.length; i += 1) {
    const duration = event.tracks[i].track_duration_seconds;
    if (!isPlayableDuration(duration)) {
      onSkippedTrack?.(i);
      continue;
    }
    if (remaining < duration) {
      return { trackIndex: i, offsetSec: remaining };
    }
    remaining -= duration;
  }

  return null;
}
