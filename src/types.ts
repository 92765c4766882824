export type ScheduledTrack = {
  track_id: string;
  track_name: string;
  track_url: string;
  track_duration_seconds: number;
};

export type ScheduledEvent = {
  event_id: string;
  event_name: string;
  artist_name: string;
  start_time_utc: string;
  end_time_utc: string;
  tracks: ScheduledTrack[];
};

export type ScheduleIssueKind =
  | "malformed_entry"
  | "invalid_start"
  | "invalid_end"
  | "inverted_window"
  | "no_tracks"
  | "missing_track_duration";

export type ScheduleIssue = {
  kind: ScheduleIssueKind;
  index: number;
  eventId: string | null;
  trackIndex?: number;
  message: string;
};

export type EventWindow = {
  startMs: number;
  endMs: number;
  effectiveEndMs: number;
};

export type SelectionResult =
  | { kind: "none" }
  | { kind: "upcoming"; event: ScheduledEvent; window: EventWindow; waitMs: number }
  | { kind: "active"; event: ScheduledEvent; window: EventWindow; elapsedSec: number };

export type TrackPosition = {
  trackIndex: number;
  offsetSec: number;
};

export type AnchorOrigin = "remote" | "local" | "override";

export type TimeAnchor = {
  baseUtcMs: number;
  baseMonotonicMs: number;
  origin: AnchorOrigin;
};

export type LoopPhase = "idle" | "resolving" | "waiting" | "playing" | "fallback";

export type SystemErrorItem = {
  ts: string;
  source: string;
  message: string;
};

export type UpcomingEventInfo = {
  eventId: string;
  eventName: string;
  startsAt: string;
};

export type PlaybackSnapshot = {
  running: boolean;
  phase: LoopPhase;
  currentActiveEvent: ScheduledEvent | null;
  currentTrack: ScheduledTrack | null;
  isFallbackActive: boolean;
  upcoming: UpcomingEventInfo | null;
  timeOrigin: AnchorOrigin | null;
  lastError: string | null;
  recentEvents: StationEvent[];
  recentErrors: SystemErrorItem[];
};

export type StationEvent = {
  ts: string;
  event: string;
  payload: Record<string, unknown>;
  snapshot?: PlaybackSnapshot;
};
