import { logError } from "./log";
import type {
  AnchorOrigin,
  LoopPhase,
  PlaybackSnapshot,
  ScheduledEvent,
  ScheduledTrack,
  StationEvent,
  SystemErrorItem,
  UpcomingEventInfo
} from "./types";

const MAX_RECENT_EVENTS = 200;
const MAX_RECENT_ERRORS = 50;

type Listener = (event: StationEvent) => void;
export type ActiveEventListener = (event: ScheduledEvent | null, isFallback: boolean) => void;
export type TrackListener = (track: ScheduledTrack | null) => void;

function trimNewest<T>(items: T[], max: number): T[] {
  return items.slice(0, max);
}

function cloneSnapshot(snapshot: PlaybackSnapshot): PlaybackSnapshot {
  return structuredClone(snapshot);
}

/** Events are the same when they are the same object or share a non-empty id and start. */
export function sameEvent(a: ScheduledEvent | null, b: ScheduledEvent | null): boolean {
  if (a === b) return true;
  if (!a || !b) return false;
  return a.event_id !== "" && a.event_id === b.event_id && a.start_time_utc === b.start_time_utc;
}

function describeEvent(event: ScheduledEvent | null): Record<string, unknown> {
  return event ? { eventId: event.event_id, eventName: event.event_name, artist: event.artist_name } : { eventId: null };
}

function describeTrack(track: ScheduledTrack | null): Record<string, unknown> {
  return track ? { trackId: track.track_id, trackName: track.track_name } : { trackId: null };
}

/**
 * Single-writer playback state. Only the playback loop mutates it; everyone
 * else reads snapshots or subscribes.
 */
export class RuntimeState {
  private readonly listeners = new Set<Listener>();
  private readonly activeListeners = new Set<ActiveEventListener>();
  private readonly trackListeners = new Set<TrackListener>();

  private state: PlaybackSnapshot = {
    running: false,
    phase: "idle",
    currentActiveEvent: null,
    currentTrack: null,
    isFallbackActive: false,
    upcoming: null,
    timeOrigin: null,
    lastError: null,
    recentEvents: [],
    recentErrors: []
  };

  subscribe(listener: Listener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  onActiveEventChanged(listener: ActiveEventListener): () => void {
    this.activeListeners.add(listener);
    return () => {
      this.activeListeners.delete(listener);
    };
  }

  onTrackChanged(listener: TrackListener): () => void {
    this.trackListeners.add(listener);
    return () => {
      this.trackListeners.delete(listener);
    };
  }

  snapshot(): PlaybackSnapshot {
    return cloneSnapshot(this.state);
  }

  activeEvent(): ScheduledEvent | null {
    return this.state.currentActiveEvent;
  }

  track(): ScheduledTrack | null {
    return this.state.currentTrack;
  }

  isFallbackActive(): boolean {
    return this.state.isFallbackActive;
  }

  setRunning(running: boolean): void {
    if (this.state.running === running) return;
    this.state.running = running;
    this.emit(running ? "loop.started" : "loop.stopped", {});
  }

  setPhase(phase: LoopPhase): void {
    if (this.state.phase === phase) return;
    this.state.phase = phase;
    this.emit("loop.phase", { phase });
  }

  setUpcoming(upcoming: UpcomingEventInfo | null): void {
    const prev = this.state.upcoming;
    if (prev?.eventId === upcoming?.eventId && prev?.startsAt === upcoming?.startsAt) return;
    this.state.upcoming = upcoming;
    this.emit("event.upcoming", { upcoming });
  }

  setTimeOrigin(origin: AnchorOrigin): void {
    if (this.state.timeOrigin === origin) return;
    this.state.timeOrigin = origin;
    this.emit("time.origin", { origin });
  }

  /**
   * Switches the active event. The current track is cleared together with the
   * event, and listeners hear about the event before the cleared track.
   */
  setActiveEvent(event: ScheduledEvent | null, isFallback: boolean): boolean {
    const fallback = event !== null && isFallback;
    if (sameEvent(this.state.currentActiveEvent, event) && this.state.isFallbackActive === fallback) {
      return false;
    }
    const previousTrack = this.state.currentTrack;
    this.state.currentActiveEvent = event;
    this.state.isFallbackActive = fallback;
    this.state.currentTrack = null;

    this.emit("event.changed", { ...describeEvent(event), isFallback: fallback });
    for (const listener of this.activeListeners) {
      this.safely(() => listener(event, fallback));
    }
    if (previousTrack !== null) {
      this.notifyTrack(null);
    }
    return true;
  }

  setTrack(track: ScheduledTrack | null): boolean {
    if (this.state.currentTrack === track) return false;
    this.state.currentTrack = track;
    this.notifyTrack(track);
    return true;
  }

  recordError(source: string, message: string): void {
    const item: SystemErrorItem = { ts: new Date().toISOString(), source, message };
    this.state.lastError = message;
    this.state.recentErrors = trimNewest([item, ...this.state.recentErrors], MAX_RECENT_ERRORS);
    this.emit("system.error", { source, message });
  }

  /** Back to idle with nothing selected. */
  reset(): void {
    this.setActiveEvent(null, false);
    this.setTrack(null);
    this.setUpcoming(null);
    this.setPhase("idle");
    this.setRunning(false);
  }

  private notifyTrack(track: ScheduledTrack | null): void {
    this.emit("track.changed", { ...describeTrack(track), ...describeEvent(this.state.currentActiveEvent) });
    for (const listener of this.trackListeners) {
      this.safely(() => listener(track));
    }
  }

  private emit(event: string, payload: Record<string, unknown>): void {
    const evt: StationEvent = {
      ts: new Date().toISOString(),
      event,
      payload
    };
    this.state.recentEvents = trimNewest([evt, ...this.state.recentEvents], MAX_RECENT_EVENTS);
    for (const listener of this.listeners) {
      this.safely(() => listener(evt));
    }
  }

  private safely(fn: () => void): void {
    try {
      fn();
    } catch (error) {
      logError("state.listener.error", error);
    }
  }
}
