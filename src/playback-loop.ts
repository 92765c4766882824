import type { AudioFetcher, AudioHandle } from "./audio";
import type { AudioOutput } from "./audio-output";
import { resolveDefaultEvent } from "./default-event";
import { ConfigurationError, errorMessage } from "./errors";
import { isEventActiveAt, selectEvent, type SelectionReporter } from "./event-selector";
import { log, logError, logWarn } from "./log";
import { RuntimeState, type ActiveEventListener, type TrackListener } from "./runtime-state";
import type { ScheduleStore } from "./schedule-source";
import type { TimeSync } from "./time-sync";
import { toIso } from "./timestamp";
import { locateTrack } from "./track-cursor";
import type { PlaybackSnapshot, ScheduledEvent, SelectionResult, StationEvent } from "./types";
import { wait, type Sleep } from "./wait";

/** Offsets this close to the end of a clip leave nothing audible. */
const PLAYBACK_EPSILON_SEC = 0.01;
const IDLE_RESOLVE_MS = 1000;

type ActiveSelection = Extract<SelectionResult, { kind: "active" }>;

type PlayOutcome = "completed" | "ended" | "failed" | "exhausted" | "aborted";

export type FallbackSettings = {
  enabled: boolean;
  explicit?: ScheduledEvent | null;
  defaultEventId?: string | null;
  checkIntervalMs?: number;
};

export type PlaybackLoopDeps = {
  schedule: ScheduleStore;
  timeSync: TimeSync;
  fetcher: AudioFetcher;
  output: AudioOutput;
  state?: RuntimeState;
  fallback?: FallbackSettings;
  fetchRetryMs?: number;
  sleep?: Sleep;
};

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Drives playback from the schedule: resolve the relevant event, resume it at
 * the track and offset its elapsed time points to, and loop back whenever the
 * event ends, fails or changes. With a default event configured, idle time is
 * filled with it until a scheduled event becomes active.
 */
export class PlaybackLoop {
  private readonly state: RuntimeState;
  private readonly sleep: Sleep;
  private readonly fetchRetryMs: number;
  private readonly checkIntervalMs: number;

  private running = false;
  private controller: AbortController | null = null;
  private loopPromise: Promise<void> | null = null;
  private defaultEvent: ScheduledEvent | null = null;

  private reportedSnapshot: readonly ScheduledEvent[] | null = null;
  private readonly reported = new Set<string>();
  private readonly reporter: SelectionReporter = {
    onExcluded: (event, index, issue) => {
      if (this.firstReport(`excluded:${index}:${issue}`)) {
        logWarn("selector.excluded", { index, eventId: event.event_id, issue });
      }
    },
    onOverlap: (winner, shadowed) => {
      if (this.firstReport(`overlap:${winner.event_id}:${shadowed.event_id}`)) {
        logWarn("selector.overlap", { winner: winner.event_id, shadowed: shadowed.event_id });
      }
    }
  };

  constructor(private readonly deps: PlaybackLoopDeps) {
    this.state = deps.state ?? new RuntimeState();
    this.sleep = deps.sleep ?? wait;
    this.fetchRetryMs = Math.max(0, deps.fetchRetryMs ?? 5_000);
    this.checkIntervalMs = Math.max(1_000, deps.fallback?.checkIntervalMs ?? 60_000);
    deps.timeSync.subscribe((anchor) => this.state.setTimeOrigin(anchor.origin));
  }

  getRuntimeState(): RuntimeState {
    return this.state;
  }

  isRunning(): boolean {
    return this.running;
  }

  snapshot(): PlaybackSnapshot {
    return this.state.snapshot();
  }

  subscribe(listener: (event: StationEvent) => void): () => void {
    return this.state.subscribe(listener);
  }

  onActiveEventChanged(listener: ActiveEventListener): () => void {
    return this.state.onActiveEventChanged(listener);
  }

  onTrackChanged(listener: TrackListener): () => void {
    return this.state.onTrackChanged(listener);
  }

  isEventActiveAt(at?: number | Date | string): SelectionResult | null {
    return isEventActiveAt(this.deps.schedule.current(), at ?? this.deps.timeSync.now());
  }

  /** Resolves once the loop has exited, whether stopped or out of events. */
  whenStopped(): Promise<void> {
    return this.loopPromise ?? Promise.resolve();
  }

  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;
    const controller = new AbortController();
    this.controller = controller;

    try {
      const events = await this.deps.schedule.load();
      if (events.length === 0) {
        throw new ConfigurationError(`Schedule from ${this.deps.schedule.description} contains no events`);
      }
      await this.deps.timeSync.ensureInitialized();
      this.defaultEvent = resolveDefaultEvent(events, {
        enabled: this.deps.fallback?.enabled ?? false,
        explicit: this.deps.fallback?.explicit,
        defaultEventId: this.deps.fallback?.defaultEventId
      });
    } catch (error) {
      this.running = false;
      this.controller = null;
      logError("playback.start.failed", error);
      this.state.recordError("playback.start", errorMessage(error));
      throw error;
    }

    if (controller.signal.aborted) {
      this.running = false;
      this.controller = null;
      return;
    }

    const anchor = this.deps.timeSync.anchor();
    if (anchor) {
      this.state.setTimeOrigin(anchor.origin);
    }
    this.state.setRunning(true);
    this.loopPromise = this.run(controller.signal)
      .catch((error) => {
        logError("playback.loop.crash", error);
        this.state.recordError("playback.loop", errorMessage(error));
      })
      .finally(() => this.finish(controller));
    log("playback.started", {
      schedule: this.deps.schedule.description,
      events: this.deps.schedule.current().length,
      fallback: this.defaultEvent?.event_id ?? null
    });
  }

  async stop(): Promise<void> {
    const controller = this.controller;
    if (!controller) return;
    controller.abort();
    await this.loopPromise;
  }

  private async finish(controller: AbortController): Promise<void> {
    try {
      await this.deps.output.stop();
    } catch (error) {
      logError("playback.output.stop.failed", error);
    }
    this.state.reset();
    if (this.controller === controller) {
      this.controller = null;
      this.running = false;
    }
    log("playback.stopped");
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      this.state.setPhase("resolving");
      const events = this.deps.schedule.current();
      const selection = selectEvent(events, this.deps.timeSync.now(), this.reporterFor(events));

      if (selection.kind === "active") {
        this.state.setUpcoming(null);
        const outcome = await this.playEvent(selection, signal);
        await this.idleAfter(outcome, selection.window.effectiveEndMs, signal);
        continue;
      }

      this.state.setUpcoming(selection.kind === "upcoming"
        ? {
            eventId: selection.event.event_id,
            eventName: selection.event.event_name,
            startsAt: toIso(selection.window.startMs)
          }
        : null);

      if (this.defaultEvent) {
        await this.playFallback(this.defaultEvent, signal);
        continue;
      }

      this.state.setActiveEvent(null, false);

      if (selection.kind === "upcoming") {
        this.state.setPhase("waiting");
        log("playback.waiting", {
          eventId: selection.event.event_id,
          eventName: selection.event.event_name,
          waitSec: Math.round(selection.waitMs / 1000)
        });
        await this.sleep(selection.waitMs, signal);
        continue;
      }

      log("playback.idle", { reason: "no active or upcoming events" });
      return;
    }
  }

  private async playEvent(selection: ActiveSelection, signal: AbortSignal): Promise<PlayOutcome> {
    const { event, window } = selection;
    this.state.setActiveEvent(event, false);
    this.state.setPhase("playing");

    if (event.tracks.length === 0) {
      logError("playback.event.empty", new Error("Event does not include any tracks"), { eventId: event.event_id });
      this.state.recordError("playback", `Event "${event.event_name}" has no tracks`);
      return "exhausted";
    }

    const position = locateTrack(event, selection.elapsedSec, (trackIndex) => {
      if (this.firstReport(`duration:${event.event_id}:${trackIndex}`)) {
        logWarn("playback.track.duration_missing", { eventId: event.event_id, trackIndex });
      }
    });
    if (!position) {
      logWarn("playback.cursor.exhausted", { eventId: event.event_id, elapsedSec: selection.elapsedSec });
      return "exhausted";
    }

    log("playback.event.resume", {
      eventId: event.event_id,
      eventName: event.event_name,
      elapsedSec: selection.elapsedSec,
      trackIndex: position.trackIndex,
      offsetSec: position.offsetSec
    });

    let played = false;
    for (let i = position.trackIndex; i < event.tracks.length; i += 1) {
      if (signal.aborted) return "aborted";
      const track = event.tracks[i];

      let handle: AudioHandle;
      try {
        handle = await this.deps.fetcher.fetch(track.track_url, signal);
      } catch (error) {
        if (signal.aborted) return "aborted";
        logError("playback.fetch.failed", error, { eventId: event.event_id, trackId: track.track_id, locator: track.track_url });
        this.state.recordError("audio.fetch", errorMessage(error));
        await this.endEvent();
        return "failed";
      }
      if (signal.aborted) return "aborted";

      const clipSec = handle.durationSec;
      const offsetSec = i === position.trackIndex
        ? clamp(position.offsetSec, 0, Math.max(0, clipSec - PLAYBACK_EPSILON_SEC))
        : 0;
      if (offsetSec >= clipSec - PLAYBACK_EPSILON_SEC) {
        logWarn("playback.track.skipped", { eventId: event.event_id, trackId: track.track_id, clipSec, offsetSec });
        continue;
      }

      try {
        await this.deps.output.play(handle, offsetSec);
      } catch (error) {
        logError("playback.output.failed", error, { eventId: event.event_id, trackId: track.track_id });
        this.state.recordError("audio.output", errorMessage(error));
        await this.endEvent();
        return "failed";
      }
      played = true;
      this.state.setTrack(track);
      log("playback.track.started", { eventId: event.event_id, trackId: track.track_id, trackName: track.track_name, offsetSec });

      const untilEndSec = (window.effectiveEndMs - this.deps.timeSync.now()) / 1000;
      if (untilEndSec <= 0) {
        await this.endEvent();
        return "ended";
      }
      await this.sleep(Math.min(clipSec - offsetSec, untilEndSec) * 1000, signal);
      if (signal.aborted) return "aborted";
      if (this.deps.timeSync.now() >= window.effectiveEndMs) {
        await this.endEvent();
        log("playback.event.ended", { eventId: event.event_id });
        return "ended";
      }
    }

    this.state.setTrack(null);
    log("playback.event.finished", { eventId: event.event_id, played });
    return played ? "completed" : "exhausted";
  }

  private async endEvent(): Promise<void> {
    await this.deps.output.stop();
    this.state.setTrack(null);
  }

  /** Keeps a failing or empty event from being re-resolved in a tight loop. */
  private async idleAfter(outcome: PlayOutcome, effectiveEndMs: number, signal: AbortSignal): Promise<void> {
    if (outcome !== "failed" && outcome !== "exhausted") return;
    const untilEnd = Math.max(0, effectiveEndMs - this.deps.timeSync.now());
    const idleMs = outcome === "failed" ? this.fetchRetryMs : IDLE_RESOLVE_MS;
    await this.sleep(Math.min(idleMs, untilEnd), signal);
  }

  private async playFallback(payload: ScheduledEvent, signal: AbortSignal): Promise<void> {
    this.state.setActiveEvent(payload, true);
    this.state.setPhase("fallback");
    log("fallback.started", { eventId: payload.event_id, eventName: payload.event_name });

    while (!signal.aborted) {
      if (this.scheduledEventActive()) {
        await this.stopFallback("scheduled event started");
        return;
      }

      let played = false;
      for (const track of payload.tracks) {
        if (signal.aborted) return;

        let handle: AudioHandle;
        try {
          handle = await this.deps.fetcher.fetch(track.track_url, signal);
          if (signal.aborted) return;
          if (handle.durationSec <= 0) continue;
          await this.deps.output.play(handle, 0);
        } catch (error) {
          if (signal.aborted) return;
          logError("fallback.fetch.failed", error, { trackId: track.track_id, locator: track.track_url });
          this.state.recordError("audio.fetch", errorMessage(error));
          await this.stopFallback("track unavailable");
          await this.sleep(this.cappedByNextEvent(Math.max(1_000, this.fetchRetryMs)), signal);
          return;
        }
        played = true;
        this.state.setTrack(track);
        log("fallback.track.started", { trackId: track.track_id, trackName: track.track_name });

        let remainingMs = handle.durationSec * 1000;
        while (remainingMs > 0) {
          const waitMs = this.cappedByNextEvent(Math.min(this.checkIntervalMs, remainingMs));
          await this.sleep(waitMs, signal);
          if (signal.aborted) return;
          remainingMs -= waitMs;
          if (this.scheduledEventActive()) {
            await this.stopFallback("scheduled event started");
            return;
          }
        }
      }

      if (!played) {
        await this.sleep(this.cappedByNextEvent(this.checkIntervalMs), signal);
      }
    }
  }

  private async stopFallback(reason: string): Promise<void> {
    await this.deps.output.stop();
    this.state.setActiveEvent(null, false);
    log("fallback.stopped", { reason });
  }

  private scheduledEventActive(): boolean {
    const events = this.deps.schedule.current();
    return selectEvent(events, this.deps.timeSync.now(), this.reporterFor(events)).kind === "active";
  }

  /** Shortens a wait so it never runs past the next scheduled start. */
  private cappedByNextEvent(ms: number): number {
    const events = this.deps.schedule.current();
    const next = selectEvent(events, this.deps.timeSync.now(), this.reporterFor(events));
    if (next.kind === "upcoming" && next.waitMs > 0) {
      return Math.min(ms, next.waitMs);
    }
    return ms;
  }

  private reporterFor(events: readonly ScheduledEvent[]): SelectionReporter {
    if (this.reportedSnapshot !== events) {
      this.reportedSnapshot = events;
      this.reported.clear();
    }
    return this.reporter;
  }

  private firstReport(key: string): boolean {
    if (this.reported.has(key)) return false;
    this.reported.add(key);
    return true;
  }
}
