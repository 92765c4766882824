import { ScheduleLoadError, errorMessage } from "./errors";
import { log, logError, logWarn } from "./log";
import { loadScheduleFile, parseScheduleJson, validateSchedule, type ScheduleValidation } from "./schedule";
import type { ScheduleIssue, ScheduledEvent } from "./types";

export interface ScheduleSource {
  readonly description: string;
  loadSchedule(): Promise<ScheduleValidation>;
}

export class FileScheduleSource implements ScheduleSource {
  constructor(private readonly filePath: string) {}

  get description(): string {
    return `file:${this.filePath}`;
  }

  loadSchedule(): Promise<ScheduleValidation> {
    return loadScheduleFile(this.filePath);
  }
}

export class HttpScheduleSource implements ScheduleSource {
  constructor(private readonly url: string, private readonly timeoutMs = 15_000) {}

  get description(): string {
    return this.url;
  }

  async loadSchedule(): Promise<ScheduleValidation> {
    log("schedule.download", { url: this.url });
    let body: string;
    try {
      const res = await fetch(this.url, { signal: AbortSignal.timeout(this.timeoutMs) });
      if (!res.ok) {
        throw new Error(`HTTP ${res.status}`);
      }
      body = await res.text();
    } catch (error) {
      throw new ScheduleLoadError(`Failed to download schedule from ${this.url}: ${errorMessage(error)}`);
    }
    return parseScheduleJson(body);
  }
}

/** In-memory source; the document is validated like any other. */
export class StaticScheduleSource implements ScheduleSource {
  readonly description = "static";

  constructor(private readonly data: unknown) {}

  async loadSchedule(): Promise<ScheduleValidation> {
    return validateSchedule(this.data);
  }
}

function freezeEvent(event: ScheduledEvent): ScheduledEvent {
  for (const track of event.tracks) {
    Object.freeze(track);
  }
  Object.freeze(event.tracks);
  return Object.freeze(event);
}

type StoreListener = (events: readonly ScheduledEvent[]) => void;

export type ScheduleStoreOptions = {
  cacheLastResponse?: boolean;
};

/**
 * Holds the current schedule snapshot. A reload swaps the whole collection;
 * events already handed out are frozen and never change underneath a reader.
 */
export class ScheduleStore {
  private events: readonly ScheduledEvent[] = [];
  private issues: ScheduleIssue[] = [];
  private loadedAt: string | null = null;
  private refreshTimer: NodeJS.Timeout | null = null;
  private readonly listeners = new Set<StoreListener>();

  constructor(
    private readonly source: ScheduleSource,
    private readonly opts: ScheduleStoreOptions = {}
  ) {}

  get description(): string {
    return this.source.description;
  }

  current(): readonly ScheduledEvent[] {
    return this.events;
  }

  currentIssues(): ScheduleIssue[] {
    return [...this.issues];
  }

  lastLoadedAt(): string | null {
    return this.loadedAt;
  }

  subscribe(listener: StoreListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async load(force = false): Promise<readonly ScheduledEvent[]> {
    if (!force && this.opts.cacheLastResponse && this.events.length > 0) {
      return this.events;
    }
    const result = await this.source.loadSchedule();
    this.replace(result);
    return this.events;
  }

  replace(result: ScheduleValidation): void {
    this.events = Object.freeze(result.events.map(freezeEvent));
    this.issues = [...result.issues];
    this.loadedAt = new Date().toISOString();
    for (const issue of this.issues) {
      logWarn("schedule.issue", { ...issue, source: this.source.description });
    }
    log("schedule.loaded", {
      source: this.source.description,
      events: this.events.length,
      issues: this.issues.length
    });
    for (const listener of this.listeners) {
      listener(this.events);
    }
  }

  startAutoRefresh(intervalMs: number): void {
    if (this.refreshTimer || intervalMs <= 0) return;
    this.refreshTimer = setInterval(() => {
      this.load(true).catch((error) => {
        logError("schedule.refresh.failed", error, { source: this.source.description });
      });
    }, intervalMs);
  }

  stopAutoRefresh(): void {
    if (!this.refreshTimer) return;
    clearInterval(this.refreshTimer);
    this.refreshTimer = null;
  }
}
