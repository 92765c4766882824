import { z } from "zod";
import { TimeSourceError, errorMessage } from "./errors";
import { log, logWarn } from "./log";
import { parseUtcTimestamp, toIso } from "./timestamp";
import type { AnchorOrigin, TimeAnchor } from "./types";
import { wait, type Sleep } from "./wait";

export interface TimeSource {
  readonly name: string;
  fetchUtc(signal: AbortSignal): Promise<number>;
}

const timeResponseSchema = z.object({
  datetime: z.string().min(1)
});

export class HttpTimeSource implements TimeSource {
  constructor(private readonly url: string) {}

  get name(): string {
    return this.url;
  }

  async fetchUtc(signal: AbortSignal): Promise<number> {
    const res = await fetch(this.url, { signal, headers: { Accept: "application/json" } });
    if (!res.ok) {
      throw new TimeSourceError(`Time service responded ${res.status}`);
    }
    const body = timeResponseSchema.safeParse(await res.json());
    if (!body.success) {
      throw new TimeSourceError("Time service response is missing a datetime field");
    }
    const ms = parseUtcTimestamp(body.data.datetime);
    if (ms === null) {
      throw new TimeSourceError(`Time service returned an unparseable datetime "${body.data.datetime}"`);
    }
    return ms;
  }
}

export class SystemTimeSource implements TimeSource {
  readonly name = "system";

  async fetchUtc(): Promise<number> {
    return Date.now();
  }
}

export type TimeSyncOptions = {
  source: TimeSource;
  resyncIntervalMs?: number;
  initialTimeoutMs?: number;
  mockUtcTime?: string | null;
  monotonicNow?: () => number;
  wallClockNow?: () => number;
  sleep?: Sleep;
};

type AnchorListener = (anchor: TimeAnchor) => void;

/**
 * Current UTC time extrapolated from the last good reading with a monotonic
 * clock. The network is only consulted on initialization and on resync; reads
 * in between never block.
 */
export class TimeSync {
  private readonly source: TimeSource;
  private readonly resyncIntervalMs: number;
  private readonly initialTimeoutMs: number;
  private readonly mockUtcTime: string | null;
  private readonly monotonicNow: () => number;
  private readonly wallClockNow: () => number;
  private readonly sleep: Sleep;
  private readonly listeners = new Set<AnchorListener>();

  private current: TimeAnchor | null = null;
  private initialization: Promise<void> | null = null;
  private overridden = false;
  private lifecycle = new AbortController();

  constructor(opts: TimeSyncOptions) {
    this.source = opts.source;
    this.resyncIntervalMs = Math.max(0, opts.resyncIntervalMs ?? 60_000);
    this.initialTimeoutMs = Math.max(1, opts.initialTimeoutMs ?? 5_000);
    this.mockUtcTime = opts.mockUtcTime ?? null;
    this.monotonicNow = opts.monotonicNow ?? (() => performance.now());
    this.wallClockNow = opts.wallClockNow ?? (() => Date.now());
    this.sleep = opts.sleep ?? wait;
  }

  now(): number {
    if (!this.current) {
      return this.wallClockNow();
    }
    const elapsedMs = Math.max(0, this.monotonicNow() - this.current.baseMonotonicMs);
    return this.current.baseUtcMs + elapsedMs;
  }

  isReady(): boolean {
    return this.current !== null;
  }

  isOverridden(): boolean {
    return this.overridden;
  }

  anchor(): TimeAnchor | null {
    return this.current ? { ...this.current } : null;
  }

  subscribe(listener: AnchorListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  ensureInitialized(): Promise<void> {
    if (!this.initialization) {
      if (this.lifecycle.signal.aborted) {
        this.lifecycle = new AbortController();
      }
      const signal = this.lifecycle.signal;
      this.initialization = this.initialize().then(() => {
        this.resyncLoop(signal).catch((error) => {
          logWarn("timesync.resync.crash", { error: errorMessage(error) });
        });
      });
    }
    return this.initialization;
  }

  /** Pins the clock to `timestamp` and stops consulting the time source. */
  override(timestamp: number | string | Date): void {
    const ms = typeof timestamp === "string"
      ? parseUtcTimestamp(timestamp)
      : typeof timestamp === "number"
        ? timestamp
        : timestamp.getTime();
    if (ms === null || Number.isNaN(new Date(ms).getTime())) {
      throw new RangeError(`Invalid override timestamp: ${String(timestamp)}`);
    }
    this.overridden = true;
    this.setAnchor(ms, "override");
    if (!this.initialization) {
      this.initialization = Promise.resolve();
    }
  }

  /** One re-fetch. A failure keeps extrapolating from the previous anchor. */
  async refresh(): Promise<boolean> {
    if (this.overridden) return false;
    try {
      const ms = await this.fetchBounded();
      if (this.overridden) return false;
      this.setAnchor(ms, "remote");
      return true;
    } catch (error) {
      logWarn("timesync.refresh.failed", { source: this.source.name, error: errorMessage(error) });
      return false;
    }
  }

  stop(): void {
    this.lifecycle.abort();
    this.initialization = this.current ? Promise.resolve() : null;
  }

  private async initialize(): Promise<void> {
    if (this.current) return;

    if (this.mockUtcTime) {
      const mockMs = parseUtcTimestamp(this.mockUtcTime);
      if (mockMs !== null) {
        this.override(mockMs);
        return;
      }
      logWarn("timesync.mock.invalid", { mockUtcTime: this.mockUtcTime });
    }

    try {
      const ms = await this.fetchBounded();
      if (!this.current) {
        this.setAnchor(ms, "remote");
      }
    } catch (error) {
      logWarn("timesync.initial.failed", { source: this.source.name, error: errorMessage(error) });
      if (!this.current) {
        this.setAnchor(this.wallClockNow(), "local");
      }
    }
  }

  private async resyncLoop(signal: AbortSignal): Promise<void> {
    while (this.resyncIntervalMs > 0 && !this.overridden && !signal.aborted) {
      await this.sleep(this.resyncIntervalMs, signal);
      if (signal.aborted || this.overridden) return;
      await this.refresh();
    }
  }

  private async fetchBounded(): Promise<number> {
    const controller = new AbortController();
    const onStop = () => controller.abort();
    this.lifecycle.signal.addEventListener("abort", onStop, { once: true });
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new TimeSourceError(`Time fetch timed out after ${this.initialTimeoutMs}ms`));
      }, this.initialTimeoutMs);
    });
    try {
      return await Promise.race([this.source.fetchUtc(controller.signal), timeout]);
    } finally {
      clearTimeout(timer);
      this.lifecycle.signal.removeEventListener("abort", onStop);
    }
  }

  private setAnchor(baseUtcMs: number, origin: AnchorOrigin): void {
    this.current = { baseUtcMs, baseMonotonicMs: this.monotonicNow(), origin };
    log("timesync.anchored", { utc: toIso(baseUtcMs), origin });
    const snapshot = { ...this.current };
    for (const listener of this.listeners) {
      listener(snapshot);
    }
  }
}
