import type { StationEvent } from "./types";

export type RevisionEntry = {
  revision: number;
  event: StationEvent;
};

/**
 * Numbered, bounded history of station events so reconnecting clients can
 * catch up from the last revision they saw.
 */
export class RevisionLog {
  private revision = 0;
  private entries: RevisionEntry[] = [];

  constructor(private readonly max = 2000) {}

  current(): number {
    return this.revision;
  }

  append(event: StationEvent): RevisionEntry {
    this.revision += 1;
    const entry = { revision: this.revision, event: { ts: event.ts, event: event.event, payload: event.payload } };
    this.entries.push(entry);
    if (this.entries.length > this.max) {
      this.entries.splice(0, this.entries.length - this.max);
    }
    return entry;
  }

  /**
   * Entries after `lastSeen`, or null when the client has to start over from a
   * snapshot: it never saw anything, or the entries it missed were dropped.
   */
  since(lastSeen: number): RevisionEntry[] | null {
    const normalized = Number.isFinite(lastSeen) && lastSeen >= 0 ? Math.floor(lastSeen) : 0;
    if (normalized === 0 || normalized > this.revision) return null;
    const firstAvailable = this.entries.length ? this.entries[0].revision : this.revision + 1;
    if (normalized + 1 < firstAvailable) return null;
    return this.entries.filter((entry) => entry.revision > normalized);
  }
}
