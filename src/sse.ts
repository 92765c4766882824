import type { StationEvent } from "./types";

/** Ids are numbered by the caller, once per connection. */
export function formatSseEvent(event: StationEvent, id: number): string {
  return `id: ${id}\nretry: 2000\nevent: message\ndata: ${JSON.stringify(event)}\n\n`;
}

export function heartbeatSseEvent(id: number, now: Date = new Date()): string {
  return `id: ${id}\nretry: 2000\nevent: heartbeat\ndata: ${JSON.stringify({ ts: now.toISOString() })}\n\n`;
}
