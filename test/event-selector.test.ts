import test from "node:test";
import assert from "node:assert/strict";
import { effectiveEndMs, isEventActiveAt, resolveWindow, selectEvent, type WindowIssue } from "../src/event-selector";
import type { ScheduledEvent } from "../src/types";
import { T0, iso, makeEvent, makeTrack } from "./fakes";

const HOUR = 3_600_000;

function show(id: string, startMs: number, endMs: number, trackSec = 3_600): ScheduledEvent {
  return makeEvent(id, startMs, endMs, [makeTrack(`${id}-1`, trackSec)]);
}

test("selects the event whose window contains now", () => {
  const events = [show("morning", T0 - HOUR, T0), show("noon", T0, T0 + HOUR)];
  const result = selectEvent(events, T0 + 90_000);

  assert.equal(result.kind, "active");
  if (result.kind !== "active") return;
  assert.equal(result.event.event_id, "noon");
  assert.equal(result.elapsedSec, 90);
  assert.deepEqual(result.window, { startMs: T0, endMs: T0 + HOUR, effectiveEndMs: T0 + HOUR });
});

test("window start is inclusive and effective end exclusive", () => {
  const events = [show("noon", T0, T0 + HOUR)];
  assert.equal(selectEvent(events, T0).kind, "active");
  assert.equal(selectEvent(events, T0 + HOUR).kind, "none");
});

test("reports the soonest upcoming event with its wait", () => {
  const events = [show("late", T0 + 2 * HOUR, T0 + 3 * HOUR), show("next", T0 + HOUR, T0 + 2 * HOUR)];
  const result = selectEvent(events, T0 + HOUR - 30_000);

  assert.equal(result.kind, "upcoming");
  if (result.kind !== "upcoming") return;
  assert.equal(result.event.event_id, "next");
  assert.equal(result.waitMs, 30_000);
});

test("returns none once every event has ended", () => {
  const events = [show("a", T0 - 2 * HOUR, T0 - HOUR)];
  assert.deepEqual(selectEvent(events, T0), { kind: "none" });
  assert.deepEqual(selectEvent([], T0), { kind: "none" });
});

test("overlapping windows resolve to the first in source order", () => {
  const first = show("first", T0 - HOUR, T0 + HOUR, 7_200);
  const second = show("second", T0 - 60_000, T0 + 60_000);
  const overlaps: Array<[string, string]> = [];

  const result = selectEvent([first, second], T0, {
    onOverlap: (winner, shadowed) => overlaps.push([winner.event_id, shadowed.event_id])
  });

  assert.equal(result.kind === "active" ? result.event.event_id : null, "first");
  assert.deepEqual(overlaps, [["first", "second"]]);
  const reversed = selectEvent([second, first], T0);
  assert.equal(reversed.kind === "active" ? reversed.event.event_id : null, "second");
});

test("equal upcoming starts resolve to the first in source order", () => {
  const a = show("a", T0 + HOUR, T0 + 2 * HOUR);
  const b = show("b", T0 + HOUR, T0 + 3 * HOUR);
  const result = selectEvent([a, b], T0);
  assert.equal(result.kind === "upcoming" ? result.event.event_id : null, "a");
});

test("effective end is capped by the total track duration", () => {
  const short = makeEvent("short", T0, T0 + HOUR, [makeTrack("x", 60), makeTrack("y", 60)]);
  assert.equal(effectiveEndMs(short, T0, T0 + HOUR), T0 + 120_000);

  assert.equal(selectEvent([short], T0 + 119_000).kind, "active");
  const after = selectEvent([short, show("later", T0 + HOUR, T0 + 2 * HOUR)], T0 + 150_000);
  assert.equal(after.kind === "upcoming" ? after.event.event_id : null, "later");
});

test("excludes events with unusable windows and reports why", () => {
  const badStart: ScheduledEvent = { ...show("bad-start", T0, T0 + HOUR), start_time_utc: "soon" };
  const badEnd: ScheduledEvent = { ...show("bad-end", T0, T0 + HOUR), end_time_utc: "" };
  const inverted = show("inverted", T0, T0 - HOUR);
  const excluded: Array<[number, WindowIssue]> = [];

  const result = selectEvent([badStart, badEnd, inverted], T0 + 1_000, {
    onExcluded: (_event, index, issue) => excluded.push([index, issue])
  });

  assert.deepEqual(result, { kind: "none" });
  assert.deepEqual(excluded, [
    [0, "invalid_start"],
    [1, "invalid_end"],
    [2, "inverted_window"]
  ]);
  assert.equal(resolveWindow(inverted), "inverted_window");
});

test("an event without usable track durations keeps its declared window", () => {
  const silent = makeEvent("silent", T0, T0 + HOUR, [makeTrack("z", 0)]);
  const bare = makeEvent("bare", T0 + HOUR, T0 + 2 * HOUR, []);
  assert.equal(effectiveEndMs(silent, T0, T0 + HOUR), T0 + HOUR);

  const result = selectEvent([silent, bare], T0 + 1_000);
  assert.equal(result.kind, "active");
  if (result.kind !== "active") return;
  assert.equal(result.event.event_id, "silent");
  assert.deepEqual(result.window, { startMs: T0, endMs: T0 + HOUR, effectiveEndMs: T0 + HOUR });
  assert.equal(selectEvent([bare], T0 + HOUR + 1_000).kind, "active");
});

test("timestamps without an offset are read as UTC", () => {
  const event: ScheduledEvent = {
    ...show("naive", T0, T0 + HOUR),
    start_time_utc: "2026-03-01 12:00:00",
    end_time_utc: "2026-03-01T13:00:00"
  };
  const result = selectEvent([event], T0 + 1_000);
  assert.equal(result.kind === "active" ? result.elapsedSec : null, 1);
});

test("repeated selection with the same inputs gives the same result", () => {
  const events = [show("a", T0, T0 + HOUR), show("b", T0 + HOUR, T0 + 2 * HOUR)];
  for (const now of [T0 - 1, T0, T0 + HOUR - 1, T0 + HOUR, T0 + 3 * HOUR]) {
    assert.deepEqual(selectEvent(events, now), selectEvent(events, now));
  }
});

test("isEventActiveAt accepts epoch ms, dates and ISO strings", () => {
  const events = [show("noon", T0, T0 + HOUR)];
  assert.equal(isEventActiveAt(events, T0 + 1)?.kind, "active");
  assert.equal(isEventActiveAt(events, new Date(T0 - 1))?.kind, "upcoming");
  assert.equal(isEventActiveAt(events, iso(T0 + 2 * HOUR))?.kind, "none");
  assert.equal(isEventActiveAt(events, "whenever"), null);
  assert.equal(isEventActiveAt(events, new Date(Number.NaN)), null);
});
