import test from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { findDefaultInSchedule, loadDefaultEventFile, resolveDefaultEvent } from "../src/default-event";
import { setLogLevel } from "../src/log";
import type { ScheduledEvent } from "../src/types";
import { T0, makeEvent, makeTrack } from "./fakes";

setLogLevel("silent");

const show = makeEvent("show", T0, T0 + 3_600_000, [makeTrack("s1", 60)]);
const filler: ScheduledEvent = { ...makeEvent("filler", T0, T0, [makeTrack("f1", 30)]), event_name: "  Default " };
const explicit = makeEvent("standalone", T0, T0, [makeTrack("x1", 30)]);

test("finds the default event by id, then by name", () => {
  assert.equal(findDefaultInSchedule([show, filler], "FILLER"), filler);
  assert.equal(findDefaultInSchedule([show, filler]), filler);
  assert.equal(findDefaultInSchedule([show, filler], "missing"), filler);
  assert.equal(findDefaultInSchedule([show]), null);
});

test("an explicit payload wins over the schedule", () => {
  assert.equal(resolveDefaultEvent([show, filler], { enabled: true, explicit }), explicit);
  assert.equal(resolveDefaultEvent([show, filler], { enabled: true, explicit: null }), filler);
});

test("disabled, missing or empty defaults turn fallback off", () => {
  assert.equal(resolveDefaultEvent([show, filler], { enabled: false, explicit }), null);
  assert.equal(resolveDefaultEvent([show], { enabled: true }), null);
  const empty = { ...explicit, tracks: [] };
  assert.equal(resolveDefaultEvent([show], { enabled: true, explicit: empty }), null);
});

test("loads the first event of a standalone default-event file", async () => {
  const dir = await mkdtemp(path.join(tmpdir(), "default-event-"));
  const file = path.join(dir, "default.json");
  await writeFile(file, JSON.stringify(explicit), "utf-8");

  const loaded = await loadDefaultEventFile(file);
  assert.equal(loaded?.event_id, "standalone");
  assert.equal(loaded?.tracks[0]?.track_url, "x1.mp3");
  assert.equal(await loadDefaultEventFile(path.join(dir, "missing.json")), null);
});
