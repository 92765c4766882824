import test from "node:test";
import assert from "node:assert/strict";
import { isPlayableDuration, locateTrack, totalTrackDurationSec } from "../src/track-cursor";
import { T0, makeEvent, makeTrack } from "./fakes";

const event = makeEvent("e1", T0, T0 + 3_600_000, [makeTrack("a", 180), makeTrack("b", 120)]);

test("locates the track and offset for elapsed time", () => {
  assert.deepEqual(locateTrack(event, 0), { trackIndex: 0, offsetSec: 0 });
  assert.deepEqual(locateTrack(event, 90), { trackIndex: 0, offsetSec: 90 });
  assert.deepEqual(locateTrack(event, 180), { trackIndex: 1, offsetSec: 0 });
  assert.deepEqual(locateTrack(event, 250.5), { trackIndex: 1, offsetSec: 70.5 });
});

test("returns null once elapsed time covers every track", () => {
  assert.equal(locateTrack(event, 300), null);
  assert.equal(locateTrack(event, 10_000), null);
  assert.equal(locateTrack(makeEvent("empty", T0, T0 + 1, []), 0), null);
});

test("treats negative or non-finite elapsed time as the start", () => {
  assert.deepEqual(locateTrack(event, -5), { trackIndex: 0, offsetSec: 0 });
  assert.deepEqual(locateTrack(event, Number.NaN), { trackIndex: 0, offsetSec: 0 });
});

test("steps over tracks without a usable duration", () => {
  const gappy = makeEvent("gappy", T0, T0 + 3_600_000, [
    makeTrack("a", 60),
    makeTrack("broken", 0),
    makeTrack("b", 60),
    makeTrack("nan", Number.NaN)
  ]);
  const skipped: number[] = [];

  assert.deepEqual(locateTrack(gappy, 75, (i) => skipped.push(i)), { trackIndex: 2, offsetSec: 15 });
  assert.deepEqual(skipped, [1]);
  assert.equal(totalTrackDurationSec(gappy), 120);
});

test("only finite positive durations are playable", () => {
  assert.equal(isPlayableDuration(1), true);
  assert.equal(isPlayableDuration(0), false);
  assert.equal(isPlayableDuration(-3), false);
  assert.equal(isPlayableDuration(Number.POSITIVE_INFINITY), false);
});
