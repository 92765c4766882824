import test from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { ScheduleLoadError } from "../src/errors";
import { setLogLevel } from "../src/log";
import type { ScheduleValidation } from "../src/schedule";
import { FileScheduleSource, ScheduleStore, StaticScheduleSource, type ScheduleSource } from "../src/schedule-source";
import type { ScheduledEvent } from "../src/types";
import { T0, makeEvent, makeTrack } from "./fakes";

setLogLevel("silent");

const show = makeEvent("show", T0, T0 + 3_600_000, [makeTrack("s1", 60)]);

class SequenceSource implements ScheduleSource {
  readonly description = "sequence";
  calls = 0;

  constructor(private readonly results: Array<ScheduledEvent[] | Error>) {}

  async loadSchedule(): Promise<ScheduleValidation> {
    const result = this.results[Math.min(this.calls, this.results.length - 1)];
    this.calls += 1;
    if (result instanceof Error) throw result;
    return { events: result, issues: [] };
  }
}

test("store holds a frozen snapshot", async () => {
  const store = new ScheduleStore(new StaticScheduleSource([show]));
  const events = await store.load();

  assert.equal(events.length, 1);
  assert.equal(Object.isFrozen(events), true);
  assert.equal(Object.isFrozen(events[0]), true);
  assert.equal(Object.isFrozen(events[0]?.tracks[0]), true);
  assert.equal(store.current(), events);
  assert.notEqual(store.lastLoadedAt(), null);
});

test("store serves the cached snapshot unless forced", async () => {
  const source = new SequenceSource([[show]]);
  const store = new ScheduleStore(source, { cacheLastResponse: true });

  await store.load();
  await store.load();
  assert.equal(source.calls, 1);
  await store.load(true);
  assert.equal(source.calls, 2);

  const uncached = new SequenceSource([[show]]);
  const plain = new ScheduleStore(uncached);
  await plain.load();
  await plain.load();
  assert.equal(uncached.calls, 2);
});

test("a failed reload keeps the previous snapshot", async () => {
  const store = new ScheduleStore(new SequenceSource([[show], new ScheduleLoadError("offline")]));
  const before = await store.load();

  await assert.rejects(store.load(true), ScheduleLoadError);
  assert.equal(store.current(), before);
});

test("subscribers receive each replaced snapshot and issues are kept", async () => {
  const store = new ScheduleStore(new StaticScheduleSource([show, { ...show, event_id: "empty", tracks: [] }]));
  const sizes: number[] = [];
  store.subscribe((events) => sizes.push(events.length));

  await store.load();

  assert.deepEqual(sizes, [2]);
  assert.deepEqual(store.currentIssues().map((i) => [i.kind, i.eventId]), [["no_tracks", "empty"]]);
});

test("file source reads schedule documents", async () => {
  const dir = await mkdtemp(path.join(tmpdir(), "schedule-source-"));
  const file = path.join(dir, "schedule.json");
  await writeFile(file, JSON.stringify([show]), "utf-8");
  const source = new FileScheduleSource(file);

  assert.equal(source.description, `file:${file}`);
  const { events } = await source.loadSchedule();
  assert.deepEqual(events, [show]);
});
