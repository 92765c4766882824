import test from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { CachedAudioFetcher, MediaFetcher, cacheFileFor, resolveLocator, type AudioFetcher, type AudioHandle } from "../src/audio";
import { SilentOutput } from "../src/audio-output";
import { AudioFetchError } from "../src/errors";
import { setLogLevel } from "../src/log";

setLogLevel("silent");

test("resolves locators against the media base URL or directory", () => {
  assert.deepEqual(resolveLocator("https://cdn.example.com/a.mp3", { mediaDir: "/srv/media" }), {
    kind: "url",
    url: "https://cdn.example.com/a.mp3"
  });
  assert.deepEqual(resolveLocator("file:///tmp/a.mp3", { mediaDir: "/srv/media" }), { kind: "file", filePath: "/tmp/a.mp3" });
  assert.deepEqual(resolveLocator("/shows/a.mp3", { mediaBaseUrl: "https://media.example.com/audio", mediaDir: "/srv/media" }), {
    kind: "url",
    url: "https://media.example.com/audio/shows/a.mp3"
  });
  assert.deepEqual(resolveLocator("shows/a.mp3", { mediaDir: "/srv/media" }), { kind: "file", filePath: "/srv/media/shows/a.mp3" });
  assert.throws(() => resolveLocator("  ", { mediaDir: "/srv/media" }), AudioFetchError);
});

test("cache file names are stable hashes that keep the extension", () => {
  const file = cacheFileFor("https://cdn.example.com/x/Song.MP3", "/cache");
  assert.equal(path.dirname(file), "/cache");
  assert.match(path.basename(file), /^[0-9a-f]{40}\.mp3$/);
  assert.equal(cacheFileFor("https://cdn.example.com/x/Song.MP3", "/cache"), file);
  assert.match(cacheFileFor("https://cdn.example.com/stream", "/cache"), /\.audio$/);
});

test("media fetcher probes local files and reports missing or undecodable ones", async () => {
  const dir = await mkdtemp(path.join(tmpdir(), "media-"));
  await writeFile(path.join(dir, "clip.mp3"), "not really audio");
  const fetcher = new MediaFetcher({
    cacheDir: path.join(dir, "cache"),
    mediaDir: dir,
    probe: async (filePath) => {
      if (filePath.endsWith("clip.mp3")) return 12.5;
      throw new Error("no audio stream");
    }
  });

  assert.deepEqual(await fetcher.fetch("clip.mp3"), {
    locator: "clip.mp3",
    source: path.join(dir, "clip.mp3"),
    durationSec: 12.5
  });
  await assert.rejects(fetcher.fetch("missing.mp3"), AudioFetchError);

  await writeFile(path.join(dir, "broken.wav"), "");
  await assert.rejects(fetcher.fetch("broken.wav"), /Unable to decode audio for broken.wav: no audio stream/);
});

class CountingFetcher implements AudioFetcher {
  calls = 0;
  failNext = false;

  async fetch(locator: string): Promise<AudioHandle> {
    this.calls += 1;
    if (this.failNext) {
      this.failNext = false;
      throw new AudioFetchError(locator, "unavailable");
    }
    return { locator, source: `/media/${locator}`, durationSec: 60 };
  }
}

test("cached fetcher shares one fetch per locator", async () => {
  const inner = new CountingFetcher();
  const cached = new CachedAudioFetcher(inner);

  const [a, b] = await Promise.all([cached.fetch("a.mp3"), cached.fetch("a.mp3")]);
  assert.equal(a, b);
  await cached.fetch("a.mp3");
  assert.equal(inner.calls, 1);
  assert.equal(cached.size(), 1);
});

test("cached fetcher forgets failures", async () => {
  const inner = new CountingFetcher();
  const cached = new CachedAudioFetcher(inner);
  inner.failNext = true;

  await assert.rejects(cached.fetch("a.mp3"), AudioFetchError);
  assert.equal(cached.size(), 0);
  assert.equal((await cached.fetch("a.mp3")).durationSec, 60);
  assert.equal(inner.calls, 2);
});

test("silent output tracks what would be playing", async () => {
  const output = new SilentOutput();
  await output.play({ locator: "a.mp3", source: "/media/a.mp3", durationSec: 60 }, 12);
  assert.deepEqual(output.nowPlaying(), { locator: "a.mp3", offsetSec: 12 });
  await output.stop();
  assert.equal(output.nowPlaying(), null);
});
