import { createHash } from "node:crypto";
import { access, mkdir, rename, writeFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { AudioFetchError, errorMessage } from "./errors";
import { log } from "./log";
import { execCmd } from "./proc";

export type AudioHandle = {
  locator: string;
  /** What the output plays: a local file path. */
  source: string;
  durationSec: number;
};

export interface AudioFetcher {
  fetch(locator: string, signal?: AbortSignal): Promise<AudioHandle>;
}

export type ResolvedLocator =
  | { kind: "url"; url: string }
  | { kind: "file"; filePath: string };

export type LocatorOptions = {
  mediaBaseUrl?: string | null;
  mediaDir: string;
};

export function resolveLocator(locator: string, opts: LocatorOptions): ResolvedLocator {
  const trimmed = locator.trim();
  if (!trimmed) {
    throw new AudioFetchError(locator, "Track has an empty locator");
  }
  if (/^https?:\/\//i.test(trimmed)) {
    return { kind: "url", url: trimmed };
  }
  if (/^file:\/\//i.test(trimmed)) {
    return { kind: "file", filePath: fileURLToPath(trimmed) };
  }
  if (opts.mediaBaseUrl) {
    const base = opts.mediaBaseUrl.endsWith("/") ? opts.mediaBaseUrl : `${opts.mediaBaseUrl}/`;
    return { kind: "url", url: new URL(trimmed.replace(/^\/+/, ""), base).toString() };
  }
  return { kind: "file", filePath: path.resolve(opts.mediaDir, trimmed) };
}

const PROBE_TIMEOUT_MS = 30_000;

export function cacheFileFor(url: string, cacheDir: string): string {
  const digest = createHash("sha1").update(url).digest("hex");
  const ext = path.extname(new URL(url).pathname).toLowerCase() || ".audio";
  return path.join(cacheDir, `${digest}${ext}`);
}

export async function getDurationSec(filePath: string, signal?: AbortSignal): Promise<number> {
  const { stdout } = await execCmd("ffprobe", [
    "-v",
    "error",
    "-show_entries",
    "format=duration",
    "-of",
    "default=noprint_wrappers=1:nokey=1",
    filePath
  ], { signal, timeoutMs: PROBE_TIMEOUT_MS });

  const value = Number(stdout.trim());
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`Could not read duration for ${filePath}`);
  }
  return value;
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

export type MediaFetcherOptions = LocatorOptions & {
  cacheDir: string;
  probe?: (filePath: string, signal?: AbortSignal) => Promise<number>;
};

/** Resolves a locator to a local file (downloading remote media once) and probes its duration. */
export class MediaFetcher implements AudioFetcher {
  private readonly probe: (filePath: string, signal?: AbortSignal) => Promise<number>;

  constructor(private readonly opts: MediaFetcherOptions) {
    this.probe = opts.probe ?? getDurationSec;
  }

  async fetch(locator: string, signal?: AbortSignal): Promise<AudioHandle> {
    const resolved = resolveLocator(locator, this.opts);
    const filePath = resolved.kind === "url"
      ? await this.download(locator, resolved.url, signal)
      : await this.local(locator, resolved.filePath);

    let durationSec: number;
    try {
      durationSec = await this.probe(filePath, signal);
    } catch (error) {
      throw new AudioFetchError(locator, `Unable to decode audio for ${locator}: ${errorMessage(error)}`);
    }
    return { locator, source: filePath, durationSec };
  }

  private async local(locator: string, filePath: string): Promise<string> {
    if (!(await fileExists(filePath))) {
      throw new AudioFetchError(locator, `Audio file not found: ${filePath}`);
    }
    return filePath;
  }

  private async download(locator: string, url: string, signal?: AbortSignal): Promise<string> {
    await mkdir(this.opts.cacheDir, { recursive: true });
    const target = cacheFileFor(url, this.opts.cacheDir);
    if (await fileExists(target)) {
      return target;
    }

    log("media.download", { url });
    let body: ArrayBuffer;
    try {
      const res = await fetch(url, { signal });
      if (!res.ok) {
        throw new Error(`HTTP ${res.status}`);
      }
      body = await res.arrayBuffer();
    } catch (error) {
      throw new AudioFetchError(locator, `Failed to download ${url}: ${errorMessage(error)}`);
    }

    const partial = `${target}.part`;
    await writeFile(partial, Buffer.from(body));
    await rename(partial, target);
    return target;
  }
}

/**
 * Shares one fetch per locator between callers. Concurrent requests for the
 * same locator join the in-flight fetch; failed fetches are forgotten.
 */
export class CachedAudioFetcher implements AudioFetcher {
  private readonly entries = new Map<string, Promise<AudioHandle>>();

  constructor(private readonly inner: AudioFetcher) {}

  fetch(locator: string, signal?: AbortSignal): Promise<AudioHandle> {
    const cached = this.entries.get(locator);
    if (cached) {
      return cached;
    }
    const pending = this.inner.fetch(locator, signal);
    this.entries.set(locator, pending);
    pending.catch(() => {
      if (this.entries.get(locator) === pending) {
        this.entries.delete(locator);
      }
    });
    return pending;
  }

  size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
