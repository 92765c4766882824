import { spawn, type ChildProcess } from "node:child_process";
import type { AudioHandle } from "./audio";
import { log, logError } from "./log";

export interface AudioOutput {
  /** Starts `handle` at `offsetSec`, replacing whatever was playing. */
  play(handle: AudioHandle, offsetSec: number): Promise<void>;
  stop(): Promise<void>;
}

export class FfplayOutput implements AudioOutput {
  private current?: ChildProcess;

  constructor(private readonly bin = "ffplay") {}

  async play(handle: AudioHandle, offsetSec: number): Promise<void> {
    await this.stop();
    const child = spawn(this.bin, [
      "-nodisp",
      "-autoexit",
      "-loglevel",
      "error",
      "-ss",
      Math.max(0, offsetSec).toFixed(3),
      handle.source
    ], { stdio: ["ignore", "ignore", "pipe"] });
    this.current = child;

    child.stderr?.on("data", (d) => {
      const line = String(d).trim();
      if (line) {
        log("output.ffplay", { line, source: handle.source });
      }
    });
    child.on("error", (error) => {
      logError("output.ffplay.error", error, { source: handle.source });
    });
    child.on("exit", (code) => {
      if (this.current === child) {
        this.current = undefined;
      }
      log("output.ffplay.exit", { code, source: handle.source }, "debug");
    });

    log("output.play", { locator: handle.locator, offsetSec, durationSec: handle.durationSec });
  }

  async stop(): Promise<void> {
    const child = this.current;
    this.current = undefined;
    if (child && child.exitCode === null && !child.killed) {
      child.kill("SIGTERM");
    }
  }
}

/** Keeps time without producing sound; for headless runs. */
export class SilentOutput implements AudioOutput {
  private playing: { locator: string; offsetSec: number } | null = null;

  async play(handle: AudioHandle, offsetSec: number): Promise<void> {
    this.playing = { locator: handle.locator, offsetSec };
    log("output.silent.play", { locator: handle.locator, offsetSec, durationSec: handle.durationSec });
  }

  async stop(): Promise<void> {
    if (!this.playing) return;
    log("output.silent.stop", { locator: this.playing.locator });
    this.playing = null;
  }

  nowPlaying(): { locator: string; offsetSec: number } | null {
    return this.playing;
  }
}
