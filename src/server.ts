import express from "express";
import { createServer, type Server } from "node:http";
import { WebSocketServer } from "ws";
import { appConfig, type AppConfig } from "./config";
import { createStation, type Station } from "./bootstrap";
import { errorMessage } from "./errors";
import { log, logError } from "./log";
import { RevisionLog } from "./revision-log";
import { serializeSchedule } from "./schedule";
import { formatSseEvent, heartbeatSseEvent } from "./sse";
import { toIso } from "./timestamp";
import type { PlaybackSnapshot, SelectionResult, StationEvent } from "./types";

const HEARTBEAT_MS = 15_000;

export function describeSelection(result: SelectionResult): Record<string, unknown> {
  if (result.kind === "none") {
    return { kind: "none" };
  }
  const base = {
    kind: result.kind,
    eventId: result.event.event_id,
    eventName: result.event.event_name,
    startsAt: toIso(result.window.startMs),
    endsAt: toIso(result.window.endMs),
    effectiveEndsAt: toIso(result.window.effectiveEndMs)
  };
  return result.kind === "active"
    ? { ...base, elapsedSec: result.elapsedSec }
    : { ...base, waitSec: result.waitMs / 1000 };
}

function toWsPayloadEvent(revision: number, event: StationEvent): string {
  return JSON.stringify({ type: "event", revision, event });
}

function toWsPayloadSnapshot(revision: number, snapshot: PlaybackSnapshot): string {
  return JSON.stringify({ type: "snapshot", revision, snapshot });
}

export function createHttpServer(station: Station, config: AppConfig): Server {
  const { loop, store, timeSync } = station;
  const revisions = new RevisionLog();

  const app = express();
  app.use(express.json({ limit: "1mb" }));
  app.use((req, res, next) => {
    res.setHeader("Access-Control-Allow-Origin", "*");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type");
    res.setHeader("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
    if (req.method === "OPTIONS") {
      res.status(204).end();
      return;
    }
    next();
  });

  const httpServer = createServer(app);
  const wsServer = new WebSocketServer({ server: httpServer, path: "/ws" });

  loop.subscribe((event) => {
    const entry = revisions.append(event);
    const payload = toWsPayloadEvent(entry.revision, entry.event);
    for (const client of wsServer.clients) {
      if (client.readyState === 1) {
        client.send(payload);
      }
    }
  });

  wsServer.on("connection", (socket, req) => {
    const parsed = new URL(req.url || "/ws", "http://127.0.0.1");
    const missed = revisions.since(Number(parsed.searchParams.get("lastRevision") || "0"));
    if (!missed) {
      socket.send(toWsPayloadSnapshot(revisions.current(), loop.snapshot()));
      return;
    }
    for (const item of missed) {
      socket.send(toWsPayloadEvent(item.revision, item.event));
    }
  });

  app.get("/healthz", (_req, res) => {
    res.json({ ok: true, service: "slotcast" });
  });

  app.get("/status", (_req, res) => {
    const snapshot = loop.snapshot();
    res.json({
      running: snapshot.running,
      phase: snapshot.phase,
      now: toIso(timeSync.now()),
      timeOrigin: snapshot.timeOrigin,
      activeEvent: snapshot.currentActiveEvent?.event_id ?? null,
      track: snapshot.currentTrack?.track_id ?? null,
      isFallbackActive: snapshot.isFallbackActive,
      upcoming: snapshot.upcoming,
      lastError: snapshot.lastError,
      schedule: {
        source: store.description,
        events: store.current().length,
        issues: store.currentIssues().length,
        loadedAt: store.lastLoadedAt()
      }
    });
  });

  app.get("/snapshot", (_req, res) => {
    res.json(loop.snapshot());
  });

  app.get("/schedule", (_req, res) => {
    res.type("application/json").send(serializeSchedule(store.current()));
  });

  app.get("/schedule/issues", (_req, res) => {
    res.json(store.currentIssues());
  });

  app.get("/schedule/at", (req, res) => {
    const ts = typeof req.query.ts === "string" ? req.query.ts.trim() : "";
    const result = loop.isEventActiveAt(ts || undefined);
    if (!result) {
      res.status(400).json({ ok: false, error: "ts must be an ISO-8601 timestamp" });
      return;
    }
    res.json(describeSelection(result));
  });

  app.post("/schedule/reload", async (_req, res) => {
    try {
      const events = await store.load(true);
      res.json({ ok: true, events: events.length, issues: store.currentIssues().length });
    } catch (error) {
      logError("control.reload.error", error);
      res.status(500).json({ ok: false, error: errorMessage(error) });
    }
  });

  app.get("/events", (req, res) => {
    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");
    res.flushHeaders?.();

    let sequence = 0;
    res.write(formatSseEvent({
      ts: new Date().toISOString(),
      event: "snapshot",
      payload: {},
      snapshot: loop.snapshot()
    }, ++sequence));

    const unsubscribe = loop.subscribe((event) => {
      res.write(formatSseEvent(event, ++sequence));
    });

    const heartbeat = setInterval(() => {
      res.write(heartbeatSseEvent(++sequence));
    }, HEARTBEAT_MS);

    req.on("close", () => {
      clearInterval(heartbeat);
      unsubscribe();
      res.end();
    });
  });

  app.post("/control/start", async (_req, res) => {
    try {
      await loop.start();
      res.json({ ok: true });
    } catch (error) {
      logError("control.start.error", error);
      res.status(500).json({ ok: false, error: errorMessage(error) });
    }
  });

  app.post("/control/stop", async (_req, res) => {
    try {
      await loop.stop();
      res.json({ ok: true });
    } catch (error) {
      logError("control.stop.error", error);
      res.status(500).json({ ok: false, error: errorMessage(error) });
    }
  });

  app.post("/time/override", (req, res) => {
    if (!config.allowTimeOverride) {
      res.status(403).json({ ok: false, error: "time override is disabled" });
      return;
    }
    const raw: unknown = req.body?.timestamp;
    if (typeof raw !== "string" && typeof raw !== "number") {
      res.status(400).json({ ok: false, error: "timestamp is required" });
      return;
    }
    try {
      timeSync.override(raw);
      res.json({ ok: true, now: toIso(timeSync.now()) });
    } catch (error) {
      res.status(400).json({ ok: false, error: errorMessage(error) });
    }
  });

  return httpServer;
}

async function main(): Promise<void> {
  const station = await createStation(appConfig);
  const httpServer = createHttpServer(station, appConfig);

  if (appConfig.scheduleRefreshSec > 0) {
    station.store.startAutoRefresh(appConfig.scheduleRefreshSec * 1000);
  }

  httpServer.listen(appConfig.port, () => {
    log("server.listen", { port: appConfig.port });
  });

  if (appConfig.autostart) {
    station.loop.start().catch((error) => {
      logError("playback.autostart.failed", error);
    });
  }

  const shutdown = async (signal: string) => {
    log("server.shutdown", { signal });
    station.store.stopAutoRefresh();
    station.timeSync.stop();
    await station.loop.stop();
    httpServer.close();
    process.exit(0);
  };

  for (const signal of ["SIGTERM", "SIGINT"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error) => {
        logError("server.shutdown.failed", error);
        process.exit(1);
      });
    });
  }
}

if (require.main === module) {
  main().catch((error) => {
    logError("server.start.failed", error);
    process.exit(1);
  });
}
