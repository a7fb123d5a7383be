import type { Server } from "node:http";
import express from "express";
import type { NextFunction, Request, Response } from "express";
import { normalizeDashboardHost, type AppConfig } from "./config.ts";
import { parseBoundedInt } from "./normalization/valueParsers.ts";
import type { Store } from "./store.ts";
import { nowIso, shortError } from "./utils.ts";
import type { Persona, RoomId, StatusSink, VoiceStatusState } from "./voice/voiceTypes.ts";

const SSE_HEARTBEAT_MS = 15_000;

type SseClient = { res: Response; blocked: boolean };

export type VoiceStatus = {
  roomId: RoomId;
  state: VoiceStatusState;
  label: string;
  text: string;
  updatedAt: string;
};

function writeSseEvent(client: SseClient, eventName: string, payload: unknown) {
  if (client.blocked) return;
  const wrote = client.res.write(`event: ${eventName}\ndata: ${JSON.stringify(payload)}\n\n`);
  if (wrote === false) {
    client.blocked = true;
    client.res.once("drain", () => {
      client.blocked = false;
    });
  }
}

/**
 * Keeps the latest status per room and fans it out to SSE clients. A client
 * whose write throws is dropped; the pipeline never sees the failure.
 */
export class VoiceStatusBroadcaster implements StatusSink {
  private readonly latest = new Map<RoomId, VoiceStatus>();
  private readonly clients = new Set<SseClient>();

  get clientCount() {
    return this.clients.size;
  }

  push(roomId: RoomId, state: VoiceStatusState, label: string, text: string) {
    const status: VoiceStatus = { roomId, state, label, text, updatedAt: nowIso() };
    this.latest.set(roomId, status);
    for (const client of this.clients) {
      try {
        writeSseEvent(client, "voice_status", status);
      } catch {
        this.clients.delete(client);
      }
    }
  }

  snapshot() {
    return [...this.latest.values()];
  }

  addClient(res: Response) {
    const client: SseClient = { res, blocked: false };
    writeSseEvent(client, "voice_status_snapshot", this.snapshot());
    this.clients.add(client);
    return () => {
      this.clients.delete(client);
    };
  }

  closeAll() {
    for (const client of this.clients) {
      try {
        client.res.end();
      } catch {
        // already closed
      }
    }
    this.clients.clear();
  }
}

type DashboardStore = Pick<Store, "getRecentActions" | "getVoiceSessionEvents">;

type DashboardOptions = {
  appConfig: Pick<AppConfig, "dashboardHost" | "dashboardPort" | "dashboardToken">;
  store: DashboardStore;
  voice: { getRuntimeState(): unknown };
  statusBroadcaster: VoiceStatusBroadcaster;
  personas?: { listPersonas(): Persona[] } | null;
};

function presentedToken(req: Request) {
  const header = req.get("x-dashboard-token");
  if (header) return header.trim();
  const bearer = /^Bearer\s+(.+)$/i.exec(req.get("authorization") ?? "");
  if (bearer) return bearer[1].trim();
  // EventSource cannot send headers
  return typeof req.query.token === "string" ? req.query.token.trim() : "";
}

export function createDashboardServer({ appConfig, store, voice, statusBroadcaster, personas = null }: DashboardOptions) {
  const app = express();
  const heartbeats = new Set<NodeJS.Timeout>();

  app.use(express.json({ limit: "64kb" }));

  app.use("/api", (req, res, next) => {
    const dashboardToken = String(appConfig.dashboardToken || "").trim();
    if (!dashboardToken || presentedToken(req) === dashboardToken) return next();
    return res.status(401).json({ error: "Unauthorized. Provide x-dashboard-token." });
  });

  app.get("/api/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.get("/api/actions", (req, res) => {
    const limit = parseBoundedInt(req.query.limit, 200, 1, 1000);
    res.json(store.getRecentActions(limit));
  });

  app.get("/api/voice/sessions", (_req, res) => {
    res.json(voice.getRuntimeState());
  });

  app.get("/api/voice/sessions/:sessionId/events", (req, res, next) => {
    try {
      const limit = parseBoundedInt(req.query.limit, 500, 1, 2000);
      res.json(store.getVoiceSessionEvents(String(req.params.sessionId || ""), limit));
    } catch (error) {
      next(error);
    }
  });

  app.get("/api/voice/status", (_req, res) => {
    res.json(statusBroadcaster.snapshot());
  });

  app.get("/api/voice/status/events", (req, res) => {
    res.writeHead(200, {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive",
      "X-Accel-Buffering": "no"
    });

    let removeClient: () => void = () => undefined;
    try {
      removeClient = statusBroadcaster.addClient(res);
    } catch {
      res.end();
      return;
    }

    const heartbeat = setInterval(() => {
      try {
        res.write(": heartbeat\n\n");
      } catch {
        // close handler cleans up
      }
    }, SSE_HEARTBEAT_MS);
    heartbeat.unref();
    heartbeats.add(heartbeat);

    req.on("close", () => {
      clearInterval(heartbeat);
      heartbeats.delete(heartbeat);
      removeClient();
    });
  });

  app.get("/api/personas", (_req, res) => {
    res.json(personas ? personas.listPersonas() : []);
  });

  app.use("/api", (_req, res) => {
    res.status(404).json({ error: "Not found." });
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    res.status(500).json({ error: shortError(error) });
  });

  const dashboardHost = normalizeDashboardHost(appConfig.dashboardHost);
  const server: Server = app.listen(appConfig.dashboardPort, dashboardHost, () => {
    console.log(`Dashboard running on http://${dashboardHost}:${appConfig.dashboardPort}`);
  });

  const close = async () => {
    for (const heartbeat of heartbeats) clearInterval(heartbeat);
    heartbeats.clear();
    statusBroadcaster.closeAll();
    await new Promise<void>((resolve) => {
      server.close(() => resolve());
      server.closeAllConnections();
    });
  };

  return { app, server, close };
}
