import test from "node:test";
import assert from "node:assert/strict";
import { createDashboardServer, VoiceStatusBroadcaster } from "./dashboard.ts";
import { BUILTIN_PERSONAS } from "./personas.ts";
import { Store } from "./store.ts";

type DashboardHarness = {
  baseUrl: string;
  store: Store;
  statusBroadcaster: VoiceStatusBroadcaster;
};

const RUNTIME_STATE = {
  activeCount: 1,
  sessions: [{ sessionId: "session-1", roomId: "guild-1", state: "IDLE" }]
};

async function withDashboardServer(
  { dashboardToken = "" }: { dashboardToken?: string },
  run: (harness: DashboardHarness) => Promise<void>
) {
  const store = new Store(":memory:");
  store.init();
  const statusBroadcaster = new VoiceStatusBroadcaster();
  const dashboard = createDashboardServer({
    appConfig: { dashboardHost: "127.0.0.1", dashboardPort: 0, dashboardToken },
    store,
    voice: { getRuntimeState: () => RUNTIME_STATE },
    statusBroadcaster,
    personas: { listPersonas: () => BUILTIN_PERSONAS }
  });

  try {
    if (!dashboard.server.listening) {
      await new Promise<void>((resolve) => dashboard.server.once("listening", () => resolve()));
    }
    const address = dashboard.server.address();
    assert.ok(address && typeof address === "object");
    const port = address.port;
    await run({ baseUrl: `http://127.0.0.1:${port}`, store, statusBroadcaster });
  } finally {
    await dashboard.close();
    store.close();
  }
}

function fieldOf(value: unknown, field: string) {
  if (!value || typeof value !== "object") return undefined;
  return new Map(Object.entries(value)).get(field);
}

async function readRowsField(response: Response, field: string) {
  const body: unknown = await response.json();
  assert.ok(Array.isArray(body));
  return body.map((row: unknown) => fieldOf(row, field));
}

type SseEvent = { event: string; data: unknown };

function createSseReader(body: ReadableStream<Uint8Array>) {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffered = "";

  return async function nextEvent(): Promise<SseEvent> {
    for (;;) {
      const boundary = buffered.indexOf("\n\n");
      if (boundary >= 0) {
        const block = buffered.slice(0, boundary);
        buffered = buffered.slice(boundary + 2);
        if (block.startsWith(":")) continue;
        let event = "message";
        let data = "";
        for (const line of block.split("\n")) {
          if (line.startsWith("event: ")) event = line.slice(7);
          if (line.startsWith("data: ")) data += line.slice(6);
        }
        return { event, data: JSON.parse(data) };
      }
      const { value, done } = await reader.read();
      if (done) throw new Error("event stream ended");
      buffered += decoder.decode(value, { stream: true });
    }
  };
}

test("health responds without a token when none is configured", async () => {
  await withDashboardServer({}, async ({ baseUrl }) => {
    const response = await fetch(`${baseUrl}/api/health`);
    assert.equal(response.status, 200);
    assert.deepEqual(await response.json(), { ok: true });
  });
});

test("api routes require the dashboard token when one is configured", async () => {
  await withDashboardServer({ dashboardToken: "test-secret" }, async ({ baseUrl }) => {
    const anonymous = await fetch(`${baseUrl}/api/health`);
    assert.equal(anonymous.status, 401);
    assert.deepEqual(await anonymous.json(), { error: "Unauthorized. Provide x-dashboard-token." });

    const wrong = await fetch(`${baseUrl}/api/health`, { headers: { "x-dashboard-token": "nope" } });
    assert.equal(wrong.status, 401);

    const viaHeader = await fetch(`${baseUrl}/api/health`, { headers: { "x-dashboard-token": "test-secret" } });
    assert.equal(viaHeader.status, 200);

    const viaBearer = await fetch(`${baseUrl}/api/health`, { headers: { authorization: "Bearer test-secret" } });
    assert.equal(viaBearer.status, 200);

    const viaQuery = await fetch(`${baseUrl}/api/health?token=test-secret`);
    assert.equal(viaQuery.status, 200);
  });
});

test("voice sessions, actions and session events are served from the runtime and the store", async () => {
  await withDashboardServer({}, async ({ baseUrl, store }) => {
    store.logAction({
      kind: "voice_session_start",
      guildId: "guild-1",
      content: "voice_joined:voice-1",
      metadata: { sessionId: "session-1" }
    });
    store.logAction({ kind: "llm_call", guildId: "guild-1", content: "reply", metadata: { sessionId: "session-1" } });
    store.logAction({
      kind: "voice_session_end",
      guildId: "guild-1",
      content: "leave_command",
      metadata: { sessionId: "session-1" }
    });

    const sessions = await fetch(`${baseUrl}/api/voice/sessions`);
    assert.deepEqual(await sessions.json(), RUNTIME_STATE);

    const actions = await fetch(`${baseUrl}/api/actions?limit=2`);
    assert.deepEqual(await readRowsField(actions, "kind"), ["voice_session_end", "llm_call"]);

    const events = await fetch(`${baseUrl}/api/voice/sessions/session-1/events`);
    assert.deepEqual(await readRowsField(events, "content"), ["voice_joined:voice-1", "leave_command"]);

    const missing = await fetch(`${baseUrl}/api/voice/nothing-here`);
    assert.equal(missing.status, 404);
  });
});

test("personas are listed by id", async () => {
  await withDashboardServer({}, async ({ baseUrl }) => {
    const response = await fetch(`${baseUrl}/api/personas`);
    assert.deepEqual(
      await readRowsField(response, "id"),
      BUILTIN_PERSONAS.map((persona) => persona.id)
    );
  });
});

test("the status stream sends a snapshot first and then live updates", async () => {
  await withDashboardServer({}, async ({ baseUrl, statusBroadcaster }) => {
    statusBroadcaster.push("guild-1", "thinking", "reply", "");

    const controller = new AbortController();
    const response = await fetch(`${baseUrl}/api/voice/status/events`, { signal: controller.signal });
    assert.equal(response.headers.get("content-type"), "text/event-stream");
    assert.ok(response.body);
    const nextEvent = createSseReader(response.body);

    try {
      const snapshot = await nextEvent();
      assert.equal(snapshot.event, "voice_status_snapshot");
      assert.ok(Array.isArray(snapshot.data));
      assert.equal(snapshot.data.length, 1);
      assert.equal(statusBroadcaster.clientCount, 1);

      statusBroadcaster.push("guild-1", "talking", "reply", "it is noon");
      const update = await nextEvent();
      assert.equal(update.event, "voice_status");
      assert.equal(fieldOf(update.data, "text"), "it is noon");
      assert.equal(fieldOf(update.data, "state"), "talking");

      const latest = await fetch(`${baseUrl}/api/voice/status`);
      assert.deepEqual(await readRowsField(latest, "state"), ["talking"]);
    } finally {
      controller.abort();
    }
  });
});
