import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { ActionLogEntry } from "./runtimeActionLogger.ts";
import { Store } from "./store.ts";

async function withTempStore(run: (store: Store) => Promise<void> | void) {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "huddlebot-store-test-"));
  const store = new Store(path.join(dir, "huddlebot.db"), { actionLogRetentionDays: 14, actionLogMaxRows: 120_000 });
  store.init();

  try {
    await run(store);
  } finally {
    store.close();
    await fs.rm(dir, { recursive: true, force: true });
  }
}

test("logAction persists rows, parses metadata and notifies the listener", async () => {
  await withTempStore(async (store) => {
    const seen: ActionLogEntry[] = [];
    store.onActionLogged = (action) => seen.push(action);

    store.logAction({
      kind: "voice_runtime",
      guildId: "guild-1",
      userId: "user-1",
      content: "gate_decision",
      metadata: { sessionId: "session-1", accept: true }
    });
    await new Promise<void>((resolve) => queueMicrotask(resolve));

    const [row] = store.getRecentActions(10);
    assert.equal(row.kind, "voice_runtime");
    assert.equal(row.guild_id, "guild-1");
    assert.equal(row.channel_id, null);
    assert.deepEqual(row.metadata, { sessionId: "session-1", accept: true });
    assert.equal(seen.length, 1);
    assert.equal(seen[0].content, "gate_decision");
    assert.equal(typeof seen[0].createdAt, "string");
  });
});

test("getVoiceSessionEvents returns one session's voice rows in order", async () => {
  await withTempStore((store) => {
    store.logAction({ kind: "voice_session_start", guildId: "g", metadata: { sessionId: "abc" } });
    store.logAction({ kind: "voice_runtime", guildId: "g", content: "first", metadata: { sessionId: "other" } });
    store.logAction({ kind: "llm_call", guildId: "g", metadata: { sessionId: "abc" } });
    store.logAction({ kind: "voice_session_end", guildId: "g", content: "leave", metadata: { sessionId: "abc" } });

    assert.deepEqual(
      store.getVoiceSessionEvents("abc").map((row) => row.kind),
      ["voice_session_start", "voice_session_end"]
    );
    assert.deepEqual(store.getVoiceSessionEvents("%"), []);
  });
});

test("countActionsSince counts one kind after a timestamp", async () => {
  await withTempStore((store) => {
    store.logAction({ kind: "voice_error", content: "a" });
    store.logAction({ kind: "voice_error", content: "b" });
    store.logAction({ kind: "voice_runtime", content: "c" });
    assert.equal(store.countActionsSince("voice_error", "2000-01-01T00:00:00.000Z"), 2);
    assert.equal(store.countActionsSince("voice_error", "2999-01-01T00:00:00.000Z"), 0);
  });
});

test("pruneActionLog drops rows past the age limit and the row cap", async () => {
  await withTempStore((store) => {
    const insert = store.db.prepare("INSERT INTO actions(created_at, kind) VALUES (?, ?)");
    for (const createdAt of [
      "2026-02-20T00:00:00.000Z",
      "2026-02-27T00:00:00.000Z",
      "2026-02-28T00:00:00.000Z",
      "2026-03-01T00:00:00.000Z",
      "2026-03-01T01:00:00.000Z"
    ]) {
      insert.run(createdAt, "voice_runtime");
    }

    const result = store.pruneActionLog({ now: "2026-03-02T00:00:00.000Z", maxAgeDays: 2, maxRows: 2 });

    assert.deepEqual(result, { deletedActions: 3 });
    assert.deepEqual(
      store.getRecentActions(10).map((row) => row.created_at),
      ["2026-03-01T01:00:00.000Z", "2026-03-01T00:00:00.000Z"]
    );
  });
});

test("active persona per room round-trips and can be replaced", async () => {
  await withTempStore((store) => {
    assert.equal(store.getActivePersonaId("guild-1"), null);
    store.setActivePersonaId("guild-1", "pirate");
    store.setActivePersonaId("guild-1", "sensei");
    store.setActivePersonaId("guild-2", "friendly");
    assert.equal(store.getActivePersonaId("guild-1"), "sensei");
    assert.equal(store.getActivePersonaId("guild-2"), "friendly");
  });
});
