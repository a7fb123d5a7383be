import test from "node:test";
import assert from "node:assert/strict";
import type { VoiceTuning } from "../config.ts";
import { sleep } from "../utils.ts";
import { SpecialPhraseHandler } from "./novelty/specialPhraseHandler.ts";
import { VoiceRoomManager } from "./voiceRoomManager.ts";
import {
  FakeGenerator,
  FakeSynthesizer,
  FakeTranscriber,
  FakeVoiceTransport,
  MemoryActionLog,
  RecordingStatusSink,
  StaticPersonaSource,
  createTestTuning,
  voicedFrame,
  waitFor
} from "./voiceTestHelpers.ts";

const SPEAKER_NAMES = new Map([["a", "ana"]]);

class UnreachableTransport extends FakeVoiceTransport {
  async connect(channelId: string) {
    this.events.push(`connect:${channelId}`);
    throw new Error("no route to voice server");
  }
}

function createHarness({
  transcripts = [],
  tuning: tuningOverrides = {},
  transportFactory
}: {
  transcripts?: string[];
  tuning?: Partial<VoiceTuning>;
  transportFactory?: () => FakeVoiceTransport;
} = {}) {
  const clock = { now: 0 };
  const store = new MemoryActionLog();
  const transports: FakeVoiceTransport[] = [];
  const transcriber = new FakeTranscriber(transcripts);
  const generator = new FakeGenerator(() => "it is noon");
  const synthesizer = new FakeSynthesizer();
  const statusSink = new RecordingStatusSink();
  const posted: Array<{ channelId: string; text: string }> = [];
  const manager = new VoiceRoomManager({
    store,
    tuning: createTestTuning({ ambientEnabled: false, ...tuningOverrides }),
    personas: new StaticPersonaSource(),
    statusSink,
    createTransport: () => {
      const transport = transportFactory ? transportFactory() : new FakeVoiceTransport({ playbackDurationMs: 0 });
      transports.push(transport);
      return transport;
    },
    createSpeechServices: () => ({ transcriber, generator, synthesizer }),
    createHandlers: () => [new SpecialPhraseHandler()],
    resolveSpeakerName: (_roomId, speakerId) => SPEAKER_NAMES.get(speakerId) ?? speakerId,
    postText: async (channelId, text) => {
      posted.push({ channelId, text });
    },
    now: () => clock.now,
    autoStartSegmenters: false
  });
  return { manager, store, transports, generator, statusSink, posted, clock };
}

async function joinGuild(manager: VoiceRoomManager) {
  const result = await manager.join({
    roomId: "guild-1",
    voiceChannelId: "voice-1",
    textChannelId: "text-1",
    requestedByUserId: "a"
  });
  const session = manager.getSession("guild-1");
  assert.ok(session);
  await session.announcement;
  return { result, session };
}

test("join connects, starts capture and greets with the persona greeting", async () => {
  const { manager, store, transports } = createHarness();
  const { result, session } = await joinGuild(manager);

  assert.equal(result.status, "joined");
  assert.equal(result.sessionId, session.id);
  assert.deepEqual(transports[0].events, ["connect:voice-1", "listen", "play:greeting", "stop_listening", "listen"]);
  assert.deepEqual(session.gate.getWakeWords(), ["bot", "computer", "huddle"]);
  assert.deepEqual(store.contents("voice_session_start"), ["voice_joined:voice-1"]);

  await manager.dispose();
});

test("joining again reuses the session and moves between channels", async () => {
  const { manager, transports } = createHarness();
  const { session } = await joinGuild(manager);

  const again = await manager.join({ roomId: "guild-1", voiceChannelId: "voice-1" });
  const moved = await manager.join({ roomId: "guild-1", voiceChannelId: "voice-2" });

  assert.deepEqual(again, { status: "already_joined", sessionId: session.id });
  assert.deepEqual(moved, { status: "moved", sessionId: session.id });
  assert.equal(transports.length, 1);
  assert.equal(transports[0].events.at(-1), "move:voice-2");
  assert.equal(session.voiceChannelId, "voice-2");

  await manager.dispose();
});

test("a failed connect leaves no session behind", async () => {
  const { manager, store, transports } = createHarness({ transportFactory: () => new UnreachableTransport() });

  await assert.rejects(
    manager.join({ roomId: "guild-1", voiceChannelId: "voice-1", textChannelId: "text-1" }),
    /no route to voice server/
  );

  assert.equal(manager.hasActiveSession("guild-1"), false);
  assert.deepEqual(transports[0].events, ["connect:voice-1", "disconnect"]);
  assert.deepEqual(store.contents("voice_error"), ["join_failed: no route to voice server"]);
});

test("captured speech runs a full cycle and echoes the exchange to text", async () => {
  const { manager, transports, generator, posted, clock } = createHarness({
    transcripts: ["hey huddle what time is it"]
  });
  const { session } = await joinGuild(manager);
  const transport = transports[0];

  for (let index = 0; index < 5; index += 1) {
    transport.emitFrame("a", voicedFrame());
  }
  clock.now = 2000;
  session.router.evaluateAll();

  await waitFor(() => posted.length === 1 && session.orchestrator.state === "IDLE");

  assert.deepEqual(posted, [{ channelId: "text-1", text: "ana: hey huddle what time is it\nHuddle: it is noon" }]);
  assert.deepEqual(generator.requests[0].trace, { guildId: "guild-1", userId: "a", source: "voice_reply" });
  assert.deepEqual(
    transport.played.map((audio) => audio.label),
    ["greeting", "reply"]
  );
  assert.deepEqual(session.gate.lastAddressed, { speakerId: "a", at: 2000 });

  await manager.dispose();
});

test("a termination phrase speaks the farewell and tears the room down", async () => {
  const { manager, store, transports, posted, clock } = createHarness({
    transcripts: ["please leave the channel"]
  });
  const { session } = await joinGuild(manager);
  const transport = transports[0];

  transport.emitFrame("a", voicedFrame());
  clock.now = 2000;
  session.router.evaluateAll();

  await waitFor(() => posted.length === 1);

  assert.equal(manager.hasActiveSession("guild-1"), false);
  assert.deepEqual(posted, [{ channelId: "text-1", text: "leaving voice as asked." }]);
  assert.deepEqual(
    transport.played.map((audio) => audio.label),
    ["greeting", "farewell"]
  );
  assert.deepEqual(transport.events.slice(-3), ["stop_listening", "stop", "disconnect"]);
  assert.deepEqual(store.contents("voice_session_end"), ["termination_phrase"]);
  const end = store.actions.find((action) => action.kind === "voice_session_end");
  assert.equal(end?.userId, "a");
});

test("a dropped connection ends the session", async () => {
  const { manager, store, transports, posted, statusSink } = createHarness();
  await joinGuild(manager);

  transports[0].dropConnection("socket closed");
  await waitFor(() => posted.length === 1);

  assert.equal(manager.hasActiveSession("guild-1"), false);
  assert.deepEqual(store.contents("voice_session_end"), ["connection_lost"]);
  assert.deepEqual(posted[0], { channelId: "text-1", text: "voice connection dropped, i'm out." });
  assert.deepEqual(statusSink.states.at(-1), { roomId: "guild-1", state: "idle", label: "", text: "" });
});

test("the room is left after the inactivity timeout", async () => {
  const { manager, store } = createHarness({ tuning: { inactivityLeaveMs: 30 } });
  await joinGuild(manager);

  await waitFor(() => store.contents("voice_session_end").length === 1);

  assert.deepEqual(store.contents("voice_session_end"), ["inactivity_timeout"]);
  assert.equal(manager.hasActiveSession("guild-1"), false);
});

test("an empty channel is left only if nobody comes back during the grace period", async () => {
  const { manager, store } = createHarness({ tuning: { emptyChannelLeaveMs: 20 } });
  await joinGuild(manager);

  manager.updateChannelOccupancy("guild-1", 0);
  manager.updateChannelOccupancy("guild-1", 2);
  await sleep(40);
  assert.equal(manager.hasActiveSession("guild-1"), true);

  manager.updateChannelOccupancy("guild-1", 0);
  await waitFor(() => store.contents("voice_session_end").length === 1);

  assert.deepEqual(store.contents("voice_session_end"), ["channel_empty"]);
  assert.deepEqual(store.contents("voice_runtime").filter((content) => content.startsWith("channel_empty")), [
    "channel_empty_grace_started",
    "channel_empty_grace_cleared",
    "channel_empty_grace_started"
  ]);
});

test("an explicit leave posts nothing and a second leave is a no-op", async () => {
  const { manager, store, posted } = createHarness();
  await joinGuild(manager);

  assert.equal(await manager.leave({ roomId: "guild-1", requestedByUserId: "a" }), true);
  assert.equal(await manager.leave({ roomId: "guild-1" }), false);

  assert.deepEqual(posted, []);
  assert.deepEqual(store.contents("voice_session_end"), ["leave_command"]);
});

test("runtime state lists active rooms", async () => {
  const { manager } = createHarness();
  const { session } = await joinGuild(manager);

  const state = manager.getRuntimeState();

  assert.equal(state.activeCount, 1);
  assert.equal(state.sessions[0].sessionId, session.id);
  assert.equal(state.sessions[0].voiceChannelId, "voice-1");
  assert.equal(state.sessions[0].state, "IDLE");
  assert.equal(state.sessions[0].listening, true);
  assert.equal(state.sessions[0].lastAddressed, null);
  assert.equal(state.sessions[0].transcriptEntries, 0);

  await manager.dispose();
  assert.equal(manager.getRuntimeState().activeCount, 0);
});
