import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { ConversationGate } from "../conversationGate.ts";
import { encodePcm16MonoAsWav } from "../pcmAudio.ts";
import { PlaybackController } from "../playbackController.ts";
import { RequestOrchestrator, type VoiceHandlerContext } from "../requestOrchestrator.ts";
import { RollingTranscript } from "../rollingTranscript.ts";
import {
  FakeGenerator,
  FakeSynthesizer,
  FakeTranscriber,
  FakeVoiceTransport,
  MemoryActionLog,
  RecordingStatusSink,
  StaticPersonaSource,
  TEST_PERSONA,
  createTestTuning
} from "../voiceTestHelpers.ts";
import type { PlayableAudio } from "../voiceTypes.ts";
import { NoveltySoundHandler } from "./noveltySoundHandler.ts";
import { SpecialPhraseHandler } from "./specialPhraseHandler.ts";

function createContext(transcript: string) {
  const spoken: string[] = [];
  const played: PlayableAudio[] = [];
  const context: VoiceHandlerContext = {
    roomId: "guild-1",
    speakerId: "a",
    speakerName: "ana",
    transcript,
    persona: TEST_PERSONA,
    speak: async (text) => {
      spoken.push(text);
      return true;
    },
    play: (audio) => {
      played.push(audio);
    }
  };
  return { context, spoken, played };
}

function monoWav(samples: number[]) {
  const pcm = Buffer.alloc(samples.length * 2);
  samples.forEach((sample, index) => pcm.writeInt16LE(sample, index * 2));
  return encodePcm16MonoAsWav(pcm, 48000);
}

test("SpecialPhraseHandler speaks the canned reply for its phrase", async () => {
  const handler = new SpecialPhraseHandler();
  assert.equal(handler.matches("Hey bot, do a barrel roll!"), true);
  assert.equal(handler.matches("bot, roll the dice"), false);

  const { context, spoken } = createContext("Hey bot, do a barrel roll!");
  const result = await handler.handle(context);

  assert.deepEqual(spoken, ["whee. consider the barrel rolled."]);
  assert.deepEqual(result, { reply: "whee. consider the barrel rolled.", label: "do a barrel roll" });
});

test("NoveltySoundHandler plays wav clips in name order and wraps around", async () => {
  const directory = await fs.mkdtemp(path.join(os.tmpdir(), "novelty-"));
  try {
    await fs.writeFile(path.join(directory, "b.wav"), monoWav([300]));
    await fs.writeFile(path.join(directory, "a.wav"), monoWav([100, 200]));
    await fs.writeFile(path.join(directory, "notes.txt"), "not audio");

    const handler = await NoveltySoundHandler.fromDirectory(directory, ["play a sound"]);
    assert.equal(handler.clipCount, 2);
    assert.equal(handler.matches("bot, play a sound please"), true);
    assert.equal(handler.matches("bot, sing a song"), false);

    const { context, played } = createContext("bot, play a sound please");
    const labels: string[] = [];
    for (let index = 0; index < 3; index += 1) {
      labels.push((await handler.handle(context)).label);
    }

    assert.deepEqual(labels, ["a", "b", "a"]);
    assert.deepEqual(
      played.map((audio) => audio.pcm.length),
      [8, 4, 8]
    );
  } finally {
    await fs.rm(directory, { recursive: true, force: true });
  }
});

test("NoveltySoundHandler without clips never matches", () => {
  const handler = new NoveltySoundHandler({ clipPaths: [], triggers: ["play a sound"] });
  assert.equal(handler.matches("play a sound"), false);
});

test("a matching handler owns the cycle instead of generation", async () => {
  const tuning = createTestTuning({ ambientEnabled: false });
  const store = new MemoryActionLog();
  const transport = new FakeVoiceTransport({ playbackDurationMs: 5 });
  const transcript = new RollingTranscript();
  const generator = new FakeGenerator(() => "should not run");
  const orchestrator = new RequestOrchestrator({
    roomId: "guild-1",
    sessionId: "session-1",
    tuning,
    store,
    gate: new ConversationGate(tuning),
    transcript,
    playback: new PlaybackController({
      roomId: "guild-1",
      sessionId: "session-1",
      transport,
      captureSink: { onFrame: () => undefined, reset: () => undefined },
      store,
      tuning
    }),
    transcriber: new FakeTranscriber(["bot are you sentient"]),
    generator,
    synthesizer: new FakeSynthesizer(),
    statusSink: new RecordingStatusSink(),
    personas: new StaticPersonaSource(),
    handlers: [new SpecialPhraseHandler()],
    now: () => 0
  });

  const outcome = await orchestrator.handleUtterance({
    speakerId: "a",
    pcm: Buffer.alloc(3840),
    arrivedAt: 0,
    cutReason: "silence"
  });

  assert.deepEqual(outcome, {
    status: "handled",
    reason: "special_phrase:are you sentient",
    transcript: "bot are you sentient",
    reply: "only on weekends."
  });
  assert.equal(generator.requests.length, 0);
  assert.deepEqual(
    transport.played.map((audio) => audio.label),
    ["special_phrase"]
  );
  assert.deepEqual(
    transcript.snapshot().map((entry) => `${entry.speaker}: ${entry.text}`),
    ["a: bot are you sentient", "Huddle: only on weekends."]
  );
});
