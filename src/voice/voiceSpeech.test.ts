import test from "node:test";
import assert from "node:assert/strict";
import type { LlmTrace } from "../llm.ts";
import { createVoiceSpeechServices, type SpeechBackend } from "./voiceSpeech.ts";

function int16Buffer(values: number[]) {
  const buffer = Buffer.alloc(values.length * 2);
  values.forEach((value, index) => buffer.writeInt16LE(value, index * 2));
  return buffer;
}

function createBackend() {
  const calls: Array<{ method: string; trace: LlmTrace | undefined; bytes?: number }> = [];
  const backend: SpeechBackend = {
    async generate({ userMessage, trace }) {
      calls.push({ method: "generate", trace });
      return {
        text: `echo: ${userMessage}`,
        provider: "openai",
        model: "gpt-4.1-mini",
        usage: { inputTokens: 1, outputTokens: 1, cacheWriteTokens: 0, cacheReadTokens: 0 }
      };
    },
    async transcribeAudio({ wav, trace }) {
      calls.push({ method: "transcribeAudio", trace, bytes: wav.length });
      return "hello bot";
    },
    async synthesizeSpeech({ trace }) {
      calls.push({ method: "synthesizeSpeech", trace });
      return int16Buffer([0, 100]);
    }
  };
  return { backend, calls };
}

test("transcriber sends a 24 kHz mono wav tagged with the room", async () => {
  const { backend, calls } = createBackend();
  const { transcriber } = createVoiceSpeechServices({ llm: backend, roomId: "guild-1", textChannelId: "text-1" });

  const text = await transcriber.transcribe(
    int16Buffer([100, 300, 100, 300, 100, 300, 100, 300]),
    new AbortController().signal
  );

  assert.equal(text, "hello bot");
  assert.deepEqual(calls, [
    {
      method: "transcribeAudio",
      trace: { guildId: "guild-1", channelId: "text-1", source: "voice_utterance" },
      bytes: 48
    }
  ]);
});

test("transcriber skips the call for empty audio", async () => {
  const { backend, calls } = createBackend();
  const { transcriber } = createVoiceSpeechServices({ llm: backend, roomId: "guild-1" });
  assert.equal(await transcriber.transcribe(Buffer.alloc(0), new AbortController().signal), "");
  assert.equal(calls.length, 0);
});

test("synthesizer converts model audio to discord playback pcm", async () => {
  const { backend } = createBackend();
  const { synthesizer } = createVoiceSpeechServices({ llm: backend, roomId: "guild-1" });

  const audio = await synthesizer.synthesize("hi", new AbortController().signal);

  assert.ok(audio);
  assert.equal(audio.label, "reply");
  assert.equal(audio.pcm.length, 16);
});

test("generator forwards the speaker trace", async () => {
  const { backend, calls } = createBackend();
  const { generator } = createVoiceSpeechServices({ llm: backend, roomId: "guild-1" });

  const result = await generator.generate({
    systemPrompt: "sys",
    userMessage: "question",
    temperature: 0.5,
    signal: new AbortController().signal,
    trace: { guildId: "guild-1", userId: "a", source: "voice_reply" }
  });

  assert.equal(result.text, "echo: question");
  assert.deepEqual(calls[0], {
    method: "generate",
    trace: { guildId: "guild-1", channelId: null, userId: "a", source: "voice_reply" }
  });
});
