import test from "node:test";
import assert from "node:assert/strict";
import { loadAppConfig } from "./config.ts";
import { LLMService } from "./llm.ts";
import { MemoryActionLog } from "./voice/voiceTestHelpers.ts";

function createService(env: Record<string, string>) {
  const store = new MemoryActionLog();
  const service = new LLMService({ appConfig: loadAppConfig(env), store });
  return { service, store };
}

test("falls back to the configured provider when the preferred one has no key", () => {
  const { service } = createService({ DEFAULT_PROVIDER: "anthropic", OPENAI_API_KEY: "test-key" });
  assert.deepEqual(service.resolveProviderAndModel(), { provider: "openai", model: "gpt-4.1-mini" });
});

test("keeps an explicit model only for the provider it was asked for", () => {
  const { service } = createService({ OPENAI_API_KEY: "test-key", ANTHROPIC_API_KEY: "test-key" });
  assert.deepEqual(service.resolveProviderAndModel({ provider: "anthropic", model: "claude-sonnet-4-5" }), {
    provider: "anthropic",
    model: "claude-sonnet-4-5"
  });
  assert.deepEqual(service.resolveProviderAndModel({ provider: "openai" }), {
    provider: "openai",
    model: "gpt-4.1-mini"
  });
});

test("generate logs llm_error and rethrows when nothing is configured", async () => {
  const { service, store } = createService({});
  await assert.rejects(
    service.generate({ systemPrompt: "sys", userMessage: "hi", temperature: 0.7, trace: { guildId: "guild-1" } }),
    /No LLM provider available/
  );
  assert.equal(store.actions.length, 1);
  assert.equal(store.actions[0].kind, "llm_error");
  assert.equal(store.actions[0].guildId, "guild-1");
});

test("speech calls fail fast without an OpenAI key", async () => {
  const { service, store } = createService({});
  assert.equal(service.isAsrReady(), false);
  await assert.rejects(service.transcribeAudio({ wav: Buffer.alloc(44) }), /OPENAI_API_KEY/);
  await assert.rejects(service.synthesizeSpeech({ text: "hi" }), /OPENAI_API_KEY/);
  assert.deepEqual(
    store.actions.map((action) => action.kind),
    ["asr_error", "tts_error"]
  );
});
