import dotenv from "dotenv";
import { normalizeLlmProvider } from "./llm/llmHelpers.ts";
import { parseBooleanFlag, parseBoundedInt, parseNumberOrFallback } from "./normalization/valueParsers.ts";
import { parsePhraseList } from "./settings/listNormalization.ts";

dotenv.config();

const DEFAULT_WAKE_WORDS = ["bot", "computer", "assistant", "panel"];
const DEFAULT_TERMINATION_PHRASES = ["leave the channel", "goodbye bot", "stop listening"];

type EnvSource = Record<string, string | undefined>;

export function loadAppConfig(env: EnvSource = process.env) {
  return {
    discordToken: env.DISCORD_TOKEN ?? "",
    commandPrefix: String(env.COMMAND_PREFIX || "!").trim() || "!",
    dashboardPort: parseNumberOrFallback(env.DASHBOARD_PORT, 8787),
    dashboardHost: normalizeDashboardHost(env.DASHBOARD_HOST),
    dashboardToken: env.DASHBOARD_TOKEN ?? "",
    dataDir: String(env.DATA_DIR || "data").trim() || "data",
    openaiApiKey: env.OPENAI_API_KEY ?? "",
    anthropicApiKey: env.ANTHROPIC_API_KEY ?? "",
    defaultProvider: normalizeLlmProvider(env.DEFAULT_PROVIDER, "openai"),
    defaultOpenAiModel: env.DEFAULT_MODEL_OPENAI ?? "gpt-4.1-mini",
    defaultAnthropicModel: env.DEFAULT_MODEL_ANTHROPIC ?? "claude-haiku-4-5",
    llmMaxOutputTokens: parseBoundedInt(env.LLM_MAX_OUTPUT_TOKENS, 320, 32, 4000),
    transcriptionModel: env.TRANSCRIPTION_MODEL ?? "gpt-4o-mini-transcribe",
    transcriptionLanguage: String(env.TRANSCRIPTION_LANGUAGE || "").trim(),
    ttsModel: env.TTS_MODEL ?? "gpt-4o-mini-tts",
    ttsVoice: env.TTS_VOICE ?? "alloy",
    ttsSpeed: parseNumberOrFallback(env.TTS_SPEED, 1.15),
    voice: {
      wakeWords: parsePhraseList(env.VOICE_WAKE_WORDS, DEFAULT_WAKE_WORDS),
      terminationPhrases: parsePhraseList(env.VOICE_TERMINATION_PHRASES, DEFAULT_TERMINATION_PHRASES),
      conversationWindowMs: parseBoundedInt(env.VOICE_CONVERSATION_WINDOW_SECONDS, 60, 0, 3600) * 1000,
      silenceThresholdMs: parseBoundedInt(env.VOICE_SILENCE_THRESHOLD_MS, 1200, 200, 10_000),
      silenceCheckIntervalMs: parseBoundedInt(env.VOICE_SILENCE_CHECK_INTERVAL_MS, 300, 50, 2000),
      maxUtteranceMs: parseBoundedInt(env.VOICE_MAX_UTTERANCE_MS, 12_000, 1000, 60_000),
      handoffWatchdogMs: parseBoundedInt(env.VOICE_HANDOFF_WATCHDOG_MS, 40_000, 1000, 600_000),
      noiseFloorRms: parseBoundedInt(env.VOICE_NOISE_FLOOR_RMS, 450, 1, 32_767),
      silentBufferMaxMs: parseBoundedInt(env.VOICE_SILENT_BUFFER_MAX_MS, 4000, 200, 60_000),
      transcriptionTimeoutMs: parseBoundedInt(env.VOICE_TRANSCRIPTION_TIMEOUT_MS, 15_000, 100, 120_000),
      generationTimeoutMs: parseBoundedInt(env.VOICE_GENERATION_TIMEOUT_MS, 25_000, 100, 180_000),
      synthesisTimeoutMs: parseBoundedInt(env.VOICE_SYNTHESIS_TIMEOUT_MS, 20_000, 100, 120_000),
      playbackMaxWaitMs: parseBoundedInt(env.VOICE_PLAYBACK_MAX_WAIT_MS, 60_000, 100, 600_000),
      relistenSettleMs: parseBoundedInt(env.VOICE_RELISTEN_SETTLE_MS, 250, 0, 5000),
      transcriptMaxEntries: parseBoundedInt(env.VOICE_TRANSCRIPT_MAX_ENTRIES, 20, 2, 500),
      transcriptMaxAgeMs: parseBoundedInt(env.VOICE_TRANSCRIPT_MAX_AGE_SECONDS, 300, 10, 86_400) * 1000,
      promptHistoryEntries: parseBoundedInt(env.VOICE_PROMPT_HISTORY_ENTRIES, 10, 0, 100),
      inactivityLeaveMs: parseBoundedInt(env.VOICE_INACTIVITY_LEAVE_SECONDS, 600, 20, 86_400) * 1000,
      emptyChannelLeaveMs: parseBoundedInt(env.VOICE_EMPTY_CHANNEL_LEAVE_SECONDS, 30, 0, 3600) * 1000,
      ambientEnabled: parseBooleanFlag(env.VOICE_AMBIENT_ENABLED, true),
      apologizeOnGenerationTimeout: parseBooleanFlag(env.VOICE_GENERATION_TIMEOUT_APOLOGY, false),
      apologyText: String(env.VOICE_APOLOGY_TEXT || "").trim() || "sorry, i lost my train of thought. ask me again?",
      noveltySoundsDir: String(env.VOICE_NOVELTY_SOUNDS_DIR || "").trim(),
      noveltyTriggers: parsePhraseList(env.VOICE_NOVELTY_TRIGGERS, ["play a sound", "sound effect"])
    },
    actionLogRetentionDays: parseBoundedInt(env.ACTION_LOG_RETENTION_DAYS, 14, 1, 3650),
    actionLogMaxRows: parseBoundedInt(env.ACTION_LOG_MAX_ROWS, 120_000, 1000, 5_000_000),
    runtimeStructuredLogsEnabled: parseBooleanFlag(env.RUNTIME_STRUCTURED_LOGS_ENABLED, true),
    runtimeStructuredLogsStdout: parseBooleanFlag(env.RUNTIME_STRUCTURED_LOGS_STDOUT, true),
    runtimeStructuredLogsFilePath:
      env.RUNTIME_STRUCTURED_LOGS_FILE_PATH ?? "data/logs/runtime-actions.ndjson"
  };
}

export const appConfig = loadAppConfig();

export type AppConfig = ReturnType<typeof loadAppConfig>;
export type VoiceTuning = AppConfig["voice"];

export function ensureRuntimeEnv(config: Pick<AppConfig, "discordToken"> = appConfig) {
  if (!config.discordToken) {
    throw new Error("Missing DISCORD_TOKEN in environment.");
  }
}

export function normalizeDashboardHost(value: unknown) {
  const normalized = String(value || "").trim();
  return normalized || "127.0.0.1";
}
