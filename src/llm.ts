import Anthropic from "@anthropic-ai/sdk";
import OpenAI, { toFile } from "openai";
import type { AppConfig } from "./config.ts";
import {
  clampNumber,
  extractOpenAiResponseText,
  extractOpenAiResponseUsage,
  normalizeDefaultModel,
  normalizeInlineText,
  normalizeLlmProvider,
  normalizeTtsVoice,
  resolveProviderFallbackOrder,
  type LlmProvider,
  type LlmUsage
} from "./llm/llmHelpers.ts";
import type { ActionLog } from "./runtimeActionLogger.ts";
import { errorMessage } from "./utils.ts";

type LlmConfig = Pick<
  AppConfig,
  | "openaiApiKey"
  | "anthropicApiKey"
  | "defaultProvider"
  | "defaultOpenAiModel"
  | "defaultAnthropicModel"
  | "llmMaxOutputTokens"
  | "transcriptionModel"
  | "transcriptionLanguage"
  | "ttsModel"
  | "ttsVoice"
  | "ttsSpeed"
>;

export type LlmTrace = {
  guildId?: string | null;
  channelId?: string | null;
  userId?: string | null;
  source?: string | null;
};

type ProviderResponse = {
  text: string;
  usage: LlmUsage;
};

type ProviderCall = {
  model: string;
  systemPrompt: string;
  userPrompt: string;
  temperature: number;
  maxOutputTokens: number;
  signal?: AbortSignal;
};

function buildOpenAiTemperatureParam(model: string, temperature: number) {
  const normalizedModel = String(model || "")
    .trim()
    .toLowerCase();
  // reasoning models reject sampling params
  if (/^(?:gpt-5|o\d)(?:$|[-_])/u.test(normalizedModel)) {
    return {};
  }
  return { temperature };
}

export class LLMService {
  appConfig: LlmConfig;
  store: ActionLog;
  openai: OpenAI | null;
  anthropic: Anthropic | null;

  constructor({ appConfig, store }: { appConfig: LlmConfig; store: ActionLog }) {
    this.appConfig = appConfig;
    this.store = store;

    this.openai = appConfig.openaiApiKey ? new OpenAI({ apiKey: appConfig.openaiApiKey }) : null;
    this.anthropic = appConfig.anthropicApiKey ? new Anthropic({ apiKey: appConfig.anthropicApiKey }) : null;
  }

  async generate({
    systemPrompt,
    userMessage,
    temperature,
    provider: requestedProvider = null,
    model: requestedModel = "",
    maxOutputTokens = this.appConfig.llmMaxOutputTokens,
    signal,
    trace = {}
  }: {
    systemPrompt: string;
    userMessage: string;
    temperature: number;
    provider?: LlmProvider | null;
    model?: string;
    maxOutputTokens?: number;
    signal?: AbortSignal;
    trace?: LlmTrace;
  }) {
    let provider: LlmProvider | null = null;
    let model: string | null = null;

    try {
      const resolved = this.resolveProviderAndModel({ provider: requestedProvider, model: requestedModel });
      provider = resolved.provider;
      model = resolved.model;
      const call: ProviderCall = {
        model,
        systemPrompt,
        userPrompt: userMessage,
        temperature: clampNumber(temperature, 0, 2, 0.7),
        maxOutputTokens,
        signal
      };
      const response = provider === "anthropic" ? await this.callAnthropic(call) : await this.callOpenAiResponses(call);

      this.store.logAction({
        kind: "llm_call",
        guildId: trace.guildId ?? null,
        channelId: trace.channelId ?? null,
        userId: trace.userId ?? null,
        content: `${provider}:${model}`,
        metadata: {
          provider,
          model,
          usage: response.usage,
          source: trace.source ? String(trace.source) : null
        }
      });

      return {
        text: response.text,
        provider,
        model,
        usage: response.usage
      };
    } catch (error) {
      this.store.logAction({
        kind: "llm_error",
        guildId: trace.guildId ?? null,
        channelId: trace.channelId ?? null,
        userId: trace.userId ?? null,
        content: errorMessage(error),
        metadata: {
          provider,
          model,
          aborted: Boolean(signal?.aborted)
        }
      });
      throw error;
    }
  }

  isAsrReady() {
    return Boolean(this.openai);
  }

  isSpeechSynthesisReady() {
    return Boolean(this.openai);
  }

  async transcribeAudio({
    wav,
    model = this.appConfig.transcriptionModel,
    language = this.appConfig.transcriptionLanguage,
    signal,
    trace = {}
  }: {
    wav: Buffer;
    model?: string;
    language?: string;
    signal?: AbortSignal;
    trace?: LlmTrace;
  }) {
    const resolvedModel = String(model || "gpt-4o-mini-transcribe").trim() || "gpt-4o-mini-transcribe";
    try {
      if (!this.openai) {
        throw new Error("Transcription requires OPENAI_API_KEY.");
      }
      const response = await this.openai.audio.transcriptions.create(
        {
          model: resolvedModel,
          file: await toFile(wav, "utterance.wav", { type: "audio/wav" }),
          ...(language ? { language } : {})
        },
        { signal }
      );
      const text = String(response.text || "").trim();

      this.store.logAction({
        kind: "asr_call",
        guildId: trace.guildId ?? null,
        channelId: trace.channelId ?? null,
        userId: trace.userId ?? null,
        content: resolvedModel,
        metadata: {
          model: resolvedModel,
          audioBytes: wav.length,
          textChars: text.length,
          source: trace.source || "unknown"
        }
      });

      return text;
    } catch (error) {
      this.store.logAction({
        kind: "asr_error",
        guildId: trace.guildId ?? null,
        channelId: trace.channelId ?? null,
        userId: trace.userId ?? null,
        content: errorMessage(error),
        metadata: {
          model: resolvedModel,
          source: trace.source || "unknown"
        }
      });
      throw error;
    }
  }

  /** Returns 24 kHz mono s16le PCM. */
  async synthesizeSpeech({
    text,
    model = this.appConfig.ttsModel,
    voice = this.appConfig.ttsVoice,
    speed = this.appConfig.ttsSpeed,
    signal,
    trace = {}
  }: {
    text: string;
    model?: string;
    voice?: string;
    speed?: number;
    signal?: AbortSignal;
    trace?: LlmTrace;
  }) {
    const resolvedText = normalizeInlineText(text, 4000);
    const resolvedModel = String(model || "gpt-4o-mini-tts").trim() || "gpt-4o-mini-tts";
    const resolvedVoice = normalizeTtsVoice(voice);
    const resolvedSpeed = clampNumber(speed, 0.25, 4, 1);

    try {
      if (!this.openai) {
        throw new Error("Speech synthesis requires OPENAI_API_KEY.");
      }
      if (!resolvedText) {
        throw new Error("Speech synthesis requires non-empty text.");
      }
      const response = await this.openai.audio.speech.create(
        {
          model: resolvedModel,
          voice: resolvedVoice,
          input: resolvedText,
          speed: resolvedSpeed,
          response_format: "pcm"
        },
        { signal }
      );
      const audioBuffer = Buffer.from(await response.arrayBuffer());
      if (!audioBuffer.length) {
        throw new Error("Speech synthesis returned empty audio.");
      }

      this.store.logAction({
        kind: "tts_call",
        guildId: trace.guildId ?? null,
        channelId: trace.channelId ?? null,
        userId: trace.userId ?? null,
        content: resolvedModel,
        metadata: {
          model: resolvedModel,
          voice: resolvedVoice,
          speed: resolvedSpeed,
          textChars: resolvedText.length,
          source: trace.source || "unknown"
        }
      });

      return audioBuffer;
    } catch (error) {
      this.store.logAction({
        kind: "tts_error",
        guildId: trace.guildId ?? null,
        channelId: trace.channelId ?? null,
        userId: trace.userId ?? null,
        content: errorMessage(error),
        metadata: {
          model: resolvedModel,
          voice: resolvedVoice,
          source: trace.source || "unknown"
        }
      });
      throw error;
    }
  }

  resolveProviderAndModel({ provider, model }: { provider?: LlmProvider | null; model?: string } = {}) {
    const desiredProvider = normalizeLlmProvider(provider, this.appConfig.defaultProvider);
    const desiredModel = String(model || "")
      .trim()
      .slice(0, 120);

    for (const candidate of resolveProviderFallbackOrder(desiredProvider)) {
      if (!this.isProviderConfigured(candidate)) continue;
      return {
        provider: candidate,
        model: candidate === desiredProvider && desiredModel ? desiredModel : this.resolveDefaultModel(candidate)
      };
    }

    throw new Error("No LLM provider available. Add OPENAI_API_KEY or ANTHROPIC_API_KEY.");
  }

  isProviderConfigured(provider: LlmProvider) {
    if (provider === "anthropic") return Boolean(this.anthropic);
    return Boolean(this.openai);
  }

  resolveDefaultModel(provider: LlmProvider) {
    if (provider === "anthropic") {
      return normalizeDefaultModel(this.appConfig.defaultAnthropicModel, "claude-haiku-4-5");
    }
    return normalizeDefaultModel(this.appConfig.defaultOpenAiModel, "gpt-4.1-mini");
  }

  async callOpenAiResponses({
    model,
    systemPrompt,
    userPrompt,
    temperature,
    maxOutputTokens,
    signal
  }: ProviderCall): Promise<ProviderResponse> {
    if (!this.openai) {
      throw new Error("OpenAI LLM calls require OPENAI_API_KEY.");
    }

    const response = await this.openai.responses.create(
      {
        model,
        instructions: systemPrompt,
        ...buildOpenAiTemperatureParam(model, temperature),
        max_output_tokens: maxOutputTokens,
        input: [
          {
            role: "user",
            content: userPrompt
          }
        ]
      },
      { signal }
    );

    return {
      text: extractOpenAiResponseText(response),
      usage: extractOpenAiResponseUsage(response)
    };
  }

  async callAnthropic({
    model,
    systemPrompt,
    userPrompt,
    temperature,
    maxOutputTokens,
    signal
  }: ProviderCall): Promise<ProviderResponse> {
    if (!this.anthropic) {
      throw new Error("Anthropic LLM calls require ANTHROPIC_API_KEY.");
    }

    const response = await this.anthropic.messages.create(
      {
        model,
        system: systemPrompt,
        temperature: Math.min(1, temperature),
        max_tokens: maxOutputTokens,
        messages: [{ role: "user", content: userPrompt }]
      },
      { signal }
    );

    const text = response.content
      .flatMap((item) => (item.type === "text" ? [item.text] : []))
      .join("\n")
      .trim();

    return {
      text,
      usage: {
        inputTokens: Number(response.usage?.input_tokens || 0),
        outputTokens: Number(response.usage?.output_tokens || 0),
        cacheWriteTokens: Number(response.usage?.cache_creation_input_tokens || 0),
        cacheReadTokens: Number(response.usage?.cache_read_input_tokens || 0)
      }
    };
  }
}
