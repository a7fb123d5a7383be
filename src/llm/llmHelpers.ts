export const LLM_PROVIDERS = ["openai", "anthropic"] as const;
export type LlmProvider = (typeof LLM_PROVIDERS)[number];

export const TTS_VOICES = ["alloy", "ash", "ballad", "coral", "echo", "fable", "onyx", "nova", "sage", "shimmer", "verse"] as const;
export type TtsVoice = (typeof TTS_VOICES)[number];

export type LlmUsage = {
  inputTokens: number;
  outputTokens: number;
  cacheWriteTokens: number;
  cacheReadTokens: number;
};

type OpenAiResponseLike = {
  output_text?: unknown;
  output?: unknown;
  usage?: {
    input_tokens?: unknown;
    output_tokens?: unknown;
    input_tokens_details?: { cached_tokens?: unknown } | null;
  } | null;
};

export function extractOpenAiResponseText(response: OpenAiResponseLike | null | undefined) {
  const direct = String(response?.output_text || "").trim();
  if (direct) return direct;

  const output = Array.isArray(response?.output) ? response.output : [];
  const textParts: string[] = [];

  for (const item of output) {
    if (!item || typeof item !== "object") continue;
    if (item.type !== "message") continue;
    const contentParts = Array.isArray(item.content) ? item.content : [];
    for (const part of contentParts) {
      if (!part || typeof part !== "object") continue;
      if (part.type !== "output_text") continue;
      const text = String(part.text || "").trim();
      if (text) textParts.push(text);
    }
  }

  return textParts.join("\n").trim();
}

export function extractOpenAiResponseUsage(response: OpenAiResponseLike | null | undefined): LlmUsage {
  const usage = response?.usage && typeof response.usage === "object" ? response.usage : null;
  return {
    inputTokens: Number(usage?.input_tokens || 0),
    outputTokens: Number(usage?.output_tokens || 0),
    cacheWriteTokens: 0,
    cacheReadTokens: Number(usage?.input_tokens_details?.cached_tokens || 0)
  };
}

export function normalizeInlineText(value: unknown, maxLen: number) {
  return String(value || "")
    .replace(/\s+/g, " ")
    .trim()
    .slice(0, maxLen);
}

export function clampNumber(value: unknown, min: number, max: number, fallback = min) {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) return fallback;
  if (parsed < min) return min;
  if (parsed > max) return max;
  return parsed;
}

export function normalizeLlmProvider(value: unknown, fallback: LlmProvider = "openai"): LlmProvider {
  const normalized = String(value || "")
    .trim()
    .toLowerCase();
  if (normalized === "anthropic") return "anthropic";
  if (normalized === "openai") return "openai";
  return fallback;
}

export function normalizeTtsVoice(value: unknown, fallback: TtsVoice = "alloy"): TtsVoice {
  const normalized = String(value || "")
    .trim()
    .toLowerCase();
  return TTS_VOICES.find((voice) => voice === normalized) ?? fallback;
}

export function resolveProviderFallbackOrder(provider: LlmProvider): LlmProvider[] {
  if (provider === "anthropic") return ["anthropic", "openai"];
  return ["openai", "anthropic"];
}

export function normalizeDefaultModel(value: unknown, fallback: string) {
  const normalized = String(value || "").trim();
  if (normalized) return normalized.slice(0, 120);
  return String(fallback || "").trim().slice(0, 120);
}
