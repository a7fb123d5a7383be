export type NormalizeTextOptions = {
  maxLen?: number;
  ellipsis?: boolean;
};

export function normalizeWhitespaceText(value: unknown, options: NormalizeTextOptions = {}): string {
  const normalized = String(value || "")
    .replace(/\s+/g, " ")
    .trim();

  const maxCandidate = Number(options.maxLen);
  if (!Number.isFinite(maxCandidate)) return normalized;

  const maxLen = Math.max(0, Math.floor(maxCandidate));
  if (normalized.length <= maxLen) return normalized;

  if (options.ellipsis) {
    return `${normalized.slice(0, Math.max(0, maxLen - 1)).trimEnd()}…`;
  }

  return normalized.slice(0, maxLen);
}

/**
 * Lowercases and strips punctuation so phrase matching works on speech-to-text
 * output ("Hey, Bot!" -> "hey bot").
 */
export function normalizeSpokenText(value: unknown) {
  return String(value || "")
    .toLowerCase()
    .normalize("NFKC")
    .replace(/[^\p{L}\p{N}]+/gu, " ")
    .trim();
}

export function containsSpokenPhrase(text: unknown, phrase: unknown) {
  const haystack = normalizeSpokenText(text);
  const needle = normalizeSpokenText(phrase);
  if (!haystack || !needle) return false;
  return ` ${haystack} `.includes(` ${needle} `);
}
