const DEFAULT_SPLIT_RE = /[\n,]/g;

type NormalizeStringListOptions = {
  maxItems?: number;
  maxLen?: number;
  splitPattern?: RegExp;
};

function normalizeStringList(
  source: unknown[],
  {
    maxItems = 20,
    maxLen = 120
  }: NormalizeStringListOptions = {}
) {
  return [...new Set(source.map((item) => String(item || "").trim()).filter(Boolean))]
    .slice(0, Math.max(1, maxItems))
    .map((item) => item.slice(0, maxLen));
}

export function normalizeBoundedStringList(
  input: unknown,
  options: NormalizeStringListOptions = {}
) {
  if (Array.isArray(input)) {
    return normalizeStringList(input, options);
  }
  if (typeof input !== "string") return [];
  const splitPattern = options.splitPattern || DEFAULT_SPLIT_RE;
  return normalizeStringList(input.split(splitPattern), options);
}

export function parsePhraseList(value: unknown, fallback: string[]) {
  const parsed = normalizeBoundedStringList(value, { maxItems: 40, maxLen: 80 }).map((item) => item.toLowerCase());
  return parsed.length ? [...new Set(parsed)] : fallback.slice();
}
