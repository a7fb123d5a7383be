import { normalizeWhitespaceText } from "../normalization/text.ts";
import type { TranscriptEntry } from "./voiceTypes.ts";

const MAX_ENTRY_TEXT_CHARS = 800;

export class RollingTranscript {
  private readonly entries: TranscriptEntry[] = [];
  readonly maxEntries: number;
  readonly maxAgeMs: number;

  constructor({ maxEntries = 20, maxAgeMs = 300_000 }: { maxEntries?: number; maxAgeMs?: number } = {}) {
    this.maxEntries = Math.max(1, Math.floor(maxEntries));
    this.maxAgeMs = Math.max(0, maxAgeMs);
  }

  get size() {
    return this.entries.length;
  }

  append(speaker: string, text: string, at = Date.now()) {
    const normalized = normalizeWhitespaceText(text, { maxLen: MAX_ENTRY_TEXT_CHARS, ellipsis: true });
    if (!normalized) return null;
    const entry: TranscriptEntry = { speaker, text: normalized, at };
    this.entries.push(entry);
    if (this.entries.length > this.maxEntries) {
      this.entries.splice(0, this.entries.length - this.maxEntries);
    }
    return entry;
  }

  /** Drops entries older than `maxAgeMs` relative to `now`. */
  prune(now = Date.now()) {
    if (this.maxAgeMs <= 0) return 0;
    const cutoff = now - this.maxAgeMs;
    const firstFresh = this.entries.findIndex((entry) => entry.at >= cutoff);
    const removeCount = firstFresh === -1 ? this.entries.length : firstFresh;
    if (removeCount > 0) this.entries.splice(0, removeCount);
    return removeCount;
  }

  recent(limit: number, now = Date.now()) {
    this.prune(now);
    if (limit <= 0) return [];
    return this.entries.slice(-limit);
  }

  snapshot() {
    return [...this.entries];
  }

  clear() {
    this.entries.length = 0;
  }
}
