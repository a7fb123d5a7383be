import { containsSpokenPhrase, normalizeSpokenText } from "../normalization/text.ts";
import type { SpeakerId } from "./voiceTypes.ts";

export type GateReason = "terminate" | "wake_word" | "follow_up" | "not_addressed" | "empty";

export type GateDecision = {
  accept: boolean;
  reason: GateReason;
  matchedPhrase: string | null;
};

export type LastAddressed = {
  speakerId: SpeakerId;
  at: number;
};

type ConversationGateOptions = {
  wakeWords: string[];
  terminationPhrases: string[];
  conversationWindowMs: number;
};

/**
 * Decides whether a finished utterance is addressed to the assistant. The open
 * conversation window only belongs to the speaker who last addressed it.
 */
export class ConversationGate {
  private wakeWords: string[];
  private readonly terminationPhrases: string[];
  private readonly conversationWindowMs: number;
  private lastAddressedRecord: LastAddressed | null = null;

  constructor({ wakeWords, terminationPhrases, conversationWindowMs }: ConversationGateOptions) {
    this.wakeWords = dedupePhrases(wakeWords);
    this.terminationPhrases = dedupePhrases(terminationPhrases);
    this.conversationWindowMs = Math.max(0, conversationWindowMs);
  }

  get lastAddressed() {
    return this.lastAddressedRecord;
  }

  getWakeWords() {
    return [...this.wakeWords];
  }

  addWakeWord(word: string) {
    this.wakeWords = dedupePhrases([...this.wakeWords, word]);
  }

  evaluate({ speakerId, text, at }: { speakerId: SpeakerId; text: string; at: number }): GateDecision {
    if (!normalizeSpokenText(text)) {
      return { accept: false, reason: "empty", matchedPhrase: null };
    }

    const terminationPhrase = this.terminationPhrases.find((phrase) => containsSpokenPhrase(text, phrase));
    if (terminationPhrase) {
      return { accept: true, reason: "terminate", matchedPhrase: terminationPhrase };
    }

    const wakeWord = this.wakeWords.find((word) => containsSpokenPhrase(text, word));
    if (wakeWord) {
      this.lastAddressedRecord = { speakerId, at };
      return { accept: true, reason: "wake_word", matchedPhrase: wakeWord };
    }

    if (this.isWithinWindow(speakerId, at)) {
      this.lastAddressedRecord = { speakerId, at };
      return { accept: true, reason: "follow_up", matchedPhrase: null };
    }

    return { accept: false, reason: "not_addressed", matchedPhrase: null };
  }

  private isWithinWindow(speakerId: SpeakerId, at: number) {
    const last = this.lastAddressedRecord;
    if (!last || last.speakerId !== speakerId) return false;
    return at - last.at <= this.conversationWindowMs;
  }

  reset() {
    this.lastAddressedRecord = null;
  }
}

function dedupePhrases(phrases: string[]) {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const phrase of phrases) {
    const normalized = normalizeSpokenText(phrase);
    if (!normalized || seen.has(normalized)) continue;
    seen.add(normalized);
    result.push(normalized);
  }
  return result;
}
