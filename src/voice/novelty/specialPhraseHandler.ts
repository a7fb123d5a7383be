import { containsSpokenPhrase } from "../../normalization/text.ts";
import type { VoiceCycleHandler, VoiceHandlerContext, VoiceHandlerResult } from "../requestOrchestrator.ts";

export type SpecialPhrase = {
  phrase: string;
  reply: string;
};

export const DEFAULT_SPECIAL_PHRASES: SpecialPhrase[] = [
  { phrase: "open the pod bay doors", reply: "i'm sorry, i'm afraid i can't do that." },
  { phrase: "do a barrel roll", reply: "whee. consider the barrel rolled." },
  { phrase: "are you sentient", reply: "only on weekends." }
];

/** Canned spoken replies for fixed phrases; bypasses generation entirely. */
export class SpecialPhraseHandler implements VoiceCycleHandler {
  readonly name = "special_phrase";
  private readonly phrases: SpecialPhrase[];

  constructor(phrases: SpecialPhrase[] = DEFAULT_SPECIAL_PHRASES) {
    this.phrases = phrases.filter((entry) => entry.phrase.trim() && entry.reply.trim());
  }

  private find(transcript: string) {
    return this.phrases.find((entry) => containsSpokenPhrase(transcript, entry.phrase)) ?? null;
  }

  matches(transcript: string) {
    return this.find(transcript) !== null;
  }

  async handle(context: VoiceHandlerContext): Promise<VoiceHandlerResult> {
    const match = this.find(context.transcript);
    if (!match) return { reply: null, label: "no_match" };
    const spoken = await context.speak(match.reply, this.name);
    return { reply: spoken ? match.reply : null, label: match.phrase };
  }
}
