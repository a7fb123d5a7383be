import { normalizeWhitespaceText } from "../normalization/text.ts";
import type { Persona, TranscriptEntry } from "./voiceTypes.ts";

const MAX_TRANSCRIPT_CHARS = 700;

export function buildVoiceToneGuardrails() {
  return [
    "Keep turns tight: one clear idea, usually one or two short sentences.",
    "Use natural spoken phrasing; no chat shorthand, no markdown, no lists.",
    "Avoid assistant-like preambles, disclaimers, and over-explaining."
  ];
}

export function buildVoiceSystemPrompt(persona: Persona) {
  const parts = [
    persona.systemPrompt.trim(),
    `Your name is ${persona.name}. You are talking out loud in a shared voice room; several people may be speaking.`,
    ...buildVoiceToneGuardrails()
  ];
  return parts.filter(Boolean).join("\n");
}

function formatTranscript(entries: TranscriptEntry[]) {
  if (!entries.length) return "(no earlier conversation)";
  return entries.map((entry) => `- ${entry.speaker}: ${entry.text}`).join("\n");
}

/**
 * The history excludes the incoming line itself; the orchestrator appends it
 * to the transcript before gating.
 */
export function buildVoiceTurnPrompt({
  speakerName,
  transcript,
  history
}: {
  speakerName: string;
  transcript: string;
  history: TranscriptEntry[];
}) {
  const speaker = speakerName.trim() || "unknown";
  const text = normalizeWhitespaceText(transcript, { maxLen: MAX_TRANSCRIPT_CHARS });
  return [
    "Recent voice conversation:",
    formatTranscript(history),
    `Incoming live voice transcript from ${speaker}: ${text || "(empty)"}`,
    "Task: respond as a short spoken reply."
  ].join("\n\n");
}
