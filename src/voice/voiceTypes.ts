import type { LlmUsage } from "../llm/llmHelpers.ts";

export type SpeakerId = string;
export type RoomId = string;

/** Raw s16le PCM at 48 kHz, 2 channels; the shape Discord receive/playback both use. */
export type PcmFrame = Buffer;

export interface FrameSink {
  onFrame(speakerId: SpeakerId, frame: PcmFrame): void;
}

export type Utterance = {
  speakerId: SpeakerId;
  pcm: Buffer;
  arrivedAt: number;
  cutReason: UtteranceCutReason;
};

export type UtteranceCutReason = "silence" | "max_duration";

export type PlayableAudio = {
  pcm: Buffer;
  label: string;
};

export interface VoiceTransport {
  connect(channelId: string): Promise<void>;
  move(channelId: string): Promise<void>;
  disconnect(): Promise<void>;
  play(audio: PlayableAudio): void;
  stop(): void;
  isPlaying(): boolean;
  /** Resolves true once the output is idle, false when `timeoutMs` passes or `signal` aborts first. */
  waitForIdle(timeoutMs: number, signal?: AbortSignal): Promise<boolean>;
  listen(sink: FrameSink): void;
  stopListening(): void;
  onConnectionLost(listener: (reason: string) => void): () => void;
}

export interface Transcriber {
  transcribe(pcm: Buffer, signal: AbortSignal): Promise<string>;
}

export type GenerationResult = {
  text: string;
  provider: string | null;
  model: string | null;
  usage: LlmUsage | null;
};

export type GenerationRequest = {
  systemPrompt: string;
  userMessage: string;
  temperature: number;
  signal: AbortSignal;
  trace: { guildId: string; userId: string | null; source: string };
};

export interface Generator {
  generate(request: GenerationRequest): Promise<GenerationResult>;
}

export interface Synthesizer {
  synthesize(text: string, signal: AbortSignal): Promise<PlayableAudio | null>;
}

export type VoiceStatusState = "idle" | "thinking" | "talking";

export interface StatusSink {
  push(roomId: RoomId, state: VoiceStatusState, label: string, text: string): void;
}

export type Persona = {
  id: string;
  name: string;
  systemPrompt: string;
  temperature: number;
  greeting: string;
  farewell: string;
};

export interface PersonaSource {
  getActivePersona(roomId: RoomId): Persona;
}

export type TranscriptEntry = {
  speaker: string;
  text: string;
  at: number;
};

export type OrchestratorState =
  | "IDLE"
  | "TRANSCRIBING"
  | "GATING"
  | "GENERATING"
  | "SYNTHESIZING"
  | "PLAYING"
  | "COOLDOWN";

export type CycleStatus = "completed" | "handled" | "rejected" | "aborted" | "terminated";

export type CycleOutcome = {
  status: CycleStatus;
  reason: string;
  transcript?: string;
  reply?: string;
};
