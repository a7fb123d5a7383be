import type { VoiceTuning } from "../config.ts";
import { normalizeWhitespaceText } from "../normalization/text.ts";
import type { ActionLog } from "../runtimeActionLogger.ts";
import { runWithTimeout, shortError } from "../utils.ts";
import type { ConversationGate, GateDecision } from "./conversationGate.ts";
import type { PlaybackController } from "./playbackController.ts";
import { RoomLock } from "./roomLock.ts";
import type { RollingTranscript } from "./rollingTranscript.ts";
import { buildVoiceSystemPrompt, buildVoiceTurnPrompt } from "./voicePrompt.ts";
import {
  GenerationFailure,
  GenerationTimeout,
  PlaybackFailure,
  SynthesisFailure,
  TranscriptionEmpty,
  TranscriptionTimeout,
  VoicePipelineError
} from "./voicePipelineErrors.ts";
import type {
  CycleOutcome,
  Generator,
  OrchestratorState,
  Persona,
  PersonaSource,
  PlayableAudio,
  SpeakerId,
  StatusSink,
  Synthesizer,
  TranscriptEntry,
  Transcriber,
  Utterance,
  VoiceStatusState
} from "./voiceTypes.ts";

export type VoiceHandlerContext = {
  roomId: string;
  speakerId: SpeakerId;
  speakerName: string;
  transcript: string;
  persona: Persona;
  /** Synthesizes and plays `text`; resolves false when nothing could be played. */
  speak(text: string, label: string): Promise<boolean>;
  play(audio: PlayableAudio): void;
};

export type VoiceHandlerResult = {
  /** Spoken text to record in the rolling transcript, if any. */
  reply: string | null;
  label: string;
};

/** Optional behavior that can own a gated cycle instead of the generation path. */
export interface VoiceCycleHandler {
  readonly name: string;
  matches(transcript: string): boolean;
  handle(context: VoiceHandlerContext): Promise<VoiceHandlerResult>;
}

export type VoiceExchange = {
  speakerId: SpeakerId;
  speakerName: string;
  text: string;
  reply: string;
  personaName: string;
};

type RequestOrchestratorOptions = {
  roomId: string;
  sessionId: string;
  textChannelId?: string | null;
  tuning: VoiceTuning;
  store: ActionLog;
  gate: ConversationGate;
  transcript: RollingTranscript;
  playback: PlaybackController;
  transcriber: Transcriber;
  generator: Generator;
  synthesizer: Synthesizer;
  statusSink: StatusSink;
  personas: PersonaSource;
  handlers?: VoiceCycleHandler[];
  lock?: RoomLock;
  resolveSpeakerName?: (speakerId: SpeakerId) => string;
  onTerminate?: (request: { speakerId: SpeakerId; text: string }) => Promise<unknown> | void;
  onExchange?: (exchange: VoiceExchange) => Promise<unknown> | void;
  onUtteranceTranscribed?: (speakerId: SpeakerId) => void;
  now?: () => number;
};

type PreLockPhase = "TRANSCRIBING" | "GATING";

/**
 * Per-room response pipeline. Transcription and gating run for every
 * utterance as it arrives; generation through playback only runs while the
 * room lock is held, so two cycles never generate or play at once.
 */
export class RequestOrchestrator {
  readonly lock: RoomLock;
  private readonly options: RequestOrchestratorOptions;
  private readonly handlers: VoiceCycleHandler[];
  private readonly preLockPhases: Record<PreLockPhase, number> = { TRANSCRIBING: 0, GATING: 0 };
  private lockedState: OrchestratorState | null = null;
  private pending = 0;
  private disposed = false;
  private completedCycles = 0;

  constructor(options: RequestOrchestratorOptions) {
    this.options = options;
    this.handlers = [...(options.handlers ?? [])];
    this.lock = options.lock ?? new RoomLock();
  }

  /** State of the cycle holding the room lock, else the busiest pre-lock phase. */
  get state(): OrchestratorState {
    if (this.lockedState) return this.lockedState;
    if (this.preLockPhases.TRANSCRIBING > 0) return "TRANSCRIBING";
    if (this.preLockPhases.GATING > 0) return "GATING";
    return "IDLE";
  }

  get pendingCycles() {
    return this.pending;
  }

  get completedCycleCount() {
    return this.completedCycles;
  }

  registerHandler(handler: VoiceCycleHandler) {
    this.handlers.push(handler);
  }

  dispose() {
    this.disposed = true;
  }

  /**
   * Speaks a line that no utterance asked for (greeting, farewell). Waits for
   * the room lock like any response and runs the same cooldown afterwards.
   */
  async announce(text: string, label: string) {
    if (this.disposed || !normalizeWhitespaceText(text)) return false;
    return await this.lock.runExclusive(async () => {
      this.setLockedState("PLAYING");
      try {
        return await this.speak(text, label, null);
      } finally {
        await this.cooldown();
      }
    });
  }

  async handleUtterance(utterance: Utterance): Promise<CycleOutcome> {
    if (this.disposed) return { status: "aborted", reason: "disposed" };
    this.pending += 1;
    try {
      const outcome = await this.runCycle(utterance);
      this.logRuntime("cycle_finished", utterance.speakerId, {
        status: outcome.status,
        reason: outcome.reason
      });
      return outcome;
    } catch (error) {
      this.logError("cycle_failed", error, utterance.speakerId);
      return { status: "aborted", reason: "unexpected_error" };
    } finally {
      this.pending -= 1;
    }
  }

  private async runCycle(utterance: Utterance): Promise<CycleOutcome> {
    const { speakerId } = utterance;
    const text = await this.withPhase("TRANSCRIBING", () => this.transcribe(utterance));
    if (typeof text !== "string") return text;
    if (this.disposed) return { status: "aborted", reason: "disposed" };

    this.options.onUtteranceTranscribed?.(speakerId);
    const speakerName = this.resolveSpeakerName(speakerId);
    const recorded = this.options.transcript.append(speakerName, text, utterance.arrivedAt);

    const decision = await this.withPhase("GATING", async () =>
      this.options.gate.evaluate({ speakerId, text, at: utterance.arrivedAt })
    );
    this.logGateDecision(speakerId, text, decision);

    if (decision.reason === "terminate") {
      await this.options.onTerminate?.({ speakerId, text });
      return { status: "terminated", reason: decision.matchedPhrase ?? "terminate", transcript: text };
    }
    if (!decision.accept) {
      return { status: "rejected", reason: decision.reason, transcript: text };
    }

    return await this.lock.runExclusive(() => this.respond({ speakerId, speakerName, text, recorded }));
  }

  private async transcribe(utterance: Utterance): Promise<string | CycleOutcome> {
    const { transcriptionTimeoutMs } = this.options.tuning;
    try {
      const raw = await runWithTimeout(
        transcriptionTimeoutMs,
        (signal) => this.options.transcriber.transcribe(utterance.pcm, signal),
        () => new TranscriptionTimeout(transcriptionTimeoutMs)
      );
      const text = normalizeWhitespaceText(raw);
      if (!text) throw new TranscriptionEmpty();
      return text;
    } catch (error) {
      if (error instanceof TranscriptionEmpty) {
        this.logRuntime("transcription_empty", utterance.speakerId);
        return { status: "aborted", reason: error.code };
      }
      this.logError("transcription_failed", error, utterance.speakerId);
      return {
        status: "aborted",
        reason: error instanceof VoicePipelineError ? error.code : "transcription_failed"
      };
    }
  }

  private async respond({
    speakerId,
    speakerName,
    text,
    recorded
  }: {
    speakerId: SpeakerId;
    speakerName: string;
    text: string;
    recorded: TranscriptEntry | null;
  }): Promise<CycleOutcome> {
    if (this.disposed) return { status: "aborted", reason: "disposed" };
    const persona = this.options.personas.getActivePersona(this.options.roomId);

    try {
      const handler = this.findHandler(text, speakerId);
      if (handler) {
        return await this.runHandler(handler, { speakerId, speakerName, text, persona });
      }
      return await this.generateAndSpeak({ speakerId, speakerName, text, recorded, persona });
    } finally {
      await this.cooldown();
    }
  }

  private async generateAndSpeak({
    speakerId,
    speakerName,
    text,
    recorded,
    persona
  }: {
    speakerId: SpeakerId;
    speakerName: string;
    text: string;
    recorded: TranscriptEntry | null;
    persona: Persona;
  }): Promise<CycleOutcome> {
    const { tuning, playback, transcript } = this.options;

    this.setLockedState("GENERATING");
    playback.startAmbient();
    this.pushStatus("thinking", persona.name, text);

    const history = transcript
      .recent(tuning.promptHistoryEntries + 1, this.now())
      .filter((entry) => entry !== recorded)
      .slice(-tuning.promptHistoryEntries);

    let reply: string;
    try {
      const result = await runWithTimeout(
        tuning.generationTimeoutMs,
        (signal) =>
          this.options.generator.generate({
            systemPrompt: buildVoiceSystemPrompt(persona),
            userMessage: buildVoiceTurnPrompt({ speakerName, transcript: text, history }),
            temperature: persona.temperature,
            signal,
            trace: { guildId: this.options.roomId, userId: speakerId, source: "voice_reply" }
          }),
        () => new GenerationTimeout(tuning.generationTimeoutMs)
      );
      reply = normalizeWhitespaceText(result.text);
      if (!reply) throw new GenerationFailure("generation returned no text");
    } catch (error) {
      await playback.stopAmbient();
      const failure =
        error instanceof VoicePipelineError
          ? error
          : new GenerationFailure(shortError(error), { cause: error });
      this.logError("generation_failed", failure, speakerId);
      if (failure instanceof GenerationTimeout && tuning.apologizeOnGenerationTimeout) {
        await this.speak(tuning.apologyText, "apology", speakerId);
      }
      return { status: "aborted", reason: failure.code, transcript: text };
    }

    transcript.append(persona.name, reply, this.now());

    this.setLockedState("SYNTHESIZING");
    const audio = await this.synthesize(reply, "reply", speakerId);
    await playback.stopAmbient();

    let played = false;
    if (audio) {
      this.setLockedState("PLAYING");
      played = this.playAudio(audio, speakerId);
      if (played) this.pushStatus("talking", persona.name, reply);
    }

    this.completedCycles += 1;
    await this.echoExchange({ speakerId, speakerName, text, reply, personaName: persona.name });
    return {
      status: "completed",
      reason: played ? "played" : audio ? "playback_failure" : "synthesis_failure",
      transcript: text,
      reply
    };
  }

  private async runHandler(
    handler: VoiceCycleHandler,
    {
      speakerId,
      speakerName,
      text,
      persona
    }: { speakerId: SpeakerId; speakerName: string; text: string; persona: Persona }
  ): Promise<CycleOutcome> {
    this.setLockedState("PLAYING");
    try {
      const result = await handler.handle({
        roomId: this.options.roomId,
        speakerId,
        speakerName,
        transcript: text,
        persona,
        speak: (line, label) => this.speak(line, label, speakerId),
        play: (audio) => {
          if (this.playAudio(audio, speakerId)) this.pushStatus("talking", persona.name, audio.label);
        }
      });
      if (result.reply) {
        this.options.transcript.append(persona.name, result.reply, this.now());
      }
      this.completedCycles += 1;
      return { status: "handled", reason: `${handler.name}:${result.label}`, transcript: text, reply: result.reply ?? undefined };
    } catch (error) {
      this.logError(`handler_failed:${handler.name}`, error, speakerId);
      return { status: "aborted", reason: "handler_failed", transcript: text };
    }
  }

  private findHandler(text: string, speakerId: SpeakerId) {
    for (const handler of this.handlers) {
      try {
        if (handler.matches(text)) return handler;
      } catch (error) {
        this.logError(`handler_match_failed:${handler.name}`, error, speakerId);
      }
    }
    return null;
  }

  private async speak(text: string, label: string, speakerId: SpeakerId | null) {
    const audio = await this.synthesize(text, label, speakerId);
    if (!audio) return false;
    await this.options.playback.stopAmbient();
    const played = this.playAudio(audio, speakerId);
    if (played) {
      const persona = this.options.personas.getActivePersona(this.options.roomId);
      this.pushStatus("talking", persona.name, text);
    }
    return played;
  }

  private async synthesize(text: string, label: string, speakerId: SpeakerId | null) {
    const { synthesisTimeoutMs } = this.options.tuning;
    try {
      const audio = await runWithTimeout(
        synthesisTimeoutMs,
        (signal) => this.options.synthesizer.synthesize(text, signal),
        () => new SynthesisFailure(`synthesis timed out after ${synthesisTimeoutMs}ms`)
      );
      if (!audio || !audio.pcm.length) throw new SynthesisFailure("synthesis returned no audio");
      return { ...audio, label };
    } catch (error) {
      const failure =
        error instanceof SynthesisFailure ? error : new SynthesisFailure(shortError(error), { cause: error });
      this.logError("synthesis_failed", failure, speakerId);
      return null;
    }
  }

  private playAudio(audio: PlayableAudio, speakerId: SpeakerId | null) {
    try {
      this.options.playback.play(audio);
      return true;
    } catch (error) {
      const failure =
        error instanceof PlaybackFailure ? error : new PlaybackFailure(shortError(error), { cause: error });
      this.logError("playback_failed", failure, speakerId);
      return false;
    }
  }

  /** Runs on every exit from the locked span before the lock is released. */
  private async cooldown() {
    const { playback } = this.options;
    this.setLockedState("COOLDOWN");
    try {
      await playback.stopAmbient();
      if (!this.disposed) {
        await playback.waitForPlaybackEnd();
      }
    } catch (error) {
      this.logError("playback_failed", error, null);
    }
    this.pushStatus("idle", "", "");
    if (!this.disposed) {
      await playback.resyncCapture();
    }
    this.setLockedState(null);
  }

  private async echoExchange(exchange: VoiceExchange) {
    try {
      await this.options.onExchange?.(exchange);
    } catch (error) {
      this.logError("text_echo_failed", error, exchange.speakerId);
    }
  }

  private async withPhase<T>(phase: PreLockPhase, task: () => Promise<T>) {
    this.preLockPhases[phase] += 1;
    try {
      return await task();
    } finally {
      this.preLockPhases[phase] -= 1;
    }
  }

  private setLockedState(state: OrchestratorState | null) {
    const previous = this.state;
    this.lockedState = state;
    const next = this.state;
    if (previous !== next) {
      this.logRuntime("state_transition", null, { from: previous, to: next });
    }
  }

  private pushStatus(state: VoiceStatusState, label: string, text: string) {
    try {
      this.options.statusSink.push(this.options.roomId, state, label, text);
    } catch (error) {
      this.logError("status_push_failed", error, null);
    }
  }

  private resolveSpeakerName(speakerId: SpeakerId) {
    const resolved = this.options.resolveSpeakerName?.(speakerId);
    return String(resolved || speakerId);
  }

  private now() {
    return this.options.now?.() ?? Date.now();
  }

  private logGateDecision(speakerId: SpeakerId, text: string, decision: GateDecision) {
    this.logRuntime("gate_decision", speakerId, {
      accept: decision.accept,
      reason: decision.reason,
      matchedPhrase: decision.matchedPhrase,
      transcript: text
    });
  }

  private logRuntime(content: string, speakerId: SpeakerId | null, metadata: Record<string, unknown> = {}) {
    this.options.store.logAction({
      kind: "voice_runtime",
      guildId: this.options.roomId,
      channelId: this.options.textChannelId ?? null,
      userId: speakerId,
      content,
      metadata: {
        sessionId: this.options.sessionId,
        ...metadata
      }
    });
  }

  private logError(content: string, error: unknown, speakerId: SpeakerId | null) {
    this.options.store.logAction({
      kind: "voice_error",
      guildId: this.options.roomId,
      channelId: this.options.textChannelId ?? null,
      userId: speakerId,
      content: `${content}: ${shortError(error)}`,
      metadata: {
        sessionId: this.options.sessionId,
        code: error instanceof VoicePipelineError ? error.code : null
      }
    });
  }
}
