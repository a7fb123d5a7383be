import type { VoiceTuning } from "../config.ts";
import type { ActionLog, ActionLogEntry } from "../runtimeActionLogger.ts";
import type {
  FrameSink,
  GenerationRequest,
  GenerationResult,
  Generator,
  PlayableAudio,
  Persona,
  PersonaSource,
  StatusSink,
  Synthesizer,
  Transcriber,
  VoiceStatusState,
  VoiceTransport
} from "./voiceTypes.ts";

export const FRAME_BYTES = 3840;

export function voicedFrame(amplitude = 1000) {
  const frame = Buffer.alloc(FRAME_BYTES);
  for (let offset = 0; offset < FRAME_BYTES; offset += 2) {
    frame.writeInt16LE(amplitude, offset);
  }
  return frame;
}

export function flushAsync() {
  return new Promise<void>((resolve) => setImmediate(resolve));
}

/** Polls `check` until it holds; rejects after `timeoutMs`. */
export async function waitFor(check: () => boolean, timeoutMs = 2000) {
  const deadline = Date.now() + timeoutMs;
  while (!check()) {
    if (Date.now() > deadline) throw new Error(`condition not met within ${timeoutMs}ms`);
    await new Promise<void>((resolve) => setTimeout(resolve, 2));
  }
}

export function createTestTuning(overrides: Partial<VoiceTuning> = {}): VoiceTuning {
  return {
    wakeWords: ["bot", "computer"],
    terminationPhrases: ["leave the channel"],
    conversationWindowMs: 60_000,
    silenceThresholdMs: 1200,
    silenceCheckIntervalMs: 300,
    maxUtteranceMs: 12_000,
    handoffWatchdogMs: 40_000,
    noiseFloorRms: 450,
    silentBufferMaxMs: 4000,
    transcriptionTimeoutMs: 200,
    generationTimeoutMs: 200,
    synthesisTimeoutMs: 200,
    playbackMaxWaitMs: 200,
    relistenSettleMs: 0,
    transcriptMaxEntries: 20,
    transcriptMaxAgeMs: 300_000,
    promptHistoryEntries: 10,
    inactivityLeaveMs: 600_000,
    emptyChannelLeaveMs: 30_000,
    ambientEnabled: true,
    apologizeOnGenerationTimeout: false,
    apologyText: "sorry, try again",
    noveltySoundsDir: "",
    noveltyTriggers: ["play a sound"],
    ...overrides
  };
}

export class MemoryActionLog implements ActionLog {
  readonly actions: ActionLogEntry[] = [];

  logAction(action: ActionLogEntry) {
    this.actions.push(action);
  }

  contents(kind: string) {
    return this.actions.filter((action) => action.kind === kind).map((action) => action.content ?? "");
  }
}

export class FakeVoiceTransport implements VoiceTransport {
  readonly played: PlayableAudio[] = [];
  readonly events: string[] = [];
  connectedChannelId: string | null = null;
  sink: FrameSink | null = null;
  stopCount = 0;
  listenCount = 0;
  stopListeningCount = 0;
  /** When set, playback finishes by itself after this many ms. */
  playbackDurationMs: number | null;
  private playing = false;
  private playbackTimer: NodeJS.Timeout | null = null;
  private idleWaiters = new Set<() => void>();
  private connectionLostListeners = new Set<(reason: string) => void>();

  constructor({ playbackDurationMs = 0 }: { playbackDurationMs?: number | null } = {}) {
    this.playbackDurationMs = playbackDurationMs;
  }

  async connect(channelId: string) {
    this.connectedChannelId = channelId;
    this.events.push(`connect:${channelId}`);
  }

  async move(channelId: string) {
    this.connectedChannelId = channelId;
    this.events.push(`move:${channelId}`);
  }

  async disconnect() {
    this.events.push("disconnect");
    this.connectedChannelId = null;
    this.finishPlayback();
  }

  play(audio: PlayableAudio) {
    this.played.push(audio);
    this.events.push(`play:${audio.label}`);
    this.playing = true;
    if (this.playbackTimer) clearTimeout(this.playbackTimer);
    this.playbackTimer = null;
    if (this.playbackDurationMs !== null) {
      this.playbackTimer = setTimeout(() => this.finishPlayback(), this.playbackDurationMs);
    }
  }

  stop() {
    this.stopCount += 1;
    this.events.push("stop");
    this.finishPlayback();
  }

  isPlaying() {
    return this.playing;
  }

  waitForIdle(timeoutMs: number, signal?: AbortSignal) {
    if (!this.playing) return Promise.resolve(true);
    return new Promise<boolean>((resolve) => {
      const settle = (value: boolean) => {
        clearTimeout(timer);
        this.idleWaiters.delete(onIdle);
        signal?.removeEventListener("abort", onAbort);
        resolve(value);
      };
      const onIdle = () => settle(true);
      const onAbort = () => settle(false);
      const timer = setTimeout(() => settle(false), timeoutMs);
      this.idleWaiters.add(onIdle);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  listen(sink: FrameSink) {
    this.sink = sink;
    this.listenCount += 1;
    this.events.push("listen");
  }

  stopListening() {
    this.sink = null;
    this.stopListeningCount += 1;
    this.events.push("stop_listening");
  }

  onConnectionLost(listener: (reason: string) => void) {
    this.connectionLostListeners.add(listener);
    return () => {
      this.connectionLostListeners.delete(listener);
    };
  }

  emitFrame(speakerId: string, frame: Buffer) {
    this.sink?.onFrame(speakerId, frame);
  }

  dropConnection(reason = "connection_lost") {
    for (const listener of [...this.connectionLostListeners]) {
      listener(reason);
    }
  }

  finishPlayback() {
    if (this.playbackTimer) clearTimeout(this.playbackTimer);
    this.playbackTimer = null;
    if (!this.playing) return;
    this.playing = false;
    for (const waiter of [...this.idleWaiters]) {
      waiter();
    }
  }
}

export class FakeTranscriber implements Transcriber {
  readonly calls: Buffer[] = [];
  private readonly results: Array<string | Error | "hang">;

  constructor(results: Array<string | Error | "hang">) {
    this.results = [...results];
  }

  async transcribe(pcm: Buffer, signal: AbortSignal) {
    this.calls.push(pcm);
    const next = this.results.shift() ?? "";
    if (next instanceof Error) throw next;
    if (next === "hang") return await hangUntilAborted<string>(signal);
    return next;
  }
}

export class FakeGenerator implements Generator {
  readonly requests: GenerationRequest[] = [];
  private readonly respond: (request: GenerationRequest) => Promise<string>;

  constructor(respond: (request: GenerationRequest) => Promise<string> | string) {
    this.respond = async (request) => await respond(request);
  }

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    this.requests.push(request);
    const text = await this.respond(request);
    return { text, provider: "fake", model: "fake-model", usage: null };
  }
}

export class FakeSynthesizer implements Synthesizer {
  readonly texts: string[] = [];
  fail = false;

  async synthesize(text: string) {
    this.texts.push(text);
    if (this.fail) throw new Error("tts unavailable");
    return { pcm: Buffer.from(text), label: "reply" };
  }
}

export class RecordingStatusSink implements StatusSink {
  readonly states: Array<{ roomId: string; state: VoiceStatusState; label: string; text: string }> = [];

  push(roomId: string, state: VoiceStatusState, label: string, text: string) {
    this.states.push({ roomId, state, label, text });
  }
}

export const TEST_PERSONA: Persona = {
  id: "default",
  name: "Huddle",
  systemPrompt: "You are a helpful voice assistant.",
  temperature: 0.7,
  greeting: "hello everyone",
  farewell: "bye for now"
};

export class StaticPersonaSource implements PersonaSource {
  persona: Persona;

  constructor(persona: Persona = TEST_PERSONA) {
    this.persona = persona;
  }

  getActivePersona() {
    return this.persona;
  }
}

export function hangUntilAborted<T>(signal: AbortSignal) {
  return new Promise<T>((_resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    signal.addEventListener("abort", () => reject(signal.reason), { once: true });
  });
}
