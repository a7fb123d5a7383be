import type { VoiceTuning } from "../config.ts";
import { isVoicedFrame, pcmBytesForMs, pcmDurationMs } from "./pcmAudio.ts";
import type { PcmFrame, SpeakerId, Utterance, UtteranceCutReason } from "./voiceTypes.ts";

export type SegmenterTuning = Pick<
  VoiceTuning,
  | "silenceThresholdMs"
  | "silenceCheckIntervalMs"
  | "maxUtteranceMs"
  | "handoffWatchdogMs"
  | "noiseFloorRms"
  | "silentBufferMaxMs"
>;

export type SegmenterDiagnostic =
  | { event: "utterance_cut"; reason: UtteranceCutReason; durationMs: number }
  | { event: "silent_buffer_dropped"; droppedBytes: number }
  | { event: "handoff_watchdog_cleared"; heldMs: number };

type SpeakerSegmenterOptions = {
  speakerId: SpeakerId;
  tuning: SegmenterTuning;
  onUtterance: (utterance: Utterance) => Promise<unknown> | void;
  onHandoffError?: (error: unknown, utterance: Utterance) => void;
  onDiagnostic?: (diagnostic: SegmenterDiagnostic) => void;
  now?: () => number;
};

type SpeakerBuffer = {
  chunks: Buffer[];
  byteLength: number;
  lastFrameAt: number;
  lastVoicedAt: number;
  speechDetected: boolean;
  handoffInFlight: boolean;
  handoffStartedAt: number;
  handoffToken: number;
};

export class SpeakerSegmenter {
  readonly speakerId: SpeakerId;
  private readonly tuning: SegmenterTuning;
  private readonly onUtterance: SpeakerSegmenterOptions["onUtterance"];
  private readonly onHandoffError: NonNullable<SpeakerSegmenterOptions["onHandoffError"]>;
  private readonly onDiagnostic: NonNullable<SpeakerSegmenterOptions["onDiagnostic"]>;
  private readonly now: () => number;
  private readonly silentBufferMaxBytes: number;
  private readonly buffer: SpeakerBuffer;
  private timer: NodeJS.Timeout | null = null;
  private stopped = false;

  constructor({ speakerId, tuning, onUtterance, onHandoffError, onDiagnostic, now }: SpeakerSegmenterOptions) {
    this.speakerId = speakerId;
    this.tuning = tuning;
    this.onUtterance = onUtterance;
    this.onHandoffError = onHandoffError ?? (() => undefined);
    this.onDiagnostic = onDiagnostic ?? (() => undefined);
    this.now = now ?? Date.now;
    this.silentBufferMaxBytes = pcmBytesForMs(tuning.silentBufferMaxMs);
    this.buffer = {
      chunks: [],
      byteLength: 0,
      lastFrameAt: 0,
      lastVoicedAt: 0,
      speechDetected: false,
      handoffInFlight: false,
      handoffStartedAt: 0,
      handoffToken: 0
    };
  }

  get handoffInFlight() {
    return this.buffer.handoffInFlight;
  }

  get bufferedBytes() {
    return this.buffer.byteLength;
  }

  get speechDetected() {
    return this.buffer.speechDetected;
  }

  get lastFrameAt() {
    return this.buffer.lastFrameAt;
  }

  start() {
    if (this.timer || this.stopped) return;
    this.timer = setInterval(() => this.evaluate(), this.tuning.silenceCheckIntervalMs);
    this.timer.unref?.();
  }

  stop() {
    this.stopped = true;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.clearBuffer();
  }

  /** Hot path: classify and append, never waits on downstream work. */
  push(frame: PcmFrame) {
    if (this.stopped || !frame.length) return;
    const buffer = this.buffer;
    const now = this.now();
    buffer.lastFrameAt = now;
    buffer.chunks.push(frame);
    buffer.byteLength += frame.length;

    if (isVoicedFrame(frame, this.tuning.noiseFloorRms)) {
      buffer.lastVoicedAt = now;
      buffer.speechDetected = true;
    }

    if (!buffer.speechDetected && buffer.byteLength > this.silentBufferMaxBytes) {
      const droppedBytes = buffer.byteLength;
      this.clearBuffer();
      this.onDiagnostic({ event: "silent_buffer_dropped", droppedBytes });
      return;
    }

    this.cutAtHardCap();
  }

  /** Periodic check; also callable directly with an injected clock. */
  evaluate() {
    if (this.stopped) return;
    const buffer = this.buffer;
    const now = this.now();

    const watchdogMs = this.tuning.handoffWatchdogMs;
    const handoffStale = now - buffer.handoffStartedAt >= watchdogMs && now - buffer.lastFrameAt >= watchdogMs;
    if (buffer.handoffInFlight && handoffStale) {
      const heldMs = now - buffer.handoffStartedAt;
      buffer.handoffInFlight = false;
      buffer.handoffToken += 1;
      this.onDiagnostic({ event: "handoff_watchdog_cleared", heldMs });
    }

    if (!buffer.speechDetected || buffer.handoffInFlight) return;
    if (now - buffer.lastVoicedAt > this.tuning.silenceThresholdMs) {
      this.cut("silence");
      return;
    }
    this.cutAtHardCap();
  }

  private cutAtHardCap() {
    const buffer = this.buffer;
    if (!buffer.speechDetected) return;
    if (pcmDurationMs(buffer.byteLength) < this.tuning.maxUtteranceMs) return;
    if (!buffer.handoffInFlight) {
      this.cut("max_duration");
      return;
    }
    // a hand-off is still running: keep only the newest window so memory stays bounded
    this.trimToBytes(pcmBytesForMs(this.tuning.maxUtteranceMs));
  }

  private cut(reason: UtteranceCutReason) {
    const buffer = this.buffer;
    const pcm = Buffer.concat(buffer.chunks, buffer.byteLength);
    const now = this.now();
    this.clearBuffer();

    buffer.handoffInFlight = true;
    buffer.handoffStartedAt = now;
    buffer.handoffToken += 1;
    const token = buffer.handoffToken;

    const utterance: Utterance = {
      speakerId: this.speakerId,
      pcm,
      arrivedAt: now,
      cutReason: reason
    };
    this.onDiagnostic({ event: "utterance_cut", reason, durationMs: Math.round(pcmDurationMs(pcm.length)) });

    void Promise.resolve()
      .then(() => this.onUtterance(utterance))
      .catch((error: unknown) => {
        this.onHandoffError(error, utterance);
      })
      .finally(() => {
        if (buffer.handoffToken === token) {
          buffer.handoffInFlight = false;
        }
      });
  }

  private trimToBytes(maxBytes: number) {
    const buffer = this.buffer;
    if (buffer.byteLength <= maxBytes) return;
    const merged = Buffer.concat(buffer.chunks, buffer.byteLength);
    const kept = merged.subarray(merged.length - maxBytes);
    buffer.chunks = [kept];
    buffer.byteLength = kept.length;
  }

  /** Drops buffered audio; hand-off state and the periodic check survive. */
  clearBuffer() {
    this.buffer.chunks = [];
    this.buffer.byteLength = 0;
    this.buffer.speechDetected = false;
  }
}
