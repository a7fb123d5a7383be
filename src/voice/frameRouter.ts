import type { ActionLog } from "../runtimeActionLogger.ts";
import { shortError } from "../utils.ts";
import { SpeakerSegmenter, type SegmenterDiagnostic, type SegmenterTuning } from "./speakerSegmenter.ts";
import { CaptureError } from "./voicePipelineErrors.ts";
import type { FrameSink, PcmFrame, SpeakerId, Utterance } from "./voiceTypes.ts";

type FrameRouterOptions = {
  roomId: string;
  sessionId: string;
  textChannelId?: string | null;
  tuning: SegmenterTuning;
  store: ActionLog;
  onUtterance: (utterance: Utterance) => Promise<unknown> | void;
  now?: () => number;
  /** Tests drive `evaluate()` themselves when this is false. */
  autoStart?: boolean;
};

export class FrameRouter implements FrameSink {
  private readonly segmenters = new Map<SpeakerId, SpeakerSegmenter>();
  private readonly options: FrameRouterOptions;
  private tornDown = false;

  constructor(options: FrameRouterOptions) {
    this.options = options;
  }

  get activeSpeakerIds() {
    return [...this.segmenters.keys()];
  }

  getSegmenter(speakerId: SpeakerId) {
    return this.segmenters.get(speakerId) ?? null;
  }

  onFrame(speakerId: SpeakerId, frame: PcmFrame) {
    if (this.tornDown) return;
    try {
      const id = String(speakerId || "");
      if (!id) throw new CaptureError("frame arrived without a speaker id");
      this.segmenterFor(id).push(frame);
    } catch (error) {
      this.logCaptureError(speakerId, error);
    }
  }

  /** Runs the periodic check of every speaker now. */
  evaluateAll() {
    for (const segmenter of this.segmenters.values()) {
      segmenter.evaluate();
    }
  }

  /** Drops buffered audio of every speaker. In-flight hand-offs stay tracked. */
  reset() {
    for (const segmenter of this.segmenters.values()) {
      segmenter.clearBuffer();
    }
  }

  teardown() {
    this.tornDown = true;
    for (const segmenter of this.segmenters.values()) {
      segmenter.stop();
    }
    this.segmenters.clear();
  }

  private segmenterFor(speakerId: SpeakerId) {
    const existing = this.segmenters.get(speakerId);
    if (existing) return existing;

    const segmenter = new SpeakerSegmenter({
      speakerId,
      tuning: this.options.tuning,
      now: this.options.now,
      onUtterance: this.options.onUtterance,
      onHandoffError: (error) => this.logCaptureError(speakerId, error, "utterance_handoff_failed"),
      onDiagnostic: (diagnostic) => this.logDiagnostic(speakerId, diagnostic)
    });
    this.segmenters.set(speakerId, segmenter);
    if (this.options.autoStart !== false) {
      segmenter.start();
    }
    return segmenter;
  }

  private logDiagnostic(speakerId: SpeakerId, diagnostic: SegmenterDiagnostic) {
    this.options.store.logAction({
      kind: diagnostic.event === "handoff_watchdog_cleared" ? "voice_error" : "voice_runtime",
      guildId: this.options.roomId,
      channelId: this.options.textChannelId ?? null,
      userId: speakerId,
      content: diagnostic.event,
      metadata: {
        sessionId: this.options.sessionId,
        ...diagnostic
      }
    });
  }

  private logCaptureError(speakerId: SpeakerId, error: unknown, label = "capture_error") {
    try {
      this.options.store.logAction({
        kind: "voice_error",
        guildId: this.options.roomId,
        channelId: this.options.textChannelId ?? null,
        userId: speakerId || null,
        content: `${label}: ${shortError(error)}`,
        metadata: {
          sessionId: this.options.sessionId
        }
      });
    } catch {
      // ingest path must never throw back into the transport
    }
  }
}
