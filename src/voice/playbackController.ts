import type { VoiceTuning } from "../config.ts";
import type { ActionLog } from "../runtimeActionLogger.ts";
import { shortError, sleep } from "../utils.ts";
import { createToneClip, pcmDurationMs } from "./pcmAudio.ts";
import { PlaybackFailure } from "./voicePipelineErrors.ts";
import type { FrameSink, PlayableAudio, VoiceTransport } from "./voiceTypes.ts";

export type ResettableFrameSink = FrameSink & { reset(): void };

type PlaybackTuning = Pick<VoiceTuning, "ambientEnabled" | "playbackMaxWaitMs" | "relistenSettleMs">;

type PlaybackControllerOptions = {
  roomId: string;
  sessionId: string;
  textChannelId?: string | null;
  transport: VoiceTransport;
  captureSink: ResettableFrameSink;
  store: ActionLog;
  tuning: PlaybackTuning;
  ambientClip?: PlayableAudio;
};

const AMBIENT_LABEL = "ambient";

let sharedToneClip: Buffer | null = null;

function defaultAmbientClip(): PlayableAudio {
  if (!sharedToneClip) sharedToneClip = createToneClip();
  return { pcm: sharedToneClip, label: AMBIENT_LABEL };
}

export class PlaybackController {
  private readonly options: PlaybackControllerOptions;
  private readonly ambientClip: PlayableAudio;
  private ambientController: AbortController | null = null;
  private ambientTask: Promise<void> | null = null;
  private currentLabel: string | null = null;
  private listening = false;

  constructor(options: PlaybackControllerOptions) {
    this.options = options;
    this.ambientClip = options.ambientClip ?? defaultAmbientClip();
  }

  get ambientRunning() {
    return this.ambientController !== null;
  }

  get isListening() {
    return this.listening;
  }

  startCapture() {
    this.options.transport.listen(this.options.captureSink);
    this.listening = true;
  }

  stopCapture() {
    this.listening = false;
    this.options.transport.stopListening();
  }

  /** Newest audio preempts whatever is playing; nothing is queued. */
  play(audio: PlayableAudio) {
    const { transport } = this.options;
    try {
      if (transport.isPlaying()) transport.stop();
      transport.play(audio);
      this.currentLabel = audio.label;
    } catch (error) {
      throw new PlaybackFailure(`failed to play ${audio.label}: ${shortError(error)}`, { cause: error });
    }
  }

  stop() {
    this.currentLabel = null;
    this.options.transport.stop();
  }

  startAmbient() {
    if (!this.options.tuning.ambientEnabled || this.ambientController) return;
    const controller = new AbortController();
    this.ambientController = controller;
    this.ambientTask = this.runAmbientLoop(controller.signal).catch((error: unknown) => {
      this.logError("ambient_loop_failed", error);
    });
  }

  async stopAmbient() {
    const controller = this.ambientController;
    if (!controller) return;
    this.ambientController = null;
    controller.abort();
    const task = this.ambientTask;
    this.ambientTask = null;
    await task;
    if (this.currentLabel === AMBIENT_LABEL && this.options.transport.isPlaying()) {
      this.stop();
    }
  }

  /** Resolves true when playback finished inside the bound; stops the output otherwise. */
  async waitForPlaybackEnd() {
    const finished = await this.options.transport.waitForIdle(this.options.tuning.playbackMaxWaitMs);
    if (!finished) {
      this.logError("playback_wait_timeout", new Error(`still playing after ${this.options.tuning.playbackMaxWaitMs}ms`));
      this.stop();
    }
    this.currentLabel = null;
    return finished;
  }

  /**
   * Restarts capture with empty speaker buffers so the assistant's own voice is
   * never cut into an utterance. Errors are logged; the settle delay always runs.
   */
  async resyncCapture() {
    const { transport, captureSink } = this.options;
    try {
      transport.stopListening();
    } catch (error) {
      this.logError("relisten_stop_failed", error);
    }
    this.listening = false;

    try {
      captureSink.reset();
    } catch (error) {
      this.logError("relisten_reset_failed", error);
    }

    await sleep(this.options.tuning.relistenSettleMs);

    try {
      transport.listen(captureSink);
      this.listening = true;
    } catch (error) {
      this.logError("relisten_start_failed", error);
    }
  }

  async dispose() {
    await this.stopAmbient();
    try {
      this.stopCapture();
    } catch (error) {
      this.logError("capture_stop_failed", error);
    }
    try {
      this.stop();
    } catch (error) {
      this.logError("playback_stop_failed", error);
    }
  }

  private async runAmbientLoop(signal: AbortSignal) {
    const { transport } = this.options;
    const clipMs = Math.max(50, Math.ceil(pcmDurationMs(this.ambientClip.pcm.length)));
    while (!signal.aborted) {
      if (!transport.isPlaying()) {
        this.play(this.ambientClip);
      }
      await transport.waitForIdle(clipMs * 2, signal);
    }
  }

  private logError(content: string, error: unknown) {
    this.options.store.logAction({
      kind: "voice_error",
      guildId: this.options.roomId,
      channelId: this.options.textChannelId ?? null,
      content: `${content}: ${shortError(error)}`,
      metadata: {
        sessionId: this.options.sessionId
      }
    });
  }
}
