import { Readable, type Transform } from "node:stream";
import {
  AudioPlayerStatus,
  createAudioPlayer,
  createAudioResource,
  EndBehaviorType,
  entersState,
  joinVoiceChannel,
  NoSubscriberBehavior,
  StreamType,
  VoiceConnectionStatus,
  type AudioPlayer,
  type AudioReceiveStream,
  type VoiceConnection,
  type VoiceConnectionState
} from "@discordjs/voice";
import type { Guild } from "discord.js";
import prism from "prism-media";
import type { ActionLog } from "../runtimeActionLogger.ts";
import { shortError } from "../utils.ts";
import { DISCORD_CHANNELS, DISCORD_SAMPLE_RATE } from "./pcmAudio.ts";
import type { FrameSink, PlayableAudio, VoiceTransport } from "./voiceTypes.ts";

const CONNECT_READY_TIMEOUT_MS = 15_000;
// receive streams close after this much silence and reopen on the next "start"
const RECEIVE_END_SILENCE_MS = 1000;
const OPUS_FRAME_SIZE = 960;

type ReceiveSubscription = {
  opusStream: AudioReceiveStream;
  decoder: Transform;
};

type DiscordVoiceTransportOptions = {
  guildId: string;
  adapterCreator: Guild["voiceAdapterCreator"];
  botUserId: string | null;
  store: ActionLog;
};

/** `VoiceTransport` over one @discordjs/voice connection and audio player. */
export class DiscordVoiceTransport implements VoiceTransport {
  private readonly options: DiscordVoiceTransportOptions;
  private readonly player: AudioPlayer;
  private readonly subscriptions = new Map<string, ReceiveSubscription>();
  private readonly connectionLostListeners = new Set<(reason: string) => void>();
  private connection: VoiceConnection | null = null;
  private sink: FrameSink | null = null;
  private closing = false;

  constructor(options: DiscordVoiceTransportOptions) {
    this.options = options;
    this.player = createAudioPlayer({
      behaviors: {
        noSubscriber: NoSubscriberBehavior.Play
      }
    });
    this.player.on("error", (error) => {
      this.logError("audio_player_error", error);
    });
  }

  async connect(channelId: string) {
    const connection = joinVoiceChannel({
      channelId,
      guildId: this.options.guildId,
      adapterCreator: this.options.adapterCreator,
      selfDeaf: false,
      selfMute: false
    });
    this.connection = connection;
    this.closing = false;

    try {
      await entersState(connection, VoiceConnectionStatus.Ready, CONNECT_READY_TIMEOUT_MS);
    } catch (error) {
      this.closing = true;
      connection.destroy();
      this.connection = null;
      throw error;
    }

    connection.subscribe(this.player);
    connection.on("stateChange", this.onConnectionStateChange);
    connection.receiver.speaking.on("start", this.onSpeakingStart);
  }

  async move(channelId: string) {
    const connection = this.requireConnection();
    connection.rejoin({ channelId, selfDeaf: false, selfMute: false });
    await entersState(connection, VoiceConnectionStatus.Ready, CONNECT_READY_TIMEOUT_MS);
  }

  async disconnect() {
    this.closing = true;
    this.stopListening();
    this.player.stop(true);
    const connection = this.connection;
    this.connection = null;
    if (!connection) return;
    connection.off("stateChange", this.onConnectionStateChange);
    connection.receiver.speaking.off("start", this.onSpeakingStart);
    if (connection.state.status !== VoiceConnectionStatus.Destroyed) {
      connection.destroy();
    }
  }

  play(audio: PlayableAudio) {
    const resource = createAudioResource(Readable.from([audio.pcm]), {
      inputType: StreamType.Raw,
      metadata: { label: audio.label }
    });
    this.player.play(resource);
  }

  stop() {
    this.player.stop(true);
  }

  isPlaying() {
    const status = this.player.state.status;
    return status !== AudioPlayerStatus.Idle && status !== AudioPlayerStatus.AutoPaused;
  }

  async waitForIdle(timeoutMs: number, signal?: AbortSignal) {
    if (!this.isPlaying()) return true;
    const timeout = AbortSignal.timeout(Math.max(1, timeoutMs));
    try {
      await entersState(this.player, AudioPlayerStatus.Idle, signal ? AbortSignal.any([timeout, signal]) : timeout);
      return true;
    } catch {
      // aborted or timed out
      return false;
    }
  }

  listen(sink: FrameSink) {
    this.sink = sink;
  }

  stopListening() {
    this.sink = null;
    for (const userId of [...this.subscriptions.keys()]) {
      this.closeSubscription(userId);
    }
  }

  onConnectionLost(listener: (reason: string) => void) {
    this.connectionLostListeners.add(listener);
    return () => {
      this.connectionLostListeners.delete(listener);
    };
  }

  private readonly onConnectionStateChange = (_oldState: VoiceConnectionState, newState: VoiceConnectionState) => {
    if (this.closing) return;
    if (
      newState.status === VoiceConnectionStatus.Destroyed ||
      newState.status === VoiceConnectionStatus.Disconnected
    ) {
      for (const listener of [...this.connectionLostListeners]) {
        listener(newState.status);
      }
    }
  };

  private readonly onSpeakingStart = (userId: string) => {
    const id = String(userId || "");
    if (!id || id === this.options.botUserId) return;
    if (!this.sink || this.subscriptions.has(id)) return;
    const connection = this.connection;
    if (!connection) return;

    const opusStream = connection.receiver.subscribe(id, {
      end: {
        behavior: EndBehaviorType.AfterSilence,
        duration: RECEIVE_END_SILENCE_MS
      }
    });
    const decoder = new prism.opus.Decoder({
      rate: DISCORD_SAMPLE_RATE,
      channels: DISCORD_CHANNELS,
      frameSize: OPUS_FRAME_SIZE
    });
    this.subscriptions.set(id, { opusStream, decoder });

    const pcmStream = opusStream.pipe(decoder);
    pcmStream.on("data", (chunk: Buffer) => {
      this.sink?.onFrame(id, chunk);
    });
    pcmStream.on("error", (error: Error) => {
      this.logError("capture_stream_error", error, id);
      this.closeSubscription(id);
    });
    opusStream.once("end", () => this.closeSubscription(id));
    opusStream.once("close", () => this.closeSubscription(id));
  };

  private closeSubscription(userId: string) {
    const subscription = this.subscriptions.get(userId);
    if (!subscription) return;
    this.subscriptions.delete(userId);

    try {
      subscription.opusStream.destroy();
    } catch {
      // ignore
    }
    try {
      subscription.decoder.destroy();
    } catch {
      // ignore
    }
  }

  private requireConnection() {
    if (!this.connection) throw new Error("voice transport is not connected");
    return this.connection;
  }

  private logError(content: string, error: unknown, userId: string | null = null) {
    this.options.store.logAction({
      kind: "voice_error",
      guildId: this.options.guildId,
      userId,
      content: `${content}: ${shortError(error)}`
    });
  }
}
