import { randomUUID } from "node:crypto";
import type { VoiceTuning } from "../config.ts";
import type { ActionLog } from "../runtimeActionLogger.ts";
import { shortError } from "../utils.ts";
import { ConversationGate } from "./conversationGate.ts";
import { FrameRouter } from "./frameRouter.ts";
import { PlaybackController } from "./playbackController.ts";
import { RequestOrchestrator, type VoiceCycleHandler, type VoiceExchange } from "./requestOrchestrator.ts";
import { RollingTranscript } from "./rollingTranscript.ts";
import { KeyedLock } from "./roomLock.ts";
import type { VoiceSpeechServices } from "./voiceSpeech.ts";
import type { PersonaSource, RoomId, SpeakerId, StatusSink, VoiceTransport } from "./voiceTypes.ts";

export type RoomSession = {
  id: string;
  roomId: RoomId;
  voiceChannelId: string;
  textChannelId: string | null;
  requestedByUserId: string | null;
  startedAt: number;
  lastActivityAt: number;
  inactivityEndsAt: number | null;
  transport: VoiceTransport;
  router: FrameRouter;
  gate: ConversationGate;
  transcript: RollingTranscript;
  playback: PlaybackController;
  orchestrator: RequestOrchestrator;
  /** Latest greeting/farewell in flight; resolves false when nothing was played. */
  announcement: Promise<boolean>;
  inactivityTimer: NodeJS.Timeout | null;
  emptyChannelTimer: NodeJS.Timeout | null;
  cleanupHandlers: Array<() => void>;
  ending: boolean;
};

export type JoinRequest = {
  roomId: RoomId;
  voiceChannelId: string;
  textChannelId?: string | null;
  requestedByUserId?: string | null;
};

export type JoinResult = {
  status: "joined" | "moved" | "already_joined";
  sessionId: string;
};

export type EndSessionRequest = {
  roomId: RoomId;
  reason: string;
  sessionId?: string;
  requestedByUserId?: string | null;
  /** Speak the persona farewell before disconnecting. */
  farewell?: boolean;
  /** Text posted to the room's text channel; `undefined` picks the default for `reason`. */
  announcement?: string | null;
};

type VoiceRoomManagerOptions = {
  store: ActionLog;
  tuning: VoiceTuning;
  personas: PersonaSource;
  statusSink: StatusSink;
  createTransport: (roomId: RoomId) => VoiceTransport;
  createSpeechServices: (context: { roomId: RoomId; textChannelId: string | null }) => VoiceSpeechServices;
  createHandlers?: (roomId: RoomId) => VoiceCycleHandler[];
  resolveSpeakerName?: (roomId: RoomId, speakerId: SpeakerId) => string;
  postText?: (textChannelId: string, text: string) => Promise<unknown>;
  now?: () => number;
  /** Tests drive segmentation through `router.evaluateAll()` when this is false. */
  autoStartSegmenters?: boolean;
};

function defaultExitMessage(reason: string) {
  switch (reason) {
    case "termination_phrase":
      return "leaving voice as asked.";
    case "inactivity_timeout":
      return "nobody talked to me for a while, leaving voice.";
    case "channel_empty":
      return "voice channel emptied out, leaving.";
    case "connection_lost":
      return "voice connection dropped, i'm out.";
    case "bot_disconnected":
      return "i got disconnected from voice.";
    default:
      return null;
  }
}

/** Owns one `RoomSession` per room; joins, moves and teardowns for a room never overlap. */
export class VoiceRoomManager {
  private readonly options: VoiceRoomManagerOptions;
  private readonly sessions = new Map<RoomId, RoomSession>();
  private readonly roomLocks = new KeyedLock();

  constructor(options: VoiceRoomManagerOptions) {
    this.options = options;
  }

  getSession(roomId: RoomId) {
    return this.sessions.get(String(roomId || "")) ?? null;
  }

  hasActiveSession(roomId: RoomId) {
    return Boolean(this.getSession(roomId));
  }

  async join({ roomId, voiceChannelId, textChannelId = null, requestedByUserId = null }: JoinRequest): Promise<JoinResult> {
    return await this.roomLocks.run(roomId, async () => {
      const existing = this.sessions.get(roomId);
      if (existing) {
        if (existing.voiceChannelId === voiceChannelId) {
          return { status: "already_joined", sessionId: existing.id };
        }
        await existing.transport.move(voiceChannelId);
        existing.voiceChannelId = voiceChannelId;
        this.clearEmptyChannelTimer(existing);
        this.touchActivity(existing);
        this.logRuntime(existing, "room_moved", { voiceChannelId });
        return { status: "moved", sessionId: existing.id };
      }

      const session = await this.openSession({ roomId, voiceChannelId, textChannelId, requestedByUserId });
      return { status: "joined", sessionId: session.id };
    });
  }

  async leave({
    roomId,
    requestedByUserId = null,
    reason = "leave_command"
  }: {
    roomId: RoomId;
    requestedByUserId?: string | null;
    reason?: string;
  }) {
    return await this.endSession({ roomId, reason, requestedByUserId, announcement: null });
  }

  async endSession({
    roomId,
    reason,
    sessionId,
    requestedByUserId = null,
    farewell = false,
    announcement
  }: EndSessionRequest) {
    return await this.roomLocks.run(roomId, async () => {
      const session = this.sessions.get(roomId);
      if (!session || session.ending) return false;
      if (sessionId && session.id !== sessionId) return false;
      session.ending = true;

      if (farewell) {
        const persona = this.options.personas.getActivePersona(roomId);
        session.announcement = this.announce(session, persona.farewell, "farewell");
        await session.announcement;
      }

      await this.teardown(session);

      const durationSeconds = Math.max(0, Math.floor((this.now() - session.startedAt) / 1000));
      this.options.store.logAction({
        kind: "voice_session_end",
        guildId: roomId,
        channelId: session.textChannelId,
        userId: requestedByUserId,
        content: reason,
        metadata: {
          sessionId: session.id,
          voiceChannelId: session.voiceChannelId,
          durationSeconds,
          completedCycles: session.orchestrator.completedCycleCount,
          requestedByUserId
        }
      });

      const text = announcement === undefined ? defaultExitMessage(reason) : announcement;
      if (text) {
        await this.postText(session, text);
      }
      return true;
    });
  }

  /** Adds the room's active persona name to its wake words after a persona switch. */
  applyActivePersona(roomId: RoomId) {
    const session = this.getSession(roomId);
    if (!session) return null;
    const persona = this.options.personas.getActivePersona(roomId);
    session.gate.addWakeWord(persona.name);
    this.logRuntime(session, "persona_applied", { personaId: persona.id, wakeWords: session.gate.getWakeWords() });
    return persona;
  }

  /** Leaves after the voice channel has had no humans for the configured grace period. */
  updateChannelOccupancy(roomId: RoomId, humanCount: number) {
    const session = this.getSession(roomId);
    if (!session || session.ending) return;

    if (humanCount > 0) {
      this.clearEmptyChannelTimer(session);
      return;
    }
    if (session.emptyChannelTimer) return;

    const graceMs = this.options.tuning.emptyChannelLeaveMs;
    this.logRuntime(session, "channel_empty_grace_started", { graceMs });
    session.emptyChannelTimer = setTimeout(() => {
      session.emptyChannelTimer = null;
      this.endInBackground(session, "channel_empty");
    }, graceMs);
    session.emptyChannelTimer.unref?.();
  }

  /** Someone else moved or disconnected the bot. */
  handleBotVoiceState(roomId: RoomId, channelId: string | null) {
    const session = this.getSession(roomId);
    if (!session || session.ending) return;

    if (!channelId) {
      this.endInBackground(session, "bot_disconnected");
      return;
    }
    if (channelId !== session.voiceChannelId) {
      session.voiceChannelId = channelId;
      this.touchActivity(session);
      this.logRuntime(session, "room_moved_externally", { voiceChannelId: channelId });
    }
  }

  getRuntimeState() {
    const sessions = [...this.sessions.values()].map((session) => {
      const lastAddressed = session.gate.lastAddressed;
      return {
        sessionId: session.id,
        roomId: session.roomId,
        voiceChannelId: session.voiceChannelId,
        textChannelId: session.textChannelId,
        startedAt: new Date(session.startedAt).toISOString(),
        lastActivityAt: new Date(session.lastActivityAt).toISOString(),
        inactivityEndsAt: session.inactivityEndsAt ? new Date(session.inactivityEndsAt).toISOString() : null,
        state: session.orchestrator.state,
        pendingCycles: session.orchestrator.pendingCycles,
        completedCycles: session.orchestrator.completedCycleCount,
        activeSpeakers: session.router.activeSpeakerIds,
        transcriptEntries: session.transcript.size,
        wakeWords: session.gate.getWakeWords(),
        lastAddressed: lastAddressed
          ? { speakerId: lastAddressed.speakerId, at: new Date(lastAddressed.at).toISOString() }
          : null,
        listening: session.playback.isListening,
        ambientRunning: session.playback.ambientRunning
      };
    });

    return {
      activeCount: sessions.length,
      sessions
    };
  }

  async stopAll(reason = "shutdown") {
    for (const roomId of [...this.sessions.keys()]) {
      await this.endSession({ roomId, reason, announcement: null });
    }
  }

  async dispose(reason = "shutdown") {
    await this.stopAll(reason);
    this.roomLocks.clear();
  }

  private async openSession({
    roomId,
    voiceChannelId,
    textChannelId,
    requestedByUserId
  }: Required<JoinRequest>) {
    const { store, tuning, personas } = this.options;
    const sessionId = randomUUID();
    const transport = this.options.createTransport(roomId);

    try {
      await transport.connect(voiceChannelId);
    } catch (error) {
      store.logAction({
        kind: "voice_error",
        guildId: roomId,
        channelId: textChannelId,
        userId: requestedByUserId,
        content: `join_failed: ${shortError(error)}`,
        metadata: { sessionId, voiceChannelId }
      });
      try {
        await transport.disconnect();
      } catch {
        // ignore
      }
      throw error;
    }

    const persona = personas.getActivePersona(roomId);
    const speech = this.options.createSpeechServices({ roomId, textChannelId });
    const gate = new ConversationGate({
      wakeWords: [...tuning.wakeWords, persona.name],
      terminationPhrases: tuning.terminationPhrases,
      conversationWindowMs: tuning.conversationWindowMs
    });
    const transcript = new RollingTranscript({
      maxEntries: tuning.transcriptMaxEntries,
      maxAgeMs: tuning.transcriptMaxAgeMs
    });
    const router: FrameRouter = new FrameRouter({
      roomId,
      sessionId,
      textChannelId,
      tuning,
      store,
      now: this.options.now,
      autoStart: this.options.autoStartSegmenters,
      onUtterance: (utterance) => orchestrator.handleUtterance(utterance)
    });
    const playback: PlaybackController = new PlaybackController({
      roomId,
      sessionId,
      textChannelId,
      transport,
      captureSink: router,
      store,
      tuning
    });
    const orchestrator: RequestOrchestrator = new RequestOrchestrator({
      roomId,
      sessionId,
      textChannelId,
      tuning,
      store,
      gate,
      transcript,
      playback,
      ...speech,
      statusSink: this.options.statusSink,
      personas,
      handlers: this.options.createHandlers?.(roomId) ?? [],
      now: this.options.now,
      resolveSpeakerName: (speakerId) => this.options.resolveSpeakerName?.(roomId, speakerId) ?? speakerId,
      onUtteranceTranscribed: () => this.touchActivity(session),
      onTerminate: ({ speakerId }) =>
        this.endSession({
          roomId,
          sessionId,
          reason: "termination_phrase",
          requestedByUserId: speakerId,
          farewell: true
        }),
      onExchange: (exchange) => this.echoExchange(session, exchange)
    });

    const now = this.now();
    const session: RoomSession = {
      id: sessionId,
      roomId,
      voiceChannelId,
      textChannelId,
      requestedByUserId,
      startedAt: now,
      lastActivityAt: now,
      inactivityEndsAt: null,
      transport,
      router,
      gate,
      transcript,
      playback,
      orchestrator,
      announcement: Promise.resolve(false),
      inactivityTimer: null,
      emptyChannelTimer: null,
      cleanupHandlers: [],
      ending: false
    };
    this.sessions.set(roomId, session);

    session.cleanupHandlers.push(
      transport.onConnectionLost((reason) => {
        this.logRuntime(session, "connection_lost", { reason });
        this.endInBackground(session, "connection_lost");
      })
    );
    playback.startCapture();
    this.touchActivity(session);

    store.logAction({
      kind: "voice_session_start",
      guildId: roomId,
      channelId: textChannelId,
      userId: requestedByUserId,
      content: `voice_joined:${voiceChannelId}`,
      metadata: {
        sessionId,
        voiceChannelId,
        personaId: persona.id,
        wakeWords: gate.getWakeWords()
      }
    });

    session.announcement = this.announce(session, persona.greeting, "greeting");
    return session;
  }

  private async teardown(session: RoomSession) {
    this.clearTimers(session);
    for (const cleanup of session.cleanupHandlers) {
      try {
        cleanup();
      } catch {
        // ignore
      }
    }
    session.cleanupHandlers = [];

    session.router.teardown();
    session.orchestrator.dispose();
    try {
      await session.playback.dispose();
    } catch (error) {
      this.logError(session, "playback_dispose_failed", error);
    }
    try {
      await session.transport.disconnect();
    } catch (error) {
      this.logError(session, "disconnect_failed", error);
    }
    this.sessions.delete(session.roomId);

    try {
      this.options.statusSink.push(session.roomId, "idle", "", "");
    } catch (error) {
      this.logError(session, "status_push_failed", error);
    }
  }

  private async announce(session: RoomSession, text: string, label: string) {
    try {
      return await session.orchestrator.announce(text, label);
    } catch (error) {
      this.logError(session, `${label}_failed`, error);
      return false;
    }
  }

  private touchActivity(session: RoomSession) {
    if (session.ending) return;
    const idleMs = this.options.tuning.inactivityLeaveMs;
    session.lastActivityAt = this.now();
    if (session.inactivityTimer) clearTimeout(session.inactivityTimer);

    session.inactivityEndsAt = session.lastActivityAt + idleMs;
    session.inactivityTimer = setTimeout(() => {
      session.inactivityTimer = null;
      this.endInBackground(session, "inactivity_timeout");
    }, idleMs);
    session.inactivityTimer.unref?.();
  }

  private endInBackground(session: RoomSession, reason: string) {
    this.endSession({ roomId: session.roomId, sessionId: session.id, reason }).catch((error: unknown) => {
      this.logError(session, "end_session_failed", error);
    });
  }

  private async echoExchange(session: RoomSession, exchange: VoiceExchange) {
    await this.postText(session, `${exchange.speakerName}: ${exchange.text}\n${exchange.personaName}: ${exchange.reply}`);
  }

  private async postText(session: RoomSession, text: string) {
    const { postText } = this.options;
    if (!postText || !session.textChannelId) return;
    try {
      await postText(session.textChannelId, text);
    } catch (error) {
      this.logError(session, "text_post_failed", error);
    }
  }

  private clearEmptyChannelTimer(session: RoomSession) {
    if (!session.emptyChannelTimer) return;
    clearTimeout(session.emptyChannelTimer);
    session.emptyChannelTimer = null;
    this.logRuntime(session, "channel_empty_grace_cleared");
  }

  private clearTimers(session: RoomSession) {
    if (session.inactivityTimer) clearTimeout(session.inactivityTimer);
    if (session.emptyChannelTimer) clearTimeout(session.emptyChannelTimer);
    session.inactivityTimer = null;
    session.emptyChannelTimer = null;
    session.inactivityEndsAt = null;
  }

  private now() {
    return this.options.now?.() ?? Date.now();
  }

  private logRuntime(session: RoomSession, content: string, metadata: Record<string, unknown> = {}) {
    this.options.store.logAction({
      kind: "voice_runtime",
      guildId: session.roomId,
      channelId: session.textChannelId,
      content,
      metadata: {
        sessionId: session.id,
        ...metadata
      }
    });
  }

  private logError(session: RoomSession, content: string, error: unknown) {
    this.options.store.logAction({
      kind: "voice_error",
      guildId: session.roomId,
      channelId: session.textChannelId,
      content: `${content}: ${shortError(error)}`,
      metadata: {
        sessionId: session.id
      }
    });
  }
}
