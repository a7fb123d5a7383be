import { Client, GatewayIntentBits, Partials, type Message, type VoiceState } from "discord.js";
import type { AppConfig } from "./config.ts";
import { describeJoinResult, formatPersonaList, parseVoiceCommand, type VoiceCommand } from "./bot/voiceCommands.ts";
import type { PersonaService } from "./personas.ts";
import type { ActionLog } from "./runtimeActionLogger.ts";
import { shortError } from "./utils.ts";
import { DiscordVoiceTransport } from "./voice/discordVoiceTransport.ts";
import type { VoiceCycleHandler } from "./voice/requestOrchestrator.ts";
import { VoiceRoomManager } from "./voice/voiceRoomManager.ts";
import { createVoiceSpeechServices, type SpeechBackend } from "./voice/voiceSpeech.ts";
import type { StatusSink } from "./voice/voiceTypes.ts";

type HuddleBotOptions = {
  appConfig: Pick<AppConfig, "discordToken" | "commandPrefix" | "voice">;
  store: ActionLog;
  llm: SpeechBackend;
  personas: PersonaService;
  statusSink: StatusSink;
  createHandlers?: (roomId: string) => VoiceCycleHandler[];
};

export class HuddleBot {
  readonly client: Client;
  readonly voice: VoiceRoomManager;
  private readonly appConfig: HuddleBotOptions["appConfig"];
  private readonly store: ActionLog;
  private readonly personas: PersonaService;

  constructor({ appConfig, store, llm, personas, statusSink, createHandlers }: HuddleBotOptions) {
    this.appConfig = appConfig;
    this.store = store;
    this.personas = personas;

    this.client = new Client({
      intents: [
        GatewayIntentBits.Guilds,
        GatewayIntentBits.GuildMessages,
        GatewayIntentBits.GuildVoiceStates,
        GatewayIntentBits.GuildMembers,
        GatewayIntentBits.MessageContent
      ],
      partials: [Partials.Channel]
    });

    this.voice = new VoiceRoomManager({
      store,
      tuning: appConfig.voice,
      personas,
      statusSink,
      createTransport: (roomId) => this.createTransport(roomId),
      createSpeechServices: ({ roomId, textChannelId }) => createVoiceSpeechServices({ llm, roomId, textChannelId }),
      createHandlers,
      resolveSpeakerName: (roomId, speakerId) => this.resolveMemberName(roomId, speakerId),
      postText: (channelId, text) => this.postText(channelId, text)
    });

    this.registerEvents();
  }

  registerEvents() {
    this.client.on("ready", () => {
      console.log(`Logged in as ${this.client.user?.tag || "unknown"}`);
    });

    this.client.on("shardDisconnect", (event, shardId) => {
      this.logBotError(`gateway_shard_disconnect: shard=${shardId} code=${event.code}`);
    });

    this.client.on("shardError", (error, shardId) => {
      this.logBotError(`gateway_shard_error: shard=${shardId} ${shortError(error)}`);
    });

    this.client.on("error", (error) => {
      this.logBotError(`gateway_error: ${shortError(error)}`);
    });

    this.client.on("messageCreate", async (message) => {
      try {
        await this.handleMessage(message);
      } catch (error) {
        this.store.logAction({
          kind: "bot_error",
          guildId: message.guildId,
          channelId: message.channelId,
          messageId: message.id,
          userId: message.author.id,
          content: shortError(error)
        });
      }
    });

    this.client.on("voiceStateUpdate", (oldState, newState) => {
      try {
        this.handleVoiceStateUpdate(oldState, newState);
      } catch (error) {
        this.store.logAction({
          kind: "voice_error",
          guildId: newState.guild.id,
          userId: newState.id,
          content: `voice_state_update_failed: ${shortError(error)}`
        });
      }
    });
  }

  async start() {
    await this.client.login(this.appConfig.discordToken);
  }

  async stop() {
    await this.voice.dispose("shutdown");
    await this.client.destroy();
  }

  async handleMessage(message: Message) {
    if (message.author.bot || !message.inGuild()) return;
    const command = parseVoiceCommand(message.content, this.appConfig.commandPrefix);
    if (!command) return;

    const reply = await this.runCommand(message, command);
    if (reply) {
      await message.reply(reply);
    }
  }

  private async runCommand(message: Message<true>, command: VoiceCommand) {
    const roomId = message.guildId;

    switch (command.name) {
      case "join": {
        const voiceChannelId = message.member?.voice.channelId;
        if (!voiceChannelId) return "join a voice channel first.";
        try {
          const result = await this.voice.join({
            roomId,
            voiceChannelId,
            textChannelId: message.channelId,
            requestedByUserId: message.author.id
          });
          return describeJoinResult(result, voiceChannelId);
        } catch (error) {
          return `couldn't join voice: ${shortError(error)}`;
        }
      }
      case "leave": {
        const left = await this.voice.leave({ roomId, requestedByUserId: message.author.id });
        return left ? "left voice." : "not in voice.";
      }
      case "persona": {
        const persona = this.personas.setActivePersona(roomId, command.args);
        if (!persona) {
          const known = this.personas.listPersonas().map((entry) => entry.id);
          return `unknown persona "${command.args}". try: ${known.join(", ")}`;
        }
        this.voice.applyActivePersona(roomId);
        return `persona set to ${persona.name}.`;
      }
      case "personas": {
        const active = this.personas.getActivePersona(roomId);
        return formatPersonaList(this.personas.listPersonas(), active.id);
      }
    }
  }

  private handleVoiceStateUpdate(oldState: VoiceState, newState: VoiceState) {
    const roomId = newState.guild.id;
    const session = this.voice.getSession(roomId);
    if (!session) return;

    const botId = this.client.user?.id;
    if (botId && newState.id === botId) {
      this.voice.handleBotVoiceState(roomId, newState.channelId);
      return;
    }

    const touchesRoom =
      oldState.channelId === session.voiceChannelId || newState.channelId === session.voiceChannelId;
    if (!touchesRoom) return;

    const channel = newState.guild.channels.cache.get(session.voiceChannelId);
    if (!channel || !channel.isVoiceBased()) return;
    const humanCount = channel.members.filter((member) => !member.user.bot).size;
    this.voice.updateChannelOccupancy(roomId, humanCount);
  }

  private createTransport(roomId: string) {
    const guild = this.client.guilds.cache.get(roomId);
    if (!guild) throw new Error(`guild ${roomId} is not available`);
    return new DiscordVoiceTransport({
      guildId: guild.id,
      adapterCreator: guild.voiceAdapterCreator,
      botUserId: this.client.user?.id ?? null,
      store: this.store
    });
  }

  private resolveMemberName(roomId: string, userId: string) {
    const member = this.client.guilds.cache.get(roomId)?.members.cache.get(userId);
    return member?.displayName || userId;
  }

  private async postText(channelId: string, text: string) {
    const channel = await this.client.channels.fetch(channelId);
    if (!channel || !channel.isTextBased() || !("send" in channel)) return;
    await channel.send(text);
  }

  private logBotError(content: string) {
    this.store.logAction({
      kind: "bot_error",
      userId: this.client.user?.id ?? null,
      content
    });
  }
}
