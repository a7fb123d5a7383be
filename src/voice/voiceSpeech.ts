import type { LLMService } from "../llm.ts";
import { convertDiscordPcmToModelInput, convertModelOutputToDiscordPcm, encodePcm16MonoAsWav } from "./pcmAudio.ts";
import type { Generator, Synthesizer, Transcriber } from "./voiceTypes.ts";

const MODEL_SAMPLE_RATE = 24000;

export type SpeechBackend = Pick<LLMService, "generate" | "transcribeAudio" | "synthesizeSpeech">;

export type VoiceSpeechServices = {
  transcriber: Transcriber;
  generator: Generator;
  synthesizer: Synthesizer;
};

/** Binds the shared LLM service to one room's trace context. */
export function createVoiceSpeechServices({
  llm,
  roomId,
  textChannelId = null
}: {
  llm: SpeechBackend;
  roomId: string;
  textChannelId?: string | null;
}): VoiceSpeechServices {
  const trace = { guildId: roomId, channelId: textChannelId };

  return {
    transcriber: {
      async transcribe(pcm, signal) {
        const modelPcm = convertDiscordPcmToModelInput(pcm, MODEL_SAMPLE_RATE);
        if (!modelPcm.length) return "";
        return await llm.transcribeAudio({
          wav: encodePcm16MonoAsWav(modelPcm, MODEL_SAMPLE_RATE),
          signal,
          trace: { ...trace, source: "voice_utterance" }
        });
      }
    },
    generator: {
      async generate(request) {
        return await llm.generate({
          systemPrompt: request.systemPrompt,
          userMessage: request.userMessage,
          temperature: request.temperature,
          signal: request.signal,
          trace: { ...trace, userId: request.trace.userId, source: request.trace.source }
        });
      }
    },
    synthesizer: {
      async synthesize(text, signal) {
        const modelPcm = await llm.synthesizeSpeech({
          text,
          signal,
          trace: { ...trace, source: "voice_reply" }
        });
        const pcm = convertModelOutputToDiscordPcm(modelPcm, MODEL_SAMPLE_RATE);
        return pcm.length ? { pcm, label: "reply" } : null;
      }
    }
  };
}
