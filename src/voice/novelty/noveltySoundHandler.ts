import fs from "node:fs/promises";
import path from "node:path";
import { containsSpokenPhrase } from "../../normalization/text.ts";
import { decodeWavToDiscordPcm } from "../pcmAudio.ts";
import type { VoiceCycleHandler, VoiceHandlerContext, VoiceHandlerResult } from "../requestOrchestrator.ts";

type NoveltySoundHandlerOptions = {
  clipPaths: string[];
  triggers: string[];
  readClip?: (clipPath: string) => Promise<Buffer>;
};

/**
 * Plays the clips of a directory one after another, wrapping around, whenever
 * a trigger phrase is heard. The position is shared by every room.
 */
export class NoveltySoundHandler implements VoiceCycleHandler {
  readonly name = "novelty_sound";
  private readonly clipPaths: string[];
  private readonly triggers: string[];
  private readonly readClip: (clipPath: string) => Promise<Buffer>;
  private nextIndex = 0;

  constructor({ clipPaths, triggers, readClip }: NoveltySoundHandlerOptions) {
    this.clipPaths = [...clipPaths];
    this.triggers = triggers.filter((trigger) => trigger.trim());
    this.readClip = readClip ?? ((clipPath) => fs.readFile(clipPath));
  }

  static async fromDirectory(directory: string, triggers: string[]) {
    const entries = await fs.readdir(directory, { withFileTypes: true });
    const clipPaths = entries
      .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith(".wav"))
      .map((entry) => entry.name)
      .sort((left, right) => left.localeCompare(right))
      .map((name) => path.join(directory, name));
    return new NoveltySoundHandler({ clipPaths, triggers });
  }

  get clipCount() {
    return this.clipPaths.length;
  }

  matches(transcript: string) {
    if (!this.clipPaths.length) return false;
    return this.triggers.some((trigger) => containsSpokenPhrase(transcript, trigger));
  }

  async handle(context: VoiceHandlerContext): Promise<VoiceHandlerResult> {
    const clipPath = this.clipPaths[this.nextIndex % this.clipPaths.length];
    this.nextIndex = (this.nextIndex + 1) % this.clipPaths.length;

    const pcm = decodeWavToDiscordPcm(await this.readClip(clipPath));
    if (!pcm || !pcm.length) {
      throw new Error(`unsupported clip ${path.basename(clipPath)}; expected 16-bit PCM wav`);
    }
    const label = path.basename(clipPath, path.extname(clipPath));
    context.play({ pcm, label });
    return { reply: null, label };
  }
}
