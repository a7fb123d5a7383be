export const DISCORD_SAMPLE_RATE = 48_000;
export const DISCORD_CHANNELS = 2;
// s16le stereo at 48 kHz
export const DISCORD_PCM_BYTES_PER_MS = (DISCORD_SAMPLE_RATE * DISCORD_CHANNELS * 2) / 1000;

function clamp16(value: number) {
  return Math.max(-32768, Math.min(32767, value));
}

function toAlignedInt16Samples(input: Buffer) {
  const evenByteLength = input.length - (input.length % 2);
  if (evenByteLength <= 0) {
    return new Int16Array(0);
  }

  const view = input.subarray(0, evenByteLength);
  if (view.byteOffset % 2 === 0) {
    return new Int16Array(view.buffer, view.byteOffset, evenByteLength / 2);
  }

  const aligned = Buffer.from(view);
  return new Int16Array(aligned.buffer, aligned.byteOffset, aligned.length / 2);
}

function int16ArrayToBuffer(samples: Int16Array) {
  if (!samples.length) return Buffer.alloc(0);
  return Buffer.from(samples.buffer, samples.byteOffset, samples.byteLength);
}

function downmixStereo16ToMono16(input: Buffer) {
  const stereoSamples = toAlignedInt16Samples(input);
  const frameCount = Math.floor(stereoSamples.length / 2);
  if (frameCount <= 0) return Buffer.alloc(0);

  const monoSamples = new Int16Array(frameCount);
  for (let index = 0; index < frameCount; index += 1) {
    const left = stereoSamples[index * 2];
    const right = stereoSamples[index * 2 + 1];
    monoSamples[index] = clamp16(Math.round((left + right) / 2));
  }

  return int16ArrayToBuffer(monoSamples);
}

function resampleMono16(input: Buffer, inputSampleRate: number, outputSampleRate: number) {
  const inRate = Number(inputSampleRate) || 0;
  const outRate = Number(outputSampleRate) || 0;
  if (inRate <= 0 || outRate <= 0) return Buffer.alloc(0);

  const inputSamples = toAlignedInt16Samples(input);
  if (inputSamples.length <= 0) return Buffer.alloc(0);
  if (inRate === outRate) return int16ArrayToBuffer(inputSamples);
  if (inputSamples.length <= 1) return Buffer.alloc(0);

  const ratio = inRate / outRate;
  const outputSampleCount = Math.max(1, Math.floor(inputSamples.length / ratio));
  const outputSamples = new Int16Array(outputSampleCount);

  for (let index = 0; index < outputSampleCount; index += 1) {
    const sourcePosition = index * ratio;
    const sourceIndex = Math.floor(sourcePosition);
    const nextIndex = Math.min(sourceIndex + 1, inputSamples.length - 1);
    const fraction = sourcePosition - sourceIndex;

    const first = inputSamples[sourceIndex];
    const second = inputSamples[nextIndex];
    outputSamples[index] = clamp16(Math.round(first + fraction * (second - first)));
  }

  return int16ArrayToBuffer(outputSamples);
}

function mono16ToStereo16(input: Buffer) {
  const inputSamples = toAlignedInt16Samples(input);
  const sampleCount = inputSamples.length;
  if (sampleCount <= 0) return Buffer.alloc(0);

  const outputSamples = new Int16Array(sampleCount * 2);
  for (let index = 0; index < sampleCount; index += 1) {
    const sample = inputSamples[index];
    outputSamples[index * 2] = sample;
    outputSamples[index * 2 + 1] = sample;
  }

  return int16ArrayToBuffer(outputSamples);
}

export function convertDiscordPcmToModelInput(discordPcm: Buffer, outputSampleRate = 24000) {
  const mono48k = downmixStereo16ToMono16(discordPcm);
  if (!mono48k.length) return Buffer.alloc(0);
  const normalizedOutputRate = Math.max(8000, Math.min(48000, Number(outputSampleRate) || 24000));
  return resampleMono16(mono48k, DISCORD_SAMPLE_RATE, normalizedOutputRate);
}

export function convertModelOutputToDiscordPcm(modelPcm: Buffer, inputSampleRate = 24000) {
  const mono48k = resampleMono16(modelPcm, inputSampleRate, DISCORD_SAMPLE_RATE);
  if (!mono48k.length) return Buffer.alloc(0);
  return mono16ToStereo16(mono48k);
}

/** Root-mean-square amplitude of the s16le samples in `frame`. */
export function frameRms(frame: Buffer) {
  const samples = toAlignedInt16Samples(frame);
  if (!samples.length) return 0;
  let sumSquares = 0;
  for (const sample of samples) {
    sumSquares += sample * sample;
  }
  return Math.sqrt(sumSquares / samples.length);
}

export function isVoicedFrame(frame: Buffer, noiseFloorRms: number) {
  return frameRms(frame) >= noiseFloorRms;
}

export function pcmBytesForMs(ms: number) {
  const bytes = Math.floor(Math.max(0, ms) * DISCORD_PCM_BYTES_PER_MS);
  return bytes - (bytes % 4);
}

export function pcmDurationMs(byteLength: number) {
  return byteLength / DISCORD_PCM_BYTES_PER_MS;
}

export function encodePcm16MonoAsWav(pcm: Buffer, sampleRate = 24000) {
  const normalizedRate = Math.max(8000, Math.min(48000, Number(sampleRate) || 24000));
  const channels = 1;
  const bitsPerSample = 16;
  const blockAlign = (channels * bitsPerSample) / 8;
  const byteRate = normalizedRate * blockAlign;
  const dataSize = pcm.length;
  const buffer = Buffer.alloc(44 + dataSize);

  buffer.write("RIFF", 0);
  buffer.writeUInt32LE(36 + dataSize, 4);
  buffer.write("WAVE", 8);
  buffer.write("fmt ", 12);
  buffer.writeUInt32LE(16, 16);
  buffer.writeUInt16LE(1, 20);
  buffer.writeUInt16LE(channels, 22);
  buffer.writeUInt32LE(normalizedRate, 24);
  buffer.writeUInt32LE(byteRate, 28);
  buffer.writeUInt16LE(blockAlign, 32);
  buffer.writeUInt16LE(bitsPerSample, 34);
  buffer.write("data", 36);
  buffer.writeUInt32LE(dataSize, 40);
  pcm.copy(buffer, 44);

  return buffer;
}

/**
 * Reads a 16-bit PCM WAV (mono or stereo, any rate) into Discord playback PCM.
 * Returns null for anything else; compressed formats are not decoded.
 */
export function decodeWavToDiscordPcm(wav: Buffer) {
  if (wav.length < 12) return null;
  if (wav.toString("ascii", 0, 4) !== "RIFF" || wav.toString("ascii", 8, 12) !== "WAVE") return null;

  let offset = 12;
  let format: { audioFormat: number; channels: number; sampleRate: number; bitsPerSample: number } | null = null;
  let data: Buffer | null = null;

  while (offset + 8 <= wav.length) {
    const chunkId = wav.toString("ascii", offset, offset + 4);
    const chunkSize = wav.readUInt32LE(offset + 4);
    const bodyStart = offset + 8;
    const bodyEnd = Math.min(wav.length, bodyStart + chunkSize);
    if (chunkId === "fmt " && bodyEnd - bodyStart >= 16) {
      format = {
        audioFormat: wav.readUInt16LE(bodyStart),
        channels: wav.readUInt16LE(bodyStart + 2),
        sampleRate: wav.readUInt32LE(bodyStart + 4),
        bitsPerSample: wav.readUInt16LE(bodyStart + 14)
      };
    } else if (chunkId === "data") {
      data = wav.subarray(bodyStart, bodyEnd);
    }
    // chunks are word aligned
    offset = bodyStart + chunkSize + (chunkSize % 2);
  }

  if (!format || !data) return null;
  if (format.audioFormat !== 1 || format.bitsPerSample !== 16) return null;
  if (format.channels === 1) {
    return convertModelOutputToDiscordPcm(data, format.sampleRate);
  }
  if (format.channels === 2) {
    if (format.sampleRate === DISCORD_SAMPLE_RATE) return Buffer.from(data);
    return convertModelOutputToDiscordPcm(downmixStereo16ToMono16(data), format.sampleRate);
  }
  return null;
}

/**
 * Synthesizes a soft two-note chime in Discord playback PCM, used as the
 * "thinking" ambience clip when no clip file is configured.
 */
export function createToneClip({
  durationMs = 900,
  frequencies = [440, 660],
  amplitude = 2200
}: {
  durationMs?: number;
  frequencies?: number[];
  amplitude?: number;
} = {}) {
  const frameCount = Math.floor((DISCORD_SAMPLE_RATE * durationMs) / 1000);
  const samples = new Int16Array(frameCount * DISCORD_CHANNELS);
  const noteCount = Math.max(1, frequencies.length);
  const framesPerNote = Math.max(1, Math.floor(frameCount / noteCount));

  for (let frame = 0; frame < frameCount; frame += 1) {
    const noteIndex = Math.min(noteCount - 1, Math.floor(frame / framesPerNote));
    const frequency = frequencies[noteIndex] ?? 440;
    const positionInNote = (frame % framesPerNote) / framesPerNote;
    // fade in/out per note to avoid clicks
    const envelope = Math.sin(Math.PI * positionInNote);
    const value = clamp16(
      Math.round(amplitude * envelope * Math.sin((2 * Math.PI * frequency * frame) / DISCORD_SAMPLE_RATE))
    );
    samples[frame * 2] = value;
    samples[frame * 2 + 1] = value;
  }

  return int16ArrayToBuffer(samples);
}
