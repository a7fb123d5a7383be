import test from "node:test";
import assert from "node:assert/strict";
import {
  convertDiscordPcmToModelInput,
  convertModelOutputToDiscordPcm,
  createToneClip,
  decodeWavToDiscordPcm,
  encodePcm16MonoAsWav,
  frameRms,
  isVoicedFrame,
  pcmBytesForMs,
  pcmDurationMs
} from "./pcmAudio.ts";

function int16Buffer(values: number[]) {
  const buffer = Buffer.alloc(values.length * 2);
  values.forEach((value, index) => buffer.writeInt16LE(value, index * 2));
  return buffer;
}

function readInt16(buffer: Buffer) {
  const values: number[] = [];
  for (let offset = 0; offset + 1 < buffer.length; offset += 2) {
    values.push(buffer.readInt16LE(offset));
  }
  return values;
}

test("frameRms and isVoicedFrame classify against the noise floor", () => {
  const loud = int16Buffer([1000, -1000, 1000, -1000]);
  assert.equal(frameRms(loud), 1000);
  assert.equal(isVoicedFrame(loud, 450), true);
  assert.equal(isVoicedFrame(Buffer.alloc(8), 450), false);
  assert.equal(frameRms(Buffer.alloc(1)), 0);
});

test("convertDiscordPcmToModelInput downmixes and halves the rate", () => {
  const stereo = int16Buffer([100, 300, 100, 300, 100, 300, 100, 300]);
  assert.deepEqual(readInt16(convertDiscordPcmToModelInput(stereo)), [200, 200]);
  assert.equal(convertDiscordPcmToModelInput(Buffer.alloc(0)).length, 0);
});

test("convertModelOutputToDiscordPcm upsamples with interpolation and duplicates channels", () => {
  const mono24k = int16Buffer([0, 100]);
  assert.deepEqual(readInt16(convertModelOutputToDiscordPcm(mono24k)), [0, 0, 50, 50, 100, 100, 100, 100]);
});

test("decodeWavToDiscordPcm reads 16-bit wav written by encodePcm16MonoAsWav", () => {
  const wav = encodePcm16MonoAsWav(int16Buffer([500, -500]), 48000);
  assert.equal(wav.toString("ascii", 0, 4), "RIFF");
  assert.equal(wav.readUInt32LE(24), 48000);
  const decoded = decodeWavToDiscordPcm(wav);
  assert.ok(decoded);
  assert.deepEqual(readInt16(decoded), [500, 500, -500, -500]);
  assert.equal(decodeWavToDiscordPcm(Buffer.from("not a wav file")), null);
});

test("duration helpers agree on 48 kHz stereo framing", () => {
  assert.equal(pcmBytesForMs(10), 1920);
  assert.equal(pcmDurationMs(1920), 10);
});

test("createToneClip renders the requested duration starting from silence", () => {
  const clip = createToneClip({ durationMs: 100 });
  assert.equal(clip.length, 19200);
  assert.equal(clip.readInt16LE(0), 0);
  assert.ok(frameRms(clip) > 0);
});
