/**
 * PCM helpers: WAV framing and synthesised cue tones. Samples are signed
 * 16-bit little endian.
 */

export const WAV_HEADER_BYTES = 44;

export function createWavBuffer(pcm: Buffer, sampleRate: number, channels = 1): Buffer {
  const header = Buffer.alloc(WAV_HEADER_BYTES);
  header.write("RIFF", 0);
  header.writeUInt32LE(pcm.length + 36, 4);
  header.write("WAVE", 8);
  header.write("fmt ", 12);
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20);
  header.writeUInt16LE(channels, 22);
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE(sampleRate * channels * 2, 28);
  header.writeUInt16LE(channels * 2, 32);
  header.writeUInt16LE(16, 34);
  header.write("data", 36);
  header.writeUInt32LE(pcm.length, 40);
  return Buffer.concat([header, pcm]);
}

/** Sine tone with a short linear fade at both ends. */
export function createTone(frequencyHz: number, durationMs: number, sampleRate: number, amplitude = 0.3): Buffer {
  const samples = Math.round((durationMs / 1000) * sampleRate);
  const fade = Math.min(Math.round(sampleRate * 0.01), Math.floor(samples / 2));
  const pcm = Buffer.alloc(samples * 2);
  for (let i = 0; i < samples; i++) {
    const envelope = fade === 0 ? 1 : Math.min(1, i / fade, (samples - 1 - i) / fade);
    const value = Math.sin((2 * Math.PI * frequencyHz * i) / sampleRate) * amplitude * envelope;
    pcm.writeInt16LE(Math.round(value * 32767), i * 2);
  }
  return pcm;
}
