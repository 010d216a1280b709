export interface WavFormat {
  sampleRate: number;
  channels: number;
  bitsPerSample: number;
}

/** Gemini TTS output: 24 kHz, mono, signed 16-bit little-endian PCM. */
export const GEMINI_TTS_FORMAT: WavFormat = {
  sampleRate: 24000,
  channels: 1,
  bitsPerSample: 16,
};

export const WAV_HEADER_SIZE = 44;

/**
 * Prefix raw PCM with a canonical 44-byte RIFF/WAVE header.
 */
export function encodeWav(
  pcm: Buffer,
  format: WavFormat = GEMINI_TTS_FORMAT,
): Buffer {
  const { sampleRate, channels, bitsPerSample } = format;
  const blockAlign = (channels * bitsPerSample) / 8;
  const byteRate = sampleRate * blockAlign;

  const header = Buffer.alloc(WAV_HEADER_SIZE);
  header.write('RIFF', 0, 'ascii');
  header.writeUInt32LE(36 + pcm.length, 4);
  header.write('WAVE', 8, 'ascii');
  header.write('fmt ', 12, 'ascii');
  header.writeUInt32LE(16, 16); // fmt chunk size
  header.writeUInt16LE(1, 20); // PCM
  header.writeUInt16LE(channels, 22);
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE(byteRate, 28);
  header.writeUInt16LE(blockAlign, 32);
  header.writeUInt16LE(bitsPerSample, 34);
  header.write('data', 36, 'ascii');
  header.writeUInt32LE(pcm.length, 40);

  return Buffer.concat([header, pcm]);
}
