import type { SynthesizedAudio } from "../../core/ports/outboundPorts";

const SAMPLE_RATE = 8_000;
const HEADER_BYTES = 44;

// Two falling beeps separated by a short pause; frequency 0 is silence.
const NOTICE_TONES = [
  { frequency: 660, seconds: 0.2 },
  { frequency: 0, seconds: 0.1 },
  { frequency: 440, seconds: 0.3 },
] as const;

const renderSamples = (): Buffer => {
  const counts = NOTICE_TONES.map((tone) => Math.round(tone.seconds * SAMPLE_RATE));
  const samples = Buffer.alloc(counts.reduce((sum, count) => sum + count, 0), 128);

  let offset = 0;
  NOTICE_TONES.forEach((tone, index) => {
    const count = counts[index] ?? 0;
    if (tone.frequency > 0) {
      for (let sample = 0; sample < count; sample += 1) {
        const phase = (2 * Math.PI * tone.frequency * sample) / SAMPLE_RATE;
        samples[offset + sample] = Math.round(128 + 64 * Math.sin(phase));
      }
    }
    offset += count;
  });

  return samples;
};

/**
 * 8 kHz mono 8-bit PCM WAV wrapping the notice tones.
 */
const encodeWav = (samples: Buffer): Buffer => {
  const header = Buffer.alloc(HEADER_BYTES);
  header.write("RIFF", 0, "ascii");
  header.writeUInt32LE(HEADER_BYTES - 8 + samples.length, 4);
  header.write("WAVE", 8, "ascii");
  header.write("fmt ", 12, "ascii");
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20);
  header.writeUInt16LE(1, 22);
  header.writeUInt32LE(SAMPLE_RATE, 24);
  header.writeUInt32LE(SAMPLE_RATE, 28);
  header.writeUInt16LE(1, 32);
  header.writeUInt16LE(8, 34);
  header.write("data", 36, "ascii");
  header.writeUInt32LE(samples.length, 40);

  return Buffer.concat([header, samples]);
};

let cached: Buffer | undefined;

/**
 * Fixed "audio unavailable" clip used when speech synthesis fails. Every call returns the same bytes.
 */
export const noticeClip = (): SynthesizedAudio => {
  cached ??= encodeWav(renderSamples());
  return { bytes: Uint8Array.from(cached), contentType: "audio/wav" };
};
