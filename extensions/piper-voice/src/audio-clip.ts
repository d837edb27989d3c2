export type ClipOptions = {
  sampleRate: number;
  channelCount?: number;
  streaming?: boolean;
};

export class AudioClip {
  readonly channelCount: number;
  readonly sampleRate: number;
  readonly streaming: boolean;

  constructor(
    readonly name: string,
    readonly samples: Float32Array,
    options: ClipOptions,
  ) {
    this.channelCount = options.channelCount ?? 1;
    this.sampleRate = options.sampleRate;
    this.streaming = options.streaming ?? false;
  }

  /** Frames per channel. */
  get sampleCount(): number {
    return Math.floor(this.samples.length / this.channelCount);
  }

  get durationMs(): number {
    return (this.sampleCount / this.sampleRate) * 1000;
  }

  /** Interleaved s16le, clamped to [-1, 1]. */
  toPcm16(): Buffer {
    const pcm = Buffer.alloc(this.samples.length * 2);
    this.samples.forEach((sample, i) => {
      const clamped = Number.isNaN(sample) ? 0 : Math.max(-1, Math.min(1, sample));
      pcm.writeInt16LE(Math.round(clamped * 32767), i * 2);
    });
    return pcm;
  }

  toWav(): Buffer {
    return pcmToWav(this.toPcm16(), { sampleRate: this.sampleRate, channels: this.channelCount });
  }
}

export function createClip(samples: Float32Array, options: ClipOptions, name = "PiperTTS"): AudioClip {
  if (samples.length === 0) {
    throw new Error("Cannot create a clip without samples");
  }
  if (!Number.isInteger(options.sampleRate) || options.sampleRate <= 0) {
    throw new Error(`Invalid sample rate: ${options.sampleRate}`);
  }
  return new AudioClip(name, samples, options);
}

export function pcmToWav(pcm: Buffer, options: { sampleRate: number; channels: number }): Buffer {
  const byteRate = options.sampleRate * options.channels * 2;
  const blockAlign = options.channels * 2;
  const header = Buffer.alloc(44);

  header.write("RIFF", 0);
  header.writeUInt32LE(36 + pcm.length, 4);
  header.write("WAVE", 8);
  header.write("fmt ", 12);
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20);
  header.writeUInt16LE(options.channels, 22);
  header.writeUInt32LE(options.sampleRate, 24);
  header.writeUInt32LE(byteRate, 28);
  header.writeUInt16LE(blockAlign, 32);
  header.writeUInt16LE(16, 34);
  header.write("data", 36);
  header.writeUInt32LE(pcm.length, 40);

  return Buffer.concat([header, pcm]);
}
