const BYTES_PER_SAMPLE = 2;

/** A block of interleaved signed 16-bit PCM samples. */
export class AudioFrame {
  constructor(
    readonly data: Int16Array,
    readonly sampleRate: number,
    readonly channels: number,
    readonly samplesPerChannel: number
  ) {
    if (data.length !== samplesPerChannel * channels) {
      throw new Error(
        `AudioFrame: expected ${samplesPerChannel * channels} samples, got ${data.length}`
      );
    }
  }

  /** Decodes little-endian PCM; `pcm` must hold whole samples for every channel. */
  static fromPcm(pcm: Uint8Array, sampleRate: number, channels: number): AudioFrame {
    const bytesPerFrame = BYTES_PER_SAMPLE * channels;
    if (pcm.length % bytesPerFrame !== 0) {
      throw new Error(`AudioFrame: ${pcm.length} bytes is not a whole number of samples`);
    }
    const buf = Buffer.from(pcm.buffer, pcm.byteOffset, pcm.byteLength);
    const data = new Int16Array(pcm.length / BYTES_PER_SAMPLE);
    for (let i = 0; i < data.length; i++) {
      data[i] = buf.readInt16LE(i * BYTES_PER_SAMPLE);
    }
    return new AudioFrame(data, sampleRate, channels, data.length / channels);
  }

  get durationMs(): number {
    return (this.samplesPerChannel / this.sampleRate) * 1000;
  }

  get byteLength(): number {
    return this.data.length * BYTES_PER_SAMPLE;
  }

  toBuffer(): Buffer {
    const out = Buffer.alloc(this.byteLength);
    for (let i = 0; i < this.data.length; i++) {
      out.writeInt16LE(this.data[i], i * BYTES_PER_SAMPLE);
    }
    return out;
  }
}

export function combineAudioFrames(frames: AudioFrame[], sampleRate: number, channels: number): AudioFrame {
  let total = 0;
  for (const frame of frames) {
    if (frame.sampleRate !== sampleRate || frame.channels !== channels) {
      throw new Error(
        `cannot combine ${frame.sampleRate}Hz/${frame.channels}ch frame into ${sampleRate}Hz/${channels}ch`
      );
    }
    total += frame.data.length;
  }
  const data = new Int16Array(total);
  let offset = 0;
  for (const frame of frames) {
    data.set(frame.data, offset);
    offset += frame.data.length;
  }
  return new AudioFrame(data, sampleRate, channels, total / channels);
}
