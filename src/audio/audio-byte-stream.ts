import { logger } from '../observability/logger';
import { AudioFrame } from './audio-frame';

/**
 * Re-chunks an arbitrary PCM16 byte stream into frames of `samplesPerChannel`
 * samples. Bytes that do not yet fill a frame, including half a sample, stay
 * buffered until the next write.
 */
export class AudioByteStream {
  private buf: Buffer = Buffer.alloc(0);
  private readonly bytesPerSample: number;
  private readonly bytesPerFrame: number;

  constructor(
    readonly sampleRate: number,
    readonly numChannels: number,
    readonly samplesPerChannel: number = Math.floor(sampleRate / 10)
  ) {
    if (samplesPerChannel <= 0) {
      throw new Error(`samplesPerChannel must be positive, got ${samplesPerChannel}`);
    }
    this.bytesPerSample = 2 * numChannels;
    this.bytesPerFrame = this.bytesPerSample * samplesPerChannel;
  }

  write(data: Uint8Array): AudioFrame[] {
    if (data.length === 0) return [];
    this.buf = this.buf.length === 0 ? Buffer.from(data) : Buffer.concat([this.buf, data]);

    const frames: AudioFrame[] = [];
    while (this.buf.length >= this.bytesPerFrame) {
      frames.push(AudioFrame.fromPcm(this.buf.subarray(0, this.bytesPerFrame), this.sampleRate, this.numChannels));
      this.buf = this.buf.subarray(this.bytesPerFrame);
    }
    return frames;
  }

  flush(): AudioFrame[] {
    const aligned = this.buf.length - (this.buf.length % this.bytesPerSample);
    if (aligned < this.buf.length) {
      logger.warn('audio byte stream: dropping incomplete sample on flush', {
        bytes: this.buf.length - aligned
      });
    }
    const rest = this.buf.subarray(0, aligned);
    this.buf = Buffer.alloc(0);
    if (rest.length === 0) return [];
    return [AudioFrame.fromPcm(rest, this.sampleRate, this.numChannels)];
  }

  get pendingBytes(): number {
    return this.buf.length;
  }
}
