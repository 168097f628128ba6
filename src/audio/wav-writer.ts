import fs from 'node:fs/promises';
import path from 'node:path';
import type { AudioFrame } from './audio-frame';

const HEADER_BYTES = 44;
const BITS_PER_SAMPLE = 16;

/** Streams 16-bit PCM frames into a WAV file; sizes are patched on close. */
export class WavWriter {
  private handle: fs.FileHandle | null = null;
  private dataBytes = 0;

  constructor(
    private readonly filePath: string,
    private readonly sampleRate: number,
    private readonly channels: number
  ) {}

  getPath() {
    return this.filePath;
  }

  get bytesWritten() {
    return this.dataBytes;
  }

  async open() {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    this.handle = await fs.open(this.filePath, 'w');
    await this.handle.write(wavHeader(this.sampleRate, this.channels, 0));
  }

  async write(frame: AudioFrame) {
    if (!this.handle) throw new Error(`WavWriter: ${this.filePath} is not open`);
    if (frame.sampleRate !== this.sampleRate || frame.channels !== this.channels) {
      throw new Error(
        `WavWriter: frame is ${frame.sampleRate}Hz/${frame.channels}ch, file is ${this.sampleRate}Hz/${this.channels}ch`
      );
    }
    if (frame.data.length === 0) return;
    const pcm = frame.toBuffer();
    await this.handle.write(pcm);
    this.dataBytes += pcm.length;
  }

  async close() {
    if (!this.handle) return;
    const header = wavHeader(this.sampleRate, this.channels, this.dataBytes);
    await this.handle.write(header, 0, header.length, 0);
    await this.handle.close();
    this.handle = null;
  }
}

export function wavHeader(sampleRate: number, channels: number, dataBytes: number): Buffer {
  const blockAlign = (channels * BITS_PER_SAMPLE) / 8;
  const buf = Buffer.alloc(HEADER_BYTES);
  buf.write('RIFF', 0);
  buf.writeUInt32LE(HEADER_BYTES - 8 + dataBytes, 4);
  buf.write('WAVE', 8);
  buf.write('fmt ', 12);
  buf.writeUInt32LE(16, 16);
  buf.writeUInt16LE(1, 20); // PCM
  buf.writeUInt16LE(channels, 22);
  buf.writeUInt32LE(sampleRate, 24);
  buf.writeUInt32LE(sampleRate * blockAlign, 28);
  buf.writeUInt16LE(blockAlign, 32);
  buf.writeUInt16LE(BITS_PER_SAMPLE, 34);
  buf.write('data', 36);
  buf.writeUInt32LE(dataBytes, 40);
  return buf;
}
