import type { AudioFrame } from '../audio/audio-frame';
import { config } from '../config';
import { KokoroTts } from './kokoro-tts';
import type { ChunkedStream, SynthesizeOptions, TtsProvider } from './types';

export class TTSClient {
  private provider: TtsProvider;

  constructor(provider?: TtsProvider) {
    this.provider = provider ?? createTtsProvider();
  }

  get capabilities() {
    return this.provider.capabilities;
  }

  synthesize(text: string, opts?: SynthesizeOptions): ChunkedStream {
    return this.provider.synthesize(text, opts);
  }

  async *stream(text: string, signal?: AbortSignal): AsyncGenerator<AudioFrame> {
    const stream = this.provider.synthesize(text, { signal });
    try {
      for await (const audio of stream) {
        if (signal?.aborted) return;
        yield audio.frame;
      }
    } finally {
      await stream.close();
    }
  }

  async close() {
    await this.provider.close();
  }
}

export type { ChunkedStream, SynthesizeOptions, TtsProvider } from './types';

function createTtsProvider(): TtsProvider {
  switch (config.ttsProvider) {
    case 'kokoro':
      return new KokoroTts();
    default:
      throw new Error(`Unsupported TTS provider: ${String(config.ttsProvider)}`);
  }
}
