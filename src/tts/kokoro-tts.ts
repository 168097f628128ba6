import type { Agent } from 'undici';
import { config } from '../config';
import { logger } from '../observability/logger';
import { createKokoroClient, type KokoroClient } from './kokoro-client';
import { KokoroChunkedStream, type KokoroSynthesisOptions } from './kokoro-stream';
import {
  DEFAULT_API_CONNECT_OPTIONS,
  isGiven,
  type NotGivenOr,
  type SynthesizeOptions,
  type TtsCapabilities,
  type TtsProvider
} from './types';

export const TTS_SAMPLE_RATE = 24000;
export const TTS_CHANNELS = 1;

export type TTSModels = 'tts-1' | 'kokoro' | (string & {});
export type TTSVoices = 'af_heart' | 'af_bella' | (string & {});

export type KokoroTtsInit = {
  baseURL?: string;
  apiKey?: string;
  model?: TTSModels;
  voice?: TTSVoices;
  speed?: number;
  // pre-configured client; the caller keeps ownership of its transport.
  // A plain OpenAI client would drop Kokoro's bare JSON error bodies.
  client?: KokoroClient;
  frameDurationMs?: number;
  readTimeoutMs?: number;
};

export type KokoroOptionsUpdate = {
  model?: NotGivenOr<TTSModels>;
  voice?: NotGivenOr<TTSVoices>;
  speed?: NotGivenOr<number>;
};

export class KokoroTts implements TtsProvider {
  readonly capabilities: TtsCapabilities = { streaming: false };
  readonly sampleRate = TTS_SAMPLE_RATE;
  readonly numChannels = TTS_CHANNELS;

  private readonly opts: KokoroSynthesisOptions;
  private readonly client: KokoroClient;
  private readonly agent: Agent | null;
  private readonly frameDurationMs: number;
  private readonly readTimeoutMs: number;

  constructor(init: KokoroTtsInit = {}) {
    const baseURL = init.baseURL ?? config.kokoroBaseUrl;
    logger.info(`Using Kokoro TTS API URL: ${baseURL}`);

    this.opts = {
      model: init.model ?? config.kokoroModel,
      voice: init.voice ?? config.kokoroVoice,
      speed: init.speed ?? config.kokoroSpeed
    };
    this.frameDurationMs = init.frameDurationMs ?? config.kokoroFrameMs;
    this.readTimeoutMs = init.readTimeoutMs ?? config.kokoroReadTimeoutMs;

    if (init.client) {
      this.client = init.client;
      this.agent = null;
    } else {
      const transport = createKokoroClient({
        baseURL,
        apiKey: init.apiKey ?? config.kokoroApiKey,
        readTimeoutMs: this.readTimeoutMs
      });
      this.client = transport.client;
      this.agent = transport.agent;
    }
  }

  get options(): Readonly<KokoroSynthesisOptions> {
    return { ...this.opts };
  }

  updateOptions(update: KokoroOptionsUpdate): void {
    if (isGiven(update.model)) this.opts.model = update.model;
    if (isGiven(update.voice)) this.opts.voice = update.voice;
    if (isGiven(update.speed)) this.opts.speed = update.speed;
  }

  synthesize(text: string, opts: SynthesizeOptions = {}): KokoroChunkedStream {
    return new KokoroChunkedStream({
      inputText: text,
      opts: this.opts,
      client: this.client,
      connOptions: opts.connOptions ?? DEFAULT_API_CONNECT_OPTIONS,
      sampleRate: this.sampleRate,
      numChannels: this.numChannels,
      frameDurationMs: this.frameDurationMs,
      readTimeoutMs: this.readTimeoutMs,
      signal: opts.signal
    });
  }

  async close(): Promise<void> {
    if (this.agent) {
      await this.agent.close();
    }
  }
}
