import { randomUUID } from 'crypto';
import { AudioByteStream } from '../audio/audio-byte-stream';
import { AudioFrame, combineAudioFrames } from '../audio/audio-frame';
import { AsyncQueue } from '../core/async_queue';
import { ApiConnectionError, ApiTimeoutError, toError } from '../core/errors';
import { logger } from '../observability/logger';
import { translateError, type KokoroClient } from './kokoro-client';
import {
  SynthesisState,
  type ApiConnectOptions,
  type ChunkedStream,
  type SynthesisMetrics,
  type SynthesizedAudio
} from './types';

export type KokoroSynthesisOptions = {
  model: string;
  voice: string;
  speed: number;
};

export type KokoroStreamInit = {
  inputText: string;
  opts: KokoroSynthesisOptions;
  client: KokoroClient;
  connOptions: ApiConnectOptions;
  sampleRate: number;
  numChannels: number;
  frameDurationMs: number;
  readTimeoutMs: number;
  signal?: AbortSignal;
};

function raceTimeout<T>(promise: Promise<T>, ms: number, onTimeout: () => void): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      onTimeout();
      reject(new ApiTimeoutError(`Kokoro TTS read timed out after ${ms}ms`));
    }, ms);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      }
    );
  });
}

export class KokoroChunkedStream implements ChunkedStream {
  readonly inputText: string;

  private readonly opts: Readonly<KokoroSynthesisOptions>;
  private readonly client: KokoroClient;
  private readonly connOptions: ApiConnectOptions;
  private readonly sampleRate: number;
  private readonly numChannels: number;
  private readonly samplesPerFrame: number;
  private readonly readTimeoutMs: number;

  private readonly eventCh = new AsyncQueue<SynthesizedAudio>();
  private readonly abort = new AbortController();
  private readonly detachSignal: () => void;
  private task: Promise<void> | null = null;
  private closed = false;
  private currentState = SynthesisState.CREATED;
  private currentRequestId: string | null = null;
  private lastMetrics: SynthesisMetrics | null = null;

  constructor(init: KokoroStreamInit) {
    this.inputText = init.inputText;
    this.opts = Object.freeze({ ...init.opts });
    this.client = init.client;
    this.connOptions = init.connOptions;
    this.sampleRate = init.sampleRate;
    this.numChannels = init.numChannels;
    this.samplesPerFrame = Math.max(1, Math.round((init.sampleRate * init.frameDurationMs) / 1000));
    this.readTimeoutMs = init.readTimeoutMs;

    const callerSignal = init.signal;
    const onCallerAbort = () => this.abort.abort();
    if (callerSignal?.aborted) {
      this.abort.abort();
    } else {
      callerSignal?.addEventListener('abort', onCallerAbort);
    }
    this.detachSignal = () => callerSignal?.removeEventListener('abort', onCallerAbort);
  }

  get state(): SynthesisState {
    return this.currentState;
  }

  get requestId(): string | null {
    return this.currentRequestId;
  }

  get metrics(): SynthesisMetrics | null {
    return this.lastMetrics;
  }

  get options(): Readonly<KokoroSynthesisOptions> {
    return this.opts;
  }

  [Symbol.asyncIterator](): AsyncIterator<SynthesizedAudio> {
    this.start();
    return {
      next: () => this.eventCh.next(),
      // consumer stopped early: cancel the request instead of buffering the rest
      return: async () => {
        await this.close();
        return { value: undefined, done: true };
      }
    };
  }

  async next(): Promise<IteratorResult<SynthesizedAudio>> {
    this.start();
    return this.eventCh.next();
  }

  async collect(): Promise<AudioFrame> {
    const frames: AudioFrame[] = [];
    for await (const ev of this) {
      frames.push(ev.frame);
    }
    return combineAudioFrames(frames, this.sampleRate, this.numChannels);
  }

  async close(): Promise<void> {
    this.closed = true;
    this.abort.abort();
    if (this.task) {
      await this.task;
    } else {
      this.detachSignal();
      this.eventCh.close();
    }
  }

  private start() {
    if (this.task || this.closed) return;
    this.task = this.run().then(
      () => {
        this.detachSignal();
        this.eventCh.close();
      },
      (err: unknown) => {
        this.detachSignal();
        this.eventCh.close(toError(err));
      }
    );
  }

  private transition(next: SynthesisState) {
    logger.debug('kokoro stream state', { from: this.currentState, to: next, requestId: this.currentRequestId });
    this.currentState = next;
  }

  private send(frame: AudioFrame, requestId: string) {
    this.eventCh.push({ requestId, frame });
  }

  private async run(): Promise<void> {
    const signal = this.abort.signal;
    let timedOut = false;
    const onTimeout = () => {
      timedOut = true;
      this.abort.abort();
    };
    const audioStream = new AudioByteStream(this.sampleRate, this.numChannels, this.samplesPerFrame);
    const startedAt = Date.now();
    let firstAudioAt: number | null = null;
    let audioMs = 0;

    logger.info('Kokoro -> converting text to audio', { chars: this.inputText.length, voice: this.opts.voice });

    try {
      if (signal.aborted) {
        throw new ApiConnectionError('Kokoro TTS synthesis aborted');
      }
      this.transition(SynthesisState.REQUESTING);
      const response = await raceTimeout(
        this.client.audio.speech.create(
          {
            input: this.inputText,
            model: this.opts.model,
            voice: this.opts.voice,
            response_format: 'pcm',
            speed: this.opts.speed
          },
          { signal, timeout: this.connOptions.timeoutMs, maxRetries: 0 }
        ),
        this.readTimeoutMs,
        onTimeout
      );

      const body = response.body;
      if (!body) {
        throw new ApiConnectionError('Kokoro TTS response has no body');
      }

      const requestId = randomUUID();
      this.currentRequestId = requestId;
      this.transition(SynthesisState.STREAMING);

      const reader = body.getReader();
      let drained = false;
      const onAbort = () => {
        reader.cancel().catch((err: unknown) => {
          logger.debug('kokoro reader cancel failed', { requestId, err: toError(err).message });
        });
      };
      signal.addEventListener('abort', onAbort);
      try {
        while (true) {
          const result = await raceTimeout(reader.read(), this.readTimeoutMs, onTimeout);
          if (signal.aborted) {
            throw new ApiConnectionError('Kokoro TTS synthesis aborted');
          }
          if (result.done) {
            drained = true;
            break;
          }
          const chunk: Uint8Array = result.value;
          if (firstAudioAt === null && chunk.length > 0) firstAudioAt = Date.now();
          for (const frame of audioStream.write(chunk)) {
            audioMs += frame.durationMs;
            this.send(frame, requestId);
          }
        }
      } finally {
        signal.removeEventListener('abort', onAbort);
        if (!drained && !signal.aborted) onAbort();
      }

      this.transition(SynthesisState.FLUSHING);
      for (const frame of audioStream.flush()) {
        audioMs += frame.durationMs;
        this.send(frame, requestId);
      }
      this.transition(SynthesisState.COMPLETED);

      this.lastMetrics = {
        requestId,
        ttfbMs: firstAudioAt === null ? null : firstAudioAt - startedAt,
        durationMs: Date.now() - startedAt,
        audioDurationMs: audioMs,
        charactersCount: this.inputText.length,
        cancelled: false
      };
      logger.info(`Kokoro TTS synthesis completed in ${this.lastMetrics.durationMs.toFixed(1)}ms`, this.lastMetrics);
    } catch (err) {
      this.transition(SynthesisState.ERRORED);
      const apiErr = translateError(err, { timedOut });
      this.lastMetrics = {
        requestId: this.currentRequestId ?? '',
        ttfbMs: firstAudioAt === null ? null : firstAudioAt - startedAt,
        durationMs: Date.now() - startedAt,
        audioDurationMs: audioMs,
        charactersCount: this.inputText.length,
        cancelled: signal.aborted && !timedOut
      };
      logger.error('Kokoro TTS synthesis failed', { requestId: this.currentRequestId, error: apiErr.message });
      throw apiErr;
    }
  }
}
