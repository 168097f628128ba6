import type { AudioFrame } from '../audio/audio-frame';

export type TtsCapabilities = {
  // true when text can be fed incrementally while audio is produced
  streaming: boolean;
};

export type ApiConnectOptions = {
  maxRetry: number;
  retryIntervalMs: number;
  // connection establishment + response headers
  timeoutMs: number;
};

export const DEFAULT_API_CONNECT_OPTIONS: Readonly<ApiConnectOptions> = Object.freeze({
  maxRetry: 3,
  retryIntervalMs: 2000,
  timeoutMs: 10000
});

export type SynthesizeOptions = {
  connOptions?: ApiConnectOptions;
  signal?: AbortSignal;
};

export type SynthesizedAudio = {
  requestId: string;
  frame: AudioFrame;
};

export type SynthesisMetrics = {
  requestId: string;
  ttfbMs: number | null;
  durationMs: number;
  audioDurationMs: number;
  charactersCount: number;
  cancelled: boolean;
};

export enum SynthesisState {
  CREATED = 'CREATED',
  REQUESTING = 'REQUESTING',
  STREAMING = 'STREAMING',
  FLUSHING = 'FLUSHING',
  COMPLETED = 'COMPLETED',
  ERRORED = 'ERRORED'
}

/** One synthesis call. Nothing is requested until the first pull. */
export interface ChunkedStream extends AsyncIterable<SynthesizedAudio> {
  readonly inputText: string;
  readonly state: SynthesisState;
  collect(): Promise<AudioFrame>;
  close(): Promise<void>;
}

export interface TtsProvider {
  readonly capabilities: TtsCapabilities;
  readonly sampleRate: number;
  readonly numChannels: number;
  synthesize(text: string, opts?: SynthesizeOptions): ChunkedStream;
  close(): Promise<void>;
}

/** Marks an update field as "leave unchanged", distinct from any real value. */
export const NOT_GIVEN: unique symbol = Symbol('NOT_GIVEN');
export type NotGiven = typeof NOT_GIVEN;
export type NotGivenOr<T> = T | NotGiven;

export function isGiven<T>(value: NotGivenOr<T> | undefined): value is T {
  return value !== NOT_GIVEN && value !== undefined;
}
