export { KokoroTts, TTS_SAMPLE_RATE, TTS_CHANNELS } from './tts/kokoro-tts';
export type { KokoroTtsInit, KokoroOptionsUpdate, TTSModels, TTSVoices } from './tts/kokoro-tts';
export { KokoroChunkedStream } from './tts/kokoro-stream';
export type { KokoroSynthesisOptions } from './tts/kokoro-stream';
export { KokoroClient, createKokoroClient } from './tts/kokoro-client';
export { TTSClient } from './tts/tts-base';
export { DEFAULT_API_CONNECT_OPTIONS, NOT_GIVEN, SynthesisState, isGiven } from './tts/types';
export type {
  ApiConnectOptions,
  ChunkedStream,
  NotGivenOr,
  SynthesisMetrics,
  SynthesizeOptions,
  SynthesizedAudio,
  TtsCapabilities,
  TtsProvider
} from './tts/types';
export { AudioFrame, combineAudioFrames } from './audio/audio-frame';
export { AudioByteStream } from './audio/audio-byte-stream';
export { WavWriter } from './audio/wav-writer';
export { ApiError, ApiConnectionError, ApiTimeoutError, ApiStatusError } from './core/errors';
export { logger } from './observability/logger';
