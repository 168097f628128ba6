export type Config = {
  ttsProvider: 'kokoro';
  // Kokoro exposes the OpenAI audio API; baseURL is handed straight to the SDK
  kokoroBaseUrl: string;
  kokoroApiKey: string;
  kokoroModel: string;
  kokoroVoice: string;
  kokoroSpeed: number;
  kokoroFrameMs: number;
  kokoroReadTimeoutMs: number;
  // connection pool
  kokoroConnectTimeoutMs: number;
  kokoroMaxConnections: number;
  kokoroKeepAliveMs: number;
};

function resolveTtsProvider(): Config['ttsProvider'] {
  switch (process.env.TTS_PROVIDER) {
    case undefined:
    case 'kokoro':
      return 'kokoro';
    default:
      throw new Error(`Unsupported TTS provider: ${process.env.TTS_PROVIDER}`);
  }
}

function numberFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const v = Number(raw);
  if (!Number.isFinite(v)) {
    throw new Error(`Invalid number for ${name}: ${raw}`);
  }
  return v;
}

// Centralized config with sensible defaults; all values can be overridden via env.
export const config: Config = {
  ttsProvider: resolveTtsProvider(),
  kokoroBaseUrl: process.env.KOKORO_BASE_URL ?? 'http://localhost:8000',
  kokoroApiKey: process.env.KOKORO_API_KEY ?? 'sk-kokoro',
  kokoroModel: process.env.KOKORO_MODEL ?? 'tts-1',
  kokoroVoice: process.env.KOKORO_VOICE ?? 'af_heart',
  kokoroSpeed: numberFromEnv('KOKORO_SPEED', 1.0),
  kokoroFrameMs: numberFromEnv('KOKORO_FRAME_MS', 100),
  kokoroReadTimeoutMs: numberFromEnv('KOKORO_READ_TIMEOUT_MS', 30000),
  kokoroConnectTimeoutMs: numberFromEnv('KOKORO_CONNECT_TIMEOUT_MS', 15000),
  kokoroMaxConnections: numberFromEnv('KOKORO_MAX_CONNECTIONS', 50),
  kokoroKeepAliveMs: numberFromEnv('KOKORO_KEEPALIVE_MS', 120000)
};
