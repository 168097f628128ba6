import OpenAI, { APIConnectionTimeoutError, APIError, type ClientOptions } from 'openai';
import { Agent } from 'undici';
import { config } from '../config';
import { ApiConnectionError, ApiError, ApiStatusError, ApiTimeoutError } from '../core/errors';

export type KokoroClientOptions = {
  baseURL: string;
  apiKey: string;
  connectTimeoutMs?: number;
  maxConnections?: number;
  keepAliveMs?: number;
  // per-request bound on headers and on each body read
  readTimeoutMs?: number;
  fetch?: ClientOptions['fetch'];
};

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

/**
 * OpenAI client pointed at a Kokoro server. Kokoro reports failures as a bare
 * JSON object (`{"message": ...}` or `{"detail": ...}`) rather than under an
 * `error` key, which the SDK would otherwise discard.
 */
export class KokoroClient extends OpenAI {
  protected override makeStatusError(
    status: number,
    error: Object | undefined,
    message: string | undefined,
    headers: Headers
  ): APIError {
    const body = isRecord(error) && !('error' in error) ? { error } : error;
    return APIError.generate(status, body, message, headers);
  }
}

export type KokoroTransport = {
  client: KokoroClient;
  agent: Agent;
};

export function createKokoroClient(opts: KokoroClientOptions): KokoroTransport {
  const readTimeoutMs = opts.readTimeoutMs ?? config.kokoroReadTimeoutMs;
  const agent = new Agent({
    connect: { timeout: opts.connectTimeoutMs ?? config.kokoroConnectTimeoutMs },
    connections: opts.maxConnections ?? config.kokoroMaxConnections,
    keepAliveTimeout: opts.keepAliveMs ?? config.kokoroKeepAliveMs,
    keepAliveMaxTimeout: opts.keepAliveMs ?? config.kokoroKeepAliveMs,
    headersTimeout: readTimeoutMs,
    bodyTimeout: readTimeoutMs
  });
  const client = new KokoroClient({
    apiKey: opts.apiKey,
    baseURL: opts.baseURL,
    maxRetries: 0,
    fetch: opts.fetch,
    fetchOptions: { dispatcher: agent, redirect: 'follow' }
  });
  return { client, agent };
}

/** Maps SDK and transport failures onto the error kinds the pipeline expects. */
export function translateError(err: unknown, ctx: { timedOut: boolean }): ApiError {
  if (err instanceof ApiError) return err;
  if (ctx.timedOut || err instanceof APIConnectionTimeoutError) {
    return new ApiTimeoutError('Kokoro TTS request timed out', { cause: err });
  }
  if (err instanceof APIError && err.status !== undefined) {
    return new ApiStatusError(err.message, {
      statusCode: err.status,
      requestId: err.requestID ?? null,
      body: err.error ?? null,
      cause: err
    });
  }
  const message = err instanceof Error ? err.message : String(err);
  return new ApiConnectionError(`Kokoro TTS connection failed: ${message}`, { cause: err });
}
