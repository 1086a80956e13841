import { z } from 'zod';
import type { ProviderEnvelope } from '@ewelink-bridge/shared';
import { BridgeError } from '../errors/bridge-error.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import { DEFAULT_HTTP_TIMEOUT_MS } from '../config/constants.js';

/**
 * Minimal fetch signature; the global fetch satisfies it and tests pass an
 * in-process stand-in
 */
export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface ProviderRequest {
  method: 'GET' | 'POST';
  url: string;
  headers: Record<string, string>;
  body?: string;
}

export interface ProviderReply {
  status: number;
  ok: boolean;
  // Present when the body parsed as a provider envelope
  envelope?: ProviderEnvelope<unknown>;
  text: string;
}

const envelopeSchema = z.object({
  error: z.number(),
  msg: z.string().optional(),
  data: z.unknown().optional(),
});

export interface ProviderHttpClientOptions {
  fetch?: FetchLike;
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * Issues single provider calls with a bounded timeout
 *
 * Transport failures and timeouts become `network_unavailable`; the response
 * is returned as-is otherwise, for the caller to classify.
 */
export class ProviderHttpClient {
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: ProviderHttpClientOptions = {}) {
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.timeoutMs = options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
    this.logger = options.logger ?? silentLogger;
  }

  async send(request: ProviderRequest): Promise<ProviderReply> {
    const start = Date.now();
    let response: Response;

    try {
      response = await this.fetchImpl(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      const timedOut = err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError');
      this.logger.warn('provider call failed', {
        method: request.method,
        url: request.url,
        timedOut,
        error: err,
      });
      throw BridgeError.networkUnavailable(
        timedOut
          ? `No response from ${request.url} within ${this.timeoutMs}ms`
          : `Could not reach ${request.url}`,
        err
      );
    }

    let text: string;
    try {
      text = await response.text();
    } catch (err) {
      throw BridgeError.networkUnavailable(`Connection to ${request.url} dropped while reading the response`, err);
    }

    this.logger.debug('provider call', {
      method: request.method,
      url: request.url,
      status: response.status,
      duration: Date.now() - start,
    });

    return {
      status: response.status,
      ok: response.ok,
      envelope: parseEnvelope(text),
      text,
    };
  }
}

/**
 * Parse a provider envelope, or undefined when the body is not one
 */
export function parseEnvelope(text: string): ProviderEnvelope<unknown> | undefined {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return undefined;
  }

  const result = envelopeSchema.safeParse(json);
  return result.success ? result.data : undefined;
}

/**
 * Shorten a raw body for error messages
 */
export function snippet(text: string, max: number = 200): string {
  const trimmed = text.trim();
  return trimmed.length > max ? `${trimmed.slice(0, max)}…` : trimmed;
}
