import { createHash } from 'node:crypto';
import type { MiddlewareHandler } from 'hono';
import type { BridgeEnv } from '../types/hono.js';
import { BridgeError } from '../errors/bridge-error.js';
import { constantTimeCompare } from '../crypto/signature.js';
import { HEADER_API_KEY } from '../config/constants.js';

export interface ApiKeyAuthOptions {
  apiKey?: string;
  headerName?: string;
}

/**
 * Bridge API authentication middleware
 * Validates the API key from `x-api-key` or a Bearer header
 */
export function apiKeyAuth(options: ApiKeyAuthOptions = {}): MiddlewareHandler<BridgeEnv> {
  const { apiKey, headerName = HEADER_API_KEY } = options;

  return async (c, next) => {
    // If no API key is configured, allow all requests (development mode)
    if (!apiKey) {
      return next();
    }

    const bearer = c.req.header('Authorization');
    const providedKey =
      c.req.header(headerName) || (bearer?.startsWith('Bearer ') ? bearer.slice('Bearer '.length) : undefined);

    if (!providedKey) {
      throw BridgeError.unauthorized();
    }

    if (!constantTimeCompare(providedKey, apiKey)) {
      throw BridgeError.forbidden();
    }

    c.set('caller', keyFingerprint(providedKey));
    return next();
  };
}

export function keyFingerprint(key: string): string {
  return `key:${createHash('sha256').update(key).digest('hex').slice(0, 16)}`;
}
