import type { ErrorHandler, MiddlewareHandler } from 'hono';
import { ZodError } from 'zod';
import type { BridgeEnv } from '../types/hono.js';
import type { Logger } from '../logging/logger.js';
import { BridgeError } from '../errors/bridge-error.js';
import { generateRandomBase64Url } from '../crypto/random.js';

export interface ErrorHandlerOptions {
  logger: Logger;
  // Hide unexpected error messages from clients
  production?: boolean;
}

/**
 * Global error handler
 *
 * Transforms errors into `{ error, error_description }` JSON responses
 */
export function bridgeErrorHandler(options: ErrorHandlerOptions): ErrorHandler<BridgeEnv> {
  const { logger, production = false } = options;

  return (err, c) => {
    if (err instanceof BridgeError) {
      const log = err.statusCode >= 500 ? logger.error : logger.warn;
      log('request failed', {
        method: c.req.method,
        path: c.req.path,
        error: err.code,
        description: err.description,
        providerCode: err.providerCode,
      });
      return c.json(err.toJSON(), err.statusCode);
    }

    if (err instanceof ZodError) {
      const invalid = BridgeError.invalidRequest(
        err.errors.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join(', ')
      );
      return c.json(invalid.toJSON(), invalid.statusCode);
    }

    logger.error('unexpected error', { method: c.req.method, path: c.req.path, error: err });

    const serverError = BridgeError.serverError(
      production ? 'An unexpected error occurred' : err.message
    );
    return c.json(serverError.toJSON(), serverError.statusCode);
  };
}

/**
 * Security headers middleware
 */
export function securityHeaders(production: boolean = false): MiddlewareHandler<BridgeEnv> {
  return async (c, next) => {
    await next();

    c.header('X-Frame-Options', 'DENY');
    c.header('X-Content-Type-Options', 'nosniff');
    c.header('Referrer-Policy', 'no-referrer');
    c.header('Cache-Control', 'no-store');

    // Strict Transport Security (enable in production with HTTPS)
    if (production) {
      c.header('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    }
  };
}

/**
 * Request logging middleware
 * One line per request; also exposes a request-scoped child logger
 */
export function requestLogger(logger: Logger): MiddlewareHandler<BridgeEnv> {
  return async (c, next) => {
    const start = Date.now();
    const requestId = c.req.header('x-request-id') ?? generateRandomBase64Url(9);
    const scoped = logger.child({ requestId });

    c.set('requestId', requestId);
    c.set('logger', scoped);
    c.header('X-Request-Id', requestId);

    await next();

    // Query strings can carry authorization codes; only the path is logged
    scoped.info('request', {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      duration: Date.now() - start,
    });
  };
}
