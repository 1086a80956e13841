import { Hono } from 'hono';
import { cors } from 'hono/cors';
import type { BridgeEnv } from './types/hono.js';
import type { BridgeServices } from './bridge.js';
import type { Logger } from './logging/logger.js';
import { bridgeErrorHandler, securityHeaders, requestLogger } from './middleware/error-handler.js';
import { rateLimiter } from './middleware/rate-limiter.js';
import { apiKeyAuth } from './middleware/api-key.js';
import { createHealthRoutes, createOAuthRoutes, createDeviceRoutes } from './routes/index.js';
import { silentLogger } from './logging/logger.js';
import {
  DEFAULT_BLINK_CYCLES,
  DEFAULT_BLINK_STEP_DELAY_MS,
  DEFAULT_RATE_LIMIT_MAX_REQUESTS,
  DEFAULT_RATE_LIMIT_WINDOW_MS,
} from './config/constants.js';

export interface BridgeServerOptions {
  services: BridgeServices;
  logger?: Logger;
  /**
   * Required on every route but /health and /oauth/callback when set
   */
  apiKey?: string;
  rateLimit?: {
    windowMs: number;
    maxRequests: number;
  };
  blink?: {
    cycles: number;
    stepDelayMs: number;
  };
  defaultDeviceId?: string;
  enableCors?: boolean;
  production?: boolean;
}

/**
 * Create the bridge HTTP application
 */
export function createBridgeServer(options: BridgeServerOptions): Hono<BridgeEnv> {
  const {
    services,
    logger = silentLogger,
    apiKey,
    rateLimit = {
      windowMs: DEFAULT_RATE_LIMIT_WINDOW_MS,
      maxRequests: DEFAULT_RATE_LIMIT_MAX_REQUESTS,
    },
    blink = {
      cycles: DEFAULT_BLINK_CYCLES,
      stepDelayMs: DEFAULT_BLINK_STEP_DELAY_MS,
    },
    defaultDeviceId,
    enableCors = false,
    production = false,
  } = options;

  const app = new Hono<BridgeEnv>();
  const auth = apiKeyAuth({ apiKey });

  // Global error handler
  app.onError(bridgeErrorHandler({ logger, production }));

  app.use('*', securityHeaders(production));
  app.use('*', requestLogger(logger));

  if (enableCors) {
    app.use(
      '*',
      cors({
        origin: '*',
        allowMethods: ['GET', 'POST', 'OPTIONS'],
        allowHeaders: ['Authorization', 'Content-Type', 'x-api-key'],
        maxAge: 86400,
      })
    );
  }

  app.route('/health', createHealthRoutes({ credentialStore: services.credentialStore }));

  app.route('/oauth', createOAuthRoutes({ services, auth }));

  // Device routes: API key, then rate limiting
  const devices = new Hono<BridgeEnv>();
  devices.use('*', auth);
  devices.use('*', rateLimiter(rateLimit));
  devices.route('/', createDeviceRoutes({ dispatcher: services.dispatcher, blink, defaultDeviceId }));
  app.route('/devices', devices);

  return app;
}
