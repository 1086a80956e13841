import { serve } from '@hono/node-server';
import { createBridgeServer } from './app.js';
import { createBridgeServices, bootstrapCredentials } from './bridge.js';
import { getConfig } from './config/index.js';
import { createLogger } from './logging/logger.js';
import { toBridgeError } from './errors/bridge-error.js';

// Load configuration
const config = getConfig();
const logger = createLogger({ level: config.logging.level, bindings: { service: 'ewelink-bridge' } });

const services = createBridgeServices(config, { logger });

const app = createBridgeServer({
  services,
  logger,
  apiKey: config.security.apiKey,
  rateLimit: config.rateLimit,
  blink: {
    cycles: config.commands.blinkCycles,
    stepDelayMs: config.commands.blinkStepDelayMs,
  },
  defaultDeviceId: config.ewelink.defaultDeviceId,
  enableCors: config.server.enableCors,
  production: config.server.nodeEnv === 'production',
});

if (!config.storage.credentialsFile) {
  logger.warn('no CREDENTIALS_FILE configured; tokens are kept in memory and lost on restart');
}
if (!config.security.apiKey) {
  logger.warn('no API_KEY configured; the bridge API is open');
}

// Start server
serve(
  {
    fetch: app.fetch,
    port: config.server.port,
    hostname: config.server.host,
  },
  (info) => {
    logger.info('bridge listening', { address: info.address, port: info.port });
  }
);

bootstrapCredentials(services, config, logger).then(
  (authenticated) => {
    if (!authenticated) {
      const host = config.server.host === '0.0.0.0' ? 'localhost' : config.server.host;
      logger.info('not authenticated; open the hosted login page from /oauth/url', {
        loginUrlEndpoint: `http://${host}:${config.server.port}/oauth/url`,
      });
    }
  },
  (err: unknown) => {
    const error = toBridgeError(err);
    logger.error('startup authentication failed', { error: error.code, description: error.description });
  }
);

// Export for programmatic use
export { createBridgeServer } from './app.js';
export { createBridgeServices, bootstrapCredentials } from './bridge.js';
export * from './config/index.js';
export * from './errors/index.js';
export * from './crypto/index.js';
export * from './provider/index.js';
export * from './grants/index.js';
export * from './services/index.js';
export * from './storage/index.js';
export * from './logging/logger.js';
