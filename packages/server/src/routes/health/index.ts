import { Hono } from 'hono';
import type { HealthResponse } from '@ewelink-bridge/shared';
import type { BridgeEnv } from '../../types/hono.js';
import type { CredentialStore } from '../../services/credential-store.js';

export interface HealthRouteOptions {
  credentialStore: CredentialStore;
}

/**
 * Liveness plus whether a token is stored
 */
export function createHealthRoutes(options: HealthRouteOptions) {
  const router = new Hono<BridgeEnv>();

  router.get('/', async (c) => {
    const tokenSet = await options.credentialStore.load();
    const body: HealthResponse = {
      status: 'ok',
      authenticated: tokenSet !== null,
    };
    if (tokenSet) {
      body.region = tokenSet.region.id;
    }
    return c.json(body);
  });

  return router;
}
