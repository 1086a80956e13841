import { Hono } from 'hono';
import { z } from 'zod';
import { zValidator } from '@hono/zod-validator';
import type { AuthorizationUrlResponse, CallbackResponse } from '@ewelink-bridge/shared';
import type { MiddlewareHandler } from 'hono';
import type { BridgeEnv } from '../../types/hono.js';
import type { BridgeServices } from '../../bridge.js';
import { throwOnInvalid } from '../validation.js';
import { buildAuthorizationUrl } from '../../services/authorization-url.js';
import { signStateToken, verifyStateToken } from '../../crypto/state.js';
import { DEFAULT_OAUTH_STATE_TTL, REGION_IDS } from '../../config/constants.js';

export interface OAuthRouteOptions {
  services: BridgeServices;
  // Guards the login URL endpoint; the callback stays open for the redirect
  auth: MiddlewareHandler<BridgeEnv>;
  stateTtl?: number;
}

const urlQuerySchema = z.object({
  region: z.enum(REGION_IDS).optional(),
});

const callbackQuerySchema = z.object({
  code: z.string().min(1, 'code is required'),
  state: z.string().min(1, 'state is required'),
});

/**
 * Hosted login flow: issue the login URL, receive the redirect
 */
export function createOAuthRoutes(options: OAuthRouteOptions) {
  const { services, auth, stateTtl = DEFAULT_OAUTH_STATE_TTL } = options;
  const router = new Hono<BridgeEnv>();

  // GET /oauth/url
  router.get(
    '/url',
    auth,
    zValidator('query', urlQuerySchema, throwOnInvalid),
    async (c) => {
      const { region } = c.req.valid('query');
      const seq = String(Date.now());
      const state = await signStateToken(services.identity.appSecret, { seq, region }, stateTtl);

      const authorization = buildAuthorizationUrl({
        identity: services.identity,
        redirectUrl: services.redirectUrl,
        state,
        region,
        timestamp: Number(seq),
      });

      const body: AuthorizationUrlResponse = {
        url: authorization.url,
        seq: authorization.seq,
        expiresIn: stateTtl,
      };
      return c.json(body);
    }
  );

  // GET /oauth/callback?code&state
  router.get(
    '/callback',
    zValidator('query', callbackQuerySchema, throwOnInvalid),
    async (c) => {
      const { code, state } = c.req.valid('query');
      const verified = await verifyStateToken(services.identity.appSecret, state);

      if (verified.region) {
        services.resolver.prefer(verified.region);
      }

      services.codes.deliver({ code, obtainedAt: new Date() });
      const tokenSet = await services.acquisition.acquire();

      c.get('logger').info('authorization completed', { region: tokenSet.region.id });

      const body: CallbackResponse = {
        authenticated: true,
        region: tokenSet.region.id,
      };
      if (tokenSet.expiresAt) {
        body.expiresAt = tokenSet.expiresAt.toISOString();
      }
      return c.json(body);
    }
  );

  return router;
}
