import type { AppIdentity, RegionId } from '@ewelink-bridge/shared';
import { signMessage, identityTimestampMessage } from '../crypto/signature.js';
import { generateNonce } from '../crypto/random.js';
import { GRANT_TYPE_AUTHORIZATION_CODE, OAUTH_PAGE_URL } from '../config/constants.js';

export interface AuthorizationUrlOptions {
  identity: AppIdentity;
  redirectUrl: string;
  state: string;
  region?: RegionId;
  timestamp?: number;
  nonce?: string;
}

export interface AuthorizationUrl {
  url: string;
  seq: string;
}

/**
 * Build the hosted login page URL
 * The page redirects back to `redirectUrl` with `code` and `state`
 */
export function buildAuthorizationUrl(options: AuthorizationUrlOptions): AuthorizationUrl {
  const seq = String(options.timestamp ?? Date.now());
  const url = new URL(OAUTH_PAGE_URL);

  url.searchParams.set('clientId', options.identity.appId);
  url.searchParams.set('seq', seq);
  url.searchParams.set(
    'authorization',
    signMessage(options.identity.appSecret, identityTimestampMessage(options.identity.appId, seq))
  );
  url.searchParams.set('redirectUrl', options.redirectUrl);
  url.searchParams.set('grantType', GRANT_TYPE_AUTHORIZATION_CODE);
  url.searchParams.set('state', options.state);
  url.searchParams.set('nonce', options.nonce ?? generateNonce());
  url.searchParams.set('showQRCode', 'false');

  if (options.region) {
    url.searchParams.set('region', options.region);
  }

  return { url: url.toString(), seq };
}
