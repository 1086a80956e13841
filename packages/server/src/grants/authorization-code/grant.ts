import type { AppIdentity } from '@ewelink-bridge/shared';
import type { GrantRequest } from '../token-response.js';
import { BridgeError } from '../../errors/bridge-error.js';
import { GRANT_TYPE_AUTHORIZATION_CODE, PATH_OAUTH_TOKEN } from '../../config/constants.js';

export interface AuthorizationCodeGrantOptions {
  identity: AppIdentity;
  code: string;
  redirectUrl: string;
}

/**
 * Exchange an authorization code captured from the hosted login redirect
 *
 * Any provider rejection other than a signature or region problem means
 * the code is spent.
 */
export function createAuthorizationCodeGrant(options: AuthorizationCodeGrantOptions): GrantRequest {
  const { identity, code, redirectUrl } = options;

  return {
    name: GRANT_TYPE_AUTHORIZATION_CODE,
    path: PATH_OAUTH_TOKEN,
    payload: {
      clientId: identity.appId,
      clientSecret: identity.appSecret,
      grantType: GRANT_TYPE_AUTHORIZATION_CODE,
      code,
      redirectUrl,
    },
    rejected: (providerCode, providerMessage) =>
      BridgeError.codeExhausted(
        `Authorization code exhausted: ${providerMessage ?? `provider error ${providerCode}`}`,
        { providerCode, providerMessage }
      ),
  };
}
