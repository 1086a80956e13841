import type { AppIdentity } from '@ewelink-bridge/shared';
import type { GrantRequest } from '../token-response.js';
import { BridgeError } from '../../errors/bridge-error.js';
import { GRANT_TYPE_REFRESH_TOKEN, PATH_USER_REFRESH } from '../../config/constants.js';

/**
 * Exchange a refresh token for a new token pair
 * A rejection means the user has to authorize again
 */
export function createRefreshTokenGrant(identity: AppIdentity, refreshToken: string): GrantRequest {
  return {
    name: GRANT_TYPE_REFRESH_TOKEN,
    path: PATH_USER_REFRESH,
    payload: {
      clientId: identity.appId,
      clientSecret: identity.appSecret,
      grantType: GRANT_TYPE_REFRESH_TOKEN,
      refreshToken,
    },
    rejected: (providerCode, providerMessage) =>
      BridgeError.tokenExpired(
        `Refresh rejected, reauthorization required: ${providerMessage ?? `provider error ${providerCode}`}`,
        { providerCode, providerMessage }
      ),
  };
}
