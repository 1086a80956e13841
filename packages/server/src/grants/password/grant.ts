import type { AppIdentity } from '@ewelink-bridge/shared';
import type { GrantRequest } from '../token-response.js';
import { BridgeError } from '../../errors/bridge-error.js';
import { ERROR_UNAUTHENTICATED } from '../../errors/error-codes.js';
import { PATH_USER_LOGIN } from '../../config/constants.js';

export interface PasswordCredentials {
  email?: string;
  phoneNumber?: string;
  password: string;
  countryCode?: string;
}

/**
 * Log in with account credentials
 */
export function createPasswordGrant(identity: AppIdentity, credentials: PasswordCredentials): GrantRequest {
  if (!credentials.email && !credentials.phoneNumber) {
    throw BridgeError.invalidRequest('Either email or phoneNumber is required');
  }
  if (!credentials.password) {
    throw BridgeError.invalidRequest('password is required');
  }

  return {
    name: 'password',
    path: PATH_USER_LOGIN,
    payload: {
      clientId: identity.appId,
      email: credentials.email,
      phoneNumber: credentials.phoneNumber,
      password: credentials.password,
      countryCode: credentials.countryCode ?? '+1',
    },
    rejected: (providerCode, providerMessage) =>
      new BridgeError(
        ERROR_UNAUTHENTICATED,
        `Login rejected: ${providerMessage ?? `provider error ${providerCode}`}`,
        { providerCode, providerMessage }
      ),
  };
}
