import type { AppIdentity } from '@ewelink-bridge/shared';
import type { JsonValue } from '../crypto/signature.js';
import { identityTimestampMessage, signJson, signMessage, canonicalJson } from '../crypto/signature.js';
import {
  AUTH_SCHEME_SIGN,
  CONTENT_TYPE_JSON,
  HEADER_APPID,
  HEADER_AUTHORIZATION,
  HEADER_CONTENT_TYPE,
  HEADER_NONCE,
  HEADER_SEQ,
} from '../config/constants.js';

export type SignatureStrategyName = 'identity-timestamp' | 'body-signing' | 'unsigned';

export interface SignatureContext {
  identity: AppIdentity;
  payload: JsonValue;
  timestamp: number;
  nonce: string;
}

/**
 * Headers plus the exact body string to transmit
 */
export interface SignedRequest {
  headers: Record<string, string>;
  body: string;
}

/**
 * A way of authenticating an app-level request
 * Strategies are pure: the same context always yields the same request
 */
export interface SignatureStrategy {
  readonly name: SignatureStrategyName;
  sign(context: SignatureContext): SignedRequest;
}

function baseHeaders(identity: AppIdentity): Record<string, string> {
  return {
    [HEADER_CONTENT_TYPE]: CONTENT_TYPE_JSON,
    [HEADER_APPID]: identity.appId,
  };
}

/**
 * Signs `{appId}_{timestamp}` and sends the timestamp as X-CK-Seq
 */
export const identityTimestampStrategy: SignatureStrategy = {
  name: 'identity-timestamp',
  sign({ identity, payload, timestamp, nonce }) {
    const signature = signMessage(identity.appSecret, identityTimestampMessage(identity.appId, timestamp));
    return {
      headers: {
        ...baseHeaders(identity),
        [HEADER_NONCE]: nonce,
        [HEADER_SEQ]: String(timestamp),
        [HEADER_AUTHORIZATION]: `${AUTH_SCHEME_SIGN} ${signature}`,
      },
      body: canonicalJson(payload),
    };
  },
};

/**
 * Signs the canonical JSON body that is sent
 */
export const bodySigningStrategy: SignatureStrategy = {
  name: 'body-signing',
  sign({ identity, payload, nonce }) {
    const { body, signature } = signJson(identity.appSecret, payload);
    return {
      headers: {
        ...baseHeaders(identity),
        [HEADER_NONCE]: nonce,
        [HEADER_AUTHORIZATION]: `${AUTH_SCHEME_SIGN} ${signature}`,
      },
      body,
    };
  },
};

export const unsignedStrategy: SignatureStrategy = {
  name: 'unsigned',
  sign({ identity, payload }) {
    return {
      headers: baseHeaders(identity),
      body: canonicalJson(payload),
    };
  },
};

export const DEFAULT_SIGNATURE_STRATEGIES: readonly SignatureStrategy[] = [
  identityTimestampStrategy,
  bodySigningStrategy,
  unsignedStrategy,
];
