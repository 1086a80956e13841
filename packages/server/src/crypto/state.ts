import * as jose from 'jose';
import type { RegionId } from '@ewelink-bridge/shared';
import { BridgeError } from '../errors/bridge-error.js';
import { DEFAULT_OAUTH_STATE_TTL } from '../config/constants.js';
import { generateRandomBase64Url } from './random.js';

/**
 * Signed `state` parameter for the hosted login redirect, using jose (HS256)
 *
 * The callback accepts a code only when it comes back with a state the bridge
 * issued itself and that has not expired.
 */

const STATE_ISSUER = 'ewelink-bridge';
const STATE_AUDIENCE = 'oauth-callback';

export interface OAuthStatePayload {
  seq: string;
  region?: RegionId;
}

function stateKey(secret: string): Uint8Array {
  return new TextEncoder().encode(secret);
}

/**
 * Sign a state token bound to the login URL's `seq`
 */
export async function signStateToken(
  secret: string,
  payload: OAuthStatePayload,
  ttlSeconds: number = DEFAULT_OAUTH_STATE_TTL
): Promise<string> {
  const claims: jose.JWTPayload = { seq: payload.seq };
  if (payload.region) {
    claims['region'] = payload.region;
  }

  return new jose.SignJWT(claims)
    .setProtectedHeader({ alg: 'HS256', typ: 'JWT' })
    .setIssuer(STATE_ISSUER)
    .setAudience(STATE_AUDIENCE)
    .setJti(generateRandomBase64Url(12))
    .setIssuedAt()
    .setExpirationTime(`${ttlSeconds}s`)
    .sign(stateKey(secret));
}

/**
 * Verify a state token returned to the callback
 */
export async function verifyStateToken(secret: string, token: string): Promise<OAuthStatePayload> {
  let payload: jose.JWTPayload;
  try {
    ({ payload } = await jose.jwtVerify(token, stateKey(secret), {
      issuer: STATE_ISSUER,
      audience: STATE_AUDIENCE,
      clockTolerance: 5,
    }));
  } catch (err) {
    throw BridgeError.invalidRequest('Invalid or expired state parameter', {
      reason: err instanceof Error ? err.message : String(err),
    });
  }

  const seq = payload['seq'];
  const region = payload['region'];

  if (typeof seq !== 'string') {
    throw BridgeError.invalidRequest('State parameter is missing its sequence');
  }

  return {
    seq,
    region: isRegionId(region) ? region : undefined,
  };
}

function isRegionId(value: unknown): value is RegionId {
  return value === 'us' || value === 'eu' || value === 'as' || value === 'cn';
}
