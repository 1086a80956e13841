import { z } from 'zod';
import type { ProviderUser, RegionEndpoint, TokenSet } from '@ewelink-bridge/shared';
import type { JsonValue } from '../crypto/signature.js';
import { BridgeError } from '../errors/bridge-error.js';

/**
 * A provider token grant
 * The acquisition protocol signs `payload` and POSTs it to `path`
 */
export interface GrantRequest {
  name: 'authorization_code' | 'password' | 'refresh_token';
  path: string;
  payload: JsonValue;
  // Error surfaced when the provider rejects the grant outright
  rejected(providerCode: number, providerMessage: string | undefined): BridgeError;
}

const userSchema = z.object({
  apikey: z.string().optional(),
  userId: z.string().optional(),
  email: z.string().optional(),
  phoneNumber: z.string().optional(),
  countryCode: z.string().optional(),
  nickname: z.string().optional(),
});

// The oauth endpoint names tokens accessToken/refreshToken, login and refresh use at/rt
const tokenDataSchema = z.object({
  accessToken: z.string().optional(),
  refreshToken: z.string().optional(),
  at: z.string().optional(),
  rt: z.string().optional(),
  atExpiredTime: z.number().optional(),
  rtExpiredTime: z.number().optional(),
  user: userSchema.optional(),
});

export interface TokenParseContext {
  region: RegionEndpoint;
  obtainedAt: Date;
  // Seconds; used when the provider sends no expiry
  accessTokenTtl: number;
}

/**
 * Build a token set from the `data` member of a successful envelope
 */
export function parseTokenData(data: unknown, context: TokenParseContext): TokenSet {
  const parsed = tokenDataSchema.safeParse(data);
  if (!parsed.success) {
    throw BridgeError.malformedResponse(`Unexpected token payload from region ${context.region.id}`);
  }

  const accessToken = parsed.data.accessToken ?? parsed.data.at;
  if (!accessToken) {
    throw BridgeError.malformedResponse(`Region ${context.region.id} returned no access token`);
  }

  const tokenSet: TokenSet = {
    accessToken,
    obtainedAt: context.obtainedAt,
    expiresAt: parsed.data.atExpiredTime
      ? new Date(parsed.data.atExpiredTime)
      : new Date(context.obtainedAt.getTime() + context.accessTokenTtl * 1000),
    region: context.region,
  };

  const refreshToken = parsed.data.refreshToken ?? parsed.data.rt;
  if (refreshToken) {
    tokenSet.refreshToken = refreshToken;
  }
  if (parsed.data.rtExpiredTime) {
    tokenSet.refreshExpiresAt = new Date(parsed.data.rtExpiredTime);
  }
  if (parsed.data.user) {
    tokenSet.user = toProviderUser(parsed.data.user);
  }

  return tokenSet;
}

function toProviderUser(user: z.infer<typeof userSchema>): ProviderUser {
  const result: ProviderUser = {};
  const userId = user.userId ?? user.apikey;
  if (userId) result.userId = userId;
  if (user.email) result.email = user.email;
  if (user.phoneNumber) result.phoneNumber = user.phoneNumber;
  if (user.countryCode) result.countryCode = user.countryCode;
  if (user.nickname) result.nickname = user.nickname;
  return result;
}
