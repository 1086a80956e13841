import type { RegionEndpoint, RegionId } from './region.js';

/**
 * Account metadata returned alongside a token
 */
export interface ProviderUser {
  userId?: string;
  email?: string;
  phoneNumber?: string;
  countryCode?: string;
  nickname?: string;
}

/**
 * Access/refresh token pair bound to the region that issued it
 */
export interface TokenSet {
  accessToken: string;
  refreshToken?: string;
  obtainedAt: Date;
  expiresAt?: Date;
  refreshExpiresAt?: Date;
  region: RegionEndpoint;
  user?: ProviderUser;
}

/**
 * Persisted credential record (one per app id)
 * Dates are ISO-8601 strings
 */
export interface CredentialRecord {
  appId: string;
  accessToken: string;
  refreshToken?: string;
  obtainedAt: string;
  expiresAt?: string;
  refreshExpiresAt?: string;
  region: RegionId;
  user?: ProviderUser;
  lastGoodRegion?: RegionId;
  updatedAt: string;
}
