/**
 * Provider regional clusters
 * An account's data and tokens live in exactly one of them
 */
export type RegionId = 'us' | 'eu' | 'as' | 'cn';

export interface RegionEndpoint {
  id: RegionId;
  baseUrl: string;
}
