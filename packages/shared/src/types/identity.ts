/**
 * Application credentials issued by the provider's developer console
 */
export interface AppIdentity {
  appId: string;
  appSecret: string;
}

/**
 * Authorization code captured from the hosted login redirect
 * Single-use and short-lived
 */
export interface AuthorizationCode {
  code: string;
  obtainedAt: Date;
}
