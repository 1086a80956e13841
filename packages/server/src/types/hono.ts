import type { Logger } from '../logging/logger.js';

/**
 * Hono context variables set by the bridge middleware
 */
export interface BridgeVariables {
  requestId: string;
  logger: Logger;
  // Fingerprint of the API key the caller presented, once authenticated
  caller?: string;
}

export type BridgeEnv = { Variables: BridgeVariables };
