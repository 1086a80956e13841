/**
 * Bridge Error Codes
 */

// Credential acquisition errors
export const ERROR_SIGNATURE_REJECTED = 'signature_rejected' as const;
export const ERROR_CODE_EXPIRED_OR_INVALID = 'code_expired_or_invalid' as const;
export const ERROR_REGIONS_EXHAUSTED = 'regions_exhausted' as const;
export const ERROR_UNAUTHENTICATED = 'unauthenticated' as const;
export const ERROR_TOKEN_EXPIRED = 'token_expired' as const;
export const ERROR_REGION_MISMATCH = 'region_mismatch' as const;

// Transport errors
export const ERROR_NETWORK_UNAVAILABLE = 'network_unavailable' as const;
export const ERROR_MALFORMED_RESPONSE = 'malformed_response' as const;

// Device command errors
export const ERROR_DEVICE_COMMAND_REJECTED = 'device_command_rejected' as const;
export const ERROR_SEQUENCE_ABORTED = 'sequence_aborted' as const;
export const ERROR_SEQUENCE_CANCELLED = 'sequence_cancelled' as const;

// Bridge API errors
export const ERROR_INVALID_REQUEST = 'invalid_request' as const;
export const ERROR_UNAUTHORIZED = 'unauthorized' as const;
export const ERROR_FORBIDDEN = 'forbidden' as const;
export const ERROR_RATE_LIMITED = 'rate_limited' as const;
export const ERROR_CONFIGURATION = 'configuration_error' as const;
export const ERROR_SERVER_ERROR = 'server_error' as const;

/**
 * All bridge error codes
 */
export type BridgeErrorCode =
  | typeof ERROR_SIGNATURE_REJECTED
  | typeof ERROR_CODE_EXPIRED_OR_INVALID
  | typeof ERROR_REGIONS_EXHAUSTED
  | typeof ERROR_UNAUTHENTICATED
  | typeof ERROR_TOKEN_EXPIRED
  | typeof ERROR_REGION_MISMATCH
  | typeof ERROR_NETWORK_UNAVAILABLE
  | typeof ERROR_MALFORMED_RESPONSE
  | typeof ERROR_DEVICE_COMMAND_REJECTED
  | typeof ERROR_SEQUENCE_ABORTED
  | typeof ERROR_SEQUENCE_CANCELLED
  | typeof ERROR_INVALID_REQUEST
  | typeof ERROR_UNAUTHORIZED
  | typeof ERROR_FORBIDDEN
  | typeof ERROR_RATE_LIMITED
  | typeof ERROR_CONFIGURATION
  | typeof ERROR_SERVER_ERROR;

/**
 * HTTP status codes for bridge errors
 */
export type BridgeErrorStatus = 400 | 401 | 403 | 409 | 429 | 500 | 502 | 503 | 504;

export const ERROR_STATUS_CODES: Record<BridgeErrorCode, BridgeErrorStatus> = {
  [ERROR_SIGNATURE_REJECTED]: 502,
  [ERROR_CODE_EXPIRED_OR_INVALID]: 400,
  [ERROR_REGIONS_EXHAUSTED]: 502,
  [ERROR_UNAUTHENTICATED]: 401,
  [ERROR_TOKEN_EXPIRED]: 401,
  [ERROR_REGION_MISMATCH]: 409,
  [ERROR_NETWORK_UNAVAILABLE]: 504,
  [ERROR_MALFORMED_RESPONSE]: 502,
  [ERROR_DEVICE_COMMAND_REJECTED]: 502,
  [ERROR_SEQUENCE_ABORTED]: 502,
  [ERROR_SEQUENCE_CANCELLED]: 409,
  [ERROR_INVALID_REQUEST]: 400,
  [ERROR_UNAUTHORIZED]: 401,
  [ERROR_FORBIDDEN]: 403,
  [ERROR_RATE_LIMITED]: 429,
  [ERROR_CONFIGURATION]: 503,
  [ERROR_SERVER_ERROR]: 500,
};

/**
 * Default error descriptions
 */
export const ERROR_DESCRIPTIONS: Record<BridgeErrorCode, string> = {
  [ERROR_SIGNATURE_REJECTED]:
    'The provider rejected every signature method; the same authorization code may be retried.',
  [ERROR_CODE_EXPIRED_OR_INVALID]:
    'The authorization code is exhausted; obtain a fresh code from the hosted login page.',
  [ERROR_REGIONS_EXHAUSTED]: 'No regional endpoint accepted the request.',
  [ERROR_UNAUTHENTICATED]: 'No access token is available; complete the authorization flow first.',
  [ERROR_TOKEN_EXPIRED]: 'The access token has expired and could not be refreshed.',
  [ERROR_REGION_MISMATCH]: 'The access token was issued by a different region than the one targeted.',
  [ERROR_NETWORK_UNAVAILABLE]: 'The provider could not be reached before the timeout.',
  [ERROR_MALFORMED_RESPONSE]: 'The provider returned a response that could not be understood.',
  [ERROR_DEVICE_COMMAND_REJECTED]: 'The provider rejected the device command.',
  [ERROR_SEQUENCE_ABORTED]: 'A step of the command sequence failed; the remaining steps were not sent.',
  [ERROR_SEQUENCE_CANCELLED]: 'The command sequence was cancelled before completion.',
  [ERROR_INVALID_REQUEST]: 'The request is missing a required parameter or is otherwise malformed.',
  [ERROR_UNAUTHORIZED]: 'API key required.',
  [ERROR_FORBIDDEN]: 'Invalid API key.',
  [ERROR_RATE_LIMITED]: 'Too many requests.',
  [ERROR_CONFIGURATION]: 'The bridge is missing required configuration.',
  [ERROR_SERVER_ERROR]: 'The bridge encountered an unexpected condition.',
};
