import type { RegionEndpoint, RegionId } from '@ewelink-bridge/shared';

/**
 * Provider constants
 */

// Regional API clusters, in default probing order
export const REGION_ENDPOINTS: Readonly<Record<RegionId, RegionEndpoint>> = {
  us: { id: 'us', baseUrl: 'https://us-apia.coolkit.cc' },
  eu: { id: 'eu', baseUrl: 'https://eu-apia.coolkit.cc' },
  as: { id: 'as', baseUrl: 'https://as-apia.coolkit.cc' },
  cn: { id: 'cn', baseUrl: 'https://cn-apia.coolkit.cn' },
};

export const REGION_IDS = ['us', 'eu', 'as', 'cn'] as const satisfies readonly RegionId[];

// Hosted login page that redirects back with ?code=...
export const OAUTH_PAGE_URL = 'https://c2ccdn.coolkit.cc/oauth/index.html';

// API paths
export const PATH_OAUTH_TOKEN = '/v2/user/oauth/token';
export const PATH_USER_LOGIN = '/v2/user/login';
export const PATH_USER_REFRESH = '/v2/user/refresh';
export const PATH_DEVICE_LIST = '/v2/device/thing';
export const PATH_DEVICE_STATUS = '/v2/device/thing/status';

// Grant types
export const GRANT_TYPE_AUTHORIZATION_CODE = 'authorization_code' as const;
export const GRANT_TYPE_REFRESH_TOKEN = 'refresh_token' as const;

// Device command target type ("thing" = single device)
export const THING_TYPE_DEVICE = 1;

// Provider envelope codes
export const ENVELOPE_OK = 0;
export const ENVELOPE_TOKEN_INVALID = 401;
export const ENVELOPE_TOKEN_EXPIRED = 402;
export const ENVELOPE_WRONG_REGION = 10004;

export const TOKEN_EXPIRED_CODES: readonly number[] = [ENVELOPE_TOKEN_INVALID, ENVELOPE_TOKEN_EXPIRED];
export const REGION_REDIRECT_CODES: readonly number[] = [ENVELOPE_WRONG_REGION];

// Provider message that identifies a signature-method problem
export const SIGN_VERIFICATION_FAILED = 'sign verification failed';

// HTTP headers
export const HEADER_APPID = 'X-CK-Appid';
export const HEADER_NONCE = 'X-CK-Nonce';
export const HEADER_SEQ = 'X-CK-Seq';
export const HEADER_AUTHORIZATION = 'Authorization';
export const HEADER_CONTENT_TYPE = 'Content-Type';
export const HEADER_API_KEY = 'x-api-key';

export const CONTENT_TYPE_JSON = 'application/json';

// Authorization header schemes
export const AUTH_SCHEME_SIGN = 'Sign';
export const AUTH_SCHEME_BEARER = 'Bearer';

// Nonce length used by the hosted login page and the API
export const NONCE_LENGTH = 8;
export const NONCE_CHARSET = 'abcdefghijklmnopqrstuvwxyz0123456789';

// Default timings
export const DEFAULT_HTTP_TIMEOUT_MS = 15000; // 15 seconds
export const MIN_HTTP_TIMEOUT_MS = 1000;
export const MAX_HTTP_TIMEOUT_MS = 60000;
export const DEFAULT_AUTH_CODE_MAX_AGE_MS = 600000; // 10 minutes
export const DEFAULT_ACCESS_TOKEN_TTL = 2592000; // 30 days, in seconds
export const DEFAULT_OAUTH_STATE_TTL = 600; // 10 minutes, in seconds

// Scripted sequences
export const DEFAULT_BLINK_CYCLES = 3;
export const DEFAULT_BLINK_STEP_DELAY_MS = 1000;
export const MAX_BLINK_CYCLES = 10;
export const MAX_BLINK_STEP_DELAY_MS = 10000;

// Command retry defaults (no in-place retry)
export const DEFAULT_COMMAND_MAX_ATTEMPTS = 1;
export const DEFAULT_COMMAND_RETRY_DELAY_MS = 500;

// Device listing page size
export const DEVICE_LIST_PAGE_SIZE = 30;

// Rate limiting defaults for the bridge API
export const DEFAULT_RATE_LIMIT_WINDOW_MS = 60000; // 1 minute
export const DEFAULT_RATE_LIMIT_MAX_REQUESTS = 30;

// Local defaults
export const DEFAULT_REDIRECT_URL = 'http://localhost:3000/oauth/callback';
export const DEFAULT_CREDENTIALS_FILE = './data/credentials.json';
