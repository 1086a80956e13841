import { readFileSync, existsSync } from 'node:fs';
import { z } from 'zod';
import type { RegionId } from '@ewelink-bridge/shared';
import * as constants from './constants.js';

/**
 * Read a secret from file (Docker secrets) or environment variable
 * Supports both `VAR_FILE` (path to file) and `VAR` (direct value) patterns
 */
function readSecret(env: NodeJS.ProcessEnv, envVar: string): string | undefined {
  const filePath = env[`${envVar}_FILE`];

  if (filePath && existsSync(filePath)) {
    try {
      return readFileSync(filePath, 'utf-8').trim();
    } catch {
      console.warn(`Warning: Could not read secret from ${filePath}`);
    }
  }

  return env[envVar];
}

// Empty strings in the environment mean "unset"
const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

const intFrom = (fallback: number) =>
  z
    .string()
    .optional()
    .transform((value) => (value === undefined || value === '' ? fallback : Number(value)))
    .pipe(z.number().int());

const regionList = z
  .string()
  .optional()
  .transform((value) =>
    (value ?? constants.REGION_IDS.join(','))
      .split(',')
      .map((part) => part.trim().toLowerCase())
      .filter((part) => part.length > 0)
  )
  .pipe(z.array(z.enum(constants.REGION_IDS)).min(1, 'EWELINK_REGIONS must name at least one region'))
  .transform((ids) => [...new Set(ids)]);

const envSchema = z.object({
  PORT: intFrom(3000).pipe(z.number().min(1).max(65535)),
  HOST: z.string().default('0.0.0.0'),
  NODE_ENV: z.string().default('development'),
  CORS_ENABLED: z
    .enum(['true', 'false'])
    .default('false')
    .transform((value) => value === 'true'),
  EWELINK_APP_ID: optionalString,
  EWELINK_APP_SECRET: optionalString,
  EWELINK_REDIRECT_URL: z.string().url().default(constants.DEFAULT_REDIRECT_URL),
  EWELINK_REGIONS: regionList,
  EWELINK_EMAIL: optionalString,
  EWELINK_PHONE: optionalString,
  EWELINK_PASSWORD: optionalString,
  EWELINK_COUNTRY_CODE: optionalString,
  EWELINK_AUTH_CODE: optionalString,
  DEFAULT_DEVICE_ID: optionalString,
  CREDENTIALS_FILE: z.string().default(constants.DEFAULT_CREDENTIALS_FILE),
  ENCRYPTION_KEY: optionalString,
  API_KEY: optionalString,
  HTTP_TIMEOUT_MS: intFrom(constants.DEFAULT_HTTP_TIMEOUT_MS).pipe(
    z.number().min(constants.MIN_HTTP_TIMEOUT_MS).max(constants.MAX_HTTP_TIMEOUT_MS)
  ),
  BLINK_STEP_DELAY_MS: intFrom(constants.DEFAULT_BLINK_STEP_DELAY_MS).pipe(
    z.number().min(0).max(constants.MAX_BLINK_STEP_DELAY_MS)
  ),
  BLINK_CYCLES: intFrom(constants.DEFAULT_BLINK_CYCLES).pipe(
    z.number().min(1).max(constants.MAX_BLINK_CYCLES)
  ),
  COMMAND_MAX_ATTEMPTS: intFrom(constants.DEFAULT_COMMAND_MAX_ATTEMPTS).pipe(z.number().min(1).max(5)),
  COMMAND_RETRY_DELAY_MS: intFrom(constants.DEFAULT_COMMAND_RETRY_DELAY_MS).pipe(z.number().min(0)),
  AUTH_CODE_MAX_AGE_MS: intFrom(constants.DEFAULT_AUTH_CODE_MAX_AGE_MS).pipe(z.number().positive()),
  ACCESS_TOKEN_TTL_SECONDS: intFrom(constants.DEFAULT_ACCESS_TOKEN_TTL).pipe(z.number().positive()),
  RATE_LIMIT_WINDOW_MS: intFrom(constants.DEFAULT_RATE_LIMIT_WINDOW_MS).pipe(z.number().positive()),
  RATE_LIMIT_MAX_REQUESTS: intFrom(constants.DEFAULT_RATE_LIMIT_MAX_REQUESTS).pipe(z.number().positive()),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

/**
 * Application configuration loaded from environment
 */
export interface Config {
  server: {
    port: number;
    host: string;
    nodeEnv: string;
    enableCors: boolean;
  };
  ewelink: {
    appId: string | undefined;
    appSecret: string | undefined;
    redirectUrl: string;
    regions: RegionId[];
    email: string | undefined;
    phoneNumber: string | undefined;
    password: string | undefined;
    countryCode: string | undefined;
    authCode: string | undefined;
    defaultDeviceId: string | undefined;
  };
  storage: {
    credentialsFile: string | undefined;
    encryptionKey: string | undefined;
  };
  security: {
    apiKey: string | undefined;
  };
  http: {
    timeoutMs: number;
  };
  commands: {
    maxAttempts: number;
    retryDelayMs: number;
    blinkCycles: number;
    blinkStepDelayMs: number;
  };
  tokens: {
    authCodeMaxAgeMs: number;
    accessTokenTtl: number;
  };
  logging: {
    level: 'debug' | 'info' | 'warn' | 'error';
  };
  rateLimit: {
    windowMs: number;
    maxRequests: number;
  };
}

/**
 * Load configuration from environment variables
 * Throws a ZodError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.parse({
    ...env,
    EWELINK_APP_SECRET: readSecret(env, 'EWELINK_APP_SECRET'),
    EWELINK_PASSWORD: readSecret(env, 'EWELINK_PASSWORD'),
    ENCRYPTION_KEY: readSecret(env, 'ENCRYPTION_KEY'),
    API_KEY: readSecret(env, 'API_KEY'),
  });

  return {
    server: {
      port: parsed.PORT,
      host: parsed.HOST,
      nodeEnv: parsed.NODE_ENV,
      enableCors: parsed.CORS_ENABLED,
    },
    ewelink: {
      appId: parsed.EWELINK_APP_ID,
      appSecret: parsed.EWELINK_APP_SECRET,
      redirectUrl: parsed.EWELINK_REDIRECT_URL,
      regions: parsed.EWELINK_REGIONS,
      email: parsed.EWELINK_EMAIL,
      phoneNumber: parsed.EWELINK_PHONE,
      password: parsed.EWELINK_PASSWORD,
      countryCode: parsed.EWELINK_COUNTRY_CODE,
      authCode: parsed.EWELINK_AUTH_CODE,
      defaultDeviceId: parsed.DEFAULT_DEVICE_ID,
    },
    storage: {
      credentialsFile: parsed.CREDENTIALS_FILE.trim() === '' ? undefined : parsed.CREDENTIALS_FILE,
      encryptionKey: parsed.ENCRYPTION_KEY,
    },
    security: {
      apiKey: parsed.API_KEY,
    },
    http: {
      timeoutMs: parsed.HTTP_TIMEOUT_MS,
    },
    commands: {
      maxAttempts: parsed.COMMAND_MAX_ATTEMPTS,
      retryDelayMs: parsed.COMMAND_RETRY_DELAY_MS,
      blinkCycles: parsed.BLINK_CYCLES,
      blinkStepDelayMs: parsed.BLINK_STEP_DELAY_MS,
    },
    tokens: {
      authCodeMaxAgeMs: parsed.AUTH_CODE_MAX_AGE_MS,
      accessTokenTtl: parsed.ACCESS_TOKEN_TTL_SECONDS,
    },
    logging: {
      level: parsed.LOG_LEVEL,
    },
    rateLimit: {
      windowMs: parsed.RATE_LIMIT_WINDOW_MS,
      maxRequests: parsed.RATE_LIMIT_MAX_REQUESTS,
    },
  };
}

// Singleton config instance
let config: Config | null = null;

/**
 * Get the current configuration (loads if not already loaded)
 */
export function getConfig(): Config {
  if (!config) {
    config = loadConfig();
  }
  return config;
}

/**
 * Reset configuration (useful for testing)
 */
export function resetConfig(): void {
  config = null;
}

// Re-export constants
export { constants };
