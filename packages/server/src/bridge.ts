import type { AppIdentity } from '@ewelink-bridge/shared';
import type { Config } from './config/index.js';
import type { FetchLike } from './provider/http-client.js';
import type { ICredentialStorage } from './storage/interfaces/index.js';
import type { Logger } from './logging/logger.js';
import type { SignatureStrategy } from './provider/signature-strategies.js';
import { ProviderHttpClient } from './provider/http-client.js';
import { RegionEndpointResolver } from './provider/region-resolver.js';
import { createRetryPolicy } from './provider/retry-policy.js';
import { createCredentialStorage } from './storage/index.js';
import { CredentialStore } from './services/credential-store.js';
import { QueuedCodeProvider } from './services/code-provider.js';
import { TokenAcquisitionProtocol } from './services/token-acquisition.js';
import { DeviceCommandDispatcher } from './services/device-dispatcher.js';
import { BridgeError } from './errors/bridge-error.js';
import { silentLogger } from './logging/logger.js';

/**
 * Everything the HTTP surface and the startup sequence need
 */
export interface BridgeServices {
  identity: AppIdentity;
  redirectUrl: string;
  credentialStore: CredentialStore;
  resolver: RegionEndpointResolver;
  codes: QueuedCodeProvider;
  acquisition: TokenAcquisitionProtocol;
  dispatcher: DeviceCommandDispatcher;
}

export interface BridgeServicesOverrides {
  fetch?: FetchLike;
  storage?: ICredentialStorage;
  strategies?: readonly SignatureStrategy[];
  logger?: Logger;
  clock?: () => Date;
}

/**
 * Wire the core services from configuration
 */
export function createBridgeServices(config: Config, overrides: BridgeServicesOverrides = {}): BridgeServices {
  const { appId, appSecret } = config.ewelink;
  if (!appId || !appSecret) {
    throw BridgeError.configuration('EWELINK_APP_ID and EWELINK_APP_SECRET are required');
  }

  const identity: AppIdentity = { appId, appSecret };
  const logger = overrides.logger ?? silentLogger;

  const storage =
    overrides.storage ??
    createCredentialStorage({
      credentialsFile: config.storage.credentialsFile,
      encryptionKey: config.storage.encryptionKey,
    });

  const http = new ProviderHttpClient({
    fetch: overrides.fetch,
    timeoutMs: config.http.timeoutMs,
    logger: logger.child({ component: 'provider' }),
  });

  const retryPolicy = createRetryPolicy({
    maxAttempts: config.commands.maxAttempts,
    initialDelayMs: config.commands.retryDelayMs,
  });

  const credentialStore = new CredentialStore({
    identity,
    storage,
    logger: logger.child({ component: 'credentials' }),
    clock: overrides.clock,
  });

  const resolver = new RegionEndpointResolver(config.ewelink.regions, {
    logger: logger.child({ component: 'regions' }),
  });

  const codes = new QueuedCodeProvider();

  const acquisition = new TokenAcquisitionProtocol({
    identity,
    redirectUrl: config.ewelink.redirectUrl,
    credentialStore,
    resolver,
    http,
    strategies: overrides.strategies,
    codeProvider: codes,
    retryPolicy,
    authCodeMaxAgeMs: config.tokens.authCodeMaxAgeMs,
    accessTokenTtl: config.tokens.accessTokenTtl,
    clock: overrides.clock,
    logger: logger.child({ component: 'acquisition' }),
  });

  const dispatcher = new DeviceCommandDispatcher({
    tokens: credentialStore,
    http,
    refresher: acquisition,
    retryPolicy,
    clock: overrides.clock,
    logger: logger.child({ component: 'dispatcher' }),
  });

  return {
    identity,
    redirectUrl: config.ewelink.redirectUrl,
    credentialStore,
    resolver,
    codes,
    acquisition,
    dispatcher,
  };
}

/**
 * Restore stored credentials, then authenticate with whatever the
 * configuration offers when nothing usable is stored
 *
 * Returns true when a token is available afterwards.
 */
export async function bootstrapCredentials(
  services: BridgeServices,
  config: Config,
  logger: Logger = silentLogger
): Promise<boolean> {
  const state = await services.acquisition.initialize();
  if (state === 'token_acquired') {
    logger.info('using stored credentials');
    return true;
  }

  const { authCode, email, phoneNumber, password, countryCode } = config.ewelink;

  if (authCode) {
    services.codes.deliver({ code: authCode, obtainedAt: new Date() });
    await services.acquisition.acquire();
    return true;
  }

  if (password && (email || phoneNumber)) {
    await services.acquisition.loginWithPassword({ email, phoneNumber, password, countryCode });
    return true;
  }

  if (state === 'expired') {
    const stored = await services.credentialStore.load();
    if (stored?.refreshToken) {
      await services.acquisition.refresh(stored);
      return true;
    }
  }

  return false;
}
