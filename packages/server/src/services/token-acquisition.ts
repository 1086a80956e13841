import type { AppIdentity, AuthorizationCode, RegionEndpoint, TokenSet } from '@ewelink-bridge/shared';
import type { CredentialStore } from './credential-store.js';
import type { AuthorizationCodeProvider } from './code-provider.js';
import type { ProviderHttpClient } from '../provider/http-client.js';
import type { RegionEndpointResolver } from '../provider/region-resolver.js';
import type { RetryPolicy } from '../provider/retry-policy.js';
import type { SignatureStrategy } from '../provider/signature-strategies.js';
import type { GrantRequest } from '../grants/token-response.js';
import type { PasswordCredentials } from '../grants/password/grant.js';
import type { AttemptFailure } from '../errors/bridge-error.js';
import type { Logger } from '../logging/logger.js';
import { snippet } from '../provider/http-client.js';
import { NO_RETRY, withRetry } from '../provider/retry-policy.js';
import { DEFAULT_SIGNATURE_STRATEGIES } from '../provider/signature-strategies.js';
import { parseTokenData } from '../grants/token-response.js';
import { createAuthorizationCodeGrant } from '../grants/authorization-code/grant.js';
import { createPasswordGrant } from '../grants/password/grant.js';
import { createRefreshTokenGrant } from '../grants/refresh-token/grant.js';
import { BridgeError, toBridgeError } from '../errors/bridge-error.js';
import {
  ERROR_CODE_EXPIRED_OR_INVALID,
  ERROR_MALFORMED_RESPONSE,
  ERROR_REGION_MISMATCH,
  ERROR_SIGNATURE_REJECTED,
} from '../errors/error-codes.js';
import { generateNonce } from '../crypto/random.js';
import { silentLogger } from '../logging/logger.js';
import {
  DEFAULT_ACCESS_TOKEN_TTL,
  DEFAULT_AUTH_CODE_MAX_AGE_MS,
  ENVELOPE_OK,
  REGION_REDIRECT_CODES,
  SIGN_VERIFICATION_FAILED,
} from '../config/constants.js';

export type AcquisitionState = 'unauthenticated' | 'code_obtained' | 'token_acquired' | 'expired' | 'failed';

export interface TokenAcquisitionOptions {
  identity: AppIdentity;
  redirectUrl: string;
  credentialStore: CredentialStore;
  resolver: RegionEndpointResolver;
  http: ProviderHttpClient;
  strategies?: readonly SignatureStrategy[];
  codeProvider?: AuthorizationCodeProvider;
  retryPolicy?: RetryPolicy;
  authCodeMaxAgeMs?: number;
  // Seconds
  accessTokenTtl?: number;
  clock?: () => Date;
  nonce?: () => string;
  logger?: Logger;
}

/**
 * Obtains access tokens from the provider
 *
 * Each grant is tried with every signature strategy in order and, within a
 * strategy, against every candidate region. A provider rejection that is
 * neither a signature nor a region problem ends the acquisition at once.
 */
export class TokenAcquisitionProtocol {
  private readonly identity: AppIdentity;
  private readonly redirectUrl: string;
  private readonly credentialStore: CredentialStore;
  private readonly resolver: RegionEndpointResolver;
  private readonly http: ProviderHttpClient;
  private readonly strategies: readonly SignatureStrategy[];
  private readonly codeProvider: AuthorizationCodeProvider | undefined;
  private readonly retryPolicy: RetryPolicy;
  private readonly authCodeMaxAgeMs: number;
  private readonly accessTokenTtl: number;
  private readonly clock: () => Date;
  private readonly nonce: () => string;
  private readonly logger: Logger;

  // Codes that succeeded or were rejected; never sent again
  private readonly spentCodes = new Set<string>();
  // Provider rejections that end the region and strategy loops
  private readonly terminalErrors = new WeakSet<BridgeError>();
  private currentState: AcquisitionState = 'unauthenticated';

  constructor(options: TokenAcquisitionOptions) {
    this.identity = options.identity;
    this.redirectUrl = options.redirectUrl;
    this.credentialStore = options.credentialStore;
    this.resolver = options.resolver;
    this.http = options.http;
    this.strategies = options.strategies ?? DEFAULT_SIGNATURE_STRATEGIES;
    this.codeProvider = options.codeProvider;
    this.retryPolicy = options.retryPolicy ?? NO_RETRY;
    this.authCodeMaxAgeMs = options.authCodeMaxAgeMs ?? DEFAULT_AUTH_CODE_MAX_AGE_MS;
    this.accessTokenTtl = options.accessTokenTtl ?? DEFAULT_ACCESS_TOKEN_TTL;
    this.clock = options.clock ?? (() => new Date());
    this.nonce = options.nonce ?? (() => generateNonce());
    this.logger = options.logger ?? silentLogger;

    if (this.strategies.length === 0) {
      throw BridgeError.configuration('At least one signature strategy is required');
    }
  }

  get state(): AcquisitionState {
    return this.currentState;
  }

  /**
   * Restore state from the credential store and seed the region hint
   */
  async initialize(): Promise<AcquisitionState> {
    const hint = await this.credentialStore.lastGoodRegion();
    if (hint) {
      this.resolver.prefer(hint);
    }

    const tokenSet = await this.credentialStore.load();
    if (!tokenSet) {
      this.currentState = 'unauthenticated';
    } else if (tokenSet.expiresAt && tokenSet.expiresAt.getTime() <= this.clock().getTime()) {
      this.currentState = 'expired';
    } else {
      this.currentState = 'token_acquired';
    }
    return this.currentState;
  }

  /**
   * Ask the code provider for a code, then exchange it
   */
  async acquire(signal?: AbortSignal): Promise<TokenSet> {
    if (!this.codeProvider) {
      throw BridgeError.configuration('No authorization code provider is configured');
    }
    const code = await this.codeProvider.getCode(signal);
    return this.exchangeCode(code);
  }

  /**
   * Exchange an authorization code for a token set
   * A bare string is taken as obtained now
   */
  async exchangeCode(input: string | AuthorizationCode): Promise<TokenSet> {
    const code: AuthorizationCode =
      typeof input === 'string' ? { code: input, obtainedAt: this.clock() } : input;

    if (!code.code) {
      throw BridgeError.invalidRequest('Missing authorization code');
    }

    if (this.spentCodes.has(code.code)) {
      this.currentState = 'failed';
      throw BridgeError.codeExhausted('Authorization code has already been used');
    }

    const age = this.clock().getTime() - code.obtainedAt.getTime();
    if (age > this.authCodeMaxAgeMs) {
      this.spentCodes.add(code.code);
      this.currentState = 'failed';
      throw BridgeError.codeExhausted(
        `Authorization code is ${Math.round(age / 1000)}s old; codes are valid for ${Math.round(this.authCodeMaxAgeMs / 1000)}s`
      );
    }

    this.currentState = 'code_obtained';
    const grant = createAuthorizationCodeGrant({
      identity: this.identity,
      code: code.code,
      redirectUrl: this.redirectUrl,
    });

    try {
      const tokenSet = await this.runGrant(grant, 'any');
      this.spentCodes.add(code.code);
      return tokenSet;
    } catch (err) {
      const error = toBridgeError(err);
      if (error.code === ERROR_CODE_EXPIRED_OR_INVALID) {
        this.spentCodes.add(code.code);
      }
      throw error;
    }
  }

  async loginWithPassword(credentials: PasswordCredentials): Promise<TokenSet> {
    const grant = createPasswordGrant(this.identity, credentials);
    return this.runGrant(grant, 'any');
  }

  /**
   * Refresh the stored token on its own region
   *
   * `stale` is the token the caller found expired; when the store already
   * holds a different one, another caller refreshed first and that token is
   * returned instead.
   */
  async refresh(stale?: TokenSet): Promise<TokenSet> {
    return this.credentialStore.exclusive(async (tx) => {
      const current = await tx.read();
      if (!current) {
        this.currentState = 'unauthenticated';
        throw BridgeError.unauthenticated();
      }
      if (stale && current.accessToken !== stale.accessToken) {
        return current;
      }
      if (!current.refreshToken) {
        this.currentState = 'failed';
        throw BridgeError.tokenExpired('Access token expired and no refresh token is available');
      }
      if (current.refreshExpiresAt && current.refreshExpiresAt.getTime() <= this.clock().getTime()) {
        this.currentState = 'failed';
        throw BridgeError.tokenExpired('Refresh token has expired; reauthorization required');
      }

      this.currentState = 'expired';
      const grant = createRefreshTokenGrant(this.identity, current.refreshToken);
      return this.runGrant(grant, current.region, (tokenSet) => {
        // The refresh response may omit account details
        if (!tokenSet.user && current.user) {
          tokenSet.user = current.user;
        }
        return tx.write(tokenSet);
      });
    });
  }

  private async runGrant(
    grant: GrantRequest,
    regions: 'any' | RegionEndpoint,
    persist: (tokenSet: TokenSet) => Promise<boolean> = (tokenSet) => this.credentialStore.save(tokenSet)
  ): Promise<TokenSet> {
    const attempts: AttemptFailure[] = [];

    for (const strategy of this.strategies) {
      const attempt = async (region: RegionEndpoint): Promise<TokenSet> => {
        try {
          return await withRetry(this.retryPolicy, () => this.post(grant, strategy, region));
        } catch (err) {
          const error = toBridgeError(err);
          const failure: AttemptFailure = {
            region: region.id,
            strategy: strategy.name,
            code: error.code,
            message: error.message,
          };
          if (error.providerCode !== undefined) {
            failure.providerCode = error.providerCode;
          }
          attempts.push(failure);
          throw error;
        }
      };

      let tokenSet: TokenSet;
      try {
        tokenSet =
          regions === 'any'
            ? (
                await this.resolver.tryEachRegion(attempt, {
                  strategy: strategy.name,
                  shouldAbort: (error) => this.terminalErrors.has(error),
                })
              ).result
            : await attempt(regions);
      } catch (err) {
        const error = toBridgeError(err);
        if (this.terminalErrors.has(error)) {
          this.currentState = 'failed';
          this.logger.warn('grant rejected', { grant: grant.name, error: error.code });
          throw new BridgeError(error.code, error.description, {
            providerCode: error.providerCode,
            providerMessage: error.providerMessage,
            attempts,
          });
        }
        this.logger.debug('signature strategy exhausted', { grant: grant.name, strategy: strategy.name });
        continue;
      }

      if (!(await persist(tokenSet))) {
        // A newer token was stored meanwhile; hand that one out
        tokenSet = await this.credentialStore.current();
      }
      this.resolver.prefer(tokenSet.region.id);
      this.currentState = 'token_acquired';
      this.logger.info('token acquired', {
        grant: grant.name,
        region: tokenSet.region.id,
        strategy: strategy.name,
        attempts: attempts.length + 1,
      });
      return tokenSet;
    }

    this.currentState = 'failed';
    this.logger.warn('token acquisition failed', { grant: grant.name, attempts: attempts.length });

    if (attempts.some((failure) => failure.code === ERROR_SIGNATURE_REJECTED)) {
      throw BridgeError.signatureRejected(attempts);
    }
    throw BridgeError.regionsExhausted(attempts);
  }

  private async post(
    grant: GrantRequest,
    strategy: SignatureStrategy,
    region: RegionEndpoint
  ): Promise<TokenSet> {
    const obtainedAt = this.clock();
    const signed = strategy.sign({
      identity: this.identity,
      payload: grant.payload,
      timestamp: obtainedAt.getTime(),
      nonce: this.nonce(),
    });

    const reply = await this.http.send({
      method: 'POST',
      url: `${region.baseUrl}${grant.path}`,
      headers: signed.headers,
      body: signed.body,
    });

    const envelope = reply.envelope;
    if (!envelope) {
      throw BridgeError.malformedResponse(
        `Region ${region.id} answered HTTP ${reply.status} with a non-JSON body: ${snippet(reply.text)}`
      );
    }

    const options = { providerCode: envelope.error, providerMessage: envelope.msg };

    if (envelope.msg?.toLowerCase().includes(SIGN_VERIFICATION_FAILED)) {
      throw new BridgeError(
        ERROR_SIGNATURE_REJECTED,
        `Region ${region.id} rejected the ${strategy.name} signature: ${envelope.msg}`,
        options
      );
    }

    // An HTTP error is a region failure whatever the envelope says
    if (!reply.ok) {
      throw new BridgeError(
        ERROR_MALFORMED_RESPONSE,
        `Region ${region.id} answered HTTP ${reply.status}: ${envelope.msg ?? `error ${envelope.error}`}`,
        options
      );
    }

    if (envelope.error === ENVELOPE_OK) {
      return parseTokenData(envelope.data, {
        region,
        obtainedAt,
        accessTokenTtl: this.accessTokenTtl,
      });
    }

    if (REGION_REDIRECT_CODES.includes(envelope.error)) {
      throw new BridgeError(
        ERROR_REGION_MISMATCH,
        `Account is not served by region ${region.id}: ${envelope.msg ?? envelope.error}`,
        options
      );
    }

    const rejection = grant.rejected(envelope.error, envelope.msg);
    this.terminalErrors.add(rejection);
    throw rejection;
  }
}
