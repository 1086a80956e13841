import type { AppIdentity, CredentialRecord, RegionId, TokenSet } from '@ewelink-bridge/shared';
import type { ICredentialStorage } from '../storage/interfaces/credential-storage.js';
import { REGION_ENDPOINTS } from '../config/constants.js';
import { BridgeError } from '../errors/bridge-error.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';

/**
 * Read-modify-write view handed to `exclusive` sections
 */
export interface CredentialTransaction {
  read(): Promise<TokenSet | null>;
  // Returns false when the write was dropped as stale
  write(tokenSet: TokenSet): Promise<boolean>;
}

export interface CredentialStoreOptions {
  identity: Pick<AppIdentity, 'appId'>;
  storage: ICredentialStorage;
  logger?: Logger;
  clock?: () => Date;
}

/**
 * Holds the single current token set of an app identity
 *
 * All writes go through one promise chain, so read-modify-write sections
 * never interleave. A token set older than the stored one is not written.
 */
export class CredentialStore {
  private readonly appId: string;
  private readonly storage: ICredentialStorage;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(options: CredentialStoreOptions) {
    this.appId = options.identity.appId;
    this.storage = options.storage;
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? (() => new Date());
  }

  async load(): Promise<TokenSet | null> {
    const record = await this.storage.find(this.appId);
    return record ? fromRecord(record) : null;
  }

  /**
   * The stored token set, or `unauthenticated`
   */
  async current(): Promise<TokenSet> {
    const tokenSet = await this.load();
    if (!tokenSet) {
      throw BridgeError.unauthenticated();
    }
    return tokenSet;
  }

  async save(tokenSet: TokenSet): Promise<boolean> {
    return this.exclusive((tx) => tx.write(tokenSet));
  }

  async clear(): Promise<void> {
    await this.exclusive(() => this.storage.delete(this.appId));
  }

  /**
   * Region hint persisted with the last successful acquisition
   */
  async lastGoodRegion(): Promise<RegionId | undefined> {
    const record = await this.storage.find(this.appId);
    return record?.lastGoodRegion ?? record?.region;
  }

  /**
   * Run `fn` after every previously queued section has settled
   */
  exclusive<T>(fn: (tx: CredentialTransaction) => Promise<T>): Promise<T> {
    const tx: CredentialTransaction = {
      read: () => this.load(),
      write: (tokenSet) => this.writeUnlocked(tokenSet),
    };
    const run = this.queue.then(() => fn(tx));
    // The chain continues whether or not this section failed
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async writeUnlocked(tokenSet: TokenSet): Promise<boolean> {
    const existing = await this.storage.find(this.appId);

    if (existing && new Date(existing.obtainedAt).getTime() > tokenSet.obtainedAt.getTime()) {
      this.logger.warn('dropping stale token write', {
        region: tokenSet.region.id,
        storedObtainedAt: existing.obtainedAt,
        obtainedAt: tokenSet.obtainedAt,
      });
      return false;
    }

    await this.storage.upsert(toRecord(this.appId, tokenSet, this.clock()));
    this.logger.info('token saved', {
      region: tokenSet.region.id,
      expiresAt: tokenSet.expiresAt,
    });
    return true;
  }
}

export function toRecord(appId: string, tokenSet: TokenSet, now: Date): CredentialRecord {
  const record: CredentialRecord = {
    appId,
    accessToken: tokenSet.accessToken,
    obtainedAt: tokenSet.obtainedAt.toISOString(),
    region: tokenSet.region.id,
    lastGoodRegion: tokenSet.region.id,
    updatedAt: now.toISOString(),
  };

  if (tokenSet.refreshToken) record.refreshToken = tokenSet.refreshToken;
  if (tokenSet.expiresAt) record.expiresAt = tokenSet.expiresAt.toISOString();
  if (tokenSet.refreshExpiresAt) record.refreshExpiresAt = tokenSet.refreshExpiresAt.toISOString();
  if (tokenSet.user) record.user = tokenSet.user;

  return record;
}

export function fromRecord(record: CredentialRecord): TokenSet {
  const tokenSet: TokenSet = {
    accessToken: record.accessToken,
    obtainedAt: new Date(record.obtainedAt),
    region: REGION_ENDPOINTS[record.region],
  };

  if (record.refreshToken) tokenSet.refreshToken = record.refreshToken;
  if (record.expiresAt) tokenSet.expiresAt = new Date(record.expiresAt);
  if (record.refreshExpiresAt) tokenSet.refreshExpiresAt = new Date(record.refreshExpiresAt);
  if (record.user) tokenSet.user = record.user;

  return tokenSet;
}

/**
 * True once `expiresAt` has passed
 */
export function isTokenExpired(tokenSet: TokenSet, now: Date = new Date()): boolean {
  return tokenSet.expiresAt !== undefined && tokenSet.expiresAt.getTime() <= now.getTime();
}
