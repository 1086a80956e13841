import type { CredentialRecord } from '@ewelink-bridge/shared';

/**
 * Storage interface for persisted provider credentials
 * Holds at most one record per app id
 */
export interface ICredentialStorage {
  /**
   * Find the record for an app id
   */
  find(appId: string): Promise<CredentialRecord | null>;

  /**
   * Insert or replace the record for `record.appId`
   */
  upsert(record: CredentialRecord): Promise<void>;

  /**
   * Remove the record for an app id (no-op when absent)
   */
  delete(appId: string): Promise<void>;
}
