import type { CredentialRecord } from '@ewelink-bridge/shared';
import type { ICredentialStorage } from '../interfaces/credential-storage.js';

/**
 * In-memory credential storage implementation
 */
export class MemoryCredentialStorage implements ICredentialStorage {
  private records = new Map<string, CredentialRecord>();

  async find(appId: string): Promise<CredentialRecord | null> {
    const record = this.records.get(appId);
    return record ? { ...record } : null;
  }

  async upsert(record: CredentialRecord): Promise<void> {
    this.records.set(record.appId, { ...record });
  }

  async delete(appId: string): Promise<void> {
    this.records.delete(appId);
  }

  /**
   * Clear all records (for testing)
   */
  clear(): void {
    this.records.clear();
  }
}
