export * from './credential-storage.js';

/**
 * Storage factory options
 */
export interface StorageOptions {
  /**
   * Path of the credentials file
   * Memory storage is used when omitted
   */
  credentialsFile?: string;

  /**
   * Encrypts the credentials file at rest when set
   */
  encryptionKey?: string;
}
