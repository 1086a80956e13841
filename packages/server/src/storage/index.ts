import type { ICredentialStorage, StorageOptions } from './interfaces/index.js';
import { FileCredentialStorage } from './file/index.js';
import { MemoryCredentialStorage } from './memory/index.js';

export * from './interfaces/index.js';
export { MemoryCredentialStorage } from './memory/index.js';
export { FileCredentialStorage } from './file/index.js';

/**
 * Create the credential storage selected by the options
 */
export function createCredentialStorage(options: StorageOptions = {}): ICredentialStorage {
  if (options.credentialsFile) {
    return new FileCredentialStorage({
      path: options.credentialsFile,
      encryptionKey: options.encryptionKey,
    });
  }
  return new MemoryCredentialStorage();
}
