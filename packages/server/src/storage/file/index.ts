export { FileCredentialStorage } from './credential-storage.js';
export type { FileCredentialStorageOptions } from './credential-storage.js';
