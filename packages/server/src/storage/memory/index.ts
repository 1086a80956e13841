export { MemoryCredentialStorage } from './credential-storage.js';
