export * from './credential-store.js';
export * from './code-provider.js';
export * from './authorization-url.js';
export * from './token-acquisition.js';
export * from './device-dispatcher.js';
export * from './command-sequence.js';
