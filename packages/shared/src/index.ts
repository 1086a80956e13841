// Re-export all shared types
export * from './types/region.js';
export * from './types/identity.js';
export * from './types/token.js';
export * from './types/device.js';
export * from './types/envelope.js';
export * from './types/api.js';
