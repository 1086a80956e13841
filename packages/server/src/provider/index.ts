export * from './http-client.js';
export * from './region-resolver.js';
export * from './retry-policy.js';
export * from './signature-strategies.js';
