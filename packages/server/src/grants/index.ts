export * from './token-response.js';
export * from './authorization-code/grant.js';
export * from './password/grant.js';
export * from './refresh-token/grant.js';
