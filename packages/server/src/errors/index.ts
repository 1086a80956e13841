export * from './error-codes.js';
export * from './bridge-error.js';
