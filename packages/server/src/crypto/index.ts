export * from './signature.js';
export * from './random.js';
export * from './encrypt.js';
export * from './state.js';
