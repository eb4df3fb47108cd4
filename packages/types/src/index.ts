export * from './keys.js';
export * from './operation.js';
export * from './state.js';
export * from './validation.js';
