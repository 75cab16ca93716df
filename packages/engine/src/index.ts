// cache-manager-codegen — Public API
export * from './types.js';
export * from './descriptor/index.js';
export * from './selector/index.js';
export * from './naming/index.js';
export * from './plan/index.js';
export * from './emitter/index.js';
export * from './config/loader.js';
export * from './errors.js';
