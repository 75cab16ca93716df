// protoc-gen-cache-manager — Public API
export { createCacheManagerPlugin, PLUGIN_VERSION } from './protoc-plugin.js';
export type { CacheManagerPluginOptions } from './protoc-plugin.js';
export { generateCommand } from './commands/generate.js';
export { initCommand } from './commands/init.js';
export { createLogger } from './logger.js';
export type { Logger } from './logger.js';
