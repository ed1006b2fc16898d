/**
 * Cache module exports.
 */
export { CacheManager } from './manager.js';
export type { ReferenceCacheFile, CachedFileResult, CacheStats } from './types.js';
export { CACHE_VERSION, CACHE_FILE } from './types.js';
