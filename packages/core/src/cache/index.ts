/**
 * Cache module - dataset persistence
 *
 * @module cache
 */

export * from './types.js';
export * from './schema.js';
export {
  FileCacheStore,
  toFileNameToken,
  formatCacheTimestamp,
  type CacheStore,
  type FileCacheStoreConfig,
} from './cache-store.js';
