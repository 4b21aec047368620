// ═══════════════════════════════════════════════════════════════════════════════
// STORAGE MODULE — Store Selection
// ═══════════════════════════════════════════════════════════════════════════════

import type { StorageConfig } from '../config/index.js';
import { getLogger } from '../observability/logging/index.js';
import { MemoryStore } from './memory.js';
import { RedisStore } from './redis.js';
import type { KeyValueStore } from './types.js';

export type { KeyValueStore } from './types.js';
export { MemoryStore } from './memory.js';
export { RedisStore } from './redis.js';

const logger = getLogger({ component: 'storage' });

/**
 * Redis when a URL is configured, otherwise an in-process store
 * (which does not survive a restart).
 */
export function createStore(config: StorageConfig): KeyValueStore {
  if (config.redisUrl) {
    logger.info('Using Redis store');
    return new RedisStore(config.redisUrl);
  }

  logger.warn('REDIS_URL not set; using in-memory store, data will not persist');
  return new MemoryStore();
}
