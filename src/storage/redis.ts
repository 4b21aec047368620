// ═══════════════════════════════════════════════════════════════════════════════
// REDIS STORE — ioredis-Backed KeyValueStore
// ═══════════════════════════════════════════════════════════════════════════════

import { Redis } from 'ioredis';

import type { KeyValueStore } from './types.js';
import { getLogger } from '../observability/logging/index.js';

const logger = getLogger({ component: 'storage' });

export class RedisStore implements KeyValueStore {
  private readonly client: Redis;

  constructor(url: string) {
    this.client = new Redis(url, {
      lazyConnect: true,
      maxRetriesPerRequest: 3,
    });

    this.client.on('error', (error: Error) => {
      logger.error('Redis connection error', error);
    });
  }

  async get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  async set(key: string, value: string): Promise<void> {
    await this.client.set(key, value);
  }

  async disconnect(): Promise<void> {
    await this.client.quit();
  }
}
