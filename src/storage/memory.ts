// ═══════════════════════════════════════════════════════════════════════════════
// MEMORY STORE — In-Process KeyValueStore Implementation
// ═══════════════════════════════════════════════════════════════════════════════

import type { KeyValueStore } from './types.js';

export class MemoryStore implements KeyValueStore {
  private data: Map<string, string> = new Map();

  async get(key: string): Promise<string | null> {
    return this.data.get(key) ?? null;
  }

  async set(key: string, value: string): Promise<void> {
    this.data.set(key, value);
  }

  async disconnect(): Promise<void> {
    // Nothing to release.
  }
}
