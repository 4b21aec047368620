// ═══════════════════════════════════════════════════════════════════════════════
// STORAGE TYPES — Key-Value Store Interface
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Durable string store the palace snapshots into. Values are opaque blobs.
 */
export interface KeyValueStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<void>;

  /** Release any connection held by the store. */
  disconnect(): Promise<void>;
}
