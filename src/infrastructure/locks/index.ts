// ═══════════════════════════════════════════════════════════════════════════════
// LOCKS MODULE — Async Concurrency Primitives
// ═══════════════════════════════════════════════════════════════════════════════

export { Mutex } from './mutex.js';
export { ReadWriteLock } from './rw-lock.js';
