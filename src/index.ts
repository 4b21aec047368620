// ═══════════════════════════════════════════════════════════════════════════════
// MEMORY PALACE — Public API
// ═══════════════════════════════════════════════════════════════════════════════

export * from './core/palace/index.js';

export {
  loadConfig,
  reloadConfig,
  resolveConfig,
  readEnvConfig,
  mergeConfig,
  ConfigError,
  PalaceConfigSchema,
  type PalaceConfig,
  type PalaceConfigInput,
  type LLMConfig,
  type ExtractionConfig,
  type DiscoveryConfig,
  type RecallConfig,
  type StorageConfig,
  type DiscoveryStrategy,
} from './config/index.js';

export {
  getLogger,
  configureLogger,
  type ILogger,
  type LogLevel,
  type LoggerConfig,
} from './observability/logging/index.js';

export {
  OpenAICompletionClient,
  type CompletionClient,
  type CompletionRequest,
  type CompletionMessage,
  type CompletionError,
  type CompletionErrorCode,
} from './providers/index.js';

export {
  createStore,
  MemoryStore,
  RedisStore,
  type KeyValueStore,
} from './storage/index.js';

export { Mutex, ReadWriteLock } from './infrastructure/locks/index.js';

export { ok, err, type Result, type AsyncResult } from './types/result.js';
