// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG MODULE — Environment Config for the Memory Palace
// ═══════════════════════════════════════════════════════════════════════════════
//
// Environment variables are read as raw values, overrides are layered on top,
// and the merged object is validated once by PalaceConfigSchema.
//
// ═══════════════════════════════════════════════════════════════════════════════

import {
  PalaceConfigSchema,
  formatConfigErrors,
  type PalaceConfig,
  type PalaceConfigInput,
} from './schema.js';

export {
  PalaceConfigSchema,
  formatConfigErrors,
  type PalaceConfig,
  type PalaceConfigInput,
  type Environment,
  type DiscoveryStrategy,
  type LLMConfig,
  type ExtractionConfig,
  type DiscoveryConfig,
  type RecallConfig,
  type StorageConfig,
} from './schema.js';

type Env = Record<string, string | undefined>;

type RawValue = string | number | boolean | undefined;
type RawSection = Record<string, RawValue>;

const SECTIONS = ['llm', 'extraction', 'discovery', 'recall', 'storage'] as const;

/**
 * Unvalidated config as read from the environment.
 */
export interface RawConfig {
  environment?: string;
  logLevel?: string;
  llm: RawSection;
  extraction: RawSection;
  discovery: RawSection;
  recall: RawSection;
  storage: RawSection;
}

// ─────────────────────────────────────────────────────────────────────────────────
// ENVIRONMENT HELPERS
// ─────────────────────────────────────────────────────────────────────────────────

function envBool(env: Env, key: string): boolean | undefined {
  const value = env[key]?.toLowerCase();
  if (value === undefined || value === '') return undefined;
  return value === 'true' || value === '1' || value === 'yes';
}

function envNumber(env: Env, key: string): number | undefined {
  const value = env[key];
  if (value === undefined || value === '') return undefined;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}

function envFloat(env: Env, key: string): number | undefined {
  const value = env[key];
  if (value === undefined || value === '') return undefined;
  const parsed = parseFloat(value);
  return isNaN(parsed) ? undefined : parsed;
}

function envString(env: Env, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value === '' ? undefined : value;
}

// ─────────────────────────────────────────────────────────────────────────────────
// ERRORS
// ─────────────────────────────────────────────────────────────────────────────────

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid memory palace configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOADING
// ─────────────────────────────────────────────────────────────────────────────────

export function readEnvConfig(env: Env = process.env): RawConfig {
  return {
    environment: envString(env, 'NODE_ENV'),
    logLevel: envString(env, 'LOG_LEVEL')?.toLowerCase(),
    llm: {
      apiKey: envString(env, 'OPENAI_API_KEY'),
      baseURL: envString(env, 'OPENAI_BASE_URL'),
      model: envString(env, 'OPENAI_MODEL'),
      timeoutMs: envNumber(env, 'PALACE_COMPLETION_TIMEOUT_MS'),
      maxTokens: envNumber(env, 'PALACE_MAX_COMPLETION_TOKENS'),
    },
    extraction: {
      temperature: envFloat(env, 'PALACE_EXTRACTION_TEMPERATURE'),
      maxConversationChars: envNumber(env, 'PALACE_MAX_CONVERSATION_CHARS'),
    },
    discovery: {
      temperature: envFloat(env, 'PALACE_DISCOVERY_TEMPERATURE'),
      strategy: envString(env, 'PALACE_DISCOVERY_STRATEGY'),
      maxComparisons: envNumber(env, 'PALACE_DISCOVERY_MAX_COMPARISONS'),
      concurrency: envNumber(env, 'PALACE_DISCOVERY_CONCURRENCY'),
    },
    recall: {
      statisticalLimit: envNumber(env, 'PALACE_RECALL_STATISTICAL_LIMIT'),
      trackAccess: envBool(env, 'PALACE_TRACK_RECALL_ACCESS'),
    },
    storage: {
      redisUrl: envString(env, 'REDIS_URL'),
      keyPrefix: envString(env, 'PALACE_STORAGE_PREFIX'),
    },
  };
}

function withoutUndefined(section: RawSection): RawSection {
  const result: RawSection = {};
  for (const [key, value] of Object.entries(section)) {
    if (value !== undefined) result[key] = value;
  }
  return result;
}

/**
 * Layer programmatic overrides over raw environment values.
 * Overrides win field by field; unset fields fall through to the environment.
 */
export function mergeConfig(base: RawConfig, overrides: PalaceConfigInput = {}): RawConfig {
  const merged: RawConfig = {
    environment: overrides.environment ?? base.environment,
    logLevel: overrides.logLevel ?? base.logLevel,
    llm: {},
    extraction: {},
    discovery: {},
    recall: {},
    storage: {},
  };

  for (const name of SECTIONS) {
    const override: RawSection = { ...overrides[name] };
    merged[name] = {
      ...withoutUndefined(base[name]),
      ...withoutUndefined(override),
    };
  }

  return merged;
}

/**
 * Validate a config, throwing ConfigError with every issue found.
 */
export function resolveConfig(
  overrides: PalaceConfigInput = {},
  env: Env = process.env
): PalaceConfig {
  const parsed = PalaceConfigSchema.safeParse(mergeConfig(readEnvConfig(env), overrides));
  if (!parsed.success) {
    throw new ConfigError(formatConfigErrors(parsed.error));
  }
  return parsed.data;
}

let cachedConfig: PalaceConfig | null = null;

export function loadConfig(): PalaceConfig {
  if (cachedConfig) return cachedConfig;
  cachedConfig = resolveConfig();
  return cachedConfig;
}

export function reloadConfig(): PalaceConfig {
  cachedConfig = null;
  return loadConfig();
}
