// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG SCHEMA — Zod Validation for Memory Palace Configuration
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';

// ─────────────────────────────────────────────────────────────────────────────────
// PRIMITIVES
// ─────────────────────────────────────────────────────────────────────────────────

export const EnvironmentSchema = z.enum(['development', 'staging', 'production', 'test']);
export type Environment = z.infer<typeof EnvironmentSchema>;

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']);

export const DiscoveryStrategySchema = z.enum(['all', 'recent']);
export type DiscoveryStrategy = z.infer<typeof DiscoveryStrategySchema>;

const TemperatureSchema = z.number().min(0).max(2);

// ─────────────────────────────────────────────────────────────────────────────────
// SECTIONS
// ─────────────────────────────────────────────────────────────────────────────────

export const LLMConfigSchema = z.object({
  apiKey: z.string().min(1).optional(),
  baseURL: z.string().url().optional(),
  model: z.string().min(1).default('gpt-4o-mini'),
  /** Per-call timeout; a timeout is handled like an unusable response */
  timeoutMs: z.number().int().positive().default(15000),
  maxTokens: z.number().int().positive().default(1200),
});

export const ExtractionConfigSchema = z.object({
  temperature: TemperatureSchema.default(0.3),
  maxConversationChars: z.number().int().positive().default(2000),
});

export const DiscoveryConfigSchema = z.object({
  temperature: TemperatureSchema.default(0.2),
  strategy: DiscoveryStrategySchema.default('all'),
  /** Only read by the 'recent' strategy */
  maxComparisons: z.number().int().positive().default(50),
  concurrency: z.number().int().positive().max(16).default(1),
});

export const RecallConfigSchema = z.object({
  statisticalLimit: z.number().int().positive().default(20),
  trackAccess: z.boolean().default(true),
});

export const StorageConfigSchema = z.object({
  redisUrl: z.string().min(1).optional(),
  keyPrefix: z.string().min(1).default('memory-palace'),
});

// ─────────────────────────────────────────────────────────────────────────────────
// ROOT
// ─────────────────────────────────────────────────────────────────────────────────

export const PalaceConfigSchema = z.object({
  environment: EnvironmentSchema.default('development'),
  logLevel: LogLevelSchema.default('info'),
  llm: LLMConfigSchema.default({}),
  extraction: ExtractionConfigSchema.default({}),
  discovery: DiscoveryConfigSchema.default({}),
  recall: RecallConfigSchema.default({}),
  storage: StorageConfigSchema.default({}),
});

export type PalaceConfig = z.infer<typeof PalaceConfigSchema>;
export type PalaceConfigInput = z.input<typeof PalaceConfigSchema>;
export type LLMConfig = PalaceConfig['llm'];
export type ExtractionConfig = PalaceConfig['extraction'];
export type DiscoveryConfig = PalaceConfig['discovery'];
export type RecallConfig = PalaceConfig['recall'];
export type StorageConfig = PalaceConfig['storage'];

/**
 * Format zod issues as `path: message` lines.
 */
export function formatConfigErrors(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}
