// ═══════════════════════════════════════════════════════════════════════════════
// PROVIDERS — Barrel Export
// ═══════════════════════════════════════════════════════════════════════════════

export type {
  CompletionRole,
  CompletionMessage,
  CompletionRequest,
  CompletionErrorCode,
  CompletionError,
  CompletionClient,
} from './types.js';

export { OpenAICompletionClient } from './openai.js';
