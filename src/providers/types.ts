// ═══════════════════════════════════════════════════════════════════════════════
// PROVIDER TYPES — Text Completion Contract
// ═══════════════════════════════════════════════════════════════════════════════

import type { AsyncResult } from '../types/result.js';

export type CompletionRole = 'user' | 'assistant';

export interface CompletionMessage {
  role: CompletionRole;
  text: string;
}

export interface CompletionRequest {
  messages: CompletionMessage[];
  systemPrompt?: string;
  temperature: number;
  /** Aborting cancels the in-flight call */
  signal?: AbortSignal;
}

export type CompletionErrorCode =
  | 'COMPLETION_FAILED'      // Network error, non-2xx status, provider error
  | 'COMPLETION_TIMEOUT'     // Per-call timeout elapsed
  | 'COMPLETION_CANCELLED'   // Caller aborted the request
  | 'EMPTY_COMPLETION'       // Provider returned no text
  | 'PROVIDER_UNAVAILABLE';  // No client configured

export interface CompletionError {
  readonly code: CompletionErrorCode;
  readonly message: string;
  readonly cause?: unknown;
}

/**
 * A text-completion service. Implementations never throw; every failure
 * comes back as an Err.
 */
export interface CompletionClient {
  complete(request: CompletionRequest): AsyncResult<string, CompletionError>;
}
