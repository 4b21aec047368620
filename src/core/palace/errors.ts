// ═══════════════════════════════════════════════════════════════════════════════
// PALACE ERRORS — Expected Failures and Invariant Violations
// ═══════════════════════════════════════════════════════════════════════════════

import type { CompletionError, CompletionErrorCode } from '../../providers/index.js';

// ─────────────────────────────────────────────────────────────────────────────────
// EXPECTED FAILURES (returned as Result errors)
// ─────────────────────────────────────────────────────────────────────────────────

export type ParseErrorCode =
  | 'INVALID_JSON'        // Not JSON after fence stripping
  | 'SCHEMA_MISMATCH';    // JSON, but not the expected shape

export interface ParseError {
  readonly code: ParseErrorCode;
  readonly message: string;
  readonly cause?: unknown;
}

export type ExtractionErrorCode = CompletionErrorCode | ParseErrorCode;

export interface ExtractionError {
  readonly code: ExtractionErrorCode;
  readonly message: string;
  readonly cause?: unknown;
}

export type DiscoveryError = ExtractionError;

export type PersistenceErrorCode =
  | 'SERIALIZATION_ERROR'
  | 'STORAGE_ERROR';

export interface PersistenceError {
  readonly code: PersistenceErrorCode;
  readonly message: string;
  readonly key?: string;
  readonly cause?: unknown;
}

export function fromCompletionError(error: CompletionError): ExtractionError {
  return { code: error.code, message: error.message, cause: error.cause };
}

/**
 * A completion client that threw instead of returning a Result. Treated as
 * a failed call, or a cancelled one when the caller had already aborted.
 */
export function fromThrownCompletion(error: unknown, signal?: AbortSignal): ExtractionError {
  return {
    code: signal?.aborted ? 'COMPLETION_CANCELLED' : 'COMPLETION_FAILED',
    message: error instanceof Error ? error.message : String(error),
    cause: error,
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// PROGRAMMER ERRORS (thrown)
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Thrown when a mutation would break a graph invariant, e.g. an edge whose
 * endpoint is not in the graph or a node id added twice.
 */
export class GraphInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GraphInvariantError';
  }
}
