// ═══════════════════════════════════════════════════════════════════════════════
// COMPLETION PARSING — Untrusted JSON from the Completion Service
// ═══════════════════════════════════════════════════════════════════════════════

import type { z } from 'zod';

import { ok, err, type Result } from '../../types/result.js';
import type { ParseError } from './errors.js';

/**
 * Remove Markdown code-fence markers (```json and ```) and trim.
 */
export function stripCodeFences(text: string): string {
  return text
    .replace(/```json/gi, '')
    .replace(/```/g, '')
    .trim();
}

/**
 * Strip fences, JSON-decode, then validate against `schema`.
 */
export function parseCompletionJson<T extends z.ZodTypeAny>(
  text: string,
  schema: T
): Result<z.infer<T>, ParseError> {
  let raw: unknown;
  try {
    raw = JSON.parse(stripCodeFences(text));
  } catch (error) {
    return err({
      code: 'INVALID_JSON',
      message: error instanceof Error ? error.message : 'Response is not valid JSON',
      cause: error,
    });
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    return err({
      code: 'SCHEMA_MISMATCH',
      message: parsed.error.issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; '),
      cause: parsed.error,
    });
  }

  return ok(parsed.data);
}
