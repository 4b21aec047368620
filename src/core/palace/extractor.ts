// ═══════════════════════════════════════════════════════════════════════════════
// INSIGHT EXTRACTOR — Conversation Text to Insight Candidates
// ═══════════════════════════════════════════════════════════════════════════════
//
// One completion call per conversation, no retries. The response is parsed
// all-or-nothing: a single malformed element fails the whole decode.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { ExtractionConfig } from '../../config/index.js';
import { getLogger } from '../../observability/logging/index.js';
import type { CompletionClient, CompletionError } from '../../providers/index.js';
import { ok, err, type AsyncResult, type Result } from '../../types/result.js';
import { fromCompletionError, fromThrownCompletion, type ExtractionError } from './errors.js';
import { parseCompletionJson } from './parsing.js';
import { EXTRACTION_SYSTEM_PROMPT, buildExtractionPrompt } from './prompts.js';
import { InsightCandidateListSchema } from './schemas.js';
import type { Conversation, InsightCandidate } from './types.js';

const logger = getLogger({ component: 'insight-extractor' });

export interface ExtractOptions {
  signal?: AbortSignal;
}

/**
 * Message texts joined by newlines, in conversation order.
 */
export function conversationToText(conversation: Conversation): string {
  return conversation.messages.map(m => m.text).join('\n');
}

export class InsightExtractor {
  constructor(
    private readonly completion: CompletionClient,
    private readonly config: ExtractionConfig
  ) {}

  async extractInsights(
    conversationText: string,
    options: ExtractOptions = {}
  ): AsyncResult<InsightCandidate[], ExtractionError> {
    if (!conversationText.trim()) {
      return ok([]);
    }

    // Counted in code points so a surrogate pair is never split.
    const truncated = Array.from(conversationText)
      .slice(0, this.config.maxConversationChars)
      .join('');

    let response: Result<string, CompletionError>;
    try {
      response = await this.completion.complete({
        messages: [{ role: 'user', text: buildExtractionPrompt(truncated) }],
        systemPrompt: EXTRACTION_SYSTEM_PROMPT,
        temperature: this.config.temperature,
        signal: options.signal,
      });
    } catch (error) {
      return err(fromThrownCompletion(error, options.signal));
    }

    if (!response.ok) {
      return err(fromCompletionError(response.error));
    }

    const parsed = parseCompletionJson(response.value, InsightCandidateListSchema);
    if (!parsed.ok) {
      logger.debug('Unusable extraction response', {
        code: parsed.error.code,
        detail: parsed.error.message,
      });
      return parsed;
    }

    logger.debug('Extracted insights', { count: parsed.value.length });
    return ok(parsed.value);
  }
}
