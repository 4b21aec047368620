// ═══════════════════════════════════════════════════════════════════════════════
// OPENAI COMPLETION CLIENT — Chat Completions with Timeout and Cancellation
// ═══════════════════════════════════════════════════════════════════════════════

import OpenAI from 'openai';

import type { LLMConfig } from '../config/index.js';
import { getLogger } from '../observability/logging/index.js';
import { ok, err, type AsyncResult } from '../types/result.js';
import type {
  CompletionClient,
  CompletionError,
  CompletionRequest,
} from './types.js';

const logger = getLogger({ component: 'llm' });

export class OpenAICompletionClient implements CompletionClient {
  private readonly client: OpenAI | null;
  private readonly config: LLMConfig;

  constructor(config: LLMConfig, client?: OpenAI) {
    this.config = config;
    if (client) {
      this.client = client;
    } else if (config.apiKey) {
      this.client = new OpenAI({ apiKey: config.apiKey, baseURL: config.baseURL, maxRetries: 0 });
    } else {
      this.client = null;
    }
  }

  isAvailable(): boolean {
    return this.client !== null;
  }

  async complete(request: CompletionRequest): AsyncResult<string, CompletionError> {
    if (!this.client) {
      return err({ code: 'PROVIDER_UNAVAILABLE', message: 'OpenAI client not configured' });
    }

    if (request.signal?.aborted) {
      return err({ code: 'COMPLETION_CANCELLED', message: 'Request cancelled before sending' });
    }

    const messages: OpenAI.ChatCompletionMessageParam[] = [];
    if (request.systemPrompt) {
      messages.push({ role: 'system', content: request.systemPrompt });
    }
    for (const message of request.messages) {
      messages.push({ role: message.role, content: message.text });
    }

    // Timeout and caller cancellation share one controller.
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.config.timeoutMs);
    const onCallerAbort = (): void => controller.abort();
    request.signal?.addEventListener('abort', onCallerAbort, { once: true });

    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.config.model,
          messages,
          temperature: request.temperature,
          max_tokens: this.config.maxTokens,
        },
        { signal: controller.signal }
      );

      const content = response.choices[0]?.message?.content?.trim() ?? '';
      if (!content) {
        return err({ code: 'EMPTY_COMPLETION', message: 'Completion contained no text' });
      }
      return ok(content);
    } catch (error) {
      if (timedOut) {
        logger.warn('Completion timed out', { timeoutMs: this.config.timeoutMs });
        return err({ code: 'COMPLETION_TIMEOUT', message: `No response within ${this.config.timeoutMs}ms`, cause: error });
      }
      if (request.signal?.aborted) {
        return err({ code: 'COMPLETION_CANCELLED', message: 'Request cancelled', cause: error });
      }
      logger.error('Completion request failed', error, { model: this.config.model });
      return err({
        code: 'COMPLETION_FAILED',
        message: error instanceof Error ? error.message : String(error),
        cause: error,
      });
    } finally {
      clearTimeout(timeoutId);
      request.signal?.removeEventListener('abort', onCallerAbort);
    }
  }
}
