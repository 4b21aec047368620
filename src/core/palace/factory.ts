// ═══════════════════════════════════════════════════════════════════════════════
// PALACE FACTORY — Wire Config, Store, and Completion Client
// ═══════════════════════════════════════════════════════════════════════════════

import { resolveConfig, type PalaceConfigInput } from '../../config/index.js';
import { configureLogger, getLogger } from '../../observability/logging/index.js';
import { OpenAICompletionClient, type CompletionClient } from '../../providers/index.js';
import { createStore, type KeyValueStore } from '../../storage/index.js';
import type { CandidateSelector } from './discoverer.js';
import { MemoryPalaceManager } from './manager.js';

export interface CreateMemoryPalaceOptions {
  config?: PalaceConfigInput;
  completion?: CompletionClient;
  store?: KeyValueStore;
  selector?: CandidateSelector;
  env?: Record<string, string | undefined>;
}

/**
 * Build a manager from environment config and load its saved state.
 * Explicit dependencies take precedence over those derived from config.
 */
export async function createMemoryPalace(
  options: CreateMemoryPalaceOptions = {}
): Promise<MemoryPalaceManager> {
  const config = resolveConfig(options.config, options.env);

  configureLogger({
    level: config.logLevel,
    environment: config.environment,
    pretty: config.environment !== 'production',
  });

  let completion = options.completion;
  if (!completion) {
    const client = new OpenAICompletionClient(config.llm);
    if (!client.isAvailable()) {
      getLogger({ component: 'memory-palace' }).warn(
        'OPENAI_API_KEY not set; extraction and discovery will produce nothing'
      );
    }
    completion = client;
  }

  const manager = new MemoryPalaceManager({
    completion,
    store: options.store ?? createStore(config.storage),
    config,
    selector: options.selector,
  });

  await manager.load();
  return manager;
}
