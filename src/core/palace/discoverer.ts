// ═══════════════════════════════════════════════════════════════════════════════
// CONNECTION DISCOVERER — Pairwise Relationship Verdicts
// ═══════════════════════════════════════════════════════════════════════════════
//
// One completion call per (new node, candidate) pair. A pair that fails for
// any reason contributes no edge; the remaining pairs still run.
//
// Candidate selection:
//   all     every existing node, timeline order
//   recent  the last `maxComparisons` nodes of the timeline
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { DiscoveryConfig } from '../../config/index.js';
import { getLogger } from '../../observability/logging/index.js';
import type { CompletionClient, CompletionError } from '../../providers/index.js';
import { err, ok, unwrapOr, type AsyncResult, type Result } from '../../types/result.js';
import { fromCompletionError, fromThrownCompletion, type DiscoveryError } from './errors.js';
import { createConnection } from './nodes.js';
import { parseCompletionJson } from './parsing.js';
import { DISCOVERY_SYSTEM_PROMPT, buildDiscoveryPrompt } from './prompts.js';
import { ConnectionVerdictSchema } from './schemas.js';
import type { KnowledgeConnection, MemoryNode } from './types.js';

const logger = getLogger({ component: 'connection-discoverer' });

// ─────────────────────────────────────────────────────────────────────────────────
// CANDIDATE SELECTION
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Chooses which existing nodes (given in timeline order) a new node is
 * compared against.
 */
export type CandidateSelector = (
  newNode: MemoryNode,
  existingNodes: readonly MemoryNode[]
) => MemoryNode[];

export const selectAll: CandidateSelector = (_newNode, existingNodes) => [...existingNodes];

export function selectRecent(maxComparisons: number): CandidateSelector {
  return (_newNode, existingNodes) =>
    maxComparisons > 0 ? existingNodes.slice(-maxComparisons) : [];
}

export function selectorForConfig(config: DiscoveryConfig): CandidateSelector {
  switch (config.strategy) {
    case 'recent':
      return selectRecent(config.maxComparisons);
    case 'all':
      return selectAll;
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// DISCOVERER
// ─────────────────────────────────────────────────────────────────────────────────

export interface DiscoverOptions {
  signal?: AbortSignal;
}

export class ConnectionDiscoverer {
  constructor(
    private readonly completion: CompletionClient,
    private readonly config: DiscoveryConfig
  ) {}

  /**
   * Ask for a verdict on every candidate. Output follows candidate order.
   * The node itself and nodes it already points to are skipped.
   */
  async discoverConnections(
    newNode: MemoryNode,
    candidates: readonly MemoryNode[],
    options: DiscoverOptions = {}
  ): Promise<KnowledgeConnection[]> {
    const pairs = candidates.filter(
      c => c.id !== newNode.id && !newNode.connections.includes(c.id)
    );
    const verdicts: Array<KnowledgeConnection | null> = [];
    const batchSize = Math.max(1, this.config.concurrency);

    for (let i = 0; i < pairs.length; i += batchSize) {
      if (options.signal?.aborted) {
        logger.debug('Discovery cancelled', { remaining: pairs.length - i });
        break;
      }

      const batch = pairs.slice(i, i + batchSize);
      const results = await Promise.all(
        batch.map(candidate => this.analyzePair(newNode, candidate, options.signal))
      );

      for (const [offset, result] of results.entries()) {
        if (!result.ok) {
          logger.debug('No connection from failed pair', {
            targetId: batch[offset]?.id,
            code: result.error.code,
          });
        }
        verdicts.push(unwrapOr(result, null));
      }
    }

    return verdicts.filter((c): c is KnowledgeConnection => c !== null);
  }

  /**
   * Verdict for one pair: an edge, null for "not connected", or the failure.
   */
  async analyzePair(
    node: MemoryNode,
    other: MemoryNode,
    signal?: AbortSignal
  ): AsyncResult<KnowledgeConnection | null, DiscoveryError> {
    let response: Result<string, CompletionError>;
    try {
      response = await this.completion.complete({
        messages: [{ role: 'user', text: buildDiscoveryPrompt(node, other) }],
        systemPrompt: DISCOVERY_SYSTEM_PROMPT,
        temperature: this.config.temperature,
        signal,
      });
    } catch (error) {
      return err(fromThrownCompletion(error, signal));
    }

    if (!response.ok) {
      return err(fromCompletionError(response.error));
    }

    const parsed = parseCompletionJson(response.value, ConnectionVerdictSchema);
    if (!parsed.ok) {
      return parsed;
    }

    const verdict = parsed.value;
    if (!verdict.connected) {
      return ok(null);
    }

    return ok(
      createConnection(node.id, other.id, verdict.type, verdict.strength, verdict.description)
    );
  }
}
