// ═══════════════════════════════════════════════════════════════════════════════
// RECALL ENGINE — Keyword + TF-IDF Retrieval with Composite Ranking
// ═══════════════════════════════════════════════════════════════════════════════
//
// Pipeline:
//   1. Keyword pass: literal substring match of the whole query
//   2. Statistical pass: summed TF-IDF per query token, top N
//   3. Set merge (keyword results first), then stable sort by
//      importance + 0.1 * accessCount + 0.2 if created within 24h
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { RecallConfig } from '../../config/index.js';
import type { KnowledgeGraph } from './graph.js';
import type { SearchIndex } from './search-index.js';
import { splitQuery } from './tokenizer.js';
import type { MemoryNode } from './types.js';

const ACCESS_WEIGHT = 0.1;
const RECENCY_BONUS = 0.2;
const RECENCY_WINDOW_MS = 24 * 60 * 60 * 1000;

export function relevanceScore(node: MemoryNode, now: Date = new Date()): number {
  const age = now.getTime() - new Date(node.createdAt).getTime();
  const recency = age < RECENCY_WINDOW_MS ? RECENCY_BONUS : 0;
  return node.importance + ACCESS_WEIGHT * node.accessCount + recency;
}

export class RecallEngine {
  constructor(
    private readonly graph: KnowledgeGraph,
    private readonly index: SearchIndex,
    private readonly config: Pick<RecallConfig, 'statisticalLimit'>
  ) {}

  /**
   * Nodes relevant to the query, most relevant first. Scores are taken from
   * the nodes as they are when called.
   */
  recall(query: string, now: Date = new Date()): MemoryNode[] {
    if (!query.trim()) {
      return [];
    }

    const merged = new Map<string, MemoryNode>();
    for (const node of [...this.keywordSearch(query), ...this.statisticalSearch(query)]) {
      if (!merged.has(node.id)) merged.set(node.id, node);
    }

    // Array.prototype.sort is stable; equal scores keep merge order.
    return [...merged.values()]
      .map(node => ({ node, score: relevanceScore(node, now) }))
      .sort((a, b) => b.score - a.score)
      .map(entry => entry.node);
  }

  keywordSearch(query: string): MemoryNode[] {
    return this.graph.searchNodes(query);
  }

  /**
   * Top `statisticalLimit` nodes by accumulated TF-IDF over the query's
   * whitespace-separated tokens. Ties keep first-scored order.
   */
  statisticalSearch(query: string): MemoryNode[] {
    const scores = new Map<string, number>();

    for (const term of splitQuery(query)) {
      for (const nodeId of this.index.getPostings(term)) {
        const score = this.index.calculateTFIDF(term, nodeId);
        scores.set(nodeId, (scores.get(nodeId) ?? 0) + score);
      }
    }

    const ranked = [...scores.entries()]
      .sort((a, b) => b[1] - a[1])
      .slice(0, this.config.statisticalLimit);

    const result: MemoryNode[] = [];
    for (const [id] of ranked) {
      const node = this.graph.getNode(id);
      if (node) result.push(node);
    }
    return result;
  }
}
