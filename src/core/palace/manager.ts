// ═══════════════════════════════════════════════════════════════════════════════
// MEMORY PALACE MANAGER — Ingestion, Recall, and Persistence Orchestration
// ═══════════════════════════════════════════════════════════════════════════════
//
// Ingestion flow (serialized by a mutex):
//   extract → for each candidate:
//     create node → select candidates (read lock) → discover (no lock)
//     → commit node + index entry + edges (write lock)
//   → save if anything was committed
//
// Completion calls never hold the graph lock, so recall keeps working during
// ingestion and never observes a node without its edges.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { PalaceConfig } from '../../config/index.js';
import { Mutex, ReadWriteLock } from '../../infrastructure/locks/index.js';
import { getLogger, withTiming } from '../../observability/logging/index.js';
import type { CompletionClient } from '../../providers/index.js';
import type { KeyValueStore } from '../../storage/index.js';
import type { Result } from '../../types/result.js';
import {
  ConnectionDiscoverer,
  selectorForConfig,
  type CandidateSelector,
} from './discoverer.js';
import type { ExtractionError, PersistenceError } from './errors.js';
import { InsightExtractor, conversationToText } from './extractor.js';
import { KnowledgeGraph } from './graph.js';
import { cloneNode, createNode } from './nodes.js';
import { PalacePersistence, type LoadIssue } from './persistence.js';
import { RecallEngine } from './recall.js';
import { SearchIndex } from './search-index.js';
import type {
  ConnectionType,
  Conversation,
  KnowledgeConnection,
  MemoryNode,
  MemoryNodeType,
  PalaceStats,
} from './types.js';

const logger = getLogger({ component: 'memory-palace' });

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export interface MemoryPalaceDeps {
  completion: CompletionClient;
  store: KeyValueStore;
  config: PalaceConfig;
  /** Overrides the strategy named in config.discovery */
  selector?: CandidateSelector;
}

export interface IngestOptions {
  signal?: AbortSignal;
}

export interface IngestionResult {
  nodes: MemoryNode[];
  connections: KnowledgeConnection[];
  cancelled: boolean;
  extractionError?: ExtractionError;
  /** Undefined when nothing was committed and no save was attempted */
  saved?: boolean;
}

// ─────────────────────────────────────────────────────────────────────────────────
// MANAGER
// ─────────────────────────────────────────────────────────────────────────────────

export class MemoryPalaceManager {
  private graph = new KnowledgeGraph();
  private index = new SearchIndex();

  private readonly ingestLock = new Mutex();
  private readonly graphLock = new ReadWriteLock();

  private readonly extractor: InsightExtractor;
  private readonly discoverer: ConnectionDiscoverer;
  private readonly persistence: PalacePersistence;
  private readonly store: KeyValueStore;
  private readonly selector: CandidateSelector;
  private readonly config: PalaceConfig;

  private processing = false;
  private lastErrorMessage: string | null = null;

  constructor(deps: MemoryPalaceDeps) {
    this.config = deps.config;
    this.extractor = new InsightExtractor(deps.completion, deps.config.extraction);
    this.discoverer = new ConnectionDiscoverer(deps.completion, deps.config.discovery);
    this.store = deps.store;
    this.persistence = new PalacePersistence(deps.store, deps.config.storage.keyPrefix);
    this.selector = deps.selector ?? selectorForConfig(deps.config.discovery);
  }

  get isProcessing(): boolean {
    return this.processing;
  }

  /** Message of the most recent extraction or persistence failure. */
  get lastError(): string | null {
    return this.lastErrorMessage;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // LIFECYCLE
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Replace in-memory state with what the store holds.
   */
  async load(): Promise<LoadIssue[]> {
    const loaded = await this.persistence.load();

    await this.graphLock.withWrite(() => {
      this.graph = loaded.graph;
      this.index = loaded.index;
    });

    logger.info('Memory palace loaded', {
      nodes: loaded.graph.size,
      connections: loaded.graph.connectionCount,
      documents: loaded.index.documentCount,
    });

    return loaded.issues;
  }

  async save(): Promise<Result<void, PersistenceError>> {
    const result = await this.graphLock.withRead(() =>
      this.persistence.save(this.graph, this.index)
    );

    if (!result.ok) {
      this.lastErrorMessage = `Failed to save memory palace: ${result.error.message}`;
      logger.error('Failed to save memory palace', result.error.cause, {
        code: result.error.code,
        key: result.error.key,
      });
    }

    return result;
  }

  /**
   * Wait for a running ingestion, then release the store's connection.
   */
  async close(): Promise<void> {
    await this.ingestLock.withLock(() => this.store.disconnect());
    logger.info('Memory palace closed');
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // INGESTION
  // ─────────────────────────────────────────────────────────────────────────────

  async ingestConversation(
    conversation: Conversation,
    options: IngestOptions = {}
  ): Promise<IngestionResult> {
    const result: IngestionResult = { nodes: [], connections: [], cancelled: false };

    if (conversation.messages.length === 0) {
      return result;
    }

    return this.ingestLock.withLock(() =>
      withTiming('ingestConversation', async () => {
        this.processing = true;
        this.lastErrorMessage = null;
        try {
          await this.runIngestion(conversation, options.signal, result);
        } finally {
          this.processing = false;
        }
        return result;
      }, logger)
    );
  }

  private async runIngestion(
    conversation: Conversation,
    signal: AbortSignal | undefined,
    result: IngestionResult
  ): Promise<void> {
    const extracted = await this.extractor.extractInsights(conversationToText(conversation), { signal });

    if (!extracted.ok) {
      result.extractionError = extracted.error;
      if (extracted.error.code === 'COMPLETION_CANCELLED') {
        result.cancelled = true;
      } else {
        this.lastErrorMessage = `Failed to process conversation: ${extracted.error.message}`;
        logger.warn('Insight extraction failed', {
          conversationId: conversation.id,
          code: extracted.error.code,
          detail: extracted.error.message,
        });
      }
      return;
    }

    const provenance = {
      conversationId: conversation.id,
      messageIds: conversation.messages.map(m => m.id),
    };

    for (const candidate of extracted.value) {
      if (signal?.aborted) {
        result.cancelled = true;
        break;
      }

      const node = createNode(candidate, provenance);

      const candidates = await this.graphLock.withRead(() =>
        this.selector(node, this.graph.allNodes()).map(cloneNode)
      );

      const edges = await this.discoverer.discoverConnections(node, candidates, { signal });

      if (signal?.aborted) {
        result.cancelled = true;
        break;
      }

      const committed = await this.graphLock.withWrite(() => this.commit(node, edges));
      result.nodes.push(cloneNode(node));
      result.connections.push(...committed);
    }

    if (result.cancelled) {
      logger.info('Ingestion cancelled', {
        conversationId: conversation.id,
        committedNodes: result.nodes.length,
      });
    }

    if (result.nodes.length > 0) {
      const saved = await this.save();
      result.saved = saved.ok;
    }

    logger.info('Conversation ingested', {
      conversationId: conversation.id,
      nodes: result.nodes.length,
      connections: result.connections.length,
    });
  }

  /**
   * Node, index entry and edges become visible together.
   */
  private commit(node: MemoryNode, edges: KnowledgeConnection[]): KnowledgeConnection[] {
    this.graph.addNode(node);
    this.index.indexNode(node);

    const committed: KnowledgeConnection[] = [];
    for (const edge of edges) {
      // load() may have replaced the graph since the candidates were selected.
      if (this.graph.getNode(edge.targetNodeId) && this.graph.addConnection(edge)) {
        committed.push({ ...edge });
      }
    }
    return committed;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // RECALL
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Nodes relevant to the query, most relevant first. With access tracking on,
   * each returned node's access count and last-access time are updated after
   * ranking and the palace is saved. Returned copies carry the values used
   * for ranking.
   */
  async recall(query: string): Promise<MemoryNode[]> {
    const { statisticalLimit, trackAccess } = this.config.recall;

    if (!trackAccess) {
      return this.graphLock.withRead(() =>
        new RecallEngine(this.graph, this.index, { statisticalLimit })
          .recall(query)
          .map(cloneNode)
      );
    }

    const results = await this.graphLock.withWrite(() => {
      const ranked = new RecallEngine(this.graph, this.index, { statisticalLimit }).recall(query);
      const snapshot = ranked.map(cloneNode);
      const now = new Date();
      for (const node of ranked) {
        this.graph.touch(node.id, now);
      }
      return snapshot;
    });

    if (results.length > 0) {
      await this.save();
    }

    return results;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // READ API
  // ─────────────────────────────────────────────────────────────────────────────

  getNode(id: string): Promise<MemoryNode | undefined> {
    return this.graphLock.withRead(() => {
      const node = this.graph.getNode(id);
      return node ? cloneNode(node) : undefined;
    });
  }

  /** Timeline order. */
  getAllNodes(): Promise<MemoryNode[]> {
    return this.graphLock.withRead(() => this.graph.allNodes().map(cloneNode));
  }

  getNodesByType(type: MemoryNodeType): Promise<MemoryNode[]> {
    return this.graphLock.withRead(() =>
      this.graph.allNodes().filter(n => n.nodeType === type).map(cloneNode)
    );
  }

  /** Newest first. */
  getRecentNodes(limit = 10): Promise<MemoryNode[]> {
    return this.graphLock.withRead(() =>
      limit > 0 ? this.graph.allNodes().slice(-limit).reverse().map(cloneNode) : []
    );
  }

  /** Keyword → nodes; topics whose bucket resolves to nothing are omitted. */
  getTopicClusters(): Promise<Map<string, MemoryNode[]>> {
    return this.graphLock.withRead(() => {
      const clusters = new Map<string, MemoryNode[]>();
      for (const topic of this.graph.getTopics().keys()) {
        const nodes = this.graph.getNodesByTopic(topic);
        if (nodes.length > 0) clusters.set(topic, nodes.map(cloneNode));
      }
      return clusters;
    });
  }

  getNodesByTopic(topic: string): Promise<MemoryNode[]> {
    return this.graphLock.withRead(() => this.graph.getNodesByTopic(topic).map(cloneNode));
  }

  getConnectedNodes(id: string): Promise<MemoryNode[]> {
    return this.graphLock.withRead(() => this.graph.getConnectedNodes(id).map(cloneNode));
  }

  getConnections(): Promise<KnowledgeConnection[]> {
    return this.graphLock.withRead(() => this.graph.getConnections().map(c => ({ ...c })));
  }

  getStats(): Promise<PalaceStats> {
    return this.graphLock.withRead(() => {
      const byNodeType = emptyNodeTypeCounts();
      const byConnectionType = emptyConnectionTypeCounts();
      const nodes = this.graph.allNodes();

      for (const node of nodes) {
        byNodeType[node.nodeType] += 1;
      }
      for (const connection of this.graph.getConnections()) {
        byConnectionType[connection.connectionType] += 1;
      }

      const createdTimes = nodes.map(n => n.createdAt).sort();

      return {
        totalNodes: nodes.length,
        totalConnections: this.graph.connectionCount,
        totalTopics: this.graph.getTopics().size,
        indexedDocuments: this.index.documentCount,
        indexedTerms: this.index.termCount,
        byNodeType,
        byConnectionType,
        oldestNode: createdTimes[0],
        newestNode: createdTimes[createdTimes.length - 1],
      };
    });
  }
}

function emptyNodeTypeCounts(): Record<MemoryNodeType, number> {
  return { insight: 0, fact: 0, idea: 0, question: 0, solution: 0, pattern: 0, connection: 0 };
}

function emptyConnectionTypeCounts(): Record<ConnectionType, number> {
  return { similar: 0, causal: 0, contradictory: 0, elaborative: 0, temporal: 0, thematic: 0 };
}
