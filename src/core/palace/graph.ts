// ═══════════════════════════════════════════════════════════════════════════════
// KNOWLEDGE GRAPH — Node Arena, Edges, Topic Index, Timeline
// ═══════════════════════════════════════════════════════════════════════════════
//
// Nodes live in an arena keyed by id and are mutated in place. Invariants:
//   - node.connections equals the targets of edges whose source is node
//   - every id in the timeline or a topic bucket exists in the arena
//   - the timeline is append-only and duplicate-free
//
// ═══════════════════════════════════════════════════════════════════════════════

import { GraphInvariantError } from './errors.js';
import type { GraphSnapshot } from './schemas.js';
import type { KnowledgeConnection, MemoryNode } from './types.js';

export class KnowledgeGraph {
  private readonly nodes = new Map<string, MemoryNode>();
  private readonly connections: KnowledgeConnection[] = [];
  private readonly topics = new Map<string, string[]>();
  private readonly timeline: string[] = [];

  // ─────────────────────────────────────────────────────────────────────────────
  // MUTATION
  // ─────────────────────────────────────────────────────────────────────────────

  addNode(node: MemoryNode): void {
    if (this.nodes.has(node.id)) {
      throw new GraphInvariantError(`Node ${node.id} already exists`);
    }

    this.nodes.set(node.id, node);
    this.timeline.push(node.id);

    for (const keyword of node.keywords) {
      const bucket = this.topics.get(keyword);
      if (bucket) {
        if (!bucket.includes(node.id)) bucket.push(node.id);
      } else {
        this.topics.set(keyword, [node.id]);
      }
    }
  }

  /**
   * Append an edge and mirror it into the source's adjacency list.
   * Returns false, changing nothing, for a duplicate (same pair, same type).
   */
  addConnection(edge: KnowledgeConnection): boolean {
    const source = this.nodes.get(edge.sourceNodeId);
    if (!source) {
      throw new GraphInvariantError(`Unknown source node ${edge.sourceNodeId}`);
    }
    if (!this.nodes.has(edge.targetNodeId)) {
      throw new GraphInvariantError(`Unknown target node ${edge.targetNodeId}`);
    }

    if (this.hasConnection(edge.sourceNodeId, edge.targetNodeId, edge.connectionType)) {
      return false;
    }

    this.connections.push(edge);
    if (!source.connections.includes(edge.targetNodeId)) {
      source.connections.push(edge.targetNodeId);
    }
    return true;
  }

  hasConnection(sourceId: string, targetId: string, type?: KnowledgeConnection['connectionType']): boolean {
    return this.connections.some(c =>
      c.sourceNodeId === sourceId &&
      c.targetNodeId === targetId &&
      (type === undefined || c.connectionType === type)
    );
  }

  /**
   * Record a read of a node. Returns false for an unknown id.
   */
  touch(id: string, now: Date = new Date()): boolean {
    const node = this.nodes.get(id);
    if (!node) return false;
    node.accessCount += 1;
    node.lastAccessedAt = now.toISOString();
    return true;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // QUERIES
  // ─────────────────────────────────────────────────────────────────────────────

  get size(): number {
    return this.nodes.size;
  }

  get connectionCount(): number {
    return this.connections.length;
  }

  getNode(id: string): MemoryNode | undefined {
    return this.nodes.get(id);
  }

  /** All nodes in timeline order. */
  allNodes(): MemoryNode[] {
    return this.resolve(this.timeline);
  }

  getTimeline(): readonly string[] {
    return this.timeline;
  }

  getTopics(): ReadonlyMap<string, readonly string[]> {
    return this.topics;
  }

  getConnections(): readonly KnowledgeConnection[] {
    return this.connections;
  }

  getNodesByTopic(topic: string): MemoryNode[] {
    return this.resolve(this.topics.get(topic.toLowerCase()) ?? []);
  }

  /** Targets of the node's outgoing edges, in the order they were added. */
  getConnectedNodes(id: string): MemoryNode[] {
    return this.resolve(this.nodes.get(id)?.connections ?? []);
  }

  /**
   * Case-insensitive literal substring match of the whole query against
   * title, content, summary and each keyword.
   */
  searchNodes(query: string): MemoryNode[] {
    const needle = query.toLowerCase();
    if (!needle) return [];

    return this.allNodes().filter(node =>
      node.title.toLowerCase().includes(needle) ||
      node.content.toLowerCase().includes(needle) ||
      node.summary.toLowerCase().includes(needle) ||
      node.keywords.some(k => k.toLowerCase().includes(needle))
    );
  }

  private resolve(ids: readonly string[]): MemoryNode[] {
    const result: MemoryNode[] = [];
    for (const id of ids) {
      const node = this.nodes.get(id);
      if (node) result.push(node);
    }
    return result;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // SNAPSHOTS
  // ─────────────────────────────────────────────────────────────────────────────

  toSnapshot(): GraphSnapshot {
    return {
      nodes: this.allNodes().map(node => ({
        ...node,
        keywords: [...node.keywords],
        sourceMessageIds: [...node.sourceMessageIds],
        connections: [...node.connections],
      })),
      connections: this.connections.map(c => ({ ...c })),
      topics: [...this.topics.entries()].map(([topic, ids]): [string, string[]] => [topic, [...ids]]),
      timeline: [...this.timeline],
    };
  }

  /**
   * Rebuild a graph from a decoded snapshot. Throws GraphInvariantError when
   * the snapshot does not describe a consistent graph.
   */
  static fromSnapshot(snapshot: GraphSnapshot): KnowledgeGraph {
    const graph = new KnowledgeGraph();
    const byId = new Map(snapshot.nodes.map(node => [node.id, node]));

    if (byId.size !== snapshot.nodes.length) {
      throw new GraphInvariantError('Snapshot contains duplicate node ids');
    }
    if (new Set(snapshot.timeline).size !== snapshot.timeline.length) {
      throw new GraphInvariantError('Snapshot timeline contains duplicates');
    }
    if (snapshot.timeline.length !== byId.size) {
      throw new GraphInvariantError('Snapshot timeline does not cover every node');
    }

    for (const id of snapshot.timeline) {
      const node = byId.get(id);
      if (!node) {
        throw new GraphInvariantError(`Snapshot timeline references unknown node ${id}`);
      }
      graph.nodes.set(id, { ...node, connections: [] });
      graph.timeline.push(id);
    }

    for (const [topic, ids] of snapshot.topics) {
      if (graph.topics.has(topic)) {
        throw new GraphInvariantError(`Snapshot lists topic "${topic}" twice`);
      }
      for (const id of ids) {
        if (!graph.nodes.has(id)) {
          throw new GraphInvariantError(`Topic "${topic}" references unknown node ${id}`);
        }
      }
      graph.topics.set(topic, [...ids]);
    }

    for (const edge of snapshot.connections) {
      graph.addConnection({ ...edge });
    }

    for (const node of snapshot.nodes) {
      const rebuilt = graph.nodes.get(node.id);
      const expected = new Set(node.connections);
      if (
        !rebuilt ||
        rebuilt.connections.length !== expected.size ||
        rebuilt.connections.some(id => !expected.has(id))
      ) {
        throw new GraphInvariantError(`Adjacency of node ${node.id} does not match its edges`);
      }
    }

    return graph;
  }
}
