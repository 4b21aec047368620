// ═══════════════════════════════════════════════════════════════════════════════
// NODE CREATION — Promote Insight Candidates to Memory Nodes
// ═══════════════════════════════════════════════════════════════════════════════

import { v4 as uuidv4 } from 'uuid';

import {
  isMemoryNodeType,
  type InsightCandidate,
  type KnowledgeConnection,
  type MemoryNode,
  type MemoryNodeType,
  type NodeProvenance,
  type ConnectionType,
} from './types.js';

export function resolveNodeType(type: string): MemoryNodeType {
  const normalized = type.trim().toLowerCase();
  return isMemoryNodeType(normalized) ? normalized : 'insight';
}

/**
 * Lowercase and trim; drop empties and repeats, keeping first occurrence order.
 */
export function normalizeKeywords(keywords: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];

  for (const keyword of keywords) {
    const normalized = keyword.trim().toLowerCase();
    if (!normalized || seen.has(normalized)) continue;
    seen.add(normalized);
    result.push(normalized);
  }

  return result;
}

export function clampUnit(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

export function createNode(
  candidate: InsightCandidate,
  provenance: NodeProvenance,
  now: Date = new Date()
): MemoryNode {
  const timestamp = now.toISOString();

  return {
    id: uuidv4(),
    title: candidate.title,
    content: candidate.content,
    summary: candidate.summary,
    keywords: normalizeKeywords(candidate.keywords),
    sourceConversationId: provenance.conversationId,
    sourceMessageIds: [...provenance.messageIds],
    createdAt: timestamp,
    lastAccessedAt: timestamp,
    accessCount: 0,
    importance: clampUnit(candidate.importance),
    nodeType: resolveNodeType(candidate.type),
    connections: [],
  };
}

export function createConnection(
  sourceNodeId: string,
  targetNodeId: string,
  connectionType: ConnectionType,
  strength: number,
  description: string,
  now: Date = new Date()
): KnowledgeConnection {
  return {
    id: uuidv4(),
    sourceNodeId,
    targetNodeId,
    connectionType,
    strength: clampUnit(strength),
    description,
    createdAt: now.toISOString(),
  };
}

/**
 * Detached copy; mutating it never touches the graph's record.
 */
export function cloneNode(node: MemoryNode): MemoryNode {
  return {
    ...node,
    keywords: [...node.keywords],
    sourceMessageIds: [...node.sourceMessageIds],
    connections: [...node.connections],
    ...(node.embedding ? { embedding: [...node.embedding] } : {}),
  };
}
