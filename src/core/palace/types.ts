// ═══════════════════════════════════════════════════════════════════════════════
// MEMORY PALACE TYPES — Nodes, Connections, Conversations
// ═══════════════════════════════════════════════════════════════════════════════
//
// The palace turns conversations into knowledge units (nodes) and links them
// with directed, typed, weighted edges (connections).
//
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// ENUMERATIONS
// ─────────────────────────────────────────────────────────────────────────────────

export const MEMORY_NODE_TYPES = [
  'insight',
  'fact',
  'idea',
  'question',
  'solution',
  'pattern',
  'connection',
] as const;

export type MemoryNodeType = (typeof MEMORY_NODE_TYPES)[number];

export const CONNECTION_TYPES = [
  'similar',        // Similar concepts
  'causal',         // Cause and effect
  'contradictory',  // Opposing views
  'elaborative',    // Builds upon
  'temporal',       // Time-related
  'thematic',       // Same theme
] as const;

export type ConnectionType = (typeof CONNECTION_TYPES)[number];

export function isMemoryNodeType(value: string): value is MemoryNodeType {
  return MEMORY_NODE_TYPES.some(type => type === value);
}

// ─────────────────────────────────────────────────────────────────────────────────
// NODES & CONNECTIONS
// ─────────────────────────────────────────────────────────────────────────────────

export interface MemoryNode {
  id: string;

  // Content
  title: string;
  content: string;
  summary: string;
  keywords: string[];    // Lowercase, deduplicated, insertion-ordered

  // Provenance (non-owning)
  sourceConversationId: string;
  sourceMessageIds: string[];

  // Lifecycle
  createdAt: string;
  lastAccessedAt: string;
  accessCount: number;

  importance: number;    // 0-1
  nodeType: MemoryNodeType;

  /** Target ids of every connection whose source is this node */
  connections: string[];

  /** Reserved for semantic scoring; never populated */
  embedding?: number[];
}

export interface KnowledgeConnection {
  id: string;
  sourceNodeId: string;
  targetNodeId: string;
  connectionType: ConnectionType;
  strength: number;      // 0-1
  description: string;
  createdAt: string;
}

// ─────────────────────────────────────────────────────────────────────────────────
// CONVERSATION INPUT
// ─────────────────────────────────────────────────────────────────────────────────

export interface ChatMessage {
  id: string;
  role: 'user' | 'assistant';
  text: string;
  timestamp?: string;
}

export interface Conversation {
  id: string;
  title?: string;
  messages: ChatMessage[];
}

export interface NodeProvenance {
  conversationId: string;
  messageIds: string[];
}

// ─────────────────────────────────────────────────────────────────────────────────
// EXTRACTION
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Insight proposed by the completion service, not yet promoted to a node.
 * `type` is free text; unknown values become 'insight'.
 */
export interface InsightCandidate {
  title: string;
  content: string;
  summary: string;
  keywords: string[];
  type: string;
  importance: number;
}

// ─────────────────────────────────────────────────────────────────────────────────
// STATS
// ─────────────────────────────────────────────────────────────────────────────────

export interface PalaceStats {
  totalNodes: number;
  totalConnections: number;
  totalTopics: number;
  indexedDocuments: number;
  indexedTerms: number;
  byNodeType: Record<MemoryNodeType, number>;
  byConnectionType: Record<ConnectionType, number>;
  oldestNode?: string;
  newestNode?: string;
}
