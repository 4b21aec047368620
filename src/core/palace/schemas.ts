// ═══════════════════════════════════════════════════════════════════════════════
// PALACE SCHEMAS — Validation for Completion Output and Snapshots
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';

import { CONNECTION_TYPES, MEMORY_NODE_TYPES } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// COMPLETION OUTPUT
// ─────────────────────────────────────────────────────────────────────────────────

export const InsightCandidateSchema = z.object({
  title: z.string(),
  content: z.string(),
  summary: z.string(),
  keywords: z.array(z.string()),
  type: z.string(),
  importance: z.number().finite(),
});

export const InsightCandidateListSchema = z.array(InsightCandidateSchema);

/**
 * `{connected:false}` needs nothing else; a positive verdict needs every
 * field, with a known type and a strength in [0,1].
 */
export const ConnectionVerdictSchema = z.discriminatedUnion('connected', [
  z.object({ connected: z.literal(false) }),
  z.object({
    connected: z.literal(true),
    type: z.enum(CONNECTION_TYPES),
    strength: z.number().min(0).max(1),
    description: z.string(),
  }),
]);

// ─────────────────────────────────────────────────────────────────────────────────
// SNAPSHOTS
// ─────────────────────────────────────────────────────────────────────────────────

export const SNAPSHOT_VERSION = 1;

const IsoDateSchema = z.string().datetime();

export const MemoryNodeSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  content: z.string(),
  summary: z.string(),
  keywords: z.array(z.string()),
  sourceConversationId: z.string(),
  sourceMessageIds: z.array(z.string()),
  createdAt: IsoDateSchema,
  lastAccessedAt: IsoDateSchema,
  accessCount: z.number().int().nonnegative(),
  importance: z.number().min(0).max(1),
  nodeType: z.enum(MEMORY_NODE_TYPES),
  connections: z.array(z.string()),
  embedding: z.array(z.number()).optional(),
});

export const KnowledgeConnectionSchema = z.object({
  id: z.string().min(1),
  sourceNodeId: z.string().min(1),
  targetNodeId: z.string().min(1),
  connectionType: z.enum(CONNECTION_TYPES),
  strength: z.number().min(0).max(1),
  description: z.string(),
  createdAt: IsoDateSchema,
});

export const GraphSnapshotSchema = z.object({
  nodes: z.array(MemoryNodeSchema),
  connections: z.array(KnowledgeConnectionSchema),
  // Map entries rather than objects: keywords and terms are arbitrary strings.
  topics: z.array(z.tuple([z.string(), z.array(z.string())])),
  timeline: z.array(z.string()),
});

export const SearchIndexSnapshotSchema = z.object({
  termFrequency: z.array(
    z.tuple([z.string(), z.array(z.tuple([z.string(), z.number().int().positive()]))])
  ),
  documentFrequency: z.array(z.tuple([z.string(), z.number().int().nonnegative()])),
  nodeWordCounts: z.array(z.tuple([z.string(), z.number().int().nonnegative()])),
  totalDocuments: z.number().int().nonnegative(),
});

export function envelopeSchema<T extends z.ZodTypeAny>(data: T) {
  return z.object({
    version: z.literal(SNAPSHOT_VERSION),
    savedAt: IsoDateSchema,
    data,
  });
}

export type GraphSnapshot = z.infer<typeof GraphSnapshotSchema>;
export type SearchIndexSnapshot = z.infer<typeof SearchIndexSnapshotSchema>;
