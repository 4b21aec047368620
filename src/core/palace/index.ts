// ═══════════════════════════════════════════════════════════════════════════════
// MEMORY PALACE MODULE — Knowledge Graph and Recall
// ═══════════════════════════════════════════════════════════════════════════════
//
// Usage:
//   import { createMemoryPalace } from './core/palace/index.js';
//
//   const palace = await createMemoryPalace();
//   await palace.ingestConversation(conversation);
//   const nodes = await palace.recall('rust');
//
// ═══════════════════════════════════════════════════════════════════════════════

// Types
export type {
  MemoryNodeType,
  ConnectionType,
  MemoryNode,
  KnowledgeConnection,
  ChatMessage,
  Conversation,
  NodeProvenance,
  InsightCandidate,
  PalaceStats,
} from './types.js';
export { MEMORY_NODE_TYPES, CONNECTION_TYPES, isMemoryNodeType } from './types.js';

// Errors
export type {
  ParseError,
  ParseErrorCode,
  ExtractionError,
  ExtractionErrorCode,
  DiscoveryError,
  PersistenceError,
  PersistenceErrorCode,
} from './errors.js';
export { GraphInvariantError } from './errors.js';

// Building blocks
export { Tokenizer, splitQuery, MIN_TOKEN_LENGTH } from './tokenizer.js';
export { createNode, createConnection, cloneNode, normalizeKeywords } from './nodes.js';
export { KnowledgeGraph } from './graph.js';
export { SearchIndex } from './search-index.js';
export { stripCodeFences, parseCompletionJson } from './parsing.js';
export { InsightExtractor, conversationToText, type ExtractOptions } from './extractor.js';
export {
  ConnectionDiscoverer,
  selectAll,
  selectRecent,
  selectorForConfig,
  type CandidateSelector,
  type DiscoverOptions,
} from './discoverer.js';
export { RecallEngine, relevanceScore } from './recall.js';
export {
  PalacePersistence,
  type LoadIssue,
  type LoadedPalace,
} from './persistence.js';
export type { GraphSnapshot, SearchIndexSnapshot } from './schemas.js';

// Orchestration
export {
  MemoryPalaceManager,
  type MemoryPalaceDeps,
  type IngestOptions,
  type IngestionResult,
} from './manager.js';
export { createMemoryPalace, type CreateMemoryPalaceOptions } from './factory.js';
