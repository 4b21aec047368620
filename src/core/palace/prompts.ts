// ═══════════════════════════════════════════════════════════════════════════════
// PROMPTS — Completion Requests for Extraction and Discovery
// ═══════════════════════════════════════════════════════════════════════════════

import type { MemoryNode } from './types.js';

export const EXTRACTION_SYSTEM_PROMPT =
  'You are an expert at extracting and organizing knowledge from conversations. ' +
  'Extract meaningful insights that would be valuable to remember later.';

export const DISCOVERY_SYSTEM_PROMPT =
  'You analyze relationships between knowledge concepts. ' +
  'Only identify meaningful, non-trivial connections.';

export function buildExtractionPrompt(conversationText: string): string {
  return `Analyze this conversation and extract key insights, facts, ideas, and important information that should be remembered. For each insight, provide:
1. A clear title
2. The main content/insight
3. A brief summary
4. 3-5 relevant keywords
5. The type (insight, fact, idea, question, solution, pattern)
6. Importance score (0.0-1.0)

Conversation:
${conversationText}

Respond with JSON array:
[{"title": "...", "content": "...", "summary": "...", "keywords": ["..."], "type": "insight", "importance": 0.8}]`;
}

export function buildDiscoveryPrompt(
  node: Pick<MemoryNode, 'title' | 'summary'>,
  other: Pick<MemoryNode, 'title' | 'summary'>
): string {
  return `Analyze these two knowledge nodes and determine if there's a meaningful connection:

Node 1: "${node.title}" - ${node.summary}
Node 2: "${other.title}" - ${other.summary}

If connected, respond with JSON:
{"connected": true, "type": "similar|causal|contradictory|elaborative|temporal|thematic", "strength": 0.0-1.0, "description": "explanation"}

If not connected:
{"connected": false}`;
}
