// ═══════════════════════════════════════════════════════════════════════════════
// TEST HELPERS — Scripted Completion Client and Fixtures
// ═══════════════════════════════════════════════════════════════════════════════

import { resolveConfig, type PalaceConfig, type PalaceConfigInput } from '../config/index.js';
import { DISCOVERY_SYSTEM_PROMPT, EXTRACTION_SYSTEM_PROMPT } from '../core/palace/prompts.js';
import type { InsightCandidate, MemoryNode } from '../core/palace/types.js';
import type {
  CompletionClient,
  CompletionError,
  CompletionErrorCode,
  CompletionRequest,
} from '../providers/index.js';
import { err, ok, type Result } from '../types/result.js';

type ScriptedReply = string | Result<string, CompletionError>;
type Responder = (request: CompletionRequest) => ScriptedReply | Promise<ScriptedReply>;

/**
 * In-process completion client. Every request is recorded; replies come from
 * the responder.
 */
export class ScriptedCompletionClient implements CompletionClient {
  readonly requests: CompletionRequest[] = [];

  constructor(private readonly responder: Responder) {}

  async complete(request: CompletionRequest): Promise<Result<string, CompletionError>> {
    this.requests.push(request);
    const reply = await this.responder(request);
    return typeof reply === 'string' ? ok(reply) : reply;
  }

  get extractionRequests(): CompletionRequest[] {
    return this.requests.filter(r => r.systemPrompt === EXTRACTION_SYSTEM_PROMPT);
  }

  get discoveryRequests(): CompletionRequest[] {
    return this.requests.filter(r => r.systemPrompt === DISCOVERY_SYSTEM_PROMPT);
  }
}

export function completionFailure(
  code: CompletionErrorCode,
  message: string
): Result<string, CompletionError> {
  return err({ code, message });
}

export interface PalaceScript {
  /** Reply to extraction requests, in call order; the last entry repeats */
  extraction: ScriptedReply[];
  /** Reply to a discovery request given its prompt text */
  discovery?: (prompt: string) => ScriptedReply | Promise<ScriptedReply>;
}

export function scriptedPalaceClient(script: PalaceScript): ScriptedCompletionClient {
  let extractionCalls = 0;
  return new ScriptedCompletionClient(request => {
    const prompt = request.messages[0]?.text ?? '';
    if (request.systemPrompt === EXTRACTION_SYSTEM_PROMPT) {
      const index = Math.min(extractionCalls, script.extraction.length - 1);
      extractionCalls += 1;
      return script.extraction[index] ?? '[]';
    }
    return script.discovery ? script.discovery(prompt) : '{"connected": false}';
  });
}

export function insightJson(...candidates: Array<Partial<InsightCandidate>>): string {
  return JSON.stringify(candidates.map(c => candidate(c)));
}

export function candidate(overrides: Partial<InsightCandidate> = {}): InsightCandidate {
  return {
    title: 'Untitled',
    content: 'No content',
    summary: 'No summary',
    keywords: [],
    type: 'insight',
    importance: 0.5,
    ...overrides,
  };
}

export function makeNode(overrides: Partial<MemoryNode> = {}): MemoryNode {
  return {
    id: 'node-1',
    title: 'Title',
    content: 'Content',
    summary: 'Summary',
    keywords: [],
    sourceConversationId: 'conv-1',
    sourceMessageIds: ['msg-1'],
    createdAt: '2026-01-01T00:00:00.000Z',
    lastAccessedAt: '2026-01-01T00:00:00.000Z',
    accessCount: 0,
    importance: 0.5,
    nodeType: 'insight',
    connections: [],
    ...overrides,
  };
}

/**
 * Config from defaults plus overrides, ignoring the process environment.
 */
export function testConfig(overrides: PalaceConfigInput = {}): PalaceConfig {
  return resolveConfig({ environment: 'test', ...overrides }, {});
}
