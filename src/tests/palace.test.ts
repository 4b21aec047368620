// ═══════════════════════════════════════════════════════════════════════════════
// MEMORY PALACE TESTS — Ingestion, Recall, Read API, Persistence
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, beforeEach } from 'vitest';
import {
  MemoryPalaceManager,
  createMemoryPalace,
  type ChatMessage,
  type Conversation,
  type CandidateSelector,
} from '../core/palace/index.js';
import type { PalaceConfigInput } from '../config/index.js';
import { MemoryStore } from '../storage/index.js';
import {
  completionFailure,
  insightJson,
  scriptedPalaceClient,
  testConfig,
  type PalaceScript,
  type ScriptedCompletionClient,
} from './helpers.js';

const CONNECTED = JSON.stringify({
  connected: true,
  type: 'elaborative',
  strength: 0.6,
  description: 'B extends A',
});

function conversation(id: string, ...texts: string[]): Conversation {
  return {
    id,
    messages: texts.map((text, i): ChatMessage => ({
      id: `${id}-m${i}`,
      role: i % 2 === 0 ? 'user' : 'assistant',
      text,
    })),
  };
}

class FailingStore extends MemoryStore {
  override async set(): Promise<void> {
    throw new Error('disk full');
  }
}

describe('MemoryPalaceManager', () => {
  let store: MemoryStore;
  let client: ScriptedCompletionClient;

  function palace(
    script: PalaceScript,
    config: PalaceConfigInput = {},
    selector?: CandidateSelector
  ): MemoryPalaceManager {
    client = scriptedPalaceClient(script);
    return new MemoryPalaceManager({ completion: client, store, config: testConfig(config), selector });
  }

  beforeEach(() => {
    store = new MemoryStore();
  });

  // ─────────────────────────────────────────────────────────────────────────────
  // INGESTION
  // ─────────────────────────────────────────────────────────────────────────────

  describe('ingestConversation', () => {
    it('should turn one insight into one indexed node', async () => {
      const manager = palace({
        extraction: [insightJson({
          title: 'Use rust for indexing',
          keywords: ['rust', 'index'],
          type: 'idea',
          importance: 0.8,
        })],
      });

      const result = await manager.ingestConversation(conversation('c1', 'Should we use rust?', 'Yes, for the index.'));

      expect(result.nodes).toHaveLength(1);
      expect(result.saved).toBe(true);
      const [node] = await manager.getAllNodes();
      expect(node?.nodeType).toBe('idea');
      expect(node?.sourceConversationId).toBe('c1');
      expect(node?.sourceMessageIds).toEqual(['c1-m0', 'c1-m1']);
      expect((await manager.getNodesByTopic('rust')).map(n => n.id)).toEqual([node?.id]);
      expect((await manager.getNodesByTopic('index')).map(n => n.id)).toEqual([node?.id]);
      expect((await manager.getStats()).indexedDocuments).toBe(1);
    });

    it('should send the joined conversation text to extraction', async () => {
      const manager = palace({ extraction: ['[]'] });

      await manager.ingestConversation(conversation('c1', 'first line', 'second line'));

      expect(client.extractionRequests[0]?.messages[0]?.text).toContain('first line\nsecond line');
    });

    it('should connect a new node to an existing one', async () => {
      const manager = palace({
        extraction: [
          insightJson({ title: 'Tree indexes', summary: 'B-trees for lookups', keywords: ['btree'] }),
          insightJson({ title: 'Use rust for indexing', summary: 'Rust index', keywords: ['rust'] }),
        ],
        discovery: () => CONNECTED,
      });

      await manager.ingestConversation(conversation('c1', 'about trees'));
      const second = await manager.ingestConversation(conversation('c2', 'about rust'));

      const [b, a] = await manager.getAllNodes();
      expect(second.connections).toHaveLength(1);
      expect(second.connections[0]).toMatchObject({
        sourceNodeId: a?.id,
        targetNodeId: b?.id,
        connectionType: 'elaborative',
        strength: 0.6,
      });
      expect(a?.connections).toEqual([b?.id]);
      expect(b?.connections).toEqual([]);
      expect((await manager.getConnectedNodes(a?.id ?? '')).map(n => n.id)).toEqual([b?.id]);
    });

    it('should not compare the first node with anything', async () => {
      const manager = palace({ extraction: [insightJson({ title: 'Only' })], discovery: () => CONNECTED });

      await manager.ingestConversation(conversation('c1', 'text'));

      expect(client.discoveryRequests).toHaveLength(0);
      expect(await manager.getConnections()).toEqual([]);
    });

    it('should compare later candidates with earlier ones from the same conversation', async () => {
      const manager = palace({
        extraction: [insightJson({ title: 'One' }, { title: 'Two' }, { title: 'Three' })],
        discovery: () => '{"connected": false}',
      });

      await manager.ingestConversation(conversation('c1', 'text'));

      // 0 + 1 + 2 comparisons
      expect(client.discoveryRequests).toHaveLength(3);
    });

    it('should use an injected candidate selector', async () => {
      const none: CandidateSelector = () => [];
      const manager = palace(
        { extraction: [insightJson({ title: 'One' }, { title: 'Two' })], discovery: () => CONNECTED },
        {},
        none
      );

      await manager.ingestConversation(conversation('c1', 'text'));

      expect(client.discoveryRequests).toHaveLength(0);
    });

    it('should do nothing for an empty conversation', async () => {
      const manager = palace({ extraction: [insightJson({ title: 'x' })] });

      const result = await manager.ingestConversation({ id: 'empty', messages: [] });

      expect(result).toEqual({ nodes: [], connections: [], cancelled: false });
      expect(client.requests).toHaveLength(0);
      expect(await store.get('memory-palace:graph')).toBeNull();
    });

    it('should record an extraction failure and commit nothing', async () => {
      const manager = palace({ extraction: ['not json at all'] });

      const result = await manager.ingestConversation(conversation('c1', 'text'));

      expect(result.nodes).toEqual([]);
      expect(result.extractionError?.code).toBe('INVALID_JSON');
      expect(result.saved).toBeUndefined();
      expect(manager.lastError).toMatch(/^Failed to process conversation: /);
      expect(await store.get('memory-palace:graph')).toBeNull();
    });

    it('should record a client that throws during extraction', async () => {
      const manager = new MemoryPalaceManager({
        completion: {
          complete: async () => {
            throw new Error('socket hang up');
          },
        },
        store,
        config: testConfig(),
      });

      const result = await manager.ingestConversation(conversation('c1', 'text'));

      expect(result.nodes).toEqual([]);
      expect(result.extractionError?.code).toBe('COMPLETION_FAILED');
      expect(manager.lastError).toBe('Failed to process conversation: socket hang up');
    });

    it('should commit every insight when discovery throws for one pair', async () => {
      let discoveryCalls = 0;
      const manager = palace({
        extraction: [insightJson({ title: 'A' }, { title: 'B' }, { title: 'C' })],
        discovery: () => {
          discoveryCalls += 1;
          if (discoveryCalls === 1) throw new Error('socket hang up');
          return CONNECTED;
        },
      });

      const result = await manager.ingestConversation(conversation('c1', 'text'));

      // B's only comparison threw; C connects to both A and B.
      expect(result.nodes.map(n => n.title)).toEqual(['A', 'B', 'C']);
      expect(result.connections).toHaveLength(2);
      expect(result.saved).toBe(true);
      expect(manager.lastError).toBeNull();
      expect(await store.get('memory-palace:graph')).not.toBeNull();
    });

    it('should clear the last error on the next ingestion', async () => {
      const manager = palace({
        extraction: [completionFailure('COMPLETION_FAILED', 'HTTP 502'), '[]'],
      });

      await manager.ingestConversation(conversation('c1', 'text'));
      expect(manager.lastError).toBe('Failed to process conversation: HTTP 502');

      await manager.ingestConversation(conversation('c2', 'text'));
      expect(manager.lastError).toBeNull();
    });

    it('should report processing only while ingesting', async () => {
      let seen: boolean | undefined;
      const inner = scriptedPalaceClient({ extraction: ['[]'] });
      const manager: MemoryPalaceManager = new MemoryPalaceManager({
        completion: {
          complete: async request => {
            seen = manager.isProcessing;
            return inner.complete(request);
          },
        },
        store,
        config: testConfig(),
      });

      expect(manager.isProcessing).toBe(false);
      await manager.ingestConversation(conversation('c1', 'text'));

      expect(seen).toBe(true);
      expect(manager.isProcessing).toBe(false);
    });

    it('should commit nothing further once cancelled', async () => {
      const controller = new AbortController();
      const manager = palace({
        extraction: [insightJson({ title: 'One' }, { title: 'Two' })],
        discovery: () => {
          controller.abort();
          return CONNECTED;
        },
      });

      const result = await manager.ingestConversation(conversation('c1', 'text'), {
        signal: controller.signal,
      });

      // "One" had no candidates and committed before the abort; "Two" did not.
      expect(result.cancelled).toBe(true);
      expect(result.nodes.map(n => n.title)).toEqual(['One']);
      expect(result.connections).toEqual([]);
      expect((await manager.getAllNodes()).map(n => n.title)).toEqual(['One']);
      expect(result.saved).toBe(true);
    });

    it('should treat a cancelled extraction as cancellation, not failure', async () => {
      const controller = new AbortController();
      controller.abort();
      const manager = palace({
        extraction: [completionFailure('COMPLETION_CANCELLED', 'Request cancelled before sending')],
      });

      const result = await manager.ingestConversation(conversation('c1', 'text'), {
        signal: controller.signal,
      });

      expect(result.cancelled).toBe(true);
      expect(manager.lastError).toBeNull();
    });

    it('should serialize concurrent ingestions', async () => {
      const manager = palace({
        extraction: [insightJson({ title: 'First' }), insightJson({ title: 'Second' })],
        discovery: () => '{"connected": false}',
      });

      await Promise.all([
        manager.ingestConversation(conversation('c1', 'one')),
        manager.ingestConversation(conversation('c2', 'two')),
      ]);

      expect((await manager.getAllNodes()).map(n => n.title)).toEqual(['First', 'Second']);
      expect(client.discoveryRequests).toHaveLength(1);
    });

    it('should hide a node from recall until its edges are committed', async () => {
      let release: () => void = () => {};
      const gate = new Promise<void>(resolve => {
        release = resolve;
      });
      const manager = palace({
        extraction: [insightJson({ title: 'rust one', keywords: ['rust'] }, { title: 'rust two', keywords: ['rust'] })],
        discovery: async () => {
          await gate;
          return CONNECTED;
        },
      });

      const ingesting = manager.ingestConversation(conversation('c1', 'text'));

      // Wait until discovery for the second node is in flight.
      while (client.discoveryRequests.length === 0) {
        await new Promise(resolve => setTimeout(resolve, 1));
      }
      const duringDiscovery = (await manager.recall('rust')).map(n => n.title);
      release();
      await ingesting;

      expect(duringDiscovery).toEqual(['rust one']);
      expect((await manager.getAllNodes()).map(n => n.connections.length)).toEqual([0, 1]);
    });

    it('should report a failed save', async () => {
      store = new FailingStore();
      const manager = palace({ extraction: [insightJson({ title: 'x' })] });

      const result = await manager.ingestConversation(conversation('c1', 'text'));

      expect(result.nodes).toHaveLength(1);
      expect(result.saved).toBe(false);
      expect(manager.lastError).toBe('Failed to save memory palace: disk full');
      expect(await manager.getAllNodes()).toHaveLength(1);
    });
  });

  describe('close', () => {
    it('should release the store once the running ingestion finishes', async () => {
      const order: string[] = [];
      store.disconnect = async () => {
        order.push('disconnect');
      };
      const manager = palace({
        extraction: [insightJson({ title: 'A' }, { title: 'B' })],
        discovery: () => {
          order.push('discovery');
          return '{"connected": false}';
        },
      });

      const ingesting = manager.ingestConversation(conversation('c1', 'text'));
      await manager.close();
      await ingesting;

      expect(order).toEqual(['discovery', 'disconnect']);
    });
  });

  // ─────────────────────────────────────────────────────────────────────────────
  // RECALL
  // ─────────────────────────────────────────────────────────────────────────────

  describe('recall', () => {
    async function seeded(config: PalaceConfigInput = {}): Promise<MemoryPalaceManager> {
      const manager = palace({
        extraction: [insightJson(
          { title: 'Use rust for indexing', keywords: ['rust', 'index'], importance: 0.8 },
          { title: 'Gardening calendar', content: 'Plant in spring', keywords: ['garden'], importance: 1 }
        )],
      }, config);
      await manager.ingestConversation(conversation('c1', 'text'));
      return manager;
    }

    it('should rank the rust node first and leave the other out', async () => {
      const manager = await seeded();

      const results = await manager.recall('rust');

      expect(results.map(n => n.title)).toEqual(['Use rust for indexing']);
    });

    it('should count accesses on returned nodes', async () => {
      const manager = await seeded();

      const [first] = await manager.recall('rust');
      expect(first?.accessCount).toBe(0);

      const [node] = await manager.getNodesByTopic('rust');
      expect(node?.accessCount).toBe(1);
      const [other] = await manager.getNodesByTopic('garden');
      expect(other?.accessCount).toBe(0);
    });

    it('should persist access counts', async () => {
      const manager = await seeded();
      await manager.recall('rust');

      const reloaded = palace({ extraction: ['[]'] });
      await reloaded.load();

      const [node] = await reloaded.getNodesByTopic('rust');
      expect(node?.accessCount).toBe(1);
    });

    it('should leave nodes untouched when access tracking is off', async () => {
      const manager = await seeded({ recall: { trackAccess: false } });

      await manager.recall('rust');

      const [node] = await manager.getNodesByTopic('rust');
      expect(node?.accessCount).toBe(0);
    });

    it('should return nothing for a blank query', async () => {
      const manager = await seeded();
      expect(await manager.recall('  ')).toEqual([]);
    });
  });

  // ─────────────────────────────────────────────────────────────────────────────
  // READ API
  // ─────────────────────────────────────────────────────────────────────────────

  describe('read API', () => {
    let manager: MemoryPalaceManager;

    beforeEach(async () => {
      manager = palace({
        extraction: [insightJson(
          { title: 'One', keywords: ['alpha'], type: 'fact' },
          { title: 'Two', keywords: ['alpha', 'beta'], type: 'idea' },
          { title: 'Three', keywords: ['beta'], type: 'fact' }
        )],
        discovery: prompt => (prompt.includes('Node 2: "One"') ? CONNECTED : '{"connected": false}'),
      });
      await manager.ingestConversation(conversation('c1', 'text'));
    });

    it('should list recent nodes newest first', async () => {
      expect((await manager.getRecentNodes()).map(n => n.title)).toEqual(['Three', 'Two', 'One']);
      expect((await manager.getRecentNodes(2)).map(n => n.title)).toEqual(['Three', 'Two']);
      expect(await manager.getRecentNodes(0)).toEqual([]);
    });

    it('should filter by type', async () => {
      expect((await manager.getNodesByType('fact')).map(n => n.title)).toEqual(['One', 'Three']);
      expect(await manager.getNodesByType('question')).toEqual([]);
    });

    it('should group topic clusters', async () => {
      const clusters = await manager.getTopicClusters();
      expect([...clusters.keys()]).toEqual(['alpha', 'beta']);
      expect(clusters.get('beta')?.map(n => n.title)).toEqual(['Two', 'Three']);
    });

    it('should summarize the palace', async () => {
      const stats = await manager.getStats();

      expect(stats.totalNodes).toBe(3);
      expect(stats.totalConnections).toBe(2);
      expect(stats.totalTopics).toBe(2);
      expect(stats.indexedDocuments).toBe(3);
      expect(stats.byNodeType.fact).toBe(2);
      expect(stats.byNodeType.idea).toBe(1);
      expect(stats.byConnectionType.elaborative).toBe(2);
      expect(stats.oldestNode).toBeDefined();
    });

    it('should hand out copies', async () => {
      const [node] = await manager.getAllNodes();
      node?.keywords.push('tampered');
      if (node) node.accessCount = 99;

      const fresh = await manager.getNode(node?.id ?? '');
      expect(fresh?.keywords).toEqual(['alpha']);
      expect(fresh?.accessCount).toBe(0);
    });

    it('should return undefined for an unknown id', async () => {
      expect(await manager.getNode('ghost')).toBeUndefined();
    });
  });

  // ─────────────────────────────────────────────────────────────────────────────
  // PERSISTENCE
  // ─────────────────────────────────────────────────────────────────────────────

  describe('persistence', () => {
    it('should restore nodes, edges and index from the store', async () => {
      const manager = palace({
        extraction: [insightJson({ title: 'Tree indexes', keywords: ['btree'] }, { title: 'Rust indexing', keywords: ['rust'] })],
        discovery: () => CONNECTED,
      });
      await manager.ingestConversation(conversation('c1', 'text'));

      const restored = palace({ extraction: ['[]'] });
      const issues = await restored.load();

      expect(issues).toEqual([]);
      expect(await restored.getAllNodes()).toEqual(await manager.getAllNodes());
      expect(await restored.getConnections()).toEqual(await manager.getConnections());
      expect(await restored.getStats()).toEqual(await manager.getStats());
      expect((await restored.recall('rust')).map(n => n.title)).toEqual(['Rust indexing']);
    });

    it('should start empty when nothing is saved', async () => {
      const manager = palace({ extraction: ['[]'] });

      const issues = await manager.load();

      expect(issues.map(i => i.reason)).toEqual(['MISSING', 'MISSING']);
      expect(await manager.getAllNodes()).toEqual([]);
    });

    it('should honour the configured key prefix', async () => {
      const manager = palace({ extraction: [insightJson({ title: 'x' })] }, { storage: { keyPrefix: 'palace-test' } });

      await manager.ingestConversation(conversation('c1', 'text'));

      expect(await store.get('palace-test:graph')).not.toBeNull();
      expect(await store.get('palace-test:search-index')).not.toBeNull();
      expect(await store.get('memory-palace:graph')).toBeNull();
    });
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// FACTORY
// ─────────────────────────────────────────────────────────────────────────────────

describe('createMemoryPalace', () => {
  it('should build a manager and load saved state', async () => {
    const store = new MemoryStore();
    const config: PalaceConfigInput = { environment: 'test', logLevel: 'fatal' };
    const first = await createMemoryPalace({
      config,
      env: {},
      store,
      completion: scriptedPalaceClient({ extraction: [insightJson({ title: 'Saved insight' })] }),
    });
    await first.ingestConversation(conversation('c1', 'text'));

    const second = await createMemoryPalace({
      config,
      env: {},
      store,
      completion: scriptedPalaceClient({ extraction: ['[]'] }),
    });

    expect((await second.getAllNodes()).map(n => n.title)).toEqual(['Saved insight']);
  });

  it('should fall back to the OpenAI client without producing insights', async () => {
    const manager = await createMemoryPalace({
      config: { environment: 'test', logLevel: 'fatal' },
      env: {},
      store: new MemoryStore(),
    });

    const result = await manager.ingestConversation(conversation('c1', 'text'));

    expect(result.nodes).toEqual([]);
    expect(result.extractionError?.code).toBe('PROVIDER_UNAVAILABLE');
  });
});
