// ═══════════════════════════════════════════════════════════════════════════════
// PALACE PERSISTENCE — Versioned Snapshots in a Key-Value Store
// ═══════════════════════════════════════════════════════════════════════════════
//
// Keys:
//   <prefix>:graph         { version, savedAt, data: GraphSnapshot }
//   <prefix>:search-index  { version, savedAt, data: SearchIndexSnapshot }
//
// Each key loads independently; a bad or missing key yields an empty
// structure and an issue, never a throw.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { z } from 'zod';

import { getLogger } from '../../observability/logging/index.js';
import type { KeyValueStore } from '../../storage/index.js';
import { err, okVoid, type AsyncResult } from '../../types/result.js';
import type { PersistenceError } from './errors.js';
import { KnowledgeGraph } from './graph.js';
import {
  GraphSnapshotSchema,
  SearchIndexSnapshotSchema,
  SNAPSHOT_VERSION,
  envelopeSchema,
} from './schemas.js';
import { SearchIndex } from './search-index.js';

const logger = getLogger({ component: 'palace-persistence' });

const GraphEnvelopeSchema = envelopeSchema(GraphSnapshotSchema);
const SearchIndexEnvelopeSchema = envelopeSchema(SearchIndexSnapshotSchema);

export interface LoadIssue {
  key: string;
  reason: 'MISSING' | 'READ_FAILED' | 'INVALID_JSON' | 'SCHEMA_MISMATCH' | 'INVARIANT_VIOLATION';
  message: string;
}

export interface LoadedPalace {
  graph: KnowledgeGraph;
  index: SearchIndex;
  issues: LoadIssue[];
}

type Decoded<T> = { ok: true; value: T } | { ok: false; issue: LoadIssue };

export class PalacePersistence {
  readonly graphKey: string;
  readonly indexKey: string;

  constructor(
    private readonly store: KeyValueStore,
    keyPrefix: string
  ) {
    this.graphKey = `${keyPrefix}:graph`;
    this.indexKey = `${keyPrefix}:search-index`;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // SAVE
  // ─────────────────────────────────────────────────────────────────────────────

  async save(graph: KnowledgeGraph, index: SearchIndex): AsyncResult<void, PersistenceError> {
    const savedAt = new Date().toISOString();

    let graphBlob: string;
    let indexBlob: string;
    try {
      graphBlob = JSON.stringify({ version: SNAPSHOT_VERSION, savedAt, data: graph.toSnapshot() });
      indexBlob = JSON.stringify({ version: SNAPSHOT_VERSION, savedAt, data: index.toSnapshot() });
    } catch (error) {
      return err({
        code: 'SERIALIZATION_ERROR',
        message: error instanceof Error ? error.message : 'Failed to serialize palace',
        cause: error,
      });
    }

    for (const [key, blob] of [[this.graphKey, graphBlob], [this.indexKey, indexBlob]] as const) {
      try {
        await this.store.set(key, blob);
      } catch (error) {
        return err({
          code: 'STORAGE_ERROR',
          message: error instanceof Error ? error.message : `Failed to write ${key}`,
          key,
          cause: error,
        });
      }
    }

    logger.debug('Palace saved', { nodes: graph.size, documents: index.documentCount });
    return okVoid();
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // LOAD
  // ─────────────────────────────────────────────────────────────────────────────

  async load(): Promise<LoadedPalace> {
    const issues: LoadIssue[] = [];

    const graphData = await this.read(this.graphKey, GraphEnvelopeSchema);
    let graph = new KnowledgeGraph();
    if (graphData.ok) {
      try {
        graph = KnowledgeGraph.fromSnapshot(graphData.value.data);
      } catch (error) {
        issues.push(invariantIssue(this.graphKey, error));
      }
    } else {
      issues.push(graphData.issue);
    }

    const indexData = await this.read(this.indexKey, SearchIndexEnvelopeSchema);
    let index = new SearchIndex();
    if (indexData.ok) {
      try {
        index = SearchIndex.fromSnapshot(indexData.value.data);
      } catch (error) {
        issues.push(invariantIssue(this.indexKey, error));
      }
    } else {
      issues.push(indexData.issue);
    }

    for (const issue of issues) {
      if (issue.reason === 'MISSING') {
        logger.info('No saved data, starting empty', { key: issue.key });
      } else {
        logger.warn('Discarding saved data', { ...issue });
      }
    }

    return { graph, index, issues };
  }

  private async read<T extends z.ZodTypeAny>(key: string, schema: T): Promise<Decoded<z.infer<T>>> {
    let blob: string | null;
    try {
      blob = await this.store.get(key);
    } catch (error) {
      return failure(key, 'READ_FAILED', error instanceof Error ? error.message : 'Read failed');
    }

    if (blob === null) {
      return failure(key, 'MISSING', 'No saved data');
    }

    let raw: unknown;
    try {
      raw = JSON.parse(blob);
    } catch (error) {
      return failure(key, 'INVALID_JSON', error instanceof Error ? error.message : 'Not JSON');
    }

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .slice(0, 3)
        .map(i => `${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('; ');
      return failure(key, 'SCHEMA_MISMATCH', detail);
    }

    return { ok: true, value: parsed.data };
  }
}

function failure(key: string, reason: LoadIssue['reason'], message: string): { ok: false; issue: LoadIssue } {
  return { ok: false, issue: { key, reason, message } };
}

function invariantIssue(key: string, error: unknown): LoadIssue {
  return {
    key,
    reason: 'INVARIANT_VIOLATION',
    message: error instanceof Error ? error.message : String(error),
  };
}
