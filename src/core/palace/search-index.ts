// ═══════════════════════════════════════════════════════════════════════════════
// SEARCH INDEX — Term Statistics for TF-IDF Scoring
// ═══════════════════════════════════════════════════════════════════════════════
//
// TF-IDF Formula:
//   tf  = count(term, node) / wordCount(node)
//   idf = ln(totalDocuments / documentFrequency(term))
//   score = tf * idf
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { SearchIndexSnapshot } from './schemas.js';
import { GraphInvariantError } from './errors.js';
import { Tokenizer } from './tokenizer.js';
import type { MemoryNode } from './types.js';

export class SearchIndex {
  private readonly termFrequency = new Map<string, Map<string, number>>();
  private readonly documentFrequency = new Map<string, number>();
  private readonly nodeWordCounts = new Map<string, number>();
  private totalDocuments = 0;

  private readonly tokenizer = new Tokenizer();

  /**
   * Index a node's title, content and summary.
   * Returns false, changing nothing, when the id is already indexed.
   */
  indexNode(node: Pick<MemoryNode, 'id' | 'title' | 'content' | 'summary'>): boolean {
    if (this.nodeWordCounts.has(node.id)) {
      return false;
    }

    const text = `${node.title} ${node.content} ${node.summary}`;
    const tokens = this.tokenizer.tokenize(text);
    const frequencies = this.tokenizer.getTokenFrequency(text);

    this.nodeWordCounts.set(node.id, tokens.length);

    for (const [term, count] of frequencies) {
      let postings = this.termFrequency.get(term);
      if (!postings) {
        postings = new Map();
        this.termFrequency.set(term, postings);
      }
      postings.set(node.id, count);
      this.documentFrequency.set(term, (this.documentFrequency.get(term) ?? 0) + 1);
    }

    this.totalDocuments += 1;
    return true;
  }

  calculateTFIDF(term: string, nodeId: string): number {
    const count = this.termFrequency.get(term)?.get(nodeId) ?? 0;
    const wordCount = this.nodeWordCounts.get(nodeId) ?? 0;
    const df = this.documentFrequency.get(term) ?? 0;

    if (count === 0 || wordCount === 0 || df === 0) {
      return 0;
    }

    const tf = count / wordCount;
    const idf = Math.log(this.totalDocuments / df);
    return tf * idf;
  }

  /** Ids of nodes containing the term. */
  getPostings(term: string): string[] {
    return [...(this.termFrequency.get(term)?.keys() ?? [])];
  }

  get documentCount(): number {
    return this.totalDocuments;
  }

  get termCount(): number {
    return this.termFrequency.size;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // SNAPSHOTS
  // ─────────────────────────────────────────────────────────────────────────────

  toSnapshot(): SearchIndexSnapshot {
    return {
      termFrequency: [...this.termFrequency.entries()].map(
        ([term, postings]): [string, Array<[string, number]>] => [term, [...postings.entries()]]
      ),
      documentFrequency: [...this.documentFrequency.entries()],
      nodeWordCounts: [...this.nodeWordCounts.entries()],
      totalDocuments: this.totalDocuments,
    };
  }

  /**
   * Rebuild an index from a decoded snapshot. Throws GraphInvariantError when
   * document frequencies or the document total disagree with the postings.
   */
  static fromSnapshot(snapshot: SearchIndexSnapshot): SearchIndex {
    const index = new SearchIndex();

    for (const [id, count] of snapshot.nodeWordCounts) {
      if (index.nodeWordCounts.has(id)) {
        throw new GraphInvariantError(`Node ${id} is indexed twice`);
      }
      index.nodeWordCounts.set(id, count);
    }

    const documentFrequency = new Map(snapshot.documentFrequency);
    if (documentFrequency.size !== snapshot.documentFrequency.length) {
      throw new GraphInvariantError('Document frequencies list a term twice');
    }

    for (const [term, entries] of snapshot.termFrequency) {
      if (index.termFrequency.has(term)) {
        throw new GraphInvariantError(`Term "${term}" is listed twice`);
      }
      const postings = new Map(entries);
      if (postings.size !== entries.length) {
        throw new GraphInvariantError(`Term "${term}" lists a node twice`);
      }
      if (documentFrequency.get(term) !== postings.size) {
        throw new GraphInvariantError(`Document frequency of "${term}" does not match its postings`);
      }
      for (const id of postings.keys()) {
        if (!index.nodeWordCounts.has(id)) {
          throw new GraphInvariantError(`Term "${term}" references unindexed node ${id}`);
        }
      }
      index.termFrequency.set(term, postings);
      index.documentFrequency.set(term, postings.size);
    }

    if (documentFrequency.size !== index.termFrequency.size) {
      throw new GraphInvariantError('Document frequencies reference unknown terms');
    }
    if (snapshot.totalDocuments !== index.nodeWordCounts.size) {
      throw new GraphInvariantError('Document total does not match indexed nodes');
    }

    index.totalDocuments = snapshot.totalDocuments;
    return index;
  }
}
