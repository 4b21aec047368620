// ═══════════════════════════════════════════════════════════════════════════════
// TOKENIZER — Word Extraction for the Lexical Index
// ═══════════════════════════════════════════════════════════════════════════════

/** Tokens with fewer code points than this are discarded */
export const MIN_TOKEN_LENGTH = 3;

// Whitespace and Unicode punctuation both separate words.
const WORD_SEPARATOR = /[\s\p{P}]+/u;

/**
 * Lowercases and splits text into indexable terms. Recall queries are
 * lowercased the same way (see splitQuery), so index terms and query
 * terms always compare in the same case.
 */
export class Tokenizer {
  tokenize(text: string): string[] {
    if (!text) {
      return [];
    }

    return text
      .toLowerCase()
      .split(WORD_SEPARATOR)
      .filter(t => Array.from(t).length >= MIN_TOKEN_LENGTH);
  }

  /**
   * Get token frequency map.
   */
  getTokenFrequency(text: string): Map<string, number> {
    const freq = new Map<string, number>();

    for (const token of this.tokenize(text)) {
      freq.set(token, (freq.get(token) ?? 0) + 1);
    }

    return freq;
  }
}

/**
 * Split a recall query into lookup terms: lowercase, whitespace only.
 * Punctuation is kept, so "rust?" does not match the indexed term "rust".
 */
export function splitQuery(query: string): string[] {
  return query.toLowerCase().split(/\s+/).filter(Boolean);
}
