/**
 * BM25 Okapi Lexical Index
 *
 * Immutable once built: a rebuild produces a new instance that replaces the
 * old one wholesale.
 *
 * @module
 */

import type { Chunk } from "../../types/index.js";

// =============================================================================
// Types
// =============================================================================

export interface BM25Parameters {
  /** Term-frequency saturation */
  k1: number;
  /** Length normalization */
  b: number;
  /** Floor for negative IDFs, as a fraction of the mean IDF */
  epsilon: number;
}

export const DEFAULT_BM25_PARAMETERS: BM25Parameters = {
  k1: 1.5,
  b: 0.75,
  epsilon: 0.25,
};

export interface LexicalHit {
  chunk: Chunk;
  score: number;
  /** Position in the indexed corpus */
  position: number;
}

/**
 * Lowercase and split on whitespace
 */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/\s+/)
    .filter((token) => token.length > 0);
}

// =============================================================================
// BM25Index
// =============================================================================

export class BM25Index {
  private readonly chunks: readonly Chunk[];
  private readonly termFrequencies: Array<Map<string, number>>;
  private readonly lengths: number[];
  private readonly idf = new Map<string, number>();
  private readonly averageLength: number;
  private readonly params: BM25Parameters;

  constructor(chunks: readonly Chunk[], params: Partial<BM25Parameters> = {}) {
    this.params = { ...DEFAULT_BM25_PARAMETERS, ...params };
    this.chunks = [...chunks];
    this.termFrequencies = [];
    this.lengths = [];

    const documentFrequency = new Map<string, number>();
    let totalLength = 0;

    for (const chunk of this.chunks) {
      const tokens = tokenize(chunk.payload.content);
      const frequencies = new Map<string, number>();
      for (const token of tokens) {
        frequencies.set(token, (frequencies.get(token) ?? 0) + 1);
      }
      this.termFrequencies.push(frequencies);
      this.lengths.push(tokens.length);
      totalLength += tokens.length;

      for (const term of frequencies.keys()) {
        documentFrequency.set(term, (documentFrequency.get(term) ?? 0) + 1);
      }
    }

    const corpusSize = this.chunks.length;
    this.averageLength = corpusSize > 0 ? totalLength / corpusSize : 0;
    this.computeIdf(documentFrequency, corpusSize);
  }

  get size(): number {
    return this.chunks.length;
  }

  /**
   * IDF = ln((N - n + 0.5) / (n + 0.5)); negative values (terms in more than
   * half the corpus) are replaced by epsilon * mean IDF.
   */
  private computeIdf(documentFrequency: Map<string, number>, corpusSize: number): void {
    let idfSum = 0;
    const negative: string[] = [];

    for (const [term, frequency] of documentFrequency) {
      const value = Math.log(corpusSize - frequency + 0.5) - Math.log(frequency + 0.5);
      this.idf.set(term, value);
      idfSum += value;
      if (value < 0) negative.push(term);
    }

    const averageIdf = documentFrequency.size > 0 ? idfSum / documentFrequency.size : 0;
    const floor = this.params.epsilon * averageIdf;
    for (const term of negative) {
      this.idf.set(term, floor);
    }
  }

  /**
   * Score every indexed chunk against the query, in corpus order
   */
  scores(query: string): number[] {
    const queryTokens = tokenize(query);
    const { k1, b } = this.params;

    return this.termFrequencies.map((frequencies, i) => {
      const length = this.lengths[i] ?? 0;
      const norm = k1 * (1 - b + (this.averageLength > 0 ? (b * length) / this.averageLength : 0));
      let score = 0;
      for (const token of queryTokens) {
        const tf = frequencies.get(token) ?? 0;
        if (tf === 0) continue;
        score += (this.idf.get(token) ?? 0) * ((tf * (k1 + 1)) / (tf + norm));
      }
      return score;
    });
  }

  /**
   * Top `limit` chunks by descending score among those containing at least
   * one query term. Small corpora can give a matching chunk a zero or
   * negative IDF; it stays a candidate. Ties keep corpus order.
   */
  search(query: string, limit: number, accept?: (chunk: Chunk) => boolean): LexicalHit[] {
    if (limit <= 0) return [];
    const queryTokens = new Set(tokenize(query));
    const scores = this.scores(query);
    const hits: LexicalHit[] = [];

    scores.forEach((score, position) => {
      const chunk = this.chunks[position];
      const frequencies = this.termFrequencies[position];
      if (!chunk || !frequencies) return;
      if (![...queryTokens].some((token) => frequencies.has(token))) return;
      if (accept && !accept(chunk)) return;
      hits.push({ chunk, score, position });
    });

    hits.sort((a, b) => b.score - a.score || a.position - b.position);
    return hits.slice(0, limit);
  }

  /** Chunks in corpus order */
  entries(): readonly Chunk[] {
    return this.chunks;
  }
}
