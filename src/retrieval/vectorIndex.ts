// ============================================
// Vector Index: in-memory cosine search over embedded chunks
// ============================================

import { IndexLoadError, ValidationError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import type { Embedder } from "./embeddings.js";
import type { Chunk, SearchResult } from "../types/index.js";

export interface IndexEntry {
  chunk: Chunk;
  vector: Float32Array;
}

export function cosineSimilarity(a: ArrayLike<number>, b: ArrayLike<number>): number {
  if (a.length !== b.length || a.length === 0) {
    return 0;
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i += 1) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }

  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  return denominator === 0 ? 0 : dot / denominator;
}

/**
 * Read-only after construction; safe to share across concurrent requests.
 */
export class DocumentIndex {
  private readonly entries: readonly IndexEntry[];
  private readonly embedder: Embedder;

  constructor(entries: readonly IndexEntry[], embedder: Embedder) {
    this.entries = entries;
    this.embedder = embedder;
  }

  get size(): number {
    return this.entries.length;
  }

  /** Width of the stored vectors; 0 for an empty index */
  get dimensions(): number {
    return this.entries[0]?.vector.length ?? 0;
  }

  /**
   * Nearest `k` chunks to `query`, most similar first.
   * Ties keep insertion order. An empty index returns [] without embedding.
   * A query vector whose width differs from the stored vectors raises IndexLoadError.
   */
  async search(query: string, k: number, signal?: AbortSignal): Promise<SearchResult[]> {
    if (!Number.isInteger(k) || k <= 0) {
      throw new ValidationError(`k must be a positive integer, got ${k}`);
    }
    if (this.entries.length === 0) return [];

    const queryVector = await this.embedder.embedQuery(query, signal);
    if (queryVector.length !== this.dimensions) {
      throw new IndexLoadError(
        `Query embedding from ${this.embedder.model} has ${queryVector.length} dimensions, index stores ${this.dimensions}; rebuild the index`
      );
    }

    const scored = this.entries.map((entry, position) => ({
      chunk: entry.chunk,
      score: cosineSimilarity(queryVector, entry.vector),
      position,
    }));
    scored.sort((a, b) => b.score - a.score || a.position - b.position);

    const results = scored.slice(0, k).map(({ chunk, score }) => ({ chunk, score }));

    logger.debug("Index search complete", {
      stage: "retrieval",
      k,
      resultCount: results.length,
      topScore: results[0]?.score,
    });

    return results;
  }
}
