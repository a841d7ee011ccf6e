// ============================================
// Core Types: Documents, chunks, search results
// ============================================

/**
 * A whole ingested file. Discarded once it has been chunked.
 */
export interface Document {
  readonly content: string;
  /** File path as read; its basename is the provenance tag shown to the model */
  readonly source: string;
}

/**
 * Contiguous window of a document's content, the unit of embedding and retrieval.
 */
export interface Chunk {
  readonly content: string;
  readonly source: string;
  /** Position of this chunk within its document (0-based) */
  readonly index: number;
  /** Character offset of the chunk in the document */
  readonly start: number;
  /** Leading characters shared with the previous chunk (0 for the first) */
  readonly overlap: number;
}

export interface SearchResult {
  chunk: Chunk;
  /** Cosine similarity, higher is closer */
  score: number;
}

/**
 * Recorded instead of thrown when a single file cannot be read.
 */
export interface IngestionWarning {
  source: string;
  message: string;
}
