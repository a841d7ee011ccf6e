import { logger } from "../lib/logger.js";
import { splitDocuments } from "./chunker.js";
import { loadDocuments } from "./loader.js";
import type { Chunk, IngestionWarning } from "../types/index.js";

export interface IngestOptions {
  dataDir: string;
  extensions: readonly string[];
  chunkSize: number;
  chunkOverlap: number;
}

export interface IngestResult {
  documentsProcessed: number;
  chunks: Chunk[];
  warnings: IngestionWarning[];
}

/**
 * Load the corpus from disk and split it into chunks ready for embedding.
 */
export async function ingestCorpus(options: IngestOptions): Promise<IngestResult> {
  const { documents, warnings } = await loadDocuments(options.dataDir, options.extensions);
  const chunks = splitDocuments(documents, {
    chunkSize: options.chunkSize,
    chunkOverlap: options.chunkOverlap,
  });

  logger.info("Corpus chunked", {
    stage: "ingest",
    documentsProcessed: documents.length,
    chunksCreated: chunks.length,
    chunkSize: options.chunkSize,
    chunkOverlap: options.chunkOverlap,
  });

  return { documentsProcessed: documents.length, chunks, warnings };
}

export { splitDocuments, chunkDocument, joinChunks, validateChunkOptions, type ChunkOptions } from "./chunker.js";
export { loadDocuments, type LoadResult } from "./loader.js";
