import { ValidationError } from "../lib/errors.js";
import type { Chunk, Document } from "../types/index.js";

export interface ChunkOptions {
  chunkSize: number;
  chunkOverlap: number;
}

/**
 * Preferred window endings, strongest first: paragraph, line, word.
 * A hard cut at chunkSize is used when none of these fits.
 */
const SEPARATORS = ["\n\n", "\n", " "] as const;

export function validateChunkOptions({ chunkSize, chunkOverlap }: ChunkOptions): void {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new ValidationError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
    throw new ValidationError(
      `chunkOverlap must be an integer in [0, ${chunkSize}), got ${chunkOverlap}`
    );
  }
}

/**
 * Split every document into overlapping windows.
 * Output order follows input order; each document's chunks are numbered from 0.
 */
export function splitDocuments(documents: readonly Document[], options: ChunkOptions): Chunk[] {
  validateChunkOptions(options);
  return documents.flatMap((doc) => chunkDocument(doc, options));
}

export function chunkDocument(doc: Document, { chunkSize, chunkOverlap }: ChunkOptions): Chunk[] {
  const text = doc.content;
  if (text.trim().length === 0) return [];

  const chunks: Chunk[] = [];
  let start = 0;

  for (;;) {
    const overlap = chunks.length === 0 ? 0 : chunkOverlap;

    if (text.length - start <= chunkSize) {
      chunks.push({ content: text.slice(start), source: doc.source, index: chunks.length, start, overlap });
      break;
    }

    const end = findWindowEnd(text, start, chunkSize, chunkOverlap);
    chunks.push({ content: text.slice(start, end), source: doc.source, index: chunks.length, start, overlap });
    start = end - chunkOverlap;
  }

  return chunks;
}

/**
 * End offset (exclusive) of the window starting at `start`.
 * The separator stays at the end of the window so chunks reassemble exactly.
 * Only endings past start + overlap qualify, so the next window moves forward.
 */
function findWindowEnd(text: string, start: number, chunkSize: number, chunkOverlap: number): number {
  const limit = start + chunkSize;
  const minEnd = start + chunkOverlap + 1;
  // Separator search stays inside the window
  const window = text.slice(start, limit);

  for (const sep of SEPARATORS) {
    const at = window.lastIndexOf(sep);
    if (at >= 0 && start + at + sep.length >= minEnd) {
      return start + at + sep.length;
    }
  }

  return limit;
}

/**
 * Reassemble a document from its chunks by dropping each chunk's declared overlap.
 */
export function joinChunks(chunks: readonly Chunk[]): string {
  return chunks.map((c) => c.content.slice(c.overlap)).join("");
}
