// ============================================
// Index Store: build-or-reuse of the persisted vector index
// ============================================

import fs from "fs/promises";
import fsSync from "fs";
import path from "path";
import { z } from "zod";
import { EmptyCorpusError, IndexBuildError, IndexLoadError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { DocumentIndex, type IndexEntry } from "./vectorIndex.js";
import type { Embedder } from "./embeddings.js";
import type { Chunk } from "../types/index.js";

/** Presence of this file is the only signal that a usable index exists. */
export const MANIFEST_FILE = "manifest.json";
export const VECTORS_FILE = "vectors.json";
export const INDEX_FORMAT_VERSION = 1;

const DEFAULT_BATCH_SIZE = 64;

const manifestSchema = z.object({
  version: z.literal(INDEX_FORMAT_VERSION),
  embeddingModel: z.string(),
  chunkCount: z.number().int().nonnegative(),
  dimensions: z.number().int().nonnegative(),
  embEncoding: z.literal("f32-base64"),
  createdAt: z.string(),
});

const storedEntrySchema = z.object({
  source: z.string(),
  index: z.number().int().nonnegative(),
  start: z.number().int().nonnegative(),
  overlap: z.number().int().nonnegative(),
  content: z.string(),
  emb: z.string(),
});

const vectorsFileSchema = z.object({
  entries: z.array(storedEntrySchema),
});

export type IndexManifest = z.infer<typeof manifestSchema>;
type StoredEntry = z.infer<typeof storedEntrySchema>;

export interface OpenIndexParams {
  chunks: readonly Chunk[];
  embedder: Embedder;
  persistPath: string;
  batchSize?: number;
  signal?: AbortSignal;
}

export function indexExists(persistPath: string): boolean {
  return fsSync.existsSync(path.join(persistPath, MANIFEST_FILE));
}

/**
 * Open the index at `persistPath`.
 *
 * An existing manifest means the stored index is reused as-is and `chunks` is ignored;
 * source changes stay invisible until the directory is removed. Without a manifest the
 * index is built from `chunks` and published in one rename.
 */
export async function openIndex(params: OpenIndexParams): Promise<DocumentIndex> {
  const { persistPath, embedder } = params;

  if (indexExists(persistPath)) {
    logger.info("Reusing persisted index", { stage: "index", persistPath });
    return loadIndex(persistPath, embedder);
  }

  if (params.chunks.length === 0) {
    throw new EmptyCorpusError(`Cannot build index at ${persistPath}: no document chunks provided.`);
  }

  return buildIndex(params);
}

export async function loadIndex(persistPath: string, embedder: Embedder): Promise<DocumentIndex> {
  let manifest: IndexManifest;
  let entries: IndexEntry[];

  try {
    manifest = manifestSchema.parse(await readJson(path.join(persistPath, MANIFEST_FILE)));
    const stored = vectorsFileSchema.parse(await readJson(path.join(persistPath, VECTORS_FILE)));
    entries = stored.entries.map(decodeEntry);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    logger.error("Failed to load persisted index", { stage: "index", persistPath, error: err });
    throw new IndexLoadError(`Failed to load index at ${persistPath}: ${reason}`, { cause: err });
  }

  if (entries.length !== manifest.chunkCount) {
    throw new IndexLoadError(
      `Index at ${persistPath} is inconsistent: manifest lists ${manifest.chunkCount} chunks, found ${entries.length}`
    );
  }
  const badVector = entries.find((e) => e.vector.length !== manifest.dimensions);
  if (badVector) {
    throw new IndexLoadError(
      `Index at ${persistPath} is inconsistent: expected ${manifest.dimensions} dimensions, found ${badVector.vector.length}`
    );
  }

  if (manifest.embeddingModel !== embedder.model) {
    logger.warn("Persisted index was built with a different embedding model", {
      stage: "index",
      persistPath,
      indexModel: manifest.embeddingModel,
      embedderModel: embedder.model,
    });
  }

  logger.info("Loaded persisted index", { stage: "index", persistPath, chunkCount: entries.length });
  return new DocumentIndex(entries, embedder);
}

async function buildIndex(params: OpenIndexParams): Promise<DocumentIndex> {
  const { chunks, embedder, persistPath, signal } = params;
  const batchSize = params.batchSize ?? DEFAULT_BATCH_SIZE;
  const tmpDir = `${persistPath}.tmp-${process.pid}-${Date.now()}`;
  const startTime = Date.now();

  logger.info("Building index", { stage: "index", persistPath, chunkCount: chunks.length, batchSize });

  try {
    const entries: IndexEntry[] = [];
    for (let i = 0; i < chunks.length; i += batchSize) {
      const batch = chunks.slice(i, i + batchSize);
      const vectors = await embedder.embedDocuments(
        batch.map((c) => c.content),
        signal
      );
      if (vectors.length !== batch.length) {
        throw new Error(`Embedder returned ${vectors.length} vectors for ${batch.length} chunks`);
      }
      batch.forEach((chunk, j) => {
        entries.push({ chunk, vector: Float32Array.from(vectors[j] ?? []) });
      });
    }

    const dimensions = entries[0]?.vector.length ?? 0;
    if (dimensions === 0 || entries.some((e) => e.vector.length !== dimensions)) {
      throw new Error("Embedder returned empty or mismatched vectors");
    }

    const manifest: IndexManifest = {
      version: INDEX_FORMAT_VERSION,
      embeddingModel: embedder.model,
      chunkCount: entries.length,
      dimensions,
      embEncoding: "f32-base64",
      createdAt: new Date().toISOString(),
    };

    await fs.mkdir(path.dirname(path.resolve(persistPath)), { recursive: true });
    await fs.mkdir(tmpDir);
    await fs.writeFile(path.join(tmpDir, VECTORS_FILE), JSON.stringify({ entries: entries.map(encodeEntry) }));
    // Written last: a directory without a manifest is never treated as an index
    await fs.writeFile(path.join(tmpDir, MANIFEST_FILE), JSON.stringify(manifest, null, 2));

    // Leftovers of an interrupted build (no manifest) are replaced wholesale
    await fs.rm(persistPath, { recursive: true, force: true });
    await fs.rename(tmpDir, persistPath);

    logger.info("Index built and persisted", {
      stage: "index",
      persistPath,
      chunkCount: entries.length,
      dimensions,
      latencyMs: Date.now() - startTime,
    });

    return new DocumentIndex(entries, embedder);
  } catch (err) {
    await fs.rm(tmpDir, { recursive: true, force: true });
    logger.error("Index build failed", { stage: "index", persistPath, error: err });
    const reason = err instanceof Error ? err.message : String(err);
    throw new IndexBuildError(`Failed to build index at ${persistPath}: ${reason}`, { cause: err });
  }
}

// ============================================
// Encoding helpers
// ============================================

async function readJson(file: string): Promise<unknown> {
  const raw = await fs.readFile(file, "utf8");
  const parsed: unknown = JSON.parse(raw);
  return parsed;
}

function encodeEntry({ chunk, vector }: IndexEntry): StoredEntry {
  return {
    source: chunk.source,
    index: chunk.index,
    start: chunk.start,
    overlap: chunk.overlap,
    content: chunk.content,
    emb: Buffer.from(vector.buffer, vector.byteOffset, vector.byteLength).toString("base64"),
  };
}

function decodeEntry(stored: StoredEntry): IndexEntry {
  const buf = Buffer.from(stored.emb, "base64");
  if (buf.byteLength % 4 !== 0) {
    throw new Error(`Corrupt embedding for ${stored.source}#${stored.index}`);
  }
  // Copy out of the (possibly pooled, unaligned) buffer
  const vector = new Float32Array(buf.byteLength / 4);
  for (let i = 0; i < vector.length; i += 1) {
    vector[i] = buf.readFloatLE(i * 4);
  }
  return {
    chunk: {
      source: stored.source,
      index: stored.index,
      start: stored.start,
      overlap: stored.overlap,
      content: stored.content,
    },
    vector,
  };
}
