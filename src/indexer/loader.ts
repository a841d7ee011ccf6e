import fs from "fs/promises";
import path from "path";
import { logger } from "../lib/logger.js";
import type { Document, IngestionWarning } from "../types/index.js";

export interface LoadResult {
  documents: Document[];
  warnings: IngestionWarning[];
}

/**
 * Read every text file directly under `dataDir`.
 *
 * Files are visited in sorted name order so repeated runs produce the same corpus.
 * Files whose extension is not in `extensions` are ignored; files that fail to read
 * are skipped with a warning instead of aborting the pass.
 */
export async function loadDocuments(dataDir: string, extensions: readonly string[]): Promise<LoadResult> {
  const documents: Document[] = [];
  const warnings: IngestionWarning[] = [];
  const allowed = new Set(extensions.map((e) => e.toLowerCase()));

  logger.info("Loading documents", { stage: "ingest", dataDir, extensions });

  let filenames: string[];
  try {
    filenames = await fs.readdir(dataDir);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.warn("Cannot list data folder", { stage: "ingest", dataDir, error: message });
    return { documents, warnings: [{ source: dataDir, message }] };
  }

  for (const filename of [...filenames].sort()) {
    if (!allowed.has(path.extname(filename).toLowerCase())) continue;

    const fullPath = path.join(dataDir, filename);
    try {
      const content = await fs.readFile(fullPath, "utf-8");
      documents.push({ content, source: fullPath });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      warnings.push({ source: fullPath, message });
      logger.warn("Skipping unreadable file", { stage: "ingest", source: fullPath, error: message });
    }
  }

  logger.info("Documents loaded", {
    stage: "ingest",
    documentCount: documents.length,
    warningCount: warnings.length,
  });

  return { documents, warnings };
}
