import "dotenv/config";
import { config } from "../config/env.js";
import { ingestCorpus } from "../indexer/index.js";
import { indexExists, openIndex } from "../retrieval/indexStore.js";
import { createOpenAIEmbedder } from "../retrieval/embeddings.js";
import { createOpenAIClient } from "../llm/client.js";

// Builds the index ahead of server start. An existing index is reused, not rebuilt:
// delete INDEX_DIR first to pick up document changes.
async function main() {
  const persistPath = config.index.persistPath;
  const openai = createOpenAIClient({ apiKey: config.openai.apiKey, maxRetries: config.openai.maxRetries });
  const embedder = createOpenAIEmbedder({
    client: openai,
    model: config.openai.embeddingModel,
    dimensions: config.openai.embeddingDimensions,
  });

  if (indexExists(persistPath)) {
    const index = await openIndex({ chunks: [], embedder, persistPath });
    console.log(`Index already present at ${persistPath} (${index.size} chunks). Remove it to rebuild.`);
    return;
  }

  const { documentsProcessed, chunks, warnings } = await ingestCorpus(config.ingestion);
  for (const w of warnings) {
    console.warn(`Skipped ${w.source}: ${w.message}`);
  }

  const index = await openIndex({
    chunks,
    embedder,
    persistPath,
    batchSize: config.openai.embeddingBatchSize,
  });

  console.log(`Done. Documents: ${documentsProcessed}, chunks indexed: ${index.size}, warnings: ${warnings.length}`);
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
