import "dotenv/config";
import path from "path";
import { config } from "../config/env.js";
import { indexExists, loadIndex } from "../retrieval/indexStore.js";
import { createOpenAIEmbedder } from "../retrieval/embeddings.js";
import { createOpenAIClient } from "../llm/client.js";

async function main() {
  const query = process.argv[2];
  const k = Number(process.argv[3] ?? config.index.retrievalK);
  if (!query) {
    console.error("Usage: npx tsx src/scripts/queryIndex.ts <query> [k]");
    process.exit(1);
  }

  const persistPath = config.index.persistPath;
  if (!indexExists(persistPath)) {
    console.error(`No index at ${persistPath}. Run src/scripts/buildIndex.ts first.`);
    process.exit(1);
  }

  const openai = createOpenAIClient({ apiKey: config.openai.apiKey, maxRetries: config.openai.maxRetries });
  const embedder = createOpenAIEmbedder({
    client: openai,
    model: config.openai.embeddingModel,
    dimensions: config.openai.embeddingDimensions,
  });
  const index = await loadIndex(persistPath, embedder);

  const results = await index.search(query, k);
  console.log(`${results.length} result(s) for "${query}":\n`);
  results.forEach(({ chunk, score }, i) => {
    console.log(`#${i + 1} [${score.toFixed(3)}] ${path.basename(chunk.source)} (chunk ${chunk.index})`);
    console.log(chunk.content.slice(0, 300));
    console.log("");
  });
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
