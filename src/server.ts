import "dotenv/config";
import { config } from "./config/env.js";
import { logger } from "./lib/logger.js";
import { wrapError } from "./lib/errors.js";
import { createApp } from "./app.js";
import { ingestCorpus } from "./indexer/index.js";
import { openIndex, indexExists } from "./retrieval/indexStore.js";
import { createOpenAIEmbedder } from "./retrieval/embeddings.js";
import { createTavilyProvider } from "./retrieval/webSearch.js";
import { createRetrievalTool, createWebSearchTool } from "./agent/tools.js";
import { createOpenAIClient, createOpenAIReasoner } from "./llm/client.js";
import type { Tool } from "./agent/types.js";

// ============================================
// Startup
// ============================================

async function main(): Promise<void> {
  logger.info("Starting docdesk", {
    stage: "startup",
    port: config.port,
    dataDir: config.ingestion.dataDir,
    indexDir: config.index.persistPath,
    webSearchConfigured: config.webSearch.isConfigured,
  });

  const openai = createOpenAIClient({
    apiKey: config.openai.apiKey,
    maxRetries: config.openai.maxRetries,
  });
  const embedder = createOpenAIEmbedder({
    client: openai,
    model: config.openai.embeddingModel,
    dimensions: config.openai.embeddingDimensions,
  });

  // Chunks are only needed when there is no index to reuse
  const { chunks } = indexExists(config.index.persistPath)
    ? { chunks: [] }
    : await ingestCorpus(config.ingestion);

  const index = await openIndex({
    chunks,
    embedder,
    persistPath: config.index.persistPath,
    batchSize: config.openai.embeddingBatchSize,
  });

  const tools: Tool[] = [createRetrievalTool({ index, k: config.index.retrievalK })];

  const { apiKey: tavilyKey } = config.webSearch;
  if (tavilyKey) {
    tools.push(
      createWebSearchTool({
        provider: createTavilyProvider({ apiKey: tavilyKey, topic: config.webSearch.topic }),
        maxResults: config.webSearch.maxResults,
      })
    );
  } else {
    logger.warn("TAVILY_API_KEY not set, web search tool disabled", { stage: "startup" });
  }

  const reasoner = createOpenAIReasoner({
    client: openai,
    model: config.openai.chatModel,
    temperature: config.openai.temperature,
  });

  const app = createApp({ reasoner, tools, agent: config.agent, index });

  app.listen(config.port, () => {
    logger.info("Server listening", {
      stage: "startup",
      port: config.port,
      chunks: index.size,
      tools: tools.map((t) => t.name),
    });
  });
}

main().catch((err: unknown) => {
  const appError = wrapError(err);
  logger.error("Startup failed", {
    stage: "startup",
    errorCode: appError.code,
    error: err,
  });
  process.exit(1);
});
