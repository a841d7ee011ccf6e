// ============================================
// Agent Tools: retrieval + web search behind one contract
// ============================================

import path from "path";
import { logger } from "../lib/logger.js";
import type { DocumentIndex } from "../retrieval/vectorIndex.js";
import type { WebSearchProvider } from "../retrieval/webSearch.js";
import type { Tool, ToolDescriptor } from "./types.js";

export const RETRIEVAL_TOOL_NAME = "retrieve_company_documents";
export const WEB_SEARCH_TOOL_NAME = "web_search";

/** Returned verbatim when the index has nothing for a query. Informative, not an error. */
export const NO_DOCUMENTS_FOUND = "No relevant documents found.";
export const NO_WEB_RESULTS_FOUND = "No web results found.";

// ============================================
// Retrieval Tool
// ============================================

export function createRetrievalTool(options: { index: Pick<DocumentIndex, "search">; k: number }): Tool {
  const { index, k } = options;

  return {
    name: RETRIEVAL_TOOL_NAME,
    description:
      "Search internal company documents, policies, or rules. Input is a natural language query; returns the most relevant passages with their source file.",
    async invoke(query, signal) {
      const results = await index.search(query, k, signal);

      logger.info("retrieve_company_documents complete", {
        stage: "retrieval",
        query: query.slice(0, 80),
        resultCount: results.length,
        topScore: results[0]?.score,
      });

      if (results.length === 0) {
        return NO_DOCUMENTS_FOUND;
      }

      return results
        .map(({ chunk }) => `Source: ${path.basename(chunk.source)}\n---\n${chunk.content}`)
        .join("\n\n");
    },
  };
}

// ============================================
// Web Search Tool
// ============================================

export function createWebSearchTool(options: { provider: WebSearchProvider; maxResults: number }): Tool {
  const { provider, maxResults } = options;

  return {
    name: WEB_SEARCH_TOOL_NAME,
    description:
      "Search the public web for current or general information that internal company documents do not cover. Input is a search query.",
    async invoke(query, signal) {
      const results = await provider.search(query, maxResults, signal);

      if (results.length === 0) {
        return NO_WEB_RESULTS_FOUND;
      }

      return results
        .slice(0, maxResults)
        .map((r) => `Title: ${r.title}\nURL: ${r.url}\n---\n${r.content}`)
        .join("\n\n");
    },
  };
}

// ============================================
// Registry helpers
// ============================================

export function describeTools(tools: readonly Tool[]): ToolDescriptor[] {
  return tools.map(({ name, description }) => ({ name, description }));
}

/**
 * Name → tool lookup used for dispatch. Duplicate names are a wiring bug.
 */
export function buildToolRegistry(tools: readonly Tool[]): ReadonlyMap<string, Tool> {
  const registry = new Map<string, Tool>();
  for (const tool of tools) {
    if (registry.has(tool.name)) {
      throw new Error(`Duplicate tool name: ${tool.name}`);
    }
    registry.set(tool.name, tool);
  }
  return registry;
}
