// ============================================
// Web Search: Tavily search API provider
// ============================================

import { z } from "zod";
import { logger } from "../lib/logger.js";

export interface WebSearchResult {
  title: string;
  url: string;
  content: string;
  score?: number;
}

/**
 * Opaque external search capability: query → ranked snippets.
 */
export interface WebSearchProvider {
  search(query: string, maxResults: number, signal?: AbortSignal): Promise<WebSearchResult[]>;
}

const TAVILY_API_BASE = "https://api.tavily.com";

const tavilyResponseSchema = z.object({
  results: z.array(
    z.object({
      title: z.string().default(""),
      url: z.string(),
      content: z.string().default(""),
      score: z.number().optional(),
    })
  ),
});

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export function createTavilyProvider(options: {
  apiKey: string;
  topic?: "general" | "news";
  fetchImpl?: FetchLike;
}): WebSearchProvider {
  const { apiKey, topic = "general" } = options;
  const fetchImpl = options.fetchImpl ?? fetch;

  return {
    async search(query, maxResults, signal) {
      const startTime = Date.now();

      const response = await fetchImpl(`${TAVILY_API_BASE}/search`, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({ query, max_results: maxResults, topic }),
        signal,
      });

      if (!response.ok) {
        const body = await response.text();
        throw new Error(`Tavily search failed: ${response.status} ${body.slice(0, 200)}`);
      }

      const parsed = tavilyResponseSchema.parse(await response.json());
      const results = parsed.results.slice(0, maxResults);

      logger.info("Web search complete", {
        stage: "web",
        query: query.slice(0, 80),
        resultCount: results.length,
        latencyMs: Date.now() - startTime,
      });

      return results;
    },
  };
}
