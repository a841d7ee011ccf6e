// ============================================
// Embeddings: text → vector capability
// Pin the model for retrieval determinism.
// ============================================

import type { CreateEmbeddingResponse, EmbeddingCreateParams } from "openai/resources/embeddings.js";
import { logger } from "../lib/logger.js";

/**
 * Opaque embedding capability. The same instance embeds chunks at build time
 * and queries at search time.
 */
export interface Embedder {
  /** Model identifier, recorded in the index manifest */
  readonly model: string;
  embedDocuments(texts: string[], signal?: AbortSignal): Promise<number[][]>;
  embedQuery(text: string, signal?: AbortSignal): Promise<number[]>;
}

/** The slice of the OpenAI client the embedder needs */
export interface EmbeddingsClient {
  embeddings: {
    create(body: EmbeddingCreateParams, options?: { signal?: AbortSignal }): Promise<CreateEmbeddingResponse>;
  };
}

const MAX_INPUT_CHARS = 8000;

export function createOpenAIEmbedder(options: {
  client: EmbeddingsClient;
  model: string;
  dimensions?: number;
}): Embedder {
  const { client, model, dimensions } = options;

  async function embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) return [];
    try {
      const response = await client.embeddings.create(
        {
          model,
          input: texts.map((t) => t.slice(0, MAX_INPUT_CHARS)),
          ...(dimensions !== undefined && { dimensions }),
        },
        { signal }
      );
      // The API may return items out of order; index is authoritative
      const vectors = [...response.data].sort((a, b) => a.index - b.index).map((d) => d.embedding);
      if (vectors.length !== texts.length) {
        throw new Error(`Expected ${texts.length} embeddings, got ${vectors.length}`);
      }
      return vectors;
    } catch (err) {
      logger.error("Embedding generation failed", {
        stage: "retrieval",
        model,
        textCount: texts.length,
        error: err,
      });
      throw err;
    }
  }

  return {
    model,
    embedDocuments: (texts, signal) => embed(texts, signal),
    async embedQuery(text, signal) {
      const [vector] = await embed([text], signal);
      if (!vector) {
        throw new Error("No embedding returned from OpenAI");
      }
      return vector;
    },
  };
}
