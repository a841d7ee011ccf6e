// ============================================
// Test Helpers: deterministic stand-ins
// ============================================

import { vi } from "vitest";
import type { Embedder } from "../src/retrieval/embeddings.js";
import type { Chunk } from "../src/types/index.js";
import type { Decision, Message, Reasoner, Tool, ToolDescriptor } from "../src/agent/types.js";

export const VOCAB = ["leave", "remote", "laptop", "salary", "holiday"] as const;

/**
 * One dimension per vocabulary word, value = occurrences in the text.
 */
export function keywordVector(text: string): number[] {
  const words = text.toLowerCase().split(/[^a-z]+/);
  return VOCAB.map((w) => words.filter((x) => x === w).length);
}

export function createKeywordEmbedder(model = "keyword-v1") {
  const embedDocuments = vi.fn(async (texts: string[]) => texts.map(keywordVector));
  const embedQuery = vi.fn(async (text: string) => keywordVector(text));
  const embedder: Embedder = { model, embedDocuments, embedQuery };
  return { embedder, embedDocuments, embedQuery };
}

export function makeChunk(content: string, source = "data/policy.txt", index = 0): Chunk {
  return { content, source, index, start: 0, overlap: 0 };
}

export interface ScriptedReasoner extends Reasoner {
  calls: Array<{ messageCount: number; tools: string[] }>;
}

/**
 * Replays `script` in order; the last entry repeats once the script runs out.
 */
export function createScriptedReasoner(script: Decision[]): ScriptedReasoner {
  const calls: ScriptedReasoner["calls"] = [];
  return {
    calls,
    async decide(conversation: readonly Message[], tools: readonly ToolDescriptor[]) {
      const step = script[Math.min(calls.length, script.length - 1)];
      calls.push({ messageCount: conversation.length, tools: tools.map((t) => t.name) });
      if (!step) {
        throw new Error("empty script");
      }
      return step;
    },
  };
}

export function createStubTool(name: string, invoke: (query: string, signal?: AbortSignal) => Promise<string>): Tool {
  return { name, description: `${name} stub`, invoke };
}
