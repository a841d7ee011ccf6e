// ============================================
// LLM Client: OpenAI chat completions as a Reasoner
// ============================================

import OpenAI from "openai";
import { z } from "zod";
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
  ChatCompletionTool,
} from "openai/resources/chat/completions.js";
import { ReasonerError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { AGENT_SYSTEM_PROMPT, buildToolListPrompt } from "./prompts.js";
import type { Decision, Message, Reasoner, ToolCall, ToolDescriptor } from "../agent/types.js";

export const DEFAULT_CHAT_MODEL = "gpt-4o";

/** The slice of the OpenAI client the reasoner needs */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(
        body: ChatCompletionCreateParamsNonStreaming,
        options?: { signal?: AbortSignal }
      ): Promise<ChatCompletion>;
    };
  };
}

export function createOpenAIClient(options: { apiKey: string; maxRetries: number }): OpenAI {
  return new OpenAI({ apiKey: options.apiKey, maxRetries: options.maxRetries });
}

// ============================================
// Message / tool mapping
// ============================================

const toolArgumentsSchema = z.object({ query: z.string() });

export function toToolSchema(tool: ToolDescriptor): ChatCompletionTool {
  return {
    type: "function",
    function: {
      name: tool.name,
      description: tool.description,
      parameters: {
        type: "object",
        properties: {
          query: {
            type: "string",
            description: "Natural language query for this tool.",
          },
        },
        required: ["query"],
      },
    },
  };
}

export function toChatMessage(message: Message): ChatCompletionMessageParam {
  switch (message.role) {
    case "user":
      return { role: "user", content: message.content };
    case "assistant":
      if (message.toolCalls && message.toolCalls.length > 0) {
        return {
          role: "assistant",
          content: message.content || null,
          tool_calls: message.toolCalls.map((call) => ({
            id: call.id,
            type: "function",
            function: { name: call.name, arguments: JSON.stringify({ query: call.argument }) },
          })),
        };
      }
      return { role: "assistant", content: message.content };
    case "tool":
      return { role: "tool", tool_call_id: message.toolCallId ?? "", content: message.content };
  }
}

/**
 * Pull the query out of a function-call argument string.
 * Models occasionally send plain text instead of JSON; that text is used as-is.
 */
export function parseToolArgument(raw: string): string {
  try {
    const parsed = toolArgumentsSchema.safeParse(JSON.parse(raw));
    if (parsed.success) {
      return parsed.data.query;
    }
  } catch {
    logger.warn("Failed to parse tool arguments", {
      stage: "llm",
      rawArgs: raw.slice(0, 200),
    });
  }
  return raw;
}

export function toDecision(response: ChatCompletion): Decision {
  const choice = response.choices[0];
  if (!choice) {
    throw new ReasonerError("No response choice from model");
  }

  const { message } = choice;
  const calls: ToolCall[] = (message.tool_calls ?? [])
    .filter((tc) => tc.type === "function")
    .map((tc) => ({
      id: tc.id,
      name: tc.function.name,
      argument: parseToolArgument(tc.function.arguments),
    }));

  if (calls.length > 0) {
    return { type: "tool_calls", content: message.content ?? "", calls };
  }
  return { type: "final", content: message.content ?? "" };
}

// ============================================
// Reasoner
// ============================================

export function createOpenAIReasoner(options: {
  client: ChatCompletionsClient;
  model?: string;
  temperature?: number;
  systemPrompt?: string;
}): Reasoner {
  const {
    client,
    model = DEFAULT_CHAT_MODEL,
    temperature = 0.5,
    systemPrompt = AGENT_SYSTEM_PROMPT,
  } = options;

  return {
    async decide(conversation, tools, signal) {
      const messages: ChatCompletionMessageParam[] = [
        { role: "system", content: systemPrompt + buildToolListPrompt(tools) },
        ...conversation.map(toChatMessage),
      ];

      const startTime = Date.now();
      let response: ChatCompletion;
      try {
        response = await client.chat.completions.create(
          {
            model,
            messages,
            temperature,
            ...(tools.length > 0 && { tools: tools.map(toToolSchema) }),
          },
          { signal }
        );
      } catch (err) {
        logger.error("LLM completion failed", { stage: "llm", model, error: err });
        throw err;
      }

      const decision = toDecision(response);

      logger.info("LLM decision", {
        stage: "llm",
        model,
        decision: decision.type,
        toolCalls: decision.type === "tool_calls" ? decision.calls.map((c) => c.name) : [],
        promptTokens: response.usage?.prompt_tokens,
        completionTokens: response.usage?.completion_tokens,
        latencyMs: Date.now() - startTime,
      });

      return decision;
    },
  };
}
