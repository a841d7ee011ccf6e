// ============================================
// Agentic Loop: THINKING ↔ TOOL_CALL until a final answer
// ============================================

import crypto from "crypto";
import {
  NoTerminationError,
  ReasonerError,
  RequestAbortedError,
  ToolInvocationError,
} from "../lib/errors.js";
import { createRequestLogger, type RequestLogger } from "../lib/logger.js";
import { TimeoutError, withTimeout } from "../lib/timeout.js";
import { buildToolRegistry, describeTools } from "./tools.js";
import type {
  AgentResult,
  AgentState,
  Conversation,
  Decision,
  Message,
  Reasoner,
  Tool,
  ToolCall,
  ToolDescriptor,
} from "./types.js";

// ============================================
// Configuration
// ============================================

/** Returned whenever the loop ends without a usable assistant message. */
export const FALLBACK_ANSWER = "No suitable response found.";
export const PIPELINE_VERSION = "agent.v1";

// ============================================
// Types
// ============================================

export interface RunAgentInput {
  /** Appended to in place; prior entries are never touched */
  conversation: Conversation;
  reasoner: Reasoner;
  tools: readonly Tool[];
  /** Maximum THINKING steps before giving up */
  maxRounds: number;
  toolTimeoutMs: number;
  thinkTimeoutMs: number;
  /** Extra attempts for a THINKING step that timed out */
  thinkRetries?: number;
  requestId?: string;
  signal?: AbortSignal;
}

// ============================================
// Main Loop
// ============================================

/**
 * Run the tool-use loop for one request.
 *
 * Each round asks the reasoner for a decision. A final decision ends the loop (DONE);
 * tool calls are dispatched by name, concurrently, and their results appended in request
 * order before the next round. Tool failures become error tool messages. Running out
 * of rounds ends in FAILED with the fallback answer.
 */
export async function runAgent(input: RunAgentInput): Promise<AgentResult> {
  const { conversation, reasoner, tools, maxRounds, signal } = input;
  const requestId = input.requestId ?? crypto.randomUUID().slice(0, 8);
  const log = createRequestLogger(requestId, "agent");
  const registry = buildToolRegistry(tools);
  const descriptors = describeTools(tools);
  const startTime = Date.now();

  let state: AgentState = "THINKING";
  let rounds = 0;
  const historyLength = conversation.length;

  log.info("Agent started", {
    messageCount: conversation.length,
    tools: descriptors.map((t) => t.name),
    maxRounds,
  });

  while (state === "THINKING") {
    if (rounds >= maxRounds) {
      state = "FAILED";
      break;
    }
    if (signal?.aborted) {
      throw new RequestAbortedError({ requestId, cause: signal.reason });
    }

    rounds += 1;
    const decision = await think(input, conversation, descriptors, requestId, log);

    if (decision.type === "final" || decision.calls.length === 0) {
      conversation.push({ role: "assistant", content: decision.content });
      state = "DONE";
      break;
    }

    conversation.push({ role: "assistant", content: decision.content, toolCalls: decision.calls });
    state = "TOOL_CALL";

    log.info("Reasoner requested tool calls", {
      round: rounds,
      tools: decision.calls.map((c) => c.name),
    });

    const results = await Promise.all(
      decision.calls.map((call) => executeToolCall(call, registry, input, log))
    );
    conversation.push(...results);
    state = "THINKING";
  }

  const latencyMs = Date.now() - startTime;

  if (state === "FAILED") {
    const error = new NoTerminationError(maxRounds, { requestId });
    log.warn("Agent hit round limit", { rounds, latencyMs, error: error.message });
    return { answer: FALLBACK_ANSWER, state: "FAILED", rounds, error };
  }

  const answer = findAnswer(conversation, historyLength);

  log.info("Agent complete", {
    rounds,
    latencyMs,
    messageCount: conversation.length,
    answerLength: answer?.length ?? 0,
  });

  return { answer: answer ?? FALLBACK_ANSWER, state: "DONE", rounds };
}

// ============================================
// Helpers
// ============================================

/**
 * Content of the last assistant message with non-blank text at or after `from`, if any.
 * The loop passes the length of the caller's history so earlier turns are never reused.
 */
export function findAnswer(conversation: readonly Message[], from = 0): string | undefined {
  for (let i = conversation.length - 1; i >= from; i -= 1) {
    const message = conversation[i];
    if (message?.role === "assistant" && message.content.trim().length > 0) {
      return message.content;
    }
  }
  return undefined;
}

async function think(
  input: RunAgentInput,
  conversation: readonly Message[],
  descriptors: readonly ToolDescriptor[],
  requestId: string,
  log: RequestLogger
): Promise<Decision> {
  const { reasoner, thinkTimeoutMs, thinkRetries = 0, signal } = input;

  for (let attempt = 0; ; attempt += 1) {
    try {
      return await withTimeout(
        "Reasoner",
        thinkTimeoutMs,
        (s) => reasoner.decide(conversation, descriptors, s),
        signal
      );
    } catch (err) {
      if (signal?.aborted) {
        throw new RequestAbortedError({ requestId, cause: err });
      }
      if (err instanceof TimeoutError && attempt < thinkRetries) {
        log.warn("Reasoner timed out, retrying", { attempt: attempt + 1, timeoutMs: thinkTimeoutMs });
        continue;
      }
      if (err instanceof ReasonerError) {
        throw err;
      }
      const reason = err instanceof Error ? err.message : String(err);
      throw new ReasonerError(reason, { requestId, cause: err });
    }
  }
}

async function executeToolCall(
  call: ToolCall,
  registry: ReadonlyMap<string, Tool>,
  input: RunAgentInput,
  log: RequestLogger
): Promise<Message> {
  const toToolMessage = (content: string): Message => ({
    role: "tool",
    content,
    toolCallId: call.id,
    name: call.name,
  });

  const tool = registry.get(call.name);
  if (!tool) {
    const error = new ToolInvocationError(
      call.name,
      `Unknown tool "${call.name}". Available tools: ${[...registry.keys()].join(", ") || "none"}.`
    );
    log.warn("Unknown tool called", { toolName: call.name, toolCallId: call.id });
    return toToolMessage(`Error: ${error.message}`);
  }

  const startTime = Date.now();
  try {
    const content = await withTimeout(
      `Tool "${call.name}"`,
      input.toolTimeoutMs,
      (signal) => tool.invoke(call.argument, signal),
      input.signal
    );
    log.info("Tool call complete", {
      toolName: call.name,
      toolCallId: call.id,
      resultLength: content.length,
      latencyMs: Date.now() - startTime,
    });
    return toToolMessage(content);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    const error = new ToolInvocationError(
      call.name,
      err instanceof TimeoutError ? reason : `Tool "${call.name}" failed: ${reason}`,
      { cause: err }
    );
    log.warn("Tool call failed", {
      toolName: call.name,
      toolCallId: call.id,
      error: error.message,
      latencyMs: Date.now() - startTime,
    });
    return toToolMessage(`Error: ${error.message}`);
  }
}
