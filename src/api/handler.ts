// ============================================
// API Handler: POST /chat, GET /healthz
// ============================================

import type { Response } from "express";
import crypto from "crypto";
import { runAgent, PIPELINE_VERSION } from "../agent/loop.js";
import { logger } from "../lib/logger.js";
import { RequestAbortedError, wrapError } from "../lib/errors.js";
import type { Conversation, Reasoner, Tool } from "../agent/types.js";
import type { ChatRequest, RequestWithId } from "./middleware.js";

// ============================================
// Types
// ============================================

export interface ChatResponse {
  answer: string;
}

export interface ApiErrorResponse {
  error: string;
  message: string;
  requestId?: string;
}

export interface AgentSettings {
  maxRounds: number;
  toolTimeoutMs: number;
  thinkTimeoutMs: number;
  thinkRetries: number;
}

export interface ChatDependencies {
  reasoner: Reasoner;
  tools: readonly Tool[];
  agent: AgentSettings;
}

// ============================================
// Core
// ============================================

/**
 * Answer one chat request. Throws on unrecoverable failure; an agent that runs
 * out of rounds still resolves with the fallback answer.
 */
export async function answerChat(
  request: ChatRequest,
  deps: ChatDependencies,
  options: { requestId: string; signal?: AbortSignal }
): Promise<ChatResponse> {
  const conversation: Conversation = request.messages.map((m) => ({
    role: m.role,
    content: m.content,
  }));

  const result = await runAgent({
    conversation,
    reasoner: deps.reasoner,
    tools: deps.tools,
    maxRounds: deps.agent.maxRounds,
    toolTimeoutMs: deps.agent.toolTimeoutMs,
    thinkTimeoutMs: deps.agent.thinkTimeoutMs,
    thinkRetries: deps.agent.thinkRetries,
    requestId: options.requestId,
    signal: options.signal,
  });

  return { answer: result.answer };
}

// ============================================
// Express Handlers
// ============================================

export function createChatHandler(deps: ChatDependencies) {
  return async function handleChatRequest(
    req: RequestWithId & { body: ChatRequest },
    res: Response
  ): Promise<void> {
    const requestId = req.requestId ?? crypto.randomUUID().slice(0, 8);
    const startTime = Date.now();
    const { session_id: sessionId, messages } = req.body;

    // Client disconnects cancel in-flight tool calls
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableEnded) controller.abort();
    });

    logger.info("Chat request received", {
      stage: "api",
      requestId,
      sessionId,
      messageCount: messages.length,
    });

    try {
      const response = await answerChat(req.body, deps, { requestId, signal: controller.signal });

      logger.info("Chat request completed", {
        stage: "api",
        requestId,
        sessionId,
        answerLength: response.answer.length,
        latencyMs: Date.now() - startTime,
        pipelineVersion: PIPELINE_VERSION,
      });

      res.status(200).json(response);
    } catch (err) {
      if (err instanceof RequestAbortedError) {
        logger.info("Chat request abandoned by client", { stage: "api", requestId, sessionId });
        return;
      }

      const appError = wrapError(err, requestId);

      logger.error("Chat request failed", {
        stage: "api",
        requestId,
        sessionId,
        error: err,
        errorCode: appError.code,
      });

      // Cause description only, never the stack
      const errorResponse: ApiErrorResponse = {
        error: "AGENT_ERROR",
        message: `Agent error: ${appError.message}`,
        requestId,
      };

      res.status(500).json(errorResponse);
    }
  };
}

// ============================================
// Health Check
// ============================================

export interface HealthResponse {
  status: "ok";
  chunks: number;
  timestamp: string;
}

export function createHealthHandler(index: { readonly size: number }) {
  return function handleHealthCheck(_req: unknown, res: Response): void {
    const response: HealthResponse = {
      status: "ok",
      chunks: index.size,
      timestamp: new Date().toISOString(),
    };

    res.status(200).json(response);
  };
}
