// ============================================
// API Middleware: Validation, Request IDs
// ============================================

import crypto from "crypto";
import type { Request, Response, NextFunction } from "express";
import { z } from "zod";

// ============================================
// Input Validation
// ============================================

/**
 * Request body schema for POST /chat.
 */
export const chatRequestSchema = z.object({
  session_id: z.string(),
  messages: z
    .array(
      z.object({
        role: z.enum(["user", "assistant"]),
        content: z.string(),
      })
    )
    .min(1, "messages cannot be empty"),
});

export type ChatRequest = z.infer<typeof chatRequestSchema>;

/**
 * Validation middleware factory.
 */
export function validateBody<T>(
  schema: z.ZodSchema<T>
): (
  req: Request,
  res: Response,
  next: NextFunction
) => void {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.body);

    if (!result.success) {
      const errors = result.error.issues.map((issue) => ({
        field: issue.path.join("."),
        message: issue.message,
      }));

      res.status(400).json({
        error: "VALIDATION_ERROR",
        message: "Invalid request body",
        details: errors,
      });
      return;
    }

    // Replace body with validated/transformed data
    req.body = result.data;
    next();
  };
}

// ============================================
// Request ID Middleware
// ============================================

export type RequestWithId = Request & { requestId?: string };

/**
 * Add request ID to all requests for tracing.
 */
export function addRequestId(
  req: RequestWithId,
  res: Response,
  next: NextFunction
): void {
  const header = req.headers["x-request-id"];
  const requestId = typeof header === "string" && header.length > 0 ? header : crypto.randomUUID().slice(0, 8);
  req.requestId = requestId;
  res.setHeader("X-Request-Id", requestId);
  next();
}
