import express from "express";
import {
  addRequestId,
  chatRequestSchema,
  createChatHandler,
  createHealthHandler,
  validateBody,
  type ChatDependencies,
} from "./api/index.js";

/**
 * Express application with all routes wired. Listening is left to the caller.
 */
export function createApp(deps: ChatDependencies & { index: { readonly size: number } }): express.Express {
  const app = express();

  app.use(express.json({ limit: "1mb" }));
  app.use(addRequestId);

  app.get("/healthz", createHealthHandler(deps.index));
  app.post("/chat", validateBody(chatRequestSchema), createChatHandler(deps));

  return app;
}
