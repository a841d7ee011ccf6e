// ============================================
// API Module: HTTP surface for the chat agent
// ============================================

export {
  validateBody,
  chatRequestSchema,
  addRequestId,
  type ChatRequest,
  type RequestWithId,
} from "./middleware.js";

export {
  answerChat,
  createChatHandler,
  createHealthHandler,
  type ChatResponse,
  type ChatDependencies,
  type AgentSettings,
  type ApiErrorResponse,
  type HealthResponse,
} from "./handler.js";
