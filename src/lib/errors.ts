// ============================================
// Standard error types for consistent handling
// ============================================

export type ErrorCode =
  | "EMPTY_CORPUS"
  | "INDEX_LOAD_FAILED"
  | "INDEX_BUILD_FAILED"
  | "TOOL_INVOCATION_FAILED"
  | "NO_TERMINATION"
  | "REASONER_FAILED"
  | "REQUEST_ABORTED"
  | "VALIDATION_ERROR"
  | "UNKNOWN_ERROR";

export interface AppError {
  code: ErrorCode;
  message: string;
  requestId?: string;
  cause?: unknown;
}

export class DocdeskError extends Error implements AppError {
  code: ErrorCode;
  requestId?: string;
  override cause?: unknown;

  constructor(options: AppError) {
    super(options.message);
    this.name = "DocdeskError";
    this.code = options.code;
    this.requestId = options.requestId;
    this.cause = options.cause;
  }
}

type ErrorOptions = Omit<AppError, "code" | "message">;

/** No persisted index and nothing to build one from. Fatal at startup. */
export class EmptyCorpusError extends DocdeskError {
  constructor(message = "Cannot build index: no document chunks provided.", options: ErrorOptions = {}) {
    super({ ...options, code: "EMPTY_CORPUS", message });
    this.name = "EmptyCorpusError";
  }
}

/** Persisted index exists but cannot be read back. Fatal at startup. */
export class IndexLoadError extends DocdeskError {
  constructor(message: string, options: ErrorOptions = {}) {
    super({ ...options, code: "INDEX_LOAD_FAILED", message });
    this.name = "IndexLoadError";
  }
}

export class IndexBuildError extends DocdeskError {
  constructor(message: string, options: ErrorOptions = {}) {
    super({ ...options, code: "INDEX_BUILD_FAILED", message });
    this.name = "IndexBuildError";
  }
}

/**
 * A single tool call failed (unknown name, exception, timeout).
 * Recoverable: the agent turns it into a tool-result message.
 */
export class ToolInvocationError extends DocdeskError {
  readonly toolName: string;

  constructor(toolName: string, message: string, options: ErrorOptions = {}) {
    super({ ...options, code: "TOOL_INVOCATION_FAILED", message });
    this.name = "ToolInvocationError";
    this.toolName = toolName;
  }
}

/** The agent used up its round budget without a final answer. */
export class NoTerminationError extends DocdeskError {
  readonly rounds: number;

  constructor(rounds: number, options: ErrorOptions = {}) {
    super({ ...options, code: "NO_TERMINATION", message: `Agent did not produce a final answer within ${rounds} rounds` });
    this.name = "NoTerminationError";
    this.rounds = rounds;
  }
}

export class ReasonerError extends DocdeskError {
  constructor(message: string, options: ErrorOptions = {}) {
    super({ ...options, code: "REASONER_FAILED", message });
    this.name = "ReasonerError";
  }
}

export class RequestAbortedError extends DocdeskError {
  constructor(options: ErrorOptions = {}) {
    super({ ...options, code: "REQUEST_ABORTED", message: "Request was aborted" });
    this.name = "RequestAbortedError";
  }
}

export class ValidationError extends DocdeskError {
  constructor(message: string, options: ErrorOptions = {}) {
    super({ ...options, code: "VALIDATION_ERROR", message });
    this.name = "ValidationError";
  }
}

/** Wrap unknown errors */
export function wrapError(err: unknown, requestId?: string): DocdeskError {
  if (err instanceof DocdeskError) {
    return err;
  }

  const message = err instanceof Error ? err.message : String(err);
  return new DocdeskError({
    code: "UNKNOWN_ERROR",
    message,
    requestId,
    cause: err,
  });
}
