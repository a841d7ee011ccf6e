// ============================================
// Structured JSON logging
// One line per entry: timestamp, level, message, stage, requestId, context
// ============================================

export type LogLevel = "debug" | "info" | "warn" | "error";

export type Stage =
  | "startup"
  | "ingest"
  | "index"
  | "retrieval"
  | "web"
  | "agent"
  | "llm"
  | "api";

export interface LogContext {
  requestId?: string;
  stage?: Stage;
  sessionId?: string;
  [key: string]: unknown;
}

interface LogEntry extends LogContext {
  timestamp: string;
  level: LogLevel;
  message: string;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LEVEL_ORDER, value);
}

/** LOG_LEVEL wins; otherwise debug is dropped in production. */
function minimumLevel(): LogLevel {
  const configured = process.env["LOG_LEVEL"]?.toLowerCase();
  if (isLogLevel(configured)) return configured;
  return process.env["NODE_ENV"] === "production" ? "info" : "debug";
}

function flattenError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return { errorMessage: error.message, errorStack: error.stack };
  }
  return error === undefined ? {} : { errorMessage: String(error) };
}

function write(level: LogLevel, message: string, context: LogContext = {}): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minimumLevel()]) return;

  const { error, ...rest } = context;
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...rest,
    ...flattenError(error),
  };
  const line = JSON.stringify(entry);

  if (level === "error") console.error(line);
  else if (level === "warn") console.warn(line);
  else console.log(line);
}

export const logger = {
  debug: (message: string, context?: LogContext): void => write("debug", message, context),
  info: (message: string, context?: LogContext): void => write("info", message, context),
  warn: (message: string, context?: LogContext): void => write("warn", message, context),
  error: (message: string, context?: LogContext & { error?: unknown }): void => write("error", message, context),
};

type BoundContext = Omit<LogContext, "requestId" | "stage">;

/** Logger with requestId and stage fixed for every entry */
export function createRequestLogger(requestId: string, stage?: Stage) {
  return {
    debug(message: string, context?: BoundContext): void {
      logger.debug(message, { ...context, requestId, stage });
    },

    info(message: string, context?: BoundContext): void {
      logger.info(message, { ...context, requestId, stage });
    },

    warn(message: string, context?: BoundContext): void {
      logger.warn(message, { ...context, requestId, stage });
    },

    error(message: string, context?: BoundContext & { error?: unknown }): void {
      logger.error(message, { ...context, requestId, stage });
    },
  };
}

export type RequestLogger = ReturnType<typeof createRequestLogger>;
