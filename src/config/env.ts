import { z } from "zod";

// ============================================
// Environment configuration with validation
// Fails fast on startup if config is invalid
// ============================================

const intFromEnv = (fallback: string, min: number) =>
  z
    .string()
    .default(fallback)
    .transform(Number)
    .pipe(z.number().int().min(min));

export const envSchema = z
  .object({
    // Server
    PORT: intFromEnv("3000", 0),
    NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).optional(),

    // OpenAI
    OPENAI_API_KEY: z.string().min(1, "OPENAI_API_KEY is required"),
    CHAT_MODEL: z.string().default("gpt-4o"),
    CHAT_TEMPERATURE: z.string().default("0.5").transform(Number).pipe(z.number().min(0).max(2)),
    EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
    // Unset keeps the model's native width
    EMBEDDING_DIMENSIONS: z
      .string()
      .optional()
      .transform((v) => (v ? Number(v) : undefined))
      .pipe(z.number().int().min(1).optional()),
    EMBEDDING_BATCH_SIZE: intFromEnv("64", 1),
    LLM_MAX_RETRIES: intFromEnv("2", 0),

    // Tavily (optional - web search tool is disabled without it)
    TAVILY_API_KEY: z.string().optional(),
    WEB_SEARCH_MAX_RESULTS: intFromEnv("2", 1),
    WEB_SEARCH_TOPIC: z.enum(["general", "news"]).default("general"),

    // Ingestion + index
    DATA_DIR: z.string().default("./data"),
    INDEX_DIR: z.string().default("./vectorstore"),
    TEXT_EXTENSIONS: z.string().default(".txt"),
    CHUNK_SIZE: intFromEnv("1200", 1),
    CHUNK_OVERLAP: intFromEnv("200", 0),
    RETRIEVAL_K: intFromEnv("4", 1),

    // Agent loop
    AGENT_MAX_ROUNDS: intFromEnv("6", 1),
    TOOL_TIMEOUT_MS: intFromEnv("20000", 1),
    THINK_TIMEOUT_MS: intFromEnv("60000", 1),
    THINK_RETRIES: intFromEnv("1", 0),
  })
  .refine((e) => e.CHUNK_OVERLAP < e.CHUNK_SIZE, {
    message: "CHUNK_OVERLAP must be smaller than CHUNK_SIZE",
    path: ["CHUNK_OVERLAP"],
  });

export type Env = z.infer<typeof envSchema>;

function validateEnv(): Env {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    console.error("❌ Invalid environment configuration:");
    for (const issue of result.error.issues) {
      console.error(`   ${issue.path.join(".")}: ${issue.message}`);
    }
    process.exit(1);
  }

  return result.data;
}

/**
 * Parse file extensions from environment variable.
 * Accepts "txt,md" or ".txt,.md"; always returns lowercase with a leading dot.
 */
export function parseExtensions(extStr: string): string[] {
  return extStr
    .split(",")
    .map((e) => e.trim().toLowerCase())
    .filter(Boolean)
    .map((e) => (e.startsWith(".") ? e : `.${e}`));
}

export function buildConfig(env: Env) {
  return {
    port: env.PORT,
    isDev: env.NODE_ENV === "development",
    isProd: env.NODE_ENV === "production",

    openai: {
      apiKey: env.OPENAI_API_KEY,
      chatModel: env.CHAT_MODEL,
      temperature: env.CHAT_TEMPERATURE,
      embeddingModel: env.EMBEDDING_MODEL,
      embeddingDimensions: env.EMBEDDING_DIMENSIONS,
      embeddingBatchSize: env.EMBEDDING_BATCH_SIZE,
      maxRetries: env.LLM_MAX_RETRIES,
    },

    webSearch: {
      apiKey: env.TAVILY_API_KEY,
      maxResults: env.WEB_SEARCH_MAX_RESULTS,
      topic: env.WEB_SEARCH_TOPIC,
      isConfigured: Boolean(env.TAVILY_API_KEY),
    },

    ingestion: {
      dataDir: env.DATA_DIR,
      extensions: parseExtensions(env.TEXT_EXTENSIONS),
      chunkSize: env.CHUNK_SIZE,
      chunkOverlap: env.CHUNK_OVERLAP,
    },

    index: {
      persistPath: env.INDEX_DIR,
      retrievalK: env.RETRIEVAL_K,
    },

    agent: {
      maxRounds: env.AGENT_MAX_ROUNDS,
      toolTimeoutMs: env.TOOL_TIMEOUT_MS,
      thinkTimeoutMs: env.THINK_TIMEOUT_MS,
      thinkRetries: env.THINK_RETRIES,
    },
  } as const;
}

export type AppConfig = ReturnType<typeof buildConfig>;

// Validate on module load
export const env = validateEnv();

export const config = buildConfig(env);
