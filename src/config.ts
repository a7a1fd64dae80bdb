import { z } from "zod"

export type LlmProvider = "openai" | "ollama"
export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace"

export interface SecuritySettings {
  maxQueriesPerMinute: number
  maxQueriesPerHour: number
  maxResponseTokens: number
  rateLimitEnabled: boolean
}

export interface VectorStoreSettings {
  baseUrl: string
  collection: string
  timeoutMs: number
}

export interface AppConfig {
  port: number
  host: string
  trustProxy: boolean
  bodyLimitBytes: number
  logDir: string
  logLevel: LogLevel
  security: SecuritySettings
  retrievalTopK: number
  llmProvider: LlmProvider
  llmModel: string
  embeddingModel: string
  openaiApiKey: string
  ollamaBaseUrl: string
  vectorStore: VectorStoreSettings
}

const EnvSchema = z.object({
  PORT: z.string().optional(),
  HOST: z.string().optional(),
  INSIGHTGATE_TRUST_PROXY: z.string().optional(),
  INSIGHTGATE_BODY_LIMIT_BYTES: z.string().optional(),
  INSIGHTGATE_LOG_DIR: z.string().default("./data/logs"),
  INSIGHTGATE_LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace"]).default("info"),
  INSIGHTGATE_MAX_QUERIES_PER_MINUTE: z.string().optional(),
  INSIGHTGATE_MAX_QUERIES_PER_HOUR: z.string().optional(),
  INSIGHTGATE_MAX_RESPONSE_TOKENS: z.string().optional(),
  INSIGHTGATE_RETRIEVAL_TOP_K: z.string().optional(),
  INSIGHTGATE_RATE_LIMIT_ENABLED: z.string().optional(),
  INSIGHTGATE_LLM_PROVIDER: z.enum(["openai", "ollama"]).default("openai"),
  INSIGHTGATE_LLM_MODEL: z.string().default("gpt-4o-mini"),
  INSIGHTGATE_EMBEDDING_MODEL: z.string().default("text-embedding-3-large"),
  INSIGHTGATE_OPENAI_API_KEY: z.string().default(""),
  INSIGHTGATE_OLLAMA_BASE_URL: z.string().default("http://localhost:11434/api"),
  INSIGHTGATE_CHROMA_URL: z.string().default("http://localhost:8001"),
  INSIGHTGATE_CHROMA_COLLECTION: z.string().default("sentiment_data"),
  INSIGHTGATE_CHROMA_TIMEOUT_MS: z.string().optional(),
})

function toBoolean(input: string | undefined, defaultValue: boolean): boolean {
  if (input === undefined) {
    return defaultValue
  }

  const normalized = input.trim().toLowerCase()
  if (["1", "true", "yes", "on"].includes(normalized)) {
    return true
  }

  if (["0", "false", "no", "off"].includes(normalized)) {
    return false
  }

  return defaultValue
}

function toInteger(input: string | undefined, defaultValue: number): number {
  if (!input) {
    return defaultValue
  }

  const parsed = Number.parseInt(input, 10)
  if (Number.isNaN(parsed)) {
    return defaultValue
  }

  return parsed
}

function toMinInteger(input: string | undefined, defaultValue: number, min: number): number {
  const parsed = toInteger(input, defaultValue)
  return parsed < min ? min : parsed
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = EnvSchema.parse(env)

  return {
    port: toInteger(parsed.PORT, 8000),
    host: parsed.HOST ?? "0.0.0.0",
    trustProxy: toBoolean(parsed.INSIGHTGATE_TRUST_PROXY, false),
    bodyLimitBytes: toMinInteger(parsed.INSIGHTGATE_BODY_LIMIT_BYTES, 256 * 1024, 1024),
    logDir: parsed.INSIGHTGATE_LOG_DIR,
    logLevel: parsed.INSIGHTGATE_LOG_LEVEL,
    security: {
      maxQueriesPerMinute: toMinInteger(parsed.INSIGHTGATE_MAX_QUERIES_PER_MINUTE, 10, 1),
      maxQueriesPerHour: toMinInteger(parsed.INSIGHTGATE_MAX_QUERIES_PER_HOUR, 100, 1),
      maxResponseTokens: toMinInteger(parsed.INSIGHTGATE_MAX_RESPONSE_TOKENS, 2000, 1),
      rateLimitEnabled: toBoolean(parsed.INSIGHTGATE_RATE_LIMIT_ENABLED, true),
    },
    retrievalTopK: toMinInteger(parsed.INSIGHTGATE_RETRIEVAL_TOP_K, 10, 1),
    llmProvider: parsed.INSIGHTGATE_LLM_PROVIDER,
    llmModel: parsed.INSIGHTGATE_LLM_MODEL,
    embeddingModel: parsed.INSIGHTGATE_EMBEDDING_MODEL,
    openaiApiKey: parsed.INSIGHTGATE_OPENAI_API_KEY,
    ollamaBaseUrl: parsed.INSIGHTGATE_OLLAMA_BASE_URL,
    vectorStore: {
      baseUrl: parsed.INSIGHTGATE_CHROMA_URL.trim().replace(/\/+$/, ""),
      collection: parsed.INSIGHTGATE_CHROMA_COLLECTION,
      timeoutMs: toMinInteger(parsed.INSIGHTGATE_CHROMA_TIMEOUT_MS, 8_000, 100),
    },
  }
}
