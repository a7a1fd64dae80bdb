export type ChunkType = "country_summary" | "anomaly" | "monthly" | "weekly" | "daily"

export type ChunkMetadataValue = string | number | boolean | null

export type ChunkMetadata = Record<string, ChunkMetadataValue>

export interface Chunk {
  id: string
  text: string
  metadata: ChunkMetadata
  distance: number
}

export interface RankedChunk extends Chunk {
  rerankScore: number
}

export interface SourceSummary {
  chunkId: string
  chunkType: string
  relevanceScore: number
  metadata: ChunkMetadata
}

export type QueryType = "forecast" | "trend" | "correlation" | "anomaly" | "historical"

export interface RetrievalFilter {
  countries?: string[]
  startDate?: string
  endDate?: string
  types?: ChunkType[]
}

export type RetrievalResult =
  | { ok: true; chunks: Chunk[] }
  | { ok: false; error: string }

export interface ConversationTurn {
  role: "user" | "assistant"
  content: string
}

export interface TokenUsage {
  promptTokens: number
  completionTokens: number
  totalTokens: number
}

export interface QueryRecord {
  text: string
  timestamp: number
}

export type DenialReason =
  | "blocked"
  | "too_short"
  | "too_long"
  | "prompt_injection"
  | "sql_injection"
  | "code_execution"
  | "sensitive_info"
  | "data_theft"
  | "bulk_extraction"
  | "rate_limited"
  | "internal_error"

export type DenialCategory = "blocked" | "invalid_input" | "policy_violation" | "rate_limited"

export type GateDecision =
  | { allowed: true; reason: "ok"; warning?: string }
  | {
      allowed: false
      reason: DenialReason
      category: DenialCategory
      message: string
      warning?: string
    }

export type GateDenial = Extract<GateDecision, { allowed: false }>
