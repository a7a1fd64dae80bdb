import type { Loggers } from "../logger"
import type {
  ConversationTurn,
  GateDecision,
  GateDenial,
  QueryType,
  RetrievalFilter,
  RetrievalResult,
  SourceSummary,
  TokenUsage,
} from "../types"
import { buildContext, DEFAULT_MAX_CHUNKS, DEFAULT_MAX_SOURCES, formatSources } from "./context-assembler"
import { ANALYST_SYSTEM_PROMPT, type Generator } from "./generator"
import { classifyQuery } from "./query-classifier"
import { rerank } from "./reranker"
import type { Retriever } from "./retriever"
import type { SecurityGate } from "./security-gate"
import { hashUserId } from "./user-state-store"

export interface QueryPipelineOptions {
  gate: SecurityGate
  retriever: Retriever
  generator: Generator
  loggers: Loggers
  retrievalTopK: number
  systemPrompt?: string
  maxChunks?: number
  maxSources?: number
  now?: () => number
}

export interface BlockedOutcome {
  blocked: true
  response: string
  sources: SourceSummary[]
  queryType: "blocked"
  denial: GateDenial
  warning?: string
  processingTimeMs: number
}

export interface AnsweredOutcome {
  blocked: false
  response: string
  sources: SourceSummary[]
  queryType: QueryType
  warning?: string
  usage: TokenUsage
  truncated: boolean
  retrievalFailed: boolean
  processingTimeMs: number
}

export type QueryOutcome = BlockedOutcome | AnsweredOutcome

export class QueryPipeline {
  private readonly now: () => number

  constructor(private readonly options: QueryPipelineOptions) {
    this.now = options.now ?? Date.now
  }

  validate(query: string, userId: string): Promise<GateDecision> {
    return this.options.gate.validate(query, userId)
  }

  async processQuery(
    query: string,
    userId: string,
    filters?: RetrievalFilter,
    history?: ConversationTurn[],
  ): Promise<QueryOutcome> {
    const started = this.now()
    const { gate, generator, loggers } = this.options

    const decision = await gate.validate(query, userId)
    if (!decision.allowed) {
      return {
        blocked: true,
        response: `Query rejected: ${decision.message}`,
        sources: [],
        queryType: "blocked",
        denial: decision,
        warning: decision.warning,
        processingTimeMs: this.now() - started,
      }
    }

    const retrieval = await this.retrieve(query, filters)
    if (!retrieval.ok) {
      loggers.app.warn({ error: retrieval.error }, "retrieval failed; continuing with empty context")
    }

    const ranked = rerank(retrieval.ok ? retrieval.chunks : [])
    const context = buildContext(ranked, this.options.maxChunks ?? DEFAULT_MAX_CHUNKS)

    const generated = await generator.generate({
      systemPrompt: this.options.systemPrompt ?? ANALYST_SYSTEM_PROMPT,
      context,
      query,
      history,
    })

    const leakKeywords = gate.inspectResponse(generated.text)
    if (leakKeywords.length > 0) {
      loggers.security.warn(
        { userKey: hashUserId(userId), keywords: leakKeywords },
        "response contains potentially sensitive keywords",
      )
    }

    const guarded = gate.guardResponse(generated.text)
    if (guarded.truncated) {
      loggers.security.warn(
        { userKey: hashUserId(userId), estimatedTokens: Math.round(guarded.estimatedTokens) },
        "response truncated to size limit",
      )
    }

    const queryType = classifyQuery(query)
    const processingTimeMs = this.now() - started

    loggers.app.info(
      {
        userKey: hashUserId(userId),
        queryType,
        retrieved: ranked.length,
        retrievalFailed: !retrieval.ok,
        truncated: guarded.truncated,
        totalTokens: generated.usage.totalTokens,
        durationMs: processingTimeMs,
      },
      "query processed",
    )

    return {
      blocked: false,
      response: guarded.text,
      sources: formatSources(ranked, this.options.maxSources ?? DEFAULT_MAX_SOURCES),
      queryType,
      warning: decision.warning,
      usage: generated.usage,
      truncated: guarded.truncated,
      retrievalFailed: !retrieval.ok,
      processingTimeMs,
    }
  }

  private async retrieve(query: string, filters: RetrievalFilter | undefined): Promise<RetrievalResult> {
    try {
      return await this.options.retriever.search(query, this.options.retrievalTopK, filters)
    } catch (error) {
      return { ok: false, error: error instanceof Error ? error.message : String(error) }
    }
  }
}
