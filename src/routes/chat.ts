import type { FastifyReply, FastifyRequest } from "fastify"
import { z } from "zod"
import { type ErrorPayload, sendError } from "../lib/http"
import type { ServerContext } from "../server-context"
import { GenerationError } from "../services/generator"
import type { DenialCategory, RetrievalFilter, SourceSummary } from "../types"

const IsoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Expected YYYY-MM-DD")

const ChatRequestSchema = z.object({
  // Length bounds are enforced by the security gate.
  query: z.string().max(10_000),
  countries: z.array(z.string().min(1).max(80)).max(50).optional(),
  types: z.array(z.enum(["country_summary", "anomaly", "monthly", "weekly", "daily"])).max(5).optional(),
  start_date: IsoDateSchema.optional(),
  end_date: IsoDateSchema.optional(),
  history: z
    .array(
      z.object({
        role: z.enum(["user", "assistant"]),
        content: z.string().max(8_000),
      }),
    )
    .max(20)
    .optional(),
})

type ChatRequest = z.infer<typeof ChatRequestSchema>

const DENIAL_STATUS: Record<DenialCategory, number> = {
  invalid_input: 400,
  policy_violation: 403,
  blocked: 403,
  rate_limited: 429,
}

export interface SourcePayload {
  chunk_id: string
  chunk_type: string
  relevance_score: number
  metadata: SourceSummary["metadata"]
}

export interface ChatResponsePayload {
  response: string
  sources: SourcePayload[]
  query_type: string
  processing_time_ms: number
  warning: string | null
}

/**
 * Client address as seen by the server; with `trustProxy` on, Fastify takes
 * it from `x-forwarded-for`.
 */
export function resolveUserId(request: FastifyRequest): string {
  return request.ip || "anonymous"
}

function toFilter(body: ChatRequest): RetrievalFilter | undefined {
  if (!body.countries?.length && !body.types?.length && !body.start_date && !body.end_date) {
    return undefined
  }

  return {
    countries: body.countries,
    types: body.types,
    startDate: body.start_date,
    endDate: body.end_date,
  }
}

function toSourcePayload(source: SourceSummary): SourcePayload {
  return {
    chunk_id: source.chunkId,
    chunk_type: source.chunkType,
    relevance_score: source.relevanceScore,
    metadata: source.metadata,
  }
}

export async function handleChat(
  request: FastifyRequest,
  reply: FastifyReply,
  ctx: ServerContext,
): Promise<ChatResponsePayload | ErrorPayload> {
  const parsed = ChatRequestSchema.safeParse(request.body)

  if (!parsed.success) {
    return sendError(reply, 400, "Invalid chat payload", parsed.error.flatten())
  }

  const body = parsed.data
  const userId = resolveUserId(request)

  try {
    const outcome = await ctx.pipeline.processQuery(body.query, userId, toFilter(body), body.history)

    if (outcome.blocked) {
      return sendError(reply, DENIAL_STATUS[outcome.denial.category], outcome.denial.message, {
        category: outcome.denial.category,
      })
    }

    return {
      response: outcome.response,
      sources: outcome.sources.map(toSourcePayload),
      query_type: outcome.queryType,
      processing_time_ms: outcome.processingTimeMs,
      warning: outcome.warning ?? null,
    }
  } catch (error) {
    ctx.loggers.app.error({ error }, "chat request failed")
    if (error instanceof GenerationError) {
      return sendError(reply, 502, "Failed to generate a response")
    }
    return sendError(reply, 500, "Failed to process chat request")
  }
}

export async function handleChatStats(_request: FastifyRequest, reply: FastifyReply, ctx: ServerContext) {
  try {
    const stats = await ctx.retriever.stats()
    return {
      status: "operational",
      collection_stats: {
        total_chunks: stats.totalChunks,
        chunk_types_sample: stats.chunkTypesSample,
      },
    }
  } catch (error) {
    ctx.loggers.app.error({ error }, "failed to read collection stats")
    return sendError(reply, 502, "Vector store unavailable")
  }
}
