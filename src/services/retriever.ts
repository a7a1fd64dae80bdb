import { embed } from "ai"
import { z } from "zod"
import type { AppConfig } from "../config"
import type { Chunk, ChunkMetadata, RetrievalFilter, RetrievalResult } from "../types"
import { getEmbeddingModel } from "./model-provider"
import { metadataType } from "./reranker"

export interface CollectionStats {
  totalChunks: number
  chunkTypesSample: Record<string, number>
}

export interface CountrySummary {
  name: string
  dataStart: string
  dataEnd: string
  meanSentiment: number | null
  stdSentiment: number | null
}

export interface Retriever {
  search(query: string, topK: number, filter?: RetrievalFilter): Promise<RetrievalResult>
  stats(): Promise<CollectionStats>
  countries(): Promise<CountrySummary[]>
}

export type QueryEmbedder = (text: string) => Promise<number[]>

type FetchImpl = (input: Request | URL | string, init?: RequestInit) => Promise<Response>

interface ChromaRetrieverDependencies {
  fetchImpl?: FetchImpl
  embedder?: QueryEmbedder
  setTimeoutImpl?: typeof setTimeout
  clearTimeoutImpl?: typeof clearTimeout
}

export type WhereClause = Record<string, unknown>

const MetadataValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()])
const MetadataSchema = z.record(MetadataValueSchema).nullable()

const CollectionSchema = z.object({
  id: z.string(),
  name: z.string(),
})

const QueryResponseSchema = z.object({
  ids: z.array(z.array(z.string())),
  documents: z.array(z.array(z.string().nullable())).nullish(),
  metadatas: z.array(z.array(MetadataSchema)).nullish(),
  distances: z.array(z.array(z.number().nullable())).nullish(),
})

const GetResponseSchema = z.object({
  ids: z.array(z.string()),
  metadatas: z.array(MetadataSchema).nullish(),
})

export function createQueryEmbedder(config: AppConfig): QueryEmbedder {
  return async (text) => {
    const { embedding } = await embed({
      model: getEmbeddingModel(config),
      value: text,
    })
    return embedding
  }
}

export function buildWhereClause(filter: RetrievalFilter | undefined): WhereClause | undefined {
  if (!filter) {
    return undefined
  }

  const clauses: WhereClause[] = []

  if (filter.countries && filter.countries.length > 0) {
    clauses.push({ country: { $in: filter.countries } })
  }

  if (filter.types && filter.types.length > 0) {
    clauses.push({ type: { $in: filter.types } })
  }

  if (clauses.length === 0) {
    return undefined
  }

  return clauses.length === 1 ? clauses[0] : { $and: clauses }
}

function stringField(metadata: ChunkMetadata, key: string): string | null {
  const value = metadata[key]
  return typeof value === "string" && value.length > 0 ? value : null
}

function numberField(metadata: ChunkMetadata, key: string): number | null {
  const value = metadata[key]
  return typeof value === "number" && Number.isFinite(value) ? value : null
}

/** Country summary chunks carry the per-country span and statistics. */
export function toCountrySummary(metadata: ChunkMetadata): CountrySummary | null {
  const name = stringField(metadata, "country")
  const dataStart = stringField(metadata, "start_date")
  const dataEnd = stringField(metadata, "end_date")
  if (!name || !dataStart || !dataEnd) {
    return null
  }

  return {
    name,
    dataStart,
    dataEnd,
    meanSentiment: numberField(metadata, "mean"),
    stdSentiment: numberField(metadata, "std"),
  }
}

/**
 * Chunks carry either a single `date` or a `start_date`/`end_date` span as
 * ISO dates; a chunk is kept when its span overlaps the requested range.
 * Chunks without any date always pass.
 */
export function matchesDateRange(metadata: ChunkMetadata, filter: RetrievalFilter | undefined): boolean {
  if (!filter || (!filter.startDate && !filter.endDate)) {
    return true
  }

  const chunkStart = stringField(metadata, "date") ?? stringField(metadata, "start_date")
  const chunkEnd = stringField(metadata, "date") ?? stringField(metadata, "end_date") ?? chunkStart
  if (!chunkStart || !chunkEnd) {
    return true
  }

  if (filter.startDate && chunkEnd < filter.startDate) {
    return false
  }

  if (filter.endDate && chunkStart > filter.endDate) {
    return false
  }

  return true
}

export class ChromaRetriever implements Retriever {
  private readonly fetchImpl: FetchImpl
  private readonly embedder: QueryEmbedder
  private readonly setTimeoutImpl: typeof setTimeout
  private readonly clearTimeoutImpl: typeof clearTimeout
  private collectionId: string | null = null

  constructor(
    private readonly config: AppConfig,
    dependencies: ChromaRetrieverDependencies = {},
  ) {
    this.fetchImpl = dependencies.fetchImpl ?? fetch
    this.embedder = dependencies.embedder ?? createQueryEmbedder(config)
    this.setTimeoutImpl = dependencies.setTimeoutImpl ?? setTimeout
    this.clearTimeoutImpl = dependencies.clearTimeoutImpl ?? clearTimeout
  }

  async search(query: string, topK: number, filter?: RetrievalFilter): Promise<RetrievalResult> {
    try {
      const embedding = await this.embedder(query)
      const collectionId = await this.resolveCollectionId()
      const where = buildWhereClause(filter)

      const body: Record<string, unknown> = {
        query_embeddings: [embedding],
        n_results: topK,
        include: ["documents", "metadatas", "distances"],
      }
      if (where) {
        body.where = where
      }

      const json = await this.request(`/api/v1/collections/${collectionId}/query`, {
        method: "POST",
        body: JSON.stringify(body),
      })
      const parsed = QueryResponseSchema.parse(json)

      const ids = parsed.ids[0] ?? []
      const documents = parsed.documents?.[0] ?? []
      const metadatas = parsed.metadatas?.[0] ?? []
      const distances = parsed.distances?.[0] ?? []

      const chunks: Chunk[] = []
      ids.forEach((id, index) => {
        const metadata: ChunkMetadata = metadatas[index] ?? {}
        if (!matchesDateRange(metadata, filter)) {
          return
        }

        chunks.push({
          id,
          text: documents[index] ?? "",
          metadata,
          distance: distances[index] ?? 2,
        })
      })

      chunks.sort((a, b) => a.distance - b.distance)
      return { ok: true, chunks }
    } catch (error) {
      return { ok: false, error: error instanceof Error ? error.message : String(error) }
    }
  }

  async stats(): Promise<CollectionStats> {
    const collectionId = await this.resolveCollectionId()
    const count = z.number().int().nonnegative().parse(
      await this.request(`/api/v1/collections/${collectionId}/count`, { method: "GET" }),
    )

    const sample = GetResponseSchema.parse(
      await this.request(`/api/v1/collections/${collectionId}/get`, {
        method: "POST",
        body: JSON.stringify({ limit: Math.min(100, count), include: ["metadatas"] }),
      }),
    )

    const chunkTypesSample: Record<string, number> = {}
    for (const metadata of sample.metadatas ?? []) {
      const type = metadataType(metadata ?? {})
      chunkTypesSample[type] = (chunkTypesSample[type] ?? 0) + 1
    }

    return { totalChunks: count, chunkTypesSample }
  }

  async countries(): Promise<CountrySummary[]> {
    const collectionId = await this.resolveCollectionId()
    const response = GetResponseSchema.parse(
      await this.request(`/api/v1/collections/${collectionId}/get`, {
        method: "POST",
        body: JSON.stringify({ where: { type: "country_summary" }, include: ["metadatas"] }),
      }),
    )

    const summaries: CountrySummary[] = []
    for (const metadata of response.metadatas ?? []) {
      const summary = toCountrySummary(metadata ?? {})
      if (summary) {
        summaries.push(summary)
      }
    }

    return summaries.sort((a, b) => a.name.localeCompare(b.name))
  }

  private async resolveCollectionId(): Promise<string> {
    if (this.collectionId) {
      return this.collectionId
    }

    const name = encodeURIComponent(this.config.vectorStore.collection)
    const collection = CollectionSchema.parse(await this.request(`/api/v1/collections/${name}`, { method: "GET" }))
    this.collectionId = collection.id
    return collection.id
  }

  private async request(path: string, init: RequestInit): Promise<unknown> {
    const controller = new AbortController()
    const timeoutHandle = this.setTimeoutImpl(() => controller.abort(), this.config.vectorStore.timeoutMs)

    let response: Response
    try {
      response = await this.fetchImpl(`${this.config.vectorStore.baseUrl}${path}`, {
        ...init,
        headers: {
          Accept: "application/json",
          "Content-Type": "application/json",
        },
        signal: controller.signal,
      })
    } finally {
      this.clearTimeoutImpl(timeoutHandle)
    }

    if (!response.ok) {
      const bodyText = await response.text()
      throw new Error(`Vector store returned ${response.status}: ${bodyText.slice(0, 500)}`)
    }

    return response.json()
  }
}
