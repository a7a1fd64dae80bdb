import type { RankedChunk, SourceSummary } from "../types"
import { metadataType } from "./reranker"

export const DEFAULT_MAX_CHUNKS = 8
export const DEFAULT_MAX_SOURCES = 5

export function buildContext(chunks: RankedChunk[], maxChunks = DEFAULT_MAX_CHUNKS): string {
  const parts: string[] = []

  chunks.slice(0, Math.max(0, maxChunks)).forEach((chunk, index) => {
    parts.push(`[Source ${index + 1} - ${metadataType(chunk.metadata)}]`)
    parts.push(chunk.text)
    parts.push("")
  })

  return parts.join("\n")
}

export function formatSources(chunks: RankedChunk[], maxSources = DEFAULT_MAX_SOURCES): SourceSummary[] {
  return chunks.slice(0, Math.max(0, maxSources)).map((chunk) => ({
    chunkId: chunk.id,
    chunkType: metadataType(chunk.metadata),
    relevanceScore: chunk.rerankScore,
    metadata: chunk.metadata,
  }))
}
