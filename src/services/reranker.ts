import type { Chunk, ChunkMetadata, ChunkType, RankedChunk } from "../types"

export const TYPE_BOOSTS: Record<ChunkType, number> = {
  country_summary: 1.2,
  anomaly: 1.15,
  monthly: 1.1,
  weekly: 1.05,
  daily: 1.0,
}

function isChunkType(value: string): value is ChunkType {
  return Object.hasOwn(TYPE_BOOSTS, value)
}

export function metadataType(metadata: ChunkMetadata): string {
  const type = metadata.type
  return typeof type === "string" && type.length > 0 ? type : "unknown"
}

export function typeBoost(type: string): number {
  return isChunkType(type) ? TYPE_BOOSTS[type] : 1.0
}

export function rerankScore(chunk: Chunk): number {
  return (1 - chunk.distance) * typeBoost(metadataType(chunk.metadata))
}

/**
 * Orders candidates by `(1 - distance) * typeBoost`, highest first.
 * Array.prototype.sort is stable, so equal scores keep retrieval order.
 */
export function rerank(candidates: Chunk[]): RankedChunk[] {
  return candidates
    .map((chunk) => ({ ...chunk, rerankScore: rerankScore(chunk) }))
    .sort((a, b) => b.rerankScore - a.rerankScore)
}
