import type { RetrievalContext, RetrievedChunk } from './types'

export interface DocumentSearchOptions {
  signal?: AbortSignal
}

/**
 * DocumentStore: chunked, searchable evidence for synthesis.
 *
 * `search` must be deterministic for a fixed index and query.
 */
export interface DocumentStore {
  search: (query: string, topK: number, options?: DocumentSearchOptions) => Promise<RetrievalContext>
}

/**
 * Order chunks by descending score, ties by ascending chunk id
 */
export function compareRetrievedChunks(a: RetrievedChunk, b: RetrievedChunk): number {
  if (b.score !== a.score)
    return b.score - a.score
  return a.chunkId < b.chunkId ? -1 : a.chunkId > b.chunkId ? 1 : 0
}

export function rankChunks(chunks: readonly RetrievedChunk[], topK: number): RetrievedChunk[] {
  return [...chunks].sort(compareRetrievedChunks).slice(0, Math.max(0, topK))
}
