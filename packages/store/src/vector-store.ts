import { z } from 'zod/v4'

/**
 * What a chunk vector carries besides its embedding, enough to rebuild a
 * retrieved chunk without the chunk files
 */
export const ChunkMetadataSchema = z.object({
  sourceId: z.string(),
  text: z.string(),
})

export type ChunkMetadata = z.infer<typeof ChunkMetadataSchema>

export const ChunkVectorSchema = z.object({
  /** Chunk id, `<source>::chunk::<n>` */
  id: z.string(),
  embedding: z.array(z.number()),
  metadata: ChunkMetadataSchema,
})

export type ChunkVector = z.infer<typeof ChunkVectorSchema>

export interface ChunkHit {
  id: string
  /** Cosine similarity to the query */
  score: number
  metadata: ChunkMetadata
}

/**
 * Index of chunk embeddings searched by cosine similarity
 */
export interface VectorStore {
  /** Insert or replace vectors by id */
  upsertBatch: (vectors: readonly ChunkVector[]) => Promise<void>

  /** Best `topK` hits, equal scores ordered by ascending id */
  search: (query: readonly number[], topK: number) => Promise<ChunkHit[]>

  count: () => Promise<number>

  close: () => Promise<void>
}
