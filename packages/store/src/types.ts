import { z } from 'zod/v4'

/**
 * A piece of a source document, as produced by ingestion
 */
export const DocumentChunkSchema = z.object({
  /** `<source>::chunk::<n>` */
  chunkId: z.string(),
  /** Source document file name */
  sourceId: z.string(),
  text: z.string(),
  metadata: z.record(z.string(), z.unknown()).optional(),
})

export type DocumentChunk = z.infer<typeof DocumentChunkSchema>

export const RetrievedChunkSchema = z.object({
  chunkId: z.string(),
  sourceId: z.string(),
  text: z.string(),
  /** Relevance score, higher is better */
  score: z.number(),
})

export type RetrievedChunk = z.infer<typeof RetrievedChunkSchema>

/**
 * Evidence fetched for one prompt
 */
export const RetrievalContextSchema = z.object({
  query: z.string(),
  /** Descending score, then ascending chunk id */
  chunks: z.array(RetrievedChunkSchema),
})

export type RetrievalContext = z.infer<typeof RetrievalContextSchema>
