import type { DocumentSearchOptions, DocumentStore } from './document-store'
import type { Embedding } from './embedding'
import type { DocumentChunk, RetrievalContext, RetrievedChunk } from './types'
import type { VectorStore } from './vector-store'
import { RetrievalError } from '@fm-synth/utils/errors'
import { createLogger } from '@fm-synth/utils/logger'
import { rankChunks } from './document-store'

const log = createLogger('DocumentStore')

const EMBED_BATCH_SIZE = 32

export interface VectorDocumentStoreOptions {
  embedding: Embedding
  vectorStore: VectorStore
}

/**
 * DocumentStore over an embedding model and a VectorStore.
 *
 * Chunk text and source travel as vector metadata, so a persisted
 * LocalVectorStore is enough to answer searches in a later run.
 */
export class VectorDocumentStore implements DocumentStore {
  private readonly embedding: Embedding
  private readonly vectorStore: VectorStore

  constructor(options: VectorDocumentStoreOptions) {
    this.embedding = options.embedding
    this.vectorStore = options.vectorStore
  }

  /**
   * Embed and upsert chunks; returns the number indexed
   */
  async index(chunks: readonly DocumentChunk[]): Promise<number> {
    for (let start = 0; start < chunks.length; start += EMBED_BATCH_SIZE) {
      const batch = chunks.slice(start, start + EMBED_BATCH_SIZE)
      const vectors = await this.embedding.embedBatch(batch.map(c => c.text))
      await this.vectorStore.upsertBatch(batch.map((chunk, i) => {
        const vector = vectors[i]
        if (!vector)
          throw new Error(`${this.embedding.getProvider()} returned ${vectors.length} embeddings for ${batch.length} chunks`)
        return { id: chunk.chunkId, embedding: vector.vector, metadata: { sourceId: chunk.sourceId, text: chunk.text } }
      }))
      log.debug(`Indexed ${Math.min(start + EMBED_BATCH_SIZE, chunks.length)}/${chunks.length} chunks`)
    }
    return chunks.length
  }

  async count(): Promise<number> {
    return this.vectorStore.count()
  }

  async search(query: string, topK: number, options: DocumentSearchOptions = {}): Promise<RetrievalContext> {
    options.signal?.throwIfAborted()
    try {
      const { vector } = await this.embedding.embed(query, { signal: options.signal })
      const hits = await this.vectorStore.search(vector, topK)
      const chunks: RetrievedChunk[] = hits.map(hit => ({
        chunkId: hit.id,
        sourceId: hit.metadata.sourceId,
        text: hit.metadata.text,
        score: hit.score,
      }))
      return { query, chunks: rankChunks(chunks, topK) }
    }
    catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      throw new RetrievalError(`Search failed for "${query}": ${message}`, { cause: error })
    }
  }
}
