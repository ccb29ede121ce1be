import type { ChunkHit, ChunkVector, VectorStore } from '../vector-store'
import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { cosineSimilarity } from '@fm-synth/utils/vector'
import { z } from 'zod/v4'
import { ChunkVectorSchema } from '../vector-store'

export const VECTOR_INDEX_FILE = 'vectors.json'

const VectorIndexFileSchema = z.object({
  /** Embedding dimension, `null` while the index is empty */
  dimension: z.number().int().positive().nullable(),
  vectors: z.array(ChunkVectorSchema),
})

type VectorIndexFile = z.infer<typeof VectorIndexFileSchema>

export interface LocalVectorStoreOptions {
  /** Index directory, or `'memory'` for a temporary one removed on close */
  path: string
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

/**
 * Chunk vectors in one JSON file, `{path}/vectors.json`.
 *
 * Search is brute-force cosine similarity. Every vector in an index shares
 * one dimension, so an index built with one embedding model cannot be
 * queried or extended with another.
 */
export class LocalVectorStore implements VectorStore {
  private vectors = new Map<string, ChunkVector>()
  private dimension: number | null = null
  private filePath: string | null = null
  private tempDir: string | undefined = undefined

  async open(options: LocalVectorStoreOptions): Promise<void> {
    let dir = options.path
    if (dir === 'memory') {
      dir = mkdtempSync(join(tmpdir(), 'fm-synth-vectors-'))
      this.tempDir = dir
    }
    else {
      mkdirSync(dir, { recursive: true })
    }
    this.filePath = join(dir, VECTOR_INDEX_FILE)

    let raw: string
    try {
      raw = readFileSync(this.filePath, 'utf8')
    }
    catch (err) {
      if (isNotFound(err))
        return
      throw new Error(`Failed to load vector index from ${this.filePath}: ${err instanceof Error ? err.message : String(err)}`, { cause: err })
    }

    let json: unknown
    try {
      json = JSON.parse(raw)
    }
    catch (err) {
      throw new Error(`Vector index ${this.filePath} is corrupt: ${err instanceof Error ? err.message : String(err)}`, { cause: err })
    }
    const stored = VectorIndexFileSchema.safeParse(json)
    if (!stored.success)
      throw new Error(`Vector index ${this.filePath} is corrupt: ${z.prettifyError(stored.error)}`)
    this.dimension = stored.data.dimension
    this.vectors = new Map(stored.data.vectors.map(v => [v.id, v]))
  }

  async close(): Promise<void> {
    try {
      this.flush()
    }
    finally {
      this.vectors = new Map()
      this.dimension = null
      this.filePath = null
      if (this.tempDir) {
        rmSync(this.tempDir, { recursive: true, force: true })
        this.tempDir = undefined
      }
    }
  }

  async upsertBatch(vectors: readonly ChunkVector[]): Promise<void> {
    for (const vector of vectors) {
      this.checkDimension(vector.embedding, `vector ${vector.id}`)
      this.dimension ??= vector.embedding.length
      this.vectors.set(vector.id, vector)
    }
    this.flush()
  }

  async search(query: readonly number[], topK: number): Promise<ChunkHit[]> {
    if (this.vectors.size === 0)
      return []
    this.checkDimension(query, 'query')

    const hits: ChunkHit[] = []
    for (const { id, embedding, metadata } of this.vectors.values())
      hits.push({ id, score: cosineSimilarity(query, embedding), metadata })

    hits.sort((a, b) => b.score - a.score || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
    return hits.slice(0, topK)
  }

  async count(): Promise<number> {
    return this.vectors.size
  }

  private checkDimension(embedding: readonly number[], what: string): void {
    if (this.dimension !== null && embedding.length !== this.dimension)
      throw new Error(`${what} has dimension ${embedding.length}, index has ${this.dimension}`)
  }

  private flush(): void {
    if (!this.filePath)
      return
    const file: VectorIndexFile = {
      dimension: this.dimension,
      vectors: [...this.vectors.values()].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0)),
    }
    writeFileSync(this.filePath, JSON.stringify(file), 'utf8')
  }
}
