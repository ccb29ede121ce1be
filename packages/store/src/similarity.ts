import type { Similarity } from '@fm-synth/model/similarity'
import type { Embedding } from './embedding'
import { normalizeName } from '@fm-synth/model/similarity'
import { cosineSimilarity } from '@fm-synth/utils/vector'

/**
 * Name similarity by cosine of embeddings, clamped to [0, 1].
 *
 * Names are normalized before embedding and vectors are cached per
 * normalized name, so repeated merges only embed new names.
 */
export class EmbeddingSimilarity implements Similarity {
  private readonly cache = new Map<string, number[]>()

  constructor(private readonly embedding: Embedding) {}

  async matrix(left: readonly string[], right: readonly string[]): Promise<number[][]> {
    const leftKeys = left.map(normalizeName)
    const rightKeys = right.map(normalizeName)
    const missing = [...new Set([...leftKeys, ...rightKeys])].filter(key => !this.cache.has(key))
    if (missing.length > 0) {
      const vectors = await this.embedding.embedBatch(missing)
      missing.forEach((key, i) => {
        const vector = vectors[i]
        if (vector)
          this.cache.set(key, vector.vector)
      })
    }

    return leftKeys.map(a => rightKeys.map((b) => {
      if (a === b)
        return 1
      const va = this.cache.get(a)
      const vb = this.cache.get(b)
      if (!va || !vb)
        return 0
      return Math.max(0, Math.min(1, cosineSimilarity(va, vb)))
    }))
  }
}
