import { EmbeddingSimilarity, MockEmbedding } from '@fm-synth/store'
import { describe, expect, it, vi } from 'vitest'

describe('EmbeddingSimilarity', () => {
  it('scores names with the same normal form 1 and keeps scores in [0, 1]', async () => {
    const similarity = new EmbeddingSimilarity(new MockEmbedding(16))
    const matrix = await similarity.matrix(['Spell Check', 'Autosave'], ['spell_check', 'Themes'])

    expect(matrix[0]?.[0]).toBe(1)
    for (const value of matrix.flat()) {
      expect(value).toBeGreaterThanOrEqual(0)
      expect(value).toBeLessThanOrEqual(1)
    }
  })

  it('embeds each normalized name once', async () => {
    const embedding = new MockEmbedding(16)
    const spy = vi.spyOn(embedding, 'embedBatch')
    const similarity = new EmbeddingSimilarity(embedding)

    await similarity.matrix(['Spell Check'], ['spell_check', 'Themes'])
    await similarity.matrix(['Themes'], ['SpellCheck'])

    expect(spy).toHaveBeenCalledTimes(1)
    expect(spy).toHaveBeenCalledWith(['spell check', 'themes'])
  })
})
