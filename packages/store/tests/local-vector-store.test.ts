import type { ChunkVector } from '@fm-synth/store/vector-store'
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { LocalVectorStore } from '@fm-synth/store/local/vector-store'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'

function chunk(id: string, embedding: number[], text = id): ChunkVector {
  return { id, embedding, metadata: { sourceId: 'editor.txt', text } }
}

describe('LocalVectorStore', () => {
  let store: LocalVectorStore

  beforeEach(async () => {
    store = new LocalVectorStore()
    await store.open({ path: 'memory' })
  })

  afterEach(async () => {
    await store.close()
  })

  it('returns no hits when empty', async () => {
    expect(await store.search([1, 0, 0], 5)).toEqual([])
    expect(await store.count()).toBe(0)
  })

  it('ranks hits by descending cosine similarity', async () => {
    await store.upsertBatch([chunk('a', [1, 0, 0]), chunk('b', [0, 1, 0]), chunk('c', [0.9, 0.1, 0])])

    const hits = await store.search([1, 0, 0], 3)
    expect(hits.map(h => h.id)).toEqual(['a', 'c', 'b'])
    expect(hits[0]?.score).toBeCloseTo(1)
  })

  it('orders equal scores by id and applies topK', async () => {
    await store.upsertBatch([chunk('chunk-b', [1, 0]), chunk('chunk-a', [2, 0]), chunk('chunk-c', [0, 1])])

    const hits = await store.search([1, 0], 2)
    expect(hits.map(h => h.id)).toEqual(['chunk-a', 'chunk-b'])
  })

  it('returns the chunk metadata with each hit', async () => {
    await store.upsertBatch([chunk('editor.txt::chunk::0', [1, 0], 'Spell check')])

    const hits = await store.search([1, 0], 1)
    expect(hits[0]?.metadata).toEqual({ sourceId: 'editor.txt', text: 'Spell check' })
  })

  it('replaces a vector upserted again under the same id', async () => {
    await store.upsertBatch([chunk('a', [1, 0], 'old')])
    await store.upsertBatch([chunk('a', [0, 1], 'new')])

    expect(await store.count()).toBe(1)
    const hits = await store.search([0, 1], 1)
    expect(hits.map(h => [h.id, h.metadata.text])).toEqual([['a', 'new']])
  })

  it('rejects vectors and queries of another dimension', async () => {
    await store.upsertBatch([chunk('a', [1, 0])])

    await expect(store.upsertBatch([chunk('b', [1, 0, 0])])).rejects.toThrow('vector b has dimension 3, index has 2')
    await expect(store.search([1, 0, 0], 1)).rejects.toThrow('query has dimension 3, index has 2')
  })
})

describe('LocalVectorStore persistence', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'fm-synth-lvs-test-'))
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('persists vectors across close and reopen', async () => {
    const first = new LocalVectorStore()
    await first.open({ path: dir })
    await first.upsertBatch([chunk('p', [1, 0, 0], 'persisted')])
    await first.close()

    const second = new LocalVectorStore()
    await second.open({ path: dir })
    const hits = await second.search([1, 0, 0], 1)
    expect(hits.map(h => [h.id, h.metadata.text])).toEqual([['p', 'persisted']])
    await second.close()
  })

  it('writes the dimension and vectors sorted by id', async () => {
    const store = new LocalVectorStore()
    await store.open({ path: dir })
    await store.upsertBatch([chunk('b', [0, 1]), chunk('a', [1, 0])])
    await store.close()

    const file: unknown = JSON.parse(readFileSync(join(dir, 'vectors.json'), 'utf8'))
    expect(file).toEqual({ dimension: 2, vectors: [chunk('a', [1, 0]), chunk('b', [0, 1])] })
  })

  it('refuses a corrupt index file', async () => {
    writeFileSync(join(dir, 'vectors.json'), JSON.stringify({ dimension: 2, vectors: [{ id: 'x', embedding: 'not-a-vector' }] }), 'utf8')

    await expect(new LocalVectorStore().open({ path: dir })).rejects.toThrow('is corrupt')
  })

  it('refuses an index file that is not JSON', async () => {
    writeFileSync(join(dir, 'vectors.json'), '{"dimension":', 'utf8')

    await expect(new LocalVectorStore().open({ path: dir })).rejects.toThrow('is corrupt')
  })
})
