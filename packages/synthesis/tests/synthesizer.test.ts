import type { DocumentStore, RetrievedChunk } from '@fm-synth/store'
import type { GeneratorClient } from '@fm-synth/synthesis/generator'
import type { IterationRecord } from '@fm-synth/synthesis/trace'
import type { Mock } from 'vitest'
import { rankChunks } from '@fm-synth/store'
import { synthesize, Synthesizer } from '@fm-synth/synthesis/synthesizer'
import { RunTraceSchema } from '@fm-synth/synthesis/trace'
import { ConfigurationError, PromptTemplateError, RetrievalError } from '@fm-synth/utils/errors'
import { describe, expect, it, vi } from 'vitest'

const CHUNKS: RetrievedChunk[] = [
  { chunkId: 'editor.txt::chunk::1', sourceId: 'editor.txt', text: 'Themes can be light or dark.', score: 0.4 },
  { chunkId: 'editor.txt::chunk::0', sourceId: 'editor.txt', text: 'Editors check spelling.', score: 0.8 },
]

const EDITOR_OUTPUT = `<solution>
{"features":[
  {"name":"Editor","parent":null},
  {"name":"Spell Check","parent":"Editor","kind":"mandatory"},
  {"name":"Theme","parent":"Editor","kind":"optional"},
  {"name":"Light","parent":"Theme","kind":"alternative"},
  {"name":"Dark","parent":"Theme","kind":"alternative"}
]}
</solution>`

function createStore(): { search: Mock<DocumentStore['search']> } {
  return {
    search: vi.fn<DocumentStore['search']>(async (query, topK) => ({ query, chunks: rankChunks(CHUNKS, topK) })),
  }
}

function createGenerator(output = EDITOR_OUTPUT): { generate: Mock<GeneratorClient['generate']> } {
  return { generate: vi.fn<GeneratorClient['generate']>(async () => output) }
}

const CONFIG = { rootFeature: 'Editor', domain: 'text editors' }

describe('Synthesizer', () => {
  it('runs exactly one iteration in single-stage mode', async () => {
    const documentStore = createStore()
    const generator = createGenerator()

    const { model, trace } = await new Synthesizer(CONFIG, { documentStore, generator, runId: 'run-ss' }).run('single-stage')

    expect(trace.records).toHaveLength(1)
    expect(trace.runId).toBe('run-ss')
    expect(trace.status).toBe('CONTINUE')
    expect(trace.stopReason).toBe('single-stage')
    expect(trace.records[0]?.diff?.added).toEqual(['Spell_Check', 'Theme', 'Light', 'Dark'])
    expect(trace.records[0]?.prompt?.user).not.toContain('Current model:')
    expect(documentStore.search).toHaveBeenCalledTimes(1)
    expect(documentStore.search.mock.calls[0]?.[0]).toBe('Editor text editors')
    expect(model.ids()).toEqual(['Editor', 'Spell_Check', 'Theme', 'Light', 'Dark'])
  })

  it('records the retrieved chunk ids as provenance', async () => {
    const { model } = await new Synthesizer(CONFIG, { documentStore: createStore(), generator: createGenerator() }).run('single-stage')

    expect(model.get('Theme')?.provenance).toEqual({
      iteration: 1,
      sourceChunkIds: ['editor.txt::chunk::0', 'editor.txt::chunk::1'],
      origin: 'generated',
    })
  })

  it('converges once the model stops changing', async () => {
    const documentStore = createStore()
    const generator = createGenerator()

    const { trace } = await new Synthesizer(CONFIG, { documentStore, generator }).run('iterative')

    expect(trace.records.map(r => r.verdict)).toEqual(['CONTINUE', 'CONTINUE', 'CONVERGED'])
    expect(trace.status).toBe('CONVERGED')
    expect(trace.stopReason).toBe('terminal-state')
    expect(documentStore.search.mock.calls.map(call => call[0])).toEqual([
      'Editor text editors',
      'Spell Check, Light, Dark (Editor)',
      'Spell Check, Light, Dark (Editor)',
    ])
  })

  it('shows the current model to the generator in iterative mode', async () => {
    const generator = createGenerator()

    await new Synthesizer(CONFIG, { documentStore: createStore(), generator }).run('iterative')

    expect(generator.generate.mock.calls[1]?.[0].user).toContain('"name": "Spell Check"')
  })

  it('stalls on repeated parse failures and keeps the root-only model', async () => {
    const { model, trace } = await new Synthesizer(CONFIG, {
      documentStore: createStore(),
      generator: createGenerator('no idea'),
    }).run('iterative')

    expect(trace.status).toBe('STALLED')
    expect(trace.records).toHaveLength(3)
    expect(trace.records.map(r => r.parse?.ok)).toEqual([false, false, false])
    expect(trace.records[0]?.diff).toBeNull()
    expect(model.size).toBe(1)
  })

  it('retries a generation that times out', async () => {
    const generator = createGenerator()
    generator.generate.mockImplementationOnce((_prompt, { signal }) => new Promise<string>((_resolve, reject) => {
      signal?.addEventListener('abort', () => reject(new Error('aborted')))
    }))

    const { trace } = await new Synthesizer(
      { ...CONFIG, generationTimeoutMs: 20, maxRetries: 1 },
      { documentStore: createStore(), generator },
    ).run('single-stage')

    expect(generator.generate).toHaveBeenCalledTimes(2)
    expect(trace.records[0]?.transportFailure).toBeNull()
    expect(trace.records[0]?.rawOutput).toBe(EDITOR_OUTPUT)
  })

  it('stalls once generation retries are exhausted', async () => {
    const generator = createGenerator()
    generator.generate.mockRejectedValue(new Error('rate limited'))

    const { model, trace } = await new Synthesizer(
      { ...CONFIG, maxRetries: 2 },
      { documentStore: createStore(), generator },
    ).run('iterative')

    expect(generator.generate).toHaveBeenCalledTimes(3)
    expect(trace.status).toBe('STALLED')
    expect(trace.records[0]?.transportFailure).toEqual({
      stage: 'generation',
      message: 'rate limited',
      attempts: 3,
      timedOut: false,
      cancelled: false,
    })
    expect(model.size).toBe(1)
  })

  it('records a failed retrieval without calling the generator', async () => {
    const documentStore = createStore()
    documentStore.search.mockRejectedValue(new RetrievalError('index offline'))
    const generator = createGenerator()

    const { trace } = await new Synthesizer({ ...CONFIG, maxRetries: 0 }, { documentStore, generator }).run('iterative')

    expect(generator.generate).not.toHaveBeenCalled()
    expect(trace.records[0]?.transportFailure?.stage).toBe('retrieval')
    expect(trace.records[0]?.transportFailure?.attempts).toBe(1)
    expect(trace.records[0]?.prompt).toBeNull()
    expect(trace.status).toBe('STALLED')
  })

  it('stops between iterations when cancelled', async () => {
    const controller = new AbortController()
    const seen: IterationRecord[] = []

    const { model, trace } = await new Synthesizer(CONFIG, {
      documentStore: createStore(),
      generator: createGenerator(),
      signal: controller.signal,
      onIteration: (record) => {
        seen.push(record)
        controller.abort()
      },
    }).run('iterative')

    expect(seen).toHaveLength(1)
    expect(trace.records).toHaveLength(1)
    expect(trace.status).toBe('CANCELLED')
    expect(trace.stopReason).toBe('cancelled')
    expect(model.size).toBe(5)
  })

  it('does not start when already cancelled', async () => {
    const generator = createGenerator()

    const { model, trace } = await new Synthesizer(CONFIG, {
      documentStore: createStore(),
      generator,
      signal: AbortSignal.abort(),
    }).run('iterative')

    expect(trace.records).toEqual([])
    expect(trace.status).toBe('CANCELLED')
    expect(generator.generate).not.toHaveBeenCalled()
    expect(model.size).toBe(1)
  })

  it('freezes appended records', async () => {
    const { trace } = await new Synthesizer(CONFIG, { documentStore: createStore(), generator: createGenerator() }).run('single-stage')

    expect(Object.isFrozen(trace.records)).toBe(true)
    expect(Object.isFrozen(trace.records[0])).toBe(true)
  })

  it('produces a trace that round-trips through its schema', async () => {
    const { trace } = await synthesize('iterative', createStore(), CONFIG, { generator: createGenerator() })

    expect(RunTraceSchema.parse(JSON.parse(JSON.stringify(trace)))).toEqual(trace)
  })

  it('rejects invalid configuration before running', () => {
    const create = (): Synthesizer => new Synthesizer(
      { rootFeature: '', maxIterations: 0 },
      { documentStore: createStore(), generator: createGenerator() },
    )

    let caught: unknown
    try {
      create()
    }
    catch (error) {
      caught = error
    }
    expect(caught).toBeInstanceOf(ConfigurationError)
    if (caught instanceof ConfigurationError)
      expect(caught.issues.map(issue => issue.split(':')[0])).toEqual(['rootFeature', 'maxIterations'])
  })

  it('rejects a custom template with unknown placeholders', () => {
    expect(() => new Synthesizer(
      { ...CONFIG, promptTemplate: 'Describe {{ROOT}}' },
      { documentStore: createStore(), generator: createGenerator() },
    )).toThrow(PromptTemplateError)
  })
})
