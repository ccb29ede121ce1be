import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { runCheck, runCoverage, runExport } from '@fm-synth/cli/commands/evaluate'
import { runIngest } from '@fm-synth/cli/commands/ingest'
import { runSynthesis } from '@fm-synth/cli/commands/synthesize'
import { toFeatureIdeXml } from '@fm-synth/model'
import { MockEmbedding } from '@fm-synth/store'
import { ConfigurationError } from '@fm-synth/utils/errors'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

const EDITOR_OUTPUT = `\`\`\`json
{"features":[
  {"name":"Editor","parent":null},
  {"name":"Spell Check","parent":"Editor","kind":"mandatory"},
  {"name":"Theme","parent":"Editor","kind":"optional"},
  {"name":"Light","parent":"Theme","kind":"alternative"},
  {"name":"Dark","parent":"Theme","kind":"alternative"}
]}
\`\`\``

const GROUND_TRUTH = `<featureModel><struct>
<and name="Editor" mandatory="true"><feature name="Spell Check" mandatory="true"/><feature name="Autosave"/></and>
</struct></featureModel>`

describe('fm-synth commands', () => {
  let workDir: string
  let vectorsDir: string

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), 'fm-synth-cli-'))
    vectorsDir = join(workDir, 'vectors')
  })

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true })
  })

  async function ingestEditorDocs(): Promise<void> {
    const docs = join(workDir, 'docs')
    await mkdir(docs)
    await writeFile(join(docs, 'editor.md'), '# Editor\n\nThe editor checks spelling as you type.\n\nThemes can be light or dark.\n')
    await runIngest({ input: docs, chunksDir: join(workDir, 'chunks'), vectorsDir, embedding: new MockEmbedding(32) })
  }

  it('ingests documents into a persistent index', async () => {
    const docs = join(workDir, 'docs')
    await mkdir(docs)
    await writeFile(join(docs, 'editor.md'), 'The editor checks spelling as you type.\n')

    const summary = await runIngest({ input: docs, chunksDir: join(workDir, 'chunks'), vectorsDir, embedding: new MockEmbedding(32) })

    expect(summary.processed).toEqual([join(workDir, 'chunks', 'editor.md.chunks.json')])
    expect(summary.skipped).toEqual([])
    expect(summary.indexed).toBe(1)
  })

  it('synthesizes, checks, scores and exports a model', async () => {
    await ingestEditorDocs()
    const generate = vi.fn(async () => EDITOR_OUTPUT)

    const { trace, model, artifacts } = await runSynthesis({
      mode: 'iterative',
      config: { rootFeature: 'Editor' },
      vectorsDir,
      outputDir: join(workDir, 'runs'),
      embedding: new MockEmbedding(32),
      generator: { generate },
      runId: 'run-1',
      usage: () => ({ model: 'stub', totalPromptTokens: 0, totalCompletionTokens: 0, totalTokens: 0, requestCount: 3, estimatedCostUsd: 0 }),
    })

    expect(trace.status).toBe('CONVERGED')
    expect(model.ids()).toEqual(['Editor', 'Spell_Check', 'Theme', 'Light', 'Dark'])
    expect(artifacts.dir).toBe(join(workDir, 'runs', 'run-1'))
    expect(JSON.parse(await readFile(join(artifacts.dir, 'usage.json'), 'utf8')).requestCount).toBe(3)

    expect(await runCheck(artifacts.model)).toEqual([])
    expect(await runCheck(artifacts.featureIde)).toEqual([])

    const groundTruthFile = join(workDir, 'ground-truth.xml')
    await writeFile(groundTruthFile, GROUND_TRUTH)
    const coverage = await runCoverage(groundTruthFile, artifacts.model)
    expect(coverage.matched.map(m => m.groundTruthId)).toEqual(['Editor', 'Spell_Check'])
    expect(coverage.misses).toEqual(['Autosave'])
    expect(coverage.extras).toEqual(['Theme', 'Light', 'Dark'])
    expect(coverage.recall).toBeCloseTo(2 / 3)
    expect(coverage.precision).toBeCloseTo(2 / 5)
    expect(coverage.f1).toBeCloseTo(0.5)

    const exported = await runExport(artifacts.model, join(workDir, 'export', 'editor.xml'))
    expect(await readFile(exported, 'utf8')).toBe(toFeatureIdeXml(model))
  })

  it('scores a missing prediction as an empty model', async () => {
    const groundTruthFile = join(workDir, 'ground-truth.xml')
    await writeFile(groundTruthFile, GROUND_TRUTH)

    const coverage = await runCoverage(groundTruthFile, join(workDir, 'runs', 'none', 'model.json'))

    expect(coverage.edgeCase).toBe('empty-prediction')
    expect(coverage.recall).toBe(0)
    expect(coverage.misses).toEqual(['Editor', 'Spell_Check', 'Autosave'])
  })

  it('reports violations of a hand-edited model', async () => {
    const file = join(workDir, 'broken.json')
    await writeFile(file, JSON.stringify({
      rootId: 'Editor',
      features: [{ id: 'Editor', name: 'Editor', parent: null, kind: 'mandatory', children: ['Undo'] }],
    }))

    expect((await runCheck(file)).map(v => v.code)).toEqual(['unknown-child'])
  })

  it('refuses to synthesize before anything is ingested', async () => {
    await expect(runSynthesis({
      mode: 'single-stage',
      config: { rootFeature: 'Editor' },
      vectorsDir,
      outputDir: join(workDir, 'runs'),
      embedding: new MockEmbedding(32),
      generator: { generate: vi.fn(async () => EDITOR_OUTPUT) },
    })).rejects.toBeInstanceOf(ConfigurationError)
  })
})
