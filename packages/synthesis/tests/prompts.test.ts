import type { RetrievalContext } from '@fm-synth/store'
import { FeatureModel } from '@fm-synth/model'
import { resolveSynthesisConfig } from '@fm-synth/synthesis/config'
import {
  buildSynthesisPrompt,
  formatEvidence,
  formatHighLevelFeatures,
  formatModelSnapshot,
  renderTemplate,
  templatePlaceholders,
} from '@fm-synth/synthesis/prompts'
import { PromptTemplateError } from '@fm-synth/utils/errors'
import { describe, expect, it } from 'vitest'

const CONTEXT: RetrievalContext = {
  query: 'Editor',
  chunks: [
    { chunkId: 'editor.txt::chunk::0', sourceId: 'editor.txt', text: 'Spell checking marks misspelled words.', score: 0.9 },
    { chunkId: 'editor.txt::chunk::1', sourceId: 'editor.txt', text: 'Autosave writes drafts every minute.', score: 0.5 },
  ],
}

describe('renderTemplate', () => {
  it('substitutes placeholders without re-scanning values', () => {
    const text = renderTemplate('Root: {{ROOT_FEATURE}} / {{CONTEXT}}', {
      ROOT_FEATURE: 'Editor',
      CONTEXT: 'literal {{DOMAIN}} and {x}',
    })

    expect(text).toBe('Root: Editor / literal {{DOMAIN}} and {x}')
  })

  it('rejects unknown, missing and single-brace placeholders together', () => {
    const render = (): string => renderTemplate('{{ROOT_FEATURE}} {{DOMAIN}} {{UNKNOWN}} {legacy}', { ROOT_FEATURE: 'Editor' })

    expect(render).toThrow(PromptTemplateError)
    expect(render).toThrow('Unresolved prompt placeholders: {legacy}, {{DOMAIN}}, {{UNKNOWN}}')
  })

  it('lists the slots of a template', () => {
    expect(templatePlaceholders('{{B}} {{A}} {{B}} {c}')).toEqual(['{c}', '{{A}}', '{{B}}'])
  })
})

describe('formatEvidence', () => {
  it('numbers blocks and labels them with chunk id and score', () => {
    expect(formatEvidence(CONTEXT, { maxTotalChars: 1000, maxChunkChars: 1000 })).toBe(
      '[1] editor.txt::chunk::0 (score 0.900)\nSpell checking marks misspelled words.\n\n'
      + '[2] editor.txt::chunk::1 (score 0.500)\nAutosave writes drafts every minute.',
    )
  })

  it('cuts each chunk to the chunk budget', () => {
    expect(formatEvidence(CONTEXT, { maxTotalChars: 1000, maxChunkChars: 5 })).toBe(
      '[1] editor.txt::chunk::0 (score 0.900)\nSpell\n\n[2] editor.txt::chunk::1 (score 0.500)\nAutos',
    )
  })

  it('drops blocks beyond the total budget', () => {
    // first block is 38 + 1 + 38 = 77 characters
    expect(formatEvidence(CONTEXT, { maxTotalChars: 80, maxChunkChars: 1000 })).toBe(
      '[1] editor.txt::chunk::0 (score 0.900)\nSpell checking marks misspelled words.',
    )
  })

  it('says so when nothing was retrieved', () => {
    expect(formatEvidence({ query: 'q', chunks: [] }, { maxTotalChars: 10, maxChunkChars: 10 })).toBe('(no evidence retrieved)')
  })
})

describe('formatHighLevelFeatures', () => {
  it('lists names with descriptions', () => {
    expect(formatHighLevelFeatures({ Editing: 'text manipulation', Export: '' })).toBe('- Editing: text manipulation\n- Export')
    expect(formatHighLevelFeatures({})).toBe('(none)')
  })
})

describe('formatModelSnapshot', () => {
  it('renders the JSON contract by parent name', () => {
    const model = FeatureModel.createEmpty('Editor')

    expect(JSON.parse(formatModelSnapshot(model, 'json'))).toEqual({ features: [{ name: 'Editor', parent: null }] })
  })
})

describe('buildSynthesisPrompt', () => {
  const config = resolveSynthesisConfig({ rootFeature: 'Editor', domain: 'text editors' })
  const model = FeatureModel.createEmpty('Editor')

  it('leaves the current model out of single-stage prompts', () => {
    const prompt = buildSynthesisPrompt({ mode: 'single-stage', config, context: CONTEXT, model })

    expect(prompt.user).toContain('Domain: text editors')
    expect(prompt.user).toContain('[1] editor.txt::chunk::0 (score 0.900)')
    expect(prompt.user).not.toContain('Current model:')
  })

  it('includes the current model in iterative prompts', () => {
    const prompt = buildSynthesisPrompt({ mode: 'iterative', config, context: CONTEXT, model })

    expect(prompt.user).toContain(`Current model:\n${formatModelSnapshot(model, 'json')}`)
  })

  it('fills a custom template', () => {
    const custom = resolveSynthesisConfig({
      rootFeature: 'Editor',
      promptTemplate: '{{ROOT_FEATURE}}|{{DOMAIN}}|{{HIGH_LEVEL_FEATURES}}|{{PREVIOUS_MODEL}}',
    })

    const prompt = buildSynthesisPrompt({ mode: 'single-stage', config: custom, context: CONTEXT, model })

    expect(prompt.user).toBe('Editor|(unspecified)|(none)|(empty)')
  })
})
