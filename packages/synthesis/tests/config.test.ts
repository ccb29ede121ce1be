import { resolveSynthesisConfig } from '@fm-synth/synthesis/config'
import { ConfigurationError } from '@fm-synth/utils/errors'
import { describe, expect, it } from 'vitest'

function issuesOf(input: unknown): string[] {
  try {
    resolveSynthesisConfig(input)
  }
  catch (error) {
    if (error instanceof ConfigurationError)
      return error.issues
    throw error
  }
  return []
}

describe('resolveSynthesisConfig', () => {
  it('fills defaults', () => {
    expect(resolveSynthesisConfig({ rootFeature: 'Editor' })).toEqual({
      rootFeature: 'Editor',
      domain: '',
      topK: 8,
      maxIterations: 6,
      stableIterations: 2,
      stallIterations: 3,
      mergeThreshold: 0.85,
      maxRetries: 2,
      generationTimeoutMs: 120_000,
      retrievalTimeoutMs: 30_000,
      frontierSize: 5,
      maxTotalChars: 18_000,
      maxChunkChars: 2_500,
      contract: 'json',
      highLevelFeatures: {},
    })
  })

  it('reports every invalid key at once', () => {
    const issues = issuesOf({ rootFeature: 'Editor', mergeThreshold: 1.5, topK: 0, contract: 'yaml' })

    expect(issues.map(issue => issue.split(':')[0])).toEqual(['topK', 'mergeThreshold', 'contract'])
  })

  it('requires a root feature', () => {
    expect(issuesOf({}).map(issue => issue.split(':')[0])).toEqual(['rootFeature'])
  })

  it('rejects a chunk budget larger than the total budget', () => {
    expect(issuesOf({ rootFeature: 'Editor', maxChunkChars: 500, maxTotalChars: 100 })).toEqual([
      'maxChunkChars (500) exceeds maxTotalChars (100)',
    ])
  })
})
