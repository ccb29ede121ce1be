import type { Embedding } from '@fm-synth/store'
import { createEmbedding, MockEmbedding } from '@fm-synth/store'
import { ConfigurationError } from '@fm-synth/utils/errors'
import { LLMClient, parseModelString } from '@fm-synth/utils/llm'

/**
 * Embedding for `provider/model`. `mock` or `mock/<dimension>` gives the
 * deterministic offline embedding.
 */
export function resolveEmbedding(modelString: string): Embedding {
  const [provider, dimension] = modelString.split('/')
  if (provider !== 'mock')
    return createEmbedding(modelString)
  if (dimension === undefined)
    return new MockEmbedding()
  const parsed = Number.parseInt(dimension, 10)
  if (Number.isNaN(parsed) || parsed <= 0)
    throw new ConfigurationError([`invalid mock embedding dimension "${dimension}"`])
  return new MockEmbedding(parsed)
}

/**
 * LLM client for `provider/model`; the API key comes from the environment
 */
export function createLLMClient(modelString: string): LLMClient {
  try {
    return new LLMClient(parseModelString(modelString))
  }
  catch (error) {
    throw new ConfigurationError([error instanceof Error ? error.message : String(error)])
  }
}
