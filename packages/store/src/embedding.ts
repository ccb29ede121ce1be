import type { EmbeddingModel } from 'ai'
import { createGoogleGenerativeAI } from '@ai-sdk/google'
import { createOpenAI } from '@ai-sdk/openai'
import { ConfigurationError } from '@fm-synth/utils/errors'
import { parseModelString } from '@fm-synth/utils/llm'
import { embed, embedMany } from 'ai'

/**
 * Embedding vector result
 */
export interface EmbeddingVector {
  /** The embedding vector */
  vector: number[]
  /** Vector dimension */
  dimension: number
}

export interface EmbedOptions {
  /** Cancels the request */
  signal?: AbortSignal
}

/**
 * Abstract base class for embedding implementations
 */
export abstract class Embedding {
  protected abstract maxTokens: number

  /**
   * Preprocess text to ensure it's valid for embedding
   */
  protected preprocessText(text: string): string {
    if (text === '') {
      return ' '
    }

    // Simple character-based truncation (approximately 4 chars per token)
    const maxChars = this.maxTokens * 4
    if (text.length > maxChars) {
      return text.substring(0, maxChars)
    }

    return text
  }

  protected preprocessTexts(texts: string[]): string[] {
    return texts.map(text => this.preprocessText(text))
  }

  abstract embed(text: string, options?: EmbedOptions): Promise<EmbeddingVector>

  abstract embedBatch(texts: string[], options?: EmbedOptions): Promise<EmbeddingVector[]>

  abstract getDimension(): number

  abstract getProvider(): string
}

/**
 * AI SDK Embedding configuration
 */
export interface AISDKEmbeddingConfig {
  /** AI SDK EmbeddingModel instance */
  model: EmbeddingModel<string>
  /** Vector dimension (0 = auto-detect on first call) */
  dimension?: number
  /** Provider name used in error messages */
  providerName?: string
  /** Max input tokens (default: 8192) */
  maxTokens?: number
}

/**
 * Embedding over any AI SDK embedding model (OpenAI, Google, Ollama)
 */
export class AISDKEmbedding extends Embedding {
  protected maxTokens: number
  private readonly embeddingModel: EmbeddingModel<string>
  private dimension: number
  private readonly providerName: string

  constructor(config: AISDKEmbeddingConfig) {
    super()
    this.embeddingModel = config.model
    this.dimension = config.dimension ?? 0
    this.providerName = config.providerName ?? 'AISDK'
    this.maxTokens = config.maxTokens ?? 8192
  }

  async embed(text: string, options: EmbedOptions = {}): Promise<EmbeddingVector> {
    const processedText = this.preprocessText(text)

    try {
      const result = await embed({ model: this.embeddingModel, value: processedText, abortSignal: options.signal })
      this.dimension = result.embedding.length
      return {
        vector: result.embedding,
        dimension: this.dimension,
      }
    }
    catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      throw new Error(`Failed to generate ${this.providerName} embedding: ${message}`, { cause: error })
    }
  }

  async embedBatch(texts: string[], options: EmbedOptions = {}): Promise<EmbeddingVector[]> {
    if (texts.length === 0) {
      return []
    }

    const processedTexts = this.preprocessTexts(texts)

    try {
      const result = await embedMany({ model: this.embeddingModel, values: processedTexts, abortSignal: options.signal })
      const first = result.embeddings[0]
      if (first) {
        this.dimension = first.length
      }
      return result.embeddings.map(emb => ({
        vector: emb,
        dimension: this.dimension,
      }))
    }
    catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      throw new Error(`Failed to generate ${this.providerName} batch embeddings: ${message}`, { cause: error })
    }
  }

  getDimension(): number {
    return this.dimension
  }

  getProvider(): string {
    return this.providerName
  }
}

const DEFAULT_EMBEDDING_MODELS = {
  openai: 'text-embedding-3-small',
  google: 'text-embedding-004',
  ollama: 'nomic-embed-text',
} as const

/**
 * Create an embedding from a "provider/model" string.
 *
 * @example
 * createEmbedding('openai/text-embedding-3-small')
 * createEmbedding('ollama') // nomic-embed-text on OLLAMA_HOST
 */
export function createEmbedding(modelString: string, options: { apiKey?: string, baseURL?: string } = {}): AISDKEmbedding {
  const { provider, model } = parseModelString(modelString)
  switch (provider) {
    case 'openai': {
      const openai = createOpenAI({ apiKey: options.apiKey ?? process.env.OPENAI_API_KEY, baseURL: options.baseURL })
      return new AISDKEmbedding({
        model: openai.embedding(model ?? DEFAULT_EMBEDDING_MODELS.openai),
        providerName: 'OpenAI',
      })
    }
    case 'google': {
      const google = createGoogleGenerativeAI({ apiKey: options.apiKey ?? process.env.GOOGLE_API_KEY, baseURL: options.baseURL })
      return new AISDKEmbedding({
        model: google.textEmbeddingModel(model ?? DEFAULT_EMBEDDING_MODELS.google),
        providerName: 'Google',
      })
    }
    case 'ollama': {
      const host = (options.baseURL ?? process.env.OLLAMA_HOST ?? 'http://127.0.0.1:11434').replace(/\/+$/, '')
      const ollama = createOpenAI({ apiKey: 'ollama', baseURL: `${host}/v1` })
      return new AISDKEmbedding({
        model: ollama.embedding(model ?? DEFAULT_EMBEDDING_MODELS.ollama),
        providerName: 'Ollama',
        maxTokens: 2048,
      })
    }
    case 'anthropic':
      throw new ConfigurationError([`provider "anthropic" has no embedding models; use openai, google or ollama`])
  }
}

/**
 * Mock embedding for testing (generates deterministic vectors)
 */
export class MockEmbedding extends Embedding {
  private readonly dimension: number
  protected maxTokens = 8192

  constructor(dimension = 64) {
    super()
    this.dimension = dimension
  }

  async embed(text: string, options: EmbedOptions = {}): Promise<EmbeddingVector> {
    options.signal?.throwIfAborted()
    return {
      vector: this.generateDeterministicVector(this.preprocessText(text)),
      dimension: this.dimension,
    }
  }

  async embedBatch(texts: string[], options: EmbedOptions = {}): Promise<EmbeddingVector[]> {
    options.signal?.throwIfAborted()
    return this.preprocessTexts(texts).map(text => ({
      vector: this.generateDeterministicVector(text),
      dimension: this.dimension,
    }))
  }

  getDimension(): number {
    return this.dimension
  }

  getProvider(): string {
    return 'Mock'
  }

  /**
   * Same text always produces the same unit vector
   */
  private generateDeterministicVector(text: string): number[] {
    const vector: number[] = []
    let hash = 0

    for (let i = 0; i < text.length; i++) {
      const codePoint = text.codePointAt(i) ?? 0
      hash = (hash * 31 + codePoint) % 2147483647
    }

    for (let i = 0; i < this.dimension; i++) {
      hash = (hash * 1103515245 + 12345) % 2147483648
      vector.push((hash / 2147483647) * 2 - 1)
    }

    const magnitude = Math.sqrt(vector.reduce((sum, val) => sum + val * val, 0))
    return vector.map(val => val / magnitude)
  }
}
