import type { LanguageModel } from 'ai'
import { createAnthropic } from '@ai-sdk/anthropic'
import { createGoogleGenerativeAI } from '@ai-sdk/google'
import { createOpenAI } from '@ai-sdk/openai'
import { generateText } from 'ai'
import { GenerationTimeoutError, toError } from './errors'
import { createLogger } from './logger'

const log = createLogger('LLMClient')

/**
 * LLM provider type
 */
export type LLMProvider = 'openai' | 'anthropic' | 'google' | 'ollama'

/**
 * LLM client options
 */
export interface LLMOptions {
  /** Provider (openai, anthropic, google, or ollama) */
  provider: LLMProvider
  /** API key (defaults to environment variable) */
  apiKey?: string
  /** Model name */
  model?: string
  /** Base URL override (Ollama host, proxies) */
  baseURL?: string
  /** Max tokens for response */
  maxTokens?: number
  /** Temperature for sampling */
  temperature?: number
  /** Timeout in milliseconds (default: 120000) */
  timeout?: number
}

/**
 * Per-call overrides for `complete()`
 */
export interface CompleteOptions {
  /** Timeout for this call only */
  timeout?: number
  /** Caller-side cancellation */
  signal?: AbortSignal
}

/**
 * LLM response
 */
export interface LLMResponse {
  /** Generated text */
  content: string
  /** Token usage */
  usage: {
    promptTokens: number
    completionTokens: number
    totalTokens: number
  }
  /** Model used */
  model: string
}

/**
 * Default models for each provider
 */
const DEFAULT_MODELS: Record<LLMProvider, string> = {
  openai: 'gpt-4.1',
  anthropic: 'claude-sonnet-4-5',
  google: 'gemini-2.0-flash',
  ollama: 'llama3.1:8b',
}

/**
 * Pricing per million tokens (input, output) in USD
 */
const MODEL_PRICING: Record<string, { input: number, output: number }> = {
  'gpt-4o': { input: 2.50, output: 10.00 },
  'gpt-4.1': { input: 2.00, output: 8.00 },
  'gpt-4.1-mini': { input: 0.40, output: 1.60 },
  'claude-sonnet-4-5': { input: 3.00, output: 15.00 },
  'claude-haiku-4-5': { input: 1.00, output: 5.00 },
  'gemini-2.0-flash': { input: 0.10, output: 0.40 },
}

const DEFAULT_OLLAMA_HOST = 'http://127.0.0.1:11434'

type ModelFactory = (modelId: string) => LanguageModel

/**
 * Create provider instance
 */
function createProvider(provider: LLMProvider, apiKey?: string, baseURL?: string): ModelFactory {
  switch (provider) {
    case 'openai': {
      const openai = createOpenAI({ apiKey: apiKey ?? process.env.OPENAI_API_KEY, baseURL })
      return modelId => openai(modelId)
    }
    case 'anthropic': {
      const anthropic = createAnthropic({ apiKey: apiKey ?? process.env.ANTHROPIC_API_KEY, baseURL })
      return modelId => anthropic(modelId)
    }
    case 'google': {
      const google = createGoogleGenerativeAI({ apiKey: apiKey ?? process.env.GOOGLE_API_KEY, baseURL })
      return modelId => google(modelId)
    }
    case 'ollama': {
      // Ollama serves an OpenAI-compatible chat endpoint under /v1
      const host = (baseURL ?? process.env.OLLAMA_HOST ?? DEFAULT_OLLAMA_HOST).replace(/\/+$/, '')
      const ollama = createOpenAI({ apiKey: apiKey ?? 'ollama', baseURL: `${host}/v1` })
      return modelId => ollama.chat(modelId)
    }
    default:
      throw new Error(`Unsupported LLM provider: ${String(provider satisfies never)}`)
  }
}

/**
 * Cumulative token usage statistics
 */
export interface TokenUsageStats {
  totalPromptTokens: number
  totalCompletionTokens: number
  totalTokens: number
  requestCount: number
}

const INITIAL_USAGE_STATS: TokenUsageStats = {
  totalPromptTokens: 0,
  totalCompletionTokens: 0,
  totalTokens: 0,
  requestCount: 0,
}

/**
 * Parse a "provider/model" format string into provider and model components.
 *
 * @example
 * parseModelString('openai/gpt-4.1') // { provider: 'openai', model: 'gpt-4.1' }
 * parseModelString('ollama/llama3.1:8b') // { provider: 'ollama', model: 'llama3.1:8b' }
 * parseModelString('google') // { provider: 'google', model: undefined }
 */
export function parseModelString(modelString: string): { provider: LLMProvider, model?: string } {
  const slashIndex = modelString.indexOf('/')
  if (slashIndex === -1) {
    return { provider: validateProvider(modelString) }
  }
  const provider = validateProvider(modelString.substring(0, slashIndex))
  const model = modelString.substring(slashIndex + 1)
  return { provider, model: model || undefined }
}

function isProvider(name: string): name is LLMProvider {
  return Object.hasOwn(DEFAULT_MODELS, name)
}

function validateProvider(name: string): LLMProvider {
  if (!isProvider(name)) {
    throw new Error(`Unknown LLM provider: "${name}". Valid providers: ${Object.keys(DEFAULT_MODELS).join(', ')}`)
  }
  return name
}

/**
 * LLM Client for feature-model generation using Vercel AI SDK
 *
 * Supports OpenAI, Anthropic, Google and Ollama with a unified interface.
 *
 * @example
 * ```typescript
 * const client = new LLMClient({ provider: 'openai', model: 'gpt-4.1' })
 *
 * // Local model through Ollama's OpenAI-compatible endpoint
 * const local = new LLMClient({ provider: 'ollama', model: 'llama3.1:8b' })
 * ```
 */
export class LLMClient {
  private readonly options: LLMOptions
  private readonly modelFactory: ModelFactory
  private usageStats: TokenUsageStats = { ...INITIAL_USAGE_STATS }

  constructor(options: LLMOptions) {
    this.options = {
      model: DEFAULT_MODELS[options.provider],
      maxTokens: 4096,
      temperature: 0.2,
      ...options,
    }
    this.modelFactory = createProvider(options.provider, options.apiKey, options.baseURL)
  }

  /**
   * Generate a completion. A call that exceeds its timeout rejects with
   * `GenerationTimeoutError`; a caller abort rejects with the abort reason.
   */
  async complete(prompt: string, systemPrompt?: string, callOptions: CompleteOptions = {}): Promise<LLMResponse> {
    const modelId = this.getModel()
    const timeout = callOptions.timeout ?? this.options.timeout ?? 120_000
    const timeoutSignal = AbortSignal.timeout(timeout)
    const abortSignal = callOptions.signal
      ? AbortSignal.any([timeoutSignal, callOptions.signal])
      : timeoutSignal

    let result: Awaited<ReturnType<typeof generateText>>
    try {
      result = await generateText({
        model: this.modelFactory(modelId),
        system: systemPrompt,
        prompt,
        maxOutputTokens: this.options.maxTokens,
        temperature: this.options.temperature,
        abortSignal,
      })
    }
    catch (error) {
      const err = timeoutSignal.aborted ? new GenerationTimeoutError(timeout, modelId) : toError(error)
      log.error(`${modelId} error: ${err.message}`)
      throw err
    }

    const inputTokens = result.usage?.inputTokens ?? 0
    const outputTokens = result.usage?.outputTokens ?? 0
    this.usageStats.totalPromptTokens += inputTokens
    this.usageStats.totalCompletionTokens += outputTokens
    this.usageStats.totalTokens += inputTokens + outputTokens
    this.usageStats.requestCount++

    return {
      content: result.text,
      usage: {
        promptTokens: inputTokens,
        completionTokens: outputTokens,
        totalTokens: inputTokens + outputTokens,
      },
      model: modelId,
    }
  }

  /**
   * Get the current provider
   */
  getProvider(): LLMProvider {
    return this.options.provider
  }

  /**
   * Get the current model
   */
  getModel(): string {
    return this.options.model ?? DEFAULT_MODELS[this.options.provider]
  }

  /**
   * Get cumulative token usage statistics
   */
  getUsageStats(): TokenUsageStats {
    return { ...this.usageStats }
  }

  /**
   * Estimate cost in USD based on token usage and model pricing.
   * Local (Ollama) and unknown models cost nothing.
   */
  estimateCost(stats?: TokenUsageStats): { inputCost: number, outputCost: number, totalCost: number } {
    const s = stats ?? this.usageStats
    const pricing = MODEL_PRICING[this.getModel()]
    if (!pricing || this.options.provider === 'ollama') {
      return { inputCost: 0, outputCost: 0, totalCost: 0 }
    }
    const inputCost = (s.totalPromptTokens / 1_000_000) * pricing.input
    const outputCost = (s.totalCompletionTokens / 1_000_000) * pricing.output
    return { inputCost, outputCost, totalCost: inputCost + outputCost }
  }
}
