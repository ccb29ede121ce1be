import { GenerationTimeoutError } from '@fm-synth/utils/errors'
import { LLMClient, parseModelString } from '@fm-synth/utils/llm'
import { beforeEach, describe, expect, it, vi } from 'vitest'

const { mockCreateOpenAI, mockChat } = vi.hoisted(() => {
  const mockChat = vi.fn(() => 'mock-chat-model')
  return {
    mockChat,
    mockCreateOpenAI: vi.fn(() => Object.assign(vi.fn(() => 'mock-model'), { chat: mockChat })),
  }
})

vi.mock('@ai-sdk/openai', () => ({
  createOpenAI: mockCreateOpenAI,
}))

vi.mock('@ai-sdk/anthropic', () => ({
  createAnthropic: vi.fn(() => vi.fn(() => 'mock-model')),
}))

vi.mock('@ai-sdk/google', () => ({
  createGoogleGenerativeAI: vi.fn(() => vi.fn(() => 'mock-model')),
}))

vi.mock('ai', () => ({
  generateText: vi.fn(),
}))

function textResult(text: string, usage?: { inputTokens: number, outputTokens: number }): any {
  return { text, usage }
}

describe('parseModelString', () => {
  it('should parse provider/model format', () => {
    expect(parseModelString('openai/gpt-4.1-mini')).toEqual({ provider: 'openai', model: 'gpt-4.1-mini' })
  })

  it('should keep the tag of an ollama model', () => {
    expect(parseModelString('ollama/llama3.1:8b')).toEqual({ provider: 'ollama', model: 'llama3.1:8b' })
  })

  it('should parse provider-only string (no slash)', () => {
    expect(parseModelString('google')).toEqual({ provider: 'google', model: undefined })
  })

  it('should throw for unknown provider', () => {
    expect(() => parseModelString('invalid/model')).toThrow('Unknown LLM provider: "invalid"')
  })

  it('should treat trailing slash as provider-only', () => {
    expect(parseModelString('openai/')).toEqual({ provider: 'openai', model: undefined })
  })

  it('should handle model with slashes (e.g., org/model)', () => {
    expect(parseModelString('openai/org/model-name')).toEqual({ provider: 'openai', model: 'org/model-name' })
  })
})

describe('LLMClient', () => {
  beforeEach(() => {
    vi.clearAllMocks()
  })

  describe('constructor', () => {
    it('should use default model for each provider', () => {
      expect(new LLMClient({ provider: 'openai' }).getModel()).toBe('gpt-4.1')
      expect(new LLMClient({ provider: 'anthropic' }).getModel()).toBe('claude-sonnet-4-5')
      expect(new LLMClient({ provider: 'google' }).getModel()).toBe('gemini-2.0-flash')
      expect(new LLMClient({ provider: 'ollama' }).getModel()).toBe('llama3.1:8b')
    })

    it('should accept custom model', () => {
      const client = new LLMClient({ provider: 'openai', model: 'gpt-4o' })
      expect(client.getModel()).toBe('gpt-4o')
      expect(client.getProvider()).toBe('openai')
    })

    it('should point ollama at the OpenAI-compatible endpoint of its host', () => {
      // eslint-disable-next-line no-new
      new LLMClient({ provider: 'ollama', baseURL: 'http://gpu-box:11434/' })

      expect(mockCreateOpenAI).toHaveBeenCalledWith({ apiKey: 'ollama', baseURL: 'http://gpu-box:11434/v1' })
    })
  })

  describe('complete', () => {
    it('should return generated text with usage stats', async () => {
      const { generateText } = await import('ai')
      vi.mocked(generateText).mockResolvedValueOnce(textResult('Hello, world!', { inputTokens: 10, outputTokens: 5 }))

      const client = new LLMClient({ provider: 'openai' })
      const result = await client.complete('Say hello')

      expect(result).toEqual({
        content: 'Hello, world!',
        usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 },
        model: 'gpt-4.1',
      })
    })

    it('should pass system prompt and an abort signal to generateText', async () => {
      const { generateText } = await import('ai')
      vi.mocked(generateText).mockResolvedValueOnce(textResult('response', { inputTokens: 5, outputTokens: 3 }))

      const client = new LLMClient({ provider: 'openai' })
      await client.complete('prompt', 'system prompt')

      expect(vi.mocked(generateText)).toHaveBeenCalledWith(
        expect.objectContaining({
          system: 'system prompt',
          prompt: 'prompt',
          abortSignal: expect.any(AbortSignal),
        }),
      )
    })

    it('should build ollama models through the chat endpoint', async () => {
      const { generateText } = await import('ai')
      vi.mocked(generateText).mockResolvedValueOnce(textResult('local'))

      const client = new LLMClient({ provider: 'ollama' })
      const result = await client.complete('prompt')

      expect(mockChat).toHaveBeenCalledWith('llama3.1:8b')
      expect(result.content).toBe('local')
    })

    it('should handle missing usage data', async () => {
      const { generateText } = await import('ai')
      vi.mocked(generateText).mockResolvedValueOnce(textResult('response'))

      const client = new LLMClient({ provider: 'openai' })
      const result = await client.complete('prompt')

      expect(result.usage).toEqual({ promptTokens: 0, completionTokens: 0, totalTokens: 0 })
    })

    it('should rethrow provider failures', async () => {
      const { generateText } = await import('ai')
      vi.mocked(generateText).mockRejectedValueOnce(new Error('upstream 503'))

      const client = new LLMClient({ provider: 'openai' })

      await expect(client.complete('prompt')).rejects.toThrow('upstream 503')
    })

    it('should reject with GenerationTimeoutError when the call outlives its timeout', async () => {
      const { generateText } = await import('ai')
      vi.mocked(generateText).mockImplementationOnce(({ abortSignal }: { abortSignal?: AbortSignal }) => new Promise<never>((_resolve, reject) => {
        abortSignal?.addEventListener('abort', () => reject(new Error('aborted')))
      }))

      const client = new LLMClient({ provider: 'openai' })
      const pending = client.complete('prompt', undefined, { timeout: 20 })

      await expect(pending).rejects.toBeInstanceOf(GenerationTimeoutError)
      await expect(pending).rejects.toThrow('Generation timed out after 20ms (model=gpt-4.1)')
    })

    it('should reject with the plain error when the caller aborts', async () => {
      const { generateText } = await import('ai')
      vi.mocked(generateText).mockImplementationOnce(({ abortSignal }: { abortSignal?: AbortSignal }) => new Promise<never>((_resolve, reject) => {
        abortSignal?.addEventListener('abort', () => reject(new Error('cancelled by caller')))
      }))

      const controller = new AbortController()
      const client = new LLMClient({ provider: 'openai' })
      const pending = client.complete('prompt', undefined, { timeout: 60_000, signal: controller.signal })
      controller.abort()

      await expect(pending).rejects.toThrow('cancelled by caller')
    })
  })

  describe('usage tracking', () => {
    it('should accumulate usage stats across requests', async () => {
      const { generateText } = await import('ai')
      vi.mocked(generateText)
        .mockResolvedValueOnce(textResult('first', { inputTokens: 10, outputTokens: 5 }))
        .mockResolvedValueOnce(textResult('second', { inputTokens: 20, outputTokens: 10 }))

      const client = new LLMClient({ provider: 'openai' })
      await client.complete('prompt1')
      await client.complete('prompt2')

      expect(client.getUsageStats()).toEqual({
        totalPromptTokens: 30,
        totalCompletionTokens: 15,
        totalTokens: 45,
        requestCount: 2,
      })
    })
  })

  describe('estimateCost', () => {
    it('should price tokens per million at the model rate', () => {
      const client = new LLMClient({ provider: 'openai', model: 'gpt-4.1' })
      const cost = client.estimateCost({
        totalPromptTokens: 1_000_000,
        totalCompletionTokens: 500_000,
        totalTokens: 1_500_000,
        requestCount: 3,
      })

      expect(cost).toEqual({ inputCost: 2, outputCost: 4, totalCost: 6 })
    })

    it('should report zero for local ollama models', () => {
      const client = new LLMClient({ provider: 'ollama' })
      expect(client.estimateCost({
        totalPromptTokens: 1000,
        totalCompletionTokens: 1000,
        totalTokens: 2000,
        requestCount: 1,
      }).totalCost).toBe(0)
    })
  })
})
