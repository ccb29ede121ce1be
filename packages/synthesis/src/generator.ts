import type { LLMClient } from '@fm-synth/utils/llm'
import type { SynthesisPrompt } from './prompts'

export interface GenerateOptions {
  timeoutMs: number
  signal?: AbortSignal
}

/**
 * Produces raw text for a prompt. Rejects with `GenerationTimeoutError`
 * when `timeoutMs` elapses first.
 */
export interface GeneratorClient {
  generate: (prompt: SynthesisPrompt, options: GenerateOptions) => Promise<string>
}

/**
 * GeneratorClient over an LLMClient
 */
export class LLMGenerator implements GeneratorClient {
  constructor(private readonly client: LLMClient) {}

  async generate(prompt: SynthesisPrompt, options: GenerateOptions): Promise<string> {
    const response = await this.client.complete(prompt.user, prompt.system, {
      timeout: options.timeoutMs,
      signal: options.signal,
    })
    return response.content
  }
}
