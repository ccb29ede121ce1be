/**
 * Error codes shared across fm-synth packages
 */
export const FmSynthErrorCode = {
  CONFIGURATION: 'CONFIGURATION',
  GENERATION_TIMEOUT: 'GENERATION_TIMEOUT',
  RETRIEVAL_FAILED: 'RETRIEVAL_FAILED',
  MODEL_INTEGRITY: 'MODEL_INTEGRITY',
  PROMPT_TEMPLATE: 'PROMPT_TEMPLATE',
} as const

export type FmSynthErrorCode = (typeof FmSynthErrorCode)[keyof typeof FmSynthErrorCode]

/**
 * Base error for every failure fm-synth raises on purpose
 */
export class FmSynthError extends Error {
  constructor(
    public readonly code: FmSynthErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'FmSynthError'
  }
}

/**
 * Invalid run configuration. Fatal at startup, never raised mid-run.
 */
export class ConfigurationError extends FmSynthError {
  constructor(public readonly issues: string[]) {
    super(FmSynthErrorCode.CONFIGURATION, `Invalid configuration: ${issues.join('; ')}`)
    this.name = 'ConfigurationError'
  }
}

/**
 * A generator call did not answer within its time budget
 */
export class GenerationTimeoutError extends FmSynthError {
  constructor(public readonly timeoutMs: number, model?: string) {
    super(
      FmSynthErrorCode.GENERATION_TIMEOUT,
      `Generation timed out after ${timeoutMs}ms${model ? ` (model=${model})` : ''}`,
    )
    this.name = 'GenerationTimeoutError'
  }
}

/**
 * The document store could not answer a search
 */
export class RetrievalError extends FmSynthError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(FmSynthErrorCode.RETRIEVAL_FAILED, message, options)
    this.name = 'RetrievalError'
  }
}

/**
 * A feature model violates a structural invariant (cycle, dangling parent, ...)
 */
export class ModelIntegrityError extends FmSynthError {
  constructor(message: string) {
    super(FmSynthErrorCode.MODEL_INTEGRITY, message)
    this.name = 'ModelIntegrityError'
  }
}

/**
 * A prompt template still contains placeholders after rendering
 */
export class PromptTemplateError extends FmSynthError {
  constructor(public readonly placeholders: string[]) {
    super(
      FmSynthErrorCode.PROMPT_TEMPLATE,
      `Unresolved prompt placeholders: ${[...placeholders].sort().join(', ')}`,
    )
    this.name = 'PromptTemplateError'
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}

export function isTimeoutError(error: unknown): boolean {
  if (error instanceof GenerationTimeoutError)
    return true
  if (!(error instanceof Error))
    return false
  return error.name === 'TimeoutError' || error.name === 'AbortError'
}
