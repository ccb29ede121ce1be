export {
  ConfigurationError,
  FmSynthError,
  FmSynthErrorCode,
  GenerationTimeoutError,
  isTimeoutError,
  ModelIntegrityError,
  PromptTemplateError,
  RetrievalError,
  toError,
} from './errors'

export { LLMClient, parseModelString } from './llm'
export type { CompleteOptions, LLMOptions, LLMProvider, LLMResponse, TokenUsageStats } from './llm'

export { createLogger, logger, LogLevels, resolveLogLevel, setLogLevel } from './logger'

export { cosineSimilarity } from './vector'
