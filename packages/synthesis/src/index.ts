// Configuration
export {
  FragmentContractSchema,
  resolveSynthesisConfig,
  SynthesisConfigSchema,
  SynthesisMode,
  SynthesisModeSchema,
} from './config'
export type { FragmentContract, SynthesisConfig, SynthesisConfigInput } from './config'

// Fragment parsing
export {
  FragmentFeatureSchema,
  FragmentSchema,
  ParseFailureReason,
  ParseFailureSchema,
  ParseOutcomeSchema,
  parseFragment,
} from './fragment-parser'
export type { Fragment, FragmentFeature, ParseFailure, ParseOutcome } from './fragment-parser'

// Merging
export { DEFAULT_MERGE_THRESHOLD, MergeDiffSchema, mergeFragment } from './merger'
export type { MergeDiff, MergeOptions, MergeResult } from './merger'

// Convergence
export { advance, ConvergenceState, ConvergenceStateSchema, initialMonitorState, isTerminal } from './convergence'
export type { ConvergenceConfig, IterationObservation, MonitorState } from './convergence'

// Prompts
export {
  assertTemplateResolvable,
  buildSynthesisPrompt,
  formatEvidence,
  formatHighLevelFeatures,
  formatModelSnapshot,
  ITERATIVE_TEMPLATE,
  PROMPT_PLACEHOLDERS,
  renderTemplate,
  SINGLE_STAGE_TEMPLATE,
  SYSTEM_PROMPT,
  templatePlaceholders,
} from './prompts'
export type { BuildPromptInput, EvidenceBudget, PromptPlaceholder, PromptValues, SynthesisPrompt } from './prompts'

// Generation
export { LLMGenerator } from './generator'
export type { GenerateOptions, GeneratorClient } from './generator'
export { withRetry } from './retry'
export type { RetryOptions, RetryOutcome } from './retry'

// Loop and trace
export { synthesize, Synthesizer } from './synthesizer'
export type { SynthesisResult, SynthesizerDeps } from './synthesizer'
export {
  appendRecord,
  createRunTrace,
  finishTrace,
  IterationRecordSchema,
  parseRunTrace,
  RunStatusSchema,
  RunTraceSchema,
  StopReasonSchema,
  TransportFailureSchema,
} from './trace'
export type { IterationRecord, RunStatus, RunTrace, StopReason, TransportFailure } from './trace'

// Artifacts
export { loadFeatureModel, readRunTrace, toUsageReport, UsageReportSchema, writeRunArtifacts } from './artifacts'
export type { RunArtifacts, UsageReport } from './artifacts'
