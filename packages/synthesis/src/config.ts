import { ConfigurationError } from '@fm-synth/utils/errors'
import { z } from 'zod/v4'

/**
 * SS runs one retrieval-augmented pass, IS refines until the monitor stops it
 */
export const SynthesisMode = {
  SingleStage: 'single-stage',
  Iterative: 'iterative',
} as const

export type SynthesisMode = (typeof SynthesisMode)[keyof typeof SynthesisMode]

export const SynthesisModeSchema = z.enum(['single-stage', 'iterative'])

/**
 * Serialization the generator is asked to answer in
 */
export const FragmentContractSchema = z.enum(['json', 'featureide-xml'])

export type FragmentContract = z.infer<typeof FragmentContractSchema>

export const SynthesisConfigSchema = z.object({
  /** Display name of the model root */
  rootFeature: z.string().trim().min(1),
  /** Free-text domain description used in queries and prompts */
  domain: z.string().default(''),
  /** Chunks retrieved per iteration */
  topK: z.number().int().positive().default(8),
  /** Iteration bound for IS mode */
  maxIterations: z.number().int().positive().default(6),
  /** K: consecutive no-change iterations before CONVERGED */
  stableIterations: z.number().int().positive().default(2),
  /** M: consecutive identical parse failures before STALLED */
  stallIterations: z.number().int().positive().default(3),
  /** Similarity at or above which a proposed feature aliases an existing one */
  mergeThreshold: z.number().gt(0).lte(1).default(0.85),
  /** Extra attempts per retrieval or generation call */
  maxRetries: z.number().int().nonnegative().default(2),
  generationTimeoutMs: z.number().int().positive().default(120_000),
  retrievalTimeoutMs: z.number().int().positive().default(30_000),
  /** Leaf features per follow-up query */
  frontierSize: z.number().int().positive().default(5),
  maxTotalChars: z.number().int().positive().default(18_000),
  maxChunkChars: z.number().int().positive().default(2_500),
  contract: FragmentContractSchema.default('json'),
  /** Seed features (name -> description) shown to the generator */
  highLevelFeatures: z.record(z.string(), z.string()).default({}),
  /** Custom user prompt with `{{PLACEHOLDER}}` slots */
  promptTemplate: z.string().optional(),
})

export type SynthesisConfig = z.output<typeof SynthesisConfigSchema>
export type SynthesisConfigInput = z.input<typeof SynthesisConfigSchema>

/**
 * Validate and default a run configuration.
 * Throws `ConfigurationError` listing every issue at once.
 */
export function resolveSynthesisConfig(input: unknown): SynthesisConfig {
  const parsed = SynthesisConfigSchema.safeParse(input)
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map(issue => `${issue.path.map(String).join('.') || '(root)'}: ${issue.message}`),
    )
  }
  const config = parsed.data
  if (config.maxChunkChars > config.maxTotalChars)
    throw new ConfigurationError([`maxChunkChars (${config.maxChunkChars}) exceeds maxTotalChars (${config.maxTotalChars})`])
  return config
}
