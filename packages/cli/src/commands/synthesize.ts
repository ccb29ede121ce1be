import type { Embedding } from '@fm-synth/store'
import type { RunArtifacts, SynthesisMode, SynthesisResult, UsageReport } from '@fm-synth/synthesis'
import type { GeneratorClient } from '@fm-synth/synthesis/generator'
import type { Command } from 'commander'
import path from 'node:path'
import { EmbeddingSimilarity, LocalVectorStore, VectorDocumentStore } from '@fm-synth/store'
import { toUsageReport, writeRunArtifacts } from '@fm-synth/synthesis/artifacts'
import { resolveSynthesisConfig, SynthesisModeSchema } from '@fm-synth/synthesis/config'
import { LLMGenerator } from '@fm-synth/synthesis/generator'
import { synthesize } from '@fm-synth/synthesis/synthesizer'
import { ConfigurationError } from '@fm-synth/utils/errors'
import { createLogger } from '@fm-synth/utils/logger'
import { loadProjectConfig, mergeSynthesisInput, parseNumberFlag } from '../config'
import { createLLMClient, resolveEmbedding } from '../providers'

const log = createLogger('synthesize')

export interface SynthesizeCommandOptions {
  mode: SynthesisMode
  /** Run configuration before validation */
  config: Record<string, unknown>
  vectorsDir: string
  outputDir: string
  embedding: Embedding
  generator: GeneratorClient
  /** Merge with embedding similarity instead of lexical Dice */
  embeddingSimilarity?: boolean
  signal?: AbortSignal
  runId?: string
  /** Read once the run has finished */
  usage?: () => UsageReport
}

export interface SynthesizeSummary extends SynthesisResult {
  artifacts: RunArtifacts
}

/**
 * Synthesize a model from an ingested corpus and write the run artifacts
 */
export async function runSynthesis(options: SynthesizeCommandOptions): Promise<SynthesizeSummary> {
  const config = resolveSynthesisConfig(options.config)

  const vectorStore = new LocalVectorStore()
  await vectorStore.open({ path: options.vectorsDir })
  try {
    const documentStore = new VectorDocumentStore({ embedding: options.embedding, vectorStore })
    if (await documentStore.count() === 0)
      throw new ConfigurationError([`no indexed chunks in ${options.vectorsDir}; run "fm-synth ingest" first`])

    const result = await synthesize(options.mode, documentStore, config, {
      generator: options.generator,
      similarity: options.embeddingSimilarity ? new EmbeddingSimilarity(options.embedding) : undefined,
      signal: options.signal,
      runId: options.runId,
      onIteration: (record, model) => log.info(`Iteration ${record.iteration}: ${record.verdict} (${model.size} features)`),
    })
    const artifacts = await writeRunArtifacts(options.outputDir, { ...result, usage: options.usage?.() })
    return { ...result, artifacts }
  }
  finally {
    await vectorStore.close()
  }
}

export function registerSynthesizeCommand(program: Command): void {
  program
    .command('synthesize')
    .description('Synthesize a feature model from an ingested corpus')
    .requiredOption('-r, --root <name>', 'Root feature name')
    .option('-c, --config <file>', 'Project configuration file')
    .option('--mode <mode>', 'single-stage or iterative', 'iterative')
    .option('-d, --domain <text>', 'Domain description')
    .option('-m, --model <provider/model>', 'LLM provider/model (e.g. openai/gpt-4o-mini, anthropic, ollama/llama3.1)')
    .option('--embed-model <provider/model>', 'Embedding provider/model used at ingest time')
    .option('--embedding-similarity', 'Merge features by embedding similarity')
    .option('--vectors <dir>', 'Vector index directory')
    .option('-o, --output <dir>', 'Run artifacts directory')
    .option('--contract <contract>', 'Answer format (json, featureide-xml)')
    .option('--top-k <n>', 'Chunks retrieved per iteration')
    .option('--max-iterations <n>', 'Iteration bound')
    .option('--merge-threshold <score>', 'Alias threshold for proposed features')
    .option('--run-id <id>', 'Run identifier (default: random UUID)')
    .action(async (options: {
      root: string
      config?: string
      mode: string
      domain?: string
      model?: string
      embedModel?: string
      embeddingSimilarity?: boolean
      vectors?: string
      output?: string
      contract?: string
      topK?: string
      maxIterations?: string
      mergeThreshold?: string
      runId?: string
    }) => {
      const mode = SynthesisModeSchema.safeParse(options.mode)
      if (!mode.success)
        throw new ConfigurationError([`--mode: expected single-stage or iterative, got "${options.mode}"`])

      const project = await loadProjectConfig(process.cwd(), options.config)
      const modelString = options.model ?? project.model
      if (!modelString)
        throw new ConfigurationError(['no generation model; pass --model or set "model" in the project configuration'])
      const client = createLLMClient(modelString)

      const controller = new AbortController()
      const onInterrupt = (): void => {
        log.warn('Interrupted, stopping after the current iteration')
        controller.abort()
      }
      process.once('SIGINT', onInterrupt)

      try {
        const { trace, model, artifacts } = await runSynthesis({
          mode: mode.data,
          config: mergeSynthesisInput(project, {
            rootFeature: options.root,
            domain: options.domain,
            contract: options.contract,
            topK: parseNumberFlag('top-k', options.topK),
            maxIterations: parseNumberFlag('max-iterations', options.maxIterations),
            mergeThreshold: parseNumberFlag('merge-threshold', options.mergeThreshold),
          }),
          vectorsDir: path.resolve(options.vectors ?? project.vectors),
          outputDir: path.resolve(options.output ?? project.output),
          embedding: resolveEmbedding(options.embedModel ?? project.embedding),
          generator: new LLMGenerator(client),
          embeddingSimilarity: options.embeddingSimilarity,
          signal: controller.signal,
          runId: options.runId,
          usage: () => toUsageReport(client.getModel(), client.getUsageStats(), client.estimateCost().totalCost),
        })

        console.log('\nSynthesis complete:')
        console.log(`  Status: ${trace.status}`)
        console.log(`  Iterations: ${trace.records.length}`)
        console.log(`  Features: ${model.size}`)
        console.log(`  Output: ${artifacts.dir}`)
      }
      finally {
        process.off('SIGINT', onInterrupt)
      }
    })
}
