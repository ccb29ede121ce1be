import type { Similarity } from '@fm-synth/model'
import type { DocumentStore } from '@fm-synth/store'
import type { SynthesisConfig, SynthesisConfigInput } from './config'
import type { IterationObservation, MonitorState } from './convergence'
import type { GeneratorClient } from './generator'
import type { MergeDiff } from './merger'
import type { IterationRecord, RunTrace, TransportFailure } from './trace'
import { randomUUID } from 'node:crypto'
import { FeatureModel, LexicalSimilarity } from '@fm-synth/model'
import { GenerationTimeoutError, RetrievalError } from '@fm-synth/utils/errors'
import { createLogger } from '@fm-synth/utils/logger'
import { resolveSynthesisConfig, SynthesisMode } from './config'
import { advance, initialMonitorState, isTerminal } from './convergence'
import { parseFragment } from './fragment-parser'
import { mergeFragment } from './merger'
import { assertTemplateResolvable, buildSynthesisPrompt } from './prompts'
import { withRetry } from './retry'
import { appendRecord, createRunTrace, finishTrace } from './trace'

const log = createLogger('Synthesizer')

export interface SynthesizerDeps {
  documentStore: DocumentStore
  generator: GeneratorClient
  /** Name similarity for merging; lexical Dice when omitted */
  similarity?: Similarity
  /** Checked between iterations */
  signal?: AbortSignal
  runId?: string
  /** Called after each iteration with its record and the model it produced */
  onIteration?: (record: IterationRecord, model: FeatureModel) => void
}

export interface SynthesisResult {
  model: FeatureModel
  trace: RunTrace
}

/**
 * Everything one iteration reads and replaces
 */
interface LoopState {
  readonly model: FeatureModel
  readonly monitor: MonitorState
  /** Feature ids already used as a query focus */
  readonly explored: ReadonlySet<string>
  readonly trace: RunTrace
}

interface Query {
  text: string
  focus: string[]
}

/**
 * Drives retrieval, generation, parsing, merging and convergence checks.
 *
 * @example
 * ```typescript
 * const synthesizer = new Synthesizer(config, { documentStore, generator })
 * const { model, trace } = await synthesizer.run('iterative')
 * ```
 */
export class Synthesizer {
  private readonly config: SynthesisConfig
  private readonly similarity: Similarity

  constructor(config: SynthesisConfigInput, private readonly deps: SynthesizerDeps) {
    this.config = resolveSynthesisConfig(config)
    if (this.config.promptTemplate !== undefined)
      assertTemplateResolvable(this.config.promptTemplate)
    this.similarity = deps.similarity ?? new LexicalSimilarity()
  }

  /**
   * Run to a terminal state (IS) or for exactly one iteration (SS).
   * Per-iteration failures are recorded, never thrown.
   */
  async run(mode: SynthesisMode): Promise<SynthesisResult> {
    const runId = this.deps.runId ?? randomUUID()
    let state: LoopState = {
      model: FeatureModel.createEmpty(this.config.rootFeature, { name: this.config.rootFeature }),
      monitor: initialMonitorState(),
      explored: new Set(),
      trace: createRunTrace({ runId, mode, rootFeature: this.config.rootFeature, startedAt: new Date().toISOString() }),
    }
    log.info(`Run ${runId}: ${mode} synthesis of "${this.config.rootFeature}"`)

    for (;;) {
      if (this.deps.signal?.aborted) {
        log.warn(`Run ${runId} cancelled after ${state.monitor.iteration} iterations`)
        state = { ...state, trace: finishTrace(state.trace, 'CANCELLED', 'cancelled', new Date().toISOString()) }
        break
      }

      state = await this.iterate(state, mode)
      const verdict = state.monitor.verdict

      if (state.trace.records.at(-1)?.transportFailure?.cancelled) {
        log.warn(`Run ${runId} cancelled during iteration ${state.trace.records.length}`)
        state = { ...state, trace: finishTrace(state.trace, 'CANCELLED', 'cancelled', new Date().toISOString()) }
        break
      }

      if (mode === SynthesisMode.SingleStage) {
        state = { ...state, trace: finishTrace(state.trace, verdict, 'single-stage', new Date().toISOString()) }
        break
      }
      if (isTerminal(verdict)) {
        state = { ...state, trace: finishTrace(state.trace, verdict, 'terminal-state', new Date().toISOString()) }
        break
      }
    }

    log.success(`Run ${runId} finished: ${state.trace.status}, ${state.model.size} features, ${state.monitor.iteration} iterations`)
    return { model: state.model, trace: state.trace }
  }

  private async iterate(state: LoopState, mode: SynthesisMode): Promise<LoopState> {
    const started = Date.now()
    const iteration = state.monitor.iteration + 1
    const query = this.buildQuery(state, iteration)
    const explored = new Set([...state.explored, ...query.focus])
    log.debug(`Iteration ${iteration}: query "${query.text}"`)

    const record: Pick<IterationRecord, 'iteration' | 'query' | 'retrieval' | 'prompt' | 'rawOutput'> = {
      iteration,
      query: query.text,
      retrieval: null,
      prompt: null,
      rawOutput: null,
    }

    const finish = (
      next: Partial<Pick<LoopState, 'model'>>,
      observation: IterationObservation | null,
      rest: Pick<IterationRecord, 'parse' | 'transportFailure' | 'diff'>,
    ): LoopState => {
      // A call cut short by cancellation says nothing about convergence
      const monitor = observation ? advance(state.monitor, observation, this.config) : state.monitor
      const model = next.model ?? state.model
      const full: IterationRecord = {
        ...record,
        ...rest,
        verdict: monitor.verdict,
        durationMs: Date.now() - started,
      }
      const trace = appendRecord(state.trace, full)
      const appended = trace.records[trace.records.length - 1] ?? full
      this.deps.onIteration?.(appended, model)
      return { model, monitor, explored, trace }
    }

    const transportFailure = (stage: TransportFailure['stage'], outcome: { error: Error, attempts: number, timedOut: boolean, cancelled: boolean }): LoopState => {
      const failure: TransportFailure = {
        stage,
        message: outcome.error.message,
        attempts: outcome.attempts,
        timedOut: outcome.timedOut,
        cancelled: outcome.cancelled,
      }
      if (!outcome.cancelled)
        log.warn(`Iteration ${iteration}: ${stage} failed after ${outcome.attempts} attempts: ${outcome.error.message}`)
      return finish(
        {},
        outcome.cancelled ? null : { kind: 'transport-failure', message: outcome.error.message },
        { parse: null, transportFailure: failure, diff: null },
      )
    }

    const retrieval = await withRetry(
      signal => this.deps.documentStore.search(query.text, this.config.topK, { signal }),
      {
        maxRetries: this.config.maxRetries,
        timeoutMs: this.config.retrievalTimeoutMs,
        signal: this.deps.signal,
        label: 'retrieval',
        timeoutError: ms => new RetrievalError(`Search timed out after ${ms}ms`),
      },
    )
    if (!retrieval.ok)
      return transportFailure('retrieval', retrieval)
    record.retrieval = retrieval.value

    const prompt = buildSynthesisPrompt({ mode, config: this.config, context: retrieval.value, model: state.model })
    record.prompt = prompt

    const generation = await withRetry(
      signal => this.deps.generator.generate(prompt, { timeoutMs: this.config.generationTimeoutMs, signal }),
      {
        maxRetries: this.config.maxRetries,
        timeoutMs: this.config.generationTimeoutMs,
        signal: this.deps.signal,
        label: 'generation',
        timeoutError: ms => new GenerationTimeoutError(ms),
      },
    )
    if (!generation.ok)
      return transportFailure('generation', generation)
    record.rawOutput = generation.value

    const parse = parseFragment(generation.value, this.config.contract)
    if (!parse.ok) {
      log.warn(`Iteration ${iteration}: unusable output (${parse.failure.reason}): ${parse.failure.detail}`)
      return finish({}, { kind: 'parse-failure', reason: parse.failure.reason }, { parse, transportFailure: null, diff: null })
    }

    const { model, diff } = await mergeFragment(state.model, parse.fragment, {
      similarity: this.similarity,
      threshold: this.config.mergeThreshold,
      iteration,
      sourceChunkIds: retrieval.value.chunks.map(c => c.chunkId),
    })
    logDiff(iteration, diff)
    return finish(
      { model },
      { kind: 'merged', added: diff.added.length, reparented: diff.reparented.length },
      { parse, transportFailure: null, diff },
    )
  }

  /**
   * First iteration: root and domain. Later: up to `frontierSize` leaves not
   * yet used as a focus, or every leaf once all have been used.
   */
  private buildQuery(state: LoopState, iteration: number): Query {
    const seed = [this.config.rootFeature, this.config.domain].filter(Boolean).join(' ')
    if (iteration === 1)
      return { text: seed, focus: [] }

    const leaves = state.model.leaves().filter(f => f.id !== state.model.rootId)
    const fresh = leaves.filter(f => !state.explored.has(f.id))
    const focus = (fresh.length > 0 ? fresh : leaves).slice(0, this.config.frontierSize)
    if (focus.length === 0)
      return { text: seed, focus: [] }
    return {
      text: `${focus.map(f => f.name).join(', ')} (${this.config.rootFeature})`,
      focus: focus.map(f => f.id),
    }
  }
}

function logDiff(iteration: number, diff: MergeDiff): void {
  log.debug(
    `Iteration ${iteration}: +${diff.added.length} added, ${diff.aliased.length} aliased, `
    + `${diff.reparented.length} reparented, ${diff.conflictsIgnored.length} conflicts ignored`,
  )
  if (diff.orphansRecovered.length > 0)
    log.warn(`Iteration ${iteration}: recovered ${diff.orphansRecovered.length} orphans under the root`)
  if (diff.groupsDowngraded.length > 0)
    log.warn(`Iteration ${iteration}: downgraded inconsistent groups under ${diff.groupsDowngraded.map(g => g.parent).join(', ')}`)
}

/**
 * Run one synthesis over `corpus`
 */
export async function synthesize(
  mode: SynthesisMode,
  corpus: DocumentStore,
  config: SynthesisConfigInput,
  deps: Omit<SynthesizerDeps, 'documentStore'>,
): Promise<SynthesisResult> {
  return new Synthesizer(config, { ...deps, documentStore: corpus }).run(mode)
}
