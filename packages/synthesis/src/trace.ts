import { RetrievalContextSchema } from '@fm-synth/store'
import { z } from 'zod/v4'
import { SynthesisModeSchema } from './config'
import { ConvergenceStateSchema } from './convergence'
import { ParseOutcomeSchema } from './fragment-parser'
import { MergeDiffSchema } from './merger'

export const TransportFailureSchema = z.object({
  stage: z.enum(['retrieval', 'generation']),
  message: z.string(),
  attempts: z.number().int().nonnegative(),
  timedOut: z.boolean(),
  cancelled: z.boolean(),
})

export type TransportFailure = z.infer<typeof TransportFailureSchema>

export const IterationRecordSchema = z.object({
  /** 1-based */
  iteration: z.number().int().positive(),
  query: z.string(),
  retrieval: RetrievalContextSchema.nullable(),
  prompt: z.object({ system: z.string(), user: z.string() }).nullable(),
  rawOutput: z.string().nullable(),
  parse: ParseOutcomeSchema.nullable(),
  transportFailure: TransportFailureSchema.nullable(),
  diff: MergeDiffSchema.nullable(),
  verdict: ConvergenceStateSchema,
  durationMs: z.number().nonnegative(),
})

export type IterationRecord = z.infer<typeof IterationRecordSchema>

export const RunStatusSchema = z.enum(['RUNNING', 'CONTINUE', 'CONVERGED', 'STALLED', 'MAX_ITER_REACHED', 'CANCELLED'])

export type RunStatus = z.infer<typeof RunStatusSchema>

export const StopReasonSchema = z.enum(['terminal-state', 'single-stage', 'cancelled'])

export type StopReason = z.infer<typeof StopReasonSchema>

export const RunTraceSchema = z.object({
  runId: z.string(),
  mode: SynthesisModeSchema,
  rootFeature: z.string(),
  startedAt: z.string(),
  finishedAt: z.string().nullable(),
  status: RunStatusSchema,
  stopReason: StopReasonSchema.nullable(),
  records: z.array(IterationRecordSchema),
})

export type RunTrace = z.infer<typeof RunTraceSchema>

function freezeTrace(trace: RunTrace): RunTrace {
  Object.freeze(trace.records)
  return Object.freeze(trace)
}

export function createRunTrace(params: Pick<RunTrace, 'runId' | 'mode' | 'rootFeature' | 'startedAt'>): RunTrace {
  return freezeTrace({ ...params, finishedAt: null, status: 'RUNNING', stopReason: null, records: [] })
}

/**
 * New trace with `record` frozen and appended
 */
export function appendRecord(trace: RunTrace, record: IterationRecord): RunTrace {
  return freezeTrace({ ...trace, records: [...trace.records, Object.freeze(record)] })
}

export function finishTrace(trace: RunTrace, status: RunStatus, stopReason: StopReason, finishedAt: string): RunTrace {
  return freezeTrace({ ...trace, status, stopReason, finishedAt })
}

export function parseRunTrace(data: unknown): RunTrace {
  const parsed = RunTraceSchema.safeParse(data)
  if (!parsed.success)
    throw new Error(`Invalid run trace: ${z.prettifyError(parsed.error)}`)
  return parsed.data
}
