import type { TokenUsageStats } from '@fm-synth/utils/llm'
import type { RunTrace } from './trace'
import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { extname, join } from 'node:path'
import { FeatureModel, featureModelFromFeatureIde, toFeatureIdeXml } from '@fm-synth/model'
import { createLogger } from '@fm-synth/utils/logger'
import { z } from 'zod/v4'
import { parseRunTrace } from './trace'

const log = createLogger('Artifacts')

export const UsageReportSchema = z.object({
  model: z.string(),
  totalPromptTokens: z.number().int().nonnegative(),
  totalCompletionTokens: z.number().int().nonnegative(),
  totalTokens: z.number().int().nonnegative(),
  requestCount: z.number().int().nonnegative(),
  estimatedCostUsd: z.number().nonnegative(),
})

export type UsageReport = z.infer<typeof UsageReportSchema>

export function toUsageReport(model: string, stats: TokenUsageStats, estimatedCostUsd: number): UsageReport {
  return { model, ...stats, estimatedCostUsd }
}

export interface RunArtifacts {
  dir: string
  model: string
  featureIde: string
  trace: string
  usage?: string
}

/**
 * Persist one run under `<outDir>/<runId>/`: `model.json`, `model.xml`
 * (FeatureIDE), `trace.json` and, when given, `usage.json`.
 */
export async function writeRunArtifacts(
  outDir: string,
  run: { model: FeatureModel, trace: RunTrace, usage?: UsageReport },
): Promise<RunArtifacts> {
  const dir = join(outDir, run.trace.runId)
  await mkdir(dir, { recursive: true })

  const artifacts: RunArtifacts = {
    dir,
    model: join(dir, 'model.json'),
    featureIde: join(dir, 'model.xml'),
    trace: join(dir, 'trace.json'),
  }
  await writeFile(artifacts.model, `${run.model.toJSON()}\n`, 'utf8')
  await writeFile(artifacts.featureIde, toFeatureIdeXml(run.model), 'utf8')
  await writeFile(artifacts.trace, `${JSON.stringify(run.trace, null, 2)}\n`, 'utf8')
  if (run.usage) {
    artifacts.usage = join(dir, 'usage.json')
    await writeFile(artifacts.usage, `${JSON.stringify(run.usage, null, 2)}\n`, 'utf8')
  }
  log.debug(`Wrote run ${run.trace.runId} to ${dir}`)
  return artifacts
}

export async function readRunTrace(path: string): Promise<RunTrace> {
  return parseRunTrace(JSON.parse(await readFile(path, 'utf8')))
}

/**
 * Load a model from `.json` (serialized FeatureModel) or `.xml` (FeatureIDE)
 */
export async function loadFeatureModel(path: string): Promise<FeatureModel> {
  const text = await readFile(path, 'utf8')
  return extname(path).toLowerCase() === '.xml' ? featureModelFromFeatureIde(text) : FeatureModel.fromJSON(text)
}
