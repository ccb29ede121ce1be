import { existsSync } from 'node:fs'
import { readFile } from 'node:fs/promises'
import path from 'node:path'
import { ConfigurationError } from '@fm-synth/utils/errors'
import { z } from 'zod/v4'

export const PROJECT_CONFIG_FILE = 'fm-synth.config.json'

/**
 * Project defaults read from `fm-synth.config.json`; command-line flags win
 */
export const ProjectConfigSchema = z.object({
  /** Generation model as `provider/model` */
  model: z.string().optional(),
  /** Embedding model as `provider/model`, or `mock` for offline runs */
  embedding: z.string().default('openai'),
  /** Where `ingest` writes chunk files */
  chunks: z.string().default('.fm-synth/chunks'),
  /** Where `ingest` persists the vector index */
  vectors: z.string().default('.fm-synth/vectors'),
  /** Parent directory of run artifacts */
  output: z.string().default('runs'),
  /** Paragraph-packing budget used by `ingest` */
  maxChunkChars: z.number().int().positive().optional(),
  /** Run configuration, validated when a run starts */
  synthesis: z.record(z.string(), z.unknown()).default({}),
  coverage: z.object({
    threshold: z.number().min(0).optional(),
    featureWeight: z.number().min(0).optional(),
    parentWeight: z.number().min(0).optional(),
    softTopK: z.number().int().positive().optional(),
  }).default({}),
})

export type ProjectConfig = z.output<typeof ProjectConfigSchema>

/**
 * Read the project configuration.
 *
 * Without an explicit `file`, a missing `fm-synth.config.json` in `cwd`
 * yields the defaults. An explicit file must exist.
 */
export async function loadProjectConfig(cwd: string, file?: string): Promise<ProjectConfig> {
  const configPath = path.resolve(cwd, file ?? PROJECT_CONFIG_FILE)
  if (!file && !existsSync(configPath))
    return ProjectConfigSchema.parse({})

  let raw: unknown
  try {
    raw = JSON.parse(await readFile(configPath, 'utf8'))
  }
  catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new ConfigurationError([`${configPath}: ${message}`])
  }

  const parsed = ProjectConfigSchema.safeParse(raw)
  if (!parsed.success)
    throw new ConfigurationError(parsed.error.issues.map(issue => `${issue.path.map(String).join('.') || '(root)'}: ${issue.message}`))
  return parsed.data
}

/**
 * Overlay flag values on the project's run configuration; undefined flags
 * leave the project value in place
 */
export function mergeSynthesisInput(project: ProjectConfig, flags: Record<string, unknown>): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...project.synthesis }
  for (const [key, value] of Object.entries(flags)) {
    if (value !== undefined)
      merged[key] = value
  }
  return merged
}

/**
 * Parse a numeric flag, rejecting anything that is not a finite number
 */
export function parseNumberFlag(name: string, value: string | undefined): number | undefined {
  if (value === undefined)
    return undefined
  const parsed = Number(value)
  if (value.trim() === '' || !Number.isFinite(parsed))
    throw new ConfigurationError([`--${name}: expected a number, got "${value}"`])
  return parsed
}
