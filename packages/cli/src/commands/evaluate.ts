import type { CoverageOptions, CoverageResult, Violation } from '@fm-synth/evaluation'
import type { FeatureModel } from '@fm-synth/model'
import type { Command } from 'commander'
import { existsSync } from 'node:fs'
import { mkdir, readFile, writeFile } from 'node:fs/promises'
import path from 'node:path'
import { evaluateCoverage } from '@fm-synth/evaluation/coverage'
import { checkWellformed } from '@fm-synth/evaluation/wellformed'
import { toFeatureIdeXml } from '@fm-synth/model'
import { loadFeatureModel } from '@fm-synth/synthesis/artifacts'
import { createLogger } from '@fm-synth/utils/logger'
import { loadProjectConfig, parseNumberFlag } from '../config'

const log = createLogger('evaluate')

/**
 * Load a model, or `null` when the file does not exist (a run that
 * produced nothing)
 */
async function loadOptionalModel(file: string): Promise<FeatureModel | null> {
  if (!existsSync(file)) {
    log.warn(`${file} not found, scoring it as an empty model`)
    return null
  }
  return loadFeatureModel(file)
}

export async function runCoverage(groundTruthFile: string, predictedFile: string, options: CoverageOptions = {}): Promise<CoverageResult> {
  const [groundTruth, predicted] = await Promise.all([loadOptionalModel(groundTruthFile), loadOptionalModel(predictedFile)])
  return evaluateCoverage(groundTruth, predicted, options)
}

export async function runCheck(file: string): Promise<Violation[]> {
  return checkWellformed(await readFile(file, 'utf8'))
}

/**
 * Convert a serialized model to FeatureIDE XML; returns the written path
 */
export async function runExport(input: string, output: string): Promise<string> {
  const model = await loadFeatureModel(input)
  await mkdir(path.dirname(output), { recursive: true })
  await writeFile(output, toFeatureIdeXml(model), 'utf8')
  return output
}

function formatPercent(value: number): string {
  return `${(value * 100).toFixed(1)}%`
}

export function registerEvaluateCommands(program: Command): void {
  program
    .command('coverage')
    .description('Score a predicted model against a ground truth')
    .argument('<ground-truth>', 'Ground-truth model (.json or FeatureIDE .xml)')
    .argument('<predicted>', 'Predicted model (.json or FeatureIDE .xml)')
    .option('-c, --config <file>', 'Project configuration file')
    .option('-t, --threshold <score>', 'Minimum pair score for a match')
    .option('--json', 'Print the full result as JSON')
    .action(async (groundTruth: string, predicted: string, options: { config?: string, threshold?: string, json?: boolean }) => {
      const project = await loadProjectConfig(process.cwd(), options.config)
      const result = await runCoverage(path.resolve(groundTruth), path.resolve(predicted), {
        ...project.coverage,
        threshold: parseNumberFlag('threshold', options.threshold) ?? project.coverage.threshold,
      })

      if (options.json) {
        console.log(JSON.stringify(result, null, 2))
        return
      }
      console.log('\nCoverage:')
      console.log(`  Recall: ${formatPercent(result.recall)}`)
      console.log(`  Precision: ${formatPercent(result.precision)}`)
      console.log(`  F1: ${formatPercent(result.f1)}`)
      console.log(`  Soft recall: ${result.softRecall.toFixed(1)}`)
      console.log(`  Matched: ${result.matched.length}`)
      if (result.edgeCase !== 'none')
        console.log(`  Edge case: ${result.edgeCase}`)
      if (result.misses.length > 0)
        console.log(`  Misses: ${result.misses.join(', ')}`)
      if (result.extras.length > 0)
        console.log(`  Extras: ${result.extras.join(', ')}`)
    })

  program
    .command('check')
    .description('Report every well-formedness violation of a serialized model')
    .argument('<file>', 'Model file (.json or FeatureIDE .xml)')
    .action(async (file: string) => {
      const violations = await runCheck(path.resolve(file))
      if (violations.length === 0) {
        log.success(`${file} is well formed`)
        return
      }
      for (const violation of violations) {
        const where = violation.locations.length > 0 ? ` (${violation.locations.join(', ')})` : ''
        console.log(`  [${violation.code}] ${violation.message}${where}`)
      }
      log.error(`${violations.length} violation(s) in ${file}`)
      process.exitCode = 1
    })

  program
    .command('export')
    .description('Write a serialized model as FeatureIDE XML')
    .argument('<input>', 'Model file (.json)')
    .option('-o, --output <file>', 'Output file (default: input with .xml extension)')
    .action(async (input: string, options: { output?: string }) => {
      const resolved = path.resolve(input)
      const output = options.output ?? path.join(path.dirname(resolved), `${path.basename(resolved, path.extname(resolved))}.xml`)
      log.success(`Exported ${await runExport(resolved, path.resolve(output))}`)
    })
}
