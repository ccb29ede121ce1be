import type { Feature, FeatureModel, Similarity } from '@fm-synth/model'
import { LexicalSimilarity } from '@fm-synth/model'
import { createLogger } from '@fm-synth/utils/logger'
import { z } from 'zod/v4'

const log = createLogger('Coverage')

export const CoverageEdgeCaseSchema = z.enum(['none', 'empty-ground-truth', 'empty-prediction', 'both-empty'])

export type CoverageEdgeCase = z.infer<typeof CoverageEdgeCaseSchema>

export const CoverageResultSchema = z.object({
  matched: z.array(z.object({
    groundTruthId: z.string(),
    predictedId: z.string(),
    score: z.number(),
  })),
  /** Unmatched ground-truth ids, pre-order */
  misses: z.array(z.string()),
  /** Unmatched predicted ids, pre-order */
  extras: z.array(z.string()),
  recall: z.number().min(0).max(1),
  precision: z.number().min(0).max(1),
  f1: z.number().min(0).max(1),
  edgeCase: CoverageEdgeCaseSchema,
  /** Mean noisy-OR of each ground-truth feature's top scores, 0-100 */
  softRecall: z.number().min(0).max(100),
})

export type CoverageResult = z.infer<typeof CoverageResultSchema>

export interface CoverageOptions {
  /** Lexical Dice when omitted */
  similarity?: Similarity
  /** Minimum pair score for a match (default 0.5) */
  threshold?: number
  /** Weight of the name similarity (default 0.9) */
  featureWeight?: number
  /** Weight of the parent-name similarity (default 0.1) */
  parentWeight?: number
  /** Predicted scores combined per ground-truth feature in `softRecall` (default 3) */
  softTopK?: number
}

export const DEFAULT_COVERAGE_OPTIONS = {
  threshold: 0.5,
  featureWeight: 0.9,
  parentWeight: 0.1,
  softTopK: 3,
} as const

interface Entry {
  feature: Feature
  parentName: string | null
  depth: number
}

interface Candidate {
  g: Entry
  p: Entry
  score: number
}

function entriesOf(model: FeatureModel | null): Entry[] {
  if (!model)
    return []
  return model.features().map(feature => ({
    feature,
    parentName: feature.parent === null ? null : model.get(feature.parent)?.name ?? null,
    depth: model.depthOf(feature.id),
  }))
}

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

/**
 * Higher score first; then shallower ground-truth feature, shallower
 * predicted feature, smaller ground-truth id, smaller predicted id
 */
function compareCandidates(a: Candidate, b: Candidate): number {
  return b.score - a.score
    || a.g.depth - b.g.depth
    || a.p.depth - b.p.depth
    || compareIds(a.g.feature.id, b.g.feature.id)
    || compareIds(a.p.feature.id, b.p.feature.id)
}

async function parentScores(
  similarity: Similarity,
  ground: readonly Entry[],
  predicted: readonly Entry[],
): Promise<(g: Entry, p: Entry) => number> {
  const left = [...new Set(ground.map(e => e.parentName).filter((n): n is string => n !== null))]
  const right = [...new Set(predicted.map(e => e.parentName).filter((n): n is string => n !== null))]
  const matrix = left.length > 0 && right.length > 0 ? await similarity.matrix(left, right) : []
  const leftIndex = new Map(left.map((name, i) => [name, i]))
  const rightIndex = new Map(right.map((name, i) => [name, i]))

  return (g, p) => {
    if (g.parentName === null || p.parentName === null)
      return g.parentName === p.parentName ? 1 : 0
    const i = leftIndex.get(g.parentName)
    const j = rightIndex.get(p.parentName)
    return i === undefined || j === undefined ? 0 : matrix[i]?.[j] ?? 0
  }
}

function emptyResult(ground: readonly Entry[], predicted: readonly Entry[]): CoverageResult {
  const edgeCase: CoverageEdgeCase = ground.length === 0
    ? (predicted.length === 0 ? 'both-empty' : 'empty-ground-truth')
    : 'empty-prediction'
  return {
    matched: [],
    misses: ground.map(e => e.feature.id),
    extras: predicted.map(e => e.feature.id),
    recall: 0,
    precision: 0,
    f1: 0,
    edgeCase,
    softRecall: 0,
  }
}

/**
 * Semantic coverage of a ground-truth model by a predicted one.
 *
 * Pairs score `featureWeight * sim(names) + parentWeight * sim(parent names)`;
 * two roots count as parent similarity 1. Pairs at or above `threshold` are
 * matched greedily, best first, each feature at most once. Either side may be
 * `null` (no model), which yields zero scores and a distinct `edgeCase`.
 */
export async function evaluateCoverage(
  groundTruth: FeatureModel | null,
  predicted: FeatureModel | null,
  options: CoverageOptions = {},
): Promise<CoverageResult> {
  const similarity = options.similarity ?? new LexicalSimilarity()
  const threshold = options.threshold ?? DEFAULT_COVERAGE_OPTIONS.threshold
  const featureWeight = options.featureWeight ?? DEFAULT_COVERAGE_OPTIONS.featureWeight
  const parentWeight = options.parentWeight ?? DEFAULT_COVERAGE_OPTIONS.parentWeight
  const softTopK = options.softTopK ?? DEFAULT_COVERAGE_OPTIONS.softTopK

  const ground = entriesOf(groundTruth)
  const pred = entriesOf(predicted)
  if (ground.length === 0 || pred.length === 0)
    return emptyResult(ground, pred)

  const names = await similarity.matrix(ground.map(e => e.feature.name), pred.map(e => e.feature.name))
  const parentScore = await parentScores(similarity, ground, pred)

  const candidates: Candidate[] = []
  const perGround: number[][] = ground.map(() => [])
  ground.forEach((g, i) => {
    pred.forEach((p, j) => {
      const score = featureWeight * (names[i]?.[j] ?? 0) + parentWeight * parentScore(g, p)
      if (score < threshold)
        return
      candidates.push({ g, p, score })
      perGround[i]?.push(score)
    })
  })
  candidates.sort(compareCandidates)

  const usedGround = new Set<string>()
  const usedPred = new Set<string>()
  const matched: CoverageResult['matched'] = []
  for (const { g, p, score } of candidates) {
    if (usedGround.has(g.feature.id) || usedPred.has(p.feature.id))
      continue
    usedGround.add(g.feature.id)
    usedPred.add(p.feature.id)
    matched.push({ groundTruthId: g.feature.id, predictedId: p.feature.id, score })
  }

  const recall = matched.length / ground.length
  const precision = matched.length / pred.length
  const f1 = recall + precision === 0 ? 0 : (2 * recall * precision) / (recall + precision)

  const soft = perGround.map((scores) => {
    const top = [...scores].sort((a, b) => b - a).slice(0, softTopK)
    return 1 - top.reduce((miss, s) => miss * (1 - Math.min(1, s)), 1)
  })
  const softRecall = (soft.reduce((sum, s) => sum + s, 0) / ground.length) * 100

  log.debug(`Coverage: ${matched.length}/${ground.length} matched, ${pred.length} predicted`)
  return {
    matched,
    misses: ground.filter(e => !usedGround.has(e.feature.id)).map(e => e.feature.id),
    extras: pred.filter(e => !usedPred.has(e.feature.id)).map(e => e.feature.id),
    recall,
    precision,
    f1,
    edgeCase: 'none',
    softRecall,
  }
}
