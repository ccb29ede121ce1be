import type { Feature, FeatureKind, Similarity } from '@fm-synth/model'
import type { Fragment, FragmentFeature } from './fragment-parser'
import {
  FeatureKind as Kinds,
  FeatureModel,
  FeatureOrigin,
  isConsistentSiblingGroup,
  isGroupMemberKind,
  LexicalSimilarity,
  normalizeName,
  toFeatureId,
  uniqueFeatureId,
} from '@fm-synth/model'
import { createLogger } from '@fm-synth/utils/logger'
import { z } from 'zod/v4'

const log = createLogger('Merger')

export const DEFAULT_MERGE_THRESHOLD = 0.85

export const MergeDiffSchema = z.object({
  /** Ids of features created by this merge, in fragment order */
  added: z.array(z.string()),
  /** Proposed names resolved onto existing features */
  aliased: z.array(z.object({ name: z.string(), id: z.string(), score: z.number() })),
  reparented: z.array(z.object({ id: z.string(), from: z.string(), to: z.string() })),
  /** Kind disagreements with an existing feature; the existing kind is kept */
  conflictsIgnored: z.array(z.object({ id: z.string(), existing: z.string(), proposed: z.string() })),
  /** New features whose parent could not be resolved, attached under the root */
  orphansRecovered: z.array(z.object({ id: z.string(), proposedParent: z.string().nullable() })),
  /** Parents whose mixed group children were downgraded to optional */
  groupsDowngraded: z.array(z.object({ parent: z.string(), ids: z.array(z.string()) })),
})

export type MergeDiff = z.infer<typeof MergeDiffSchema>

export interface MergeOptions {
  /** Name similarity; lexical Dice when omitted */
  similarity?: Similarity
  threshold?: number
  /** Iteration recorded in the provenance of new features */
  iteration?: number
  sourceChunkIds?: readonly string[]
}

export interface MergeResult {
  model: FeatureModel
  diff: MergeDiff
}

interface DraftFeature {
  id: string
  name: string
  parent: string | null
  kind: FeatureKind
  children: string[]
  provenance: { iteration: number, sourceChunkIds: string[], origin: FeatureOrigin }
}

function emptyDiff(): MergeDiff {
  return { added: [], aliased: [], reparented: [], conflictsIgnored: [], orphansRecovered: [], groupsDowngraded: [] }
}

function toDraft(feature: Feature): DraftFeature {
  return {
    ...feature,
    children: [...feature.children],
    provenance: { ...feature.provenance, sourceChunkIds: [...feature.provenance.sourceChunkIds] },
  }
}

/**
 * Drop later entries whose normalized name repeats an earlier one
 */
function dedupe(features: readonly FragmentFeature[]): FragmentFeature[] {
  const seen = new Set<string>()
  return features.filter((f) => {
    const key = normalizeName(f.name)
    if (key.length === 0 || seen.has(key))
      return false
    seen.add(key)
    return true
  })
}

interface Match {
  id: string
  score: number
  depth: number
}

/**
 * Best candidate scoring at or above `threshold`; ties go to the shallower
 * feature, then the lexicographically smaller id
 */
function bestMatch(
  row: readonly number[],
  candidates: readonly Feature[],
  depthOf: ReadonlyMap<string, number>,
  threshold: number,
): Match | undefined {
  let best: Match | undefined
  for (const [j, candidate] of candidates.entries()) {
    const score = row[j] ?? 0
    if (score < threshold)
      continue
    const depth = depthOf.get(candidate.id) ?? 0
    const better = best === undefined
      || score > best.score
      || (score === best.score && (depth < best.depth || (depth === best.depth && candidate.id < best.id)))
    if (better)
      best = { id: candidate.id, score, depth }
  }
  return best
}

function plainKind(kind: FeatureKind | undefined): FeatureKind {
  return kind === undefined || isGroupMemberKind(kind) ? Kinds.Optional : kind
}

/**
 * Merge a fragment into a model, returning the new model and what changed.
 *
 * - The fragment's first parentless feature is the model root.
 * - Every other proposed feature aliases the most similar existing feature
 *   scoring at or above `threshold`; ties go to the shallower feature, then
 *   the lexicographically smaller id.
 * - A parent name the fragment does not define resolves against the existing
 *   features the same way.
 * - Existing features keep their kind and parent (first write wins). The
 *   one exception is an orphan-recovered feature, which moves under a
 *   newly resolvable proposed parent.
 * - Unresolvable parents attach the feature under the root.
 * - Sibling sets mixing group kinds are downgraded to optional.
 *
 * When nothing changes, the input model instance is returned.
 */
export async function mergeFragment(
  model: FeatureModel,
  fragment: Fragment,
  options: MergeOptions = {},
): Promise<MergeResult> {
  const similarity = options.similarity ?? new LexicalSimilarity()
  const threshold = options.threshold ?? DEFAULT_MERGE_THRESHOLD
  const iteration = options.iteration ?? 0
  const sourceChunkIds = [...(options.sourceChunkIds ?? [])]
  const diff = emptyDiff()

  const proposed = dedupe(fragment.features)
  if (proposed.length === 0)
    return { model, diff }

  const draft = new Map<string, DraftFeature>()
  for (const feature of model.features())
    draft.set(feature.id, toDraft(feature))

  // normalized proposed name -> feature id
  const resolved = new Map<string, string>()

  const rootIndex = proposed.findIndex(f => f.parent === null)
  const rootProposal = proposed[rootIndex]
  if (rootProposal) {
    resolved.set(normalizeName(rootProposal.name), model.rootId)
    diff.aliased.push({ name: rootProposal.name, id: model.rootId, score: 1 })
  }
  const others = proposed.filter((_, i) => i !== rootIndex)

  // Alias against existing features
  const existing = model.features()
  const scores = await similarity.matrix(others.map(f => f.name), existing.map(f => f.name))
  const depthOf = new Map(existing.map(f => [f.id, model.depthOf(f.id)]))
  const aliases = new Map<FragmentFeature, string>()
  for (const [i, feature] of others.entries()) {
    const best = bestMatch(scores[i] ?? [], existing, depthOf, threshold)
    if (best) {
      aliases.set(feature, best.id)
      resolved.set(normalizeName(feature.name), best.id)
      diff.aliased.push({ name: feature.name, id: best.id, score: best.score })
    }
  }

  // Allocate ids for the rest up front so parent names resolve in any order
  const pending: Array<{ proposal: FragmentFeature, id: string }> = []
  for (const feature of others) {
    if (aliases.has(feature))
      continue
    const id = uniqueFeatureId(toFeatureId(feature.name), taken => draft.has(taken) || pending.some(p => p.id === taken))
    pending.push({ proposal: feature, id })
    resolved.set(normalizeName(feature.name), id)
  }

  // Parents named but not defined by the fragment
  const outside = [...new Set(others
    .map(f => f.parent)
    .filter((name): name is string => name !== null && !resolved.has(normalizeName(name))))]
  if (outside.length > 0) {
    const parentScores = await similarity.matrix(outside, existing.map(f => f.name))
    for (const [i, name] of outside.entries()) {
      const best = bestMatch(parentScores[i] ?? [], existing, depthOf, threshold)
      if (best)
        resolved.set(normalizeName(name), best.id)
    }
  }

  const attach = (id: string, proposal: FragmentFeature, parent: string, origin: FeatureOrigin, kind: FeatureKind): void => {
    draft.set(id, {
      id,
      name: proposal.name,
      parent,
      kind,
      children: [],
      provenance: { iteration, sourceChunkIds: [...sourceChunkIds], origin },
    })
    draft.get(parent)?.children.push(id)
    diff.added.push(id)
  }

  const resolveParent = (proposal: FragmentFeature): string | undefined =>
    proposal.parent === null ? undefined : resolved.get(normalizeName(proposal.parent))

  while (pending.length > 0) {
    let progress = true
    while (progress) {
      progress = false
      for (let i = 0; i < pending.length; i++) {
        const entry = pending[i]
        if (!entry)
          continue
        const parent = resolveParent(entry.proposal)
        if (parent === undefined || parent === entry.id || !draft.has(parent))
          continue
        attach(entry.id, entry.proposal, parent, FeatureOrigin.Generated, entry.proposal.kind ?? Kinds.Optional)
        pending.splice(i, 1)
        i--
        progress = true
      }
    }
    // Nothing else resolves: recover the first stuck feature, then retry
    const orphan = pending.shift()
    if (orphan) {
      attach(orphan.id, orphan.proposal, model.rootId, FeatureOrigin.OrphanRecovered, plainKind(orphan.proposal.kind))
      diff.orphansRecovered.push({ id: orphan.id, proposedParent: orphan.proposal.parent })
    }
  }

  // Existing features: record kind conflicts, move recovered orphans
  for (const [proposal, id] of aliases) {
    const current = draft.get(id)
    if (!current || id === model.rootId)
      continue
    if (proposal.kind !== undefined && proposal.kind !== current.kind)
      diff.conflictsIgnored.push({ id, existing: current.kind, proposed: proposal.kind })

    if (current.provenance.origin !== FeatureOrigin.OrphanRecovered)
      continue
    const target = resolveParent(proposal)
    if (target === undefined || target === current.parent || !draft.has(target) || isDraftDescendant(draft, target, id))
      continue
    const from = current.parent ?? model.rootId
    const oldParent = draft.get(from)
    if (oldParent)
      oldParent.children = oldParent.children.filter(c => c !== id)
    draft.get(target)?.children.push(id)
    current.parent = target
    current.provenance.origin = FeatureOrigin.Generated
    diff.reparented.push({ id, from, to: target })
  }

  for (const parent of draft.values()) {
    const children = parent.children.map(c => draft.get(c)).filter((c): c is DraftFeature => c !== undefined)
    if (isConsistentSiblingGroup(children.map(c => c.kind)))
      continue
    const downgraded = children.filter(c => isGroupMemberKind(c.kind))
    for (const child of downgraded)
      child.kind = Kinds.Optional
    diff.groupsDowngraded.push({ parent: parent.id, ids: downgraded.map(c => c.id) })
  }

  const changed = diff.added.length > 0 || diff.reparented.length > 0 || diff.groupsDowngraded.length > 0
  if (!changed)
    return { model, diff }

  log.debug(`iteration ${iteration}: +${diff.added.length} features, ${diff.aliased.length} aliased, ${diff.orphansRecovered.length} orphans`)
  return { model: FeatureModel.fromFeatures(model.rootId, [...draft.values()], model.name), diff }
}

function isDraftDescendant(draft: ReadonlyMap<string, DraftFeature>, id: string, ancestorId: string): boolean {
  let current = draft.get(id)
  while (current) {
    if (current.id === ancestorId)
      return true
    current = current.parent === null ? undefined : draft.get(current.parent)
  }
  return false
}
