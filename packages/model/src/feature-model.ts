import type { Feature } from './feature'
import { ModelIntegrityError } from '@fm-synth/utils/errors'
import { z } from 'zod/v4'
import {
  createFeature,
  FeatureKind,
  FeatureOrigin,
  FeatureSchema,
  isConsistentSiblingGroup,
  isGroupMemberKind,
  toFeatureId,
} from './feature'

export const FEATURE_MODEL_FORMAT_VERSION = '1.0.0'

/**
 * Serialized feature model format for persistence
 */
export const SerializedFeatureModelSchema = z.object({
  version: z.string(),
  name: z.string().optional(),
  rootId: z.string(),
  /** Features in pre-order, root first */
  features: z.array(FeatureSchema),
})

export type SerializedFeatureModel = z.infer<typeof SerializedFeatureModelSchema>

/**
 * Structural problems that prevent a feature list from forming a model.
 * Returns an empty list when the features form a valid tree.
 */
export function findIntegrityIssues(rootId: string, features: readonly Feature[]): string[] {
  const issues: string[] = []
  const byId = new Map<string, Feature>()
  for (const feature of features) {
    if (byId.has(feature.id))
      issues.push(`duplicate feature id "${feature.id}"`)
    else
      byId.set(feature.id, feature)
  }

  const root = byId.get(rootId)
  if (!root) {
    issues.push(`root "${rootId}" not found`)
    return issues
  }
  if (root.parent !== null)
    issues.push(`root "${rootId}" has a parent`)
  if (isGroupMemberKind(root.kind))
    issues.push(`root "${rootId}" cannot be a group member`)

  for (const feature of byId.values()) {
    if (feature.id !== rootId && feature.parent === null)
      issues.push(`feature "${feature.id}" has no parent`)
    if (feature.parent !== null) {
      const parent = byId.get(feature.parent)
      if (!parent)
        issues.push(`feature "${feature.id}" references missing parent "${feature.parent}"`)
      else if (!parent.children.includes(feature.id))
        issues.push(`parent "${parent.id}" does not list child "${feature.id}"`)
    }
    const kinds: FeatureKind[] = []
    for (const childId of feature.children) {
      const child = byId.get(childId)
      if (!child) {
        issues.push(`feature "${feature.id}" lists missing child "${childId}"`)
        continue
      }
      if (child.parent !== feature.id)
        issues.push(`child "${childId}" of "${feature.id}" names parent "${child.parent}"`)
      kinds.push(child.kind)
    }
    if (new Set(feature.children).size !== feature.children.length)
      issues.push(`feature "${feature.id}" lists a child twice`)
    if (!isConsistentSiblingGroup(kinds))
      issues.push(`children of "${feature.id}" mix group kinds`)
  }

  const reached = new Set<string>()
  const stack = [rootId]
  while (stack.length > 0) {
    const id = stack.pop()
    if (id === undefined || reached.has(id))
      continue
    reached.add(id)
    for (const childId of byId.get(id)?.children ?? [])
      stack.push(childId)
  }
  for (const id of byId.keys()) {
    if (!reached.has(id))
      issues.push(`feature "${id}" is not reachable from the root (cycle or detached subtree)`)
  }
  return issues
}

/**
 * Immutable feature tree rooted at exactly one feature.
 *
 * Every instance satisfies the structural invariants checked by
 * {@link findIntegrityIssues}; operations that change the tree build a
 * new instance.
 */
export class FeatureModel {
  private readonly byId: ReadonlyMap<string, Feature>

  private constructor(
    readonly rootId: string,
    features: readonly Feature[],
    readonly name?: string,
  ) {
    const byId = new Map<string, Feature>()
    for (const feature of features) {
      const children = [...feature.children]
      const sourceChunkIds = [...feature.provenance.sourceChunkIds]
      Object.freeze(children)
      Object.freeze(sourceChunkIds)
      byId.set(feature.id, Object.freeze({
        ...feature,
        children,
        provenance: Object.freeze({ ...feature.provenance, sourceChunkIds }),
      }))
    }
    this.byId = byId
    Object.freeze(this)
  }

  /**
   * A model holding only its root feature
   */
  static createEmpty(rootName: string, options: { rootId?: string, name?: string } = {}): FeatureModel {
    const root = createFeature({
      id: options.rootId ?? toFeatureId(rootName),
      name: rootName,
      parent: null,
      kind: FeatureKind.Mandatory,
      provenance: { origin: FeatureOrigin.Root },
    })
    return new FeatureModel(root.id, [root], options.name)
  }

  /**
   * Build a model from a flat feature list, throwing `ModelIntegrityError`
   * when the list does not form a valid tree
   */
  static fromFeatures(rootId: string, features: readonly Feature[], name?: string): FeatureModel {
    const issues = findIntegrityIssues(rootId, features)
    if (issues.length > 0)
      throw new ModelIntegrityError(`Invalid feature model: ${issues.join('; ')}`)
    return new FeatureModel(rootId, features, name)
  }

  get root(): Feature {
    return this.require(this.rootId)
  }

  get size(): number {
    return this.byId.size
  }

  has(id: string): boolean {
    return this.byId.has(id)
  }

  get(id: string): Feature | undefined {
    return this.byId.get(id)
  }

  require(id: string): Feature {
    const feature = this.byId.get(id)
    if (!feature)
      throw new ModelIntegrityError(`Feature "${id}" not found`)
    return feature
  }

  /**
   * All features in pre-order (root first, children in their listed order)
   */
  features(): Feature[] {
    const result: Feature[] = []
    const stack = [this.rootId]
    while (stack.length > 0) {
      const id = stack.pop()
      const feature = id === undefined ? undefined : this.byId.get(id)
      if (!feature)
        continue
      result.push(feature)
      for (let i = feature.children.length - 1; i >= 0; i--) {
        const childId = feature.children[i]
        if (childId !== undefined)
          stack.push(childId)
      }
    }
    return result
  }

  ids(): string[] {
    return this.features().map(f => f.id)
  }

  childrenOf(id: string): Feature[] {
    return this.require(id).children.map(childId => this.require(childId))
  }

  parentOf(id: string): Feature | undefined {
    const parent = this.require(id).parent
    return parent === null ? undefined : this.byId.get(parent)
  }

  /**
   * Distance from the root (root = 0)
   */
  depthOf(id: string): number {
    let depth = 0
    let current = this.require(id)
    while (current.parent !== null) {
      current = this.require(current.parent)
      depth++
    }
    return depth
  }

  /**
   * Features without children, in pre-order
   */
  leaves(): Feature[] {
    return this.features().filter(f => f.children.length === 0)
  }

  // ==================== Serialization ====================

  serialize(): SerializedFeatureModel {
    const result: SerializedFeatureModel = {
      version: FEATURE_MODEL_FORMAT_VERSION,
      rootId: this.rootId,
      features: this.features().map(f => ({
        ...f,
        children: [...f.children],
        provenance: { ...f.provenance, sourceChunkIds: [...f.provenance.sourceChunkIds] },
      })),
    }
    if (this.name !== undefined)
      result.name = this.name
    return result
  }

  toJSON(): string {
    return JSON.stringify(this.serialize(), null, 2)
  }

  static deserialize(data: unknown): FeatureModel {
    const parsed = SerializedFeatureModelSchema.safeParse(data)
    if (!parsed.success)
      throw new ModelIntegrityError(`Invalid serialized feature model: ${z.prettifyError(parsed.error)}`)
    return FeatureModel.fromFeatures(parsed.data.rootId, parsed.data.features, parsed.data.name)
  }

  static fromJSON(json: string): FeatureModel {
    return FeatureModel.deserialize(JSON.parse(json))
  }
}
