import type { FeatureIdeNode, FeatureKind } from '@fm-synth/model'
import {
  FEATURE_ID_PATTERN,
  FEATURE_IDE_ROOT_TAGS,
  FeatureKindSchema,
  isConsistentSiblingGroup,
  isGroupMemberKind,
  ProvenanceSchema,
  readFeatureIde,
} from '@fm-synth/model'
import { z } from 'zod/v4'

export const ViolationCode = {
  Syntax: 'syntax',
  Schema: 'schema',
  InvalidId: 'invalid-id',
  DuplicateId: 'duplicate-id',
  MissingRoot: 'missing-root',
  MultipleRoots: 'multiple-roots',
  RootMismatch: 'root-mismatch',
  DanglingParent: 'dangling-parent',
  UnknownChild: 'unknown-child',
  ChildLinkMismatch: 'child-link-mismatch',
  Cycle: 'cycle',
  GroupInconsistency: 'group-inconsistency',
} as const

export type ViolationCode = (typeof ViolationCode)[keyof typeof ViolationCode]

export const ViolationSchema = z.object({
  code: z.enum([
    'syntax',
    'schema',
    'invalid-id',
    'duplicate-id',
    'missing-root',
    'multiple-roots',
    'root-mismatch',
    'dangling-parent',
    'unknown-child',
    'child-link-mismatch',
    'cycle',
    'group-inconsistency',
  ]),
  message: z.string(),
  /** JSON paths (`features[2].parent`) or XML element paths (`/featureModel/struct/and[0]`) */
  locations: z.array(z.string()),
})

export type Violation = z.infer<typeof ViolationSchema>

const DocumentShapeSchema = z.object({
  rootId: z.string().optional(),
  features: z.array(z.unknown()),
})

// ids are checked separately so that a bad id does not hide the rest of the feature
const LooseFeatureSchema = z.object({
  id: z.string(),
  name: z.string().min(1),
  parent: z.string().nullable(),
  kind: FeatureKindSchema,
  children: z.array(z.string()),
  provenance: ProvenanceSchema.optional(),
})

type LooseFeature = z.infer<typeof LooseFeatureSchema>

interface Entry {
  feature: LooseFeature
  location: string
}

function schemaViolations(error: z.ZodError, prefix: string): Violation[] {
  return error.issues.map((issue) => {
    const path = [prefix, ...issue.path.map(String)].filter(Boolean).join('.')
    return { code: ViolationCode.Schema, message: `${path || '(root)'}: ${issue.message}`, locations: [path || '$'] }
  })
}

function groupBy<T>(items: readonly T[], key: (item: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>()
  for (const item of items) {
    const group = groups.get(key(item))
    if (group)
      group.push(item)
    else
      groups.set(key(item), [item])
  }
  return groups
}

function checkIds(entries: readonly Entry[]): Violation[] {
  const violations: Violation[] = []
  for (const { feature, location } of entries) {
    if (!FEATURE_ID_PATTERN.test(feature.id))
      violations.push({ code: ViolationCode.InvalidId, message: `invalid feature id "${feature.id}"`, locations: [`${location}.id`] })
  }
  for (const [id, group] of groupBy(entries, e => e.feature.id)) {
    if (group.length > 1) {
      violations.push({
        code: ViolationCode.DuplicateId,
        message: `feature id "${id}" appears ${group.length} times`,
        locations: group.map(e => e.location),
      })
    }
  }
  return violations
}

function checkRoots(entries: readonly Entry[], rootId: string | undefined): Violation[] {
  const roots = entries.filter(e => e.feature.parent === null)
  const [root] = roots
  if (!root)
    return [{ code: ViolationCode.MissingRoot, message: 'no feature without a parent', locations: ['features'] }]
  const violations: Violation[] = []
  if (roots.length > 1) {
    violations.push({
      code: ViolationCode.MultipleRoots,
      message: `${roots.length} features have no parent: ${roots.map(e => e.feature.id).join(', ')}`,
      locations: roots.map(e => e.location),
    })
  }
  else if (rootId !== undefined && root.feature.id !== rootId) {
    violations.push({
      code: ViolationCode.RootMismatch,
      message: `rootId "${rootId}" does not name the root feature "${root.feature.id}"`,
      locations: ['rootId', root.location],
    })
  }
  for (const { feature, location } of roots) {
    if (isGroupMemberKind(feature.kind)) {
      violations.push({
        code: ViolationCode.GroupInconsistency,
        message: `root "${feature.id}" cannot be a ${feature.kind}`,
        locations: [`${location}.kind`],
      })
    }
  }
  return violations
}

function checkLinks(entries: readonly Entry[], byId: ReadonlyMap<string, Entry>): Violation[] {
  const violations: Violation[] = []
  for (const { feature, location } of entries) {
    if (feature.parent !== null) {
      const parent = byId.get(feature.parent)
      if (!parent) {
        violations.push({
          code: ViolationCode.DanglingParent,
          message: `feature "${feature.id}" names missing parent "${feature.parent}"`,
          locations: [`${location}.parent`],
        })
      }
      else if (!parent.feature.children.includes(feature.id)) {
        violations.push({
          code: ViolationCode.ChildLinkMismatch,
          message: `parent "${parent.feature.id}" does not list child "${feature.id}"`,
          locations: [`${location}.parent`, `${parent.location}.children`],
        })
      }
    }
    for (const [j, childId] of feature.children.entries()) {
      const child = byId.get(childId)
      if (!child) {
        violations.push({
          code: ViolationCode.UnknownChild,
          message: `feature "${feature.id}" lists missing child "${childId}"`,
          locations: [`${location}.children[${j}]`],
        })
      }
      else if (child.feature.parent !== feature.id) {
        violations.push({
          code: ViolationCode.ChildLinkMismatch,
          message: `child "${childId}" of "${feature.id}" names parent "${child.feature.parent ?? 'null'}"`,
          locations: [`${location}.children[${j}]`, `${child.location}.parent`],
        })
      }
    }
  }
  return violations
}

function checkCycles(byId: ReadonlyMap<string, Entry>): Violation[] {
  const violations: Violation[] = []
  const state = new Map<string, 'visiting' | 'done'>()
  for (const start of byId.keys()) {
    const path: string[] = []
    let current: string | null = start
    while (current !== null && !state.has(current)) {
      const entry = byId.get(current)
      if (!entry)
        break
      state.set(current, 'visiting')
      path.push(current)
      current = entry.feature.parent
    }
    if (current !== null && state.get(current) === 'visiting') {
      const cycle = path.slice(path.indexOf(current))
      violations.push({
        code: ViolationCode.Cycle,
        message: `parent cycle: ${[...cycle, current].join(' -> ')}`,
        locations: cycle.map(id => byId.get(id)?.location ?? id),
      })
    }
    for (const id of path)
      state.set(id, 'done')
  }
  return violations
}

function checkGroups(entries: readonly Entry[]): Violation[] {
  const violations: Violation[] = []
  const siblings = groupBy(entries.filter(e => e.feature.parent !== null), e => e.feature.parent ?? '')
  for (const [parent, group] of siblings) {
    const kinds: FeatureKind[] = group.map(e => e.feature.kind)
    if (!isConsistentSiblingGroup(kinds)) {
      violations.push({
        code: ViolationCode.GroupInconsistency,
        message: `children of "${parent}" mix kinds: ${[...new Set(kinds)].join(', ')}`,
        locations: group.map(e => `${e.location}.kind`),
      })
    }
  }
  return violations
}

function checkSerializedModel(value: unknown): Violation[] {
  const shape = DocumentShapeSchema.safeParse(value)
  if (!shape.success)
    return schemaViolations(shape.error, '')

  const violations: Violation[] = []
  const entries: Entry[] = []
  for (const [i, raw] of shape.data.features.entries()) {
    const parsed = LooseFeatureSchema.safeParse(raw)
    if (parsed.success)
      entries.push({ feature: parsed.data, location: `features[${i}]` })
    else
      violations.push(...schemaViolations(parsed.error, `features[${i}]`))
  }

  const byId = new Map<string, Entry>()
  for (const entry of entries) {
    if (!byId.has(entry.feature.id))
      byId.set(entry.feature.id, entry)
  }

  return [
    ...violations,
    ...checkIds(entries),
    ...checkRoots(entries, shape.data.rootId),
    ...checkLinks(entries, byId),
    ...checkCycles(byId),
    ...checkGroups(entries),
  ]
}

function flatten(nodes: readonly FeatureIdeNode[]): FeatureIdeNode[] {
  return nodes.flatMap(node => [node, ...flatten(node.children)])
}

function checkFeatureIde(xml: string): Violation[] {
  const doc = readFeatureIde(xml)
  if (!doc.ok) {
    return [{
      code: ViolationCode.Syntax,
      message: doc.line === undefined ? doc.message : `line ${doc.line}: ${doc.message}`,
      locations: doc.line === undefined ? [] : [`line ${doc.line}`],
    }]
  }

  const violations: Violation[] = []
  const rootTag = doc.rootTag ?? ''
  if (!FEATURE_IDE_ROOT_TAGS.some(tag => tag === rootTag))
    violations.push({ code: ViolationCode.Schema, message: `unexpected document element <${rootTag}>`, locations: [`/${rootTag}`] })
  if (!doc.hasStruct) {
    violations.push({ code: ViolationCode.Schema, message: `<${rootTag}> has no <struct> element`, locations: [`/${rootTag}`] })
    return violations
  }

  if (doc.roots.length === 0)
    violations.push({ code: ViolationCode.MissingRoot, message: '<struct> contains no feature', locations: [`/${rootTag}/struct`] })
  else if (doc.roots.length > 1)
    violations.push({ code: ViolationCode.MultipleRoots, message: `<struct> contains ${doc.roots.length} root features`, locations: doc.roots.map(n => n.path) })

  const nodes = flatten(doc.roots)
  for (const node of nodes) {
    if (!node.name)
      violations.push({ code: ViolationCode.Schema, message: `${node.path}: missing name attribute`, locations: [node.path] })
    if (node.tag === 'feature' && node.children.length > 0)
      violations.push({ code: ViolationCode.Schema, message: `${node.path}: <feature> cannot have children`, locations: [node.path] })
  }
  for (const [name, group] of groupBy(nodes.filter(n => n.name), n => n.name ?? '')) {
    if (group.length > 1) {
      violations.push({
        code: ViolationCode.DuplicateId,
        message: `feature name "${name}" appears ${group.length} times`,
        locations: group.map(n => n.path),
      })
    }
  }
  return violations
}

/**
 * Check a serialized feature model and report every violation found.
 *
 * Accepts the JSON serialization (text or an already parsed value) or
 * FeatureIDE XML text. An empty list means the model is well formed.
 * Violations are reported, never corrected.
 */
export function checkWellformed(serialized: unknown): Violation[] {
  if (typeof serialized !== 'string')
    return checkSerializedModel(serialized)
  if (serialized.trimStart().startsWith('<'))
    return checkFeatureIde(serialized)

  let value: unknown
  try {
    value = JSON.parse(serialized)
  }
  catch (error) {
    return [{ code: ViolationCode.Syntax, message: error instanceof Error ? error.message : String(error), locations: [] }]
  }
  return checkSerializedModel(value)
}
