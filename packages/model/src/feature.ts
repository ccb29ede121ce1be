import { z } from 'zod/v4'

/**
 * Variability kinds a feature can carry relative to its parent
 */
export const FeatureKind = {
  Mandatory: 'mandatory',
  Optional: 'optional',
  OrGroupMember: 'or-group-member',
  AlternativeGroupMember: 'alternative-group-member',
} as const

export type FeatureKind = (typeof FeatureKind)[keyof typeof FeatureKind]

export const FeatureKindSchema = z.enum([
  'mandatory',
  'optional',
  'or-group-member',
  'alternative-group-member',
])

/**
 * Where a feature came from
 */
export const FeatureOrigin = {
  Root: 'root',
  Generated: 'generated',
  OrphanRecovered: 'orphan-recovered',
} as const

export type FeatureOrigin = (typeof FeatureOrigin)[keyof typeof FeatureOrigin]

export const FEATURE_ID_PATTERN = /^[A-Za-z_][A-Za-z0-9_-]*$/

export const ProvenanceSchema = z.object({
  /** Iteration that introduced the feature (0 for the root) */
  iteration: z.number().int().nonnegative(),
  /** Retrieval chunks in the prompt that proposed the feature */
  sourceChunkIds: z.array(z.string()),
  origin: z.enum(['root', 'generated', 'orphan-recovered']),
})

export type Provenance = z.infer<typeof ProvenanceSchema>

/**
 * A node of the feature tree
 */
export const FeatureSchema = z.object({
  id: z.string().regex(FEATURE_ID_PATTERN),
  /** Display name as proposed by the generator */
  name: z.string().min(1),
  /** Parent id, null only for the root */
  parent: z.string().nullable(),
  kind: FeatureKindSchema,
  /** Ordered child ids */
  children: z.array(z.string()),
  provenance: ProvenanceSchema,
})

export type Feature = z.infer<typeof FeatureSchema>

/**
 * Create a feature, validating the id and filling defaults
 */
export function createFeature(params: {
  id: string
  name: string
  parent: string | null
  kind?: FeatureKind
  children?: string[]
  provenance?: Partial<Provenance>
}): Feature {
  return FeatureSchema.parse({
    id: params.id,
    name: params.name,
    parent: params.parent,
    kind: params.kind ?? FeatureKind.Optional,
    children: params.children ?? [],
    provenance: {
      iteration: params.provenance?.iteration ?? 0,
      sourceChunkIds: params.provenance?.sourceChunkIds ?? [],
      origin: params.provenance?.origin ?? (params.parent === null ? FeatureOrigin.Root : FeatureOrigin.Generated),
    },
  })
}

export function isGroupMemberKind(kind: FeatureKind): boolean {
  return kind === FeatureKind.OrGroupMember || kind === FeatureKind.AlternativeGroupMember
}

/**
 * Sibling kinds are consistent when they are all plain (mandatory/optional)
 * or all members of the same group type.
 */
export function isConsistentSiblingGroup(kinds: readonly FeatureKind[]): boolean {
  const groupKinds = new Set(kinds.filter(isGroupMemberKind))
  if (groupKinds.size === 0)
    return true
  if (groupKinds.size > 1)
    return false
  return kinds.every(isGroupMemberKind)
}

/**
 * Derive an identifier from a display name.
 *
 * @example
 * toFeatureId('Spell Check') // 'Spell_Check'
 * toFeatureId('3D View') // '_3D_View'
 */
export function toFeatureId(name: string): string {
  const base = name
    .normalize('NFKC')
    .replace(/[^\w-]+/g, '_')
    .replace(/_+/g, '_')
    .replace(/^_+|_+$/g, '')
  if (base.length === 0)
    return 'feature'
  return /^[A-Z_]/i.test(base) ? base : `_${base}`
}

/**
 * Return `base` or the first `base_N` (N >= 2) not in `taken`
 */
export function uniqueFeatureId(base: string, taken: (id: string) => boolean): string {
  if (!taken(base))
    return base
  let n = 2
  while (taken(`${base}_${n}`))
    n++
  return `${base}_${n}`
}
