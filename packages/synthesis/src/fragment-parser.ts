import type { FeatureIdeNode, FeatureKind } from '@fm-synth/model'
import type { FragmentContract } from './config'
import { FeatureKindSchema, readFeatureIde } from '@fm-synth/model'
import { z } from 'zod/v4'

export const ParseFailureReason = {
  MalformedSyntax: 'malformed-syntax',
  SchemaViolation: 'schema-violation',
  EmptyOutput: 'empty-output',
} as const

export type ParseFailureReason = (typeof ParseFailureReason)[keyof typeof ParseFailureReason]

export const FragmentFeatureSchema = z.object({
  name: z.string(),
  /** Parent *name*; may reference a feature that does not exist yet */
  parent: z.string().nullable(),
  kind: FeatureKindSchema.optional(),
})

export type FragmentFeature = z.infer<typeof FragmentFeatureSchema>

/**
 * Partial, possibly inconsistent model proposed by one generation call
 */
export const FragmentSchema = z.object({
  features: z.array(FragmentFeatureSchema),
})

export type Fragment = z.infer<typeof FragmentSchema>

export const ParseFailureSchema = z.object({
  reason: z.enum(['malformed-syntax', 'schema-violation', 'empty-output']),
  detail: z.string(),
})

export type ParseFailure = z.infer<typeof ParseFailureSchema>

export const ParseOutcomeSchema = z.discriminatedUnion('ok', [
  z.object({ ok: z.literal(true), fragment: FragmentSchema }),
  z.object({ ok: z.literal(false), failure: ParseFailureSchema }),
])

export type ParseOutcome = z.infer<typeof ParseOutcomeSchema>

const KIND_ALIASES: Record<string, FeatureKind> = {
  'mandatory': 'mandatory',
  'optional': 'optional',
  'or': 'or-group-member',
  'or-group': 'or-group-member',
  'or-group-member': 'or-group-member',
  'alt': 'alternative-group-member',
  'xor': 'alternative-group-member',
  'alternative': 'alternative-group-member',
  'alternative-group': 'alternative-group-member',
  'alternative-group-member': 'alternative-group-member',
}

const RawFragmentFeatureSchema = z.object({
  name: z.string().trim().min(1),
  parent: z.string().trim().nullable().optional(),
  kind: z.string().trim().toLowerCase().refine(k => k in KIND_ALIASES, {
    message: `kind must be one of ${Object.keys(KIND_ALIASES).join(', ')}`,
  }).optional(),
})

const RawFragmentSchema = z.union([
  z.object({ features: z.array(RawFragmentFeatureSchema) }),
  z.array(RawFragmentFeatureSchema),
])

function failure(reason: ParseFailureReason, detail: string): ParseOutcome {
  return { ok: false, failure: { reason, detail } }
}

function stripFences(text: string): string[] {
  const blocks: string[] = []
  for (const match of text.matchAll(/```[\w-]*\s*\n?([\s\S]*?)```/g)) {
    const body = match[1]?.trim()
    if (body)
      blocks.push(body)
  }
  return blocks
}

function between(text: string, open: string, close: string): string | undefined {
  const start = text.indexOf(open)
  const end = text.lastIndexOf(close)
  return start !== -1 && end > start ? text.slice(start, end + close.length) : undefined
}

/**
 * Candidate JSON payloads, most specific first
 */
function jsonCandidates(text: string): string[] {
  const candidates = [...stripFences(text)]
  const solution = /<solution>\s*([\s\S]*?)\s*<\/solution>/.exec(text)?.[1]
  if (solution)
    candidates.push(solution)
  const object = between(text, '{', '}')
  if (object)
    candidates.push(object)
  const array = between(text, '[', ']')
  if (array)
    candidates.push(array)
  candidates.push(text.trim())
  return candidates
}

function parseJsonFragment(text: string): ParseOutcome {
  let payload: unknown
  let lastError = 'no JSON payload found'
  let found = false
  for (const candidate of jsonCandidates(text)) {
    try {
      payload = JSON.parse(candidate)
      found = true
      break
    }
    catch (error) {
      lastError = error instanceof Error ? error.message : String(error)
    }
  }
  if (!found)
    return failure(ParseFailureReason.MalformedSyntax, lastError)

  const parsed = RawFragmentSchema.safeParse(payload)
  if (!parsed.success)
    return failure(ParseFailureReason.SchemaViolation, z.prettifyError(parsed.error))

  const features = Array.isArray(parsed.data) ? parsed.data : parsed.data.features
  return {
    ok: true,
    fragment: {
      features: features.map(f => ({
        name: f.name,
        parent: f.parent ? f.parent : null,
        ...(f.kind ? { kind: KIND_ALIASES[f.kind] } : {}),
      })),
    },
  }
}

function isolateXml(text: string): string | undefined {
  for (const candidate of [...stripFences(text), text]) {
    const model = /<featureModel[\s>][\s\S]*<\/featureModel>/.exec(candidate)?.[0]
    if (model)
      return model
    const struct = /<struct[\s>][\s\S]*<\/struct>/.exec(candidate)?.[0]
    if (struct)
      return `<featureModel>${struct}</featureModel>`
  }
  return undefined
}

function parseXmlFragment(text: string): ParseOutcome {
  const xml = isolateXml(text)
  if (!xml)
    return failure(ParseFailureReason.MalformedSyntax, 'no <featureModel> or <struct> element found')

  const doc = readFeatureIde(xml)
  if (!doc.ok)
    return failure(ParseFailureReason.MalformedSyntax, doc.line ? `line ${doc.line}: ${doc.message}` : doc.message)
  if (!doc.hasStruct)
    return failure(ParseFailureReason.SchemaViolation, '<featureModel> has no <struct> element')

  const features: FragmentFeature[] = []
  const problems: string[] = []
  const visit = (node: FeatureIdeNode, parent: string | null): void => {
    const name = node.name?.trim()
    if (!name) {
      problems.push(`${node.path}: missing name attribute`)
      return
    }
    features.push(parent === null ? { name, parent } : { name, parent, kind: node.kind })
    for (const child of node.children)
      visit(child, name)
  }
  for (const root of doc.roots)
    visit(root, null)

  if (problems.length > 0)
    return failure(ParseFailureReason.SchemaViolation, problems.join('\n'))
  return { ok: true, fragment: { features } }
}

/**
 * Turn raw generator output into a fragment.
 *
 * Never throws: unusable output comes back as a `ParseFailure`. Surrounding
 * prose, code fences and `<solution>` wrappers are tolerated.
 */
export function parseFragment(raw: string, contract: FragmentContract): ParseOutcome {
  if (raw.trim().length === 0)
    return failure(ParseFailureReason.EmptyOutput, 'generator returned no text')
  return contract === 'json' ? parseJsonFragment(raw) : parseXmlFragment(raw)
}
