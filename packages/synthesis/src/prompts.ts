import type { FeatureModel } from '@fm-synth/model'
import type { RetrievalContext } from '@fm-synth/store'
import type { FragmentContract, SynthesisConfig, SynthesisMode } from './config'
import { toFeatureIdeXml } from '@fm-synth/model'
import { PromptTemplateError } from '@fm-synth/utils/errors'

export const PROMPT_PLACEHOLDERS = [
  'ROOT_FEATURE',
  'DOMAIN',
  'CONTEXT',
  'PREVIOUS_MODEL',
  'HIGH_LEVEL_FEATURES',
  'FORMAT',
] as const

export type PromptPlaceholder = (typeof PROMPT_PLACEHOLDERS)[number]

export type PromptValues = Partial<Record<PromptPlaceholder, string>>

export interface SynthesisPrompt {
  system: string
  user: string
}

export interface EvidenceBudget {
  maxTotalChars: number
  maxChunkChars: number
}

export const SYSTEM_PROMPT = `You are an expert in software product-line engineering.
You extract feature models from documentation: a tree of features below one root,
each feature mandatory or optional, or a member of an or-group (one or more may be
selected) or an alternative-group (exactly one may be selected).
Only propose features supported by the provided evidence.`

const JSON_FORMAT = `Answer with a single JSON object inside <solution></solution> tags:
<solution>
{"features": [
  {"name": "<root feature>", "parent": null},
  {"name": "<feature>", "parent": "<parent feature name>", "kind": "mandatory | optional | or | alternative"}
]}
</solution>
List the root first. Every non-root feature names its parent by feature name.
All children of one parent are either plain (mandatory/optional) or members of the same group type.`

const XML_FORMAT = `Answer with a FeatureIDE model:
<featureModel>
  <struct>
    <and name="<root feature>" mandatory="true">
      <feature name="<feature>" mandatory="true"/>
      <alt name="<group parent>">
        <feature name="<choice>"/>
      </alt>
    </and>
  </struct>
</featureModel>
Use <and> for plain children, <or> for or-groups, <alt> for alternative-groups and <feature> for leaves.`

const PLACEHOLDER_SECTIONS = `Root feature: {{ROOT_FEATURE}}
Domain: {{DOMAIN}}

High-level features to refine:
{{HIGH_LEVEL_FEATURES}}

Evidence:
{{CONTEXT}}`

export const SINGLE_STAGE_TEMPLATE = `Build the feature model of "{{ROOT_FEATURE}}" from the evidence below.

${PLACEHOLDER_SECTIONS}

{{FORMAT}}`

export const ITERATIVE_TEMPLATE = `Refine the feature model of "{{ROOT_FEATURE}}" with the evidence below.
Keep every existing feature; add the missing features the evidence supports and
place each one under the most specific parent.

${PLACEHOLDER_SECTIONS}

Current model:
{{PREVIOUS_MODEL}}

{{FORMAT}}`

const DOUBLE_BRACE = /\{\{([A-Z0-9_]+)\}\}/g
const SINGLE_BRACE = /(?<!\{)\{([a-zA-Z0-9_]+)\}(?!\})/g

/**
 * Placeholders used by a template, sorted and unique.
 * Single-brace `{name}` slots count too, since they are never substituted.
 */
export function templatePlaceholders(template: string): string[] {
  const names = new Set<string>()
  for (const match of template.matchAll(DOUBLE_BRACE))
    names.add(`{{${match[1] ?? ''}}}`)
  for (const match of template.matchAll(SINGLE_BRACE))
    names.add(`{${match[1] ?? ''}}`)
  return [...names].sort()
}

function isPlaceholder(name: string): name is PromptPlaceholder {
  return PROMPT_PLACEHOLDERS.some(p => p === name)
}

/**
 * Throw `PromptTemplateError` when the template uses a slot that will not
 * be filled: unknown names, single-brace slots, or names missing from `values`.
 */
export function assertTemplateResolvable(template: string, values?: PromptValues): void {
  const unresolved = templatePlaceholders(template).filter((slot) => {
    const name = /^\{\{(.*)\}\}$/.exec(slot)?.[1]
    if (name === undefined || !isPlaceholder(name))
      return true
    return values !== undefined && values[name] === undefined
  })
  if (unresolved.length > 0)
    throw new PromptTemplateError(unresolved)
}

/**
 * Substitute `{{PLACEHOLDER}}` slots. Values are inserted verbatim and never
 * re-scanned, so evidence containing braces is safe.
 */
export function renderTemplate(template: string, values: PromptValues): string {
  assertTemplateResolvable(template, values)
  return template.replace(DOUBLE_BRACE, (slot, name: string) => (isPlaceholder(name) ? values[name] ?? slot : slot))
}

/**
 * Numbered evidence blocks, each chunk cut to `maxChunkChars` and the whole
 * to `maxTotalChars`. Blocks that no longer fit are left out.
 */
export function formatEvidence(context: RetrievalContext, budget: EvidenceBudget): string {
  const blocks: string[] = []
  let total = 0
  for (const [i, chunk] of context.chunks.entries()) {
    const text = chunk.text.length > budget.maxChunkChars ? chunk.text.slice(0, budget.maxChunkChars) : chunk.text
    const block = `[${i + 1}] ${chunk.chunkId} (score ${chunk.score.toFixed(3)})\n${text}`
    const cost = block.length + (blocks.length > 0 ? 2 : 0)
    if (total + cost > budget.maxTotalChars) {
      if (blocks.length === 0)
        blocks.push(block.slice(0, budget.maxTotalChars))
      break
    }
    blocks.push(block)
    total += cost
  }
  return blocks.length > 0 ? blocks.join('\n\n') : '(no evidence retrieved)'
}

export function formatHighLevelFeatures(features: Readonly<Record<string, string>>): string {
  const entries = Object.entries(features)
  if (entries.length === 0)
    return '(none)'
  return entries.map(([name, description]) => (description ? `- ${name}: ${description}` : `- ${name}`)).join('\n')
}

/**
 * The model in the format the generator is asked to answer in
 */
export function formatModelSnapshot(model: FeatureModel, contract: FragmentContract): string {
  if (contract === 'featureide-xml')
    return toFeatureIdeXml(model)
  const features = model.features().map((f) => {
    const parent = f.parent === null ? null : model.get(f.parent)?.name ?? null
    return parent === null ? { name: f.name, parent } : { name: f.name, parent, kind: f.kind }
  })
  return JSON.stringify({ features }, null, 2)
}

export interface BuildPromptInput {
  mode: SynthesisMode
  config: SynthesisConfig
  context: RetrievalContext
  model: FeatureModel
}

/**
 * SS prompts carry evidence only; IS prompts add the current model.
 * A custom template may use every placeholder in both modes.
 */
export function buildSynthesisPrompt(input: BuildPromptInput): SynthesisPrompt {
  const { mode, config, context, model } = input
  const values: PromptValues = {
    ROOT_FEATURE: config.rootFeature,
    DOMAIN: config.domain || '(unspecified)',
    CONTEXT: formatEvidence(context, config),
    HIGH_LEVEL_FEATURES: formatHighLevelFeatures(config.highLevelFeatures),
    FORMAT: config.contract === 'json' ? JSON_FORMAT : XML_FORMAT,
    PREVIOUS_MODEL: mode === 'iterative' ? formatModelSnapshot(model, config.contract) : '(empty)',
  }

  const template = config.promptTemplate ?? (mode === 'iterative' ? ITERATIVE_TEMPLATE : SINGLE_STAGE_TEMPLATE)
  return { system: SYSTEM_PROMPT, user: renderTemplate(template, values) }
}
