import type { Feature } from './feature'
import { ModelIntegrityError } from '@fm-synth/utils/errors'
import { XMLBuilder, XMLParser, XMLValidator } from 'fast-xml-parser'
import { createFeature, FeatureKind, FeatureOrigin, toFeatureId, uniqueFeatureId } from './feature'
import { FeatureModel } from './feature-model'

/**
 * Element names that denote features inside `<struct>`
 */
export const FEATURE_IDE_TAGS = ['and', 'or', 'alt', 'feature'] as const

export type FeatureIdeTag = (typeof FEATURE_IDE_TAGS)[number]

export const FEATURE_IDE_ROOT_TAGS = ['featureModel', 'extendedFeatureModel'] as const

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8" standalone="no"?>'

/**
 * One feature element of a FeatureIDE document
 */
export interface FeatureIdeNode {
  tag: FeatureIdeTag
  /** `name` attribute, undefined when absent */
  name: string | undefined
  /** Kind implied by the enclosing group element and the `mandatory` attribute */
  kind: FeatureKind
  /** Element path such as `/featureModel/struct/and[0]/feature[1]` */
  path: string
  children: FeatureIdeNode[]
}

export type FeatureIdeDocument =
  | { ok: true, rootTag: string | undefined, hasStruct: boolean, roots: FeatureIdeNode[] }
  | { ok: false, message: string, line?: number }

interface XmlElement {
  tag: string
  attributes: Record<string, string>
  children: XmlElement[]
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isFeatureIdeTag(tag: string): tag is FeatureIdeTag {
  return FEATURE_IDE_TAGS.some(t => t === tag)
}

// fast-xml-parser's preserveOrder output: [{ tag: [...children], ':@': { '@_attr': value } }]
function toElements(value: unknown): XmlElement[] {
  if (!Array.isArray(value))
    return []
  const elements: XmlElement[] = []
  for (const entry of value) {
    if (!isRecord(entry))
      continue
    const attributes: Record<string, string> = {}
    const rawAttributes = entry[':@']
    if (isRecord(rawAttributes)) {
      for (const [key, attr] of Object.entries(rawAttributes)) {
        if (key.startsWith('@_'))
          attributes[key.slice(2)] = String(attr)
      }
    }
    for (const [tag, inner] of Object.entries(entry)) {
      if (tag === ':@' || tag.startsWith('#'))
        continue
      elements.push({ tag, attributes, children: toElements(inner) })
    }
  }
  return elements
}

function kindOf(parentTag: FeatureIdeTag | 'struct', attributes: Record<string, string>): FeatureKind {
  if (parentTag === 'struct')
    return FeatureKind.Mandatory
  if (parentTag === 'or')
    return FeatureKind.OrGroupMember
  if (parentTag === 'alt')
    return FeatureKind.AlternativeGroupMember
  return attributes.mandatory === 'true' ? FeatureKind.Mandatory : FeatureKind.Optional
}

function toNodes(elements: XmlElement[], parentTag: FeatureIdeTag | 'struct', parentPath: string): FeatureIdeNode[] {
  const counters = new Map<string, number>()
  const nodes: FeatureIdeNode[] = []
  for (const element of elements) {
    const tag = element.tag
    if (!isFeatureIdeTag(tag))
      continue
    const index = counters.get(tag) ?? 0
    counters.set(tag, index + 1)
    const path = `${parentPath}/${tag}[${index}]`
    nodes.push({
      tag,
      name: element.attributes.name,
      kind: kindOf(parentTag, element.attributes),
      path,
      children: toNodes(element.children, tag, path),
    })
  }
  return nodes
}

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  ignoreDeclaration: true,
  ignorePiTags: true,
  parseAttributeValue: false,
  trimValues: true,
})

/**
 * Read a FeatureIDE document into its feature elements.
 * Never throws: syntax errors come back as `{ ok: false }`.
 */
export function readFeatureIde(xml: string): FeatureIdeDocument {
  const validation = XMLValidator.validate(xml)
  if (validation !== true)
    return { ok: false, message: validation.err.msg, line: validation.err.line }

  let top: XmlElement[]
  try {
    top = toElements(parser.parse(xml))
  }
  catch (error) {
    return { ok: false, message: error instanceof Error ? error.message : String(error) }
  }

  const rootElement = top[0]
  const struct = rootElement?.children.find(c => c.tag === 'struct')
  return {
    ok: true,
    rootTag: rootElement?.tag,
    hasStruct: struct !== undefined,
    roots: struct ? toNodes(struct.children, 'struct', `/${rootElement?.tag ?? ''}/struct`) : [],
  }
}

/**
 * Load a FeatureIDE model (typically a ground truth) as a FeatureModel.
 * Ids are derived from names and made unique.
 */
export function featureModelFromFeatureIde(xml: string, name?: string): FeatureModel {
  const doc = readFeatureIde(xml)
  if (!doc.ok)
    throw new ModelIntegrityError(`Malformed FeatureIDE XML: ${doc.message}`)
  const [root, ...extraRoots] = doc.roots
  if (!root || extraRoots.length > 0)
    throw new ModelIntegrityError(`FeatureIDE model must have exactly one root feature, found ${doc.roots.length}`)

  const features: Feature[] = []
  const taken = new Set<string>()
  const visit = (node: FeatureIdeNode, parent: string | null): string => {
    if (!node.name)
      throw new ModelIntegrityError(`Feature element at ${node.path} has no name`)
    const id = uniqueFeatureId(toFeatureId(node.name), candidate => taken.has(candidate))
    taken.add(id)
    const feature = createFeature({
      id,
      name: node.name,
      parent,
      kind: node.kind,
      provenance: { origin: parent === null ? FeatureOrigin.Root : FeatureOrigin.Generated },
    })
    features.push(feature)
    feature.children = node.children.map(child => visit(child, id))
    return id
  }
  const rootId = visit(root, null)
  return FeatureModel.fromFeatures(rootId, features, name)
}

type OrderedXml = Record<string, OrderedXml[] | Record<string, string>>

function groupTagOf(children: readonly Feature[]): FeatureIdeTag {
  if (children.length === 0)
    return 'feature'
  if (children.every(c => c.kind === FeatureKind.OrGroupMember))
    return 'or'
  if (children.every(c => c.kind === FeatureKind.AlternativeGroupMember))
    return 'alt'
  return 'and'
}

const builder = new XMLBuilder({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  format: true,
  indentBy: '\t',
  suppressEmptyNode: true,
})

/**
 * Export a model in FeatureIDE's `<featureModel><struct>` format
 */
export function toFeatureIdeXml(model: FeatureModel): string {
  const toElement = (feature: Feature): OrderedXml => {
    const children = model.childrenOf(feature.id)
    const attributes: Record<string, string> = {}
    if (feature.kind === FeatureKind.Mandatory)
      attributes['@_mandatory'] = 'true'
    attributes['@_name'] = feature.name
    return {
      [groupTagOf(children)]: children.map(toElement),
      ':@': attributes,
    }
  }
  const document: OrderedXml[] = [{ featureModel: [{ struct: [toElement(model.root)] }] }]
  const body: string = builder.build(document)
  return `${XML_DECLARATION}\n${body.trim()}\n`
}
