// Feature types and utilities
export {
  createFeature,
  FEATURE_ID_PATTERN,
  FeatureKind,
  FeatureKindSchema,
  FeatureOrigin,
  FeatureSchema,
  isConsistentSiblingGroup,
  isGroupMemberKind,
  ProvenanceSchema,
  toFeatureId,
  uniqueFeatureId,
} from './feature'

export type { Feature, Provenance } from './feature'

// Feature model
export {
  FEATURE_MODEL_FORMAT_VERSION,
  FeatureModel,
  findIntegrityIssues,
  SerializedFeatureModelSchema,
} from './feature-model'

export type { SerializedFeatureModel } from './feature-model'

// FeatureIDE XML
export {
  FEATURE_IDE_ROOT_TAGS,
  FEATURE_IDE_TAGS,
  featureModelFromFeatureIde,
  readFeatureIde,
  toFeatureIdeXml,
} from './featureide'

export type { FeatureIdeDocument, FeatureIdeNode, FeatureIdeTag } from './featureide'

// Name similarity
export { diceSimilarity, LexicalSimilarity, normalizeName } from './similarity'

export type { Similarity } from './similarity'
