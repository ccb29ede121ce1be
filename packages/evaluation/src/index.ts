// Coverage against a ground truth
export {
  CoverageEdgeCaseSchema,
  CoverageResultSchema,
  DEFAULT_COVERAGE_OPTIONS,
  evaluateCoverage,
} from './coverage'
export type { CoverageEdgeCase, CoverageOptions, CoverageResult } from './coverage'

// Well-formedness
export { checkWellformed, ViolationCode, ViolationSchema } from './wellformed'
export type { Violation } from './wellformed'
