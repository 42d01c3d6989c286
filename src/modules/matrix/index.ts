/**
 * matrix module: axis expansion, exclusion rules and placeholder interpolation.
 */

export {
  expandMatrix,
  expandCombinations,
  validateAxisSet,
  formatJobId,
  computeHistoryKey,
} from './matrix-expander.js'
export type { JobTemplate, StepTemplate } from './matrix-expander.js'
export {
  validateExclusionRules,
  isExcluded,
  resolveReference,
  variantMatches,
  isVariantRecord,
} from './exclusion-rules.js'
export { interpolateMatrix, interpolateInvocation, interpolateToolchain } from './interpolate.js'
