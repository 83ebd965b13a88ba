/**
 * Query evaluation engine
 *
 * @module query
 */

export { resolvePath, type PathResolution, type PathFound, type PathMissing } from './path'
export { RegexCache, type RegexCacheOptions } from './regex-cache'
export { PredicateEvaluator, type PredicateEvaluatorOptions } from './predicate'
export { SpecificationEvaluator, type SpecificationEvaluatorOptions } from './specification'
export {
  createPredicateResult,
  matchedResult,
  notMatchedResult,
  undeterminedResult,
  isMatched,
  isDetermined,
  describeResult,
  describeGroup,
  summarize,
} from './result'
export * from './operators'
