/**
 * @file index.ts
 * @description Public API of csp-forge
 */

export * from './types.js'
export * from './constants.js'
export {
  appendUnique,
  hasToken,
  parseCSPDirectives,
  reconstructCSP,
  removeDuplicates,
  tokenize,
} from './directives.js'
export {extractDomain} from './domain.js'
export {computeHash, parseHashAlgorithm} from './hasher.js'
export {HEURISTIC_RULES, SELF} from './heuristic-rules.js'
export type {Consequence, HeuristicRule, RuleFamily, RulePattern} from './heuristic-rules.js'
export {
  applyHeuristics,
  evaluateRule,
  getHeuristicsSummary,
  InferenceContext,
} from './heuristics.js'
export type {HeuristicsSummary} from './heuristics.js'
export {
  addExternalResourcesToCSP,
  applyCSPModifications,
  updateCSP,
} from './merger.js'
export {
  extractCssResources,
  extractExternalResources,
  extractInlineContent,
  isEventHandler,
  srcsetUrls,
} from './parser.js'
export {PolicyBuilder} from './policy-builder.js'
export type {PolicyResult} from './policy-builder.js'
export {createSnippet, formatValidationResult, VerboseReporter} from './report.js'
export type {HashContentType, HashInfo} from './report.js'
export {
  createResource,
  isResourceType,
  ResourceCatalog,
  toExternalResource,
} from './resources.js'
export {
  generateStrictCSP,
  getDefaultStrictTemplate,
  mergeStrictCSPWithHashes,
} from './strict.js'
export {validateCSP} from './validator.js'
