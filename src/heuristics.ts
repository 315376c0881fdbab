/**
 * @file heuristics.ts
 * @description Infers resources a page will need at runtime from the
 *   external resources it references, e.g. the font host behind a web font
 *   stylesheet or the API and iframe origins of a payment script.
 *   Inferences are best-effort hints, not a security boundary.
 */

import {extractDomain} from './domain.js'
import {
  HEURISTIC_RULES,
  SELF,
  type HeuristicRule,
  type RuleFamily,
} from './heuristic-rules.js'
import type {
  Confidence,
  ExternalResource,
  HeuristicResource,
  InferredType,
} from './types.js'

export {toExternalResource} from './resources.js'

/**
 * Tracks which inferences have been emitted during one applyHeuristics call.
 * Keyed by inferred origin, rule and type, so two resources that imply the
 * same fact produce a single inference.
 */
export class InferenceContext {
  private readonly seen = new Set<string>()

  /**
   * Returns true the first time a key is claimed.
   */
  claim(origin: string, ruleId: string, type: InferredType): boolean {
    const key = `${origin}|${ruleId}|${type}`
    if (this.seen.has(key)) return false
    this.seen.add(key)
    return true
  }
}

function normalizeTarget(target: string): string {
  const withScheme =
    target.startsWith('http://') || target.startsWith('https://')
      ? target
      : `https://${target}`
  return extractDomain(withScheme)
}

function firstMatch(rule: HeuristicRule, subject: string) {
  for (const pattern of rule.patterns) {
    const hit =
      typeof pattern.match === 'string'
        ? subject.includes(pattern.match)
        : pattern.match.test(subject)
    if (hit) return pattern
  }
  return undefined
}

/**
 * Runs a single rule against a resource. The first matching pattern fires;
 * consequences already claimed in `ctx` are dropped.
 */
export function evaluateRule(
  rule: HeuristicRule,
  resource: ExternalResource,
  ctx: InferenceContext,
): HeuristicResource[] {
  const domain = extractDomain(resource.url)
  const subject = rule.subject === 'url' ? resource.url.toLowerCase() : domain
  if (!subject) return []

  const pattern = firstMatch(rule, subject)
  if (!pattern) return []

  // A vendor pattern fires in place of the rule's own-origin consequences,
  // which must not fire later for this origin through another pattern.
  if (pattern.consequences && domain) {
    for (const {type, target} of rule.consequences) {
      if (target === SELF) ctx.claim(domain, rule.id, type)
    }
  }

  const label =
    typeof pattern.match === 'string' ? pattern.match : pattern.match.source
  const reason =
    typeof rule.reason === 'string' ? rule.reason : rule.reason(label)

  const inferred: HeuristicResource[] = []
  for (const {type, target} of pattern.consequences ?? rule.consequences) {
    const url = target === SELF ? domain : target
    const origin = target === SELF ? domain : normalizeTarget(target)
    // Relative sources have no origin to point at.
    if (!url || !origin) continue
    if (!ctx.claim(origin, rule.id, type)) continue

    inferred.push(
      Object.freeze({
        url,
        type,
        confidence: rule.confidence,
        reason,
        sourceURL: resource.url,
        sourceType: resource.type,
      }),
    )
  }
  return inferred
}

function rulesFor(family: RuleFamily): HeuristicRule[] {
  return HEURISTIC_RULES.filter((rule) => rule.family === family)
}

const FAMILIES: readonly RuleFamily[] = ['stylesheet', 'script', 'image', 'any']

/**
 * Infers additional resources from `resources`, in input order.
 * Each call starts with a fresh context.
 */
export function applyHeuristics(
  resources: readonly ExternalResource[],
): HeuristicResource[] {
  const ctx = new InferenceContext()
  const inferred: HeuristicResource[] = []

  for (const resource of resources) {
    for (const family of FAMILIES) {
      if (family !== 'any' && family !== resource.type) continue
      for (const rule of rulesFor(family)) {
        inferred.push(...evaluateRule(rule, resource, ctx))
      }
    }
  }

  return inferred
}

export type HeuristicsSummary = Partial<
  Record<InferredType | `confidence_${Confidence}`, number>
>

/**
 * Counts inferences per type and per confidence level.
 */
export function getHeuristicsSummary(
  heuristics: readonly HeuristicResource[],
): HeuristicsSummary {
  const summary: HeuristicsSummary = {}
  for (const h of heuristics) {
    summary[h.type] = (summary[h.type] ?? 0) + 1
    const level = `confidence_${h.confidence}` as const
    summary[level] = (summary[level] ?? 0) + 1
  }
  return summary
}
