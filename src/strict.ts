/**
 * @file strict.ts
 * @description Strict policy generation from a template, and the hash merge
 *   used on top of a generated policy.
 */

import {UNSAFE_HASHES} from './constants.js'
import {
  appendUnique,
  hasToken,
  parseCSPDirectives,
  reconstructCSP,
} from './directives.js'
import type {StrictCSPTemplate} from './types.js'

/**
 * Recommended baseline: nothing by default, same-origin for fetches,
 * no frames, no plugins, no framing by other sites.
 */
export function getDefaultStrictTemplate(): StrictCSPTemplate {
  return {
    defaultSrc: ["'none'"],
    scriptSrc: ["'self'"],
    styleSrc: ["'self'"],
    imgSrc: ["'self'"],
    fontSrc: ["'self'"],
    connectSrc: ["'self'"],
    manifestSrc: ["'self'"],
    workerSrc: ["'self'"],
    frameSrc: ["'none'"],
    objectSrc: ["'none'"],
    mediaSrc: ["'self'"],
    baseUri: ["'self'"],
    formAction: ["'self'"],
    frameAncestors: ["'none'"],
    upgradeInsecureRequests: true,
    requireTrustedTypesFor: false,
  }
}

const TEMPLATE_DIRECTIVES: ReadonlyArray<
  readonly [keyof StrictCSPTemplate, string]
> = [
  ['defaultSrc', 'default-src'],
  ['scriptSrc', 'script-src'],
  ['styleSrc', 'style-src'],
  ['imgSrc', 'img-src'],
  ['fontSrc', 'font-src'],
  ['connectSrc', 'connect-src'],
  ['manifestSrc', 'manifest-src'],
  ['workerSrc', 'worker-src'],
  ['frameSrc', 'frame-src'],
  ['objectSrc', 'object-src'],
  ['mediaSrc', 'media-src'],
  ['baseUri', 'base-uri'],
  ['formAction', 'form-action'],
  ['frameAncestors', 'frame-ancestors'],
]

/**
 * Renders a template in template order. Directives with an empty list are
 * left out.
 */
export function generateStrictCSP(
  template: Partial<StrictCSPTemplate>,
): string {
  const parts: string[] = []

  for (const [field, name] of TEMPLATE_DIRECTIVES) {
    const sources = template[field]
    if (Array.isArray(sources) && sources.length > 0) {
      parts.push(`${name} ${sources.join(' ')}`)
    }
  }

  if (template.upgradeInsecureRequests) {
    parts.push('upgrade-insecure-requests')
  }
  if (template.requireTrustedTypesFor) {
    parts.push("require-trusted-types-for 'script'")
  }

  return parts.join('; ')
}

/**
 * Adds hashes to a generated strict policy. Unlike updateCSP, every style
 * hash goes to style-src, and a directive is only touched when there is
 * something to add to it.
 */
export function mergeStrictCSPWithHashes(
  strictCSP: string,
  scriptHashes: readonly string[] = [],
  styleTagHashes: readonly string[] = [],
  styleAttrHashes: readonly string[] = [],
  hasEventHandlers = false,
): string {
  const directives = parseCSPDirectives(strictCSP)

  if (scriptHashes.length > 0 || hasEventHandlers) {
    let scriptSrc = appendUnique(directives.get('script-src') ?? '', scriptHashes)
    if (hasEventHandlers && !hasToken(scriptSrc, UNSAFE_HASHES)) {
      scriptSrc = appendUnique(scriptSrc, [UNSAFE_HASHES])
    }
    directives.set('script-src', scriptSrc)
  }

  if (styleTagHashes.length > 0 || styleAttrHashes.length > 0) {
    let styleSrc = appendUnique(directives.get('style-src') ?? '', [
      ...styleTagHashes,
      ...styleAttrHashes,
    ])
    if (styleAttrHashes.length > 0 && !hasToken(styleSrc, UNSAFE_HASHES)) {
      styleSrc = appendUnique(styleSrc, [UNSAFE_HASHES])
    }
    directives.set('style-src', styleSrc)
  }

  return reconstructCSP(directives)
}
