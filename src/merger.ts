/**
 * @file merger.ts
 * @description Merge passes over an existing policy: inline content hashes,
 *   external resource origins and explicit add/remove modifications.
 */

import {DATA_SCHEME, RESOURCE_DIRECTIVES, UNSAFE_HASHES} from './constants.js'
import {
  appendUnique,
  hasToken,
  parseCSPDirectives,
  reconstructCSP,
  tokenize,
} from './directives.js'
import type {ResourceCatalog} from './resources.js'
import type {CSPModification, Directives} from './types.js'

function appendTo(
  directives: Directives,
  name: string,
  tokens: readonly string[],
): void {
  directives.set(name, appendUnique(directives.get(name) ?? '', tokens))
}

function ensureUnsafeHashes(directives: Directives, name: string): void {
  const value = directives.get(name) ?? ''
  if (!hasToken(value, UNSAFE_HASHES)) appendTo(directives, name, [UNSAFE_HASHES])
}

/**
 * Adds inline content hashes to an existing policy.
 *
 * Script hashes go to script-src, `<style>` hashes to style-src, and style
 * attribute hashes to style-src-attr when the policy already has it,
 * style-src otherwise. Missing directives are created. 'unsafe-hashes' is
 * added where hashes must cover event handler or style attributes, since
 * browsers ignore attribute hashes without it.
 */
export function updateCSP(
  cspHeader: string,
  scriptHashes: readonly string[] = [],
  styleTagHashes: readonly string[] = [],
  styleAttrHashes: readonly string[] = [],
  hasEventHandlers = false,
): string {
  const directives = parseCSPDirectives(cspHeader)

  if (scriptHashes.length > 0) {
    appendTo(directives, 'script-src', scriptHashes)
    if (hasEventHandlers) ensureUnsafeHashes(directives, 'script-src')
  }

  if (styleTagHashes.length > 0) {
    appendTo(directives, 'style-src', styleTagHashes)
  }

  if (styleAttrHashes.length > 0) {
    const name = directives.has('style-src-attr') ? 'style-src-attr' : 'style-src'
    appendTo(directives, name, styleAttrHashes)
    ensureUnsafeHashes(directives, name)
  }

  return reconstructCSP(directives)
}

/**
 * Unions `tokens` into a directive. A directive that does not exist yet is
 * seeded from default-src.
 */
function mergeIntoDirective(
  directives: Directives,
  name: string,
  tokens: readonly string[],
): void {
  const base = directives.get(name) ?? directives.get('default-src') ?? ''
  directives.set(name, appendUnique(base, tokens))
}

/**
 * Adds the origins of the catalog's resources to their fetch directives
 * (scripts → script-src, stylesheets → style-src, images → img-src,
 * fonts → font-src, frames → frame-src, other → connect-src), and `data:`
 * to img-src / font-src when data: URIs were seen for that class.
 */
export function addExternalResourcesToCSP(
  cspHeader: string,
  resources: ResourceCatalog,
): string {
  const directives = parseCSPDirectives(cspHeader)

  if (resources.usesDataURI('image')) {
    mergeIntoDirective(directives, 'img-src', [DATA_SCHEME])
  }
  if (resources.usesDataURI('font')) {
    mergeIntoDirective(directives, 'font-src', [DATA_SCHEME])
  }

  for (const [type, name] of RESOURCE_DIRECTIVES) {
    const domains = resources.getDomainsByType(type)
    if (domains.length > 0) mergeIntoDirective(directives, name, domains)
  }

  return reconstructCSP(directives)
}

/**
 * Applies add/remove operations strictly in the order given.
 * Adding an existing token is a no-op; removing the last token of a
 * directive removes the directive.
 */
export function applyCSPModifications(
  cspHeader: string,
  modifications: readonly CSPModification[],
): string {
  const directives = parseCSPDirectives(cspHeader)

  for (const {action, directive, value} of modifications) {
    const tokens = tokenize(directives.get(directive) ?? '')

    if (action === 'add') {
      if (!tokens.includes(value)) {
        directives.set(directive, [...tokens, value].join(' '))
      }
      continue
    }

    if (!directives.has(directive)) continue
    const remaining = tokens.filter((token) => token !== value)
    if (remaining.length === tokens.length) continue
    if (remaining.length === 0) {
      directives.delete(directive)
    } else {
      directives.set(directive, remaining.join(' '))
    }
  }

  return reconstructCSP(directives)
}
