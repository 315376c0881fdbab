/**
 * @file directives.ts
 * @description Directive-level model of a CSP header: parse, serialize and
 *   token-level helpers every merge pass is built on.
 */

import {CANONICAL_DIRECTIVE_ORDER} from './constants.js'
import type {Directives} from './types.js'

/**
 * Parses a CSP header into directive name → value.
 * A bare directive maps to ''. A repeated directive name overwrites the
 * earlier one.
 */
export function parseCSPDirectives(cspHeader: string): Directives {
  const directives: Directives = new Map()

  for (const raw of cspHeader.split(';')) {
    const part = raw.trim()
    if (!part) continue

    const match = /\s/.exec(part)
    if (!match) {
      directives.set(part, '')
    } else {
      directives.set(part.slice(0, match.index), part.slice(match.index + 1).trim())
    }
  }

  return directives
}

/**
 * Serializes directives back into a header string. Common directives come
 * first in canonical order so successive generations diff cleanly.
 */
export function reconstructCSP(directives: ReadonlyMap<string, string>): string {
  const parts: string[] = []
  const emitted = new Set<string>()

  const render = (name: string, value: string) =>
    value === '' ? name : `${name} ${value}`

  for (const name of CANONICAL_DIRECTIVE_ORDER) {
    const value = directives.get(name)
    if (value === undefined) continue
    parts.push(render(name, value))
    emitted.add(name)
  }

  for (const [name, value] of directives) {
    if (!emitted.has(name)) parts.push(render(name, value))
  }

  return parts.join('; ')
}

/**
 * Splits a directive value into its source expressions.
 */
export function tokenize(value: string): string[] {
  return value.split(/\s+/).filter(Boolean)
}

/**
 * Order-preserving, duplicate-free union of an existing value and new tokens.
 */
export function appendUnique(
  existing: string,
  tokens: readonly string[],
): string {
  const seen = new Set<string>()
  const result: string[] = []

  for (const token of [...tokenize(existing), ...tokens]) {
    if (seen.has(token)) continue
    seen.add(token)
    result.push(token)
  }

  return result.join(' ')
}

/**
 * Order-preserving de-duplication.
 */
export function removeDuplicates<T>(items: readonly T[]): T[] {
  return Array.from(new Set(items))
}

export function hasToken(value: string, token: string): boolean {
  return tokenize(value).includes(token)
}
