/**
 * @file hasher.ts
 * @description CSP hash source expressions for inline content
 */

import {createHash} from 'crypto'
import {HASH_ALGORITHMS} from './constants.js'
import type {HashAlgorithm} from './types.js'

/**
 * Hashes the exact UTF-8 bytes of `content` (no whitespace normalization)
 * and returns the quoted source expression, e.g. `'sha256-…'`.
 */
export function computeHash(
  content: string,
  algorithm: HashAlgorithm = 'sha256',
): string {
  const digest = createHash(algorithm).update(content, 'utf8').digest('base64')
  return `'${algorithm}-${digest}'`
}

/**
 * @throws Error when `value` is not sha256, sha384 or sha512
 */
export function parseHashAlgorithm(value: string): HashAlgorithm {
  const algorithm = HASH_ALGORITHMS.find((algo) => algo === value)
  if (!algorithm) {
    throw new Error(
      `Invalid hash algorithm '${value}'. Must be sha256, sha384, or sha512`,
    )
  }
  return algorithm
}
