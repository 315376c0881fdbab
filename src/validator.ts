/**
 * @file validator.ts
 * @description Advisory checks over a CSP header. Every check runs; findings
 *   accumulate in a fixed order.
 */

import {DEPRECATED_DIRECTIVES} from './constants.js'
import {parseCSPDirectives, tokenize} from './directives.js'
import type {Directives, ValidationResult, ValidationWarning} from './types.js'

type Check = (directives: Directives) => ValidationWarning[]

const warning = (message: string, fix: string): ValidationWarning => ({
  severity: 'warning',
  message,
  fix,
})

const HASH_PREFIXES = ["'sha256-", "'sha384-", "'sha512-"]

const checkUnsafeInlineWithHashes: Check = (directives) => {
  const warnings: ValidationWarning[] = []
  for (const name of ['script-src', 'style-src']) {
    const tokens = tokenize(directives.get(name) ?? '')
    const hasHashes = tokens.some((t) =>
      HASH_PREFIXES.some((prefix) => t.startsWith(prefix)),
    )
    if (tokens.includes("'unsafe-inline'") && hasHashes) {
      warnings.push(
        warning(
          `${name} contains both 'unsafe-inline' and hash values`,
          `Remove 'unsafe-inline' from ${name} - hashes are ignored when 'unsafe-inline' is present`,
        ),
      )
    }
  }
  return warnings
}

const checkUnsafeEval: Check = (directives) => {
  const tokens = tokenize(directives.get('script-src') ?? '')
  if (!tokens.includes("'unsafe-eval'")) return []
  return [
    warning(
      "script-src contains 'unsafe-eval' which allows dangerous eval() usage",
      'Remove \'unsafe-eval\' if possible and refactor code to avoid eval(), Function(), setTimeout(string), etc.',
    ),
  ]
}

const checkMissingDefaultSrc: Check = (directives) => {
  if (directives.has('default-src')) return []
  return [
    warning(
      "Missing 'default-src' directive",
      "Add 'default-src' as a fallback for other directives (recommended: 'default-src 'self'')",
    ),
  ]
}

const PERMISSIVE_CHECKED = [
  'default-src',
  'script-src',
  'style-src',
  'img-src',
  'connect-src',
]

// Only the https://* form is exempt; other scheme-qualified wildcards warn.
const checkOverlyPermissive: Check = (directives) => {
  const warnings: ValidationWarning[] = []
  for (const name of PERMISSIVE_CHECKED) {
    const value = directives.get(name)
    if (value === undefined) continue

    if (value.includes('*') && !value.includes('https://*')) {
      warnings.push(
        warning(
          `${name} contains wildcard '*' which allows resources from any origin`,
          `Restrict ${name} to specific domains or use 'self'`,
        ),
      )
    }

    if (name === 'script-src' && tokenize(value).includes('data:')) {
      warnings.push(
        warning(
          "script-src allows 'data:' URIs which can be exploited",
          "Remove 'data:' from script-src if not absolutely necessary",
        ),
      )
    }
  }
  return warnings
}

const checkDeprecatedDirectives: Check = (directives) =>
  DEPRECATED_DIRECTIVES.filter(([name]) => directives.has(name)).map(
    ([name, suggestion]) => warning(`'${name}' is deprecated`, suggestion),
  )

const checkOrphanedAttrDirectives: Check = (directives) => {
  const warnings: ValidationWarning[] = []
  for (const base of ['style-src', 'script-src']) {
    const attr = `${base}-attr`
    if (directives.has(attr) && !directives.has(base)) {
      warnings.push(
        warning(
          `'${attr}' is defined but '${base}' is not`,
          `Consider adding '${base}' as it acts as fallback for '${attr}'`,
        ),
      )
    }
  }
  return warnings
}

const CHECKS: readonly Check[] = [
  checkUnsafeInlineWithHashes,
  checkUnsafeEval,
  checkMissingDefaultSrc,
  checkOverlyPermissive,
  checkDeprecatedDirectives,
  checkOrphanedAttrDirectives,
]

/**
 * Validates a CSP header. Only an empty header is invalid; everything else
 * is reported as advisory warnings.
 */
export function validateCSP(cspHeader: string): ValidationResult {
  if (cspHeader === '') {
    return {
      valid: false,
      warnings: [
        {
          severity: 'error',
          message: 'CSP header is empty',
          fix: 'Provide a valid CSP header string',
        },
      ],
    }
  }

  const directives = parseCSPDirectives(cspHeader)
  return {
    valid: true,
    warnings: CHECKS.flatMap((check) => check(directives)),
  }
}
