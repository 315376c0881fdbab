/**
 * @file cli.ts
 * @description Command-line interface for csp-forge
 */

import {readFile} from 'fs/promises'
import {parseArgs, type ParseArgsConfig} from 'node:util'
import {MODIFIABLE_DIRECTIVES} from './constants.js'
import {parseHashAlgorithm} from './hasher.js'
import {PolicyBuilder} from './policy-builder.js'
import {formatValidationResult} from './report.js'
import type {CLIOptions, CSPModification, Logger} from './types.js'
import {validateCSP} from './validator.js'

type ParsedValue = string | boolean | Array<string | boolean> | undefined

const BOOLEAN_FLAGS = [
  'validate-only',
  'no-validate',
  'no-scripts',
  'no-styles',
  'no-inline-styles',
  'no-event-handlers',
  'include-external',
  'heuristics',
  'generate-strict',
  'require-trusted-types',
] as const

type BooleanFlag = (typeof BOOLEAN_FLAGS)[number]

function buildOptionsConfig(): NonNullable<ParseArgsConfig['options']> {
  const options: NonNullable<ParseArgsConfig['options']> = {
    csp: {type: 'string'},
    'hash-algo': {type: 'string'},
    format: {type: 'string', short: 'f'},
    verbose: {type: 'boolean', short: 'v'},
    help: {type: 'boolean', short: 'h'},
  }
  for (const flag of BOOLEAN_FLAGS) {
    options[flag] = {type: 'boolean'}
  }
  for (const directive of MODIFIABLE_DIRECTIVES) {
    options[`add-${directive}`] = {type: 'string', multiple: true}
    options[`remove-${directive}`] = {type: 'string', multiple: true}
  }
  return options
}

const envName = (flag: string) =>
  `CSP_${flag.toUpperCase().replace(/-/g, '_')}`

function asString(value: ParsedValue): string | undefined {
  return typeof value === 'string' ? value : undefined
}

function parseBoolean(value: ParsedValue, envVar: string | undefined): boolean {
  if (typeof value === 'boolean') return value
  return envVar === 'true'
}

export function parseFormat(value: string | undefined): CLIOptions['outputFormat'] {
  switch (value) {
    case 'json':
    case 'raw':
      return value
    default:
      return 'header'
  }
}

/**
 * Turns --add-<directive> / --remove-<directive> occurrences into
 * modifications, in command-line order.
 */
export function parseModifications(
  tokens: ReadonlyArray<{kind: string; name?: string; value?: string}>,
): CSPModification[] {
  const modifications: CSPModification[] = []
  for (const token of tokens) {
    if (token.kind !== 'option' || !token.name || token.value === undefined) {
      continue
    }
    const match = /^(add|remove)-(.+)$/.exec(token.name)
    if (!match) continue
    const [, action, directive] = match
    if ((action === 'add' || action === 'remove') && directive) {
      modifications.push({action, directive, value: token.value})
    }
  }
  return modifications
}

export function formatOutput(
  csp: string,
  options: Pick<CLIOptions, 'outputFormat'>,
): string {
  switch (options.outputFormat) {
    case 'json':
      return JSON.stringify({'Content-Security-Policy': csp}, null, 2)
    case 'raw':
      return csp
    case 'header':
    default:
      return `Content-Security-Policy: ${csp}`
  }
}

/**
 * Reads CLI arguments, falling back to CSP_* environment variables.
 * @throws Error on unknown options or an unsupported hash algorithm
 */
export function getOptions(
  args: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
): CLIOptions & {help: boolean} {
  const {values, positionals, tokens} = parseArgs({
    args,
    options: buildOptionsConfig(),
    allowPositionals: true,
    tokens: true,
  })

  const flag = (name: BooleanFlag) => parseBoolean(values[name], env[envName(name)])

  return {
    files: positionals,
    csp: asString(values.csp) || env.CSP_HEADER || '',
    hashAlgorithm: parseHashAlgorithm(
      asString(values['hash-algo']) || env.CSP_HASH_ALGO || 'sha256',
    ),
    validateOnly: flag('validate-only'),
    noValidate: flag('no-validate'),
    noScripts: flag('no-scripts'),
    noStyles: flag('no-styles'),
    noInlineStyles: flag('no-inline-styles'),
    noEventHandlers: flag('no-event-handlers'),
    includeExternal: flag('include-external'),
    useHeuristics: flag('heuristics'),
    generateStrict: flag('generate-strict'),
    requireTrustedTypes: flag('require-trusted-types'),
    verbose: parseBoolean(values.verbose, env.CSP_VERBOSE),
    modifications: parseModifications(tokens ?? []),
    outputFormat: parseFormat(asString(values.format) || env.CSP_OUTPUT_FORMAT),
    help: values.help === true,
  }
}

/**
 * Diagnostics go to stderr so stdout carries only the policy.
 */
export function createCliLogger(verbose: boolean): Logger {
  const toStderr = (...data: unknown[]) => console.error(...data)
  return {
    error: toStderr,
    warn: toStderr,
    info: toStderr,
    debug: verbose ? toStderr : () => {},
  }
}

const USAGE = [
  'Usage: csp-forge [options] file1.html [file2.html ...]',
  '',
  'Generate CSP hashes for inline content in HTML files.',
  'If no CSP is provided, a strict CSP is generated.',
  '',
  'Options:',
  '  --csp <header>                Existing CSP header to update',
  '  --hash-algo <algo>            sha256 (default), sha384 or sha512',
  '  --validate-only               Only validate the CSP given with --csp',
  '  --no-validate                 Skip CSP validation checks',
  '  --no-scripts                  Skip inline <script> elements',
  '  --no-styles                   Skip inline <style> tags',
  '  --no-inline-styles            Skip style attributes',
  '  --no-event-handlers           Skip inline event handlers (onclick, etc.)',
  '  --include-external            Add external resource origins to the CSP',
  '  --heuristics                  Infer additional origins (with --include-external)',
  '  --generate-strict             Generate a complete strict CSP from scratch',
  "  --require-trusted-types       Add require-trusted-types-for 'script'",
  '  --add-<directive> <value>     Add a value to a directive (repeatable, in order)',
  '  --remove-<directive> <value>  Remove a value from a directive (repeatable, in order)',
  '  --format, -f <format>         Output format (header, raw, json)',
  '  --verbose, -v                 Show hashes, resources and inferences',
  '  --help, -h                    Show this help',
  '',
  'Example: csp-forge --include-external --heuristics index.html',
]

/**
 * Runs the CLI and resolves to the process exit code.
 */
export async function main(
  args: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
): Promise<number> {
  try {
    const options = getOptions(args, env)

    if (options.validateOnly) {
      if (!options.csp) {
        console.error('Error: --csp is required for validation')
        return 1
      }
      const result = validateCSP(options.csp)
      for (const line of formatValidationResult(result, true)) console.log(line)
      return result.valid ? 0 : 1
    }

    if (options.help || options.files.length === 0) {
      for (const line of USAGE) console.error(line)
      return options.help ? 0 : 1
    }

    const documents = await Promise.all(
      options.files.map(async (source) => ({
        source,
        html: await readFile(source, 'utf8'),
      })),
    )

    const {csp} = new PolicyBuilder({
      ...options,
      logger: createCliLogger(options.verbose ?? false),
    })
      .addDocuments(documents)
      .generate()

    console.log(formatOutput(csp, options))
    return 0
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : String(error))
    return 1
  }
}
