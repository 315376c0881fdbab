/**
 * @file report.ts
 * @description Human-readable reporting for verbose runs and validation
 *   results. Everything is written line by line through a Logger.
 */

import {getHeuristicsSummary} from './heuristics.js'
import type {ResourceCatalog} from './resources.js'
import type {
  HeuristicResource,
  Logger,
  ResourceType,
  ValidationResult,
} from './types.js'

export type HashContentType =
  | 'script'
  | 'style-tag'
  | 'style-attr'
  | 'event-handler'

export interface HashInfo {
  hash: string
  contentType: HashContentType
  sourceFile: string
  /** Single-line, truncated content for display. */
  snippet: string
}

const RULE = '-'.repeat(80)

const CONTENT_TYPE_TITLES: ReadonlyArray<readonly [HashContentType, string]> = [
  ['script', 'Inline Scripts'],
  ['style-tag', 'Style Tags'],
  ['style-attr', 'Style Attributes'],
  ['event-handler', 'Event Handlers'],
]

const RESOURCE_TITLES: ReadonlyArray<readonly [ResourceType, string]> = [
  ['script', 'External Scripts'],
  ['stylesheet', 'External Stylesheets'],
  ['image', 'External Images'],
  ['font', 'External Fonts'],
  ['frame', 'External Frames'],
  ['other', 'Other External Resources'],
]

/**
 * Collapses whitespace and truncates to `maxLen` characters plus "...".
 */
export function createSnippet(content: string, maxLen = 60): string {
  const collapsed = content.trim().split(/\s+/).filter(Boolean).join(' ')
  if (collapsed.length <= maxLen) return collapsed
  return `${collapsed.slice(0, maxLen)}...`
}

/**
 * Renders a validation result. Fix suggestions are included when
 * `showFixes` is set.
 */
export function formatValidationResult(
  result: ValidationResult,
  showFixes: boolean,
): string[] {
  if (result.valid && result.warnings.length === 0) {
    return ['✓ CSP validation passed with no warnings']
  }

  const lines = [
    result.valid
      ? `⚠ CSP validation passed with ${result.warnings.length} warning(s)`
      : '✗ CSP validation failed',
    '',
  ]

  result.warnings.forEach((warning, i) => {
    const symbol = warning.severity === 'error' ? '✗' : '⚠'
    lines.push(`${symbol} ${warning.message}`)
    if (showFixes && warning.fix) lines.push(`  Fix: ${warning.fix}`)
    if (i < result.warnings.length - 1) lines.push('')
  })

  return lines
}

/**
 * Collects hash metadata during a run and prints progress and summaries.
 * Does nothing when disabled.
 */
export class VerboseReporter {
  private readonly hashes: HashInfo[] = []

  constructor(
    private readonly logger: Logger,
    readonly enabled: boolean,
  ) {}

  private print(...lines: string[]): void {
    for (const line of lines) this.logger.info(line)
  }

  addHash(
    hash: string,
    contentType: HashContentType,
    sourceFile: string,
    content: string,
  ): void {
    if (!this.enabled) return
    this.hashes.push({hash, contentType, sourceFile, snippet: createSnippet(content)})
  }

  get recorded(): readonly HashInfo[] {
    return this.hashes
  }

  progress(file: string, index: number, total: number): void {
    if (!this.enabled) return
    this.print(`[${index}/${total}] Processing ${file}`)
  }

  fileSummary(counts: {
    scripts: number
    styleTags: number
    styleAttributes: number
    eventHandlers: number
  }): void {
    if (!this.enabled) return

    const items: string[] = []
    if (counts.scripts > 0) items.push(`${counts.scripts} inline script(s)`)
    if (counts.styleTags > 0) items.push(`${counts.styleTags} <style> tag(s)`)
    if (counts.styleAttributes > 0) {
      items.push(`${counts.styleAttributes} style attribute(s)`)
    }
    if (counts.eventHandlers > 0) {
      items.push(`${counts.eventHandlers} event handler(s)`)
    }

    this.print(
      items.length > 0
        ? `  Found: ${items.join(', ')}`
        : '  Found: no inline content',
    )
  }

  hashDetails(): void {
    if (!this.enabled || this.hashes.length === 0) return

    this.print('', 'Hash Details:', RULE)
    for (const [contentType, title] of CONTENT_TYPE_TITLES) {
      const group = this.hashes.filter((h) => h.contentType === contentType)
      if (group.length === 0) continue

      this.print('', `${title}:`)
      group.forEach((h, i) => {
        this.print(
          `  [${i + 1}] ${h.hash}`,
          `      File: ${h.sourceFile}`,
          `      Content: ${h.snippet}`,
        )
      })
    }
    this.print(RULE)
  }

  externalResources(catalog: ResourceCatalog): void {
    if (!this.enabled || catalog.size === 0) return

    this.print('', 'External Resources:', RULE)
    for (const [type, title] of RESOURCE_TITLES) {
      const resources = catalog.get(type)
      if (resources.length === 0) continue

      this.print('', `${title}:`)
      resources.forEach((res, i) => {
        this.print(`  [${i + 1}] ${res.url}`)
        if (res.domain) this.print(`      Domain: ${res.domain}`)
      })
    }

    const domains = catalog.getUniqueDomains()
    if (domains.length > 0) {
      this.print('', `Unique Domains (${domains.length}):`)
      this.print(...domains.map((domain) => `  - ${domain}`))
    }
    this.print(RULE)
  }

  inferredResources(inferred: readonly HeuristicResource[]): void {
    if (!this.enabled || inferred.length === 0) return

    this.print('', 'Inferred Resources (from heuristics):', '='.repeat(80))
    for (const h of inferred) {
      this.print(
        `  [${h.confidence.toUpperCase()}] ${h.url}`,
        `      Type: ${h.type}`,
        `      Reason: ${h.reason}`,
        `      Source: ${h.sourceURL} (${h.sourceType})`,
        '',
      )
    }

    const summary = getHeuristicsSummary(inferred)
    this.print(`Total inferred: ${inferred.length} resources`)
    for (const [key, count] of Object.entries(summary)) {
      if (!key.startsWith('confidence_')) this.print(`  - ${key}: ${count}`)
    }
    this.print(
      `Confidence levels: High=${summary.confidence_high ?? 0}, Medium=${summary.confidence_medium ?? 0}, Low=${summary.confidence_low ?? 0}`,
      '',
    )
  }

  summary(totals: {
    scripts: readonly [number, number]
    styleTags: readonly [number, number]
    styleAttributes: readonly [number, number]
  }): void {
    if (!this.enabled) return
    this.print(
      '',
      'Summary:',
      `  Total inline scripts: ${totals.scripts[0]} (unique: ${totals.scripts[1]})`,
      `  Total <style> tags: ${totals.styleTags[0]} (unique: ${totals.styleTags[1]})`,
      `  Total style attributes: ${totals.styleAttributes[0]} (unique: ${totals.styleAttributes[1]})`,
      '',
    )
  }
}
