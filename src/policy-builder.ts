/**
 * @file policy-builder.ts
 * @description
 *   PolicyBuilder: folds the inline content and external resources of one or
 *   more HTML documents into a single CSP header. Per run it:
 *     - hashes inline scripts, event handlers, <style> blocks and style
 *       attributes (sha256/384/512), de-duplicated across documents
 *     - starts from an existing policy, or from the strict template
 *     - optionally adds external resource origins, plus inferred ones
 *     - applies explicit add/remove modifications in order
 *     - validates the input and output policies through the logger
 *
 * @example
 * import {PolicyBuilder} from './policy-builder.js'
 *
 * const builder = new PolicyBuilder({
 *   csp: "default-src 'self'",
 *   includeExternal: true,
 *   useHeuristics: true,
 * })
 * builder.addDocument('index.html', html)
 * const {csp} = builder.generate()
 * console.log('Content-Security-Policy:', csp)
 */

import {removeDuplicates} from './directives.js'
import {computeHash} from './hasher.js'
import {applyHeuristics} from './heuristics.js'
import {
  addExternalResourcesToCSP,
  applyCSPModifications,
  updateCSP,
} from './merger.js'
import {extractExternalResources, extractInlineContent} from './parser.js'
import {VerboseReporter} from './report.js'
import {ResourceCatalog} from './resources.js'
import {
  generateStrictCSP,
  getDefaultStrictTemplate,
  mergeStrictCSPWithHashes,
} from './strict.js'
import type {
  HeuristicResource,
  Logger,
  PolicyBuilderOptions,
  ValidationResult,
} from './types.js'
import {validateCSP} from './validator.js'

export type {PolicyBuilderOptions}

export interface PolicyResult {
  /** The final header value. */
  csp: string
  scriptHashes: string[]
  styleTagHashes: string[]
  styleAttrHashes: string[]
  /** Discovered resources plus converted inferences; empty unless includeExternal. */
  catalog: ResourceCatalog
  inferred: HeuristicResource[]
  /** Validation of the output policy; undefined with noValidate. */
  validation?: ValidationResult
}

interface Totals {
  scripts: number
  styleTags: number
  styleAttributes: number
}

export class PolicyBuilder {
  private readonly opts: Required<
    Omit<PolicyBuilderOptions, 'csp' | 'logger'>
  > & {csp: string}
  private readonly logger: Logger
  private readonly reporter: VerboseReporter
  private readonly catalog = new ResourceCatalog()
  private scriptHashes: string[] = []
  private styleTagHashes: string[] = []
  private styleAttrHashes: string[] = []
  private hasEventHandlers = false
  private documents = 0
  private readonly totals: Totals = {scripts: 0, styleTags: 0, styleAttributes: 0}

  /**
   * @param opts - Configuration options controlling extraction and policy
   */
  constructor(opts: PolicyBuilderOptions = {}) {
    const {
      csp = '',
      generateStrict = false,
      hashAlgorithm = 'sha256',
      includeExternal = false,
      useHeuristics = false,
      requireTrustedTypes = false,
      modifications = [],
      noValidate = false,
      noScripts = false,
      noStyles = false,
      noInlineStyles = false,
      noEventHandlers = false,
      verbose = false,
      logger = console,
    } = opts

    this.logger = logger
    this.reporter = new VerboseReporter(logger, verbose)

    // No policy to update means build one from the strict template
    const strict = generateStrict || !csp
    if (strict && !generateStrict) {
      logger.debug('No CSP provided, generating a strict policy')
    }

    this.opts = {
      csp,
      generateStrict: strict,
      hashAlgorithm,
      includeExternal,
      useHeuristics,
      requireTrustedTypes,
      modifications,
      noValidate,
      noScripts,
      noStyles,
      noInlineStyles,
      noEventHandlers,
      verbose,
    }
  }

  /**
   * Extracts and hashes one document's inline content, and collects its
   * external resources when includeExternal is set.
   * @param source - Name used in verbose output (usually the file path)
   * @param html - Document markup
   */
  addDocument(source: string, html: string): this {
    this.documents++
    const {hashAlgorithm, includeExternal, noScripts} = this.opts

    const content = extractInlineContent(html, this.opts)
    if (content.hasEventHandlers) this.hasEventHandlers = true

    this.reporter.fileSummary({
      scripts: content.scripts.length - content.eventHandlers.length,
      styleTags: content.styleTags.length,
      styleAttributes: content.styleAttributes.length,
      eventHandlers: content.eventHandlers.length,
    })

    if (includeExternal) {
      this.catalog.merge(extractExternalResources(html))
    }

    // noScripts also skips handler hashes; hasEventHandlers still counts
    const scripts = noScripts ? [] : content.scripts
    scripts.forEach((script, i) => {
      const hash = computeHash(script, hashAlgorithm)
      this.scriptHashes.push(hash)
      this.totals.scripts++
      this.reporter.addHash(
        hash,
        content.scriptKinds[i] ?? 'script',
        source,
        script,
      )
    })

    for (const style of content.styleTags) {
      const hash = computeHash(style, hashAlgorithm)
      this.styleTagHashes.push(hash)
      this.totals.styleTags++
      this.reporter.addHash(hash, 'style-tag', source, style)
    }

    for (const style of content.styleAttributes) {
      const hash = computeHash(style, hashAlgorithm)
      this.styleAttrHashes.push(hash)
      this.totals.styleAttributes++
      this.reporter.addHash(hash, 'style-attr', source, style)
    }

    return this
  }

  /**
   * Adds several documents, reporting progress for each.
   */
  addDocuments(documents: ReadonlyArray<{source: string; html: string}>): this {
    documents.forEach(({source, html}, i) => {
      this.reporter.progress(source, i + 1, documents.length)
      this.addDocument(source, html)
    })
    return this
  }

  private validateInput(): void {
    const {csp, generateStrict, noValidate} = this.opts
    if (noValidate || generateStrict) return

    const result = validateCSP(csp)
    if (result.warnings.length > 0) {
      this.logger.warn(
        `Input CSP has ${result.warnings.length} warning(s). Use --validate-only for details.`,
      )
    }
  }

  private basePolicy(): string {
    if (!this.opts.generateStrict) return this.opts.csp
    return generateStrictCSP({
      ...getDefaultStrictTemplate(),
      requireTrustedTypesFor: this.opts.requireTrustedTypes,
    })
  }

  /**
   * Builds the final policy from everything added so far.
   * @throws Error when no document was added
   */
  generate(): PolicyResult {
    if (this.documents === 0) {
      throw new Error('At least one HTML document is required')
    }

    const {includeExternal, useHeuristics, modifications, noValidate} = this.opts
    this.validateInput()

    let catalog = this.catalog
    let inferred: HeuristicResource[] = []
    if (includeExternal && useHeuristics) {
      const discovered = (['script', 'stylesheet', 'image', 'font', 'frame'] as const)
        .flatMap((type) => catalog.get(type))
      inferred = applyHeuristics(discovered)
      catalog = catalog.withInferred(inferred)
      this.logger.debug(`Inferred ${inferred.length} additional resource(s)`)
    }

    const scriptHashes = removeDuplicates(this.scriptHashes)
    const styleTagHashes = removeDuplicates(this.styleTagHashes)
    const styleAttrHashes = removeDuplicates(this.styleAttrHashes)

    this.reporter.hashDetails()
    if (includeExternal) {
      this.reporter.externalResources(catalog)
      this.reporter.inferredResources(inferred)
    }
    this.reporter.summary({
      scripts: [this.totals.scripts, scriptHashes.length],
      styleTags: [this.totals.styleTags, styleTagHashes.length],
      styleAttributes: [this.totals.styleAttributes, styleAttrHashes.length],
    })

    const merge = this.opts.generateStrict ? mergeStrictCSPWithHashes : updateCSP
    let csp = merge(
      this.basePolicy(),
      scriptHashes,
      styleTagHashes,
      styleAttrHashes,
      this.hasEventHandlers,
    )

    if (includeExternal) {
      csp = addExternalResourcesToCSP(csp, catalog)
    }
    if (modifications.length > 0) {
      csp = applyCSPModifications(csp, modifications)
    }

    let validation: ValidationResult | undefined
    if (!noValidate) {
      validation = validateCSP(csp)
      if (validation.warnings.length > 0) {
        this.logger.warn(
          `Output CSP has ${validation.warnings.length} warning(s). Use --validate-only to check.`,
        )
      }
    }

    return {
      csp,
      scriptHashes,
      styleTagHashes,
      styleAttrHashes,
      catalog,
      inferred,
      validation,
    }
  }
}
