/**
 * @file types.ts
 * @description Shared types for the policy model, the inference engine and the CLI
 */

/**
 * Shared logger interface used by the policy builder, the reporter and the CLI.
 */
export interface Logger
  extends Pick<Console, 'error' | 'warn' | 'info' | 'debug'> {}

/**
 * Parsed policy: directive name → raw value string ('' for a bare directive).
 */
export type Directives = Map<string, string>

/**
 * Kind of external reference a document makes.
 */
export type ResourceType =
  | 'script'
  | 'stylesheet'
  | 'image'
  | 'font'
  | 'frame'
  | 'other'

/**
 * Resource classes whose data: URI usage is tracked separately.
 */
export type DataURIClass = 'image' | 'font'

/**
 * A discovered external reference. `domain` is '' when the URL is not
 * externally addressable (relative path, data: URI, unparsable).
 */
export interface ExternalResource {
  readonly type: ResourceType
  readonly url: string
  readonly domain: string
}

export type Confidence = 'high' | 'medium' | 'low'

/**
 * Inferred resources use `connect` where discovered ones use `other`.
 */
export type InferredType = Exclude<ResourceType, 'other'> | 'connect'

/**
 * A resource the page is expected to need at runtime, inferred from
 * another resource it references.
 */
export interface HeuristicResource {
  readonly url: string
  readonly type: InferredType
  readonly confidence: Confidence
  readonly reason: string
  /** URL of the resource that triggered the inference. */
  readonly sourceURL: string
  readonly sourceType: ResourceType
}

export type HashAlgorithm = 'sha256' | 'sha384' | 'sha512'

export interface CSPModification {
  action: 'add' | 'remove'
  directive: string
  value: string
}

export interface ValidationWarning {
  severity: 'warning' | 'error'
  message: string
  /** Suggested fix. */
  fix: string
}

export interface ValidationResult {
  valid: boolean
  warnings: ValidationWarning[]
}

/**
 * Per-directive allow-lists for a policy generated from scratch.
 * An empty list omits the directive.
 */
export interface StrictCSPTemplate {
  defaultSrc: string[]
  scriptSrc: string[]
  styleSrc: string[]
  imgSrc: string[]
  fontSrc: string[]
  connectSrc: string[]
  manifestSrc: string[]
  workerSrc: string[]
  frameSrc: string[]
  objectSrc: string[]
  mediaSrc: string[]
  baseUri: string[]
  formAction: string[]
  frameAncestors: string[]
  upgradeInsecureRequests: boolean
  /** Adds "require-trusted-types-for 'script'". */
  requireTrustedTypesFor: boolean
}

export type InlineScriptKind = 'script' | 'event-handler'

/**
 * Inline content pulled out of a single document.
 */
export interface InlineContent {
  /** <script> bodies and event handler attribute values, in document order. */
  scripts: string[]
  /** Where each entry of `scripts` came from. */
  scriptKinds: InlineScriptKind[]
  styleTags: string[]
  styleAttributes: string[]
  /** Event handler attribute values; each one is also in `scripts`. */
  eventHandlers: string[]
  hasEventHandlers: boolean
}

export interface ExtractionOptions {
  noScripts?: boolean
  noStyles?: boolean
  noInlineStyles?: boolean
  noEventHandlers?: boolean
}

/**
 * Options for the policy builder, shared by the CLI.
 */
export interface PolicyBuilderOptions extends ExtractionOptions {
  /**
   * Existing CSP header to update. When omitted (or when `generateStrict`
   * is set) a strict policy is generated from the default template.
   */
  csp?: string

  /**
   * Build a policy from the strict template instead of updating `csp`.
   */
  generateStrict?: boolean

  /**
   * Algorithm used for inline content hashes (default: sha256).
   */
  hashAlgorithm?: HashAlgorithm

  /**
   * Add external resource origins to the matching fetch directives.
   */
  includeExternal?: boolean

  /**
   * Infer additional origins from the external resources found.
   * Only takes effect together with `includeExternal`.
   */
  useHeuristics?: boolean

  /**
   * Adds "require-trusted-types-for 'script'" to a generated strict policy.
   */
  requireTrustedTypes?: boolean

  /**
   * Add/remove operations applied last, in order.
   */
  modifications?: CSPModification[]

  /**
   * Skip validation of the input and output policies.
   */
  noValidate?: boolean

  /**
   * Report per-file progress, hashes and resources through `logger.info`.
   */
  verbose?: boolean

  /**
   * A logger implementing error, warn, info, debug (default: console).
   */
  logger?: Logger
}

/**
 * CLI configuration: builder options plus what only the command line needs.
 */
export interface CLIOptions extends PolicyBuilderOptions {
  files: string[]
  validateOnly?: boolean
  /**
   * the format of the output
   */
  outputFormat: 'header' | 'raw' | 'json'
}
