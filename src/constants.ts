/**
 * @file constants.ts
 * @description Shared constants for the policy model and the CLI
 */

import type {HashAlgorithm, ResourceType} from './types.js'

/**
 * Directives emitted first, in this order, when a policy is serialized.
 * Everything else follows in insertion order.
 */
export const CANONICAL_DIRECTIVE_ORDER = [
  'default-src',
  'script-src',
  'style-src',
  'img-src',
  'font-src',
  'connect-src',
  'frame-src',
  'frame-ancestors',
  'object-src',
  'base-uri',
  'form-action',
] as const

/**
 * Directives the CLI exposes --add-<name> / --remove-<name> flags for.
 * @see https://developer.mozilla.org/en-US/docs/Web/HTTP/Headers/Content-Security-Policy
 */
export const MODIFIABLE_DIRECTIVES = [
  'default-src',
  'script-src',
  'style-src',
  'img-src',
  'font-src',
  'connect-src',
  'manifest-src',
  'worker-src',
  'frame-src',
  'object-src',
  'media-src',
  'base-uri',
  'form-action',
  'frame-ancestors',
] as const

export type ModifiableDirective = (typeof MODIFIABLE_DIRECTIVES)[number]

/**
 * Fetch directive each catalog resource type feeds.
 */
export const RESOURCE_DIRECTIVES: ReadonlyArray<
  readonly [ResourceType, string]
> = [
  ['script', 'script-src'],
  ['stylesheet', 'style-src'],
  ['image', 'img-src'],
  ['font', 'font-src'],
  ['frame', 'frame-src'],
  ['other', 'connect-src'],
]

export const RESOURCE_TYPES: readonly ResourceType[] = [
  'script',
  'stylesheet',
  'image',
  'font',
  'frame',
  'other',
]

export const HASH_ALGORITHMS: readonly HashAlgorithm[] = [
  'sha256',
  'sha384',
  'sha512',
]

/**
 * Deprecated directives and what to use instead.
 */
export const DEPRECATED_DIRECTIVES: ReadonlyArray<readonly [string, string]> = [
  [
    'block-all-mixed-content',
    "Use 'upgrade-insecure-requests' instead, or handle via HTTPS",
  ],
  [
    'plugin-types',
    'Deprecated - plugins are no longer supported in modern browsers',
  ],
  ['referrer', 'Use the Referrer-Policy header instead'],
]

export const UNSAFE_HASHES = "'unsafe-hashes'"
export const DATA_SCHEME = 'data:'
