/**
 * @file heuristic-rules.ts
 * @description Ordered inference rules. Each rule lists patterns in
 *   evaluation order; the first pattern that matches fires the rule and
 *   nothing further in that rule is tried. New patterns are appended.
 */

import type {Confidence, InferredType, ResourceType} from './types.js'

/**
 * Rules in the `any` family run for every resource type.
 */
export type RuleFamily = Exclude<ResourceType, 'font' | 'frame' | 'other'> | 'any'

/**
 * `self` targets the triggering resource's own origin; any other string is
 * a fixed host.
 */
export const SELF = 'self'

export interface Consequence {
  type: InferredType
  target: string
}

export interface RulePattern {
  /** Substring or regular expression tested against the rule's subject. */
  match: string | RegExp
  /** Overrides the rule's consequences for this pattern. */
  consequences?: readonly Consequence[]
}

export interface HeuristicRule {
  id: string
  family: RuleFamily
  /** Lower-cased URL, or the extracted origin. */
  subject: 'url' | 'domain'
  patterns: readonly RulePattern[]
  consequences: readonly Consequence[]
  confidence: Confidence
  reason: string | ((pattern: string) => string)
}

const onSelf = (type: InferredType): Consequence[] => [{type, target: SELF}]

const connectTo = (...hosts: string[]): Consequence[] =>
  hosts.map((target) => ({type: 'connect', target}))

const patterns = (...matches: Array<string | RegExp>): RulePattern[] =>
  matches.map((match) => ({match}))

export const HEURISTIC_RULES: readonly HeuristicRule[] = [
  // Stylesheets
  {
    id: 'stylesheet-font-keyword',
    family: 'stylesheet',
    subject: 'url',
    patterns: patterns('font'),
    consequences: onSelf('font'),
    confidence: 'high',
    reason: "Stylesheet name contains 'font' keyword",
  },
  {
    id: 'stylesheet-google-fonts',
    family: 'stylesheet',
    subject: 'domain',
    patterns: patterns('fonts.googleapis.com'),
    consequences: [{type: 'font', target: 'https://fonts.gstatic.com'}],
    confidence: 'high',
    reason: 'Google Fonts CSS always loads from fonts.gstatic.com',
  },
  {
    id: 'stylesheet-icon-font',
    family: 'stylesheet',
    subject: 'url',
    patterns: patterns(
      'fontawesome',
      'font-awesome',
      'material-icons',
      'icomoon',
      'glyphicons',
    ),
    consequences: onSelf('font'),
    confidence: 'high',
    reason: (pattern) => `Icon font library detected (${pattern})`,
  },
  {
    id: 'stylesheet-css-framework',
    family: 'stylesheet',
    subject: 'url',
    patterns: patterns('bootstrap', 'foundation', 'bulma', 'tailwind'),
    consequences: onSelf('font'),
    confidence: 'medium',
    reason: (pattern) => `CSS framework may include custom fonts (${pattern})`,
  },
  {
    id: 'stylesheet-cdn',
    family: 'stylesheet',
    subject: 'domain',
    patterns: patterns('cdn.jsdelivr.net', 'unpkg.com', 'cdnjs.cloudflare.com'),
    consequences: onSelf('connect'),
    confidence: 'medium',
    reason: 'CDN may dynamically load additional resources',
  },

  // Scripts
  {
    id: 'script-analytics',
    family: 'script',
    subject: 'url',
    patterns: [
      {match: 'google-analytics.com', consequences: connectTo('google-analytics.com')},
      {match: 'googletagmanager.com', consequences: connectTo('google-analytics.com')},
      {match: 'gtag/js', consequences: connectTo('google-analytics.com')},
      {match: 'ga.js', consequences: connectTo('google-analytics.com')},
      {match: 'analytics.js'},
      {match: 'analytics'},
    ],
    consequences: onSelf('connect'),
    confidence: 'high',
    reason: 'Analytics/tracking script needs to send data',
  },
  {
    id: 'script-framework-chunks',
    family: 'script',
    subject: 'url',
    patterns: patterns('react', 'vue', 'angular', 'chunk', 'bundle'),
    consequences: onSelf('script'),
    confidence: 'high',
    reason: 'JavaScript framework may lazy-load additional chunks',
  },
  {
    id: 'script-payment-api',
    family: 'script',
    subject: 'domain',
    patterns: [
      {match: 'stripe.com', consequences: connectTo('stripe.com')},
      {match: 'paypal.com', consequences: connectTo('paypal.com')},
      {match: 'square.com', consequences: connectTo('square.com')},
      {match: 'braintree.com', consequences: connectTo('braintreegateway.com')},
    ],
    consequences: [],
    confidence: 'high',
    reason: 'Payment processor needs API connection',
  },
  {
    id: 'script-payment-frame',
    family: 'script',
    subject: 'domain',
    patterns: [
      {match: 'stripe.com', consequences: [{type: 'frame', target: 'stripe.com'}]},
      {match: 'paypal.com', consequences: [{type: 'frame', target: 'paypal.com'}]},
      {match: 'square.com', consequences: [{type: 'frame', target: 'square.com'}]},
      {
        match: 'braintree.com',
        consequences: [{type: 'frame', target: 'braintreegateway.com'}],
      },
    ],
    consequences: [],
    confidence: 'high',
    reason: 'Payment processor may use iframes',
  },
  {
    id: 'script-social-widget',
    family: 'script',
    subject: 'domain',
    patterns: [
      {
        match: 'facebook',
        consequences: connectTo('connect.facebook.net', 'facebook.com'),
      },
      {
        match: 'twitter',
        consequences: connectTo('platform.twitter.com', 'twitter.com'),
      },
      {
        match: 'linkedin',
        consequences: connectTo('platform.linkedin.com', 'linkedin.com'),
      },
      {match: 'instagram', consequences: connectTo('instagram.com')},
      {match: 'youtube', consequences: connectTo('youtube.com')},
    ],
    consequences: [],
    confidence: 'high',
    reason: 'Social media widget needs API access',
  },
  {
    id: 'script-polyfill',
    family: 'script',
    subject: 'url',
    patterns: patterns('polyfill'),
    consequences: onSelf('script'),
    confidence: 'medium',
    reason: 'Polyfill service may serve different files based on user agent',
  },

  // Images
  {
    id: 'image-cdn',
    family: 'image',
    subject: 'domain',
    patterns: patterns(
      'cloudinary',
      'imgix',
      'cloudflare',
      'fastly',
      'akamai',
      'cloudfront',
    ),
    consequences: onSelf('image'),
    confidence: 'high',
    reason: 'CDN domain likely serves multiple images',
  },
  {
    id: 'image-responsive',
    family: 'image',
    subject: 'url',
    patterns: patterns(/[-_@](xs|sm|md|lg|xl|[0-9]+x|2x|3x|retina)|@[0-9]x/),
    consequences: onSelf('image'),
    confidence: 'high',
    reason: 'Responsive image pattern detected, likely has multiple variants',
  },
  {
    id: 'image-user-content',
    family: 'image',
    subject: 'url',
    patterns: patterns('/avatar', '/profile', '/user', '/photo'),
    consequences: onSelf('image'),
    confidence: 'medium',
    reason: 'User-generated content pattern detected',
  },

  // Any resource
  {
    id: 'any-api-endpoint',
    family: 'any',
    subject: 'url',
    patterns: patterns('api.', '/api/', 'graphql', 'rest'),
    consequences: onSelf('connect'),
    confidence: 'high',
    reason: 'API endpoint detected',
  },
]
