import {describe, expect, test} from 'vitest'
import {HEURISTIC_RULES} from '../src/heuristic-rules.js'
import {
  applyHeuristics,
  evaluateRule,
  getHeuristicsSummary,
  InferenceContext,
  toExternalResource,
} from '../src/heuristics.js'
import {addExternalResourcesToCSP} from '../src/merger.js'
import {createResource, ResourceCatalog} from '../src/resources.js'

const rule = (id: string) => {
  const found = HEURISTIC_RULES.find((r) => r.id === id)
  if (!found) throw new Error(`no rule ${id}`)
  return found
}

describe('applyHeuristics', () => {
  test('should infer the Google Fonts font host', () => {
    const stylesheet = createResource(
      'stylesheet',
      'https://fonts.googleapis.com/css2?family=Inter',
    )

    expect(applyHeuristics([stylesheet])).toEqual([
      {
        url: 'https://fonts.googleapis.com',
        type: 'font',
        confidence: 'high',
        reason: "Stylesheet name contains 'font' keyword",
        sourceURL: 'https://fonts.googleapis.com/css2?family=Inter',
        sourceType: 'stylesheet',
      },
      {
        url: 'https://fonts.gstatic.com',
        type: 'font',
        confidence: 'high',
        reason: 'Google Fonts CSS always loads from fonts.gstatic.com',
        sourceURL: 'https://fonts.googleapis.com/css2?family=Inter',
        sourceType: 'stylesheet',
      },
    ])
  })

  test('should emit the same inference only once per call', () => {
    const inferred = applyHeuristics([
      createResource('stylesheet', 'https://fonts.googleapis.com/css2?family=Inter'),
      createResource('stylesheet', 'https://fonts.googleapis.com/css2?family=Roboto'),
    ])

    expect(inferred.filter((h) => h.url === 'https://fonts.gstatic.com')).toHaveLength(1)
    expect(inferred).toHaveLength(2)
  })

  test('should infer API and iframe origins for payment scripts', () => {
    const inferred = applyHeuristics([
      createResource('script', 'https://js.stripe.com/v3/'),
    ])

    expect(inferred.map(({url, type, reason}) => ({url, type, reason}))).toEqual([
      {url: 'stripe.com', type: 'connect', reason: 'Payment processor needs API connection'},
      {url: 'stripe.com', type: 'frame', reason: 'Payment processor may use iframes'},
    ])
  })

  test('should point vendor analytics at the collection host', () => {
    const inferred = applyHeuristics([
      createResource('script', 'https://www.googletagmanager.com/gtag/js?id=G-TEST'),
    ])

    expect(inferred).toHaveLength(1)
    expect(inferred[0]).toMatchObject({
      url: 'google-analytics.com',
      type: 'connect',
      confidence: 'high',
    })
  })

  test('should point self-hosted analytics at the script origin', () => {
    const inferred = applyHeuristics([
      createResource('script', 'https://example.com/js/analytics.js'),
    ])

    expect(inferred.map(({url, type}) => ({url, type}))).toEqual([
      {url: 'https://example.com', type: 'connect'},
    ])
  })

  test('should format rule reasons with the matched pattern', () => {
    const inferred = applyHeuristics([
      createResource(
        'stylesheet',
        'https://cdn.jsdelivr.net/npm/bootstrap@5.3.0/dist/css/bootstrap.min.css',
      ),
    ])

    expect(inferred.map(({url, type, confidence, reason}) => ({url, type, confidence, reason}))).toEqual([
      {
        url: 'https://cdn.jsdelivr.net',
        type: 'font',
        confidence: 'medium',
        reason: 'CSS framework may include custom fonts (bootstrap)',
      },
      {
        url: 'https://cdn.jsdelivr.net',
        type: 'connect',
        confidence: 'medium',
        reason: 'CDN may dynamically load additional resources',
      },
    ])
  })

  test('should run the any-type rules after the type rules', () => {
    const inferred = applyHeuristics([
      createResource('image', 'https://api.example.com/v1/avatar.png'),
    ])

    expect(inferred.map(({url, type, confidence}) => ({url, type, confidence}))).toEqual([
      {url: 'https://api.example.com', type: 'image', confidence: 'medium'},
      {url: 'https://api.example.com', type: 'connect', confidence: 'high'},
    ])
  })

  test('should skip resources without an origin', () => {
    expect(
      applyHeuristics([createResource('script', '/static/react-bundle.js')]),
    ).toEqual([])
  })

  test('should return nothing for unremarkable resources', () => {
    expect(
      applyHeuristics([createResource('frame', 'https://www.example.org/embed')]),
    ).toEqual([])
  })

  test('should give the same result on repeated calls', () => {
    const resources = [
      createResource('script', 'https://js.stripe.com/v3/'),
      createResource('stylesheet', 'https://fonts.googleapis.com/css2?family=Inter'),
    ]
    expect(applyHeuristics(resources)).toEqual(applyHeuristics(resources))
  })

  test('should add nothing when its own inferences are fed back in', () => {
    const resources = [
      createResource('script', 'https://analytics.example.com/gtag/js/bundle.js'),
      createResource('script', 'https://js.stripe.com/v3/'),
      createResource('stylesheet', 'https://fonts.googleapis.com/css2?family=Inter'),
      createResource('image', 'https://api.example.com/v1/avatar.png'),
    ]
    const first = applyHeuristics(resources)

    expect(
      applyHeuristics([...resources, ...first.map(toExternalResource)]),
    ).toEqual(first)
  })

  test('should not fire own-origin analytics after a vendor pattern matched', () => {
    const inferred = applyHeuristics([
      createResource('script', 'https://analytics.example.com/gtag/js/bundle.js'),
      createResource('script', 'https://analytics.example.com'),
    ])

    expect(inferred.map(({url, type}) => `${type}:${url}`)).toEqual([
      'connect:google-analytics.com',
      'script:https://analytics.example.com',
    ])
  })

  test('should not change the policy when its inferences are merged twice', () => {
    const catalog = ResourceCatalog.from([
      createResource('script', 'https://js.stripe.com/v3/'),
      createResource('stylesheet', 'https://fonts.googleapis.com/css2?family=Inter'),
    ])
    const extended = catalog.withInferred(applyHeuristics(catalog.all()))

    const once = addExternalResourcesToCSP("default-src 'self'", extended)
    expect(addExternalResourcesToCSP(once, extended)).toBe(once)
  })
})

describe('evaluateRule', () => {
  test('should match responsive image names with a regular expression', () => {
    const inferred = evaluateRule(
      rule('image-responsive'),
      createResource('image', 'https://img.example.com/hero_lg.jpg'),
      new InferenceContext(),
    )

    expect(inferred).toHaveLength(1)
    expect(inferred[0]?.url).toBe('https://img.example.com')
  })

  test('should drop consequences already claimed in the context', () => {
    const ctx = new InferenceContext()
    ctx.claim('https://stripe.com', 'script-payment-api', 'connect')

    expect(
      evaluateRule(
        rule('script-payment-api'),
        createResource('script', 'https://js.stripe.com/v3/'),
        ctx,
      ),
    ).toEqual([])
  })

  test('should return frozen inferences', () => {
    const [first] = evaluateRule(
      rule('any-api-endpoint'),
      createResource('other', 'https://example.com/graphql'),
      new InferenceContext(),
    )
    expect(first && Object.isFrozen(first)).toBe(true)
  })
})

describe('InferenceContext', () => {
  test('should accept a key only once', () => {
    const ctx = new InferenceContext()
    expect(ctx.claim('https://a.example.com', 'r', 'font')).toBe(true)
    expect(ctx.claim('https://a.example.com', 'r', 'font')).toBe(false)
    expect(ctx.claim('https://a.example.com', 'r', 'image')).toBe(true)
  })
})

describe('getHeuristicsSummary', () => {
  test('should count per type and per confidence level', () => {
    const inferred = applyHeuristics([
      createResource('image', 'https://api.example.com/v1/avatar.png'),
      createResource('script', 'https://js.stripe.com/v3/'),
    ])

    expect(getHeuristicsSummary(inferred)).toEqual({
      image: 1,
      connect: 2,
      frame: 1,
      confidence_medium: 1,
      confidence_high: 3,
    })
  })

  test('should return an empty summary for no inferences', () => {
    expect(getHeuristicsSummary([])).toEqual({})
  })
})
