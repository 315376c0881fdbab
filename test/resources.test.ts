import {describe, expect, test} from 'vitest'
import {
  createResource,
  isResourceType,
  ResourceCatalog,
  toExternalResource,
} from '../src/resources.js'
import type {HeuristicResource} from '../src/types.js'

const inferred = (
  url: string,
  type: HeuristicResource['type'],
): HeuristicResource => ({
  url,
  type,
  confidence: 'high',
  reason: 'test',
  sourceURL: 'https://source.example.com/app.js',
  sourceType: 'script',
})

describe('createResource', () => {
  test('should derive the domain from the URL', () => {
    expect(createResource('script', 'https://cdn.example.com/a.js')).toEqual({
      type: 'script',
      url: 'https://cdn.example.com/a.js',
      domain: 'https://cdn.example.com',
    })
  })

  test('should leave the domain empty for relative URLs', () => {
    expect(createResource('image', '/logo.png').domain).toBe('')
  })

  test('should return a frozen record', () => {
    expect(Object.isFrozen(createResource('font', 'https://f.example.com/a.woff2'))).toBe(
      true,
    )
  })
})

describe('toExternalResource', () => {
  test('should add https:// to bare hosts', () => {
    expect(toExternalResource(inferred('stripe.com', 'frame'))).toEqual({
      type: 'frame',
      url: 'https://stripe.com',
      domain: 'https://stripe.com',
    })
  })

  test('should keep an existing scheme', () => {
    expect(toExternalResource(inferred('http://legacy.example.com', 'image')).url).toBe(
      'http://legacy.example.com',
    )
  })

  test('should map connect to other', () => {
    expect(toExternalResource(inferred('https://api.example.com', 'connect')).type).toBe(
      'other',
    )
  })
})

describe('ResourceCatalog', () => {
  test('should keep one insertion-ordered list per type', () => {
    const catalog = ResourceCatalog.from([
      createResource('script', 'https://b.example.com/1.js'),
      createResource('image', 'https://img.example.com/a.png'),
      createResource('script', 'https://a.example.com/2.js'),
    ])

    expect(catalog.get('script').map((r) => r.url)).toEqual([
      'https://b.example.com/1.js',
      'https://a.example.com/2.js',
    ])
    expect(catalog.get('font')).toEqual([])
    expect(catalog.size).toBe(3)
  })

  test('should return sorted unique domains, skipping empty ones', () => {
    const catalog = ResourceCatalog.from([
      createResource('script', 'https://b.example.com/1.js'),
      createResource('script', '/local.js'),
      createResource('image', 'https://a.example.com/x.png'),
      createResource('script', 'https://b.example.com/2.js'),
    ])

    expect(catalog.getUniqueDomains()).toEqual([
      'https://a.example.com',
      'https://b.example.com',
    ])
    expect(catalog.getDomainsByType('script')).toEqual(['https://b.example.com'])
  })

  test('should return no domains for an unknown type', () => {
    const catalog = ResourceCatalog.from([
      createResource('script', 'https://b.example.com/1.js'),
    ])
    expect(catalog.getDomainsByType('media')).toEqual([])
  })

  test('should track data: URI usage per class', () => {
    const catalog = new ResourceCatalog().markDataURI('font')
    expect(catalog.usesDataURI('font')).toBe(true)
    expect(catalog.usesDataURI('image')).toBe(false)
  })

  test('should merge resources and data: flags from another catalog', () => {
    const first = ResourceCatalog.from([createResource('frame', 'https://f.example.com/')])
    const second = ResourceCatalog.from([
      createResource('frame', 'https://g.example.com/'),
    ]).markDataURI('image')

    first.merge(second)

    expect(first.getDomainsByType('frame')).toEqual([
      'https://f.example.com',
      'https://g.example.com',
    ])
    expect(first.usesDataURI('image')).toBe(true)
  })

  test('withInferred should return a new catalog and leave the original untouched', () => {
    const catalog = ResourceCatalog.from([
      createResource('script', 'https://js.stripe.com/v3/'),
    ])

    const extended = catalog.withInferred([
      inferred('stripe.com', 'connect'),
      inferred('stripe.com', 'frame'),
    ])

    expect(catalog.size).toBe(1)
    expect(extended.size).toBe(3)
    expect(extended.getDomainsByType('other')).toEqual(['https://stripe.com'])
    expect(extended.getDomainsByType('frame')).toEqual(['https://stripe.com'])
  })

  test('all should list resources grouped by type', () => {
    const catalog = ResourceCatalog.from([
      createResource('image', 'https://i.example.com/a.png'),
      createResource('script', 'https://s.example.com/a.js'),
    ])
    expect(catalog.all().map((r) => r.type)).toEqual(['script', 'image'])
  })
})

describe('isResourceType', () => {
  test('should accept the six resource types only', () => {
    expect(isResourceType('stylesheet')).toBe(true)
    expect(isResourceType('other')).toBe(true)
    expect(isResourceType('connect')).toBe(false)
  })
})
