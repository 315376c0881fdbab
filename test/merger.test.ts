import {describe, expect, test} from 'vitest'
import {
  addExternalResourcesToCSP,
  applyCSPModifications,
  updateCSP,
} from '../src/merger.js'
import {createResource, ResourceCatalog} from '../src/resources.js'

describe('updateCSP', () => {
  test('should add hashes and unsafe-hashes where attributes need them', () => {
    const csp = updateCSP(
      "default-src 'self'; script-src 'self'",
      ["'sha256-a'"],
      ["'sha256-b'"],
      ["'sha256-c'"],
      true,
    )

    expect(csp).toBe(
      "default-src 'self'; script-src 'self' 'sha256-a' 'unsafe-hashes'; style-src 'sha256-b' 'sha256-c' 'unsafe-hashes'",
    )
  })

  test('should put style attribute hashes in style-src-attr when present', () => {
    const csp = updateCSP(
      "default-src 'self'; style-src 'self'; style-src-attr 'self'",
      [],
      [],
      ["'sha256-c'"],
    )

    expect(csp).toBe(
      "default-src 'self'; style-src 'self'; style-src-attr 'self' 'sha256-c' 'unsafe-hashes'",
    )
  })

  test('should not add unsafe-hashes to script-src without event handlers', () => {
    expect(updateCSP("script-src 'self'", ["'sha256-a'"])).toBe(
      "script-src 'self' 'sha256-a'",
    )
  })

  test('should leave the policy alone when there is nothing to add', () => {
    expect(updateCSP("default-src 'self'", [], [], [], true)).toBe("default-src 'self'")
  })

  test('should not duplicate hashes already present', () => {
    const once = updateCSP("default-src 'self'", ["'sha256-a'"], [], ["'sha256-c'"], true)
    expect(updateCSP(once, ["'sha256-a'"], [], ["'sha256-c'"], true)).toBe(once)
  })
})

describe('addExternalResourcesToCSP', () => {
  test('should add origins per type and seed new directives from default-src', () => {
    const catalog = ResourceCatalog.from([
      createResource('script', 'https://cdn.example.com/a.js'),
      createResource('image', 'https://img.example.com/x.png'),
      createResource('font', 'https://fonts.gstatic.com/x.woff2'),
      createResource('image', '/relative.png'),
    ]).markDataURI('image')

    expect(
      addExternalResourcesToCSP("default-src 'self'; script-src 'self'", catalog),
    ).toBe(
      "default-src 'self'; script-src 'self' https://cdn.example.com; img-src 'self' data: https://img.example.com; font-src 'self' https://fonts.gstatic.com",
    )
  })

  test('should create directives from nothing when there is no default-src', () => {
    const catalog = ResourceCatalog.from([
      createResource('frame', 'https://www.youtube.com/embed/x'),
    ])
    expect(addExternalResourcesToCSP('', catalog)).toBe('frame-src https://www.youtube.com')
  })

  test('should send other resources to connect-src', () => {
    const catalog = ResourceCatalog.from([
      createResource('other', 'https://api.example.com/v1'),
    ])
    expect(addExternalResourcesToCSP("connect-src 'self'", catalog)).toBe(
      "connect-src 'self' https://api.example.com",
    )
  })

  test('should add data: to font-src for font data URIs', () => {
    const catalog = new ResourceCatalog().markDataURI('font')
    expect(addExternalResourcesToCSP("default-src 'none'", catalog)).toBe(
      "default-src 'none'; font-src 'none' data:",
    )
  })
})

describe('applyCSPModifications', () => {
  test('should apply operations in order', () => {
    const csp = applyCSPModifications(
      "default-src 'self'; script-src 'self' 'unsafe-inline'",
      [
        {action: 'add', directive: 'script-src', value: 'https://a.example.com'},
        {action: 'remove', directive: 'script-src', value: "'unsafe-inline'"},
        {action: 'add', directive: 'script-src', value: 'https://a.example.com'},
        {action: 'remove', directive: 'object-src', value: "'none'"},
        {action: 'add', directive: 'worker-src', value: 'blob:'},
        {action: 'remove', directive: 'default-src', value: "'self'"},
      ],
    )

    expect(csp).toBe("script-src 'self' https://a.example.com; worker-src blob:")
  })

  test('should let a later operation undo an earlier one', () => {
    expect(
      applyCSPModifications("img-src 'self'", [
        {action: 'add', directive: 'img-src', value: 'data:'},
        {action: 'remove', directive: 'img-src', value: 'data:'},
      ]),
    ).toBe("img-src 'self'")

    expect(
      applyCSPModifications("img-src 'self'", [
        {action: 'remove', directive: 'img-src', value: 'data:'},
        {action: 'add', directive: 'img-src', value: 'data:'},
      ]),
    ).toBe("img-src 'self' data:")
  })

  test('should ignore removal of a value that is not present', () => {
    expect(
      applyCSPModifications("img-src 'self'", [
        {action: 'remove', directive: 'img-src', value: 'https://x.example.com'},
      ]),
    ).toBe("img-src 'self'")
  })
})
