import {describe, expect, test} from 'vitest'
import {extractDomain} from '../src/domain.js'

describe('extractDomain', () => {
  test('should reduce absolute URLs to their origin', () => {
    expect(extractDomain('https://cdn.example.com/lib/app.js?v=2#top')).toBe(
      'https://cdn.example.com',
    )
    expect(extractDomain('http://example.com')).toBe('http://example.com')
  })

  test('should keep a non-default port', () => {
    expect(extractDomain('https://api.example.com:8443/v1/users')).toBe(
      'https://api.example.com:8443',
    )
  })

  test('should treat protocol-relative URLs as https', () => {
    expect(extractDomain('//static.example.com/logo.png')).toBe(
      'https://static.example.com',
    )
  })

  test('should return an empty string for data: URIs', () => {
    expect(extractDomain('data:image/png;base64,AAAA')).toBe('')
  })

  test('should return an empty string for relative paths', () => {
    expect(extractDomain('/assets/app.js')).toBe('')
    expect(extractDomain('images/logo.png')).toBe('')
    expect(extractDomain('')).toBe('')
  })

  test('should return an empty string for other schemes', () => {
    expect(extractDomain('ftp://files.example.com/a.txt')).toBe('')
    expect(extractDomain('javascript:void(0)')).toBe('')
  })

  test('should return an empty string for unparsable URLs', () => {
    expect(extractDomain('https://')).toBe('')
    expect(extractDomain('http://exa mple.com/')).toBe('')
  })
})
