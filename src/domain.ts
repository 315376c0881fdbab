/**
 * @file domain.ts
 * @description Origin extraction for discovered resource URLs
 */

/**
 * Reduces a URL to its origin (`scheme://host[:port]`).
 * Returns '' for data: URIs, relative paths and anything unparsable.
 * Protocol-relative URLs are treated as https.
 */
export function extractDomain(rawURL: string): string {
  if (rawURL.startsWith('data:')) return ''

  if (
    !rawURL.startsWith('http://') &&
    !rawURL.startsWith('https://') &&
    !rawURL.startsWith('//')
  ) {
    return ''
  }

  const absolute = rawURL.startsWith('//') ? `https:${rawURL}` : rawURL

  let url: URL
  try {
    url = new URL(absolute)
  } catch {
    return ''
  }

  if (!url.host) return ''

  return `${url.protocol}//${url.host}`
}
