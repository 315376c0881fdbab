/**
 * @file parser.ts
 * @description Pulls inline content and external resource references out of
 *   an HTML document with cheerio.
 */

import * as cheerio from 'cheerio'
import {readFileSync} from 'fs'
import {createResource, ResourceCatalog} from './resources.js'
import type {
  DataURIClass,
  ExtractionOptions,
  InlineContent,
  ResourceType,
} from './types.js'

const EVENT_HANDLERS: ReadonlySet<string> = new Set(
  loadEventHandlers(new URL('../data/event-handlers.json', import.meta.url)),
)

function loadEventHandlers(file: URL): string[] {
  const parsed: unknown = JSON.parse(readFileSync(file, 'utf8'))
  if (
    !Array.isArray(parsed) ||
    !parsed.every((name): name is string => typeof name === 'string')
  ) {
    throw new Error(`Malformed event handler list: ${file.pathname}`)
  }
  return parsed
}

/**
 * Tests whether an attribute name is an inline event handler (onclick, …).
 */
export function isEventHandler(attrName: string): boolean {
  return EVENT_HANDLERS.has(attrName.toLowerCase())
}

/**
 * Collects inline `<script>` bodies, `<style>` bodies, `style` attributes
 * and event handler attributes, in document order. Event handler values are
 * hashed like scripts, so they are returned in `scripts`.
 */
export function extractInlineContent(
  html: string,
  opts: ExtractionOptions = {},
): InlineContent {
  const $ = cheerio.load(html)
  const content: InlineContent = {
    scripts: [],
    scriptKinds: [],
    styleTags: [],
    styleAttributes: [],
    eventHandlers: [],
    hasEventHandlers: false,
  }

  $('*').each((_, el) => {
    if (!('attribs' in el)) return
    const attribs = el.attribs

    if (el.tagName === 'script' && !opts.noScripts && attribs.src === undefined) {
      content.scripts.push($(el).text())
      content.scriptKinds.push('script')
    } else if (el.tagName === 'style' && !opts.noStyles) {
      content.styleTags.push($(el).text())
    }

    for (const [name, value] of Object.entries(attribs)) {
      if (isEventHandler(name)) {
        if (!opts.noEventHandlers) {
          content.scripts.push(value)
          content.scriptKinds.push('event-handler')
          content.eventHandlers.push(value)
          content.hasEventHandlers = true
        }
        continue
      }
      if (name.toLowerCase() === 'style' && !opts.noInlineStyles) {
        content.styleAttributes.push(value)
      }
    }
  })

  return content
}

const FONT_EXTENSION_RE = /\.(woff2?|ttf|otf|eot)$/i
const FONT_DATA_RE = /^data:(font\/|application\/(x-)?font)/i
const FONT_FACE_RE = /@font-face\s*\{[^}]*\}/gi
const CSS_URL_RE = /url\(\s*(['"]?)([^'")]+)\1\s*\)/gi
const CSS_IMPORT_RE = /@import\s+(?:url\()?\s*['"]?([^'")\s;]+)['"]?\s*\)?/gi

/**
 * Records a reference: data: URIs only flag their class, everything else
 * becomes a resource of `type`.
 */
function record(
  catalog: ResourceCatalog,
  type: ResourceType,
  rawUrl: string | undefined,
): void {
  const url = rawUrl?.trim()
  if (!url || url.startsWith('#')) return

  if (url.toLowerCase().startsWith('data:')) {
    const dataClass: DataURIClass | undefined =
      type === 'font' || FONT_DATA_RE.test(url)
        ? 'font'
        : type === 'image'
          ? 'image'
          : undefined
    if (dataClass) catalog.markDataURI(dataClass)
    return
  }

  catalog.add(createResource(type, url))
}

function stripQuery(url: string): string {
  return url.replace(/[?#].*$/, '')
}

/**
 * Extracts url() and @import references from a CSS fragment. URLs inside
 * @font-face blocks or with a font extension are fonts, other url()s are
 * images.
 */
export function extractCssResources(css: string, catalog: ResourceCatalog): void {
  const fontFaceUrls = new Set<string>()
  for (const block of css.match(FONT_FACE_RE) ?? []) {
    for (const match of block.matchAll(CSS_URL_RE)) {
      if (match[2]) fontFaceUrls.add(match[2].trim())
    }
  }

  const imports = new Set<string>()
  for (const match of css.matchAll(CSS_IMPORT_RE)) {
    if (!match[1]) continue
    imports.add(match[1])
    record(catalog, 'stylesheet', match[1])
  }

  for (const match of css.matchAll(CSS_URL_RE)) {
    const url = match[2]?.trim()
    if (!url || imports.has(url)) continue
    const type: ResourceType =
      fontFaceUrls.has(url) ||
      FONT_EXTENSION_RE.test(stripQuery(url)) ||
      FONT_DATA_RE.test(url)
        ? 'font'
        : 'image'
    record(catalog, type, url)
  }
}

/**
 * Candidate URLs of a srcset. A URL runs to the next whitespace, so commas
 * inside data: URIs stay part of the URL; trailing commas end the candidate.
 */
export function srcsetUrls(srcset: string): string[] {
  const urls: string[] = []
  let rest = srcset

  while (rest) {
    rest = rest.replace(/^[\s,]+/, '')
    const raw = /^\S+/.exec(rest)?.[0]
    if (!raw) break
    rest = rest.slice(raw.length)

    const url = raw.replace(/,+$/, '')
    if (url) urls.push(url)
    if (url === raw) {
      // skip descriptors
      const comma = rest.indexOf(',')
      rest = comma === -1 ? '' : rest.slice(comma + 1)
    }
  }

  return urls
}

const PRELOAD_TYPES: Readonly<Record<string, ResourceType>> = {
  script: 'script',
  style: 'stylesheet',
  image: 'image',
  font: 'font',
  document: 'frame',
  fetch: 'other',
}

/**
 * Walks a document for external references: script/img/iframe sources,
 * stylesheet/icon/preload links, srcset candidates, poster images, and
 * url()/@import inside `<style>` blocks and `style` attributes.
 */
export function extractExternalResources(html: string): ResourceCatalog {
  const $ = cheerio.load(html)
  const catalog = new ResourceCatalog()

  $('*').each((_, el) => {
    if (!('attribs' in el)) return
    const attribs = el.attribs

    switch (el.tagName) {
      case 'script':
        record(catalog, 'script', attribs.src)
        break
      case 'link': {
        const rel = (attribs.rel ?? '').toLowerCase().split(/\s+/)
        if (rel.includes('stylesheet')) {
          record(catalog, 'stylesheet', attribs.href)
        } else if (rel.includes('icon') || rel.includes('apple-touch-icon')) {
          record(catalog, 'image', attribs.href)
        } else if (rel.includes('preload') || rel.includes('prefetch')) {
          const as = PRELOAD_TYPES[(attribs.as ?? '').toLowerCase()]
          if (as) record(catalog, as, attribs.href)
        }
        break
      }
      case 'img':
        record(catalog, 'image', attribs.src)
        for (const url of srcsetUrls(attribs.srcset ?? '')) {
          record(catalog, 'image', url)
        }
        break
      case 'source':
        for (const url of srcsetUrls(attribs.srcset ?? '')) {
          record(catalog, 'image', url)
        }
        break
      case 'video':
        record(catalog, 'image', attribs.poster)
        break
      case 'iframe':
      case 'frame':
        record(catalog, 'frame', attribs.src)
        break
      case 'style':
        extractCssResources($(el).text(), catalog)
        break
    }

    if (attribs.style) extractCssResources(attribs.style, catalog)
  })

  return catalog
}
