/**
 * @file resources.ts
 * @description ResourceCatalog: typed container for the external resources
 *   discovered across one or more documents.
 */

import {RESOURCE_TYPES} from './constants.js'
import {extractDomain} from './domain.js'
import type {
  DataURIClass,
  ExternalResource,
  HeuristicResource,
  ResourceType,
} from './types.js'

/**
 * Builds an immutable resource record, deriving its origin from the URL.
 */
export function createResource(
  type: ResourceType,
  url: string,
): ExternalResource {
  return Object.freeze({type, url, domain: extractDomain(url)})
}

/**
 * Converts an inferred resource into a discovered one so it can be merged
 * into a catalog. A missing scheme defaults to https; `connect` becomes
 * `other`, which feeds connect-src.
 */
export function toExternalResource(
  heuristic: HeuristicResource,
): ExternalResource {
  const url =
    heuristic.url.startsWith('http://') || heuristic.url.startsWith('https://')
      ? heuristic.url
      : `https://${heuristic.url}`
  const type: ResourceType =
    heuristic.type === 'connect' ? 'other' : heuristic.type

  return createResource(type, url)
}

function sortedDomains(resources: Iterable<ExternalResource>): string[] {
  const domains = new Set<string>()
  for (const res of resources) {
    if (res.domain) domains.add(res.domain)
  }
  return Array.from(domains).sort()
}

/**
 * Six insertion-ordered lists, one per resource type, plus the resource
 * classes for which data: URIs were seen. Domain queries are always sorted
 * and duplicate-free, whatever order resources were added in.
 */
export class ResourceCatalog {
  private readonly lists: Record<ResourceType, ExternalResource[]> = {
    script: [],
    stylesheet: [],
    image: [],
    font: [],
    frame: [],
    other: [],
  }
  private readonly dataURIs = new Set<DataURIClass>()

  static from(resources: Iterable<ExternalResource>): ResourceCatalog {
    const catalog = new ResourceCatalog()
    catalog.addAll(resources)
    return catalog
  }

  add(resource: ExternalResource): this {
    this.lists[resource.type].push(resource)
    return this
  }

  addAll(resources: Iterable<ExternalResource>): this {
    for (const res of resources) this.add(res)
    return this
  }

  markDataURI(resourceClass: DataURIClass): this {
    this.dataURIs.add(resourceClass)
    return this
  }

  usesDataURI(resourceClass: DataURIClass): boolean {
    return this.dataURIs.has(resourceClass)
  }

  get(type: ResourceType): readonly ExternalResource[] {
    return this.lists[type]
  }

  /**
   * Every resource, grouped by type in catalog order.
   */
  all(): ExternalResource[] {
    return RESOURCE_TYPES.flatMap((type) => this.lists[type])
  }

  get size(): number {
    return RESOURCE_TYPES.reduce((n, type) => n + this.lists[type].length, 0)
  }

  /**
   * Appends another catalog's resources and data: URI flags.
   */
  merge(other: ResourceCatalog): this {
    for (const type of RESOURCE_TYPES) {
      this.lists[type].push(...other.get(type))
    }
    for (const resourceClass of other.dataURIs) {
      this.dataURIs.add(resourceClass)
    }
    return this
  }

  /**
   * Returns a new catalog holding this one's resources followed by the
   * converted inferred resources.
   */
  withInferred(inferred: readonly HeuristicResource[]): ResourceCatalog {
    return new ResourceCatalog()
      .merge(this)
      .addAll(inferred.map(toExternalResource))
  }

  getUniqueDomains(): string[] {
    return sortedDomains(this.all())
  }

  getDomainsByType(type: string): string[] {
    if (!isResourceType(type)) return []
    return sortedDomains(this.lists[type])
  }
}

export function isResourceType(value: string): value is ResourceType {
  return RESOURCE_TYPES.some((type) => type === value)
}
