import * as Either from "effect/Either"
import { Match } from "effect"

import type { Document } from "./document.js"
import type { Json, JsonObject } from "./json.js"
import type { IdentifierOrResource, Relationship, Relationships } from "./relationship.js"
import type { Resource } from "./resource.js"
import type { ResourceIdentifier } from "./resource-identifier.js"
import type { ResourceLinkage } from "./resource-linkage.js"

// CHANGE: flatten a decoded resource graph into plain nested params
// WHY: persistence layers take attribute maps with nested associations, not linkage
// QUOTE(TZ): n/a
// REF: req-params-1
// SOURCE: n/a
// FORMAT THEOREM: ∀(t,i) reachable: expanded(t,i) happens at most once per pass; later references yield {"id": i}
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: (type,id) is marked visited before its relationships are flattened
// COMPLEXITY: O(V + E) where V = distinct (type,id) pairs reachable, E = linkage elements traversed

export type Params = JsonObject

/**
 * Resources addressable by type, then id.
 */
export type ResourceIndex = ReadonlyMap<string, ReadonlyMap<string, Resource>>

/**
 * (type, id) pairs already expanded during one flattening pass.
 */
export type Visited = Map<string, Set<string>>

export type LinkageUnset = { readonly _tag: "LinkageUnset" }

export const linkageUnset: LinkageUnset = { _tag: "LinkageUnset" }

export const makeVisited = (): Visited => new Map()

export const isVisited = (visited: Visited, type: string, id: string): boolean =>
  visited.get(type)?.has(id) ?? false

export const markVisited = (visited: Visited, type: string, id: string): void => {
  const ids = visited.get(type)
  if (ids === undefined) {
    visited.set(type, new Set([id]))
    return
  }
  ids.add(id)
}

/**
 * Index resources by type and id; resources without an id cannot be referenced and are skipped.
 *
 * @pure true
 * @invariant the first resource wins for a duplicated (type, id)
 * @complexity O(n)
 */
export const indexResources = (resources: Iterable<Resource>): ResourceIndex => {
  const index = new Map<string, Map<string, Resource>>()
  for (const candidate of resources) {
    if (candidate.id === undefined) {
      continue
    }
    const byId = index.get(candidate.type) ?? new Map<string, Resource>()
    if (!byId.has(candidate.id)) {
      byId.set(candidate.id, candidate)
    }
    index.set(candidate.type, byId)
  }
  return index
}

const primaryResources = (document: Document): ReadonlyArray<Resource> =>
  Match.value(document.data).pipe(
    Match.tag("One", (linkage) => [linkage.value]),
    Match.tag("Many", (linkage) => linkage.values),
    Match.orElse(() => [])
  )

/**
 * Build the resource index from a document's primary data and included resources.
 *
 * @pure true
 * @complexity O(n)
 */
export const buildResourceIndex = (document: Document): ResourceIndex =>
  indexResources([...primaryResources(document), ...(document.included ?? [])])

const lookup = (index: ResourceIndex, identifier: ResourceIdentifier): Resource | undefined =>
  index.get(identifier.type)?.get(identifier.id)

const idParams = (id: string): Params => ({ id })

const expand = (value: Resource, id: string | undefined, index: ResourceIndex, visited: Visited): Params => ({
  ...value.attributes,
  ...(id === undefined ? {} : idParams(id)),
  ...relationshipsToParams(value.relationships ?? {}, index, visited)
})

const identifierToParams = (identifier: ResourceIdentifier, index: ResourceIndex, visited: Visited): Params => {
  const found = lookup(index, identifier)
  if (found === undefined || isVisited(visited, identifier.type, identifier.id)) {
    return idParams(identifier.id)
  }
  markVisited(visited, identifier.type, identifier.id)
  return expand(found, identifier.id, index, visited)
}

/**
 * Flatten one linkage element.
 *
 * An embedded resource is its own source of truth; an identifier is resolved through the index.
 *
 * @pure false (grows `visited`)
 * @complexity O(size of the newly expanded subgraph)
 */
export const elementToParams = (
  element: IdentifierOrResource,
  index: ResourceIndex,
  visited: Visited
): Params =>
  element._tag === "Resource"
    ? expand(element, element.id, index, visited)
    : identifierToParams(element, index, visited)

/**
 * Flatten a linkage with a caller-supplied visited set.
 *
 * @returns Params for One, a list for Many, null for Null, or LinkageUnset.
 *
 * @pure false (grows `visited`)
 * @invariant Many elements share `visited` in order, so repeated references collapse to {"id"}
 * @complexity O(V + E)
 */
export const linkageToParamsWith = (
  linkage: ResourceLinkage<IdentifierOrResource>,
  index: ResourceIndex,
  visited: Visited
): Either.Either<Json, LinkageUnset> => {
  switch (linkage._tag) {
    case "Unset":
      return Either.left(linkageUnset)
    case "Null":
      return Either.right(null)
    case "One":
      return Either.right(elementToParams(linkage.value, index, visited))
    case "Many":
      return Either.right(linkage.values.map((element) => elementToParams(element, index, visited)))
  }
}

/**
 * Flatten a linkage in a fresh pass.
 *
 * @pure true
 * @complexity O(V + E)
 */
export const linkageToParams = (
  linkage: ResourceLinkage<IdentifierOrResource>,
  index: ResourceIndex
): Either.Either<Json, LinkageUnset> => linkageToParamsWith(linkage, index, makeVisited())

export const relationshipToParams = (
  relationship: Relationship,
  index: ResourceIndex,
  visited: Visited = makeVisited()
): Either.Either<Json, LinkageUnset> => linkageToParamsWith(relationship.data, index, visited)

/**
 * Flatten every relationship of a resource, keyed by relationship name.
 *
 * Relationships whose linkage was never sent are left out.
 *
 * @pure false (grows `visited`)
 * @complexity O(V + E)
 */
export const relationshipsToParams = (
  relationships: Relationships,
  index: ResourceIndex,
  visited: Visited
): Params => {
  const entries: Array<readonly [string, Json]> = []
  for (const [name, relationship] of Object.entries(relationships)) {
    const params = relationshipToParams(relationship, index, visited)
    if (Either.isRight(params)) {
      entries.push([name, params.right])
    }
  }
  return Object.fromEntries(entries)
}

/**
 * Flatten a resource and everything it links to.
 *
 * A resource with an id is marked visited first, so links back to it collapse to {"id"}.
 *
 * @pure false (grows `visited`)
 * @complexity O(V + E)
 */
export const resourceToParams = (
  value: Resource,
  index: ResourceIndex,
  visited: Visited = makeVisited()
): Params => {
  if (value.id !== undefined) {
    if (isVisited(visited, value.type, value.id)) {
      return idParams(value.id)
    }
    markVisited(visited, value.type, value.id)
  }
  return expand(value, value.id, index, visited)
}

/**
 * Flatten a whole document's primary data in one pass.
 *
 * One visited set is shared by all primary resources and their relationships.
 *
 * @returns Params for one resource, a list for many, null for empty data, or LinkageUnset.
 *
 * @pure true
 * @complexity O(V + E)
 */
export const documentToParams = (document: Document): Either.Either<Json, LinkageUnset> => {
  const index = buildResourceIndex(document)
  const visited = makeVisited()
  switch (document.data._tag) {
    case "Unset":
      return Either.left(linkageUnset)
    case "Null":
      return Either.right(null)
    case "One":
      return Either.right(resourceToParams(document.data.value, index, visited))
    case "Many":
      return Either.right(document.data.values.map((value) => resourceToParams(value, index, visited)))
  }
}
