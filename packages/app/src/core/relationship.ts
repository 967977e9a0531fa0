import * as Either from "effect/Either"

import type { FromJson, Member } from "./field.js"
import { decodeEntries, decodeField, decodeObject, fieldValue, isAbsent, reduceFields } from "./field.js"
import type { JsonObject } from "./json.js"
import type { Links } from "./links.js"
import { linksMember, linksToJson } from "./links.js"
import type { Meta } from "./meta.js"
import { metaMember } from "./meta.js"
import type { Resource } from "./resource.js"
import type { ResourceIdentifier } from "./resource-identifier.js"
import { resourceIdentifierFromJson } from "./resource-identifier.js"
import type { ResourceLinkage } from "./resource-linkage.js"
import { linkageFromJson, linkageToJson, unset } from "./resource-linkage.js"
import { minimumChildren } from "./violation.js"

// CHANGE: decode and encode relationship objects
// WHY: a relationship without data, links and meta carries no information and is rejected as a whole
// QUOTE(TZ): "A relationship object MUST contain at least one of the following: links, data, meta"
// REF: req-relationship-1
// SOURCE: https://jsonapi.org/format/#document-resource-object-relationships
// FORMAT THEOREM: ∀j: absent(data) ∧ absent(links) ∧ absent(meta) → decode(j) = Left([minimumChildren])
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: data defaults to Unset when the key is absent
// COMPLEXITY: O(n) where n = size of linkage

export type IdentifierOrResource = ResourceIdentifier | Resource

export interface Relationship {
  readonly data: ResourceLinkage<IdentifierOrResource>
  readonly links?: Links
  readonly meta?: Meta
}

export type Relationships = Readonly<Record<string, Relationship>>

export const RELATIONSHIP_CHILDREN: ReadonlyArray<string> = ["data", "links", "meta"]

/**
 * Build a relationship decoder over the decoder used for each linkage element.
 *
 * @pure true
 * @complexity O(n)
 */
export const relationshipFromJson = (fromElement: FromJson<IdentifierOrResource>): FromJson<Relationship> => {
  const dataMember: Member<ResourceLinkage<IdentifierOrResource>> = {
    name: "data",
    required: false,
    fromJson: linkageFromJson(fromElement)
  }
  return decodeObject("relationship", (parent) => {
    const data = decodeField(parent, dataMember)
    const links = decodeField(parent, linksMember)
    const meta = decodeField(parent, metaMember)
    if (isAbsent(data) && isAbsent(links) && isAbsent(meta)) {
      return Either.left([minimumChildren(parent.template, RELATIONSHIP_CHILDREN)])
    }
    return reduceFields([data, links, meta], () => {
      const linksValue = fieldValue(links)
      const metaValue = fieldValue(meta)
      return {
        data: fieldValue(data) ?? unset,
        ...(linksValue === undefined ? {} : { links: linksValue }),
        ...(metaValue === undefined ? {} : { meta: metaValue })
      }
    })
  })
}

export const relationshipsFromJson = (
  fromElement: FromJson<IdentifierOrResource>
): FromJson<Relationships> => decodeEntries("relationships object", relationshipFromJson(fromElement))

/**
 * Relationship decoder whose linkage holds resource identifiers only.
 */
export const decodeRelationship: FromJson<Relationship> = relationshipFromJson(resourceIdentifierFromJson)

export const relationshipToJson = (
  relationship: Relationship,
  elementToJson: (element: IdentifierOrResource) => JsonObject
): JsonObject => {
  const data = linkageToJson(relationship.data, elementToJson)
  return {
    ...(data === undefined ? {} : { data }),
    ...(relationship.links === undefined ? {} : { links: linksToJson(relationship.links) }),
    ...(relationship.meta === undefined ? {} : { meta: relationship.meta })
  }
}
