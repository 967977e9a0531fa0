import type { Action } from "./config.js"
import type { FromJson, Member } from "./field.js"
import { decodeField, decodeObject, fieldValue, jsonObjectFromJson, reduceFields, stringFromJson } from "./field.js"
import type { JsonObject } from "./json.js"
import { getMember, isJsonObject } from "./json.js"
import type { Links } from "./links.js"
import { linksMember, linksToJson } from "./links.js"
import type { Meta } from "./meta.js"
import { metaMember } from "./meta.js"
import type { IdentifierOrResource, Relationships } from "./relationship.js"
import { relationshipsFromJson, relationshipToJson } from "./relationship.js"
import { resourceIdentifierFromJson, resourceIdentifierToJson, typeMember } from "./resource-identifier.js"

// CHANGE: decode and encode resource objects
// WHY: primary data and included resources carry attributes and relationships
// QUOTE(TZ): "Exception: The id member is not required when the resource object originates at the client and represents a new resource to be created on the server."
// REF: req-resource-1
// SOURCE: https://jsonapi.org/format/#document-resource-objects
// FORMAT THEOREM: ∀a,j: decode(a, j) = Right(r) → r.id ≠ undefined ∨ a = "create"
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: relationship violations are anchored at /relationships/{name}
// COMPLEXITY: O(n) where n = size of the resource subtree

export type Attributes = JsonObject

export interface Resource {
  readonly _tag: "Resource"
  readonly type: string
  readonly id?: string
  readonly attributes?: Attributes
  readonly relationships?: Relationships
  readonly links?: Links
  readonly meta?: Meta
}

export interface ResourceFields {
  readonly type: string
  readonly id?: string
  readonly attributes?: Attributes
  readonly relationships?: Relationships
  readonly links?: Links
  readonly meta?: Meta
}

export const resource = (fields: ResourceFields): Resource => ({ _tag: "Resource", ...fields })

interface ResourceMembers {
  readonly id: Member<string>
  readonly attributes: Member<Attributes>
  readonly relationships: Member<Relationships>
}

const attributesMember: Member<Attributes> = {
  name: "attributes",
  required: false,
  fromJson: jsonObjectFromJson("attributes object")
}

/**
 * Whether a linkage element is a resource to be created or updated alongside its parent.
 */
const isEmbeddedResource = (json: JsonObject): boolean =>
  getMember(json, "attributes") !== undefined || getMember(json, "relationships") !== undefined

/**
 * Decoder for one linkage element inside a relationship.
 *
 * Fetched documents only link by identifier; create and update requests may embed resources,
 * which are decoded with an optional id.
 */
const linkageElementFromJson = (action: Action): FromJson<IdentifierOrResource> => {
  if (action === "fetch") {
    return resourceIdentifierFromJson
  }
  return (json, template) =>
    isJsonObject(json) && isEmbeddedResource(json)
      ? resourceFromJson("create")(json, template)
      : resourceIdentifierFromJson(json, template)
}

const resourceMembers = (action: Action): ResourceMembers => {
  const fromRelationships = relationshipsFromJson(linkageElementFromJson(action))
  return {
    id: { name: "id", required: action !== "create", fromJson: stringFromJson },
    attributes: attributesMember,
    relationships: { name: "relationships", required: false, fromJson: fromRelationships }
  }
}

const membersByAction: Readonly<Record<Action, ResourceMembers>> = {
  create: resourceMembers("create"),
  update: resourceMembers("update"),
  fetch: resourceMembers("fetch")
}

/**
 * Build the resource decoder for an action.
 *
 * @param action - "create" makes `id` optional.
 * @returns Decoder producing a Resource or every violation found in it.
 *
 * @pure true
 * @invariant type is always required
 * @complexity O(n)
 */
export const resourceFromJson = (action: Action): FromJson<Resource> =>
  decodeObject("resource", (parent) => {
    const members = membersByAction[action]
    const type = decodeField(parent, typeMember)
    const id = decodeField(parent, members.id)
    const attributes = decodeField(parent, members.attributes)
    const relationships = decodeField(parent, members.relationships)
    const links = decodeField(parent, linksMember)
    const meta = decodeField(parent, metaMember)
    return reduceFields([type, id, attributes, relationships, links, meta], () => {
      const idValue = fieldValue(id)
      const attributesValue = fieldValue(attributes)
      const relationshipsValue = fieldValue(relationships)
      const linksValue = fieldValue(links)
      const metaValue = fieldValue(meta)
      return resource({
        type: fieldValue(type) ?? "",
        ...(idValue === undefined ? {} : { id: idValue }),
        ...(attributesValue === undefined ? {} : { attributes: attributesValue }),
        ...(relationshipsValue === undefined ? {} : { relationships: relationshipsValue }),
        ...(linksValue === undefined ? {} : { links: linksValue }),
        ...(metaValue === undefined ? {} : { meta: metaValue })
      })
    })
  })

export const identifierOrResourceToJson = (element: IdentifierOrResource): JsonObject =>
  element._tag === "Resource" ? resourceToJson(element) : resourceIdentifierToJson(element)

const relationshipsToJson = (relationships: Relationships): JsonObject =>
  Object.fromEntries(
    Object.entries(relationships).map((
      [name, relationship]
    ) => [name, relationshipToJson(relationship, identifierOrResourceToJson)])
  )

export const resourceToJson = (value: Resource): JsonObject => ({
  type: value.type,
  ...(value.id === undefined ? {} : { id: value.id }),
  ...(value.attributes === undefined ? {} : { attributes: value.attributes }),
  ...(value.relationships === undefined ? {} : { relationships: relationshipsToJson(value.relationships) }),
  ...(value.links === undefined ? {} : { links: linksToJson(value.links) }),
  ...(value.meta === undefined ? {} : { meta: value.meta })
})
