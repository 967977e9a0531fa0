import type { FromJson, Member } from "./field.js"
import { decodeField, decodeObject, fieldValue, reduceFields, stringFromJson } from "./field.js"
import type { JsonObject } from "./json.js"
import type { Meta } from "./meta.js"
import { metaMember } from "./meta.js"

// CHANGE: decode and encode resource identifier objects
// WHY: relationship linkage refers to other resources by type and id only
// QUOTE(TZ): "A resource identifier object MUST contain type and id members."
// REF: req-resource-identifier-1
// SOURCE: https://jsonapi.org/format/#document-resource-identifier-objects
// FORMAT THEOREM: ∀j: decode(j) = Right(r) → typeof r.type = "string" ∧ typeof r.id = "string"
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: a missing type and a missing id are both reported
// COMPLEXITY: O(1)

export interface ResourceIdentifier {
  readonly _tag: "ResourceIdentifier"
  readonly type: string
  readonly id: string
  readonly meta?: Meta
}

export const resourceIdentifier = (type: string, id: string, meta?: Meta): ResourceIdentifier => ({
  _tag: "ResourceIdentifier",
  type,
  id,
  ...(meta === undefined ? {} : { meta })
})

export const typeMember: Member<string> = { name: "type", required: true, fromJson: stringFromJson }

const idMember: Member<string> = { name: "id", required: true, fromJson: stringFromJson }

export const resourceIdentifierFromJson: FromJson<ResourceIdentifier> = decodeObject(
  "resource identifier",
  (parent) => {
    const id = decodeField(parent, idMember)
    const meta = decodeField(parent, metaMember)
    const type = decodeField(parent, typeMember)
    return reduceFields(
      [id, meta, type],
      () => resourceIdentifier(fieldValue(type) ?? "", fieldValue(id) ?? "", fieldValue(meta))
    )
  }
)

export const resourceIdentifierToJson = (identifier: ResourceIdentifier): JsonObject => ({
  type: identifier.type,
  id: identifier.id,
  ...(identifier.meta === undefined ? {} : { meta: identifier.meta })
})
