import type { JsonObject } from "./json.js"
import type { Member } from "./field.js"
import { jsonObjectFromJson } from "./field.js"

// Non-standard meta-information; any JSON object is accepted as is.

export type Meta = JsonObject

export const metaFromJson = jsonObjectFromJson("meta object")

export const metaMember: Member<Meta> = {
  name: "meta",
  required: false,
  fromJson: metaFromJson
}
