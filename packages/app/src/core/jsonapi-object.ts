import type { FromJson, Member } from "./field.js"
import { decodeField, decodeObject, fieldValue, reduceFields, stringFromJson } from "./field.js"
import type { JsonObject } from "./json.js"
import type { Meta } from "./meta.js"
import { metaMember } from "./meta.js"

// Top-level `jsonapi` member describing the server implementation.

export interface JsonApiObject {
  readonly version?: string
  readonly meta?: Meta
}

const versionMember: Member<string> = { name: "version", required: false, fromJson: stringFromJson }

export const jsonApiObjectFromJson: FromJson<JsonApiObject> = decodeObject("jsonapi object", (parent) => {
  const version = decodeField(parent, versionMember)
  const meta = decodeField(parent, metaMember)
  return reduceFields([version, meta], () => {
    const versionValue = fieldValue(version)
    const metaValue = fieldValue(meta)
    return {
      ...(versionValue === undefined ? {} : { version: versionValue }),
      ...(metaValue === undefined ? {} : { meta: metaValue })
    }
  })
})

export const jsonApiMember: Member<JsonApiObject> = {
  name: "jsonapi",
  required: false,
  fromJson: jsonApiObjectFromJson
}

export const jsonApiObjectToJson = (jsonapi: JsonApiObject): JsonObject => ({
  ...(jsonapi.version === undefined ? {} : { version: jsonapi.version }),
  ...(jsonapi.meta === undefined ? {} : { meta: jsonapi.meta })
})
