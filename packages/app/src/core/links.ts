import * as Either from "effect/Either"

import type { FromJson, Member } from "./field.js"
import { decodeEntries, decodeField, decodeObject, fieldValue, reduceFields, stringFromJson } from "./field.js"
import type { JsonObject } from "./json.js"
import { isJsonObject } from "./json.js"
import type { Meta } from "./meta.js"
import { metaMember } from "./meta.js"
import { typeError } from "./violation.js"

// CHANGE: decode and encode links objects
// WHY: documents, resources, relationships and errors all carry free-form links
// QUOTE(TZ): "Each member of a links object is a link. A link MUST be represented as either: a string ... an object"
// REF: req-links-1
// SOURCE: https://jsonapi.org/format/#document-links
// FORMAT THEOREM: ∀l ∈ Links: decode(encode(l)) = Right(l)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: link names stay the wire strings
// COMPLEXITY: O(n) where n = number of links

export interface LinkObject {
  readonly href?: string
  readonly meta?: Meta
}

export type Link = string | LinkObject

export type Links = Readonly<Record<string, Link>>

const hrefMember: Member<string> = { name: "href", required: false, fromJson: stringFromJson }

const linkObjectFromJson: FromJson<LinkObject> = decodeObject("link object", (parent) => {
  const href = decodeField(parent, hrefMember)
  const meta = decodeField(parent, metaMember)
  return reduceFields([href, meta], () => {
    const hrefValue = fieldValue(href)
    const metaValue = fieldValue(meta)
    return {
      ...(hrefValue === undefined ? {} : { href: hrefValue }),
      ...(metaValue === undefined ? {} : { meta: metaValue })
    }
  })
})

export const linkFromJson: FromJson<Link> = (json, template) => {
  if (typeof json === "string") {
    return Either.right(json)
  }
  if (isJsonObject(json)) {
    return linkObjectFromJson(json, template)
  }
  return Either.left([typeError(template, "link")])
}

export const linksFromJson: FromJson<Links> = decodeEntries("links object", linkFromJson)

export const linksMember: Member<Links> = {
  name: "links",
  required: false,
  fromJson: linksFromJson
}

const linkToJson = (link: Link): string | JsonObject =>
  typeof link === "string" ? link : {
    ...(link.href === undefined ? {} : { href: link.href }),
    ...(link.meta === undefined ? {} : { meta: link.meta })
  }

export const linksToJson = (links: Links): JsonObject =>
  Object.fromEntries(Object.entries(links).map(([name, link]) => [name, linkToJson(link)]))
