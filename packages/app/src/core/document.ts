import * as Either from "effect/Either"

import type { Action } from "./config.js"
import { defaultCodecOptions } from "./config.js"
import { errorObjectToJson, errorsMember } from "./error-object.js"
import type { FromJson, Member } from "./field.js"
import { collectViolations, decodeElements, decodeField, decodeObject, fieldValue, isAbsent, reduceFields } from "./field.js"
import type { JsonApiObject } from "./jsonapi-object.js"
import { jsonApiMember, jsonApiObjectToJson } from "./jsonapi-object.js"
import type { Json, JsonObject } from "./json.js"
import type { Links } from "./links.js"
import { linksMember, linksToJson } from "./links.js"
import type { Meta } from "./meta.js"
import { metaMember } from "./meta.js"
import type { Resource } from "./resource.js"
import { resourceFromJson, resourceToJson } from "./resource.js"
import type { ResourceLinkage } from "./resource-linkage.js"
import { linkageFromJson, linkageToJson, unset } from "./resource-linkage.js"
import type { ErrorObject } from "./violation.js"
import { conflicting, errorTemplate, minimumChildren, missing } from "./violation.js"

// CHANGE: decode and encode top-level documents
// WHY: a document is the root of every decode and encode operation
// QUOTE(TZ): "The members data and errors MUST NOT coexist in the same document."
// REF: req-document-1
// SOURCE: https://jsonapi.org/format/#document-top-level
// FORMAT THEOREM: ∀j: decode(j) = Right(d) ∨ decode(j) = Left(e) where e.data = Unset ∧ |e.errors| ≥ 1
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: a document never holds primary data and errors together
// COMPLEXITY: O(n) where n = size of the document

/**
 * Primary data: Unset when the `data` member is absent.
 */
export type PrimaryData = ResourceLinkage<Resource>

export interface Document {
  readonly data: PrimaryData
  readonly errors?: ReadonlyArray<ErrorObject>
  readonly included?: ReadonlyArray<Resource>
  readonly links?: Links
  readonly meta?: Meta
  readonly jsonapi?: JsonApiObject
}

export interface ErrorDocument extends Document {
  readonly errors: ReadonlyArray<ErrorObject>
}

export interface DocumentDecodeOptions {
  readonly action?: Action
}

export const errorDocument = (errors: ReadonlyArray<ErrorObject>): ErrorDocument => ({ data: unset, errors })

export const rootTemplate: ErrorObject = errorTemplate("")

export const TOP_LEVEL_CHILDREN: ReadonlyArray<string> = ["data", "errors", "meta"]

interface DocumentMembers {
  readonly data: Member<PrimaryData>
  readonly included: Member<ReadonlyArray<Resource>>
}

const documentMembers = (action: Action): DocumentMembers => {
  const fromResource = resourceFromJson(action)
  return {
    data: { name: "data", required: false, fromJson: linkageFromJson(fromResource) },
    included: { name: "included", required: false, fromJson: decodeElements("array", fromResource) }
  }
}

/**
 * Build the document decoder for an action.
 *
 * Presence rules between members are checked alongside the members themselves,
 * so a conflicting document still reports malformed `data` and `errors`.
 *
 * @pure true
 * @complexity O(n)
 */
export const documentFromJson = (action: Action): FromJson<Document> => {
  const members = documentMembers(action)
  return decodeObject("document", (parent) => {
    const data = decodeField(parent, members.data)
    const errors = decodeField(parent, errorsMember)
    const included = decodeField(parent, members.included)
    const links = decodeField(parent, linksMember)
    const meta = decodeField(parent, metaMember)
    const jsonapi = decodeField(parent, jsonApiMember)
    const results = [data, errors, included, links, meta, jsonapi]

    const structural: Array<ErrorObject> = []
    if (!isAbsent(data) && !isAbsent(errors)) {
      structural.push(conflicting(parent.template, ["data", "errors"]))
    }
    if (isAbsent(data) && isAbsent(errors) && isAbsent(meta)) {
      structural.push(minimumChildren(parent.template, TOP_LEVEL_CHILDREN))
    }
    if (isAbsent(data) && !isAbsent(included)) {
      structural.push(missing(parent.template, "data"))
    }
    if (structural.length > 0) {
      return Either.left([...structural, ...collectViolations(results)])
    }

    return reduceFields(results, (): Document => {
      const errorsValue = fieldValue(errors)
      const includedValue = fieldValue(included)
      const linksValue = fieldValue(links)
      const metaValue = fieldValue(meta)
      const jsonapiValue = fieldValue(jsonapi)
      return {
        data: fieldValue(data) ?? unset,
        ...(errorsValue === undefined ? {} : { errors: errorsValue }),
        ...(includedValue === undefined ? {} : { included: includedValue }),
        ...(linksValue === undefined ? {} : { links: linksValue }),
        ...(metaValue === undefined ? {} : { meta: metaValue }),
        ...(jsonapiValue === undefined ? {} : { jsonapi: jsonapiValue })
      }
    })
  })
}

/**
 * Decode an untrusted JSON value into a document.
 *
 * @param json - Generic JSON value.
 * @param options - Decode action; defaults to "fetch".
 * @returns The document, or a document holding every violation found.
 *
 * @pure true
 * @invariant a partially decoded document is never returned
 * @complexity O(n)
 */
export const decodeDocument = (
  json: Json,
  options: DocumentDecodeOptions = {}
): Either.Either<Document, ErrorDocument> =>
  Either.mapLeft(
    documentFromJson(options.action ?? defaultCodecOptions.action)(json, rootTemplate),
    errorDocument
  )

/**
 * Encode a document; absent members are omitted and Unset data is left out.
 *
 * @pure true
 * @complexity O(n)
 */
export const documentToJson = (document: Document): JsonObject => {
  const data = linkageToJson(document.data, resourceToJson)
  return {
    ...(data === undefined ? {} : { data }),
    ...(document.errors === undefined ? {} : { errors: document.errors.map(errorObjectToJson) }),
    ...(document.included === undefined ? {} : { included: document.included.map(resourceToJson) }),
    ...(document.links === undefined ? {} : { links: linksToJson(document.links) }),
    ...(document.meta === undefined ? {} : { meta: document.meta }),
    ...(document.jsonapi === undefined ? {} : { jsonapi: jsonApiObjectToJson(document.jsonapi) })
  }
}
