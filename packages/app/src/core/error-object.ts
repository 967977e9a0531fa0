import * as Either from "effect/Either"

import type { FromJson, Member } from "./field.js"
import { decodeElements, decodeField, decodeObject, fieldValue, isAbsent, reduceFields, stringFromJson } from "./field.js"
import type { JsonObject } from "./json.js"
import { linksMember, linksToJson } from "./links.js"
import { metaMember } from "./meta.js"
import type { Source } from "./source.js"
import { parameter, pointer, sourceToJson } from "./source.js"
import type { ErrorObject } from "./violation.js"
import { conflicting, minimumChildren } from "./violation.js"

// CHANGE: decode and encode error objects in wire form
// WHY: the decoder must accept its own error output as input
// QUOTE(TZ): "Error objects MUST be returned as an array keyed by errors in the top level of a JSON:API document."
// REF: req-error-object-1
// SOURCE: https://jsonapi.org/format/#error-objects
// FORMAT THEOREM: ∀e ∈ ErrorObject: decode(encode(e)) = Right(e)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: absent members are omitted on encode, never emitted as null
// COMPLEXITY: O(n) where n = size of links and meta

const pointerMember: Member<string> = { name: "pointer", required: false, fromJson: stringFromJson }
const parameterMember: Member<string> = { name: "parameter", required: false, fromJson: stringFromJson }

/**
 * Decode the `source` member of an error object.
 *
 * Exactly one of `pointer` and `parameter` must be present.
 *
 * @pure true
 * @complexity O(1)
 */
export const sourceFromJson: FromJson<Source> = decodeObject("source object", (parent) => {
  const pointerResult = decodeField(parent, pointerMember)
  const parameterResult = decodeField(parent, parameterMember)
  if (isAbsent(pointerResult) && isAbsent(parameterResult)) {
    return Either.left([minimumChildren(parent.template, ["parameter", "pointer"])])
  }
  if (!isAbsent(pointerResult) && !isAbsent(parameterResult)) {
    return Either.left([conflicting(parent.template, ["parameter", "pointer"])])
  }
  return reduceFields([pointerResult, parameterResult], (): Source => {
    const parameterValue = fieldValue(parameterResult)
    return parameterValue === undefined ? pointer(fieldValue(pointerResult) ?? "") : parameter(parameterValue)
  })
})

const sourceMember: Member<Source> = { name: "source", required: false, fromJson: sourceFromJson }

const stringMember = (name: string): Member<string> => ({ name, required: false, fromJson: stringFromJson })

const codeMember = stringMember("code")
const detailMember = stringMember("detail")
const idMember = stringMember("id")
const statusMember = stringMember("status")
const titleMember = stringMember("title")

/**
 * Decode one error object.
 *
 * @pure true
 * @invariant every member is optional
 * @complexity O(n)
 */
export const errorObjectFromJson: FromJson<ErrorObject> = decodeObject("error object", (parent) => {
  const code = decodeField(parent, codeMember)
  const detail = decodeField(parent, detailMember)
  const id = decodeField(parent, idMember)
  const links = decodeField(parent, linksMember)
  const meta = decodeField(parent, metaMember)
  const source = decodeField(parent, sourceMember)
  const status = decodeField(parent, statusMember)
  const title = decodeField(parent, titleMember)
  return reduceFields([code, detail, id, links, meta, source, status, title], () => {
    const codeValue = fieldValue(code)
    const detailValue = fieldValue(detail)
    const idValue = fieldValue(id)
    const linksValue = fieldValue(links)
    const metaValue = fieldValue(meta)
    const sourceValue = fieldValue(source)
    const statusValue = fieldValue(status)
    const titleValue = fieldValue(title)
    return {
      ...(codeValue === undefined ? {} : { code: codeValue }),
      ...(detailValue === undefined ? {} : { detail: detailValue }),
      ...(idValue === undefined ? {} : { id: idValue }),
      ...(linksValue === undefined ? {} : { links: linksValue }),
      ...(metaValue === undefined ? {} : { meta: metaValue }),
      ...(sourceValue === undefined ? {} : { source: sourceValue }),
      ...(statusValue === undefined ? {} : { status: statusValue }),
      ...(titleValue === undefined ? {} : { title: titleValue })
    }
  })
})

export const errorsFromJson = decodeElements("array", errorObjectFromJson)

export const errorsMember: Member<ReadonlyArray<ErrorObject>> = {
  name: "errors",
  required: false,
  fromJson: errorsFromJson
}

export const errorObjectToJson = (error: ErrorObject): JsonObject => ({
  ...(error.code === undefined ? {} : { code: error.code }),
  ...(error.detail === undefined ? {} : { detail: error.detail }),
  ...(error.id === undefined ? {} : { id: error.id }),
  ...(error.links === undefined ? {} : { links: linksToJson(error.links) }),
  ...(error.meta === undefined ? {} : { meta: error.meta }),
  ...(error.source === undefined ? {} : { source: sourceToJson(error.source) }),
  ...(error.status === undefined ? {} : { status: error.status }),
  ...(error.title === undefined ? {} : { title: error.title })
})
