import * as Either from "effect/Either"

import type { FromJson } from "./field.js"
import { decodeElements } from "./field.js"
import type { Json, JsonObject } from "./json.js"
import { isJsonArray, isJsonObject } from "./json.js"
import { typeError } from "./violation.js"

// CHANGE: model resource linkage as a tagged sum
// WHY: "not loaded", "empty to-one", "to-one" and "to-many" must stay observably different
// QUOTE(TZ): "Resource linkage MUST be represented as: null for empty to-one relationships, an empty array ([]) for empty to-many relationships, a single resource identifier object for non-empty to-one relationships, an array of resource identifier objects for non-empty to-many relationships."
// REF: req-linkage-1
// SOURCE: https://jsonapi.org/format/#document-resource-object-linkage
// FORMAT THEOREM: absent ↦ Unset, null ↦ Null, object ↦ One, array ↦ Many
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Many keeps element order; element violations are all reported
// COMPLEXITY: O(n) where n = number of elements

export interface Unset {
  readonly _tag: "Unset"
}

export interface Null {
  readonly _tag: "Null"
}

export interface One<A> {
  readonly _tag: "One"
  readonly value: A
}

export interface Many<A> {
  readonly _tag: "Many"
  readonly values: ReadonlyArray<A>
}

export type ResourceLinkage<A> = Unset | Null | One<A> | Many<A>

export const unset: Unset = { _tag: "Unset" }

export const nullLinkage: Null = { _tag: "Null" }

export const one = <A>(value: A): One<A> => ({ _tag: "One", value })

export const many = <A>(values: ReadonlyArray<A>): Many<A> => ({ _tag: "Many", values })

const HUMAN_TYPE = "resource linkage"

/**
 * Build a linkage decoder over an element decoder.
 *
 * The key-absent case never reaches this decoder; callers map an absent `data` member to `unset`.
 *
 * @param fromElement - Decoder for one identifier or resource.
 * @returns Decoder for null | object | array.
 *
 * @pure true
 * @invariant a One element keeps the `data` pointer; Many elements get `/data/{index}`
 * @complexity O(n)
 */
export const linkageFromJson = <A>(fromElement: FromJson<A>): FromJson<ResourceLinkage<A>> => {
  const fromElements = decodeElements(HUMAN_TYPE, fromElement)
  return (json, template) => {
    if (json === null) {
      return Either.right(nullLinkage)
    }
    if (isJsonObject(json)) {
      return Either.map(fromElement(json, template), (value): ResourceLinkage<A> => one(value))
    }
    if (isJsonArray(json)) {
      return Either.map(fromElements(json, template), (values): ResourceLinkage<A> => many(values))
    }
    return Either.left([typeError(template, HUMAN_TYPE)])
  }
}

/**
 * Encode a linkage; Unset has no wire form and yields undefined.
 *
 * @pure true
 * @complexity O(n)
 */
export const linkageToJson = <A>(
  linkage: ResourceLinkage<A>,
  elementToJson: (element: A) => JsonObject
): Json | undefined => {
  switch (linkage._tag) {
    case "Unset":
      return undefined
    case "Null":
      return null
    case "One":
      return elementToJson(linkage.value)
    case "Many":
      return linkage.values.map(elementToJson)
  }
}
