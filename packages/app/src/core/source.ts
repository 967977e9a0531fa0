import type { JsonObject } from "./json.js"

// CHANGE: model the source of an error as a JSON pointer or a query parameter
// WHY: every error object must locate the offending member precisely
// QUOTE(TZ): "pointer: a JSON Pointer [RFC6901] to the value in the request document that caused the error"
// REF: req-source-1
// SOURCE: https://jsonapi.org/format/#error-objects
// FORMAT THEOREM: ∀s,c: descend(pointer(p), c) = pointer(p + "/" + c)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: a source is exactly one of pointer | parameter
// COMPLEXITY: O(1)/O(1)

export interface PointerSource {
  readonly _tag: "Pointer"
  readonly pointer: string
}

export interface ParameterSource {
  readonly _tag: "Parameter"
  readonly parameter: string
}

export type Source = PointerSource | ParameterSource

export const pointer = (path: string): PointerSource => ({ _tag: "Pointer", pointer: path })

export const parameter = (name: string): ParameterSource => ({ _tag: "Parameter", parameter: name })

export const rootPointer: PointerSource = pointer("")

/**
 * Descend a pointer source to a named or indexed child.
 *
 * A parameter source has no children and is returned as is.
 *
 * @pure true
 * @invariant input source is never mutated
 * @complexity O(n) where n = pointer length
 */
export const descend = (source: Source, child: string | number): Source =>
  source._tag === "Pointer" ? pointer(`${source.pointer}/${child}`) : source

export const sourceText = (source: Source | undefined): string => {
  if (source === undefined) {
    return ""
  }
  return source._tag === "Pointer" ? source.pointer : source.parameter
}

export const sourceToJson = (source: Source): JsonObject =>
  source._tag === "Pointer" ? { pointer: source.pointer } : { parameter: source.parameter }
