// CHANGE: introduce a JSON domain type for untrusted document input
// WHY: every decoder consumes the same closed value space instead of unknown
// QUOTE(TZ): n/a
// REF: req-json-1
// SOURCE: n/a
// FORMAT THEOREM: ∀x ∈ Json: jsonTypeName(x) ∈ {null, boolean, number, string, array, object}
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Json is closed under array/object nesting with primitive leaves
// COMPLEXITY: O(1)/O(1)

export type Json =
  | null
  | boolean
  | number
  | string
  | ReadonlyArray<Json>
  | { readonly [key: string]: Json }

export type JsonObject = { readonly [key: string]: Json }

export type JsonTypeName = "null" | "boolean" | "number" | "string" | "array" | "object"

export const isJsonObject = (value: Json): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value)

export const isJsonArray = (value: Json): value is ReadonlyArray<Json> => Array.isArray(value)

/**
 * Read an own member of a JSON object.
 *
 * Inherited keys (`constructor`, `toString`, ...) are never members.
 *
 * @pure true
 * @complexity O(1)
 */
export const getMember = (json: JsonObject, name: string): Json | undefined =>
  Object.hasOwn(json, name) ? json[name] : undefined

export const jsonTypeName = (value: Json): JsonTypeName => {
  if (value === null) {
    return "null"
  }
  if (isJsonArray(value)) {
    return "array"
  }
  if (isJsonObject(value)) {
    return "object"
  }
  if (typeof value === "boolean") {
    return "boolean"
  }
  return typeof value === "number" ? "number" : "string"
}
