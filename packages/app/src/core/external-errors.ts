import type { AdaptedError, ErrorObject } from "./violation.js"
import { adapted } from "./violation.js"

// CHANGE: adapt keyed validation errors from a persistence layer into error objects
// WHY: attribute and association errors must point into /data/attributes and /data/relationships
// QUOTE(TZ): n/a
// REF: req-external-errors-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e: attribute(root(e)) → pointer(e) = "/data/attributes/" + format(path(e))
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: errors on unknown fields carry no source
// COMPLEXITY: O(n) where n = number of errors

export type ExternalValue = string | number | boolean

/**
 * One validation error: the field path, a message template and its substitution values.
 */
export interface ExternalError {
  readonly path: ReadonlyArray<string | number>
  readonly message: string
  readonly values: Readonly<Record<string, ExternalValue>>
}

export type ErrorAdapter = (error: ExternalError) => AdaptedError

export interface KeyedAdapterOptions {
  readonly attributes: ReadonlySet<string>
  readonly associations: ReadonlySet<string>
  readonly associationByForeignKey: ReadonlyMap<string, string>
  readonly formatKey?: (key: string) => string
}

const PLACEHOLDER = /%\{(\w+)\}/gu

/**
 * Fill `%{key}` placeholders from `values`; the `type` key is never substituted.
 *
 * @example interpolateMessage("should be at least %{count} character(s)", { count: 2 })
 *
 * @pure true
 * @complexity O(n) where n = message length
 */
export const interpolateMessage = (
  message: string,
  values: Readonly<Record<string, ExternalValue>>
): string =>
  message.replace(PLACEHOLDER, (placeholder, key: string) => {
    if (key === "type" || !Object.hasOwn(values, key)) {
      return placeholder
    }
    const value = values[key]
    return value === undefined ? placeholder : String(value)
  })

const identity = (key: string): string => key

interface Located {
  readonly parent: string
  readonly root: string
}

const locateRoot = (field: string, options: KeyedAdapterOptions): Located | undefined => {
  const format = options.formatKey ?? identity
  if (options.associations.has(field)) {
    return { parent: "/data/relationships", root: format(field) }
  }
  const association = options.associationByForeignKey.get(field)
  if (association !== undefined) {
    return { parent: "/data/relationships", root: format(association) }
  }
  if (options.attributes.has(field)) {
    return { parent: "/data/attributes", root: format(field) }
  }
  return undefined
}

const formatSegment = (segment: string | number, format: (key: string) => string): string =>
  typeof segment === "number" ? String(segment) : format(segment)

/**
 * Adapter that classifies the root field of each error as attribute, association or foreign key.
 *
 * Nested segments follow the root: `["comments", 0, "text"]` points at `/data/relationships/comments/0/text`.
 *
 * @pure true
 * @complexity O(k) where k = path length
 */
export const keyedAdapter = (options: KeyedAdapterOptions): ErrorAdapter => (error) => {
  const format = options.formatKey ?? identity
  const title = interpolateMessage(error.message, error.values)
  const [first, ...rest] = error.path
  const nested = rest.map((segment) => formatSegment(segment, format))
  const located = typeof first === "string" ? locateRoot(first, options) : undefined
  if (located === undefined) {
    const child = error.path.map((segment) => formatSegment(segment, format)).join(" ")
    return { detail: child.length === 0 ? title : `${child} ${title}`, title }
  }
  const segments = [located.root, ...nested]
  return {
    pointer: `${located.parent}/${segments.join("/")}`,
    detail: `${segments.join(" ")} ${title}`,
    title
  }
}

/**
 * Convert external validation errors with an injected adapter.
 *
 * @pure true
 * @complexity O(n)
 */
export const fromExternalErrors = (
  errors: ReadonlyArray<ExternalError>,
  adapter: ErrorAdapter
): ReadonlyArray<ErrorObject> => errors.map((error) => adapted(adapter(error)))
