import type { JsonObject } from "./json.js"
import type { Links } from "./links.js"
import type { Source } from "./source.js"
import { descend, parameter, pointer, sourceText } from "./source.js"

// CHANGE: define the error object and the canonical violation constructors
// WHY: malformed input is reported in the wire format's own error shape
// QUOTE(TZ): "Error objects provide additional information about problems encountered while performing an operation."
// REF: req-violation-1
// SOURCE: https://jsonapi.org/format/#error-objects
// FORMAT THEOREM: ∀t,c: missing(t,c).source = t.source ∧ missing(t,c).status = "422"
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: constructors never mutate the template and never read its non-source members
// COMPLEXITY: O(n) where n = number of child names

export interface ErrorObject {
  readonly code?: string
  readonly detail?: string
  readonly id?: string
  readonly links?: Links
  readonly meta?: JsonObject
  readonly source?: Source
  readonly status?: string
  readonly title?: string
}

export type Violations = ReadonlyArray<ErrorObject>

/**
 * Name of a JSON type in wire terms, such as "array", "object" or "resource linkage".
 */
export type HumanType = string

const UNPROCESSABLE = "422"

const withSource = (source: Source | undefined): { readonly source?: Source } =>
  source === undefined ? {} : { source }

export const errorTemplate = (path: string): ErrorObject => ({ source: pointer(path) })

export const descendError = (template: ErrorObject, child: string | number): ErrorObject =>
  template.source === undefined ? template : { ...template, source: descend(template.source, child) }

/**
 * A required member is not present.
 *
 * The source stays on the parent pointer.
 *
 * @pure true
 * @complexity O(1)
 */
export const missing = (template: ErrorObject, child: string): ErrorObject => ({
  detail: `\`${sourceText(template.source)}/${child}\` is missing`,
  meta: { child },
  ...withSource(template.source),
  status: UNPROCESSABLE,
  title: "Child missing"
})

/**
 * The JSON type of a member is wrong.
 *
 * `humanType` is the wire type ("object", "array", "resource linkage"), never a TypeScript one.
 *
 * @pure true
 * @complexity O(1)
 */
export const typeError = (template: ErrorObject, humanType: HumanType): ErrorObject => ({
  detail: `\`${sourceText(template.source)}\` type is not ${humanType}`,
  meta: { type: humanType },
  ...withSource(template.source),
  status: UNPROCESSABLE,
  title: "Type is wrong"
})

export const conflicting = (template: ErrorObject, children: ReadonlyArray<string>): ErrorObject => ({
  detail: "The following members conflict with each other (only one can be present):\n" + children.join("\n"),
  meta: { children: [...children] },
  ...withSource(template.source),
  status: UNPROCESSABLE,
  title: "Children conflicting"
})

export const minimumChildren = (template: ErrorObject, children: ReadonlyArray<string>): ErrorObject => ({
  detail: `At least one of the following children of \`${sourceText(template.source)}\` must be present:\n` +
    children.join("\n"),
  meta: { children: [...children] },
  ...withSource(template.source),
  status: UNPROCESSABLE,
  title: "Not enough children"
})

export const includeTemplate: ErrorObject = { source: parameter("include") }

/**
 * A relationship path requested through a query parameter is unknown.
 *
 * Without a template the source is the `include` parameter.
 *
 * @pure true
 * @complexity O(1)
 */
export const unknownRelationshipPath = (
  unknownPath: string,
  template: ErrorObject = includeTemplate
): ErrorObject => ({
  detail: `\`${unknownPath}\` is an unknown relationship path`,
  meta: { relationship_path: unknownPath },
  ...withSource(template.source),
  title: "Unknown relationship path"
})

/**
 * Error reported by a validation source outside the document decoder.
 */
export interface AdaptedError {
  readonly pointer?: string
  readonly detail: string
  readonly title: string
}

export const adapted = (error: AdaptedError): ErrorObject => ({
  detail: error.detail,
  ...(error.pointer === undefined ? {} : { source: pointer(error.pointer) }),
  title: error.title
})
