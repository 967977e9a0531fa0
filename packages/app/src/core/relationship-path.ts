import * as Either from "effect/Either"

import { defaultCodecOptions } from "./config.js"
import { parameter } from "./source.js"

import type { ErrorObject, Violations } from "./violation.js"
import { includeTemplate, unknownRelationshipPath } from "./violation.js"

// CHANGE: parse and check relationship paths from the include parameter
// WHY: unknown paths are reported as error objects pointing at the query parameter
// QUOTE(TZ): "A relationship path is a dot-separated (U+002E FULL-STOP, \".\") list of relationship names."
// REF: req-relationship-path-1
// SOURCE: https://jsonapi.org/format/#fetching-includes
// FORMAT THEOREM: ∀p = n1.n2...nk: toInclude(p) = {n1: {n2: ... nk}}
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: every unknown path yields exactly one error object
// COMPLEXITY: O(n) where n = parameter length

export type Include = string | { readonly [relationshipName: string]: Include }

export const RELATIONSHIP_NAME_SEPARATOR = "."

export const parseIncludeParameter = (value: string): ReadonlyArray<string> =>
  value
    .split(",")
    .map((path) => path.trim())
    .filter((path) => path.length > 0)

/**
 * Nest the relationship names of a path.
 *
 * @example toInclude("comments.author.posts") // { comments: { author: "posts" } }
 *
 * @pure true
 * @complexity O(k) where k = number of names
 */
export const toInclude = (path: string): Include => {
  const names = path.split(RELATIONSHIP_NAME_SEPARATOR)
  let include: Include = names[names.length - 1] ?? path
  for (let index = names.length - 2; index >= 0; index -= 1) {
    include = { [names[index] ?? ""]: include }
  }
  return include
}

/**
 * Check relationship paths against the paths the caller knows.
 *
 * @param paths - Relationship paths from the parameter.
 * @param isKnown - Whether a path can be included.
 * @param template - Source of the errors; defaults to the include parameter.
 * @returns The includes, or one error object per unknown path.
 *
 * @pure true
 * @complexity O(n)
 */
export const checkRelationshipPaths = (
  paths: ReadonlyArray<string>,
  isKnown: (path: string) => boolean,
  template: ErrorObject = includeTemplate
): Either.Either<ReadonlyArray<Include>, Violations> => {
  const unknown = paths.filter((path) => !isKnown(path))
  if (unknown.length > 0) {
    return Either.left(unknown.map((path) => unknownRelationshipPath(path, template)))
  }
  return Either.right(paths.map(toInclude))
}

/**
 * Parse and check a raw include parameter value.
 *
 * @param value - Comma-separated relationship paths.
 * @param parameterName - Query parameter the errors point at.
 *
 * @pure true
 * @complexity O(n)
 */
export const checkIncludeParameter = (
  value: string,
  isKnown: (path: string) => boolean,
  parameterName: string = defaultCodecOptions.includeParameter
): Either.Either<ReadonlyArray<Include>, Violations> =>
  checkRelationshipPaths(parseIncludeParameter(value), isKnown, { source: parameter(parameterName) })
