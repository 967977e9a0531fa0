import type { ErrorDocument } from "./document.js"

// CHANGE: unify the error algebra of the boundary layer
// WHY: IO, text parsing, configuration and document validation fail with typed, matchable errors
// QUOTE(TZ): n/a
// REF: req-errors-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ AppError: e._tag is stable and exhaustively matchable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error tags are unique
// COMPLEXITY: O(1)/O(1)

export type FileError = { readonly _tag: "FileError"; readonly message: string }
export type JsonTextError = { readonly _tag: "JsonTextError"; readonly message: string }
export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }
export type InvalidDocument = { readonly _tag: "InvalidDocument"; readonly document: ErrorDocument }

export type AppError = FileError | JsonTextError | ConfigError | InvalidDocument

export const fileError = (message: string): FileError => ({
  _tag: "FileError",
  message
})

export const jsonTextError = (message: string): JsonTextError => ({
  _tag: "JsonTextError",
  message
})

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const invalidDocument = (document: ErrorDocument): InvalidDocument => ({
  _tag: "InvalidDocument",
  document
})
