import * as Effect from "effect/Effect"
import { pipe } from "effect/Function"
import * as ParseResult from "effect/ParseResult"
import * as Schema from "effect/Schema"

import type { JsonTextError } from "../core/errors.js"
import { jsonTextError } from "../core/errors.js"
import type { Json } from "../core/json.js"

// CHANGE: parse and print JSON text at the boundary
// WHY: the core decodes generic JSON values, never raw text
// QUOTE(TZ): n/a
// REF: req-json-text-1
// SOURCE: n/a
// FORMAT THEOREM: ∀j ∈ Json: parse(print(j)) = Right(j)
// PURITY: SHELL
// EFFECT: Effect<Json, JsonTextError>
// INVARIANT: parsed objects are checked against Json in place, never rebuilt; "__proto__" members are kept
// COMPLEXITY: O(n) where n = text length

export const JsonSchema: Schema.Schema<Json> = Schema.suspend(() =>
  Schema.Union(
    Schema.Null,
    Schema.Boolean,
    Schema.Number,
    Schema.String,
    Schema.Array(JsonSchema),
    Schema.Record({ key: Schema.String, value: JsonSchema })
  )
)

const JsonTextSchema = Schema.parseJson()

const isJson = Schema.is(JsonSchema)

export const parseJsonText = (raw: string): Effect.Effect<Json, JsonTextError> =>
  pipe(
    Schema.decodeUnknown(JsonTextSchema)(raw),
    Effect.mapError((error) => jsonTextError(ParseResult.TreeFormatter.formatErrorSync(error))),
    Effect.flatMap((value) =>
      isJson(value) ? Effect.succeed(value) : Effect.fail(jsonTextError("Parsed text is not a JSON value"))
    )
  )

export const printJson = (json: Json, indent?: number): string => JSON.stringify(json, null, indent)
