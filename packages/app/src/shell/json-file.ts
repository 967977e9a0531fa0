import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"

import type { AppError } from "../core/errors.js"
import { fileError } from "../core/errors.js"
import type { Json } from "../core/json.js"
import { parseJsonText, printJson } from "./json-text.js"

// CHANGE: read and write JSON documents through the platform file system
// WHY: isolate filesystem IO from the pure decoder
// QUOTE(TZ): n/a
// REF: req-json-io-1
// SOURCE: n/a
// FORMAT THEOREM: ∀p,j: write(p, j) ; read(p) = Right(j)
// PURITY: SHELL
// EFFECT: Effect<Json, AppError, FileSystem>
// INVARIANT: written files end with a newline
// COMPLEXITY: O(n)

export const readTextFile = (
  path: string
): Effect.Effect<string, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    return yield* _(
      fs.readFileString(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
  })

export const readJsonFile = (
  path: string
): Effect.Effect<Json, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const raw = yield* _(readTextFile(path))
    return yield* _(parseJsonText(raw))
  })

export const writeJsonFile = (
  path: string,
  json: Json
): Effect.Effect<void, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const payload = printJson(json, 2) + "\n"
    yield* _(
      fs.writeFileString(path, payload).pipe(Effect.mapError((error) => fileError(String(error))))
    )
  })
