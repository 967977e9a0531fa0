import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"
import { pipe } from "effect/Function"
import * as ParseResult from "effect/ParseResult"
import * as Schema from "effect/Schema"

import type { PartialCodecOptions } from "../core/config.js"
import { ACTIONS, unknownConfigKeys } from "../core/config.js"
import type { AppError, ConfigError } from "../core/errors.js"
import { configError, fileError } from "../core/errors.js"
import { isJsonObject } from "../core/json.js"
import { parseJsonText } from "./json-text.js"

// CHANGE: decode the codec config file with schema validation
// WHY: keep boundary data typed and reject invalid config early
// QUOTE(TZ): n/a
// REF: req-config-file-1
// SOURCE: n/a
// FORMAT THEOREM: ∀c: decode(c) = Right(cfg) → cfg.options.action ∈ Actions
// PURITY: SHELL
// EFFECT: Effect<ConfigFile | undefined, AppError, FileSystem>
// INVARIANT: missing default config yields undefined
// COMPLEXITY: O(n)

export const DEFAULT_CONFIG_PATH = "./.jsonapi-decode.json"

export interface ConfigFile {
  readonly options: PartialCodecOptions
  readonly unknownKeys: ReadonlyArray<string>
}

const ConfigSchema = Schema.partial(
  Schema.Struct({
    action: Schema.Literal(...ACTIONS),
    includeParameter: Schema.String
  })
)

const formatError = (error: ParseResult.ParseError): ConfigError => configError(ParseResult.TreeFormatter.formatErrorSync(error))

/**
 * Decode config file contents.
 *
 * @param raw - File contents.
 * @returns Options set in the file and the keys no option reads.
 *
 * @pure true
 * @complexity O(n)
 */
export const decodeConfig = (raw: string): Effect.Effect<ConfigFile, AppError> =>
  Effect.gen(function*(_) {
    const json = yield* _(parseJsonText(raw).pipe(Effect.mapError((error) => configError(error.message))))
    if (!isJsonObject(json)) {
      return yield* _(Effect.fail(configError("Config file must contain a JSON object")))
    }
    const config = yield* _(pipe(Schema.decodeUnknown(ConfigSchema)(json), Effect.mapError(formatError)))
    const options: PartialCodecOptions = {
      ...(config.action === undefined ? {} : { action: config.action }),
      ...(config.includeParameter === undefined ? {} : { includeParameter: config.includeParameter })
    }
    return { options, unknownKeys: unknownConfigKeys(json) }
  })

export const loadConfigFile = (
  path: string,
  explicit: boolean
): Effect.Effect<ConfigFile | undefined, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const exists = yield* _(
      fs.exists(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    if (!exists) {
      if (explicit) {
        return yield* _(Effect.fail(fileError(`Config file not found: ${path}`)))
      }
      return
    }
    const contents = yield* _(
      fs.readFileString(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    return yield* _(decodeConfig(contents))
  })
