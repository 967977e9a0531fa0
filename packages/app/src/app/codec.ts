import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Effect } from "effect"
import * as Either from "effect/Either"

import type { CodecOptions, PartialCodecOptions } from "../core/config.js"
import { resolveCodecOptions } from "../core/config.js"
import type { Document, DocumentDecodeOptions } from "../core/document.js"
import { decodeDocument, documentToJson, errorDocument } from "../core/document.js"
import type { AppError } from "../core/errors.js"
import { invalidDocument } from "../core/errors.js"
import type { Json } from "../core/json.js"
import type { Include } from "../core/relationship-path.js"
import { checkIncludeParameter } from "../core/relationship-path.js"
import { loadConfigFile } from "../shell/config-file.js"
import { readJsonFile, writeJsonFile } from "../shell/json-file.js"
import { parseJsonText, printJson } from "../shell/json-text.js"

// CHANGE: compose JSON text, files and config with the pure document codec
// WHY: callers at the boundary work with text and paths, the core with JSON values
// QUOTE(TZ): n/a
// REF: req-codec-1
// SOURCE: n/a
// FORMAT THEOREM: ∀d: decodeDocumentText(encodeDocumentText(d)) = Right(d)
// PURITY: SHELL
// EFFECT: Effect<Document, AppError, FileSystem>
// INVARIANT: an invalid document fails with every error object found
// COMPLEXITY: O(n)

const fromDecoded = (json: Json, options: DocumentDecodeOptions, origin: string): Effect.Effect<Document, AppError> =>
  Either.match(decodeDocument(json, options), {
    onLeft: (document) =>
      Effect.logDebug("document rejected").pipe(
        Effect.annotateLogs({ origin, errors: document.errors.length }),
        Effect.zipRight(Effect.fail(invalidDocument(document)))
      ),
    onRight: (document) => Effect.succeed(document)
  })

/**
 * Parse JSON text and decode it as a document.
 *
 * @param text - Raw JSON text.
 * @param options - Decode action.
 * @returns The document; fails with InvalidDocument holding the error document.
 *
 * @pure false
 * @effect Logger
 * @complexity O(n)
 */
export const decodeDocumentText = (
  text: string,
  options: DocumentDecodeOptions = {}
): Effect.Effect<Document, AppError> =>
  Effect.gen(function*(_) {
    const json = yield* _(parseJsonText(text))
    return yield* _(fromDecoded(json, options, "text"))
  })

export const encodeDocumentText = (document: Document): string => printJson(documentToJson(document))

export const readDocumentFile = (
  path: string,
  options: DocumentDecodeOptions = {}
): Effect.Effect<Document, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const json = yield* _(readJsonFile(path))
    return yield* _(fromDecoded(json, options, path))
  })

export const writeDocumentFile = (
  path: string,
  document: Document
): Effect.Effect<void, AppError, FileSystemService> => writeJsonFile(path, documentToJson(document))

/**
 * Resolve codec options from overrides, an optional config file and defaults.
 *
 * @param configPath - Config file path; a missing file is an error only when `explicit`.
 * @param explicit - Whether the caller named the file.
 * @param overrides - Options taking precedence over the file.
 *
 * @pure false
 * @effect FileSystem, Logger
 * @invariant unknown config keys are reported as warnings and ignored
 * @complexity O(n)
 */
export const loadCodecOptions = (
  configPath: string,
  explicit: boolean,
  overrides: PartialCodecOptions = {}
): Effect.Effect<CodecOptions, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const configFile = yield* _(loadConfigFile(configPath, explicit))
    if (configFile !== undefined && configFile.unknownKeys.length > 0) {
      yield* _(
        Effect.logWarning(`Unknown config keys: ${configFile.unknownKeys.join(", ")}`).pipe(
          Effect.annotateLogs({ configPath })
        )
      )
    }
    return resolveCodecOptions(overrides, configFile?.options)
  })

/**
 * Check a raw include parameter against the relationship paths a caller serves.
 *
 * Unknown paths fail with an error document whose sources name `options.includeParameter`.
 */
export const checkInclude = (
  value: string,
  isKnown: (path: string) => boolean,
  options: CodecOptions
): Effect.Effect<ReadonlyArray<Include>, AppError> =>
  Either.match(checkIncludeParameter(value, isKnown, options.includeParameter), {
    onLeft: (violations) =>
      Effect.logDebug("include parameter rejected").pipe(
        Effect.annotateLogs({ parameter: options.includeParameter, errors: violations.length }),
        Effect.zipRight(Effect.fail(invalidDocument(errorDocument(violations))))
      ),
    onRight: (includes) => Effect.succeed(includes)
  })
