export * from "./core/config.js"
export * from "./core/document.js"
export * from "./core/error-object.js"
export * from "./core/errors.js"
export * from "./core/external-errors.js"
export * from "./core/field.js"
export * from "./core/json.js"
export * from "./core/jsonapi-object.js"
export * from "./core/links.js"
export * from "./core/meta.js"
export * from "./core/params.js"
export * from "./core/relationship-path.js"
export * from "./core/relationship.js"
export * from "./core/resource-identifier.js"
export * from "./core/resource-linkage.js"
export * from "./core/resource.js"
export * from "./core/source.js"
export * from "./core/violation.js"

export {
  checkInclude,
  decodeDocumentText,
  encodeDocumentText,
  loadCodecOptions,
  readDocumentFile,
  writeDocumentFile
} from "./app/codec.js"
export type { ConfigFile } from "./shell/config-file.js"
export { DEFAULT_CONFIG_PATH, decodeConfig, loadConfigFile } from "./shell/config-file.js"
export { readJsonFile, writeJsonFile } from "./shell/json-file.js"
export { JsonSchema, parseJsonText, printJson } from "./shell/json-text.js"
