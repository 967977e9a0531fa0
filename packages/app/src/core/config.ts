// CHANGE: define codec options, their defaults and merge rules
// WHY: the same decoder serves fetched documents and client create/update requests
// QUOTE(TZ): "The resource object MUST contain at least a type member." (POST without client-generated id)
// REF: req-config-merge-1
// SOURCE: https://jsonapi.org/format/#crud-creating
// FORMAT THEOREM: ∀k: resolve(explicit, file).k = explicit.k ?? file.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: resolved options are total
// COMPLEXITY: O(1)/O(1)

export const ACTIONS = ["create", "update", "fetch"] as const

export type Action = typeof ACTIONS[number]

export interface CodecOptions {
  readonly action: Action
  readonly includeParameter: string
}

export type PartialCodecOptions = Partial<CodecOptions>

export const defaultCodecOptions: CodecOptions = {
  action: "fetch",
  includeParameter: "include"
}

/**
 * Resolve the effective options from explicit options, file config, and defaults.
 *
 * @param explicit - Options given by the caller.
 * @param fileConfig - Optional options loaded from a config file.
 * @returns Resolved options.
 *
 * @pure true
 * @complexity O(1)
 */
export const resolveCodecOptions = (
  explicit: PartialCodecOptions = {},
  fileConfig?: PartialCodecOptions
): CodecOptions => ({
  action: explicit.action ?? fileConfig?.action ?? defaultCodecOptions.action,
  includeParameter: explicit.includeParameter ?? fileConfig?.includeParameter ?? defaultCodecOptions.includeParameter
})

export const CONFIG_KEYS: ReadonlyArray<keyof CodecOptions> = ["action", "includeParameter"]

/**
 * Keys of a config object that no option reads.
 *
 * @pure true
 * @complexity O(n)
 */
export const unknownConfigKeys = (config: Readonly<Record<string, unknown>>): ReadonlyArray<string> =>
  Object.keys(config).filter((key) => !CONFIG_KEYS.some((known) => known === key))
