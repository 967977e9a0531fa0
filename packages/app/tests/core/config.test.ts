import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { defaultCodecOptions, resolveCodecOptions, unknownConfigKeys } from "../../src/core/config.js"

describe("codec options", () => {
  it.effect("defaults to fetch and the include parameter", () =>
    Effect.sync(() => {
      expect(resolveCodecOptions()).toEqual(defaultCodecOptions)
    }))

  it.effect("prefers explicit options over the config file", () =>
    Effect.sync(() => {
      expect(resolveCodecOptions({ action: "create" }, { action: "update", includeParameter: "expand" })).toEqual({
        action: "create",
        includeParameter: "expand"
      })
    }))

  it.effect("lists keys no option reads", () =>
    Effect.sync(() => {
      expect(unknownConfigKeys({ action: "fetch", strict: true, include: "x" })).toEqual(["strict", "include"])
    }))
})
