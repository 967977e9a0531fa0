import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import type { Member } from "../../src/core/field.js"
import {
  absent,
  decodeElements,
  decodeEntries,
  decodeField,
  fieldValue,
  isAbsent,
  reduceFields,
  stringFromJson,
  success
} from "../../src/core/field.js"
import { getMember, jsonTypeName } from "../../src/core/json.js"
import { errorTemplate, missing, typeError } from "../../src/core/violation.js"
import { leftOf, rightOf } from "./test-helpers.js"

const name: Member<string> = { name: "name", required: true, fromJson: stringFromJson }
const nickname: Member<string> = { name: "nickname", required: false, fromJson: stringFromJson }
const template = errorTemplate("/data")

describe("decodeField", () => {
  it.effect("succeeds with the decoded value", () =>
    Effect.sync(() => {
      const result = decodeField({ json: { name: "Ada" }, template }, name)
      expect(isAbsent(result)).toBe(false)
      expect(fieldValue(result)).toBe("Ada")
    }))

  it.effect("reports a missing required member at the parent pointer", () =>
    Effect.sync(() => {
      const result = decodeField({ json: {}, template }, name)
      expect(leftOf(result)).toEqual([missing(template, "name")])
    }))

  it.effect("is absent for a missing optional member", () =>
    Effect.sync(() => {
      const result = decodeField({ json: {}, template }, nickname)
      expect(isAbsent(result)).toBe(true)
      expect(fieldValue(result)).toBeUndefined()
    }))

  it.effect("reports a wrong type at the member pointer", () =>
    Effect.sync(() => {
      const result = decodeField({ json: { nickname: 7 }, template }, nickname)
      expect(leftOf(result)).toEqual([typeError(errorTemplate("/data/nickname"), "string")])
    }))

  it.effect("ignores inherited keys", () =>
    Effect.sync(() => {
      expect(getMember({}, "toString")).toBeUndefined()
      expect(jsonTypeName([])).toBe("array")
    }))
})

describe("reduceFields", () => {
  it.effect("builds the value when no member failed", () =>
    Effect.sync(() => {
      expect(rightOf(reduceFields([success("a"), absent], () => "built"))).toBe("built")
    }))

  it.effect("collects every failure in member order", () =>
    Effect.sync(() => {
      const json = { name: 1, nickname: false }
      const first = decodeField({ json, template }, name)
      const second = decodeField({ json, template }, nickname)
      expect(leftOf(reduceFields([first, absent, second], () => "never"))).toEqual([
        typeError(errorTemplate("/data/name"), "string"),
        typeError(errorTemplate("/data/nickname"), "string")
      ])
    }))
})

describe("collection decoders", () => {
  it.effect("anchors element violations at their index", () =>
    Effect.sync(() => {
      const decode = decodeElements("array", stringFromJson)
      expect(leftOf(decode(["a", 1, "c", null], template))).toEqual([
        typeError(errorTemplate("/data/1"), "string"),
        typeError(errorTemplate("/data/3"), "string")
      ])
      expect(rightOf(decode(["a", "b"], template))).toEqual(["a", "b"])
      expect(leftOf(decode("a", template))).toEqual([typeError(template, "array")])
    }))

  it.effect("anchors entry violations at their key", () =>
    Effect.sync(() => {
      const decode = decodeEntries("labels object", stringFromJson)
      expect(leftOf(decode({ en: "Shirt", de: 3 }, template))).toEqual([
        typeError(errorTemplate("/data/de"), "string")
      ])
      expect(rightOf(decode({ en: "Shirt" }, template))).toEqual({ en: "Shirt" })
      expect(leftOf(decode([], template))).toEqual([typeError(template, "labels object")])
    }))
})
