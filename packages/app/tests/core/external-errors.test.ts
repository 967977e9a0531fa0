import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import type { ExternalError } from "../../src/core/external-errors.js"
import { fromExternalErrors, interpolateMessage, keyedAdapter } from "../../src/core/external-errors.js"
import { pointer } from "../../src/core/source.js"

const adapter = keyedAdapter({
  attributes: new Set(["name", "published_at"]),
  associations: new Set(["comments"]),
  associationByForeignKey: new Map([["author_id", "author"]]),
  formatKey: (key) => key.replace(/_/gu, "-")
})

const error = (path: ExternalError["path"], message: string, values: ExternalError["values"] = {}): ExternalError => ({
  path,
  message,
  values
})

describe("interpolateMessage", () => {
  it.effect("fills placeholders from values", () =>
    Effect.sync(() => {
      expect(interpolateMessage("should be at least %{count} character(s)", { count: 2 })).toBe(
        "should be at least 2 character(s)"
      )
    }))

  it.effect("keeps the type placeholder and unknown keys", () =>
    Effect.sync(() => {
      expect(interpolateMessage("is not a %{type} (%{missing})", { type: "integer" })).toBe(
        "is not a %{type} (%{missing})"
      )
    }))
})

describe("keyedAdapter", () => {
  it.effect("points attribute errors into attributes", () =>
    Effect.sync(() => {
      expect(adapter(error(["published_at"], "is invalid"))).toEqual({
        pointer: "/data/attributes/published-at",
        detail: "published-at is invalid",
        title: "is invalid"
      })
    }))

  it.effect("points foreign key errors at the association", () =>
    Effect.sync(() => {
      expect(adapter(error(["author_id"], "does not exist"))).toEqual({
        pointer: "/data/relationships/author",
        detail: "author does not exist",
        title: "does not exist"
      })
    }))

  it.effect("follows nested segments of an association", () =>
    Effect.sync(() => {
      expect(adapter(error(["comments", 0, "body_text"], "can't be blank"))).toEqual({
        pointer: "/data/relationships/comments/0/body-text",
        detail: "comments 0 body-text can't be blank",
        title: "can't be blank"
      })
    }))

  it.effect("gives unknown fields no pointer", () =>
    Effect.sync(() => {
      expect(adapter(error(["base_price"], "is too low"))).toEqual({
        detail: "base-price is too low",
        title: "is too low"
      })
    }))
})

describe("keyedAdapter without a field", () => {
  it.effect("uses the title alone as detail", () =>
    Effect.sync(() => {
      expect(adapter(error([], "is invalid"))).toEqual({ detail: "is invalid", title: "is invalid" })
    }))
})

describe("fromExternalErrors", () => {
  it.effect("builds error objects in order", () =>
    Effect.sync(() => {
      const errors = fromExternalErrors(
        [error(["name"], "should be at least %{count} character(s)", { count: 2 }), error(["base_price"], "is too low")],
        adapter
      )
      expect(errors).toEqual([
        {
          detail: "name should be at least 2 character(s)",
          source: pointer("/data/attributes/name"),
          title: "should be at least 2 character(s)"
        },
        { detail: "base-price is too low", title: "is too low" }
      ])
    }))
})
