import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { resource, resourceFromJson, resourceToJson } from "../../src/core/resource.js"
import { resourceIdentifier } from "../../src/core/resource-identifier.js"
import { many, one } from "../../src/core/resource-linkage.js"
import { errorTemplate, minimumChildren, missing, typeError } from "../../src/core/violation.js"
import { leftOf, rightOf } from "./test-helpers.js"

const template = errorTemplate("/data")
const fetchResource = resourceFromJson("fetch")
const createResource = resourceFromJson("create")

describe("resourceFromJson", () => {
  it.effect("decodes type, id and attributes", () =>
    Effect.sync(() => {
      const json = { type: "article", id: "1", attributes: { title: "Hello", tags: ["a"] } }
      expect(rightOf(fetchResource(json, template))).toEqual(
        resource({ type: "article", id: "1", attributes: { title: "Hello", tags: ["a"] } })
      )
    }))

  it.effect("requires type and id outside of create", () =>
    Effect.sync(() => {
      expect(leftOf(fetchResource({}, template))).toEqual([missing(template, "type"), missing(template, "id")])
      expect(leftOf(resourceFromJson("update")({ type: "article" }, template))).toEqual([missing(template, "id")])
    }))

  it.effect("accepts a resource without id on create", () =>
    Effect.sync(() => {
      expect(rightOf(createResource({ type: "article" }, template))).toEqual(resource({ type: "article" }))
    }))

  it.effect("anchors relationship violations at the relationship name", () =>
    Effect.sync(() => {
      const json = { type: "article", id: "1", relationships: { author: {} } }
      expect(leftOf(fetchResource(json, template))).toEqual([
        minimumChildren(errorTemplate("/data/relationships/author"), ["data", "links", "meta"])
      ])
    }))

  it.effect("reports malformed members together", () =>
    Effect.sync(() => {
      const json = { type: 1, id: "1", attributes: [], relationships: "none", meta: true }
      expect(leftOf(fetchResource(json, template))).toEqual([
        typeError(errorTemplate("/data/type"), "string"),
        typeError(errorTemplate("/data/attributes"), "attributes object"),
        typeError(errorTemplate("/data/relationships"), "relationships object"),
        typeError(errorTemplate("/data/meta"), "meta object")
      ])
    }))

  it.effect("embeds resources to be created in relationship linkage", () =>
    Effect.sync(() => {
      const json = {
        type: "article",
        relationships: {
          comments: { data: [{ type: "comment", attributes: { text: "First" } }, { type: "comment", id: "5" }] }
        }
      }
      expect(rightOf(createResource(json, template))).toEqual(
        resource({
          type: "article",
          relationships: {
            comments: {
              data: many([
                resource({ type: "comment", attributes: { text: "First" } }),
                resourceIdentifier("comment", "5")
              ])
            }
          }
        })
      )
    }))

  it.effect("embeds resources without id alongside identifiers on update", () =>
    Effect.sync(() => {
      const json = {
        type: "article",
        id: "1",
        relationships: {
          comments: { data: [{ type: "comment", attributes: { text: "Second" } }, { type: "comment", id: "5" }] }
        }
      }
      const decoded = rightOf(resourceFromJson("update")(json, template))
      const comments = decoded.relationships?.["comments"]?.data
      expect(comments).toEqual(
        many([resource({ type: "comment", attributes: { text: "Second" } }), resourceIdentifier("comment", "5")])
      )
      const embedded = comments?._tag === "Many" ? comments.values[0] : undefined
      expect(embedded?._tag).toBe("Resource")
      expect(embedded?.id).toBeUndefined()
    }))

  it.effect("links by identifier only when fetching", () =>
    Effect.sync(() => {
      const json = {
        type: "article",
        id: "1",
        relationships: { comments: { data: [{ type: "comment", attributes: { text: "First" } }] } }
      }
      expect(leftOf(fetchResource(json, template))).toEqual([
        missing(errorTemplate("/data/relationships/comments/data/0"), "id")
      ])
    }))
})

describe("resourceToJson", () => {
  it.effect("omits absent members", () =>
    Effect.sync(() => {
      expect(resourceToJson(resource({ type: "article", id: "1" }))).toEqual({ type: "article", id: "1" })
    }))

  it.effect("decodes its own output", () =>
    Effect.sync(() => {
      const value = resource({
        type: "article",
        id: "1",
        attributes: { title: "Hello" },
        relationships: { author: { data: one(resourceIdentifier("person", "9")) } },
        links: { self: "https://example.test/articles/1" },
        meta: { views: 3 }
      })
      expect(rightOf(fetchResource(resourceToJson(value), template))).toEqual(value)
    }))
})
