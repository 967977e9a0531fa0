import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import type { Document } from "../../src/core/document.js"
import {
  buildResourceIndex,
  documentToParams,
  indexResources,
  linkageToParams,
  linkageUnset,
  relationshipToParams,
  resourceToParams
} from "../../src/core/params.js"
import { resource } from "../../src/core/resource.js"
import { resourceIdentifier } from "../../src/core/resource-identifier.js"
import { many, nullLinkage, one, unset } from "../../src/core/resource-linkage.js"
import { leftOf, rightOf } from "./test-helpers.js"

const shirt = resource({ type: "shirt", id: "1", attributes: { size: "L" } })
const ada = resource({ type: "person", id: "9", attributes: { name: "Ada" } })

const friends = (name: string, id: string, friendId: string) =>
  resource({
    type: "person",
    id,
    attributes: { name },
    relationships: { friend: { data: one(resourceIdentifier("person", friendId)) } }
  })

describe("linkageToParams", () => {
  it.effect("merges indexed attributes with the id", () =>
    Effect.sync(() => {
      const linkage = one(resourceIdentifier("shirt", "1"))
      expect(rightOf(linkageToParams(linkage, indexResources([shirt])))).toEqual({ id: "1", size: "L" })
    }))

  it.effect("falls back to the id when the resource is not indexed", () =>
    Effect.sync(() => {
      expect(rightOf(linkageToParams(one(resourceIdentifier("shirt", "1")), indexResources([])))).toEqual({ id: "1" })
    }))

  it.effect("stops at resources already expanded in the pass", () =>
    Effect.sync(() => {
      const index = indexResources([friends("A", "a", "b"), friends("B", "b", "a")])
      expect(rightOf(linkageToParams(one(resourceIdentifier("person", "a")), index))).toEqual({
        name: "A",
        id: "a",
        friend: { name: "B", id: "b", friend: { id: "a" } }
      })
    }))

  it.effect("stops at a resource linking to itself", () =>
    Effect.sync(() => {
      const index = indexResources([friends("A", "a", "a")])
      expect(rightOf(linkageToParams(one(resourceIdentifier("person", "a")), index))).toEqual({
        name: "A",
        id: "a",
        friend: { id: "a" }
      })
    }))

  it.effect("collapses repeated references in one list", () =>
    Effect.sync(() => {
      const linkage = many([resourceIdentifier("shirt", "1"), resourceIdentifier("shirt", "1")])
      expect(rightOf(linkageToParams(linkage, indexResources([shirt])))).toEqual([{ id: "1", size: "L" }, { id: "1" }])
    }))

  it.effect("starts every call with a fresh pass", () =>
    Effect.sync(() => {
      const linkage = one(resourceIdentifier("shirt", "1"))
      const index = indexResources([shirt])
      expect(rightOf(linkageToParams(linkage, index))).toEqual(rightOf(linkageToParams(linkage, index)))
    }))

  it.effect("signals null and unset linkage differently", () =>
    Effect.sync(() => {
      expect(rightOf(linkageToParams(nullLinkage, indexResources([])))).toBeNull()
      expect(rightOf(linkageToParams(many([]), indexResources([])))).toEqual([])
      expect(leftOf(linkageToParams(unset, indexResources([])))).toEqual(linkageUnset)
      expect(leftOf(relationshipToParams({ data: unset }, indexResources([])))).toEqual(linkageUnset)
    }))

  it.effect("expands embedded resources without a lookup", () =>
    Effect.sync(() => {
      const comment = resource({
        type: "comment",
        attributes: { text: "First" },
        relationships: { author: { data: one(resourceIdentifier("person", "9")) } }
      })
      expect(rightOf(linkageToParams(many([comment]), indexResources([ada])))).toEqual([
        { text: "First", author: { name: "Ada", id: "9" } }
      ])
    }))
})

describe("resourceToParams", () => {
  it.effect("leaves out relationships whose linkage was never sent", () =>
    Effect.sync(() => {
      const article = resource({
        type: "article",
        id: "1",
        attributes: { title: "Hello" },
        relationships: {
          author: { data: unset, links: { related: "https://example.test/articles/1/author" } },
          editor: { data: nullLinkage },
          tags: { data: many([]) }
        }
      })
      expect(resourceToParams(article, indexResources([]))).toEqual({ title: "Hello", id: "1", editor: null, tags: [] })
    }))

  it.effect("collapses links back to the resource itself", () =>
    Effect.sync(() => {
      const a = friends("A", "a", "a")
      expect(resourceToParams(a, indexResources([a]))).toEqual({ name: "A", id: "a", friend: { id: "a" } })
    }))
})

describe("documentToParams", () => {
  const article = (id: string) =>
    resource({
      type: "article",
      id,
      attributes: { title: `Article ${id}` },
      relationships: { author: { data: one(resourceIdentifier("person", "9")) } }
    })

  it.effect("expands a shared resource once per document", () =>
    Effect.sync(() => {
      const document: Document = { data: many([article("1"), article("2")]), included: [ada] }
      expect(rightOf(documentToParams(document))).toEqual([
        { title: "Article 1", id: "1", author: { name: "Ada", id: "9" } },
        { title: "Article 2", id: "2", author: { id: "9" } }
      ])
    }))

  it.effect("indexes primary data alongside included resources", () =>
    Effect.sync(() => {
      const index = buildResourceIndex({ data: one(article("1")), included: [ada] })
      expect(index.get("article")?.get("1")).toEqual(article("1"))
      expect(index.get("person")?.get("9")).toEqual(ada)
    }))

  it.effect("signals documents without primary data", () =>
    Effect.sync(() => {
      expect(leftOf(documentToParams({ data: unset, meta: {} }))).toEqual(linkageUnset)
      expect(rightOf(documentToParams({ data: nullLinkage }))).toBeNull()
    }))
})
