import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import type { Json } from "../../src/core/json.js"
import {
  allows,
  allowsAdditionalItems,
  allowsAdditionalProperties,
  propsOrBoolAllows
} from "../../src/core/json-schema.js"
import { SchemaCodec } from "../../src/core/json-schema-codec.js"
import { leftOf, rightOf } from "./either-helpers.js"

describe("JSON-Schema union fields", () => {
  it.effect("decodes an items object as a single schema", () =>
    Effect.sync(() => {
      const schema = rightOf(SchemaCodec.decode({ type: "array", items: { type: "string" } }))
      expect(schema.items).toEqual({ _tag: "Schema", schema: { type: "string" } })
    }))

  it.effect("decodes an items array as one schema per position", () =>
    Effect.sync(() => {
      const schema = rightOf(SchemaCodec.decode({ items: [{ type: "integer" }, { type: "string" }] }))
      expect(schema.items).toEqual({
        _tag: "Array",
        schemas: [{ type: "integer" }, { type: "string" }]
      })
    }))

  it.effect("rejects an items value that is neither object nor array", () =>
    Effect.sync(() => {
      const error = leftOf(SchemaCodec.decode({ items: 3 }))
      expect(error).toEqual({ _tag: "InvalidShape", path: "$.items", expected: "schema or array of schemas" })
    }))

  it.effect("decodes additionalProperties as a boolean or a schema", () =>
    Effect.sync(() => {
      const closed = rightOf(SchemaCodec.decode({ additionalProperties: false }))
      const typed = rightOf(SchemaCodec.decode({ additionalProperties: { type: "number" } }))
      expect(closed.additionalProperties).toEqual({ _tag: "Allows", allows: false })
      expect(typed.additionalProperties).toEqual({ _tag: "Schema", schema: { type: "number" } })
    }))

  it.effect("treats an absent additionalProperties as allowing everything", () =>
    Effect.sync(() => {
      const schema = rightOf(SchemaCodec.decode({ type: "object" }))
      expect(schema.additionalProperties).toBeUndefined()
      expect(allowsAdditionalProperties(schema)).toEqual(allows(true))
      expect(allowsAdditionalItems(schema)).toEqual(allows(true))
      expect(propsOrBoolAllows(allowsAdditionalProperties(schema))).toBe(true)
    }))

  it.effect("rejects a string where a boolean or schema is expected", () =>
    Effect.sync(() => {
      const error = leftOf(SchemaCodec.decode({ additionalItems: "yes" }))
      expect(error).toEqual({ _tag: "InvalidShape", path: "$.additionalItems", expected: "boolean or schema" })
    }))

  it.effect("decodes dependencies as property lists or schemas", () =>
    Effect.sync(() => {
      const schema = rightOf(SchemaCodec.decode({
        dependencies: {
          card: ["billing"],
          billing: { required: ["address"] }
        }
      }))
      expect(schema.dependencies).toEqual({
        card: { _tag: "Properties", properties: ["billing"] },
        billing: { _tag: "Schema", schema: { required: ["address"] } }
      })
    }))

  it.effect("accepts type as a string or a list of strings", () =>
    Effect.sync(() => {
      expect(rightOf(SchemaCodec.decode({ type: "string" })).type).toBe("string")
      expect(rightOf(SchemaCodec.decode({ type: ["string", "null"] })).type).toEqual(["string", "null"])
      expect(leftOf(SchemaCodec.decode({ type: 1 }))).toEqual({
        _tag: "InvalidShape",
        path: "$.type",
        expected: "string or array of strings"
      })
    }))
})

describe("JSON-Schema node fields", () => {
  it.effect("keeps a zero bound distinct from an absent one", () =>
    Effect.sync(() => {
      const schema = rightOf(SchemaCodec.decode({ minimum: 0, minLength: 0, uniqueItems: false }))
      expect(schema.minimum).toBe(0)
      expect(schema.minLength).toBe(0)
      expect(schema.uniqueItems).toBe(false)
      expect("maximum" in schema).toBe(false)
      expect(SchemaCodec.encode(schema)).toEqual({ minimum: 0, minLength: 0, uniqueItems: false })
    }))

  it.effect("rejects a fractional length bound", () =>
    Effect.sync(() => {
      const error = leftOf(SchemaCodec.decode({ maxLength: 1.5 }))
      expect(error).toEqual({ _tag: "InvalidShape", path: "$.maxLength", expected: "integer" })
    }))

  it.effect("reports nested failures with their full path", () =>
    Effect.sync(() => {
      const error = leftOf(SchemaCodec.decode({ properties: { "odd key": { minLength: "x" } } }))
      expect(error).toEqual({
        _tag: "InvalidShape",
        path: "$.properties[\"odd key\"].minLength",
        expected: "integer"
      })
    }))

  it.effect("captures x- fields on nested schema nodes and re-emits them", () =>
    Effect.sync(() => {
      const input: Json = {
        type: "object",
        properties: { a: { type: "string", "x-type-hint": "ID" } },
        items: [{ type: "integer", "x-order": 1 }],
        "x-internal": true
      }
      const schema = rightOf(SchemaCodec.decode(input))
      expect(schema.extensions).toEqual({ "x-internal": true })
      expect(schema.properties?.["a"]).toEqual({ type: "string", extensions: { "x-type-hint": "ID" } })
      expect(SchemaCodec.encode(schema)).toEqual(input)
    }))

  it.effect("rejects a length bound beyond the safe-integer range", () =>
    Effect.sync(() => {
      expect(leftOf(SchemaCodec.decode({ maxLength: 2 ** 53 }))).toEqual({
        _tag: "InvalidShape",
        path: "$.maxLength",
        expected: "integer"
      })
      expect(rightOf(SchemaCodec.decode({ maxLength: Number.MAX_SAFE_INTEGER })).maxLength).toBe(
        Number.MAX_SAFE_INTEGER
      )
    }))

  it.effect("rejects unknown keywords in strict mode and ignores them in lenient mode", () =>
    Effect.sync(() => {
      const input: Json = { type: "string", const: "a" }
      expect(leftOf(SchemaCodec.decode(input))).toEqual({ _tag: "UnknownField", path: "$.const" })
      expect(rightOf(SchemaCodec.decode(input, { mode: "lenient" }))).toEqual({ type: "string" })
    }))

  it.effect("re-encodes a nested schema to the same JSON", () =>
    Effect.sync(() => {
      const input: Json = {
        title: "Pet",
        type: ["object", "null"],
        required: ["name"],
        properties: {
          name: { type: "string", minLength: 1 },
          tags: { type: "array", items: { type: "string" }, uniqueItems: true },
          pair: { type: "array", items: [{ type: "integer" }, { type: "string" }], additionalItems: false }
        },
        additionalProperties: { type: "number" },
        dependencies: { name: ["tags"], tags: { required: ["pair"] } },
        definitions: { id: { type: "integer", minimum: 1, exclusiveMinimum: true } },
        enum: [null, 1, "a"],
        default: { name: "rex" },
        externalDocs: { url: "https://example.com/pet" }
      }
      expect(SchemaCodec.encode(rightOf(SchemaCodec.decode(input)))).toEqual(input)
    }))
})
