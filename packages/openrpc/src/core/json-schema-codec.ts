import { Match } from "effect"
import * as Either from "effect/Either"

import type { Decoder, Mutable } from "./decoder.js"
import {
  arrayOf,
  boolean,
  integer,
  json,
  number,
  openObject,
  optionalFields,
  recordOf,
  requiredField,
  string,
  stringArray
} from "./decoder.js"
import type { Codec, Encoder, JsonDraft } from "./encoder.js"
import { encodeList, encodeOptional, encodeRecord, makeCodec, put } from "./encoder.js"
import { invalidShape } from "./errors.js"
import { appendExtensions, captureExtensions } from "./extensions.js"
import type { Json } from "./json.js"
import { isJsonArray, isJsonObject } from "./json.js"
import type {
  SchemaExternalDocs,
  PropsOrArray,
  PropsOrBool,
  PropsOrStringArray,
  Schema
} from "./json-schema.js"
import {
  additionalSchema,
  allows,
  propertyDependency,
  schemaDependency,
  singleItems,
  tupleItems
} from "./json-schema.js"

// CHANGE: decode and encode JSON-Schema nodes, including the either/or union fields
// WHY: union fields are discriminated by the JSON shape found at their position
// QUOTE(TZ): "items: if the value is a JSON array, decode each element as a Schema"
// REF: req-json-schema-codec-1
// FORMAT THEOREM: ∀s: decode(encode(s)) = Right(s)
// PURITY: CORE
// INVARIANT: x- fields are captured on the node that carries them, at any depth
// COMPLEXITY: O(n) where n = number of nodes

export const schemaFields: ReadonlySet<string> = new Set([
  "id",
  "$schema",
  "$ref",
  "title",
  "description",
  "type",
  "nullable",
  "format",
  "pattern",
  "maximum",
  "exclusiveMaximum",
  "minimum",
  "exclusiveMinimum",
  "multipleOf",
  "maxLength",
  "minLength",
  "maxItems",
  "minItems",
  "maxProperties",
  "minProperties",
  "uniqueItems",
  "enum",
  "required",
  "allOf",
  "oneOf",
  "anyOf",
  "not",
  "properties",
  "patternProperties",
  "items",
  "additionalItems",
  "additionalProperties",
  "dependencies",
  "definitions",
  "default",
  "example",
  "externalDocs"
])

const externalDocsFields: ReadonlySet<string> = new Set(["description", "url"])

const decodeExternalDocs: Decoder<SchemaExternalDocs> = (input, cursor) =>
  Either.gen(function*(_) {
    const object = yield* _(openObject(input, cursor, externalDocsFields))
    const docs: Mutable<SchemaExternalDocs> = {
      url: yield* _(requiredField(object, "url", cursor, string))
    }
    yield* _(optionalFields(object, cursor, docs)("description", string))
    return docs
  })

const decodeType: Decoder<string | ReadonlyArray<string>> = (input, cursor) => {
  if (typeof input === "string") {
    return Either.right(input)
  }
  if (isJsonArray(input)) {
    return stringArray(input, cursor)
  }
  return Either.left(invalidShape(cursor.path, "string or array of strings"))
}

const decodeItems: Decoder<PropsOrArray> = (input, cursor) => {
  if (isJsonArray(input)) {
    return Either.map(arrayOf(decodeSchemaNode)(input, cursor), tupleItems)
  }
  if (isJsonObject(input)) {
    return Either.map(decodeSchemaNode(input, cursor), singleItems)
  }
  return Either.left(invalidShape(cursor.path, "schema or array of schemas"))
}

const decodePropsOrBool: Decoder<PropsOrBool> = (input, cursor) => {
  if (typeof input === "boolean") {
    return Either.right(allows(input))
  }
  if (isJsonObject(input)) {
    return Either.map(decodeSchemaNode(input, cursor), additionalSchema)
  }
  return Either.left(invalidShape(cursor.path, "boolean or schema"))
}

const decodePropsOrStringArray: Decoder<PropsOrStringArray> = (input, cursor) => {
  if (isJsonArray(input)) {
    return Either.map(stringArray(input, cursor), propertyDependency)
  }
  if (isJsonObject(input)) {
    return Either.map(decodeSchemaNode(input, cursor), schemaDependency)
  }
  return Either.left(invalidShape(cursor.path, "schema or array of strings"))
}

/**
 * Decode one JSON-Schema node.
 *
 * @pure true
 * @invariant absent fields stay absent on the result
 * @complexity O(n)
 */
export const decodeSchemaNode: Decoder<Schema> = (input, cursor) =>
  Either.gen(function*(_) {
    const object = yield* _(openObject(input, cursor, schemaFields))
    const schema: Mutable<Schema> = {}
    const read = optionalFields(object, cursor, schema)
    yield* _(read("id", string))
    yield* _(read("$schema", string))
    yield* _(read("$ref", string))
    yield* _(read("title", string))
    yield* _(read("description", string))
    yield* _(read("type", decodeType))
    yield* _(read("nullable", boolean))
    yield* _(read("format", string))
    yield* _(read("pattern", string))
    yield* _(read("maximum", number))
    yield* _(read("exclusiveMaximum", boolean))
    yield* _(read("minimum", number))
    yield* _(read("exclusiveMinimum", boolean))
    yield* _(read("multipleOf", number))
    yield* _(read("maxLength", integer))
    yield* _(read("minLength", integer))
    yield* _(read("maxItems", integer))
    yield* _(read("minItems", integer))
    yield* _(read("maxProperties", integer))
    yield* _(read("minProperties", integer))
    yield* _(read("uniqueItems", boolean))
    yield* _(read("enum", arrayOf(json)))
    yield* _(read("required", stringArray))
    yield* _(read("allOf", arrayOf(decodeSchemaNode)))
    yield* _(read("oneOf", arrayOf(decodeSchemaNode)))
    yield* _(read("anyOf", arrayOf(decodeSchemaNode)))
    yield* _(read("not", decodeSchemaNode))
    yield* _(read("properties", recordOf(decodeSchemaNode)))
    yield* _(read("patternProperties", recordOf(decodeSchemaNode)))
    yield* _(read("items", decodeItems))
    yield* _(read("additionalItems", decodePropsOrBool))
    yield* _(read("additionalProperties", decodePropsOrBool))
    yield* _(read("dependencies", recordOf(decodePropsOrStringArray)))
    yield* _(read("definitions", recordOf(decodeSchemaNode)))
    yield* _(read("default", json))
    yield* _(read("example", json))
    yield* _(read("externalDocs", decodeExternalDocs))
    captureExtensions(object, schema)
    return schema
  })

const encodeExternalDocs = (docs: SchemaExternalDocs): Json => {
  const out: JsonDraft = {}
  put(out, "description", docs.description)
  put(out, "url", docs.url)
  return out
}

const encodeItems = (items: PropsOrArray): Json =>
  Match.value(items).pipe(
    Match.tag("Schema", ({ schema }) => encodeSchemaNode(schema)),
    Match.tag("Array", ({ schemas }) => encodeSchemaList(schemas)),
    Match.exhaustive
  )

const encodePropsOrBool = (value: PropsOrBool): Json =>
  Match.value(value).pipe(
    Match.tag("Allows", ({ allows: flag }) => flag),
    Match.tag("Schema", ({ schema }) => encodeSchemaNode(schema)),
    Match.exhaustive
  )

const encodePropsOrStringArray = (value: PropsOrStringArray): Json =>
  Match.value(value).pipe(
    Match.tag("Schema", ({ schema }) => encodeSchemaNode(schema)),
    Match.tag("Properties", ({ properties }) => properties),
    Match.exhaustive
  )

/** Encode one JSON-Schema node; fields are emitted only when present. */
export const encodeSchemaNode = (schema: Schema): JsonDraft => {
  const out: JsonDraft = {}
  put(out, "id", schema.id)
  put(out, "$schema", schema.$schema)
  put(out, "$ref", schema.$ref)
  put(out, "title", schema.title)
  put(out, "description", schema.description)
  put(out, "type", schema.type)
  put(out, "nullable", schema.nullable)
  put(out, "format", schema.format)
  put(out, "pattern", schema.pattern)
  put(out, "maximum", schema.maximum)
  put(out, "exclusiveMaximum", schema.exclusiveMaximum)
  put(out, "minimum", schema.minimum)
  put(out, "exclusiveMinimum", schema.exclusiveMinimum)
  put(out, "multipleOf", schema.multipleOf)
  put(out, "maxLength", schema.maxLength)
  put(out, "minLength", schema.minLength)
  put(out, "maxItems", schema.maxItems)
  put(out, "minItems", schema.minItems)
  put(out, "maxProperties", schema.maxProperties)
  put(out, "minProperties", schema.minProperties)
  put(out, "uniqueItems", schema.uniqueItems)
  put(out, "enum", schema.enum)
  put(out, "required", schema.required)
  put(out, "allOf", encodeOptional(schema.allOf, encodeSchemaList))
  put(out, "oneOf", encodeOptional(schema.oneOf, encodeSchemaList))
  put(out, "anyOf", encodeOptional(schema.anyOf, encodeSchemaList))
  put(out, "not", encodeOptional(schema.not, encodeSchemaNode))
  put(out, "properties", encodeOptional(schema.properties, encodeSchemaRecord))
  put(out, "patternProperties", encodeOptional(schema.patternProperties, encodeSchemaRecord))
  put(out, "items", encodeOptional(schema.items, encodeItems))
  put(out, "additionalItems", encodeOptional(schema.additionalItems, encodePropsOrBool))
  put(out, "additionalProperties", encodeOptional(schema.additionalProperties, encodePropsOrBool))
  put(out, "dependencies", encodeOptional(schema.dependencies, encodeRecord(encodePropsOrStringArray)))
  put(out, "definitions", encodeOptional(schema.definitions, encodeSchemaRecord))
  put(out, "default", schema.default)
  put(out, "example", schema.example)
  put(out, "externalDocs", encodeOptional(schema.externalDocs, encodeExternalDocs))
  appendExtensions(out, schema.extensions)
  return out
}

const encodeSchemaList: Encoder<ReadonlyArray<Schema>> = encodeList(encodeSchemaNode)

const encodeSchemaRecord: Encoder<Readonly<Record<string, Schema>>> = encodeRecord(encodeSchemaNode)

export const SchemaCodec: Codec<Schema> = makeCodec(decodeSchemaNode, encodeSchemaNode)
