import * as Schema from "@effect/schema/Schema"
import * as TreeFormatter from "@effect/schema/TreeFormatter"
import * as Either from "effect/Either"

import type { DecodeOptions } from "./decoder.js"
import { defaultDecodeOptions, rootCursor } from "./decoder.js"
import type { DecodeError, MalformedJson } from "./errors.js"
import { malformedJson } from "./errors.js"
import type { Json } from "./json.js"
import type { OpenRpcDocument } from "./openrpc.js"
import { decodeOpenRpcDocument, encodeOpenRpcDocument } from "./openrpc-codec.js"

// CHANGE: expose the JSON text boundary for whole documents
// WHY: malformed text is reported before any field is looked at
// REF: req-document-io-1
// FORMAT THEOREM: ∀t: parseDocument(t) = Right(d) → stringifyDocument(d) parses to encode(d)
// PURITY: CORE
// INVARIANT: no partial result is returned for malformed JSON
// COMPLEXITY: O(n) where n = text length

const JsonSchema: Schema.Schema<Json> = Schema.suspend(() =>
  Schema.Union(
    Schema.Null,
    Schema.Boolean,
    Schema.Number,
    Schema.String,
    Schema.Array(JsonSchema),
    Schema.Record({ key: Schema.String, value: JsonSchema })
  )
)

const JsonParseSchema = Schema.parseJson(JsonSchema)

export const parseJsonText = (text: string): Either.Either<Json, MalformedJson> =>
  Either.mapLeft(
    Schema.decodeUnknownEither(JsonParseSchema)(text),
    (error) => malformedJson(TreeFormatter.formatErrorSync(error))
  )

export const decodeDocument = (
  input: Json,
  options: DecodeOptions = defaultDecodeOptions
): Either.Either<OpenRpcDocument, DecodeError> => decodeOpenRpcDocument(input, rootCursor(options))

export const encodeDocument = (document: OpenRpcDocument): Json => encodeOpenRpcDocument(document)

/**
 * Parse and decode an OpenRPC document from JSON text.
 *
 * @pure true
 * @invariant MalformedJson is returned before any decode error
 * @complexity O(n)
 */
export const parseDocument = (
  text: string,
  options: DecodeOptions = defaultDecodeOptions
): Either.Either<OpenRpcDocument, DecodeError> =>
  Either.flatMap(parseJsonText(text), (value) => decodeDocument(value, options))

export const stringifyDocument = (document: OpenRpcDocument, indent = 2): string =>
  `${JSON.stringify(encodeDocument(document), null, indent)}\n`
