import * as Either from "effect/Either"

import type { DecodeError } from "./errors.js"
import { invalidShape, missingRequired, unknownField } from "./errors.js"
import { isExtensionKey } from "./extensions.js"
import type { Json, JsonObject } from "./json.js"
import { isJsonArray, isJsonObject } from "./json.js"

// CHANGE: provide path-tracking decoder combinators over parsed JSON
// WHY: entity decoders share shape checks, required/optional handling and the strict/lenient policy
// REF: req-decode-1
// FORMAT THEOREM: ∀d,v,c: d(v,c) = Left(e) → e.path starts with c.path
// PURITY: CORE
// INVARIANT: decoding stops at the first error
// COMPLEXITY: O(n) where n = size of the decoded value

export type DecodeMode = "strict" | "lenient"

export interface DecodeOptions {
  readonly mode: DecodeMode
}

export const defaultDecodeOptions: DecodeOptions = { mode: "strict" }

export interface Cursor {
  readonly path: string
  readonly mode: DecodeMode
}

export type Decoder<A> = (input: Json, cursor: Cursor) => Either.Either<A, DecodeError>

export type Mutable<T> = { -readonly [K in keyof T]: T[K] }

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/

export const fieldPath = (path: string, key: string): string =>
  IDENTIFIER.test(key) ? `${path}.${key}` : `${path}[${JSON.stringify(key)}]`

export const indexPath = (path: string, index: number): string => `${path}[${index}]`

export const rootCursor = (options: DecodeOptions): Cursor => ({ path: "$", mode: options.mode })

const enter = (cursor: Cursor, path: string): Cursor => ({ ...cursor, path })

export const string: Decoder<string> = (input, cursor) =>
  typeof input === "string" ? Either.right(input) : Either.left(invalidShape(cursor.path, "string"))

export const boolean: Decoder<boolean> = (input, cursor) =>
  typeof input === "boolean" ? Either.right(input) : Either.left(invalidShape(cursor.path, "boolean"))

export const number: Decoder<number> = (input, cursor) =>
  typeof input === "number" && Number.isFinite(input)
    ? Either.right(input)
    : Either.left(invalidShape(cursor.path, "number"))

/** Whole numbers inside the safe-integer range; larger values may already have been rounded by the parse. */
export const integer: Decoder<number> = (input, cursor) =>
  typeof input === "number" && Number.isSafeInteger(input)
    ? Either.right(input)
    : Either.left(invalidShape(cursor.path, "integer"))

export const json: Decoder<Json> = (input) => Either.right(input)

export const arrayOf = <A>(item: Decoder<A>): Decoder<ReadonlyArray<A>> => (input, cursor) => {
  if (!isJsonArray(input)) {
    return Either.left(invalidShape(cursor.path, "array"))
  }
  const result: Array<A> = []
  for (let index = 0; index < input.length; index++) {
    const element = input[index]
    if (element === undefined) {
      continue
    }
    const decoded = item(element, enter(cursor, indexPath(cursor.path, index)))
    if (Either.isLeft(decoded)) {
      return Either.left(decoded.left)
    }
    result.push(decoded.right)
  }
  return Either.right(result)
}

export const recordOf = <A>(value: Decoder<A>): Decoder<Readonly<Record<string, A>>> => (input, cursor) => {
  if (!isJsonObject(input)) {
    return Either.left(invalidShape(cursor.path, "object"))
  }
  const entries: Array<readonly [string, A]> = []
  for (const [key, entry] of Object.entries(input)) {
    const decoded = value(entry, enter(cursor, fieldPath(cursor.path, key)))
    if (Either.isLeft(decoded)) {
      return Either.left(decoded.left)
    }
    entries.push([key, decoded.right])
  }
  return Either.right(Object.fromEntries(entries))
}

export const stringArray: Decoder<ReadonlyArray<string>> = arrayOf(string)

/**
 * Require an object and apply the unknown-field policy to its keys.
 *
 * `x-` keys always pass: the caller either captures them or skips them.
 */
export const openObject = (
  input: Json,
  cursor: Cursor,
  known: ReadonlySet<string>
): Either.Either<JsonObject, DecodeError> => {
  if (!isJsonObject(input)) {
    return Either.left(invalidShape(cursor.path, "object"))
  }
  if (cursor.mode === "strict") {
    const unknown = Object.keys(input).find((key) => !known.has(key) && !isExtensionKey(key))
    if (unknown !== undefined) {
      return Either.left(unknownField(fieldPath(cursor.path, unknown)))
    }
  }
  return Either.right(input)
}

export const requiredField = <A>(
  object: JsonObject,
  key: string,
  cursor: Cursor,
  decoder: Decoder<A>
): Either.Either<A, DecodeError> => {
  const path = fieldPath(cursor.path, key)
  const value = object[key]
  if (value === undefined) {
    return Either.left(missingRequired(path))
  }
  return decoder(value, enter(cursor, path))
}

export const optionalField = <A>(
  object: JsonObject,
  key: string,
  cursor: Cursor,
  decoder: Decoder<A>
): Either.Either<A | undefined, DecodeError> => {
  const value = object[key]
  if (value === undefined) {
    return Either.right(undefined)
  }
  return decoder(value, enter(cursor, fieldPath(cursor.path, key)))
}

/**
 * Bind optional-field decoding to a draft: a present field is decoded and
 * stored under the same key, an absent one leaves the draft untouched.
 */
export const optionalFields = <T extends object>(object: JsonObject, cursor: Cursor, draft: T) => {
  const read = <K extends keyof T & string>(
    key: K,
    decoder: Decoder<Exclude<T[K], undefined>>
  ): Either.Either<void, DecodeError> =>
    Either.map(optionalField(object, key, cursor, decoder), (value) => {
      if (value !== undefined) {
        draft[key] = value
      }
    })
  return read
}
