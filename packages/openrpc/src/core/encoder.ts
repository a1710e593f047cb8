import type * as Either from "effect/Either"

import type { DecodeOptions, Decoder } from "./decoder.js"
import { defaultDecodeOptions, rootCursor } from "./decoder.js"
import type { DecodeError } from "./errors.js"
import type { Json } from "./json.js"

// CHANGE: provide encoding helpers and the public codec shape
// WHY: encoders emit present fields only, so encode(decode(d)) reproduces d
// REF: req-encode-1
// FORMAT THEOREM: ∀k: value(k) = undefined → k ∉ keys(encode(x))
// PURITY: CORE
// INVARIANT: encoders never inject defaults
// COMPLEXITY: O(n)

export type JsonDraft = Record<string, Json>

export type Encoder<A> = (value: A) => Json

export interface Codec<A> {
  readonly decode: (input: Json, options?: DecodeOptions) => Either.Either<A, DecodeError>
  readonly encode: Encoder<A>
}

export const makeCodec = <A>(decoder: Decoder<A>, encoder: Encoder<A>): Codec<A> => ({
  decode: (input, options = defaultDecodeOptions) => decoder(input, rootCursor(options)),
  encode: encoder
})

export const put = (target: JsonDraft, key: string, value: Json | undefined): void => {
  if (value !== undefined) {
    target[key] = value
  }
}

export const encodeOptional = <A>(value: A | undefined, encode: Encoder<A>): Json | undefined =>
  value === undefined ? undefined : encode(value)

export const encodeList = <A>(encode: Encoder<A>): Encoder<ReadonlyArray<A>> => (values) =>
  values.map((value) => encode(value))

export const encodeRecord = <A>(encode: Encoder<A>): Encoder<Readonly<Record<string, A>>> => (record) =>
  Object.fromEntries(Object.entries(record).map(([key, value]) => [key, encode(value)] as const))
