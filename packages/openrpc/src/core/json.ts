// CHANGE: introduce a JSON domain type for opaque document values
// WHY: enum/default/example/data payloads are carried without interpretation
// REF: req-json-1
// PURITY: CORE
// INVARIANT: Json is closed under array/object nesting with primitive leaves
// COMPLEXITY: O(1)/O(1)

export type Json =
  | null
  | boolean
  | number
  | string
  | ReadonlyArray<Json>
  | { readonly [key: string]: Json }

export type JsonObject = { readonly [key: string]: Json }

export const isJsonObject = (value: Json): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value)

export const isJsonArray = (value: Json): value is ReadonlyArray<Json> => Array.isArray(value)
