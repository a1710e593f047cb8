import { Match } from "effect"

// CHANGE: unify the decode error algebra and the document IO error algebra
// WHY: every decode failure carries a field path and is reported, never thrown
// REF: req-errors-1
// FORMAT THEOREM: ∀e ∈ AppError: e._tag is stable and exhaustively matchable
// PURITY: CORE
// INVARIANT: error tags are unique
// COMPLEXITY: O(1)/O(1)

export type MalformedJson = { readonly _tag: "MalformedJson"; readonly message: string }
export type InvalidShape = {
  readonly _tag: "InvalidShape"
  readonly path: string
  readonly expected: string
}
export type UnknownField = { readonly _tag: "UnknownField"; readonly path: string }
export type MissingRequired = { readonly _tag: "MissingRequired"; readonly path: string }

export type DecodeError = MalformedJson | InvalidShape | UnknownField | MissingRequired

export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }
export type FileError = { readonly _tag: "FileError"; readonly message: string }
export type DocumentError = {
  readonly _tag: "DocumentError"
  readonly file: string
  readonly error: DecodeError
}

export type AppError = ConfigError | FileError | DocumentError

export const malformedJson = (message: string): MalformedJson => ({
  _tag: "MalformedJson",
  message
})

export const invalidShape = (path: string, expected: string): InvalidShape => ({
  _tag: "InvalidShape",
  path,
  expected
})

export const unknownField = (path: string): UnknownField => ({
  _tag: "UnknownField",
  path
})

export const missingRequired = (path: string): MissingRequired => ({
  _tag: "MissingRequired",
  path
})

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const fileError = (message: string): FileError => ({
  _tag: "FileError",
  message
})

export const documentError = (file: string, error: DecodeError): DocumentError => ({
  _tag: "DocumentError",
  file,
  error
})

export const renderDecodeError = (error: DecodeError): string =>
  Match.value(error).pipe(
    Match.tag("MalformedJson", ({ message }) => `malformed JSON: ${message}`),
    Match.tag("InvalidShape", ({ expected, path }) => `${path}: expected ${expected}`),
    Match.tag("UnknownField", ({ path }) => `${path}: unknown field`),
    Match.tag("MissingRequired", ({ path }) => `${path}: missing required field`),
    Match.exhaustive
  )

export const renderAppError = (error: AppError): string =>
  Match.value(error).pipe(
    Match.tag("ConfigError", ({ message }) => `invalid config: ${message}`),
    Match.tag("FileError", ({ message }) => message),
    Match.tag("DocumentError", ({ error: cause, file }) => `${file}: ${renderDecodeError(cause)}`),
    Match.exhaustive
  )
