import { Brand, Match } from "effect"
import * as Option from "effect/Option"

import type { Extensible } from "./extensions.js"
import type { Json } from "./json.js"
import type { Schema } from "./json-schema.js"

// CHANGE: define the OpenRPC document object graph
// WHY: callers decode a document, inspect it and re-encode it without loss
// QUOTE(TZ): "The OpenRPC Specification defines a standard, programming language-agnostic interface description for JSON-RPC 2.0 APIs."
// REF: req-openrpc-model-1
// PURITY: CORE
// INVARIANT: entities are readonly values with no parent back-references
// COMPLEXITY: O(1)/O(1)

/** Root object of an OpenRPC document. */
export interface OpenRpcDocument extends Extensible {
  /** Semantic version of the OpenRPC specification the document follows. */
  readonly openrpc: string
  readonly info: Info
  /** Absent or empty means a single `localhost` server; see `effectiveServers`. */
  readonly servers?: ReadonlyArray<Server>
  /** Required, possibly empty. */
  readonly methods: ReadonlyArray<Method>
  readonly components?: Components
  readonly externaldocs?: ExternalDocumentation
}

export interface Info extends Extensible {
  readonly title: string
  readonly description?: string
  readonly termsOfService?: string
  readonly contact?: Contact
  readonly license?: License
  readonly version: string
}

export interface Contact extends Extensible {
  readonly name?: string
  readonly url?: string
  readonly email?: string
}

export interface License extends Extensible {
  readonly name: string
  readonly url?: string
}

export interface Server extends Extensible {
  readonly name: string
  /** May contain `{variable}` tokens substituted from `variables`. */
  readonly url: string
  readonly summary?: string
  readonly description?: string
  readonly variables?: Readonly<Record<string, ServerVariable>>
}

export interface ServerVariable extends Extensible {
  readonly enum?: ReadonlyArray<string>
  readonly default: string
  readonly description?: string
}

/** Expected format of the JSON-RPC `params` member. */
export const ParamStructure = {
  ByPosition: 0,
  ByName: 1,
  Either: 2
} as const

export type ParamStructure = (typeof ParamStructure)[keyof typeof ParamStructure]

/**
 * Textual form of a param structure. Values outside the enumeration render
 * as their decimal string.
 */
export const renderParamStructure = (value: number): string =>
  Match.value(value).pipe(
    Match.when(ParamStructure.ByPosition, () => "by-position"),
    Match.when(ParamStructure.ByName, () => "by-name"),
    Match.when(ParamStructure.Either, () => "either"),
    Match.orElse((other) => String(other))
  )

export const parseParamStructure = (text: string): Option.Option<ParamStructure> =>
  Match.value(text).pipe(
    Match.when("by-position", () => Option.some<ParamStructure>(ParamStructure.ByPosition)),
    Match.when("by-name", () => Option.some<ParamStructure>(ParamStructure.ByName)),
    Match.when("either", () => Option.some<ParamStructure>(ParamStructure.Either)),
    Match.orElse(() => Option.none())
  )

export interface Method extends Extensible {
  /** Unique within the document; the JSON-RPC `method` member. */
  readonly name: string
  readonly tags?: ReadonlyArray<Tag | Reference>
  readonly summary?: string
  readonly description?: string
  readonly externaldocs?: ExternalDocumentation
  /** Required params come before optional ones. */
  readonly params: ReadonlyArray<ContentDescriptor | Reference>
  readonly result: ContentDescriptor | Reference
  readonly deprecated?: boolean
  readonly servers?: ReadonlyArray<Server>
  readonly errors?: ReadonlyArray<ErrorObject | Reference>
  readonly links?: ReadonlyArray<Link | Reference>
  readonly paramStructure?: ParamStructure
  readonly examples?: ReadonlyArray<ExamplePairing | Reference>
}

export const paramStructureOf = (method: Method): ParamStructure =>
  method.paramStructure ?? ParamStructure.ByPosition

export interface ContentDescriptor extends Extensible {
  readonly examples?: ReadonlyArray<ExamplePairing>
  readonly name: string
  readonly summary?: string
  readonly description?: string
  readonly schema: JSONSchema
  readonly required?: boolean
  readonly deprecated?: boolean
}

export const isRequired = (descriptor: ContentDescriptor): boolean => descriptor.required ?? false

export const isDeprecated = (entity: { readonly deprecated?: boolean }): boolean => entity.deprecated ?? false

/** A JSON-Schema node plus the extensions found beside its keywords. */
export interface JSONSchema extends Extensible {
  readonly schema: Schema
}

export interface ExamplePairing extends Extensible {
  readonly name?: string
  readonly description?: string
  readonly summary?: string
  readonly params?: ReadonlyArray<Example>
  readonly result?: Example
}

/**
 * Fields shared by both example shapes. `summary` is read from and written to
 * the `summary` key; documents that put the summary under `tags` fail strict
 * decoding with `UnknownField`.
 */
export interface ExampleFields extends Extensible {
  readonly name?: string
  readonly summary?: string
  readonly description?: string
}

/** `value` and `externalValue` never appear together. */
export type Example =
  | (ExampleFields & { readonly value?: Json; readonly externalValue?: never })
  | (ExampleFields & { readonly externalValue?: string; readonly value?: never })

/** A constant or a runtime expression evaluated when the link is followed. */
export type RuntimeExpression = string

export interface Link extends Extensible {
  readonly name: string
  readonly description?: string
  readonly summary?: string
  readonly method?: string
  readonly params?: Readonly<Record<string, RuntimeExpression>>
  readonly server?: Server
}

export type ErrorCode = number & Brand.Brand<"ErrorCode">

/** Any integer is an error code; the named constants below are the pre-defined ones. */
export const ErrorCode = Brand.refined<ErrorCode>(
  (value) => Number.isInteger(value),
  (value) => Brand.error(`Expected ${value} to be an integer error code`)
)

export const ParseError = ErrorCode(-32700)
export const InvalidRequest = ErrorCode(-32600)
export const MethodNotFound = ErrorCode(-32601)
export const InvalidParams = ErrorCode(-32602)
export const InternalError = ErrorCode(-32603)

export const RESERVED_ERROR_RANGE = { min: -32768, max: -32000 } as const
export const SERVER_ERROR_RANGE = { min: -32099, max: -32000 } as const

export const isReservedErrorCode = (code: number): boolean =>
  code >= RESERVED_ERROR_RANGE.min && code <= RESERVED_ERROR_RANGE.max

/** Implementation-defined server errors; application errors must stay out of this range. */
export const isServerErrorCode = (code: number): boolean =>
  code >= SERVER_ERROR_RANGE.min && code <= SERVER_ERROR_RANGE.max

/** Application level error. Named to keep the global `Error` visible. */
export interface ErrorObject extends Extensible {
  readonly code: ErrorCode
  readonly message: string
  readonly data?: Json
}

/** Reusable objects; nothing here takes effect unless referenced. */
export interface Components extends Extensible {
  readonly contentDescriptors?: Readonly<Record<string, ContentDescriptor>>
  readonly schemas?: Readonly<Record<string, JSONSchema>>
  readonly examples?: Readonly<Record<string, Example>>
  readonly links?: Readonly<Record<string, Link>>
  readonly errors?: Readonly<Record<string, ErrorObject>>
  readonly examplePairingObjects?: Readonly<Record<string, ExamplePairing>>
  readonly tags?: Readonly<Record<string, Tag>>
}

export interface Tag extends Extensible {
  readonly name: string
  readonly summary?: string
  readonly description?: string
  readonly externaldocs?: ExternalDocumentation
}

export interface ExternalDocumentation extends Extensible {
  readonly description?: string
  readonly url: string
}

/** A `$ref` pointer, with any `x-` keys found beside it. Resolution is left to the caller. */
export interface Reference extends Extensible {
  readonly $ref: string
}

/** Conditional content descriptor. */
export interface OneOf {
  readonly oneOf: ContentDescriptor
}
