import type { Extensible } from "./extensions.js"
import type { Json } from "./json.js"

// CHANGE: define the JSON-Schema Draft 4 node embedded in OpenRPC documents
// WHY: parameter and result types are described with this subset
// QUOTE(TZ): "The Schema Object allows the definition of input and output data types."
// REF: req-json-schema-1
// PURITY: CORE
// INVARIANT: an absent optional field is never conflated with a zero/false/empty value
// COMPLEXITY: O(1)/O(1)

/**
 * One JSON-Schema node. Every field is optional; absence means "no constraint".
 * `x-` keys on the node land in `extensions`.
 */
export interface Schema extends Extensible {
  readonly id?: string
  readonly $schema?: string
  readonly $ref?: string
  readonly title?: string
  readonly description?: string
  readonly type?: string | ReadonlyArray<string>
  readonly nullable?: boolean
  readonly format?: string
  readonly pattern?: string
  readonly maximum?: number
  readonly exclusiveMaximum?: boolean
  readonly minimum?: number
  readonly exclusiveMinimum?: boolean
  readonly multipleOf?: number
  readonly maxLength?: number
  readonly minLength?: number
  readonly maxItems?: number
  readonly minItems?: number
  readonly maxProperties?: number
  readonly minProperties?: number
  readonly uniqueItems?: boolean
  readonly enum?: ReadonlyArray<Json>
  readonly required?: ReadonlyArray<string>
  readonly allOf?: ReadonlyArray<Schema>
  readonly oneOf?: ReadonlyArray<Schema>
  readonly anyOf?: ReadonlyArray<Schema>
  readonly not?: Schema
  readonly properties?: Readonly<Record<string, Schema>>
  readonly patternProperties?: Readonly<Record<string, Schema>>
  readonly items?: PropsOrArray
  readonly additionalItems?: PropsOrBool
  readonly additionalProperties?: PropsOrBool
  readonly dependencies?: Dependencies
  readonly definitions?: Definitions
  readonly default?: Json
  readonly example?: Json
  readonly externalDocs?: SchemaExternalDocs
}

/** `items`: a single schema for every element, or one schema per position. */
export type PropsOrArray =
  | { readonly _tag: "Schema"; readonly schema: Schema }
  | { readonly _tag: "Array"; readonly schemas: ReadonlyArray<Schema> }

/** `additionalProperties` / `additionalItems`: a boolean switch or a schema. */
export type PropsOrBool =
  | { readonly _tag: "Allows"; readonly allows: boolean }
  | { readonly _tag: "Schema"; readonly schema: Schema }

/** A `dependencies` entry: a schema, or the property names that must be present. */
export type PropsOrStringArray =
  | { readonly _tag: "Schema"; readonly schema: Schema }
  | { readonly _tag: "Properties"; readonly properties: ReadonlyArray<string> }

export type Dependencies = Readonly<Record<string, PropsOrStringArray>>

export type Definitions = Readonly<Record<string, Schema>>

export interface SchemaExternalDocs {
  readonly description?: string
  readonly url: string
}

export const singleItems = (schema: Schema): PropsOrArray => ({ _tag: "Schema", schema })

export const tupleItems = (schemas: ReadonlyArray<Schema>): PropsOrArray => ({ _tag: "Array", schemas })

export const allows = (value: boolean): PropsOrBool => ({ _tag: "Allows", allows: value })

export const additionalSchema = (schema: Schema): PropsOrBool => ({ _tag: "Schema", schema })

export const schemaDependency = (schema: Schema): PropsOrStringArray => ({ _tag: "Schema", schema })

export const propertyDependency = (properties: ReadonlyArray<string>): PropsOrStringArray => ({
  _tag: "Properties",
  properties
})

const allowAll: PropsOrBool = allows(true)

/** Effective `additionalProperties`: an absent field allows everything. */
export const allowsAdditionalProperties = (schema: Schema): PropsOrBool =>
  schema.additionalProperties ?? allowAll

/** Effective `additionalItems`: an absent field allows everything. */
export const allowsAdditionalItems = (schema: Schema): PropsOrBool => schema.additionalItems ?? allowAll

/**
 * Boolean reading of a PropsOrBool. The schema variant reports `true`; it only
 * matters for display since the schema itself constrains the extra members.
 */
export const propsOrBoolAllows = (value: PropsOrBool): boolean =>
  value._tag === "Allows" ? value.allows : true
