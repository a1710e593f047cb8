import * as Either from "effect/Either"

import type { Decoder, Mutable } from "./decoder.js"
import {
  arrayOf,
  boolean,
  integer,
  json,
  openObject,
  optionalField,
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
import { isJsonObject } from "./json.js"
import { decodeSchemaNode, encodeSchemaNode, schemaFields } from "./json-schema-codec.js"
import type {
  Components,
  Contact,
  ContentDescriptor,
  ErrorObject,
  Example,
  ExampleFields,
  ExamplePairing,
  ExternalDocumentation,
  Info,
  JSONSchema,
  License,
  Link,
  Method,
  OneOf,
  OpenRpcDocument,
  ParamStructure,
  Reference,
  Server,
  ServerVariable,
  Tag
} from "./openrpc.js"
import { ErrorCode, parseParamStructure, renderParamStructure } from "./openrpc.js"
import { isReference } from "./references.js"

// CHANGE: decode and encode every OpenRPC object, capturing x- extensions
// WHY: the document must survive decode → inspect → encode without loss
// QUOTE(TZ): "This object MAY be extended with Specification Extensions."
// REF: req-openrpc-codec-1
// FORMAT THEOREM: ∀d accepted in strict mode: encode(decode(d)) ≡ d up to key order
// PURITY: CORE
// INVARIANT: extensions are re-emitted after the named fields, in captured order
// COMPLEXITY: O(n) where n = document size

const fields = (...names: ReadonlyArray<string>): ReadonlySet<string> => new Set(names)

const documentFields = fields("openrpc", "info", "servers", "methods", "components", "externaldocs")
const infoFields = fields("title", "description", "termsOfService", "contact", "license", "version")
const contactFields = fields("name", "url", "email")
const licenseFields = fields("name", "url")
const serverFields = fields("name", "url", "summary", "description", "variables")
const serverVariableFields = fields("enum", "default", "description")
const methodFields = fields(
  "name",
  "tags",
  "summary",
  "description",
  "externaldocs",
  "params",
  "result",
  "deprecated",
  "servers",
  "errors",
  "links",
  "paramStructure",
  "examples"
)
const contentDescriptorFields = fields(
  "examples",
  "name",
  "summary",
  "description",
  "schema",
  "required",
  "deprecated"
)
const examplePairingFields = fields("name", "description", "summary", "params", "result")
const exampleFields = fields("name", "summary", "description", "value", "externalValue")
const linkFields = fields("name", "description", "summary", "method", "params", "server")
const errorFields = fields("code", "message", "data")
const componentsFields = fields(
  "contentDescriptors",
  "schemas",
  "examples",
  "links",
  "errors",
  "examplePairingObjects",
  "tags"
)
const tagFields = fields("name", "summary", "description", "externaldocs")
const externalDocsFields = fields("description", "url")
const referenceFields = fields("$ref")
const oneOfFields = fields("oneOf")

// Decoders

export const decodeReference: Decoder<Reference> = (input, cursor) =>
  Either.gen(function*(_) {
    const object = yield* _(openObject(input, cursor, referenceFields))
    const reference: Mutable<Reference> = { $ref: yield* _(requiredField(object, "$ref", cursor, string)) }
    captureExtensions(object, reference)
    return reference
  })

/** An object holding a `$ref` key decodes as a Reference; anything else goes to `decoder`. */
const orReference = <A>(decoder: Decoder<A>): Decoder<A | Reference> => (input, cursor) =>
  isJsonObject(input) && input["$ref"] !== undefined ? decodeReference(input, cursor) : decoder(input, cursor)

export const decodeExternalDocumentation: Decoder<ExternalDocumentation> = (input, cursor) =>
  Either.gen(function*(_) {
    const object = yield* _(openObject(input, cursor, externalDocsFields))
    const docs: Mutable<ExternalDocumentation> = {
      url: yield* _(requiredField(object, "url", cursor, string))
    }
    yield* _(optionalFields(object, cursor, docs)("description", string))
    captureExtensions(object, docs)
    return docs
  })

export const decodeContact: Decoder<Contact> = (input, cursor) =>
  Either.gen(function*(_) {
    const object = yield* _(openObject(input, cursor, contactFields))
    const contact: Mutable<Contact> = {}
    const read = optionalFields(object, cursor, contact)
    yield* _(read("name", string))
    yield* _(read("url", string))
    yield* _(read("email", string))
    captureExtensions(object, contact)
    return contact
  })

export const decodeLicense: Decoder<License> = (input, cursor) =>
  Either.gen(function*(_) {
    const object = yield* _(openObject(input, cursor, licenseFields))
    const license: Mutable<License> = {
      name: yield* _(requiredField(object, "name", cursor, string))
    }
    yield* _(optionalFields(object, cursor, license)("url", string))
    captureExtensions(object, license)
    return license
  })

export const decodeInfo: Decoder<Info> = (input, cursor) =>
  Either.gen(function*(_) {
    const object = yield* _(openObject(input, cursor, infoFields))
    const info: Mutable<Info> = {
      title: yield* _(requiredField(object, "title", cursor, string)),
      version: yield* _(requiredField(object, "version", cursor, string))
    }
    const read = optionalFields(object, cursor, info)
    yield* _(read("description", string))
    yield* _(read("termsOfService", string))
    yield* _(read("contact", decodeContact))
    yield* _(read("license", decodeLicense))
    captureExtensions(object, info)
    return info
  })

export const decodeServerVariable: Decoder<ServerVariable> = (input, cursor) =>
  Either.gen(function*(_) {
    const object = yield* _(openObject(input, cursor, serverVariableFields))
    const variable: Mutable<ServerVariable> = {
      default: yield* _(requiredField(object, "default", cursor, string))
    }
    const read = optionalFields(object, cursor, variable)
    yield* _(read("enum", stringArray))
    yield* _(read("description", string))
    captureExtensions(object, variable)
    return variable
  })

export const decodeServer: Decoder<Server> = (input, cursor) =>
  Either.gen(function*(_) {
    const object = yield* _(openObject(input, cursor, serverFields))
    const server: Mutable<Server> = {
      name: yield* _(requiredField(object, "name", cursor, string)),
      url: yield* _(requiredField(object, "url", cursor, string))
    }
    const read = optionalFields(object, cursor, server)
    yield* _(read("summary", string))
    yield* _(read("description", string))
    yield* _(read("variables", recordOf(decodeServerVariable)))
    captureExtensions(object, server)
    return server
  })

export const decodeJsonSchema: Decoder<JSONSchema> = (input, cursor) =>
  Either.gen(function*(_) {
    const object = yield* _(openObject(input, cursor, schemaFields))
    const { extensions, ...schema } = yield* _(decodeSchemaNode(object, cursor))
    return extensions === undefined ? { schema } : { schema, extensions }
  })

export const decodeExample: Decoder<Example> = (input, cursor) =>
  Either.gen(function*(_) {
    const object = yield* _(openObject(input, cursor, exampleFields))
    const base: Mutable<ExampleFields> = {}
    const read = optionalFields(object, cursor, base)
    yield* _(read("name", string))
    yield* _(read("summary", string))
    yield* _(read("description", string))
    captureExtensions(object, base)
    const value = yield* _(optionalField(object, "value", cursor, json))
    const externalValue = yield* _(optionalField(object, "externalValue", cursor, string))
    if (value !== undefined && externalValue !== undefined) {
      return yield* _(Either.left(invalidShape(cursor.path, "either value or externalValue, not both")))
    }
    if (value !== undefined) {
      return { ...base, value }
    }
    if (externalValue !== undefined) {
      return { ...base, externalValue }
    }
    return base
  })

export const decodeExamplePairing: Decoder<ExamplePairing> = (input, cursor) =>
  Either.gen(function*(_) {
    const object = yield* _(openObject(input, cursor, examplePairingFields))
    const pairing: Mutable<ExamplePairing> = {}
    const read = optionalFields(object, cursor, pairing)
    yield* _(read("name", string))
    yield* _(read("description", string))
    yield* _(read("summary", string))
    yield* _(read("params", arrayOf(decodeExample)))
    yield* _(read("result", decodeExample))
    captureExtensions(object, pairing)
    return pairing
  })

export const decodeContentDescriptor: Decoder<ContentDescriptor> = (input, cursor) =>
  Either.gen(function*(_) {
    const object = yield* _(openObject(input, cursor, contentDescriptorFields))
    const descriptor: Mutable<ContentDescriptor> = {
      name: yield* _(requiredField(object, "name", cursor, string)),
      schema: yield* _(requiredField(object, "schema", cursor, decodeJsonSchema))
    }
    const read = optionalFields(object, cursor, descriptor)
    yield* _(read("examples", arrayOf(decodeExamplePairing)))
    yield* _(read("summary", string))
    yield* _(read("description", string))
    yield* _(read("required", boolean))
    yield* _(read("deprecated", boolean))
    captureExtensions(object, descriptor)
    return descriptor
  })

export const decodeLink: Decoder<Link> = (input, cursor) =>
  Either.gen(function*(_) {
    const object = yield* _(openObject(input, cursor, linkFields))
    const link: Mutable<Link> = {
      name: yield* _(requiredField(object, "name", cursor, string))
    }
    const read = optionalFields(object, cursor, link)
    yield* _(read("description", string))
    yield* _(read("summary", string))
    yield* _(read("method", string))
    yield* _(read("params", recordOf(string)))
    yield* _(read("server", decodeServer))
    captureExtensions(object, link)
    return link
  })

const decodeErrorCode: Decoder<ErrorCode> = (input, cursor) => Either.map(integer(input, cursor), ErrorCode)

export const decodeError: Decoder<ErrorObject> = (input, cursor) =>
  Either.gen(function*(_) {
    const object = yield* _(openObject(input, cursor, errorFields))
    const error: Mutable<ErrorObject> = {
      code: yield* _(requiredField(object, "code", cursor, decodeErrorCode)),
      message: yield* _(requiredField(object, "message", cursor, string))
    }
    yield* _(optionalFields(object, cursor, error)("data", json))
    captureExtensions(object, error)
    return error
  })

export const decodeTag: Decoder<Tag> = (input, cursor) =>
  Either.gen(function*(_) {
    const object = yield* _(openObject(input, cursor, tagFields))
    const tag: Mutable<Tag> = {
      name: yield* _(requiredField(object, "name", cursor, string))
    }
    const read = optionalFields(object, cursor, tag)
    yield* _(read("summary", string))
    yield* _(read("description", string))
    yield* _(read("externaldocs", decodeExternalDocumentation))
    captureExtensions(object, tag)
    return tag
  })

const decodeParamStructure: Decoder<ParamStructure> = (input, cursor) =>
  Either.flatMap(string(input, cursor), (text) =>
    Either.fromOption(
      parseParamStructure(text),
      () => invalidShape(cursor.path, "\"by-position\", \"by-name\" or \"either\"")
    ))

export const decodeMethod: Decoder<Method> = (input, cursor) =>
  Either.gen(function*(_) {
    const object = yield* _(openObject(input, cursor, methodFields))
    const method: Mutable<Method> = {
      name: yield* _(requiredField(object, "name", cursor, string)),
      params: yield* _(requiredField(object, "params", cursor, arrayOf(orReference(decodeContentDescriptor)))),
      result: yield* _(requiredField(object, "result", cursor, orReference(decodeContentDescriptor)))
    }
    const read = optionalFields(object, cursor, method)
    yield* _(read("tags", arrayOf(orReference(decodeTag))))
    yield* _(read("summary", string))
    yield* _(read("description", string))
    yield* _(read("externaldocs", decodeExternalDocumentation))
    yield* _(read("deprecated", boolean))
    yield* _(read("servers", arrayOf(decodeServer)))
    yield* _(read("errors", arrayOf(orReference(decodeError))))
    yield* _(read("links", arrayOf(orReference(decodeLink))))
    yield* _(read("paramStructure", decodeParamStructure))
    yield* _(read("examples", arrayOf(orReference(decodeExamplePairing))))
    captureExtensions(object, method)
    return method
  })

export const decodeComponents: Decoder<Components> = (input, cursor) =>
  Either.gen(function*(_) {
    const object = yield* _(openObject(input, cursor, componentsFields))
    const components: Mutable<Components> = {}
    const read = optionalFields(object, cursor, components)
    yield* _(read("contentDescriptors", recordOf(decodeContentDescriptor)))
    yield* _(read("schemas", recordOf(decodeJsonSchema)))
    yield* _(read("examples", recordOf(decodeExample)))
    yield* _(read("links", recordOf(decodeLink)))
    yield* _(read("errors", recordOf(decodeError)))
    yield* _(read("examplePairingObjects", recordOf(decodeExamplePairing)))
    yield* _(read("tags", recordOf(decodeTag)))
    captureExtensions(object, components)
    return components
  })

export const decodeOneOf: Decoder<OneOf> = (input, cursor) =>
  Either.gen(function*(_) {
    const object = yield* _(openObject(input, cursor, oneOfFields))
    return { oneOf: yield* _(requiredField(object, "oneOf", cursor, decodeContentDescriptor)) }
  })

/**
 * Decode a whole OpenRPC document.
 *
 * @pure true
 * @invariant the first failure is returned with its field path
 * @complexity O(n)
 */
export const decodeOpenRpcDocument: Decoder<OpenRpcDocument> = (input, cursor) =>
  Either.gen(function*(_) {
    const object = yield* _(openObject(input, cursor, documentFields))
    const document: Mutable<OpenRpcDocument> = {
      openrpc: yield* _(requiredField(object, "openrpc", cursor, string)),
      info: yield* _(requiredField(object, "info", cursor, decodeInfo)),
      methods: yield* _(requiredField(object, "methods", cursor, arrayOf(decodeMethod)))
    }
    const read = optionalFields(object, cursor, document)
    yield* _(read("servers", arrayOf(decodeServer)))
    yield* _(read("components", decodeComponents))
    yield* _(read("externaldocs", decodeExternalDocumentation))
    captureExtensions(object, document)
    return document
  })

// Encoders

export const encodeReference = (reference: Reference): Json => {
  const out: JsonDraft = { $ref: reference.$ref }
  appendExtensions(out, reference.extensions)
  return out
}

const orReferenceEncoder = <A extends object>(encode: Encoder<A>): Encoder<A | Reference> => (value) =>
  isReference(value) ? encodeReference(value) : encode(value)

export const encodeExternalDocumentation = (docs: ExternalDocumentation): Json => {
  const out: JsonDraft = {}
  put(out, "description", docs.description)
  put(out, "url", docs.url)
  appendExtensions(out, docs.extensions)
  return out
}

export const encodeContact = (contact: Contact): Json => {
  const out: JsonDraft = {}
  put(out, "name", contact.name)
  put(out, "url", contact.url)
  put(out, "email", contact.email)
  appendExtensions(out, contact.extensions)
  return out
}

export const encodeLicense = (license: License): Json => {
  const out: JsonDraft = {}
  put(out, "name", license.name)
  put(out, "url", license.url)
  appendExtensions(out, license.extensions)
  return out
}

export const encodeInfo = (info: Info): Json => {
  const out: JsonDraft = {}
  put(out, "title", info.title)
  put(out, "description", info.description)
  put(out, "termsOfService", info.termsOfService)
  put(out, "contact", encodeOptional(info.contact, encodeContact))
  put(out, "license", encodeOptional(info.license, encodeLicense))
  put(out, "version", info.version)
  appendExtensions(out, info.extensions)
  return out
}

export const encodeServerVariable = (variable: ServerVariable): Json => {
  const out: JsonDraft = {}
  put(out, "enum", variable.enum)
  put(out, "default", variable.default)
  put(out, "description", variable.description)
  appendExtensions(out, variable.extensions)
  return out
}

export const encodeServer = (server: Server): Json => {
  const out: JsonDraft = {}
  put(out, "name", server.name)
  put(out, "url", server.url)
  put(out, "summary", server.summary)
  put(out, "description", server.description)
  put(out, "variables", encodeOptional(server.variables, encodeRecord(encodeServerVariable)))
  appendExtensions(out, server.extensions)
  return out
}

export const encodeJsonSchema = (wrapper: JSONSchema): Json => {
  const out = encodeSchemaNode(wrapper.schema)
  appendExtensions(out, wrapper.extensions)
  return out
}

export const encodeExample = (example: Example): Json => {
  const out: JsonDraft = {}
  put(out, "name", example.name)
  put(out, "summary", example.summary)
  put(out, "description", example.description)
  put(out, "value", example.value)
  put(out, "externalValue", example.externalValue)
  appendExtensions(out, example.extensions)
  return out
}

export const encodeExamplePairing = (pairing: ExamplePairing): Json => {
  const out: JsonDraft = {}
  put(out, "name", pairing.name)
  put(out, "description", pairing.description)
  put(out, "summary", pairing.summary)
  put(out, "params", encodeOptional(pairing.params, encodeList(encodeExample)))
  put(out, "result", encodeOptional(pairing.result, encodeExample))
  appendExtensions(out, pairing.extensions)
  return out
}

export const encodeContentDescriptor = (descriptor: ContentDescriptor): Json => {
  const out: JsonDraft = {}
  put(out, "examples", encodeOptional(descriptor.examples, encodeList(encodeExamplePairing)))
  put(out, "name", descriptor.name)
  put(out, "summary", descriptor.summary)
  put(out, "description", descriptor.description)
  put(out, "schema", encodeJsonSchema(descriptor.schema))
  put(out, "required", descriptor.required)
  put(out, "deprecated", descriptor.deprecated)
  appendExtensions(out, descriptor.extensions)
  return out
}

export const encodeLink = (link: Link): Json => {
  const out: JsonDraft = {}
  put(out, "name", link.name)
  put(out, "description", link.description)
  put(out, "summary", link.summary)
  put(out, "method", link.method)
  put(out, "params", link.params)
  put(out, "server", encodeOptional(link.server, encodeServer))
  appendExtensions(out, link.extensions)
  return out
}

export const encodeError = (error: ErrorObject): Json => {
  const out: JsonDraft = {}
  put(out, "code", error.code)
  put(out, "message", error.message)
  put(out, "data", error.data)
  appendExtensions(out, error.extensions)
  return out
}

export const encodeTag = (tag: Tag): Json => {
  const out: JsonDraft = {}
  put(out, "name", tag.name)
  put(out, "summary", tag.summary)
  put(out, "description", tag.description)
  put(out, "externaldocs", encodeOptional(tag.externaldocs, encodeExternalDocumentation))
  appendExtensions(out, tag.extensions)
  return out
}

export const encodeMethod = (method: Method): Json => {
  const out: JsonDraft = {}
  put(out, "name", method.name)
  put(out, "tags", encodeOptional(method.tags, encodeList(orReferenceEncoder(encodeTag))))
  put(out, "summary", method.summary)
  put(out, "description", method.description)
  put(out, "externaldocs", encodeOptional(method.externaldocs, encodeExternalDocumentation))
  put(out, "params", encodeList(orReferenceEncoder(encodeContentDescriptor))(method.params))
  put(out, "result", orReferenceEncoder(encodeContentDescriptor)(method.result))
  put(out, "deprecated", method.deprecated)
  put(out, "servers", encodeOptional(method.servers, encodeList(encodeServer)))
  put(out, "errors", encodeOptional(method.errors, encodeList(orReferenceEncoder(encodeError))))
  put(out, "links", encodeOptional(method.links, encodeList(orReferenceEncoder(encodeLink))))
  put(out, "paramStructure", encodeOptional(method.paramStructure, renderParamStructure))
  put(out, "examples", encodeOptional(method.examples, encodeList(orReferenceEncoder(encodeExamplePairing))))
  appendExtensions(out, method.extensions)
  return out
}

export const encodeComponents = (components: Components): Json => {
  const out: JsonDraft = {}
  put(
    out,
    "contentDescriptors",
    encodeOptional(components.contentDescriptors, encodeRecord(encodeContentDescriptor))
  )
  put(out, "schemas", encodeOptional(components.schemas, encodeRecord(encodeJsonSchema)))
  put(out, "examples", encodeOptional(components.examples, encodeRecord(encodeExample)))
  put(out, "links", encodeOptional(components.links, encodeRecord(encodeLink)))
  put(out, "errors", encodeOptional(components.errors, encodeRecord(encodeError)))
  put(
    out,
    "examplePairingObjects",
    encodeOptional(components.examplePairingObjects, encodeRecord(encodeExamplePairing))
  )
  put(out, "tags", encodeOptional(components.tags, encodeRecord(encodeTag)))
  appendExtensions(out, components.extensions)
  return out
}

export const encodeOneOf = (value: OneOf): Json => ({ oneOf: encodeContentDescriptor(value.oneOf) })

export const encodeOpenRpcDocument = (document: OpenRpcDocument): Json => {
  const out: JsonDraft = {}
  put(out, "openrpc", document.openrpc)
  put(out, "info", encodeInfo(document.info))
  put(out, "servers", encodeOptional(document.servers, encodeList(encodeServer)))
  put(out, "methods", encodeList(encodeMethod)(document.methods))
  put(out, "components", encodeOptional(document.components, encodeComponents))
  put(out, "externaldocs", encodeOptional(document.externaldocs, encodeExternalDocumentation))
  appendExtensions(out, document.extensions)
  return out
}

export const DocumentCodec: Codec<OpenRpcDocument> = makeCodec(decodeOpenRpcDocument, encodeOpenRpcDocument)
export const InfoCodec: Codec<Info> = makeCodec(decodeInfo, encodeInfo)
export const ContactCodec: Codec<Contact> = makeCodec(decodeContact, encodeContact)
export const LicenseCodec: Codec<License> = makeCodec(decodeLicense, encodeLicense)
export const ServerCodec: Codec<Server> = makeCodec(decodeServer, encodeServer)
export const ServerVariableCodec: Codec<ServerVariable> = makeCodec(decodeServerVariable, encodeServerVariable)
export const MethodCodec: Codec<Method> = makeCodec(decodeMethod, encodeMethod)
export const ContentDescriptorCodec: Codec<ContentDescriptor> = makeCodec(
  decodeContentDescriptor,
  encodeContentDescriptor
)
export const JsonSchemaCodec: Codec<JSONSchema> = makeCodec(decodeJsonSchema, encodeJsonSchema)
export const ExampleCodec: Codec<Example> = makeCodec(decodeExample, encodeExample)
export const ExamplePairingCodec: Codec<ExamplePairing> = makeCodec(decodeExamplePairing, encodeExamplePairing)
export const LinkCodec: Codec<Link> = makeCodec(decodeLink, encodeLink)
export const ErrorCodec: Codec<ErrorObject> = makeCodec(decodeError, encodeError)
export const ComponentsCodec: Codec<Components> = makeCodec(decodeComponents, encodeComponents)
export const TagCodec: Codec<Tag> = makeCodec(decodeTag, encodeTag)
export const ExternalDocumentationCodec: Codec<ExternalDocumentation> = makeCodec(
  decodeExternalDocumentation,
  encodeExternalDocumentation
)
export const ReferenceCodec: Codec<Reference> = makeCodec(decodeReference, encodeReference)
export const OneOfCodec: Codec<OneOf> = makeCodec(decodeOneOf, encodeOneOf)
