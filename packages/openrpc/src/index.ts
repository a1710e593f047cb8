export * from "./core/decoder.js"
export * from "./core/document.js"
export * from "./core/encoder.js"
export * from "./core/errors.js"
export * from "./core/extensions.js"
export * from "./core/json-schema-codec.js"
export * from "./core/json-schema.js"
export * from "./core/json.js"
export * from "./core/openrpc-codec.js"
export * from "./core/openrpc.js"
export * from "./core/references.js"
export * from "./core/servers.js"
export * from "./shell/document-file.js"
