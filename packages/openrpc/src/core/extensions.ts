import type { Json, JsonObject } from "./json.js"

// CHANGE: model vendor extensions as an explicit residual map
// WHY: x- fields are carried beside the named fields without reflection
// QUOTE(TZ): "The extensions properties are implemented as patterned fields that are always prefixed by \"x-\"."
// REF: req-extensions-1
// PURITY: CORE
// INVARIANT: every key of Extensions starts with "x-"; insertion order is the source order
// COMPLEXITY: O(n) where n = number of fields on the owner

export type ExtensionKey = `x-${string}`

export type Extensions = Readonly<Record<ExtensionKey, Json>>

export interface Extensible {
  readonly extensions?: Extensions
}

export const isExtensionKey = (key: string): key is ExtensionKey => key.startsWith("x-")

/**
 * Collect every `x-` field of an object, in source order.
 *
 * @returns undefined when the object carries no extension.
 */
export const collectExtensions = (object: JsonObject): Extensions | undefined => {
  const entries = Object.entries(object).filter(([key]) => isExtensionKey(key))
  return entries.length === 0 ? undefined : Object.fromEntries(entries)
}

export const captureExtensions = (object: JsonObject, draft: { extensions?: Extensions }): void => {
  const extensions = collectExtensions(object)
  if (extensions !== undefined) {
    draft.extensions = extensions
  }
}

export const appendExtensions = (
  target: Record<string, Json>,
  extensions: Extensions | undefined
): void => {
  if (extensions === undefined) {
    return
  }
  for (const [key, value] of Object.entries(extensions)) {
    if (isExtensionKey(key)) {
      target[key] = value
    }
  }
}
