import * as Either from "effect/Either"

import type { Method, OpenRpcDocument, Server } from "./openrpc.js"

// CHANGE: apply the documented server defaults and URL templating after decode
// WHY: decoding never injects servers; consumers opt into the defaults here
// QUOTE(TZ): "If the servers property is not provided, or is an empty array, the default value would be a Server with a url value of localhost."
// REF: req-servers-1
// FORMAT THEOREM: ∀d: effectiveServers(d).length ≥ 1
// PURITY: CORE
// INVARIANT: expandServerUrl leaves text outside {tokens} unchanged
// COMPLEXITY: O(n) where n = url length

export const DEFAULT_SERVER: Server = { name: "default", url: "localhost" }

export type UnknownServerVariable = {
  readonly _tag: "UnknownServerVariable"
  readonly server: string
  readonly variable: string
}

const TOKEN = /\{([^{}]+)\}/g

export const effectiveServers = (document: OpenRpcDocument): ReadonlyArray<Server> =>
  document.servers !== undefined && document.servers.length > 0 ? document.servers : [DEFAULT_SERVER]

/** Method-level servers override the root list. */
export const methodServers = (document: OpenRpcDocument, method: Method): ReadonlyArray<Server> =>
  method.servers !== undefined && method.servers.length > 0 ? method.servers : effectiveServers(document)

/** Names of the `{variable}` tokens in a server URL, in order of appearance. */
export const serverUrlTokens = (url: string): ReadonlyArray<string> =>
  Array.from(url.matchAll(TOKEN), (match) => match[1] ?? "")

/**
 * Substitute `{variable}` tokens in a server URL.
 *
 * @param values - Overrides; a token without one takes its variable's default.
 * @returns The expanded URL, or the first token with neither a value nor a variable.
 */
export const expandServerUrl = (
  server: Server,
  values: Readonly<Record<string, string>> = {}
): Either.Either<string, UnknownServerVariable> => {
  const missing = serverUrlTokens(server.url).find(
    (token) => values[token] === undefined && server.variables?.[token] === undefined
  )
  if (missing !== undefined) {
    return Either.left({ _tag: "UnknownServerVariable", server: server.name, variable: missing })
  }
  return Either.right(
    server.url.replace(TOKEN, (_match, token: string) => values[token] ?? server.variables?.[token]?.default ?? "")
  )
}
