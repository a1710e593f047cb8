import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import type { Method, OpenRpcDocument, Server } from "../../src/core/openrpc.js"
import {
  DEFAULT_SERVER,
  effectiveServers,
  expandServerUrl,
  methodServers,
  serverUrlTokens
} from "../../src/core/servers.js"
import { leftOf, rightOf } from "./either-helpers.js"

const regional: Server = {
  name: "regional",
  url: "https://{region}.ledger.test:{port}/rpc",
  variables: {
    region: { default: "eu", enum: ["eu", "us"] },
    port: { default: "8545" }
  }
}

const method: Method = {
  name: "ping",
  params: [],
  result: { name: "pong", schema: { schema: { type: "boolean" } } }
}

const documentWith = (servers: ReadonlyArray<Server> | undefined): OpenRpcDocument => ({
  openrpc: "1.2.6",
  info: { title: "T", version: "1" },
  methods: [method],
  ...(servers === undefined ? {} : { servers })
})

describe("server defaults", () => {
  it.effect("falls back to localhost when servers are absent or empty", () =>
    Effect.sync(() => {
      expect(effectiveServers(documentWith(undefined))).toEqual([DEFAULT_SERVER])
      expect(effectiveServers(documentWith([]))).toEqual([DEFAULT_SERVER])
      expect(DEFAULT_SERVER.url).toBe("localhost")
      expect(effectiveServers(documentWith([regional]))).toEqual([regional])
    }))

  it.effect("prefers method servers over the root list", () =>
    Effect.sync(() => {
      const local: Server = { name: "local", url: "http://127.0.0.1:8545" }
      const document = documentWith([regional])
      expect(methodServers(document, method)).toEqual([regional])
      expect(methodServers(document, { ...method, servers: [local] })).toEqual([local])
    }))
})

describe("server url templating", () => {
  it.effect("lists tokens in order of appearance", () =>
    Effect.sync(() => {
      expect(serverUrlTokens(regional.url)).toEqual(["region", "port"])
      expect(serverUrlTokens("localhost")).toEqual([])
    }))

  it.effect("substitutes defaults and overrides", () =>
    Effect.sync(() => {
      expect(rightOf(expandServerUrl(regional))).toBe("https://eu.ledger.test:8545/rpc")
      expect(rightOf(expandServerUrl(regional, { region: "us" }))).toBe("https://us.ledger.test:8545/rpc")
    }))

  it.effect("reports the first token without a variable", () =>
    Effect.sync(() => {
      const server: Server = { name: "bare", url: "https://{host}/{path}" }
      expect(leftOf(expandServerUrl(server, { path: "rpc" }))).toEqual({
        _tag: "UnknownServerVariable",
        server: "bare",
        variable: "host"
      })
      expect(rightOf(expandServerUrl(server, { host: "h", path: "rpc" }))).toBe("https://h/rpc")
    }))
})
