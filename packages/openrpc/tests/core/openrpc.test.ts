import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Option from "effect/Option"

import type { ContentDescriptor, OpenRpcDocument } from "../../src/core/openrpc.js"
import {
  ErrorCode,
  InternalError,
  InvalidParams,
  InvalidRequest,
  isDeprecated,
  isRequired,
  isReservedErrorCode,
  isServerErrorCode,
  MethodNotFound,
  ParamStructure,
  parseParamStructure,
  ParseError,
  renderParamStructure
} from "../../src/core/openrpc.js"
import { findMethod, isReference } from "../../src/core/references.js"

const descriptor: ContentDescriptor = { name: "id", schema: { schema: { type: "integer" } } }

describe("ParamStructure", () => {
  it.effect("renders every known value and the decimal form otherwise", () =>
    Effect.sync(() => {
      expect(renderParamStructure(ParamStructure.ByPosition)).toBe("by-position")
      expect(renderParamStructure(ParamStructure.ByName)).toBe("by-name")
      expect(renderParamStructure(ParamStructure.Either)).toBe("either")
      expect(renderParamStructure(7)).toBe("7")
    }))

  it.effect("parses only the three textual forms", () =>
    Effect.sync(() => {
      expect(Option.getOrUndefined(parseParamStructure("by-name"))).toBe(ParamStructure.ByName)
      expect(Option.isNone(parseParamStructure("byName"))).toBe(true)
    }))
})

describe("ErrorCode", () => {
  it.effect("exposes the pre-defined JSON-RPC codes", () =>
    Effect.sync(() => {
      expect([ParseError, InvalidRequest, MethodNotFound, InvalidParams, InternalError]).toEqual([
        -32700,
        -32600,
        -32601,
        -32602,
        -32603
      ])
    }))

  it.effect("accepts integers only", () =>
    Effect.sync(() => {
      expect(ErrorCode.is(4001)).toBe(true)
      expect(ErrorCode.is(-1)).toBe(true)
      expect(ErrorCode.is(1.5)).toBe(false)
    }))

  it.effect("classifies reserved and server ranges", () =>
    Effect.sync(() => {
      expect(isReservedErrorCode(ParseError)).toBe(true)
      expect(isReservedErrorCode(-31999)).toBe(false)
      expect(isServerErrorCode(-32000)).toBe(true)
      expect(isServerErrorCode(-32099)).toBe(true)
      expect(isServerErrorCode(-32100)).toBe(false)
      expect(isServerErrorCode(InvalidParams)).toBe(false)
    }))
})

describe("content descriptor defaults and lookups", () => {
  it.effect("reads absent required and deprecated flags as false", () =>
    Effect.sync(() => {
      expect(isRequired(descriptor)).toBe(false)
      expect(isDeprecated(descriptor)).toBe(false)
      expect(isRequired({ ...descriptor, required: true })).toBe(true)
    }))

  it.effect("tells references apart from inline objects", () =>
    Effect.sync(() => {
      expect(isReference({ $ref: "#/components/contentDescriptors/Id" })).toBe(true)
      expect(isReference(descriptor)).toBe(false)
    }))

  it.effect("finds methods by name", () =>
    Effect.sync(() => {
      const document: OpenRpcDocument = {
        openrpc: "1.2.6",
        info: { title: "T", version: "1" },
        methods: [
          { name: "a", params: [], result: descriptor },
          { name: "b", params: [descriptor], result: descriptor }
        ]
      }
      const found = findMethod(document, "b")
      expect(Option.getOrUndefined(found)?.params.length).toBe(1)
      expect(Option.isNone(findMethod(document, "c"))).toBe(true)
    }))
})
