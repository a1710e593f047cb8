import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Config from "effect/Config"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"

import type { DecodeMode, DecodeOptions } from "../core/decoder.js"
import { parseDocument, stringifyDocument } from "../core/document.js"
import type { AppError, ConfigError } from "../core/errors.js"
import { configError, documentError, fileError } from "../core/errors.js"
import type { OpenRpcDocument } from "../core/openrpc.js"

// CHANGE: load and store OpenRPC documents through the platform FileSystem
// WHY: filesystem IO stays out of the pure codecs
// REF: req-document-file-1
// PURITY: SHELL
// EFFECT: Effect<OpenRpcDocument, AppError, FileSystem>
// INVARIANT: a document is decoded before it is handed out
// COMPLEXITY: O(n)

/** Decode mode taken from `OPENRPC_DECODE_MODE`, strict when unset. */
export const decodeModeConfig: Config.Config<DecodeMode> = Config.literal("strict", "lenient")(
  "OPENRPC_DECODE_MODE"
).pipe(Config.withDefault("strict"))

export const resolveDecodeOptions = (
  options: DecodeOptions | undefined
): Effect.Effect<DecodeOptions, ConfigError> =>
  options === undefined
    ? decodeModeConfig.pipe(
      Effect.map((mode): DecodeOptions => ({ mode })),
      Effect.mapError((error) => configError(String(error)))
    )
    : Effect.succeed(options)

/**
 * Read and decode a document file. Without explicit options the mode comes
 * from {@link decodeModeConfig}.
 *
 * @effect FileSystem, ConfigProvider
 */
export const readDocument = (
  path: string,
  options?: DecodeOptions
): Effect.Effect<OpenRpcDocument, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const resolved = yield* _(resolveDecodeOptions(options))
    const raw = yield* _(
      fs.readFileString(path).pipe(Effect.mapError((error) => fileError(error.message)))
    )
    yield* _(Effect.logDebug(`decoding ${path} in ${resolved.mode} mode`))
    const decoded = parseDocument(raw, resolved)
    if (Either.isLeft(decoded)) {
      return yield* _(Effect.fail(documentError(path, decoded.left)))
    }
    yield* _(Effect.logDebug(`${path}: ${decoded.right.methods.length} methods`))
    return decoded.right
  })

/** Encode a document and write it as indented JSON text. */
export const writeDocument = (
  path: string,
  document: OpenRpcDocument,
  indent = 2
): Effect.Effect<void, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    yield* _(
      fs.writeFileString(path, stringifyDocument(document, indent)).pipe(
        Effect.mapError((error) => fileError(error.message))
      )
    )
    yield* _(Effect.logDebug(`wrote ${path}`))
  })
