import { FileSystem } from "@effect/platform/FileSystem"
import { Path } from "@effect/platform/Path"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { parseJsonText } from "../../src/core/document.js"
import type { Json } from "../../src/core/json.js"

export const readFixture = (name: string) =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const path = yield* _(Path)
    const file = yield* _(path.fromFileUrl(new URL(`../fixtures/${name}`, import.meta.url)))
    return yield* _(fs.readFileString(file))
  })

export const readJsonFixture = (name: string) =>
  Effect.flatMap(readFixture(name), (text): Effect.Effect<Json, Error> =>
    Either.match(parseJsonText(text), {
      onLeft: (error) => Effect.fail(new Error(error.message)),
      onRight: (value: Json) => Effect.succeed(value)
    }))
