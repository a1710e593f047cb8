import { NodeContext } from "@effect/platform-node"
import { FileSystem, type FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Path, type Path as PathService } from "@effect/platform/Path"
import { Effect } from "effect"

export interface TempContext {
  readonly fs: FileSystemService
  readonly path: PathService
  readonly tempDir: string
}

/** Run `use` against a fresh directory that is removed afterwards. */
export const withTempDir = <A, E, R>(use: (context: TempContext) => Effect.Effect<A, E, R>) =>
  Effect.scoped(
    Effect.gen(function*(_) {
      const fs = yield* _(FileSystem)
      const path = yield* _(Path)
      const tempDir = yield* _(fs.makeTempDirectoryScoped({ prefix: "openrpc-model-" }))
      return yield* _(use({ fs, path, tempDir }))
    })
  )

export const provideNodeContext = <A, E, R>(effect: Effect.Effect<A, E, R>) =>
  effect.pipe(Effect.provide(NodeContext.layer))
