import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"

import type { AppError, JsonUsageError } from "../core/errors.js"
import { fileError } from "../core/errors.js"
import { parseReader } from "../core/parser.js"
import { decodeByteChunks, readerFromChunks } from "../core/reader-source.js"
import type { WriteOptions } from "../core/serializer.js"
import { toCompactJson, toIndentedJson } from "../core/serializer.js"
import type { JsonValue } from "../core/value.js"

// CHANGE: load and save JSON documents through the FileSystem service
// WHY: isolate filesystem IO while keeping parsing and rendering in the core
// QUOTE(TZ): "a byte-stream convenience that decodes using a caller/platform-selected text encoding before parsing"
// REF: req-json-io-1
// SOURCE: n/a
// FORMAT THEOREM: ∀p,v: save(p, v) ; load(p) = v' → Equal.equals(v, v')
// PURITY: SHELL
// EFFECT: Effect<JsonValue | void, AppError, FileSystem>
// INVARIANT: bytes are decoded before parsing; saved files end with a newline
// COMPLEXITY: O(n)

export const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  Either.isLeft(either) ? Effect.fail(either.left) : Effect.succeed(either.right)

export type SaveOptions = WriteOptions

export const readJsonBytes = (
  path: string
): Effect.Effect<Uint8Array, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    return yield* _(
      fs.readFile(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
  })

/**
 * Read `path`, decode it with `encoding` and parse it with the stream source.
 * An unknown encoding label surfaces as a JsonIoError.
 *
 * @pure false
 * @effect FileSystem.readFile
 */
export const loadJsonFile = (
  path: string,
  encoding = "utf-8"
): Effect.Effect<JsonValue, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const bytes = yield* _(readJsonBytes(path))
    const parsed = parseReader(readerFromChunks(decodeByteChunks([bytes], encoding)))
    return yield* _(fromEither(parsed))
  })

/**
 * Render `value` (indented when `options.indent` is set) and write it with a
 * trailing newline.
 *
 * @pure false
 * @effect FileSystem.writeFileString
 */
export const saveJsonFile = (
  path: string,
  value: JsonValue,
  options: SaveOptions = {}
): Effect.Effect<void, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const rendered: Either.Either<string, JsonUsageError> = options.indent === undefined
      ? Either.right(toCompactJson(value, options))
      : toIndentedJson(value, options.indent, options)
    const text = yield* _(fromEither(rendered))
    const fs = yield* _(FileSystem)
    yield* _(
      fs.writeFileString(path, `${text}\n`).pipe(Effect.mapError((error) => fileError(String(error))))
    )
  })
