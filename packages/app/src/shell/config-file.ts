import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as S from "@effect/schema/Schema"
import * as TreeFormatter from "@effect/schema/TreeFormatter"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"
import { pipe } from "effect/Function"

import type { FileConfig } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import { configError, fileError, formatParseError } from "../core/errors.js"
import type { Json } from "../core/json.js"
import { toJson } from "../core/json.js"
import { parse } from "../core/parser.js"
import { maxIndent } from "../core/serializer.js"

// CHANGE: decode .jsonvalrc.json with this library's parser and schema validation
// WHY: keep boundary data typed and reject invalid config early
// QUOTE(TZ): "Config file .jsonvalrc.json ... validated with @effect/schema"
// REF: req-config-file-1
// SOURCE: n/a
// FORMAT THEOREM: ∀c: decode(c) = Right(cfg) → cfg fields have correct types
// PURITY: SHELL
// EFFECT: Effect<FileConfig | undefined, AppError, FileSystem>
// INVARIANT: a missing implicit config yields undefined
// COMPLEXITY: O(n)

const RawConfigSchema = S.partial(
  S.Struct({
    indent: S.Int.pipe(S.between(0, maxIndent)),
    ascii: S.Boolean,
    encoding: S.String
  })
)

const parseConfigText = (raw: string): Effect.Effect<Json, AppError> =>
  Either.match(parse(raw), {
    onLeft: (error): Effect.Effect<Json, AppError> => Effect.fail(configError(formatParseError(error))),
    onRight: (value): Effect.Effect<Json, AppError> => Effect.succeed(toJson(value))
  })

export const decodeConfig = (raw: string): Effect.Effect<FileConfig, AppError> =>
  pipe(
    parseConfigText(raw),
    Effect.flatMap((json) =>
      pipe(
        S.decodeUnknown(RawConfigSchema)(json),
        Effect.mapError((error) => configError(TreeFormatter.formatErrorSync(error)))
      )
    ),
    Effect.map((config) => ({
      ...(config.indent === undefined ? {} : { indent: config.indent }),
      ...(config.ascii === undefined ? {} : { ascii: config.ascii }),
      ...(config.encoding === undefined ? {} : { encoding: config.encoding })
    }))
  )

export const loadConfigFile = (
  path: string,
  explicit: boolean
): Effect.Effect<FileConfig | undefined, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const exists = yield* _(
      fs.exists(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    if (!exists) {
      if (explicit) {
        return yield* _(Effect.fail(fileError(`Config file not found: ${path}`)))
      }
      return undefined
    }
    const contents = yield* _(
      fs.readFileString(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    return yield* _(decodeConfig(contents))
  })
