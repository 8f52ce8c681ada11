import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import { Effect, Match } from "effect"

import type { CliArgs } from "../core/cli.js"
import { parseCliArgs } from "../core/cli.js"
import type { ResolvedConfig } from "../core/config.js"
import { defaultConfigFile, resolveConfig } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import { fileError } from "../core/errors.js"
import { toCompactJson, toIndentedJson } from "../core/serializer.js"
import type { JsonValue } from "../core/value.js"
import { loadConfigFile } from "../shell/config-file.js"
import { fromEither, loadJsonFile } from "../shell/json-file.js"

// CHANGE: orchestrate jsonval commands with functional core + imperative shell
// WHY: enforce single entrypoint with typed errors and deterministic outputs
// QUOTE(TZ): "jsonval [format|minify|check]"
// REF: req-program-1
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: run(argv) = Right(r) → r.exitCode = 0
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, AppError, FileSystem>
// INVARIANT: output emitted at most once
// COMPLEXITY: O(n)

export interface ProgramResult {
  readonly output: string
  readonly exitCode: number
}

const writeStdout = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(payload.endsWith("\n") ? payload : `${payload}\n`)
  })

const renderDocument = (
  cli: CliArgs,
  config: ResolvedConfig,
  value: JsonValue
): Effect.Effect<string, AppError> =>
  Match.value(cli.command).pipe(
    Match.when("check", () => Effect.succeed(`OK ${cli.input}`)),
    Match.when("minify", () => Effect.succeed(toCompactJson(value, { ascii: config.ascii }))),
    Match.when("format", () => fromEither(toIndentedJson(value, config.indent, { ascii: config.ascii }))),
    Match.exhaustive
  )

const emitOutput = (
  cli: CliArgs,
  output: string
): Effect.Effect<void, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    if (cli.output !== undefined && cli.command !== "check") {
      const fs = yield* _(FileSystem)
      yield* _(
        fs.writeFileString(cli.output, `${output}\n`).pipe(Effect.mapError((error) => fileError(String(error))))
      )
      return
    }
    if (!cli.silent) {
      yield* _(writeStdout(output))
    }
  })

/**
 * Run CLI program with the provided argv.
 *
 * @param argv - process.argv array.
 * @returns ProgramResult with the rendered output and exit code.
 *
 * @pure false
 * @effect FileSystem, Console
 * @invariant exitCode is deterministic for fixed inputs
 * @complexity O(n)
 */
export const runCli = (
  argv: ReadonlyArray<string>
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const cli = yield* _(fromEither(parseCliArgs(argv)))
    const fileConfig = yield* _(loadConfigFile(cli.configPath ?? defaultConfigFile, cli.configPath !== undefined))
    const config = resolveConfig(cli, fileConfig)
    const value = yield* _(loadJsonFile(cli.input, config.encoding))
    const output = yield* _(renderDocument(cli, config, value))
    yield* _(emitOutput(cli, output))
    return { output, exitCode: 0 }
  })
