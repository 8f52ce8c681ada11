import { Match } from "effect"
import * as Either from "effect/Either"

import { maxIndent } from "./serializer.js"

// CHANGE: implement deterministic CLI parsing for jsonval
// WHY: keep CLI decoding pure and testable at the boundary
// QUOTE(TZ): "jsonval [format|minify|check] --input <file>"
// REF: req-cli-parse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: parse(argv) = Right(args) → args.command ∈ Commands ∧ args.input ≠ ""
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags are rejected
// COMPLEXITY: O(n) where n = argv length

export type CliCommand = "format" | "minify" | "check"

export interface CliArgs {
  readonly command: CliCommand
  readonly input: string
  readonly output: string | undefined
  readonly indent: number | undefined
  readonly ascii: boolean | undefined
  readonly encoding: string | undefined
  readonly configPath: string | undefined
  readonly silent: boolean
}

export type CliError = { readonly _tag: "CliError"; readonly message: string }

export const cliError = (message: string): CliError => ({ _tag: "CliError", message })

const isFlag = (value: string): boolean => value.startsWith("-")

const parseBoolean = (value: string): Either.Either<boolean, CliError> => {
  if (value === "true" || value === "1") {
    return Either.right(true)
  }
  if (value === "false" || value === "0") {
    return Either.right(false)
  }
  return Either.left(cliError(`Invalid boolean value: ${value}`))
}

const parseIndent = (value: string): Either.Either<number, CliError> => {
  if (!/^\d+$/u.test(value)) {
    return Either.left(cliError(`Invalid indent: ${value} (expected a non-negative integer)`))
  }
  const indent = Number(value)
  return indent > maxIndent
    ? Either.left(cliError(`Invalid indent: ${value} (maximum is ${maxIndent})`))
    : Either.right(indent)
}

const parseCommand = (value: string): Either.Either<CliCommand, CliError> =>
  Match.value(value).pipe(
    Match.when("format", () => Either.right<CliCommand>("format")),
    Match.when("minify", () => Either.right<CliCommand>("minify")),
    Match.when("check", () => Either.right<CliCommand>("check")),
    Match.orElse(() => Either.left(cliError(`Unknown command: ${value}`)))
  )

const defaultArgs = (command: CliCommand): CliArgs => ({
  command,
  input: "",
  output: undefined,
  indent: undefined,
  ascii: undefined,
  encoding: undefined,
  configPath: undefined,
  silent: false
})

const readFlagValue = (
  flagName: string,
  inlineValue: string | undefined,
  nextValue: string | undefined
): Either.Either<string, CliError> => {
  if (inlineValue !== undefined) {
    return Either.right(inlineValue)
  }
  if (nextValue === undefined || isFlag(nextValue)) {
    return Either.left(cliError(`Missing value for --${flagName}`))
  }
  return Either.right(nextValue)
}

type Parsed = Either.Either<{ readonly next: CliArgs; readonly consumed: number }, CliError>

const parseValueFlag = (
  flagName: string,
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (args: CliArgs, value: string) => Either.Either<CliArgs, CliError>
): Parsed =>
  Either.flatMap(readFlagValue(flagName, inlineValue, nextValue), (value) =>
    Either.map(update(current, value), (next) => ({
      next,
      consumed: inlineValue === undefined ? 2 : 1
    })))

const parseOptionalBooleanFlag = (
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (args: CliArgs, value: boolean) => CliArgs
): Parsed => {
  const useNext = inlineValue === undefined && nextValue !== undefined && !isFlag(nextValue) &&
    (nextValue === "true" || nextValue === "false")
  const nextValueResolved = inlineValue ?? (useNext ? nextValue : "true")
  return Either.map(parseBoolean(nextValueResolved), (value) => ({
    next: update(current, value),
    consumed: useNext ? 2 : 1
  }))
}

type FlagParser = (
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined
) => Parsed

const flagParsers: Readonly<Record<string, FlagParser>> = {
  silent: (current) => Either.right({ next: { ...current, silent: true }, consumed: 1 }),
  ascii: (current, inlineValue, nextValue) =>
    parseOptionalBooleanFlag(current, inlineValue, nextValue, (args, value) => ({
      ...args,
      ascii: value
    })),
  input: (current, inlineValue, nextValue) =>
    parseValueFlag("input", current, inlineValue, nextValue, (args, value) => Either.right({ ...args, input: value })),
  output: (current, inlineValue, nextValue) =>
    parseValueFlag("output", current, inlineValue, nextValue, (args, value) => Either.right({ ...args, output: value })),
  indent: (current, inlineValue, nextValue) =>
    parseValueFlag("indent", current, inlineValue, nextValue, (args, value) =>
      Either.map(parseIndent(value), (indent) => ({ ...args, indent }))),
  encoding: (current, inlineValue, nextValue) =>
    parseValueFlag(
      "encoding",
      current,
      inlineValue,
      nextValue,
      (args, value) => Either.right({ ...args, encoding: value })
    ),
  config: (current, inlineValue, nextValue) =>
    parseValueFlag("config", current, inlineValue, nextValue, (args, value) => Either.right({ ...args, configPath: value }))
}

const parseFlag = (
  raw: string,
  nextValue: string | undefined,
  current: CliArgs
): Parsed => {
  if (!raw.startsWith("--")) {
    return Either.left(cliError(`Unknown flag: ${raw}`))
  }
  const [name = "", inlineValue] = raw.slice(2).split("=", 2)
  const parser = flagParsers[name]
  if (parser === undefined) {
    return Either.left(cliError(`Unknown flag: --${name}`))
  }
  return parser(current, inlineValue, nextValue)
}

interface ParsedCommand {
  readonly command: CliCommand
  readonly startIndex: number
}

const parseCommandFromArgs = (
  rawArgs: ReadonlyArray<string>
): Either.Either<ParsedCommand, CliError> => {
  const first = rawArgs[0]
  if (first === undefined || isFlag(first)) {
    return Either.right({ command: "format", startIndex: 0 })
  }
  return Either.map(parseCommand(first), (command) => ({ command, startIndex: 1 }))
}

const parseFlags = (
  rawArgs: ReadonlyArray<string>,
  startIndex: number,
  initial: CliArgs
): Either.Either<CliArgs, CliError> => {
  let args = initial
  let index = startIndex
  while (index < rawArgs.length) {
    const current = rawArgs[index]
    if (current === undefined) {
      return Either.left(cliError("Unexpected end of arguments"))
    }
    if (!isFlag(current)) {
      return Either.left(cliError(`Unexpected positional argument: ${current}`))
    }
    const parsed = parseFlag(current, rawArgs[index + 1], args)
    if (Either.isLeft(parsed)) {
      return Either.left(parsed.left)
    }
    args = parsed.right.next
    index += parsed.right.consumed
  }
  if (args.input.length === 0) {
    return Either.left(cliError("Missing required flag --input"))
  }
  return Either.right(args)
}

/**
 * Parse CLI arguments into a typed configuration.
 *
 * @param argv - Raw process.argv array.
 * @returns Either with parsed CliArgs or CliError.
 *
 * @pure true
 * @invariant command defaults to format when omitted
 * @complexity O(n)
 */
export const parseCliArgs = (
  argv: ReadonlyArray<string>
): Either.Either<CliArgs, CliError> =>
  Either.flatMap(
    parseCommandFromArgs(argv.slice(2)),
    (parsed) => parseFlags(argv.slice(2), parsed.startIndex, defaultArgs(parsed.command))
  )
