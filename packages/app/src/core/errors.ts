import { Match } from "effect"
import * as Option from "effect/Option"

import type { CliError } from "./cli.js"
import { quoteJsonString } from "./escape.js"
import type { JsonType } from "./json-type.js"
import { typeLabel } from "./json-type.js"

// CHANGE: unify the error algebra of the value model, parser, serializer and CLI
// WHY: provide typed failures that callers match exhaustively instead of catching
// QUOTE(TZ): "parse errors, type-mismatch errors, not-found errors, construction/usage errors"
// REF: req-errors-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ AppError: e._tag is stable and exhaustively matchable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error tags are unique
// COMPLEXITY: O(1)/O(1)

export type JsonParseError = {
  readonly _tag: "JsonParseError"
  readonly message: string
  readonly position: Option.Option<number>
  readonly input: Option.Option<string>
}

export type JsonIoError = {
  readonly _tag: "JsonIoError"
  readonly message: string
  readonly cause: unknown
}

export type JsonTypeMismatch = {
  readonly _tag: "JsonTypeMismatch"
  readonly found: JsonType
  readonly expected: ReadonlyArray<JsonType>
  readonly message: string
}

export type JsonNotFound = {
  readonly _tag: "JsonNotFound"
  readonly key: string | number
  readonly message: string
}

export type JsonConversionError = { readonly _tag: "JsonConversionError"; readonly message: string }
export type JsonUsageError = { readonly _tag: "JsonUsageError"; readonly message: string }

export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }
export type FileError = { readonly _tag: "FileError"; readonly message: string }

export type JsonError =
  | JsonParseError
  | JsonIoError
  | JsonTypeMismatch
  | JsonNotFound
  | JsonConversionError
  | JsonUsageError

export type AppError =
  | JsonError
  | CliError
  | ConfigError
  | FileError

export const parseError = (
  message: string,
  position: Option.Option<number> = Option.none(),
  input: Option.Option<string> = Option.none()
): JsonParseError => ({
  _tag: "JsonParseError",
  message,
  position,
  input
})

export const ioError = (cause: unknown): JsonIoError => ({
  _tag: "JsonIoError",
  message: cause instanceof Error ? cause.message : String(cause),
  cause
})

export const typeMismatch = (found: JsonType, ...expected: ReadonlyArray<JsonType>): JsonTypeMismatch => ({
  _tag: "JsonTypeMismatch",
  found,
  expected,
  message: `${expected.map(typeLabel).join(", ")} expected, ${typeLabel(found)} found`
})

export const keyNotFound = (key: string): JsonNotFound => ({
  _tag: "JsonNotFound",
  key,
  message: `key ${quoteJsonString(key, true)} not present`
})

export const indexNotFound = (index: number, size: number): JsonNotFound => ({
  _tag: "JsonNotFound",
  key: index,
  message: `index ${index} out of bounds for length ${size}`
})

export const conversionError = (message: string): JsonConversionError => ({
  _tag: "JsonConversionError",
  message
})

export const usageError = (message: string): JsonUsageError => ({
  _tag: "JsonUsageError",
  message
})

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const fileError = (message: string): FileError => ({
  _tag: "FileError",
  message
})

/**
 * Render a parse error the way the string source reports it:
 * `[offset]: message : input` when a position is known, the bare message otherwise.
 *
 * @pure true
 * @complexity O(n) where n = input length
 */
export const formatParseError = (error: JsonParseError): string =>
  Option.match(Option.all({ position: error.position, input: error.input }), {
    onNone: () => error.message,
    onSome: ({ input, position }) => `[${position}]: ${error.message} : ${input}`
  })

/**
 * Render any application error as a single line for stderr.
 *
 * @pure true
 * @invariant output is prefixed with the error kind
 * @complexity O(n)
 */
export const renderAppError = (error: AppError): string =>
  Match.value(error).pipe(
    Match.tag("JsonParseError", (value) => `parse error: ${formatParseError(value)}`),
    Match.tag("JsonIoError", (value) => `i/o error: ${value.message}`),
    Match.tag("JsonTypeMismatch", (value) => `type mismatch: ${value.message}`),
    Match.tag("JsonNotFound", (value) => `not found: ${value.message}`),
    Match.tag("JsonConversionError", (value) => `conversion error: ${value.message}`),
    Match.tag("JsonUsageError", (value) => `usage error: ${value.message}`),
    Match.tag("CliError", (value) => `cli error: ${value.message}`),
    Match.tag("ConfigError", (value) => `config error: ${value.message}`),
    Match.tag("FileError", (value) => `file error: ${value.message}`),
    Match.exhaustive
  )
