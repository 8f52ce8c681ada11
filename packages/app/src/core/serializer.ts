import { EOL } from "node:os"

import * as Either from "effect/Either"

import type { JsonAccessor } from "./accessor.js"
import type { ConverterRegistry } from "./convert.js"
import { emptyRegistry, of, toValue } from "./convert.js"
import type { JsonConversionError, JsonUsageError } from "./errors.js"
import { usageError } from "./errors.js"
import type { IndentLayout, JsonSink } from "./render.js"
import { renderCompact, renderIndented, writeCompact, writeIndented } from "./render.js"
import type { JsonValue } from "./value.js"

// CHANGE: public serialization entry points over values, accessors and native data
// WHY: callers choose compact or indented text without touching the renderer
// QUOTE(TZ): "Serialization is a total function over a well-formed Value tree"
// REF: req-serialize-2
// SOURCE: n/a
// FORMAT THEOREM: ∀v,n ≥ 0: toIndentedJson(v, n) = Right(t) → parse(t) ≡ v
// PURITY: CORE (writeJson writes into the caller's sink)
// EFFECT: sink.write
// INVARIANT: an invalid indent is rejected before any output is produced
// COMPLEXITY: O(n)

export interface SerializeOptions {
  readonly ascii?: boolean
}

export interface IndentOptions extends SerializeOptions {
  readonly lineSeparator?: string
}

export interface WriteOptions extends IndentOptions {
  readonly indent?: number
}

export interface StringifyOptions extends WriteOptions {
  readonly registry?: ConverterRegistry
}

/**
 * Widest accepted indent, in spaces per nesting level.
 */
export const maxIndent = 256

const resolveLayout = (
  indent: number,
  options: IndentOptions
): Either.Either<IndentLayout, JsonUsageError> => {
  if (!Number.isInteger(indent) || indent < 0) {
    return Either.left(usageError(`indent must be a non-negative integer, got ${indent}`))
  }
  if (indent > maxIndent) {
    return Either.left(usageError(`indent must be at most ${maxIndent}, got ${indent}`))
  }
  return Either.right({ indent, lineSeparator: options.lineSeparator ?? EOL })
}

/**
 * Render without any whitespace.
 *
 * @pure true
 * @complexity O(n)
 */
export const toCompactJson = (value: JsonValue, options: SerializeOptions = {}): string =>
  renderCompact(value, options.ascii ?? false)

/**
 * Render one member per line, nested `indent` spaces per level, joined with
 * the platform line separator unless `lineSeparator` is given.
 *
 * @param indent - Spaces per nesting level; 0 keeps the line breaks.
 * @returns Text, or a usage error for a negative, fractional or too wide indent.
 *
 * @pure true
 * @complexity O(n)
 */
export const toIndentedJson = (
  value: JsonValue,
  indent: number,
  options: IndentOptions = {}
): Either.Either<string, JsonUsageError> =>
  Either.map(resolveLayout(indent, options), (layout) => renderIndented(value, options.ascii ?? false, layout))

/**
 * Stream the rendering into `sink`; indented when `options.indent` is set.
 * Exceptions raised by the sink propagate to the caller.
 *
 * @pure false
 * @effect sink.write
 */
export const writeJson = (
  value: JsonValue,
  sink: JsonSink,
  options: WriteOptions = {}
): Either.Either<void, JsonUsageError> => {
  const ascii = options.ascii ?? false
  if (options.indent === undefined) {
    writeCompact(value, sink, ascii)
    return Either.right(undefined)
  }
  return Either.map(resolveLayout(options.indent, options), (layout) => writeIndented(value, sink, ascii, layout))
}

const render = (value: JsonValue, options: WriteOptions): Either.Either<string, JsonUsageError> =>
  options.indent === undefined
    ? Either.right(toCompactJson(value, options))
    : toIndentedJson(value, options.indent, options)

/**
 * Convert native data with `of`, then render it.
 *
 * @pure true
 * @complexity O(n)
 */
export const stringify = (
  input: unknown,
  options: StringifyOptions = {}
): Either.Either<string, JsonConversionError | JsonUsageError> =>
  Either.flatMap(of(input, options.registry ?? emptyRegistry), (value) => render(value, options))

/**
 * Realize an accessor, then render it.
 *
 * @pure true
 * @complexity O(n)
 */
export const stringifyAccessor = (
  accessor: JsonAccessor,
  options: WriteOptions = {}
): Either.Either<string, JsonConversionError | JsonUsageError> =>
  Either.flatMap(toValue(accessor), (value) => render(value, options))
