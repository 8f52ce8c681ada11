import * as Either from "effect/Either"
import * as Option from "effect/Option"
import type * as Predicate from "effect/Predicate"

import type { JsonAccessor } from "./accessor.js"
import { isJsonAccessor, readBoolean, readDecimal, readEntries, readList, readString } from "./accessor.js"
import { decimalFromBigInt, decimalFromNumber, isDecimal } from "./decimal.js"
import type { JsonConversionError, JsonTypeMismatch } from "./errors.js"
import { conversionError } from "./errors.js"
import { isJsonType } from "./json-type.js"
import type { JsonValue } from "./value.js"
import { isJsonValue, JsonArray, JsonBoolean, JsonNull, JsonNumber, JsonObject, JsonString } from "./value.js"

// CHANGE: convert arbitrary native data and foreign accessors into value trees
// WHY: one entry point integrates builders, plain JS data and caller-specific types
// QUOTE(TZ): "a generic of-style entry point accepting native containers ... and any Accessor-Capability implementor"
// REF: req-convert-1
// SOURCE: n/a
// FORMAT THEOREM: ∀x: of(x) = Right(v) → v is acyclic ∧ contains no undefined child
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: a Left is returned before any partial tree escapes
// COMPLEXITY: O(n) where n = number of reachable native nodes

type Conversion = Either.Either<JsonValue, JsonConversionError>

/**
 * A caller-supplied conversion for one family of native values.
 */
export interface JsonConverter {
  readonly name: string
  readonly tryConvert: (value: unknown) => Option.Option<Conversion>
}

/**
 * Immutable, ordered set of converters consulted by `of` before the
 * built-in rules. The first converter whose guard accepts a value wins.
 */
export interface ConverterRegistry {
  readonly converters: ReadonlyArray<JsonConverter>
}

export const emptyRegistry: ConverterRegistry = { converters: [] }

export const makeConverter = <A>(
  name: string,
  guard: Predicate.Refinement<unknown, A>,
  convert: (value: A) => Conversion
): JsonConverter => ({
  name,
  tryConvert: (value) => (guard(value) ? Option.some(convert(value)) : Option.none())
})

/**
 * Return a registry with `converter` appended; the input registry is unchanged.
 *
 * @pure true
 */
export const registerConverter = (
  registry: ConverterRegistry,
  converter: JsonConverter
): ConverterRegistry => ({ converters: [...registry.converters, converter] })

const fromMismatch = (mismatch: JsonTypeMismatch): JsonConversionError =>
  conversionError(`accessor reported ${mismatch.found} but ${mismatch.message}`)

const cyclic = conversionError("cyclic structure cannot be converted to JSON")

const isPlainObject = (value: object): boolean => {
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === null || proto === Object.prototype
}

const isIterable = (value: object): value is Iterable<unknown> =>
  Symbol.iterator in value && typeof Reflect.get(value, Symbol.iterator) === "function"

const guarded = (container: object, ancestors: Set<object>, build: () => Conversion): Conversion => {
  if (ancestors.has(container)) {
    return Either.left(cyclic)
  }
  ancestors.add(container)
  const result = build()
  ancestors.delete(container)
  return result
}

const buildObject = (
  entries: Iterable<readonly [unknown, unknown]>,
  convertChild: (child: unknown) => Conversion
): Conversion => {
  const fields = new Map<string, JsonValue>()
  for (const [key, child] of entries) {
    const converted = convertChild(child)
    if (Either.isLeft(converted)) {
      return converted
    }
    fields.set(String(key), converted.right)
  }
  return Either.right(JsonObject.unsafeFromMap(fields))
}

const buildArray = (
  elements: Iterable<unknown>,
  convertChild: (child: unknown) => Conversion
): Conversion => {
  const result: Array<JsonValue> = []
  for (const child of elements) {
    const converted = convertChild(child)
    if (Either.isLeft(converted)) {
      return converted
    }
    result.push(converted.right)
  }
  return Either.right(JsonArray.unsafeFromArray(result))
}

const realize = (accessor: JsonAccessor, ancestors: Set<object>): Conversion => {
  if (isJsonValue(accessor)) {
    return Either.right(accessor)
  }
  const type: unknown = accessor.type()
  if (!isJsonType(type)) {
    return Either.left(conversionError(`accessor reported an unknown type ${String(type)}`))
  }
  switch (type) {
    case "OBJECT":
      return guarded(accessor, ancestors, () => {
        const entries = readEntries(accessor)
        if (Either.isLeft(entries)) {
          return Either.left(fromMismatch(entries.left))
        }
        return buildObject(entries.right, (child) =>
          isJsonAccessor(child) ? realize(child, ancestors) : Either.left(conversionError("object entry is not an accessor")))
      })
    case "ARRAY":
      return guarded(accessor, ancestors, () => {
        const list = readList(accessor)
        if (Either.isLeft(list)) {
          return Either.left(fromMismatch(list.left))
        }
        return buildArray(list.right, (child) =>
          isJsonAccessor(child) ? realize(child, ancestors) : Either.left(conversionError("array element is not an accessor")))
      })
    case "STRING":
      return Either.mapBoth(readString(accessor), { onLeft: fromMismatch, onRight: JsonString.of })
    case "NUMBER":
      return Either.mapBoth(readDecimal(accessor), { onLeft: fromMismatch, onRight: JsonNumber.of })
    case "BOOLEAN":
      return Either.mapBoth(readBoolean(accessor), { onLeft: fromMismatch, onRight: JsonBoolean.of })
    case "NULL":
      return Either.right(JsonNull.NULL)
  }
}

const fromNumber = (value: number): Conversion =>
  Option.match(decimalFromNumber(value), {
    onNone: () => Either.left(conversionError(`${value} is not a finite number`)),
    onSome: (decimal) => Either.right(JsonNumber.of(decimal))
  })

const convert = (input: unknown, registry: ConverterRegistry, ancestors: Set<object>): Conversion => {
  if (input === null || input === undefined) {
    return Either.right(JsonNull.NULL)
  }
  if (isJsonAccessor(input)) {
    return realize(input, ancestors)
  }
  for (const converter of registry.converters) {
    const converted = converter.tryConvert(input)
    if (Option.isSome(converted)) {
      return converted.value
    }
  }
  const convertChild = (child: unknown): Conversion => convert(child, registry, ancestors)
  switch (typeof input) {
    case "string":
      return Either.right(JsonString.of(input))
    case "number":
      return fromNumber(input)
    case "bigint":
      return Either.right(JsonNumber.of(decimalFromBigInt(input)))
    case "boolean":
      return Either.right(JsonBoolean.of(input))
    case "object":
      break
    default:
      return Either.right(JsonString.of(String(input)))
  }
  if (isDecimal(input)) {
    return Either.right(JsonNumber.of(input))
  }
  if (input instanceof Number) {
    return fromNumber(input.valueOf())
  }
  if (input instanceof Boolean) {
    return Either.right(JsonBoolean.of(input.valueOf()))
  }
  if (input instanceof String) {
    return Either.right(JsonString.of(input.valueOf()))
  }
  if (input instanceof Map) {
    const map: Map<unknown, unknown> = input
    return guarded(input, ancestors, () => buildObject(map.entries(), convertChild))
  }
  if (isPlainObject(input)) {
    return guarded(input, ancestors, () => buildObject(Object.entries(input), convertChild))
  }
  if (isIterable(input)) {
    return guarded(input, ancestors, () => buildArray(input, convertChild))
  }
  return Either.right(JsonString.of(String(input)))
}

/**
 * Convert any native value into a JsonValue.
 *
 * Precedence: null/undefined → Null; accessor → realized through its views;
 * registry converters in order; string; number/bigint/BigDecimal → Number;
 * boolean; Map or plain object → Object (keys via `String`); other
 * iterables → Array; anything else → String via `String(value)`.
 *
 * @param input - Native value.
 * @param registry - Caller-scoped converters, consulted before the built-in rules.
 * @returns JsonValue or the first conversion failure.
 *
 * @pure true
 * @invariant non-finite numbers and cycles are rejected
 * @complexity O(n)
 */
export const of = (input: unknown, registry: ConverterRegistry = emptyRegistry): Conversion =>
  convert(input, registry, new Set())

/**
 * Realize any accessor as an immutable tree; the identity for a JsonValue.
 *
 * @pure true
 * @complexity O(n)
 */
export const toValue = (accessor: JsonAccessor): Conversion => realize(accessor, new Set())
