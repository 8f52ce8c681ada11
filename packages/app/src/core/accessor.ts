import * as Either from "effect/Either"
import * as Option from "effect/Option"
import * as Predicate from "effect/Predicate"

import type { Decimal } from "./decimal.js"
import { decimalToDouble, decimalToInt, decimalToLong } from "./decimal.js"
import type { JsonNotFound, JsonTypeMismatch } from "./errors.js"
import { indexNotFound, keyNotFound, typeMismatch } from "./errors.js"
import type { JsonType } from "./json-type.js"

// CHANGE: define the open read protocol shared by immutable values and foreign structures
// WHY: the serializer and the conversion entry point must not depend on one concrete tree type
// QUOTE(TZ): "Single required primitive: type(). All other operations have a default that fails with type-mismatch"
// REF: req-accessor-1
// SOURCE: n/a
// FORMAT THEOREM: ∀a: readX(a) = Right(x) → a.type() = typeOf(X)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: a missing view behaves exactly like a mismatching type tag
// COMPLEXITY: O(1) per read, O(n) for toRawAccessor

export const JsonAccessorTypeId: unique symbol = Symbol.for("jsonval/JsonAccessor")

export type JsonAccessorTypeId = typeof JsonAccessorTypeId

/**
 * Anything that can be read as a JSON node.
 *
 * Only `type()` is required. Each view is consulted only when `type()`
 * returns the matching tag; the reader functions below fail with a type
 * mismatch when the tag differs or the view is absent.
 */
export interface JsonAccessor {
  readonly [JsonAccessorTypeId]: JsonAccessorTypeId
  type(): JsonType
  asList?(): ReadonlyArray<JsonAccessor>
  asEntries?(): Iterable<readonly [string, JsonAccessor]>
  asString?(): string
  asDecimal?(): Decimal
  asBoolean?(): boolean
}

/**
 * Read-only native form of a JSON tree.
 */
export type JsonRaw =
  | null
  | boolean
  | string
  | Decimal
  | ReadonlyArray<JsonRaw>
  | ReadonlyMap<string, JsonRaw>

export const isJsonAccessor = (value: unknown): value is JsonAccessor =>
  Predicate.hasProperty(value, JsonAccessorTypeId) &&
  Predicate.hasProperty(value, "type") &&
  Predicate.isFunction(value.type)

export const readList = (
  accessor: JsonAccessor
): Either.Either<ReadonlyArray<JsonAccessor>, JsonTypeMismatch> => {
  const type = accessor.type()
  if (type !== "ARRAY" || accessor.asList === undefined) {
    return Either.left(typeMismatch(type, "ARRAY"))
  }
  return Either.right(accessor.asList())
}

/**
 * Read an object view as an ordered map. Repeated keys keep the first
 * position and the last value.
 */
export const readEntries = (
  accessor: JsonAccessor
): Either.Either<ReadonlyMap<string, JsonAccessor>, JsonTypeMismatch> => {
  const type = accessor.type()
  if (type !== "OBJECT" || accessor.asEntries === undefined) {
    return Either.left(typeMismatch(type, "OBJECT"))
  }
  const result = new Map<string, JsonAccessor>()
  for (const [key, value] of accessor.asEntries()) {
    result.set(key, value)
  }
  return Either.right(result)
}

export const readString = (accessor: JsonAccessor): Either.Either<string, JsonTypeMismatch> => {
  const type = accessor.type()
  if (type !== "STRING" || accessor.asString === undefined) {
    return Either.left(typeMismatch(type, "STRING"))
  }
  return Either.right(accessor.asString())
}

export const readDecimal = (accessor: JsonAccessor): Either.Either<Decimal, JsonTypeMismatch> => {
  const type = accessor.type()
  if (type !== "NUMBER" || accessor.asDecimal === undefined) {
    return Either.left(typeMismatch(type, "NUMBER"))
  }
  return Either.right(accessor.asDecimal())
}

export const readBoolean = (accessor: JsonAccessor): Either.Either<boolean, JsonTypeMismatch> => {
  const type = accessor.type()
  if (type !== "BOOLEAN" || accessor.asBoolean === undefined) {
    return Either.left(typeMismatch(type, "BOOLEAN"))
  }
  return Either.right(accessor.asBoolean())
}

export const readInt = (accessor: JsonAccessor): Either.Either<number, JsonTypeMismatch> =>
  Either.map(readDecimal(accessor), decimalToInt)

export const readLong = (accessor: JsonAccessor): Either.Either<bigint, JsonTypeMismatch> =>
  Either.map(readDecimal(accessor), decimalToLong)

export const readDouble = (accessor: JsonAccessor): Either.Either<number, JsonTypeMismatch> =>
  Either.map(readDecimal(accessor), decimalToDouble)

export const isNullAccessor = (accessor: JsonAccessor): boolean => accessor.type() === "NULL"

/**
 * Number of entries of an object or elements of an array.
 */
export const readSize = (accessor: JsonAccessor): Either.Either<number, JsonTypeMismatch> => {
  const type = accessor.type()
  if (type === "OBJECT") {
    return Either.map(readEntries(accessor), (entries) => entries.size)
  }
  if (type === "ARRAY") {
    return Either.map(readList(accessor), (list) => list.length)
  }
  return Either.left(typeMismatch(type, "OBJECT", "ARRAY"))
}

export const readOptional = (
  accessor: JsonAccessor,
  key: string
): Either.Either<Option.Option<JsonAccessor>, JsonTypeMismatch> =>
  Either.map(readEntries(accessor), (entries) => Option.fromNullable(entries.get(key)))

export const readKey = (
  accessor: JsonAccessor,
  key: string
): Either.Either<JsonAccessor, JsonTypeMismatch | JsonNotFound> =>
  Either.flatMap(
    readOptional(accessor, key),
    (found): Either.Either<JsonAccessor, JsonNotFound> =>
      Option.match(found, {
        onNone: () => Either.left(keyNotFound(key)),
        onSome: (value) => Either.right(value)
      })
  )

export const readIndex = (
  accessor: JsonAccessor,
  index: number
): Either.Either<JsonAccessor, JsonTypeMismatch | JsonNotFound> =>
  Either.flatMap(readList(accessor), (list) => {
    const element = Number.isInteger(index) && index >= 0 ? list[index] : undefined
    return element === undefined ? Either.left(indexNotFound(index, list.length)) : Either.right(element)
  })

/**
 * Recursively copy any accessor into read-only native data.
 *
 * @param accessor - Root node.
 * @returns JsonRaw tree or the first type mismatch met while walking it.
 *
 * @pure true
 * @invariant arrays are frozen; maps keep insertion order
 * @complexity O(n) where n = number of nodes
 */
export const toRawAccessor = (accessor: JsonAccessor): Either.Either<JsonRaw, JsonTypeMismatch> => {
  const type = accessor.type()
  switch (type) {
    case "OBJECT": {
      const entries = readEntries(accessor)
      if (Either.isLeft(entries)) {
        return Either.left(entries.left)
      }
      const result = new Map<string, JsonRaw>()
      for (const [key, value] of entries.right) {
        const raw = toRawAccessor(value)
        if (Either.isLeft(raw)) {
          return Either.left(raw.left)
        }
        result.set(key, raw.right)
      }
      return Either.right(result)
    }
    case "ARRAY": {
      const list = readList(accessor)
      if (Either.isLeft(list)) {
        return Either.left(list.left)
      }
      const result: Array<JsonRaw> = []
      for (const value of list.right) {
        const raw = toRawAccessor(value)
        if (Either.isLeft(raw)) {
          return Either.left(raw.left)
        }
        result.push(raw.right)
      }
      return Either.right(Object.freeze(result))
    }
    case "STRING":
      return readString(accessor)
    case "NUMBER":
      return readDecimal(accessor)
    case "BOOLEAN":
      return readBoolean(accessor)
    case "NULL":
      return Either.right(null)
  }
}
