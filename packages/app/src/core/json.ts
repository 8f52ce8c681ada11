import type * as Either from "effect/Either"

import type { ConverterRegistry } from "./convert.js"
import { of } from "./convert.js"
import { decimalToDouble } from "./decimal.js"
import type { JsonConversionError } from "./errors.js"
import type { JsonValue } from "./value.js"

// CHANGE: bridge value trees and plain JS JSON data
// WHY: schema decoding and interop code work on ordinary records and numbers
// QUOTE(TZ): n/a
// REF: req-io-json-1
// SOURCE: n/a
// FORMAT THEOREM: ∀x ∈ Json (finite numbers): toJson(fromJson(x)) deep-equals x
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Json is closed under array/object nesting with primitive leaves
// COMPLEXITY: O(n)/O(n)

export type Json =
  | null
  | boolean
  | number
  | string
  | ReadonlyArray<Json>
  | JsonRecord

export interface JsonRecord {
  readonly [key: string]: Json
}

/**
 * Copy a value tree into plain data. Numbers are narrowed to the nearest
 * double, so very large or very precise numbers lose digits.
 *
 * @pure true
 * @complexity O(n)
 */
export const toJson = (value: JsonValue): Json => {
  switch (value._tag) {
    case "JsonObject": {
      const record: Record<string, Json> = {}
      for (const [key, child] of value.asEntries()) {
        Object.defineProperty(record, key, { value: toJson(child), enumerable: true, writable: true, configurable: true })
      }
      return record
    }
    case "JsonArray":
      return value.elements.map(toJson)
    case "JsonString":
      return value.value
    case "JsonNumber":
      return decimalToDouble(value.value)
    case "JsonBoolean":
      return value.value
    case "JsonNull":
      return null
  }
}

/**
 * Typed counterpart of `of` for plain JSON data.
 *
 * @pure true
 * @complexity O(n)
 */
export const fromJson = (
  json: Json,
  registry?: ConverterRegistry
): Either.Either<JsonValue, JsonConversionError> => (registry === undefined ? of(json) : of(json, registry))
