import * as Either from "effect/Either"
import * as Equal from "effect/Equal"
import * as Hash from "effect/Hash"
import * as Option from "effect/Option"

import type { JsonAccessor, JsonRaw } from "./accessor.js"
import { JsonAccessorTypeId } from "./accessor.js"
import type { Decimal } from "./decimal.js"
import { decimalToDouble, decimalToInt, decimalToLong } from "./decimal.js"
import type { JsonNotFound, JsonTypeMismatch } from "./errors.js"
import { indexNotFound, keyNotFound, typeMismatch } from "./errors.js"
import type { JsonType } from "./json-type.js"
import { renderCompact } from "./render.js"

// CHANGE: model JSON documents as a closed family of immutable nodes
// WHY: values are shared freely once built, compared structurally and matched exhaustively
// QUOTE(TZ): "constructed once ... then shared freely (read-only) ... no in-place mutation API exists"
// REF: req-value-model-1
// SOURCE: n/a
// FORMAT THEOREM: ∀a,b ∈ JsonValue: Equal.equals(a, b) ↔ same variant ∧ recursively equal contents
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: children are owned by exactly one parent and never undefined
// COMPLEXITY: O(1) accessors, O(n) equality/hash/toRaw

export type JsonValue =
  | JsonObject
  | JsonArray
  | JsonString
  | JsonNumber
  | JsonBoolean
  | JsonNull

/**
 * Shared behaviour of every node: each accessor fails with a type mismatch
 * unless the variant overrides it.
 */
abstract class JsonElement implements JsonAccessor, Equal.Equal {
  readonly [JsonAccessorTypeId]: JsonAccessorTypeId = JsonAccessorTypeId

  abstract type(): JsonType

  abstract toValue(): JsonValue

  abstract toRaw(): JsonRaw

  abstract [Equal.symbol](that: Equal.Equal): boolean

  abstract [Hash.symbol](): number

  /**
   * Strict lookup: a key on an object, an index on an array.
   */
  get(key: string): Either.Either<JsonValue, JsonTypeMismatch | JsonNotFound>
  get(index: number): Either.Either<JsonValue, JsonTypeMismatch | JsonNotFound>
  get(keyOrIndex: string | number): Either.Either<JsonValue, JsonTypeMismatch | JsonNotFound> {
    return Either.left(typeMismatch(this.type(), typeof keyOrIndex === "string" ? "OBJECT" : "ARRAY"))
  }

  getOptional(_key: string): Either.Either<Option.Option<JsonValue>, JsonTypeMismatch> {
    return Either.left(typeMismatch(this.type(), "OBJECT"))
  }

  size(): Either.Either<number, JsonTypeMismatch> {
    return Either.left(typeMismatch(this.type(), "OBJECT", "ARRAY"))
  }

  entries(): Either.Either<ReadonlyMap<string, JsonValue>, JsonTypeMismatch> {
    return Either.left(typeMismatch(this.type(), "OBJECT"))
  }

  items(): Either.Either<ReadonlyArray<JsonValue>, JsonTypeMismatch> {
    return Either.left(typeMismatch(this.type(), "ARRAY"))
  }

  string(): Either.Either<string, JsonTypeMismatch> {
    return Either.left(typeMismatch(this.type(), "STRING"))
  }

  decimal(): Either.Either<Decimal, JsonTypeMismatch> {
    return Either.left(typeMismatch(this.type(), "NUMBER"))
  }

  int(): Either.Either<number, JsonTypeMismatch> {
    return Either.map(this.decimal(), decimalToInt)
  }

  long(): Either.Either<bigint, JsonTypeMismatch> {
    return Either.map(this.decimal(), decimalToLong)
  }

  double(): Either.Either<number, JsonTypeMismatch> {
    return Either.map(this.decimal(), decimalToDouble)
  }

  boolean(): Either.Either<boolean, JsonTypeMismatch> {
    return Either.left(typeMismatch(this.type(), "BOOLEAN"))
  }

  isNull(): boolean {
    return false
  }

  /**
   * Compact JSON text.
   */
  toString(): string {
    return renderCompact(this.toValue(), false)
  }
}

export class JsonObject extends JsonElement {
  readonly _tag = "JsonObject"

  static readonly EMPTY: JsonObject = new JsonObject(new Map())

  private constructor(private readonly fields: Map<string, JsonValue>) {
    super()
  }

  /**
   * Build an object from entries; a repeated key keeps its first position
   * and its last value.
   */
  static fromEntries(entries: Iterable<readonly [string, JsonValue]>): JsonObject {
    const fields = new Map<string, JsonValue>()
    for (const [key, value] of entries) {
      fields.set(key, value)
    }
    return new JsonObject(fields)
  }

  /**
   * Take ownership of a freshly built map without copying it. The caller
   * must not keep a reference to `fields`.
   */
  static unsafeFromMap(fields: Map<string, JsonValue>): JsonObject {
    return new JsonObject(fields)
  }

  type(): JsonType {
    return "OBJECT"
  }

  toValue(): JsonValue {
    return this
  }

  override get(key: string): Either.Either<JsonValue, JsonTypeMismatch | JsonNotFound>
  override get(index: number): Either.Either<JsonValue, JsonTypeMismatch | JsonNotFound>
  override get(keyOrIndex: string | number): Either.Either<JsonValue, JsonTypeMismatch | JsonNotFound> {
    if (typeof keyOrIndex === "number") {
      return Either.left(typeMismatch("OBJECT", "ARRAY"))
    }
    const value = this.fields.get(keyOrIndex)
    return value === undefined ? Either.left(keyNotFound(keyOrIndex)) : Either.right(value)
  }

  override getOptional(key: string): Either.Either<Option.Option<JsonValue>, JsonTypeMismatch> {
    return Either.right(Option.fromNullable(this.fields.get(key)))
  }

  override size(): Either.Either<number, JsonTypeMismatch> {
    return Either.right(this.fields.size)
  }

  /**
   * A copy of the members; changing it leaves this object untouched.
   */
  override entries(): Either.Either<ReadonlyMap<string, JsonValue>, JsonTypeMismatch> {
    return Either.right(new Map(this.fields))
  }

  // walks the members in insertion order without exposing the backing map
  asEntries(): IterableIterator<readonly [string, JsonValue]> {
    return this.fields.entries()
  }

  toRaw(): JsonRaw {
    const result = new Map<string, JsonRaw>()
    for (const [key, value] of this.fields) {
      result.set(key, value.toRaw())
    }
    return result
  }

  [Equal.symbol](that: Equal.Equal): boolean {
    if (!(that instanceof JsonObject) || that.fields.size !== this.fields.size) {
      return false
    }
    for (const [key, value] of this.fields) {
      const other = that.fields.get(key)
      if (other === undefined || !Equal.equals(value, other)) {
        return false
      }
    }
    return true
  }

  // order-independent: entries are summed, not chained
  [Hash.symbol](): number {
    let sum = 0
    for (const [key, value] of this.fields) {
      sum = (sum + Hash.combine(Hash.hash(value))(Hash.string(key))) | 0
    }
    return Hash.cached(this, Hash.optimize(Hash.combine(sum)(Hash.string("JsonObject"))))
  }
}

export class JsonArray extends JsonElement {
  readonly _tag = "JsonArray"

  static readonly EMPTY: JsonArray = new JsonArray([])

  private constructor(readonly elements: ReadonlyArray<JsonValue>) {
    super()
  }

  static fromIterable(elements: Iterable<JsonValue>): JsonArray {
    return new JsonArray(Object.freeze([...elements]))
  }

  /**
   * Take ownership of a freshly built array without copying it.
   */
  static unsafeFromArray(elements: Array<JsonValue>): JsonArray {
    return new JsonArray(Object.freeze(elements))
  }

  type(): JsonType {
    return "ARRAY"
  }

  toValue(): JsonValue {
    return this
  }

  override get(key: string): Either.Either<JsonValue, JsonTypeMismatch | JsonNotFound>
  override get(index: number): Either.Either<JsonValue, JsonTypeMismatch | JsonNotFound>
  override get(keyOrIndex: string | number): Either.Either<JsonValue, JsonTypeMismatch | JsonNotFound> {
    if (typeof keyOrIndex === "string") {
      return Either.left(typeMismatch("ARRAY", "OBJECT"))
    }
    const value = Number.isInteger(keyOrIndex) && keyOrIndex >= 0 ? this.elements[keyOrIndex] : undefined
    return value === undefined ? Either.left(indexNotFound(keyOrIndex, this.elements.length)) : Either.right(value)
  }

  override size(): Either.Either<number, JsonTypeMismatch> {
    return Either.right(this.elements.length)
  }

  override items(): Either.Either<ReadonlyArray<JsonValue>, JsonTypeMismatch> {
    return Either.right(this.elements)
  }

  asList(): ReadonlyArray<JsonAccessor> {
    return this.elements
  }

  toRaw(): JsonRaw {
    return Object.freeze(this.elements.map((element) => element.toRaw()))
  }

  [Equal.symbol](that: Equal.Equal): boolean {
    if (!(that instanceof JsonArray) || that.elements.length !== this.elements.length) {
      return false
    }
    return this.elements.every((element, index) => {
      const other = that.elements[index]
      return other !== undefined && Equal.equals(element, other)
    })
  }

  [Hash.symbol](): number {
    let hash = Hash.string("JsonArray")
    for (const element of this.elements) {
      hash = Hash.combine(Hash.hash(element))(hash)
    }
    return Hash.cached(this, Hash.optimize(hash))
  }
}

export class JsonString extends JsonElement {
  readonly _tag = "JsonString"

  private constructor(readonly value: string) {
    super()
  }

  static of(value: string): JsonString {
    return new JsonString(value)
  }

  type(): JsonType {
    return "STRING"
  }

  toValue(): JsonValue {
    return this
  }

  override string(): Either.Either<string, JsonTypeMismatch> {
    return Either.right(this.value)
  }

  asString(): string {
    return this.value
  }

  toRaw(): JsonRaw {
    return this.value
  }

  [Equal.symbol](that: Equal.Equal): boolean {
    return that instanceof JsonString && that.value === this.value
  }

  [Hash.symbol](): number {
    return Hash.cached(this, Hash.string(this.value))
  }
}

export class JsonNumber extends JsonElement {
  readonly _tag = "JsonNumber"

  private constructor(readonly value: Decimal) {
    super()
  }

  static of(value: Decimal): JsonNumber {
    return new JsonNumber(value)
  }

  type(): JsonType {
    return "NUMBER"
  }

  toValue(): JsonValue {
    return this
  }

  override decimal(): Either.Either<Decimal, JsonTypeMismatch> {
    return Either.right(this.value)
  }

  asDecimal(): Decimal {
    return this.value
  }

  toRaw(): JsonRaw {
    return this.value
  }

  // decimal equality ignores scale: 1.50 equals 1.5
  [Equal.symbol](that: Equal.Equal): boolean {
    return that instanceof JsonNumber && Equal.equals(this.value, that.value)
  }

  [Hash.symbol](): number {
    return Hash.hash(this.value)
  }
}

export class JsonBoolean extends JsonElement {
  readonly _tag = "JsonBoolean"

  static readonly TRUE: JsonBoolean = new JsonBoolean(true)

  static readonly FALSE: JsonBoolean = new JsonBoolean(false)

  private constructor(readonly value: boolean) {
    super()
  }

  static of(value: boolean): JsonBoolean {
    return value ? JsonBoolean.TRUE : JsonBoolean.FALSE
  }

  type(): JsonType {
    return "BOOLEAN"
  }

  toValue(): JsonValue {
    return this
  }

  override boolean(): Either.Either<boolean, JsonTypeMismatch> {
    return Either.right(this.value)
  }

  asBoolean(): boolean {
    return this.value
  }

  toRaw(): JsonRaw {
    return this.value
  }

  [Equal.symbol](that: Equal.Equal): boolean {
    return that instanceof JsonBoolean && that.value === this.value
  }

  [Hash.symbol](): number {
    return Hash.hash(this.value)
  }
}

export class JsonNull extends JsonElement {
  readonly _tag = "JsonNull"

  static readonly NULL: JsonNull = new JsonNull()

  private constructor() {
    super()
  }

  type(): JsonType {
    return "NULL"
  }

  toValue(): JsonValue {
    return this
  }

  override isNull(): boolean {
    return true
  }

  toRaw(): JsonRaw {
    return null
  }

  [Equal.symbol](that: Equal.Equal): boolean {
    return that instanceof JsonNull
  }

  [Hash.symbol](): number {
    return Hash.string("JsonNull")
  }
}

export const isJsonValue = (value: unknown): value is JsonValue => value instanceof JsonElement
