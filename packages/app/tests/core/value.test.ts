import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"
import * as Equal from "effect/Equal"
import * as Hash from "effect/Hash"
import * as Option from "effect/Option"

import { decimalFromLiteral } from "../../src/core/decimal.js"
import { quoteJsonString } from "../../src/core/escape.js"
import { parse } from "../../src/core/parser.js"
import type { JsonValue } from "../../src/core/value.js"
import { JsonArray, JsonBoolean, JsonNull, JsonNumber, JsonObject, JsonString } from "../../src/core/value.js"

const num = (text: string): JsonNumber => JsonNumber.of(Option.getOrThrow(decimalFromLiteral(text)))

const parsed = (text: string): JsonValue => Either.getOrThrow(parse(text))

describe("structural equality", () => {
  it.effect("ignores key order in objects", () =>
    Effect.sync(() => {
      const left = JsonObject.fromEntries([["a", num("1")], ["b", JsonString.of("x")]])
      const right = JsonObject.fromEntries([["b", JsonString.of("x")], ["a", num("1")]])
      expect(Equal.equals(left, right)).toBe(true)
      expect(Hash.hash(left)).toBe(Hash.hash(right))
    }))

  it.effect("respects element order in arrays", () =>
    Effect.sync(() => {
      const left = JsonArray.fromIterable([num("1"), num("2")])
      const right = JsonArray.fromIterable([num("2"), num("1")])
      expect(Equal.equals(left, right)).toBe(false)
    }))

  it.effect("compares numbers by decimal value", () =>
    Effect.sync(() => {
      expect(Equal.equals(num("1.50"), num("1.5"))).toBe(true)
      expect(Equal.equals(num("1e2"), num("100"))).toBe(true)
      expect(Hash.hash(num("1e2"))).toBe(Hash.hash(num("100")))
      expect(Equal.equals(num("1"), JsonString.of("1"))).toBe(false)
    }))

  it.effect("distinguishes variants with similar content", () =>
    Effect.sync(() => {
      expect(Equal.equals(JsonArray.EMPTY, JsonObject.EMPTY)).toBe(false)
      expect(Equal.equals(JsonNull.NULL, JsonBoolean.FALSE)).toBe(false)
      expect(JsonBoolean.of(true)).toBe(JsonBoolean.TRUE)
    }))
})

describe("strict accessors", () => {
  it.effect("looks up keys and indexes", () =>
    Effect.sync(() => {
      const value = parsed(`{"list":[10,20],"name":"jsonval"}`)
      const list = Either.getOrThrow(value.get("list"))
      expect(Either.getOrThrow(Either.getOrThrow(list.get(1)).int())).toBe(20)
      expect(Either.getOrThrow(Either.getOrThrow(value.get("name")).string())).toBe("jsonval")
      expect(Either.getOrThrow(value.size())).toBe(2)
      expect(Either.getOrThrow(list.size())).toBe(2)
    }))

  it.effect("reports missing keys and indexes as not found", () =>
    Effect.sync(() => {
      const value = parsed(`{"list":[10,20]}`)
      const missing = value.get("zz")
      expect(Either.isLeft(missing)).toBe(true)
      if (Either.isLeft(missing)) {
        expect(missing.left._tag).toBe("JsonNotFound")
        expect(missing.left.message).toBe(`key ${quoteJsonString("zz", true)} not present`)
      }
      const outOfRange = Either.getOrThrow(value.get("list")).get(5)
      expect(Either.isLeft(outOfRange)).toBe(true)
      if (Either.isLeft(outOfRange)) {
        expect(outOfRange.left.message).toBe("index 5 out of bounds for length 2")
      }
    }))

  it.effect("reports the found and expected types on mismatch", () =>
    Effect.sync(() => {
      const number = parsed("12")
      const result = number.string()
      expect(Either.isLeft(result)).toBe(true)
      if (Either.isLeft(result)) {
        expect(result.left.found).toBe("NUMBER")
        expect(result.left.expected).toEqual(["STRING"])
        expect(result.left.message).toBe("string expected, number found")
      }
      const size = JsonString.of("x").size()
      expect(Either.isLeft(size)).toBe(true)
      if (Either.isLeft(size)) {
        expect(size.left.expected).toEqual(["OBJECT", "ARRAY"])
      }
      const byIndex = JsonObject.EMPTY.get(0)
      expect(Either.isLeft(byIndex)).toBe(true)
      if (Either.isLeft(byIndex)) {
        expect(byIndex.left._tag).toBe("JsonTypeMismatch")
      }
    }))

  it.effect("returns None for an absent optional key", () =>
    Effect.sync(() => {
      const value = parsed(`{"a":null}`)
      expect(Option.isNone(Either.getOrThrow(value.getOptional("b")))).toBe(true)
      const present = Option.getOrThrow(Either.getOrThrow(value.getOptional("a")))
      expect(present.isNull()).toBe(true)
      expect(Either.isLeft(JsonNull.NULL.getOptional("a"))).toBe(true)
    }))

  it.effect("narrows numbers", () =>
    Effect.sync(() => {
      const value = parsed("-3.99")
      expect(Either.getOrThrow(value.int())).toBe(-3)
      expect(Either.getOrThrow(value.long())).toBe(BigInt(-3))
      expect(Either.getOrThrow(value.double())).toBe(-3.99)
    }))
})

describe("native views", () => {
  it.effect("exports read-only native data", () =>
    Effect.sync(() => {
      const raw = parsed(`{"a":[true,null,"s"]}`).toRaw()
      expect(raw).toBeInstanceOf(Map)
      if (raw instanceof Map) {
        const list: unknown = raw.get("a")
        expect(list).toEqual([true, null, "s"])
        expect(Object.isFrozen(list)).toBe(true)
      }
    }))

  it.effect("renders compact text from toString", () =>
    Effect.sync(() => {
      const value = JsonObject.fromEntries([["k", JsonArray.fromIterable([num("1.0"), JsonNull.NULL])]])
      expect(value.toString()).toBe(`{"k":[1.0,null]}`)
      expect(value.toValue()).toBe(value)
    }))

  it.effect("keeps elements immutable", () =>
    Effect.sync(() => {
      const value = JsonArray.fromIterable([num("1")])
      expect(Object.isFrozen(value.elements)).toBe(true)
      expect(value.type()).toBe("ARRAY")
    }))
})

describe("immutability", () => {
  it.effect("changing the map returned by entries leaves the object as built", () =>
    Effect.sync(() => {
      const obj = parsed(`{"a":1}`)
      const hashBefore = Hash.hash(obj)
      const view = Either.getOrThrow(obj.entries())
      expect(view instanceof Map).toBe(true)
      if (view instanceof Map) {
        view.set("b", num("2"))
        view.delete("a")
      }
      expect(obj.toString()).toBe(`{"a":1}`)
      expect(Either.getOrThrow(obj.size())).toBe(1)
      expect(Either.isLeft(obj.get("b"))).toBe(true)
      expect(Hash.hash(obj)).toBe(hashBefore)
      expect(Equal.equals(obj, parsed(`{"a":1}`))).toBe(true)
    }))

  it.effect("item lists cannot be changed in place", () =>
    Effect.sync(() => {
      const items = Either.getOrThrow(parsed("[1,2]").items())
      expect(Object.isFrozen(items)).toBe(true)
    }))
})
