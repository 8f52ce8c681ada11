import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as BigDecimal from "effect/BigDecimal"
import * as Either from "effect/Either"

import { emptyRegistry, makeConverter, of, registerConverter } from "../../src/core/convert.js"
import { fromJson, toJson } from "../../src/core/json.js"
import { parse } from "../../src/core/parser.js"
import { toCompactJson } from "../../src/core/serializer.js"
import { JsonNull, JsonString } from "../../src/core/value.js"

const compact = (input: unknown): string => toCompactJson(Either.getOrThrow(of(input)))

class Label {
  constructor(readonly text: string) {}

  toString(): string {
    return `label:${this.text}`
  }
}

describe("of", () => {
  it.effect("maps absent values to null", () =>
    Effect.sync(() => {
      expect(Either.getOrThrow(of(null))).toBe(JsonNull.NULL)
      expect(Either.getOrThrow(of(undefined))).toBe(JsonNull.NULL)
    }))

  it.effect("converts plain objects, maps and iterables", () =>
    Effect.sync(() => {
      expect(compact({ a: 1, b: [true, "x", null] })).toBe(`{"a":1,"b":[true,"x",null]}`)
      expect(compact(new Map<unknown, unknown>([[1, "one"], ["two", 2]]))).toBe(`{"1":"one","two":2}`)
      expect(compact(new Set([3, 4]))).toBe("[3,4]")
      expect(compact(Int8Array.of(1, -2))).toBe("[1,-2]")
    }))

  it.effect("converts numeric and boolean sources, boxed ones included", () =>
    Effect.sync(() => {
      expect(compact(10n)).toBe("10")
      expect(compact(0.1)).toBe("0.1")
      expect(compact(BigDecimal.make(150n, 2))).toBe("1.50")
      expect(compact(new Number(2))).toBe("2")
      expect(compact(new Boolean(false))).toBe("false")
      expect(compact(new String("s"))).toBe(`"s"`)
    }))

  it.effect("falls back to the text form of other values", () =>
    Effect.sync(() => {
      expect(compact(new Label("x"))).toBe(`"label:x"`)
    }))

  it.effect("returns an existing value unchanged", () =>
    Effect.sync(() => {
      const value = Either.getOrThrow(parse("[1]"))
      expect(Either.getOrThrow(of(value))).toBe(value)
    }))

  it.effect("rejects non-finite numbers", () =>
    Effect.sync(() => {
      const result = of({ ratio: Number.POSITIVE_INFINITY })
      expect(Either.isLeft(result)).toBe(true)
      if (Either.isLeft(result)) {
        expect(result.left._tag).toBe("JsonConversionError")
        expect(result.left.message).toBe("Infinity is not a finite number")
      }
    }))

  it.effect("rejects cycles but accepts shared subtrees", () =>
    Effect.sync(() => {
      const cyclic: Array<unknown> = []
      cyclic.push(cyclic)
      const result = of(cyclic)
      expect(Either.isLeft(result) && result.left.message).toBe("cyclic structure cannot be converted to JSON")
      const shared = [1]
      expect(compact([shared, shared])).toBe("[[1],[1]]")
    }))
})

describe("converter registry", () => {
  const dates = makeConverter(
    "date",
    (value: unknown): value is Date => value instanceof Date,
    (date) => Either.right(JsonString.of(date.toISOString()))
  )

  it.effect("consults registered converters before the built-in rules", () =>
    Effect.sync(() => {
      const registry = registerConverter(emptyRegistry, dates)
      const value = Either.getOrThrow(of({ at: new Date(0) }, registry))
      expect(toCompactJson(value)).toBe(`{"at":"1970-01-01T00:00:00.000Z"}`)
    }))

  it.effect("leaves the earlier registry untouched", () =>
    Effect.sync(() => {
      const registry = registerConverter(emptyRegistry, dates)
      expect(registry.converters).toHaveLength(1)
      expect(emptyRegistry.converters).toHaveLength(0)
    }))
})

describe("plain JSON bridge", () => {
  it.effect("converts to and from plain data", () =>
    Effect.sync(() => {
      const value = Either.getOrThrow(parse(`{"a":[1.5,"x",null,true],"b":{}}`))
      expect(toJson(value)).toEqual({ a: [1.5, "x", null, true], b: {} })
      expect(toCompactJson(Either.getOrThrow(fromJson({ k: [2] })))).toBe(`{"k":[2]}`)
    }))
})
