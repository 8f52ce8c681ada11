import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as BigDecimal from "effect/BigDecimal"
import * as Either from "effect/Either"
import * as Equal from "effect/Equal"
import * as Option from "effect/Option"

import { formatParseError } from "../../src/core/errors.js"
import type { JsonParseError } from "../../src/core/errors.js"
import { parse, parseToRaw } from "../../src/core/parser.js"
import { toCompactJson } from "../../src/core/serializer.js"
import type { JsonValue } from "../../src/core/value.js"

const ok = (text: string): JsonValue => Either.getOrThrow(parse(text))

const failure = (text: string): JsonParseError => {
  const result = parse(text)
  if (Either.isRight(result)) {
    throw new Error(`expected a parse error for ${text}`)
  }
  return result.left
}

const expectFailure = (text: string, message: string, position: number): void => {
  const error = failure(text)
  expect(error.message).toBe(message)
  expect(error.position).toEqual(Option.some(position))
}

describe("parse", () => {
  it.effect("parses every value kind", () =>
    Effect.sync(() => {
      expect(toCompactJson(ok(`{"a":[1,-2.5,true,false,null],"b":"x"}`))).toBe(
        `{"a":[1,-2.5,true,false,null],"b":"x"}`
      )
      expect(toCompactJson(ok(`"\\"\\\\\\/\\b\\f\\n\\r\\t"`))).toBe(`"\\"\\\\\\/\\b\\f\\n\\r\\t"`)
    }))

  it.effect("ignores whitespace around tokens", () =>
    Effect.sync(() => {
      const spaced = ok(" \n{ \"a\" : [ 1 , true ] }\t")
      expect(Equal.equals(spaced, ok(`{"a":[1,true]}`))).toBe(true)
    }))

  it.effect("keeps the first position and the last value of a repeated key", () =>
    Effect.sync(() => {
      expect(toCompactJson(ok(`{"a":1,"b":3,"a":2}`))).toBe(`{"a":2,"b":3}`)
    }))

  it.effect("keeps the exact decimal of a number", () =>
    Effect.sync(() => {
      const hundred = ok("1e2")
      const decimal = Either.getOrThrow(hundred.decimal())
      expect(decimal.value).toBe(1n)
      expect(decimal.scale).toBe(-2)
      expect(Equal.equals(decimal, BigDecimal.fromBigInt(100n))).toBe(true)
      const text = toCompactJson(hundred)
      expect(text).toBe("1E+2")
      expect(toCompactJson(ok(text))).toBe(text)
      expect(toCompactJson(ok("-0.0125"))).toBe("-0.0125")
    }))

  it.effect("joins surrogate escapes into one character", () =>
    Effect.sync(() => {
      const value = ok(`"\\ud83d\\ude00"`)
      expect(Either.getOrThrow(value.string())).toBe("😀")
    }))

  it.effect("accepts an omitted or trailing comma", () =>
    Effect.sync(() => {
      expect(toCompactJson(ok("[1 2]"))).toBe("[1,2]")
      expect(toCompactJson(ok("[1,]"))).toBe("[1]")
      expect(toCompactJson(ok(`{"a":1,}`))).toBe(`{"a":1}`)
      expect(toCompactJson(ok("{ }"))).toBe("{}")
    }))

  it.effect("exposes raw native data", () =>
    Effect.sync(() => {
      const raw = Either.getOrThrow(parseToRaw(`{"a":[null,"s"]}`))
      expect(raw).toEqual(new Map([["a", [null, "s"]]]))
    }))
})

describe("parse errors", () => {
  it.effect("report the offset and the input", () =>
    Effect.sync(() => {
      const error = failure(`{"a":}`)
      expect(error.position).toEqual(Option.some(5))
      expect(formatParseError(error)).toBe(`[5]: not a valid start of a JSON value : {"a":}`)
    }))

  it.effect("cover structural problems", () =>
    Effect.sync(() => {
      expectFailure("", "no valid JSON found", 0)
      expectFailure("   ", "no valid JSON found", 3)
      expectFailure("[1,2", "array is not terminated with ']'", 4)
      expectFailure(`{"a":1`, "object is not terminated with '}'", 6)
      expectFailure("{1:2}", "a field must be of type string", 2)
      expectFailure(`{"a" 1}`, "a field must be followed by ':'", 5)
      expectFailure("1 2", "can only have one top-level JSON value", 2)
      expectFailure("01", "can only have one top-level JSON value", 1)
    }))

  it.effect("cover strings", () =>
    Effect.sync(() => {
      expectFailure(`"\\x"`, "Unexpected escaped character 'x'", 2)
      expectFailure(`"abc`, "string is not terminated with '\"'", 4)
      expectFailure(`"\\u12zz"`, "invalid unicode escape", 6)
    }))

  it.effect("cover literals", () =>
    Effect.sync(() => {
      expectFailure("tru", "unexpected end", 3)
      expectFailure("trux", `expected character "e", "x" found`, 3)
      expectFailure("nul\n", `expected character "l", "\\n" found`, 3)
    }))

  it.effect("cover numbers", () =>
    Effect.sync(() => {
      expectFailure("-", "a number cannot consist of only '-'", 1)
      expectFailure("1.", "a number cannot end with '.'", 2)
      expectFailure("1.x", "must be at least one digit after '.'", 2)
      expectFailure("1e", "a number cannot end with 'e' or 'E'", 2)
      expectFailure("1e+", "a digit must follow {'e','E'}{'+','-'}", 3)
      expectFailure("1e99999999999999999999", "number exponent is out of range", 22)
    }))
})
