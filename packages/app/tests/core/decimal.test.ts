import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Option from "effect/Option"

import type { Decimal } from "../../src/core/decimal.js"
import {
  decimalFromLiteral,
  decimalFromNumber,
  decimalFromParts,
  decimalToDouble,
  decimalToInt,
  decimalToLong,
  formatDecimal
} from "../../src/core/decimal.js"

const literal = (text: string): Decimal => Option.getOrThrow(decimalFromLiteral(text))

const fromNumber = (value: number): string => formatDecimal(Option.getOrThrow(decimalFromNumber(value)))

describe("formatDecimal", () => {
  it.effect("keeps the scale of plain decimals", () =>
    Effect.sync(() => {
      expect(formatDecimal(literal("1.50"))).toBe("1.50")
      expect(formatDecimal(literal("-12.5e-3"))).toBe("-0.0125")
      expect(formatDecimal(literal("0.000001"))).toBe("0.000001")
      expect(formatDecimal(literal("-0"))).toBe("0")
    }))

  it.effect("switches to scientific notation for negative scales and tiny magnitudes", () =>
    Effect.sync(() => {
      expect(formatDecimal(literal("1e2"))).toBe("1E+2")
      expect(formatDecimal(literal("12.5e3"))).toBe("1.25E+4")
      expect(formatDecimal(literal("0.0000001"))).toBe("1E-7")
    }))
})

describe("decimal construction", () => {
  it.effect("builds from native numbers", () =>
    Effect.sync(() => {
      expect(fromNumber(5)).toBe("5")
      expect(fromNumber(0.1)).toBe("0.1")
      expect(fromNumber(1.5e-7)).toBe("1.5E-7")
      expect(fromNumber(1e21)).toBe("1000000000000000000000")
      expect(Option.isNone(decimalFromNumber(Number.NaN))).toBe(true)
      expect(Option.isNone(decimalFromNumber(Number.NEGATIVE_INFINITY))).toBe(true)
    }))

  it.effect("rejects exponents whose scale is not representable", () =>
    Effect.sync(() => {
      expect(Option.isNone(decimalFromParts(false, "1", "", "99999999999999999999"))).toBe(true)
      expect(Option.isNone(decimalFromLiteral("1.2.3"))).toBe(true)
    }))
})

describe("narrowing", () => {
  it.effect("truncates toward zero and wraps to 32 bits", () =>
    Effect.sync(() => {
      expect(decimalToInt(literal("3.99"))).toBe(3)
      expect(decimalToInt(literal("-3.99"))).toBe(-3)
      expect(decimalToInt(literal("0.5"))).toBe(0)
      expect(decimalToInt(literal("1e3"))).toBe(1000)
      expect(decimalToInt(literal("2147483648"))).toBe(-2147483648)
      expect(decimalToInt(literal("4294967297"))).toBe(1)
    }))

  it.effect("wraps to 64 bits for long", () =>
    Effect.sync(() => {
      expect(decimalToLong(literal("9223372036854775808"))).toBe(BigInt("-9223372036854775808"))
      expect(decimalToLong(literal("-7.9"))).toBe(BigInt(-7))
    }))

  it.effect("rounds to the nearest double", () =>
    Effect.sync(() => {
      expect(decimalToDouble(literal("1.5"))).toBe(1.5)
      expect(decimalToDouble(literal("1e400"))).toBe(Number.POSITIVE_INFINITY)
    }))
})
