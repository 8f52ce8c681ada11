import * as BigDecimal from "effect/BigDecimal"
import * as Option from "effect/Option"

// CHANGE: exact decimal support for JSON numbers on top of effect/BigDecimal
// WHY: numbers keep every digit of their lexeme instead of collapsing to a double
// QUOTE(TZ): "the exact matched lexeme is parsed as an arbitrary-precision decimal"
// REF: req-number-1
// SOURCE: n/a
// FORMAT THEOREM: ∀d: decimalFromLiteral(formatDecimal(d)) = Some(d') ∧ d'.value = d.value ∧ d'.scale = d.scale
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: scale is a safe integer; no NaN or infinity is representable
// COMPLEXITY: O(n) where n = number of digits

export type Decimal = BigDecimal.BigDecimal

const literalPattern = /^(-?)(\d+)(?:\.(\d+))?(?:[eE]([+-]?\d+))?$/u

/**
 * Build a decimal from the pieces of a number lexeme.
 *
 * @param negative - Leading '-' present.
 * @param integer - Integer digits.
 * @param fraction - Fraction digits (may be empty).
 * @param exponent - Signed exponent digits (may be empty).
 * @returns None when the resulting scale is not a safe integer.
 *
 * @pure true
 * @invariant value × 10^-scale equals the lexeme exactly
 * @complexity O(n)
 */
export const decimalFromParts = (
  negative: boolean,
  integer: string,
  fraction: string,
  exponent: string
): Option.Option<Decimal> => {
  const power = exponent.length === 0 ? 0 : Number(exponent)
  const scale = fraction.length - power
  if (!Number.isSafeInteger(scale)) {
    return Option.none()
  }
  const digits = `${negative ? "-" : ""}${integer}${fraction}`
  return Option.some(BigDecimal.make(BigInt(digits), scale))
}

/**
 * Parse a complete number literal (JSON grammar, leading zeros tolerated).
 *
 * @pure true
 * @complexity O(n)
 */
export const decimalFromLiteral = (text: string): Option.Option<Decimal> => {
  const match = literalPattern.exec(text)
  if (match === null) {
    return Option.none()
  }
  return decimalFromParts(match[1] === "-", match[2] ?? "0", match[3] ?? "", match[4] ?? "")
}

/**
 * Convert a double. Integral values get scale 0; other values use the
 * shortest decimal text that round-trips to the same double.
 *
 * @returns None for NaN and infinities.
 *
 * @pure true
 * @complexity O(1)
 */
export const decimalFromNumber = (value: number): Option.Option<Decimal> => {
  if (!Number.isFinite(value)) {
    return Option.none()
  }
  if (Number.isInteger(value)) {
    return Option.some(BigDecimal.make(BigInt(value), 0))
  }
  return decimalFromLiteral(String(value))
}

export const decimalFromBigInt = (value: bigint): Decimal => BigDecimal.make(value, 0)

/**
 * Canonical text of a decimal. Scale is preserved (`1.50` stays `1.50`);
 * scientific notation with an upper-case `E` is used when the scale is
 * negative or the adjusted exponent drops below -6.
 *
 * @pure true
 * @invariant output is a valid JSON number
 * @complexity O(n)
 */
export const formatDecimal = (decimal: Decimal): string => {
  const negative = decimal.value < BigInt(0)
  const sign = negative ? "-" : ""
  const coefficient = (negative ? -decimal.value : decimal.value).toString()
  const scale = decimal.scale
  const adjusted = coefficient.length - 1 - scale
  if (scale >= 0 && adjusted >= -6) {
    if (scale === 0) {
      return sign + coefficient
    }
    if (coefficient.length > scale) {
      const point = coefficient.length - scale
      return `${sign}${coefficient.slice(0, point)}.${coefficient.slice(point)}`
    }
    return `${sign}0.${"0".repeat(scale - coefficient.length)}${coefficient}`
  }
  const mantissa = coefficient.length > 1
    ? `${coefficient.slice(0, 1)}.${coefficient.slice(1)}`
    : coefficient
  const exponent = adjusted >= 0 ? `+${adjusted}` : `${adjusted}`
  return `${sign}${mantissa}E${exponent}`
}

const ten = BigInt(10)
const zero = BigInt(0)

// 10^k is divisible by 2^64 once k ≥ 64, so wider shifts wrap to zero
const maxWrappingShift = 64

const truncateToBigInt = (decimal: Decimal): bigint => {
  if (decimal.scale > 0) {
    const digits = (decimal.value < zero ? -decimal.value : decimal.value).toString().length
    return decimal.scale > digits ? zero : decimal.value / ten ** BigInt(decimal.scale)
  }
  if (-decimal.scale >= maxWrappingShift) {
    return zero
  }
  return decimal.value * ten ** BigInt(-decimal.scale)
}

/**
 * Narrow to a 32-bit signed integer: drop the fraction, keep the low 32 bits.
 *
 * @pure true
 */
export const decimalToInt = (decimal: Decimal): number => Number(BigInt.asIntN(32, truncateToBigInt(decimal)))

/**
 * Narrow to a 64-bit signed integer: drop the fraction, keep the low 64 bits.
 *
 * @pure true
 */
export const decimalToLong = (decimal: Decimal): bigint => BigInt.asIntN(64, truncateToBigInt(decimal))

/**
 * Nearest double; magnitudes beyond the double range become ±Infinity.
 *
 * @pure true
 */
export const decimalToDouble = (decimal: Decimal): number => Number(formatDecimal(decimal))

export const isDecimal = (value: unknown): value is Decimal => BigDecimal.isBigDecimal(value)
