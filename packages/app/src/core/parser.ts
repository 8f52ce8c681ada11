import * as Either from "effect/Either"
import * as Option from "effect/Option"

import type { JsonRaw } from "./accessor.js"
import { decimalFromParts } from "./decimal.js"
import type { JsonIoError, JsonParseError } from "./errors.js"
import type { CharacterReader } from "./reader-source.js"
import { makeReaderSource, withReadFailure } from "./reader-source.js"
import type { CharacterSource } from "./source.js"
import { makeStringSource } from "./source.js"
import type { JsonValue } from "./value.js"
import { JsonArray, JsonBoolean, JsonNull, JsonNumber, JsonObject, JsonString } from "./value.js"

// CHANGE: recursive-descent JSON parser over any CharacterSource
// WHY: strings and readers share one grammar with identical messages
// QUOTE(TZ): "strict JSON ... one character of lookahead, recursive descent, no backtracking"
// REF: req-parser-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v ∈ JsonValue: parse(toCompactJson(v)) = Right(v') ∧ Equal.equals(v, v')
// PURITY: CORE
// EFFECT: reads from the source only
// INVARIANT: the first error aborts the parse; no partial value escapes
// COMPLEXITY: O(n) time, O(d) stack where d = nesting depth

type Parsed<A> = Either.Either<A, JsonParseError>

const isDigit = (char: string): boolean => char >= "0" && char <= "9"

const isWhitespace = (char: string): boolean => char === " " || char === "\n" || char === "\r" || char === "\t"

const hexUnit = /^[0-9a-fA-F]{4}$/u

const shortEscapes: Readonly<Record<string, string>> = {
  "\"": "\"",
  "\\": "\\",
  "/": "/",
  b: "\b",
  f: "\f",
  n: "\n",
  r: "\r",
  t: "\t"
}

const skipWhitespace = (source: CharacterSource): void => {
  while (source.hasMore() && isWhitespace(source.current())) {
    source.advance()
  }
}

const requireInput = (source: CharacterSource, message: string): Parsed<void> =>
  source.hasMore() ? Either.right(undefined) : Either.left(source.error(message))

const nextChar = (source: CharacterSource, message: string): Parsed<string> => {
  source.advance()
  return source.hasMore() ? Either.right(source.current()) : Either.left(source.error(message))
}

const parseObject = (source: CharacterSource): Parsed<JsonValue> => {
  const unterminated = "object is not terminated with '}'"
  const fields = new Map<string, JsonValue>()
  source.advance()
  skipWhitespace(source)
  const opened = requireInput(source, unterminated)
  if (Either.isLeft(opened)) {
    return Either.left(opened.left)
  }
  while (source.current() !== "}") {
    const key = parseElement(source)
    if (Either.isLeft(key)) {
      return key
    }
    const name = key.right
    if (name._tag !== "JsonString") {
      return Either.left(source.error("a field must be of type string"))
    }
    if (!source.hasMore() || source.current() !== ":") {
      return Either.left(source.error("a field must be followed by ':'"))
    }
    source.advance()
    const value = parseElement(source)
    if (Either.isLeft(value)) {
      return value
    }
    fields.set(name.value, value.right)
    const afterValue = requireInput(source, unterminated)
    if (Either.isLeft(afterValue)) {
      return Either.left(afterValue.left)
    }
    if (source.current() === ",") {
      source.advance()
    }
    const afterComma = requireInput(source, unterminated)
    if (Either.isLeft(afterComma)) {
      return Either.left(afterComma.left)
    }
  }
  source.advance()
  return Either.right(JsonObject.unsafeFromMap(fields))
}

const parseArray = (source: CharacterSource): Parsed<JsonValue> => {
  const unterminated = "array is not terminated with ']'"
  const elements: Array<JsonValue> = []
  source.advance()
  skipWhitespace(source)
  const opened = requireInput(source, unterminated)
  if (Either.isLeft(opened)) {
    return Either.left(opened.left)
  }
  while (source.current() !== "]") {
    const element = parseElement(source)
    if (Either.isLeft(element)) {
      return element
    }
    elements.push(element.right)
    const afterValue = requireInput(source, unterminated)
    if (Either.isLeft(afterValue)) {
      return Either.left(afterValue.left)
    }
    if (source.current() === ",") {
      source.advance()
    }
    const afterComma = requireInput(source, unterminated)
    if (Either.isLeft(afterComma)) {
      return Either.left(afterComma.left)
    }
  }
  source.advance()
  return Either.right(JsonArray.unsafeFromArray(elements))
}

const parseUnicodeEscape = (source: CharacterSource, unterminated: string): Parsed<string> => {
  let hex = ""
  for (let index = 0; index < 4; index++) {
    const digit = nextChar(source, unterminated)
    if (Either.isLeft(digit)) {
      return digit
    }
    hex += digit.right
  }
  if (!hexUnit.test(hex)) {
    return Either.left(source.error("invalid unicode escape"))
  }
  return Either.right(String.fromCharCode(Number.parseInt(hex, 16)))
}

/**
 * Decode a quoted string. `\u` escapes append one UTF-16 code unit each;
 * consecutive surrogate escapes therefore form one astral character.
 */
const parseString = (source: CharacterSource): Parsed<JsonValue> => {
  const unterminated = "string is not terminated with '\"'"
  let text = ""
  for (;;) {
    const char = nextChar(source, unterminated)
    if (Either.isLeft(char)) {
      return Either.left(char.left)
    }
    if (char.right === "\"") {
      break
    }
    if (char.right !== "\\") {
      text += char.right
      continue
    }
    const escaped = nextChar(source, unterminated)
    if (Either.isLeft(escaped)) {
      return Either.left(escaped.left)
    }
    if (escaped.right === "u") {
      const unit = parseUnicodeEscape(source, unterminated)
      if (Either.isLeft(unit)) {
        return Either.left(unit.left)
      }
      text += unit.right
      continue
    }
    const replacement = shortEscapes[escaped.right]
    if (replacement === undefined) {
      return Either.left(source.error(`Unexpected escaped character '${escaped.right}'`))
    }
    text += replacement
  }
  source.advance()
  return Either.right(JsonString.of(text))
}

const parseLiteral = (source: CharacterSource, rest: string, value: JsonValue): Parsed<JsonValue> =>
  Either.map(source.matchLiteral(rest), () => value)

const readDigits = (source: CharacterSource): string => {
  let digits = ""
  while (source.hasMore() && isDigit(source.current())) {
    digits += source.current()
    source.advance()
  }
  return digits
}

const parseNumber = (source: CharacterSource): Parsed<JsonValue> => {
  const negative = source.current() === "-"
  if (negative) {
    source.advance()
    if (!source.hasMore() || !isDigit(source.current())) {
      return Either.left(source.error("a number cannot consist of only '-'"))
    }
  }
  let integer = "0"
  if (source.current() === "0") {
    source.advance()
  } else {
    integer = readDigits(source)
  }
  let fraction = ""
  if (source.hasMore() && source.current() === ".") {
    source.advance()
    if (!source.hasMore()) {
      return Either.left(source.error("a number cannot end with '.'"))
    }
    if (!isDigit(source.current())) {
      return Either.left(source.error("must be at least one digit after '.'"))
    }
    fraction = readDigits(source)
  }
  let exponent = ""
  if (source.hasMore() && (source.current() === "e" || source.current() === "E")) {
    source.advance()
    if (!source.hasMore()) {
      return Either.left(source.error("a number cannot end with 'e' or 'E'"))
    }
    let sign = ""
    if (source.current() === "+" || source.current() === "-") {
      sign = source.current()
      source.advance()
    }
    if (!source.hasMore() || !isDigit(source.current())) {
      return Either.left(source.error("a digit must follow {'e','E'}{'+','-'}"))
    }
    exponent = sign + readDigits(source)
  }
  return Option.match(decimalFromParts(negative, integer, fraction, exponent), {
    onNone: () => Either.left(source.error("number exponent is out of range")),
    onSome: (decimal) => Either.right(JsonNumber.of(decimal))
  })
}

/**
 * Parse one element surrounded by optional whitespace.
 *
 * @pure false
 * @effect advances the source
 * @complexity O(n)
 */
export const parseElement = (source: CharacterSource): Parsed<JsonValue> => {
  skipWhitespace(source)
  if (!source.hasMore()) {
    return Either.left(source.error("no valid JSON found"))
  }
  const char = source.current()
  let result: Parsed<JsonValue>
  if (char === "{") {
    result = parseObject(source)
  } else if (char === "[") {
    result = parseArray(source)
  } else if (char === "\"") {
    result = parseString(source)
  } else if (char === "t") {
    result = parseLiteral(source, "rue", JsonBoolean.TRUE)
  } else if (char === "f") {
    result = parseLiteral(source, "alse", JsonBoolean.FALSE)
  } else if (char === "n") {
    result = parseLiteral(source, "ull", JsonNull.NULL)
  } else if (char === "-" || isDigit(char)) {
    result = parseNumber(source)
  } else {
    return Either.left(source.error("not a valid start of a JSON value"))
  }
  if (Either.isRight(result)) {
    skipWhitespace(source)
  }
  return result
}

/**
 * Parse exactly one top-level value; anything left over is an error.
 *
 * @pure false
 * @effect consumes the source
 */
export const parseDocument = (source: CharacterSource): Parsed<JsonValue> =>
  Either.flatMap(parseElement(source), (value) =>
    source.hasMore()
      ? Either.left(source.error("can only have one top-level JSON value"))
      : Either.right(value))

/**
 * Parse JSON text. Errors carry the 0-based offset and the input.
 *
 * @param text - Complete JSON document.
 * @returns The value tree or the first syntax error.
 *
 * @pure true
 * @invariant Right(v) → v contains no undefined child
 * @complexity O(n)
 */
export const parse = (text: string): Parsed<JsonValue> => parseDocument(makeStringSource(text))

/**
 * Parse from a reader. A read failure wins over any parse outcome; the
 * reader is left open.
 *
 * @pure false
 * @effect reader.read
 */
export const parseReader = (reader: CharacterReader): Either.Either<JsonValue, JsonParseError | JsonIoError> => {
  const source = makeReaderSource(reader)
  return withReadFailure(source, parseDocument(source))
}

export const parseToRaw = (text: string): Parsed<JsonRaw> => Either.map(parse(text), (value) => value.toRaw())
