import * as Either from "effect/Either"
import * as Option from "effect/Option"

import type { JsonParseError } from "./errors.js"
import { parseError } from "./errors.js"
import { quoteJsonString } from "./escape.js"

// CHANGE: describe what the parser reads from and adapt in-memory text to it
// WHY: one grammar algorithm serves every input kind through a five-operation contract
// QUOTE(TZ): "a single algorithm generic over a small source contract (current, advance, hasMore, matchLiteral, error)"
// REF: req-parser-source-1
// SOURCE: n/a
// FORMAT THEOREM: ∀s: s.hasMore() → s.current() is defined
// PURITY: CORE (mutable cursor local to one parse call)
// EFFECT: n/a
// INVARIANT: a source is consumed by at most one parse
// COMPLEXITY: O(1) per operation

/**
 * Single-lookahead character stream consumed by the parser.
 *
 * `current()` is only meaningful while `hasMore()` holds. `matchLiteral`
 * checks the characters that follow the current one and leaves the source
 * positioned after the literal.
 */
export interface CharacterSource {
  readonly current: () => string
  readonly advance: () => void
  readonly hasMore: () => boolean
  readonly matchLiteral: (rest: string) => Either.Either<void, JsonParseError>
  readonly error: (message: string) => JsonParseError
}

export const unexpectedEnd = "unexpected end"

export const literalMismatch = (expected: string, found: string): string =>
  `expected character "${expected}", ${quoteJsonString(found, false)} found`

/**
 * Random-access source over a string. Errors carry the 0-based offset of the
 * current character and the whole input.
 *
 * @pure false
 * @effect mutates its own cursor
 * @complexity O(1) per step
 */
export const makeStringSource = (input: string): CharacterSource => {
  let position = 0

  const error = (message: string): JsonParseError =>
    parseError(message, Option.some(position), Option.some(input))

  return {
    current: () => input.charAt(position),
    advance: () => {
      position++
    },
    hasMore: () => position < input.length,
    matchLiteral: (rest) => {
      for (const expected of rest) {
        position++
        if (position >= input.length) {
          return Either.left(error(unexpectedEnd))
        }
        const found = input.charAt(position)
        if (found !== expected) {
          return Either.left(error(literalMismatch(expected, found)))
        }
      }
      position++
      return Either.right(undefined)
    },
    error
  }
}
