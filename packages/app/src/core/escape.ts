// CHANGE: encode raw strings as JSON string literals
// WHY: both renderings and error messages quote strings with one escaping table
// QUOTE(TZ): "always escape \" \\ / \b \f \n \r \t"
// REF: req-serialize-escape-1
// SOURCE: n/a
// FORMAT THEOREM: ∀s: parseString(quote(s, ascii)) = s
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: ascii=true → every emitted code unit ∈ [0x20, 0x7E]
// COMPLEXITY: O(n)/O(n)

const shortEscapes: Readonly<Record<string, string>> = {
  "\"": "\\\"",
  "\\": "\\\\",
  "/": "\\/",
  "\b": "\\b",
  "\f": "\\f",
  "\n": "\\n",
  "\r": "\\r",
  "\t": "\\t"
}

const isPrintableAscii = (code: number): boolean => code >= 0x20 && code <= 0x7e

const unicodeEscape = (code: number): string => `\\u${code.toString(16).padStart(4, "0")}`

/**
 * Escape the contents of a string literal, without the surrounding quotes.
 *
 * Works on UTF-16 code units, so a character outside the BMP is written as
 * two `\u` escapes in ASCII mode.
 *
 * @param value - Raw string.
 * @param ascii - Escape every code unit outside printable ASCII.
 * @returns Escaped body.
 *
 * @pure true
 * @complexity O(n)
 */
export const escapeJsonString = (value: string, ascii: boolean): string => {
  let result = ""
  for (let index = 0; index < value.length; index++) {
    const char = value.charAt(index)
    const short = shortEscapes[char]
    if (short !== undefined) {
      result += short
      continue
    }
    const code = value.charCodeAt(index)
    result += ascii && !isPrintableAscii(code) ? unicodeEscape(code) : char
  }
  return result
}

export const quoteJsonString = (value: string, ascii: boolean): string => `"${escapeJsonString(value, ascii)}"`
