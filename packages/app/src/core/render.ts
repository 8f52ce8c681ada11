import { Match } from "effect"

import { formatDecimal } from "./decimal.js"
import { quoteJsonString } from "./escape.js"
import type { JsonBoolean, JsonNull, JsonNumber, JsonString, JsonValue } from "./value.js"

// CHANGE: render value trees as JSON text into a chunk sink
// WHY: compact and indented output share one variant dispatch and one escaping table
// QUOTE(TZ): "Two renderings sharing the same variant dispatch"
// REF: req-serialize-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v: parse(render(v)) ≡ v
// PURITY: CORE
// EFFECT: n/a (sink errors propagate unchanged)
// INVARIANT: rendering never fails on a well-formed tree
// COMPLEXITY: O(n) where n = output length

export interface JsonSink {
  readonly write: (chunk: string) => void
}

export interface IndentLayout {
  readonly indent: number
  readonly lineSeparator: string
}

type JsonScalar = JsonString | JsonNumber | JsonBoolean | JsonNull

const scalarText = (value: JsonScalar, ascii: boolean): string =>
  Match.value(value).pipe(
    Match.tag("JsonString", (node) => quoteJsonString(node.value, ascii)),
    Match.tag("JsonNumber", (node) => formatDecimal(node.value)),
    Match.tag("JsonBoolean", (node) => (node.value ? "true" : "false")),
    Match.tag("JsonNull", () => "null"),
    Match.exhaustive
  )

/**
 * Write the compact rendering of `value` into `sink`.
 *
 * @pure false
 * @effect sink.write
 * @complexity O(n)
 */
export const writeCompact = (value: JsonValue, sink: JsonSink, ascii: boolean): void => {
  switch (value._tag) {
    case "JsonObject": {
      sink.write("{")
      let first = true
      for (const [key, child] of value.asEntries()) {
        if (!first) {
          sink.write(",")
        }
        first = false
        sink.write(quoteJsonString(key, ascii))
        sink.write(":")
        writeCompact(child, sink, ascii)
      }
      sink.write("}")
      return
    }
    case "JsonArray": {
      sink.write("[")
      value.elements.forEach((child, index) => {
        if (index > 0) {
          sink.write(",")
        }
        writeCompact(child, sink, ascii)
      })
      sink.write("]")
      return
    }
    default:
      sink.write(scalarText(value, ascii))
  }
}

/**
 * Write the indented rendering of `value` into `sink`. Each container opens
 * a new level `layout.indent` spaces deeper than `prefix`; empty containers
 * stay on one line.
 *
 * @pure false
 * @effect sink.write
 * @invariant layout.indent ≥ 0 (checked by callers)
 * @complexity O(n)
 */
export const writeIndented = (
  value: JsonValue,
  sink: JsonSink,
  ascii: boolean,
  layout: IndentLayout,
  prefix = 0
): void => {
  const outer = " ".repeat(prefix)
  const inner = outer + " ".repeat(layout.indent)
  const nested = prefix + layout.indent
  switch (value._tag) {
    case "JsonObject": {
      let first = true
      for (const [key, child] of value.asEntries()) {
        sink.write(first ? `{${layout.lineSeparator}` : `,${layout.lineSeparator}`)
        first = false
        sink.write(inner)
        sink.write(quoteJsonString(key, ascii))
        sink.write(": ")
        writeIndented(child, sink, ascii, layout, nested)
      }
      sink.write(first ? "{}" : layout.lineSeparator + outer + "}")
      return
    }
    case "JsonArray": {
      if (value.elements.length === 0) {
        sink.write("[]")
        return
      }
      sink.write("[")
      value.elements.forEach((child, index) => {
        sink.write(index === 0 ? layout.lineSeparator : `,${layout.lineSeparator}`)
        sink.write(inner)
        writeIndented(child, sink, ascii, layout, nested)
      })
      sink.write(layout.lineSeparator + outer + "]")
      return
    }
    default:
      sink.write(scalarText(value, ascii))
  }
}

const collect = (run: (sink: JsonSink) => void): string => {
  const chunks: Array<string> = []
  run({ write: (chunk) => chunks.push(chunk) })
  return chunks.join("")
}

export const renderCompact = (value: JsonValue, ascii: boolean): string =>
  collect((sink) => writeCompact(value, sink, ascii))

export const renderIndented = (value: JsonValue, ascii: boolean, layout: IndentLayout): string =>
  collect((sink) => writeIndented(value, sink, ascii, layout))
