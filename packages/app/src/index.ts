// CHANGE: expose the library surface from one entry point
// WHY: consumers import values, parser and serializer without deep paths
// QUOTE(TZ): n/a
// REF: req-public-api-1
// SOURCE: n/a
// FORMAT THEOREM: n/a
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: only core modules are re-exported; file and CLI glue stay in shell/ and app/
// COMPLEXITY: O(1)

export * from "./core/accessor.js"
export * from "./core/convert.js"
export * from "./core/decimal.js"
export * from "./core/errors.js"
export * from "./core/escape.js"
export * from "./core/json-type.js"
export * from "./core/json.js"
export * from "./core/parser.js"
export * from "./core/reader-source.js"
export type { IndentLayout, JsonSink } from "./core/render.js"
export * from "./core/serializer.js"
export type { CharacterSource } from "./core/source.js"
export { makeStringSource } from "./core/source.js"
export * from "./core/value.js"
