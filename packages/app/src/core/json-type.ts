// CHANGE: name the six JSON node kinds as a closed tag set
// WHY: every accessor, the parser and the serializer dispatch on the same tags
// QUOTE(TZ): "Object, Array, String, Number, Boolean, Null"
// REF: req-value-type-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v ∈ JsonValue: type(v) ∈ JsonTypes
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: JsonTypes has exactly six members
// COMPLEXITY: O(1)/O(1)

export type JsonType = "OBJECT" | "ARRAY" | "STRING" | "NUMBER" | "BOOLEAN" | "NULL"

export const JsonTypes: ReadonlyArray<JsonType> = [
  "OBJECT",
  "ARRAY",
  "STRING",
  "NUMBER",
  "BOOLEAN",
  "NULL"
]

export const isJsonType = (value: unknown): value is JsonType =>
  typeof value === "string" && JsonTypes.some((type) => type === value)

/**
 * Lower-case label used in human-readable messages ("number", "object").
 */
export const typeLabel = (type: JsonType): string => type.toLowerCase()
