import * as Either from "effect/Either"
import * as Option from "effect/Option"

import type { FormattingError } from "./errors.js"
import { formattingError } from "./errors.js"
import type { Profile } from "./representation.js"
import { encodeString } from "./string-codec.js"
import type { Value } from "./value.js"

// CHANGE: render a Value tree as tab-indented JSON text
// WHY: give parse_text a deterministic inverse for every representable tree
// QUOTE(ECMA-404): "Insignificant whitespace is allowed before or after any of the six structural characters"
// REF: req-serializer-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v representable: parseText(format(v)) ≡ v (objects compared as key sets)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: one tab per depth, no separator after the last element, empty containers on one line
// COMPLEXITY: O(n)/O(n)

type Rendered = Either.Either<string, FormattingError>

const indent = (depth: number): string => "\t".repeat(depth)

const quoted = <I, F>(text: string, profile: Profile<I, F>): Rendered =>
  Either.map(encodeString(text, profile.string), (escaped) => `"${escaped}"`)

const literal = <A>(text: Option.Option<string>, value: A, representation: string): Rendered =>
  Option.match(text, {
    onNone: () =>
      Either.left(formattingError("CONVERSION_FAILURE", `${String(value)} is not representable as ${representation}`)),
    onSome: (rendered) => Either.right(rendered)
  })

const renderLines = (
  open: string,
  close: string,
  lines: ReadonlyArray<string>,
  depth: number
): string =>
  lines.length === 0
    ? `${open}${close}`
    : `${open}\n${lines.map((line) => `${indent(depth + 1)}${line}`).join(",\n")}\n${indent(depth)}${close}`

const renderArray = <I, F>(
  items: ReadonlyArray<Value<I, F>>,
  depth: number,
  profile: Profile<I, F>
): Rendered => {
  const lines: Array<string> = []
  for (const item of items) {
    const rendered = render(item, depth + 1, profile)
    if (Either.isLeft(rendered)) {
      return Either.left(rendered.left)
    }
    lines.push(rendered.right)
  }
  return Either.right(renderLines("[", "]", lines, depth))
}

const renderObject = <I, F>(
  entries: ReadonlyMap<string, Value<I, F>>,
  depth: number,
  profile: Profile<I, F>
): Rendered => {
  const lines: Array<string> = []
  for (const [key, entry] of entries) {
    const renderedKey = quoted(key, profile)
    if (Either.isLeft(renderedKey)) {
      return Either.left(renderedKey.left)
    }
    const rendered = render(entry, depth + 1, profile)
    if (Either.isLeft(rendered)) {
      return Either.left(rendered.left)
    }
    lines.push(`${renderedKey.right}: ${rendered.right}`)
  }
  return Either.right(renderLines("{", "}", lines, depth))
}

const render = <I, F>(value: Value<I, F>, depth: number, profile: Profile<I, F>): Rendered => {
  switch (value._tag) {
    case "Null":
      return Either.right("null")
    case "Bool":
      return Either.right(value.value ? "true" : "false")
    case "Integer":
      return literal(profile.integer.toLiteral(value.value), value.value, profile.integer.name)
    case "Float":
      return literal(profile.float.toLiteral(value.value), value.value, profile.float.name)
    case "String":
      return quoted(value.value, profile)
    case "Array":
      return renderArray(value.items, depth, profile)
    case "Object":
      return renderObject(value.entries, depth, profile)
  }
}

/**
 * Serialize a Value tree to indented JSON text.
 *
 * @param value - Tree to serialize.
 * @param profile - Representations the tree was built with.
 * @returns Either with the JSON text (no trailing newline) or a formatting error.
 *
 * @pure true
 * @invariant object members follow the Map's iteration order
 * @complexity O(n)
 */
export const format = <I, F>(value: Value<I, F>, profile: Profile<I, F>): Rendered => render(value, 0, profile)
