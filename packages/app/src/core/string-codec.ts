import * as Either from "effect/Either"

import type { FormattingError, ParsingError } from "./errors.js"
import { formattingError, parsingError } from "./errors.js"
import type { StringRepresentation } from "./representation.js"

// CHANGE: decode string-literal bodies and encode strings back into escaped JSON text
// WHY: escape legality is checked here, after the tokenizer captured the raw span
// QUOTE(ECMA-404): "All code points may be placed within the quotation marks except for the code points that must be escaped"
// REF: req-string-codec-1
// SOURCE: n/a
// FORMAT THEOREM: ∀s without control characters: decode(encode(s)) = s
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: every \uXXXX escape yields exactly one UTF-16 code unit
// COMPLEXITY: O(n)/O(n)

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

const shortForms: Readonly<Record<string, string>> = {
  "\"": "\\\"",
  "\\": "\\\\",
  "\b": "\\b",
  "\f": "\\f",
  "\n": "\\n",
  "\r": "\\r",
  "\t": "\\t"
}

const hexQuad = /^[0-9a-fA-F]{4}$/u

const isHighSurrogate = (code: number): boolean => code >= 0xd800 && code <= 0xdbff

const isLowSurrogate = (code: number): boolean => code >= 0xdc00 && code <= 0xdfff

const firstControlCharacter = (raw: string): number => {
  for (let index = 0; index < raw.length; index += 1) {
    if (raw.charCodeAt(index) <= 0x1f) {
      return index
    }
  }
  return -1
}

/**
 * Decode the raw body of a string literal.
 *
 * @param raw - Characters between the quotes, escapes untouched.
 * @param line - Line of the raw span.
 * @param column - Column of the first character of the raw span.
 * @param representation - Target string width.
 * @returns Either with the decoded string or a positioned parsing error.
 *
 * @pure true
 * @invariant control characters are rejected before escape processing
 * @complexity O(n)
 */
export const decodeString = (
  raw: string,
  line: number,
  column: number,
  representation: StringRepresentation
): Either.Either<string, ParsingError> => {
  const control = firstControlCharacter(raw)
  if (control >= 0) {
    return Either.left(
      parsingError("ILLEGAL_CODE_POINT", "Control character inside a string literal", {
        line,
        column: column + control
      })
    )
  }
  const badEscape = (offset: number, message: string): Either.Either<string, ParsingError> =>
    Either.left(parsingError("BAD_REVERSE_SOLIDUS", message, { line, column: column + offset }))

  let output = ""
  let index = 0
  while (index < raw.length) {
    const backslash = raw.indexOf("\\", index)
    if (backslash < 0) {
      output += raw.slice(index)
      break
    }
    output += raw.slice(index, backslash)
    const letter = raw[backslash + 1]
    if (letter === undefined) {
      return badEscape(backslash, "Reverse solidus at the end of a string literal")
    }
    const short = shortEscapes[letter]
    if (short !== undefined) {
      output += short
      index = backslash + 2
      continue
    }
    if (letter !== "u") {
      return badEscape(backslash + 1, `Unknown escape sequence \\${letter}`)
    }
    const hex = raw.slice(backslash + 2, backslash + 6)
    if (!hexQuad.test(hex)) {
      return badEscape(backslash + 2, "Escape \\u must be followed by four hexadecimal digits")
    }
    const code = Number.parseInt(hex, 16)
    if (code > representation.maxEscapedCodeUnit) {
      return Either.left(
        parsingError(
          "STRING_TYPE_TOO_NARROW",
          `Code point U+${hex.toUpperCase()} is out of range of the ${representation.name} string representation`,
          { line, column: column + backslash + 2 }
        )
      )
    }
    output += String.fromCharCode(code)
    index = backslash + 6
  }
  return Either.right(output)
}

const unicodeEscape = (code: number): string => `\\u${code.toString(16).padStart(4, "0")}`

// Paired surrogates travel as one code point; a lone half has no UTF-8 encoding.
const isUnpairedSurrogate = (value: string, index: number): boolean => {
  const code = value.charCodeAt(index)
  if (isHighSurrogate(code)) {
    return !isLowSurrogate(value.charCodeAt(index + 1))
  }
  if (isLowSurrogate(code)) {
    return !isHighSurrogate(value.charCodeAt(index - 1))
  }
  return false
}

/**
 * Escape a string for placement between JSON quotation marks.
 *
 * @param value - String to encode.
 * @param representation - String width the value was built for.
 * @returns Either with the escaped text (without quotes) or a formatting error.
 *
 * @pure true
 * @invariant output holds no raw control character, no quotation mark, no unpaired surrogate
 * and no code unit above the representation's range
 * @complexity O(n)
 */
export const encodeString = (
  value: string,
  representation: StringRepresentation
): Either.Either<string, FormattingError> => {
  let output = ""
  for (let index = 0; index < value.length; index += 1) {
    const char = value.charAt(index)
    const short = shortForms[char]
    if (short !== undefined) {
      output += short
      continue
    }
    const code = value.charCodeAt(index)
    if (code <= 0x1f) {
      return Either.left(
        formattingError("ILLEGAL_CODE_POINT", `Control character ${unicodeEscape(code)} has no JSON short form`)
      )
    }
    // Narrow output escapes every code unit above 0xff on its own, surrogate pairs included.
    if (code > representation.maxEscapedCodeUnit || isUnpairedSurrogate(value, index)) {
      output += unicodeEscape(code)
      continue
    }
    output += char
  }
  return Either.right(output)
}
