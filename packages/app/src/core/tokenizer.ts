import * as Either from "effect/Either"

import type { ParsingError } from "./errors.js"
import { parsingError } from "./errors.js"

// CHANGE: scan JSON text into positioned tokens
// WHY: keep lexical boundaries separate from literal decoding so each stage fails with its own kind
// QUOTE(ECMA-404): "Insignificant whitespace is allowed before or after any token"
// REF: req-tokenizer-1
// SOURCE: n/a
// FORMAT THEOREM: ∀s: tokenize(s) = Right(ts) → ∀t ∈ ts: 1 ≤ t.line ∧ 1 ≤ t.column
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: raw spans of string and number literals are captured without validation
// COMPLEXITY: O(n)/O(n) where n = source length

export type StructuralKind =
  | "left-bracket"
  | "left-brace"
  | "right-bracket"
  | "right-brace"
  | "colon"
  | "comma"

export type LiteralNameKind = "true" | "false" | "null"

export type SpanKind = "string-literal" | "number-literal"

export type TokenKind = StructuralKind | LiteralNameKind | SpanKind

export type Token =
  | {
    readonly kind: StructuralKind | LiteralNameKind
    readonly line: number
    readonly column: number
  }
  | {
    readonly kind: SpanKind
    readonly line: number
    readonly column: number
    readonly raw: string
  }

const structural: Readonly<Record<string, StructuralKind>> = {
  "[": "left-bracket",
  "{": "left-brace",
  "]": "right-bracket",
  "}": "right-brace",
  ":": "colon",
  ",": "comma"
}

const literalNames: Readonly<Record<string, LiteralNameKind>> = {
  t: "true",
  f: "false",
  n: "null"
}

const isWhiteSpace = (char: string | undefined): boolean =>
  char === "\t" || char === "\n" || char === "\r" || char === " "

// End of input also delimits a literal name.
const isDelimiter = (char: string | undefined): boolean =>
  char === undefined || isWhiteSpace(char) || structural[char] !== undefined

const isNumberStart = (char: string): boolean => (char >= "0" && char <= "9") || char === "-" || char === "."

const isNumberCharacter = (char: string | undefined): boolean =>
  char !== undefined &&
  ((char >= "0" && char <= "9") || char === "-" || char === "+" || char === "." || char === "e" || char === "E")

interface Scanned {
  readonly token: Token
  readonly next: number
}

const scanLiteralName = (
  source: string,
  index: number,
  line: number,
  column: number,
  kind: LiteralNameKind
): Either.Either<Scanned, ParsingError> => {
  const end = index + kind.length
  if (end > source.length || source.slice(index, end) !== kind || !isDelimiter(source[end])) {
    return Either.left(
      parsingError("UNKNOWN_TOKEN", `Unknown token, expected literal '${kind}'`, { line, column })
    )
  }
  return Either.right({ token: { kind, line, column }, next: end })
}

const scanString = (
  source: string,
  index: number,
  line: number,
  column: number
): Either.Either<Scanned, ParsingError> => {
  let peek = index + 1
  while (peek < source.length && source[peek] !== "\"") {
    peek += source[peek] === "\\" ? 2 : 1
  }
  if (peek >= source.length) {
    return Either.left(
      parsingError("UNEXPECTED_SOURCE_END", "Source ended before the string literal was closed", { line, column })
    )
  }
  return Either.right({
    token: { kind: "string-literal", line, column, raw: source.slice(index + 1, peek) },
    next: peek + 1
  })
}

const scanNumber = (source: string, index: number, line: number, column: number): Scanned => {
  let peek = index
  while (isNumberCharacter(source[peek])) {
    peek += 1
  }
  return {
    token: { kind: "number-literal", line, column, raw: source.slice(index, peek) },
    next: peek
  }
}

const scanToken = (
  source: string,
  index: number,
  line: number,
  column: number
): Either.Either<Scanned, ParsingError> => {
  const char = source[index] ?? ""
  const structuralKind = structural[char]
  if (structuralKind !== undefined) {
    return Either.right({ token: { kind: structuralKind, line, column }, next: index + 1 })
  }
  const literalKind = literalNames[char]
  if (literalKind !== undefined) {
    return scanLiteralName(source, index, line, column, literalKind)
  }
  if (char === "\"") {
    return scanString(source, index, line, column)
  }
  if (isNumberStart(char)) {
    return Either.right(scanNumber(source, index, line, column))
  }
  return Either.left(
    parsingError("UNKNOWN_TOKEN", `Unknown token ${JSON.stringify(char)}`, { line, column })
  )
}

/**
 * Transform JSON source text into a flat token sequence.
 *
 * @param source - Decoded source text.
 * @returns Either with tokens in source order or the first lexical error.
 *
 * @pure true
 * @invariant line increments and column resets to 1 on every newline consumed as whitespace
 * @complexity O(n)
 */
export const tokenize = (source: string): Either.Either<ReadonlyArray<Token>, ParsingError> => {
  const tokens: Array<Token> = []
  let index = 0
  let line = 1
  let column = 1
  while (index < source.length) {
    const char = source[index]
    if (isWhiteSpace(char)) {
      if (char === "\n") {
        line += 1
        column = 1
      } else {
        column += 1
      }
      index += 1
      continue
    }
    const scanned = scanToken(source, index, line, column)
    if (Either.isLeft(scanned)) {
      return Either.left(scanned.left)
    }
    tokens.push(scanned.right.token)
    column += scanned.right.next - index
    index = scanned.right.next
  }
  return Either.right(tokens)
}
