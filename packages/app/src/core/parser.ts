import * as Either from "effect/Either"

import type { ParsingError } from "./errors.js"
import { parsingError } from "./errors.js"
import { convertNumber } from "./number.js"
import type { Profile } from "./representation.js"
import { decodeString } from "./string-codec.js"
import type { Token } from "./tokenizer.js"
import { tokenize } from "./tokenizer.js"
import type { Value } from "./value.js"
import { jsonArray, jsonBool, jsonNull, jsonObject, jsonString } from "./value.js"

// CHANGE: parser from tokens to a Value tree, driven by an explicit stack of open containers
// WHY: one token of lookahead is enough for the ECMA-404 grammar; nesting never grows the call stack
// QUOTE(ECMA-404): "A JSON text is a sequence of tokens formed from Unicode code points that conforms to the JSON value grammar"
// REF: req-parser-1
// SOURCE: n/a
// FORMAT THEOREM: ∀ts: parseValue(ts, i) = Right({ next }) → i < next ≤ |ts|
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: duplicate object keys keep the last value; trailing commas are rejected
// COMPLEXITY: O(n)/O(d) where n = tokens, d = nesting depth

export interface Parsed<I, F> {
  readonly value: Value<I, F>
  readonly next: number
}

type ParseResult<I, F> = Either.Either<Parsed<I, F>, ParsingError>

interface ArrayFrame<I, F> {
  readonly _tag: "ArrayFrame"
  readonly items: Array<Value<I, F>>
}

interface ObjectFrame<I, F> {
  readonly _tag: "ObjectFrame"
  readonly entries: Map<string, Value<I, F>>
  key: string
}

type Frame<I, F> = ArrayFrame<I, F> | ObjectFrame<I, F>

// What the loop does next: read a value, read an object key, or attach a finished value to its parent.
type Step<I, F> =
  | { readonly _tag: "Value"; readonly index: number }
  | { readonly _tag: "Key"; readonly index: number }
  | { readonly _tag: "Complete"; readonly value: Value<I, F>; readonly next: number }
  | { readonly _tag: "Done"; readonly parsed: Parsed<I, F> }

type StepResult<I, F> = Either.Either<Step<I, F>, ParsingError>

const sourceEnd = (container: "array" | "object"): ParsingError =>
  parsingError("UNEXPECTED_SOURCE_END", `Source ended before the ${container} was completely parsed`)

const frameEnd = <I, F>(frame: Frame<I, F>): ParsingError =>
  sourceEnd(frame._tag === "ArrayFrame" ? "array" : "object")

const unexpected = (token: Token, expected: string): ParsingError =>
  parsingError("UNEXPECTED_TOKEN", `Unexpected token '${token.kind}', expected ${expected}`, {
    line: token.line,
    column: token.column
  })

const proceed = <I, F>(step: Step<I, F>): StepResult<I, F> => Either.right(step)

const complete = <I, F>(value: Value<I, F>, next: number): StepResult<I, F> =>
  proceed<I, F>({ _tag: "Complete", value, next })

const readValue = <I, F>(
  tokens: ReadonlyArray<Token>,
  index: number,
  stack: Array<Frame<I, F>>,
  profile: Profile<I, F>
): StepResult<I, F> => {
  const token = tokens[index]
  if (token === undefined) {
    const parent = stack.at(-1)
    return Either.left(
      parent === undefined
        ? parsingError("UNEXPECTED_TOKEN", "Expected a value but no token remained")
        : frameEnd(parent)
    )
  }
  switch (token.kind) {
    case "left-bracket": {
      const first = tokens[index + 1]
      if (first === undefined) {
        return Either.left(sourceEnd("array"))
      }
      if (first.kind === "right-bracket") {
        return complete(jsonArray<I, F>([]), index + 2)
      }
      stack.push({ _tag: "ArrayFrame", items: [] })
      return proceed<I, F>({ _tag: "Value", index: index + 1 })
    }
    case "left-brace": {
      const first = tokens[index + 1]
      if (first === undefined) {
        return Either.left(sourceEnd("object"))
      }
      if (first.kind === "right-brace") {
        return complete(jsonObject<I, F>([]), index + 2)
      }
      stack.push({ _tag: "ObjectFrame", entries: new Map(), key: "" })
      return proceed<I, F>({ _tag: "Key", index: index + 1 })
    }
    case "number-literal":
      return Either.flatMap(
        convertNumber(token.raw, token.line, token.column, profile),
        (value): StepResult<I, F> => complete(value, index + 1)
      )
    case "string-literal":
      return Either.flatMap(
        decodeString(token.raw, token.line, token.column + 1, profile.string),
        (value): StepResult<I, F> => complete<I, F>(jsonString(value), index + 1)
      )
    case "true":
      return complete<I, F>(jsonBool(true), index + 1)
    case "false":
      return complete<I, F>(jsonBool(false), index + 1)
    case "null":
      return complete(jsonNull, index + 1)
    default:
      return Either.left(unexpected(token, "a value"))
  }
}

const readKey = <I, F>(
  tokens: ReadonlyArray<Token>,
  index: number,
  frame: ObjectFrame<I, F>,
  profile: Profile<I, F>
): StepResult<I, F> => {
  const keyToken = tokens[index]
  if (keyToken === undefined) {
    return Either.left(sourceEnd("object"))
  }
  if (keyToken.kind !== "string-literal") {
    return Either.left(unexpected(keyToken, "a string literal key"))
  }
  const key = decodeString(keyToken.raw, keyToken.line, keyToken.column + 1, profile.string)
  if (Either.isLeft(key)) {
    return Either.left(key.left)
  }
  const colon = tokens[index + 1]
  if (colon === undefined) {
    return Either.left(sourceEnd("object"))
  }
  if (colon.kind !== "colon") {
    return Either.left(unexpected(colon, "':'"))
  }
  frame.key = key.right
  return proceed<I, F>({ _tag: "Value", index: index + 2 })
}

// Attaches a finished value to the innermost open container and reads the separator after it.
const attach = <I, F>(
  tokens: ReadonlyArray<Token>,
  value: Value<I, F>,
  next: number,
  stack: Array<Frame<I, F>>
): StepResult<I, F> => {
  const frame = stack.at(-1)
  if (frame === undefined) {
    return proceed<I, F>({ _tag: "Done", parsed: { value, next } })
  }
  if (frame._tag === "ArrayFrame") {
    frame.items.push(value)
  } else {
    // Last write wins on duplicate keys.
    frame.entries.set(frame.key, value)
  }
  const separator = tokens[next]
  if (separator === undefined) {
    return Either.left(frameEnd(frame))
  }
  const closing = frame._tag === "ArrayFrame" ? "right-bracket" : "right-brace"
  if (separator.kind === closing) {
    stack.pop()
    return complete(
      frame._tag === "ArrayFrame" ? jsonArray(frame.items) : jsonObject(frame.entries),
      next + 1
    )
  }
  if (separator.kind !== "comma") {
    return Either.left(unexpected(separator, frame._tag === "ArrayFrame" ? "',' or ']'" : "',' or '}'"))
  }
  return proceed<I, F>(
    frame._tag === "ArrayFrame" ? { _tag: "Value", index: next + 1 } : { _tag: "Key", index: next + 1 }
  )
}

const advance = <I, F>(
  tokens: ReadonlyArray<Token>,
  step: Exclude<Step<I, F>, { readonly _tag: "Done" }>,
  stack: Array<Frame<I, F>>,
  profile: Profile<I, F>
): StepResult<I, F> => {
  switch (step._tag) {
    case "Value":
      return readValue(tokens, step.index, stack, profile)
    case "Key": {
      const frame = stack.at(-1)
      if (frame === undefined || frame._tag !== "ObjectFrame") {
        return Either.left(parsingError("UNEXPECTED_TOKEN", "Expected an object key outside an object"))
      }
      return readKey(tokens, step.index, frame, profile)
    }
    case "Complete":
      return attach(tokens, step.value, step.next, stack)
  }
}

/**
 * Parse one value starting at a token index.
 *
 * @param tokens - Token sequence from the tokenizer.
 * @param index - Index of the value's first token.
 * @param profile - Target representations for literals.
 * @returns Either with the value and the index one past it, or a parsing error.
 *
 * @pure true
 * @invariant a missing leading token is UNEXPECTED_TOKEN
 * @invariant call depth stays constant for any nesting depth
 * @complexity O(n)
 */
export const parseValue = <I, F>(
  tokens: ReadonlyArray<Token>,
  index: number,
  profile: Profile<I, F>
): ParseResult<I, F> => {
  const stack: Array<Frame<I, F>> = []
  let step: Step<I, F> = { _tag: "Value", index }
  while (step._tag !== "Done") {
    const advanced: StepResult<I, F> = advance(tokens, step, stack, profile)
    if (Either.isLeft(advanced)) {
      return Either.left(advanced.left)
    }
    step = advanced.right
  }
  return Either.right(step.parsed)
}

/**
 * Parse a complete token sequence holding exactly one value.
 *
 * @pure true
 * @invariant trailing tokens after the value are UNEXPECTED_TOKEN
 * @complexity O(n)
 */
export const parseTokens = <I, F>(
  tokens: ReadonlyArray<Token>,
  profile: Profile<I, F>
): Either.Either<Value<I, F>, ParsingError> => {
  if (tokens.length === 0) {
    return Either.left(parsingError("UNEXPECTED_SOURCE_END", "Source contained no value"))
  }
  const parsed = parseValue(tokens, 0, profile)
  if (Either.isLeft(parsed)) {
    return Either.left(parsed.left)
  }
  const trailing = tokens[parsed.right.next]
  if (trailing !== undefined) {
    return Either.left(unexpected(trailing, "end of source after a complete value"))
  }
  return Either.right(parsed.right.value)
}

// The byte-order mark is kept, so the tokenizer rejects it like any other stray character.
const utf8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true })

const decodeSource = (source: string | Uint8Array): Either.Either<string, ParsingError> =>
  typeof source === "string"
    ? Either.right(source)
    : Either.try({
      try: () => utf8.decode(source),
      catch: () => parsingError("ILLEGAL_CODE_POINT", "Source is not valid UTF-8")
    })

/**
 * Parse JSON source text into a Value tree.
 *
 * @param source - Text, or UTF-8 bytes to be decoded strictly.
 * @param profile - Target integer, float and string representations.
 * @returns Either with the complete Value or the first parsing error.
 *
 * @pure true
 * @invariant empty source → UNEXPECTED_SOURCE_END
 * @complexity O(n)
 */
export const parseText = <I, F>(
  source: string | Uint8Array,
  profile: Profile<I, F>
): Either.Either<Value<I, F>, ParsingError> =>
  Either.flatMap(decodeSource(source), (text): Either.Either<Value<I, F>, ParsingError> => {
    if (text.length === 0) {
      return Either.left(parsingError("UNEXPECTED_SOURCE_END", "Source was empty"))
    }
    return Either.flatMap(tokenize(text), (tokens) => parseTokens(tokens, profile))
  })
