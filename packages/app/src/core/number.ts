import * as Either from "effect/Either"

import type { ParsingError, ParsingErrorKind } from "./errors.js"
import { parsingError } from "./errors.js"
import type { ConversionFailure, Profile } from "./representation.js"
import type { JsonFloat, JsonInteger } from "./value.js"
import { jsonFloat, jsonInteger } from "./value.js"

// CHANGE: classify number literals and convert them into the profile's numeric types
// WHY: a malformed literal and an out-of-range literal must stay separately observable
// QUOTE(ECMA-404): "A number is a sequence of decimal digits with no superfluous leading zero"
// REF: req-number-1
// SOURCE: n/a
// FORMAT THEOREM: ∀raw: isFloatLiteral(raw) ↔ raw contains one of '.', 'e', 'E'
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: "format" failures map to INCORRECT_NUMBER_FORMAT, "range" failures to *_TYPE_TOO_NARROW
// COMPLEXITY: O(n)/O(1)

export type NumberValue<I, F> = JsonInteger<I> | JsonFloat<F>

export const isFloatLiteral = (raw: string): boolean =>
  raw.includes(".") || raw.includes("e") || raw.includes("E")

const failureKind = (failure: ConversionFailure, rangeKind: ParsingErrorKind): ParsingErrorKind =>
  failure === "format" ? "INCORRECT_NUMBER_FORMAT" : rangeKind

const failureMessage = (raw: string, failure: ConversionFailure, target: string): string =>
  failure === "format"
    ? `Number literal '${raw}' is not correctly formatted`
    : `Number literal '${raw}' is out of range for ${target}`

/**
 * Convert the raw text of a number token.
 *
 * @param raw - Numeric span captured by the tokenizer.
 * @param line - Line of the token.
 * @param column - Column of the token.
 * @param profile - Target representations.
 * @returns Either with an Integer or Float number value, or a positioned parsing error.
 *
 * @pure true
 * @invariant classification depends on raw text only, never on magnitude
 * @complexity O(n)
 */
export const convertNumber = <I, F>(
  raw: string,
  line: number,
  column: number,
  profile: Profile<I, F>
): Either.Either<NumberValue<I, F>, ParsingError> => {
  if (isFloatLiteral(raw)) {
    const converted = profile.float.fromLiteral(raw)
    if (Either.isLeft(converted)) {
      return Either.left(
        parsingError(
          failureKind(converted.left, "FLOATING_POINT_TYPE_TOO_NARROW"),
          failureMessage(raw, converted.left, profile.float.name),
          { line, column }
        )
      )
    }
    const float: NumberValue<I, F> = jsonFloat(converted.right)
    return Either.right(float)
  }
  const converted = profile.integer.fromLiteral(raw)
  if (Either.isLeft(converted)) {
    return Either.left(
      parsingError(
        failureKind(converted.left, "INTEGER_TYPE_TOO_NARROW"),
        failureMessage(raw, converted.left, profile.integer.name),
        { line, column }
      )
    )
  }
  const integer: NumberValue<I, F> = jsonInteger(converted.right)
  return Either.right(integer)
}
