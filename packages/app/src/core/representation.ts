import * as Either from "effect/Either"
import * as Option from "effect/Option"
import * as Order from "effect/Order"

// CHANGE: describe the integer/float/string representations a value tree is built over
// WHY: choose numeric width and string width once per profile instead of per value
// QUOTE(ECMA-404): "JSON is agnostic about the semantics of numbers"
// REF: req-representation-1
// SOURCE: n/a
// FORMAT THEOREM: ∀r, s: r.fromLiteral(s) = Right(v) → r.toLiteral(v) = Some(t) ∧ r.fromLiteral(t) = Right(v)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: fromLiteral separates grammar failures ("format") from width failures ("range")
// COMPLEXITY: O(n)/O(1) where n = literal length

export type ConversionFailure = "format" | "range"

export type PartialOrdering = -1 | 0 | 1 | "unordered"

export interface IntegerRepresentation<I> {
  readonly name: string
  readonly fromLiteral: (raw: string) => Either.Either<I, ConversionFailure>
  readonly toLiteral: (value: I) => Option.Option<string>
  readonly compare: (left: I, right: I) => PartialOrdering
}

export interface FloatRepresentation<F> {
  readonly name: string
  readonly fromLiteral: (raw: string) => Either.Either<F, ConversionFailure>
  readonly toLiteral: (value: F) => Option.Option<string>
  readonly compare: (left: F, right: F) => PartialOrdering
}

export interface StringRepresentation {
  readonly name: "narrow" | "wide"
  // Largest code unit the representation holds. Input escapes above it are rejected, output above it is escaped.
  readonly maxEscapedCodeUnit: number
}

export interface Profile<I, F> {
  readonly name: string
  readonly integer: IntegerRepresentation<I>
  readonly float: FloatRepresentation<F>
  readonly string: StringRepresentation
}

const integerGrammar = /^-?(?:0|[1-9]\d*)$/u
const floatGrammar = /^-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?$/u
const nonZeroMantissa = /^[^eE]*[1-9]/u

const fromOrder = <A>(order: Order.Order<A>) => (left: A, right: A): PartialOrdering => order(left, right)

const bigintInRange = (raw: string, min: bigint, max: bigint): Either.Either<bigint, ConversionFailure> => {
  if (!integerGrammar.test(raw)) {
    return Either.left("format")
  }
  const value = BigInt(raw)
  return value < min || value > max ? Either.left("range") : Either.right(value)
}

const numberInteger = (name: string, min: number, max: number): IntegerRepresentation<number> => ({
  name,
  fromLiteral: (raw) => Either.map(bigintInRange(raw, BigInt(min), BigInt(max)), Number),
  toLiteral: (value) =>
    Number.isInteger(value) && value >= min && value <= max ? Option.some(String(value)) : Option.none(),
  compare: fromOrder(Order.number)
})

const bigintInteger = (name: string, min: bigint, max: bigint): IntegerRepresentation<bigint> => ({
  name,
  fromLiteral: (raw) => bigintInRange(raw, min, max),
  toLiteral: (value) => value >= min && value <= max ? Option.some(value.toString()) : Option.none(),
  compare: fromOrder(Order.bigint)
})

export const int32: IntegerRepresentation<number> = numberInteger("int32", -2147483648, 2147483647)

export const safeInteger: IntegerRepresentation<number> = numberInteger(
  "safeInteger",
  Number.MIN_SAFE_INTEGER,
  Number.MAX_SAFE_INTEGER
)

export const int64: IntegerRepresentation<bigint> = bigintInteger("int64", -(2n ** 63n), 2n ** 63n - 1n)

export const uint64: IntegerRepresentation<bigint> = bigintInteger("uint64", 0n, 2n ** 64n - 1n)

// Shortest round-trip text, forced to keep a fraction or exponent so it re-reads as a float.
const floatText = (value: number): string => {
  if (Object.is(value, -0)) {
    return "-0.0"
  }
  const text = String(value)
  return /[.eE]/u.test(text) ? text : `${text}.0`
}

const compareFloats = (left: number, right: number): PartialOrdering => {
  if (Number.isNaN(left) || Number.isNaN(right)) {
    return "unordered"
  }
  if (left === right) {
    return 0
  }
  return left < right ? -1 : 1
}

const makeFloat = (name: string, round: (value: number) => number): FloatRepresentation<number> => ({
  name,
  fromLiteral: (raw) => {
    if (!floatGrammar.test(raw)) {
      return Either.left("format")
    }
    const value = round(Number(raw))
    if (!Number.isFinite(value)) {
      return Either.left("range")
    }
    if (value === 0 && nonZeroMantissa.test(raw)) {
      return Either.left("range")
    }
    return Either.right(value)
  },
  toLiteral: (value) =>
    Number.isFinite(value) && round(value) === value ? Option.some(floatText(value)) : Option.none(),
  compare: compareFloats
})

export const float64: FloatRepresentation<number> = makeFloat("float64", (value) => value)

export const float32: FloatRepresentation<number> = makeFloat("float32", Math.fround)

export const narrowString: StringRepresentation = {
  name: "narrow",
  maxEscapedCodeUnit: 0xff
}

export const wideString: StringRepresentation = {
  name: "wide",
  maxEscapedCodeUnit: 0xffff
}

/**
 * Assemble a profile from one representation per axis.
 *
 * @pure true
 * @complexity O(1)
 */
export const makeProfile = <I, F>(
  name: string,
  integer: IntegerRepresentation<I>,
  float: FloatRepresentation<F>,
  string: StringRepresentation
): Profile<I, F> => ({ name, integer, float, string })

export const standard: Profile<bigint, number> = makeProfile("standard", int64, float64, wideString)

export const narrow: Profile<number, number> = makeProfile("narrow", int32, float32, narrowString)

export const safe: Profile<number, number> = makeProfile("safe", safeInteger, float64, wideString)

export type ProfileName = "standard" | "narrow" | "safe"

export const profileNames: ReadonlyArray<ProfileName> = ["standard", "narrow", "safe"]

export const isProfileName = (value: string): value is ProfileName =>
  value === "standard" || value === "narrow" || value === "safe"
