import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { convertNumber, isFloatLiteral } from "../../src/core/number.js"
import { narrow, safe, standard } from "../../src/core/representation.js"
import { leftOf, rightOf } from "./either-helpers.js"

describe("isFloatLiteral", () => {
  it.effect("classifies by the presence of a fraction or exponent", () =>
    Effect.sync(() => {
      expect(isFloatLiteral("12")).toBe(false)
      expect(isFloatLiteral("-0")).toBe(false)
      expect(isFloatLiteral("1.0")).toBe(true)
      expect(isFloatLiteral("1e3")).toBe(true)
      expect(isFloatLiteral("1E3")).toBe(true)
    }))
})

describe("convertNumber", () => {
  it.effect("produces Integer values for integer literals", () =>
    Effect.sync(() => {
      expect(rightOf(convertNumber("42", 1, 1, standard))).toEqual({ _tag: "Integer", value: 42n })
      expect(rightOf(convertNumber("-7", 1, 1, narrow))).toEqual({ _tag: "Integer", value: -7 })
    }))

  it.effect("produces Float values for 1.0 and exponent forms", () =>
    Effect.sync(() => {
      expect(rightOf(convertNumber("1.0", 1, 1, standard))).toEqual({ _tag: "Float", value: 1 })
      expect(rightOf(convertNumber("1e3", 1, 1, standard))).toEqual({ _tag: "Float", value: 1000 })
      expect(rightOf(convertNumber("-2.5E-1", 1, 1, standard))).toEqual({ _tag: "Float", value: -0.25 })
    }))

  it.effect("rounds through float32 in the narrow profile", () =>
    Effect.sync(() => {
      expect(rightOf(convertNumber("0.1", 1, 1, narrow))).toEqual({ _tag: "Float", value: Math.fround(0.1) })
    }))

  it.effect("reports integers that do not fit the target width", () =>
    Effect.sync(() => {
      const error = leftOf(convertNumber("99999999999999999999", 4, 9, narrow))
      expect(error.kind).toBe("INTEGER_TYPE_TOO_NARROW")
      expect(error.message).toBe("Number literal '99999999999999999999' is out of range for int32")
      expect(error.location).toEqual({ line: 4, column: 9 })
      expect(leftOf(convertNumber("99999999999999999999", 1, 1, standard)).kind).toBe("INTEGER_TYPE_TOO_NARROW")
    }))

  it.effect("checks integer bounds exactly", () =>
    Effect.sync(() => {
      expect(rightOf(convertNumber("2147483647", 1, 1, narrow))).toEqual({ _tag: "Integer", value: 2147483647 })
      expect(leftOf(convertNumber("2147483648", 1, 1, narrow)).kind).toBe("INTEGER_TYPE_TOO_NARROW")
      expect(rightOf(convertNumber("-9223372036854775808", 1, 1, standard))).toEqual({
        _tag: "Integer",
        value: -9223372036854775808n
      })
      expect(leftOf(convertNumber("9007199254740992", 1, 1, safe)).kind).toBe("INTEGER_TYPE_TOO_NARROW")
    }))

  it.effect("rejects literals outside the number grammar", () =>
    Effect.sync(() => {
      for (const raw of ["01", "-", "1-2", "--1", "1.", ".5", "1e", "1.2.3", "1e+"]) {
        const error = leftOf(convertNumber(raw, 1, 1, standard))
        expect(error.kind).toBe("INCORRECT_NUMBER_FORMAT")
        expect(error.message).toBe(`Number literal '${raw}' is not correctly formatted`)
      }
    }))

  it.effect("reports float overflow and underflow", () =>
    Effect.sync(() => {
      const overflow = leftOf(convertNumber("1e400", 2, 3, standard))
      expect(overflow.kind).toBe("FLOATING_POINT_TYPE_TOO_NARROW")
      expect(overflow.message).toBe("Number literal '1e400' is out of range for float64")
      expect(overflow.location).toEqual({ line: 2, column: 3 })
      expect(leftOf(convertNumber("1e-400", 1, 1, standard)).kind).toBe("FLOATING_POINT_TYPE_TOO_NARROW")
      expect(leftOf(convertNumber("3.5e38", 1, 1, narrow)).kind).toBe("FLOATING_POINT_TYPE_TOO_NARROW")
    }))

  it.effect("accepts zero written with a tiny exponent", () =>
    Effect.sync(() => {
      expect(rightOf(convertNumber("0.0e-400", 1, 1, standard))).toEqual({ _tag: "Float", value: 0 })
    }))
})
