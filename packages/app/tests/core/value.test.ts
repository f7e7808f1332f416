import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { standard } from "../../src/core/representation.js"
import type { Value } from "../../src/core/value.js"
import {
  asArray,
  asBool,
  asFloat,
  asInteger,
  asObject,
  asString,
  at,
  compare,
  equals,
  get,
  isNull,
  jsonArray,
  jsonBool,
  jsonFloat,
  jsonInteger,
  jsonNull,
  jsonObject,
  jsonObjectFromRecord,
  jsonString,
  toPlain
} from "../../src/core/value.js"
import { leftOf, rightOf } from "./either-helpers.js"

type StandardValue = Value<bigint, number>

const sample: StandardValue = jsonObjectFromRecord<bigint, number>({
  name: jsonString("widget"),
  sizes: jsonArray<bigint, number>([jsonInteger(1n), jsonFloat(2.5)]),
  enabled: jsonBool(true),
  parent: jsonNull
})

describe("value accessors", () => {
  it.effect("reads scalars of the matching variant", () =>
    Effect.sync(() => {
      expect(rightOf(asString(rightOf(get(sample, "name"))))).toBe("widget")
      expect(rightOf(asBool(rightOf(get(sample, "enabled"))))).toBe(true)
      expect(isNull(rightOf(get(sample, "parent")))).toBe(true)
      const sizes = rightOf(get(sample, "sizes"))
      expect(rightOf(asInteger(rightOf(at(sizes, 0))))).toBe(1n)
      expect(rightOf(asFloat(rightOf(at(sizes, 1))))).toBe(2.5)
      expect(rightOf(asArray(sizes))).toHaveLength(2)
      expect([...rightOf(asObject(sample)).keys()]).toEqual(["name", "sizes", "enabled", "parent"])
    }))

  it.effect("keeps Integer and Float apart", () =>
    Effect.sync(() => {
      const error = leftOf(asInteger(jsonFloat(1.0)))
      expect(error._tag).toBe("InterfaceMisuse")
      expect(error.kind).toBe("INCORRECT_TYPE")
      expect(error.message).toBe("Expected Integer value, found Float")
      expect(leftOf(asFloat(jsonInteger(1n))).kind).toBe("INCORRECT_TYPE")
    }))

  it.effect("reports indexes outside the array", () =>
    Effect.sync(() => {
      const sizes = rightOf(get(sample, "sizes"))
      const error = leftOf(at(sizes, 5))
      expect(error.kind).toBe("INDEX_OUT_OF_RANGE")
      expect(error.message).toBe("Index 5 is out of range for length 2")
      expect(leftOf(at(sizes, -1)).kind).toBe("INDEX_OUT_OF_RANGE")
      expect(leftOf(at(jsonNull, 0)).message).toBe("Expected Array value, found Null")
    }))

  it.effect("reports missing keys", () =>
    Effect.sync(() => {
      const error = leftOf(get(sample, "missing"))
      expect(error.kind).toBe("NO_SUCH_KEY")
      expect(error.message).toBe(`No such key: "missing"`)
      expect(leftOf(get(jsonString("x"), "a")).kind).toBe("INCORRECT_TYPE")
    }))
})

describe("jsonObject", () => {
  it.effect("keeps the last value of a repeated key", () =>
    Effect.sync(() => {
      const object = jsonObject<bigint, number>([["a", jsonInteger(1n)], ["a", jsonInteger(2n)]])
      expect(object.entries.size).toBe(1)
      expect(rightOf(asInteger(rightOf(get(object, "a"))))).toBe(2n)
    }))
})

describe("compare", () => {
  it.effect("orders strings, integers and floats", () =>
    Effect.sync(() => {
      expect(rightOf(compare(standard, jsonString("a"), jsonString("b")))).toBe(-1)
      expect(rightOf(compare(standard, jsonString("b"), jsonString("b")))).toBe(0)
      expect(rightOf(compare(standard, jsonInteger(3n), jsonInteger(2n)))).toBe(1)
      expect(rightOf(compare(standard, jsonFloat(0.5), jsonFloat(0.25)))).toBe(1)
    }))

  it.effect("leaves NaN unordered", () =>
    Effect.sync(() => {
      expect(rightOf(compare(standard, jsonFloat(Number.NaN), jsonFloat(1)))).toBe("unordered")
    }))

  it.effect("refuses to compare Integer with Float", () =>
    Effect.sync(() => {
      const error = leftOf(compare(standard, jsonInteger(1n), jsonFloat(1)))
      expect(error.kind).toBe("INCORRECT_TYPE")
      expect(error.message).toBe("Expected Integer value, found Float")
    }))

  it.effect("refuses to order containers, booleans and null", () =>
    Effect.sync(() => {
      const objects = leftOf(compare(standard, jsonObject<bigint, number>([]), jsonObject<bigint, number>([])))
      expect(objects.kind).toBe("ILLEGAL_OPERAND")
      expect(objects.message).toBe("Object values have no ordering")
      expect(leftOf(compare(standard, jsonBool(true), jsonBool(false))).kind).toBe("ILLEGAL_OPERAND")
      expect(leftOf(compare(standard, jsonNull, jsonNull)).kind).toBe("ILLEGAL_OPERAND")
      const arrays = compare(standard, jsonArray<bigint, number>([]), jsonArray<bigint, number>([]))
      expect(leftOf(arrays).kind).toBe("ILLEGAL_OPERAND")
    }))
})

describe("equals", () => {
  it.effect("compares objects as key sets", () =>
    Effect.sync(() => {
      const left = jsonObject<bigint, number>([["a", jsonInteger(1n)], ["b", jsonNull]])
      const right = jsonObject<bigint, number>([["b", jsonNull], ["a", jsonInteger(1n)]])
      expect(equals(left, right)).toBe(true)
      expect(equals(left, jsonObject<bigint, number>([["a", jsonInteger(1n)]]))).toBe(false)
    }))

  it.effect("distinguishes Integer 1 from Float 1.0", () =>
    Effect.sync(() => {
      expect(equals<bigint, number>(jsonInteger(1n), jsonFloat(1))).toBe(false)
      const left = jsonArray<bigint, number>([jsonString("x")])
      const right = jsonArray<bigint, number>([jsonString("x")])
      expect(equals(left, right)).toBe(true)
    }))
})

describe("toPlain", () => {
  it.effect("converts a tree into plain data", () =>
    Effect.sync(() => {
      expect(toPlain(sample)).toEqual({ name: "widget", sizes: [1n, 2.5], enabled: true, parent: null })
    }))
})
