import * as Either from "effect/Either"

import type { InterfaceMisuse } from "./errors.js"
import { interfaceMisuse } from "./errors.js"
import type { PartialOrdering, Profile } from "./representation.js"

// CHANGE: model a JSON value as a closed tagged union over profile types
// WHY: keep variant checks exhaustive and keep caller misuse apart from data errors
// QUOTE(ECMA-404): "A JSON value can be an object, array, number, string, true, false, or null"
// REF: req-value-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v ∈ Value: v._tag ∈ {Null, Bool, Integer, Float, String, Array, Object}
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: a Value owns its children; trees are acyclic and never mutated after construction
// COMPLEXITY: O(1)/O(1) per accessor

export type JsonNull = { readonly _tag: "Null" }
export type JsonBool = { readonly _tag: "Bool"; readonly value: boolean }
export type JsonInteger<I> = { readonly _tag: "Integer"; readonly value: I }
export type JsonFloat<F> = { readonly _tag: "Float"; readonly value: F }
export type JsonString = { readonly _tag: "String"; readonly value: string }
export type JsonArray<I, F> = { readonly _tag: "Array"; readonly items: ReadonlyArray<Value<I, F>> }
// Map iteration order is not part of the contract.
export type JsonObject<I, F> = { readonly _tag: "Object"; readonly entries: ReadonlyMap<string, Value<I, F>> }

export type Value<I, F> =
  | JsonNull
  | JsonBool
  | JsonInteger<I>
  | JsonFloat<F>
  | JsonString
  | JsonArray<I, F>
  | JsonObject<I, F>

export type ValueTag = Value<unknown, unknown>["_tag"]

export type Plain<I, F> =
  | null
  | boolean
  | I
  | F
  | string
  | ReadonlyArray<Plain<I, F>>
  | { readonly [key: string]: Plain<I, F> }

export const jsonNull: JsonNull = { _tag: "Null" }

export const jsonBool = (value: boolean): JsonBool => ({ _tag: "Bool", value })

export const jsonInteger = <I>(value: I): JsonInteger<I> => ({ _tag: "Integer", value })

export const jsonFloat = <F>(value: F): JsonFloat<F> => ({ _tag: "Float", value })

export const jsonString = (value: string): JsonString => ({ _tag: "String", value })

export const jsonArray = <I, F>(items: Iterable<Value<I, F>>): JsonArray<I, F> => ({
  _tag: "Array",
  items: [...items]
})

/**
 * Build an object from key/value pairs; a repeated key keeps its last value.
 *
 * @param entries - A Map or any iterable of [key, value] pairs.
 * @returns Object value owning a copy of the entries.
 *
 * @pure true
 * @invariant keys are unique
 * @complexity O(n)
 */
export const jsonObject = <I, F>(entries: Iterable<readonly [string, Value<I, F>]>): JsonObject<I, F> => ({
  _tag: "Object",
  entries: new Map(entries)
})

export const jsonObjectFromRecord = <I, F>(record: Readonly<Record<string, Value<I, F>>>): JsonObject<I, F> =>
  jsonObject(Object.entries(record))

const incorrectType = (expected: ValueTag, actual: ValueTag): InterfaceMisuse =>
  interfaceMisuse("INCORRECT_TYPE", `Expected ${expected} value, found ${actual}`)

export const isNull = <I, F>(value: Value<I, F>): boolean => value._tag === "Null"

export const asBool = <I, F>(value: Value<I, F>): Either.Either<boolean, InterfaceMisuse> =>
  value._tag === "Bool" ? Either.right(value.value) : Either.left(incorrectType("Bool", value._tag))

export const asInteger = <I, F>(value: Value<I, F>): Either.Either<I, InterfaceMisuse> =>
  value._tag === "Integer" ? Either.right(value.value) : Either.left(incorrectType("Integer", value._tag))

export const asFloat = <I, F>(value: Value<I, F>): Either.Either<F, InterfaceMisuse> =>
  value._tag === "Float" ? Either.right(value.value) : Either.left(incorrectType("Float", value._tag))

export const asString = <I, F>(value: Value<I, F>): Either.Either<string, InterfaceMisuse> =>
  value._tag === "String" ? Either.right(value.value) : Either.left(incorrectType("String", value._tag))

export const asArray = <I, F>(value: Value<I, F>): Either.Either<ReadonlyArray<Value<I, F>>, InterfaceMisuse> =>
  value._tag === "Array" ? Either.right(value.items) : Either.left(incorrectType("Array", value._tag))

export const asObject = <I, F>(
  value: Value<I, F>
): Either.Either<ReadonlyMap<string, Value<I, F>>, InterfaceMisuse> =>
  value._tag === "Object" ? Either.right(value.entries) : Either.left(incorrectType("Object", value._tag))

export const at = <I, F>(value: Value<I, F>, index: number): Either.Either<Value<I, F>, InterfaceMisuse> =>
  Either.flatMap(asArray(value), (items) => {
    const item = Number.isInteger(index) && index >= 0 ? items[index] : undefined
    return item === undefined
      ? Either.left(interfaceMisuse("INDEX_OUT_OF_RANGE", `Index ${index} is out of range for length ${items.length}`))
      : Either.right(item)
  })

export const get = <I, F>(value: Value<I, F>, key: string): Either.Either<Value<I, F>, InterfaceMisuse> =>
  Either.flatMap(asObject(value), (entries) => {
    const entry = entries.get(key)
    return entry === undefined
      ? Either.left(interfaceMisuse("NO_SUCH_KEY", `No such key: ${JSON.stringify(key)}`))
      : Either.right(entry)
  })

const compareStrings = (left: string, right: string): PartialOrdering => {
  if (left === right) {
    return 0
  }
  return left < right ? -1 : 1
}

/**
 * Partially order two values of the same scalar variant.
 *
 * @param profile - Supplies the ordering of the integer and float representations.
 * @param left - Left operand.
 * @param right - Right operand.
 * @returns Ordering, "unordered" for incomparable floats, or the misuse that was committed.
 *
 * @pure true
 * @invariant differing variants → INCORRECT_TYPE; Null/Bool/Array/Object → ILLEGAL_OPERAND
 * @complexity O(1) for numbers, O(n) for strings
 */
export const compare = <I, F>(
  profile: Profile<I, F>,
  left: Value<I, F>,
  right: Value<I, F>
): Either.Either<PartialOrdering, InterfaceMisuse> => {
  if (left._tag !== right._tag) {
    return Either.left(incorrectType(left._tag, right._tag))
  }
  if (left._tag === "Integer" && right._tag === "Integer") {
    return Either.right(profile.integer.compare(left.value, right.value))
  }
  if (left._tag === "Float" && right._tag === "Float") {
    return Either.right(profile.float.compare(left.value, right.value))
  }
  if (left._tag === "String" && right._tag === "String") {
    return Either.right(compareStrings(left.value, right.value))
  }
  return Either.left(interfaceMisuse("ILLEGAL_OPERAND", `${left._tag} values have no ordering`))
}

const equalObjects = <I, F>(left: JsonObject<I, F>, right: JsonObject<I, F>): boolean => {
  if (left.entries.size !== right.entries.size) {
    return false
  }
  for (const [key, entry] of left.entries) {
    const other = right.entries.get(key)
    if (other === undefined || !equals(entry, other)) {
      return false
    }
  }
  return true
}

const equalArrays = <I, F>(left: JsonArray<I, F>, right: JsonArray<I, F>): boolean =>
  left.items.length === right.items.length &&
  left.items.every((item, index) => {
    const other = right.items[index]
    return other !== undefined && equals(item, other)
  })

/**
 * Structural equality: same variant and same content, objects compared as key sets.
 *
 * @pure true
 * @complexity O(n) where n = total tree size
 */
export const equals = <I, F>(left: Value<I, F>, right: Value<I, F>): boolean => {
  switch (left._tag) {
    case "Null":
      return right._tag === "Null"
    case "Bool":
      return right._tag === "Bool" && right.value === left.value
    case "Integer":
      return right._tag === "Integer" && right.value === left.value
    case "Float":
      return right._tag === "Float" && right.value === left.value
    case "String":
      return right._tag === "String" && right.value === left.value
    case "Array":
      return right._tag === "Array" && equalArrays(left, right)
    case "Object":
      return right._tag === "Object" && equalObjects(left, right)
  }
}

/**
 * Convert a value tree into plain JavaScript data.
 *
 * @pure true
 * @invariant object keys become own enumerable properties, including "__proto__"
 * @complexity O(n)
 */
export const toPlain = <I, F>(value: Value<I, F>): Plain<I, F> => {
  switch (value._tag) {
    case "Null":
      return null
    case "Bool":
    case "Integer":
    case "Float":
    case "String":
      return value.value
    case "Array":
      return value.items.map((item) => toPlain(item))
    case "Object":
      return Object.fromEntries([...value.entries].map(([key, entry]) => [key, toPlain(entry)]))
  }
}
