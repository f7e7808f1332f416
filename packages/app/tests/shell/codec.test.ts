import { describe, expect, it } from "@effect/vitest"
import { Effect, Logger, LogLevel } from "effect"

import { narrow, standard } from "../../src/core/representation.js"
import { equals, jsonArray, jsonFloat, jsonInteger, jsonObject, jsonString } from "../../src/core/value.js"
import { parseFile, parseSource, writeToFile } from "../../src/shell/codec.js"
import { provideNodeContext, withTempDir } from "../app/test-helpers.js"
import { leftOf } from "../core/either-helpers.js"

const captureLogs = (messages: Array<string>) =>
  Logger.add(
    Logger.make(({ message }) => {
      messages.push(String(message))
    })
  )

describe("parseFile", () => {
  it.effect("rejects paths without a .json extension before touching the disk", () =>
    Effect.gen(function*(_) {
      const result = yield* _(Effect.either(parseFile("/nonexistent/data.txt", standard)))
      const error = leftOf(result)
      expect(error.kind).toBe("INCORRECT_FILE_EXTENSION")
      expect(error.message).toBe("Unexpected file extension of path /nonexistent/data.txt, expected .json")
    }).pipe(provideNodeContext))

  it.effect("reports missing files", () =>
    withTempDir(({ path, tempDir }) =>
      Effect.gen(function*(_) {
        const missing = path.join(tempDir, "missing.json")
        const error = leftOf(yield* _(Effect.either(parseFile(missing, standard))))
        expect(error.kind).toBe("FILE_NOT_FOUND")
        expect(error.message).toBe(`No file found at path ${missing}`)
        expect(error.location).toBeUndefined()
      })
    ).pipe(provideNodeContext))

  it.effect("parses file contents with the requested profile", () =>
    withTempDir(({ fs, path, tempDir }) =>
      Effect.gen(function*(_) {
        const file = path.join(tempDir, "data.json")
        yield* _(fs.writeFileString(file, `{"n": 3000000000}`))
        const parsed = yield* _(parseFile(file, standard))
        expect(equals(parsed, jsonObject<bigint, number>([["n", jsonInteger(3000000000n)]]))).toBe(true)
        const error = leftOf(yield* _(Effect.either(parseFile(file, narrow))))
        expect(error.kind).toBe("INTEGER_TYPE_TOO_NARROW")
        expect(error.location).toEqual({ line: 1, column: 7 })
      })
    ).pipe(provideNodeContext))
})

describe("writeToFile", () => {
  it.effect("writes text that parseFile reads back", () =>
    withTempDir(({ fs, path, tempDir }) =>
      Effect.gen(function*(_) {
        const file = path.join(tempDir, "out.json")
        const value = jsonArray<bigint, number>([jsonString("x"), jsonFloat(0.5)])
        yield* _(writeToFile(value, file, standard))
        expect(yield* _(fs.readFileString(file))).toBe("[\n\t\"x\",\n\t0.5\n]")
        const reread = yield* _(parseFile(file, standard))
        expect(equals(reread, value)).toBe(true)
      })
    ).pipe(provideNodeContext))

  it.effect("writes nothing when formatting fails", () =>
    withTempDir(({ fs, path, tempDir }) =>
      Effect.gen(function*(_) {
        const file = path.join(tempDir, "nan.json")
        const error = leftOf(yield* _(Effect.either(writeToFile(jsonFloat(Number.NaN), file, standard))))
        expect(error.kind).toBe("CONVERSION_FAILURE")
        expect(yield* _(fs.exists(file))).toBe(false)
      })
    ).pipe(provideNodeContext))

  it.effect("reports destinations that cannot be written", () =>
    withTempDir(({ path, tempDir }) =>
      Effect.gen(function*(_) {
        const file = path.join(tempDir, "no-such-dir", "out.json")
        const error = leftOf(yield* _(Effect.either(writeToFile(jsonArray<bigint, number>([]), file, standard))))
        expect(error._tag).toBe("FormattingError")
        expect(error.kind).toBe("FILE_WRITE_ERROR")
      })
    ).pipe(provideNodeContext))
})

describe("debug traces", () => {
  it.effect("stay silent at the default log level", () =>
    Effect.gen(function*(_) {
      const messages: Array<string> = []
      yield* _(parseSource("[1]", standard).pipe(Effect.provide(captureLogs(messages))))
      expect(messages).toEqual([])
    }))

  it.effect("report successes and failures at debug level", () =>
    Effect.gen(function*(_) {
      const messages: Array<string> = []
      const traced = <A, E>(effect: Effect.Effect<A, E>) =>
        effect.pipe(Logger.withMinimumLogLevel(LogLevel.Debug), Effect.provide(captureLogs(messages)))
      const parsed = yield* _(traced(parseSource("[1]", standard)))
      expect(parsed._tag).toBe("Array")
      yield* _(Effect.either(traced(parseSource("[1,]", standard))))
      expect(messages).toEqual([
        "Source was successfully parsed",
        "UNEXPECTED_TOKEN: Unexpected token 'right-bracket', expected a value (line 1, column 4)"
      ])
    }))
})
