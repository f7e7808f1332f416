import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { loadConfigFile } from "../../src/shell/config-file.js"
import { provideNodeContext, withTempDir } from "../app/test-helpers.js"
import { leftOf } from "../core/either-helpers.js"

describe("loadConfigFile", () => {
  it.effect("returns undefined when the default config is absent", () =>
    withTempDir(({ path, tempDir }) =>
      Effect.gen(function*(_) {
        const config = yield* _(loadConfigFile(path.join(tempDir, ".json-codec.json"), false))
        expect(config).toBeUndefined()
      })
    ).pipe(provideNodeContext))

  it.effect("fails when an explicit config is absent", () =>
    withTempDir(({ path, tempDir }) =>
      Effect.gen(function*(_) {
        const missing = path.join(tempDir, "custom.json")
        const error = leftOf(yield* _(Effect.either(loadConfigFile(missing, true))))
        expect(error._tag).toBe("ConfigError")
        expect(error.message).toBe(`Config file not found: ${missing}`)
      })
    ).pipe(provideNodeContext))

  it.effect("decodes profile and trace", () =>
    withTempDir(({ fs, path, tempDir }) =>
      Effect.gen(function*(_) {
        const file = path.join(tempDir, ".json-codec.json")
        yield* _(fs.writeFileString(file, `{\n\t"profile": "narrow",\n\t"trace": true\n}`))
        expect(yield* _(loadConfigFile(file, false))).toEqual({ profile: "narrow", trace: true })
      })
    ).pipe(provideNodeContext))

  it.effect("leaves omitted keys out", () =>
    withTempDir(({ fs, path, tempDir }) =>
      Effect.gen(function*(_) {
        const file = path.join(tempDir, ".json-codec.json")
        yield* _(fs.writeFileString(file, "{}"))
        expect(yield* _(loadConfigFile(file, false))).toEqual({})
      })
    ).pipe(provideNodeContext))

  it.effect("rejects unknown profile names", () =>
    withTempDir(({ fs, path, tempDir }) =>
      Effect.gen(function*(_) {
        const file = path.join(tempDir, ".json-codec.json")
        yield* _(fs.writeFileString(file, `{"profile": "huge"}`))
        const error = leftOf(yield* _(Effect.either(loadConfigFile(file, false))))
        expect(error._tag).toBe("ConfigError")
      })
    ).pipe(provideNodeContext))

  it.effect("reports malformed JSON with the parser's diagnosis", () =>
    withTempDir(({ fs, path, tempDir }) =>
      Effect.gen(function*(_) {
        const file = path.join(tempDir, ".json-codec.json")
        yield* _(fs.writeFileString(file, `{"profile": `))
        const error = leftOf(yield* _(Effect.either(loadConfigFile(file, false))))
        expect(error._tag).toBe("ConfigError")
        expect(error.message).toBe(
          `${file}: UNEXPECTED_SOURCE_END: Source ended before the object was completely parsed`
        )
      })
    ).pipe(provideNodeContext))
})
