import type { PlatformError } from "@effect/platform/Error"
import { FileSystem } from "@effect/platform/FileSystem"
import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Path } from "@effect/platform/Path"
import type { Path as PathService } from "@effect/platform/Path"
import * as Effect from "effect/Effect"
import type * as Either from "effect/Either"

import type { FormattingError, ParsingError } from "../core/errors.js"
import { formattingError, parsingError, renderFormattingError, renderParsingError } from "../core/errors.js"
import { parseText } from "../core/parser.js"
import type { Profile } from "../core/representation.js"
import { format } from "../core/serializer.js"
import type { Value } from "../core/value.js"

// CHANGE: wrap the pure codec with file IO and debug traces
// WHY: keep reading and writing paths at the edge while the core stays pure
// QUOTE(ECMA-404): n/a
// REF: req-codec-io-1
// SOURCE: n/a
// FORMAT THEOREM: ∀p, v: writeToFile(v, p); parseFile(p) ≡ v for representable v
// PURITY: SHELL
// EFFECT: Effect<Value, ParsingError, FileSystem | Path>, Effect<void, FormattingError, FileSystem>
// INVARIANT: traces are emitted at Debug level and never change results
// COMPLEXITY: O(n)

type CodecEnv = FileSystemService | PathService

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

const traceParsingError = (error: ParsingError): Effect.Effect<void> => Effect.logDebug(renderParsingError(error))

const traceFormattingError = (error: FormattingError): Effect.Effect<void> =>
  Effect.logDebug(renderFormattingError(error))

/**
 * Parse in-memory source with debug traces.
 *
 * @param source - Text or UTF-8 bytes.
 * @param profile - Target representations.
 * @returns Effect with the parsed Value.
 *
 * @pure false
 * @effect Logger
 * @invariant result equals parseText(source, profile)
 * @complexity O(n)
 */
export const parseSource = <I, F>(
  source: string | Uint8Array,
  profile: Profile<I, F>
): Effect.Effect<Value<I, F>, ParsingError> =>
  fromEither(parseText(source, profile)).pipe(
    Effect.tap(() => Effect.logDebug("Source was successfully parsed")),
    Effect.tapError(traceParsingError)
  )

export const formatValue = <I, F>(
  value: Value<I, F>,
  profile: Profile<I, F>
): Effect.Effect<string, FormattingError> =>
  fromEither(format(value, profile)).pipe(Effect.tapError(traceFormattingError))

const readFailure = (kind: "FILE_NOT_FOUND" | "FILE_READ_ERROR", path: string) => (error: PlatformError) =>
  parsingError(kind, `Could not read ${path}: ${error.message}`)

/**
 * Read a .json file and parse its contents.
 *
 * @param path - File path; must end in .json.
 * @param profile - Target representations.
 * @returns Effect with the parsed Value.
 *
 * @pure false
 * @effect FileSystem, Path, Logger
 * @invariant extension is checked before existence, existence before reading
 * @complexity O(n)
 */
export const parseFile = <I, F>(
  path: string,
  profile: Profile<I, F>
): Effect.Effect<Value<I, F>, ParsingError, CodecEnv> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const paths = yield* _(Path)
    if (paths.extname(path) !== ".json") {
      return yield* _(
        Effect.fail(parsingError("INCORRECT_FILE_EXTENSION", `Unexpected file extension of path ${path}, expected .json`))
      )
    }
    const exists = yield* _(fs.exists(path).pipe(Effect.mapError(readFailure("FILE_NOT_FOUND", path))))
    if (!exists) {
      return yield* _(Effect.fail(parsingError("FILE_NOT_FOUND", `No file found at path ${path}`)))
    }
    yield* _(Effect.logDebug(`Reading file: ${path}`))
    const bytes = yield* _(fs.readFile(path).pipe(Effect.mapError(readFailure("FILE_READ_ERROR", path))))
    const value = yield* _(fromEither(parseText(bytes, profile)))
    yield* _(Effect.logDebug(`Successfully parsed ${path}`))
    return value
  }).pipe(Effect.tapError(traceParsingError))

/**
 * Serialize a value and write it to a path.
 *
 * @param value - Tree to write.
 * @param path - Destination; created or truncated.
 * @param profile - Representations the tree was built with.
 * @returns Effect that completes once the file is written.
 *
 * @pure false
 * @effect FileSystem, Logger
 * @invariant nothing is written when formatting fails
 * @complexity O(n)
 */
export const writeToFile = <I, F>(
  value: Value<I, F>,
  path: string,
  profile: Profile<I, F>
): Effect.Effect<void, FormattingError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const text = yield* _(formatValue(value, profile))
    yield* _(Effect.logDebug(`Writing to file: ${path}`))
    yield* _(
      fs.writeFileString(path, text).pipe(
        Effect.mapError((error) => formattingError("FILE_WRITE_ERROR", `Could not write ${path}: ${error.message}`)),
        Effect.tapError(traceFormattingError)
      )
    )
    yield* _(Effect.logDebug(`Successfully wrote to file: ${path}`))
  })
