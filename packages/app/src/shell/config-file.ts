import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import type { Path as PathService } from "@effect/platform/Path"
import * as S from "@effect/schema/Schema"
import * as TreeFormatter from "@effect/schema/TreeFormatter"
import * as Effect from "effect/Effect"
import { pipe } from "effect/Function"

import type { FileConfig } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import { configError, renderParsingError } from "../core/errors.js"
import { safe } from "../core/representation.js"
import type { Plain } from "../core/value.js"
import { toPlain } from "../core/value.js"
import { parseFile } from "./codec.js"

// CHANGE: decode .json-codec.json with the codec itself plus schema validation
// WHY: keep boundary data typed and reject invalid config early
// QUOTE(ECMA-404): n/a
// REF: req-config-file-1
// SOURCE: n/a
// FORMAT THEOREM: ∀c: decode(c) = Right(cfg) → cfg fields have correct types
// PURITY: SHELL
// EFFECT: Effect<FileConfig | undefined, AppError, FileSystem | Path>
// INVARIANT: missing implicit config yields undefined
// COMPLEXITY: O(n)

const RawConfigSchema = S.partial(
  S.Struct({
    profile: S.Literal("standard", "narrow", "safe"),
    trace: S.Boolean
  })
)

const decodeConfig = (plain: Plain<number, number>): Effect.Effect<FileConfig, AppError> =>
  pipe(
    S.decodeUnknown(RawConfigSchema)(plain),
    Effect.map((config) => ({
      ...(config.profile === undefined ? {} : { profile: config.profile }),
      ...(config.trace === undefined ? {} : { trace: config.trace })
    })),
    Effect.mapError((error) => configError(TreeFormatter.formatErrorSync(error)))
  )

export const loadConfigFile = (
  path: string,
  explicit: boolean
): Effect.Effect<FileConfig | undefined, AppError, FileSystemService | PathService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const exists = yield* _(
      fs.exists(path).pipe(Effect.mapError((error) => configError(String(error))))
    )
    if (!exists) {
      if (explicit) {
        return yield* _(Effect.fail(configError(`Config file not found: ${path}`)))
      }
      return undefined
    }
    const value = yield* _(
      parseFile(path, safe).pipe(
        Effect.mapError((error) => configError(`${path}: ${renderParsingError(error)}`))
      )
    )
    return yield* _(decodeConfig(toPlain(value)))
  })
